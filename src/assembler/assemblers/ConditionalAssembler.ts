/*
 *   Yamas - Yet Another Macro Assembler (for the PDP-8)
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { Diagnostics } from "../../diagnostics/Diagnostics.js";
import { SourceLexer } from "../../lexer/SourceLexer.js";
import { SubComponents } from "../Assembler.js";
import { ExprEvaluator } from "../util/ExprEvaluator.js";
import { RegisterFunction, Statement, isKeyword, parseStatement } from "../util/Statement.js";

/**
 * Assembler for IF / ELSE / ENDC.
 * Open IFs are counted per source view, so a block cannot end with one still open.
 */
export class ConditionalAssembler {
    private diag: Diagnostics;
    private lexer: SourceLexer;
    private evaluator: ExprEvaluator;

    public constructor(components: SubComponents) {
        this.diag = components.diag;
        this.lexer = components.lexer;
        this.evaluator = components.evaluator;
    }

    public registerStatements(register: RegisterFunction) {
        register("IF", this.handleIf.bind(this));
        register("ELSE", this.handleElse.bind(this));
        register("ENDC", this.handleEndc.bind(this));
    }

    private handleIf(stmt: Statement) {
        const cond = this.evaluator.evalConstant(stmt.operands);
        this.lexer.enterIf();
        if (!cond) {
            this.skipBranch(true);
        }
    }

    // Reached while executing the taken branch
    private handleElse() {
        if (this.lexer.getIfDepth() == 0) {
            this.diag.error("Found ELSE outside of an IF construct");
            return;
        }
        this.skipBranch(false);
    }

    private handleEndc() {
        if (!this.lexer.leaveIf()) {
            this.diag.error("Found ENDC outside of an IF construct");
        }
    }

    // Skips to the matching ENDC, or to the matching ELSE if stopAtElse is set
    private skipBranch(stopAtElse: boolean) {
        let depth = 0;
        for (let line = this.lexer.nextRawLine(); line !== undefined; line = this.lexer.nextRawLine()) {
            const stmt = parseStatement(line);
            if (isKeyword(stmt, "IF")) {
                depth++;
            } else if (isKeyword(stmt, "ENDC")) {
                if (depth == 0) {
                    this.lexer.leaveIf();
                    return;
                }
                depth--;
            } else if (isKeyword(stmt, "ELSE") && depth == 0 && stopAtElse) {
                return;
            }
        }
    }
}
