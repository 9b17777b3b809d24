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
import { SubComponents } from "../Assembler.js";
import { SymbolTable } from "../SymbolTable.js";
import { ExprEvaluator } from "../util/ExprEvaluator.js";
import { RegisterFunction, Statement } from "../util/Statement.js";

/**
 * Assembler for statements related to symbol table manipulation.
 */
export class SymbolAssembler {
    private diag: Diagnostics;
    private syms: SymbolTable;
    private evaluator: ExprEvaluator;

    public constructor(components: SubComponents) {
        this.diag = components.diag;
        this.syms = components.symbols;
        this.evaluator = components.evaluator;
    }

    public registerStatements(register: RegisterFunction) {
        register("DEF", this.handleDef.bind(this));
    }

    public handleLabel(name: string) {
        this.syms.addLabel(name);
    }

    // DEF name = value
    private handleDef(stmt: Statement) {
        const match = stmt.operands.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.+)$/);
        if (!match) {
            this.diag.error("DEF takes the form 'DEF name = value'");
            return;
        }

        const value = this.evaluator.evalConstant(match[2]);
        if (value !== undefined) {
            this.syms.addVar(match[1], value);
        }
    }
}
