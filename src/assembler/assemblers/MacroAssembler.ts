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
import { ContextStack } from "../../fstack/ContextStack.js";
import { SourceLexer } from "../../lexer/SourceLexer.js";
import { SubComponents } from "../Assembler.js";
import { SymbolTable } from "../SymbolTable.js";
import { ExprEvaluator } from "../util/ExprEvaluator.js";
import { RegisterFunction, Statement, isKeyword, parseStatement, parseString, splitOperands } from "../util/Statement.js";

const NameRegex = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Assembler for statements that change what is being read:
 * macros, repetitions and included files.
 */
export class MacroAssembler {
    private diag: Diagnostics;
    private lexer: SourceLexer;
    private fstack: ContextStack;
    private syms: SymbolTable;
    private evaluator: ExprEvaluator;

    public constructor(components: SubComponents) {
        this.diag = components.diag;
        this.lexer = components.lexer;
        this.fstack = components.fstack;
        this.syms = components.symbols;
        this.evaluator = components.evaluator;
    }

    public registerStatements(register: RegisterFunction) {
        register("MACRO", this.handleMacro.bind(this));
        register("ENDM", () => this.diag.error("Found ENDM outside of a MACRO definition"));
        register("REPT", this.handleRept.bind(this));
        register("FOR", this.handleFor.bind(this));
        register("ENDR", () => this.diag.error("Found ENDR outside of a REPT/FOR block"));
        register("BREAK", this.handleBreak.bind(this));
        register("INCLUDE", this.handleInclude.bind(this));
    }

    public handleInvocation(stmt: Statement) {
        if (stmt.keyword === undefined) {
            return;
        }
        this.fstack.runMacro(stmt.keyword, { args: splitOperands(stmt.operands) });
    }

    private handleMacro(stmt: Statement) {
        const name = stmt.operands;
        const fileLine = this.lexer.getLineNo();
        const body = this.captureBody(["MACRO"], "ENDM");
        if (body === undefined) {
            this.diag.error("Unterminated macro definition");
            return;
        }

        if (!NameRegex.test(name)) {
            this.diag.error(`Invalid macro name '${name}'`);
            return;
        }

        const src = this.fstack.getFileStack();
        if (!src) {
            throw Error("Internal error: macro defined without a context");
        }
        this.syms.addMacro(name, body, src, fileLine);
    }

    private handleRept(stmt: Statement) {
        const count = this.evaluator.evalConstant(stmt.operands);
        const reptLineNo = this.lexer.getLineNo();
        const body = this.captureBody(["REPT", "FOR"], "ENDR");
        if (body === undefined) {
            this.diag.error("Unterminated REPT/FOR block");
            return;
        }

        if (count === undefined) {
            return;
        }
        if (count < 0) {
            this.diag.error(`REPT count must not be negative, not ${count}`);
            return;
        }
        this.fstack.runRept(count, reptLineNo, body);
    }

    // FOR name, stop | FOR name, start, stop | FOR name, start, stop, step
    private handleFor(stmt: Statement) {
        const ops = splitOperands(stmt.operands);
        const reptLineNo = this.lexer.getLineNo();
        const params = this.parseForParams(ops);
        const body = this.captureBody(["REPT", "FOR"], "ENDR");
        if (body === undefined) {
            this.diag.error("Unterminated REPT/FOR block");
            return;
        }

        if (!params) {
            return;
        }
        const [name, start, stop, step] = params;
        this.fstack.runFor(name, start, stop, step, reptLineNo, body);
    }

    private parseForParams(ops: string[]): [string, number, number, number] | undefined {
        if (ops.length < 2 || ops.length > 4) {
            this.diag.error("FOR takes a variable name and one to three values");
            return undefined;
        }

        const name = ops[0];
        if (!NameRegex.test(name)) {
            this.diag.error(`Invalid FOR variable name '${name}'`);
            return undefined;
        }

        const values: number[] = [];
        for (const op of ops.slice(1)) {
            const val = this.evaluator.evalConstant(op);
            if (val === undefined) {
                return undefined;
            }
            values.push(val);
        }

        switch (values.length) {
            case 1:     return [name, 0, values[0], 1];
            case 2:     return [name, values[0], values[1], 1];
            default:    return [name, values[0], values[1], values[2]];
        }
    }

    private handleBreak() {
        if (this.fstack.break()) {
            this.lexer.skipRestOfView();
        }
    }

    private handleInclude(stmt: Statement) {
        const path = parseString(stmt.operands);
        if (path === undefined) {
            this.diag.error("INCLUDE takes a quoted file name");
            return;
        }
        this.fstack.runInclude(path);
    }

    /**
     * Reads raw lines up to the terminator that matches the block just opened.
     * @returns the lines in between, undefined if the view ended first
     */
    private captureBody(openers: string[], terminator: string): string | undefined {
        const lines: string[] = [];
        let depth = 0;

        for (let line = this.lexer.nextRawLine(); line !== undefined; line = this.lexer.nextRawLine()) {
            const stmt = parseStatement(line);
            if (isKeyword(stmt, ...openers)) {
                depth++;
            } else if (isKeyword(stmt, terminator)) {
                if (depth == 0) {
                    return lines.join("\n");
                }
                depth--;
            }
            lines.push(line);
        }
        return undefined;
    }
}
