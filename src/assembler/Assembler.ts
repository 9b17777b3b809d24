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

import { Diagnostics, DiagnosticsOptions } from "../diagnostics/Diagnostics.js";
import { ContextStack, ContextStackOptions } from "../fstack/ContextStack.js";
import { FileStackNode } from "../fstack/FileStackNode.js";
import { SourceLexer } from "../lexer/SourceLexer.js";
import { OutputRegistry } from "../output/OutputRegistry.js";
import { Section } from "../section/Section.js";
import { SectionTable, SectionTableOptions } from "../section/SectionTable.js";
import { CodeError, FatalError } from "../utils/CodeError.js";
import { SymbolData } from "./SymbolData.js";
import { SymbolTable } from "./SymbolTable.js";
import { ConditionalAssembler } from "./assemblers/ConditionalAssembler.js";
import { DataAssembler } from "./assemblers/DataAssembler.js";
import { MacroAssembler } from "./assemblers/MacroAssembler.js";
import { SectionAssembler } from "./assemblers/SectionAssembler.js";
import { SymbolAssembler } from "./assemblers/SymbolAssembler.js";
import { ExprEvaluator } from "./util/ExprEvaluator.js";
import { Statement, StatementHandler, parseStatement } from "./util/Statement.js";

export interface AssemblerOptions extends ContextStackOptions, SectionTableOptions, DiagnosticsOptions {
}

export interface SubComponents {
    options: AssemblerOptions;
    diag: Diagnostics;
    lexer: SourceLexer;
    fstack: ContextStack;
    symbols: SymbolTable;
    sections: SectionTable;
    evaluator: ExprEvaluator;

    // ends the pass after the current statement
    stopPass: () => void;
}

export interface AssemblerOutput {
    // everything reported, in order
    diagnostics: readonly CodeError[];
    errors: readonly CodeError[];
    warnings: readonly CodeError[];
    sections: readonly Section[];
    nodes: readonly FileStackNode[];
    symbols: ReadonlyMap<string, SymbolData>;
    dependencies: readonly string[];
    failedOnMissingInclude: boolean;
}

/**
 * A single assembly pass over a main file and everything it pulls in.
 */
export class Assembler {
    private opts: AssemblerOptions;
    private diag: Diagnostics;
    private lexer: SourceLexer;
    private fstack: ContextStack;
    private syms: SymbolTable;
    private sections: SectionTable;
    private output: OutputRegistry;
    private evaluator: ExprEvaluator;

    private stmtHandlers = new Map<string, StatementHandler>();
    private symbolAsm: SymbolAssembler;
    private macroAsm: MacroAssembler;
    private stopped = false;
    private done = false;

    public constructor(options: AssemblerOptions) {
        this.opts = options;
        this.diag = new Diagnostics(options);

        // the components refer to each other, so some are reached through closures
        this.syms = new SymbolTable(this.diag, {
            getSymbolSection: () => this.sections.getSymbolSection(),
            getSymbolOffset: () => this.sections.getSymbolOffset(),
            getFileStack: () => this.fstack.getFileStack(),
            getLineNo: () => this.lexer.getLineNo(),
        });
        this.lexer = new SourceLexer(this.diag, {
            getMacroArgs: () => this.fstack.getMacroArgs(),
            getUniqueId: () => this.fstack.getUniqueId(),
        });
        this.fstack = new ContextStack({ lexer: this.lexer, symbols: this.syms, diag: this.diag }, options);
        this.output = new OutputRegistry({
            getFileStack: () => this.fstack.getFileStack(),
            getParentNode: node => this.fstack.getParentNode(node),
            getLineNo: () => this.lexer.getLineNo(),
            getCurrentSection: () => this.sections.getCurrentSection(),
            getSymbolSection: () => this.sections.getSymbolSection(),
            getSymbolOffset: () => this.sections.getSymbolOffset(),
        });
        this.sections = new SectionTable({
            fstack: this.fstack,
            lexer: this.lexer,
            symbols: this.syms,
            diag: this.diag,
            output: this.output,
        }, options);
        this.evaluator = new ExprEvaluator(this.diag, this.syms);
        this.diag.setLocator(() => this.fstack.dumpCurrent());

        const components: SubComponents = {
            options: this.opts,
            diag: this.diag,
            lexer: this.lexer,
            fstack: this.fstack,
            symbols: this.syms,
            sections: this.sections,
            evaluator: this.evaluator,
            stopPass: () => {
                this.stopped = true;
            },
        };

        const register = this.registerStatement.bind(this);
        const sectionAsm = new SectionAssembler(components);
        sectionAsm.registerStatements(register);
        new DataAssembler(components, sectionAsm).registerStatements(register);
        new ConditionalAssembler(components).registerStatements(register);
        this.symbolAsm = new SymbolAssembler(components);
        this.symbolAsm.registerStatements(register);
        this.macroAsm = new MacroAssembler(components);
        this.macroAsm.registerStatements(register);
    }

    private registerStatement(keyword: string, handler: StatementHandler) {
        if (this.stmtHandlers.has(keyword)) {
            throw Error(`Multiple handlers for ${keyword}`);
        }
        this.stmtHandlers.set(keyword, handler);
    }

    public run(mainPath: string): AssemblerOutput {
        if (this.done) {
            throw Error("An assembler instance can only run once");
        }
        this.done = true;

        try {
            this.fstack.init(mainPath);
            this.assembleAll();

            if (!this.fstack.failedOnMissingInclude) {
                this.sections.checkUnionClosed();
                this.sections.checkLoadClosed();
                this.sections.checkStack();
                this.sections.checkSizes();
            }
        } catch (e) {
            if (!(e instanceof FatalError)) {
                throw e;
            }
        }

        return {
            diagnostics: this.diag.getDiagnostics(),
            errors: this.diag.getErrors(),
            warnings: this.diag.getWarnings(),
            sections: this.sections.getSections(),
            nodes: this.output.getNodes(),
            symbols: this.syms.getSymbols(),
            dependencies: this.fstack.includePaths.getDependencyLines(),
            failedOnMissingInclude: this.fstack.failedOnMissingInclude,
        };
    }

    public getSectionTable(): SectionTable {
        return this.sections;
    }

    private assembleAll() {
        while (!this.stopped && !this.fstack.failedOnMissingInclude) {
            const line = this.lexer.nextLine();
            if (line === undefined) {
                if (this.fstack.endOfBody()) {
                    return;
                }
                continue;
            }
            this.assembleStatement(parseStatement(line));
        }
    }

    private assembleStatement(stmt: Statement) {
        if (stmt.label !== undefined) {
            this.symbolAsm.handleLabel(stmt.label);
        }

        if (stmt.keyword === undefined) {
            if (stmt.operands != "") {
                this.diag.error(`Syntax error: unexpected '${stmt.operands}'`);
            }
            return;
        }

        const handler = this.stmtHandlers.get(stmt.keyword.toUpperCase());
        if (handler) {
            handler(stmt);
        } else {
            this.macroAsm.handleInvocation(stmt);
        }
    }
}
