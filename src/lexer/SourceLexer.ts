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

import { readFileSync } from "fs";
import { Diagnostics } from "../diagnostics/Diagnostics.js";
import { LexerService, SubstitutionSource } from "./LexerService.js";
import { LexerState } from "./LexerState.js";

/**
 * Line-oriented lexer over the currently active source view.
 * Substitutes macro arguments and the unique expansion id as lines are read.
 */
export class SourceLexer implements LexerService {
    private diag: Diagnostics;
    private subst: SubstitutionSource;
    private state?: LexerState;
    private pendingState?: LexerState;

    public constructor(diag: Diagnostics, subst: SubstitutionSource) {
        this.diag = diag;
        this.subst = subst;
    }

    public openFile(path: string): LexerState | undefined {
        let text: string;
        try {
            text = readFileSync(path, "utf-8");
        } catch {
            return undefined;
        }
        return new LexerState(path, text, 0);
    }

    public openView(label: string, body: string, lineNo: number): LexerState {
        return new LexerState(label, body, lineNo);
    }

    public setState(state: LexerState) {
        this.state = state;
        this.pendingState = undefined;
    }

    public setStateAtEOL(state: LexerState) {
        this.pendingState = state;
    }

    public restartRept(lineNo: number) {
        this.current().rewind(lineNo);
    }

    public getLineNo(): number {
        return this.state?.lineNo ?? 0;
    }

    public getIfDepth(): number {
        return this.state?.ifDepth ?? 0;
    }

    // undefined at the end of the current view
    public nextLine(): string | undefined {
        const raw = this.nextRawLine();
        if (raw === undefined) {
            return undefined;
        }
        return this.substitute(raw);
    }

    // Lines of captured bodies are kept verbatim, they get substituted when they are replayed
    public nextRawLine(): string | undefined {
        this.applyPendingState();
        return this.state?.next();
    }

    public skipRestOfView() {
        this.current().skipToEnd();
    }

    public enterIf() {
        this.current().enterIf();
    }

    public leaveIf(): boolean {
        return this.current().leaveIf();
    }

    private applyPendingState() {
        if (this.pendingState) {
            this.state = this.pendingState;
            this.pendingState = undefined;
        }
    }

    private current(): LexerState {
        this.applyPendingState();
        if (!this.state) {
            throw Error("Internal error: no active source view");
        }
        return this.state;
    }

    private substitute(line: string): string {
        if (!line.includes("\\")) {
            return line;
        }

        return line.replace(/\\([1-9#@\\])/g, (_match, what: string) => {
            switch (what) {
                case "\\":
                    return "\\";
                case "@":
                    return this.uniqueIdText();
                case "#":
                    return this.subst.getMacroArgs()?.args.join(", ") ?? this.outsideMacro("\\#");
                default:
                    return this.macroArg(Number.parseInt(what, 10));
            }
        });
    }

    private uniqueIdText(): string {
        const id = this.subst.getUniqueId();
        if (id === undefined) {
            this.diag.error("'\\@' cannot be used outside of a macro or REPT/FOR block");
            return "";
        }
        return `_u${id}`;
    }

    private macroArg(num: number): string {
        const args = this.subst.getMacroArgs();
        if (!args) {
            return this.outsideMacro(`\\${num}`);
        }
        const arg = args.args[num - 1];
        if (arg === undefined) {
            this.diag.error(`Macro argument '\\${num}' not defined`);
            return "";
        }
        return arg;
    }

    private outsideMacro(what: string): string {
        this.diag.error(`'${what}' cannot be used outside of a macro`);
        return "";
    }
}
