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

import { LexerState } from "./LexerState.js";

// What the context stack needs from the lexer
export interface LexerService {
    // undefined if the file cannot be read
    openFile(path: string): LexerState | undefined;
    openView(label: string, body: string, lineNo: number): LexerState;

    setState(state: LexerState): void;

    // switch once the current line is done
    setStateAtEOL(state: LexerState): void;

    restartRept(lineNo: number): void;

    getLineNo(): number;
    getIfDepth(): number;
}

export interface MacroArgs {
    readonly args: readonly string[];
}

// Provides the values for \1..\9, \# and \@ while lexing
export interface SubstitutionSource {
    getMacroArgs(): MacroArgs | undefined;
    getUniqueId(): number | undefined;
}
