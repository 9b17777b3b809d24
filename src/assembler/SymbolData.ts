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

import { FileStackNode } from "../fstack/FileStackNode.js";
import { Section } from "../section/Section.js";

export enum SymbolType {
    Macro,      // MACRO name ... ENDM
    Var,        // DEF name = x, FOR loop variables
    Label,      // name:
    PC,         // @
}

export type SymbolData = MacroSymbol | VarSymbol | LabelSymbol | PCSymbol;

export interface BaseSymbol {
    readonly type: SymbolType;
    readonly name: string;
}

export interface MacroSymbol extends BaseSymbol {
    type: SymbolType.Macro;
    body: string;

    // where the macro was defined, which names its expansions
    src: FileStackNode;
    fileLine: number;
}

export interface VarSymbol extends BaseSymbol {
    type: SymbolType.Var;
    value: number;
}

export interface LabelSymbol extends BaseSymbol {
    type: SymbolType.Label;
    section: Section;
    offset: number;
    src: FileStackNode;
    fileLine: number;
}

export interface PCSymbol extends BaseSymbol {
    type: SymbolType.PC;
}

export function isVar(sym: SymbolData | undefined): sym is VarSymbol {
    return sym?.type == SymbolType.Var;
}
