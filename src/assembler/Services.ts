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
import { LabelScopes, PatchType } from "../section/Section.js";
import { Expression } from "./Expression.js";
import { SymbolData } from "./SymbolData.js";

// What the core needs from the symbol table
export interface SymbolService {
    findExactSymbol(name: string): SymbolData | undefined;

    // returns the existing symbol instead if the name is taken by something else
    addVar(name: string, value: number): SymbolData;

    // undefined outside of any section
    getPC(): SymbolData | undefined;
    getValue(sym: SymbolData): number;

    getCurrentLabelScopes(): LabelScopes;
    setCurrentLabelScopes(scopes: LabelScopes): void;
    resetCurrentLabelScopes(): void;
}

// Where the current context is, for stamping sections, symbols and patches
export interface FileStackService {
    // marks the returned node and its parents as referenced
    getFileStack(): FileStackNode | undefined;
    dump(node: FileStackNode, lineNo: number): string;
    findFile(path: string): string | undefined;

    // reports a file that could not be found, returns true if the pass must stop
    fileError(path: string, functionName: string): boolean;
}

// What the core needs from the object output
export interface OutputService {
    registerNode(node: FileStackNode): void;
    createPatch(type: PatchType, expr: Expression, offset: number, pcShift: number): void;
}
