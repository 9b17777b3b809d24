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

import { Expression } from "../assembler/Expression.js";
import { FileStackNode } from "../fstack/FileStackNode.js";
import { SectionType } from "./SectionType.js";

export enum SectionModifier {
    Normal,
    Union,
    Fragment,
}

export const SectionModifierNames: Record<SectionModifier, string> = {
    [SectionModifier.Normal]: "regular",
    [SectionModifier.Union]: "UNION",
    [SectionModifier.Fragment]: "FRAGMENT",
};

// Placement attributes of a declaration besides the type and the fixed address
export interface SectionSpec {
    bank?: number;
    alignment: number;
    alignOffset: number;
}

export enum PatchType {
    Byte,
    Word,
    Long,
    JR,
}

export interface Patch {
    type: PatchType;
    src: FileStackNode;
    lineNo: number;

    // where in the section the value goes
    offset: number;

    // section and offset that @ refers to inside the expression
    pcSection?: Section;
    pcOffset: number;

    expr: Expression;
}

export interface SectionInit {
    name: string;
    type: SectionType;
    modifier: SectionModifier;
    src: FileStackNode;
    fileLine: number;
    org?: number;
    bank?: number;
    align: number;
    alignOffset: number;
    dataSize: number;
}

export class Section {
    public readonly name: string;
    public readonly type: SectionType;
    public modifier: SectionModifier;
    public readonly src: FileStackNode;
    public readonly fileLine: number;

    public size = 0;
    public org?: number;
    public bank?: number;
    public align: number;
    public alignOffset: number;

    // only allocated for ROM sections
    public readonly data: Uint8Array;

    public readonly patches: Patch[] = [];

    public constructor(init: SectionInit) {
        this.name = init.name;
        this.type = init.type;
        this.modifier = init.modifier;
        this.src = init.src;
        this.fileLine = init.fileLine;
        this.org = init.org;
        this.bank = init.bank;
        this.align = init.align;
        this.alignOffset = init.alignOffset;
        this.data = new Uint8Array(init.dataSize);
    }
}

export interface UnionStackEntry {
    start: number;

    // largest member seen so far
    size: number;
}

export type LabelScopes = readonly [global: string | undefined, local: string | undefined];

// Everything PUSHS saves and POPS restores
export interface SectionStackEntry {
    section?: Section;
    loadSection?: Section;
    labelScopes: LabelScopes;
    offset: number;
    loadOffset: number;
    unionStack: UnionStackEntry[];
}
