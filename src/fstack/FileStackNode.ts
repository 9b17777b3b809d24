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

export enum NodeType {
    Rept,
    File,
    Macro,
}

export type FileStackNode = FileNode | MacroNode | ReptNode;
export type NamedNode = FileNode | MacroNode;

export interface BaseNode {
    readonly type: NodeType;

    // slot in the owning arena, stable for the node's lifetime
    readonly id: number;

    // arena slot of the parent, undefined only for the top-level file
    parent?: number;

    // line of the parent at which this node was entered
    lineNo: number;

    // captured by a section, symbol or patch: must be copied instead of mutated, never freed on pop
    referenced: boolean;

    // index in the output's node list, assigned once the node is registered
    outputId?: number;
}

export interface FileNode extends BaseNode {
    type: NodeType.File;
    name: string;
}

export interface MacroNode extends BaseNode {
    type: NodeType.Macro;
    name: string;
}

export interface ReptNode extends BaseNode {
    type: NodeType.Rept;

    // current iteration of each enclosing REPT/FOR, innermost first; starts at 1
    iters: number[];
}

export function isNamedNode(node: FileStackNode): node is NamedNode {
    return node.type != NodeType.Rept;
}

export function reptSuffix(iters: readonly number[]): string {
    let suffix = "";
    for (let i = iters.length - 1; i >= 0; i--) {
        suffix += `::REPT~${iters[i]}`;
    }
    return suffix;
}
