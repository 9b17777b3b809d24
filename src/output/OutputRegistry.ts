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
import { OutputService } from "../assembler/Services.js";
import { FileStackNode } from "../fstack/FileStackNode.js";
import { Patch, PatchType, Section } from "../section/Section.js";

export interface OutputSources {
    // marks and returns the current node
    getFileStack(): FileStackNode | undefined;
    getParentNode(node: FileStackNode): FileStackNode | undefined;
    getLineNo(): number;
    getCurrentSection(): Section | undefined;
    getSymbolSection(): Section | undefined;
    getSymbolOffset(): number;
}

/**
 * Collects what an object file would contain besides the sections themselves:
 * the file stack nodes that something refers to and the patches for values left to the linker.
 */
export class OutputRegistry implements OutputService {
    private nodes: FileStackNode[] = [];

    public constructor(private src: OutputSources) {
    }

    public registerNode(node: FileStackNode) {
        const chain: FileStackNode[] = [];
        for (let cur: FileStackNode | undefined = node; cur && cur.outputId === undefined; cur = this.src.getParentNode(cur)) {
            chain.push(cur);
        }

        // parents first, so that every parent has a smaller id than its children
        for (let i = chain.length - 1; i >= 0; i--) {
            chain[i].outputId = this.nodes.length;
            this.nodes.push(chain[i]);
        }
    }

    public createPatch(type: PatchType, expr: Expression, offset: number, pcShift: number) {
        const sect = this.src.getCurrentSection();
        const node = this.src.getFileStack();
        if (!sect || !node) {
            throw Error("Internal error: patch outside of a section");
        }
        this.registerNode(node);

        const patch: Patch = {
            type,
            src: node,
            lineNo: this.src.getLineNo(),
            offset,
            pcSection: this.src.getSymbolSection(),

            // @ is where the whole directive or instruction started
            pcOffset: this.src.getSymbolOffset() - pcShift,
            expr,
        };
        sect.patches.push(patch);
    }

    public getNodes(): readonly FileStackNode[] {
        return this.nodes;
    }
}
