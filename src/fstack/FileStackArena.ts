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

import { FileNode, FileStackNode, MacroNode, NodeType, ReptNode } from "./FileStackNode.js";

type NodeInit<T extends FileStackNode> = Omit<T, "id" | "referenced" | "outputId">;

/**
 * Owns every file stack node of a pass, addressed by stable slots.
 * Unreferenced nodes are handed back when their context is popped, referenced ones stay
 * until the whole arena is reset at the end of the pass.
 */
export class FileStackArena {
    private nodes: (FileStackNode | undefined)[] = [];
    private freeSlots: number[] = [];

    public newFile(init: NodeInit<FileNode>): FileNode {
        return this.store({ ...init, id: this.takeSlot(), referenced: false });
    }

    public newMacro(init: NodeInit<MacroNode>): MacroNode {
        return this.store({ ...init, id: this.takeSlot(), referenced: false });
    }

    public newRept(init: NodeInit<ReptNode>): ReptNode {
        return this.store({ ...init, id: this.takeSlot(), referenced: false });
    }

    // Copies everything but the referencing, so the copy may be mutated freely
    public duplicateRept(node: ReptNode): ReptNode {
        return this.newRept({
            type: NodeType.Rept,
            parent: node.parent,
            lineNo: node.lineNo,
            iters: [...node.iters],
        });
    }

    public get(id: number): FileStackNode {
        const node = this.nodes[id];
        if (!node) {
            throw Error(`Internal error: file stack slot ${id} is not in use`);
        }
        return node;
    }

    public getParent(node: FileStackNode): FileStackNode | undefined {
        return node.parent !== undefined ? this.get(node.parent) : undefined;
    }

    // Returns the slot for reuse unless something captured the node
    public release(node: FileStackNode): boolean {
        if (node.referenced) {
            return false;
        }
        if (this.nodes[node.id] !== node) {
            throw Error(`Internal error: releasing stale file stack node ${node.id}`);
        }
        this.nodes[node.id] = undefined;
        this.freeSlots.push(node.id);
        return true;
    }

    public markReferenced(node: FileStackNode) {
        let cur: FileStackNode | undefined = node;
        while (cur && !cur.referenced) {
            cur.referenced = true;
            cur.outputId = undefined;
            cur = this.getParent(cur);
        }
    }

    public get liveCount(): number {
        return this.nodes.length - this.freeSlots.length;
    }

    public reset() {
        this.nodes = [];
        this.freeSlots = [];
    }

    private takeSlot(): number {
        return this.freeSlots.pop() ?? this.nodes.length;
    }

    private store<T extends FileStackNode>(node: T): T {
        this.nodes[node.id] = node;
        return node;
    }
}
