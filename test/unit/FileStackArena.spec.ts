/* eslint-disable max-lines-per-function */
import { FileStackArena } from "../../src/fstack/FileStackArena.js";
import { NodeType } from "../../src/fstack/FileStackNode.js";

describe("GIVEN a file stack arena", () => {
    describe("WHEN nodes are created", () => {
        const arena = new FileStackArena();
        const main = arena.newFile({ type: NodeType.File, name: "main.asm", parent: undefined, lineNo: 0 });
        const rept = arena.newRept({ type: NodeType.Rept, parent: main.id, lineNo: 4, iters: [1] });

        test("THEN they get consecutive ids and start unreferenced", () => {
            expect(main.id).toEqual(0);
            expect(rept.id).toEqual(1);
            expect(rept.referenced).toBe(false);
            expect(arena.liveCount).toEqual(2);
        });

        test("THEN the parent can be looked up by id", () => {
            expect(arena.getParent(rept)).toBe(main);
            expect(arena.getParent(main)).toBeUndefined();
        });
    });

    describe("WHEN an unreferenced node is released", () => {
        const arena = new FileStackArena();
        const main = arena.newFile({ type: NodeType.File, name: "main.asm", parent: undefined, lineNo: 0 });
        const macro = arena.newMacro({ type: NodeType.Macro, name: "main.asm::m", parent: main.id, lineNo: 2 });
        const released = arena.release(macro);
        const next = arena.newRept({ type: NodeType.Rept, parent: main.id, lineNo: 3, iters: [1] });

        test("THEN its slot is reused", () => {
            expect(released).toBe(true);
            expect(next.id).toEqual(macro.id);
            expect(arena.liveCount).toEqual(2);
        });
    });

    describe("WHEN a node is marked as referenced", () => {
        const arena = new FileStackArena();
        const main = arena.newFile({ type: NodeType.File, name: "main.asm", parent: undefined, lineNo: 0 });
        const macro = arena.newMacro({ type: NodeType.Macro, name: "main.asm::m", parent: main.id, lineNo: 2 });
        const rept = arena.newRept({ type: NodeType.Rept, parent: macro.id, lineNo: 5, iters: [2] });
        arena.markReferenced(rept);

        test("THEN all of its parents are referenced as well", () => {
            expect(rept.referenced).toBe(true);
            expect(macro.referenced).toBe(true);
            expect(main.referenced).toBe(true);
        });

        test("THEN it is not released on pop", () => {
            expect(arena.release(rept)).toBe(false);
            expect(arena.get(rept.id)).toBe(rept);
        });
    });

    describe("WHEN a REPT node is duplicated", () => {
        const arena = new FileStackArena();
        const main = arena.newFile({ type: NodeType.File, name: "main.asm", parent: undefined, lineNo: 0 });
        const rept = arena.newRept({ type: NodeType.Rept, parent: main.id, lineNo: 1, iters: [1, 3] });
        arena.markReferenced(rept);
        const copy = arena.duplicateRept(rept);
        copy.iters[0]++;

        test("THEN the copy can change without touching the original", () => {
            expect(rept.iters).toEqual([1, 3]);
            expect(copy.iters).toEqual([2, 3]);
            expect(copy.referenced).toBe(false);
            expect(copy.parent).toEqual(main.id);
        });
    });

    describe("WHEN looking up a released slot", () => {
        const arena = new FileStackArena();
        const main = arena.newFile({ type: NodeType.File, name: "main.asm", parent: undefined, lineNo: 0 });
        arena.release(main);

        test("THEN it should throw", () => {
            expect(() => arena.get(main.id)).toThrow("not in use");
        });
    });
});
