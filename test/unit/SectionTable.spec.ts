/* eslint-disable max-lines-per-function */
import { FileStackService } from "../../src/assembler/Services.js";
import { SymbolTable } from "../../src/assembler/SymbolTable.js";
import { Diagnostics } from "../../src/diagnostics/Diagnostics.js";
import { FileNode, NodeType } from "../../src/fstack/FileStackNode.js";
import { SectionModifier, SectionSpec } from "../../src/section/Section.js";
import { SectionTable, SectionTableOptions } from "../../src/section/SectionTable.js";
import { SectionType } from "../../src/section/SectionType.js";
import { FatalError } from "../../src/utils/CodeError.js";

const floating: SectionSpec = { alignment: 0, alignOffset: 0 };

function setup(opts: SectionTableOptions = {}) {
    const diag = new Diagnostics({});
    const node: FileNode = { type: NodeType.File, id: 0, name: "test.asm", lineNo: 0, referenced: false };
    const fstack: FileStackService = {
        getFileStack: () => node,
        dump: (_node, lineNo) => `test.asm(${lineNo})`,
        findFile: () => undefined,
        fileError: () => false,
    };
    const output = { registerNode: vi.fn(), createPatch: vi.fn() };
    const syms: SymbolTable = new SymbolTable(diag, {
        getSymbolSection: () => table.getSymbolSection(),
        getSymbolOffset: () => table.getSymbolOffset(),
        getFileStack: () => node,
        getLineNo: () => 7,
    });
    const table: SectionTable = new SectionTable({ fstack, lexer: { getLineNo: () => 7 }, symbols: syms, diag, output }, opts);
    return { diag, output, syms, table };
}

function errorMessages(diag: Diagnostics): string[] {
    return diag.getErrors().map(e => e.message);
}

describe("GIVEN a section table", () => {
    describe("WHEN a section is created", () => {
        const { table, output } = setup();
        table.newSection("Code", SectionType.ROM0, 0x150, floating, SectionModifier.Normal);
        const sect = table.findSectionByName("Code");

        test("THEN it records where it was declared and registers the node", () => {
            expect(sect).toMatchObject({ name: "Code", org: 0x150, bank: 0, size: 0, fileLine: 7 });
            expect(output.registerNode).toHaveBeenCalledTimes(1);
            expect(table.getCurrentSection()).toBe(sect);
        });
    });

    describe("WHEN writing outside of a section", () => {
        const { table, diag } = setup();
        table.constByte(1);

        test("THEN it is an error", () => {
            expect(errorMessages(diag)).toEqual(["Cannot output data outside of a SECTION"]);
        });
    });

    describe("WHEN writing data into a RAM section", () => {
        const { table, diag } = setup();
        table.newSection("Vars", SectionType.WRAM0, undefined, floating, SectionModifier.Normal);
        table.constByte(1);
        table.skip(3, true);

        test("THEN only reserving space is allowed", () => {
            expect(errorMessages(diag)).toEqual(["Section 'Vars' cannot contain code or data (not ROM0 or ROMX)"]);
            expect(table.findSectionByName("Vars")?.size).toEqual(3);
        });
    });

    describe("WHEN a fragment literal is opened", () => {
        const { table } = setup();
        table.newSection("Code", SectionType.ROM0, undefined, floating, SectionModifier.Normal);
        table.constByte(1);
        const first = table.pushSectionFragmentLiteral();
        table.constByte(2);
        table.constByte(3);
        table.popSection();
        table.constByte(4);
        const second = table.pushSectionFragmentLiteral();
        table.popSection();

        const [parent, literal] = table.getSections();

        test("THEN it gets its own anonymous section with a fresh name", () => {
            expect(first).toEqual("$0");
            expect(second).toEqual("$1");
            expect(table.countSections()).toEqual(3);
            expect(literal.name).toEqual("Code");
            expect(Array.from(literal.data.subarray(0, literal.size))).toEqual([2, 3]);
            expect(table.getId(literal)).toEqual(1);
        });

        test("THEN the parent becomes a fragment and continues where it was", () => {
            expect(parent.modifier).toEqual(SectionModifier.Fragment);
            expect(Array.from(parent.data.subarray(0, parent.size))).toEqual([1, 4]);
            expect(table.findSectionByName("Code")).toBe(parent);
        });
    });

    describe("WHEN a fragment literal is opened in RAM", () => {
        const { table } = setup();
        table.newSection("Vars", SectionType.WRAM0, undefined, floating, SectionModifier.Normal);

        test("THEN it is fatal", () => {
            expect(() => table.pushSectionFragmentLiteral()).toThrow(FatalError);
        });
    });

    describe("WHEN asking whether a size is final", () => {
        const { table } = setup();
        table.newSection("A", SectionType.ROM0, undefined, floating, SectionModifier.Normal);
        table.newSection("U", SectionType.HRAM, undefined, floating, SectionModifier.Union);
        table.pushSection();
        table.newSection("B", SectionType.ROM0, undefined, floating, SectionModifier.Normal);
        table.popSection();
        table.newSection("C", SectionType.ROM0, undefined, floating, SectionModifier.Normal);
        table.pushSection();

        const sizeKnown = (name: string) => {
            const sect = table.findSectionByName(name);
            if (!sect) {
                throw Error(`no section ${name}`);
            }
            return table.isSizeKnown(sect);
        };

        test("THEN closed regular sections are final", () => {
            expect(sizeKnown("A")).toBe(true);
            expect(sizeKnown("B")).toBe(true);
        });

        test("THEN unions and sections on the stack are not", () => {
            expect(sizeKnown("U")).toBe(false);
            expect(sizeKnown("C")).toBe(false);
        });
    });

    describe("WHEN a section grows past its type's size", () => {
        const { table, diag } = setup();
        table.newSection("H", SectionType.HRAM, undefined, floating, SectionModifier.Normal);
        table.skip(0x80, true);
        table.checkSizes();

        test("THEN checking the sizes reports it", () => {
            expect(errorMessages(diag)).toEqual(["Section 'H' grew too big (max size = 0x7F bytes, reached 0x80)"]);
        });
    });

    describe("WHEN ROM0 is widened", () => {
        const { table, diag } = setup({ tinyRom: true });
        table.newSection("Big", SectionType.ROM0, 0x7000, floating, SectionModifier.Normal);
        table.skip(0x5000, true);
        table.checkSizes();

        test("THEN it may span the whole ROM area", () => {
            expect(errorMessages(diag)).toEqual([]);
            expect(table.findSectionByName("Big")?.size).toEqual(0x5000);
        });
    });

    describe("WHEN writing a value that is not known yet", () => {
        const { table, output, syms } = setup();
        table.newSection("Code", SectionType.ROM0, undefined, floating, SectionModifier.Normal);
        table.constByte(0);
        const expr = {
            isKnown: () => false,
            value: () => 0,
            isDiffConstant: () => false,
            symbolOf: () => undefined,
            toString: () => "Later",
        };
        table.relWord(expr, 0);

        test("THEN a patch is requested and zeroes are written", () => {
            expect(output.createPatch).toHaveBeenCalledWith(1, expr, 1, 0);
            expect(table.findSectionByName("Code")?.size).toEqual(3);
            expect(syms.getPC()).toBeDefined();
        });
    });

    describe("WHEN asking for alignment padding", () => {
        const { table } = setup();

        test("THEN nothing is needed outside of a section", () => {
            expect(table.getAlignBytes(4, 0)).toEqual(0);
        });

        test("THEN fixed sections count as fully aligned", () => {
            table.newSection("Fixed", SectionType.ROM0, 0x101, floating, SectionModifier.Normal);
            expect(table.getAlignBytes(4, 0)).toEqual(15);
            expect(table.getAlignBytes(4, 2)).toEqual(1);
        });

        test("THEN floating sections without alignment need nothing", () => {
            table.newSection("Float", SectionType.ROM0, undefined, floating, SectionModifier.Normal);
            expect(table.getAlignBytes(4, 0)).toEqual(0);
        });
    });

    describe("WHEN aligning a floating section to 16 bits", () => {
        const { table } = setup();
        table.newSection("Pinned", SectionType.ROM0, undefined, floating, SectionModifier.Normal);
        table.skip(4, true);
        table.alignPC(16, 0x1234);

        test("THEN its address becomes fixed", () => {
            expect(table.findSectionByName("Pinned")).toMatchObject({ org: 0x1230, align: 0 });
        });
    });

    describe("WHEN ending a section", () => {
        const { table, syms } = setup();
        table.newSection("Code", SectionType.ROM0, undefined, floating, SectionModifier.Normal);
        syms.addLabel("Main");
        table.endSection();

        test("THEN there is no current section or label scope", () => {
            expect(table.getCurrentSection()).toBeUndefined();
            expect(syms.getCurrentLabelScopes()).toEqual([undefined, undefined]);
            expect(syms.getPC()).toBeUndefined();
        });

        test("THEN ending it again is fatal", () => {
            expect(() => table.endSection()).toThrow("Cannot end the section outside of a SECTION");
        });
    });
    describe("WHEN a LOAD block runs inside a pushed section", () => {
        const { table } = setup();
        const bank: SectionSpec = { bank: 3, alignment: 0, alignOffset: 0 };
        table.newSection("Code", SectionType.ROMX, undefined, bank, SectionModifier.Normal);
        table.constByte(1);
        table.setLoadSection("Ram", SectionType.WRAM0, undefined, floating, SectionModifier.Normal);
        table.constByte(2);

        test("THEN symbols see the LOAD section while bytes go to the ROM section", () => {
            expect(table.getCurrentLoadSection()?.name).toEqual("Ram");
            expect(table.getSymbolSection()?.name).toEqual("Ram");
            expect(table.getSymbolOffset()).toEqual(1);
            expect(table.getOutputOffset()).toEqual(2);
            expect(table.getOutputBank()).toEqual(3);
        });

        test("THEN PUSHS saves everything and POPS restores it", () => {
            table.pushSection();
            expect(table.stackDepth).toEqual(1);
            expect(table.getCurrentLoadSection()).toBeUndefined();
            expect(table.getOutputBank()).toBeUndefined();

            table.newSection("Vars", SectionType.HRAM, undefined, floating, SectionModifier.Normal);
            table.startUnion();
            expect(table.unionDepth).toEqual(1);
            table.endUnion();

            table.popSection();
            expect(table.stackDepth).toEqual(0);
            expect(table.unionDepth).toEqual(0);
            expect(table.getCurrentLoadSection()?.name).toEqual("Ram");
            expect(table.getOutputOffset()).toEqual(2);
        });
    });
});
