/* eslint-disable max-lines-per-function */
import { PatchType } from "../../src/section/Section.js";
import { WarningType } from "../../src/diagnostics/WarningType.js";
import { assemble, assembleWithErrors, getSection, sectionBytes } from "./TestUtils.js";

describe("GIVEN a program with data directives", () => {
    describe("WHEN a string is emitted as longs", () => {
        const data = assemble(`
SECTION "Code", ROM0
    DL "AB"
        `);

        test("THEN every character takes four bytes", () => {
            expect(sectionBytes(data, "Code")).toEqual([65, 0, 0, 0, 66, 0, 0, 0]);
        });
    });

    describe("WHEN emitting numbers and strings", () => {
        const data = assemble(`
SECTION "Code", ROM0[$100]
Start:
    DB 1, 2, $FF
    DW $1234
    DL $12345678
    DB "Hi", %101, &17, 'A'
    DW "A"
        `);

        test("THEN the bytes are little endian", () => {
            expect(sectionBytes(data, "Code")).toEqual([
                1, 2, 0xFF,
                0x34, 0x12,
                0x78, 0x56, 0x34, 0x12,
                72, 105, 5, 15, 65,
                65, 0,
            ]);
        });

        test("THEN labels in fixed sections know their address", () => {
            expect(data.output.symbols.get("Start")).toMatchObject({ offset: 0 });
            expect(getSection(data, "Code").org).toEqual(0x100);
        });
    });

    describe("WHEN using expressions with symbols", () => {
        const data = assemble(`
DEF BASE = $10
SECTION "Code", ROM0[$200]
Here:
    DB BASE + 2, BASE - 1, -1
    DW Here + 3
        `);

        test("THEN they are evaluated right away", () => {
            expect(sectionBytes(data, "Code")).toEqual([0x12, 0x0F, 0xFF, 0x03, 0x02]);
        });
    });

    describe("WHEN a value refers to a label defined later", () => {
        const data = assemble(`
SECTION "Code", ROM0
    DB 0
    DW Later + 2
Later:
        `);
        const sect = getSection(data, "Code");

        test("THEN a patch is recorded and zeroes are written", () => {
            expect(sectionBytes(data, "Code")).toEqual([0, 0, 0]);
            expect(sect.patches.length).toEqual(1);
            expect(sect.patches[0]).toMatchObject({ type: PatchType.Word, offset: 1, pcOffset: 1 });
            expect(sect.patches[0].expr.toString()).toEqual("Later+2");
        });

        test("THEN the patch refers to the node it was created in", () => {
            expect(sect.patches[0].src.outputId).toBeDefined();
            expect(sect.patches[0].lineNo).toEqual(4);
        });
    });

    describe("WHEN reserving space with DS", () => {
        const data = assemble(`
SECTION "Code", ROM0
    DS 3
    DS 2, $AA
    DS 3, 1, 2
        `, { padByte: 0xFF });

        test("THEN it is filled with the pad byte or the given values", () => {
            expect(sectionBytes(data, "Code")).toEqual([0xFF, 0xFF, 0xFF, 0xAA, 0xAA, 1, 2, 1]);
        });
    });

    describe("WHEN a data directive has no data", () => {
        const data = assemble(`
SECTION "Code", ROM0
    DB
    DW
        `);

        test("THEN it warns and pads", () => {
            expect(data.warnings).toEqual([
                "DB directive without data in ROM",
                "DW directive without data in ROM",
            ]);
            expect(data.output.warnings[0].warning).toEqual(WarningType.EmptyDataDirective);
            expect(sectionBytes(data, "Code")).toEqual([0, 0, 0]);
        });
    });

    describe("WHEN a string does not fit into bytes", () => {
        const data = assemble(`
SECTION "Code", ROM0
    DB "AĀ"
        `);

        test("THEN it warns once and truncates", () => {
            expect(data.warnings).toEqual(["All character units must be 8-bit"]);
            expect(sectionBytes(data, "Code")).toEqual([65, 0]);
        });
    });

    describe("WHEN writing outside of any section", () => {
        const data = assembleWithErrors(`
    DB 1
        `);

        test("THEN it is an error", () => {
            expect(data.errors).toEqual(["Cannot output data outside of a SECTION"]);
        });
    });

    describe("WHEN writing data into RAM", () => {
        const data = assembleWithErrors(`
SECTION "Vars", WRAM0
    DB 1
    DS 4
        `);

        test("THEN only reserving space is accepted", () => {
            expect(data.errors).toEqual(["Section 'Vars' cannot contain code or data (not ROM0 or ROMX)"]);
            expect(getSection(data, "Vars").size).toEqual(4);
        });
    });
});

describe("GIVEN a program with relative jumps", () => {
    describe("WHEN jumping backwards in a fixed section", () => {
        const data = assemble(`
SECTION "Code", ROM0[$150]
Loop:
    JR Loop
    JR @
        `);

        test("THEN the offset is relative to the byte after the operand", () => {
            expect(sectionBytes(data, "Code")).toEqual([0x18, 0xFE, 0x18, 0xFE]);
        });
    });

    describe("WHEN jumping backwards in a floating section", () => {
        const data = assemble(`
SECTION "Code", ROM0
Back:
    DB 0
    JR Back
        `);

        test("THEN the offset is computed without a patch", () => {
            expect(sectionBytes(data, "Code")).toEqual([0, 0x18, 0xFD]);
            expect(getSection(data, "Code").patches).toEqual([]);
        });
    });

    describe("WHEN jumping forwards", () => {
        const data = assemble(`
SECTION "Code", ROM0
    JR Target
    DB 0
Target:
        `);
        const sect = getSection(data, "Code");

        test("THEN a JR patch is left for the linker", () => {
            expect(sectionBytes(data, "Code")).toEqual([0x18, 0, 0]);
            expect(sect.patches[0]).toMatchObject({ type: PatchType.JR, offset: 1, pcOffset: 0 });
        });
    });

    describe("WHEN the target is too far away", () => {
        const data = assembleWithErrors(`
SECTION "Code", ROM0
Back:
    DS 200
    JR Back
        `);

        test("THEN it is an error and a zero is written", () => {
            expect(data.errors).toEqual(["JR target must be between -128 and 127 bytes away, not -202; use JP instead"]);
            expect(sectionBytes(data, "Code").slice(200)).toEqual([0x18, 0]);
        });
    });
});
