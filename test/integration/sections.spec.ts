/* eslint-disable max-lines-per-function */
import { SectionModifier } from "../../src/section/Section.js";
import { assemble, assembleWithErrors, getSection, sectionBytes } from "./TestUtils.js";

describe("GIVEN sections declared more than once", () => {
    describe("WHEN a regular section is declared again", () => {
        const data = assembleWithErrors([
            "SECTION \"A\", ROM0",
            "SECTION \"A\", ROM0",
        ].join("\n"));

        test("THEN both the conflict and the failure are reported", () => {
            expect(data.errors).toEqual([
                "Section already defined previously at main.asm(1)",
                "Cannot create section \"A\" (1 error)",
            ]);
            expect(data.output.errors[1].severity).toEqual("fatal");
        });
    });

    describe("WHEN a declaration differs in type and modifier", () => {
        const data = assembleWithErrors(`
SECTION "M", WRAM0
SECTION UNION "M", WRAMX
        `);

        test("THEN all conflicts are counted before giving up", () => {
            expect(data.errors).toEqual([
                "Section already exists but with type WRAM0",
                "Section already declared as regular section",
                "Cannot create section \"M\" (2 errors)",
            ]);
        });
    });

    describe("WHEN fragments are appended", () => {
        const data = assemble(`
SECTION FRAGMENT "Frag", ROM0
    DB 1, 2
SECTION "Other", ROM0
    DB 9
SECTION FRAGMENT "Frag", ROM0
    DB 3
        `);

        test("THEN the data continues where the previous fragment ended", () => {
            expect(sectionBytes(data, "Frag")).toEqual([1, 2, 3]);
            expect(data.output.sections.length).toEqual(2);
        });
    });

    describe("WHEN a later fragment has a fixed address", () => {
        const data = assemble(`
SECTION FRAGMENT "Frag", ROM0
    DB 1, 2, 3, 4
SECTION FRAGMENT "Frag", ROM0[$1004]
        `);

        test("THEN the start address is derived from the size so far", () => {
            expect(getSection(data, "Frag").org).toEqual(0x1000);
        });
    });

    describe("WHEN a later fragment is aligned", () => {
        const data = assemble(`
SECTION FRAGMENT "Frag", ROM0
    DB 1, 2, 3
SECTION FRAGMENT "Frag", ROM0, ALIGN[4]
        `);

        test("THEN the alignment offset is moved back by the size so far", () => {
            expect(getSection(data, "Frag")).toMatchObject({ align: 4, alignOffset: 13 });
        });
    });

    describe("WHEN union declarations are merged", () => {
        const data = assemble(`
SECTION UNION "Shared", HRAM, ALIGN[2]
    DS 4
SECTION UNION "Shared", HRAM, ALIGN[4, 4]
    DS 8
SECTION UNION "Shared", HRAM
    DS 2
        `);
        const sect = getSection(data, "Shared");

        test("THEN the largest declaration decides the size", () => {
            expect(sect.size).toEqual(8);
            expect(sect.modifier).toEqual(SectionModifier.Union);
        });

        test("THEN the strictest alignment is kept", () => {
            expect(sect).toMatchObject({ align: 4, alignOffset: 4 });
        });
    });

    describe("WHEN union declarations have incompatible constraints", () => {
        const data = assembleWithErrors(`
SECTION UNION "U", HRAM, ALIGN[2]
SECTION UNION "U", HRAM, ALIGN[4, 1]
        `);

        test("THEN the alignment conflict is reported", () => {
            expect(data.errors).toEqual([
                "Section already declared with incompatible 4-byte alignment (offset 0)",
                "Cannot create section \"U\" (1 error)",
            ]);
        });
    });

    describe("WHEN union declarations have different addresses", () => {
        const data = assembleWithErrors(`
SECTION UNION "U", WRAM0[$C000]
SECTION UNION "U", WRAM0[$C100]
        `);

        test("THEN the address conflict is reported", () => {
            expect(data.errors[0]).toEqual("Section already declared as fixed at different address $C000");
        });
    });

    describe("WHEN union declarations have different banks", () => {
        const data = assembleWithErrors(`
SECTION UNION "B", WRAMX, BANK[1]
SECTION UNION "B", WRAMX
SECTION UNION "B", WRAMX, BANK[2]
        `);

        test("THEN an unspecified bank is compatible but a different one is not", () => {
            expect(data.errors[0]).toEqual("Section already declared with different bank 1");
        });
    });

    describe("WHEN a ROM section is declared as union", () => {
        const data = assembleWithErrors(`
SECTION UNION "R", ROM0
SECTION UNION "R", ROM0
        `);

        test("THEN merging it is refused", () => {
            expect(data.errors[0]).toEqual("Cannot declare ROM sections as UNION");
        });
    });
});

describe("GIVEN section attributes", () => {
    describe("WHEN a bank is out of range", () => {
        const data = assembleWithErrors(`
SECTION "R", WRAMX, BANK[9]
        `);

        test("THEN it is an error and the bank is dropped", () => {
            expect(data.errors).toEqual(["WRAMX bank value $0009 out of range ($0001 to $0007)"]);
            expect(getSection(data, "R").bank).toBeUndefined();
        });
    });

    describe("WHEN a bank is given for a type without banks", () => {
        const data = assembleWithErrors(`
SECTION "H", HRAM, BANK[1]
        `);

        test("THEN it is an error and no bank is recorded", () => {
            expect(data.errors).toEqual(["BANK only allowed for ROMX, WRAMX, SRAM, or VRAM sections"]);
            expect(getSection(data, "H").bank).toBeUndefined();
        });
    });

    describe("WHEN the type has a single bank", () => {
        const data = assemble(`
SECTION "H", HRAM
SECTION "X", ROMX
        `);

        test("THEN that bank is implied", () => {
            expect(getSection(data, "H").bank).toEqual(0);
            expect(getSection(data, "X").bank).toBeUndefined();
        });
    });

    describe("WHEN a fixed address is outside the type's range", () => {
        const data = assembleWithErrors(`
SECTION "X", ROM0[$4000]
        `);

        test("THEN it is an error", () => {
            expect(data.errors).toEqual(["Section \"X\"'s fixed address $4000 is outside of range [$0000; $3FFF]"]);
        });
    });

    describe("WHEN the alignment offset is too large", () => {
        const data = assembleWithErrors(`
SECTION "X", ROM0, ALIGN[2, 4]
        `);

        test("THEN it is an error and the offset is reset", () => {
            expect(data.errors).toEqual(["Alignment offset (4) must be smaller than alignment size (4)"]);
            expect(getSection(data, "X")).toMatchObject({ align: 2, alignOffset: 0 });
        });
    });

    describe("WHEN a fixed address contradicts the alignment", () => {
        const data = assembleWithErrors(`
SECTION "X", ROM0[$101], ALIGN[4]
        `);

        test("THEN it is an error and the address wins", () => {
            expect(data.errors).toEqual(["Section \"X\"'s fixed address doesn't match its alignment"]);
            expect(getSection(data, "X")).toMatchObject({ org: 0x101, align: 0 });
        });
    });

    describe("WHEN the alignment covers the whole address", () => {
        const data = assemble(`
SECTION "X", ROM0, ALIGN[16, $1234]
        `);

        test("THEN the section becomes fixed", () => {
            expect(getSection(data, "X")).toMatchObject({ org: 0x1234, align: 0 });
        });
    });

    describe("WHEN the alignment is larger than 16", () => {
        const data = assembleWithErrors(`
SECTION "X", ROM0, ALIGN[17]
        `);

        test("THEN it is an error and 16 is used", () => {
            expect(data.errors).toEqual(["Alignment must be between 0 and 16, not 17"]);
            expect(getSection(data, "X")).toMatchObject({ org: 0, align: 0 });
        });
    });

    describe("WHEN the alignment cannot be reached in the memory area", () => {
        const data = assembleWithErrors(`
SECTION "X", HRAM, ALIGN[8]
        `);

        test("THEN it is an error", () => {
            expect(data.errors).toEqual(["Section \"X\"'s alignment cannot be attained in HRAM"]);
        });
    });
});

describe("GIVEN alignment inside a section", () => {
    describe("WHEN aligning a floating section", () => {
        const data = assemble(`
SECTION "Flt", ROM0
    DB 1, 2, 3
    ALIGN 4
        `);

        test("THEN the section takes the alignment relative to its start", () => {
            expect(getSection(data, "Flt")).toMatchObject({ align: 4, alignOffset: 13 });
        });
    });

    describe("WHEN a fixed section is misaligned", () => {
        const data = assembleWithErrors(`
SECTION "Fix", ROM0[$100]
    DB 1
    ALIGN 2
        `);

        test("THEN it is an error", () => {
            expect(data.errors).toEqual(["Section is misaligned (at PC = $0101, expected ALIGN[2, 0], got ALIGN[2, 1])"]);
        });
    });

    describe("WHEN padding up to an alignment", () => {
        const data = assemble(`
SECTION "Fix", ROM0[$100]
    DB 1
    DS ALIGN[3]
    DB 2
        `, { padByte: 0xFF });

        test("THEN pad bytes are inserted up to the boundary", () => {
            expect(sectionBytes(data, "Fix")).toEqual([1, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 2]);
        });
    });
});

describe("GIVEN sections that grow too big", () => {
    describe("WHEN the pass ends", () => {
        const data = assembleWithErrors(`
SECTION "Hi", HRAM
    DS $80
        `);

        test("THEN the overflow is reported", () => {
            expect(data.errors).toEqual(["Section 'Hi' grew too big (max size = 0x7F bytes, reached 0x80)"]);
        });
    });
});
