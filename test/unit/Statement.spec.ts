import { isKeyword, parseStatement, parseString, splitOperands } from "../../src/assembler/util/Statement.js";

describe("GIVEN source lines", () => {
    test("THEN labels need to start the line", () => {
        expect(parseStatement("Main: DB 1")).toEqual({ label: "Main", keyword: "DB", operands: "1" });
        expect(parseStatement("Main:: nop")).toEqual({ label: "Main", keyword: "nop", operands: "" });
        expect(parseStatement("    Main: DB 1")).toEqual({ label: undefined, keyword: "Main", operands: ": DB 1" });
    });

    test("THEN comments are dropped", () => {
        expect(parseStatement("    DB 1 ; one")).toEqual({ label: undefined, keyword: "DB", operands: "1" });
        expect(parseStatement("; nothing")).toEqual({ label: undefined, operands: "" });
    });

    test("THEN keywords match without case", () => {
        expect(isKeyword(parseStatement("    endr"), "REPT", "ENDR")).toBe(true);
        expect(isKeyword(parseStatement("x:"), "ENDR")).toBe(false);
    });
});

describe("GIVEN operand lists", () => {
    test("THEN commas inside quotes and brackets do not split", () => {
        expect(splitOperands("\"a,b\", ROM0[$100], ALIGN[2, 1]")).toEqual(["\"a,b\"", "ROM0[$100]", "ALIGN[2, 1]"]);
    });

    test("THEN empty operands are kept between commas", () => {
        expect(splitOperands("")).toEqual([]);
        expect(splitOperands("1, ")).toEqual(["1", ""]);
    });

    test("THEN only fully quoted operands are strings", () => {
        expect(parseString("\"file.asm\"")).toEqual("file.asm");
        expect(parseString("file.asm")).toBeUndefined();
    });
});
