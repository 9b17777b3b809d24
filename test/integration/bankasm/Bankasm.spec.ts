import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Bankasm } from "../../../src/index.js";

describe("GIVEN an assembly file", () => {
    const listing = [
        "SECTION \"Header\", ROM0[$100]",
        "    DB 1",
        "    DW Later",
        "SECTION \"Vars\", WRAMX, ALIGN[4, 2]",
        "Later: DS 3",
    ].join("\n");

    describe("WHEN assembled by Bankasm with a map", () => {
        const dir = mkdtempSync(join(tmpdir(), "bankasm-"));
        const path = join(dir, "main.asm");
        writeFileSync(path, listing);

        const out = new Bankasm({ writeMap: true }).assemble(path);
        rmSync(dir, { recursive: true, force: true });

        test("THEN it should list every section and patch", () => {
            expect(out.errors.length).toBe(0);
            expect(out.map).toEqual([
                "SECTION \"Header\" ROM0 [$0100] BANK[0]: $0003 bytes, 1 patch",
                "  Word @$0001 = Later",
                "SECTION \"Vars\" WRAMX ALIGN[4, 2]: $0003 bytes, 0 patches",
            ]);
        });
    });
});
