import { Diagnostics } from "../../src/diagnostics/Diagnostics.js";
import { WarningType, parseWarningType } from "../../src/diagnostics/WarningType.js";
import { FatalError, formatCodeError } from "../../src/utils/CodeError.js";

describe("GIVEN diagnostics", () => {
    describe("WHEN messages are reported", () => {
        const diag = new Diagnostics({});
        diag.setLocator(() => "main.asm(3)");
        diag.warning(WarningType.Truncation, "Expression must be 8-bit");
        diag.error("Something broke");

        test("THEN they are formatted with their location", () => {
            expect(diag.getDiagnostics().map(formatCodeError)).toEqual([
                "warning: [-Wtruncation] main.asm(3):\n    Expression must be 8-bit",
                "error: main.asm(3):\n    Something broke",
            ]);
        });

        test("THEN only errors count", () => {
            expect(diag.errorCount).toEqual(1);
            expect(diag.getWarnings().length).toEqual(1);
        });
    });

    describe("WHEN a fatal error is reported", () => {
        const diag = new Diagnostics({});

        test("THEN it throws and is recorded", () => {
            expect(() => diag.fatal("Stop")).toThrow(FatalError);
            expect(diag.getErrors().map(formatCodeError)).toEqual(["fatal: at top level:\n    Stop"]);
        });
    });

    describe("WHEN warnings are errors", () => {
        const diag = new Diagnostics({ warningsAreErrors: true });
        diag.warning(WarningType.User, "Careful");

        test("THEN the warning is an error that keeps its flag", () => {
            expect(diag.getErrors().map(formatCodeError)).toEqual(["error: [-Wuser] at top level:\n    Careful"]);
        });
    });

    test("THEN warning flags are parsed by name", () => {
        expect(parseWarningType("backwards-for")).toEqual(WarningType.BackwardsFor);
        expect(parseWarningType("nonsense")).toBeUndefined();
    });
});
