#!/usr/bin/env node
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

import { array, command, flag, multioption, number, option, optional, positional, run, string } from "cmd-ts";
import { writeFileSync } from "fs";
import { Bankasm, BankasmOptions } from "../src/Bankasm.js";
import { WarningType, parseWarningType } from "../src/diagnostics/WarningType.js";
import { formatCodeError } from "../src/utils/CodeError.js";

// eslint-disable-next-line max-lines-per-function
const cmd = command({
    name: "bankasm",
    description: "Assembler core for banked 8-bit ROM targets",
    args: {
        includePaths: multioption({
            long: "include",
            short: "I",
            description: "Add a directory to search for INCLUDE and INCBIN files",
            type: array(string),
        }),
        preInclude: option({
            long: "preinclude",
            short: "P",
            description: "Include a file before the main source",
            type: optional(string),
        }),
        recursionDepth: option({
            long: "recursion-depth",
            short: "r",
            description: "Maximum nesting of INCLUDE, macros and REPT/FOR",
            type: optional(number),
        }),
        padValue: option({
            long: "pad-value",
            short: "p",
            description: "Byte to fill DS space in ROM with",
            type: optional(number),
        }),
        dependFile: option({
            long: "dependfile",
            short: "M",
            description: "Write make dependencies to this file",
            type: optional(string),
        }),
        missingDeps: flag({
            long: "MG",
            description: "Treat missing files as generated dependencies",
        }),
        phonyDeps: flag({
            long: "MP",
            description: "Add a phony target for every dependency",
        }),
        dependTarget: option({
            long: "MT",
            description: "Target name for the dependency rules",
            type: optional(string),
        }),
        warnings: multioption({
            long: "warning",
            short: "W",
            description: "no-<category> to disable a warning, error to turn warnings into errors",
            type: array(string),
        }),
        tinyRom: flag({
            long: "tiny",
            short: "t",
            description: "ROM0 spans the whole 32 KiB ROM area",
        }),
        wram0: flag({
            long: "wram0",
            short: "w",
            description: "WRAM0 spans both work RAM areas",
        }),
        verbose: flag({
            long: "verbose",
            short: "v",
            description: "Print progress information",
        }),
        mapFile: option({
            long: "map",
            short: "m",
            description: "Write a section listing to this file",
            type: optional(string),
        }),
        source: positional({
            description: "Main source file",
            displayName: "source",
            type: string,
        }),
    },

    handler: (args) => {
        const opts: BankasmOptions = {};
        opts.includePaths = args.includePaths;
        opts.preIncludeFile = args.preInclude;
        opts.maxRecursionDepth = args.recursionDepth;
        opts.padByte = args.padValue;
        opts.generatedMissingIncludes = args.missingDeps;
        opts.generatePhonyDeps = args.phonyDeps;
        opts.tinyRom = args.tinyRom;
        opts.wram0Only = args.wram0;
        opts.verbose = args.verbose;
        opts.writeMap = args.mapFile !== undefined;

        if (args.dependFile !== undefined) {
            opts.dependTarget = args.dependTarget ?? args.source;
        }

        const disabled: WarningType[] = [];
        for (const w of args.warnings) {
            if (w == "error") {
                opts.warningsAreErrors = true;
                continue;
            }
            const type = parseWarningType(w.startsWith("no-") ? w.substring(3) : w);
            if (type === undefined) {
                console.error(`Unknown warning flag '${w}'`);
                process.exit(-1);
            }
            if (w.startsWith("no-")) {
                disabled.push(type);
            }
        }
        opts.disabledWarnings = disabled;

        if (opts.padByte !== undefined && (opts.padByte < 0 || opts.padByte > 0xFF)) {
            console.error("Argument for option 'p' must be between 0 and 0xFF");
            process.exit(-1);
        }

        const bankasm = new Bankasm(opts);
        const output = bankasm.assemble(args.source);

        output.diagnostics.forEach(e => console.error(formatCodeError(e)));

        if (args.dependFile !== undefined) {
            writeFileSync(args.dependFile, output.dependencies.map(line => line + "\n").join(""));
        }

        if (output.errors.length > 0) {
            console.error(`Assembly aborted with ${output.errors.length} error(s)`);
            process.exit(-1);
        }

        if (args.mapFile !== undefined && !output.failedOnMissingInclude) {
            writeFileSync(args.mapFile, output.map.map(line => line + "\n").join(""));
        }

        if (args.verbose) {
            console.log(`Assembled ${output.sections.length} section(s)`);
        }
        process.exit(0);
    }
});

void run(cmd, process.argv.slice(2));
