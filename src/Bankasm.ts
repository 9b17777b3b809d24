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

import { Assembler, AssemblerOptions, AssemblerOutput } from "./assembler/Assembler.js";
import { dumpSections } from "./output/dumpSections.js";

export interface BankasmOptions extends AssemblerOptions {
    // also produce a listing of the sections
    writeMap?: boolean;
}

export interface BankasmOutput extends AssemblerOutput {
    map: readonly string[];
}

export class Bankasm {
    private opts: BankasmOptions;

    public constructor(opts: BankasmOptions) {
        this.opts = opts;
    }

    public assemble(mainPath: string): BankasmOutput {
        const asm = new Assembler(this.opts);
        const output = asm.run(mainPath);

        const map: string[] = [];
        if (this.opts.writeMap) {
            dumpSections(output.sections, asm.getSectionTable().types, line => map.push(line));
        }

        return { ...output, map };
    }
}
