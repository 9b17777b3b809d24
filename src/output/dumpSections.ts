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

import { PatchType, Section, SectionModifier, SectionModifierNames } from "../section/Section.js";
import { SectionTypeTable } from "../section/SectionType.js";
import { hex, plural, replaceNonPrints } from "../utils/Strings.js";

export function dumpSections(sections: readonly Section[], types: SectionTypeTable, write: (line: string) => void) {
    for (const sect of sections) {
        write(formatSection(sect, types));
        for (const patch of sect.patches) {
            write(`  ${PatchType[patch.type]} @$${hex(patch.offset, 4)} = ${patch.expr.toString()}`);
        }
    }
}

export function formatSection(sect: Section, types: SectionTypeTable): string {
    const info = types.get(sect.type);
    let str = `SECTION "${replaceNonPrints(sect.name)}" ${info.name}`;
    if (sect.modifier != SectionModifier.Normal) {
        str += ` ${SectionModifierNames[sect.modifier]}`;
    }

    if (sect.org !== undefined) {
        str += ` [$${hex(sect.org, 4)}]`;
    } else if (sect.align != 0) {
        str += ` ALIGN[${sect.align}, ${sect.alignOffset}]`;
    } else {
        str += " floating";
    }

    if (sect.bank !== undefined) {
        str += ` BANK[${sect.bank}]`;
    }

    str += `: $${hex(sect.size, 4)} bytes, ${plural(sect.patches.length, "patch", "patches")}`;
    return str;
}
