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

import { Diagnostics } from "../../diagnostics/Diagnostics.js";
import { SectionModifier, SectionSpec } from "../../section/Section.js";
import { SectionTable } from "../../section/SectionTable.js";
import { SectionType, parseSectionType } from "../../section/SectionType.js";
import { SubComponents } from "../Assembler.js";
import { ExprEvaluator } from "../util/ExprEvaluator.js";
import { RegisterFunction, Statement, parseString, splitOperands } from "../util/Statement.js";

interface SectionDecl {
    name: string;
    type: SectionType;
    org?: number;
    spec: SectionSpec;
    mod: SectionModifier;
}

/**
 * Assembler for statements that choose where output goes.
 */
export class SectionAssembler {
    private diag: Diagnostics;
    private sections: SectionTable;
    private evaluator: ExprEvaluator;

    public constructor(components: SubComponents) {
        this.diag = components.diag;
        this.sections = components.sections;
        this.evaluator = components.evaluator;
    }

    public registerStatements(register: RegisterFunction) {
        register("SECTION", this.handleSection.bind(this));
        register("LOAD", this.handleLoad.bind(this));
        register("ENDL", () => this.sections.endLoadSection());
        register("ENDSECTION", () => this.sections.endSection());
        register("PUSHS", this.handlePushs.bind(this));
        register("POPS", () => this.sections.popSection());
        register("UNION", () => this.sections.startUnion());
        register("NEXTU", () => this.sections.nextUnionMember());
        register("ENDU", () => this.sections.endUnion());
        register("ALIGN", this.handleAlign.bind(this));
    }

    private handleSection(stmt: Statement) {
        const decl = this.parseDecl(stmt.operands);
        if (decl) {
            this.sections.newSection(decl.name, decl.type, decl.org, decl.spec, decl.mod);
        }
    }

    private handleLoad(stmt: Statement) {
        const decl = this.parseDecl(stmt.operands);
        if (decl) {
            this.sections.setLoadSection(decl.name, decl.type, decl.org, decl.spec, decl.mod);
        }
    }

    // PUSHS may open the new section right away
    private handlePushs(stmt: Statement) {
        if (stmt.operands == "") {
            this.sections.pushSection();
            return;
        }

        const decl = this.parseDecl(stmt.operands);
        if (decl) {
            this.sections.pushSection();
            this.sections.newSection(decl.name, decl.type, decl.org, decl.spec, decl.mod);
        }
    }

    private handleAlign(stmt: Statement) {
        const args = this.parseAlign(stmt.operands);
        if (args) {
            this.sections.alignPC(args[0], args[1]);
        }
    }

    // "a" or "a, ofs" as used by ALIGN and ALIGN[...]
    public parseAlign(text: string): [alignment: number, offset: number] | undefined {
        const ops = splitOperands(text);
        if (ops.length < 1 || ops.length > 2) {
            this.diag.error("ALIGN takes an alignment and an optional offset");
            return undefined;
        }

        const alignment = this.evaluator.evalConstant(ops[0]);
        const offset = ops.length == 2 ? this.evaluator.evalConstant(ops[1]) : 0;
        if (alignment === undefined || offset === undefined) {
            return undefined;
        }

        if (alignment < 0 || alignment > 16) {
            this.diag.error(`Alignment must be between 0 and 16, not ${alignment}`);
            return undefined;
        }
        if (offset < 0 || offset >= 2 ** alignment) {
            this.diag.error(`Offset must be between 0 and ${2 ** alignment - 1}, not ${offset}`);
            return undefined;
        }
        return [alignment, offset];
    }

    // [UNION|FRAGMENT] "name", TYPE[[addr]][, BANK[n]][, ALIGN[a[, ofs]]]
    private parseDecl(text: string): SectionDecl | undefined {
        let mod = SectionModifier.Normal;
        let rest = text;
        const modMatch = rest.match(/^(UNION|FRAGMENT)\s+/i);
        if (modMatch) {
            mod = modMatch[1].toUpperCase() == "UNION" ? SectionModifier.Union : SectionModifier.Fragment;
            rest = rest.substring(modMatch[0].length);
        }

        const ops = splitOperands(rest);
        const name = ops.length >= 2 ? parseString(ops[0]) : undefined;
        if (name === undefined) {
            this.diag.error("Section declarations need a quoted name and a type");
            return undefined;
        }

        const typeMatch = ops[1].match(/^([A-Za-z0-9]+)\s*(?:\[(.*)\])?$/);
        const type = typeMatch ? parseSectionType(typeMatch[1]) : undefined;
        if (!typeMatch || type === undefined) {
            this.diag.error(`Unknown section type '${ops[1]}'`);
            return undefined;
        }

        let org: number | undefined;
        if (typeMatch[2] !== undefined) {
            org = this.evaluator.evalConstant(typeMatch[2]);
            if (org === undefined) {
                return undefined;
            }
        }

        const spec: SectionSpec = { alignment: 0, alignOffset: 0 };
        for (const opt of ops.slice(2)) {
            const optMatch = opt.match(/^(BANK|ALIGN)\s*\[(.*)\]$/i);
            if (!optMatch) {
                this.diag.error(`Unknown section option '${opt}'`);
                return undefined;
            }

            if (optMatch[1].toUpperCase() == "BANK") {
                const bank = this.evaluator.evalConstant(optMatch[2]);
                if (bank === undefined) {
                    return undefined;
                }
                spec.bank = bank;
            } else {
                // range checks happen when the section is created
                const alignOps = splitOperands(optMatch[2]);
                const alignment = this.evaluator.evalConstant(alignOps[0] ?? "");
                const offset = alignOps.length > 1 ? this.evaluator.evalConstant(alignOps[1]) : 0;
                if (alignment === undefined || offset === undefined) {
                    return undefined;
                }
                spec.alignment = alignment;
                spec.alignOffset = offset;
            }
        }

        return { name, type, org, spec, mod };
    }
}
