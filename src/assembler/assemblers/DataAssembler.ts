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
import { SectionTable } from "../../section/SectionTable.js";
import { SubComponents } from "../Assembler.js";
import { Expression } from "../Expression.js";
import { ExprEvaluator } from "../util/ExprEvaluator.js";
import { RegisterFunction, Statement, parseString, splitOperands } from "../util/Statement.js";
import { SectionAssembler } from "./SectionAssembler.js";

const OpcodeJR = 0x18;

/**
 * Assembler for statements related to data output.
 */
export class DataAssembler {
    private diag: Diagnostics;
    private sections: SectionTable;
    private evaluator: ExprEvaluator;
    private stopPass: () => void;

    public constructor(components: SubComponents, private sectionAsm: SectionAssembler) {
        this.diag = components.diag;
        this.sections = components.sections;
        this.evaluator = components.evaluator;
        this.stopPass = components.stopPass;
    }

    public registerStatements(register: RegisterFunction) {
        register("DB", stmt => this.handleData(stmt, 1));
        register("DW", stmt => this.handleData(stmt, 2));
        register("DL", stmt => this.handleData(stmt, 4));
        register("DS", this.handleDs.bind(this));
        register("JR", this.handleJr.bind(this));
        register("INCBIN", this.handleIncbin.bind(this));
    }

    private handleData(stmt: Statement, width: 1 | 2 | 4) {
        const ops = splitOperands(stmt.operands);
        if (ops.length == 0) {
            this.sections.skip(width, false);
            return;
        }

        for (const op of ops) {
            const str = parseString(op);
            if (str !== undefined) {
                const units = [...str].map(c => c.codePointAt(0) ?? 0);
                switch (width) {
                    case 1: this.sections.byteString(units); break;
                    case 2: this.sections.wordString(units); break;
                    case 4: this.sections.longString(units); break;
                }
                continue;
            }

            const expr = this.evaluator.tryEval(op);
            if (!expr) {
                continue;
            }
            switch (width) {
                case 1: this.sections.relByte(expr, 0); break;
                case 2: this.sections.relWord(expr, 0); break;
                case 4: this.sections.relLong(expr, 0); break;
            }
        }
    }

    // DS count[, fill...] or DS ALIGN[a[, ofs]][, fill...]
    private handleDs(stmt: Statement) {
        const ops = splitOperands(stmt.operands);
        if (ops.length == 0) {
            this.diag.error("DS needs a size");
            return;
        }

        let count: number | undefined;
        let align: [number, number] | undefined;
        const alignMatch = ops[0].match(/^ALIGN\s*\[(.*)\]$/i);
        if (alignMatch) {
            align = this.sectionAsm.parseAlign(alignMatch[1]);
            if (!align) {
                return;
            }
            count = this.sections.getAlignBytes(align[0], align[1]);
        } else {
            count = this.evaluator.evalConstant(ops[0]);
            if (count === undefined) {
                return;
            }
            if (count < 0) {
                this.diag.error(`DS size must not be negative, not ${count}`);
                return;
            }
        }

        const fill: Expression[] = [];
        for (const op of ops.slice(1)) {
            const expr = this.evaluator.tryEval(op);
            if (!expr) {
                return;
            }
            fill.push(expr);
        }

        if (fill.length > 0) {
            this.sections.relBytes(count, fill);
        } else {
            this.sections.skip(count, true);
        }

        if (align) {
            this.sections.alignPC(align[0], align[1]);
        }
    }

    private handleJr(stmt: Statement) {
        const expr = this.evaluator.tryEval(stmt.operands);
        if (!expr) {
            return;
        }
        this.sections.constByte(OpcodeJR);
        this.sections.pcRelByte(expr, 1);
    }

    // INCBIN "file"[, start[, length]]
    private handleIncbin(stmt: Statement) {
        const ops = splitOperands(stmt.operands);
        const name = ops.length > 0 ? parseString(ops[0]) : undefined;
        if (name === undefined || ops.length > 3) {
            this.diag.error("INCBIN takes a quoted file name, an optional start and an optional length");
            return;
        }

        const start = ops.length > 1 ? this.evaluator.evalConstant(ops[1]) : 0;
        if (start === undefined) {
            return;
        }
        if (start < 0) {
            this.diag.error(`Start position cannot be negative (${start})`);
            return;
        }

        let stop: boolean;
        if (ops.length > 2) {
            const length = this.evaluator.evalConstant(ops[2]);
            if (length === undefined) {
                return;
            }
            if (length < 0) {
                this.diag.error(`Number of bytes to read cannot be negative (${length})`);
                return;
            }
            stop = this.sections.binaryFileSlice(name, start, length);
        } else {
            stop = this.sections.binaryFile(name, start);
        }

        if (stop) {
            this.stopPass();
        }
    }
}
