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
import { parseIntSafe } from "../../utils/Strings.js";
import { ConstExpression, Expression, SymbolExpression } from "../Expression.js";
import { isVar } from "../SymbolData.js";
import { SymbolTable } from "../SymbolTable.js";

interface Term {
    sign: 1 | -1;
    text: string;
}

/**
 * Builds expressions from operand text.
 * Supported are sums and differences of numbers ($hex, %bin, &oct, decimal),
 * symbols, '@' and character literals; at most one symbol that is not constant may appear, and only added.
 */
export class ExprEvaluator {
    public constructor(private diag: Diagnostics, private syms: SymbolTable) {
    }

    // undefined after reporting an error
    public tryEval(text: string): Expression | undefined {
        const terms = this.splitTerms(text.trim());
        if (!terms) {
            this.diag.error(`Invalid expression '${text.trim()}'`);
            return undefined;
        }

        let constant = 0;
        let symName: string | undefined;
        for (const term of terms) {
            const num = this.parseNumber(term.text);
            if (num !== undefined) {
                constant += term.sign * num;
                continue;
            }

            if (!/^(@|\.?[A-Za-z_][A-Za-z0-9_.]*)$/.test(term.text)) {
                this.diag.error(`Invalid expression '${text.trim()}'`);
                return undefined;
            }

            const name = this.syms.qualify(term.text);
            const sym = this.syms.findExactSymbol(name);

            // one added label or @ stays a symbol even when its value is known, JR looks at it
            if (term.sign > 0 && symName === undefined && !isVar(sym)) {
                symName = name;
            } else if (sym && this.syms.isConstant(sym)) {
                constant += term.sign * this.syms.getValue(sym);
            } else {
                this.diag.error(`Expression '${text.trim()}' is not constant`);
                return undefined;
            }
        }

        if (symName === undefined) {
            return new ConstExpression(constant);
        }
        return new SymbolExpression(this.syms, symName, constant);
    }

    // For counts, sizes and conditions, which are needed right away
    public evalConstant(text: string): number | undefined {
        const expr = this.tryEval(text);
        if (!expr) {
            return undefined;
        }
        if (!expr.isKnown()) {
            this.diag.error(`Expected constant expression: '${expr.toString()}' is not constant at assembly time`);
            return undefined;
        }
        return expr.value();
    }

    private splitTerms(text: string): Term[] | undefined {
        const terms: Term[] = [];
        let sign: 1 | -1 = 1;
        let cur = "";
        let expectOperand = true;

        for (let i = 0; i < text.length; i++) {
            const c = text[i];
            if (c == "'") {
                const end = text.indexOf("'", i + 1);
                if (end < 0) {
                    return undefined;
                }
                cur += text.substring(i, end + 1);
                i = end;
                expectOperand = false;
            } else if ((c == "+" || c == "-") && cur.trim() == "" && expectOperand) {
                // unary sign
                if (c == "-") {
                    sign = sign == 1 ? -1 : 1;
                }
            } else if (c == "+" || c == "-") {
                terms.push({ sign, text: cur.trim() });
                sign = c == "-" ? -1 : 1;
                cur = "";
                expectOperand = true;
            } else {
                cur += c;
                if (c != " " && c != "\t") {
                    expectOperand = false;
                }
            }
        }

        if (cur.trim() == "") {
            return undefined;
        }
        terms.push({ sign, text: cur.trim() });
        return terms;
    }

    private parseNumber(text: string): number | undefined {
        try {
            switch (text[0]) {
                case "$":   return parseIntSafe(text.substring(1), 16);
                case "%":   return parseIntSafe(text.substring(1), 2);
                case "&":   return parseIntSafe(text.substring(1), 8);
                case "'":   return this.parseChar(text);
                default:
                    if (/^[0-9]/.test(text)) {
                        return parseIntSafe(text, 10);
                    }
                    return undefined;
            }
        } catch (e) {
            if (!(e instanceof Error)) {
                throw e;
            }
            this.diag.error(`${e.message}: '${text}'`);
            return 0;
        }
    }

    private parseChar(text: string): number {
        if (text.length != 3 || !text.endsWith("'")) {
            throw Error("Character literals must hold exactly one character");
        }
        return text.charCodeAt(1);
    }
}
