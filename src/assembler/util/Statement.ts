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

// One source line after comment removal
export interface Statement {
    label?: string;

    // as written, directives are matched case-insensitively
    keyword?: string;
    operands: string;
}

export type StatementHandler = (stmt: Statement) => void;
export type RegisterFunction = (keyword: string, handler: StatementHandler) => void;

const LabelRegex = /^(\.?[A-Za-z_][A-Za-z0-9_.]*)::?/;
const KeywordRegex = /^\s*([A-Za-z_.][A-Za-z0-9_.]*)/;

export function parseStatement(line: string): Statement {
    let rest = stripComment(line);
    let label: string | undefined;

    const labelMatch = rest.match(LabelRegex);
    if (labelMatch) {
        label = labelMatch[1];
        rest = rest.substring(labelMatch[0].length);
    }

    const kwMatch = rest.match(KeywordRegex);
    if (!kwMatch) {
        return { label, operands: rest.trim() };
    }

    return {
        label,
        keyword: kwMatch[1],
        operands: rest.substring(kwMatch[0].length).trim(),
    };
}

export function isKeyword(stmt: Statement, ...keywords: string[]): boolean {
    return stmt.keyword !== undefined && keywords.includes(stmt.keyword.toUpperCase());
}

// Splits at commas that are neither quoted nor inside brackets or parentheses
export function splitOperands(text: string): string[] {
    const parts: string[] = [];
    let depth = 0;
    let quote: string | undefined;
    let cur = "";

    for (const c of text) {
        if (quote) {
            if (c == quote) {
                quote = undefined;
            }
        } else if (c == "\"" || c == "'") {
            quote = c;
        } else if (c == "[" || c == "(") {
            depth++;
        } else if (c == "]" || c == ")") {
            depth--;
        } else if (c == "," && depth == 0) {
            parts.push(cur.trim());
            cur = "";
            continue;
        }
        cur += c;
    }

    if (cur.trim() != "" || parts.length > 0) {
        parts.push(cur.trim());
    }
    return parts;
}

// The contents of a "quoted" operand, undefined if it is something else
export function parseString(operand: string): string | undefined {
    const match = operand.match(/^"([^"]*)"$/);
    return match ? match[1] : undefined;
}

function stripComment(line: string): string {
    let quote: string | undefined;
    for (let i = 0; i < line.length; i++) {
        const c = line[i];
        if (quote) {
            if (c == quote) {
                quote = undefined;
            }
        } else if (c == "\"" || c == "'") {
            quote = c;
        } else if (c == ";") {
            return line.substring(0, i);
        }
    }
    return line;
}
