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

import { SymbolData } from "./SymbolData.js";

// An operand whose value may only be known at link time
export interface Expression {
    isKnown(): boolean;

    // only meaningful if known
    value(): number;

    // whether this minus the given PC is a constant, i.e. both lie in the same section
    isDiffConstant(pc: SymbolData | undefined): boolean;

    // the symbol if the expression is nothing but a symbol
    symbolOf(): SymbolData | undefined;

    toString(): string;
}

// How expressions look at symbols, which may only be defined after the expression was built
export interface SymbolResolver {
    findExactSymbol(name: string): SymbolData | undefined;
    isConstant(sym: SymbolData): boolean;
    getValue(sym: SymbolData): number;
    sameSection(a: SymbolData, b: SymbolData): boolean;
}

export class ConstExpression implements Expression {
    public constructor(private readonly val: number) {
    }

    public isKnown(): boolean {
        return true;
    }

    public value(): number {
        return this.val;
    }

    public isDiffConstant(): boolean {
        return false;
    }

    public symbolOf(): SymbolData | undefined {
        return undefined;
    }

    public toString(): string {
        return this.val.toString();
    }
}

/**
 * A symbol plus a constant addend.
 * The symbol is looked up by name on every query so that forward references
 * become known once their label is defined.
 */
export class SymbolExpression implements Expression {
    public constructor(private readonly resolver: SymbolResolver, public readonly symName: string, public readonly addend: number) {
    }

    public isKnown(): boolean {
        const sym = this.symbolRef();
        return sym !== undefined && this.resolver.isConstant(sym);
    }

    public value(): number {
        const sym = this.symbolRef();
        if (!sym) {
            throw Error(`Internal error: value of undefined symbol ${this.symName}`);
        }
        return this.resolver.getValue(sym) + this.addend;
    }

    public isDiffConstant(pc: SymbolData | undefined): boolean {
        const sym = this.symbolOf();
        if (!sym || !pc) {
            return false;
        }
        return this.resolver.sameSection(sym, pc);
    }

    public symbolOf(): SymbolData | undefined {
        return this.addend == 0 ? this.symbolRef() : undefined;
    }

    public toString(): string {
        if (this.addend == 0) {
            return this.symName;
        }
        return this.addend > 0 ? `${this.symName}+${this.addend}` : `${this.symName}-${-this.addend}`;
    }

    private symbolRef(): SymbolData | undefined {
        return this.resolver.findExactSymbol(this.symName);
    }
}
