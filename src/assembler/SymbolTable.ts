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

import { Diagnostics } from "../diagnostics/Diagnostics.js";
import { FileStackNode } from "../fstack/FileStackNode.js";
import { LabelScopes, Section } from "../section/Section.js";
import { SymbolResolver } from "./Expression.js";
import { SymbolService } from "./Services.js";
import { LabelSymbol, MacroSymbol, PCSymbol, SymbolData, SymbolType } from "./SymbolData.js";

// Where @ currently points and where new labels come from
export interface PCSource {
    getSymbolSection(): Section | undefined;
    getSymbolOffset(): number;
    getFileStack(): FileStackNode | undefined;
    getLineNo(): number;
}

const SymbolKinds: Record<SymbolType, string> = {
    [SymbolType.Macro]: "macro",
    [SymbolType.Var]: "variable",
    [SymbolType.Label]: "label",
    [SymbolType.PC]: "built-in symbol",
};

export class SymbolTable implements SymbolService, SymbolResolver {
    private symbols = new Map<string, SymbolData>();
    private pc: PCSymbol = { type: SymbolType.PC, name: "@" };
    private labelScopes: LabelScopes = [undefined, undefined];

    public constructor(private diag: Diagnostics, private pcSource: PCSource) {
    }

    public findExactSymbol(name: string): SymbolData | undefined {
        if (name == this.pc.name) {
            return this.pc;
        }
        return this.symbols.get(name);
    }

    // Turns a local label name into its fully qualified form using the current scope
    public qualify(name: string): string {
        if (!name.startsWith(".")) {
            return name;
        }
        const [global] = this.labelScopes;
        if (global === undefined) {
            this.diag.error(`Unqualified local label '${name}' in main scope`);
            return name;
        }
        return global + name;
    }

    public addVar(name: string, value: number): SymbolData {
        const existing = this.symbols.get(name);
        if (existing) {
            if (existing.type == SymbolType.Var) {
                existing.value = value;
            } else {
                this.diag.error(`'${name}' already defined as ${SymbolKinds[existing.type]}`);
            }
            return existing;
        }

        const sym: SymbolData = { type: SymbolType.Var, name, value };
        this.symbols.set(name, sym);
        return sym;
    }

    public addLabel(rawName: string): LabelSymbol | undefined {
        const section = this.pcSource.getSymbolSection();
        if (!section) {
            this.diag.error(`Label "${rawName}" created outside of a SECTION`);
            return undefined;
        }

        const name = this.qualify(rawName);
        if (this.findExactSymbol(name)) {
            this.diag.error(`'${name}' already defined`);
            return undefined;
        }

        const src = this.pcSource.getFileStack();
        if (!src) {
            throw Error("Internal error: label defined without a context");
        }

        const sym: LabelSymbol = {
            type: SymbolType.Label,
            name,
            section,
            offset: this.pcSource.getSymbolOffset(),
            src,
            fileLine: this.pcSource.getLineNo(),
        };
        this.symbols.set(name, sym);

        if (!rawName.startsWith(".")) {
            this.labelScopes = [name, undefined];
        } else {
            this.labelScopes = [this.labelScopes[0], name];
        }
        return sym;
    }

    public addMacro(name: string, body: string, src: FileStackNode, fileLine: number): MacroSymbol | undefined {
        if (this.findExactSymbol(name)) {
            this.diag.error(`'${name}' already defined`);
            return undefined;
        }

        const sym: MacroSymbol = { type: SymbolType.Macro, name, body, src, fileLine };
        this.symbols.set(name, sym);
        return sym;
    }

    public getPC(): SymbolData | undefined {
        return this.pcSource.getSymbolSection() ? this.pc : undefined;
    }

    public isConstant(sym: SymbolData): boolean {
        switch (sym.type) {
            case SymbolType.Var:
                return true;
            case SymbolType.Label:
                return sym.section.org !== undefined;
            case SymbolType.PC:
                return this.pcSource.getSymbolSection()?.org !== undefined;
            case SymbolType.Macro:
                return false;
        }
    }

    // Labels of floating sections evaluate to their offset
    public getValue(sym: SymbolData): number {
        switch (sym.type) {
            case SymbolType.Var:
                return sym.value;
            case SymbolType.Label:
                return (sym.section.org ?? 0) + sym.offset;
            case SymbolType.PC:
                return (this.pcSource.getSymbolSection()?.org ?? 0) + this.pcSource.getSymbolOffset();
            case SymbolType.Macro:
                throw Error(`Internal error: value of macro ${sym.name}`);
        }
    }

    public sameSection(a: SymbolData, b: SymbolData): boolean {
        const sectA = this.sectionOf(a);
        return sectA !== undefined && sectA === this.sectionOf(b);
    }

    public getCurrentLabelScopes(): LabelScopes {
        return this.labelScopes;
    }

    public setCurrentLabelScopes(scopes: LabelScopes) {
        this.labelScopes = scopes;
    }

    public resetCurrentLabelScopes() {
        this.labelScopes = [undefined, undefined];
    }

    public getSymbols(): ReadonlyMap<string, SymbolData> {
        return this.symbols;
    }

    private sectionOf(sym: SymbolData): Section | undefined {
        switch (sym.type) {
            case SymbolType.Label:
                return sym.section;
            case SymbolType.PC:
                return this.pcSource.getSymbolSection();
            default:
                return undefined;
        }
    }
}
