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

import { closeSync, fstatSync, openSync, readSync } from "fs";
import { Expression } from "../assembler/Expression.js";
import { FileStackService, OutputService, SymbolService } from "../assembler/Services.js";
import { Diagnostics } from "../diagnostics/Diagnostics.js";
import { WarningType } from "../diagnostics/WarningType.js";
import { hex, plural } from "../utils/Strings.js";
import {
    LabelScopes, PatchType, Section, SectionModifier, SectionModifierNames, SectionSpec,
    SectionStackEntry, UnionStackEntry,
} from "./Section.js";
import { MemoryMapOptions, SectionType, SectionTypeTable, hasData, isBankable } from "./SectionType.js";

const MaxOffset = 0xFFFFFFFF;

export interface SectionTableOptions extends MemoryMapOptions {
    // fill value for DS in ROM sections
    padByte?: number;
}

export interface SectionServices {
    fstack: FileStackService;
    lexer: { getLineNo(): number };
    symbols: SymbolService;
    diag: Diagnostics;
    output: OutputService;
}

function mask(align: number): number {
    return (1 << align) - 1;
}

/**
 * All sections of a pass and the state of where output currently goes:
 * the active section, an optional LOAD block inside it, the UNION members and the PUSHS stack.
 */
export class SectionTable {
    private fstack: FileStackService;
    private lexer: { getLineNo(): number };
    private symbols: SymbolService;
    private diag: Diagnostics;
    private output: OutputService;
    private opts: SectionTableOptions;

    public readonly types: SectionTypeTable;

    private sections: Section[] = [];
    private sectionMap = new Map<string, number>();

    private currentSection?: Section;

    // offset into the current section, or into the LOAD block if there is one
    private curOffset = 0;

    private sectionStack: SectionStackEntry[] = [];

    private currentLoadSection?: Section;
    private currentLoadLabelScopes: LabelScopes = [undefined, undefined];

    // position of the LOAD block inside its parent section
    private loadOffset = 0;

    private currentUnionStack: UnionStackEntry[] = [];

    private nextFragmentLiteralId = 0;

    // file position for the next INCBIN read, null for streams
    private readPos: number | null = null;

    public constructor(services: SectionServices, opts: SectionTableOptions) {
        this.fstack = services.fstack;
        this.lexer = services.lexer;
        this.symbols = services.symbols;
        this.diag = services.diag;
        this.output = services.output;
        this.opts = opts;
        this.types = new SectionTypeTable(opts);
    }

    public getSections(): readonly Section[] {
        return this.sections;
    }

    public countSections(): number {
        return this.sections.length;
    }

    public findSectionByName(name: string): Section | undefined {
        const idx = this.sectionMap.get(name);
        return idx !== undefined ? this.sections[idx] : undefined;
    }

    // Fragment literals share their parent's name, so this goes by identity
    public getId(sect: Section): number | undefined {
        const idx = this.sections.indexOf(sect);
        return idx >= 0 ? idx : undefined;
    }

    public getCurrentSection(): Section | undefined {
        return this.currentSection;
    }

    public getCurrentLoadSection(): Section | undefined {
        return this.currentLoadSection;
    }

    public getSymbolSection(): Section | undefined {
        return this.currentLoadSection ?? this.currentSection;
    }

    public getSymbolOffset(): number {
        return this.curOffset;
    }

    public getOutputOffset(): number {
        return this.curOffset + this.loadOffset;
    }

    public getOutputBank(): number | undefined {
        return this.currentSection?.bank;
    }

    public get unionDepth(): number {
        return this.currentUnionStack.length;
    }

    public get stackDepth(): number {
        return this.sectionStack.length;
    }

    public isSizeKnown(sect: Section): boolean {
        // UNION and FRAGMENT sections can still grow
        if (sect.modifier != SectionModifier.Normal) {
            return false;
        }

        if (sect === this.currentSection || sect === this.currentLoadSection) {
            return false;
        }

        return !this.sectionStack.some(entry => entry.section?.name == sect.name);
    }

    public checkSizes() {
        for (const sect of this.sections) {
            const maxSize = this.types.get(sect.type).size;
            if (sect.size > maxSize) {
                this.diag.error(`Section '${sect.name}' grew too big (max size = 0x${hex(maxSize, 0)} bytes, reached 0x${hex(sect.size, 0)})`);
            }
        }
    }

    public newSection(name: string, type: SectionType, org: number | undefined, spec: SectionSpec, mod: SectionModifier) {
        for (const entry of this.sectionStack) {
            if (entry.section?.name == name) {
                this.diag.fatal(`Section '${name}' is already on the stack`);
            }
        }

        if (this.currentLoadSection) {
            this.endLoadSection("SECTION");
        }

        const sect = this.getSection(name, type, org, spec, mod);

        this.changeSection();
        this.curOffset = mod == SectionModifier.Union ? 0 : sect.size;
        this.loadOffset = 0;
        this.currentSection = sect;
    }

    public setLoadSection(name: string, type: SectionType, org: number | undefined, spec: SectionSpec, mod: SectionModifier) {
        // UNION and LOAD cannot meet: UNIONs are only allowed in RAM, LOAD blocks only in ROM
        if (!this.requireCodeSection()) {
            return;
        }

        if (hasData(type)) {
            this.diag.error("`LOAD` blocks cannot create a ROM section");
            return;
        }

        if (this.currentLoadSection) {
            this.endLoadSection("LOAD");
        }

        const sect = this.getSection(name, type, org, spec, mod);

        this.currentLoadLabelScopes = this.symbols.getCurrentLabelScopes();
        this.changeSection();
        this.loadOffset = this.curOffset - (mod == SectionModifier.Union ? 0 : sect.size);
        this.curOffset -= this.loadOffset;
        this.currentLoadSection = sect;
    }

    // cause names the directive that closes the block implicitly, if any
    public endLoadSection(cause?: string) {
        if (cause !== undefined) {
            this.diag.warning(WarningType.UnterminatedLoad, `\`LOAD\` block without \`ENDL\` terminated by \`${cause}\``);
        }

        if (!this.currentLoadSection) {
            this.diag.error("Found `ENDL` outside of a `LOAD` block");
            return;
        }

        this.changeSection();
        this.curOffset += this.loadOffset;
        this.loadOffset = 0;
        this.currentLoadSection = undefined;
        this.symbols.setCurrentLabelScopes(this.currentLoadLabelScopes);
    }

    public checkLoadClosed() {
        if (this.currentLoadSection) {
            this.diag.warning(WarningType.UnterminatedLoad, "`LOAD` block without `ENDL` terminated by EOF");
        }
    }

    public endSection() {
        if (!this.currentSection) {
            this.diag.fatal("Cannot end the section outside of a SECTION");
        }

        if (this.currentUnionStack.length > 0) {
            this.diag.fatal("Cannot end the section within a UNION");
        }

        if (this.currentLoadSection) {
            this.endLoadSection("ENDSECTION");
        }

        this.currentSection = undefined;
        this.symbols.resetCurrentLabelScopes();
    }

    public pushSection() {
        this.sectionStack.push({
            section: this.currentSection,
            loadSection: this.currentLoadSection,
            labelScopes: this.symbols.getCurrentLabelScopes(),
            offset: this.curOffset,
            loadOffset: this.loadOffset,
            unionStack: this.currentUnionStack,
        });

        this.currentSection = undefined;
        this.currentLoadSection = undefined;
        this.symbols.resetCurrentLabelScopes();
        this.currentUnionStack = [];
    }

    public popSection() {
        const entry = this.sectionStack.at(-1);
        if (!entry) {
            this.diag.fatal("No entries in the section stack");
        }

        if (this.currentLoadSection) {
            this.endLoadSection("POPS");
        }

        this.sectionStack.pop();

        this.changeSection();
        this.currentSection = entry.section;
        this.currentLoadSection = entry.loadSection;
        this.symbols.setCurrentLabelScopes(entry.labelScopes);
        this.curOffset = entry.offset;
        this.loadOffset = entry.loadOffset;
        this.currentUnionStack = entry.unionStack;
    }

    public checkStack() {
        if (this.sectionStack.length > 0) {
            this.diag.warning(WarningType.UnmatchedDirective, "`PUSHS` without corresponding `POPS`");
        }
    }

    /**
     * Opens an anonymous fragment of the current section for bytes that are placed apart from it.
     * The current section is pushed and becomes a fragment itself; POPS returns to it.
     * @returns the symbol name standing for the fragment's address
     */
    public pushSectionFragmentLiteral(): string {
        const parent = this.currentSection;
        if (!parent) {
            this.diag.fatal("Cannot output fragment literals outside of a SECTION");
        }
        if (!hasData(parent.type)) {
            this.diag.fatal(`Section '${parent.name}' cannot contain fragment literals (not ROM0 or ROMX)`);
        }
        if (this.currentLoadSection) {
            this.diag.fatal("`LOAD` blocks cannot contain fragment literals");
        }
        if (parent.modifier == SectionModifier.Union) {
            this.diag.fatal("`SECTION UNION` cannot contain fragment literals");
        }

        // the parent must be freely relocatable now
        parent.modifier = SectionModifier.Fragment;

        this.pushSection();

        const sect = this.createSectionFragmentLiteral(parent);

        this.changeSection();
        this.curOffset = sect.size;
        this.currentSection = sect;

        return `$${this.nextFragmentLiteralId++}`;
    }

    public startUnion() {
        if (!this.currentSection) {
            this.diag.error("UNIONs must be inside a SECTION");
            return;
        }
        if (hasData(this.currentSection.type)) {
            this.diag.error("Cannot use UNION inside of ROM0 or ROMX sections");
            return;
        }

        this.currentUnionStack.push({ start: this.curOffset, size: 0 });
    }

    public nextUnionMember() {
        if (this.currentUnionStack.length == 0) {
            this.diag.error("Found NEXTU outside of a UNION construct");
            return;
        }
        this.endUnionMember();
    }

    public endUnion() {
        const top = this.currentUnionStack.at(-1);
        if (!top) {
            this.diag.error("Found ENDU outside of a UNION construct");
            return;
        }
        this.endUnionMember();
        this.curOffset += top.size;
        this.currentUnionStack.pop();
    }

    public checkUnionClosed() {
        if (this.currentUnionStack.length > 0) {
            this.diag.error("Unterminated UNION construct");
        }
    }

    // How many bytes to output so that the position satisfies ALIGN[alignment, offset]
    public getAlignBytes(alignment: number, offset: number): number {
        const sect = this.getSymbolSection();
        if (!sect) {
            return 0;
        }

        // fixed sections count as maximally aligned
        const curAlignment = sect.org !== undefined ? 16 : sect.align;
        if (curAlignment == 0) {
            return 0;
        }

        const pcValue = sect.org !== undefined ? sect.org : sect.alignOffset;
        return ((offset - this.curOffset - pcValue) & 0xFFFF) % (1 << Math.min(alignment, curAlignment));
    }

    public alignPC(alignment: number, offset: number) {
        if (!this.requireSection()) {
            return;
        }

        const sect = this.getSymbolSection();
        if (!sect) {
            return;
        }
        const alignSize = 2 ** alignment;

        if (sect.org !== undefined) {
            const actualOffset = (sect.org + this.curOffset) % alignSize;
            if (actualOffset != offset) {
                this.diag.error(
                    `Section is misaligned (at PC = $${hex(sect.org + this.curOffset, 4)}, ` +
                    `expected ALIGN[${alignment}, ${offset}], got ALIGN[${alignment}, ${actualOffset}])`,
                );
            }
            return;
        }

        const actualOffset = (sect.alignOffset + this.curOffset) % alignSize;
        const sectAlignSize = 1 << sect.align;
        if (sect.align != 0 && actualOffset % sectAlignSize != offset % sectAlignSize) {
            this.diag.error(
                `Section is misaligned ($${hex(this.curOffset, 4)} bytes into the section, ` +
                `expected ALIGN[${alignment}, ${offset}], got ALIGN[${alignment}, ${actualOffset}])`,
            );
        } else if (alignment >= 16) {
            // large enough to pin the address, which also keeps the alignment itself below 16
            if (alignment > 16) {
                this.diag.error(`Alignment must be between 0 and 16, not ${alignment}`);
            }
            sect.align = 0;
            sect.org = (offset - this.curOffset) & 0xFFFF;
        } else if (alignment > sect.align) {
            sect.align = alignment;
            sect.alignOffset = (offset - this.curOffset) & mask(alignment);
        }
    }

    public constByte(byte: number) {
        if (!this.requireCodeSection()) {
            return;
        }
        this.writeByte(byte);
    }

    public byteString(units: readonly number[]) {
        if (!this.requireCodeSection()) {
            return;
        }
        this.checkUnits(units, 8);
        for (const unit of units) {
            this.writeByte(unit);
        }
    }

    public wordString(units: readonly number[]) {
        if (!this.requireCodeSection()) {
            return;
        }
        this.checkUnits(units, 16);
        for (const unit of units) {
            this.writeWord(unit);
        }
    }

    public longString(units: readonly number[]) {
        if (!this.requireCodeSection()) {
            return;
        }
        for (const unit of units) {
            this.writeLong(unit);
        }
    }

    // isDs: reserved with DS rather than a DB/DW/DL without data
    public skip(count: number, isDs: boolean) {
        if (!this.requireSection() || !this.currentSection) {
            return;
        }

        if (!hasData(this.currentSection.type)) {
            this.growSection(count);
            return;
        }

        if (!isDs) {
            const directive = count == 4 ? "DL" : count == 2 ? "DW" : "DB";
            this.diag.warning(WarningType.EmptyDataDirective, `${directive} directive without data in ROM`);
        }
        for (let i = 0; i < count; i++) {
            this.writeByte(this.opts.padByte ?? 0);
        }
    }

    public relByte(expr: Expression, pcShift: number) {
        if (!this.requireCodeSection()) {
            return;
        }

        if (!expr.isKnown()) {
            this.createPatch(PatchType.Byte, expr, pcShift);
            this.writeByte(0);
        } else {
            this.writeByte(expr.value());
        }
    }

    // count bytes, cycling through the given expressions
    public relBytes(count: number, exprs: readonly Expression[]) {
        if (!this.requireCodeSection() || exprs.length == 0) {
            return;
        }

        for (let i = 0; i < count; i++) {
            const expr = exprs[i % exprs.length];
            if (!expr.isKnown()) {
                this.createPatch(PatchType.Byte, expr, i);
                this.writeByte(0);
            } else {
                this.writeByte(expr.value());
            }
        }
    }

    public relWord(expr: Expression, pcShift: number) {
        if (!this.requireCodeSection()) {
            return;
        }

        if (!expr.isKnown()) {
            this.createPatch(PatchType.Word, expr, pcShift);
            this.writeWord(0);
        } else {
            this.writeWord(expr.value());
        }
    }

    public relLong(expr: Expression, pcShift: number) {
        if (!this.requireCodeSection()) {
            return;
        }

        if (!expr.isKnown()) {
            this.createPatch(PatchType.Long, expr, pcShift);
            this.writeLong(0);
        } else {
            this.writeLong(expr.value());
        }
    }

    // Signed offset from the byte after the operand to the expression
    public pcRelByte(expr: Expression, pcShift: number) {
        if (!this.requireCodeSection()) {
            return;
        }

        const pc = this.symbols.getPC();
        const sym = expr.symbolOf();
        if (!pc || !sym || !expr.isDiffConstant(pc)) {
            this.createPatch(PatchType.JR, expr, pcShift);
            this.writeByte(0);
            return;
        }

        let offset: number;
        if (sym === pc) {
            // @ as the operand lies two bytes before the reference point
            offset = -2;
        } else {
            // wraps like a 16-bit address, e.g. jumping from ROM to HRAM
            const diff = this.symbols.getValue(sym) - (this.symbols.getValue(pc) + 1);
            offset = ((diff + 0x8000) & 0xFFFF) - 0x8000;
        }

        if (offset < -128 || offset > 127) {
            this.diag.error(`JR target must be between -128 and 127 bytes away, not ${offset}; use JP instead`);
            this.writeByte(0);
        } else {
            this.writeByte(offset);
        }
    }

    /**
     * INCBIN: appends a file's bytes starting at startPos.
     * @returns true if the pass has to stop because of a missing file
     */
    public binaryFile(name: string, startPos: number): boolean {
        if (!this.requireCodeSection()) {
            return false;
        }

        const fd = this.openBinary(name);
        if (typeof fd == "boolean") {
            return fd;
        }

        try {
            if (!this.seekBinary(fd, name, startPos, undefined)) {
                return false;
            }
            this.readBinary(fd, name, undefined);
        } finally {
            closeSync(fd);
        }
        return false;
    }

    // INCBIN with a length: reading past the end of the file is an error
    public binaryFileSlice(name: string, startPos: number, length: number): boolean {
        if (!this.requireCodeSection()) {
            return false;
        }
        if (length == 0) {
            return false;
        }

        const fd = this.openBinary(name);
        if (typeof fd == "boolean") {
            return fd;
        }

        try {
            if (!this.seekBinary(fd, name, startPos, length)) {
                return false;
            }
            this.readBinary(fd, name, length);
        } finally {
            closeSync(fd);
        }
        return false;
    }

    private openBinary(name: string): number | boolean {
        const fullPath = this.fstack.findFile(name);
        if (fullPath !== undefined) {
            try {
                return openSync(fullPath, "r");
            } catch (e) {
                if (!(e instanceof Error)) {
                    throw e;
                }
                this.diag.error(`Error opening INCBIN file '${name}': ${e.message}`);
                return false;
            }
        }
        return this.fstack.fileError(name, "INCBIN");
    }

    // Positions the read at startPos; regular files are seeked, streams consumed byte by byte
    private seekBinary(fd: number, name: string, startPos: number, length: number | undefined): boolean {
        const stat = fstatSync(fd);
        if (stat.isFile()) {
            const fileSize = stat.size;
            if (startPos > fileSize) {
                this.diag.error(`Specified start position is greater than length of file '${name}'`);
                return false;
            }
            if (length !== undefined && startPos + length > fileSize) {
                this.diag.error(`Specified range in INCBIN file '${name}' is out of bounds (${startPos} + ${length} > ${fileSize})`);
                return false;
            }
            this.readPos = startPos;
            return true;
        }

        this.readPos = null;
        const skipBuf = new Uint8Array(1);
        for (let i = 0; i < startPos; i++) {
            if (readSync(fd, skipBuf, 0, 1, null) == 0) {
                this.diag.error(`Specified start position is greater than length of file '${name}'`);
                return false;
            }
        }
        return true;
    }

    private readBinary(fd: number, name: string, length: number | undefined) {
        const buf = new Uint8Array(4096);
        let left = length ?? Infinity;

        while (left > 0) {
            let got: number;
            try {
                got = readSync(fd, buf, 0, Math.min(buf.length, left), this.readPos);
            } catch (e) {
                if (!(e instanceof Error)) {
                    throw e;
                }
                this.diag.error(`Error reading INCBIN file '${name}': ${e.message}`);
                return;
            }

            if (got == 0) {
                if (length !== undefined) {
                    this.diag.error(`Premature end of INCBIN file '${name}' (${left} bytes left to read)`);
                }
                return;
            }

            if (this.readPos !== null) {
                this.readPos += got;
            }
            for (let i = 0; i < got; i++) {
                this.writeByte(buf[i]);
            }
            left -= got;
        }
    }

    private requireSection(): boolean {
        if (this.currentSection) {
            return true;
        }

        this.diag.error("Cannot output data outside of a SECTION");
        return false;
    }

    private requireCodeSection(): boolean {
        if (!this.requireSection() || !this.currentSection) {
            return false;
        }

        if (hasData(this.currentSection.type)) {
            return true;
        }

        this.diag.error(`Section '${this.currentSection.name}' cannot contain code or data (not ROM0 or ROMX)`);
        return false;
    }

    private changeSection() {
        if (this.currentUnionStack.length > 0) {
            this.diag.fatal("Cannot change the section within a UNION");
        }

        this.symbols.resetCurrentLabelScopes();
    }

    private endUnionMember() {
        const member = this.currentUnionStack.at(-1);
        if (!member) {
            throw Error("Internal error: no UNION to end a member of");
        }

        const memberSize = this.curOffset - member.start;
        if (memberSize > member.size) {
            member.size = memberSize;
        }
        this.curOffset = member.start;
    }

    private growSection(growth: number) {
        const sect = this.currentSection;
        if (!sect) {
            throw Error("Internal error: growing without a section");
        }

        if (growth > 0 && this.curOffset > MaxOffset - growth) {
            this.diag.fatal("Section size would overflow internal counter");
        }
        this.curOffset += growth;

        const outOffset = this.getOutputOffset();
        if (outOffset > sect.size) {
            sect.size = outOffset;
        }
        if (this.currentLoadSection && this.curOffset > this.currentLoadSection.size) {
            this.currentLoadSection.size = this.curOffset;
        }
    }

    private writeByte(byte: number) {
        const sect = this.currentSection;
        if (!sect) {
            throw Error("Internal error: writing without a section");
        }

        // stays in bounds even after earlier errors let the section overflow
        const index = this.getOutputOffset();
        if (index < sect.data.length) {
            sect.data[index] = byte & 0xFF;
        }
        this.growSection(1);
    }

    private writeWord(value: number) {
        this.writeByte(value & 0xFF);
        this.writeByte(value >> 8);
    }

    private writeLong(value: number) {
        this.writeByte(value & 0xFF);
        this.writeByte(value >> 8);
        this.writeByte(value >> 16);
        this.writeByte(value >> 24);
    }

    private checkUnits(units: readonly number[], bits: number) {
        for (const unit of units) {
            if (unit < -(2 ** (bits - 1)) || unit >= 2 ** bits) {
                this.diag.warning(WarningType.Truncation, `All character units must be ${bits}-bit`);
                break;
            }
        }
    }

    private createPatch(type: PatchType, expr: Expression, pcShift: number) {
        this.output.createPatch(type, expr, this.getOutputOffset(), pcShift);
    }

    private getSection(name: string, type: SectionType, org: number | undefined, spec: SectionSpec, mod: SectionModifier): Section {
        const info = this.types.get(type);
        let bank = spec.bank;
        let alignment = spec.alignment;
        let alignOffset = spec.alignOffset;

        // first, validate the parameters and normalize them where applicable

        if (bank !== undefined) {
            if (!isBankable(type)) {
                this.diag.error("BANK only allowed for ROMX, WRAMX, SRAM, or VRAM sections");
                bank = undefined;
            } else if (bank < info.firstBank || bank > info.lastBank) {
                this.diag.error(
                    `${info.name} bank value $${hex(bank, 4)} out of range ` +
                    `($${hex(info.firstBank, 4)} to $${hex(info.lastBank, 4)})`,
                );
                bank = undefined;
            }
        } else if (this.types.bankCount(type) == 1) {
            // a single bank is implied
            bank = info.firstBank;
        }

        if (alignOffset >= 2 ** alignment) {
            this.diag.error(`Alignment offset (${alignOffset}) must be smaller than alignment size (${2 ** alignment})`);
            alignOffset = 0;
        }

        if (org !== undefined) {
            const endAddr = this.types.endAddr(type);
            if (org < info.startAddr || org > endAddr) {
                this.diag.error(
                    `Section "${name}"'s fixed address $${hex(org, 4)} is outside of range ` +
                    `[$${hex(info.startAddr, 4)}; $${hex(endAddr, 4)}]`,
                );
            }
        }

        if (alignment != 0) {
            if (alignment > 16) {
                this.diag.error(`Alignment must be between 0 and 16, not ${alignment}`);
                alignment = 16;
            }

            const alignMask = mask(alignment);
            if (org !== undefined) {
                if ((org - alignOffset) & alignMask) {
                    this.diag.error(`Section "${name}"'s fixed address doesn't match its alignment`);
                }
                // satisfied or not, the fixed address wins
                alignment = 0;
            } else if (info.startAddr & alignMask) {
                this.diag.error(`Section "${name}"'s alignment cannot be attained in ${info.name}`);
                alignment = 0;
                org = 0;
            } else if (alignment == 16) {
                // no bits of freedom left: this fixes the address
                alignment = 0;
                org = alignOffset;
            }
        }

        const sect = this.findSectionByName(name);
        if (sect) {
            this.mergeSections(sect, type, org, bank, alignment, alignOffset, mod);
            return sect;
        }
        return this.createSection(name, type, org, bank, alignment, alignOffset, mod);
    }

    private createSection(
        name: string, type: SectionType, org: number | undefined, bank: number | undefined,
        alignment: number, alignOffset: number, mod: SectionModifier,
    ): Section {
        const src = this.getSource();
        const sect = new Section({
            name,
            type,
            modifier: mod,
            src,
            fileLine: this.lexer.getLineNo(),
            org,
            bank,
            align: alignment,
            alignOffset,
            dataSize: hasData(type) ? this.types.get(type).size : 0,
        });

        this.sectionMap.set(name, this.sections.length);
        this.sections.push(sect);
        this.output.registerNode(src);
        return sect;
    }

    // Not entered into the name map: the name keeps referring to the parent
    private createSectionFragmentLiteral(parent: Section): Section {
        if (!hasData(parent.type)) {
            throw Error("Internal error: fragment literal in a section without data");
        }

        const src = this.getSource();
        const sect = new Section({
            name: parent.name,
            type: parent.type,
            modifier: SectionModifier.Fragment,
            src,
            fileLine: this.lexer.getLineNo(),
            org: undefined,
            bank: parent.bank == 0 ? undefined : parent.bank,
            align: 0,
            alignOffset: 0,
            dataSize: this.types.get(parent.type).size,
        });

        this.sections.push(sect);
        this.output.registerNode(src);
        return sect;
    }

    private getSource() {
        const src = this.fstack.getFileStack();
        if (!src) {
            throw Error("Internal error: section declared without a context");
        }
        return src;
    }

    private mergeSections(
        sect: Section, type: SectionType, org: number | undefined, bank: number | undefined,
        alignment: number, alignOffset: number, mod: SectionModifier,
    ) {
        let numErrors = 0;
        const sectError = (msg: string) => {
            this.diag.error(msg);
            numErrors++;
        };

        if (type != sect.type) {
            sectError(`Section already exists but with type ${this.types.get(sect.type).name}`);
        }

        if (sect.modifier != mod) {
            sectError(`Section already declared as ${SectionModifierNames[sect.modifier]} section`);
        } else {
            switch (mod) {
                case SectionModifier.Union:
                case SectionModifier.Fragment:
                    if (mod == SectionModifier.Union) {
                        this.mergeSectUnion(sect, type, org, alignment, alignOffset, sectError);
                    } else {
                        this.mergeFragments(sect, org, alignment, alignOffset, sectError);
                    }

                    if (sect.bank === undefined) {
                        // unspecified so far, the new declaration decides
                        sect.bank = bank;
                    } else if (bank !== undefined && sect.bank != bank) {
                        sectError(`Section already declared with different bank ${sect.bank}`);
                    }
                    break;

                case SectionModifier.Normal:
                    sectError(`Section already defined previously at ${this.fstack.dump(sect.src, sect.fileLine)}`);
                    break;
            }
        }

        if (numErrors > 0) {
            this.diag.fatal(`Cannot create section "${sect.name}" (${plural(numErrors, "error")})`);
        }
    }

    // Unions only need compatible constraints and end up with the strictest combination of both
    private mergeSectUnion(
        sect: Section, type: SectionType, org: number | undefined,
        alignment: number, alignOffset: number, sectError: (msg: string) => void,
    ) {
        if (hasData(type)) {
            sectError("Cannot declare ROM sections as UNION");
        }

        if (org !== undefined) {
            if (sect.org !== undefined && sect.org != org) {
                sectError(`Section already declared as fixed at different address $${hex(sect.org, 4)}`);
            } else if (sect.align != 0 && (mask(sect.align) & (org - sect.alignOffset))) {
                sectError(`Section already declared as aligned to ${1 << sect.align} bytes (offset ${sect.alignOffset})`);
            } else {
                sect.org = org;
            }
        } else if (alignment != 0) {
            if (sect.org !== undefined) {
                if ((sect.org - alignOffset) & mask(alignment)) {
                    sectError(`Section already declared as fixed at incompatible address $${hex(sect.org, 4)}`);
                }
            } else if ((alignOffset & mask(sect.align)) != (sect.alignOffset & mask(alignment))) {
                sectError(`Section already declared with incompatible ${1 << sect.align}-byte alignment (offset ${sect.alignOffset})`);
            } else if (alignment > sect.align) {
                sect.align = alignment;
                sect.alignOffset = alignOffset;
            }
        }
    }

    // Same as for unions, but the constraints apply to the end of what the section holds so far
    private mergeFragments(
        sect: Section, org: number | undefined,
        alignment: number, alignOffset: number, sectError: (msg: string) => void,
    ) {
        if (org !== undefined) {
            const curOrg = (org - sect.size) & 0xFFFF;

            if (sect.org !== undefined && sect.org != curOrg) {
                sectError(`Section already declared as fixed at incompatible address $${hex(sect.org, 4)}`);
            } else if (sect.align != 0 && (mask(sect.align) & (curOrg - sect.alignOffset))) {
                sectError(`Section already declared as aligned to ${1 << sect.align} bytes (offset ${sect.alignOffset})`);
            } else {
                sect.org = curOrg;
            }
        } else if (alignment != 0) {
            const curOfs = (alignOffset - sect.size) & mask(alignment);

            if (sect.org !== undefined) {
                if ((sect.org - curOfs) & mask(alignment)) {
                    sectError(`Section already declared as fixed at incompatible address $${hex(sect.org, 4)}`);
                }
            } else if ((curOfs & mask(sect.align)) != (sect.alignOffset & mask(alignment))) {
                sectError(`Section already declared with incompatible ${1 << sect.align}-byte alignment (offset ${sect.alignOffset})`);
            } else if (alignment > sect.align) {
                sect.align = alignment;
                sect.alignOffset = curOfs;
            }
        }
    }
}
