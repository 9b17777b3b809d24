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

export enum SectionType {
    WRAM0,
    VRAM,
    ROMX,
    ROM0,
    HRAM,
    WRAMX,
    SRAM,
    OAM,
}

export interface SectionTypeInfo {
    readonly name: string;
    readonly startAddr: number;
    readonly size: number;
    readonly firstBank: number;
    readonly lastBank: number;
}

export interface MemoryMapOptions {
    // ROM0 spans the whole ROM area, like a 32 KiB cartridge without a mapper
    tinyRom?: boolean;

    // WRAM0 spans both work RAM areas
    wram0Only?: boolean;
}

const DefaultTypeInfo: Record<SectionType, SectionTypeInfo> = {
    [SectionType.WRAM0]:    { name: "WRAM0", startAddr: 0xC000, size: 0x1000, firstBank: 0, lastBank: 0 },
    [SectionType.VRAM]:     { name: "VRAM",  startAddr: 0x8000, size: 0x2000, firstBank: 0, lastBank: 1 },
    [SectionType.ROMX]:     { name: "ROMX",  startAddr: 0x4000, size: 0x4000, firstBank: 1, lastBank: 65535 },
    [SectionType.ROM0]:     { name: "ROM0",  startAddr: 0x0000, size: 0x4000, firstBank: 0, lastBank: 0 },
    [SectionType.HRAM]:     { name: "HRAM",  startAddr: 0xFF80, size: 0x007F, firstBank: 0, lastBank: 0 },
    [SectionType.WRAMX]:    { name: "WRAMX", startAddr: 0xD000, size: 0x1000, firstBank: 1, lastBank: 7 },
    [SectionType.SRAM]:     { name: "SRAM",  startAddr: 0xA000, size: 0x2000, firstBank: 0, lastBank: 255 },
    [SectionType.OAM]:      { name: "OAM",   startAddr: 0xFE00, size: 0x00A0, firstBank: 0, lastBank: 0 },
};

export class SectionTypeTable {
    private info: Record<SectionType, SectionTypeInfo>;

    public constructor(opts: MemoryMapOptions) {
        this.info = { ...DefaultTypeInfo };
        if (opts.tinyRom) {
            this.info[SectionType.ROM0] = { ...this.info[SectionType.ROM0], size: 0x8000 };
        }
        if (opts.wram0Only) {
            this.info[SectionType.WRAM0] = { ...this.info[SectionType.WRAM0], size: 0x2000 };
        }
    }

    public get(type: SectionType): SectionTypeInfo {
        return this.info[type];
    }

    public endAddr(type: SectionType): number {
        const info = this.info[type];
        return info.startAddr + info.size - 1;
    }

    public bankCount(type: SectionType): number {
        const info = this.info[type];
        return info.lastBank - info.firstBank + 1;
    }
}

// Only ROM sections carry bytes, everything else merely reserves space
export function hasData(type: SectionType): boolean {
    return type == SectionType.ROM0 || type == SectionType.ROMX;
}

export function isBankable(type: SectionType): boolean {
    return type == SectionType.ROMX || type == SectionType.VRAM || type == SectionType.SRAM || type == SectionType.WRAMX;
}

export function parseSectionType(name: string): SectionType | undefined {
    const upper = name.toUpperCase();
    for (const [type, info] of Object.entries(DefaultTypeInfo)) {
        if (info.name == upper) {
            return Number(type);
        }
    }
    return undefined;
}
