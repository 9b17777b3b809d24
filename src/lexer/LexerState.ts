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

// A source view: an opened file, a macro body or a REPT/FOR body
export class LexerState {
    public readonly name: string;
    private lines: string[];
    private lineIdx = 0;
    private lineNo_: number;
    private ifDepth_ = 0;

    public constructor(name: string, text: string, firstLineNo: number) {
        this.name = name;
        this.lines = splitLines(text);
        this.lineNo_ = firstLineNo;
    }

    public get lineNo() {
        return this.lineNo_;
    }

    public get ifDepth() {
        return this.ifDepth_;
    }

    public get atEnd(): boolean {
        return this.lineIdx >= this.lines.length;
    }

    public next(): string | undefined {
        if (this.atEnd) {
            return undefined;
        }
        this.lineNo_++;
        return this.lines[this.lineIdx++];
    }

    public rewind(lineNo: number) {
        this.lineIdx = 0;
        this.lineNo_ = lineNo;
        this.ifDepth_ = 0;
    }

    public skipToEnd() {
        this.lineNo_ += this.lines.length - this.lineIdx;
        this.lineIdx = this.lines.length;
        this.ifDepth_ = 0;
    }

    public enterIf() {
        this.ifDepth_++;
    }

    public leaveIf(): boolean {
        if (this.ifDepth_ == 0) {
            return false;
        }
        this.ifDepth_--;
        return true;
    }
}

function splitLines(text: string): string[] {
    if (text.length == 0) {
        return [];
    }
    const lines = text.split(/\r?\n/);
    if (lines[lines.length - 1] == "") {
        // a trailing line break does not start another line
        lines.pop();
    }
    return lines;
}
