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

import { statSync } from "fs";
import { Diagnostics } from "../diagnostics/Diagnostics.js";

export const MaxIncludePaths = 128;

export interface DependencyOptions {
    // write make-style dependency lines for this target
    dependTarget?: string;

    // also emit an empty rule per dependency
    generatePhonyDeps?: boolean;

    // only generating dependencies: missing files are recorded instead of reported
    generatedMissingIncludes?: boolean;
}

/**
 * Resolves INCLUDE and INCBIN paths against the include directories
 * and records every resolved file as a dependency of the output.
 */
export class IncludePaths {
    private diag: Diagnostics;
    private opts: DependencyOptions;
    private prefixes: string[] = [];
    private depLines: string[] = [];

    public constructor(diag: Diagnostics, opts: DependencyOptions) {
        this.diag = diag;
        this.opts = opts;
    }

    public add(path: string) {
        if (path.length == 0) {
            return;
        }
        if (this.prefixes.length >= MaxIncludePaths) {
            this.diag.error("Too many include directories passed from command line");
            return;
        }
        this.prefixes.push(path.endsWith("/") ? path : path + "/");
    }

    public getPrefixes(): readonly string[] {
        return this.prefixes;
    }

    // First match wins; the path as given is tried before any include directory
    public findFile(path: string): string | undefined {
        for (const prefix of ["", ...this.prefixes]) {
            const fullPath = prefix + path;
            if (isPathValid(fullPath)) {
                this.printDep(fullPath);
                return fullPath;
            }
        }

        if (this.opts.generatedMissingIncludes) {
            this.printDep(path);
        }
        return undefined;
    }

    public printDep(path: string) {
        if (this.opts.dependTarget === undefined) {
            return;
        }
        this.depLines.push(`${this.opts.dependTarget}: ${path}`);
        if (this.opts.generatePhonyDeps) {
            this.depLines.push(`${path}:`);
        }
    }

    public getDependencyLines(): readonly string[] {
        return this.depLines;
    }
}

function isPathValid(path: string): boolean {
    const stat = statSync(path, { throwIfNoEntry: false });
    return stat !== undefined && !stat.isDirectory();
}
