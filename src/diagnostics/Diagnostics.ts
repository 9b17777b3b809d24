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

import { CodeError, FatalError } from "../utils/CodeError.js";
import { WarningType } from "./WarningType.js";

export interface DiagnosticsOptions {
    disabledWarnings?: WarningType[];
    warningsAreErrors?: boolean;
}

/**
 * Collects everything reported during a pass.
 * Recoverable errors and warnings return to the caller, fatal errors throw a FatalError
 * that only the pass driver is supposed to catch.
 */
export class Diagnostics {
    private opts: DiagnosticsOptions;
    private entries: CodeError[] = [];
    private numErrors = 0;
    private locator: () => string = () => "at top level";

    public constructor(opts: DiagnosticsOptions) {
        this.opts = opts;
    }

    public setLocator(locator: () => string) {
        this.locator = locator;
    }

    public error(msg: string) {
        this.entries.push(new CodeError(msg, "error", this.locator()));
        this.numErrors++;
    }

    public warning(type: WarningType, msg: string) {
        if (this.opts.disabledWarnings?.includes(type)) {
            return;
        }

        if (this.opts.warningsAreErrors) {
            this.entries.push(new CodeError(msg, "error", this.locator(), type));
            this.numErrors++;
        } else {
            this.entries.push(new CodeError(msg, "warning", this.locator(), type));
        }
    }

    public fatal(msg: string): never {
        const err = new FatalError(msg, this.locator());
        this.entries.push(err);
        this.numErrors++;
        throw err;
    }

    public get errorCount(): number {
        return this.numErrors;
    }

    public getDiagnostics(): readonly CodeError[] {
        return this.entries;
    }

    public getErrors(): readonly CodeError[] {
        return this.entries.filter(e => e.severity != "warning");
    }

    public getWarnings(): readonly CodeError[] {
        return this.entries.filter(e => e.severity == "warning");
    }
}
