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

import { WarningType } from "../diagnostics/WarningType.js";

export type Severity = "warning" | "error" | "fatal";

export class CodeError extends Error {
    public severity: Severity;
    public where: string;
    public warning?: WarningType;

    public constructor(msg: string, severity: Severity, where: string, warning?: WarningType) {
        super(msg);
        this.name = CodeError.name;

        this.severity = severity;
        this.where = where;
        this.warning = warning;
    }
}

// Aborts the current pass; whatever was recorded before stays valid
export class FatalError extends CodeError {
    public constructor(msg: string, where: string) {
        super(msg, "fatal", where);
        this.name = FatalError.name;
    }
}

export function formatCodeError(error: CodeError) {
    const tag = error.warning !== undefined ? `${error.severity}: [-W${error.warning}]` : `${error.severity}:`;
    return `${tag} ${error.where}:\n    ${error.message}`;
}
