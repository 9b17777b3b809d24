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
import { WarningType } from "../diagnostics/WarningType.js";
import { LexerService, MacroArgs, SubstitutionSource } from "../lexer/LexerService.js";
import { LexerState } from "../lexer/LexerState.js";
import { FileStackService, SymbolService } from "../assembler/Services.js";
import { SymbolType, isVar } from "../assembler/SymbolData.js";
import { toInt32 } from "../utils/Strings.js";
import { FileStackArena } from "./FileStackArena.js";
import { FileStackNode, NodeType, ReptNode, isNamedNode, reptSuffix } from "./FileStackNode.js";
import { DependencyOptions, IncludePaths } from "./IncludePaths.js";

export const DefaultMaxRecursionDepth = 64;

export interface ContextStackOptions extends DependencyOptions {
    includePaths?: string[];
    preIncludeFile?: string;
    maxRecursionDepth?: number;
    verbose?: boolean;
}

export interface ContextServices {
    lexer: LexerService;
    symbols: SymbolService;
    diag: Diagnostics;
}

interface Context {
    fileInfo: FileStackNode;
    lexerState: LexerState;

    // value of \@ while this context is active
    uniqueId?: number;

    // arguments in effect while this context is active
    macroArgs?: MacroArgs;

    // REPT and FOR only
    nbReptIters: number;
    forValue: number;
    forStep: number;
    forName?: string;
}

/**
 * The stack of active files, macro expansions and REPT/FOR blocks.
 */
export class ContextStack implements FileStackService, SubstitutionSource {
    private lexer: LexerService;
    private symbols: SymbolService;
    private diag: Diagnostics;
    private opts: ContextStackOptions;

    private arena = new FileStackArena();
    private stack: Context[] = [];
    private maxRecursionDepth_: number;
    private maxUniqueId = 0;
    private preIncludeName?: string;
    private failedOnMissingInclude_ = false;

    public readonly includePaths: IncludePaths;

    public constructor(services: ContextServices, opts: ContextStackOptions) {
        this.lexer = services.lexer;
        this.symbols = services.symbols;
        this.diag = services.diag;
        this.opts = opts;
        this.maxRecursionDepth_ = opts.maxRecursionDepth ?? DefaultMaxRecursionDepth;

        this.includePaths = new IncludePaths(this.diag, opts);
        for (const path of opts.includePaths ?? []) {
            this.includePaths.add(path);
        }
        if (opts.preIncludeFile !== undefined) {
            this.setPreIncludeFile(opts.preIncludeFile);
        }
    }

    public init(mainPath: string) {
        const state = this.lexer.openFile(mainPath);
        if (!state) {
            this.diag.fatal("Failed to open main file");
        }
        this.lexer.setState(state);

        const fileInfo = this.arena.newFile({
            type: NodeType.File,
            name: mainPath,
            parent: undefined,
            lineNo: 0,
        });

        this.stack = [{
            fileInfo: fileInfo,
            lexerState: state,
            uniqueId: undefined,
            macroArgs: undefined,
            nbReptIters: 0,
            forValue: 0,
            forStep: 0,
        }];

        this.runPreIncludeFile();
    }

    public setPreIncludeFile(path: string) {
        if (this.preIncludeName !== undefined) {
            this.diag.warning(WarningType.User, `Overriding pre-included filename ${this.preIncludeName}`);
        }
        this.preIncludeName = path;
        if (this.opts.verbose) {
            console.log(`Pre-included filename ${path}`);
        }
    }

    // number of contexts above the top-level file
    public get depth(): number {
        return Math.max(this.stack.length - 1, 0);
    }

    public get maxRecursionDepth(): number {
        return this.maxRecursionDepth_;
    }

    public setRecursionDepth(newDepth: number) {
        if (this.depth > newDepth) {
            this.diag.fatal(`Recursion limit (${newDepth}) exceeded`);
        }
        this.maxRecursionDepth_ = newDepth;
    }

    public get failedOnMissingInclude(): boolean {
        return this.failedOnMissingInclude_;
    }

    public get liveNodeCount(): number {
        return this.arena.liveCount;
    }

    public getFileStack(): FileStackNode | undefined {
        const top = this.stack.at(-1);
        if (!top) {
            return undefined;
        }
        this.arena.markReferenced(top.fileInfo);
        return top.fileInfo;
    }

    // Like getFileStack, but leaves the node unreferenced
    public peekFileStack(): FileStackNode | undefined {
        return this.stack.at(-1)?.fileInfo;
    }

    public getParentNode(node: FileStackNode): FileStackNode | undefined {
        return this.arena.getParent(node);
    }

    public getFileName(): string {
        // walking the nodes skips nested REPTs
        let node: FileStackNode | undefined = this.top().fileInfo;
        while (node && node.type != NodeType.File) {
            node = this.arena.getParent(node);
        }
        if (!node || node.type != NodeType.File) {
            throw Error("Internal error: context without a file");
        }
        return node.name;
    }

    public getUniqueId(): number | undefined {
        return this.stack.at(-1)?.uniqueId;
    }

    public getMacroArgs(): MacroArgs | undefined {
        return this.stack.at(-1)?.macroArgs;
    }

    public findFile(path: string): string | undefined {
        return this.includePaths.findFile(path);
    }

    public fileError(path: string, functionName: string): boolean {
        if (!this.opts.generatedMissingIncludes) {
            this.diag.error(`Error opening ${functionName} file '${path}': No such file or directory`);
            return false;
        }

        this.failedOnMissingInclude_ = true;
        if (this.opts.verbose) {
            console.log(`Aborting (-MG) on ${functionName} file '${path}' (No such file or directory)`);
        }
        return true;
    }

    public dump(node: FileStackNode, lineNo: number): string {
        return `${this.dumpNodeAndParents(node).chain}(${lineNo})`;
    }

    public dumpCurrent(): string {
        const top = this.stack.at(-1);
        if (!top) {
            return "at top level";
        }
        return this.dump(top.fileInfo, this.lexer.getLineNo());
    }

    public runInclude(path: string) {
        const fullPath = this.findFile(path);
        if (fullPath === undefined) {
            if (this.opts.generatedMissingIncludes) {
                if (this.opts.verbose) {
                    console.log(`Aborting (-MG) on INCLUDE file '${path}' (No such file or directory)`);
                }
                this.failedOnMissingInclude_ = true;
            } else {
                this.diag.error(`Unable to open included file '${path}': No such file or directory`);
            }
            return;
        }

        const parent = this.top();
        this.reserveDepth();
        const fileInfo = this.arena.newFile({
            type: NodeType.File,
            name: fullPath,
            parent: parent.fileInfo.id,
            lineNo: this.lexer.getLineNo(),
        });
        const state = this.lexer.openFile(fullPath);
        if (!state) {
            this.diag.fatal("Failed to set up lexer for file include");
        }

        // the unique id is kept since INCLUDE may be inside a macro or REPT/FOR
        this.pushContext(fileInfo, state, parent.uniqueId, parent.macroArgs);
        this.lexer.setStateAtEOL(state);
    }

    public runMacro(macroName: string, args: MacroArgs) {
        const macro = this.symbols.findExactSymbol(macroName);
        if (!macro) {
            this.diag.error(`Macro "${macroName}" not defined`);
            return;
        }
        if (macro.type != SymbolType.Macro) {
            this.diag.error(`"${macroName}" is not a macro`);
            return;
        }

        // <file or macro it was defined in>::REPT~n...::<macro>
        let node: FileStackNode | undefined = macro.src;
        let reptPart = "";
        if (node.type == NodeType.Rept) {
            reptPart = reptSuffix(node.iters);
            while (node && node.type == NodeType.Rept) {
                node = this.arena.getParent(node);
            }
        }
        if (!node || !isNamedNode(node)) {
            throw Error("Internal error: REPT node without a named parent");
        }

        const parent = this.top();
        this.reserveDepth();
        const fileInfo = this.arena.newMacro({
            type: NodeType.Macro,
            name: `${node.name}${reptPart}::${macro.name}`,
            parent: parent.fileInfo.id,
            lineNo: this.lexer.getLineNo(),
        });
        const state = this.lexer.openView("MACRO", macro.body, macro.fileLine);

        this.pushContext(fileInfo, state, this.useNewUniqueId(), args);
        this.lexer.setStateAtEOL(state);
    }

    public runRept(count: number, reptLineNo: number, body: string) {
        if (count == 0) {
            return;
        }
        const ctx = this.newReptContext(reptLineNo, body);
        ctx.nbReptIters = count;
        ctx.forName = undefined;
    }

    public runFor(symName: string, start: number, stop: number, step: number, reptLineNo: number, body: string) {
        const sym = this.symbols.addVar(symName, start);
        if (!isVar(sym)) {
            return;
        }

        let count = 0;
        if (step > 0 && start < stop) {
            count = Math.floor((stop - start - 1) / step) + 1;
        } else if (step < 0 && stop < start) {
            count = Math.floor((start - stop - 1) / -step) + 1;
        } else if (step == 0) {
            this.diag.error("FOR cannot have a step value of 0");
        }

        if ((step > 0 && start > stop) || (step < 0 && start < stop)) {
            this.diag.warning(WarningType.BackwardsFor, `FOR goes backwards from ${start} to ${stop} by ${step}`);
        }

        if (count == 0) {
            return;
        }
        const ctx = this.newReptContext(reptLineNo, body);
        ctx.nbReptIters = count;
        ctx.forValue = start;
        ctx.forStep = step;
        ctx.forName = symName;
    }

    // Prevents further iterations of the innermost REPT/FOR
    public stopRept() {
        this.top().nbReptIters = 0;
    }

    public break(): boolean {
        if (this.top().fileInfo.type != NodeType.Rept) {
            this.diag.error("BREAK can only be used inside a REPT/FOR block");
            return false;
        }
        this.stopRept();
        return true;
    }

    /**
     * Called when the current source view is exhausted.
     * Loops REPT/FOR blocks, pops everything else.
     * @returns true if the top-level file ended, i.e. the pass is done
     */
    public endOfBody(): boolean {
        const ifDepth = this.lexer.getIfDepth();
        if (ifDepth != 0) {
            this.diag.fatal(`Ended block with ${ifDepth} unterminated IF construct${ifDepth == 1 ? "" : "s"}`);
        }

        const ctx = this.top();
        if (ctx.fileInfo.type == NodeType.Rept) {
            let fileInfo: ReptNode = ctx.fileInfo;

            // a referenced node may not change anymore, continue on a copy
            if (fileInfo.referenced) {
                fileInfo = this.arena.duplicateRept(fileInfo);
                ctx.fileInfo = fileInfo;
            }

            if (ctx.forName !== undefined && fileInfo.iters[0] <= ctx.nbReptIters) {
                ctx.forValue = toInt32(ctx.forValue + ctx.forStep);
                const sym = this.symbols.addVar(ctx.forName, ctx.forValue);
                if (!isVar(sym)) {
                    this.diag.fatal("Failed to update FOR symbol value");
                }
            }

            fileInfo.iters[0]++;
            if (fileInfo.iters[0] <= ctx.nbReptIters) {
                this.lexer.restartRept(fileInfo.lineNo);
                ctx.uniqueId = this.useNewUniqueId();
                return false;
            }
        } else if (this.stack.length == 1) {
            return true;
        }

        const popped = this.stack.pop();
        if (!popped) {
            throw Error("Internal error: context stack underflow");
        }
        this.arena.release(popped.fileInfo);
        this.lexer.setState(this.top().lexerState);
        return false;
    }

    private runPreIncludeFile() {
        if (this.preIncludeName === undefined) {
            return;
        }

        const fullPath = this.findFile(this.preIncludeName);
        if (fullPath === undefined) {
            this.diag.error(`Unable to open included file '${this.preIncludeName}': No such file or directory`);
            return;
        }

        const parent = this.top();
        this.reserveDepth();
        const fileInfo = this.arena.newFile({
            type: NodeType.File,
            name: fullPath,
            parent: parent.fileInfo.id,
            lineNo: this.lexer.getLineNo(),
        });
        const state = this.lexer.openFile(fullPath);
        if (!state) {
            this.diag.fatal("Failed to set up lexer for file include");
        }

        // unlike INCLUDE, this starts from scratch
        this.pushContext(fileInfo, state, undefined, undefined);
        this.lexer.setState(state);
    }

    private newReptContext(reptLineNo: number, body: string): Context {
        const parent = this.top();
        const parentIters = parent.fileInfo.type == NodeType.Rept ? parent.fileInfo.iters : [];

        this.reserveDepth();
        const fileInfo = this.arena.newRept({
            type: NodeType.Rept,
            parent: parent.fileInfo.id,
            lineNo: reptLineNo,
            iters: [1, ...parentIters],
        });
        const state = this.lexer.openView("REPT", body, reptLineNo);

        const ctx = this.pushContext(fileInfo, state, this.useNewUniqueId(), parent.macroArgs);
        this.lexer.setStateAtEOL(state);
        return ctx;
    }

    // Only checks whether the ceiling is exceeded, must run before the context is pushed
    private reserveDepth() {
        if (this.depth + 1 > this.maxRecursionDepth_) {
            this.diag.fatal(`Recursion limit (${this.maxRecursionDepth_}) exceeded`);
        }
    }

    private pushContext(fileInfo: FileStackNode, state: LexerState, uniqueId: number | undefined, macroArgs: MacroArgs | undefined): Context {
        const ctx: Context = {
            fileInfo,
            lexerState: state,
            uniqueId,
            macroArgs,
            nbReptIters: 0,
            forValue: 0,
            forStep: 0,
        };
        this.stack.push(ctx);
        return ctx;
    }

    private useNewUniqueId(): number {
        return ++this.maxUniqueId;
    }

    private top(): Context {
        const top = this.stack.at(-1);
        if (!top) {
            throw Error("Internal error: no active context");
        }
        return top;
    }

    private dumpNodeAndParents(node: FileStackNode): { chain: string, name: string } {
        const parent = this.arena.getParent(node);

        if (!isNamedNode(node)) {
            if (!parent) {
                throw Error("Internal error: REPT node without a parent");
            }
            const { chain, name } = this.dumpNodeAndParents(parent);
            return { chain: `${chain}(${node.lineNo}) -> ${name}${reptSuffix(node.iters)}`, name };
        }

        if (!parent) {
            return { chain: node.name, name: node.name };
        }
        const { chain } = this.dumpNodeAndParents(parent);
        return { chain: `${chain}(${node.lineNo}) -> ${node.name}`, name: node.name };
    }
}
