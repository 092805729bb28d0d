import path from "path";
import fs from "fs";
import { BwmErrorCode, isBwmFormatError } from "./3d/bwmerror";

export type ScriptState = "running" | "canceled" | "error" | "done";
export type ScriptFSEntry = { name: string, kind: "file" | "directory" };
//code and offset are null when the failure was not a bwm format error
export type ScriptFailure = { code: BwmErrorCode | null, offset: number | null, message: string };

export interface ScriptOutput {
    state: ScriptState;
    failure: ScriptFailure | null;
    log(...args: unknown[]): void;
    setState(state: ScriptState): void;
    run<ARGS extends unknown[], RET>(fn: (output: ScriptOutput, ...args: ARGS) => Promise<RET>, ...args: ARGS): Promise<RET | null>;
}

export interface ScriptFS {
    writeFile(name: string, data: Buffer | string): Promise<void>;
    readFileBuffer(name: string): Promise<Buffer>;
    readDir(dir: string): Promise<ScriptFSEntry[]>;
}

export function scriptFailure(e: unknown): ScriptFailure {
    if (isBwmFormatError(e)) {
        return { code: e.code, offset: e.offset, message: e.message };
    }
    return { code: null, offset: null, message: (e instanceof Error ? e.message : String(e)) };
}

/**
 * Paths of all files below `dir`, depth first and in name order.
 */
export async function* walkScriptFS(scriptfs: ScriptFS, dir = "."): AsyncGenerator<string> {
    let entries = await scriptfs.readDir(dir);
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (let entry of entries) {
        let name = (dir == "." ? entry.name : `${dir}/${entry.name}`);
        if (entry.kind == "directory") {
            yield* walkScriptFS(scriptfs, name);
        } else {
            yield name;
        }
    }
}

export class CLIScriptFS implements ScriptFS {
    readonly root: string;
    constructor(root: string) {
        this.root = path.resolve(root);
        fs.mkdirSync(this.root, { recursive: true });
    }
    resolvePath(sub: string) {
        let target = path.resolve(this.root, sub.replace(/^\/+/, ""));
        let rel = path.relative(this.root, target);
        if (rel.startsWith("..") || path.isAbsolute(rel)) {
            throw new Error(`path ${sub} is outside of ${this.root}`);
        }
        return target;
    }
    async writeFile(name: string, data: Buffer | string) {
        let target = this.resolvePath(name);
        await fs.promises.mkdir(path.dirname(target), { recursive: true });
        await fs.promises.writeFile(target, data);
    }
    readFileBuffer(name: string) {
        return fs.promises.readFile(this.resolvePath(name));
    }
    //dotfiles, links and devices are left out
    async readDir(name: string) {
        let entries = await fs.promises.readdir(this.resolvePath(name), { withFileTypes: true });
        let res: ScriptFSEntry[] = [];
        for (let entry of entries) {
            if (entry.name.startsWith(".")) { continue; }
            if (entry.isDirectory()) {
                res.push({ name: entry.name, kind: "directory" });
            } else if (entry.isFile()) {
                res.push({ name: entry.name, kind: "file" });
            }
        }
        return res;
    }
}

/**
 * Runs script functions and keeps the error of a failed run in `failure`, the state ends up as
 * "error" in that case and as "done" otherwise.
 */
export abstract class ScriptOutputBase implements ScriptOutput {
    state: ScriptState = "running";
    failure: ScriptFailure | null = null;

    abstract log(...args: unknown[]): void;

    setState(state: ScriptState) {
        this.state = state;
    }

    async run<ARGS extends unknown[], RET>(fn: (output: ScriptOutput, ...args: ARGS) => Promise<RET>, ...args: ARGS): Promise<RET | null> {
        this.failure = null;
        this.setState("running");
        try {
            return await fn(this, ...args);
        } catch (e) {
            if (this.state != "canceled") {
                this.failure = scriptFailure(e);
                //broken files only need the message, anything else gets its stack
                this.log(this.failure.code != null ? this.failure.message : e);
                this.setState("error");
            }
            return null;
        } finally {
            if (this.state == "running") {
                this.setState("done");
            }
        }
    }
}

export class CLIScriptOutput extends ScriptOutputBase {
    log(...args: unknown[]) {
        console.log(...args);
    }
}
