import type { ScriptFS, ScriptFSEntry } from "../src/scriptrunner";
import { ScriptOutputBase } from "../src/scriptrunner";

export class MemoryScriptFS implements ScriptFS {
	files = new Map<string, Buffer | string>();

	async writeFile(name: string, data: Buffer | string) {
		this.files.set(name, data);
	}
	async readFileBuffer(name: string) {
		let file = this.files.get(name);
		if (file == undefined) { throw new Error(`file ${name} not found`); }
		return (typeof file == "string" ? Buffer.from(file) : file);
	}
	async readDir(dir: string) {
		let prefix = (dir == "." ? "" : `${dir}/`);
		let entries = new Map<string, ScriptFSEntry>();
		for (let name of this.files.keys()) {
			if (!name.startsWith(prefix)) { continue; }
			let parts = name.slice(prefix.length).split("/");
			entries.set(parts[0], { name: parts[0], kind: (parts.length > 1 ? "directory" : "file") });
		}
		return [...entries.values()];
	}
}

export class MemoryScriptOutput extends ScriptOutputBase {
	lines: string[] = [];
	log(...args: unknown[]) {
		this.lines.push(args.map(q => (q instanceof Error ? q.message : String(q))).join(" "));
	}
}
