import * as cmdts from "cmd-ts";
import fs from "fs";
import path from "path";

export const BwmInputFile: cmdts.Type<string, string> = {
	async from(str) {
		let filepath = path.resolve(str);
		let stat = await fs.promises.stat(filepath).catch(() => null);
		if (!stat || !stat.isFile()) { throw new Error(`file ${str} does not exist`); }
		return filepath;
	},
	displayName: "file",
	description: "Path to a .bwm model file"
};

export const InputDirectory: cmdts.Type<string, string> = {
	async from(str) {
		let dirpath = path.resolve(str);
		let stat = await fs.promises.stat(dirpath).catch(() => null);
		if (!stat || !stat.isDirectory()) { throw new Error(`directory ${str} does not exist`); }
		return dirpath;
	},
	displayName: "dir",
	description: "Directory to search for .bwm files, including subdirectories"
};

export const strictsizes = {
	strict: cmdts.flag({ long: "strict", short: "t", description: "fail when the header payload size doesn't match the file or bytes are left over" })
};

export function cliArguments(argv?: string[]) {
	//skip the node executable and the script path
	let args = (argv ?? process.argv).slice();
	for (let skip = 2; skip > 0 && args.length > 0; args.shift()) {
		if (!args[0].startsWith("-")) { skip--; }
	}
	return args;
}
