import * as cmdts from "cmd-ts";
import { command, option, positional } from "cmd-ts";
import { BwmInputFile, InputDirectory, strictsizes } from "./cliparser";
import { CLIScriptFS, ScriptFS, ScriptOutput } from "./scriptrunner";
import { bwmInfo, exportBwmJson } from "./scripts/bwmjson";
import { checkBwmFiles } from "./scripts/checkfiles";


export type CliApiContext = {
	getFs(name: string): ScriptFS,
	getConsole(): ScriptOutput
}

export function cliFsOutputType(ctx: CliApiContext, fsname: string): cmdts.Type<string, ScriptFS> {
	return {
		async from(str) { return new CLIScriptFS(str); },
		defaultValue() { return ctx.getFs(fsname) },
		description: `Where to save files (${fsname})`
	};
}

export function cliApi(ctx: CliApiContext) {
	function saveArg(name: string) {
		return {
			save: option({
				long: "save",
				short: "s",
				type: cliFsOutputType(ctx, name)
			})
		} as const;
	}
	//failed runs are already logged by ScriptOutput.run
	function finish(output: ScriptOutput) {
		if (output.state == "error") { process.exitCode = 1; }
	}

	const info = command({
		name: "info",
		description: "Print a summary of a bwm file",
		args: {
			...strictsizes,
			file: positional({ type: BwmInputFile, displayName: "file" })
		},
		handler: async (args) => {
			let output = ctx.getConsole();
			await output.run(bwmInfo, args.file, { strictSizes: args.strict });
			finish(output);
		}
	});

	const json = command({
		name: "json",
		description: "Decode a bwm file and save it as json",
		args: {
			...strictsizes,
			...saveArg("extract"),
			file: positional({ type: BwmInputFile, displayName: "file" })
		},
		handler: async (args) => {
			let output = ctx.getConsole();
			await output.run(exportBwmJson, args.save, args.file, { strictSizes: args.strict });
			finish(output);
		}
	});

	const check = command({
		name: "check",
		description: "Decode all bwm files in a directory and report failures",
		args: {
			...strictsizes,
			...saveArg("extract"),
			dir: positional({ type: InputDirectory, displayName: "dir" })
		},
		handler: async (args) => {
			let output = ctx.getConsole();
			let report = await output.run(checkBwmFiles, args.save, new CLIScriptFS(args.dir), { strictSizes: args.strict });
			if (report && report.failed != 0) { output.setState("error"); }
			finish(output);
		}
	});

	let subcommands = cmdts.subcommands({
		name: "bwmtool",
		cmds: { info, json, check }
	});

	return {
		subcommands
	}
}
