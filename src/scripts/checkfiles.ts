import prettyJson from "json-stringify-pretty-compact";
import type { ScriptFS, ScriptOutput } from "../scriptrunner";
import { walkScriptFS } from "../scriptrunner";
import { BwmErrorCode, isBwmFormatError } from "../3d/bwmerror";
import { BwmParseOptions, parseBwmModel } from "../3d/bwmmodel";
import { isBwmContent } from "../3d/bwmfile";

export type CheckResult = {
	file: string,
	ok: boolean,
	version?: number,
	error?: { code: BwmErrorCode, offset: number, message: string }
}

export type CheckReport = {
	checked: number,
	passed: number,
	failed: number,
	skipped: number,
	errorcounts: Partial<Record<BwmErrorCode, number>>,
	files: CheckResult[]
}

/**
 * Decodes every bwm file in a directory tree and reports which ones fail and where.
 * Files that don't start with the bwm magic are skipped.
 */
export async function checkBwmFiles(output: ScriptOutput, outdir: ScriptFS | null, indir: ScriptFS, opts: BwmParseOptions) {
	let report: CheckReport = { checked: 0, passed: 0, failed: 0, skipped: 0, errorcounts: {}, files: [] };
	for await (let file of walkScriptFS(indir)) {
		let data = await indir.readFileBuffer(file);
		if (!isBwmContent(data)) {
			report.skipped++;
			continue;
		}
		report.checked++;
		try {
			let model = parseBwmModel(data, opts);
			report.passed++;
			report.files.push({ file, ok: true, version: model.version });
			output.log(`pass ${file}`);
		} catch (e) {
			//anything other than a format error is a bug, not a broken file
			if (!isBwmFormatError(e)) { throw e; }
			report.failed++;
			report.errorcounts[e.code] = (report.errorcounts[e.code] ?? 0) + 1;
			report.files.push({ file, ok: false, error: { code: e.code, offset: e.offset, message: e.message } });
			output.log(`fail ${file}: ${e.message}`);
		}
	}
	output.log(`checked ${report.checked} files, ${report.passed} passed, ${report.failed} failed, ${report.skipped} skipped`);
	if (outdir) {
		await outdir.writeFile("check-report.json", prettyJson(report));
	}
	return report;
}
