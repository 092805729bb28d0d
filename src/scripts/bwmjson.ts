import path from "path";
import prettyJson from "json-stringify-pretty-compact";
import type { ScriptFS, ScriptOutput } from "../scriptrunner";
import type { BwmModel, BwmParseOptions } from "../3d/bwmmodel";
import { loadBwmFile } from "../3d/bwmfile";
import { invalidMaterialRefs } from "../3d/bwmutils";

export function bwmModelSummary(model: BwmModel) {
	return {
		version: model.version,
		payloadSize: model.payloadSize,
		payloadSize2: model.payloadSize2,
		materials: model.materials.length,
		meshes: model.meshes.length,
		materialRefs: model.meshes.reduce((a, v) => a + v.materialRefs.length, 0),
		bones: model.boneCount,
		entities: model.entities.length,
		unknownA: model.unknownACount,
		unknownB: model.unknownBCount,
		stride: model.stride,
		vertices: model.vertices.length,
		indices: model.indices.length,
		cleavePoints: model.cleavePoints?.length ?? null,
		meshlist: model.meshes.map(q => ({ id: q.id, name: q.name, faces: q.faceCount, materialRefs: q.materialRefs.length }))
	};
}

//plain json version of the model, typed arrays become normal arrays
export function bwmModelToJson(model: BwmModel) {
	return {
		...model,
		indices: Array.from(model.indices),
		cleavePoints: model.cleavePoints ?? null
	};
}

export async function bwmInfo(output: ScriptOutput, filepath: string, opts: BwmParseOptions) {
	let model = await loadBwmFile(filepath, opts);
	let summary = bwmModelSummary(model);
	output.log(`${path.basename(filepath)}: BWM${summary.version}, payload ${summary.payloadSize} bytes`);
	output.log(`materials: ${summary.materials}, meshes: ${summary.meshes} (${summary.materialRefs} material refs), bones: ${summary.bones}, entities: ${summary.entities}`);
	output.log(`unknown blocks: ${summary.unknownA}/${summary.unknownB}, stride: ${summary.stride}, vertices: ${summary.vertices}, indices: ${summary.indices}`);
	if (summary.cleavePoints != null) {
		output.log(`cleave points: ${summary.cleavePoints}`);
	}
	for (let mesh of summary.meshlist) {
		output.log(`  mesh ${mesh.id} "${mesh.name}": ${mesh.faces} faces, ${mesh.materialRefs} material refs`);
	}
	for (let bad of invalidMaterialRefs(model)) {
		output.log(`  warning: mesh ${bad.mesh} material ref ${bad.ref}: ${bad.reason}`);
	}
	return summary;
}

export async function exportBwmJson(output: ScriptOutput, outdir: ScriptFS, filepath: string, opts: BwmParseOptions) {
	let model = await loadBwmFile(filepath, opts);
	let outname = `${path.basename(filepath, path.extname(filepath))}.json`;
	await outdir.writeFile(outname, prettyJson(bwmModelToJson(model)));
	output.log(`wrote ${outname}`);
	return outname;
}
