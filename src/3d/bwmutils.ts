import type { BwmMaterialDefinition, BwmMaterialRef, BwmMeshDescription, BwmModel, BwmVertex } from "./bwmmodel";

export type BwmSubmesh = {
	ref: BwmMaterialRef,
	material: BwmMaterialDefinition | undefined,
	indices: Uint16Array,
	vertices: BwmVertex[]
}

/**
 * Carves the shared index and vertex buffers into the ranges each material ref of a mesh points at.
 * Ranges are clamped to the buffers, out of range materials come back as undefined.
 */
export function meshSubmeshes(model: BwmModel, mesh: BwmMeshDescription): BwmSubmesh[] {
	return mesh.materialRefs.map(ref => ({
		ref,
		material: model.materials[ref.materialDefinition],
		indices: model.indices.subarray(ref.indicesOffset, ref.indicesOffset + ref.indicesSize),
		vertices: model.vertices.slice(ref.vertexOffset, ref.vertexOffset + ref.vertexSize)
	}));
}

//refs whose ranges don't fit in the decoded buffers, the decoder keeps them as stored
export function invalidMaterialRefs(model: BwmModel) {
	let res: { mesh: number, ref: number, reason: string }[] = [];
	model.meshes.forEach((mesh, meshindex) => {
		mesh.materialRefs.forEach((ref, refindex) => {
			let reason = "";
			if (ref.materialDefinition >= model.materials.length) {
				reason = `material ${ref.materialDefinition} out of range`;
			} else if (ref.indicesOffset + ref.indicesSize > model.indices.length) {
				reason = `indices ${ref.indicesOffset}+${ref.indicesSize} out of range`;
			} else if (ref.vertexOffset + ref.vertexSize > model.vertices.length) {
				reason = `vertices ${ref.vertexOffset}+${ref.vertexSize} out of range`;
			}
			if (reason) { res.push({ mesh: meshindex, ref: refindex, reason }); }
		});
	});
	return res;
}
