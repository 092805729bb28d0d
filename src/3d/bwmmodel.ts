import { Stream } from "../utils";
import { bwmMagicNumber, bwmMagicString, bwmPayloadStart, bwmRecordSizes, bwmTextSizes, bwmVersions } from "../constants";
import { BwmFormatError } from "./bwmerror";
import { BwmStrideField, readStrideDefs } from "./bwmstride";

export type BwmVersion = typeof bwmVersions[number];

export type BwmPoint = { x: number, y: number, z: number };

export type BwmParseOptions = {
	//check the payload size field against the buffer and fail on bytes left over after decoding
	strictSizes?: boolean
}

export type BwmHeader = {
	version: BwmVersion,
	payloadSize: number,
	payloadSize2: number,
	materialCount: number,
	meshCount: number,
	boneCount: number,
	entityCount: number,
	unknownACount: number,
	unknownBCount: number,
	vertexCount: number,
	strideCount: number,
	indexCount: number
}

export type BwmMaterialDefinition = {
	diffuseMap: string,
	lightMap: string,
	unknown3: string,
	specularMap: string,
	unknown5: string,
	normalMap: string,
	type: string
}

export type BwmMaterialRef = {
	//index into BwmModel.materials
	materialDefinition: number,
	indicesOffset: number,
	indicesSize: number,
	vertexOffset: number,
	vertexSize: number,
	facesOffset: number,
	facesSize: number,
	unknown: number
}

export type BwmMeshDescription = {
	id: number,
	name: string,
	faceCount: number,
	indicesOffset: number,
	readonly materialRefs: readonly BwmMaterialRef[]
}

export type BwmEntity = {
	name: string,
	position: BwmPoint,
	unknown1: BwmPoint,
	unknown2: BwmPoint,
	unknown3: BwmPoint
}

export type BwmVertex = {
	position: BwmPoint,
	normal: BwmPoint,
	u: number,
	v: number
}

export type BwmModel = {
	readonly version: BwmVersion,
	readonly payloadSize: number,
	readonly payloadSize2: number,
	readonly materials: readonly BwmMaterialDefinition[],
	readonly meshes: readonly BwmMeshDescription[],
	//bone records are skipped, their layout is unknown
	readonly boneCount: number,
	readonly entities: readonly BwmEntity[],
	readonly unknownACount: number,
	readonly unknownBCount: number,
	readonly strideFields: readonly BwmStrideField[],
	readonly stride: number,
	readonly vertices: readonly BwmVertex[],
	readonly indices: Uint16Array,
	//only present in version 6
	readonly cleavePoints: readonly BwmPoint[] | undefined
}

function isBwmVersion(version: number): version is BwmVersion {
	return bwmVersions.some(q => q == version);
}

export function readPoint(str: Stream): BwmPoint {
	let x = str.readFloat();
	let y = str.readFloat();
	let z = str.readFloat();
	return { x, y, z };
}

function readArray<T>(count: number, reader: () => T) {
	let res: T[] = [];
	for (let i = 0; i < count; i++) {
		res.push(reader());
	}
	return res;
}

export function readBwmHeader(str: Stream): BwmHeader {
	let magicloc = str.fileloc();
	let magic = str.readBuffer(bwmRecordSizes.magic);
	if (!magic.equals(Buffer.from(bwmMagicString, "latin1"))) {
		throw new BwmFormatError("BadMagic", `expected "${bwmMagicString}", got ${JSON.stringify(magic.toString("latin1"))}`, magicloc);
	}
	str.skip(bwmRecordSizes.headerReserved1);

	//should equal file length - 44, not checked unless strictSizes is set
	let payloadSize = str.readUInt();

	let magicnumberloc = str.fileloc();
	let magicnumber = str.readUInt();
	if (magicnumber != bwmMagicNumber) {
		throw new BwmFormatError("BadHeader", `magic number 0x${magicnumber.toString(16)} does not match 0x${bwmMagicNumber.toString(16)}`, magicnumberloc);
	}

	let versionloc = str.fileloc();
	let version = str.readUInt();
	if (!isBwmVersion(version)) {
		throw new BwmFormatError("UnsupportedVersion", `file format version ${version} is not supported, expected ${bwmVersions.join(" or ")}`, versionloc);
	}
	let payloadSize2 = str.readUInt();
	str.skip(bwmRecordSizes.headerReserved2);

	let materialCount = str.readUInt();
	let meshCount = str.readUInt();
	let boneCount = str.readUInt();
	let entityCount = str.readUInt();
	let unknownACount = str.readUInt();
	let unknownBCount = str.readUInt();
	str.skip(bwmRecordSizes.headerReserved3);
	let vertexCount = str.readUInt();
	let strideCount = str.readUInt();
	str.readUInt();//always 2?
	let indexCount = str.readUInt();

	return {
		version, payloadSize, payloadSize2,
		materialCount, meshCount, boneCount, entityCount, unknownACount, unknownBCount,
		vertexCount, strideCount, indexCount
	};
}

function readMaterialDefinition(str: Stream): BwmMaterialDefinition {
	let len = bwmTextSizes.material;
	return {
		diffuseMap: str.readFixedString(len),
		lightMap: str.readFixedString(len),
		unknown3: str.readFixedString(len),
		specularMap: str.readFixedString(len),
		unknown5: str.readFixedString(len),
		normalMap: str.readFixedString(len),
		type: str.readFixedString(len)
	};
}

//the material refs themselves follow after all descriptions, only their count is known here
function readMeshDescription(str: Stream) {
	let faceCount = str.readUInt();
	let indicesOffset = str.readUInt();
	str.skip(bwmRecordSizes.meshDescriptionReserved);
	str.readUInt();
	let materialRefCount = str.readUInt();
	str.readUInt();
	let id = str.readUInt();
	let name = str.readFixedString(bwmTextSizes.meshName);
	str.readUInt();
	str.readUInt();
	return { id, name, faceCount, indicesOffset, materialRefCount };
}

function readMaterialRef(str: Stream): BwmMaterialRef {
	return {
		materialDefinition: str.readUInt(),
		indicesOffset: str.readUInt(),
		indicesSize: str.readUInt(),
		vertexOffset: str.readUInt(),
		vertexSize: str.readUInt(),
		facesOffset: str.readUInt(),
		facesSize: str.readUInt(),
		unknown: str.readUInt()
	};
}

function readEntity(str: Stream): BwmEntity {
	let unknown1 = readPoint(str);
	let unknown2 = readPoint(str);
	let unknown3 = readPoint(str);
	let position = readPoint(str);
	let name = str.readFixedString(bwmTextSizes.entityName);
	return { name, position, unknown1, unknown2, unknown3 };
}

function readVertices(str: Stream, count: number, stride: number) {
	if (count == 0) { return []; }
	if (stride < bwmRecordSizes.vertexDecoded) {
		//also covers files without a stride definition, those are rejected rather than read as zeroed vertices
		throw new BwmFormatError("StrideTooSmall", `vertex stride of ${stride} bytes can't hold position, normal and uv (${bwmRecordSizes.vertexDecoded} bytes)`, str.fileloc());
	}
	let padding = stride - bwmRecordSizes.vertexDecoded;
	return readArray<BwmVertex>(count, () => {
		let position = readPoint(str);
		let normal = readPoint(str);
		let u = str.readFloat();
		let v = str.readFloat();
		str.skip(padding);
		return { position, normal, u, v };
	});
}

function readIndices(str: Stream, count: number) {
	let bytes = str.readBuffer(count * bwmRecordSizes.index);
	let indices = new Uint16Array(count);
	for (let i = 0; i < count; i++) {
		indices[i] = bytes.readUInt16LE(i * bwmRecordSizes.index);
	}
	return indices;
}

export function parseBwmModel(data: Buffer, opts: BwmParseOptions = {}): BwmModel {
	let str = new Stream(data);
	let header = readBwmHeader(str);

	if (opts.strictSizes && header.payloadSize != data.length - bwmPayloadStart) {
		throw new BwmFormatError("SizeMismatch", `header declares ${header.payloadSize} payload bytes, file has ${data.length - bwmPayloadStart}`, bwmPayloadStart - 4);
	}

	let materials = readArray(header.materialCount, () => readMaterialDefinition(str));
	let meshheads = readArray(header.meshCount, () => readMeshDescription(str));
	let meshes = meshheads.map<BwmMeshDescription>(head => ({
		id: head.id,
		name: head.name,
		faceCount: head.faceCount,
		indicesOffset: head.indicesOffset,
		materialRefs: readArray(head.materialRefCount, () => readMaterialRef(str))
	}));
	str.skip(header.boneCount * bwmRecordSizes.bone);
	let entities = readArray(header.entityCount, () => readEntity(str));
	str.skip(header.unknownACount * bwmRecordSizes.unknownBlockA);
	str.skip(header.unknownBCount * bwmRecordSizes.unknownBlockB);

	let stridedef = readStrideDefs(str, header.strideCount);
	let vertices = readVertices(str, header.vertexCount, stridedef.stride);
	let indices = readIndices(str, header.indexCount);

	let cleavePoints: BwmPoint[] | undefined = undefined;
	if (header.version == 6) {
		let cleavecount = str.readUInt();
		cleavePoints = readArray(cleavecount, () => readPoint(str));
	}

	if (opts.strictSizes && !str.eof()) {
		throw new BwmFormatError("SizeMismatch", `bytes left over after decoding file: ${str.bytesLeft()}`, str.fileloc());
	}

	return {
		version: header.version,
		payloadSize: header.payloadSize,
		payloadSize2: header.payloadSize2,
		materials,
		meshes,
		boneCount: header.boneCount,
		entities,
		unknownACount: header.unknownACount,
		unknownBCount: header.unknownBCount,
		strideFields: stridedef.fields,
		stride: stridedef.stride,
		vertices,
		indices,
		cleavePoints
	};
}
