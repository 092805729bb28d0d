import { Stream } from "../utils";
import { bwmRecordSizes, strideFormatSizes } from "../constants";
import { BwmFormatError } from "./bwmerror";

export type BwmStrideField = {
	//type tag, doesn't affect the size
	id: number,
	format: number,
	size: number
}

export type BwmStrideDef = {
	fields: BwmStrideField[],
	//bytes per vertex
	stride: number
}

export function strideInBytesFromFormat(format: number, fileoffset = 0) {
	if (!Number.isInteger(format) || format < 0 || format >= strideFormatSizes.length) {
		throw new BwmFormatError("UnknownStrideFormat", `stride format code ${format} is not one of 0-${strideFormatSizes.length - 1}`, fileoffset);
	}
	return strideFormatSizes[format];
}

/**
 * Parses one stride definition block: a uint32 entry count followed by (id, format) uint32 pairs.
 * Pure function of the block bytes, fileoffset only shifts the offsets reported in errors.
 */
export function parseStrideDef(block: Buffer, fileoffset = 0): BwmStrideDef {
	let str = new Stream(block, 0, fileoffset);
	let count = str.readUInt();
	if (count * 8 > str.bytesLeft()) {
		throw new BwmFormatError("UnexpectedEndOfData", `stride definition declares ${count} entries, only room for ${Math.floor(str.bytesLeft() / 8)}`, str.fileloc() - 4);
	}
	let fields: BwmStrideField[] = [];
	let stride = 0;
	for (let i = 0; i < count; i++) {
		let id = str.readUInt();
		let formatloc = str.fileloc();
		let format = str.readUInt();
		let size = strideInBytesFromFormat(format, formatloc);
		fields.push({ id, format, size });
		stride += size;
	}
	return { fields, stride };
}

export function strideInBytesFromStreamDef(block: Buffer, fileoffset = 0) {
	return parseStrideDef(block, fileoffset).stride;
}

/**
 * Reads all stride definition blocks and resolves the single vertex layout.
 * No definition at all resolves to a zero stride.
 */
export function readStrideDefs(str: Stream, count: number): BwmStrideDef {
	let blocks: { data: Buffer, offset: number }[] = [];
	for (let i = 0; i < count; i++) {
		let offset = str.fileloc();
		blocks.push({ data: str.readBuffer(bwmRecordSizes.strideDef), offset });
	}
	if (blocks.length > 1) {
		//files with multiple vertex streams exist but their interleaving isn't understood
		throw new BwmFormatError("MultipleStridesUnsupported", `file has ${blocks.length} stride definitions, only 1 is supported`, blocks[1].offset);
	}
	if (blocks.length == 0) {
		return { fields: [], stride: 0 };
	}
	return parseStrideDef(blocks[0].data, blocks[0].offset);
}
