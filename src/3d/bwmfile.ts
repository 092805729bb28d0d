import fs from "fs";
import { bwmMagicString, bwmRecordSizes } from "../constants";
import { BwmParseOptions, parseBwmModel } from "./bwmmodel";

/**
 * Check if a buffer starts with the BWM magic string without decoding anything else.
 */
export function isBwmContent(data: Uint8Array) {
	if (data.length < bwmRecordSizes.magic) { return false; }
	let magic = Buffer.from(data.buffer, data.byteOffset, bwmRecordSizes.magic);
	return magic.toString("latin1") == bwmMagicString;
}

export async function loadBwmFile(filepath: string, opts?: BwmParseOptions) {
	let data = await fs.promises.readFile(filepath);
	return parseBwmModel(data, opts);
}

/**
 * Drains an already opened binary stream (fs.ReadStream, socket, etc) and decodes the result.
 * The stream should not have an encoding set.
 */
export async function readBwmStream(stream: AsyncIterable<Uint8Array | string>, opts?: BwmParseOptions) {
	let chunks: Uint8Array[] = [];
	for await (let chunk of stream) {
		if (typeof chunk == "string") {
			throw new Error("bwm stream yielded text, the stream should be read in binary mode");
		}
		chunks.push(chunk);
	}
	return parseBwmModel(Buffer.concat(chunks), opts);
}
