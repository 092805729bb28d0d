import { describe, it, expect } from "vitest";
import { Stream } from "../src/utils";
import { parseStrideDef, readStrideDefs, strideInBytesFromFormat, strideInBytesFromStreamDef } from "../src/3d/bwmstride";
import { strideBlock } from "./bwmbuilder";

describe("stride resolution", () => {
	it("maps format codes to byte sizes", () => {
		expect([0, 1, 2, 3, 4].map(q => strideInBytesFromFormat(q))).toEqual([4, 8, 12, 4, 1]);
	});

	it("rejects unknown format codes", () => {
		expect(() => strideInBytesFromFormat(5)).toThrow(expect.objectContaining({ code: "UnknownStrideFormat" }));
		expect(() => strideInBytesFromFormat(-1)).toThrow(expect.objectContaining({ code: "UnknownStrideFormat" }));
	});

	it("sums entry sizes regardless of order", () => {
		expect(strideInBytesFromStreamDef(strideBlock([0, 1]))).toBe(12);
		expect(strideInBytesFromStreamDef(strideBlock([1, 0]))).toBe(12);
	});

	it("resolves an empty table to zero", () => {
		expect(parseStrideDef(strideBlock([]))).toEqual({ fields: [], stride: 0 });
	});

	it("returns the parsed fields", () => {
		let def = parseStrideDef(strideBlock([2, 2, 1, 4]));
		expect(def.stride).toBe(33);
		expect(def.fields).toEqual([
			{ id: 0, format: 2, size: 12 },
			{ id: 1, format: 2, size: 12 },
			{ id: 2, format: 1, size: 8 },
			{ id: 3, format: 4, size: 1 }
		]);
	});

	it("reports the file offset of a bad format code", () => {
		//count, id0, format0, id1, format1
		expect(() => parseStrideDef(strideBlock([1, 7]), 1000)).toThrow(expect.objectContaining({ code: "UnknownStrideFormat", offset: 1016 }));
	});

	it("fails when the entry count doesn't fit in the block", () => {
		expect(() => parseStrideDef(strideBlock([0], 17), 200)).toThrow(expect.objectContaining({ code: "UnexpectedEndOfData", offset: 200 }));
		//16 entries is the most a 136 byte block can hold
		expect(strideInBytesFromStreamDef(strideBlock(new Array(16).fill(3)))).toBe(64);
	});

	it("rejects more than one stride definition", () => {
		let data = Buffer.concat([Buffer.alloc(10), strideBlock([0]), strideBlock([1])]);
		let str = new Stream(data, 10);
		expect(() => readStrideDefs(str, 2)).toThrow(expect.objectContaining({ code: "MultipleStridesUnsupported", offset: 146 }));
	});

	it("resolves no definitions to a zero stride", () => {
		let str = new Stream(Buffer.alloc(0));
		expect(readStrideDefs(str, 0)).toEqual({ fields: [], stride: 0 });
	});

	it("consumes exactly one block", () => {
		let str = new Stream(Buffer.concat([strideBlock([2, 2, 1]), Buffer.alloc(4)]));
		expect(readStrideDefs(str, 1).stride).toBe(32);
		expect(str.scanloc()).toBe(136);
	});
});
