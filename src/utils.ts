import { BwmFormatError } from "./3d/bwmerror";

/**
 * Forward-only little endian cursor over a buffer.
 * Every read is bounds checked and throws UnexpectedEndOfData instead of returning garbage.
 */
export class Stream {
	private data: Buffer;
	private scan: number;
	//added to positions in error messages when the buffer is a slice of a larger file
	private origin: number;

	constructor(data: Buffer, scan = 0, origin = 0) {
		this.data = data;
		this.scan = scan;
		this.origin = origin;
	}

	getData() {
		return this.data;
	}
	bytesLeft() {
		return this.data.length - this.scan;
	}
	scanloc() {
		return this.scan;
	}
	fileloc() {
		return this.origin + this.scan;
	}
	eof() {
		return this.scan >= this.data.length;
	}
	tee() {
		return new Stream(this.data, this.scan, this.origin);
	}

	private need(len: number) {
		if (len > this.bytesLeft()) {
			throw new BwmFormatError("UnexpectedEndOfData", `reading past end of buffer, needed ${len} bytes but ${this.bytesLeft()} are left`, this.fileloc());
		}
	}

	skip(n: number) {
		this.need(n);
		this.scan += n;
		return this;
	}

	readBuffer(len = this.data.length - this.scan) {
		this.need(len);
		let res = this.data.subarray(this.scan, this.scan + len);
		this.scan += len;
		return res;
	}

	readUByte() {
		this.need(1);
		return this.data[this.scan++];
	}

	readUShort() {
		this.need(2);
		let val = this.data.readUInt16LE(this.scan);
		this.scan += 2;
		return val;
	}

	readUInt() {
		this.need(4);
		let val = this.data.readUInt32LE(this.scan);
		this.scan += 4;
		return val;
	}

	readFloat() {
		this.need(4);
		let val = this.data.readFloatLE(this.scan);
		this.scan += 4;
		return val;
	}

	/**
	 * Reads a null padded text field of exactly len bytes. Only trailing nulls are stripped,
	 * anything stored after an embedded null is kept.
	 */
	readFixedString(len: number) {
		let bytes = this.readBuffer(len);
		let end = bytes.length;
		while (end > 0 && bytes[end - 1] == 0) { end--; }
		return bytes.toString("latin1", 0, end);
	}
}
