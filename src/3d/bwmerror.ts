export type BwmErrorCode =
	| "BadMagic"
	| "BadHeader"
	| "UnsupportedVersion"
	| "UnexpectedEndOfData"
	| "UnknownStrideFormat"
	| "MultipleStridesUnsupported"
	| "StrideTooSmall"
	//only raised with strictSizes
	| "SizeMismatch";

/**
 * Thrown for any file that can't be decoded, the decode is aborted and no partial model is returned.
 * offset is the absolute byte position in the file where the problem was detected
 */
export class BwmFormatError extends Error {
	code: BwmErrorCode;
	offset: number;

	constructor(code: BwmErrorCode, message: string, offset: number) {
		super(`${code} at 0x${offset.toString(16)}: ${message}`);
		this.name = "BwmFormatError";
		this.code = code;
		this.offset = offset;
	}
}

export function isBwmFormatError(e: unknown): e is BwmFormatError {
	return e instanceof BwmFormatError;
}
