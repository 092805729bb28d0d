export const bwmMagicString = "LiOnHeAdMODEL";
export const bwmMagicNumber = 0x2B00B1E5;
export const bwmVersions = [5, 6] as const;

//bytes up to and including the payload size field, the payload size counts everything after it
export const bwmPayloadStart = 44;

//byte widths of everything that is read as a fixed block
export const bwmRecordSizes = {
	magic: 13,
	headerReserved1: 27,
	headerReserved2: 68,
	headerReserved3: 20,
	header: 184,

	material: 7 * 64,
	meshDescription: 220,
	meshDescriptionReserved: 124,
	materialRef: 8 * 4,
	bone: 48,
	entity: 4 * 12 + 256,
	unknownBlockA: 12,
	unknownBlockB: 12,
	strideDef: 136,

	//position, normal, u, v
	vertexDecoded: 32,
	index: 2,
	point: 12
};

export const bwmTextSizes = {
	material: 64,
	meshName: 64,
	entityName: 256
};

//bytes per stride field, indexed by format code
export const strideFormatSizes: readonly number[] = [4, 8, 12, 4, 1];
