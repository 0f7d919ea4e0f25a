export type {
	SnbtContext,
	TagBehavior,
	TagContext,
	TagTypeRegistry,
} from "./behavior.ts";
export { enterContainer } from "./behavior.ts";
export {
	COMPRESSIONS,
	compress,
	decompress,
	detectCompression,
	parseCompression,
} from "./compression.ts";
export type { NbtErrorKind, NbtErrorLocation } from "./errors.ts";
export { NbtError, isNbtError } from "./errors.ts";
export type { Nbt, NbtOptions, NbtOptionsInput } from "./nbt.ts";
export {
	createNbt,
	fromJson,
	parseSnbt,
	parseSnbtValue,
	readNbt,
	resolveOptions,
	toJson,
	toSnbt,
	writeNbt,
} from "./nbt.ts";
export {
	need,
	readArrayCount,
	readFixedArray,
	readFloat32,
	readFloat64,
	readInt8,
	readInt16,
	readInt32,
	readInt64,
	readString,
	readTypeId,
} from "./read.ts";
export { createTagTypeRegistry } from "./registry.ts";
export { layoutSequence, quoteSnbtString, renderSnbt } from "./snbt.ts";
export {
	assertHomogeneous,
	compoundDelete,
	compoundGet,
	compoundSet,
	equalNbt,
	listAppend,
	nbtBool,
	nbtByte,
	nbtByteArray,
	nbtCompound,
	nbtCustom,
	nbtDouble,
	nbtFloat,
	nbtInt,
	nbtIntArray,
	nbtList,
	nbtLong,
	nbtLongArray,
	nbtRoot,
	nbtShort,
	nbtString,
	tagIdOf,
} from "./tags.ts";
export type * from "./types.ts";
export {
	DEFAULT_MAX_DEPTH,
	DEFAULT_SNBT_CONFIG,
	FIRST_CUSTOM_ID,
	MAX_TYPE_ID,
	TAG_ID,
} from "./types.ts";
export {
	checkInteger,
	checkLong,
	sizeOfString,
	writeFixedArray,
	writeFloat32,
	writeFloat64,
	writeInt8,
	writeInt16,
	writeInt32,
	writeInt64,
	writeString,
	writeTypeId,
} from "./write.ts";
