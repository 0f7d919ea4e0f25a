import type { TagContext } from "./behavior.ts";
import { NbtError } from "./errors.ts";
import type { NbtRoot } from "./types.ts";
import { TAG_ID } from "./types.ts";

const MAX_STRING_BYTES = 0xffff;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

// ─── Range checks ───────────────────────────────────────────────────────────

export const checkInteger = (value: number, bits: 8 | 16 | 32): number => {
	const limit = 2 ** (bits - 1);
	if (!Number.isInteger(value) || value < -limit || value >= limit)
		throw new NbtError(
			"ValueOutOfRange",
			`${value} is not a signed ${bits}-bit integer`,
		);
	return value;
};

export const checkLong = (value: bigint): bigint => {
	if (value < INT64_MIN || value > INT64_MAX)
		throw new NbtError(
			"ValueOutOfRange",
			`${value} is not a signed 64-bit integer`,
		);
	return value;
};

// ─── Big-endian primitives ──────────────────────────────────────────────────

export const writeInt8 = (value: number, buf: Buffer, offset: number): number => {
	buf.writeInt8(checkInteger(value, 8), offset);
	return offset + 1;
};

export const writeInt16 = (
	value: number,
	buf: Buffer,
	offset: number,
): number => {
	buf.writeInt16BE(checkInteger(value, 16), offset);
	return offset + 2;
};

export const writeInt32 = (
	value: number,
	buf: Buffer,
	offset: number,
): number => {
	buf.writeInt32BE(checkInteger(value, 32), offset);
	return offset + 4;
};

export const writeInt64 = (
	value: bigint,
	buf: Buffer,
	offset: number,
): number => {
	buf.writeBigInt64BE(checkLong(value), offset);
	return offset + 8;
};

export const writeFloat32 = (
	value: number,
	buf: Buffer,
	offset: number,
): number => {
	buf.writeFloatBE(value, offset);
	return offset + 4;
};

export const writeFloat64 = (
	value: number,
	buf: Buffer,
	offset: number,
): number => {
	buf.writeDoubleBE(value, offset);
	return offset + 8;
};

export const writeTypeId = (id: number, buf: Buffer, offset: number): number => {
	buf.writeUInt8(id, offset);
	return offset + 1;
};

export const sizeOfString = (value: string): number => {
	const length = Buffer.byteLength(value, "utf8");
	if (length > MAX_STRING_BYTES)
		throw new NbtError(
			"MalformedString",
			`String of ${length} bytes exceeds ${MAX_STRING_BYTES}`,
		);
	return 2 + length;
};

export const writeString = (
	value: string,
	buf: Buffer,
	offset: number,
): number => {
	const bytes = Buffer.from(value, "utf8");
	buf.writeUInt16BE(bytes.length, offset);
	bytes.copy(buf, offset + 2);
	return offset + 2 + bytes.length;
};

export const writeFixedArray = <T>(
	value: readonly T[],
	buf: Buffer,
	offset: number,
	writeOne: (value: T, buf: Buffer, offset: number) => number,
): number => {
	offset = writeInt32(value.length, buf, offset);
	for (const item of value) offset = writeOne(item, buf, offset);
	return offset;
};

// ─── Root tag writer ────────────────────────────────────────────────────────

/** Encode a named root compound to its exact byte length. */
export const writeRootTag = (root: NbtRoot, ctx: TagContext): Buffer => {
	const compound = ctx.registry.resolve(TAG_ID.compound);
	const size = 1 + sizeOfString(root.name) + compound.sizeOf(root, ctx);
	const buf = Buffer.alloc(size);
	let offset = writeTypeId(TAG_ID.compound, buf, 0);
	offset = writeString(root.name, buf, offset);
	offset = compound.write(root, buf, offset, ctx);
	return offset === size ? buf : buf.subarray(0, offset);
};
