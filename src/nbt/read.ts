import type { TagContext } from "./behavior.ts";
import { NbtError } from "./errors.ts";
import type { NbtRoot, ReadResult } from "./types.ts";
import { TAG_ID } from "./types.ts";

const utf8 = new TextDecoder("utf-8", { fatal: true });

// ─── Big-endian primitives ──────────────────────────────────────────────────

/** Throws `UnexpectedEof` unless `size` bytes are available at `offset`. */
export const need = (buf: Buffer, offset: number, size: number): void => {
	if (offset + size > buf.length)
		throw new NbtError(
			"UnexpectedEof",
			`Needed ${size} byte(s), ${Math.max(0, buf.length - offset)} left`,
			{ offset },
		);
};

export const readInt8 = (buf: Buffer, offset: number): ReadResult<number> => {
	need(buf, offset, 1);
	return { value: buf.readInt8(offset), size: 1 };
};

export const readInt16 = (buf: Buffer, offset: number): ReadResult<number> => {
	need(buf, offset, 2);
	return { value: buf.readInt16BE(offset), size: 2 };
};

export const readInt32 = (buf: Buffer, offset: number): ReadResult<number> => {
	need(buf, offset, 4);
	return { value: buf.readInt32BE(offset), size: 4 };
};

export const readInt64 = (buf: Buffer, offset: number): ReadResult<bigint> => {
	need(buf, offset, 8);
	return { value: buf.readBigInt64BE(offset), size: 8 };
};

export const readFloat32 = (buf: Buffer, offset: number): ReadResult<number> => {
	need(buf, offset, 4);
	return { value: buf.readFloatBE(offset), size: 4 };
};

export const readFloat64 = (buf: Buffer, offset: number): ReadResult<number> => {
	need(buf, offset, 8);
	return { value: buf.readDoubleBE(offset), size: 8 };
};

export const readTypeId = (buf: Buffer, offset: number): ReadResult<number> => {
	need(buf, offset, 1);
	return { value: buf.readUInt8(offset), size: 1 };
};

/** u16 length + UTF-8 bytes. */
export const readString = (buf: Buffer, offset: number): ReadResult<string> => {
	need(buf, offset, 2);
	const length = buf.readUInt16BE(offset);
	const start = offset + 2;
	if (start + length > buf.length)
		throw new NbtError(
			"MalformedString",
			`String of ${length} byte(s) runs past end of stream`,
			{ offset },
		);
	try {
		return {
			value: utf8.decode(buf.subarray(start, start + length)),
			size: 2 + length,
		};
	} catch (err) {
		throw new NbtError(
			"MalformedString",
			"Invalid UTF-8 in string",
			{ offset },
			err,
		);
	}
};

/** Signed 32-bit element count of arrays and lists. */
export const readArrayCount = (
	buf: Buffer,
	offset: number,
): ReadResult<number> => {
	const result = readInt32(buf, offset);
	if (result.value < 0)
		throw new NbtError(
			"NegativeLength",
			`Negative length ${result.value}`,
			{ offset },
		);
	return result;
};

/** Count-prefixed run of fixed-width elements; the whole run must fit. */
export const readFixedArray = <T>(
	buf: Buffer,
	offset: number,
	width: number,
	readOne: (buf: Buffer, offset: number) => ReadResult<T>,
): ReadResult<T[]> => {
	const { value: count, size: countSize } = readArrayCount(buf, offset);
	const start = offset + countSize;
	need(buf, start, count * width);
	const value: T[] = [];
	for (let i = 0; i < count; i++)
		value.push(readOne(buf, start + i * width).value);
	return { value, size: countSize + count * width };
};

// ─── Root tag reader ────────────────────────────────────────────────────────

export const readRootTag = (
	buf: Buffer,
	offset: number,
	ctx: TagContext,
): ReadResult<NbtRoot> => {
	const { value: tagId } = readTypeId(buf, offset);
	if (tagId === TAG_ID.end)
		throw new NbtError("UnexpectedEndTag", "Root tag is an End tag", {
			offset,
		});
	ctx.registry.resolve(tagId, offset);
	if (tagId !== TAG_ID.compound)
		throw new NbtError(
			"InvalidRoot",
			`Expected compound root (10), got type id ${tagId}`,
			{ offset },
		);
	let pos = offset + 1;
	const nameResult = readString(buf, pos);
	pos += nameResult.size;
	const compound = ctx.registry.resolve(TAG_ID.compound).read(buf, pos, ctx);
	pos += compound.size;
	if (compound.value.type !== "compound")
		throw new NbtError("InvalidRoot", "Root payload is not a compound", {
			offset,
		});
	return {
		value: {
			type: "compound",
			name: nameResult.value,
			value: compound.value.value,
		},
		size: pos - offset,
	};
};
