import { enterContainer, type TagBehavior } from "./behavior.ts";
import { NbtError } from "./errors.ts";
import {
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
import {
	formatDouble,
	formatFloat,
	layoutSequence,
	quoteSnbtString,
	renderCompound,
	renderList,
} from "./snbt.ts";
import {
	assertHomogeneous,
	nbtByte,
	nbtByteArray,
	nbtCompound,
	nbtDouble,
	nbtFloat,
	nbtInt,
	nbtIntArray,
	nbtList,
	nbtLong,
	nbtLongArray,
	nbtShort,
	nbtString,
	tagIdOf,
} from "./tags.ts";
import type {
	JsonValue,
	NbtByte,
	NbtByteArray,
	NbtCompound,
	NbtDouble,
	NbtFloat,
	NbtInt,
	NbtIntArray,
	NbtList,
	NbtLong,
	NbtLongArray,
	NbtShort,
	NbtString,
	NbtTag,
	ReadResult,
} from "./types.ts";
import { TAG_ID } from "./types.ts";
import {
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

// ─── Numeric scalars ────────────────────────────────────────────────────────

type NumberTag = NbtByte | NbtShort | NbtInt | NbtFloat | NbtDouble;

const numeric = <T extends NumberTag>(
	id: number,
	label: string,
	width: number,
	make: (value: number) => T,
	readOne: (buf: Buffer, offset: number) => ReadResult<number>,
	writeOne: (value: number, buf: Buffer, offset: number) => number,
	format: (value: number) => string,
): TagBehavior<T> => ({
	id,
	label,
	create: () => make(0),
	read: (buf, offset) => {
		const { value, size } = readOne(buf, offset);
		return { value: make(value), size };
	},
	sizeOf: () => width,
	write: (tag, buf, offset) => writeOne(tag.value, buf, offset),
	toSnbt: (tag) => format(tag.value),
	toJson: (tag) => tag.value,
});

const byteBehavior = numeric(
	TAG_ID.byte,
	"TAG_Byte",
	1,
	nbtByte,
	readInt8,
	writeInt8,
	(v) => `${v}b`,
);

const shortBehavior = numeric(
	TAG_ID.short,
	"TAG_Short",
	2,
	nbtShort,
	readInt16,
	writeInt16,
	(v) => `${v}s`,
);

const intBehavior = numeric(
	TAG_ID.int,
	"TAG_Int",
	4,
	nbtInt,
	readInt32,
	writeInt32,
	String,
);

const floatBehavior = numeric(
	TAG_ID.float,
	"TAG_Float",
	4,
	nbtFloat,
	readFloat32,
	writeFloat32,
	(v) => `${formatFloat(v)}f`,
);

const doubleBehavior = numeric(
	TAG_ID.double,
	"TAG_Double",
	8,
	nbtDouble,
	readFloat64,
	writeFloat64,
	formatDouble,
);

const longBehavior: TagBehavior<NbtLong> = {
	id: TAG_ID.long,
	label: "TAG_Long",
	create: () => nbtLong(0n),
	read: (buf, offset) => {
		const { value, size } = readInt64(buf, offset);
		return { value: nbtLong(value), size };
	},
	sizeOf: () => 8,
	write: (tag, buf, offset) => writeInt64(tag.value, buf, offset),
	toSnbt: (tag) => `${tag.value}l`,
	toJson: (tag) => Number(tag.value),
};

const stringBehavior: TagBehavior<NbtString> = {
	id: TAG_ID.string,
	label: "TAG_String",
	create: () => nbtString(""),
	read: (buf, offset) => {
		const { value, size } = readString(buf, offset);
		return { value: nbtString(value), size };
	},
	sizeOf: (tag) => sizeOfString(tag.value),
	write: (tag, buf, offset) => writeString(tag.value, buf, offset),
	toSnbt: (tag) => quoteSnbtString(tag.value),
	toJson: (tag) => tag.value,
};

// ─── Typed arrays ───────────────────────────────────────────────────────────

// Typed arrays count as one nesting level, like a list of scalars.

/** Integral value of a parsed SNBT array element. */
const integralElement = (tag: NbtTag, label: string, position: number): bigint => {
	switch (tag.type) {
		case "byte":
		case "short":
		case "int":
			return BigInt(tag.value);
		case "long":
			return tag.value;
		default:
			throw new NbtError(
				"ListTypeMismatch",
				`${label} elements must be integers, got ${tag.type}`,
				{ position },
			);
	}
};

const toNumberElements = (
	elements: readonly NbtTag[],
	label: string,
	bits: 8 | 32,
	position: number,
): number[] =>
	elements.map((element) => {
		const value = Number(integralElement(element, label, position));
		try {
			return checkInteger(value, bits);
		} catch (err) {
			throw new NbtError(
				"InvalidNumber",
				`${value} does not fit in ${label}`,
				{ position },
				err,
			);
		}
	});

const byteArrayBehavior: TagBehavior<NbtByteArray> = {
	id: TAG_ID.byteArray,
	label: "TAG_Byte_Array",
	snbtTag: "B",
	create: () => nbtByteArray(),
	read: (buf, offset, ctx) => {
		enterContainer(ctx, { offset });
		const { value, size } = readFixedArray(buf, offset, 1, readInt8);
		return { value: nbtByteArray(value), size };
	},
	sizeOf: (tag, ctx) => {
		enterContainer(ctx);
		return 4 + tag.value.length;
	},
	write: (tag, buf, offset, ctx) => {
		enterContainer(ctx);
		return writeFixedArray(tag.value, buf, offset, writeInt8);
	},
	toSnbt: (tag, ctx) => {
		enterContainer(ctx);
		return layoutSequence(
			tag.value.map((v) => `${v}b`),
			ctx,
			"B;",
		);
	},
	toJson: (tag, ctx) => {
		enterContainer(ctx);
		return [...tag.value];
	},
	fromSnbt: (elements, position) =>
		nbtByteArray(toNumberElements(elements, "TAG_Byte_Array", 8, position)),
};

const intArrayBehavior: TagBehavior<NbtIntArray> = {
	id: TAG_ID.intArray,
	label: "TAG_Int_Array",
	snbtTag: "I",
	create: () => nbtIntArray(),
	read: (buf, offset, ctx) => {
		enterContainer(ctx, { offset });
		const { value, size } = readFixedArray(buf, offset, 4, readInt32);
		return { value: nbtIntArray(value), size };
	},
	sizeOf: (tag, ctx) => {
		enterContainer(ctx);
		return 4 + tag.value.length * 4;
	},
	write: (tag, buf, offset, ctx) => {
		enterContainer(ctx);
		return writeFixedArray(tag.value, buf, offset, writeInt32);
	},
	toSnbt: (tag, ctx) => {
		enterContainer(ctx);
		return layoutSequence(tag.value.map(String), ctx, "I;");
	},
	toJson: (tag, ctx) => {
		enterContainer(ctx);
		return [...tag.value];
	},
	fromSnbt: (elements, position) =>
		nbtIntArray(toNumberElements(elements, "TAG_Int_Array", 32, position)),
};

const longArrayBehavior: TagBehavior<NbtLongArray> = {
	id: TAG_ID.longArray,
	label: "TAG_Long_Array",
	snbtTag: "L",
	create: () => nbtLongArray(),
	read: (buf, offset, ctx) => {
		enterContainer(ctx, { offset });
		const { value, size } = readFixedArray(buf, offset, 8, readInt64);
		return { value: nbtLongArray(value), size };
	},
	sizeOf: (tag, ctx) => {
		enterContainer(ctx);
		return 4 + tag.value.length * 8;
	},
	write: (tag, buf, offset, ctx) => {
		enterContainer(ctx);
		return writeFixedArray(tag.value, buf, offset, writeInt64);
	},
	toSnbt: (tag, ctx) => {
		enterContainer(ctx);
		return layoutSequence(
			tag.value.map((v) => `${v}l`),
			ctx,
			"L;",
		);
	},
	toJson: (tag, ctx) => {
		enterContainer(ctx);
		return tag.value.map(Number);
	},
	fromSnbt: (elements, position) =>
		nbtLongArray(
			elements.map((element) =>
				checkLong(integralElement(element, "TAG_Long_Array", position)),
			),
		),
};

// ─── Containers ─────────────────────────────────────────────────────────────

const listBehavior: TagBehavior<NbtList> = {
	id: TAG_ID.list,
	label: "TAG_List",
	create: () => nbtList(),
	read: (buf, offset, ctx) => {
		const inner = enterContainer(ctx, { offset });
		const { value: elementId } = readTypeId(buf, offset);
		const { value: count } = readArrayCount(buf, offset + 1);
		let pos = offset + 5;
		const items: NbtTag[] = [];
		if (elementId !== TAG_ID.end || count > 0) {
			const element = ctx.registry.resolve(elementId, offset);
			for (let i = 0; i < count; i++) {
				const result = element.read(buf, pos, inner);
				items.push(result.value);
				pos += result.size;
			}
		}
		return {
			value: { type: "list", elementId, value: items },
			size: pos - offset,
		};
	},
	sizeOf: (tag, ctx) => {
		const inner = enterContainer(ctx);
		assertHomogeneous(tag);
		if (tag.elementId === TAG_ID.end) return 5;
		const element = ctx.registry.resolve(tag.elementId);
		return tag.value.reduce(
			(size, item) => size + element.sizeOf(item, inner),
			5,
		);
	},
	write: (tag, buf, offset, ctx) => {
		const inner = enterContainer(ctx);
		assertHomogeneous(tag);
		offset = writeTypeId(tag.elementId, buf, offset);
		offset = writeInt32(tag.value.length, buf, offset);
		if (tag.elementId === TAG_ID.end) return offset;
		const element = ctx.registry.resolve(tag.elementId);
		for (const item of tag.value) offset = element.write(item, buf, offset, inner);
		return offset;
	},
	toSnbt: (tag, ctx) => renderList(tag.value, ctx),
	toJson: (tag, ctx) => {
		const inner = enterContainer(ctx);
		return tag.value.map((item) =>
			ctx.registry.resolve(tagIdOf(item)).toJson(item, inner),
		);
	},
};

const compoundBehavior: TagBehavior<NbtCompound> = {
	id: TAG_ID.compound,
	label: "TAG_Compound",
	create: () => nbtCompound(),
	read: (buf, offset, ctx) => {
		const inner = enterContainer(ctx, { offset });
		const entries = new Map<string, NbtTag>();
		let pos = offset;
		for (;;) {
			const { value: tagId } = readTypeId(buf, pos);
			if (tagId === TAG_ID.end) {
				pos += 1;
				break;
			}
			const behavior = ctx.registry.resolve(tagId, pos);
			pos += 1;
			const name = readString(buf, pos);
			pos += name.size;
			const payload = behavior.read(buf, pos, inner);
			entries.set(name.value, payload.value);
			pos += payload.size;
		}
		return { value: nbtCompound(entries), size: pos - offset };
	},
	sizeOf: (tag, ctx) => {
		const inner = enterContainer(ctx);
		let size = 1;
		for (const [name, child] of tag.value)
			size +=
				1 +
				sizeOfString(name) +
				ctx.registry.resolve(tagIdOf(child)).sizeOf(child, inner);
		return size;
	},
	write: (tag, buf, offset, ctx) => {
		const inner = enterContainer(ctx);
		for (const [name, child] of tag.value) {
			const id = tagIdOf(child);
			offset = writeTypeId(id, buf, offset);
			offset = writeString(name, buf, offset);
			offset = ctx.registry.resolve(id).write(child, buf, offset, inner);
		}
		return writeTypeId(TAG_ID.end, buf, offset);
	},
	toSnbt: (tag, ctx) => renderCompound(tag.value, ctx),
	toJson: (tag, ctx) => {
		const inner = enterContainer(ctx);
		return Object.fromEntries(
			[...tag.value].map(([name, child]): [string, JsonValue] => [
				name,
				ctx.registry.resolve(tagIdOf(child)).toJson(child, inner),
			]),
		);
	},
};

export const BUILTIN_BEHAVIORS: readonly TagBehavior[] = [
	byteBehavior,
	shortBehavior,
	intBehavior,
	longBehavior,
	floatBehavior,
	doubleBehavior,
	byteArrayBehavior,
	stringBehavior,
	listBehavior,
	compoundBehavior,
	intArrayBehavior,
	longArrayBehavior,
];
