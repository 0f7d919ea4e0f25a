import { isDeepStrictEqual } from "node:util";
import { NbtError } from "./errors.ts";
import type {
	NbtByte,
	NbtByteArray,
	NbtCompound,
	NbtCustom,
	NbtDouble,
	NbtFloat,
	NbtInt,
	NbtIntArray,
	NbtList,
	NbtLong,
	NbtLongArray,
	NbtRoot,
	NbtShort,
	NbtString,
	NbtTag,
} from "./types.ts";
import { TAG_ID } from "./types.ts";

// ─── Type ids ───────────────────────────────────────────────────────────────

export const tagIdOf = (tag: NbtTag): number =>
	tag.type === "custom" ? tag.id : TAG_ID[tag.type];

// ─── Builder functions ──────────────────────────────────────────────────────

export const nbtByte = (value: number): NbtByte => ({ type: "byte", value });

export const nbtShort = (value: number): NbtShort => ({
	type: "short",
	value,
});

export const nbtInt = (value: number): NbtInt => ({ type: "int", value });

export const nbtLong = (value: bigint | number): NbtLong => ({
	type: "long",
	value: BigInt(value),
});

export const nbtFloat = (value: number): NbtFloat => ({
	type: "float",
	value: Math.fround(value),
});

export const nbtDouble = (value: number): NbtDouble => ({
	type: "double",
	value,
});

export const nbtString = (value: string): NbtString => ({
	type: "string",
	value,
});

export const nbtByteArray = (value: readonly number[] = []): NbtByteArray => ({
	type: "byteArray",
	value: [...value],
});

export const nbtIntArray = (value: readonly number[] = []): NbtIntArray => ({
	type: "intArray",
	value: [...value],
});

export const nbtLongArray = (
	value: readonly (bigint | number)[] = [],
): NbtLongArray => ({
	type: "longArray",
	value: value.map((v) => BigInt(v)),
});

export const nbtBool = (value = false): NbtByte => nbtByte(value ? 1 : 0);

export const nbtCustom = <V>(id: number, value: V): NbtCustom<V> => ({
	type: "custom",
	id,
	value,
});

type CompoundEntries =
	| Readonly<Record<string, NbtTag>>
	| Iterable<readonly [string, NbtTag]>;

const isIterable = (
	entries: CompoundEntries,
): entries is Iterable<readonly [string, NbtTag]> =>
	Symbol.iterator in entries;

const toEntryMap = (entries: CompoundEntries): Map<string, NbtTag> =>
	new Map(isIterable(entries) ? entries : Object.entries(entries));

export const nbtCompound = (entries: CompoundEntries = {}): NbtCompound => ({
	type: "compound",
	value: toEntryMap(entries),
});

export const nbtRoot = (entries: CompoundEntries = {}, name = ""): NbtRoot => ({
	type: "compound",
	name,
	value: toEntryMap(entries),
});

/**
 * Build a list. The element id defaults to the first element's id, or End
 * for an empty list; every element must carry that id.
 */
export const nbtList = (
	items: readonly NbtTag[] = [],
	elementId: number = items.length > 0 ? tagIdOf(items[0]) : TAG_ID.end,
): NbtList => {
	items.forEach((item, index) => assertElement(elementId, item, index));
	return { type: "list", elementId, value: [...items] };
};

// ─── List helpers ───────────────────────────────────────────────────────────

const assertElement = (elementId: number, item: NbtTag, index: number): void => {
	const id = tagIdOf(item);
	if (id !== elementId)
		throw new NbtError(
			"ListTypeMismatch",
			`List element ${index} has type id ${id}, expected ${elementId}`,
		);
};

/** Append to a list, rejecting an element of a different type. */
export const listAppend = (list: NbtList, item: NbtTag): NbtList => {
	assertElement(list.elementId, item, list.value.length);
	list.value.push(item);
	return list;
};

/** Throws `ListTypeMismatch` if any element disagrees with the declared id. */
export const assertHomogeneous = (list: NbtList): void => {
	list.value.forEach((item, index) =>
		assertElement(list.elementId, item, index),
	);
};

// ─── Compound helpers ───────────────────────────────────────────────────────

/** Set a member; an existing key keeps its position and takes the new tag. */
export const compoundSet = <C extends NbtCompound>(
	compound: C,
	key: string,
	tag: NbtTag,
): C => {
	compound.value.set(key, tag);
	return compound;
};

export const compoundGet = (
	compound: NbtCompound,
	key: string,
): NbtTag | undefined => compound.value.get(key);

export const compoundDelete = (compound: NbtCompound, key: string): boolean =>
	compound.value.delete(key);

// ─── Equality (deep structural comparison) ──────────────────────────────────

const equalArrays = <T>(a: readonly T[], b: readonly T[]): boolean =>
	a.length === b.length && a.every((v, i) => v === b[i]);

export const equalNbt = (a: NbtTag, b: NbtTag): boolean => {
	if (tagIdOf(a) !== tagIdOf(b)) return false;
	if ("name" in a || "name" in b) {
		const aName = "name" in a ? a.name : undefined;
		const bName = "name" in b ? b.name : undefined;
		if (aName !== bName) return false;
	}

	switch (a.type) {
		case "compound": {
			if (b.type !== "compound") return false;
			if (a.value.size !== b.value.size) return false;
			const bEntries = [...b.value];
			return [...a.value].every(([key, val], i) => {
				const [bKey, bVal] = bEntries[i];
				return key === bKey && equalNbt(val, bVal);
			});
		}
		case "list": {
			if (b.type !== "list") return false;
			if (a.elementId !== b.elementId) return false;
			if (a.value.length !== b.value.length) return false;
			return a.value.every((item, i) => equalNbt(item, b.value[i]));
		}
		case "byteArray":
			return b.type === "byteArray" && equalArrays(a.value, b.value);
		case "intArray":
			return b.type === "intArray" && equalArrays(a.value, b.value);
		case "longArray":
			return b.type === "longArray" && equalArrays(a.value, b.value);
		case "custom":
			return b.type === "custom" && isDeepStrictEqual(a.value, b.value);
		default:
			// NaN equals NaN, -0 differs from 0
			return Object.is(a.value, b.value);
	}
};
