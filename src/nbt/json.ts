/**
 * Lossy conversion between tag trees and plain JSON values.
 *
 * Going out, every numeric kind becomes a JSON number and the three array
 * kinds become number arrays. Coming back, numbers are widened: integers in
 * the int32 range become Int, other integers in the int64 range become Long,
 * everything else becomes Double. A JSON array becomes a List whose element
 * kind is the widest of its numeric elements.
 */

import { enterContainer, type TagContext } from "./behavior.ts";
import { NbtError } from "./errors.ts";
import {
	nbtByte,
	nbtCompound,
	nbtDouble,
	nbtInt,
	nbtList,
	nbtLong,
	nbtRoot,
	nbtString,
	tagIdOf,
} from "./tags.ts";
import type { JsonValue, NbtRoot, NbtTag } from "./types.ts";

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const INT64_MIN = -(2 ** 63);
const INT64_MAX = 2 ** 63;

// ─── Tag → JSON ─────────────────────────────────────────────────────────────

export const nbtToJson = (tag: NbtTag, ctx: TagContext): JsonValue =>
	ctx.registry.resolve(tagIdOf(tag)).toJson(tag, ctx);

// ─── JSON → Tag ─────────────────────────────────────────────────────────────

const numberToTag = (value: number): NbtTag => {
	if (Number.isInteger(value)) {
		if (value >= INT32_MIN && value <= INT32_MAX) return nbtInt(value);
		if (value >= INT64_MIN && value < INT64_MAX) return nbtLong(BigInt(value));
	}
	return nbtDouble(value);
};

type NumericKind = "int" | "long" | "double";

const isNumericKind = (tag: NbtTag): boolean =>
	tag.type === "int" || tag.type === "long" || tag.type === "double";

const widen = (tag: NbtTag, target: NumericKind): NbtTag => {
	if (tag.type === target) return tag;
	if (tag.type === "int" && target === "long") return nbtLong(tag.value);
	if (tag.type === "int" || tag.type === "long")
		return nbtDouble(Number(tag.value));
	return tag;
};

const arrayToList = (items: readonly JsonValue[], ctx: TagContext): NbtTag => {
	const inner = enterContainer(ctx);
	const tags = items.map((item) => jsonToNbt(item, inner));
	if (tags.length === 0) return nbtList();
	if (tags.every(isNumericKind)) {
		const target: NumericKind = tags.some((tag) => tag.type === "double")
			? "double"
			: tags.some((tag) => tag.type === "long")
				? "long"
				: "int";
		return nbtList(tags.map((tag) => widen(tag, target)));
	}
	return nbtList(tags);
};

const objectToEntries = (
	value: { readonly [key: string]: JsonValue },
	ctx: TagContext,
): Map<string, NbtTag> => {
	const inner = enterContainer(ctx);
	return new Map(
		Object.entries(value).map(([key, child]): [string, NbtTag] => [
			key,
			jsonToNbt(child, inner),
		]),
	);
};

export const jsonToNbt = (value: JsonValue, ctx: TagContext): NbtTag => {
	if (value === null)
		throw new NbtError("InvalidJson", "JSON null has no tag counterpart");
	if (typeof value === "boolean") return nbtByte(value ? 1 : 0);
	if (typeof value === "number") return numberToTag(value);
	if (typeof value === "string") return nbtString(value);
	if (Array.isArray(value)) return arrayToList(value, ctx);
	return nbtCompound(objectToEntries(value, ctx));
};

/** Convert a JSON document whose top level is an object. */
export const jsonToRoot = (value: JsonValue, ctx: TagContext): NbtRoot => {
	if (value === null || typeof value !== "object" || Array.isArray(value))
		throw new NbtError(
			"InvalidJson",
			"Top-level JSON value must be an object",
		);
	return nbtRoot(objectToEntries(value, ctx));
};

/** Parse JSON text and convert it; malformed text fails with `InvalidJson`. */
export const parseJsonRoot = (text: string, ctx: TagContext): NbtRoot => {
	let value: JsonValue;
	try {
		value = JSON.parse(text);
	} catch (err) {
		throw new NbtError("InvalidJson", "Malformed JSON document", {}, err);
	}
	return jsonToRoot(value, ctx);
};
