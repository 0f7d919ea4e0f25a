import { enterContainer, type SnbtContext } from "./behavior.ts";
import { tagIdOf } from "./tags.ts";
import type { NbtTag } from "./types.ts";

/** Keys matching this stay unquoted unless `quoteKeys` is set. */
const PLAIN_KEY = /^[A-Za-z0-9._+-]+$/;

// ─── Scalars ────────────────────────────────────────────────────────────────

/** Double-quote, escaping only `"` and backslash. */
export const quoteSnbtString = (value: string): string => {
	let out = '"';
	for (const ch of value) {
		if (ch === "\\" || ch === '"') out += "\\";
		out += ch;
	}
	return `${out}"`;
};

export const formatSnbtKey = (key: string, ctx: SnbtContext): string =>
	!ctx.config.quoteKeys && PLAIN_KEY.test(key) ? key : quoteSnbtString(key);

/** Shortest decimal that reads back to the same 32-bit float. */
export const formatFloat = (value: number): string => {
	if (!Number.isFinite(value)) return String(value);
	if (Object.is(value, -0)) return "-0.0";
	for (let precision = 1; precision <= 9; precision++) {
		const text = String(Number(value.toPrecision(precision)));
		if (Math.fround(Number(text)) === value) return text;
	}
	return String(value);
};

/** Doubles without a decimal point or exponent get a `d` suffix. */
export const formatDouble = (value: number): string => {
	if (Object.is(value, -0)) return "-0.0";
	const text = String(value);
	return /[.eE]/.test(text) ? text : `${text}d`;
};

// ─── Containers ─────────────────────────────────────────────────────────────

export const renderSnbt = (tag: NbtTag, ctx: SnbtContext): string =>
	ctx.registry.resolve(tagIdOf(tag)).toSnbt(tag, ctx);

/**
 * Lay out `[prefix e0,e1,...]`. `ctx` is the context of the sequence itself;
 * elements are rendered by the caller at `ctx.depth + 1`.
 */
export const layoutSequence = (
	items: readonly string[],
	ctx: SnbtContext,
	prefix = "",
): string => {
	const { prettyPrint, indent, inlineThreshold } = ctx.config;
	if (items.length === 0) return `[${prefix}]`;
	if (!prettyPrint) return `[${prefix}${items.join(",")}]`;
	if (items.length <= inlineThreshold)
		return `[${prefix}${items.join(", ")}]`;
	const pad = indent.repeat(ctx.depth + 1);
	const body = items.map((item) => `${pad}${item}`).join(",\n");
	return `[${prefix}\n${body}\n${indent.repeat(ctx.depth)}]`;
};

export const renderList = (
	items: readonly NbtTag[],
	ctx: SnbtContext,
	prefix = "",
): string => {
	const inner = enterContainer(ctx);
	return layoutSequence(
		items.map((item) => renderSnbt(item, inner)),
		ctx,
		prefix,
	);
};

export const renderCompound = (
	entries: ReadonlyMap<string, NbtTag>,
	ctx: SnbtContext,
): string => {
	const inner = enterContainer(ctx);
	if (entries.size === 0) return "{}";
	const { prettyPrint, indent } = ctx.config;
	const members = [...entries].map(
		([key, tag]) =>
			`${formatSnbtKey(key, ctx)}${prettyPrint ? ": " : ":"}${renderSnbt(tag, inner)}`,
	);
	if (!prettyPrint) return `{${members.join(",")}}`;
	const pad = indent.repeat(ctx.depth + 1);
	return `{\n${members.map((m) => `${pad}${m}`).join(",\n")}\n${indent.repeat(ctx.depth)}}`;
};
