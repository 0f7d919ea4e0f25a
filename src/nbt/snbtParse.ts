import { enterContainer, type TagContext } from "./behavior.ts";
import { NbtError, type NbtErrorKind } from "./errors.ts";
import {
	nbtByte,
	nbtDouble,
	nbtFloat,
	nbtInt,
	nbtList,
	nbtLong,
	nbtRoot,
	nbtShort,
	nbtString,
	tagIdOf,
} from "./tags.ts";
import type { NbtRoot, NbtTag } from "./types.ts";

// ─── Literals ───────────────────────────────────────────────────────────────

const INTEGER = /^([-+]?\d+)([bslBSL])?$/;
const DECIMAL = /^([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)([fdFD])?$/;
const SPECIAL = /^([-+]?(?:NaN|Infinity))([fdFD])$/;
const TYPED_ARRAY_TAG = /[A-Za-z_][A-Za-z0-9_]*(?=\s*;)/y;

const INTEGER_RANGES = {
	b: [-128n, 127n],
	s: [-32768n, 32767n],
	i: [-2147483648n, 2147483647n],
	l: [-(2n ** 63n), 2n ** 63n - 1n],
} as const;

const isUnquotedChar = (ch: string): boolean => /[A-Za-z0-9._+-]/.test(ch);

const isWhitespace = (ch: string): boolean => /\s/.test(ch);

const ESCAPES: Readonly<Record<string, string>> = {
	"\\": "\\",
	'"': '"',
	"'": "'",
	n: "\n",
	t: "\t",
	r: "\r",
	b: "\b",
	f: "\f",
};

type Located = { readonly tag: NbtTag; readonly position: number };

// ─── Parser ─────────────────────────────────────────────────────────────────

const createParser = (text: string) => {
	let pos = 0;

	const locate = (position: number) => {
		const before = text.slice(0, position);
		const line = before.split("\n").length;
		const column = position - before.lastIndexOf("\n");
		return { position, line, column };
	};

	const fail = (
		kind: NbtErrorKind,
		message: string,
		at = pos,
		cause?: unknown,
	): never => {
		throw new NbtError(kind, message, locate(at), cause);
	};

	const describe = (at: number): string =>
		at < text.length ? `'${text[at]}'` : "end of input";

	const skipWhitespace = (): void => {
		while (pos < text.length && isWhitespace(text[pos])) pos++;
	};

	const expect = (ch: string): void => {
		skipWhitespace();
		if (text[pos] !== ch)
			fail("UnexpectedToken", `Expected '${ch}', found ${describe(pos)}`);
		pos++;
	};

	const readUnquoted = (): string => {
		const start = pos;
		while (pos < text.length && isUnquotedChar(text[pos])) pos++;
		return text.slice(start, pos);
	};

	const readQuoted = (): string => {
		const start = pos;
		const quote = text[pos];
		pos++;
		let out = "";
		for (;;) {
			if (pos >= text.length)
				return fail("UnterminatedString", "Unterminated string", start);
			const ch = text[pos];
			if (ch === quote) {
				pos++;
				return out;
			}
			if (ch !== "\\") {
				out += ch;
				pos++;
				continue;
			}
			pos++;
			if (pos >= text.length)
				return fail("UnterminatedString", "Unterminated string", start);
			const escape = text[pos];
			if (escape === "u") {
				const hex = text.slice(pos + 1, pos + 5);
				if (!/^[0-9a-fA-F]{4}$/.test(hex))
					fail("UnexpectedToken", "Invalid \\u escape", pos - 1);
				out += String.fromCharCode(Number.parseInt(hex, 16));
				pos += 5;
				continue;
			}
			const replacement = ESCAPES[escape];
			if (replacement === undefined)
				fail("UnexpectedToken", `Invalid escape '\\${escape}'`, pos - 1);
			out += replacement;
			pos++;
		}
	};

	const readKey = (): string => {
		skipWhitespace();
		if (text[pos] === '"' || text[pos] === "'") return readQuoted();
		const key = readUnquoted();
		if (key.length === 0)
			fail("UnexpectedToken", `Expected a key, found ${describe(pos)}`);
		return key;
	};

	const integer = (
		digits: string,
		range: readonly [bigint, bigint],
		start: number,
	): bigint => {
		const value = BigInt(digits.startsWith("+") ? digits.slice(1) : digits);
		if (value < range[0] || value > range[1])
			fail("InvalidNumber", `${digits} is out of range`, start);
		return value;
	};

	const decimal = (literal: string, isFloat: boolean, start: number): number => {
		const value = isFloat ? Math.fround(Number(literal)) : Number(literal);
		if (!Number.isFinite(value))
			fail("InvalidNumber", `${literal} is out of range`, start);
		return value;
	};

	const classify = (token: string, start: number): NbtTag => {
		if (token === "true") return nbtByte(1);
		if (token === "false") return nbtByte(0);

		const int = INTEGER.exec(token);
		if (int) {
			const [, digits, suffix = ""] = int;
			switch (suffix.toLowerCase()) {
				case "b":
					return nbtByte(Number(integer(digits, INTEGER_RANGES.b, start)));
				case "s":
					return nbtShort(Number(integer(digits, INTEGER_RANGES.s, start)));
				case "l":
					return nbtLong(integer(digits, INTEGER_RANGES.l, start));
				default:
					return nbtInt(Number(integer(digits, INTEGER_RANGES.i, start)));
			}
		}

		const dec = DECIMAL.exec(token);
		if (dec) {
			const [, literal, suffix = ""] = dec;
			const isFloat = suffix.toLowerCase() === "f";
			if (suffix !== "" || /[.eE]/.test(literal))
				return isFloat
					? nbtFloat(decimal(literal, true, start))
					: nbtDouble(decimal(literal, false, start));
		}

		const special = SPECIAL.exec(token);
		if (special) {
			const [, literal, suffix] = special;
			const value = Number(literal);
			return suffix.toLowerCase() === "f" ? nbtFloat(value) : nbtDouble(value);
		}

		return nbtString(token);
	};

	const parseSequence = (ctx: TagContext): Located[] => {
		const items: Located[] = [];
		skipWhitespace();
		if (text[pos] === "]") {
			pos++;
			return items;
		}
		for (;;) {
			skipWhitespace();
			const position = pos;
			items.push({ tag: parseValue(ctx), position });
			skipWhitespace();
			if (text[pos] === ",") {
				pos++;
				continue;
			}
			if (text[pos] === "]") {
				pos++;
				return items;
			}
			fail("UnexpectedToken", `Expected ',' or ']', found ${describe(pos)}`);
		}
	};

	const parseListOrArray = (ctx: TagContext): NbtTag => {
		const start = pos;
		pos++;
		skipWhitespace();
		const inner = enterContainer(ctx, () => locate(start));
		TYPED_ARRAY_TAG.lastIndex = pos;
		const typed = TYPED_ARRAY_TAG.exec(text);
		if (typed) {
			const behavior = ctx.registry.findBySnbtTag(typed[0]);
			if (!behavior || !behavior.fromSnbt)
				return fail("UnexpectedToken", `Unknown array type '${typed[0]}'`, pos);
			pos += typed[0].length;
			expect(";");
			const elements = parseSequence(inner).map((item) => item.tag);
			return behavior.fromSnbt(elements, start);
		}

		const items = parseSequence(inner);
		if (items.length === 0) return nbtList();
		const elementId = tagIdOf(items[0].tag);
		for (const { tag, position } of items)
			if (tagIdOf(tag) !== elementId)
				fail(
					"ListTypeMismatch",
					`List element has type id ${tagIdOf(tag)}, expected ${elementId}`,
					position,
				);
		return nbtList(
			items.map((item) => item.tag),
			elementId,
		);
	};

	const parseCompound = (ctx: TagContext): Map<string, NbtTag> => {
		const start = pos;
		const inner = enterContainer(ctx, () => locate(start));
		pos++;
		const entries = new Map<string, NbtTag>();
		skipWhitespace();
		if (text[pos] === "}") {
			pos++;
			return entries;
		}
		for (;;) {
			const key = readKey();
			expect(":");
			entries.set(key, parseValue(inner));
			skipWhitespace();
			if (text[pos] === ",") {
				pos++;
				continue;
			}
			if (text[pos] === "}") {
				pos++;
				return entries;
			}
			fail("UnexpectedToken", `Expected ',' or '}', found ${describe(pos)}`);
		}
	};

	const parseValue = (ctx: TagContext): NbtTag => {
		skipWhitespace();
		const start = pos;
		const ch = text[pos];
		if (ch === "{") return { type: "compound", value: parseCompound(ctx) };
		if (ch === "[") return parseListOrArray(ctx);
		if (ch === '"' || ch === "'") return nbtString(readQuoted());
		const token = readUnquoted();
		if (token.length === 0)
			return fail("UnexpectedToken", `Expected a value, found ${describe(start)}`, start);
		return classify(token, start);
	};

	const parseDocument = (ctx: TagContext): NbtTag => {
		const tag = parseValue(ctx);
		skipWhitespace();
		if (pos < text.length)
			fail("UnexpectedToken", `Unexpected trailing ${describe(pos)}`);
		return tag;
	};

	return { parseDocument };
};

// ─── Entry points ───────────────────────────────────────────────────────────

/** Parse any SNBT value. */
export const parseSnbtTag = (text: string, ctx: TagContext): NbtTag =>
	createParser(text).parseDocument(ctx);

/** Parse SNBT whose top-level value is a compound; the root name is `""`. */
export const parseSnbtRoot = (text: string, ctx: TagContext): NbtRoot => {
	const tag = parseSnbtTag(text, ctx);
	if (tag.type !== "compound")
		throw new NbtError(
			"InvalidRoot",
			`Expected a compound at the top level, got ${tag.type}`,
			{ position: 0, line: 1, column: 1 },
		);
	return nbtRoot(tag.value);
};
