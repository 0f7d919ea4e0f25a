import { promises as fs } from "node:fs";
import type { Readable, Writable } from "node:stream";
import type { SnbtContext, TagContext, TagTypeRegistry } from "./behavior.ts";
import { compress, decompress } from "./compression.ts";
import { NbtError } from "./errors.ts";
import { jsonToRoot, nbtToJson, parseJsonRoot } from "./json.ts";
import { readRootTag } from "./read.ts";
import { createTagTypeRegistry } from "./registry.ts";
import { renderSnbt } from "./snbt.ts";
import { parseSnbtRoot, parseSnbtTag } from "./snbtParse.ts";
import type {
	JsonValue,
	NbtCompression,
	NbtReadResult,
	NbtRoot,
	NbtTag,
	SnbtConfig,
} from "./types.ts";
import { DEFAULT_MAX_DEPTH, DEFAULT_SNBT_CONFIG } from "./types.ts";
import { writeRootTag } from "./write.ts";

// ─── Options ────────────────────────────────────────────────────────────────

export type NbtOptions = {
	readonly registry: TagTypeRegistry;
	/** Deepest allowed container level; the root compound is level 0. */
	readonly maxDepth: number;
	readonly snbt: SnbtConfig;
};

export type NbtOptionsInput = {
	readonly registry?: TagTypeRegistry;
	readonly maxDepth?: number;
	readonly snbt?: Partial<SnbtConfig>;
};

export const resolveOptions = (
	input: NbtOptionsInput = {},
	base?: NbtOptions,
): NbtOptions => {
	const maxDepth = input.maxDepth ?? base?.maxDepth ?? DEFAULT_MAX_DEPTH;
	if (!Number.isInteger(maxDepth) || maxDepth < 0)
		throw new NbtError(
			"ValueOutOfRange",
			`maxDepth must be a non-negative integer, got ${maxDepth}`,
		);
	return {
		registry: input.registry ?? base?.registry ?? createTagTypeRegistry(),
		maxDepth,
		snbt: { ...(base?.snbt ?? DEFAULT_SNBT_CONFIG), ...input.snbt },
	};
};

const tagContext = (options: NbtOptions): TagContext => ({
	registry: options.registry,
	depth: 0,
	maxDepth: options.maxDepth,
});

const snbtContext = (options: NbtOptions): SnbtContext => ({
	...tagContext(options),
	config: options.snbt,
});

// ─── Binary ─────────────────────────────────────────────────────────────────

/** Decode a root compound, detecting gzip/zlib framing from magic bytes. */
export const readNbt = (
	data: Buffer | Uint8Array,
	input?: NbtOptionsInput,
): NbtReadResult => {
	const options = resolveOptions(input);
	const buf = Buffer.isBuffer(data) ? data : Buffer.from(data);
	const unwrapped = decompress(buf);
	const result = readRootTag(unwrapped.data, 0, tagContext(options));
	return {
		root: result.value,
		compression: unwrapped.compression,
		bytesRead: result.size,
	};
};

export const writeNbt = (
	root: NbtRoot,
	compression: NbtCompression = "none",
	input?: NbtOptionsInput,
): Buffer => {
	const options = resolveOptions(input);
	return compress(writeRootTag(root, tagContext(options)), compression);
};

// ─── SNBT ───────────────────────────────────────────────────────────────────

export const toSnbt = (tag: NbtTag, input?: NbtOptionsInput): string =>
	renderSnbt(tag, snbtContext(resolveOptions(input)));

export const parseSnbt = (text: string, input?: NbtOptionsInput): NbtRoot =>
	parseSnbtRoot(text, tagContext(resolveOptions(input)));

export const parseSnbtValue = (
	text: string,
	input?: NbtOptionsInput,
): NbtTag => parseSnbtTag(text, tagContext(resolveOptions(input)));

// ─── JSON (lossy) ───────────────────────────────────────────────────────────

export const toJson = (tag: NbtTag, input?: NbtOptionsInput): JsonValue =>
	nbtToJson(tag, tagContext(resolveOptions(input)));

export const fromJson = (value: JsonValue, input?: NbtOptionsInput): NbtRoot =>
	jsonToRoot(value, tagContext(resolveOptions(input)));

// ─── I/O helpers ────────────────────────────────────────────────────────────

const wrapIo = async <T>(what: string, action: () => Promise<T>): Promise<T> => {
	try {
		return await action();
	} catch (err) {
		if (err instanceof NbtError) throw err;
		throw new NbtError("IoError", `Failed to ${what}`, {}, err);
	}
};

const readAll = async (input: Readable): Promise<Buffer> => {
	const chunks: Buffer[] = [];
	for await (const chunk of input)
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
	return Buffer.concat(chunks);
};

const writeAll = (output: Writable, data: Buffer): Promise<void> =>
	new Promise((resolve, reject) => {
		output.write(data, (err) => (err ? reject(err) : resolve()));
	});

// ─── Codec ──────────────────────────────────────────────────────────────────

/** A codec bound to one registry and configuration. */
export type Nbt = {
	readonly options: NbtOptions;
	readonly registry: TagTypeRegistry;
	/** New codec with some options replaced; this one is left as it is. */
	readonly withOptions: (input: NbtOptionsInput) => Nbt;

	readonly read: (data: Buffer | Uint8Array) => NbtReadResult;
	readonly fromBuffer: (data: Buffer | Uint8Array) => NbtRoot;
	readonly toBuffer: (root: NbtRoot, compression?: NbtCompression) => Buffer;
	readonly fromBase64: (encoded: string) => NbtRoot;
	readonly toBase64: (root: NbtRoot, compression?: NbtCompression) => string;
	readonly readFile: (path: string) => Promise<NbtReadResult>;
	readonly fromFile: (path: string) => Promise<NbtRoot>;
	readonly toFile: (
		root: NbtRoot,
		path: string,
		compression?: NbtCompression,
	) => Promise<void>;
	/** Buffers the whole stream, then decodes it like `read`. */
	readonly fromStream: (input: Readable) => Promise<NbtRoot>;
	readonly toStream: (
		root: NbtRoot,
		output: Writable,
		compression?: NbtCompression,
	) => Promise<void>;

	readonly toSnbt: (tag: NbtTag) => string;
	readonly fromSnbt: (text: string) => NbtRoot;
	readonly parseSnbtTag: (text: string) => NbtTag;
	readonly fromSnbtFile: (path: string) => Promise<NbtRoot>;

	readonly toJson: (tag: NbtTag) => JsonValue;
	readonly fromJson: (value: JsonValue) => NbtRoot;
	readonly toJsonFile: (root: NbtRoot, path: string) => Promise<void>;
	readonly fromJsonFile: (path: string) => Promise<NbtRoot>;
};

export const createNbt = (input?: NbtOptionsInput): Nbt =>
	fromOptions(resolveOptions(input));

const fromOptions = (options: NbtOptions): Nbt => {
	const read = (data: Buffer | Uint8Array): NbtReadResult =>
		readNbt(data, options);
	const toBuffer = (
		root: NbtRoot,
		compression: NbtCompression = "none",
	): Buffer => writeNbt(root, compression, options);

	return {
		options,
		registry: options.registry,
		withOptions: (next) => fromOptions(resolveOptions(next, options)),

		read,
		fromBuffer: (data) => read(data).root,
		toBuffer,
		fromBase64: (encoded) => read(Buffer.from(encoded, "base64")).root,
		toBase64: (root, compression) =>
			toBuffer(root, compression).toString("base64"),
		readFile: async (path) =>
			read(await wrapIo(`read ${path}`, () => fs.readFile(path))),
		fromFile: async (path) =>
			read(await wrapIo(`read ${path}`, () => fs.readFile(path))).root,
		toFile: async (root, path, compression) => {
			const data = toBuffer(root, compression);
			await wrapIo(`write ${path}`, () => fs.writeFile(path, data));
		},
		fromStream: async (stream) =>
			read(await wrapIo("read stream", () => readAll(stream))).root,
		toStream: async (root, stream, compression) => {
			const data = toBuffer(root, compression);
			await wrapIo("write stream", () => writeAll(stream, data));
		},

		toSnbt: (tag) => toSnbt(tag, options),
		fromSnbt: (text) => parseSnbt(text, options),
		parseSnbtTag: (text) => parseSnbtValue(text, options),
		fromSnbtFile: async (path) =>
			parseSnbt(
				await wrapIo(`read ${path}`, () => fs.readFile(path, "utf8")),
				options,
			),

		toJson: (tag) => toJson(tag, options),
		fromJson: (value) => fromJson(value, options),
		toJsonFile: async (root, path) => {
			const text = `${JSON.stringify(toJson(root, options), null, 2)}\n`;
			await wrapIo(`write ${path}`, () => fs.writeFile(path, text));
		},
		fromJsonFile: async (path) =>
			parseJsonRoot(
				await wrapIo(`read ${path}`, () => fs.readFile(path, "utf8")),
				tagContext(options),
			),
	};
};
