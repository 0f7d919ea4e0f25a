// ─── Tag type identifiers ───────────────────────────────────────────────────

export type NbtTagType =
	| "byte"
	| "short"
	| "int"
	| "long"
	| "float"
	| "double"
	| "byteArray"
	| "string"
	| "list"
	| "compound"
	| "intArray"
	| "longArray";

// ─── Tag ID ↔ type mappings ────────────────────────────────────────────────

export const TAG_ID = {
	end: 0,
	byte: 1,
	short: 2,
	int: 3,
	long: 4,
	float: 5,
	double: 6,
	byteArray: 7,
	string: 8,
	list: 9,
	compound: 10,
	intArray: 11,
	longArray: 12,
} as const satisfies Record<NbtTagType | "end", number>;

/** Lowest id available to registered extension types. */
export const FIRST_CUSTOM_ID = 13;

/** Highest id the one-byte type field can carry. */
export const MAX_TYPE_ID = 255;

export const DEFAULT_MAX_DEPTH = 512;

// ─── Individual tag types ───────────────────────────────────────────────────

export type NbtByte = { readonly type: "byte"; value: number };
export type NbtShort = { readonly type: "short"; value: number };
export type NbtInt = { readonly type: "int"; value: number };
export type NbtLong = { readonly type: "long"; value: bigint };
export type NbtFloat = { readonly type: "float"; value: number };
export type NbtDouble = { readonly type: "double"; value: number };
export type NbtString = { readonly type: "string"; value: string };
export type NbtByteArray = { readonly type: "byteArray"; value: number[] };
export type NbtIntArray = { readonly type: "intArray"; value: number[] };
export type NbtLongArray = { readonly type: "longArray"; value: bigint[] };
export type NbtList = {
	readonly type: "list";
	/** Element type id; `TAG_ID.end` for a list declared without one. */
	readonly elementId: number;
	value: NbtTag[];
};
export type NbtCompound = {
	readonly type: "compound";
	value: Map<string, NbtTag>;
};

/** Tag of a registered extension type; `value` is interpreted by its behavior. */
export type NbtCustom<V = unknown> = {
	readonly type: "custom";
	readonly id: number;
	value: V;
};

// ─── Union types ────────────────────────────────────────────────────────────

export type NbtTag =
	| NbtByte
	| NbtShort
	| NbtInt
	| NbtLong
	| NbtFloat
	| NbtDouble
	| NbtString
	| NbtByteArray
	| NbtIntArray
	| NbtLongArray
	| NbtList
	| NbtCompound
	| NbtCustom;

// ─── Root NBT (compound with a name) ───────────────────────────────────────

export type NbtRoot = NbtCompound & { name: string };

// ─── Read result (value + bytes consumed) ───────────────────────────────────

export type ReadResult<T> = { readonly value: T; readonly size: number };

// ─── Compression framing ────────────────────────────────────────────────────

export type NbtCompression = "none" | "gzip" | "zlib";

export type NbtReadResult = {
	readonly root: NbtRoot;
	readonly compression: NbtCompression;
	readonly bytesRead: number;
};

// ─── SNBT configuration ─────────────────────────────────────────────────────

export type SnbtConfig = {
	readonly prettyPrint: boolean;
	/** Indentation unit used in pretty mode. */
	readonly indent: string;
	/** Lists and arrays up to this length stay on one line in pretty mode. */
	readonly inlineThreshold: number;
	/** Quote every compound key, even plain identifiers. */
	readonly quoteKeys: boolean;
};

export const DEFAULT_SNBT_CONFIG: SnbtConfig = {
	prettyPrint: false,
	indent: "    ",
	inlineThreshold: 8,
	quoteKeys: false,
};

// ─── JSON boundary ──────────────────────────────────────────────────────────

export type JsonValue =
	| null
	| boolean
	| number
	| string
	| JsonValue[]
	| { [key: string]: JsonValue };
