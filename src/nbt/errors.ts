export type NbtErrorKind =
	| "UnknownTypeId"
	| "DuplicateTypeId"
	| "UnexpectedEndTag"
	| "InvalidRoot"
	| "MalformedString"
	| "NegativeLength"
	| "UnexpectedEof"
	| "NestingTooDeep"
	| "UnsupportedCompression"
	| "DecompressionFailed"
	| "ListTypeMismatch"
	| "ValueOutOfRange"
	| "InvalidJson"
	| "IoError"
	| "UnexpectedToken"
	| "UnterminatedString"
	| "InvalidNumber";

/** Where in the input a failure happened. */
export type NbtErrorLocation = {
	/** Byte offset into the (decompressed) binary stream. */
	readonly offset?: number;
	/** Character index into SNBT text. */
	readonly position?: number;
	/** 1-based line of `position`. */
	readonly line?: number;
	/** 1-based column of `position`. */
	readonly column?: number;
};

/**
 * Error thrown by every codec operation. Failures are terminal: the
 * operation that threw produced no tree.
 */
export class NbtError extends Error {
	readonly offset?: number;
	readonly position?: number;
	readonly line?: number;
	readonly column?: number;

	constructor(
		public readonly kind: NbtErrorKind,
		message: string,
		location: NbtErrorLocation = {},
		public readonly cause?: unknown,
	) {
		super(`${message}${describeLocation(location)}`);
		this.name = "NbtError";
		this.offset = location.offset;
		this.position = location.position;
		this.line = location.line;
		this.column = location.column;
	}
}

const describeLocation = (location: NbtErrorLocation): string => {
	if (location.line !== undefined && location.column !== undefined)
		return ` at line ${location.line}, column ${location.column}`;
	if (location.position !== undefined)
		return ` at position ${location.position}`;
	if (location.offset !== undefined) return ` at byte offset ${location.offset}`;
	return "";
};

export const isNbtError = (error: unknown, kind?: NbtErrorKind): boolean =>
	error instanceof NbtError && (kind === undefined || error.kind === kind);
