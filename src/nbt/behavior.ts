import { NbtError, type NbtErrorLocation } from "./errors.ts";
import type { JsonValue, NbtTag, ReadResult, SnbtConfig } from "./types.ts";

// ─── Traversal context ──────────────────────────────────────────────────────

export type TagContext = {
	readonly registry: TagTypeRegistry;
	/** Nesting level of the tag being processed; the root compound is 0. */
	readonly depth: number;
	readonly maxDepth: number;
};

export type SnbtContext = TagContext & { readonly config: SnbtConfig };

/**
 * Called by every container (compound, list, typed array) before it
 * touches its children. Returns the context for those children.
 */
export const enterContainer = <C extends TagContext>(
	ctx: C,
	location: NbtErrorLocation | (() => NbtErrorLocation) = {},
): C => {
	if (ctx.depth > ctx.maxDepth)
		throw new NbtError(
			"NestingTooDeep",
			`Nesting depth ${ctx.depth} exceeds maximum of ${ctx.maxDepth}`,
			typeof location === "function" ? location() : location,
		);
	return { ...ctx, depth: ctx.depth + 1 };
};

// ─── Behavior bundle ────────────────────────────────────────────────────────

/**
 * Everything the codec knows about one type id. Payload readers and writers
 * never see the type id or the name: those belong to the enclosing compound
 * (or to the list header).
 */
export type TagBehavior<T extends NbtTag = NbtTag> = {
	readonly id: number;
	/** Human-readable name, e.g. `TAG_Int`. */
	readonly label: string;
	/** Zero value of the type. */
	create(): T;
	read(buf: Buffer, offset: number, ctx: TagContext): ReadResult<T>;
	/** Encoded payload size in bytes. */
	sizeOf(tag: T, ctx: TagContext): number;
	/** Returns the offset just past the payload. */
	write(tag: T, buf: Buffer, offset: number, ctx: TagContext): number;
	toSnbt(tag: T, ctx: SnbtContext): string;
	toJson(tag: T, ctx: TagContext): JsonValue;
	/**
	 * Prefix of the bracketed SNBT literal `[<snbtTag>;e0,e1,...]` this type
	 * parses from. Types without one cannot be read back from SNBT.
	 */
	readonly snbtTag?: string;
	fromSnbt?(elements: readonly NbtTag[], position: number): T;
};

// ─── Registry ───────────────────────────────────────────────────────────────

export type TagTypeRegistry = {
	/** Throws `DuplicateTypeId` for an id that is already taken. */
	readonly register: <T extends NbtTag>(behavior: TagBehavior<T>) => TagTypeRegistry;
	/** Throws `UnknownTypeId` for an unregistered id. */
	readonly resolve: (id: number, offset?: number) => TagBehavior;
	readonly has: (id: number) => boolean;
	readonly ids: () => number[];
	readonly findBySnbtTag: (snbtTag: string) => TagBehavior | undefined;
	/** Independent copy; later registrations on either side stay private. */
	readonly clone: () => TagTypeRegistry;
};
