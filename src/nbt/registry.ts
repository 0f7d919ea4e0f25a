import type { TagBehavior, TagTypeRegistry } from "./behavior.ts";
import { BUILTIN_BEHAVIORS } from "./builtins.ts";
import { NbtError } from "./errors.ts";
import type { NbtTag } from "./types.ts";
import { FIRST_CUSTOM_ID, MAX_TYPE_ID } from "./types.ts";

const fromBehaviors = (
	initial: Iterable<readonly [number, TagBehavior]>,
): TagTypeRegistry => {
	const behaviors = new Map<number, TagBehavior>(initial);
	const bySnbtTag = new Map<string, TagBehavior>();
	for (const behavior of behaviors.values())
		if (behavior.snbtTag !== undefined) bySnbtTag.set(behavior.snbtTag, behavior);

	const register = <T extends NbtTag>(
		behavior: TagBehavior<T>,
	): TagTypeRegistry => {
		const { id, snbtTag } = behavior;
		if (Number.isInteger(id) && id >= 0 && id < FIRST_CUSTOM_ID)
			throw new NbtError(
				"DuplicateTypeId",
				`Type id ${id} is reserved for a built-in type`,
			);
		if (!Number.isInteger(id) || id < 0 || id > MAX_TYPE_ID)
			throw new NbtError(
				"ValueOutOfRange",
				`Custom type ids must be integers in ${FIRST_CUSTOM_ID}..${MAX_TYPE_ID}, got ${id}`,
			);
		const existing = behaviors.get(id);
		if (existing)
			throw new NbtError(
				"DuplicateTypeId",
				`Type id ${id} is already registered as ${existing.label}`,
			);
		if (snbtTag !== undefined && bySnbtTag.has(snbtTag))
			throw new NbtError(
				"DuplicateTypeId",
				`SNBT tag "${snbtTag}" is already used by ${bySnbtTag.get(snbtTag)?.label}`,
			);
		behaviors.set(id, behavior);
		if (snbtTag !== undefined) bySnbtTag.set(snbtTag, behavior);
		return registry;
	};

	const resolve = (id: number, offset?: number): TagBehavior => {
		const behavior = behaviors.get(id);
		if (!behavior)
			throw new NbtError("UnknownTypeId", `Unknown tag type id ${id}`, {
				offset,
			});
		return behavior;
	};

	const registry: TagTypeRegistry = {
		register,
		resolve,
		has: (id) => behaviors.has(id),
		ids: () => [...behaviors.keys()].sort((a, b) => a - b),
		findBySnbtTag: (snbtTag) => bySnbtTag.get(snbtTag),
		clone: () => fromBehaviors(behaviors),
	};
	return registry;
};

/** Registry holding the twelve built-in payload types (ids 1..12). */
export const createTagTypeRegistry = (): TagTypeRegistry =>
	fromBehaviors(BUILTIN_BEHAVIORS.map((b) => [b.id, b] as const));
