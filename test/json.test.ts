import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
	compoundGet,
	createNbt,
	equalNbt,
	isNbtError,
	nbtByte,
	nbtByteArray,
	nbtCompound,
	nbtDouble,
	nbtFloat,
	nbtInt,
	nbtList,
	nbtLong,
	nbtLongArray,
	nbtRoot,
	nbtString,
	TAG_ID,
} from "../src/nbt/index.ts";

const nbt = createNbt();

const caughtError = (fn: () => unknown): unknown => {
	try {
		fn();
	} catch (err) {
		return err;
	}
	return undefined;
};

describe("toJson", () => {
	it("flattens tags to plain JSON", () => {
		const root = nbtRoot({
			a: nbtInt(42),
			l: nbtLong(5n),
			f: nbtFloat(1.5),
			s: nbtString("x"),
			ba: nbtByteArray([1, 2]),
			la: nbtLongArray([7n]),
			list: nbtList([nbtInt(1), nbtInt(2), nbtInt(3)]),
			c: nbtCompound({ d: nbtDouble(0.5) }),
		});
		expect(nbt.toJson(root)).toEqual({
			a: 42,
			l: 5,
			f: 1.5,
			s: "x",
			ba: [1, 2],
			la: [7],
			list: [1, 2, 3],
			c: { d: 0.5 },
		});
	});

	it("renders bytes as numbers", () => {
		expect(nbt.toJson(nbtByte(1))).toBe(1);
	});
});

describe("fromJson", () => {
	it("widens numbers to the smallest fitting kind", () => {
		const root = nbt.fromJson({
			a: 42,
			big: 3000000000,
			frac: 0.5,
			flag: true,
			s: "x",
		});
		expect([...root.value]).toEqual([
			["a", nbtInt(42)],
			["big", nbtLong(3000000000n)],
			["frac", nbtDouble(0.5)],
			["flag", nbtByte(1)],
			["s", nbtString("x")],
		]);
	});

	it("widens numeric arrays to a common element type", () => {
		const root = nbt.fromJson({
			ints: [1, 2],
			longs: [1, 3000000000],
			doubles: [1, 0.5],
			empty: [],
		});
		expect(compoundGet(root, "ints")).toEqual(nbtList([nbtInt(1), nbtInt(2)]));
		expect(compoundGet(root, "longs")).toEqual({
			type: "list",
			elementId: TAG_ID.long,
			value: [nbtLong(1n), nbtLong(3000000000n)],
		});
		expect(compoundGet(root, "doubles")).toEqual({
			type: "list",
			elementId: TAG_ID.double,
			value: [nbtDouble(1), nbtDouble(0.5)],
		});
		expect(compoundGet(root, "empty")).toEqual(nbtList());
	});

	it("converts nested objects to compounds", () => {
		const root = nbt.fromJson({ obj: { k: "v" }, list: [{ n: 1 }] });
		expect(
			equalNbt(
				root,
				nbtRoot({
					obj: nbtCompound({ k: nbtString("v") }),
					list: nbtList([nbtCompound({ n: nbtInt(1) })]),
				}),
			),
		).toBe(true);
	});

	it("rejects null", () => {
		expect(
			isNbtError(caughtError(() => nbt.fromJson({ a: null })), "InvalidJson"),
		).toBe(true);
	});

	it("requires an object at the top level", () => {
		expect(isNbtError(caughtError(() => nbt.fromJson([1])), "InvalidJson")).toBe(
			true,
		);
		expect(isNbtError(caughtError(() => nbt.fromJson("x")), "InvalidJson")).toBe(
			true,
		);
	});

	it("rejects arrays mixing strings and numbers", () => {
		expect(
			isNbtError(
				caughtError(() => nbt.fromJson({ mixed: ["a", 1] })),
				"ListTypeMismatch",
			),
		).toBe(true);
	});

	it("applies the nesting limit", () => {
		const shallow = nbt.withOptions({ maxDepth: 1 });
		expect(compoundGet(shallow.fromJson({ a: { b: 1 } }), "a")).toEqual(
			nbtCompound({ b: nbtInt(1) }),
		);
		expect(
			isNbtError(
				caughtError(() => shallow.fromJson({ a: { b: { c: 1 } } })),
				"NestingTooDeep",
			),
		).toBe(true);
	});
});

describe("JSON files", () => {
	let dir = "";

	beforeAll(async () => {
		dir = await mkdtemp(join(tmpdir(), "nbt-json-"));
	});

	afterAll(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("writes indented JSON with a trailing newline", async () => {
		const path = join(dir, "out.json");
		await nbt.toJsonFile(nbtRoot({ b: nbtByte(1) }), path);
		expect(await readFile(path, "utf8")).toBe('{\n  "b": 1\n}\n');
	});

	it("reads a file back with lossy widening", async () => {
		const path = join(dir, "roundtrip.json");
		await nbt.toJsonFile(nbtRoot({ b: nbtByte(1) }), path);
		expect(compoundGet(await nbt.fromJsonFile(path), "b")).toEqual(nbtInt(1));
	});

	it("rejects malformed JSON text", async () => {
		const path = join(dir, "broken.json");
		await writeFile(path, "{ not json");
		let caught: unknown;
		try {
			await nbt.fromJsonFile(path);
		} catch (err) {
			caught = err;
		}
		expect(isNbtError(caught, "InvalidJson")).toBe(true);
	});
});
