import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
	createNbt,
	equalNbt,
	isNbtError,
	NbtError,
	nbtByte,
	nbtByteArray,
	nbtCompound,
	nbtDouble,
	nbtFloat,
	nbtInt,
	nbtIntArray,
	nbtList,
	nbtLong,
	nbtLongArray,
	nbtRoot,
	nbtShort,
	nbtString,
	quoteSnbtString,
	TAG_ID,
} from "../src/nbt/index.ts";

const nbt = createNbt();

const catchNbtError = (fn: () => unknown): NbtError => {
	try {
		fn();
	} catch (err) {
		if (err instanceof NbtError) return err;
		throw err;
	}
	throw new Error("expected an NbtError");
};

describe("toSnbt", () => {
	it("renders compact SNBT", () => {
		const root = nbtRoot({
			a: nbtInt(42),
			list: nbtList([nbtInt(1), nbtInt(2), nbtInt(3)]),
		});
		expect(nbt.toSnbt(root)).toBe("{a:42,list:[1,2,3]}");
	});

	it("suffixes every numeric kind", () => {
		const root = nbtRoot({
			b: nbtByte(1),
			s: nbtShort(2),
			l: nbtLong(3n),
			f: nbtFloat(1.5),
			d: nbtDouble(2.5),
			dd: nbtDouble(2),
			str: nbtString("hi"),
			ba: nbtByteArray([1, -2]),
			ia: nbtIntArray([3]),
			la: nbtLongArray([4n]),
			e: nbtList(),
		});
		expect(nbt.toSnbt(root)).toBe(
			'{b:1b,s:2s,l:3l,f:1.5f,d:2.5,dd:2d,str:"hi",ba:[B;1b,-2b],ia:[I;3],la:[L;4l],e:[]}',
		);
	});

	it("uses the shortest float text that reads back", () => {
		expect(nbt.toSnbt(nbtFloat(0.1))).toBe("0.1f");
		expect(nbt.toSnbt(nbtDouble(-0))).toBe("-0.0");
	});

	it("renders an empty root as {}", () => {
		expect(nbt.toSnbt(nbtRoot())).toBe("{}");
	});

	it("is deterministic", () => {
		const root = nbtRoot({ z: nbtInt(1), a: nbtCompound({ q: nbtByte(0) }) });
		expect(nbt.toSnbt(root)).toBe(nbt.toSnbt(root));
		expect(nbt.toSnbt(root)).toBe("{z:1,a:{q:0b}}");
	});
});

describe("quoting", () => {
	it("quotes keys outside the plain character set", () => {
		const root = nbtRoot({ "my key": nbtInt(1), "a.b-c+d_e": nbtInt(2) });
		expect(nbt.toSnbt(root)).toBe('{"my key":1,a.b-c+d_e:2}');
	});

	it("quotes every key when configured", () => {
		const quoted = nbt.withOptions({ snbt: { quoteKeys: true } });
		expect(quoted.toSnbt(nbtRoot({ a: nbtInt(42) }))).toBe('{"a":42}');
	});

	it("double-quotes and escapes quotes and backslashes", () => {
		expect(quoteSnbtString('say "hi"')).toBe('"say \\"hi\\""');
		expect(quoteSnbtString("it's")).toBe(`"it's"`);
		expect(quoteSnbtString(`it's "x"`)).toBe(`"it's \\"x\\""`);
		expect(quoteSnbtString("a\\b")).toBe('"a\\\\b"');
		expect(quoteSnbtString("")).toBe('""');
	});

	it("reads quoted strings back", () => {
		for (const value of ['say "hi"', `it's "x"`, "a\\b", "line\nbreak"]) {
			const root = nbtRoot({ s: nbtString(value) });
			expect(equalNbt(nbt.fromSnbt(nbt.toSnbt(root)), root)).toBe(true);
		}
	});
});

describe("pretty printing", () => {
	const pretty = nbt.withOptions({ snbt: { prettyPrint: true } });

	it("puts one member per line and keeps short lists inline", () => {
		const root = nbtRoot({
			a: nbtInt(1),
			list: nbtList([nbtInt(1), nbtInt(2)]),
			c: nbtCompound(),
		});
		expect(pretty.toSnbt(root)).toBe(
			"{\n    a: 1,\n    list: [1, 2],\n    c: {}\n}",
		);
	});

	it("breaks lists longer than the inline threshold", () => {
		const narrow = pretty.withOptions({ snbt: { inlineThreshold: 2 } });
		const root = nbtRoot({ list: nbtList([nbtInt(1), nbtInt(2), nbtInt(3)]) });
		expect(narrow.toSnbt(root)).toBe(
			"{\n    list: [\n        1,\n        2,\n        3\n    ]\n}",
		);
		expect(equalNbt(narrow.fromSnbt(narrow.toSnbt(root)), root)).toBe(true);
	});

	it("honours a custom indent", () => {
		const tabbed = pretty.withOptions({ snbt: { indent: "\t" } });
		expect(tabbed.toSnbt(nbtRoot({ a: nbtCompound({ b: nbtInt(1) }) }))).toBe(
			"{\n\ta: {\n\t\tb: 1\n\t}\n}",
		);
	});
});

describe("fromSnbt", () => {
	it("parses the compact form", () => {
		const root = nbt.fromSnbt("{a:42,list:[1,2,3]}");
		expect(root.name).toBe("");
		expect(
			equalNbt(
				root,
				nbtRoot({
					a: nbtInt(42),
					list: nbtList([nbtInt(1), nbtInt(2), nbtInt(3)]),
				}),
			),
		).toBe(true);
	});

	it("tolerates whitespace between tokens", () => {
		const root = nbt.fromSnbt(" { a : 42 , list : [ 1 , 2 , 3 ] } ");
		expect(nbt.toSnbt(root)).toBe("{a:42,list:[1,2,3]}");
	});

	it("reads back every numeric kind", () => {
		const text =
			'{b:1b,s:2s,l:3l,f:1.5f,d:2.5,dd:2d,str:"hi",ba:[B;1b,-2b],ia:[I;3],la:[L;4l],e:[]}';
		expect(nbt.toSnbt(nbt.fromSnbt(text))).toBe(text);
	});

	it("keeps an empty list typed as End", () => {
		expect(nbt.parseSnbtTag("[]")).toEqual({
			type: "list",
			elementId: TAG_ID.end,
			value: [],
		});
	});

	it("allows whitespace inside a typed array header", () => {
		expect(nbt.parseSnbtTag("[ I ; 1 , 2 ]")).toEqual(nbtIntArray([1, 2]));
		expect(nbt.parseSnbtTag("[\nL;3l]")).toEqual(nbtLongArray([3n]));
	});

	it("roundtrips NaN and signed zero", () => {
		const root = nbtRoot({
			f: nbtFloat(Number.NaN),
			d: nbtDouble(Number.NaN),
			z: nbtDouble(-0),
			zf: nbtFloat(-0),
			i: nbtDouble(-Infinity),
		});
		const text = nbt.toSnbt(root);
		expect(text).toBe("{f:NaNf,d:NaNd,z:-0.0,zf:-0.0f,i:-Infinityd}");
		expect(equalNbt(nbt.fromSnbt(text), root)).toBe(true);
		expect(equalNbt(nbt.parseSnbtTag("0.0"), nbtDouble(-0))).toBe(false);
	});

	it("accepts quoted keys", () => {
		const root = nbt.fromSnbt(`{"my key":1,'other':2}`);
		expect([...root.value.keys()]).toEqual(["my key", "other"]);
	});
});

describe("literals", () => {
	const value = (text: string) => nbt.parseSnbtTag(text);

	it("classifies integers by suffix", () => {
		expect(value("127b")).toEqual(nbtByte(127));
		expect(value("-5S")).toEqual(nbtShort(-5));
		expect(value("7")).toEqual(nbtInt(7));
		expect(value("2147483648l")).toEqual(nbtLong(2147483648n));
	});

	it("classifies decimals", () => {
		expect(value("1e3")).toEqual(nbtDouble(1000));
		expect(value("3f")).toEqual(nbtFloat(3));
		expect(value("1.5D")).toEqual(nbtDouble(1.5));
		expect(value("-.5")).toEqual(nbtDouble(-0.5));
	});

	it("maps booleans to bytes", () => {
		expect(value("true")).toEqual(nbtByte(1));
		expect(value("false")).toEqual(nbtByte(0));
	});

	it("treats other bare words as strings", () => {
		expect(value("hello")).toEqual(nbtString("hello"));
		expect(value("1.2.3")).toEqual(nbtString("1.2.3"));
		expect(value("NaN")).toEqual(nbtString("NaN"));
	});

	it("accepts NaN and Infinity only with a suffix", () => {
		const nan = value("NaNd");
		expect(nan.type === "double" && Number.isNaN(nan.value)).toBe(true);
		expect(value("-Infinityf")).toEqual(nbtFloat(-Infinity));
	});

	it("decodes escapes", () => {
		expect(value('"a\\tb\\u0041"')).toEqual(nbtString("a\tbA"));
	});
});

describe("parse errors", () => {
	it("rejects out-of-range integers", () => {
		const err = catchNbtError(() => nbt.fromSnbt("{a:1b,b:300b}"));
		expect(err.kind).toBe("InvalidNumber");
		expect(err.position).toBe(8);
		expect(catchNbtError(() => nbt.parseSnbtTag("2147483648")).kind).toBe(
			"InvalidNumber",
		);
	});

	it("rejects decimals that overflow", () => {
		expect(catchNbtError(() => nbt.parseSnbtTag("1e39f")).kind).toBe(
			"InvalidNumber",
		);
	});

	it("reports a missing closing brace", () => {
		const err = catchNbtError(() => nbt.fromSnbt("{a:1"));
		expect(err.kind).toBe("UnexpectedToken");
		expect(err.position).toBe(4);
	});

	it("reports an unterminated string at its opening quote", () => {
		const err = catchNbtError(() => nbt.fromSnbt('{a:"abc}'));
		expect(err.kind).toBe("UnterminatedString");
		expect(err.position).toBe(3);
		expect(err.line).toBe(1);
		expect(err.column).toBe(4);
		expect(err.message).toBe("Unterminated string at line 1, column 4");
	});

	it("reports line and column across line breaks", () => {
		const err = catchNbtError(() => nbt.fromSnbt("{\n  a: ?\n}"));
		expect(err.kind).toBe("UnexpectedToken");
		expect(err.position).toBe(7);
		expect(err.line).toBe(2);
		expect(err.column).toBe(6);
	});

	it("rejects mixed list element types", () => {
		const err = catchNbtError(() => nbt.parseSnbtTag('[1,"a"]'));
		expect(err.kind).toBe("ListTypeMismatch");
		expect(err.position).toBe(3);
	});

	it("rejects non-integral typed array elements", () => {
		expect(catchNbtError(() => nbt.parseSnbtTag("[I;1,2.5]")).kind).toBe(
			"ListTypeMismatch",
		);
		expect(catchNbtError(() => nbt.parseSnbtTag("[B;1,300]")).kind).toBe(
			"InvalidNumber",
		);
	});

	it("rejects trailing input", () => {
		const err = catchNbtError(() => nbt.fromSnbt("{} x"));
		expect(err.kind).toBe("UnexpectedToken");
		expect(err.position).toBe(3);
	});

	it("rejects an invalid escape", () => {
		expect(catchNbtError(() => nbt.parseSnbtTag('"\\q"')).kind).toBe(
			"UnexpectedToken",
		);
	});

	it("requires a compound at the top level of a document", () => {
		expect(catchNbtError(() => nbt.fromSnbt("[1]")).kind).toBe("InvalidRoot");
	});
});

describe("nesting depth", () => {
	const shallow = nbt.withOptions({ maxDepth: 2 });

	it("parses a document exactly at the maximum depth", () => {
		expect(shallow.toSnbt(shallow.fromSnbt("{c:{c:{}}}"))).toBe("{c:{c:{}}}");
	});

	it("rejects one level beyond the maximum", () => {
		expect(catchNbtError(() => shallow.fromSnbt("{c:{c:{c:{}}}}")).kind).toBe(
			"NestingTooDeep",
		);
	});

	it("counts typed arrays as a level", () => {
		const tight = nbt.withOptions({ maxDepth: 1 });
		expect(tight.fromSnbt("{a:[I;1,2]}").value.get("a")).toEqual(
			nbtIntArray([1, 2]),
		);
		const err = catchNbtError(() => tight.fromSnbt("{a:[I;[I;1]]}"));
		expect(err.kind).toBe("NestingTooDeep");
		expect(err.position).toBe(6);
		expect(
			catchNbtError(() => tight.fromSnbt("{a:[I;[I;[I;[I;[I;]]]]]}")).kind,
		).toBe("NestingTooDeep");
	});

	it("stops deeply nested typed arrays at the default limit", () => {
		const text = `{a:${"[I;".repeat(10000)}`;
		expect(catchNbtError(() => nbt.fromSnbt(text)).kind).toBe(
			"NestingTooDeep",
		);
	});

	it("rejects rendering a typed array beyond the maximum", () => {
		const tight = nbt.withOptions({ maxDepth: 1 });
		const root = nbtRoot({ l: nbtList([nbtIntArray([1])]) });
		expect(catchNbtError(() => tight.toSnbt(root)).kind).toBe(
			"NestingTooDeep",
		);
		expect(shallow.toSnbt(root)).toBe("{l:[[I;1]]}");
	});

	it("rejects rendering a tree beyond the maximum", () => {
		const root = nbtRoot({
			c: nbtCompound({ c: nbtCompound({ c: nbtCompound() }) }),
		});
		expect(catchNbtError(() => shallow.toSnbt(root)).kind).toBe(
			"NestingTooDeep",
		);
	});
});

describe("SNBT files", () => {
	let dir = "";

	beforeAll(async () => {
		dir = await mkdtemp(join(tmpdir(), "nbt-snbt-"));
	});

	afterAll(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("reads a document from disk", async () => {
		const path = join(dir, "doc.snbt");
		await writeFile(path, "{a:42,list:[1,2,3]}\n");
		expect(nbt.toSnbt(await nbt.fromSnbtFile(path))).toBe(
			"{a:42,list:[1,2,3]}",
		);
	});

	it("wraps a missing file as IoError", async () => {
		let caught: unknown;
		try {
			await nbt.fromSnbtFile(join(dir, "missing.snbt"));
		} catch (err) {
			caught = err;
		}
		expect(isNbtError(caught, "IoError")).toBe(true);
	});
});
