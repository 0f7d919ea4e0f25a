import { extname } from "node:path";
import {
	createNbt,
	isNbtError,
	type Nbt,
	parseCompression,
} from "./nbt/index.ts";

export type CliIo = {
	readonly log: (line: string) => void;
	readonly error: (line: string) => void;
};

const USAGE = [
	"Usage:",
	"  nbt snbt <file> [--pretty]        print a file as SNBT",
	"  nbt json <file>                   print a file as JSON",
	"  nbt info <file>                   print compression, root name and size",
	"  nbt convert <in> <out> [--compression none|gzip|zlib]",
	"                                    write binary NBT from .snbt or .json",
].join("\n");

const optionValue = (
	args: readonly string[],
	flag: string,
): string | undefined => {
	const index = args.indexOf(flag);
	return index === -1 ? undefined : args[index + 1];
};

const positionals = (args: readonly string[]): string[] => {
	const out: string[] = [];
	for (let i = 0; i < args.length; i++) {
		if (args[i] === "--compression") i++;
		else if (!args[i].startsWith("--")) out.push(args[i]);
	}
	return out;
};

const runCommand = async (
	nbt: Nbt,
	command: string,
	args: readonly string[],
	io: CliIo,
): Promise<number> => {
	const [input, output] = positionals(args);
	if (!input) {
		io.error(USAGE);
		return 2;
	}

	switch (command) {
		case "snbt": {
			const pretty = args.includes("--pretty");
			const root = await nbt.fromFile(input);
			io.log(nbt.withOptions({ snbt: { prettyPrint: pretty } }).toSnbt(root));
			return 0;
		}
		case "json": {
			const root = await nbt.fromFile(input);
			io.log(JSON.stringify(nbt.toJson(root), null, 2));
			return 0;
		}
		case "info": {
			const { root, compression, bytesRead } = await nbt.readFile(input);
			io.log(`compression: ${compression}`);
			io.log(`root name: ${JSON.stringify(root.name)}`);
			io.log(`entries: ${root.value.size}`);
			io.log(`bytes: ${bytesRead}`);
			return 0;
		}
		case "convert": {
			if (!output) {
				io.error(USAGE);
				return 2;
			}
			const compression = parseCompression(
				optionValue(args, "--compression") ?? "none",
			);
			const root =
				extname(input) === ".json"
					? await nbt.fromJsonFile(input)
					: await nbt.fromSnbtFile(input);
			await nbt.toFile(root, output, compression);
			io.log(`wrote ${output} (${compression})`);
			return 0;
		}
		default:
			io.error(`Unknown command: ${command}\n${USAGE}`);
			return 2;
	}
};

/** Run the command line tool; resolves to the process exit code. */
export const runCli = async (
	argv: readonly string[],
	io: CliIo = { log: console.log, error: console.error },
	nbt: Nbt = createNbt(),
): Promise<number> => {
	const [command, ...args] = argv;
	if (command === "--help") {
		io.log(USAGE);
		return 0;
	}
	if (!command) {
		io.error(USAGE);
		return 2;
	}
	try {
		return await runCommand(nbt, command, args, io);
	} catch (err) {
		if (!(err instanceof Error)) throw err;
		io.error(`[nbt] ${isNbtError(err) ? "" : "unexpected: "}${err.message}`);
		return 1;
	}
};
