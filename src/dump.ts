import minimist from "minimist";
import * as z from "zod";

import { debugLog } from "./debug.js";
import * as ebml from "./ebml/index.js";
import * as matroska from "./matroska/index.js";
import { CacheSource, FileSource, type ByteSource } from "./source/index.js";

const usage = "usage: ebml-dump <file> [--depth N] [--indent S] [--hex-limit N] [--summary]";

const argsSchema = z.object({
	_: z.tuple([z.string()]).transform((args) => args[0]),
	depth: z.number().int().nonnegative().optional(),
	indent: z.union([z.string(), z.number().int().nonnegative()]).optional(),
	"hex-limit": z.number().int().nonnegative().optional(),
	summary: z.boolean(),
});

export interface OpenedSource extends ByteSource {
	close(): void;
}

export interface DumpIO {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	open: (path: string) => OpenedSource;
}

const defaultIO: DumpIO = {
	stdout: (text) => process.stdout.write(text),
	stderr: (text) => process.stderr.write(text),
	open: (path) => FileSource.open(path),
};

/**
 * Dumps one file as XML, or as a summary with --summary. Returns the process exit code.
 */
export function runDump(argv: string[], io: DumpIO = defaultIO): number {
	const parsedArgs = argsSchema.safeParse(minimist(argv, { boolean: ["summary"], string: ["_"] }));
	if (!parsedArgs.success) {
		io.stderr(`${usage}\n`);
		return 2;
	}
	const args = parsedArgs.data;

	const raw = io.open(args._);
	try {
		const source = new CacheSource(raw);
		debugLog("cli", `parsing ${args._} (${source.size} bytes)`);
		const result = matroska.File.safeParse(source);
		if (!result.success) {
			io.stderr(`${args._}: ${result.error.message}\n`);
			return 1;
		}
		if (args.summary) {
			io.stdout(matroska.formatSummary(matroska.summarize(result.file)));
		} else {
			io.stdout(result.file.toXML({ maxDepth: args.depth, indent: args.indent, hexLimit: args["hex-limit"] }));
		}
		return 0;
	} catch (err) {
		// views decode lazily, so field errors surface while printing
		if (err instanceof ebml.EbmlError) {
			io.stderr(`${args._}: ${err.message}\n`);
			return 1;
		}
		throw err;
	} finally {
		raw.close();
	}
}
