#!/usr/bin/env node
import { writeFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { Compiler, CompileResultType } from "./compiler.ts";

export const Usage = "usage: subc [--debug] [--pretty] [--color] [-o <file>] <source>";

export type Io = {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
};

const processIo: Io = {
	stdout: (text) => process.stdout.write(text),
	stderr: (text) => console.error(text),
};

function cli(args: string[]) {
	return yargs(args)
		.scriptName("subc")
		.command("$0 <source>", "Compile a C-subset program to x86-64 assembly")
		.positional("source", {
			demandOption: true,
			describe: "The program text",
			type: "string",
		})
		.env("SUBC")
		.options({
			color: {
				default: false,
				describe: "Colorize diagnostics",
				type: "boolean",
			},
			debug: {
				default: false,
				describe: "Dump tokens and the typed AST to stderr",
				type: "boolean",
			},
			output: {
				alias: "o",
				describe: "Write assembly to a file instead of stdout",
				type: "string",
			},
			pretty: {
				default: false,
				describe: "Render diagnostics with line numbers",
				type: "boolean",
			},
		})
		.check((argv) => {
			if (argv._.length > 0) {
				throw new Error("expected exactly one source argument");
			}
			return true;
		})
		.strict()
		.help(false)
		.version(false)
		.exitProcess(false)
		.fail((message, error) => {
			throw error ?? new Error(message);
		});
}

// Validation failures surface as a returned Error, whether yargs throws or rejects.
async function parseArgs(args: string[]) {
	try {
		return await cli(args).parseAsync();
	} catch (error) {
		return error instanceof Error ? error : new Error(String(error));
	}
}

/** Runs the compiler on `args`; resolves to the process exit code. */
export async function run(args: string[], io: Io = processIo): Promise<number> {
	const argv = await parseArgs(args);
	if (argv instanceof Error) {
		io.stderr(argv.message);
		io.stderr(Usage);
		return 1;
	}
	const compiler = Compiler.create(
		{ debug: argv.debug, pretty: argv.pretty, color: argv.color },
		io.stderr
	);
	const result = Compiler.compile(compiler, argv.source);
	if (result.type !== CompileResultType.Ok) {
		Compiler.reportError(compiler, result);
		return 1;
	}
	if (argv.output !== undefined) {
		await writeFile(argv.output, result.asm);
	} else {
		io.stdout(result.asm);
	}
	return 0;
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
	run(hideBin(process.argv)).then(
		(code) => {
			process.exitCode = code;
		},
		(error: unknown) => {
			console.error(error);
			process.exitCode = 1;
		}
	);
}
