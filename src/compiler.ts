import { Ast, type Func } from "./ast.ts";
import { CodeGen } from "./codegen.ts";
import { CodeSource } from "./codesource.ts";
import { CType } from "./ctypes.ts";
import { Parser } from "./parser.ts";
import { annotate, caret, type Colors, colorsFor, defaultHighlight, highlight } from "./reporter.ts";
import { Token, Tokenizer } from "./tokens.ts";
import { Problem } from "./utils.ts";

export enum CompileResultType {
	Ok = "Ok",
	Error = "Error",
}

export type CompileOk = {
	type: CompileResultType.Ok;
	asm: string;
};

export type CompileFailure = {
	type: CompileResultType.Error;
	source: CodeSource;
	name: string;
	note: string;
	start: number;
	end: number;
};

export type CompileResult = CompileOk | CompileFailure;

export type CompilerOptions = {
	/** Dump tokens and the typed AST to stderr. */
	debug: boolean;
	/** Render diagnostics with a line-numbered gutter. */
	pretty: boolean;
	color: boolean;
};

export type Compiler = CompilerOptions & {
	colors: Colors;
	log: (message: string) => void;
};

export const Compiler = { create, compile, printError, reportError };

function create(
	options: Partial<CompilerOptions> = {},
	log: (message: string) => void = console.error
): Compiler {
	const color = options.color ?? false;
	return {
		debug: options.debug ?? false,
		pretty: options.pretty ?? false,
		color,
		colors: colorsFor(color),
		log,
	};
}

function compile(c: Compiler, source: string | CodeSource): CompileResult {
	const s = typeof source === "string" ? CodeSource.fromString(source) : source;
	try {
		if (c.debug) {
			c.log(c.colors.green("Debug: Source"));
			c.log(highlight(s.content, defaultHighlight(c.colors)));
			const cp = CodeSource.checkpoint(s);
			printTokens(c, Tokenizer.tokenize(s));
			CodeSource.restore(s, cp);
		}
		const fn = Parser.parse(s);
		if (c.debug) {
			printFunc(c, fn);
		}
		return { type: CompileResultType.Ok, asm: CodeGen.generate(fn) };
	} catch (error) {
		if (error instanceof Problem) {
			return {
				type: CompileResultType.Error,
				source: s,
				name: error.constructor.name,
				note: error.note,
				start: error.start,
				end: error.end,
			};
		}
		throw error;
	}
}

function printError(c: Compiler, error: CompileFailure): string {
	if (!c.pretty) {
		return caret(error.source.content, error.start, error.note);
	}
	const red = c.colors.red;
	const annotated = annotate(error.source.content, {
		path: error.source.path,
		start: error.start,
		end: error.end,
		note: error.note,
		fmt: red,
		colors: c.colors,
	});
	return `${red(error.name)}:\n${annotated}`;
}

function reportError(c: Compiler, error: CompileFailure): void {
	c.log(printError(c, error));
}

function printTokens(c: Compiler, tokens: Token[]): void {
	const { green } = c.colors;
	c.log(green("Debug: Tokens"));
	c.log(tokens.map(Token.print).join("\n"));
}

function printFunc(c: Compiler, fn: Func): void {
	const { green } = c.colors;
	c.log(green(`Debug: ${fn.name}: ${CType.print(fn.type)}`));
	for (const local of fn.locals) {
		c.log(`  ${local.name}: ${CType.print(local.type)}`);
	}
	c.log(green("Debug: AST"));
	c.log(Ast.print(fn.body));
}
