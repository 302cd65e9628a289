export type Span = {
	start: number;
	end: number;
};

export const Span = { lineOf, columnOf, lineStartOf };

function lineOf(source: string, span: Span): number {
	let line = 0;
	for (let i = 0; i < span.start; i++) {
		if (source[i] === "\n") {
			line++;
		}
	}
	return line;
}

function columnOf(source: string, span: Span): number {
	return span.start - lineStartOf(source, span);
}

function lineStartOf(source: string, span: Span): number {
	return source.lastIndexOf("\n", span.start - 1) + 1;
}

export function alignTo(n: number, align: number): number {
	return Math.ceil(n / align) * align;
}

export function sexpr(v: unknown, ignoreKeys: string[] = []): string {
	if (v === undefined) {
		return "_";
	}
	if (typeof v !== "object" || v === null) {
		return `${v}`;
	}
	let mapped: string[];
	if (Array.isArray(v)) {
		mapped = v.map((vi) => sexpr(vi, ignoreKeys));
	} else {
		mapped = [];
		for (const [key, vk] of Object.entries(v)) {
			if (!ignoreKeys.includes(key)) {
				if (Array.isArray(vk)) {
					mapped.push(sexpr([key, ...vk], ignoreKeys));
				} else {
					mapped.push(sexpr(vk, ignoreKeys));
				}
			}
		}
	}
	const oneLine = `(${mapped.join(" ")})`;
	if (!oneLine.includes("\n") && oneLine.length <= 80) {
		return oneLine;
	}
	return `(${mapped.join("\n")})`.replaceAll("\n", "\n  ");
}

export class Problem extends Error {
	readonly start: number;
	readonly end: number;

	constructor(readonly note: string, span: Span) {
		super(note);
		this.start = span.start;
		this.end = span.end;
	}
}

export class LexError extends Problem {}

export class ParseError extends Problem {}

export class TypeError extends Problem {}

/** Broken code generator invariant, never a fault in the input program. */
export class CodegenError extends Problem {}
