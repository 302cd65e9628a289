import pc from "picocolors";
import { CodeSource } from "./codesource.ts";
import { Tokenizer, TokenType } from "./tokens.ts";
import { Span } from "./utils.ts";

export type Fmt = (text: string) => string;

export type Colors = ReturnType<typeof pc.createColors>;

export type HighlightColors = Partial<Record<TokenType, Fmt>>;

export function colorsFor(enabled: boolean): Colors {
	return pc.createColors(enabled);
}

export function defaultHighlight(c: Colors): HighlightColors {
	return {
		[TokenType.Keyword]: c.magenta,
		[TokenType.Num]: c.yellow,
		[TokenType.Punc]: c.blue,
	};
}

/** Re-renders `source` with each token wrapped by its type's formatter. */
export function highlight(source: string, colors: HighlightColors): string {
	const tokens = Tokenizer.tokenize(CodeSource.fromString(source));
	let highlighted = "";
	let last = 0;
	for (const token of tokens) {
		highlighted += source.substring(last, token.start);
		const formatter = colors[token.type];
		highlighted += formatter ? formatter(token.image) : token.image;
		last = token.end;
	}
	return highlighted + source.substring(last);
}

/**
 * The offending source line, then a caret under `offset` followed by the
 * note:
 *
 * ```
 * { return 1+; }
 *            ^ expected an expression
 * ```
 */
export function caret(source: string, offset: number, note: string): string {
	const span = { start: offset, end: offset };
	const lineStart = Span.lineStartOf(source, span);
	let lineEnd = source.indexOf("\n", lineStart);
	if (lineEnd < 0) {
		lineEnd = source.length;
	}
	const line = source.substring(lineStart, lineEnd);
	const padding = tabAwarePadding(offset - lineStart, line);
	return `${line}\n${padding}^ ${note}`;
}

type Annotation = {
	start: number;
	end: number;
	path?: string;
	note?: string;
	fmt?: Fmt;
	colors?: Colors;
	overflow?: number;
};

export function annotate(source: string, annotation: Annotation): string {
	const { start, end, path, note, overflow } = annotation;
	const gray = annotation.colors?.gray ?? identity;
	if (start < 0 || end < 0 || start > end || end > source.length) {
		throw new Error(
			`Cannot annotate (${start}, ${end}] for content of length ${source.length}!`
		);
	}
	// Gather the context
	let ctxStart = 0;
	let ctxEnd = source.length;
	let lineNo = 1;
	let colNo = 1;
	for (let i = 0; i < source.length; i++) {
		const c = source[i];
		if (c === "\n") {
			if (i >= end) {
				ctxEnd = i;
				break;
			}
			if (i < start) {
				ctxStart = i + 1;
				colNo = 1;
			}
			lineNo += 1;
		} else if (i < start) {
			colNo += 1;
		}
	}
	// Render the annotation
	let ctx = source.substring(ctxStart, ctxEnd);
	const fmt = annotation.fmt ?? identity;
	if (annotation.fmt) {
		const prefix = ctx.substring(0, start - ctxStart);
		const span = ctx.substring(start - ctxStart, end - ctxStart);
		const suffix = ctx.substring(end - ctxStart);
		ctx = `${prefix}${fmt(span)}${suffix}`;
	}
	const ctxLines = ctx.split("\n");
	const firstLineNo = lineNo - ctxLines.length + 1;
	const padding = " ".repeat(` ${lineNo}`.length);
	const annotated: string[] = [];
	if (path) {
		annotated.push(gray(`${padding}--> ${path}:${firstLineNo}:${colNo}`));
	}
	annotated.push(gray(`${padding} |`));
	let n = firstLineNo;
	for (const line of ctxLines) {
		annotated.push(` ${gray(`${n}`.padEnd(`${lineNo}`.length))} ${gray("|")} ${line}`);
		n += 1;
	}
	const lastLine = ctxLines[ctxLines.length - 1];
	const underStart = ctxLines.length === 1 ? colNo - 1 : 0;
	const underPadding = tabAwarePadding(underStart, lastLine);
	const marker = `${padding} ${gray("|")} ${underPadding}${fmt("^")} `;
	if (!note) {
		annotated.push(marker);
	} else if (marker.length + note.length < (overflow ?? 80)) {
		annotated.push(`${marker}${fmt(note)}`);
	} else {
		annotated.push(marker);
		annotated.push(`${padding} ${gray("|")}${underPadding} ${fmt(note)}`);
	}
	return annotated.join("\n");
}

function identity(text: string): string {
	return text;
}

function tabAwarePadding(length: number, text: string): string {
	let padded = "";
	for (let i = 0; i < length; i++) {
		padded += text[i] === "\t" ? "\t" : " ";
	}
	return padded;
}
