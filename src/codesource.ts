import type { Span } from "./utils.ts";

/**
 * Program text plus the tokenizer's cursor. `start` marks the beginning of
 * the token being scanned and `end` the next unread character.
 */
export type CodeSource = {
	readonly path: string;
	readonly content: string;
	start: number;
	end: number;
};

export type Checkpoint = Span;

export type CharTest = (c: string) => boolean;

export const CodeSource = {
	fromString,
	hasMore,
	peek,
	advance,
	skipWhile,
	takeWhile,
	match,
	startScan,
	scanned,
	scannedSpan,
	checkpoint,
	restore,
};

function fromString(content: string, path: string = "<arg>"): CodeSource {
	return { path, content, start: 0, end: 0 };
}

function hasMore(s: CodeSource): boolean {
	return s.end < s.content.length;
}

function peek(s: CodeSource): string | undefined {
	return s.content[s.end];
}

function advance(s: CodeSource): string | undefined {
	return s.content[s.end++];
}

/** Moves past every leading character satisfying `test`; returns how many. */
function skipWhile(s: CodeSource, test: CharTest): number {
	const from = s.end;
	while (hasMore(s) && test(s.content[s.end])) {
		s.end++;
	}
	return s.end - from;
}

function takeWhile(s: CodeSource, test: CharTest): string {
	const from = s.end;
	skipWhile(s, test);
	return s.content.substring(from, s.end);
}

function match(s: CodeSource, literal: string): boolean {
	if (!s.content.startsWith(literal, s.end)) {
		return false;
	}
	s.end += literal.length;
	return true;
}

function startScan(s: CodeSource): void {
	s.start = s.end;
}

function scanned(s: CodeSource): string {
	return s.content.substring(s.start, s.end);
}

function scannedSpan(s: CodeSource): Span {
	return { start: s.start, end: s.end };
}

function checkpoint(s: CodeSource): Checkpoint {
	return { start: s.start, end: s.end };
}

function restore(s: CodeSource, c: Checkpoint): void {
	s.start = c.start;
	s.end = c.end;
}
