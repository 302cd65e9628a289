import { CodeSource } from "./codesource.ts";
import { LexError, type Span } from "./utils.ts";

export enum TokenType {
	Id = "Id",
	Punc = "Punc",
	Keyword = "Keyword",
	Num = "Num",
	Eof = "Eof",
}

export type Token = {
	type: TokenType;
	image: string;
	value?: bigint;
} & Span;

export const Token = { print, equal };

function print(token: Token): string {
	return `(${token.type} \`${token.image}\` ${token.start}:${token.end})`;
}

function equal(token: Token, literal: string): boolean {
	return token.image === literal;
}

export const Keywords = new Set(["return", "if", "else", "for", "while", "int"]);

const Punctuators = ["==", "!=", "<=", ">="];

const Whitespace = " \t\n\v\f\r";

const Digits = "0123456789";

// Largest literal a 64-bit immediate holds.
const MaxInt = 2n ** 63n - 1n;

export const Tokenizer = { tokenize, nextToken, convertKeywords };

function tokenize(s: CodeSource): Token[] {
	const tokens: Token[] = [];
	let t = nextToken(s);
	while (t.type !== TokenType.Eof) {
		tokens.push(t);
		t = nextToken(s);
	}
	tokens.push(t);
	convertKeywords(tokens);
	return tokens;
}

function nextToken(s: CodeSource): Token {
	CodeSource.skipWhile(s, isWhitespace);
	CodeSource.startScan(s);
	const c = CodeSource.peek(s);
	if (c === undefined) {
		return tokenHere(s, TokenType.Eof);
	}
	if (isDigit(c)) {
		return nextNumber(s);
	}
	if (isIdentStart(c)) {
		return nextIdentifier(s);
	}
	for (const punctuator of Punctuators) {
		if (CodeSource.match(s, punctuator)) {
			return tokenHere(s, TokenType.Punc);
		}
	}
	CodeSource.advance(s);
	if (isPunct(c)) {
		return tokenHere(s, TokenType.Punc);
	}
	throw new LexError("invalid token", CodeSource.scannedSpan(s));
}

function nextNumber(s: CodeSource): Token {
	const value = BigInt(CodeSource.takeWhile(s, isDigit));
	if (value > MaxInt) {
		throw new LexError("number out of range", CodeSource.scannedSpan(s));
	}
	return tokenHere(s, TokenType.Num, value);
}

function nextIdentifier(s: CodeSource): Token {
	CodeSource.skipWhile(s, (c) => isIdentStart(c) || isDigit(c));
	return tokenHere(s, TokenType.Id);
}

/** Reclassifies reserved identifiers in place. */
function convertKeywords(tokens: Token[]): void {
	for (const t of tokens) {
		if (t.type === TokenType.Id && Keywords.has(t.image)) {
			t.type = TokenType.Keyword;
		}
	}
}

function tokenHere(s: CodeSource, type: TokenType, value?: bigint): Token {
	const image = CodeSource.scanned(s);
	const { start, end } = CodeSource.scannedSpan(s);
	if (value === undefined) {
		return { type, image, start, end };
	}
	return { type, image, value, start, end };
}

function isDigit(c: string): boolean {
	return Digits.includes(c);
}

function isIdentStart(c: string): boolean {
	return ("a" <= c && c <= "z") || ("A" <= c && c <= "Z") || c === "_";
}

// ASCII graphic characters that are neither letters nor digits.
function isPunct(c: string): boolean {
	const code = c.charCodeAt(0);
	return (
		(code >= 0x21 && code <= 0x2f) ||
		(code >= 0x3a && code <= 0x40) ||
		(code >= 0x5b && code <= 0x60) ||
		(code >= 0x7b && code <= 0x7e)
	);
}

function isWhitespace(c: string): boolean {
	return Whitespace.includes(c);
}
