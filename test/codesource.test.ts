import { expect, test } from "vitest";
import { CodeSource } from "../src/codesource.ts";

const isDigit = (c: string) => c >= "0" && c <= "9";

test("hasMore, peek, advance", () => {
	const s = CodeSource.fromString("ab");
	expect(CodeSource.hasMore(s)).toBe(true);
	expect(CodeSource.peek(s)).toBe("a");
	expect(CodeSource.advance(s)).toBe("a");
	expect(CodeSource.peek(s)).toBe("b");
	expect(CodeSource.advance(s)).toBe("b");
	expect(CodeSource.hasMore(s)).toBe(false);
	expect(CodeSource.peek(s)).toBe(undefined);
});

test("skipWhile, takeWhile", () => {
	const s = CodeSource.fromString("  123+4");
	expect(CodeSource.skipWhile(s, (c) => c === " ")).toBe(2);
	expect(CodeSource.skipWhile(s, (c) => c === " ")).toBe(0);
	expect(CodeSource.takeWhile(s, isDigit)).toBe("123");
	expect(CodeSource.takeWhile(s, isDigit)).toBe("");
	expect(CodeSource.peek(s)).toBe("+");
	CodeSource.advance(s);
	expect(CodeSource.takeWhile(s, isDigit)).toBe("4");
	expect(CodeSource.hasMore(s)).toBe(false);
});

test("startScan, scanned, scannedSpan", () => {
	const s = CodeSource.fromString("12 345");
	CodeSource.startScan(s);
	expect(CodeSource.scanned(s)).toBe("");
	CodeSource.takeWhile(s, isDigit);
	expect(CodeSource.scanned(s)).toBe("12");
	expect(CodeSource.scannedSpan(s)).toEqual({ start: 0, end: 2 });
	CodeSource.advance(s);
	CodeSource.startScan(s);
	CodeSource.takeWhile(s, isDigit);
	expect(CodeSource.scanned(s)).toBe("345");
	expect(CodeSource.scannedSpan(s)).toEqual({ start: 3, end: 6 });
});

test("match", () => {
	const s = CodeSource.fromString("<=<");
	expect(CodeSource.match(s, "==")).toBe(false);
	expect(CodeSource.match(s, "<=")).toBe(true);
	expect(CodeSource.match(s, "<=")).toBe(false);
	expect(CodeSource.match(s, "<")).toBe(true);
	expect(CodeSource.hasMore(s)).toBe(false);
});

test("checkpoint, restore", () => {
	const s = CodeSource.fromString("int x;");
	CodeSource.match(s, "int");
	const c = CodeSource.checkpoint(s);
	CodeSource.startScan(s);
	CodeSource.match(s, " x;");
	expect(CodeSource.hasMore(s)).toBe(false);
	CodeSource.restore(s, c);
	expect(CodeSource.scannedSpan(s)).toEqual({ start: 0, end: 3 });
	expect(CodeSource.peek(s)).toBe(" ");
});

test("path", () => {
	expect(CodeSource.fromString("").path).toBe("<arg>");
	expect(CodeSource.fromString("", "main.c").path).toBe("main.c");
});
