import { describe, expect, test } from "vitest";
import { Ast, type ExprNode, type Func, type Node, NodeTag } from "../src/ast.ts";
import { CodeSource } from "../src/codesource.ts";
import { CType } from "../src/ctypes.ts";
import { Parser } from "../src/parser.ts";
import { Problem } from "../src/utils.ts";

function parse(source: string): Func {
	return Parser.parse(CodeSource.fromString(source));
}

// Parses `{ <decls> return <expr>; }` and prints the returned expression.
function printExpr(expr: string, decls: string = ""): string {
	return Ast.print(returned(expr, decls));
}

function returned(expr: string, decls: string = ""): ExprNode {
	const fn = parse(`{ ${decls} return ${expr}; }`);
	const last = fn.body.body[fn.body.body.length - 1];
	if (last.tag !== NodeTag.Return) {
		throw new Error(`expected a return statement, got ${last.tag}`);
	}
	return last.expr;
}

function problemOf(source: string): [string, string, number] {
	try {
		parse(source);
	} catch (error) {
		if (error instanceof Problem) {
			return [error.constructor.name, error.note, error.start];
		}
		throw error;
	}
	throw new Error(`expected ${JSON.stringify(source)} to fail`);
}

describe("precedence", () => {
	test("multiplication binds tighter than addition", () => {
		expect(printExpr("1+2*3")).toBe("(Add (Num 1) (Mul (Num 2) (Num 3)))");
		expect(printExpr("(1+2)*3")).toBe("(Mul (Add (Num 1) (Num 2)) (Num 3))");
	});

	test("binary operators are left-associative", () => {
		expect(printExpr("1-2-3")).toBe("(Sub (Sub (Num 1) (Num 2)) (Num 3))");
		expect(printExpr("8/4/2")).toBe("(Div (Div (Num 8) (Num 4)) (Num 2))");
		expect(printExpr("1==2!=3")).toBe("(Ne (Eq (Num 1) (Num 2)) (Num 3))");
	});

	test("relational binds tighter than equality", () => {
		expect(printExpr("1<2==3<=4")).toBe("(Eq (Lt (Num 1) (Num 2)) (Le (Num 3) (Num 4)))");
	});

	test("assignment is right-associative", () => {
		expect(printExpr("a=b=1", "int a; int b;")).toBe(
			"(Assign (Var a) (Assign (Var b) (Num 1)))"
		);
	});

	test("unary operators", () => {
		expect(printExpr("-+-1")).toBe("(Neg (Neg (Num 1)))");
		expect(printExpr("*&a", "int a;")).toBe("(Deref (Addr (Var a)))");
		expect(printExpr("-2*3")).toBe("(Mul (Neg (Num 2)) (Num 3))");
	});
});

describe("relational canonicalization", () => {
	test("a > b is built as b < a", () => {
		const decls = "int a; int b;";
		expect(printExpr("a>b", decls)).toBe("(Lt (Var b) (Var a))");
		expect(printExpr("a>b", decls)).toBe(printExpr("b<a", decls));
	});

	test("a >= b is built as b <= a", () => {
		const decls = "int a; int b;";
		expect(printExpr("a>=b", decls)).toBe("(Le (Var b) (Var a))");
		expect(printExpr("a>=b", decls)).toBe(printExpr("b<=a", decls));
	});
});

describe("pointer arithmetic", () => {
	const decls = "int *p; int *q; int n;";

	test("ptr + int scales the integer", () => {
		expect(printExpr("p+1", decls)).toBe("(Add (Var p) (Mul (Num 1) (Num 8)))");
		expect(CType.print(returned("p+n", decls).type ?? CType.Int)).toBe("int*");
	});

	test("int + ptr is canonicalized to ptr + int", () => {
		expect(printExpr("1+p", decls)).toBe("(Add (Var p) (Mul (Num 1) (Num 8)))");
		expect(printExpr("1+p", decls)).toBe(printExpr("p+1", decls));
	});

	test("ptr - int scales the integer", () => {
		const node = returned("p-n", decls);
		expect(Ast.print(node)).toBe("(Sub (Var p) (Mul (Var n) (Num 8)))");
		expect(node.type?.kind).toBe("Ptr");
	});

	test("ptr - ptr counts elements", () => {
		const node = returned("p-q", decls);
		expect(Ast.print(node)).toBe("(Div (Sub (Var p) (Var q)) (Num 8))");
		expect(node.type).toBe(CType.Int);
	});

	test("int + int is not scaled", () => {
		expect(printExpr("n+1", decls)).toBe("(Add (Var n) (Num 1))");
	});

	test("invalid operand combinations", () => {
		expect(problemOf("{ int *p; int *q; return p+q; }")).toEqual([
			"TypeError",
			"invalid operands",
			26,
		]);
		expect(problemOf("{ int *p; return 1-p; }")).toEqual(["TypeError", "invalid operands", 18]);
	});
});

describe("statements", () => {
	test("declarations lower to assignments", () => {
		const fn = parse("{ int a=3, b; return a; }");
		expect(Ast.print(fn.body)).toBe(
			"(Block (Block (ExprStmt (Assign (Var a) (Num 3)))) (Return (Var a)))"
		);
		expect(fn.locals.map((l) => l.name)).toEqual(["a", "b"]);
	});

	test("declarators build pointer types", () => {
		const fn = parse("{ int a; int *b, **c; }");
		expect(fn.locals.map((l) => [l.name, CType.print(l.type)])).toEqual([
			["a", "int"],
			["b", "int*"],
			["c", "int**"],
		]);
	});

	test("an empty declaration declares nothing", () => {
		expect(parse("{ int; }").locals).toEqual([]);
	});

	test("if with and without else", () => {
		expect(Ast.print(parse("{ if (1) return 2; else return 3; }").body)).toBe(
			"(Block (If (Num 1) (Return (Num 2)) (Return (Num 3))))"
		);
		expect(Ast.print(parse("{ if (1) return 2; }").body)).toBe(
			"(Block (If (Num 1) (Return (Num 2)) _))"
		);
	});

	test("dangling else binds to the nearest if", () => {
		expect(Ast.print(parse("{ if (1) if (2) return 3; else return 4; }").body)).toBe(
			"(Block (If (Num 1) (If (Num 2) (Return (Num 3)) (Return (Num 4))) _))"
		);
	});

	test("for with every clause omitted", () => {
		expect(Ast.print(parse("{ for (;;) ; }").body)).toBe("(Block (For (Block) _ _ (Block)))");
	});

	test("while is a for without init and inc", () => {
		expect(Ast.print(parse("{ while (1) return 0; }").body)).toBe(
			"(Block (For _ (Num 1) _ (Return (Num 0))))"
		);
	});

	test("nested blocks and empty statements", () => {
		expect(Ast.print(parse("{ {} ; { return 1; } }").body)).toBe(
			"(Block (Block) (Block) (Block (Return (Num 1))))"
		);
	});

	test("zero-argument calls", () => {
		expect(printExpr("f()")).toBe("(FunCall f)");
		expect(printExpr("f()+1")).toBe("(Add (FunCall f) (Num 1))");
	});

	test("function shell", () => {
		const fn = parse("{ return 0; }");
		expect(fn.name).toBe("main");
		expect(CType.print(fn.type)).toBe("int()");
		expect(fn.stackSize).toBe(0);
		expect(fn.body.token.image).toBe("{");
	});
});

describe("typing", () => {
	test("every expression node is typed after parsing", () => {
		const fn = parse(
			"{ int x=5; int *p=&x; int *q=p+1; int i; for (i=0; i<q-p; i=i+1) *p=*p+i; if (x>=5) return f(); return -x; }"
		);
		const untyped: string[] = [];
		const visit = (node: Node): void => {
			if (Ast.isExpr(node) && node.type === undefined) {
				untyped.push(Ast.print(node));
			}
			Ast.children(node).forEach(visit);
		};
		visit(fn.body);
		expect(untyped).toEqual([]);
	});

	test("dereferencing a non-pointer is rejected", () => {
		expect(problemOf("{ int x; return *x; }")).toEqual([
			"TypeError",
			"invalid pointer dereference",
			16,
		]);
	});
});

describe("errors", () => {
	test("missing expression", () => {
		expect(problemOf("{ return @; }")).toEqual(["ParseError", "expected an expression", 9]);
		expect(problemOf("{ return 1+; }")).toEqual(["ParseError", "expected an expression", 11]);
	});

	test("missing punctuation", () => {
		expect(problemOf("return 0; }")).toEqual(["ParseError", "expected '{'", 0]);
		expect(problemOf("{ return 0 }")).toEqual(["ParseError", "expected ';'", 11]);
		expect(problemOf("{ return (1; }")).toEqual(["ParseError", "expected ')'", 11]);
		expect(problemOf("{ return 0;")).toEqual(["ParseError", "expected '}'", 11]);
		expect(problemOf("{ if 1) return 0; }")).toEqual(["ParseError", "expected '('", 5]);
		expect(problemOf("{ int a b; }")).toEqual(["ParseError", "expected ','", 8]);
	});

	test("declarations", () => {
		expect(problemOf("{ int 1; }")).toEqual(["ParseError", "expected a variable name", 6]);
		expect(problemOf("{ int a; int a; }")).toEqual(["ParseError", "redefinition of 'a'", 13]);
	});

	test("undefined variables", () => {
		expect(problemOf("{ return x; }")).toEqual(["ParseError", "undefined variable", 9]);
		expect(problemOf("{ x = 1; int x; }")).toEqual(["ParseError", "undefined variable", 2]);
	});

	test("lvalues", () => {
		expect(problemOf("{ 1 = 2; }")).toEqual(["TypeError", "not an lvalue", 2]);
		expect(problemOf("{ int a; a+1 = 2; }")).toEqual(["TypeError", "not an lvalue", 10]);
		expect(problemOf("{ return &1; }")).toEqual(["TypeError", "not an lvalue", 10]);
	});

	test("tokens after the closing brace", () => {
		expect(problemOf("{ return 0; } x")).toEqual(["ParseError", "extra token", 14]);
	});

	test("lexical errors surface from parse", () => {
		expect(problemOf("{ return λ; }")).toEqual(["LexError", "invalid token", 9]);
	});
});
