import {
	Ast,
	type AssignNode,
	type BinaryNode,
	type BinaryTag,
	type BlockNode,
	type ExprNode,
	type ExprStmtNode,
	type ForNode,
	type Func,
	type IfNode,
	type LocalVar,
	type LValue,
	NodeTag,
	type NumNode,
	type StmtNode,
	type VarNode,
} from "./ast.ts";
import { CodeSource } from "./codesource.ts";
import { CType } from "./ctypes.ts";
import { Token, Tokenizer, TokenType } from "./tokens.ts";
import { TypeChecker, typeOf } from "./typechecker.ts";
import { ParseError, TypeError } from "./utils.ts";

/** Element size used to scale pointer arithmetic. */
export const PointerScale = 8n;

type Parser = {
	tokens: Token[];
	position: number;
	locals: LocalVar[];
};

type Declarator = {
	type: CType;
	name: Token;
};

export const Parser = { parse, parseTokens };

function parse(source: CodeSource): Func {
	return parseTokens(Tokenizer.tokenize(source));
}

// program = "{" compound-stmt
function parseTokens(tokens: Token[]): Func {
	const p: Parser = { tokens, position: 0, locals: [] };
	skip(p, "{");
	const body = parseCompoundStmt(p, lookBehind(p));
	const rest = peek(p);
	if (rest.type !== TokenType.Eof) {
		throw new ParseError("extra token", rest);
	}
	return {
		name: "main",
		type: CType.func(CType.Int),
		body,
		locals: p.locals,
		stackSize: 0,
	};
}

// compound-stmt = (declaration | stmt)* "}"
function parseCompoundStmt(p: Parser, open: Token): BlockNode {
	const body: StmtNode[] = [];
	while (!lookAhead(p, "}") && peek(p).type !== TokenType.Eof) {
		const stmt = lookAhead(p, "int") ? parseDeclaration(p) : parseStmt(p);
		TypeChecker.addType(stmt);
		body.push(stmt);
	}
	skip(p, "}");
	return { tag: NodeTag.Block, token: open, body };
}

// declaration = "int" (init-decl ("," init-decl)*)? ";"
// init-decl   = declarator ("=" assign)?
function parseDeclaration(p: Parser): BlockNode {
	const start = skip(p, "int");
	const body: StmtNode[] = [];
	let i = 0;
	while (!lookAhead(p, ";")) {
		if (i++ > 0) {
			skip(p, ",");
		}
		const { type, name } = parseDeclarator(p, CType.Int);
		const variable = declareLocal(p, name, type);
		const eq = peek(p);
		if (!consume(p, "=")) {
			continue;
		}
		const lhs: VarNode = { tag: NodeTag.Var, token: name, variable };
		const rhs = parseAssign(p);
		const assign: AssignNode = { tag: NodeTag.Assign, token: eq, lhs, rhs };
		body.push({ tag: NodeTag.ExprStmt, token: eq, expr: assign });
	}
	skip(p, ";");
	return { tag: NodeTag.Block, token: start, body };
}

// declarator = "*"* ident
function parseDeclarator(p: Parser, base: CType): Declarator {
	let type = base;
	while (consume(p, "*")) {
		type = CType.pointerTo(type);
	}
	const name = peek(p);
	if (name.type !== TokenType.Id) {
		throw new ParseError("expected a variable name", name);
	}
	p.position++;
	return { type, name };
}

// stmt = "return" expr ";"
//      | "if" "(" expr ")" stmt ("else" stmt)?
//      | "for" "(" expr-stmt expr? ";" expr? ")" stmt
//      | "while" "(" expr ")" stmt
//      | "{" compound-stmt
//      | expr-stmt
function parseStmt(p: Parser): StmtNode {
	const token = peek(p);
	if (consume(p, "return")) {
		const expr = parseExpr(p);
		skip(p, ";");
		return { tag: NodeTag.Return, token, expr };
	}
	if (consume(p, "if")) {
		return parseIfStmt(p, token);
	}
	if (consume(p, "for")) {
		return parseForStmt(p, token);
	}
	if (consume(p, "while")) {
		skip(p, "(");
		const cond = parseExpr(p);
		skip(p, ")");
		const then = parseStmt(p);
		return { tag: NodeTag.For, token, cond, then };
	}
	if (consume(p, "{")) {
		return parseCompoundStmt(p, token);
	}
	return parseExprStmt(p);
}

function parseIfStmt(p: Parser, token: Token): IfNode {
	skip(p, "(");
	const cond = parseExpr(p);
	skip(p, ")");
	const then = parseStmt(p);
	if (consume(p, "else")) {
		const els = parseStmt(p);
		return { tag: NodeTag.If, token, cond, then, els };
	}
	return { tag: NodeTag.If, token, cond, then };
}

function parseForStmt(p: Parser, token: Token): ForNode {
	skip(p, "(");
	const init = parseExprStmt(p);
	const cond = lookAhead(p, ";") ? undefined : parseExpr(p);
	skip(p, ";");
	const inc = lookAhead(p, ")") ? undefined : parseExpr(p);
	skip(p, ")");
	const then = parseStmt(p);
	const node: ForNode = { tag: NodeTag.For, token, init, then };
	if (cond !== undefined) {
		node.cond = cond;
	}
	if (inc !== undefined) {
		node.inc = inc;
	}
	return node;
}

// expr-stmt = expr? ";"
function parseExprStmt(p: Parser): BlockNode | ExprStmtNode {
	const token = peek(p);
	if (consume(p, ";")) {
		return { tag: NodeTag.Block, token, body: [] };
	}
	const expr = parseExpr(p);
	skip(p, ";");
	return { tag: NodeTag.ExprStmt, token, expr };
}

// expr = assign
function parseExpr(p: Parser): ExprNode {
	return parseAssign(p);
}

// assign = equality ("=" assign)?
function parseAssign(p: Parser): ExprNode {
	const lhs = parseEquality(p);
	const token = peek(p);
	if (consume(p, "=")) {
		const rhs = parseAssign(p);
		return { tag: NodeTag.Assign, token, lhs: asLValue(lhs), rhs };
	}
	return lhs;
}

// equality = relational ("==" relational | "!=" relational)*
function parseEquality(p: Parser): ExprNode {
	let node = parseRelational(p);
	for (;;) {
		const token = peek(p);
		if (consume(p, "==")) {
			node = binary(NodeTag.Eq, node, parseRelational(p), token);
		} else if (consume(p, "!=")) {
			node = binary(NodeTag.Ne, node, parseRelational(p), token);
		} else {
			return node;
		}
	}
}

// relational = add ("<" add | "<=" add | ">" add | ">=" add)*
function parseRelational(p: Parser): ExprNode {
	let node = parseAdd(p);
	for (;;) {
		const token = peek(p);
		if (consume(p, "<")) {
			node = binary(NodeTag.Lt, node, parseAdd(p), token);
		} else if (consume(p, "<=")) {
			node = binary(NodeTag.Le, node, parseAdd(p), token);
		} else if (consume(p, ">")) {
			node = binary(NodeTag.Lt, parseAdd(p), node, token);
		} else if (consume(p, ">=")) {
			node = binary(NodeTag.Le, parseAdd(p), node, token);
		} else {
			return node;
		}
	}
}

// add = mul ("+" mul | "-" mul)*
function parseAdd(p: Parser): ExprNode {
	let node = parseMul(p);
	for (;;) {
		const token = peek(p);
		if (consume(p, "+")) {
			node = newAdd(node, parseMul(p), token);
		} else if (consume(p, "-")) {
			node = newSub(node, parseMul(p), token);
		} else {
			return node;
		}
	}
}

// `+` is overloaded for pointers: `ptr + n` advances by n elements.
function newAdd(lhs: ExprNode, rhs: ExprNode, token: Token): ExprNode {
	TypeChecker.addType(lhs);
	TypeChecker.addType(rhs);
	const lhsType = typeOf(lhs);
	const rhsType = typeOf(rhs);
	if (CType.isInteger(lhsType) && CType.isInteger(rhsType)) {
		return binary(NodeTag.Add, lhs, rhs, token);
	}
	if (CType.isPointer(lhsType) && CType.isPointer(rhsType)) {
		throw new TypeError("invalid operands", token);
	}
	if (CType.isPointer(rhsType) && CType.isInteger(lhsType)) {
		// Canonicalize `num + ptr` to `ptr + num`.
		return newAdd(rhs, lhs, token);
	}
	if (!CType.isPointer(lhsType) || !CType.isInteger(rhsType)) {
		throw new TypeError("invalid operands", token);
	}
	const node = binary(NodeTag.Add, lhs, scaled(rhs, token), token);
	node.type = lhsType;
	return node;
}

// `ptr - ptr` yields the number of elements between the two pointers.
function newSub(lhs: ExprNode, rhs: ExprNode, token: Token): ExprNode {
	TypeChecker.addType(lhs);
	TypeChecker.addType(rhs);
	const lhsType = typeOf(lhs);
	const rhsType = typeOf(rhs);
	if (CType.isInteger(lhsType) && CType.isInteger(rhsType)) {
		return binary(NodeTag.Sub, lhs, rhs, token);
	}
	if (CType.isPointer(lhsType) && CType.isInteger(rhsType)) {
		const node = binary(NodeTag.Sub, lhs, scaled(rhs, token), token);
		node.type = lhsType;
		return node;
	}
	if (CType.isPointer(lhsType) && CType.isPointer(rhsType)) {
		const diff = binary(NodeTag.Sub, lhs, rhs, token);
		diff.type = CType.Int;
		const node = binary(NodeTag.Div, diff, num(PointerScale, token), token);
		node.type = CType.Int;
		return node;
	}
	throw new TypeError("invalid operands", token);
}

function scaled(node: ExprNode, token: Token): ExprNode {
	const product = binary(NodeTag.Mul, node, num(PointerScale, token), token);
	product.type = CType.Int;
	return product;
}

// mul = unary ("*" unary | "/" unary)*
function parseMul(p: Parser): ExprNode {
	let node = parseUnary(p);
	for (;;) {
		const token = peek(p);
		if (consume(p, "*")) {
			node = binary(NodeTag.Mul, node, parseUnary(p), token);
		} else if (consume(p, "/")) {
			node = binary(NodeTag.Div, node, parseUnary(p), token);
		} else {
			return node;
		}
	}
}

// unary = ("+" | "-" | "*" | "&") unary | primary
function parseUnary(p: Parser): ExprNode {
	const token = peek(p);
	if (consume(p, "+")) {
		return parseUnary(p);
	}
	if (consume(p, "-")) {
		return { tag: NodeTag.Neg, token, operand: parseUnary(p) };
	}
	if (consume(p, "*")) {
		return { tag: NodeTag.Deref, token, operand: parseUnary(p) };
	}
	if (consume(p, "&")) {
		return { tag: NodeTag.Addr, token, operand: asLValue(parseUnary(p)) };
	}
	return parsePrimary(p);
}

// primary = "(" expr ")" | ident ("(" ")")? | num
function parsePrimary(p: Parser): ExprNode {
	const token = peek(p);
	if (consume(p, "(")) {
		const node = parseExpr(p);
		skip(p, ")");
		return node;
	}
	if (token.type === TokenType.Num && token.value !== undefined) {
		p.position++;
		return num(token.value, token);
	}
	if (token.type === TokenType.Id) {
		p.position++;
		if (consume(p, "(")) {
			skip(p, ")");
			return { tag: NodeTag.FunCall, token, name: token.image };
		}
		const variable = findLocal(p, token);
		if (variable === undefined) {
			throw new ParseError("undefined variable", token);
		}
		return { tag: NodeTag.Var, token, variable };
	}
	throw new ParseError("expected an expression", token);
}

function binary(
	tag: BinaryTag,
	lhs: ExprNode,
	rhs: ExprNode,
	token: Token
): BinaryNode {
	return { tag, token, lhs, rhs };
}

function num(value: bigint, token: Token): NumNode {
	return { tag: NodeTag.Num, token, value, type: CType.Int };
}

function asLValue(node: ExprNode): LValue {
	if (!Ast.isLValue(node)) {
		throw new TypeError("not an lvalue", node.token);
	}
	return node;
}

function findLocal(p: Parser, name: Token): LocalVar | undefined {
	for (const local of p.locals) {
		if (local.name === name.image) {
			return local;
		}
	}
	return undefined;
}

function declareLocal(p: Parser, name: Token, type: CType): LocalVar {
	if (findLocal(p, name) !== undefined) {
		throw new ParseError(`redefinition of '${name.image}'`, name);
	}
	const local: LocalVar = { name: name.image, type, offset: 0 };
	p.locals.push(local);
	return local;
}

function peek(p: Parser): Token {
	return p.tokens[Math.min(p.position, p.tokens.length - 1)];
}

function lookBehind(p: Parser): Token {
	return p.tokens[Math.max(p.position - 1, 0)];
}

function lookAhead(p: Parser, literal: string): boolean {
	return Token.equal(peek(p), literal);
}

/** Advances past `literal` when it is next; reports whether it was. */
function consume(p: Parser, literal: string): boolean {
	if (lookAhead(p, literal)) {
		p.position++;
		return true;
	}
	return false;
}

function skip(p: Parser, literal: string): Token {
	const token = peek(p);
	if (!consume(p, literal)) {
		throw new ParseError(`expected '${literal}'`, token);
	}
	return token;
}
