import type { CType, FuncType } from "./ctypes.ts";
import type { Token } from "./tokens.ts";
import { sexpr } from "./utils.ts";

export enum NodeTag {
	// Binary
	Add = "Add",
	Sub = "Sub",
	Mul = "Mul",
	Div = "Div",
	Eq = "Eq",
	Ne = "Ne",
	Lt = "Lt",
	Le = "Le",
	// Unary
	Neg = "Neg",
	Addr = "Addr",
	Deref = "Deref",
	Assign = "Assign",
	// Leaves
	Num = "Num",
	Var = "Var",
	FunCall = "FunCall",
	// Statements
	Return = "Return",
	If = "If",
	For = "For",
	Block = "Block",
	ExprStmt = "ExprStmt",
}

export type LocalVar = {
	name: string;
	type: CType;
	/** Distance below the frame pointer; set by the code generator. */
	offset: number;
};

type NodeOf<T extends NodeTag> = {
	tag: T;
	token: Token;
};

type Typed = { type?: CType };

export type BinaryTag =
	| NodeTag.Add
	| NodeTag.Sub
	| NodeTag.Mul
	| NodeTag.Div
	| NodeTag.Eq
	| NodeTag.Ne
	| NodeTag.Lt
	| NodeTag.Le;

export type BinaryNode = NodeOf<BinaryTag> & {
	lhs: ExprNode;
	rhs: ExprNode;
} & Typed;

export type NegNode = NodeOf<NodeTag.Neg> & { operand: ExprNode } & Typed;

export type AddrNode = NodeOf<NodeTag.Addr> & { operand: LValue } & Typed;

export type DerefNode = NodeOf<NodeTag.Deref> & { operand: ExprNode } & Typed;

export type AssignNode = NodeOf<NodeTag.Assign> & {
	lhs: LValue;
	rhs: ExprNode;
} & Typed;

export type NumNode = NodeOf<NodeTag.Num> & { value: bigint } & Typed;

export type VarNode = NodeOf<NodeTag.Var> & { variable: LocalVar } & Typed;

export type FunCallNode = NodeOf<NodeTag.FunCall> & { name: string } & Typed;

export type ExprNode =
	| BinaryNode
	| NegNode
	| AddrNode
	| DerefNode
	| AssignNode
	| NumNode
	| VarNode
	| FunCallNode;

/** Expressions that designate a storage location. */
export type LValue = VarNode | DerefNode;

export type ReturnNode = NodeOf<NodeTag.Return> & { expr: ExprNode };

export type IfNode = NodeOf<NodeTag.If> & {
	cond: ExprNode;
	then: StmtNode;
	els?: StmtNode;
};

export type ForNode = NodeOf<NodeTag.For> & {
	init?: StmtNode;
	cond?: ExprNode;
	inc?: ExprNode;
	then: StmtNode;
};

export type BlockNode = NodeOf<NodeTag.Block> & { body: StmtNode[] };

export type ExprStmtNode = NodeOf<NodeTag.ExprStmt> & { expr: ExprNode };

export type StmtNode = ReturnNode | IfNode | ForNode | BlockNode | ExprStmtNode;

export type Node = ExprNode | StmtNode;

export type Func = {
	name: string;
	type: FuncType;
	body: BlockNode;
	locals: LocalVar[];
	stackSize: number;
};

export const Ast = { print: printAst, isExpr, isLValue, children };

const ExprTags = new Set<NodeTag>([
	NodeTag.Add,
	NodeTag.Sub,
	NodeTag.Mul,
	NodeTag.Div,
	NodeTag.Eq,
	NodeTag.Ne,
	NodeTag.Lt,
	NodeTag.Le,
	NodeTag.Neg,
	NodeTag.Addr,
	NodeTag.Deref,
	NodeTag.Assign,
	NodeTag.Num,
	NodeTag.Var,
	NodeTag.FunCall,
]);

function isExpr(node: Node): node is ExprNode {
	return ExprTags.has(node.tag);
}

function isLValue(node: ExprNode): node is LValue {
	return node.tag === NodeTag.Var || node.tag === NodeTag.Deref;
}

function children(node: Node): Node[] {
	switch (node.tag) {
		case NodeTag.Add:
		case NodeTag.Sub:
		case NodeTag.Mul:
		case NodeTag.Div:
		case NodeTag.Eq:
		case NodeTag.Ne:
		case NodeTag.Lt:
		case NodeTag.Le:
		case NodeTag.Assign:
			return [node.lhs, node.rhs];
		case NodeTag.Neg:
		case NodeTag.Addr:
		case NodeTag.Deref:
			return [node.operand];
		case NodeTag.Num:
		case NodeTag.Var:
		case NodeTag.FunCall:
			return [];
		case NodeTag.Return:
		case NodeTag.ExprStmt:
			return [node.expr];
		case NodeTag.If:
			return node.els ? [node.cond, node.then, node.els] : [node.cond, node.then];
		case NodeTag.For: {
			const nodes: Node[] = [];
			if (node.init) {
				nodes.push(node.init);
			}
			if (node.cond) {
				nodes.push(node.cond);
			}
			if (node.inc) {
				nodes.push(node.inc);
			}
			nodes.push(node.then);
			return nodes;
		}
		case NodeTag.Block:
			return node.body;
	}
}

/** Renders a node as an s-expression, e.g. `(Add (Num 1) (Mul (Num 2) (Num 3)))`. */
function printAst(node: Node): string {
	return sexpr(shape(node));
}

function shape(node: Node): unknown[] {
	switch (node.tag) {
		case NodeTag.Num:
			return [node.tag, node.value];
		case NodeTag.Var:
			return [node.tag, node.variable.name];
		case NodeTag.FunCall:
			return [node.tag, node.name];
		case NodeTag.If:
			return [
				node.tag,
				shape(node.cond),
				shape(node.then),
				node.els ? shape(node.els) : undefined,
			];
		case NodeTag.For:
			return [
				node.tag,
				node.init ? shape(node.init) : undefined,
				node.cond ? shape(node.cond) : undefined,
				node.inc ? shape(node.inc) : undefined,
				shape(node.then),
			];
		default:
			return [node.tag, ...children(node).map(shape)];
	}
}
