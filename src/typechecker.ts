import { Ast, type Node, NodeTag } from "./ast.ts";
import { CType } from "./ctypes.ts";
import { TypeError } from "./utils.ts";

export const TypeChecker = { addType };

/**
 * Types `node` and everything below it. Nodes that already carry a type are
 * left untouched, so the parser can pre-type the nodes it synthesizes.
 */
function addType(node: Node): void {
	if (Ast.isExpr(node) && node.type !== undefined) {
		return;
	}
	for (const child of Ast.children(node)) {
		addType(child);
	}
	switch (node.tag) {
		case NodeTag.Add:
		case NodeTag.Sub:
		case NodeTag.Mul:
		case NodeTag.Div:
		case NodeTag.Assign:
			node.type = typeOf(node.lhs);
			return;
		case NodeTag.Neg:
			node.type = typeOf(node.operand);
			return;
		case NodeTag.Eq:
		case NodeTag.Ne:
		case NodeTag.Lt:
		case NodeTag.Le:
		case NodeTag.Num:
			node.type = CType.Int;
			return;
		case NodeTag.FunCall:
			// Undeclared callees are assumed to be `int f()`.
			node.type = CType.func(CType.Int).returns;
			return;
		case NodeTag.Var:
			node.type = node.variable.type;
			return;
		case NodeTag.Addr:
			node.type = CType.pointerTo(typeOf(node.operand));
			return;
		case NodeTag.Deref: {
			const operandType = typeOf(node.operand);
			if (!CType.isPointer(operandType)) {
				throw new TypeError("invalid pointer dereference", node.token);
			}
			node.type = operandType.base;
			return;
		}
		case NodeTag.Return:
		case NodeTag.If:
		case NodeTag.For:
		case NodeTag.Block:
		case NodeTag.ExprStmt:
			return;
	}
}

/** The type of an already visited expression. */
export function typeOf(node: Node): CType {
	if (!Ast.isExpr(node) || node.type === undefined) {
		throw new TypeError(`${node.tag} node has no type`, node.token);
	}
	return node.type;
}
