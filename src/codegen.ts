import { type ExprNode, type Func, type LValue, NodeTag, type StmtNode } from "./ast.ts";
import { alignTo, CodegenError } from "./utils.ts";

/** Bytes each local occupies in the frame. */
export const SlotSize = 8;

export const ReturnLabel = ".L.return";

export type CodeGen = {
	lines: string[];
	/** Values currently pushed on the evaluation stack. */
	depth: number;
	labels: number;
};

export const CodeGen = { create, generate, assignLocalOffsets };

function create(): CodeGen {
	return { lines: [], depth: 0, labels: 0 };
}

/** Lowers `fn` to AT&T-syntax x86-64 assembly. */
function generate(fn: Func, g: CodeGen = create()): string {
	assignLocalOffsets(fn);
	emit(g, `  .globl ${fn.name}`);
	emit(g, `${fn.name}:`);
	emit(g, "  push %rbp");
	emit(g, "  mov %rsp, %rbp");
	emit(g, `  sub $${fn.stackSize}, %rsp`);
	genStmt(g, fn.body);
	if (g.depth !== 0) {
		throw new CodegenError(`evaluation stack depth ${g.depth} at function end`, fn.body.token);
	}
	emit(g, `${ReturnLabel}:`);
	emit(g, "  mov %rbp, %rsp");
	emit(g, "  pop %rbp");
	emit(g, "  ret");
	return g.lines.join("\n") + "\n";
}

function assignLocalOffsets(fn: Func): void {
	let offset = 0;
	for (const local of fn.locals) {
		offset += SlotSize;
		local.offset = offset;
	}
	fn.stackSize = alignTo(offset, 16);
}

function emit(g: CodeGen, line: string): void {
	g.lines.push(line);
}

function nextLabel(g: CodeGen): number {
	return ++g.labels;
}

function push(g: CodeGen): void {
	emit(g, "  push %rax");
	g.depth++;
}

function pop(g: CodeGen, register: string): void {
	emit(g, `  pop ${register}`);
	g.depth--;
}

// Leaves the address of `node` in %rax.
function genAddr(g: CodeGen, node: LValue): void {
	switch (node.tag) {
		case NodeTag.Var:
			emit(g, `  lea -${node.variable.offset}(%rbp), %rax`);
			return;
		case NodeTag.Deref:
			genExpr(g, node.operand);
			return;
	}
}

function genExpr(g: CodeGen, node: ExprNode): void {
	switch (node.tag) {
		case NodeTag.Num:
			emit(g, `  mov $${node.value}, %rax`);
			return;
		case NodeTag.Neg:
			genExpr(g, node.operand);
			emit(g, "  neg %rax");
			return;
		case NodeTag.Var:
			genAddr(g, node);
			emit(g, "  mov (%rax), %rax");
			return;
		case NodeTag.Deref:
			genExpr(g, node.operand);
			emit(g, "  mov (%rax), %rax");
			return;
		case NodeTag.Addr:
			genAddr(g, node.operand);
			return;
		case NodeTag.Assign:
			genAddr(g, node.lhs);
			push(g);
			genExpr(g, node.rhs);
			pop(g, "%rdi");
			emit(g, "  mov %rax, (%rdi)");
			return;
		case NodeTag.FunCall:
			// %rsp is not realigned to 16 bytes before the call.
			emit(g, "  mov $0, %rax");
			emit(g, `  call ${node.name}`);
			return;
	}

	genExpr(g, node.rhs);
	push(g);
	genExpr(g, node.lhs);
	pop(g, "%rdi");

	switch (node.tag) {
		case NodeTag.Add:
			emit(g, "  add %rdi, %rax");
			return;
		case NodeTag.Sub:
			emit(g, "  sub %rdi, %rax");
			return;
		case NodeTag.Mul:
			emit(g, "  imul %rdi, %rax");
			return;
		case NodeTag.Div:
			emit(g, "  cqo");
			emit(g, "  idiv %rdi");
			return;
		case NodeTag.Eq:
		case NodeTag.Ne:
		case NodeTag.Lt:
		case NodeTag.Le:
			emit(g, "  cmp %rdi, %rax");
			emit(g, `  ${SetInstructions[node.tag]} %al`);
			emit(g, "  movzb %al, %rax");
			return;
	}
}

const SetInstructions = {
	[NodeTag.Eq]: "sete",
	[NodeTag.Ne]: "setne",
	[NodeTag.Lt]: "setl",
	[NodeTag.Le]: "setle",
};

function genStmt(g: CodeGen, node: StmtNode): void {
	switch (node.tag) {
		case NodeTag.If: {
			const c = nextLabel(g);
			genExpr(g, node.cond);
			emit(g, "  cmp $0, %rax");
			emit(g, `  je  .L.else.${c}`);
			genStmt(g, node.then);
			emit(g, `  jmp .L.end.${c}`);
			emit(g, `.L.else.${c}:`);
			if (node.els) {
				genStmt(g, node.els);
			}
			emit(g, `.L.end.${c}:`);
			break;
		}
		case NodeTag.For: {
			const c = nextLabel(g);
			if (node.init) {
				genStmt(g, node.init);
			}
			emit(g, `.L.begin.${c}:`);
			if (node.cond) {
				genExpr(g, node.cond);
				emit(g, "  cmp $0, %rax");
				emit(g, `  je  .L.end.${c}`);
			}
			genStmt(g, node.then);
			if (node.inc) {
				genExpr(g, node.inc);
			}
			emit(g, `  jmp .L.begin.${c}`);
			emit(g, `.L.end.${c}:`);
			break;
		}
		case NodeTag.Block:
			for (const stmt of node.body) {
				genStmt(g, stmt);
			}
			break;
		case NodeTag.Return:
			genExpr(g, node.expr);
			emit(g, `  jmp ${ReturnLabel}`);
			break;
		case NodeTag.ExprStmt:
			genExpr(g, node.expr);
			break;
	}
	if (g.depth !== 0) {
		throw new CodegenError(`evaluation stack depth ${g.depth} after statement`, node.token);
	}
}
