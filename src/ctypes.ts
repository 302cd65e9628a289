export enum Kind {
	Int = "Int",
	Ptr = "Ptr",
	Func = "Func",
}

export type IntType = {
	kind: Kind.Int;
};

export type PtrType = {
	kind: Kind.Ptr;
	base: CType;
};

export type FuncType = {
	kind: Kind.Func;
	returns: CType;
};

export type CType = IntType | PtrType | FuncType;

const Int: IntType = { kind: Kind.Int };

export const CType = {
	Int,
	pointerTo,
	func,
	isInteger,
	isPointer,
	print,
};

function pointerTo(base: CType): PtrType {
	return { kind: Kind.Ptr, base };
}

function func(returns: CType): FuncType {
	return { kind: Kind.Func, returns };
}

function isInteger(t: CType): t is IntType {
	return t.kind === Kind.Int;
}

function isPointer(t: CType): t is PtrType {
	return t.kind === Kind.Ptr;
}

function print(t: CType): string {
	switch (t.kind) {
		case Kind.Int:
			return "int";
		case Kind.Ptr:
			return `${print(t.base)}*`;
		case Kind.Func:
			return `${print(t.returns)}()`;
	}
}
