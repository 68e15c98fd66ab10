import type { Range } from '../../types/diagnostic.js';

export type AdditiveOp = 'PLUS' | 'MINUS';
export type BinaryOp = AdditiveOp | 'MUL' | 'INTEGER_DIV' | 'FLOAT_DIV';
export type UnaryOpKind = AdditiveOp;
export type TypeName = 'INTEGER' | 'REAL';

export type Program = { kind: 'Program'; name: string; block: Block; range: Range };
export type Block = { kind: 'Block'; declarations: Declaration[]; compound: Compound; range: Range };
export type VarDecl = { kind: 'VarDecl'; variableName: string; typeName: TypeName; range: Range };
export type ProcedureDecl = { kind: 'ProcedureDecl'; name: string; block: Block; range: Range };
export type Compound = { kind: 'Compound'; statements: Statement[]; range: Range };
export type Assign = { kind: 'Assign'; target: Var; value: Expr; range: Range };
export type NoOp = { kind: 'NoOp'; range: Range };
export type BinOp = { kind: 'BinOp'; op: BinaryOp; left: Expr; right: Expr; range: Range };
export type UnaryOp = { kind: 'UnaryOp'; op: UnaryOpKind; operand: Expr; range: Range };
export type Num =
    | { kind: 'Num'; numericType: 'INTEGER'; value: bigint; range: Range }
    | { kind: 'Num'; numericType: 'REAL'; value: number; range: Range };
export type Var = { kind: 'Var'; name: string; range: Range };

export type Declaration = VarDecl | ProcedureDecl;
export type Statement = Compound | Assign | NoOp;
export type Expr = BinOp | UnaryOp | Num | Var;

export type Node = Program | Block | Declaration | Statement | Expr;

export type NodeKind = Node['kind'];
