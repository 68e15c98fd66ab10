import { LangError } from './errors.js';
import type { BinOp, Block, Declaration, Expr, Program, Statement, Var } from './lang/ast.js';
import { combine, createInteger, createReal, floorDiv, isInteger, toReal } from './runtime/values.js';
import type { GlobalStore, NumValue } from './runtime/values.js';

export interface InterpreterOptions {
    signal?: AbortSignal;
}

/**
 * Tree-walking evaluator. The global store belongs to this instance and is cleared at the
 * start of every run.
 */
export class Interpreter {
    public readonly globals: GlobalStore = new Map();
    private readonly tree: Program;
    private readonly signal?: AbortSignal;

    constructor(tree: Program, options: InterpreterOptions = {}) {
        this.tree = tree;
        this.signal = options.signal;
    }

    interpret(): GlobalStore {
        this.globals.clear();
        this.execute(this.tree);
        return this.globals;
    }

    private execute(node: Program | Block | Declaration | Statement): void {
        this.signal?.throwIfAborted();

        switch (node.kind) {
            case 'Program':
                this.execute(node.block);
                return;
            case 'Block':
                for (const decl of node.declarations) {
                    this.execute(decl);
                }
                this.execute(node.compound);
                return;
            case 'Compound':
                for (const statement of node.statements) {
                    this.execute(statement);
                }
                return;
            case 'Assign':
                this.globals.set(node.target.name, this.evaluate(node.value));
                return;
            case 'VarDecl':
            case 'ProcedureDecl':
            case 'NoOp':
                return;
        }
    }

    evaluate(node: Expr): NumValue {
        this.signal?.throwIfAborted();

        switch (node.kind) {
            case 'Num':
                return node.numericType === 'INTEGER' ? createInteger(node.value) : createReal(node.value);
            case 'Var':
                return this.lookup(node);
            case 'UnaryOp': {
                const operand = this.evaluate(node.operand);
                if (node.op === 'PLUS') return operand;
                return isInteger(operand) ? createInteger(-operand.value) : createReal(-operand.value);
            }
            case 'BinOp':
                return this.binary(node);
        }
    }

    private lookup(node: Var): NumValue {
        const value = this.globals.get(node.name);
        if (value === undefined) {
            throw new LangError('UndefinedVariable', `Variable '${node.name}' is used before it is assigned`, {
                range: node.range,
                identifier: node.name
            });
        }
        return value;
    }

    private binary(node: BinOp): NumValue {
        const left = this.evaluate(node.left);
        const right = this.evaluate(node.right);

        switch (node.op) {
            case 'PLUS':
                return combine(left, right, (a, b) => a + b, (a, b) => a + b);
            case 'MINUS':
                return combine(left, right, (a, b) => a - b, (a, b) => a - b);
            case 'MUL':
                return combine(left, right, (a, b) => a * b, (a, b) => a * b);
            case 'INTEGER_DIV':
                this.checkDivisor(node, right);
                return combine(left, right, floorDiv, (a, b) => Math.floor(a / b));
            case 'FLOAT_DIV':
                this.checkDivisor(node, right);
                return createReal(toReal(left) / toReal(right));
        }
    }

    private checkDivisor(node: BinOp, divisor: NumValue): void {
        if (isInteger(divisor) ? divisor.value === 0n : divisor.value === 0) {
            const op = node.op === 'INTEGER_DIV' ? 'DIV' : '/';
            throw new LangError('DivisionByZero', `Division by zero in '${op}'`, { range: node.right.range });
        }
    }
}

export function interpret(tree: Program, options?: InterpreterOptions): GlobalStore {
    return new Interpreter(tree, options).interpret();
}
