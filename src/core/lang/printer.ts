import type { BinaryOp, Block, Compound, Declaration, Expr, Program, Statement } from './ast.js';
import { formatReal } from '../runtime/values.js';

const OP_TEXT: Record<BinaryOp, string> = {
    PLUS: '+',
    MINUS: '-',
    MUL: '*',
    INTEGER_DIV: 'DIV',
    FLOAT_DIV: '/'
};

const PRECEDENCE: Record<BinaryOp, number> = {
    PLUS: 1,
    MINUS: 1,
    MUL: 2,
    INTEGER_DIV: 2,
    FLOAT_DIV: 2
};

const INDENT = '  ';

/**
 * Renders a program back to canonical source text: uppercase keywords, one statement per
 * line, parentheses only where precedence or left-associativity needs them.
 */
export function formatProgram(program: Program): string {
    const lines: string[] = [`PROGRAM ${program.name};`];
    formatBlock(program.block, 0, lines);
    lines[lines.length - 1] += '.';
    return lines.map(line => line.trimEnd()).join('\n') + '\n';
}

function formatBlock(block: Block, depth: number, lines: string[]): void {
    formatDeclarations(block.declarations, depth, lines);
    formatCompound(block.compound, depth, lines);
}

function formatDeclarations(declarations: Declaration[], depth: number, lines: string[]): void {
    const pad = INDENT.repeat(depth);
    let inVarSection = false;

    for (const decl of declarations) {
        if (decl.kind === 'VarDecl') {
            if (!inVarSection) {
                lines.push(`${pad}VAR`);
                inVarSection = true;
            }
            lines.push(`${pad}${INDENT}${decl.variableName} : ${decl.typeName};`);
        } else {
            inVarSection = false;
            lines.push(`${pad}PROCEDURE ${decl.name};`);
            formatBlock(decl.block, depth + 1, lines);
            lines[lines.length - 1] += ';';
        }
    }
}

function formatCompound(compound: Compound, depth: number, lines: string[]): void {
    const pad = INDENT.repeat(depth);
    lines.push(`${pad}BEGIN`);
    compound.statements.forEach((statement, i) => {
        const separator = i < compound.statements.length - 1 ? ';' : '';
        formatStatement(statement, depth + 1, lines);
        lines[lines.length - 1] += separator;
    });
    lines.push(`${pad}END`);
}

function formatStatement(statement: Statement, depth: number, lines: string[]): void {
    const pad = INDENT.repeat(depth);
    switch (statement.kind) {
        case 'Compound':
            formatCompound(statement, depth, lines);
            return;
        case 'Assign':
            lines.push(`${pad}${statement.target.name} := ${formatExpr(statement.value)}`);
            return;
        case 'NoOp':
            lines.push(pad);
            return;
    }
}

export function formatExpr(expr: Expr): string {
    switch (expr.kind) {
        case 'Num':
            return expr.numericType === 'REAL' ? formatReal(expr.value) : expr.value.toString();
        case 'Var':
            return expr.name;
        case 'UnaryOp': {
            const operand = formatExpr(expr.operand);
            const sign = expr.op === 'PLUS' ? '+' : '-';
            return expr.operand.kind === 'BinOp' ? `${sign}(${operand})` : `${sign}${operand}`;
        }
        case 'BinOp': {
            const precedence = PRECEDENCE[expr.op];
            const left = formatOperand(expr.left, precedence, false);
            const right = formatOperand(expr.right, precedence, true);
            return `${left} ${OP_TEXT[expr.op]} ${right}`;
        }
    }
}

function formatOperand(expr: Expr, parentPrecedence: number, isRight: boolean): string {
    const text = formatExpr(expr);
    if (expr.kind !== 'BinOp') return text;
    const precedence = PRECEDENCE[expr.op];
    const needsParens = precedence < parentPrecedence || (isRight && precedence === parentPrecedence);
    return needsParens ? `(${text})` : text;
}
