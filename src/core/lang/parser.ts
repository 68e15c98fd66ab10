import type { Location, Range } from '../../types/diagnostic.js';
import { LangError } from '../errors.js';
import { Lexer } from './lexer.js';
import { describeToken } from './tokens.js';
import type { Token, TokenType } from './tokens.js';
import type {
    Assign,
    BinaryOp,
    Block,
    Compound,
    Declaration,
    Expr,
    NoOp,
    ProcedureDecl,
    Program,
    Statement,
    TypeName,
    Var,
    VarDecl
} from './ast.js';

const ADDITIVE_OPS: ReadonlySet<TokenType> = new Set<TokenType>(['PLUS', 'MINUS']);
const MULTIPLICATIVE_OPS: ReadonlySet<TokenType> = new Set<TokenType>(['MUL', 'INTEGER_DIV', 'FLOAT_DIV']);

function span(start: Range, end: Range): Range {
    return { start: start.start, end: end.end };
}

function isBinaryOp(kind: TokenType): kind is BinaryOp {
    return ADDITIVE_OPS.has(kind) || MULTIPLICATIVE_OPS.has(kind);
}

/**
 * Recursive-descent parser with a single token of lookahead. Each grammar rule has one
 * method; the rule it implements is quoted above it.
 *
 * The first token that does not fit the grammar aborts the parse with an InvalidSyntax
 * error, there is no recovery.
 */
export class Parser {
    private readonly lexer: Lexer;
    private currentToken: Token;
    private lastToken: Token;

    constructor(lexer: Lexer) {
        this.lexer = lexer;
        this.currentToken = this.lexer.getNextToken();
        this.lastToken = this.currentToken;
    }

    public parse(): Program {
        const node = this.program();
        if (this.currentToken.kind !== 'EOF') {
            throw this.error(`Unexpected ${describeToken(this.currentToken)} after end of program`);
        }
        return node;
    }

    // program : PROGRAM variable SEMI block DOT
    private program(): Program {
        const start = this.eat('PROGRAM');
        const name = this.variable().name;
        this.eat('SEMI');
        const block = this.block();
        const dot = this.eat('DOT');
        return { kind: 'Program', name, block, range: span(start.range, dot.range) };
    }

    // block : declarations compound_statement
    private block(): Block {
        const startRange = this.currentToken.range;
        const declarations = this.declarations();
        const compound = this.compoundStatement();
        return { kind: 'Block', declarations, compound, range: span(startRange, compound.range) };
    }

    // declarations : ( VAR (var_declaration SEMI)+ | PROCEDURE ID SEMI block SEMI )*
    private declarations(): Declaration[] {
        const declarations: Declaration[] = [];

        while (this.check('VAR') || this.check('PROCEDURE')) {
            if (this.check('VAR')) {
                this.eat('VAR');
                // At least one declaration must follow VAR
                do {
                    declarations.push(...this.varDeclaration());
                    this.eat('SEMI');
                } while (this.check('ID'));
            } else {
                declarations.push(this.procedureDeclaration());
            }
        }

        return declarations;
    }

    private procedureDeclaration(): ProcedureDecl {
        const start = this.eat('PROCEDURE');
        const nameToken = this.eat('ID');
        this.eat('SEMI');
        const block = this.block();
        const semi = this.eat('SEMI');
        return { kind: 'ProcedureDecl', name: String(nameToken.value), block, range: span(start.range, semi.range) };
    }

    // var_declaration : ID (COMMA ID)* COLON type_spec
    private varDeclaration(): VarDecl[] {
        const names: Token[] = [this.eat('ID')];
        while (this.check('COMMA')) {
            this.eat('COMMA');
            names.push(this.eat('ID'));
        }
        this.eat('COLON');
        const typeToken = this.currentToken;
        const typeName = this.typeSpec();

        return names.map((name): VarDecl => ({
            kind: 'VarDecl',
            variableName: String(name.value),
            typeName,
            range: span(name.range, typeToken.range)
        }));
    }

    // type_spec : INTEGER | REAL
    private typeSpec(): TypeName {
        if (this.check('INTEGER')) {
            this.eat('INTEGER');
            return 'INTEGER';
        }
        this.eat('REAL');
        return 'REAL';
    }

    // compound_statement : BEGIN statement_list END
    private compoundStatement(): Compound {
        const begin = this.eat('BEGIN');
        const statements = this.statementList();
        const end = this.eat('END');
        return { kind: 'Compound', statements, range: span(begin.range, end.range) };
    }

    // statement_list : statement (SEMI statement)*
    private statementList(): Statement[] {
        const statements: Statement[] = [this.statement()];
        while (this.check('SEMI')) {
            this.eat('SEMI');
            statements.push(this.statement());
        }
        return statements;
    }

    // statement : compound_statement | assignment | empty
    private statement(): Statement {
        if (this.check('BEGIN')) return this.compoundStatement();
        if (this.check('ID')) return this.assignment();
        return this.empty();
    }

    // assignment : variable ASSIGN expr
    private assignment(): Assign {
        const target = this.variable();
        this.eat('ASSIGN');
        const value = this.expr();
        return { kind: 'Assign', target, value, range: span(target.range, value.range) };
    }

    private empty(): NoOp {
        const at: Location = this.lastToken.range.end;
        return { kind: 'NoOp', range: { start: at, end: at } };
    }

    // expr : term ((PLUS | MINUS) term)*
    private expr(): Expr {
        let node = this.term();
        while (ADDITIVE_OPS.has(this.currentToken.kind)) {
            node = this.binary(node, () => this.term());
        }
        return node;
    }

    // term : factor ((MUL | INTEGER_DIV | FLOAT_DIV) factor)*
    private term(): Expr {
        let node = this.factor();
        while (MULTIPLICATIVE_OPS.has(this.currentToken.kind)) {
            node = this.binary(node, () => this.factor());
        }
        return node;
    }

    private binary(left: Expr, operand: () => Expr): Expr {
        const opToken = this.currentToken;
        const op = opToken.kind;
        if (!isBinaryOp(op)) {
            throw this.error(`Expected an operator but found ${describeToken(opToken)}`);
        }
        this.eat(op);
        const right = operand();
        return { kind: 'BinOp', op, left, right, range: span(left.range, right.range) };
    }

    // factor : (PLUS | MINUS) factor | INTEGER_CONST | REAL_CONST | LPAREN expr RPAREN | variable
    private factor(): Expr {
        const token = this.currentToken;

        switch (token.kind) {
            case 'PLUS':
            case 'MINUS': {
                this.eat(token.kind);
                const operand = this.factor();
                return { kind: 'UnaryOp', op: token.kind, operand, range: span(token.range, operand.range) };
            }
            case 'INTEGER_CONST':
                this.eat('INTEGER_CONST');
                return { kind: 'Num', numericType: 'INTEGER', value: BigInt(String(token.value)), range: token.range };
            case 'REAL_CONST':
                this.eat('REAL_CONST');
                return { kind: 'Num', numericType: 'REAL', value: Number(token.value), range: token.range };
            case 'LPAREN': {
                this.eat('LPAREN');
                const node = this.expr();
                this.eat('RPAREN');
                // Grouping adds no node
                return node;
            }
            default:
                return this.variable();
        }
    }

    // variable : ID
    private variable(): Var {
        const token = this.eat('ID');
        return { kind: 'Var', name: String(token.value), range: token.range };
    }

    // Helpers
    private check(kind: TokenType): boolean {
        return this.currentToken.kind === kind;
    }

    private eat(kind: TokenType): Token {
        const token = this.currentToken;
        if (token.kind !== kind) {
            throw this.error(`Expected ${kind} but found ${describeToken(token)}`);
        }
        this.lastToken = token;
        this.currentToken = this.lexer.getNextToken();
        return token;
    }

    private error(message: string): LangError {
        const { line, col } = this.currentToken.range.start;
        return new LangError('InvalidSyntax', `Invalid syntax: ${message} at line ${line}, column ${col}`, {
            range: this.currentToken.range,
            token: this.currentToken
        });
    }
}

export function parseProgram(input: string): Program {
    return new Parser(new Lexer(input)).parse();
}
