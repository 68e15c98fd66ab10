import { LangError } from './errors.js';
import type { Node, Var, VarDecl } from './lang/ast.js';
import type { Range } from '../types/diagnostic.js';

export type BuiltinTypeSymbol = { category: 'builtin'; name: string };
export type VarSymbol = { category: 'var'; name: string; type: BuiltinTypeSymbol };

export type LangSymbol = BuiltinTypeSymbol | VarSymbol;

export const BUILTIN_TYPES: readonly string[] = ['INTEGER', 'REAL'];

export function describeSymbol(symbol: LangSymbol): string {
    return symbol.category === 'var' ? `${symbol.name}:${symbol.type.name}` : symbol.name;
}

/**
 * Flat, case-insensitive table of every name a program declares. Procedures do not open
 * a scope of their own, so one table covers the whole program.
 */
export class SymbolTable {
    // Map<UPPERCASE name, symbol>, insertion ordered
    private symbols = new Map<string, LangSymbol>();

    constructor() {
        for (const name of BUILTIN_TYPES) {
            this.define({ category: 'builtin', name });
        }
    }

    define(symbol: LangSymbol, range?: Range): void {
        const key = symbol.name.toUpperCase();
        if (this.symbols.has(key)) {
            throw new LangError('DuplicateIdentifier', `Duplicate identifier '${symbol.name}'`, {
                range,
                identifier: symbol.name
            });
        }
        this.symbols.set(key, symbol);
    }

    lookup(name: string): LangSymbol | undefined {
        return this.symbols.get(name.toUpperCase());
    }

    has(name: string): boolean {
        return this.symbols.has(name.toUpperCase());
    }

    getSymbols(): LangSymbol[] {
        return Array.from(this.symbols.values());
    }

    get size(): number {
        return this.symbols.size;
    }
}

export interface AnalysisOptions {
    signal?: AbortSignal;
}

/**
 * Declaration/usage checker. Walks the tree once, defining a symbol per variable
 * declaration and failing on the first duplicate or undeclared name.
 *
 * Procedure bodies are parsed but not checked here.
 */
export class SymbolTableBuilder {
    public readonly symtab = new SymbolTable();
    private readonly signal?: AbortSignal;

    constructor(options: AnalysisOptions = {}) {
        this.signal = options.signal;
    }

    build(tree: Node): SymbolTable {
        this.visit(tree);
        return this.symtab;
    }

    visit(node: Node): void {
        this.signal?.throwIfAborted();

        switch (node.kind) {
            case 'Program':
                this.visit(node.block);
                return;
            case 'Block':
                for (const decl of node.declarations) {
                    this.visit(decl);
                }
                this.visit(node.compound);
                return;
            case 'VarDecl':
                this.declareVariable(node);
                return;
            case 'ProcedureDecl':
                return;
            case 'Compound':
                for (const statement of node.statements) {
                    this.visit(statement);
                }
                return;
            case 'Assign':
                this.resolve(node.target);
                this.visit(node.value);
                return;
            case 'Var':
                this.resolve(node);
                return;
            case 'BinOp':
                this.visit(node.left);
                this.visit(node.right);
                return;
            case 'UnaryOp':
                this.visit(node.operand);
                return;
            case 'Num':
            case 'NoOp':
                return;
        }
    }

    private declareVariable(node: VarDecl): void {
        const typeSymbol = this.symtab.lookup(node.typeName);
        if (!typeSymbol || typeSymbol.category !== 'builtin') {
            throw new LangError('UndeclaredIdentifier', `Unknown type '${node.typeName}'`, {
                range: node.range,
                identifier: node.typeName
            });
        }

        this.symtab.define({ category: 'var', name: node.variableName, type: typeSymbol }, node.range);
    }

    private resolve(node: Var): void {
        if (!this.symtab.has(node.name)) {
            throw new LangError('UndeclaredIdentifier', `Identifier not found '${node.name}'`, {
                range: node.range,
                identifier: node.name
            });
        }
    }
}

export function buildSymbolTable(tree: Node, options?: AnalysisOptions): SymbolTable {
    return new SymbolTableBuilder(options).build(tree);
}
