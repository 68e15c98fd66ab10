import { readFileSync } from 'fs';
import path from 'path';
import { Stage } from '../types/diagnostic.js';
import type { Diagnostic } from '../types/diagnostic.js';
import { LangError, toDiagnostic } from './errors.js';
import { Interpreter } from './interpreter.js';
import { Lexer, tokenize } from './lang/lexer.js';
import { Parser } from './lang/parser.js';
import type { Program } from './lang/ast.js';
import type { Token } from './lang/tokens.js';
import type { GlobalStore } from './runtime/values.js';
import { SymbolTableBuilder } from './symbols.js';
import type { SymbolTable } from './symbols.js';

export interface UnitOptions {
    /** Run the declaration/usage pass before evaluation */
    semantic?: boolean;
    /** Stop after the semantic pass */
    checkOnly?: boolean;
    signal?: AbortSignal;
}

/**
 * One source text taken through lexing, parsing, the symbol pass and evaluation. The first
 * failing stage records a single diagnostic and the later stages are skipped.
 */
export class CompilationUnit {
    public diagnostics: Diagnostic[] = [];
    public readonly filePath: string;
    public source?: string;
    public tree?: Program;
    public symbols?: SymbolTable;
    public globals?: GlobalStore;
    private readonly options: UnitOptions;

    constructor(filePath: string, options: UnitOptions = {}) {
        this.filePath = filePath;
        this.options = options;
    }

    static fromSource(source: string, options: UnitOptions = {}, filePath = '<input>'): CompilationUnit {
        const unit = new CompilationUnit(filePath, options);
        unit.source = source;
        return unit;
    }

    get name(): string {
        return path.basename(this.filePath);
    }

    get ok(): boolean {
        return !this.diagnostics.some(d => d.severity === 'error');
    }

    load(): boolean {
        if (this.source !== undefined) return true;
        try {
            this.source = readFileSync(this.filePath, 'utf8');
            return true;
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            this.diagnostics.push({
                code: 'FILE_READ_ERROR',
                message: `Failed to read file: ${reason}`,
                severity: 'error',
                file: this.filePath,
                stage: Stage.IO
            });
            return false;
        }
    }

    /** Token stream of the source, through EOF. */
    tokens(): Token[] | undefined {
        if (!this.load() || this.source === undefined) return undefined;
        const source = this.source;
        return this.guard(() => tokenize(source));
    }

    run(): boolean {
        if (!this.load() || this.source === undefined) return false;
        const source = this.source;
        const { semantic = true, checkOnly = false, signal } = this.options;

        const tree = this.guard(() => new Parser(new Lexer(source)).parse());
        if (!tree) return false;
        this.tree = tree;

        if (semantic) {
            const symbols = this.guard(() => new SymbolTableBuilder({ signal }).build(tree));
            if (!symbols) return false;
            this.symbols = symbols;
        }

        if (checkOnly) return true;

        const globals = this.guard(() => new Interpreter(tree, { signal }).interpret());
        if (!globals) return false;
        this.globals = globals;
        return true;
    }

    private guard<T>(stage: () => T): T | undefined {
        try {
            return stage();
        } catch (e) {
            if (e instanceof LangError) {
                this.diagnostics.push(toDiagnostic(e, this.filePath));
                return undefined;
            }
            throw e;
        }
    }
}
