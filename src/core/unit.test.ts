import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { CompilationUnit } from './unit.js';
import { Stage } from '../types/diagnostic.js';
import { describeSymbol } from './symbols.js';
import { toJS } from './runtime/values.js';

describe('CompilationUnit', () => {
    it('takes a source through every stage', () => {
        const unit = CompilationUnit.fromSource('PROGRAM Test; VAR a, b : INTEGER; BEGIN a := 10; b := a + 5 * 2; END.');

        expect(unit.run()).toBe(true);
        expect(unit.ok).toBe(true);
        expect(unit.diagnostics).toEqual([]);
        expect(unit.tree?.name).toBe('TEST');
        expect(unit.symbols?.getSymbols().map(describeSymbol)).toEqual(['INTEGER', 'REAL', 'A:INTEGER', 'B:INTEGER']);
        expect(unit.globals && toJS(unit.globals)).toEqual({ A: 10n, B: 20n });
    });

    it('records one diagnostic and skips evaluation on a semantic error', () => {
        const unit = CompilationUnit.fromSource('PROGRAM P; BEGIN y := 1; END.');

        expect(unit.run()).toBe(false);
        expect(unit.ok).toBe(false);
        expect(unit.globals).toBeUndefined();
        expect(unit.diagnostics).toEqual([{
            code: 'UNDECLARED_IDENTIFIER',
            message: "Identifier not found 'Y'",
            severity: 'error',
            file: '<input>',
            stage: Stage.SEMANTIC,
            range: {
                start: { line: 1, col: 18, offset: 17 },
                end: { line: 1, col: 19, offset: 18 }
            }
        }]);
    });

    it('can skip the semantic pass', () => {
        const unit = CompilationUnit.fromSource('PROGRAM P; BEGIN y := 1 END.', { semantic: false });

        expect(unit.run()).toBe(true);
        expect(unit.symbols).toBeUndefined();
        expect(unit.globals?.get('Y')).toEqual({ kind: 'integer', value: 1n });
    });

    it('stops after the semantic pass in check-only mode', () => {
        const unit = CompilationUnit.fromSource('PROGRAM P; VAR a : INTEGER; BEGIN a := a + 1 END.', { checkOnly: true });

        expect(unit.run()).toBe(true);
        expect(unit.symbols?.has('A')).toBe(true);
        expect(unit.globals).toBeUndefined();
    });

    it('reports runtime errors with the runtime stage', () => {
        const unit = CompilationUnit.fromSource('PROGRAM P; VAR a, b : INTEGER; BEGIN b := a END.');

        expect(unit.run()).toBe(false);
        expect(unit.diagnostics.map(d => [d.code, d.stage])).toEqual([['UNDEFINED_VARIABLE', Stage.RUNTIME]]);
    });

    it('reports lexer errors before a tree exists', () => {
        const unit = CompilationUnit.fromSource('PROGRAM P; BEGIN # END.');

        expect(unit.run()).toBe(false);
        expect(unit.tree).toBeUndefined();
        expect(unit.diagnostics.map(d => [d.code, d.stage])).toEqual([['INVALID_CHARACTER', Stage.LEX]]);
    });

    it('exposes the token stream', () => {
        const unit = CompilationUnit.fromSource('PROGRAM P;');
        expect(unit.tokens()?.map(t => t.kind)).toEqual(['PROGRAM', 'ID', 'SEMI', 'EOF']);

        const broken = CompilationUnit.fromSource('{ open');
        expect(broken.tokens()).toBeUndefined();
        expect(broken.diagnostics[0].code).toBe('UNTERMINATED_COMMENT');
    });

    it('lets errors that are not language errors propagate', () => {
        const controller = new AbortController();
        controller.abort(new Error('halt'));
        const unit = CompilationUnit.fromSource('PROGRAM P; BEGIN END.', { signal: controller.signal });

        expect(() => unit.run()).toThrow('halt');
    });

    describe('from a file', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(path.join(tmpdir(), 'minipas-unit-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('reads and runs the file', () => {
            const file = path.join(dir, 'half.pas');
            writeFileSync(file, 'PROGRAM Half; VAR x : REAL; BEGIN x := 7 / 2 END.');
            const unit = new CompilationUnit(file);

            expect(unit.name).toBe('half.pas');
            expect(unit.run()).toBe(true);
            expect(unit.globals?.get('X')).toEqual({ kind: 'real', value: 3.5 });
        });

        it('reports a file that cannot be read', () => {
            const file = path.join(dir, 'missing.pas');
            const unit = new CompilationUnit(file);

            expect(unit.run()).toBe(false);
            expect(unit.diagnostics).toHaveLength(1);
            expect(unit.diagnostics[0]).toMatchObject({ code: 'FILE_READ_ERROR', file, stage: Stage.IO });
        });
    });
});
