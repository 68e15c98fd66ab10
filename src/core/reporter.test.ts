import { afterEach, describe, it, expect, vi } from 'vitest';
import { Reporter } from './reporter.js';
import type { OutputFormat } from './reporter.js';
import { Stage } from '../types/diagnostic.js';
import type { Diagnostic } from '../types/diagnostic.js';
import { createInteger, createReal } from './runtime/values.js';
import type { GlobalStore, NumValue } from './runtime/values.js';
import { SymbolTable } from './symbols.js';
import { tokenize } from './lang/lexer.js';

// Helper to capture console output
function captureConsole(fn: () => void, method: 'log' | 'error' = 'log'): string[] {
    const output: string[] = [];
    const spy = vi.spyOn(console, method).mockImplementation((...args: unknown[]) => {
        output.push(args.map(String).join(' '));
    });
    try {
        fn();
    } finally {
        spy.mockRestore();
    }
    return output;
}

const reporter = (format: OutputFormat) => new Reporter({ color: 'never', format });

const diagnostic: Diagnostic = {
    code: 'UNDECLARED_IDENTIFIER',
    message: "Identifier not found 'Y'",
    severity: 'error',
    file: 'prog.pas',
    stage: Stage.SEMANTIC,
    range: { start: { line: 1, col: 18, offset: 17 }, end: { line: 1, col: 19, offset: 18 } }
};

const globals: GlobalStore = new Map<string, NumValue>([
    ['A', createInteger(10n)],
    ['X', createReal(3)]
]);

describe('Reporter', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('formats diagnostics for each output format', () => {
        expect(reporter('plain').formatDiagnostic(diagnostic))
            .toBe("  ✖ ERROR  [UNDECLARED_IDENTIFIER]  prog.pas:1:18  Identifier not found 'Y'");
        expect(reporter('compact').formatDiagnostic(diagnostic))
            .toBe("prog.pas:1:18 [UNDECLARED_IDENTIFIER] E: Identifier not found 'Y'");
        expect(reporter('json').formatDiagnostic(diagnostic)).toBe(JSON.stringify(diagnostic));
    });

    it('omits the location when a diagnostic has no range', () => {
        const warning: Diagnostic = { code: 'CONFIG_UNKNOWN_KEY', message: 'Unknown config key "x".', severity: 'warning', file: '.minipas.yml' };
        expect(reporter('compact').formatDiagnostic(warning)).toBe('.minipas.yml [CONFIG_UNKNOWN_KEY] W: Unknown config key "x".');
    });

    it('prints a success line when a file has no diagnostics', () => {
        const lines = captureConsole(() => reporter('pretty').printDiagnostics({ name: 'a.pas', path: '/tmp/a.pas', diagnostics: [] }));
        expect(lines).toEqual(['  ✓ No errors']);
    });

    it('prints the banner and file header in pretty mode only', () => {
        const pretty = captureConsole(() => {
            reporter('pretty').printBanner('0.1.0', 2);
            reporter('pretty').printFileHeader({ name: 'a.pas', path: '/tmp/a.pas', diagnostics: [] });
        });
        expect(pretty[0]).toBe('┌ minipas 0.1.0  •  Running 2 files');
        expect(pretty[3]).toBe('File: a.pas  (/tmp/a.pas)');

        const compact = captureConsole(() => reporter('compact').printBanner('0.1.0', 2));
        expect(compact).toEqual([]);
    });

    it('prints reals with a fractional part', () => {
        expect(captureConsole(() => reporter('plain').printGlobals(globals))).toEqual([
            '  Global store',
            '    A = 10',
            '    X = 3.0'
        ]);
        expect(captureConsole(() => reporter('compact').printGlobals(globals))).toEqual(['A=10 X=3.0']);
    });

    it('keeps the value kind in JSON output', () => {
        expect(captureConsole(() => reporter('json').printGlobals(globals))).toEqual([
            '{"globals":{"A":{"kind":"integer","value":10},"X":{"kind":"real","value":3}}}'
        ]);
    });

    it('writes integers beyond the JSON-safe range as strings', () => {
        const big: GlobalStore = new Map([['B', createInteger(9007199254740993n)]]);
        expect(captureConsole(() => reporter('json').printGlobals(big))).toEqual([
            '{"globals":{"B":{"kind":"integer","value":"9007199254740993"}}}'
        ]);
        expect(captureConsole(() => reporter('compact').printGlobals(big))).toEqual(['B=9007199254740993']);
    });

    it('prints the symbol table with right-aligned names', () => {
        const table = new SymbolTable();
        table.define({ category: 'var', name: 'A', type: { category: 'builtin', name: 'INTEGER' } });

        expect(captureConsole(() => reporter('plain').printSymbols(table.getSymbols()))).toEqual([
            '  Symbol table',
            '    INTEGER: INTEGER',
            '       REAL: REAL',
            '          A: A:INTEGER'
        ]);
        expect(captureConsole(() => reporter('json').printSymbols(table.getSymbols()))).toEqual([
            '{"symbols":[{"name":"INTEGER","category":"builtin"},{"name":"REAL","category":"builtin"},{"name":"A","category":"var","type":"INTEGER"}]}'
        ]);
    });

    it('prints one token per line with its position', () => {
        const lines = captureConsole(() => reporter('plain').printTokens(tokenize('x')));
        expect(lines).toEqual([
            '  1:1     ID' + ' '.repeat(12) + 'X',
            '  1:2     EOF'
        ]);
    });

    it('prints a compact summary', () => {
        vi.spyOn(Date, 'now').mockReturnValue(1000);
        const compact = reporter('compact');
        const lines = captureConsole(() => compact.printSummary({ files: { total: 2, passed: 1, failed: 1 }, errors: 1, warnings: 0 }));
        expect(lines).toEqual(['Summary: 1 errors, 0 warnings (0.00s)']);
    });

    it('writes errors as JSON objects in JSON mode', () => {
        const lines = captureConsole(() => reporter('json').printError('boom'), 'error');
        expect(lines).toEqual(['{"error":"boom"}']);
    });

    it('stays silent for info lines in JSON mode', () => {
        expect(captureConsole(() => reporter('json').printInfo('scanning'))).toEqual([]);
    });
});
