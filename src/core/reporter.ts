import ansis from 'ansis';
import type { Diagnostic, Severity } from '../types/diagnostic.js';
import type { Token } from './lang/tokens.js';
import type { LangSymbol } from './symbols.js';
import { describeSymbol } from './symbols.js';
import { formatValue, jsonInteger, toJSONNumber } from './runtime/values.js';
import type { GlobalStore } from './runtime/values.js';

export type OutputFormat = 'pretty' | 'plain' | 'json' | 'compact';
export type ColorMode = 'auto' | 'always' | 'never';

export interface ReporterOptions {
    color: ColorMode;
    format: OutputFormat;
}

export interface FileReport {
    name: string;
    path: string;
    diagnostics: Diagnostic[];
}

export interface SummaryStats {
    files: { total: number; passed: number; failed: number };
    errors: number;
    warnings: number;
}

export class Reporter {
    private options: ReporterOptions;
    private shouldColor: boolean;
    private startTime: number;

    constructor(options: ReporterOptions) {
        this.options = options;
        this.shouldColor = this.shouldUseColor();
        this.startTime = Date.now();
    }

    private shouldUseColor(): boolean {
        if (this.options.color === 'never') return false;
        if (this.options.color === 'always') return true;
        if (this.options.format === 'plain' || this.options.format === 'json') return false;

        // auto mode: check environment
        const hasNoColor = process.env.NO_COLOR !== undefined;
        const hasForceColor = process.env.FORCE_COLOR !== undefined;
        const isTTY = process.stdout.isTTY === true;

        return !hasNoColor && (hasForceColor || isTTY);
    }

    private getElapsedTime(): string {
        const elapsed = Date.now() - this.startTime;
        return (elapsed / 1000).toFixed(2);
    }

    private colorize(text: string, color: (text: string) => string): string {
        return this.shouldColor ? color(text) : text;
    }

    private getSeverityIcon(severity: Severity): string {
        return severity === 'error' ? '✖' : '⚠';
    }

    private getSeverityColor(severity: Severity): (text: string) => string {
        return severity === 'error' ? ansis.red : ansis.yellow;
    }

    private isQuiet(): boolean {
        return this.options.format === 'json' || this.options.format === 'compact';
    }

    formatDiagnostic(diagnostic: Diagnostic): string {
        const { file, code, message, severity, range } = diagnostic;
        const location = range ? `:${range.start.line}:${range.start.col}` : '';

        if (this.options.format === 'json') {
            return JSON.stringify(diagnostic);
        }

        if (this.options.format === 'compact') {
            const severityChar = severity === 'error' ? 'E' : 'W';
            return `${file}${location} [${code}] ${severityChar}: ${message}`;
        }

        const coloredIcon = this.colorize(this.getSeverityIcon(severity), this.getSeverityColor(severity));
        const coloredSeverity = this.colorize(severity.toUpperCase(), this.getSeverityColor(severity));
        const coloredCode = this.colorize(`[${code}]`, ansis.cyan);
        const coloredLocation = this.colorize(`${file}${location}`, ansis.bold);

        return `  ${coloredIcon} ${coloredSeverity}  ${coloredCode}  ${coloredLocation}  ${message}`;
    }

    printBanner(version: string, fileCount: number): void {
        if (this.isQuiet()) return;

        const header = this.colorize(`┌ minipas ${version}  •  Running ${fileCount} file${fileCount === 1 ? '' : 's'}`, ansis.bold);
        const divider = this.colorize('└────────────────────────────────────────────────────────', ansis.dim);

        console.log(header);
        console.log(divider);
        console.log();
    }

    printFileHeader(report: FileReport): void {
        if (this.isQuiet()) return;

        const name = this.colorize(`File: ${report.name}`, ansis.bold);
        const filePath = this.colorize(`(${report.path})`, ansis.dim);
        console.log(`${name}  ${filePath}`);
    }

    printDiagnostics(report: FileReport): void {
        if (this.isQuiet()) {
            report.diagnostics.forEach(d => console.log(this.formatDiagnostic(d)));
            return;
        }

        if (report.diagnostics.length === 0) {
            const successIcon = this.colorize('✓', ansis.green);
            console.log(`  ${successIcon} ${this.colorize('No errors', ansis.green)}`);
            return;
        }

        report.diagnostics.forEach(d => console.log(this.formatDiagnostic(d)));
    }

    printTokens(tokens: Token[]): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify({ tokens: tokens.map(t => ({ kind: t.kind, value: typeof t.value === 'bigint' ? jsonInteger(t.value) : t.value })) }));
            return;
        }
        for (const token of tokens) {
            const kind = this.colorize(token.kind.padEnd(13), ansis.cyan);
            const location = `${token.range.start.line}:${token.range.start.col}`;
            console.log(`  ${location.padEnd(7)} ${kind} ${token.value === null ? '' : String(token.value)}`.trimEnd());
        }
    }

    printSource(source: string): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify({ source }));
            return;
        }
        for (const line of source.trimEnd().split('\n')) {
            console.log(`  ${line}`);
        }
    }

    printSymbols(symbols: LangSymbol[]): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify({
                symbols: symbols.map(s => s.category === 'var'
                    ? { name: s.name, category: s.category, type: s.type.name }
                    : { name: s.name, category: s.category })
            }));
            return;
        }

        console.log(this.colorize('  Symbol table', ansis.cyan));
        for (const symbol of symbols) {
            console.log(`    ${symbol.name.padStart(7)}: ${describeSymbol(symbol)}`);
        }
    }

    printGlobals(globals: GlobalStore): void {
        if (this.options.format === 'json') {
            const entries = Array.from(globals, ([name, v]) => [name, { kind: v.kind, value: toJSONNumber(v) }]);
            console.log(JSON.stringify({ globals: Object.fromEntries(entries) }));
            return;
        }

        if (this.options.format === 'compact') {
            const pairs = Array.from(globals, ([name, v]) => `${name}=${formatValue(v)}`);
            console.log(pairs.join(' '));
            return;
        }

        console.log(this.colorize('  Global store', ansis.cyan));
        for (const [name, value] of globals) {
            console.log(`    ${name} = ${formatValue(value)}`);
        }
    }

    printSummary(stats: SummaryStats): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify({
                summary: stats,
                timing: { elapsedSeconds: this.getElapsedTime() }
            }));
            return;
        }

        if (this.options.format === 'compact') {
            console.log(`Summary: ${stats.errors} errors, ${stats.warnings} warnings (${this.getElapsedTime()}s)`);
            return;
        }

        const divider = this.colorize('────────────────────────────────────────────────────────', ansis.dim);
        console.log();
        console.log(divider);
        console.log(this.colorize('Summary', ansis.bold));
        console.log();

        console.log(this.colorize('Files:', ansis.cyan) + ` ${stats.files.total}`);
        const passedStr = this.colorize(`Passed: ${stats.files.passed}`, ansis.green);
        const failedStr = this.colorize(`Failed: ${stats.files.failed}`, stats.files.failed > 0 ? ansis.red : ansis.dim);
        console.log(`  ${passedStr}  ${failedStr}`);
        console.log();

        console.log(this.colorize(`Ran ${stats.files.total} files in ${this.getElapsedTime()}s`, ansis.dim));

        const exitCode = stats.errors > 0 ? 1 : 0;
        console.log(this.colorize(`Exit code: ${exitCode}`, exitCode === 0 ? ansis.green : ansis.red));
    }

    printSuccess(): void {
        if (this.isQuiet()) return;

        console.log();
        const successIcon = this.colorize('✓', ansis.green);
        console.log(`${successIcon} ${this.colorize('All programs ran successfully!', ansis.green.bold)}`);
    }

    printError(message: string): void {
        if (this.options.format === 'json') {
            console.error(JSON.stringify({ error: message }));
            return;
        }

        console.error(this.colorize(`Error: ${message}`, ansis.red));
    }

    printWarning(message: string): void {
        if (this.options.format === 'json') {
            console.warn(JSON.stringify({ warning: message }));
            return;
        }

        console.warn(this.colorize(`Warning: ${message}`, ansis.yellow));
    }

    printInfo(message: string): void {
        if (this.options.format === 'json') return;

        console.log(this.colorize(message, ansis.dim));
    }
}
