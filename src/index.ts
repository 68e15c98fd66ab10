#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync, existsSync, statSync } from 'fs';
import path from 'path';
import fg from 'fast-glob';
import { CompilationUnit } from './core/unit.js';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG, isColorMode, isOutputFormat, loadConfig } from './core/config.js';
import type { RunConfig } from './core/config.js';
import { Reporter } from './core/reporter.js';
import type { SummaryStats } from './core/reporter.js';
import { formatProgram } from './core/lang/printer.js';
import type { Diagnostic } from './types/diagnostic.js';

interface CliOptions {
    format: string;
    color: string;
    symbols: boolean;
    globals: boolean;
    semantic: boolean;
    check: boolean;
    tokens: boolean;
    ast: boolean;
    workspace: boolean;
    ext?: string;
    ignore: string[];
    config?: string;
    profile?: string;
}

const pkg: { version: string } = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));

const program = new Command();

program
    .name('minipas')
    .description('Run programs written in a small Pascal-like language')
    .version(pkg.version)
    .argument('<path>', 'Path to a source file, or a directory with --workspace')
    .option('--format <pretty|plain|json|compact>', 'Output format (pretty, plain, json, compact)', 'pretty')
    .option('--color <auto|always|never>', 'Color output (auto, always, never)', 'auto')
    .option('--symbols', 'Print the symbol table after the semantic pass', false)
    .option('--no-globals', 'Do not print the global variable store')
    .option('--no-semantic', 'Skip the declaration/usage pass')
    .option('--check', 'Only lex, parse and check declarations; do not evaluate', false)
    .option('--tokens', 'Print the token stream', false)
    .option('--ast', 'Print the program re-rendered from its syntax tree', false)
    .option('--workspace', 'Recursively run every source file under the given directory', false)
    .option('--ext <csv>', 'Comma-separated source extensions (no dots), e.g. "pas,mp"')
    .option('--ignore <glob>', 'Ignore files matching the given glob patterns (can be used multiple times)', (val: string, memo: string[]) => { memo.push(val); return memo; }, [])
    .option(`--config <path>`, `Path to a config file (defaults to ${CONFIG_FILE_NAME} next to the target)`)
    .option('--profile <name>', 'Use a specific profile from the config file')
    .action(async (targetPath: string, options: CliOptions, command: Command) => {
        const fromCli = (key: string) => command.getOptionValueSource(key) === 'cli';

        const targetDir = existsSync(targetPath) && statSync(targetPath).isDirectory() ? targetPath : path.dirname(targetPath);
        const loaded = loadConfig(options.config ?? path.join(targetDir, CONFIG_FILE_NAME), options.profile);
        const config: RunConfig = loaded.config;

        // Flags given on the command line win over the config file
        if (fromCli('format') || !loaded.source) {
            if (isOutputFormat(options.format)) config.format = options.format;
        }
        if (fromCli('color') || !loaded.source) {
            if (isColorMode(options.color)) config.color = options.color;
        }
        if (fromCli('symbols')) config.symbols = options.symbols;
        if (fromCli('globals')) config.globals = options.globals;
        if (fromCli('semantic')) config.semantic = options.semantic;
        if (options.ext) {
            config.extensions = options.ext.split(',').map(s => s.trim().replace(/^\./, '')).filter(Boolean);
        }
        config.ignore.push(...options.ignore);

        const reporter = new Reporter({ color: config.color, format: config.format });

        if (!isOutputFormat(options.format)) {
            reporter.printWarning(`Unknown format "${options.format}", using "${config.format}".`);
        }
        for (const d of loaded.diagnostics) {
            const where = d.range ? `${d.file}:${d.range.start.line}:${d.range.start.col}` : d.file;
            if (d.severity === 'error') reporter.printError(`${where} ${d.message}`);
            else reporter.printWarning(`${where} ${d.message}`);
        }

        let files: string[] = [];
        if (options.workspace) {
            reporter.printInfo(`Scanning workspace for sources: ${targetPath}`);
            const extensions = config.extensions.length > 0 ? config.extensions : DEFAULT_CONFIG.extensions;
            const extPart = extensions.length > 1 ? `{${extensions.join(',')}}` : extensions[0];
            const matches = await fg(`**/*.${extPart}`, { cwd: targetPath, absolute: true, ignore: ['**/node_modules/**', ...config.ignore] });
            files = matches.sort();
            reporter.printInfo(`Found ${files.length} files.`);
            reporter.printInfo('');
        } else if (existsSync(targetPath) && statSync(targetPath).isFile()) {
            files = [targetPath];
        } else {
            reporter.printError(`No source file at ${targetPath}. Use --workspace to scan a directory.`);
            process.exit(1);
        }

        reporter.printBanner(pkg.version, files.length);

        const allDiagnostics: Diagnostic[] = [];
        let failed = 0;

        for (const [index, file] of files.entries()) {
            const unit = new CompilationUnit(file, { semantic: config.semantic, checkOnly: options.check });
            const report = { name: unit.name, path: file, diagnostics: unit.diagnostics };
            reporter.printFileHeader(report);

            let lexed = true;
            if (options.tokens) {
                const tokens = unit.tokens();
                if (tokens) reporter.printTokens(tokens);
                else lexed = false;
            }

            if (lexed && unit.run()) {
                if (options.ast && unit.tree) reporter.printSource(formatProgram(unit.tree));
                if (config.symbols && unit.symbols) reporter.printSymbols(unit.symbols.getSymbols());
                if (config.globals && unit.globals) reporter.printGlobals(unit.globals);
            }

            reporter.printDiagnostics(report);
            allDiagnostics.push(...unit.diagnostics);
            if (!unit.ok) failed++;

            if (index < files.length - 1 && config.format !== 'json' && config.format !== 'compact') {
                console.log();
            }
        }

        const stats: SummaryStats = {
            files: { total: files.length, passed: files.length - failed, failed },
            errors: allDiagnostics.filter(d => d.severity === 'error').length,
            warnings: allDiagnostics.filter(d => d.severity === 'warning').length
        };

        reporter.printSummary(stats);

        if (failed === 0) {
            reporter.printSuccess();
        } else {
            process.exit(1);
        }
    });

await program.parseAsync();
