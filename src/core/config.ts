import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { isMap, isScalar, isSeq } from 'yaml';
import type { YAMLMap } from 'yaml';
import { parseYaml, getNodeRange } from '../parser/yaml.js';
import type { ParsedYaml } from '../parser/yaml.js';
import { Stage } from '../types/diagnostic.js';
import type { Diagnostic } from '../types/diagnostic.js';
import type { ColorMode, OutputFormat } from './reporter.js';

export const CONFIG_FILE_NAME = '.minipas.yml';

export interface RunConfig {
    format: OutputFormat;
    color: ColorMode;
    /** Print the symbol table after the semantic pass */
    symbols: boolean;
    /** Print the global store after evaluation */
    globals: boolean;
    /** Run the declaration/usage pass before evaluation */
    semantic: boolean;
    extensions: string[];
    ignore: string[];
}

export const DEFAULT_CONFIG: RunConfig = {
    format: 'pretty',
    color: 'auto',
    symbols: false,
    globals: true,
    semantic: true,
    extensions: ['pas'],
    ignore: []
};

const FORMATS: readonly OutputFormat[] = ['pretty', 'plain', 'json', 'compact'];
const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never'];

export function isOutputFormat(value: unknown): value is OutputFormat {
    return FORMATS.some(f => f === value);
}

export function isColorMode(value: unknown): value is ColorMode {
    return COLOR_MODES.some(c => c === value);
}

export interface LoadedConfig {
    config: RunConfig;
    diagnostics: Diagnostic[];
    /** Path of the file that was read, if any */
    source?: string;
}

/**
 * Reads a `.minipas.yml` file and layers it over the defaults. Keys at the top level
 * apply first, then the keys of `profiles.<profile>` when a profile is given.
 */
export function loadConfig(configPath: string, profile?: string): LoadedConfig {
    const config: RunConfig = { ...DEFAULT_CONFIG, extensions: [...DEFAULT_CONFIG.extensions], ignore: [] };

    if (!existsSync(configPath)) {
        return { config, diagnostics: [] };
    }

    const { parsed, diagnostics } = parseYaml(readFileSync(configPath, 'utf8'), configPath);
    if (!parsed) {
        return { config, diagnostics, source: configPath };
    }

    const root = parsed.doc.contents;
    if (root === null) {
        return { config, diagnostics, source: configPath };
    }
    if (!isMap(root)) {
        diagnostics.push({
            code: 'CONFIG_NOT_A_MAP',
            message: 'Config file must contain a YAML mapping.',
            severity: 'error',
            file: configPath,
            stage: Stage.CONFIG,
            range: getNodeRange(root, parsed.lineCounter)
        });
        return { config, diagnostics, source: configPath };
    }

    applyConfig(root, config, parsed, diagnostics);

    if (profile) {
        const profiles = root.get('profiles', true);
        const selected = isMap(profiles) ? profiles.get(profile, true) : undefined;
        if (isMap(selected)) {
            applyConfig(selected, config, parsed, diagnostics);
        } else {
            diagnostics.push({
                code: 'CONFIG_PROFILE_MISSING',
                message: `Profile "${profile}" not found in ${path.basename(configPath)}.`,
                severity: 'warning',
                file: configPath,
                stage: Stage.CONFIG
            });
        }
    }

    return { config, diagnostics, source: configPath };
}

function applyConfig(map: YAMLMap<unknown, unknown>, target: RunConfig, parsed: ParsedYaml, diagnostics: Diagnostic[]): void {
    for (const pair of map.items) {
        if (!isScalar(pair.key)) continue;
        const key = String(pair.key.value);
        const node = pair.value;

        const invalid = (expected: string) => {
            diagnostics.push({
                code: 'CONFIG_INVALID_VALUE',
                message: `"${key}" must be ${expected}.`,
                severity: 'warning',
                file: parsed.filePath,
                stage: Stage.CONFIG,
                range: getNodeRange(node, parsed.lineCounter)
            });
        };

        switch (key) {
            case 'format': {
                const value = isScalar(node) ? node.value : undefined;
                if (isOutputFormat(value)) target.format = value;
                else invalid(`one of ${FORMATS.join(', ')}`);
                break;
            }
            case 'color': {
                const value = isScalar(node) ? node.value : undefined;
                if (isColorMode(value)) target.color = value;
                else invalid(`one of ${COLOR_MODES.join(', ')}`);
                break;
            }
            case 'symbols':
            case 'globals':
            case 'semantic': {
                const value = isScalar(node) ? node.value : undefined;
                if (typeof value === 'boolean') target[key] = value;
                else invalid('a boolean');
                break;
            }
            case 'extensions':
            case 'ignore': {
                const list = readStringList(node);
                if (!list) {
                    invalid('a string or a list of strings');
                    break;
                }
                target[key] = key === 'extensions'
                    ? list.map(e => e.trim().replace(/^\./, '')).filter(Boolean)
                    : [...target.ignore, ...list];
                break;
            }
            case 'profiles':
                break;
            default:
                diagnostics.push({
                    code: 'CONFIG_UNKNOWN_KEY',
                    message: `Unknown config key "${key}".`,
                    severity: 'warning',
                    file: parsed.filePath,
                    stage: Stage.CONFIG,
                    range: getNodeRange(pair.key, parsed.lineCounter)
                });
        }
    }
}

function readStringList(node: unknown): string[] | undefined {
    if (isScalar(node) && typeof node.value === 'string') {
        return [node.value];
    }
    if (isSeq(node)) {
        const items: string[] = [];
        for (const item of node.items) {
            if (!isScalar(item) || typeof item.value !== 'string') return undefined;
            items.push(item.value);
        }
        return items;
    }
    return undefined;
}
