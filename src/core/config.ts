import { existsSync, readFileSync } from 'fs';
import { isNode } from 'yaml';
import { ParsedYaml, parseYaml } from '../parser/yaml.js';
import { Diagnostic, Range } from '../types/diagnostic.js';
import type { ColorMode, OutputFormat } from './reporter.js';

export const CONFIG_FILE_NAME = '.intexpr.yml';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['pretty', 'plain', 'json', 'compact'];
export const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never'];

export interface IntexprConfig {
    format?: OutputFormat;
    color?: ColorMode;
    verbose?: boolean;
    tree?: boolean;
    files?: string[];
    ignore?: string[];
}

export interface ConfigFile extends IntexprConfig {
    filePath: string;
    profiles: Record<string, IntexprConfig>;
}

export type Settings = Required<IntexprConfig>;

export const DEFAULT_SETTINGS: Settings = {
    format: 'pretty',
    color: 'auto',
    verbose: false,
    tree: false,
    files: [],
    ignore: []
};

export function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
    const allowed: readonly string[] = values;
    return typeof value === 'string' && allowed.includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rangeOf(parsed: ParsedYaml, path: string[]): Range | undefined {
    const node = parsed.doc.getIn(path, true);
    if (!isNode(node) || !node.range) return undefined;

    const [start, end] = node.range;
    return {
        start: { ...parsed.lineCounter.linePos(start), offset: start },
        end: { ...parsed.lineCounter.linePos(end), offset: end }
    };
}

function readSection(parsed: ParsedYaml, raw: Record<string, unknown>, path: string[], diagnostics: Diagnostic[]): IntexprConfig {
    const section: IntexprConfig = {};

    const invalid = (key: string, message: string) => {
        diagnostics.push({
            code: 'CONFIG_INVALID',
            message,
            severity: 'warning',
            file: parsed.filePath,
            range: rangeOf(parsed, [...path, key])
        });
    };

    const globs = (key: string, value: unknown): string[] | undefined => {
        const list: unknown[] = Array.isArray(value) ? value : [value];
        if (list.every((v): v is string => typeof v === 'string')) return list;
        invalid(key, `"${key}" must be a glob or a list of globs`);
        return undefined;
    };

    for (const [key, value] of Object.entries(raw)) {
        switch (key) {
            case 'format':
                if (isOneOf(OUTPUT_FORMATS, value)) section.format = value;
                else invalid(key, `"format" must be one of ${OUTPUT_FORMATS.join(', ')}`);
                break;
            case 'color':
                if (isOneOf(COLOR_MODES, value)) section.color = value;
                else invalid(key, `"color" must be one of ${COLOR_MODES.join(', ')}`);
                break;
            case 'verbose':
            case 'tree':
                if (typeof value === 'boolean') section[key] = value;
                else invalid(key, `"${key}" must be true or false`);
                break;
            case 'files':
            case 'ignore':
                section[key] = globs(key, value);
                break;
            case 'profiles':
                // Handled by readConfig for the top level only.
                if (path.length > 0) invalid(key, 'Profiles cannot be nested');
                break;
            default:
                invalid(key, `Unknown option "${key}"`);
        }
    }

    return section;
}

/**
 * Reads configuration from YAML text. Syntax errors discard the whole file;
 * invalid options are reported and skipped.
 */
export function readConfig(text: string, filePath: string): { config?: ConfigFile, diagnostics: Diagnostic[] } {
    const { parsed, diagnostics } = parseYaml(text, filePath);
    if (!parsed) return { diagnostics };

    const root: unknown = parsed.doc.toJS();
    if (root === null || root === undefined) {
        return { config: { filePath, profiles: {} }, diagnostics };
    }
    if (!isRecord(root)) {
        diagnostics.push({
            code: 'CONFIG_INVALID',
            message: 'Configuration must be a YAML mapping',
            severity: 'warning',
            file: filePath
        });
        return { diagnostics };
    }

    const config: ConfigFile = { ...readSection(parsed, root, [], diagnostics), filePath, profiles: {} };

    const profiles = root.profiles;
    if (isRecord(profiles)) {
        for (const [name, profile] of Object.entries(profiles)) {
            if (isRecord(profile)) {
                config.profiles[name] = readSection(parsed, profile, ['profiles', name], diagnostics);
            } else {
                diagnostics.push({
                    code: 'CONFIG_INVALID',
                    message: `Profile "${name}" must be a mapping`,
                    severity: 'warning',
                    file: filePath,
                    range: rangeOf(parsed, ['profiles', name])
                });
            }
        }
    } else if (profiles !== undefined) {
        diagnostics.push({
            code: 'CONFIG_INVALID',
            message: '"profiles" must be a mapping of profile names to options',
            severity: 'warning',
            file: filePath,
            range: rangeOf(parsed, ['profiles'])
        });
    }

    return { config, diagnostics };
}

export function loadConfig(configPath: string): { config?: ConfigFile, diagnostics: Diagnostic[] } {
    if (!existsSync(configPath)) return { diagnostics: [] };
    return readConfig(readFileSync(configPath, 'utf8'), configPath);
}

/**
 * Merges defaults, the config file, the selected profile and command-line options,
 * later sources winning. Glob lists are concatenated rather than replaced.
 */
export function resolveSettings(cli: IntexprConfig, config: ConfigFile | undefined, profileName: string | undefined, diagnostics: Diagnostic[]): Settings {
    const layers: IntexprConfig[] = [];
    if (config) {
        layers.push(config);
        if (profileName) {
            const profile = Object.hasOwn(config.profiles, profileName) ? config.profiles[profileName] : undefined;
            if (profile) {
                layers.push(profile);
            } else {
                diagnostics.push({
                    code: 'CONFIG_INVALID',
                    message: `Unknown profile "${profileName}"`,
                    severity: 'warning',
                    file: config.filePath
                });
            }
        }
    }
    layers.push(cli);

    const settings: Settings = { ...DEFAULT_SETTINGS, files: [], ignore: [] };
    for (const layer of layers) {
        if (layer.format !== undefined) settings.format = layer.format;
        if (layer.color !== undefined) settings.color = layer.color;
        if (layer.verbose !== undefined) settings.verbose = layer.verbose;
        if (layer.tree !== undefined) settings.tree = layer.tree;
        if (layer.files) settings.files.push(...layer.files);
        if (layer.ignore) settings.ignore.push(...layer.ignore);
    }
    return settings;
}
