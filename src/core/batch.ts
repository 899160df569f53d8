import fg from 'fast-glob';
import { readFile } from 'fs/promises';
import path from 'path';
import { EvaluationError, ParseError, ParseLogger } from './expr/ast.js';
import { SPACE_CHARS } from './expr/cursor.js';
import { formatExpr } from './expr/print.js';
import { parseExpression } from '../lib.js';
import { Diagnostic, ExpressionStats, Range } from '../types/diagnostic.js';

const LEADING_SPACE = new RegExp(`^[${SPACE_CHARS}]+`);

export interface ExpressionEntry {
    file: string;
    line: number;
    text: string;
}

export interface EvaluationOutcome {
    entry: ExpressionEntry;
    value?: number;
    tree?: string;
    diagnostics: Diagnostic[];
}

export interface BatchOptions {
    files?: string[];
    ignore?: string[];
    logger?: ParseLogger;
}

/**
 * A set of expressions from the command line and from files, one expression per
 * line. Blank lines and lines starting with '#' are skipped.
 */
export class ExpressionBatch {
    public entries: ExpressionEntry[] = [];
    public diagnostics: Diagnostic[] = [];
    public rootPath: string;
    public filePatterns: string[];
    public ignorePatterns: string[];
    private logger?: ParseLogger;

    constructor(rootPath: string, opts?: BatchOptions) {
        this.rootPath = path.resolve(rootPath);
        this.filePatterns = opts?.files || [];
        this.ignorePatterns = opts?.ignore || [];
        this.logger = opts?.logger;
    }

    addExpression(file: string, line: number, text: string): void {
        this.entries.push({ file, line, text });
    }

    addSource(file: string, content: string): void {
        const lines = content.split(/\r?\n/);
        lines.forEach((text, i) => {
            const body = text.replace(LEADING_SPACE, '');
            if (body === '' || body.startsWith('#')) return;
            this.addExpression(file, i + 1, text);
        });
    }

    async load(): Promise<void> {
        if (this.filePatterns.length === 0) return;

        const matches = await fg(this.filePatterns, {
            cwd: this.rootPath,
            ignore: ['**/node_modules/**', ...this.ignorePatterns],
            onlyFiles: true
        });
        matches.sort();

        if (matches.length === 0) {
            this.diagnostics.push({
                code: 'NO_FILES_MATCHED',
                message: `No files matched ${this.filePatterns.map(p => `"${p}"`).join(', ')}`,
                severity: 'warning',
                file: this.rootPath
            });
            return;
        }

        for (const file of matches) {
            try {
                this.addSource(file, await readFile(path.join(this.rootPath, file), 'utf8'));
            } catch (e) {
                this.diagnostics.push({
                    code: 'FILE_UNREADABLE',
                    message: `Unable to read file: ${e instanceof Error ? e.message : String(e)}`,
                    severity: 'error',
                    file
                });
            }
        }
    }

    evaluate(): EvaluationOutcome[] {
        return this.entries.map(entry => this.evaluateEntry(entry));
    }

    private evaluateEntry(entry: ExpressionEntry): EvaluationOutcome {
        const result = parseExpression(entry.text, { logger: this.logger });
        if (!result.ok) {
            return { entry, diagnostics: [parseDiagnostic(entry, result.error)] };
        }

        const tree = formatExpr(result.evaluable.expr);
        try {
            return { entry, value: result.evaluable.evaluate(), tree, diagnostics: [] };
        } catch (e) {
            if (!(e instanceof EvaluationError)) throw e;
            return {
                entry,
                tree,
                diagnostics: [{
                    code: 'EVALUATION_ERROR',
                    message: e.message,
                    severity: 'error',
                    file: entry.file,
                    range: locate(entry, e.range.start, e.range.end)
                }]
            };
        }
    }
}

function locate(entry: ExpressionEntry, start: number, end: number): Range {
    return {
        start: { line: entry.line, col: start + 1, offset: start },
        end: { line: entry.line, col: end + 1, offset: end }
    };
}

function parseDiagnostic(entry: ExpressionEntry, error: ParseError): Diagnostic {
    const { offset, found } = error;
    return {
        code: 'PARSE_ERROR',
        message: error.message,
        severity: 'error',
        file: entry.file,
        // Blank input has no position to point at.
        range: offset === undefined ? undefined : locate(entry, offset, offset + (found?.length ?? 0)),
        found
    };
}

export function summarize(outcomes: EvaluationOutcome[]): ExpressionStats {
    const failed = outcomes.filter(o => o.diagnostics.length > 0).length;
    return { total: outcomes.length, passed: outcomes.length - failed, failed };
}
