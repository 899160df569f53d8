import { Diagnostic, ExpressionStats, Severity } from '../types/diagnostic.js';
import { ParseLogger } from './expr/ast.js';
import type { EvaluationOutcome } from './batch.js';
import ansis from 'ansis';

export type OutputFormat = 'pretty' | 'plain' | 'json' | 'compact';
export type ColorMode = 'auto' | 'always' | 'never';

export interface ReporterOptions {
    color: ColorMode;
    format: OutputFormat;
    verbose: boolean;
    tree: boolean;
}

export class Reporter implements ParseLogger {
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
        if (this.options.format === 'plain') return false; // Plain format never uses color

        // auto mode: check environment
        const hasColorEnv = process.env.NO_COLOR !== undefined;
        const hasForceColor = process.env.FORCE_COLOR !== undefined;
        const isTTY = process.stdout.isTTY;

        return !hasColorEnv && (hasForceColor || isTTY);
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

    private formatLocation(diagnostic: Diagnostic): string {
        const { file, range } = diagnostic;
        return range ? `${file}:${range.start.line}:${range.start.col}` : file;
    }

    formatDiagnostic(diagnostic: Diagnostic): string {
        if (this.options.format === 'json') {
            return JSON.stringify(diagnostic);
        }

        if (this.options.format === 'compact') {
            const severityChar = diagnostic.severity === 'error' ? 'E' : 'W';
            return `${this.formatLocation(diagnostic)} [${diagnostic.code}] ${severityChar}: ${diagnostic.message}`;
        }

        const { code, message, severity } = diagnostic;
        const color = this.getSeverityColor(severity);
        const coloredIcon = this.colorize(this.getSeverityIcon(severity), color);
        const coloredSeverity = this.colorize(severity.toUpperCase(), color);
        const coloredCode = this.colorize(`[${code}]`, ansis.cyan);
        const coloredLocation = this.colorize(this.formatLocation(diagnostic), ansis.bold);

        return `  ${coloredIcon} ${coloredSeverity}  ${coloredCode}  ${coloredLocation}  ${message}`;
    }

    private formatContext(context: string): string {
        return this.colorize(`    ↳ ${context}`, ansis.dim);
    }

    /** Points at the column a diagnostic refers to, beneath the expression text. */
    private formatCaret(text: string, diagnostic: Diagnostic): string[] {
        if (!diagnostic.range) return [];
        const start = diagnostic.range.start.offset;
        const width = Math.max(1, diagnostic.range.end.offset - start);
        return [
            this.formatContext(text),
            this.colorize(`      ${' '.repeat(start)}${'^'.repeat(width)}`, this.getSeverityColor(diagnostic.severity))
        ];
    }

    printBanner(version: string, expressionCount: number): void {
        if (this.options.format === 'json' || this.options.format === 'compact') {
            return;
        }

        const header = this.colorize(`┌ intexpr ${version}  •  Evaluating ${expressionCount} expression${expressionCount === 1 ? '' : 's'}`, ansis.bold);
        const divider = this.colorize('└────────────────────────────────────────────────────────', ansis.dim);

        console.log(header);
        console.log(divider);
        console.log();
    }

    printOutcome(outcome: EvaluationOutcome): void {
        const { entry, value, tree, diagnostics } = outcome;

        if (this.options.format === 'json') {
            console.log(JSON.stringify({
                file: entry.file,
                line: entry.line,
                expression: entry.text,
                value,
                tree: this.options.tree ? tree : undefined,
                diagnostics
            }));
            return;
        }

        if (this.options.format === 'compact') {
            if (value !== undefined) {
                console.log(`${entry.file}:${entry.line} = ${value}`);
            }
            diagnostics.forEach(d => console.log(this.formatDiagnostic(d)));
            return;
        }

        if (value !== undefined) {
            const icon = this.colorize('✓', ansis.green);
            const expression = this.colorize(entry.text.trim(), ansis.bold);
            const result = this.colorize(`= ${value}`, ansis.green);
            console.log(`  ${icon} ${expression}  ${result}`);
        }

        for (const diagnostic of diagnostics) {
            console.log(this.formatDiagnostic(diagnostic));
            this.formatCaret(entry.text, diagnostic).forEach(line => console.log(line));
        }

        if (this.options.tree && tree !== undefined) {
            console.log(this.formatContext(tree));
        }
    }

    printDiagnostics(diagnostics: Diagnostic[]): void {
        diagnostics.forEach(d => {
            if (d.severity === 'error') console.error(this.formatDiagnostic(d));
            else console.warn(this.formatDiagnostic(d));
        });
    }

    printSummary(stats: ExpressionStats): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify({
                summary: stats,
                timing: { elapsedSeconds: this.getElapsedTime() }
            }, null, 2));
            return;
        }

        if (this.options.format === 'compact') {
            console.log(`Summary: ${stats.total} expressions, ${stats.failed} failed (${this.getElapsedTime()}s)`);
            return;
        }

        const divider = this.colorize('────────────────────────────────────────────────────────', ansis.dim);
        console.log();
        console.log(divider);
        console.log(this.colorize('Summary', ansis.bold));
        console.log();

        console.log(this.colorize('Expressions:', ansis.cyan) + ` ${stats.total}`);
        const passedStr = this.colorize(`Passed: ${stats.passed}`, ansis.green);
        const failedStr = this.colorize(`Failed: ${stats.failed}`, stats.failed > 0 ? ansis.red : ansis.dim);
        console.log(`  ${passedStr}  ${failedStr}`);
        console.log();

        console.log(this.colorize(`Evaluated ${stats.total} expressions in ${this.getElapsedTime()}s`, ansis.dim));

        const exitCode = stats.failed > 0 ? 1 : 0;
        console.log(this.colorize(`Exit code: ${exitCode}`, exitCode === 0 ? ansis.green : ansis.red));
    }

    printSuccess(): void {
        if (this.options.format === 'json' || this.options.format === 'compact') {
            return;
        }

        console.log();
        const successIcon = this.colorize('✓', ansis.green);
        const successMsg = this.colorize('All expressions evaluated!', ansis.green.bold);
        console.log(`${successIcon} ${successMsg}`);
    }

    printError(message: string): void {
        if (this.options.format === 'json') {
            console.error(JSON.stringify({ error: message }));
            return;
        }

        console.error(this.colorize(`Error: ${message}`, ansis.red));
    }

    debug(message: string): void {
        if (!this.options.verbose || this.options.format === 'json') return;

        console.log(this.colorize(`[debug] ${message}`, ansis.dim));
    }
}
