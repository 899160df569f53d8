#!/usr/bin/env node
import { Command, Option } from 'commander';
import { readFileSync, existsSync } from 'fs';
import path from 'path';
import { ExpressionBatch, summarize } from './core/batch.js';
import { CONFIG_FILE_NAME, COLOR_MODES, IntexprConfig, OUTPUT_FORMATS, isOneOf, loadConfig, resolveSettings } from './core/config.js';
import { Reporter } from './core/reporter.js';
import { Diagnostic } from './types/diagnostic.js';

const pkg: { version: string } = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));

interface CliOptions {
    file: string[];
    ignore: string[];
    format?: string;
    color?: string;
    tree?: boolean;
    verbose?: boolean;
    config?: string;
    profile?: string;
}

const collect = (val: string, memo: string[]) => { memo.push(val); return memo; };

const program = new Command();

program
    .name('intexpr')
    .description('Integer arithmetic expression parser and evaluator')
    .version(pkg.version)
    .argument('[expressions...]', 'Expressions to evaluate, e.g. "(50 - 11) * 2"')
    .option('-f, --file <glob>', 'Evaluate every line of the files matching the glob (can be used multiple times)', collect, [])
    .option('--ignore <glob>', 'Ignore files matching the given glob patterns (can be used multiple times)', collect, [])
    .addOption(new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS))
    .addOption(new Option('--color <mode>', 'Color output').choices(COLOR_MODES))
    .option('--tree', 'Show each expression fully parenthesized')
    .option('--verbose', 'Log every parse attempt')
    .option('--config <path>', `Path to a config file (defaults to ${CONFIG_FILE_NAME} in the working directory)`)
    .option('--profile <name>', 'Use a specific profile from the config file')
    .action(async (expressions: string[], options: CliOptions) => {
        const configDiagnostics: Diagnostic[] = [];
        const configPath = options.config ?? path.join(process.cwd(), CONFIG_FILE_NAME);

        if (options.config && !existsSync(configPath)) {
            configDiagnostics.push({
                code: 'CONFIG_INVALID',
                message: 'Config file not found',
                severity: 'warning',
                file: configPath
            });
        }

        const { config, diagnostics } = loadConfig(configPath);
        configDiagnostics.push(...diagnostics);

        const cli: IntexprConfig = {
            format: isOneOf(OUTPUT_FORMATS, options.format) ? options.format : undefined,
            color: isOneOf(COLOR_MODES, options.color) ? options.color : undefined,
            tree: options.tree,
            verbose: options.verbose,
            files: options.file,
            ignore: options.ignore
        };
        const settings = resolveSettings(cli, config, options.profile, configDiagnostics);

        const reporter = new Reporter({
            color: settings.color,
            format: settings.format,
            verbose: settings.verbose,
            tree: settings.tree
        });
        reporter.printDiagnostics(configDiagnostics);

        const batch = new ExpressionBatch(process.cwd(), {
            files: settings.files,
            ignore: settings.ignore,
            logger: reporter
        });
        expressions.forEach((text, i) => batch.addExpression(`<arg ${i + 1}>`, 1, text));
        await batch.load();
        reporter.printDiagnostics(batch.diagnostics);

        if (batch.entries.length === 0) {
            reporter.printError('No expressions given. Pass expressions as arguments or use --file.');
            process.exit(1);
        }

        reporter.printBanner(pkg.version, batch.entries.length);

        const outcomes = batch.evaluate();
        outcomes.forEach(outcome => reporter.printOutcome(outcome));

        const stats = summarize(outcomes);
        reporter.printSummary(stats);

        const fileErrors = batch.diagnostics.filter(d => d.severity === 'error').length;
        if (stats.failed === 0 && fileErrors === 0) {
            reporter.printSuccess();
        } else {
            process.exit(1);
        }
    });

await program.parseAsync();
