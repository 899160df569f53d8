import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { ExpressionBatch, summarize } from '../src/core/batch.js';
import { recordingLogger } from './helpers.js';

describe('ExpressionBatch', () => {
    it('takes one expression per line, skipping blanks and comments', () => {
        const batch = new ExpressionBatch('.');
        batch.addSource('a.expr', '# sums\n1 + 2\n\n   \r\n(4 * 5\r\n');
        expect(batch.entries).toEqual([
            { file: 'a.expr', line: 2, text: '1 + 2' },
            { file: 'a.expr', line: 5, text: '(4 * 5' }
        ]);
    });

    it('evaluates every entry and reports failures as diagnostics', () => {
        const batch = new ExpressionBatch('.');
        batch.addExpression('<arg 1>', 1, '50 - 11 * 2');
        batch.addExpression('<arg 2>', 1, '3 +');
        batch.addExpression('<arg 3>', 1, '1 / 0');

        const [ok, invalid, failing] = batch.evaluate();

        expect(ok.value).toBe(28);
        expect(ok.tree).toBe('(50 - (11 * 2))');
        expect(ok.diagnostics).toEqual([]);

        expect(invalid.value).toBeUndefined();
        expect(invalid.diagnostics).toEqual([{
            code: 'PARSE_ERROR',
            message: 'Operator must be followed by an expression',
            severity: 'error',
            file: '<arg 2>',
            range: {
                start: { line: 1, col: 4, offset: 3 },
                end: { line: 1, col: 4, offset: 3 }
            },
            found: undefined
        }]);

        expect(failing.value).toBeUndefined();
        expect(failing.tree).toBe('(1 / 0)');
        expect(failing.diagnostics).toEqual([{
            code: 'EVALUATION_ERROR',
            message: 'Division by zero',
            severity: 'error',
            file: '<arg 3>',
            range: {
                start: { line: 1, col: 5, offset: 4 },
                end: { line: 1, col: 6, offset: 5 }
            }
        }]);

        expect(summarize([ok, invalid, failing])).toEqual({ total: 3, passed: 1, failed: 2 });
    });

    it('spans the offending text in parse diagnostics', () => {
        const batch = new ExpressionBatch('.');
        batch.addExpression('sums.expr', 7, '1 2 3');
        const [outcome] = batch.evaluate();
        expect(outcome.diagnostics[0].range).toEqual({
            start: { line: 7, col: 3, offset: 2 },
            end: { line: 7, col: 6, offset: 5 }
        });
        expect(outcome.diagnostics[0].found).toBe('2 3');
    });

    it('passes the logger to the parser', () => {
        const logger = recordingLogger();
        const batch = new ExpressionBatch('.', { logger });
        batch.addExpression('<arg 1>', 1, '2');
        batch.evaluate();
        expect(logger.messages).toContain("Parsing expression: '2'");
    });

    describe('load', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(path.join(tmpdir(), 'intexpr-'));
            mkdirSync(path.join(dir, 'nested'));
            writeFileSync(path.join(dir, 'sums.expr'), '1 + 1\n2 * 3\n');
            writeFileSync(path.join(dir, 'nested', 'skip.expr'), '9\n');
            writeFileSync(path.join(dir, 'notes.txt'), 'not an expression\n');
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('reads files matching the globs', async () => {
            const batch = new ExpressionBatch(dir, { files: ['**/*.expr'], ignore: ['nested/**'] });
            await batch.load();
            expect(batch.diagnostics).toEqual([]);
            expect(batch.entries).toEqual([
                { file: 'sums.expr', line: 1, text: '1 + 1' },
                { file: 'sums.expr', line: 2, text: '2 * 3' }
            ]);
        });

        it('warns when nothing matches', async () => {
            const batch = new ExpressionBatch(dir, { files: ['*.none'] });
            await batch.load();
            expect(batch.entries).toEqual([]);
            expect(batch.diagnostics).toEqual([{
                code: 'NO_FILES_MATCHED',
                message: 'No files matched "*.none"',
                severity: 'warning',
                file: path.resolve(dir)
            }]);
        });

        it('does nothing without globs', async () => {
            const batch = new ExpressionBatch(dir);
            await batch.load();
            expect(batch.entries).toEqual([]);
            expect(batch.diagnostics).toEqual([]);
        });
    });

    it('leaves the range out when a parse error has no position', () => {
        const batch = new ExpressionBatch('.');
        batch.addExpression('<arg 1>', 1, '   ');
        const [outcome] = batch.evaluate();
        expect(outcome.diagnostics).toEqual([{
            code: 'PARSE_ERROR',
            message: 'No expression specified',
            severity: 'error',
            file: '<arg 1>',
            range: undefined,
            found: undefined
        }]);
    });

    it('keeps lines holding only non-ASCII whitespace', () => {
        const batch = new ExpressionBatch('.');
        batch.addSource('a.expr', '\u00A0\n\x0B# note\n1 + 1');
        expect(batch.entries.map(e => e.line)).toEqual([1, 3]);
        const [blank, sum] = batch.evaluate();
        expect(blank.diagnostics[0].message).toBe('Input expression contains invalid characters');
        expect(blank.diagnostics[0].range?.start).toEqual({ line: 1, col: 1, offset: 0 });
        expect(sum.value).toBe(2);
    });

    it('evaluates a long chain and carries on to the next entry', () => {
        const batch = new ExpressionBatch('.');
        batch.addExpression('<arg 1>', 1, Array(100000).fill('1').join('+'));
        batch.addExpression('<arg 2>', 1, '1 + 1');
        expect(batch.evaluate().map(o => o.value)).toEqual([100000, 2]);
    });
});
