// Public API for the expression parser.
// Usage: import { parse } from 'intexpr';

import { Evaluable, EvaluationError, ParseError, ParseLogger, ParseResult } from './core/expr/ast.js';
import { toEvaluable } from './core/expr/evaluate.js';
import { parseTree } from './core/expr/parser.js';

export interface ParseOptions {
    // Receives a trace of the parse attempt and its outcome. Default: none.
    logger?: ParseLogger;
}

const START_MARK = '>'.repeat(30);
const END_MARK = '<'.repeat(30);

/**
 * Parses an integer arithmetic expression. Throws ParseError if it is malformed.
 */
export function parse(expression: string | null | undefined, options?: ParseOptions): Evaluable {
    const logger = options?.logger;
    logger?.debug(START_MARK);
    logger?.debug(`Parsing expression: '${expression}'`);
    try {
        const evaluable = toEvaluable(parseTree(expression, logger));
        if (logger) logger.debug(describeValue(expression, evaluable));
        return evaluable;
    } catch (e) {
        if (e instanceof ParseError) {
            logger?.debug(`Parsed expression '${expression}' is invalid: ${e.message}`);
        }
        throw e;
    } finally {
        logger?.debug(END_MARK);
    }
}

/**
 * Like parse, but reports a malformed expression in the result instead of throwing.
 */
export function parseExpression(expression: string | null | undefined, options?: ParseOptions): ParseResult {
    try {
        return { ok: true, evaluable: parse(expression, options) };
    } catch (e) {
        if (e instanceof ParseError) {
            return { ok: false, error: e };
        }
        throw e;
    }
}

function describeValue(expression: string | null | undefined, evaluable: Evaluable): string {
    try {
        return `Parsed expression '${expression}' is valid and has value ${evaluable.evaluate()}`;
    } catch (e) {
        if (e instanceof EvaluationError) {
            return `Parsed expression '${expression}' is valid but cannot be evaluated: ${e.message}`;
        }
        throw e;
    }
}

export { ParseError, EvaluationError } from './core/expr/ast.js';
export type { Evaluable, Expr, OperatorSymbol, ParseLogger, ParseResult, Range } from './core/expr/ast.js';
export { evaluate } from './core/expr/evaluate.js';
export { formatExpr } from './core/expr/print.js';
export { OPERATORS } from './core/expr/operators.js';
export type { Operator, OperatorName } from './core/expr/operators.js';
