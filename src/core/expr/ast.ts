export type Range = { start: number; end: number };

export type OperatorSymbol = '+' | '-' | '*' | '/';

export type Expr =
    | { kind: 'Literal'; value: number; range: Range }
    | { kind: 'Binary'; op: OperatorSymbol; left: Expr; right: Expr; range: Range };

export type LiteralExpr = Extract<Expr, { kind: 'Literal' }>;
export type BinaryExpr = Extract<Expr, { kind: 'Binary' }>;

/**
 * Splits a left-associative chain into its leftmost operand and the binary
 * nodes above it, innermost first.
 */
export function leftSpine(expr: Expr): { head: LiteralExpr, chain: BinaryExpr[] } {
    const chain: BinaryExpr[] = [];
    let head = expr;
    while (head.kind === 'Binary') {
        chain.push(head);
        head = head.left;
    }
    return { head, chain: chain.reverse() };
}

export class ParseError extends Error {
    constructor(message: string, public readonly offset?: number, public readonly found?: string) {
        super(message);
        this.name = 'ParseError';
    }
}

export class EvaluationError extends Error {
    constructor(message: string, public readonly range: Range) {
        super(message);
        this.name = 'EvaluationError';
    }
}

/** A parsed expression that can be evaluated any number of times. */
export interface Evaluable {
    readonly expr: Expr;
    evaluate(): number;
}

export type ParseResult =
    | { ok: true; evaluable: Evaluable }
    | { ok: false; error: ParseError };

export interface ParseLogger {
    debug(message: string): void;
}

export function literal(value: number, range: Range): Expr {
    return { kind: 'Literal', value, range };
}

export function binary(op: OperatorSymbol, left: Expr, right: Expr): Expr {
    return { kind: 'Binary', op, left, right, range: { start: left.range.start, end: right.range.end } };
}
