import { Cursor, DIGITS, LEFT_PAREN, RIGHT_PAREN, TRAILING, WHITESPACE, matchOneOf } from './cursor.js';
import { Expr, OperatorSymbol, ParseError, ParseLogger, binary, literal } from './ast.js';
import { HIGH_PRIORITY, LOW_PRIORITY } from './operators.js';
import { validateInput } from './validation.js';

// Every rule returns undefined without consuming input when it does not apply,
// so callers can try alternatives in sequence.
type Rule = () => Expr | undefined;

interface OperatorTier {
    pattern: RegExp;
    symbols: readonly OperatorSymbol[];
}

const MAX_LITERAL = 2147483647;

const LOW_PRIORITY_OPS: OperatorTier = { pattern: matchOneOf(LOW_PRIORITY), symbols: LOW_PRIORITY };
const HIGH_PRIORITY_OPS: OperatorTier = { pattern: matchOneOf(HIGH_PRIORITY), symbols: HIGH_PRIORITY };

export class Parser {
    private cursor: Cursor;

    constructor(input: string | null | undefined, logger?: ParseLogger) {
        this.cursor = new Cursor(validateInput(input), logger);
    }

    public parse(): Expr {
        const expr = this.parseLowPriority();
        if (!expr) {
            throw new ParseError('No expression specified', this.cursor.offset);
        }

        // Whitespace and unmatched ')' may follow the expression; anything else may not.
        this.cursor.matchNext(TRAILING);
        if (!this.cursor.atEnd()) {
            throw new ParseError('Expression contains extraneous characters', this.cursor.offset, this.cursor.rest());
        }

        return expr;
    }

    private parseLowPriority(): Expr | undefined {
        return this.parseBinaryChain(() => this.parseHighPriority(), LOW_PRIORITY_OPS);
    }

    private parseHighPriority(): Expr | undefined {
        return this.parseBinaryChain(() => this.parseAtomic(), HIGH_PRIORITY_OPS);
    }

    /**
     * operand (operator operand)*, folded to the left.
     */
    private parseBinaryChain(operand: Rule, operators: OperatorTier): Expr | undefined {
        let left = operand();
        if (!left) return undefined;

        for (;;) {
            const op = this.matchOperator(operators);
            if (op === undefined) break;

            const right = operand();
            if (!right) {
                throw new ParseError('Operator must be followed by an expression', this.cursor.offset);
            }
            left = binary(op, left, right);
        }

        return left;
    }

    private matchOperator({ pattern, symbols }: OperatorTier): OperatorSymbol | undefined {
        const text = this.cursor.matchNext(pattern);
        return symbols.find(symbol => symbol === text);
    }

    private parseAtomic(): Expr | undefined {
        this.cursor.matchNext(WHITESPACE);
        const expr = this.parseNumber() ?? this.parseParenthesized();
        if (expr) {
            this.cursor.matchNext(WHITESPACE);
        }
        return expr;
    }

    private parseNumber(): Expr | undefined {
        const start = this.cursor.offset;
        const digits = this.cursor.matchNext(DIGITS);
        if (digits === undefined) return undefined;

        const value = Number(digits);
        if (value > MAX_LITERAL) {
            throw new ParseError('Number is out of range', start, digits);
        }
        return literal(value, { start, end: this.cursor.offset });
    }

    private parseParenthesized(): Expr | undefined {
        if (this.cursor.matchNext(LEFT_PAREN) === undefined) return undefined;

        const expr = this.parseLowPriority();
        if (!expr) {
            throw new ParseError('Left parenthesis must be followed by an expression', this.cursor.offset);
        }

        // A missing ')' is accepted here; the top-level trailing check or an
        // enclosing group accounts for it.
        this.cursor.matchNext(RIGHT_PAREN);
        return expr;
    }
}

export function parseTree(input: string | null | undefined, logger?: ParseLogger): Expr {
    return new Parser(input, logger).parse();
}
