import { Evaluable, EvaluationError, Expr, leftSpine } from './ast.js';
import { OPERATORS } from './operators.js';

/**
 * Evaluates an expression tree, left operand before right.
 * Chains such as `1 + 2 + 3 + ...` are folded in a loop; only parenthesized
 * operands recurse. Throws EvaluationError on division by zero.
 */
export function evaluate(expr: Expr): number {
    const { head, chain } = leftSpine(expr);
    let value = head.value;
    for (const node of chain) {
        const right = evaluate(node.right);
        if (node.op === '/' && right === 0) {
            throw new EvaluationError('Division by zero', node.right.range);
        }
        value = OPERATORS[node.op].apply(value, right);
    }
    return value;
}

export function toEvaluable(expr: Expr): Evaluable {
    return Object.freeze({
        expr,
        evaluate: () => evaluate(expr),
    });
}
