import { Expr, leftSpine } from './ast.js';

/** Renders an expression with every binary operation in parentheses, e.g. `((50 - 11) * 2)`. */
export function formatExpr(expr: Expr): string {
    const { head, chain } = leftSpine(expr);
    let text = String(head.value);
    for (const node of chain) {
        text = `(${text} ${node.op} ${formatExpr(node.right)})`;
    }
    return text;
}
