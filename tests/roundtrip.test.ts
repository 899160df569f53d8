import { formatExpr, parse } from '../src/lib.js';

type Op = '+' | '-' | '*' | '/';
type Tree = { kind: 'num'; value: number } | { kind: 'op'; op: Op; left: Tree; right: Tree };

const OPS: Op[] = ['+', '-', '*', '/'];

// Deterministic so failures reproduce.
function random(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state / 0x100000000;
    };
}

// Independent of the parser: BigInt arithmetic truncates toward zero, then
// the result is wrapped to a signed 32-bit integer.
function reference(tree: Tree): bigint {
    if (tree.kind === 'num') return BigInt(tree.value);
    const left = reference(tree.left);
    const right = reference(tree.right);
    switch (tree.op) {
        case '+': return BigInt.asIntN(32, left + right);
        case '-': return BigInt.asIntN(32, left - right);
        case '*': return BigInt.asIntN(32, left * right);
        case '/': return BigInt.asIntN(32, left / right);
    }
}

function generate(next: () => number, depth: number): Tree {
    if (depth === 0 || next() < 0.25) {
        return { kind: 'num', value: Math.floor(next() * 1000) };
    }
    const left = generate(next, depth - 1);
    const right = generate(next, depth - 1);
    let op = OPS[Math.floor(next() * OPS.length)];
    if (op === '/' && reference(right) === 0n) op = '+';
    return { kind: 'op', op, left, right };
}

function render(tree: Tree, space: () => string): string {
    if (tree.kind === 'num') return String(tree.value);
    return `(${space()}${render(tree.left, space)}${space()}${tree.op}${space()}${render(tree.right, space)}${space()})`;
}

describe('round trip', () => {
    const next = random(20240611);
    const spaces = ['', ' ', '  ', '\t'];
    const space = () => spaces[Math.floor(next() * spaces.length)];
    const trees = Array.from({ length: 200 }, () => generate(next, 4));

    it('evaluates generated expressions like the reference arithmetic', () => {
        for (const tree of trees) {
            const text = render(tree, space);
            expect(parse(text).evaluate(), text).toBe(Number(reference(tree)));
        }
    });

    it('formats back to the canonical rendering', () => {
        for (const tree of trees) {
            const canonical = render(tree, () => ' ').replace(/\( /g, '(').replace(/ \)/g, ')');
            expect(formatExpr(parse(render(tree, space)).expr)).toBe(canonical);
        }
    });
});
