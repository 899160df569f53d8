import { OperatorSymbol } from './ast.js';

export type OperatorName = 'Add' | 'Subtract' | 'Multiply' | 'Divide';

export interface Operator {
    name: OperatorName;
    symbol: OperatorSymbol;
    // Operands and result are 32-bit signed integers; overflow wraps.
    apply(a: number, b: number): number;
}

export const OPERATORS: Record<OperatorSymbol, Operator> = {
    '+': { name: 'Add', symbol: '+', apply: (a, b) => (a + b) | 0 },
    '-': { name: 'Subtract', symbol: '-', apply: (a, b) => (a - b) | 0 },
    '*': { name: 'Multiply', symbol: '*', apply: (a, b) => Math.imul(a, b) },
    // Truncates toward zero. Callers guard against a zero divisor.
    '/': { name: 'Divide', symbol: '/', apply: (a, b) => Math.trunc(a / b) | 0 },
};

export const LOW_PRIORITY: readonly OperatorSymbol[] = ['+', '-'];
export const HIGH_PRIORITY: readonly OperatorSymbol[] = ['*', '/'];
