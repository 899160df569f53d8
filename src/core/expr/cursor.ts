import { ParseLogger } from './ast.js';

// ASCII whitespace only: space, tab, line feed, vertical tab, form feed, carriage return.
export const SPACE_CHARS = ' \\t\\n\\x0B\\f\\r';

// All patterns are sticky so they only ever match at the cursor offset.
export const WHITESPACE = new RegExp(`[${SPACE_CHARS}]+`, 'y');
export const DIGITS = /\d+/y;
export const LEFT_PAREN = /\(/y;
export const RIGHT_PAREN = /\)/y;
export const TRAILING = new RegExp(`[${SPACE_CHARS})]+`, 'y');

/**
 * Builds a pattern matching exactly one of the given characters.
 */
export function matchOneOf(chars: readonly string[]): RegExp {
    const escaped = chars.map(c => c.replace(/[\\\]^-]/g, '\\$&')).join('');
    return new RegExp(`[${escaped}]`, 'y');
}

export class Cursor {
    private current: number = 0;

    constructor(public readonly text: string, private logger?: ParseLogger) {}

    get offset(): number {
        return this.current;
    }

    /**
     * Matches `pattern` at the current offset. On a hit the offset moves past the
     * matched text, which is returned; on a miss nothing changes.
     */
    matchNext(pattern: RegExp): string | undefined {
        if (!pattern.sticky) {
            throw new Error(`Pattern ${pattern} must be sticky`);
        }

        pattern.lastIndex = this.current;
        const match = pattern.exec(this.text);
        if (!match || match[0].length === 0) {
            this.logger?.debug(`No match found for '${pattern.source}' at ${this.current}`);
            return undefined;
        }

        this.logger?.debug(`Found character(s) matching '${pattern.source}' at ${this.current}: '${match[0]}'`);
        this.current += match[0].length;
        return match[0];
    }

    atEnd(): boolean {
        return this.current >= this.text.length;
    }

    rest(): string {
        return this.text.slice(this.current);
    }
}
