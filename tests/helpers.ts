import { ParseError, ParseLogger } from '../src/lib.js';

/** Runs fn and returns the ParseError it throws. */
export function catchParseError(fn: () => unknown): ParseError {
    try {
        fn();
    } catch (e) {
        if (e instanceof ParseError) return e;
        throw e;
    }
    throw new Error('expected a ParseError');
}

export function recordingLogger(): ParseLogger & { messages: string[] } {
    const messages: string[] = [];
    return { messages, debug: (message: string) => { messages.push(message); } };
}
