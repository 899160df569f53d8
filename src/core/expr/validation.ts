import { ParseError } from './ast.js';
import { SPACE_CHARS } from './cursor.js';

const BLANK = new RegExp(`^[${SPACE_CHARS}]*$`);
const INVALID_CHARACTER = new RegExp(`[^\\d${SPACE_CHARS}()+\\-*/]`);
const LEADING = new RegExp(`^[${SPACE_CHARS}(]*`);

/**
 * Checks that the input is worth handing to the parser:
 * - not blank
 * - only digits, ASCII whitespace, parentheses and the four operators
 * - a digit first, once any leading whitespace and '(' are skipped
 *
 * Parenthesis balance is not checked: missing '(' at the start and missing ')'
 * at the end are accepted by the parser.
 */
export function validateInput(text: string | null | undefined): string {
    if (text === null || text === undefined || BLANK.test(text)) {
        throw new ParseError('No expression specified');
    }

    const invalid = INVALID_CHARACTER.exec(text);
    if (invalid) {
        throw new ParseError('Input expression contains invalid characters', invalid.index, invalid[0]);
    }

    const first = LEADING.exec(text)?.[0].length ?? 0;
    if (first >= text.length || !/\d/.test(text[first])) {
        throw new ParseError("first non-whitespace/non-'(' character must be numeric", first, text.slice(first, first + 1));
    }

    return text;
}
