// src/codec/integerToken.ts

import { FormatError } from '../models/errors';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse an accumulated ID token
 *
 * Surrounding whitespace is ignored (a blank line before a record leaves a
 * newline at the front of the ID token). Anything else that is not a
 * decimal integer raises FormatError.
 *
 * @param token Raw accumulated characters
 * @param line 1-based line on which the token was committed
 * @param column Column name for the error message
 */
export function parseIntegerToken(token: string, line: number, column: string): number {
    const trimmed = token.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
        throw new FormatError(token, line, column);
    }
    return Number.parseInt(trimmed, 10);
}
