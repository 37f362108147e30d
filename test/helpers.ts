import { parse } from '../src/parser.js';
import { ParseError, type ParseErrorDetail } from '../src/errors.js';
import type { ParseOptions } from '../src/types.js';
import type { Value } from '../src/value/value.js';

/**
 * Parse text that is expected to fail and return the error it raised.
 */
export function parseError(text: string, options?: ParseOptions): ParseError {
    try {
        parse(text, options);
    } catch (error) {
        if (error instanceof ParseError) return error;
        throw error;
    }
    throw new Error(`expected ${JSON.stringify(text)} to fail`);
}

/**
 * Shorthand for the detail of a failing parse.
 */
export function failure(text: string, options?: ParseOptions): ParseErrorDetail {
    return parseError(text, options).detail;
}

/**
 * Keys of an object node in iteration order.
 */
export function keysOf(value: Value): string[] {
    const map = value.asObject();
    if (map === undefined) throw new Error(`expected an object, got ${value.kind}`);
    return [...map.keys()];
}

export { parse, ParseError };
