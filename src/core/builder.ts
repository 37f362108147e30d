import { ParseError, invalidCharacter, unexpectedEof } from '../errors.js';
import { Value } from '../value/value.js';
import { Char, isDigit } from './chars.js';
import type { Cursor } from './cursor.js';
import { scanNumber } from './number.js';
import { scanString } from './string.js';

// ============ Build Context ============

export interface BuildContext {
    cursor: Cursor;
    maxDepth: number;
}

// ============ Value Dispatcher ============

/**
 * Parse one value, choosing the sub-parser from the next byte.
 * `depth` is the number of containers already open around it.
 */
export function parseValue(ctx: BuildContext, depth: number): Value {
    const c = ctx.cursor.peek();
    if (c === undefined) throw unexpectedEof();

    if (c === Char.n) return parseNull(ctx.cursor);
    if (c === Char.t || c === Char.f) return Value.boolean(parseBoolean(ctx.cursor));
    if (c === Char.plus || c === Char.minus || isDigit(c)) return Value.number(scanNumber(ctx.cursor));
    if (c === Char.doubleQuote) return Value.string(scanString(ctx.cursor));
    if (c === Char.openBracket) return parseArray(ctx, depth + 1);
    if (c === Char.openBrace) return parseObject(ctx, depth + 1);

    throw invalidCharacter(ctx.cursor.position);
}

// ============ Keywords ============

function parseNull(cursor: Cursor): Value {
    if (!cursor.matches('null')) throw invalidCharacter(cursor.position);
    cursor.advance(4);
    return Value.null();
}

function parseBoolean(cursor: Cursor): boolean {
    if (cursor.matches('true')) {
        cursor.advance(4);
        return true;
    }
    if (cursor.matches('false')) {
        cursor.advance(5);
        return false;
    }
    throw invalidCharacter(cursor.position);
}

// ============ Containers ============

/**
 * Consume the opening byte of a container and enforce the depth limit.
 */
function open(ctx: BuildContext, bracket: number, depth: number): void {
    const item = ctx.cursor.indexedNext();
    if (item === undefined) throw unexpectedEof();
    const [index, c] = item;
    if (c !== bracket) throw invalidCharacter(index);
    if (depth > ctx.maxDepth) {
        throw new ParseError({ kind: 'DEPTH_EXCEEDED', index, maxDepth: ctx.maxDepth });
    }
}

/**
 * `[ value ( , value )* ]` or `[]`. Neither leading nor trailing commas.
 */
export function parseArray(ctx: BuildContext, depth: number): Value {
    const { cursor } = ctx;
    open(ctx, Char.openBracket, depth);

    const node = Value.array();
    for (;;) {
        cursor.eatWhitespace();
        const c = cursor.peek();
        if (c === undefined) throw unexpectedEof();

        if (c === Char.closeBracket && node.len() === 0) {
            cursor.advance(1);
            return node;
        }
        if (c === Char.closeBracket || c === Char.comma) {
            throw new ParseError({ kind: 'UNEXPECTED_SEPARATOR', index: cursor.position });
        }

        node.push(parseValue(ctx, depth));
        cursor.eatWhitespace();

        const item = cursor.indexedNext();
        if (item === undefined) throw unexpectedEof();
        const [index, next] = item;
        if (next === Char.closeBracket) return node;
        if (next !== Char.comma) throw invalidCharacter(index);
    }
}

/**
 * `{ "key" : value ( , "key" : value )* }` or `{}`. Keys must be quoted;
 * a repeated key keeps the last value.
 */
export function parseObject(ctx: BuildContext, depth: number): Value {
    const { cursor } = ctx;
    open(ctx, Char.openBrace, depth);

    const node = Value.object();
    for (;;) {
        cursor.eatWhitespace();
        const c = cursor.peek();
        if (c === undefined) throw unexpectedEof();

        if (c === Char.closeBrace && node.len() === 0) {
            cursor.advance(1);
            return node;
        }
        if (c === Char.closeBrace || c === Char.comma) {
            throw new ParseError({ kind: 'UNEXPECTED_SEPARATOR', index: cursor.position });
        }
        if (c !== Char.doubleQuote) throw invalidCharacter(cursor.position);

        const key = scanString(cursor);
        cursor.eatWhitespace();
        expect(cursor, Char.colon);
        cursor.eatWhitespace();
        node.insert(key, parseValue(ctx, depth));
        cursor.eatWhitespace();

        const item = cursor.indexedNext();
        if (item === undefined) throw unexpectedEof();
        const [index, next] = item;
        if (next === Char.closeBrace) return node;
        if (next !== Char.comma) throw invalidCharacter(index);
    }
}

function expect(cursor: Cursor, byte: number): void {
    const item = cursor.indexedNext();
    if (item === undefined) throw unexpectedEof();
    const [index, c] = item;
    if (c !== byte) throw invalidCharacter(index);
}
