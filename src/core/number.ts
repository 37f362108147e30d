/**
 * Number Literal State Machine
 *
 *   sign? ( 0 | [1-9][0-9]* ) ( . [0-9]+ )? ( [eE] sign? [0-9]+ )?
 *
 *        ┌───────┐  + -   ┌────────────┐
 *        │ START │───────▶│ AFTER_SIGN │
 *        └───┬───┘        └─────┬──────┘
 *            │ 0 / 1-9          │ 0 / 1-9
 *            ▼                  ▼
 *   ┌────────────┐  ┌──────────────┐
 *   │ AFTER_ZERO │  │ INTEGER_PART │◀─┐ 0-9
 *   └─────┬──────┘  └──────┬───────┘──┘
 *         │ .  e E         │ .  e E
 *         └───────┬────────┘
 *            .    │    e E
 *       ┌─────────┴──────────────┐
 *       ▼                        ▼
 *  ┌─────────────────────┐  ┌────────────────┐  + -  ┌─────────────────────┐
 *  │ AFTER_DECIMAL_POINT │  │ AFTER_EXPONENT │──────▶│ AFTER_EXPONENT_SIGN │
 *  └─────────┬───────────┘  └───────┬────────┘       └──────────┬──────────┘
 *            │ 0-9                  │ 0-9                       │ 0-9
 *            ▼                      ▼                           │
 *  ┌─────────────────┐  e E   ┌───────────────┐                 │
 *  │ FRACTIONAL_PART │───────▶│ EXPONENT_PART │◀────────────────┘
 *  └─────────────────┘        └───────────────┘
 *
 * Accepting states (AFTER_ZERO, INTEGER_PART, FRACTIONAL_PART, EXPONENT_PART)
 * end the literal on `}` `]` `,` whitespace or end of input. The terminator is
 * handed back to the caller by rewinding the cursor one byte. Input that ends
 * in any other state fails at the index one past the last byte.
 */

import { ParseError, invalidCharacter } from '../errors.js';
import { type JsonNumber, floatNumber, isInt64 } from '../value/number.js';
import { Char, isDigit, isWhitespace } from './chars.js';
import type { Cursor } from './cursor.js';

// ============ State Types ============

export type NumberState =
    | 'START'
    | 'AFTER_SIGN'
    | 'AFTER_ZERO'             // no more integer digits may follow
    | 'INTEGER_PART'
    | 'AFTER_DECIMAL_POINT'    // needs at least one digit
    | 'FRACTIONAL_PART'
    | 'AFTER_EXPONENT'         // needs a sign or a digit
    | 'AFTER_EXPONENT_SIGN'    // needs at least one digit
    | 'EXPONENT_PART';

export type Transition =
    | { type: 'continue'; state: NumberState; fraction?: boolean }
    | { type: 'end' }
    | { type: 'reject' };

const ACCEPTING: ReadonlySet<NumberState> = new Set<NumberState>(['AFTER_ZERO', 'INTEGER_PART', 'FRACTIONAL_PART', 'EXPONENT_PART']);

function isTerminator(c: number): boolean {
    return c === Char.closeBrace || c === Char.closeBracket || c === Char.comma || isWhitespace(c);
}

function isExponentMarker(c: number): boolean {
    return c === Char.e || c === Char.E;
}

function isSign(c: number): boolean {
    return c === Char.plus || c === Char.minus;
}

// ============ Transition Function ============

/**
 * Pure transition: current state and input byte to the next step.
 * `fraction` marks the transitions that make the literal a float.
 */
export function transition(state: NumberState, c: number): Transition {
    switch (state) {
        case 'START':
            if (isSign(c)) return { type: 'continue', state: 'AFTER_SIGN' };
            return leadingDigit(c);
        case 'AFTER_SIGN':
            return leadingDigit(c);
        case 'AFTER_ZERO':
            return afterInteger(c);
        case 'INTEGER_PART':
            if (isDigit(c)) return { type: 'continue', state: 'INTEGER_PART' };
            return afterInteger(c);
        case 'AFTER_DECIMAL_POINT':
            return isDigit(c) ? { type: 'continue', state: 'FRACTIONAL_PART' } : { type: 'reject' };
        case 'FRACTIONAL_PART':
            if (isDigit(c)) return { type: 'continue', state: 'FRACTIONAL_PART' };
            if (isExponentMarker(c)) return { type: 'continue', state: 'AFTER_EXPONENT' };
            return isTerminator(c) ? { type: 'end' } : { type: 'reject' };
        case 'AFTER_EXPONENT':
            if (isSign(c)) return { type: 'continue', state: 'AFTER_EXPONENT_SIGN' };
            return isDigit(c) ? { type: 'continue', state: 'EXPONENT_PART' } : { type: 'reject' };
        case 'AFTER_EXPONENT_SIGN':
            return isDigit(c) ? { type: 'continue', state: 'EXPONENT_PART' } : { type: 'reject' };
        case 'EXPONENT_PART':
            if (isDigit(c)) return { type: 'continue', state: 'EXPONENT_PART' };
            return isTerminator(c) ? { type: 'end' } : { type: 'reject' };
    }
}

function leadingDigit(c: number): Transition {
    if (c === Char._0) return { type: 'continue', state: 'AFTER_ZERO' };
    if (c >= Char._1 && c <= Char._9) return { type: 'continue', state: 'INTEGER_PART' };
    return { type: 'reject' };
}

function afterInteger(c: number): Transition {
    if (c === Char.period) return { type: 'continue', state: 'AFTER_DECIMAL_POINT', fraction: true };
    if (isExponentMarker(c)) return { type: 'continue', state: 'AFTER_EXPONENT', fraction: true };
    return isTerminator(c) ? { type: 'end' } : { type: 'reject' };
}

// ============ Scanner ============

/**
 * Consume a number literal at the cursor.
 *
 * Literals without `.` or exponent become 64-bit integers; overflow is an
 * error, never a silent switch to float.
 */
export function scanNumber(cursor: Cursor): JsonNumber {
    const start = cursor.position;
    let end = start;
    let state: NumberState = 'START';
    let isInteger = true;

    for (;;) {
        const item = cursor.indexedNext();
        if (item === undefined) {
            if (!ACCEPTING.has(state)) throw invalidCharacter(cursor.position);
            end = cursor.position;
            break;
        }

        const [index, c] = item;
        const step = transition(state, c);
        if (step.type === 'reject') throw invalidCharacter(index);
        if (step.type === 'end') {
            end = index;
            cursor.rewind();
            break;
        }
        state = step.state;
        if (step.fraction) isInteger = false;
    }

    const text = cursor.slice(start, end);
    return isInteger ? parseInteger(text) : parseFloatLiteral(text);
}

function parseInteger(text: string): JsonNumber {
    let value: bigint;
    try {
        value = BigInt(text);
    } catch (cause) {
        throw new ParseError({ kind: 'PARSE_INT_ERROR', text }, { cause });
    }
    if (!isInt64(value)) {
        throw new ParseError({ kind: 'PARSE_INT_ERROR', text }, {
            cause: new RangeError('number out of range for a signed 64-bit integer'),
        });
    }
    return { type: 'int', value };
}

function parseFloatLiteral(text: string): JsonNumber {
    const value = Number(text);
    if (Number.isNaN(value)) {
        throw new ParseError({ kind: 'PARSE_FLOAT_ERROR', text });
    }
    return floatNumber(value);
}
