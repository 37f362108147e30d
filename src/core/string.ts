import { ParseError, invalidCharacter, unexpectedEof } from '../errors.js';
import { Char } from './chars.js';
import type { Cursor } from './cursor.js';

// Only these get translated; every other escaped character stands for itself.
const ESCAPES: Record<string, string> = {
    'f': '\f',
    'b': '\b',
    'n': '\n',
    'r': '\r',
    't': '\t',
};

function hexValue(c: string): number | undefined {
    const code = c.charCodeAt(0);
    if (code >= 0x30 && code <= 0x39) return code - 0x30;        // 0-9
    if (code >= 0x61 && code <= 0x66) return code - 0x61 + 10;   // a-f
    if (code >= 0x41 && code <= 0x46) return code - 0x41 + 10;   // A-F
    return undefined;
}

// Surrogate code units are not Unicode scalar values.
function isSurrogate(unit: number): boolean {
    return unit >= 0xd800 && unit <= 0xdfff;
}

/**
 * Reads characters of an escaped string one code point at a time.
 */
class CharReader {
    private readonly chars: string[];
    private index = 0;

    constructor(text: string) {
        this.chars = Array.from(text);
    }

    next(): string | undefined {
        return this.index < this.chars.length ? this.chars[this.index++] : undefined;
    }

    readHex4(): number {
        let value = 0;
        for (let i = 0; i < 4; i++) {
            const c = this.next();
            if (c === undefined) throw unexpectedEof();
            const digit = hexValue(c);
            if (digit === undefined) throw new ParseError({ kind: 'INVALID_HEX' });
            value = (value << 4) | digit;
        }
        return value;
    }
}

/**
 * Decode the escape sequences of a raw (still escaped) string body.
 *
 * `\f \b \n \r \t` map to control characters and `\uXXXX` to the scalar
 * value it names; a surrogate is rejected even when a pair is written out.
 * Any other escaped character is kept as is, so `\/`, `\"` and `\\` work
 * alongside looser forms such as `\'`.
 */
export function unescapeString(raw: string): string {
    const reader = new CharReader(raw);
    let out = '';

    for (let c = reader.next(); c !== undefined; c = reader.next()) {
        if (c !== '\\') {
            out += c;
            continue;
        }
        const escaped = reader.next();
        if (escaped === undefined) throw unexpectedEof();
        if (escaped !== 'u') {
            out += ESCAPES[escaped] ?? escaped;
            continue;
        }

        const unit = reader.readHex4();
        if (isSurrogate(unit)) throw new ParseError({ kind: 'INVALID_ESCAPE_SEQUENCE' });
        out += String.fromCharCode(unit);
    }

    return out;
}

/**
 * Consume a double-quoted string at the cursor and return its decoded text.
 *
 * Raw line breaks are not allowed between the quotes. A backslash protects the
 * byte after it from being read as the closing quote; decoding happens once
 * the whole body has been captured.
 */
export function scanString(cursor: Cursor): string {
    const open = cursor.peek();
    if (open === undefined) throw unexpectedEof();
    if (open !== Char.doubleQuote) throw invalidCharacter(cursor.position);

    const quoteIndex = cursor.position;
    cursor.next();
    const start = cursor.position;

    for (;;) {
        const item = cursor.indexedNext();
        if (item === undefined) {
            throw new ParseError({ kind: 'UNEXPECTED_EOF_WHILE_PARSING_STRING', index: quoteIndex });
        }
        const [index, c] = item;
        switch (c) {
            case Char.lineFeed:
            case Char.carriageReturn:
                throw new ParseError({ kind: 'LINE_BREAK_WHILE_PARSING_STRING', index });
            case Char.doubleQuote:
                return unescapeString(cursor.slice(start, index));
            case Char.backslash:
                cursor.advance(1);
                break;
        }
    }
}
