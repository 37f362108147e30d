import { describe, it, expect } from 'vitest';
import { Cursor } from '../src/core/cursor.js';
import { scanString, unescapeString } from '../src/core/string.js';
import { ParseError, failure, parse } from './helpers.js';

/**
 * Escape with the sequences the decoder documents.
 */
function escape(text: string): string {
    const named: Record<string, string> = {
        '\f': '\\f', '\b': '\\b', '\n': '\\n', '\r': '\\r', '\t': '\\t',
        '"': '\\"', '\\': '\\\\',
    };
    let out = '';
    for (const c of text) {
        const code = c.charCodeAt(0);
        if (c in named) out += named[c];
        else if (code < 0x20) out += '\\u' + code.toString(16).padStart(4, '0');
        else out += c;
    }
    return out;
}

describe('Strings', () => {
    describe('scanning', () => {
        it('parses a plain string', () => {
            expect(parse('"hello"').asString()).toBe('hello');
        });

        it('parses an empty string', () => {
            expect(parse('""').asString()).toBe('');
        });

        it('keeps non-ASCII text intact', () => {
            expect(parse('"héllo wörld 😀"').asString()).toBe('héllo wörld 😀');
        });

        it('does not end on an escaped quote', () => {
            expect(parse('"a\\"b"').asString()).toBe('a"b');
        });

        it('leaves the cursor after the closing quote', () => {
            const cursor = new Cursor('"ab" ,');

            expect(scanString(cursor)).toBe('ab');
            expect(cursor.position).toBe(4);
        });

        it('requires an opening quote', () => {
            expect(() => scanString(new Cursor('ab'))).toThrow('Invalid character at index 0.');
            expect(() => scanString(new Cursor(''))).toThrow('Unexpected end of stream.');
        });
    });

    describe('line breaks', () => {
        it('rejects a raw line feed at its index', () => {
            expect(failure('"ab\ncd"')).toEqual({ kind: 'LINE_BREAK_WHILE_PARSING_STRING', index: 3 });
        });

        it('rejects a raw carriage return at its index', () => {
            expect(failure('["x\r"]')).toEqual({ kind: 'LINE_BREAK_WHILE_PARSING_STRING', index: 3 });
        });

        it('accepts a raw tab', () => {
            expect(parse('"a\tb"').asString()).toBe('a\tb');
        });
    });

    describe('unterminated strings', () => {
        it('reports the index of the opening quote', () => {
            expect(failure('"abc')).toEqual({ kind: 'UNEXPECTED_EOF_WHILE_PARSING_STRING', index: 0 });
            expect(failure('{"a": "b')).toEqual({ kind: 'UNEXPECTED_EOF_WHILE_PARSING_STRING', index: 6 });
        });

        it('treats a trailing backslash as hiding the closing quote', () => {
            expect(failure('"abc\\"')).toEqual({ kind: 'UNEXPECTED_EOF_WHILE_PARSING_STRING', index: 0 });
        });

        it('uses the message wording', () => {
            expect(() => parse('  "abc')).toThrow('Unexpected end of stream while parsing string; Start Index: 2');
        });
    });

    describe('escapes', () => {
        it('decodes the single-character escapes', () => {
            expect(parse('"\\f\\b\\n\\r\\t"').asString()).toBe('\f\b\n\r\t');
        });

        it('passes other escaped characters through', () => {
            expect(parse('"\\/\\\\\\""').asString()).toBe('/\\"');
            expect(parse(`"\\'"`).asString()).toBe("'");
            expect(parse('"\\q\\<"').asString()).toBe('q<');
        });

        it('decodes \\u escapes in either case', () => {
            expect(parse('"\\u0041\\u00e9\\u00E9"').asString()).toBe('Aéé');
        });

        it('rejects a surrogate pair written as two escapes', () => {
            expect(failure('"\\ud83d\\ude00"')).toEqual({ kind: 'INVALID_ESCAPE_SEQUENCE' });
            expect(() => unescapeString('\\uD83D\\uDE00')).toThrow('Invalid escape sequence.');
        });

        it('accepts the scalars around the surrogate range', () => {
            expect(parse('"\\ud7ff\\ue000\\uffff"').asString()).toBe('\ud7ff\ue000\uffff');
        });

        it('rejects lone surrogates', () => {
            expect(failure('"\\ud83d"')).toEqual({ kind: 'INVALID_ESCAPE_SEQUENCE' });
            expect(failure('"\\ud83dx"')).toEqual({ kind: 'INVALID_ESCAPE_SEQUENCE' });
            expect(failure('"\\ude00"')).toEqual({ kind: 'INVALID_ESCAPE_SEQUENCE' });
            expect(failure('"\\ud83d\\u0041"')).toEqual({ kind: 'INVALID_ESCAPE_SEQUENCE' });
        });

        it('rejects non-hex digits', () => {
            expect(failure('"\\u12g4"')).toEqual({ kind: 'INVALID_HEX' });
            expect(() => parse('"\\uZZZZ"')).toThrow('Invalid Hex.');
        });

        it('rejects a truncated \\u escape', () => {
            expect(failure('"\\u12"')).toEqual({ kind: 'UNEXPECTED_EOF' });
        });
    });

    describe('unescapeString', () => {
        it('reproduces text escaped with the documented set', () => {
            const samples = [
                'plain',
                'tab\there, line\nbreak',
                'quote " and backslash \\',
                'controls \u0001\u001f \f\b\r',
                'mixed é 😀 \\n literal',
            ];
            for (const sample of samples) {
                expect(unescapeString(escape(sample))).toBe(sample);
            }
        });

        it('fails on a dangling backslash', () => {
            expect(() => unescapeString('abc\\')).toThrow(ParseError);
        });
    });
});
