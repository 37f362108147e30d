import { describe, it, expect } from 'vitest';
import { INT64_MAX } from '../src/value/number.js';
import { failure, keysOf, parse } from './helpers.js';

describe('Basic JSON Parsing', () => {
    describe('primitive roots', () => {
        it('parses null', () => {
            expect(parse('null').isNull()).toBe(true);
        });

        it('parses booleans', () => {
            expect(parse('true').asBoolean()).toBe(true);
            expect(parse('false').asBoolean()).toBe(false);
        });

        it('parses a string root', () => {
            expect(parse('"hello"').asString()).toBe('hello');
        });

        it('parses a number root', () => {
            expect(parse('42').asInt()).toBe(42n);
        });
    });

    describe('keywords', () => {
        it('rejects a truncated keyword at its start', () => {
            expect(failure('nul')).toEqual({ kind: 'INVALID_CHARACTER', index: 0 });
            expect(failure('[tru]')).toEqual({ kind: 'INVALID_CHARACTER', index: 1 });
            expect(failure('fals')).toEqual({ kind: 'INVALID_CHARACTER', index: 0 });
        });

        it('rejects keywords with trailing letters', () => {
            expect(failure('nullx')).toEqual({ kind: 'INVALID_CHARACTER', index: 4 });
        });

        it('is case sensitive', () => {
            expect(failure('True')).toEqual({ kind: 'INVALID_CHARACTER', index: 0 });
        });
    });

    describe('surrounding whitespace', () => {
        it('allows leading and trailing whitespace', () => {
            expect(parse('null   ').isNull()).toBe(true);
            expect(parse(' \n\t[1]\r\n ').len()).toBe(1);
            expect(parse('\f{}\f').len()).toBe(0);
        });

        it('rejects content after the value', () => {
            expect(failure('null garbage')).toEqual({ kind: 'INVALID_CHARACTER', index: 5 });
            expect(failure('[1] [2]')).toEqual({ kind: 'INVALID_CHARACTER', index: 4 });
            expect(failure('1 2')).toEqual({ kind: 'INVALID_CHARACTER', index: 2 });
        });

        it('rejects empty input', () => {
            expect(failure('')).toEqual({ kind: 'UNEXPECTED_EOF' });
            expect(failure('   ')).toEqual({ kind: 'UNEXPECTED_EOF' });
        });

        it('rejects unknown leading bytes', () => {
            expect(failure('x')).toEqual({ kind: 'INVALID_CHARACTER', index: 0 });
            expect(failure("'a'")).toEqual({ kind: 'INVALID_CHARACTER', index: 0 });
            expect(failure('\v1')).toEqual({ kind: 'INVALID_CHARACTER', index: 0 });
        });
    });

    describe('mixed documents', () => {
        it('parses typed numbers inside an object', () => {
            const doc = parse('{"int":9223372036854775807,"float":3.14159265358979}');

            expect(doc.get('int')?.asNumber()).toEqual({ type: 'int', value: INT64_MAX });
            expect(doc.get('float')?.asNumber()).toEqual({ type: 'float', value: 3.14159265358979 });
        });

        it('parses nested containers', () => {
            const doc = parse(`
                {
                    "tag": null,
                    "registered": true,
                    "age": 197,
                    "name": "Fred",
                    "classes": ["Algebra", "Cryptography"],
                    "rgb": { "r": 4, "g": 7, "b": 3 }
                }
            `);

            expect(keysOf(doc)).toEqual(['tag', 'registered', 'age', 'name', 'classes', 'rgb']);
            expect(doc.get('tag')?.isNull()).toBe(true);
            expect(doc.get('registered')?.asBoolean()).toBe(true);
            expect(doc.get('age')?.asInt()).toBe(197n);
            expect(doc.get('classes')?.get(1)?.asString()).toBe('Cryptography');
            expect(doc.get('rgb')?.get('g')?.asInt()).toBe(7n);
        });

        it('reports byte offsets past multi-byte characters', () => {
            expect(failure('["é", x]')).toEqual({ kind: 'INVALID_CHARACTER', index: 7 });
        });
    });
});
