import { TextDecoder, TextEncoder } from 'node:util';
import { isWhitespace } from './chars.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Byte-indexed scanner over a fully buffered UTF-8 input.
 *
 * None of the methods throw: reads past the end return `undefined`/false.
 * The offset only moves forward, except for the single-byte `rewind`.
 */
export class Cursor {
    private readonly bytes: Uint8Array;
    private index = 0;

    constructor(source: string) {
        this.bytes = encoder.encode(source);
    }

    get position(): number {
        return this.index;
    }

    get length(): number {
        return this.bytes.length;
    }

    isEof(): boolean {
        return this.index >= this.bytes.length;
    }

    /** Look at the next byte without consuming it. */
    peek(): number | undefined {
        return this.index < this.bytes.length ? this.bytes[this.index] : undefined;
    }

    next(): number | undefined {
        if (this.index >= this.bytes.length) return undefined;
        return this.bytes[this.index++];
    }

    /** Consume one byte, paired with the index it was read from. */
    indexedNext(): [index: number, byte: number] | undefined {
        if (this.index >= this.bytes.length) return undefined;
        const index = this.index++;
        return [index, this.bytes[index]];
    }

    advance(step: number): void {
        this.index = Math.min(this.index + step, this.bytes.length);
    }

    /**
     * Step back one byte. Only used to hand a terminator back to the caller.
     */
    rewind(): void {
        this.index = Math.max(this.index - 1, 0);
    }

    /** Whether the ASCII `literal` appears at the current offset. */
    matches(literal: string): boolean {
        if (this.index + literal.length > this.bytes.length) return false;
        for (let i = 0; i < literal.length; i++) {
            if (this.bytes[this.index + i] !== literal.charCodeAt(i)) return false;
        }
        return true;
    }

    eatWhitespace(): void {
        while (this.index < this.bytes.length && isWhitespace(this.bytes[this.index])) {
            this.index++;
        }
    }

    /** Decode the bytes in `[start, end)` back to text. */
    slice(start: number, end: number): string {
        return decoder.decode(this.bytes.subarray(start, end));
    }
}
