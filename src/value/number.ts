/**
 * A JSON number: exactly one of a signed 64-bit integer or a 64-bit float.
 * The variant is fixed when the literal is parsed.
 */
export type JsonNumber =
    | { type: 'int'; value: bigint }
    | { type: 'float'; value: number };

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

export function isInt64(value: bigint): boolean {
    return value >= INT64_MIN && value <= INT64_MAX;
}

export function intNumber(value: bigint): JsonNumber {
    if (!isInt64(value)) {
        throw new RangeError(`${value} does not fit in a signed 64-bit integer`);
    }
    return { type: 'int', value };
}

export function floatNumber(value: number): JsonNumber {
    return { type: 'float', value };
}

/**
 * Widen to a JS number. Integers beyond 2^53 lose precision.
 */
export function toJsNumber(num: JsonNumber): number {
    return num.type === 'int' ? Number(num.value) : num.value;
}

export function numbersEqual(a: JsonNumber, b: JsonNumber): boolean {
    if (a.type === 'int') return b.type === 'int' && a.value === b.value;
    return b.type === 'float' && a.value === b.value;
}
