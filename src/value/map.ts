import { getConfig } from '../config.js';
import type { ObjectBacking } from '../types.js';
import type { Value } from './value.js';

/**
 * Read side of a `ValueMap`, as handed out by `Value.asObject`.
 */
export interface ReadonlyValueMap extends Iterable<[string, Value]> {
    readonly backing: ObjectBacking;
    readonly size: number;
    get(key: string): Value | undefined;
    has(key: string): boolean;
    keys(): IterableIterator<string>;
    values(): IterableIterator<Value>;
    entries(): IterableIterator<[string, Value]>;
}

/**
 * Mapping from key to value used by object nodes. Keys are unique;
 * `set` on an existing key replaces the value and returns the old one.
 */
export interface ValueMap extends ReadonlyValueMap {
    set(key: string, value: Value): Value | undefined;
    delete(key: string): Value | undefined;
}

/**
 * Insertion-ordered backing.
 */
export class OrderedValueMap implements ValueMap {
    readonly backing = 'ordered';
    private readonly map = new Map<string, Value>();

    get size(): number {
        return this.map.size;
    }

    get(key: string): Value | undefined {
        return this.map.get(key);
    }

    has(key: string): boolean {
        return this.map.has(key);
    }

    set(key: string, value: Value): Value | undefined {
        const previous = this.map.get(key);
        this.map.set(key, value);
        return previous;
    }

    delete(key: string): Value | undefined {
        const previous = this.map.get(key);
        this.map.delete(key);
        return previous;
    }

    keys(): IterableIterator<string> {
        return this.map.keys();
    }

    values(): IterableIterator<Value> {
        return this.map.values();
    }

    entries(): IterableIterator<[string, Value]> {
        return this.map.entries();
    }

    [Symbol.iterator](): IterableIterator<[string, Value]> {
        return this.map.entries();
    }
}

/**
 * Hash-style backing on a prototype-less record. Iteration order is whatever
 * the engine gives for own keys, so callers must not rely on it.
 */
export class HashedValueMap implements ValueMap {
    readonly backing = 'hashed';
    private readonly record: Record<string, Value> = Object.create(null);
    private count = 0;

    get size(): number {
        return this.count;
    }

    get(key: string): Value | undefined {
        return this.has(key) ? this.record[key] : undefined;
    }

    has(key: string): boolean {
        return Object.hasOwn(this.record, key);
    }

    set(key: string, value: Value): Value | undefined {
        const previous = this.get(key);
        if (previous === undefined) this.count++;
        this.record[key] = value;
        return previous;
    }

    delete(key: string): Value | undefined {
        const previous = this.get(key);
        if (previous !== undefined) {
            delete this.record[key];
            this.count--;
        }
        return previous;
    }

    *keys(): IterableIterator<string> {
        yield* Object.keys(this.record);
    }

    *values(): IterableIterator<Value> {
        for (const key of Object.keys(this.record)) yield this.record[key];
    }

    *entries(): IterableIterator<[string, Value]> {
        for (const key of Object.keys(this.record)) yield [key, this.record[key]];
    }

    [Symbol.iterator](): IterableIterator<[string, Value]> {
        return this.entries();
    }
}

/**
 * Create an empty map using the configured backing, or `backing` when given.
 */
export function createValueMap(backing: ObjectBacking = getConfig().objectBacking): ValueMap {
    return backing === 'ordered' ? new OrderedValueMap() : new HashedValueMap();
}
