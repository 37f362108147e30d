import { ValueTypeError } from '../errors.js';
import type { IndexOrKey } from '../types.js';
import { type JsonNumber, floatNumber, intNumber, numbersEqual } from './number.js';
import { type ReadonlyValueMap, type ValueMap, createValueMap } from './map.js';

/**
 * The variants a `Value` node can hold.
 */
export type ValueData =
    | { kind: 'null' }
    | { kind: 'boolean'; value: boolean }
    | { kind: 'number'; value: JsonNumber }
    | { kind: 'string'; value: string }
    | { kind: 'array'; value: Value[] }
    | { kind: 'object'; value: ValueMap };

export type ValueKind = ValueData['kind'];

/**
 * Anything `Value.from` knows how to wrap. `number` becomes a float, `bigint` an integer.
 */
export type ValueInput = Value | null | boolean | number | bigint | string | Value[] | ValueMap;

/**
 * A node of a JSON tree.
 *
 * Reading never throws: `get` and the `as*` views return `undefined` when the
 * target is missing or has another kind. The mutators (`entry`, `push`, `insert`)
 * turn a `null` node into the container they need and throw `ValueTypeError`
 * when the node already holds a different kind; use them only where the shape
 * is known.
 *
 * Each node has at most one parent, so a tree never shares or contains itself.
 * Passing a `Value` to a mutator moves it into the container; a node that is
 * already attached must be removed or cloned first.
 */
export class Value {
    private data: ValueData;
    private parent: Value | undefined;

    private constructor(data: ValueData) {
        this.data = data;
    }

    // ============ Construction ============

    static null(): Value {
        return new Value({ kind: 'null' });
    }

    static boolean(value: boolean): Value {
        return new Value({ kind: 'boolean', value });
    }

    static number(value: JsonNumber): Value {
        return new Value({ kind: 'number', value });
    }

    /** @throws RangeError when `value` is outside the signed 64-bit range or not an integer. */
    static int(value: bigint | number): Value {
        if (typeof value === 'number' && !Number.isSafeInteger(value)) {
            throw new RangeError(`${value} is not a safe integer`);
        }
        return Value.number(intNumber(BigInt(value)));
    }

    static float(value: number): Value {
        return Value.number(floatNumber(value));
    }

    static string(value: string): Value {
        return new Value({ kind: 'string', value });
    }

    /** @throws ValueTypeError when an item is already attached or listed twice. */
    static array(items: Value[] = []): Value {
        const node = new Value({ kind: 'array', value: [] });
        for (const item of items) node.push(item);
        return node;
    }

    /**
     * Object node with the entries of `entries` (copied, same backing), or an
     * empty one with the configured backing.
     *
     * @throws ValueTypeError when a value is already attached.
     */
    static object(entries?: ValueMap): Value {
        const node = new Value({ kind: 'object', value: createValueMap(entries?.backing) });
        if (entries !== undefined) {
            for (const [key, item] of entries) node.insert(key, item);
        }
        return node;
    }

    static from(input: ValueInput): Value {
        if (input instanceof Value) return input;
        if (input === null) return Value.null();
        if (typeof input === 'boolean') return Value.boolean(input);
        if (typeof input === 'number') return Value.float(input);
        if (typeof input === 'bigint') return Value.int(input);
        if (typeof input === 'string') return Value.string(input);
        if (Array.isArray(input)) return Value.array(input);
        return Value.object(input);
    }

    // ============ Inspection ============

    get kind(): ValueKind {
        return this.data.kind;
    }

    isNull(): boolean {
        return this.data.kind === 'null';
    }

    asBoolean(): boolean | undefined {
        return this.data.kind === 'boolean' ? this.data.value : undefined;
    }

    asNumber(): JsonNumber | undefined {
        return this.data.kind === 'number' ? this.data.value : undefined;
    }

    asInt(): bigint | undefined {
        return this.data.kind === 'number' && this.data.value.type === 'int' ? this.data.value.value : undefined;
    }

    asFloat(): number | undefined {
        return this.data.kind === 'number' && this.data.value.type === 'float' ? this.data.value.value : undefined;
    }

    asString(): string | undefined {
        return this.data.kind === 'string' ? this.data.value : undefined;
    }

    asArray(): readonly Value[] | undefined {
        return this.data.kind === 'array' ? this.data.value : undefined;
    }

    asObject(): ReadonlyValueMap | undefined {
        return this.data.kind === 'object' ? this.data.value : undefined;
    }

    /**
     * Child at a position (arrays) or key (objects). `undefined` when the child
     * is absent or the index kind does not match the container.
     */
    get(indexOrKey: IndexOrKey): Value | undefined {
        if (typeof indexOrKey === 'number') {
            return this.data.kind === 'array' ? this.data.value[indexOrKey] : undefined;
        }
        return this.data.kind === 'object' ? this.data.value.get(indexOrKey) : undefined;
    }

    /**
     * Character count for strings, entry count for arrays and objects, 0 otherwise.
     */
    len(): number {
        switch (this.data.kind) {
            case 'string':
                return Array.from(this.data.value).length;
            case 'array':
                return this.data.value.length;
            case 'object':
                return this.data.value.size;
            default:
                return 0;
        }
    }

    // ============ Mutation ============

    /**
     * Child at `indexOrKey`, created if needed.
     *
     * A `null` node becomes an empty array (number) or object (string) first.
     * Arrays are padded with `null` up to the position; objects get a `null`
     * entry for a missing key.
     *
     * @throws ValueTypeError when the node holds a container of the other kind or a scalar.
     */
    entry(indexOrKey: IndexOrKey): Value {
        if (typeof indexOrKey === 'number') {
            if (!Number.isInteger(indexOrKey) || indexOrKey < 0) {
                throw new RangeError(`Invalid array index ${indexOrKey}.`);
            }
            const array = this.coerceArray();
            while (array.length <= indexOrKey) array.push(this.own(Value.null()));
            return array[indexOrKey];
        }
        const object = this.coerceObject();
        const existing = object.get(indexOrKey);
        if (existing !== undefined) return existing;
        const created = this.own(Value.null());
        object.set(indexOrKey, created);
        return created;
    }

    /**
     * Append to an array; a `null` node becomes an empty array first.
     *
     * @throws ValueTypeError when the node is neither null nor an array, or
     * when `value` is attached elsewhere or would contain this node.
     */
    push(value: ValueInput): void {
        const child = this.claim(value);
        this.coerceArray().push(this.own(child));
    }

    /**
     * Set `key` on an object, returning the value it replaced; a `null` node
     * becomes an empty object first.
     *
     * @throws ValueTypeError when the node is neither null nor an object, or
     * when `value` is attached elsewhere or would contain this node.
     */
    insert(key: string, value: ValueInput): Value | undefined {
        const child = this.claim(value);
        return Value.detach(this.coerceObject().set(key, this.own(child)));
    }

    /**
     * Remove `key` from an object. Returns the removed child, or `undefined`
     * when there was none or this is not an object.
     */
    remove(key: string): Value | undefined {
        return this.data.kind === 'object' ? Value.detach(this.data.value.delete(key)) : undefined;
    }

    /**
     * Overwrite this node in place. Returns the previous content as a detached node.
     *
     * A `Value` argument has its content moved here and is left `null`.
     *
     * @throws ValueTypeError when `value` is attached elsewhere or contains this node.
     */
    replace(value: ValueInput): Value {
        if (value === this) return this.clone();
        const next = this.claim(value);

        const previous = new Value(this.data);
        previous.adoptChildren();
        this.data = next.data;
        this.adoptChildren();
        next.data = { kind: 'null' };
        return previous;
    }

    // ============ Ownership ============

    /**
     * Wrap `value` and check that it may become a child of this node.
     */
    private claim(value: ValueInput): Value {
        const child = Value.from(value);
        if (child.parent !== undefined) {
            throw new ValueTypeError('Value is already part of a tree.');
        }
        for (let node: Value | undefined = this; node !== undefined; node = node.parent) {
            if (node === child) throw new ValueTypeError('Value cannot be placed inside itself.');
        }
        return child;
    }

    private static detach(node: Value | undefined): Value | undefined {
        if (node !== undefined) node.parent = undefined;
        return node;
    }

    private own(child: Value): Value {
        child.parent = this;
        return child;
    }

    private adoptChildren(): void {
        switch (this.data.kind) {
            case 'array':
                for (const child of this.data.value) this.own(child);
                break;
            case 'object':
                for (const child of this.data.value.values()) this.own(child);
                break;
        }
    }

    private coerceArray(): Value[] {
        if (this.data.kind === 'null') this.data = { kind: 'array', value: [] };
        if (this.data.kind !== 'array') throw new ValueTypeError('Not an array.');
        return this.data.value;
    }

    private coerceObject(): ValueMap {
        if (this.data.kind === 'null') this.data = { kind: 'object', value: createValueMap() };
        if (this.data.kind !== 'object') throw new ValueTypeError('Not an object.');
        return this.data.value;
    }

    // ============ Copy & compare ============

    clone(): Value {
        switch (this.data.kind) {
            case 'array':
                return Value.array(this.data.value.map(item => item.clone()));
            case 'object': {
                const copy = new Value({ kind: 'object', value: createValueMap(this.data.value.backing) });
                for (const [key, item] of this.data.value) copy.insert(key, item.clone());
                return copy;
            }
            default:
                return new Value({ ...this.data });
        }
    }

    /**
     * Structural equality. Integers never equal floats; object entry order is ignored.
     */
    equals(other: Value): boolean {
        const a = this.data;
        const b = other.data;
        switch (a.kind) {
            case 'null':
                return b.kind === 'null';
            case 'boolean':
                return b.kind === 'boolean' && b.value === a.value;
            case 'string':
                return b.kind === 'string' && b.value === a.value;
            case 'number':
                return b.kind === 'number' && numbersEqual(a.value, b.value);
            case 'array':
                return b.kind === 'array'
                    && a.value.length === b.value.length
                    && a.value.every((item, i) => item.equals(b.value[i]));
            case 'object': {
                if (b.kind !== 'object' || a.value.size !== b.value.size) return false;
                for (const [key, item] of a.value) {
                    const counterpart = b.value.get(key);
                    if (counterpart === undefined || !item.equals(counterpart)) return false;
                }
                return true;
            }
        }
    }
}
