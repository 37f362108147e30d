/**
 * How objects store their entries.
 * - `ordered`: iteration follows insertion order.
 * - `hashed`: iteration order is unspecified (integer-like keys come first).
 */
export type ObjectBacking = 'ordered' | 'hashed';

/**
 * Process-wide settings, see `configure`.
 */
export interface JsonwoodConfig {
    objectBacking: ObjectBacking;
}

/**
 * Options for a single `parse` call.
 */
export interface ParseOptions {
    /** Deepest allowed nesting of arrays and objects (default: 128). `Infinity` disables the check. */
    maxDepth?: number;
}

/**
 * Position or key used to address a child of an array or object.
 */
export type IndexOrKey = number | string;
