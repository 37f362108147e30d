import { invalidCharacter } from './errors.js';
import type { ParseOptions } from './types.js';
import { type BuildContext, parseValue } from './core/builder.js';
import { Cursor } from './core/cursor.js';
import type { Value } from './value/value.js';

export const DEFAULT_MAX_DEPTH = 128;

/**
 * Parse a complete JSON document.
 *
 * Surrounding whitespace is allowed; anything else after the value is an
 * error. Failures throw `ParseError` and never yield a partial tree.
 *
 * @throws RangeError when `maxDepth` is neither a non-negative integer nor `Infinity`.
 *
 * @example
 * const doc = parse('{"name": "wood", "rings": 42}');
 * doc.get('rings')?.asInt(); // 42n
 */
export function parse(text: string, options: ParseOptions = {}): Value {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (maxDepth !== Infinity && !(Number.isInteger(maxDepth) && maxDepth >= 0)) {
        throw new RangeError(`maxDepth must be a non-negative integer or Infinity, got ${maxDepth}.`);
    }

    const ctx: BuildContext = {
        cursor: new Cursor(text),
        maxDepth,
    };

    ctx.cursor.eatWhitespace();
    const value = parseValue(ctx, 0);
    ctx.cursor.eatWhitespace();

    if (!ctx.cursor.isEof()) {
        throw invalidCharacter(ctx.cursor.position);
    }
    return value;
}
