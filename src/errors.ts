/**
 * Every way a parse can fail. Variants that can be attributed to a byte carry its index.
 */
export type ParseErrorDetail =
    | { kind: 'INVALID_CHARACTER'; index: number }
    | { kind: 'UNEXPECTED_EOF' }
    | { kind: 'UNEXPECTED_EOF_WHILE_PARSING_STRING'; index: number }   // index of the opening quote
    | { kind: 'LINE_BREAK_WHILE_PARSING_STRING'; index: number }
    | { kind: 'UNEXPECTED_SEPARATOR'; index: number }                  // stray `,` / `]` / `}`
    | { kind: 'PARSE_INT_ERROR'; text: string }
    | { kind: 'PARSE_FLOAT_ERROR'; text: string }
    | { kind: 'INVALID_ESCAPE_SEQUENCE' }
    | { kind: 'INVALID_HEX' }
    | { kind: 'DEPTH_EXCEEDED'; index: number; maxDepth: number };

export type ParseErrorKind = ParseErrorDetail['kind'];

function describe(detail: ParseErrorDetail): string {
    switch (detail.kind) {
        case 'INVALID_CHARACTER':
            return `Invalid character at index ${detail.index}.`;
        case 'UNEXPECTED_EOF':
            return 'Unexpected end of stream.';
        case 'UNEXPECTED_EOF_WHILE_PARSING_STRING':
            return `Unexpected end of stream while parsing string; Start Index: ${detail.index}`;
        case 'LINE_BREAK_WHILE_PARSING_STRING':
            return `Line Break while parsing string. Index: ${detail.index}`;
        case 'UNEXPECTED_SEPARATOR':
            return `Unexpected separator in array or object at index ${detail.index}.`;
        case 'PARSE_INT_ERROR':
            return `Parse Integer Error: ${detail.text}`;
        case 'PARSE_FLOAT_ERROR':
            return `Parse Float Error: ${detail.text}`;
        case 'INVALID_ESCAPE_SEQUENCE':
            return 'Invalid escape sequence.';
        case 'INVALID_HEX':
            return 'Invalid Hex.';
        case 'DEPTH_EXCEEDED':
            return `Maximum depth of ${detail.maxDepth} exceeded at index ${detail.index}.`;
    }
}

export class ParseError extends Error {
    readonly detail: ParseErrorDetail;

    constructor(detail: ParseErrorDetail, options?: { cause?: unknown }) {
        super(describe(detail), options);
        this.name = 'ParseError';
        this.detail = detail;
    }

    get kind(): ParseErrorKind {
        return this.detail.kind;
    }

    /** Byte offset of the failure, where the grammar allows attributing one. */
    get index(): number | undefined {
        return 'index' in this.detail ? this.detail.index : undefined;
    }
}

export const invalidCharacter = (index: number): ParseError =>
    new ParseError({ kind: 'INVALID_CHARACTER', index });

export const unexpectedEof = (): ParseError =>
    new ParseError({ kind: 'UNEXPECTED_EOF' });

/**
 * Raised by the mutating accessors of `Value` when the node holds a different
 * container kind. This signals a bug in the caller, not bad input.
 */
export class ValueTypeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValueTypeError';
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
