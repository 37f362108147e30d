/**
 * Byte values the scanner dispatches on.
 */
export const Char = {
    tab: 0x09,              // \t
    lineFeed: 0x0a,         // \n
    formFeed: 0x0c,         // \f
    carriageReturn: 0x0d,   // \r
    space: 0x20,            // " "

    doubleQuote: 0x22,      // "
    plus: 0x2b,             // +
    comma: 0x2c,            // ,
    minus: 0x2d,            // -
    period: 0x2e,           // .

    _0: 0x30,               // 0
    _1: 0x31,               // 1
    _9: 0x39,               // 9

    colon: 0x3a,            // :

    E: 0x45,                // E

    openBracket: 0x5b,      // [
    backslash: 0x5c,        // \
    closeBracket: 0x5d,     // ]

    e: 0x65,                // e
    f: 0x66,                // f
    n: 0x6e,                // n
    t: 0x74,                // t

    openBrace: 0x7b,        // {
    closeBrace: 0x7d,       // }
} as const;

/**
 * ASCII whitespace: space, tab, line feed, form feed, carriage return.
 */
export function isWhitespace(c: number): boolean {
    return c === Char.space || c === Char.tab || c === Char.lineFeed || c === Char.formFeed || c === Char.carriageReturn;
}

export function isDigit(c: number): boolean {
    return c >= Char._0 && c <= Char._9;
}
