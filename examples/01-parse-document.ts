/**
 * Parsing Example
 *
 * Parses a document, walks it with the read-only accessors and shows
 * what a failed parse reports.
 * Run: npx tsx examples/01-parse-document.ts
 */

import { ParseError, parse } from '../src/index.js';

const text = `
{
    "name": "Fred",
    "age": 197,
    "height": 1.83,
    "classes": ["Algebra", "History of Programming", "Cryptography"],
    "rgb": { "r": 4, "g": 7, "b": 3 }
}
`;

function main() {
    console.log('--- Parsing Example ---\n');

    const doc = parse(text);
    console.log(`name:    ${doc.get('name')?.asString()}`);
    console.log(`age:     ${doc.get('age')?.asInt()} (${doc.get('age')?.asNumber()?.type})`);
    console.log(`height:  ${doc.get('height')?.asFloat()} (${doc.get('height')?.asNumber()?.type})`);
    console.log(`classes: ${doc.get('classes')?.len()}`);
    for (const item of doc.get('classes')?.asArray() ?? []) {
        console.log(`  - ${item.asString()}`);
    }
    console.log(`missing: ${doc.get('rgb')?.get('alpha')?.kind ?? '(absent)'}`);

    for (const broken of ['[1,]', '{"a" 1}', '"unterminated', '01']) {
        try {
            parse(broken);
        } catch (error) {
            if (!(error instanceof ParseError)) throw error;
            console.log(`\n${JSON.stringify(broken)}`);
            console.log(`  ${error.kind} @ ${error.index ?? '-'}: ${error.message}`);
        }
    }

    console.log('\n--- Done ---');
}

main();
