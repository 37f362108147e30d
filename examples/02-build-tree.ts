/**
 * Building Example
 *
 * Builds a tree from a null root with the auto-vivifying mutators, then
 * shows the type error raised when a node is used as the wrong container.
 * Run: npx tsx examples/02-build-tree.ts
 */

import { Value, ValueTypeError, configure, parse } from '../src/index.js';

function main() {
    console.log('--- Building Example ---\n');

    const root = Value.null();
    root.entry('user').entry('name').replace('Ada');
    root.entry('user').entry('id').replace(1815n);
    root.entry('scores').push(9.5);
    root.entry('scores').push(7.25);
    root.entry('grid').entry(2).replace(true);

    console.log(`root kind:   ${root.kind}`);
    console.log(`user.name:   ${root.get('user')?.get('name')?.asString()}`);
    console.log(`scores:      ${root.get('scores')?.len()}`);
    console.log(`grid[0]:     ${root.get('grid')?.get(0)?.kind}`);
    console.log(`same as text: ${root.equals(parse('{"user":{"name":"Ada","id":1815},"scores":[9.5,7.25],"grid":[null,null,true]}'))}`);

    try {
        root.entry('user').push('oops');
    } catch (error) {
        if (!(error instanceof ValueTypeError)) throw error;
        console.log(`\npush into an object: ${error.message}`);
    }

    configure({ objectBacking: 'hashed' });
    const hashed = parse('{"b":1,"a":2,"10":3,"2":4}');
    console.log(`\nhashed key order: ${[...(hashed.asObject()?.keys() ?? [])].join(', ')}`);

    console.log('\n--- Done ---');
}

main();
