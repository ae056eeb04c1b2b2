/**
 * Backtracking Example
 *
 * An alternative whose first branch pulls a chunk before failing. The
 * second branch still sees that chunk.
 * Run: npx tsx examples/03-backtracking.ts
 */

import { alt, chars, map, parseIterable, then } from '../src/index.js';

const keyword = map(then(chars.string('let'), chars.char(' ')), () => 'keyword');
const identifier = map(chars.word, (name) => `identifier ${name}`);

for (const chunks of [['le', 't x'], ['le', 'tter']]) {
    const result = parseIterable(alt(keyword, identifier), chunks);
    console.log(JSON.stringify(chunks), '=>', result.kind === 'done' ? result.value : result.message);
}
