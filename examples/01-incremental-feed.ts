/**
 * Incremental Feeding Example
 *
 * Feeds a parser one chunk at a time, the way a socket handler would,
 * and shows the parse suspending between chunks.
 * Run: npx tsx examples/01-incremental-feed.ts
 */

import { bind, chars, map, parse, sepBy, then, thenLeft, type Result } from '../src/index.js';

// key=value pairs separated by ';', terminated by a newline
const pair = bind(thenLeft(chars.word, chars.char('=')), (key) => map(chars.number, (value) => [key, value] as const));
const record = thenLeft(sepBy(pair, then(chars.char(';'), chars.skipSpaces)), chars.eol);

const chunks = ['width', '=12', '0; heig', 'ht=4', '5\n'];

let result: Result<string, (readonly [string, number])[]> = parse(record);
for (const chunk of chunks) {
    if (result.kind !== 'partial') break;
    console.log(`[Feed] ${JSON.stringify(chunk)}`);
    result = result.feed(chunk);
}

if (result.kind === 'partial') {
    result = result.end();
}

if (result.kind === 'done') {
    console.log('Parsed:', Object.fromEntries(result.value));
} else if (result.kind === 'fail') {
    console.log(`Failed: ${result.message} (${result.context.join(' < ')})`);
}
