/**
 * Async Record Stream Example
 *
 * Decodes newline-delimited records from an async stream whose chunk
 * boundaries fall in arbitrary places.
 * Run: npx tsx examples/02-async-records.ts
 */

import { Chunkwise, chars, map, takeTill, thenLeft } from '../src/index.js';

async function* mockStream(): AsyncIterable<string> {
    const chunks = ['GET /ind', 'ex.html\nGET /st', 'yle.css\n', 'POST /api\n'];

    for (const chunk of chunks) {
        await new Promise(resolve => setTimeout(resolve, 100)); // Simulate network delay
        console.log(`[Stream] Received chunk: ${JSON.stringify(chunk)}`);
        yield chunk;
    }
}

const line = thenLeft(map(takeTill((c: string) => c === '\n'), chars.text), chars.char('\n'));

async function main() {
    console.log('--- Async Record Stream ---\n');

    const decoder = new Chunkwise({ parser: line, stream: mockStream() });

    for await (const request of decoder) {
        console.log(`[Record] ${request}`);
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
