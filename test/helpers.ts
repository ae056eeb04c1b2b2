import { feed, finish, parse } from '../src/parse.js';
import { text } from '../src/text.js';
import type { Done, Fail, Final, Parser, Prompt, Result, Suspended } from '../src/types.js';

/**
 * Helper to create an async iterable from an array of strings
 */
export async function* toStream(chunks: string[]): AsyncIterable<string> {
    for (const chunk of chunks) {
        yield chunk;
    }
}

/**
 * Helper to collect every value from an async iterable
 */
export async function collect<A>(source: AsyncIterable<A>): Promise<A[]> {
    const results: A[] = [];
    for await (const value of source) {
        results.push(value);
    }
    return results;
}

/**
 * Start with no input, feed each chunk in turn, then signal the end
 */
export function parseChunks<A>(parser: Parser<string, A>, chunks: string[]): Final<string, A> {
    let result: Result<string, A> = parse(parser);
    for (const chunk of chunks) {
        result = feed(result, chunk);
    }
    return finish(result);
}

/**
 * Every way of cutting s into consecutive non-empty chunks of equal size
 */
export function chunkings(s: string): string[][] {
    const out: string[][] = [];
    for (let size = 1; size <= s.length; size++) {
        const chunks: string[] = [];
        for (let i = 0; i < s.length; i += size) {
            chunks.push(s.slice(i, i + size));
        }
        out.push(chunks);
    }
    return out;
}

/**
 * Synchronous prompt over a fixed list of chunks that counts how often it
 * was asked for input
 */
export function countingPrompt(chunks: string[]): { prompt: Prompt<string>; requests: () => number } {
    let asked = 0;
    const pending = [...chunks];
    const prompt: Prompt<string> = (_state, onEnd, onChunk) => {
        asked++;
        const next = pending.shift();
        return next === undefined ? onEnd() : onChunk(next);
    };
    return { prompt, requests: () => asked };
}

export function restOf(result: Final<string, unknown>): string {
    return text(result.rest);
}

export function isLetter(c: string): boolean {
    return /^\p{L}$/u.test(c);
}

export function isDigit(c: string): boolean {
    return c >= '0' && c <= '9';
}

export function expectDone<T, A>(result: Result<T, A>): Done<T, A> {
    if (result.kind !== 'done') throw new Error(`expected done, got ${result.kind}`);
    return result;
}

export function expectFail<T, A>(result: Result<T, A>): Fail<T> {
    if (result.kind !== 'fail') throw new Error(`expected fail, got ${result.kind}`);
    return result;
}

export function expectPartial<T, A>(result: Result<T, A>): Suspended<T, A> {
    if (result.kind !== 'partial') throw new Error(`expected partial, got ${result.kind}`);
    return result;
}
