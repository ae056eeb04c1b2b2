import type { Chunk, Parser } from './types.js';
import { Tape } from './core/tape.js';
import { ParseError } from './errors.js';
import { parse } from './parse.js';

/**
 * Options for creating a Chunkwise decoder.
 */
export interface ChunkwiseOptions<T, A> {
    /** Parser for one record */
    parser: Parser<T, A>;

    /** The source stream yielding chunks */
    stream: AsyncIterable<Chunk<T>>;
}

/**
 * Applies a record parser over and over to an async stream of chunks,
 * yielding each record as soon as it is complete. Input left over after one
 * record is where the next one starts; iteration ends when the stream is
 * exhausted with nothing left over.
 */
export class Chunkwise<T, A> implements AsyncIterable<A> {
    private parser: Parser<T, A>;
    private stream: AsyncIterable<Chunk<T>>;

    constructor(options: ChunkwiseOptions<T, A>) {
        this.parser = options.parser;
        this.stream = options.stream;
    }

    async *[Symbol.asyncIterator](): AsyncIterator<A> {
        const iterator = this.stream[Symbol.asyncIterator]();
        let buffered = Tape.empty<T>();
        let exhausted = false;

        try {
            while (true) {
                if (buffered.isEmpty()) {
                    if (exhausted) return;
                    const next = await iterator.next();
                    if (next.done) return;
                    buffered = Tape.from(next.value);
                    continue;
                }

                let supplied = buffered.length;
                let result = parse(this.parser, buffered, { more: exhausted ? 'complete' : 'incomplete' });
                while (result.kind === 'partial') {
                    const next = await iterator.next();
                    if (next.done) {
                        exhausted = true;
                        result = result.end();
                    } else {
                        const chunk = Tape.from(next.value);
                        supplied += chunk.length;
                        result = result.feed(chunk);
                    }
                }

                if (result.kind === 'fail') {
                    throw ParseError.from(result);
                }

                // A record that consumes nothing would be yielded forever
                if (result.rest.length >= supplied) {
                    throw new ParseError([], 'parser succeeded without consuming input', result.rest.toArray());
                }

                yield result.value;
                buffered = result.rest;
            }
        } finally {
            await iterator.return?.();
        }
    }
}
