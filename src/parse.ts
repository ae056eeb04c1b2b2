import type {
    Chunk,
    Final,
    InputState,
    OnFailure,
    OnSuccess,
    ParseOptions,
    Parser,
    Result,
    Settled,
    Step,
} from './types.js';
import { awaitPrompt, createState, pullFrom } from './core/state.js';
import { bounce, done, settle } from './core/trampoline.js';

/**
 * Start `parser` on `state` and step it until it finishes or waits for input.
 */
export function run<T, A, R>(
    parser: Parser<T, A>,
    state: InputState<T>,
    onFailure: OnFailure<T, R>,
    onSuccess: OnSuccess<T, A, R>,
): Settled<T, R> {
    return settle(bounce(() => parser(state, onFailure, onSuccess)));
}

// ============ Top-level continuations ============

function onFail<T, A>(state: InputState<T>, context: readonly string[], message: string): Step<T, Result<T, A>> {
    return done<T, Result<T, A>>({ kind: 'fail', context, message, rest: state.remaining });
}

function onDone<T, A>(state: InputState<T>, value: A): Step<T, Result<T, A>> {
    return done<T, Result<T, A>>({ kind: 'done', value, rest: state.remaining });
}

function toResult<T, A>(settled: Settled<T, Result<T, A>>): Result<T, A> {
    if (settled.kind === 'done') return settled.value;

    const { state, resume } = settled;
    return {
        kind: 'partial',
        state,
        feed: (chunk) => toResult(settle(resume.chunk(chunk))),
        end: () => finish(toResult(settle(resume.end()))),
    };
}

// ============ Entry points ============

/**
 * Parse `input`, returning a partial result when the parser wants more
 * than has been supplied. Continue it with `feed` and `end`.
 */
export function parse<T, A>(parser: Parser<T, A>, input: Chunk<T> = [], options: ParseOptions<T> = {}): Result<T, A> {
    const state = createState(input, options.more ?? 'incomplete', options.prompt ?? awaitPrompt);
    return toResult(run(parser, state, onFail<T, A>, onDone<T, A>));
}

/**
 * Supply one more chunk. A finished result keeps the chunk as unconsumed input.
 */
export function feed<T, A>(result: Result<T, A>, chunk: Chunk<T>): Result<T, A> {
    if (result.kind === 'partial') return result.feed(chunk);
    return { ...result, rest: result.rest.append(chunk) };
}

/**
 * Tell a suspended parse that no more input is coming.
 */
export function finish<T, A>(result: Result<T, A>): Final<T, A> {
    return result.kind === 'partial' ? result.end() : result;
}

/**
 * Parse input that is already complete.
 */
export function parseOnly<T, A>(parser: Parser<T, A>, input: Chunk<T>): Final<T, A> {
    return finish(parse(parser, input, { more: 'complete' }));
}

/**
 * Parse chunks pulled on demand from a synchronous source.
 */
export function parseIterable<T, A>(parser: Parser<T, A>, chunks: Iterable<Chunk<T>>): Final<T, A> {
    return finish(parse(parser, [], { prompt: pullFrom(chunks[Symbol.iterator]()) }));
}

/**
 * Parse chunks from an async source, reading only as far as the parser needs.
 */
export async function parseAsync<T, A>(parser: Parser<T, A>, stream: AsyncIterable<Chunk<T>>): Promise<Final<T, A>> {
    const iterator = stream[Symbol.asyncIterator]();
    let result = parse(parser);
    while (result.kind === 'partial') {
        const next = await iterator.next();
        result = next.done ? result.end() : result.feed(next.value);
    }
    return result;
}
