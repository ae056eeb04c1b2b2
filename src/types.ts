import type { Tape } from './core/tape.js';

/**
 * One delivery of input. A string is a chunk of single code-point tokens.
 */
export type Chunk<T> = Iterable<T>;

/**
 * Whether further chunks may still arrive.
 * Once 'complete', a stream never becomes 'incomplete' again.
 */
export type More = 'complete' | 'incomplete';

/**
 * Immutable snapshot of the unconsumed input.
 * Holding an earlier InputState is equivalent to rewinding to it.
 */
export interface InputState<T> {
    readonly remaining: Tape<T>;
    readonly more: More;

    /**
     * Tokens pulled from the prompt since the innermost open backtrack point.
     * Absent when no backtrack point is open.
     */
    readonly added?: Tape<T>;

    /** Where further chunks come from */
    readonly prompt: Prompt<T>;
}

// ============ Trampoline ============

export type Thunk<T, R> = () => Step<T, R>;

export interface Resume<T, R> {
    end(): Step<T, R>;
    chunk(chunk: Chunk<T>): Step<T, R>;
}

/**
 * What a parsing step hands back to the driving loop.
 */
export type Step<T, R> =
    | { readonly kind: 'done'; readonly value: R }
    | { readonly kind: 'bounce'; readonly next: Thunk<T, R> }
    | { readonly kind: 'await'; readonly state: InputState<T>; readonly resume: Resume<T, R> };

export type Settled<T, R> = Exclude<Step<T, R>, { kind: 'bounce' }>;

// ============ Continuations ============

/**
 * Context labels are innermost first.
 */
export type OnFailure<T, R> = (state: InputState<T>, context: readonly string[], message: string) => Step<T, R>;

export type OnSuccess<T, A, R> = (state: InputState<T>, value: A) => Step<T, R>;

/**
 * Asked for more input when the buffer runs dry on an incomplete stream.
 * Must call exactly one continuation exactly once: either synchronously,
 * returning its step, or later, by returning an 'await' step.
 */
export type Prompt<T> = <R>(
    state: InputState<T>,
    onEnd: () => Step<T, R>,
    onChunk: (chunk: Chunk<T>) => Step<T, R>,
) => Step<T, R>;

// ============ Parsers ============

export interface Parser<T, A> {
    <R>(state: InputState<T>, onFailure: OnFailure<T, R>, onSuccess: OnSuccess<T, A, R>): Step<T, R>;
}

export const NEVER_FAILS: unique symbol = Symbol('neverFails');

/**
 * A parser that always succeeds. Repeating one until it fails never ends,
 * so the repetition combinators do not accept it.
 */
export interface TotalParser<T, A> extends Parser<T, A> {
    readonly [NEVER_FAILS]: true;
}

/**
 * Any parser except a TotalParser.
 */
export type FallibleParser<T, A> = Parser<T, A> & { readonly [NEVER_FAILS]?: never };

// ============ Results ============

export interface Done<T, A> {
    readonly kind: 'done';
    readonly value: A;
    readonly rest: Tape<T>;
}

export interface Fail<T> {
    readonly kind: 'fail';
    readonly context: readonly string[];
    readonly message: string;
    readonly rest: Tape<T>;
}

/**
 * A parse waiting for the caller to supply the next chunk.
 */
export interface Suspended<T, A> {
    readonly kind: 'partial';
    readonly state: InputState<T>;
    feed(chunk: Chunk<T>): Result<T, A>;
    end(): Final<T, A>;
}

export type Final<T, A> = Done<T, A> | Fail<T>;

export type Result<T, A> = Final<T, A> | Suspended<T, A>;

/**
 * Options for the top-level entry points.
 */
export interface ParseOptions<T> {
    /** Whether more chunks may follow the initial input (default: 'incomplete') */
    more?: More;

    /** Source of further chunks (default: suspend and return a partial result) */
    prompt?: Prompt<T>;
}
