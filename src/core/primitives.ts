import { NEVER_FAILS, type Chunk, type InputState, type Parser, type Step, type TotalParser } from '../types.js';
import { appendChunk, complete } from './state.js';
import { Tape } from './tape.js';
import { bounce } from './trampoline.js';

const NOT_ENOUGH_INPUT = 'not enough input';
const DEMAND_INPUT = ['demand-input'] as const;

/**
 * Mark a parser as one that never fails.
 */
export function total<T, A>(parser: Parser<T, A>): TotalParser<T, A> {
    return Object.assign(parser, { [NEVER_FAILS]: true as const });
}

export function pure<T, A>(value: A): TotalParser<T, A> {
    return total<T, A>((state, _onFailure, onSuccess) => bounce(() => onSuccess(state, value)));
}

export function fail<T, A = never>(message: string): Parser<T, A> {
    return (state, onFailure) => bounce(() => onFailure(state, [], message));
}

/**
 * Current unconsumed input, without consuming it.
 */
export function get<T>(): TotalParser<T, Tape<T>> {
    return total<T, Tape<T>>((state, _onFailure, onSuccess) => bounce(() => onSuccess(state, state.remaining)));
}

/**
 * Replace the unconsumed input. Whatever was there before is gone, so take
 * what you need with `get` first.
 */
export function put<T>(tokens: Chunk<T>): TotalParser<T, void> {
    const remaining = Tape.from(tokens);
    return total<T, void>((state, _onFailure, onSuccess) => bounce(() => onSuccess({ ...state, remaining }, undefined)));
}

/**
 * Ask the prompt for a chunk, retrying when it delivers an empty one.
 */
function request<T, R>(
    state: InputState<T>,
    onEnd: (state: InputState<T>) => Step<T, R>,
    onChunk: (state: InputState<T>) => Step<T, R>,
): Step<T, R> {
    return state.prompt(
        state,
        () => bounce(() => onEnd(complete(state))),
        (chunk) => {
            const next = appendChunk(state, chunk);
            return next === undefined
                ? bounce(() => request(state, onEnd, onChunk))
                : bounce(() => onChunk(next));
        },
    );
}

/**
 * Succeed once another chunk has been appended to the input.
 * Fails with "not enough input" when the stream is complete.
 */
export function demandInput<T>(): Parser<T, void> {
    return (state, onFailure, onSuccess) => {
        if (state.more === 'complete') {
            return bounce(() => onFailure(state, DEMAND_INPUT, NOT_ENOUGH_INPUT));
        }
        return request(
            state,
            (after) => onFailure(after, DEMAND_INPUT, NOT_ENOUGH_INPUT),
            (after) => onSuccess(after, undefined),
        );
    };
}

/**
 * True if input is available now or on demand, false at the final end.
 * Never fails.
 */
export function wantInput<T>(): TotalParser<T, boolean> {
    return total<T, boolean>((state, _onFailure, onSuccess) => {
        if (!state.remaining.isEmpty()) return bounce(() => onSuccess(state, true));
        if (state.more === 'complete') return bounce(() => onSuccess(state, false));
        return request(
            state,
            (after) => onSuccess(after, false),
            (after) => onSuccess(after, true),
        );
    });
}

/**
 * Succeed with the unconsumed input once it holds at least n tokens.
 */
export function ensure<T>(n: number): Parser<T, Tape<T>> {
    const self: Parser<T, Tape<T>> = (state, onFailure, onSuccess) => {
        if (state.remaining.length >= n) {
            return bounce(() => onSuccess(state, state.remaining));
        }
        return demandInput<T>()(state, onFailure, (next) => bounce(() => self(next, onFailure, onSuccess)));
    };
    return self;
}
