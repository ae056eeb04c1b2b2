import type { Chunk, InputState, Settled, Step, Thunk } from '../types.js';

export function done<T, R>(value: R): Step<T, R> {
    return { kind: 'done', value };
}

/**
 * Defer a step to the driving loop instead of calling onward.
 * Every continuation call in the engine goes through here, which keeps the
 * native stack flat however long the input is.
 */
export function bounce<T, R>(next: Thunk<T, R>): Step<T, R> {
    return { kind: 'bounce', next };
}

export function suspend<T, R>(
    state: InputState<T>,
    end: () => Step<T, R>,
    chunk: (chunk: Chunk<T>) => Step<T, R>,
): Step<T, R> {
    return { kind: 'await', state, resume: { end, chunk } };
}

/**
 * Step until the computation finishes or waits for input.
 */
export function settle<T, R>(step: Step<T, R>): Settled<T, R> {
    let current = step;
    while (current.kind === 'bounce') {
        current = current.next();
    }
    return current;
}
