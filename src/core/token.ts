import type { Parser } from '../types.js';
import { bind, map } from './combinators.js';
import { ensure, fail, put } from './primitives.js';

/**
 * Consume one token for which pred holds and return it.
 * On failure nothing is consumed.
 */
export function satisfy<T>(pred: (token: T) => boolean): Parser<T, T> {
    return bind(ensure<T>(1), (input) => {
        const split = input.uncons();
        if (split === undefined || !pred(split[0])) return fail<T, T>('satisfy?');
        const [token, rest] = split;
        return map(put(rest), () => token);
    });
}

/**
 * Like satisfy, but discards the token.
 */
export function skip<T>(pred: (token: T) => boolean): Parser<T, void> {
    return bind(ensure<T>(1), (input) => {
        const split = input.uncons();
        if (split === undefined || !pred(split[0])) return fail<T, void>('skip');
        return put(split[1]);
    });
}

export function anyToken<T>(): Parser<T, T> {
    return satisfy<T>(() => true);
}

/**
 * Consume exactly n tokens, but only if pred accepts them as a whole.
 * On failure nothing is consumed, even when the stream ran out part way.
 */
export function takeWith<T>(n: number, pred: (head: readonly T[]) => boolean): Parser<T, T[]> {
    return bind(ensure<T>(n), (input) => {
        const [head, tail] = input.splitAt(n);
        const tokens = head.toArray();
        return pred(tokens) ? map(put(tail), () => tokens) : fail<T, T[]>('take-with');
    });
}

export function take<T>(n: number): Parser<T, T[]> {
    return takeWith<T>(n, () => true);
}
