/**
 * Scanning parsers.
 *
 * Each of these behaves the same whether the run of tokens it scans sits
 * inside one chunk or is spread over many chunks delivered over time: when
 * a scan reaches the end of the buffered input it asks `wantInput` whether
 * the stream goes on, and if so carries on with the next chunk.
 *
 * takeWhile, takeTill, skipWhile and takeRest never fail. Repeating them
 * until failure would never end, which is why they are TotalParsers and the
 * repetition combinators refuse them.
 */

import type { Parser, TotalParser } from '../types.js';
import { bind, map, then } from './combinators.js';
import { cons, toArray, type List } from './list.js';
import { demandInput, fail, get, pure, put, total, wantInput } from './primitives.js';
import { mergeStreams, openBacktrack } from './state.js';
import { Tape } from './tape.js';
import { bounce } from './trampoline.js';

type Pred<T> = (token: T) => boolean;

function flatten<T>(fragments: List<Tape<T>>): T[] {
    const out: T[] = [];
    for (const fragment of toArray(fragments)) {
        for (const token of fragment) {
            out.push(token);
        }
    }
    return out;
}

// ============ Skipping ============

export function skipWhile<T>(pred: Pred<T>): TotalParser<T, void> {
    const loop: Parser<T, void> = bind(get<T>(), (input) => {
        const rest = input.dropWhile(pred);
        if (!rest.isEmpty()) return put(rest);
        return then(put(rest), bind(wantInput<T>(), (available) => (available ? loop : pure<T, void>(undefined))));
    });
    return total(loop);
}

// ============ Taking ============

/**
 * Consume tokens while pred holds and return them. Returns an empty array
 * rather than failing when the first token does not match.
 */
export function takeWhile<T>(pred: Pred<T>): TotalParser<T, T[]> {
    const loop = (acc: List<Tape<T>>): Parser<T, List<Tape<T>>> =>
        bind(get<T>(), (input) => {
            const [matched, rest] = input.span(pred);
            const fragments = cons(matched, acc);
            if (!rest.isEmpty()) return map(put(rest), () => fragments);
            return then(
                put(rest),
                bind(wantInput<T>(), (available) => (available ? loop(fragments) : pure<T, List<Tape<T>>>(fragments))),
            );
        });
    return total(map(loop(undefined), flatten));
}

/**
 * Consume tokens until pred first holds.
 */
export function takeTill<T>(pred: Pred<T>): TotalParser<T, T[]> {
    return takeWhile<T>((token) => !pred(token));
}

/**
 * Like takeWhile, but fails without consuming anything unless at least one
 * token matches.
 */
export function takeWhile1<T>(pred: Pred<T>): Parser<T, T[]> {
    return bind(get<T>(), (buffered) =>
        then(
            buffered.isEmpty() ? demandInput<T>() : pure<T, void>(undefined),
            bind(get<T>(), (input) => {
                const [matched, rest] = input.span(pred);
                if (matched.isEmpty()) return fail<T, T[]>('take-while1');
                if (!rest.isEmpty()) return map(put(rest), () => matched.toArray());
                return then(put(rest), map(takeWhile(pred), (tail) => matched.toArray().concat(tail)));
            }),
        ),
    );
}

/**
 * Drain every remaining chunk. The result holds one array per continuation
 * hop, in delivery order, and is not flattened.
 */
export function takeRest<T>(): TotalParser<T, T[][]> {
    const loop = (acc: List<T[]>): Parser<T, List<T[]>> =>
        bind(wantInput<T>(), (available) =>
            available
                ? bind(get<T>(), (input) => then(put(Tape.empty<T>()), loop(cons(input.toArray(), acc))))
                : pure<T, List<T[]>>(acc),
        );
    return total(map(loop(undefined), toArray));
}

// ============ End of input ============

/**
 * Succeed only when the stream is finally exhausted. Never consumes.
 *
 * With nothing buffered on an incomplete stream the answer is unknown, so
 * this probes with demandInput and inverts its outcome. Any chunk the probe
 * pulls is merged back, so the next parser still sees it.
 */
export function endOfInput<T>(): Parser<T, void> {
    return (state, onFailure, onSuccess) => {
        if (!state.remaining.isEmpty()) {
            return bounce(() => onFailure(state, [], 'end-of-input'));
        }
        if (state.more === 'complete') {
            return bounce(() => onSuccess(state, undefined));
        }
        return demandInput<T>()(
            openBacktrack(state),
            (after) => bounce(() => onSuccess(mergeStreams(state, after), undefined)),
            (after) => bounce(() => onFailure(mergeStreams(state, after), [], 'end-of-input')),
        );
    };
}

/**
 * True when no more input exists. Never fails.
 */
export function atEnd<T>(): TotalParser<T, boolean> {
    return total(map(wantInput<T>(), (available) => !available));
}
