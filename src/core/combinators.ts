import type { FallibleParser, Parser } from '../types.js';
import { commit, mergeStreams, openBacktrack } from './state.js';
import { bounce } from './trampoline.js';
import { cons, toArray, type List } from './list.js';
import { pure } from './primitives.js';

// ============ Sequencing ============

export function bind<T, A, B>(parser: Parser<T, A>, f: (value: A) => Parser<T, B>): Parser<T, B> {
    return (state, onFailure, onSuccess) =>
        parser(state, onFailure, (next, value) => bounce(() => f(value)(next, onFailure, onSuccess)));
}

export function map<T, A, B>(parser: Parser<T, A>, f: (value: A) => B): Parser<T, B> {
    return (state, onFailure, onSuccess) =>
        parser(state, onFailure, (next, value) => bounce(() => onSuccess(next, f(value))));
}

/**
 * Run `first`, drop its value, then run `second`.
 */
export function then<T, B>(first: Parser<T, unknown>, second: Parser<T, B>): Parser<T, B> {
    return bind(first, () => second);
}

/**
 * Run both, keep the value of `first`.
 */
export function thenLeft<T, A>(first: Parser<T, A>, second: Parser<T, unknown>): Parser<T, A> {
    return bind(first, (value) => map(second, () => value));
}

export function between<T, A>(open: Parser<T, unknown>, close: Parser<T, unknown>, parser: Parser<T, A>): Parser<T, A> {
    return then(open, thenLeft(parser, close));
}

// ============ Choice ============

/**
 * Try `left`; if it fails, rewind and try `right`.
 *
 * Chunks pulled from the prompt while `left` ran cannot be pulled again, so
 * the rewound state has them appended after the tokens `left` started from.
 */
export function alt<T, A>(left: Parser<T, A>, right: Parser<T, A>): Parser<T, A> {
    return (state, onFailure, onSuccess) =>
        left(
            openBacktrack(state),
            (after) => bounce(() => right(mergeStreams(state, after), onFailure, onSuccess)),
            (after, value) => bounce(() => onSuccess(commit(state, after), value)),
        );
}

export function choice<T, A>(...parsers: Parser<T, A>[]): Parser<T, A> {
    if (parsers.length === 0) return (state, onFailure) => bounce(() => onFailure(state, [], 'choice'));
    return parsers.reduceRight((rest, parser) => alt(parser, rest));
}

export function option<T, A>(fallback: A, parser: Parser<T, A>): Parser<T, A> {
    return alt(parser, pure<T, A>(fallback));
}

export function optional<T, A>(parser: Parser<T, A>): Parser<T, A | undefined> {
    return option<T, A | undefined>(undefined, parser);
}

/**
 * Run `parser` without consuming input.
 */
export function lookAhead<T, A>(parser: Parser<T, A>): Parser<T, A> {
    return (state, onFailure, onSuccess) =>
        parser(
            openBacktrack(state),
            (after, context, message) => bounce(() => onFailure(mergeStreams(state, after), context, message)),
            (after, value) => bounce(() => onSuccess(mergeStreams(state, after), value)),
        );
}

// ============ Diagnostics ============

/**
 * Name a failure point. The label is pushed onto the context of every
 * failure leaving `parser`, after the labels already there.
 */
export function label<T, A>(parser: Parser<T, A>, name: string): Parser<T, A> {
    return (state, onFailure, onSuccess) =>
        parser(state, (after, context, message) => bounce(() => onFailure(after, [...context, name], message)), onSuccess);
}

// ============ Repetition ============
//
// Each loop commits after every element (the alternative only spans one
// attempt), so neither the stack nor the continuation chain grows with the
// number of repetitions.

type Attempt<A> = { value: A } | undefined;

function attempt<T, A>(parser: Parser<T, A>): Parser<T, Attempt<A>> {
    return alt(map(parser, (value): Attempt<A> => ({ value })), pure<T, Attempt<A>>(undefined));
}

export function many<T, A>(parser: FallibleParser<T, A>): Parser<T, A[]> {
    const loop = (acc: List<A>): Parser<T, List<A>> =>
        bind(attempt(parser), (found) => (found === undefined ? pure<T, List<A>>(acc) : loop(cons(found.value, acc))));
    return map(loop(undefined), toArray);
}

export function many1<T, A>(parser: FallibleParser<T, A>): Parser<T, A[]> {
    return bind(parser, (first) => map(many(parser), (rest) => [first, ...rest]));
}

export function skipMany<T>(parser: FallibleParser<T, unknown>): Parser<T, void> {
    const loop: Parser<T, void> = bind(attempt(parser), (found) => (found === undefined ? pure<T, void>(undefined) : loop));
    return loop;
}

export function skipMany1<T>(parser: FallibleParser<T, unknown>): Parser<T, void> {
    return then(parser, skipMany(parser));
}

export function sepBy1<T, A>(parser: FallibleParser<T, A>, separator: Parser<T, unknown>): Parser<T, A[]> {
    return bind(parser, (first) => map(many(then(separator, parser)), (rest) => [first, ...rest]));
}

export function sepBy<T, A>(parser: FallibleParser<T, A>, separator: Parser<T, unknown>): Parser<T, A[]> {
    return option<T, A[]>([], sepBy1(parser, separator));
}

/**
 * Apply `parser` until `end` succeeds, returning the values of `parser`.
 */
export function manyTill<T, A>(parser: FallibleParser<T, A>, end: Parser<T, unknown>): Parser<T, A[]> {
    const loop = (acc: List<A>): Parser<T, List<A>> =>
        alt(
            map(end, () => acc),
            bind(parser, (value) => loop(cons(value, acc))),
        );
    return map(loop(undefined), toArray);
}

export function count<T, A>(n: number, parser: Parser<T, A>): Parser<T, A[]> {
    const loop = (left: number, acc: List<A>): Parser<T, List<A>> =>
        left <= 0 ? pure<T, List<A>>(acc) : bind(parser, (value) => loop(left - 1, cons(value, acc)));
    return map(loop(n, undefined), toArray);
}
