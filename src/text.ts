/**
 * Character-level parsers over string chunks.
 *
 * Tokens are single code points: a chunk "héllo" is five tokens. None of
 * this reaches below the public combinator contract.
 */

import type { Parser } from './types.js';
import { alt, bind, label, many, many1, map, option, skipMany, then } from './core/combinators.js';
import { pure } from './core/primitives.js';
import { takeWhile, takeWhile1 } from './core/scan.js';
import { satisfy, takeWith } from './core/token.js';

export type CharClass = string | ReadonlySet<string>;

/**
 * Join tokens back into a string.
 */
export function text(tokens: Iterable<string>): string {
    return Array.from(tokens).join('');
}

function matches(c: CharClass, token: string): boolean {
    return typeof c === 'string' ? token === c : c.has(token);
}

function describe(c: CharClass): string {
    return typeof c === 'string' ? JSON.stringify(c) : JSON.stringify(text(c));
}

function isLetter(c: string): boolean {
    return /^\p{L}$/u.test(c);
}

function isDigit(c: string): boolean {
    return c >= '0' && c <= '9';
}

function isWhitespace(c: string): boolean {
    return /^\s$/u.test(c);
}

// ============ Single characters ============

export const anyChar: Parser<string, string> = satisfy<string>(() => true);

/**
 * Match one character equal to c, or contained in c when it is a set.
 */
export function char(c: CharClass): Parser<string, string> {
    return label(satisfy<string>((token) => matches(c, token)), `char ${describe(c)}`);
}

export function notChar(c: CharClass): Parser<string, string> {
    return label(satisfy<string>((token) => !matches(c, token)), `not char ${describe(c)}`);
}

export const letter: Parser<string, string> = label(satisfy(isLetter), 'letter');

export const digit: Parser<string, string> = label(satisfy(isDigit), 'digit');

export const whitespace: Parser<string, string> = label(satisfy(isWhitespace), 'whitespace');

export const space: Parser<string, string> = char(' ');

export const spaces: Parser<string, string[]> = many(space);

export const skipSpaces: Parser<string, void> = skipMany(space);

export const skipWhitespaces: Parser<string, void> = skipMany(whitespace);

// ============ Runs ============

/**
 * Match s exactly. A mismatch consumes nothing, including a partial match
 * cut short by the end of the stream.
 */
export function string(s: string): Parser<string, string> {
    const expected = Array.from(s);
    return map(
        takeWith<string>(expected.length, (head) => head.every((token, i) => token === expected[i])),
        () => s,
    );
}

export const word: Parser<string, string> = map(many1(letter), text);

/**
 * Decimal digits with an optional fraction, e.g. "42", "3.14", "7.".
 */
export const number: Parser<string, number> = label(
    bind(takeWhile1(isDigit), (whole) =>
        map(
            option('', map(then(char('.'), takeWhile(isDigit)), (fraction) => `.${text(fraction)}`)),
            (fraction) => Number(text(whole) + fraction),
        ),
    ),
    'number',
);

/**
 * Match "\n" or "\r\n".
 */
export const eol: Parser<string, void> = alt(
    then(char('\n'), pure<string, void>(undefined)),
    then(string('\r\n'), pure<string, void>(undefined)),
);
