import { describe, it, expect } from 'vitest';
import { alt } from '../src/core/combinators.js';
import { anyToken, satisfy, skip, take, takeWith } from '../src/core/token.js';
import { parse, parseOnly } from '../src/parse.js';
import { string } from '../src/text.js';
import { expectDone, expectFail, expectPartial, restOf } from './helpers.js';

describe('Token-level parsers', () => {
    describe('satisfy', () => {
        it('consumes a matching token', () => {
            const result = expectDone(parseOnly(satisfy<string>((c) => c === 'a'), 'abc'));
            expect(result.value).toBe('a');
            expect(restOf(result)).toBe('bc');
        });

        it('consumes nothing on a mismatch', () => {
            const result = expectFail(parseOnly(satisfy<string>((c) => c === 'x'), 'abc'));
            expect(result.message).toBe('satisfy?');
            expect(result.context).toEqual([]);
            expect(restOf(result)).toBe('abc');
        });

        it('waits for a token when none is buffered', () => {
            const partial = expectPartial(parse(satisfy<string>((c) => c === 'a')));
            expect(expectDone(partial.feed('ab')).value).toBe('a');
        });

        it('works over non-character tokens', () => {
            const result = expectDone(parseOnly(satisfy<number>((n) => n > 10), [42, 1]));
            expect(result.value).toBe(42);
            expect(result.rest.toArray()).toEqual([1]);
        });
    });

    describe('anyToken', () => {
        it('fails with not enough input on an empty complete stream', () => {
            const result = expectFail(parseOnly(anyToken<string>(), ''));
            expect(result.message).toBe('not enough input');
            expect(result.context).toEqual(['demand-input']);
        });
    });

    describe('skip', () => {
        it('drops a matching token', () => {
            const result = expectDone(parseOnly(skip<string>((c) => c === '#'), '#x'));
            expect(result.value).toBeUndefined();
            expect(restOf(result)).toBe('x');
        });

        it('fails without consuming', () => {
            const result = expectFail(parseOnly(skip<string>((c) => c === '#'), 'x'));
            expect(result.message).toBe('skip');
            expect(restOf(result)).toBe('x');
        });
    });

    describe('takeWith', () => {
        it('returns the accepted head', () => {
            const result = expectDone(parseOnly(takeWith<string>(2, (head) => head.join('') === 'ab'), 'abc'));
            expect(result.value).toEqual(['a', 'b']);
            expect(restOf(result)).toBe('c');
        });

        it('consumes nothing when the head is rejected', () => {
            const result = expectFail(parseOnly(takeWith<string>(2, (head) => head.join('') === 'xy'), 'abc'));
            expect(result.message).toBe('take-with');
            expect(restOf(result)).toBe('abc');
        });

        it('take spans chunk boundaries', () => {
            const partial = expectPartial(parse(take<string>(3), 'a'));
            const result = expectDone(partial.feed('bcd'));
            expect(result.value).toEqual(['a', 'b', 'c']);
            expect(restOf(result)).toBe('d');
        });
    });

    describe('string', () => {
        it('fails on a mismatch without consuming any of the input', () => {
            const result = expectFail(parseOnly(string('124'), '123'));
            expect(result.message).toBe('take-with');
            expect(restOf(result)).toBe('123');
        });

        it('leaves the input for the next alternative', () => {
            const result = expectDone(parseOnly(alt(string('124'), string('123')), '123'));
            expect(result.value).toBe('123');
            expect(restOf(result)).toBe('');
        });

        it('grants no partial credit when the stream runs out', () => {
            const result = expectFail(parseOnly(string('1234'), '123'));
            expect(result.message).toBe('not enough input');
            expect(restOf(result)).toBe('123');
        });

        it('matches across chunks', () => {
            const partial = expectPartial(parse(string('hello'), 'he'));
            const result = expectDone(partial.feed('llo!'));
            expect(result.value).toBe('hello');
            expect(restOf(result)).toBe('!');
        });
    });
});
