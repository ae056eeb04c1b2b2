import { describe, it, expect } from 'vitest';
import { bind, map, then } from '../src/core/combinators.js';
import { demandInput, ensure, fail, get, pure, put, wantInput } from '../src/core/primitives.js';
import { parse, parseOnly } from '../src/parse.js';
import { text } from '../src/text.js';
import { expectDone, expectFail, expectPartial, restOf } from './helpers.js';

describe('Primitive state operations', () => {
    describe('get and put', () => {
        it('get returns the input without consuming it', () => {
            const result = expectDone(parseOnly(get<string>(), 'abc'));
            expect(text(result.value)).toBe('abc');
            expect(restOf(result)).toBe('abc');
        });

        it('put replaces the input', () => {
            const result = expectDone(parseOnly(then(put('xyz'), get<string>()), 'abc'));
            expect(text(result.value)).toBe('xyz');
        });

        it('pure succeeds without touching the input', () => {
            const result = expectDone(parseOnly(pure<string, number>(7), 'ab'));
            expect(result.value).toBe(7);
            expect(restOf(result)).toBe('ab');
        });

        it('fail reports its message with an empty context', () => {
            const result = expectFail(parseOnly(fail<string>('nope'), 'ab'));
            expect(result.message).toBe('nope');
            expect(result.context).toEqual([]);
            expect(restOf(result)).toBe('ab');
        });
    });

    describe('demandInput', () => {
        it('fails at once on a complete stream', () => {
            const result = expectFail(parseOnly(demandInput<string>(), ''));
            expect(result.context).toEqual(['demand-input']);
            expect(result.message).toBe('not enough input');
        });

        it('suspends, then appends the new chunk', () => {
            const partial = expectPartial(parse(demandInput<string>(), 'ab'));
            expect(text(partial.state.remaining)).toBe('ab');

            const result = expectDone(partial.feed('cd'));
            expect(restOf(result)).toBe('abcd');
        });

        it('fails when the caller reports no more input', () => {
            const result = expectFail(expectPartial(parse(demandInput<string>(), 'ab')).end());
            expect(result.context).toEqual(['demand-input']);
            expect(result.message).toBe('not enough input');
            expect(restOf(result)).toBe('ab');
        });

        it('keeps waiting when fed an empty chunk', () => {
            const partial = expectPartial(parse(demandInput<string>()));
            const stillWaiting = expectPartial(partial.feed(''));
            expect(restOf(expectDone(stillWaiting.feed('z')))).toBe('z');
        });
    });

    describe('wantInput', () => {
        it('answers true without prompting when input is buffered', () => {
            expect(expectDone(parse(wantInput<string>(), 'a')).value).toBe(true);
        });

        it('answers false on a drained complete stream', () => {
            expect(expectDone(parseOnly(wantInput<string>(), '')).value).toBe(false);
        });

        it('maps end of input to false', () => {
            expect(expectPartial(parse(wantInput<string>())).end()).toMatchObject({ kind: 'done', value: false });
        });

        it('maps a new chunk to true and keeps it', () => {
            const result = expectDone(expectPartial(parse(wantInput<string>())).feed('x'));
            expect(result.value).toBe(true);
            expect(restOf(result)).toBe('x');
        });

        it('gives the same answer twice in a row', () => {
            const twice = bind(wantInput<string>(), (first) => map(wantInput<string>(), (second) => [first, second]));

            const ended = expectPartial(parse(twice)).end();
            expect(ended).toMatchObject({ kind: 'done', value: [false, false] });

            const fed = expectDone(expectPartial(parse(twice)).feed('q'));
            expect(fed.value).toEqual([true, true]);
            expect(restOf(fed)).toBe('q');
        });
    });

    describe('ensure', () => {
        it('succeeds immediately when enough is buffered', () => {
            const result = expectDone(parse(ensure<string>(2), 'abc'));
            expect(text(result.value)).toBe('abc');
            expect(restOf(result)).toBe('abc');
        });

        it('demands input until enough has arrived', () => {
            const first = expectPartial(parse(ensure<string>(3), 'a'));
            const second = expectPartial(first.feed('b'));
            const result = expectDone(second.feed('cd'));
            expect(text(result.value)).toBe('abcd');
        });

        it('propagates the demand failure', () => {
            const partial = expectPartial(expectPartial(parse(ensure<string>(3), 'a')).feed('b'));
            const result = expectFail(partial.end());
            expect(result.context).toEqual(['demand-input']);
            expect(result.message).toBe('not enough input');
            expect(restOf(result)).toBe('ab');
        });
    });
});
