import type { Chunk, InputState, More, Prompt, Step } from '../types.js';
import { Tape } from './tape.js';
import { suspend } from './trampoline.js';

/**
 * Default prompt: hand control back to whoever drives the parse.
 */
export function awaitPrompt<T, R>(
    state: InputState<T>,
    onEnd: () => Step<T, R>,
    onChunk: (chunk: Chunk<T>) => Step<T, R>,
): Step<T, R> {
    return suspend(state, onEnd, onChunk);
}

/**
 * Prompt that pulls chunks synchronously from an iterator.
 */
export function pullFrom<T>(chunks: Iterator<Chunk<T>>): Prompt<T> {
    return (_state, onEnd, onChunk) => {
        const next = chunks.next();
        return next.done ? onEnd() : onChunk(next.value);
    };
}

export function createState<T>(input: Chunk<T>, more: More, prompt: Prompt<T>): InputState<T> {
    return { remaining: Tape.from(input), more, prompt };
}

export function complete<T>(state: InputState<T>): InputState<T> {
    return state.more === 'complete' ? state : { ...state, more: 'complete' };
}

/**
 * Append a freshly delivered chunk, recording it for any open backtrack point.
 * Returns undefined when the chunk holds no tokens.
 */
export function appendChunk<T>(state: InputState<T>, chunk: Chunk<T>): InputState<T> | undefined {
    const tokens = Tape.from(chunk);
    if (tokens.isEmpty()) return undefined;
    return {
        ...state,
        remaining: state.remaining.concat(tokens),
        added: state.added?.concat(tokens),
    };
}

/**
 * Open a backtrack point: start recording pulled tokens from scratch.
 */
export function openBacktrack<T>(state: InputState<T>): InputState<T> {
    return { ...state, added: Tape.empty<T>() };
}

/**
 * Close a backtrack point by continuing from `after`, handing what it pulled
 * on to the enclosing point.
 */
export function commit<T>(before: InputState<T>, after: InputState<T>): InputState<T> {
    return { ...after, added: carry(before, after) };
}

/**
 * Close a backtrack point by rewinding to `before`, replaying whatever was
 * pulled from the prompt in the meantime so no token is lost or duplicated.
 */
export function mergeStreams<T>(before: InputState<T>, after: InputState<T>): InputState<T> {
    const pulled = after.added ?? Tape.empty<T>();
    return {
        ...before,
        remaining: before.remaining.concat(pulled),
        added: carry(before, after),
        more: before.more === 'complete' || after.more === 'complete' ? 'complete' : 'incomplete',
    };
}

function carry<T>(before: InputState<T>, after: InputState<T>): Tape<T> | undefined {
    if (before.added === undefined) return undefined;
    return after.added === undefined ? before.added : before.added.concat(after.added);
}
