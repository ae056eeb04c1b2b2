/**
 * Persistent token buffer.
 *
 * A Tape is a read-only window [start, end) over an append-only arena.
 * Slicing shares the arena; appending pushes onto it only when the window
 * already ends at the arena's tip, and copies otherwise. No operation ever
 * changes what an existing Tape contains, so any Tape held as a snapshot
 * stays valid after later parsing.
 *
 *   arena:  [ a b c d e f ]
 *   tape1:      [b c d]        start=1 end=4
 *   tape2:          [d e f]    start=3 end=6   <- at tip, append pushes
 */
export class Tape<T> implements Iterable<T> {
    private constructor(
        private readonly arena: T[],
        private readonly start: number,
        private readonly end: number,
    ) {}

    static empty<T>(): Tape<T> {
        return new Tape<T>([], 0, 0);
    }

    static from<T>(items: Iterable<T>): Tape<T> {
        if (items instanceof Tape) return items;
        const arena = Array.from(items);
        return new Tape(arena, 0, arena.length);
    }

    get length(): number {
        return this.end - this.start;
    }

    isEmpty(): boolean {
        return this.end === this.start;
    }

    at(index: number): T | undefined {
        if (index < 0 || index >= this.length) return undefined;
        return this.arena[this.start + index];
    }

    /**
     * First token and the tape after it, or undefined when empty.
     */
    uncons(): [T, Tape<T>] | undefined {
        if (this.isEmpty()) return undefined;
        return [this.arena[this.start], this.drop(1)];
    }

    slice(from: number, to: number = this.length): Tape<T> {
        const lo = clamp(from, 0, this.length);
        const hi = clamp(to, lo, this.length);
        if (lo === 0 && hi === this.length) return this;
        return new Tape(this.arena, this.start + lo, this.start + hi);
    }

    take(n: number): Tape<T> {
        return this.slice(0, n);
    }

    drop(n: number): Tape<T> {
        return this.slice(n);
    }

    splitAt(n: number): [Tape<T>, Tape<T>] {
        return [this.take(n), this.drop(n)];
    }

    /**
     * Number of leading tokens satisfying pred.
     */
    prefixLength(pred: (token: T) => boolean): number {
        let i = this.start;
        while (i < this.end && pred(this.arena[i])) i++;
        return i - this.start;
    }

    span(pred: (token: T) => boolean): [Tape<T>, Tape<T>] {
        return this.splitAt(this.prefixLength(pred));
    }

    dropWhile(pred: (token: T) => boolean): Tape<T> {
        return this.drop(this.prefixLength(pred));
    }

    append(items: Iterable<T>): Tape<T> {
        let arena = this.arena;
        let start = this.start;
        if (this.end !== arena.length) {
            arena = arena.slice(this.start, this.end);
            start = 0;
        }
        const before = arena.length;
        for (const item of items) {
            arena.push(item);
        }
        if (arena.length === before && arena === this.arena) return this;
        return new Tape(arena, start, arena.length);
    }

    concat(other: Tape<T>): Tape<T> {
        if (other.isEmpty()) return this;
        if (this.isEmpty()) return other;
        return this.append(other);
    }

    toArray(): T[] {
        return this.arena.slice(this.start, this.end);
    }

    *[Symbol.iterator](): Iterator<T> {
        for (let i = this.start; i < this.end; i++) {
            yield this.arena[i];
        }
    }
}

function clamp(value: number, lo: number, hi: number): number {
    return Math.min(Math.max(value, lo), hi);
}
