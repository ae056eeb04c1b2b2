import type { Fail } from './types.js';

/**
 * Raised at the async iteration boundary, where a failed parse has no
 * continuation left to go to.
 */
export class ParseError<T = unknown> extends Error {
    /** Failure-site labels, innermost first */
    readonly context: readonly string[];

    /** What went wrong, without the context */
    readonly reason: string;

    /** Input left unconsumed at the point of failure */
    readonly rest: readonly T[];

    constructor(context: readonly string[], reason: string, rest: readonly T[]) {
        super(context.length > 0 ? `${context.join(' < ')}: ${reason}` : reason);
        this.name = 'ParseError';
        this.context = context;
        this.reason = reason;
        this.rest = rest;
    }

    static from<T>(failure: Fail<T>): ParseError<T> {
        return new ParseError(failure.context, failure.message, failure.rest.toArray());
    }
}
