/**
 * Persistent singly linked list, newest element first. Loops accumulate
 * into one so that every step is O(1) and a backtracked branch never sees
 * elements added after it.
 */
export interface Cons<A> {
    readonly head: A;
    readonly tail: List<A>;
}

export type List<A> = Cons<A> | undefined;

export function cons<A>(head: A, tail: List<A>): List<A> {
    return { head, tail };
}

/**
 * Elements in the order they were added.
 */
export function toArray<A>(list: List<A>): A[] {
    const out: A[] = [];
    for (let node = list; node !== undefined; node = node.tail) {
        out.push(node.head);
    }
    return out.reverse();
}
