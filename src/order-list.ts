import { HEAD, TAIL } from './constants';
import { InvalidIteratorError } from './errors';
import type { NodeStore } from './node-store';

/**
 * Doubly linked list threading every live node in insertion order.
 * Delimited by the head and tail sentinels, so link and unlink never
 * branch on the ends.
 */
export class OrderList<K, V> implements Iterable<number> {
    constructor(private readonly store: NodeStore<K, V>) {}

    isEmpty(): boolean { return this.store.nextOf(HEAD) === TAIL; }

    /** First live slot, or TAIL when empty. */
    first(): number { return this.store.nextOf(HEAD); }

    /** Last live slot, or HEAD when empty. */
    last(): number { return this.store.prevOf(TAIL); }

    next(slot: number): number { return this.store.nextOf(slot); }
    prev(slot: number): number { return this.store.prevOf(slot); }

    /** Links `slot` immediately before the tail sentinel. O(1). */
    append(slot: number): void {
        const store = this.store;
        const last = store.prevOf(TAIL);
        store.setPrev(slot, last);
        store.setNext(slot, TAIL);
        store.setNext(last, slot);
        store.setPrev(TAIL, slot);
    }

    /** Unlinks a live, non-sentinel slot. O(1). */
    unlink(slot: number): void {
        const store = this.store;
        const prev = store.prevOf(slot);
        const next = store.nextOf(slot);
        store.setNext(prev, next);
        store.setPrev(next, prev);
    }

    /** Releases every node between the sentinels. O(n). */
    clear(): void {
        const store = this.store;
        let curr = store.nextOf(HEAD);
        while (curr !== TAIL) {
            const next = store.nextOf(curr);
            store.release(curr);
            curr = next;
        }
        store.setNext(HEAD, TAIL);
        store.setPrev(TAIL, HEAD);
    }

    /**
     * Yields live slots in order. The caller may erase or insert entries
     * between steps: the walk resumes after the yielded slot while it is
     * live, else at the successor saved before yielding.
     * @throws InvalidIteratorError when both the yielded slot and its saved
     * successor were erased (or the list was cleared) during the step.
     */
    *[Symbol.iterator](): Iterator<number> {
        const store = this.store;
        let curr = store.nextOf(HEAD);
        while (curr !== TAIL) {
            const generation = store.generationOf(curr);
            const next = store.nextOf(curr);
            const nextGeneration = store.generationOf(next);
            yield curr;

            if (store.isLive(curr) && store.generationOf(curr) === generation) {
                curr = store.nextOf(curr);
            } else if (store.generationOf(next) === nextGeneration && (next === TAIL || store.isLive(next))) {
                curr = next;
            } else {
                throw new InvalidIteratorError('Order changed under a running iteration');
            }
        }
    }
}
