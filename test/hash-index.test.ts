import { describe, expect, it } from 'vitest';

import { NIL } from '../src/constants';
import { HashIndex } from '../src/hash-index';
import { NodeStore } from '../src/node-store';
import { OrderList } from '../src/order-list';
import { makePair } from '../src/pair';

// Keys hash to themselves so bucket placement is predictable
function setup(bucketCount: number) {
    const store = new NodeStore<number, string>();
    const order = new OrderList(store);
    const index = new HashIndex(store, order, (a: number, b: number) => a === b, bucketCount);
    const add = (key: number) => {
        const slot = store.allocate(makePair(key, `v${key}`), key);
        order.append(slot);
        index.link(slot);
        return slot;
    };
    return { store, order, index, add };
}

describe('HashIndex', () => {
    it('places keys by hash mod bucket count', () => {
        const { index } = setup(4);
        expect(index.bucketCount).toBe(4);
        expect(index.bucketOf(9)).toBe(1);
        expect(index.bucketOf(0xffffffff)).toBe(3);
    });

    it('finds every key of a shared chain', () => {
        const { index, add } = setup(4);
        const s1 = add(1);
        const s5 = add(5);
        const s9 = add(9);

        expect(index.lookup(1, 1)).toBe(s1);
        expect(index.lookup(5, 5)).toBe(s5);
        expect(index.lookup(9, 9)).toBe(s9);
        expect(index.lookup(13, 13)).toBe(NIL);
        expect(index.chainedCount()).toBe(3);
    });

    it('compares keys after a hash match', () => {
        const store = new NodeStore<string, number>();
        const order = new OrderList(store);
        const index = new HashIndex(store, order, (a: string, b: string) => a === b, 8);
        const slot = store.allocate(makePair('x', 1), 42);
        order.append(slot);
        index.link(slot);

        expect(index.lookup('x', 42)).toBe(slot);
        expect(index.lookup('y', 42)).toBe(NIL);
    });

    it('unlinks from the head, middle and tail of a chain', () => {
        const { index, add } = setup(4);
        const s1 = add(1);
        const s5 = add(5);
        const s9 = add(9);

        // Chain is 9 -> 5 -> 1 (prepend on link)
        expect(index.unlink(s5)).toBe(true);
        expect(index.lookup(5, 5)).toBe(NIL);
        expect(index.lookup(1, 1)).toBe(s1);
        expect(index.unlink(s9)).toBe(true);
        expect(index.unlink(s1)).toBe(true);
        expect(index.chainedCount()).toBe(0);
        expect(index.unlink(s1)).toBe(false);
    });

    it('grows only when the prospective count exceeds the load factor', () => {
        const { index } = setup(4);
        expect(index.maybeGrow(3)).toBe(false);
        expect(index.bucketCount).toBe(4);
        expect(index.maybeGrow(4)).toBe(true);
        expect(index.bucketCount).toBe(8);
    });

    it('doubles as many times as needed in one rehash', () => {
        const { index } = setup(8);
        expect(index.maybeGrow(13)).toBe(true);
        expect(index.bucketCount).toBe(32);
    });

    it('rehash keeps every node reachable and leaves order links alone', () => {
        const { store, order, index, add } = setup(4);
        const slots = [1, 5, 9, 2, 6].map(add);
        const before = [...order];

        index.rehash(16);
        expect(index.bucketCount).toBe(16);
        expect([...order]).toEqual(before);
        expect(index.chainedCount()).toBe(5);
        for (const slot of slots) {
            const key = store.pairAt(slot)?.key ?? -1;
            expect(index.lookup(key, key)).toBe(slot);
        }
    });

    it('reset empties the buckets but keeps their count', () => {
        const { index, add } = setup(4);
        add(1);
        add(2);
        index.reset();
        expect(index.chainedCount()).toBe(0);
        expect(index.lookup(1, 1)).toBe(NIL);
        expect(index.bucketCount).toBe(4);
    });
});
