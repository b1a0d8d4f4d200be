import { MAX_LOAD_FACTOR, NIL } from './constants';
import type { EqualityPredicate } from './hash';
import type { NodeStore } from './node-store';
import type { OrderList } from './order-list';

/**
 * Separate-chaining hash index over the nodes of a NodeStore.
 *
 * The bucket array holds chain heads only; chain links live on the nodes
 * (`chainNext`). The index owns no node: it is a secondary view of the set
 * already owned by the order list.
 */
export class HashIndex<K, V> {
    private _buckets: Int32Array;

    constructor(
        private readonly store: NodeStore<K, V>,
        private readonly order: OrderList<K, V>,
        private readonly equals: EqualityPredicate<K>,
        bucketCount: number,
    ) {
        this._buckets = new Int32Array(bucketCount).fill(NIL);
    }

    get bucketCount(): number { return this._buckets.length; }

    bucketOf(hash: number): number {
        return (hash >>> 0) % this._buckets.length;
    }

    /** Slot holding `key`, or NIL. Cached hashes are compared before keys. */
    lookup(key: K, hash: number): number {
        const store = this.store;
        let curr = this._buckets[this.bucketOf(hash)];
        while (curr !== NIL) {
            if (store.hashAt(curr) === hash) {
                const pair = store.pairAt(curr);
                if (pair !== undefined && this.equals(pair.key, key)) return curr;
            }
            curr = store.chainNextOf(curr);
        }
        return NIL;
    }

    /** Prepends `slot` to the chain of its bucket. O(1). */
    link(slot: number): void {
        const idx = this.bucketOf(this.store.hashAt(slot));
        this.store.setChainNext(slot, this._buckets[idx]);
        this._buckets[idx] = slot;
    }

    /**
     * Removes `slot` from its chain by linear scan.
     * @returns false when the slot was not found in its bucket.
     */
    unlink(slot: number): boolean {
        const store = this.store;
        const idx = this.bucketOf(store.hashAt(slot));
        let curr = this._buckets[idx];
        if (curr === slot) {
            this._buckets[idx] = store.chainNextOf(slot);
            store.setChainNext(slot, NIL);
            return true;
        }
        while (curr !== NIL) {
            const next = store.chainNextOf(curr);
            if (next === slot) {
                store.setChainNext(curr, store.chainNextOf(slot));
                store.setChainNext(slot, NIL);
                return true;
            }
            curr = next;
        }
        return false;
    }

    /**
     * Doubles the bucket array until `prospectiveCount` fits under the
     * load factor, then rehashes once.
     * @returns true when a rehash happened.
     */
    maybeGrow(prospectiveCount: number): boolean {
        let target = this._buckets.length;
        while (prospectiveCount > target * MAX_LOAD_FACTOR) target *= 2;
        if (target === this._buckets.length) return false;
        this.rehash(target);
        return true;
    }

    /**
     * Rebuilds every chain for `bucketCount` buckets.
     * Walks the order list, not the old buckets, so the result depends only
     * on insertion order. Order links and slots are untouched.
     * @complexity O(n)
     */
    rehash(bucketCount: number): void {
        const store = this.store;
        const buckets = new Int32Array(bucketCount).fill(NIL);
        for (const slot of this.order) {
            const idx = (store.hashAt(slot) >>> 0) % bucketCount;
            store.setChainNext(slot, buckets[idx]);
            buckets[idx] = slot;
        }
        this._buckets = buckets;
    }

    /** Empties every bucket; the bucket count is kept. */
    reset(): void {
        this._buckets.fill(NIL);
    }

    /** Number of nodes reachable through all chains. */
    chainedCount(): number {
        let n = 0;
        for (let i = 0; i < this._buckets.length; i++) {
            let curr = this._buckets[i];
            while (curr !== NIL) {
                n++;
                curr = this.store.chainNextOf(curr);
            }
        }
        return n;
    }

    dispose(): void {
        this._buckets = new Int32Array(0);
    }
}
