import { HEAD, INITIAL_SLOT_CAPACITY, NIL, TAIL } from './constants';
import type { Pair } from './pair';

/**
 * Arena holding every node of one map.
 *
 * Architecture: **Structure of Arrays (SoA)**
 * A node is a slot index. Its fields live in parallel arrays:
 * - `_pairs`: the key/value entry (`undefined` while the slot is free).
 * - `_hashes`: the key's cached hash.
 * - `_prev` / `_next`: order-list links.
 * - `_chainNext`: hash-chain link (non-owning, secondary index).
 * - `_generations`: bumped on release so stale handles can be told apart.
 *
 * Slots 0 and 1 are the head and tail sentinels. Slot indices never move;
 * growing the arena copies the arrays but keeps every index.
 */
export class NodeStore<K, V> {
    private _pairs: (Pair<K, V> | undefined)[] = [];
    private _hashes: Uint32Array;
    private _prev: Int32Array;
    private _next: Int32Array;
    private _chainNext: Int32Array;
    private _generations: Uint32Array;

    // Released slots, reused LIFO
    private _freeList: number[] = [];
    // Slots [0, _used) have been handed out at least once
    private _used = 2;
    private _live = 0;

    constructor(capacity: number = INITIAL_SLOT_CAPACITY) {
        const cap = Math.max(capacity, 2);
        this._hashes = new Uint32Array(cap);
        this._prev = new Int32Array(cap).fill(NIL);
        this._next = new Int32Array(cap).fill(NIL);
        this._chainNext = new Int32Array(cap).fill(NIL);
        this._generations = new Uint32Array(cap);

        this._next[HEAD] = TAIL;
        this._prev[TAIL] = HEAD;
    }

    get capacity(): number { return this._prev.length; }

    /** Number of slots currently holding a pair. */
    get liveCount(): number { return this._live; }

    /**
     * Creates a node for `pair` and returns its slot.
     * The node starts unlinked from both the order list and the hash index.
     * @complexity Amortized O(1).
     */
    allocate(pair: Pair<K, V>, hash: number): number {
        let slot = this._freeList.pop();
        if (slot === undefined) {
            if (this._used === this.capacity) this.grow(this.capacity * 2);
            slot = this._used++;
        }
        this._pairs[slot] = pair;
        this._hashes[slot] = hash;
        this._prev[slot] = NIL;
        this._next[slot] = NIL;
        this._chainNext[slot] = NIL;
        this._live++;
        return slot;
    }

    /** Destroys the node in `slot`. Callers unlink it first. */
    release(slot: number): void {
        if (!this.isLive(slot)) return;
        this._pairs[slot] = undefined;
        this._prev[slot] = NIL;
        this._next[slot] = NIL;
        this._chainNext[slot] = NIL;
        this._generations[slot]++;
        this._freeList.push(slot);
        this._live--;
    }

    isLive(slot: number): boolean {
        return slot > TAIL && slot < this._used && this._pairs[slot] !== undefined;
    }

    isSentinel(slot: number): boolean {
        return slot === HEAD || slot === TAIL;
    }

    pairAt(slot: number): Pair<K, V> | undefined { return this._pairs[slot]; }
    hashAt(slot: number): number { return this._hashes[slot]; }

    prevOf(slot: number): number { return this._prev[slot]; }
    nextOf(slot: number): number { return this._next[slot]; }
    chainNextOf(slot: number): number { return this._chainNext[slot]; }

    setPrev(slot: number, target: number): void { this._prev[slot] = target; }
    setNext(slot: number, target: number): void { this._next[slot] = target; }
    setChainNext(slot: number, target: number): void { this._chainNext[slot] = target; }

    generationOf(slot: number): number { return this._generations[slot]; }

    /** Invalidates every handle on the sentinels (used by clear). */
    retireSentinels(): void {
        this._generations[HEAD]++;
        this._generations[TAIL]++;
    }

    /** Drops all storage, sentinels included. The store is unusable afterwards. */
    dispose(): void {
        this._pairs = [];
        this._freeList = [];
        this._hashes = new Uint32Array(0);
        this._prev = new Int32Array(0);
        this._next = new Int32Array(0);
        this._chainNext = new Int32Array(0);
        this._generations = new Uint32Array(0);
        this._used = 0;
        this._live = 0;
    }

    private grow(capacity: number): void {
        const hashes = new Uint32Array(capacity);
        const prev = new Int32Array(capacity).fill(NIL);
        const next = new Int32Array(capacity).fill(NIL);
        const chainNext = new Int32Array(capacity).fill(NIL);
        const generations = new Uint32Array(capacity);

        hashes.set(this._hashes);
        prev.set(this._prev);
        next.set(this._next);
        chainNext.set(this._chainNext);
        generations.set(this._generations);

        this._hashes = hashes;
        this._prev = prev;
        this._next = next;
        this._chainNext = chainNext;
        this._generations = generations;
    }
}
