/**
 * @module linked-hashmap
 * @description
 * Hash map with deterministic iteration in insertion order.
 * * Architecture:
 * - Storage: node arena (`NodeStore`), nodes addressed by stable slot indices.
 * - Order: sentinel-delimited doubly linked list through the arena.
 * - Lookup: separate chaining (`HashIndex`), chain links stored on the nodes.
 * - Contract: re-inserting a key keeps its position and its value.
 */

import { NIL, TAIL } from './constants';
import { IndexOutOfBoundError, InvalidIteratorError, LinkedHashMapError } from './errors';
import { HashIndex } from './hash-index';
import { ConstMapIterator, MapIterator } from './iterator';
import type { Position } from './iterator';
import { NodeStore } from './node-store';
import { resolveOptions } from './options';
import type { LinkedHashMapOptions, ResolvedOptions } from './options';
import { OrderList } from './order-list';
import { makePair } from './pair';
import type { Pair, ReadonlyPair } from './pair';

export interface InsertResult<K, V> {
    readonly position: MapIterator<K, V>;
    readonly inserted: boolean;
}

/**
 * Associative container with O(1) amortized lookup that iterates in the
 * order keys were first inserted.
 *
 * @template K Key type; hashed and compared through the map's options.
 * @template V Mapped value type.
 */
export class LinkedHashMap<K, V> implements Iterable<[K, V]> {
    private readonly _options: ResolvedOptions<K, V>;
    private readonly _store: NodeStore<K, V>;
    private readonly _order: OrderList<K, V>;
    private readonly _index: HashIndex<K, V>;
    private _size = 0;
    private _destroyed = false;

    constructor(options?: LinkedHashMapOptions<K, V>) {
        this._options = resolveOptions(options);
        this._store = new NodeStore<K, V>();
        this._order = new OrderList(this._store);
        this._index = new HashIndex(this._store, this._order, this._options.equals, this._options.initialBucketCount);
    }

    /** Builds a map from `[key, value]` entries. Later duplicates are ignored. */
    static from<K, V>(entries: Iterable<readonly [K, V]>, options?: LinkedHashMapOptions<K, V>): LinkedHashMap<K, V> {
        const map = new LinkedHashMap<K, V>(options);
        for (const [key, value] of entries) map.insert(key, value);
        return map;
    }

    get size(): number { return this._size; }
    get bucketCount(): number { return this._index.bucketCount; }
    get loadFactor(): number { return this._size / this._index.bucketCount; }

    empty(): boolean { return this._size === 0; }

    // ========================================================================
    // LOOKUP
    // ========================================================================

    find(key: K): MapIterator<K, V> {
        return new MapIterator(this, this._store, this.findSlot(key));
    }

    cfind(key: K): ConstMapIterator<K, V> {
        return new ConstMapIterator(this, this._store, this.findSlot(key));
    }

    /** 0 or 1, keys are unique. */
    count(key: K): number {
        return this.findSlot(key) === TAIL ? 0 : 1;
    }

    has(key: K): boolean {
        return this.count(key) === 1;
    }

    /**
     * Returns the value mapped to `key`.
     * @throws IndexOutOfBoundError if the key is absent.
     */
    at(key: K): V {
        const pair = this._store.pairAt(this.findSlot(key));
        if (pair === undefined) throw new IndexOutOfBoundError();
        return pair.value;
    }

    /**
     * Returns the value mapped to `key`, inserting one first when the key is
     * absent. The new value comes from `fallback`, else from the
     * `defaultValue` option; one of the two factories is required for a
     * missing key, since there is no default-constructed `V`.
     * @throws LinkedHashMapError (`NO_DEFAULT_VALUE`) on a miss with no factory;
     * the map is left unchanged.
     */
    getOrInsert(key: K, fallback?: () => V): V {
        return this.entryFor(key, fallback).value;
    }

    /** `map[key] = value`: inserts or overwrites, keeping the key's position. */
    set(key: K, value: V): this {
        this.entryFor(key, () => value).value = value;
        return this;
    }

    // ========================================================================
    // MUTATION
    // ========================================================================

    /**
     * Inserts `key` unless it is already present. An existing entry keeps its
     * value and its position.
     * @complexity Amortized O(1).
     */
    insert(pair: ReadonlyPair<K, V>): InsertResult<K, V>;
    insert(key: K, value: V): InsertResult<K, V>;
    insert(...args: [ReadonlyPair<K, V>] | [K, V]): InsertResult<K, V> {
        this.assertAlive();
        const key = args.length === 1 ? args[0].key : args[0];
        const value = args.length === 1 ? args[0].value : args[1];

        const hash = this.hashOf(key);
        const existing = this._index.lookup(key, hash);
        if (existing !== NIL) {
            return { position: new MapIterator(this, this._store, existing), inserted: false };
        }

        // Grow before the node counts, so the load bound holds afterwards
        this._index.maybeGrow(this._size + 1);

        const slot = this._store.allocate(makePair(key, value), hash);
        this._order.append(slot);
        this._index.link(slot);
        this._size++;
        return { position: new MapIterator(this, this._store, slot), inserted: true };
    }

    /**
     * Removes the entry at `position`. Other iterators stay valid.
     * @throws InvalidIteratorError for a foreign, stale or end position.
     */
    erase(position: Position<K, V>): void {
        this.assertAlive();
        const slot = position.slot;
        if (position.owner !== this) throw new InvalidIteratorError('Iterator belongs to another map');
        if (this._store.isSentinel(slot)) throw new InvalidIteratorError('Cannot erase end()');
        if (!position.isValid) throw new InvalidIteratorError('Iterator refers to an erased entry');

        this._order.unlink(slot);
        this._index.unlink(slot);
        this._store.release(slot);
        this._size--;
    }

    /** Removes `key` if present. */
    delete(key: K): boolean {
        const it = this.find(key);
        if (it.isEnd) return false;
        this.erase(it);
        return true;
    }

    /** Removes every entry. The bucket count is kept; all iterators become invalid. */
    clear(): void {
        this.assertAlive();
        this._order.clear();
        this._index.reset();
        this._store.retireSentinels();
        this._size = 0;
    }

    // ========================================================================
    // COPY & LIFECYCLE
    // ========================================================================

    /**
     * Copy construction: same options, same bucket count, same entries in the
     * same order. Entries are copied; values are shared by reference.
     */
    clone(): LinkedHashMap<K, V> {
        this.assertAlive();
        const copy = new LinkedHashMap<K, V>({ ...this._options, initialBucketCount: this.bucketCount });
        copy.populateFrom(this);
        return copy;
    }

    /**
     * Copy assignment: clears this map, then inserts `other`'s entries in
     * order. Keeps this map's own hash, equality and bucket array.
     */
    assign(other: LinkedHashMap<K, V>): this {
        this.assertAlive();
        if (other === this) return this;
        other.assertAlive();
        this.clear();
        this.populateFrom(other);
        return this;
    }

    /** Releases all storage. Any later call throws. */
    destroy(): void {
        if (this._destroyed) return;
        this.clear();
        this._index.dispose();
        this._store.dispose();
        this._destroyed = true;
    }

    // ========================================================================
    // ITERATION
    // ========================================================================

    begin(): MapIterator<K, V> {
        this.assertAlive();
        return new MapIterator(this, this._store, this._order.first());
    }

    end(): MapIterator<K, V> {
        this.assertAlive();
        return new MapIterator(this, this._store, TAIL);
    }

    cbegin(): ConstMapIterator<K, V> {
        this.assertAlive();
        return new ConstMapIterator(this, this._store, this._order.first());
    }

    cend(): ConstMapIterator<K, V> {
        this.assertAlive();
        return new ConstMapIterator(this, this._store, TAIL);
    }

    *entries(): IterableIterator<[K, V]> {
        for (const pair of this.pairs()) yield [pair.key, pair.value];
    }

    *keys(): IterableIterator<K> {
        for (const pair of this.pairs()) yield pair.key;
    }

    *values(): IterableIterator<V> {
        for (const pair of this.pairs()) yield pair.value;
    }

    forEach(fn: (value: V, key: K, map: this) => void): void {
        for (const pair of this.pairs()) fn(pair.value, pair.key, this);
    }

    [Symbol.iterator](): IterableIterator<[K, V]> {
        return this.entries();
    }

    toString(): string {
        const parts: string[] = [];
        for (const pair of this.pairs()) parts.push(`${String(pair.key)} => ${String(pair.value)}`);
        return `LinkedHashMap{${parts.join(', ')}}`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }

    // ========================================================================
    // INTERNALS
    // ========================================================================

    private *pairs(): Generator<Pair<K, V>> {
        this.assertAlive();
        for (const slot of this._order) {
            const pair = this._store.pairAt(slot);
            if (pair !== undefined) yield pair;
        }
    }

    private hashOf(key: K): number {
        return this._options.hash(key) >>> 0;
    }

    /** Slot of `key`, or TAIL (the end position) when absent. */
    private findSlot(key: K): number {
        this.assertAlive();
        const slot = this._index.lookup(key, this.hashOf(key));
        return slot === NIL ? TAIL : slot;
    }

    private entryFor(key: K, fallback: (() => V) | undefined): Pair<K, V> {
        const found = this._store.pairAt(this.findSlot(key));
        if (found !== undefined) return found;

        const make = fallback ?? this._options.defaultValue;
        if (make === undefined) {
            throw new LinkedHashMapError('No default value for a missing key', 'NO_DEFAULT_VALUE');
        }
        return this.insert(key, make()).position.pair;
    }

    private populateFrom(source: LinkedHashMap<K, V>): void {
        for (const pair of source.pairs()) this.insert(pair.key, pair.value);
    }

    private assertAlive(): void {
        if (this._destroyed) throw new LinkedHashMapError('Map has been destroyed', 'DESTROYED');
    }
}

