import { HEAD, TAIL } from './constants';
import { InvalidIteratorError } from './errors';
import type { NodeStore } from './node-store';
import type { Pair, ReadonlyPair } from './pair';

/**
 * Shared state of both iterator flavours: (owner, slot, generation).
 * A handle is valid while its slot still carries the generation it was
 * taken at; erase, clear and destroy bump generations.
 */
export abstract class Position<K, V> {
    protected _slot: number;
    protected _generation: number;

    constructor(
        /** @internal */ readonly owner: object,
        protected readonly store: NodeStore<K, V>,
        slot: number,
    ) {
        this._slot = slot;
        this._generation = store.generationOf(slot);
    }

    /** @internal */
    get slot(): number { return this._slot; }

    /** @internal */
    get generation(): number { return this._generation; }

    get isEnd(): boolean { return this._slot === TAIL; }

    get isValid(): boolean {
        const store = this.store;
        if (store.generationOf(this._slot) !== this._generation) return false;
        return this._slot === TAIL || store.isLive(this._slot);
    }

    get key(): K { return this.deref().key; }

    /**
     * Same owner and same node. Handles from different maps never compare
     * equal, not even two `end()`s.
     */
    equals(other: Position<K, V>): boolean {
        return this.owner === other.owner
            && this._slot === other._slot
            && this._generation === other._generation;
    }

    /** Moves to the next node or to end. Fails at end. */
    increment(): this {
        if (!this.isValid || this._slot === TAIL) {
            throw new InvalidIteratorError('Cannot increment past end');
        }
        this.moveTo(this.store.nextOf(this._slot));
        return this;
    }

    /** Moves to the previous node. Fails on the first node and on end of an empty map. */
    decrement(): this {
        if (!this.isValid) throw new InvalidIteratorError('Cannot decrement a stale iterator');
        const prev = this.store.prevOf(this._slot);
        if (prev === HEAD) throw new InvalidIteratorError('Cannot decrement past begin');
        this.moveTo(prev);
        return this;
    }

    protected deref(): Pair<K, V> {
        const pair = this.isValid ? this.store.pairAt(this._slot) : undefined;
        if (pair === undefined) throw new InvalidIteratorError('Cannot dereference this iterator');
        return pair;
    }

    private moveTo(slot: number): void {
        this._slot = slot;
        this._generation = this.store.generationOf(slot);
    }
}

/** Bidirectional iterator whose entry value may be written through. */
export class MapIterator<K, V> extends Position<K, V> {
    get pair(): Pair<K, V> { return this.deref(); }

    get value(): V { return this.deref().value; }
    set value(v: V) { this.deref().value = v; }

    /** `it++`: moves forward, returns the old position. */
    postIncrement(): MapIterator<K, V> {
        const old = this.clone();
        this.increment();
        return old;
    }

    /** `it--`: moves back, returns the old position. */
    postDecrement(): MapIterator<K, V> {
        const old = this.clone();
        this.decrement();
        return old;
    }

    clone(): MapIterator<K, V> {
        const it = new MapIterator<K, V>(this.owner, this.store, this._slot);
        it._generation = this._generation;
        return it;
    }

    toConst(): ConstMapIterator<K, V> {
        return ConstMapIterator.at(this.owner, this.store, this._slot, this._generation);
    }
}

/** Bidirectional read-only iterator. */
export class ConstMapIterator<K, V> extends Position<K, V> {
    /** @internal */
    static at<K, V>(owner: object, store: NodeStore<K, V>, slot: number, generation: number): ConstMapIterator<K, V> {
        const it = new ConstMapIterator<K, V>(owner, store, slot);
        it._generation = generation;
        return it;
    }

    get pair(): ReadonlyPair<K, V> { return this.deref(); }

    get value(): V { return this.deref().value; }

    postIncrement(): ConstMapIterator<K, V> {
        const old = this.clone();
        this.increment();
        return old;
    }

    postDecrement(): ConstMapIterator<K, V> {
        const old = this.clone();
        this.decrement();
        return old;
    }

    clone(): ConstMapIterator<K, V> {
        return ConstMapIterator.at(this.owner, this.store, this._slot, this._generation);
    }
}

export type AnyMapIterator<K, V> = MapIterator<K, V> | ConstMapIterator<K, V>;
