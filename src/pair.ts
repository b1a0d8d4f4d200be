/**
 * A key/value entry. The key is fixed once the entry exists; the value may be
 * reassigned in place.
 */
export interface Pair<K, V> {
    readonly key: K;
    value: V;
}

/** Read-only view handed out by const iterators. */
export interface ReadonlyPair<K, V> {
    readonly key: K;
    readonly value: V;
}

export function makePair<K, V>(key: K, value: V): Pair<K, V> {
    return { key, value };
}
