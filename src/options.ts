import { INITIAL_BUCKET_COUNT } from './constants';
import { LinkedHashMapError } from './errors';
import { areEqual, hashValue } from './hash';
import type { EqualityPredicate, HashFunction } from './hash';

export interface LinkedHashMapOptions<K, V> {
    /** Key → unsigned integer. Defaults to `hashValue`. */
    hash?: HashFunction<K>;
    /** Key equality, consistent with `hash`. Defaults to `areEqual`. */
    equals?: EqualityPredicate<K>;
    /** Length of the first bucket array. Defaults to 16. */
    initialBucketCount?: number;
    /** Produces the value `getOrInsert` stores for a missing key. */
    defaultValue?: () => V;
}

export interface ResolvedOptions<K, V> {
    readonly hash: HashFunction<K>;
    readonly equals: EqualityPredicate<K>;
    readonly initialBucketCount: number;
    readonly defaultValue: (() => V) | undefined;
}

export function resolveOptions<K, V>(options: LinkedHashMapOptions<K, V> = {}): ResolvedOptions<K, V> {
    const initialBucketCount = options.initialBucketCount ?? INITIAL_BUCKET_COUNT;
    if (!Number.isSafeInteger(initialBucketCount) || initialBucketCount < 1) {
        throw new LinkedHashMapError(
            `initialBucketCount must be a positive integer, got ${initialBucketCount}`,
            'INVALID_OPTION',
        );
    }
    if (options.hash !== undefined && typeof options.hash !== 'function') {
        throw new LinkedHashMapError('hash must be a function', 'INVALID_OPTION');
    }
    if (options.equals !== undefined && typeof options.equals !== 'function') {
        throw new LinkedHashMapError('equals must be a function', 'INVALID_OPTION');
    }

    return {
        hash: options.hash ?? hashValue,
        equals: options.equals ?? areEqual,
        initialBucketCount,
        defaultValue: options.defaultValue,
    };
}
