/**
 * @module linked-hashmap
 * Insertion-ordered hash map with bidirectional, owner-checked iterators.
 */

export { LinkedHashMap } from './linked-hash-map';
export type { InsertResult } from './linked-hash-map';
export { MapIterator, ConstMapIterator, Position } from './iterator';
export type { AnyMapIterator } from './iterator';
export { LinkedHashMapError, InvalidIteratorError, IndexOutOfBoundError } from './errors';
export type { LinkedHashMapErrorCode } from './errors';
export { hashValue, areEqual, isStructural } from './hash';
export type { Structural, HashFunction, EqualityPredicate } from './hash';
export { makePair } from './pair';
export type { Pair, ReadonlyPair } from './pair';
export type { LinkedHashMapOptions } from './options';
export { INITIAL_BUCKET_COUNT, MAX_LOAD_FACTOR } from './constants';
