/**
 * @module linked-hashmap/hash
 * @description
 * Default key hashing and equality for LinkedHashMap.
 * * Hashing: FNV-1a over string code units and number bit patterns.
 * * Structural keys (objects exposing `hashCode` and `equals`) and arrays
 *   are compared by value; every other object by identity.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/**
 * Interface for keys with value semantics.
 * Equal objects MUST report the same `hashCode`.
 */
export interface Structural {
    readonly hashCode: number;
    equals(other: unknown): boolean;
}

/** Maps a key to an unsigned 32-bit integer. */
export type HashFunction<K> = (key: K) => number;

/** Key equality used for chain matching and duplicate detection. */
export type EqualityPredicate<K> = (a: K, b: K) => boolean;

// ============================================================================
// 2. HASH ENGINE (FNV-1a)
// ============================================================================

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;

const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

const identityHashes = new WeakMap<object, number>();
let nextIdentity = 1;

function mix(h: number, v: number): number {
    h ^= v;
    return Math.imul(h, FNV_PRIME);
}

function hashNumber(val: number): number {
    // Integer fast path; -0 folds into 0
    if ((val | 0) === val) return mix(FNV_OFFSET, val) >>> 0;
    // All NaNs share one bit pattern
    if (Number.isNaN(val)) return 0x7ff80000;
    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h = mix(h, view.getInt32(0, true));
    h = mix(h, view.getInt32(4, true));
    return h >>> 0;
}

function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h = mix(h, str.charCodeAt(i));
    }
    return h >>> 0;
}

function identityHash(obj: object): number {
    let h = identityHashes.get(obj);
    if (h === undefined) {
        h = hashNumber(nextIdentity++);
        identityHashes.set(obj, h);
    }
    return h;
}

export function isStructural(val: unknown): val is Structural {
    return typeof val === 'object' && val !== null
        && typeof Reflect.get(val, 'hashCode') === 'number'
        && typeof Reflect.get(val, 'equals') === 'function';
}

/**
 * Computes an unsigned 32-bit hash code for any key.
 * - Numbers / strings / bigints / booleans: by value.
 * - Arrays: element-wise.
 * - Structural objects: delegates to `.hashCode`.
 * - Other objects and functions: stable identity hash.
 */
export function hashValue(val: unknown): number {
    switch (typeof val) {
        case 'number': return hashNumber(val);
        case 'string': return hashString(val);
        case 'boolean': return val ? 1231 : 1237;
        case 'bigint': return (hashString(val.toString()) ^ 0x5bd1e995) >>> 0;
        case 'undefined': return 0;
        case 'symbol': return hashString(String(val));
        case 'function': return identityHash(val);
    }

    if (typeof val !== 'object' || val === null) return 0x9e3779b9;

    if (Array.isArray(val)) {
        let h = FNV_OFFSET;
        const len = val.length;
        for (let i = 0; i < len; i++) {
            h = mix(h, hashValue(val[i]));
        }
        return h >>> 0;
    }

    if (isStructural(val)) return val.hashCode >>> 0;

    return identityHash(val);
}

// ============================================================================
// 3. EQUALITY
// ============================================================================

/**
 * Default key equality, consistent with `hashValue`.
 * SameValueZero for primitives, deep for arrays and structural objects.
 */
export function areEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a === 'number' && typeof b === 'number') {
        return Number.isNaN(a) && Number.isNaN(b);
    }
    if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
        return false;
    }

    if (Array.isArray(a)) {
        if (!Array.isArray(b) || a.length !== b.length) return false;
        for (let i = 0; i < a.length; i++) {
            if (!areEqual(a[i], b[i])) return false;
        }
        return true;
    }

    if (isStructural(a)) return a.equals(b);
    return false;
}
