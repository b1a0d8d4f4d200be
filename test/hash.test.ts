import { describe, expect, it } from 'vitest';

import { areEqual, hashValue, isStructural } from '../src/hash';
import type { Structural } from '../src/hash';

class Point implements Structural {
    constructor(readonly x: number, readonly y: number) {}

    get hashCode(): number { return Math.imul(this.x, 31) + this.y; }

    equals(other: unknown): boolean {
        return other instanceof Point && other.x === this.x && other.y === this.y;
    }
}

describe('hashValue', () => {
    it('hashes strings by value', () => {
        const built = ['hel', 'lo'].join('');
        expect(hashValue(built)).toBe(hashValue('hello'));
        expect(hashValue('hello')).not.toBe(hashValue('hellp'));
    });

    it('returns unsigned 32-bit integers', () => {
        for (const key of ['', 'abc', 0, -1, 3.5, -7.25, true, null, undefined, [1, 2]]) {
            const h = hashValue(key);
            expect(Number.isInteger(h)).toBe(true);
            expect(h).toBeGreaterThanOrEqual(0);
            expect(h).toBeLessThan(2 ** 32);
        }
    });

    it('folds -0 into 0 and gives every NaN the same hash', () => {
        expect(hashValue(-0)).toBe(hashValue(0));
        expect(hashValue(NaN)).toBe(hashValue(0 / 0));
    });

    it('hashes arrays element-wise', () => {
        expect(hashValue([1, 'a', [2]])).toBe(hashValue([1, 'a', [2]]));
        expect(hashValue([1, 2])).not.toBe(hashValue([2, 1]));
    });

    it('delegates to hashCode for structural keys', () => {
        expect(hashValue(new Point(1, 2))).toBe(33);
    });

    it('gives plain objects a stable identity hash', () => {
        const a = {};
        const b = {};
        expect(hashValue(a)).toBe(hashValue(a));
        expect(hashValue(a)).not.toBe(hashValue(b));
    });
});

describe('areEqual', () => {
    it('uses SameValueZero for primitives', () => {
        expect(areEqual(NaN, NaN)).toBe(true);
        expect(areEqual(0, -0)).toBe(true);
        expect(areEqual(1, '1')).toBe(false);
        expect(areEqual(null, undefined)).toBe(false);
    });

    it('compares arrays deeply', () => {
        expect(areEqual([1, [2, 'x']], [1, [2, 'x']])).toBe(true);
        expect(areEqual([1, 2], [1, 2, 3])).toBe(false);
        expect(areEqual([1], { 0: 1, length: 1 })).toBe(false);
    });

    it('compares structural objects through equals', () => {
        expect(areEqual(new Point(1, 2), new Point(1, 2))).toBe(true);
        expect(areEqual(new Point(1, 2), new Point(2, 1))).toBe(false);
    });

    it('compares other objects by identity', () => {
        const a = { id: 1 };
        expect(areEqual(a, a)).toBe(true);
        expect(areEqual(a, { id: 1 })).toBe(false);
    });
});

describe('isStructural', () => {
    it('requires both hashCode and equals', () => {
        expect(isStructural(new Point(0, 0))).toBe(true);
        expect(isStructural({ hashCode: 1 })).toBe(false);
        expect(isStructural('hashCode')).toBe(false);
    });
});
