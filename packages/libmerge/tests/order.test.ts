// tests/order.test.ts — list position markers
import { describe, it, expect } from 'vitest';
import {
    mkBefore, mkAfter, mkOrder,
    isOrdered, isOrderedList, isArrayLike,
    BEFORE_ORDER, DEFAULT_ORDER, AFTER_ORDER,
} from '../src/index.js';
import { toSegments } from '../src/order.js';

describe('order constants', () => {
    it('sorts before < default < after', () => {
        expect(BEFORE_ORDER).toBe(500);
        expect(DEFAULT_ORDER).toBe(1000);
        expect(AFTER_ORDER).toBe(1500);
    });
});

describe('markers', () => {
    it('mkBefore / mkAfter / mkOrder carry their position', () => {
        expect(mkBefore(['a']).order).toBe(BEFORE_ORDER);
        expect(mkAfter(['z']).order).toBe(AFTER_ORDER);
        expect(mkOrder(750, ['m'])).toEqual({ __ordered: true, order: 750, items: ['m'] });
    });

    it('type guards recognise markers only', () => {
        expect(isOrdered(mkOrder(1, []))).toBe(true);
        expect(isOrdered(['x'])).toBe(false);
        expect(isOrdered(null)).toBe(false);
        expect(isOrderedList({ __orderedList: true, segments: [] })).toBe(true);
        expect(isOrderedList({ segments: [] })).toBe(false);
    });

    it('isArrayLike covers arrays and both marker kinds', () => {
        expect(isArrayLike([])).toBe(true);
        expect(isArrayLike(mkAfter([]))).toBe(true);
        expect(isArrayLike({ __orderedList: true, segments: [] })).toBe(true);
        expect(isArrayLike('abc')).toBe(false);
    });
});

describe('toSegments', () => {
    it('wraps a plain array at the default order', () => {
        expect(toSegments(['a', 'b'])).toEqual([{ order: DEFAULT_ORDER, items: ['a', 'b'] }]);
    });

    it('splits inline markers out of a plain array', () => {
        expect(toSegments(['a', mkAfter(['z']), 'b'])).toEqual([
            { order: DEFAULT_ORDER, items: ['a'] },
            { order: AFTER_ORDER, items: ['z'] },
            { order: DEFAULT_ORDER, items: ['b'] },
        ]);
    });

    it('throws on non-array input', () => {
        expect(() => toSegments('nope')).toThrow(/Expected array-like/);
    });
});
