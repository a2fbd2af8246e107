// tests/resolve.test.ts — marker resolution
import { describe, it, expect } from 'vitest';
import { resolve, mkDefault, mkForce, mkOrder } from '../src/index.js';

describe('resolve', () => {
    it('unwraps priority markers at any depth', () => {
        expect(resolve({ a: mkDefault(1), b: { c: mkForce('x') } })).toEqual({ a: 1, b: { c: 'x' } });
    });

    it('flattens ordered lists with a stable sort', () => {
        const list = {
            __orderedList: true,
            segments: [
                { order: 1000, items: ['b1'] },
                { order: 500, items: ['a'] },
                { order: 1000, items: ['b2'] },
            ],
        };
        expect(resolve(list)).toEqual(['a', 'b1', 'b2']);
    });

    it('resolves a bare ordered marker to its items', () => {
        expect(resolve(mkOrder(10, ['x', mkDefault('y')]))).toEqual(['x', 'y']);
    });

    it('passes primitives, dates and regexps through', () => {
        const date = new Date(0);
        const re = /x/;
        expect(resolve(null)).toBe(null);
        expect(resolve(3)).toBe(3);
        expect(resolve(date)).toBe(date);
        expect(resolve(re)).toBe(re);
    });
});
