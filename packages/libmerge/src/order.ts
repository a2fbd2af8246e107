// libmerge/src/order.ts
// Position markers for list fragments. Lower order sorts first; plain
// arrays sit at DEFAULT_ORDER, ties keep contribution order.

import type { Ordered, OrderedList, Segment } from './types.js';

export const BEFORE_ORDER = 500;
export const DEFAULT_ORDER = 1000;
export const AFTER_ORDER = 1500;

export function mkOrder<T>(order: number, items: T[]): Ordered<T> {
    return { __ordered: true, order, items };
}

export function mkBefore<T>(items: T[]): Ordered<T> {
    return mkOrder(BEFORE_ORDER, items);
}

export function mkAfter<T>(items: T[]): Ordered<T> {
    return mkOrder(AFTER_ORDER, items);
}

export function isOrdered(val: unknown): val is Ordered {
    return typeof val === 'object' && val !== null && '__ordered' in val && val.__ordered === true;
}

export function isOrderedList(val: unknown): val is OrderedList {
    return typeof val === 'object' && val !== null && '__orderedList' in val && val.__orderedList === true;
}

export function isArrayLike(val: unknown): boolean {
    return Array.isArray(val) || isOrdered(val) || isOrderedList(val);
}

/**
 * Split an array-like value into segments. Ordered markers nested inside a
 * plain array keep their own position; the surrounding items form
 * DEFAULT_ORDER segments.
 */
export function toSegments(val: unknown): Segment[] {
    if (isOrderedList(val)) return val.segments;
    if (isOrdered(val)) return [{ order: val.order, items: val.items }];
    if (!Array.isArray(val)) {
        throw new Error('Expected array-like value, got: ' + typeof val);
    }

    const segments: Segment[] = [];
    let inline: unknown[] = [];
    for (const item of val) {
        if (isOrdered(item)) {
            if (inline.length > 0) segments.push({ order: DEFAULT_ORDER, items: inline });
            inline = [];
            segments.push({ order: item.order, items: item.items });
        } else {
            inline.push(item);
        }
    }
    if (inline.length > 0 || segments.length === 0) {
        segments.push({ order: DEFAULT_ORDER, items: inline });
    }
    return segments;
}

export function orderedList(segments: Segment[]): OrderedList {
    return { __orderedList: true, segments };
}
