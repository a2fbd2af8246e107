// libmerge/src/resolve.ts
// Turn merged state into plain data: unwrap priorities, flatten ordered lists.

import { isOverride } from './priority.js';
import { isOrdered, isOrderedList } from './order.js';
import type { OrderedList } from './types.js';

export function resolve(val: unknown): unknown {
    if (isOverride(val)) return resolve(val.value);
    if (isOrderedList(val)) return flatten(val);
    if (isOrdered(val)) return resolve(val.items);

    if (typeof val !== 'object' || val === null) return val;
    if (val instanceof Date || val instanceof RegExp) return val;

    if (Array.isArray(val)) return val.map(item => resolve(item));

    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(val)) {
        out[key] = resolve(value);
    }
    return out;
}

/** Stable sort by order, then concatenate. */
function flatten(list: OrderedList): unknown[] {
    const sorted = [...list.segments].sort((a, b) => a.order - b.order);
    const items: unknown[] = [];
    for (const segment of sorted) {
        for (const item of segment.items) {
            items.push(resolve(item));
        }
    }
    return items;
}
