// libmerge/src/merge.ts
// Fragment merge strategy, decided per key by the kind of value:
//
//   list    segments accumulate; resolve() sorts them by order
//   object  recursive merge; the lower-priority side fills in defaults
//   scalar  lowest priority number wins; a tie must agree

import { DEFAULT_PRIORITY, isOverride, getPriority, unwrapPriority, mkOverride } from './priority.js';
import { isOrdered, isOrderedList, isArrayLike, toSegments, orderedList } from './order.js';
import type { Fragment, MergeFn } from './types.js';

export function isPlainObject(val: unknown): val is Record<string, unknown> {
    if (typeof val !== 'object' || val === null || Array.isArray(val)) return false;
    if (val instanceof Date || val instanceof RegExp) return false;
    return !isOverride(val) && !isOrdered(val) && !isOrderedList(val);
}

/**
 * `top` over `base`, recursing into shared objects. Shared arrays
 * concatenate unless `replaceArrays` is set.
 */
function overlay(
    base: Record<string, unknown>,
    top: Record<string, unknown>,
    replaceArrays: boolean,
): Record<string, unknown> {
    const out: Record<string, unknown> = { ...base };
    for (const [key, next] of Object.entries(top)) {
        const prev = out[key];
        if (isPlainObject(prev) && isPlainObject(next)) {
            out[key] = overlay(prev, next, replaceArrays);
        } else if (!replaceArrays && Array.isArray(prev) && Array.isArray(next)) {
            out[key] = prev.concat(next);
        } else {
            out[key] = next;
        }
    }
    return out;
}

// ─── Per-kind strategies ────────────────────────────────────────────

function mergeLists(key: string, current: unknown, incoming: unknown): unknown {
    if (!isArrayLike(current) || !isArrayLike(incoming)) {
        throw new Error(`Type mismatch for "${key}": cannot merge array with non-array`);
    }
    return orderedList(toSegments(current).concat(toSegments(incoming)));
}

function mergeObjects(
    current: unknown,
    currentValue: Record<string, unknown>,
    incoming: unknown,
    incomingValue: Record<string, unknown>,
): unknown {
    const curPri = getPriority(current);
    const incPri = getPriority(incoming);
    // nested lists only concatenate between equal priorities
    const replaceArrays = curPri !== incPri;
    const merged = incPri <= curPri
        ? overlay(currentValue, incomingValue, replaceArrays)
        : overlay(incomingValue, currentValue, replaceArrays);
    const winner = Math.min(curPri, incPri);
    return winner === DEFAULT_PRIORITY ? merged : mkOverride(winner, merged);
}

function mergeScalars(key: string, current: unknown, incoming: unknown): unknown {
    const curPri = getPriority(current);
    const incPri = getPriority(incoming);
    if (curPri !== incPri) return incPri < curPri ? incoming : current;

    const a = unwrapPriority(current);
    const b = unwrapPriority(incoming);
    if (a === b) return current;
    throw new Error(
        `Scalar conflict for key "${key}": values ${JSON.stringify(a)} vs ${JSON.stringify(b)} ` +
        `at priority ${curPri}.`,
    );
}

// ─── Merge function ─────────────────────────────────────────────────

function mergeKey(key: string, current: unknown, incoming: unknown): unknown {
    if (current === undefined) {
        return isArrayLike(incoming) ? orderedList(toSegments(incoming)) : incoming;
    }
    if (isArrayLike(current) || isArrayLike(incoming)) {
        return mergeLists(key, current, incoming);
    }

    const currentValue = unwrapPriority(current);
    const incomingValue = unwrapPriority(incoming);
    if (!isPlainObject(currentValue) || !isPlainObject(incomingValue)) {
        return mergeScalars(key, current, incoming);
    }
    return mergeObjects(current, currentValue, incoming, incomingValue);
}

/** Merge one fragment into the accumulated state. */
export const moduleMerge: MergeFn = (current, extension) => {
    const result: Fragment = { ...current };
    for (const [key, incoming] of Object.entries(extension)) {
        if (incoming === undefined) continue;
        result[key] = mergeKey(key, result[key], incoming);
    }
    return result;
};
