// libmerge/src/priority.ts
// Precedence markers for scalar values.
//
//   mkForce   → 50
//   bare      → 100
//   mkDefault → 1000
//
// Lower number wins. Equal priorities with different values are a conflict.

import type { Override } from './types.js';

export const DEFAULT_PRIORITY = 100;
export const MKDEFAULT_PRIORITY = 1000;
export const MKFORCE_PRIORITY = 50;

export function mkOverride<T>(priority: number, value: T): Override<T> {
    return { __type: 'override', priority, value };
}

/** A value any bare value or `mkForce` replaces. */
export function mkDefault<T>(value: T): Override<T> {
    return mkOverride(MKDEFAULT_PRIORITY, value);
}

/** A value that replaces bare values and defaults. */
export function mkForce<T>(value: T): Override<T> {
    return mkOverride(MKFORCE_PRIORITY, value);
}

export function isOverride(val: unknown): val is Override {
    return typeof val === 'object' && val !== null && '__type' in val && val.__type === 'override';
}

export function getPriority(val: unknown): number {
    return isOverride(val) ? val.priority : DEFAULT_PRIORITY;
}

export function unwrapPriority(val: unknown): unknown {
    return isOverride(val) ? val.value : val;
}
