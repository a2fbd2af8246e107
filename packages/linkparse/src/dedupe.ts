// linkparse/src/dedupe.ts

import type { ProxyDescriptor } from './types.js';

export interface DedupeOptions {
    /** Fold the display name into the identity key. */
    includeName?: boolean;
}

/** Non-blank server and an integer port in 1–65535. */
export function isValidDescriptor(d: ProxyDescriptor): boolean {
    return d.server.trim() !== '' && Number.isInteger(d.port) && d.port > 0 && d.port <= 65535;
}

export function identityKey(d: ProxyDescriptor, options: DedupeOptions = {}): string {
    const key = `${d.server.trim().toLowerCase()}:${d.port}:${d.scheme}`;
    return options.includeName ? `${key}:${d.name}` : key;
}

/**
 * Drop invalid descriptors, then keep the first descriptor seen for each
 * `server:port:scheme` key. Order-preserving and idempotent.
 */
export function dedupe(descriptors: readonly ProxyDescriptor[], options: DedupeOptions = {}): ProxyDescriptor[] {
    const seen = new Set<string>();
    const out: ProxyDescriptor[] = [];
    for (const d of descriptors) {
        if (!isValidDescriptor(d)) continue;
        const key = identityKey(d, options);
        if (seen.has(key)) continue;
        seen.add(key);
        out.push(d);
    }
    return out;
}
