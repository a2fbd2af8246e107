// libmerge/src/modules.ts
// Run modules in registration order and produce a plain config object.

import { moduleMerge, isPlainObject } from './merge.js';
import { resolve } from './resolve.js';
import type { ConfigModule, Fragment } from './types.js';

/**
 * Merge every module's fragment in order, then resolve markers.
 * Each module sees the state merged before it as `prev`.
 */
export function applyModules<Ctx>(modules: Array<ConfigModule<Ctx>>, ctx: Ctx): Fragment {
    let state: Fragment = {};
    for (const mod of modules) {
        state = moduleMerge(state, mod(state, ctx));
    }
    const resolved = resolve(state);
    return isPlainObject(resolved) ? resolved : {};
}

/** Drop undefined values and empty objects from the top level. */
export function cleanup(config: Fragment): Fragment {
    const result: Fragment = {};
    for (const [key, value] of Object.entries(config)) {
        if (value === undefined) continue;
        if (isPlainObject(value) && Object.keys(value).length === 0) continue;
        result[key] = value;
    }
    return result;
}
