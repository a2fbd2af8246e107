// subgen/src/lib/render.ts
// Policy document → complete Clash/Mihomo config object, built from
// modules merged in registration order.

import { readFile } from 'node:fs/promises';
import { applyModules, cleanup, isPlainObject } from 'libmerge';
import type { Fragment } from 'libmerge';
import type { PolicyDocument } from './assemble.js';
import type { RenderContext, RenderModule } from '../modules/context.js';

import generalModule from '../modules/general.js';
import dnsModule from '../modules/dns.js';
import policyModule, { catchAllModule } from '../modules/policy.js';
import settingsModule from '../modules/settings.js';

// merge order = registration order; list positions come from mkBefore/mkAfter
export const RENDER_MODULES: RenderModule[] = [
    generalModule,   // listeners, controller (mkDefault)
    dnsModule,       // dns block (mkDefault)
    policyModule,    // proxies, proxy-groups (mkBefore), rules
    catchAllModule,  // MATCH (mkAfter)
    settingsModule,  // overrides (bare)
];

/** Keys owned by the policy document. */
export const RESERVED_KEYS: readonly string[] = ['proxies', 'proxy-groups', 'rules'];

export interface RenderOptions {
    ipv6Enabled?: boolean;
    dnsMode?: string;
    settings?: Record<string, unknown>;
}

export function renderConfig(policy: PolicyDocument, options: RenderOptions = {}): Fragment {
    const ctx: RenderContext = {
        policy,
        ipv6Enabled: options.ipv6Enabled ?? false,
        dnsMode: options.dnsMode ?? 'fake-ip',
        settings: options.settings ?? {},
    };
    return cleanup(applyModules(RENDER_MODULES, ctx));
}

/**
 * Validate parsed settings: a JSON object that sets none of the reserved
 * keys. `source` names the origin in error messages.
 */
export function checkSettings(value: unknown, source: string): Record<string, unknown> {
    if (!isPlainObject(value)) {
        throw new Error(`Settings must be a JSON object: ${source}`);
    }
    const reserved = RESERVED_KEYS.find(key => key in value);
    if (reserved !== undefined) {
        throw new Error(`Settings may not set "${reserved}": ${source}`);
    }
    return value;
}

/** Settings from a JSON file; an empty path means no overrides. */
export async function loadSettings(file: string): Promise<Record<string, unknown>> {
    if (!file) return {};
    const text = await readFile(file, 'utf8');
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`Settings file is not valid JSON: ${file} (${reason})`);
    }
    return checkSettings(value, file);
}
