// subgen/src/modules/policy.ts — nodes, groups and rules from the policy document

import { DEFAULT_ORDER, mkAfter, mkBefore, mkOrder } from 'libmerge';
import type { Fragment } from 'libmerge';
import { formatRule, isCatchAll } from '../lib/rules.js';
import type { RenderContext } from './context.js';

export default function policyModule(_prev: Fragment, ctx: RenderContext): Fragment {
    const { nodes, groups, rules } = ctx.policy;

    return {
        proxies: nodes,
        'proxy-groups': mkBefore(groups),
        rules: mkOrder(DEFAULT_ORDER, rules.filter(rule => !isCatchAll(rule)).map(formatRule)),
    };
}

/** The catch-all goes after every other rule, whichever module adds them. */
export function catchAllModule(_prev: Fragment, ctx: RenderContext): Fragment {
    return {
        rules: mkAfter(ctx.policy.rules.filter(isCatchAll).map(formatRule)),
    };
}
