// subgen/src/modules/general.ts — listener, controller and mode defaults

import { mkDefault } from 'libmerge';
import type { Fragment } from 'libmerge';
import type { RenderContext } from './context.js';

export default function generalModule(_prev: Fragment, ctx: RenderContext): Fragment {
    return {
        port: mkDefault(7890),
        'socks-port': mkDefault(7891),
        'allow-lan': mkDefault(true),
        mode: mkDefault('rule'),
        'log-level': mkDefault('info'),
        'external-controller': mkDefault('0.0.0.0:9090'),
        ipv6: mkDefault(ctx.ipv6Enabled),
    };
}
