// subgen/src/modules/dns.ts — DNS defaults

import { mkDefault } from 'libmerge';
import type { Fragment } from 'libmerge';
import type { RenderContext } from './context.js';

export default function dnsModule(_prev: Fragment, ctx: RenderContext): Fragment {
    const { ipv6Enabled, dnsMode } = ctx;

    if (dnsMode !== 'fake-ip' && dnsMode !== 'redir-host') {
        throw new Error('Invalid dnsMode: ' + dnsMode);
    }

    return {
        dns: mkDefault({
            enable: true,
            ipv6: ipv6Enabled,
            listen: '0.0.0.0:53',
            'default-nameserver': ['223.5.5.5', '8.8.8.8'],
            'enhanced-mode': dnsMode,
            ...(dnsMode === 'fake-ip' ? { 'fake-ip-range': '198.18.0.1/16' } : {}),
            nameserver: [
                'https://doh.pub/dns-query',
                'https://dns.alidns.com/dns-query',
            ],
        }),
    };
}
