// linkparse/src/decoders/vless.ts
// vless://uuid@host:port?security=reality&pbk=..&sid=..&flow=..#name
// reality:// links are rewritten to vless:// by the registry.

import { decoded, fallbackName, networkFromParams, parseAuthorityLink, tlsFromParams, unparseable } from './shared.js';
import { queryValue } from '../uri.js';
import type { ProtocolDecoder } from '../types.js';

const TLS_SECURITIES = new Set(['tls', 'xtls', 'reality']);

export const decodeVless: ProtocolDecoder = (raw, scheme) => {
    const link = parseAuthorityLink(raw, scheme);
    if (!link.ok) return unparseable(scheme, link.reason);

    const { credential, server, port, params, name } = link.value;
    if (!credential) return unparseable(scheme, 'empty uuid');

    const security = (queryValue(params, 'security') ?? '').toLowerCase();

    return decoded({
        scheme: 'vless',
        name: name ?? fallbackName(scheme, server, port),
        server,
        port,
        uuid: credential,
        flow: queryValue(params, 'flow'),
        reality: security === 'reality'
            ? { publicKey: queryValue(params, 'pbk'), shortId: queryValue(params, 'sid') }
            : undefined,
        transport: {
            ...networkFromParams(params),
            ...tlsFromParams(params, server),
            tlsEnabled: TLS_SECURITIES.has(security),
        },
    });
};
