// linkparse/src/decoders/hysteria2.ts
// hysteria2://auth@host:port?sni=..&obfs=salamander&obfs-password=..#name

import { decoded, fallbackName, parseAuthorityLink, tlsFromParams, unparseable } from './shared.js';
import { queryValue } from '../uri.js';
import type { ProtocolDecoder } from '../types.js';

export const decodeHysteria2: ProtocolDecoder = (raw, scheme) => {
    const link = parseAuthorityLink(raw, scheme);
    if (!link.ok) return unparseable(scheme, link.reason);

    const { credential, server, port, params, name } = link.value;
    if (!credential) return unparseable(scheme, 'empty password');

    const obfs = queryValue(params, 'obfs');
    return decoded({
        scheme: 'hysteria2',
        name: name ?? fallbackName(scheme, server, port),
        server,
        port,
        password: credential,
        obfs: obfs === 'none' ? undefined : obfs,
        obfsPassword: queryValue(params, 'obfs-password', 'obfs_password'),
        transport: tlsFromParams(params, server),
    });
};
