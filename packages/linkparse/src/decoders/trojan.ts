// linkparse/src/decoders/trojan.ts
// trojan://password@host:port?sni=..&type=ws&path=..#name

import { decoded, fallbackName, networkFromParams, parseAuthorityLink, tlsFromParams, unparseable } from './shared.js';
import type { ProtocolDecoder } from '../types.js';

export const decodeTrojan: ProtocolDecoder = (raw, scheme) => {
    const link = parseAuthorityLink(raw, scheme);
    if (!link.ok) return unparseable(scheme, link.reason);

    const { credential, server, port, params, name } = link.value;
    if (!credential) return unparseable(scheme, 'empty password');

    return decoded({
        scheme: 'trojan',
        name: name ?? fallbackName(scheme, server, port),
        server,
        port,
        password: credential,
        transport: {
            ...networkFromParams(params),
            ...tlsFromParams(params, server),
            tlsEnabled: true,
        },
    });
};
