// linkparse/src/decoders/ssr.ts
// ssr://BASE64(server:port:protocol:method:obfs:BASE64(password)/?remarks=..&group=..)
//
// Decodes onto the ss shape. Protocol, obfs and their parameters have no
// ss equivalent; they are kept on `projection` and never emitted.

import { decodeBase64 } from '../base64.js';
import { parsePort, splitFragment } from '../uri.js';
import { decoded, fallbackName, stripScheme, unparseable } from './shared.js';
import type { ProtocolDecoder, SsrProjection } from '../types.js';

const POSITIONAL_FIELDS = 6;

/** `key=BASE64` pairs; values that fail to decode are dropped. */
function parseSsrQuery(query: string): Map<string, string> {
    const params = new Map<string, string>();
    for (const pair of query.split('&')) {
        const eq = pair.indexOf('=');
        if (eq <= 0) continue;
        const value = decodeBase64(pair.slice(eq + 1));
        if (value) params.set(pair.slice(0, eq), value);
    }
    return params;
}

export const decodeSsr: ProtocolDecoder = (raw, scheme) => {
    const rest = stripScheme(raw, scheme);
    if (rest === null) return unparseable(scheme, `missing ${scheme}:// prefix`);

    const { body, fragment } = splitFragment(rest);
    const payload = decodeBase64(body);
    if (payload === null) return unparseable(scheme, 'payload is not base64');

    const split = payload.indexOf('/?');
    let positional = split === -1 ? payload : payload.slice(0, split);
    const query = split === -1 ? '' : payload.slice(split + 2);
    if (positional.endsWith('/')) positional = positional.slice(0, -1);

    // server may itself contain colons (IPv6), so read from the right
    const fields = positional.split(':');
    if (fields.length < POSITIONAL_FIELDS) {
        return unparseable(scheme, `expected ${POSITIONAL_FIELDS} positional fields, got ${fields.length}`);
    }
    const [portText, protocol, cipher, obfs, encodedPassword] = fields.slice(-5);
    const server = fields.slice(0, -5).join(':');

    const port = parsePort(portText);
    if (port === null) return unparseable(scheme, `invalid port "${portText}"`);
    if (!cipher) return unparseable(scheme, 'empty method');
    const password = decodeBase64(encodedPassword);
    if (password === null) return unparseable(scheme, 'password is not base64');

    const params = parseSsrQuery(query);
    const projection: SsrProjection = {
        from: 'ssr',
        protocol,
        obfs,
        protocolParam: params.get('protoparam'),
        obfsParam: params.get('obfsparam'),
        group: params.get('group'),
    };

    return decoded({
        scheme: 'ss',
        name: params.get('remarks')?.trim() || fragment || fallbackName(scheme, server, port),
        server,
        port,
        cipher,
        password,
        projection,
    });
};
