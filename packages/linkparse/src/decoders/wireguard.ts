// linkparse/src/decoders/wireguard.ts
// wireguard://host:port?private_key=..&public_key=..&address=10.0.0.2/32,fd00::2/128&dns=..&mtu=1420#name
// Any userinfo before `@` is ignored; keys come only from the query.

import {
    parseHostPort, parseQuery, queryValue, splitFragment, splitList, splitQuery,
} from '../uri.js';
import { decoded, fallbackName, stripScheme, unparseable } from './shared.js';
import type { ProtocolDecoder } from '../types.js';

function stripAddress(entry: string): string {
    const bare = entry.replace(/\/\d+$/, '');
    return bare.startsWith('[') && bare.endsWith(']') ? bare.slice(1, -1) : bare;
}

function parseMtu(text: string | undefined): number | undefined {
    if (!text || !/^\d+$/.test(text)) return undefined;
    const mtu = Number(text);
    return mtu > 0 ? mtu : undefined;
}

/** `reserved=1,2,3`: exactly three byte values. */
function parseReserved(text: string | undefined): number[] | undefined {
    const parts = splitList(text);
    if (parts.length !== 3 || !parts.every(p => /^\d{1,3}$/.test(p))) return undefined;
    const bytes = parts.map(Number);
    return bytes.every(b => b <= 255) ? bytes : undefined;
}

export const decodeWireguard: ProtocolDecoder = (raw, scheme) => {
    const rest = stripScheme(raw, scheme);
    if (rest === null) return unparseable(scheme, `missing ${scheme}:// prefix`);

    const { body, fragment } = splitFragment(rest);
    const { path, query } = splitQuery(body);
    const endpoint = parseHostPort(path.slice(path.lastIndexOf('@') + 1));
    if (!endpoint) return unparseable(scheme, 'invalid host:port');

    const params = parseQuery(query);
    const privateKey = queryValue(params, 'private_key', 'privatekey');
    const publicKey = queryValue(params, 'public_key', 'publickey');
    if (!privateKey) return unparseable(scheme, 'missing private_key');
    if (!publicKey) return unparseable(scheme, 'missing public_key');

    const addresses = splitList(queryValue(params, 'address', 'ip')).map(stripAddress);
    const { server, port } = endpoint;

    return decoded({
        scheme: 'wireguard',
        name: fragment ?? fallbackName(scheme, server, port),
        server,
        port,
        privateKey,
        publicKey,
        presharedKey: queryValue(params, 'preshared_key', 'presharedkey'),
        ip: addresses.find(a => !a.includes(':')),
        ipv6: addresses.find(a => a.includes(':')),
        dns: splitList(queryValue(params, 'dns')),
        mtu: parseMtu(queryValue(params, 'mtu')),
        reserved: parseReserved(queryValue(params, 'reserved')),
    });
};
