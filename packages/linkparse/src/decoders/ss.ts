// linkparse/src/decoders/ss.ts
// Shadowsocks links in three shapes, tried in order:
//   ss://method:password@host:port#name           (plain userinfo)
//   ss://BASE64(method:password)@host:port#name   (SIP002)
//   ss://BASE64(method:password@host:port)#name   (legacy whole-body)
// plus the flat `host:port:method:password` body some generators emit.

import { decodeBase64 } from '../base64.js';
import {
    parseHostPort, parsePort, parseQuery, queryValue, safeDecodeURIComponent,
    splitFragment, splitQuery,
} from '../uri.js';
import { decoded, fallbackName, stripScheme, unparseable } from './shared.js';
import type { ProtocolDecoder, SsPlugin } from '../types.js';

interface Credential {
    cipher: string;
    password: string;
}

interface Located extends Credential {
    server: string;
    port: number;
}

/** `method:password`, split at the first colon; both parts required. */
function splitMethod(text: string): Credential | null {
    const colon = text.indexOf(':');
    if (colon <= 0) return null;
    const password = text.slice(colon + 1);
    if (!password) return null;
    return { cipher: text.slice(0, colon), password };
}

function fromUserinfo(userinfo: string, hostPort: string): Located | null {
    const endpoint = parseHostPort(hostPort);
    if (!endpoint) return null;

    const plain = safeDecodeURIComponent(userinfo);
    const credential = splitMethod(plain) ?? splitMethod(decodeBase64(plain) ?? '');
    return credential ? { ...credential, ...endpoint } : null;
}

/** `method:password@host:port` or `host:port:method:password`. */
function fromWholeBody(text: string): Located | null {
    const at = text.lastIndexOf('@');
    if (at !== -1) {
        const endpoint = parseHostPort(text.slice(at + 1));
        const credential = splitMethod(text.slice(0, at));
        return endpoint && credential ? { ...credential, ...endpoint } : null;
    }

    const fields = text.split(':');
    if (fields.length < 4) return null;
    const port = parsePort(fields[1]);
    const credential = splitMethod(fields.slice(2).join(':'));
    return port !== null && credential ? { ...credential, server: fields[0], port } : null;
}

// ─── Plugin ─────────────────────────────────────────────────────────

const OBFS_PLUGINS = new Set(['obfs-local', 'simple-obfs', 'obfs']);

/**
 * `plugin=obfs-local;obfs=http;obfs-host=example.com`. Bare options such as
 * `tls` become `true`.
 */
export function parsePlugin(value: string | undefined): SsPlugin | undefined {
    if (!value) return undefined;
    const [name, ...parts] = value.split(';');
    if (!name) return undefined;

    const raw: Record<string, string | boolean> = {};
    for (const part of parts) {
        if (!part) continue;
        const eq = part.indexOf('=');
        if (eq === -1) raw[part] = true;
        else raw[part.slice(0, eq)] = part.slice(eq + 1);
    }

    if (OBFS_PLUGINS.has(name)) {
        const options: Record<string, string | boolean> = {};
        if (raw.obfs !== undefined) options.mode = raw.obfs;
        if (raw['obfs-host'] !== undefined) options.host = raw['obfs-host'];
        return { name: 'obfs', options };
    }
    return { name, options: raw };
}

// ─── Decoder ────────────────────────────────────────────────────────

export const decodeSs: ProtocolDecoder = (raw, scheme) => {
    const rest = stripScheme(raw, scheme);
    if (rest === null) return unparseable(scheme, `missing ${scheme}:// prefix`);

    const { body, fragment } = splitFragment(rest);
    const { path, query } = splitQuery(body);
    const main = path.endsWith('/') ? path.slice(0, -1) : path;

    let located: Located | null = null;
    const at = main.lastIndexOf('@');
    if (at !== -1) located = fromUserinfo(main.slice(0, at), main.slice(at + 1));
    if (!located) {
        const candidates = [decodeBase64(main), main];
        for (const candidate of candidates) {
            if (candidate === null) continue;
            located = fromWholeBody(candidate.trim());
            if (located) break;
        }
    }
    if (!located) return unparseable(scheme, 'no method:password and host:port found');

    const { cipher, password, server, port } = located;
    return decoded({
        scheme: 'ss',
        name: fragment ?? fallbackName(scheme, server, port),
        server,
        port,
        cipher,
        password,
        plugin: parsePlugin(queryValue(parseQuery(query), 'plugin')),
    });
};
