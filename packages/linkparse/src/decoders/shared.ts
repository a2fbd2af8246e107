// linkparse/src/decoders/shared.ts
// Result constructors and the authority/query handling common to
// trojan-style links (trojan, vless, hysteria2, tuic, juicity).

import {
    parseHostPort, parseQuery, parsed, queryFlag, queryValue, rejected,
    safeDecodeURIComponent, splitFragment, splitList, splitQuery,
} from '../uri.js';
import type { Parsed, QueryParams } from '../uri.js';
import type {
    DecodeResult, LinkScheme, Network, ProxyDescriptor, TransportOverlay,
} from '../types.js';

export const SCHEME_LABELS: Record<LinkScheme, string> = {
    ss: 'SS',
    ssr: 'SSR',
    vmess: 'VMess',
    trojan: 'Trojan',
    vless: 'VLESS',
    hysteria2: 'Hysteria2',
    tuic: 'TUIC',
    juicity: 'Juicity',
    wireguard: 'WireGuard',
};

export function fallbackName(scheme: LinkScheme, server: string, port: number): string {
    return `${SCHEME_LABELS[scheme]}-${server}:${port}`;
}

export function decoded(proxy: ProxyDescriptor): DecodeResult {
    return { ok: true, proxy };
}

export function unparseable(scheme: LinkScheme, reason: string): DecodeResult {
    return { ok: false, error: { code: 'unparseable', scheme, reason } };
}

/** The text after `scheme://`, or null when the prefix is missing. */
export function stripScheme(raw: string, scheme: LinkScheme): string | null {
    const prefix = `${scheme}://`;
    return raw.slice(0, prefix.length).toLowerCase() === prefix ? raw.slice(prefix.length) : null;
}

// ─── credential@host:port?query#name ────────────────────────────────

export interface AuthorityLink {
    credential: string;
    server: string;
    port: number;
    params: QueryParams;
    name: string | null;
}

export function parseAuthorityLink(raw: string, scheme: LinkScheme): Parsed<AuthorityLink> {
    const rest = stripScheme(raw, scheme);
    if (rest === null) return rejected(`missing ${scheme}:// prefix`);

    const { body, fragment } = splitFragment(rest);
    const { path, query } = splitQuery(body);

    const at = path.indexOf('@');
    if (at === -1) return rejected('missing "@" between credential and host');

    const endpoint = parseHostPort(path.slice(at + 1));
    if (!endpoint) return rejected('invalid host:port');

    return parsed({
        credential: safeDecodeURIComponent(path.slice(0, at)),
        server: endpoint.server,
        port: endpoint.port,
        params: parseQuery(query),
        name: fragment,
    });
}

// ─── Query → transport ──────────────────────────────────────────────

const NETWORKS: ReadonlySet<string> = new Set<Network>(['tcp', 'ws', 'h2', 'grpc']);

function isNetwork(value: string): value is Network {
    return NETWORKS.has(value);
}

/** TLS settings. SNI falls back to the server address. */
export function tlsFromParams(params: QueryParams, server: string): TransportOverlay {
    const alpn = splitList(queryValue(params, 'alpn'));
    return {
        serverName: queryValue(params, 'sni', 'peer') ?? server,
        skipCertVerify: queryFlag(params, 'insecure', 'allowInsecure', 'allow_insecure'),
        alpn: alpn.length > 0 ? alpn : undefined,
        fingerprint: queryValue(params, 'fp'),
    };
}

/** Secondary transport from `type`, `path`, `host`, `serviceName`. */
export function networkFromParams(params: QueryParams): TransportOverlay {
    const type = (queryValue(params, 'type') ?? 'tcp').toLowerCase();
    const network: Network = type === 'http' ? 'h2' : isNetwork(type) ? type : 'tcp';
    const path = queryValue(params, 'path');
    const host = queryValue(params, 'host');

    switch (network) {
        case 'ws':
            return { network, wsPath: path, wsHostHeader: host };
        case 'h2':
            return { network, h2Hosts: splitList(host), h2Path: path };
        case 'grpc':
            return { network, grpcServiceName: queryValue(params, 'serviceName', 'service_name') ?? path };
        default:
            return { network };
    }
}
