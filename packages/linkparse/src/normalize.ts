// linkparse/src/normalize.ts
// Descriptor → flattened Clash/Mihomo proxy record, and pruning of empty
// values from such records.

import type { ClashProxy, ProxyDescriptor, TransportOverlay } from './types.js';

/** Plain object (literal or null-prototype), not an array or class instance. */
export function isRecord(value: unknown): value is Record<string, unknown> {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function isEmpty(value: unknown): boolean {
    if (value === null || value === undefined || value === '') return true;
    if (Array.isArray(value)) return value.length === 0;
    return isRecord(value) && Object.keys(value).length === 0;
}

function pruneValue(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(pruneValue).filter(item => !isEmpty(item));
    }
    if (isRecord(value)) return prune(value);
    return value;
}

/**
 * Depth-first removal of `null`, `undefined`, `''`, `[]` and `{}` from
 * maps and lists. A map emptied by pruning is removed from its parent.
 * `0` and `false` are kept. Idempotent.
 */
export function prune(record: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(record)) {
        const pruned = pruneValue(value);
        if (!isEmpty(pruned)) out[key] = pruned;
    }
    return out;
}

// ─── Flattening ─────────────────────────────────────────────────────

function transportFields(t: TransportOverlay): Record<string, unknown> {
    return {
        network: t.network,
        'ws-opts': t.network === 'ws'
            ? { path: t.wsPath, headers: { Host: t.wsHostHeader } }
            : undefined,
        'h2-opts': t.network === 'h2'
            ? { host: t.h2Hosts, path: t.h2Path }
            : undefined,
        'grpc-opts': t.network === 'grpc'
            ? { 'grpc-service-name': t.grpcServiceName }
            : undefined,
    };
}

function tlsFields(t: TransportOverlay): Record<string, unknown> {
    return {
        'skip-cert-verify': t.skipCertVerify,
        alpn: t.alpn,
        'client-fingerprint': t.fingerprint,
    };
}

/**
 * Flatten a descriptor into the record written under `proxies`. Empty
 * fields are still present; pass the result through `prune`.
 */
export function toClashProxy(d: ProxyDescriptor): ClashProxy {
    const base: ClashProxy = { name: d.name, type: d.scheme, server: d.server, port: d.port };

    switch (d.scheme) {
        case 'ss':
            return {
                ...base,
                cipher: d.cipher,
                password: d.password,
                plugin: d.plugin?.name,
                'plugin-opts': d.plugin?.options,
                udp: true,
            };
        case 'vmess':
            return {
                ...base,
                uuid: d.uuid,
                alterId: d.alterId,
                cipher: d.cipher,
                udp: true,
                tls: d.transport.tlsEnabled,
                servername: d.transport.serverName,
                ...transportFields(d.transport),
                ...tlsFields(d.transport),
            };
        case 'vless':
            return {
                ...base,
                uuid: d.uuid,
                flow: d.flow,
                udp: true,
                tls: d.transport.tlsEnabled,
                servername: d.transport.serverName,
                'reality-opts': d.reality
                    ? { 'public-key': d.reality.publicKey, 'short-id': d.reality.shortId }
                    : undefined,
                ...transportFields(d.transport),
                ...tlsFields(d.transport),
            };
        case 'trojan':
            return {
                ...base,
                password: d.password,
                udp: true,
                sni: d.transport.serverName,
                ...transportFields(d.transport),
                ...tlsFields(d.transport),
            };
        case 'hysteria2':
            return {
                ...base,
                password: d.password,
                obfs: d.obfs,
                'obfs-password': d.obfsPassword,
                sni: d.transport.serverName,
                ...tlsFields(d.transport),
            };
        case 'tuic':
            return {
                ...base,
                uuid: d.uuid,
                password: d.password,
                'congestion-controller': d.congestionController,
                'udp-relay-mode': d.udpRelayMode,
                sni: d.transport.serverName,
                ...tlsFields(d.transport),
            };
        case 'juicity':
            return {
                ...base,
                uuid: d.uuid,
                password: d.password,
                'congestion-control': d.congestionControl,
                sni: d.transport.serverName,
                ...tlsFields(d.transport),
            };
        case 'wireguard':
            return {
                ...base,
                'private-key': d.privateKey,
                'public-key': d.publicKey,
                'pre-shared-key': d.presharedKey,
                ip: d.ip,
                ipv6: d.ipv6,
                dns: d.dns,
                mtu: d.mtu,
                reserved: d.reserved,
                udp: true,
            };
    }
}

/** `toClashProxy` then `prune`, keeping the identity fields typed. */
export function normalizeProxy(d: ProxyDescriptor): ClashProxy {
    return { ...prune(toClashProxy(d)), name: d.name, type: d.scheme, server: d.server, port: d.port };
}
