// linkparse/src/types.ts
// Normalized proxy descriptors and decoder results.

// ─── Schemes ────────────────────────────────────────────────────────

/** Link schemes that have a decoder. Aliases (reality, wg, hy2) are rewritten first. */
export type LinkScheme =
    | 'ss'
    | 'ssr'
    | 'vmess'
    | 'trojan'
    | 'vless'
    | 'hysteria2'
    | 'tuic'
    | 'juicity'
    | 'wireguard';

/** Descriptor kinds. SSR links decode to `ss` (see `SsrProjection`). */
export type ProxyScheme = Exclude<LinkScheme, 'ssr'>;

// ─── Descriptor parts ───────────────────────────────────────────────

/** Fields every descriptor carries. */
export interface Endpoint {
    name: string;
    server: string;
    port: number;
}

export type Network = 'tcp' | 'ws' | 'h2' | 'grpc';

/**
 * Secondary transport and TLS settings. Only the fields relevant to the
 * selected `network` are set.
 */
export interface TransportOverlay {
    network?: Network;
    tlsEnabled?: boolean;
    skipCertVerify?: boolean;
    serverName?: string;
    alpn?: string[];
    fingerprint?: string;
    wsPath?: string;
    wsHostHeader?: string;
    h2Hosts?: string[];
    h2Path?: string;
    grpcServiceName?: string;
}

export interface SsPlugin {
    name: string;
    options: Record<string, string | boolean>;
}

/**
 * What an SSR link carried that the ss shape cannot express. Kept on the
 * descriptor so callers can report it; never emitted into the config.
 */
export interface SsrProjection {
    from: 'ssr';
    protocol: string;
    obfs: string;
    protocolParam?: string;
    obfsParam?: string;
    group?: string;
}

export interface RealityOptions {
    publicKey?: string;
    shortId?: string;
}

// ─── Descriptors ────────────────────────────────────────────────────

export interface SsDescriptor extends Endpoint {
    scheme: 'ss';
    cipher: string;
    password: string;
    plugin?: SsPlugin;
    projection?: SsrProjection;
}

export interface VmessDescriptor extends Endpoint {
    scheme: 'vmess';
    uuid: string;
    alterId: number;
    cipher: string;
    transport: TransportOverlay;
}

export interface VlessDescriptor extends Endpoint {
    scheme: 'vless';
    uuid: string;
    flow?: string;
    reality?: RealityOptions;
    transport: TransportOverlay;
}

export interface TrojanDescriptor extends Endpoint {
    scheme: 'trojan';
    password: string;
    transport: TransportOverlay;
}

export interface Hysteria2Descriptor extends Endpoint {
    scheme: 'hysteria2';
    password: string;
    obfs?: string;
    obfsPassword?: string;
    transport: TransportOverlay;
}

export interface TuicDescriptor extends Endpoint {
    scheme: 'tuic';
    uuid: string;
    password: string;
    congestionController?: string;
    udpRelayMode?: string;
    transport: TransportOverlay;
}

export interface JuicityDescriptor extends Endpoint {
    scheme: 'juicity';
    uuid: string;
    password: string;
    congestionControl?: string;
    transport: TransportOverlay;
}

export interface WireguardDescriptor extends Endpoint {
    scheme: 'wireguard';
    privateKey: string;
    publicKey: string;
    presharedKey?: string;
    ip?: string;
    ipv6?: string;
    dns: string[];
    mtu?: number;
    reserved?: number[];
}

export type ProxyDescriptor =
    | SsDescriptor
    | VmessDescriptor
    | VlessDescriptor
    | TrojanDescriptor
    | Hysteria2Descriptor
    | TuicDescriptor
    | JuicityDescriptor
    | WireguardDescriptor;

// ─── Results ────────────────────────────────────────────────────────

export type DecodeErrorCode = 'unparseable' | 'unsupported-scheme';

export interface DecodeError {
    code: DecodeErrorCode;
    /** Scheme as written in the link, when one was recognised. */
    scheme?: string;
    reason: string;
}

export type DecodeResult =
    | { ok: true; proxy: ProxyDescriptor }
    | { ok: false; error: DecodeError };

/**
 * Pure decoder for one scheme. Must never throw; every failure is
 * reported as `{ ok: false }`.
 */
export type ProtocolDecoder = (raw: string, scheme: LinkScheme) => DecodeResult;

/** Outcome of decoding one input line. */
export type LineResult =
    | { kind: 'proxy'; proxy: ProxyDescriptor }
    | { kind: 'bundle'; proxies: ProxyDescriptor[]; failures: DecodeError[] }
    | { kind: 'unparseable'; error: DecodeError };

/** Flattened node as written under `proxies` in a Clash/Mihomo config. */
export interface ClashProxy {
    name: string;
    type: string;
    server: string;
    port: number;
    [key: string]: unknown;
}
