// linkparse/src/index.ts — public API

export type {
    LinkScheme, ProxyScheme, Endpoint, Network, TransportOverlay,
    SsPlugin, SsrProjection, RealityOptions,
    SsDescriptor, VmessDescriptor, VlessDescriptor, TrojanDescriptor,
    Hysteria2Descriptor, TuicDescriptor, JuicityDescriptor, WireguardDescriptor,
    ProxyDescriptor, DecodeErrorCode, DecodeError, DecodeResult,
    ProtocolDecoder, LineResult, ClashProxy,
} from './types.js';

export { decodeBase64, encodeBase64, repairPadding } from './base64.js';

export {
    DECODERS, SCHEME_ALIASES, DEFAULT_MAX_BUNDLE_DEPTH,
    decodeLink, decodeLine,
} from './registry.js';
export type { DecodeLineOptions } from './registry.js';

export { isRecord, prune, toClashProxy, normalizeProxy } from './normalize.js';

export { dedupe, identityKey, isValidDescriptor } from './dedupe.js';
export type { DedupeOptions } from './dedupe.js';

export { SCHEME_LABELS } from './decoders/shared.js';
