// linkparse/src/decoders/vmess.ts
// vmess://BASE64({"add","port","id","aid","scy","net","tls","host","path","sni","ps"})

import { decodeBase64 } from '../base64.js';
import { parsePort, splitFragment, splitList } from '../uri.js';
import { isRecord } from '../normalize.js';
import { decoded, fallbackName, stripScheme, unparseable } from './shared.js';
import type { Network, ProtocolDecoder, TransportOverlay } from '../types.js';

/** Strings pass through, numbers are stringified, everything else is absent. */
function field(obj: Record<string, unknown>, key: string): string | undefined {
    const value = obj[key];
    if (typeof value === 'string') return value.trim() || undefined;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return undefined;
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

function transportFor(
    net: string, host: string | undefined, path: string | undefined,
): TransportOverlay {
    const network: Network = net === 'ws' || net === 'h2' || net === 'grpc' ? net : net === 'http' ? 'h2' : 'tcp';
    switch (network) {
        case 'ws':
            return { network, wsPath: path, wsHostHeader: host };
        case 'h2':
            return { network, h2Hosts: splitList(host), h2Path: path };
        case 'grpc':
            return { network, grpcServiceName: path };
        default:
            return { network };
    }
}

export const decodeVmess: ProtocolDecoder = (raw, scheme) => {
    const rest = stripScheme(raw, scheme);
    if (rest === null) return unparseable(scheme, `missing ${scheme}:// prefix`);

    const { body, fragment } = splitFragment(rest);
    const text = decodeBase64(body);
    if (text === null) return unparseable(scheme, 'payload is not base64');

    const obj = parseJson(text);
    if (!isRecord(obj)) return unparseable(scheme, 'payload is not a JSON object');

    const portText = field(obj, 'port') ?? '';
    const port = parsePort(portText);
    if (port === null) return unparseable(scheme, `invalid port "${portText}"`);

    const uuid = field(obj, 'id');
    if (!uuid) return unparseable(scheme, 'missing id');

    const server = field(obj, 'add') ?? '';
    const host = field(obj, 'host');
    const tlsFlag = obj.tls;
    const tlsEnabled = tlsFlag === true || (typeof tlsFlag === 'string' && tlsFlag.toLowerCase() === 'tls');
    const alterId = Number.parseInt(field(obj, 'aid') ?? '', 10);

    return decoded({
        scheme: 'vmess',
        name: field(obj, 'ps') ?? fragment ?? fallbackName(scheme, server, port),
        server,
        port,
        uuid,
        alterId: Number.isNaN(alterId) ? 0 : alterId,
        cipher: field(obj, 'scy') ?? 'auto',
        transport: {
            ...transportFor((field(obj, 'net') ?? 'tcp').toLowerCase(), host, field(obj, 'path')),
            tlsEnabled,
            serverName: field(obj, 'sni') ?? (tlsEnabled ? host : undefined),
        },
    });
};
