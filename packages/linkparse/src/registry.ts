// linkparse/src/registry.ts
// Static scheme → decoder table and the per-line entry point.

import { decodeBase64 } from './base64.js';
import { decodeHysteria2 } from './decoders/hysteria2.js';
import { decodeSs } from './decoders/ss.js';
import { decodeSsr } from './decoders/ssr.js';
import { decodeTrojan } from './decoders/trojan.js';
import { decodeJuicity, decodeTuic } from './decoders/tuic.js';
import { decodeVless } from './decoders/vless.js';
import { decodeVmess } from './decoders/vmess.js';
import { decodeWireguard } from './decoders/wireguard.js';
import type {
    DecodeError, DecodeResult, LineResult, LinkScheme, ProtocolDecoder, ProxyDescriptor,
} from './types.js';

export const DECODERS: Record<LinkScheme, ProtocolDecoder> = {
    ss: decodeSs,
    ssr: decodeSsr,
    vmess: decodeVmess,
    trojan: decodeTrojan,
    vless: decodeVless,
    hysteria2: decodeHysteria2,
    tuic: decodeTuic,
    juicity: decodeJuicity,
    wireguard: decodeWireguard,
};

/** Alternative prefixes, rewritten before dispatch. */
export const SCHEME_ALIASES: Readonly<Record<string, LinkScheme>> = {
    reality: 'vless',
    wg: 'wireguard',
    hy2: 'hysteria2',
};

export const DEFAULT_MAX_BUNDLE_DEPTH = 2;

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i;
const BUNDLE_PATTERN = /^[A-Za-z0-9+/=_-]+$/;
const MIN_BUNDLE_LENGTH = 16;

function isLinkScheme(name: string): name is LinkScheme {
    return Object.hasOwn(DECODERS, name);
}

/**
 * Decode a single `scheme://` link. Aliases are rewritten first; unknown
 * schemes are reported as `unsupported-scheme`. A decoder that throws is
 * reported as `unparseable`.
 */
export function decodeLink(raw: string): DecodeResult {
    const link = raw.trim();
    const match = SCHEME_PATTERN.exec(link);
    if (!match) {
        return { ok: false, error: { code: 'unparseable', reason: 'not a link' } };
    }

    const written = match[1].toLowerCase();
    const scheme = SCHEME_ALIASES[written] ?? written;
    if (!isLinkScheme(scheme)) {
        return {
            ok: false,
            error: { code: 'unsupported-scheme', scheme: written, reason: `no decoder for ${written}://` },
        };
    }

    const rewritten = `${scheme}://${link.slice(match[0].length)}`;
    try {
        return DECODERS[scheme](rewritten, scheme);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        return { ok: false, error: { code: 'unparseable', scheme: written, reason } };
    }
}

export interface DecodeLineOptions {
    /** Nesting limit for base64 bundles. 0 disables bundle decoding. */
    maxBundleDepth?: number;
}

function isBundleCandidate(line: string): boolean {
    return line.length >= MIN_BUNDLE_LENGTH && BUNDLE_PATTERN.test(line);
}

/** Lines of a decoded bundle that look like links or nested bundles. */
function bundleLines(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => !line.startsWith('#') && (line.includes('://') || isBundleCandidate(line)));
}

function decodeAt(line: string, depth: number, maxDepth: number): LineResult {
    const text = line.trim();
    if (SCHEME_PATTERN.test(text)) {
        const result = decodeLink(text);
        return result.ok
            ? { kind: 'proxy', proxy: result.proxy }
            : { kind: 'unparseable', error: result.error };
    }

    if (!isBundleCandidate(text)) {
        return { kind: 'unparseable', error: { code: 'unparseable', reason: 'not a link' } };
    }
    if (depth >= maxDepth) {
        return { kind: 'unparseable', error: { code: 'unparseable', reason: 'bundle nesting limit reached' } };
    }

    const decoded = decodeBase64(text);
    const lines = decoded === null ? [] : bundleLines(decoded);
    if (lines.length === 0) {
        return { kind: 'unparseable', error: { code: 'unparseable', reason: 'base64 bundle holds no links' } };
    }

    const proxies: ProxyDescriptor[] = [];
    const failures: DecodeError[] = [];
    for (const inner of lines) {
        const result = decodeAt(inner, depth + 1, maxDepth);
        switch (result.kind) {
            case 'proxy':
                proxies.push(result.proxy);
                break;
            case 'bundle':
                proxies.push(...result.proxies);
                failures.push(...result.failures);
                break;
            case 'unparseable':
                failures.push(result.error);
                break;
        }
    }
    return { kind: 'bundle', proxies, failures };
}

/**
 * Decode one input line: a single link, or a base64 bundle of links that
 * is decoded recursively up to `maxBundleDepth` levels.
 */
export function decodeLine(line: string, options: DecodeLineOptions = {}): LineResult {
    return decodeAt(line, 0, options.maxBundleDepth ?? DEFAULT_MAX_BUNDLE_DEPTH);
}
