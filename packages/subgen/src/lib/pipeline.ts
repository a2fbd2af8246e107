// subgen/src/lib/pipeline.ts
// Subscription text → descriptors → policy document. Logging happens here;
// the decoding core reports failures as values.

import { decodeBase64, decodeLine, dedupe } from 'linkparse';
import type { DecodeError, ProxyDescriptor } from 'linkparse';
import { assemble } from './assemble.js';
import type { PolicyDocument } from './assemble.js';
import type { RuleEntry } from './rules.js';
import type { Logger } from './logger.js';

export interface DecodeOptions {
    maxBundleDepth?: number;
    logger?: Logger;
}

export interface DecodedSubscription {
    proxies: ProxyDescriptor[];
    failures: DecodeError[];
}

/** Trimmed lines without blanks and `#` comments. */
export function contentLines(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line !== '' && !line.startsWith('#'));
}

/**
 * A body without any `://` that decodes to text containing one is a
 * whole-body base64 subscription; return the decoded text.
 */
export function unwrapSubscription(content: string): string {
    if (content.includes('://')) return content;
    const decoded = decodeBase64(content.replace(/\s+/g, ''));
    return decoded !== null && decoded.includes('://') ? decoded : content;
}

function logProjection(logger: Logger | undefined, proxy: ProxyDescriptor): void {
    if (!logger || proxy.scheme !== 'ss' || !proxy.projection) return;
    logger.debug(
        { name: proxy.name, server: proxy.server, port: proxy.port, dropped: proxy.projection },
        'ssr node emitted as ss; protocol and obfs settings dropped',
    );
}

/** Decode every line of a subscription, keeping line order. */
export function decodeSubscription(content: string, options: DecodeOptions = {}): DecodedSubscription {
    const { logger, maxBundleDepth } = options;
    const proxies: ProxyDescriptor[] = [];
    const failures: DecodeError[] = [];

    const reject = (line: string, error: DecodeError): void => {
        failures.push(error);
        logger?.debug({ line: line.slice(0, 80), code: error.code, reason: error.reason }, 'line rejected');
    };

    for (const line of contentLines(unwrapSubscription(content))) {
        const result = decodeLine(line, { maxBundleDepth });
        switch (result.kind) {
            case 'proxy':
                proxies.push(result.proxy);
                break;
            case 'bundle':
                proxies.push(...result.proxies);
                for (const error of result.failures) reject(line, error);
                break;
            case 'unparseable':
                reject(line, result.error);
                break;
        }
    }

    for (const proxy of proxies) logProjection(logger, proxy);
    return { proxies, failures };
}

export interface PolicyOptions {
    maxNodes?: number;
    dedupeByName?: boolean;
}

export function buildPolicy(
    descriptors: readonly ProxyDescriptor[],
    rules: readonly RuleEntry[],
    options: PolicyOptions = {},
): PolicyDocument {
    const unique = dedupe(descriptors, { includeName: options.dedupeByName ?? false });
    return assemble(unique, rules, { maxNodes: options.maxNodes });
}
