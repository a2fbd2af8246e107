// subgen/src/lib/fetch.ts
// Sequential subscription download with an explicit delay between requests.

import { setTimeout as sleep } from 'node:timers/promises';
import axios from 'axios';

export const USER_AGENT = 'clash.meta';

export interface TextRequestConfig {
    timeout: number;
    headers: Record<string, string>;
    responseType: 'text';
    validateStatus: (status: number) => boolean;
}

export interface TextResponse {
    status: number;
    data: unknown;
}

/** The slice of an HTTP client the fetcher uses; axios satisfies it. */
export interface TextClient {
    get(url: string, config: TextRequestConfig): Promise<TextResponse>;
}

export type FetchResult =
    | { url: string; ok: true; content: string }
    | { url: string; ok: false; error: string };

export interface FetchOptions {
    client?: TextClient;
    timeoutMs?: number;
    /** Pause between consecutive requests. */
    delayMs?: number;
    sleep?: (ms: number) => Promise<unknown>;
}

export async function fetchText(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const client: TextClient = options.client ?? axios;
    try {
        const res = await client.get(url, {
            timeout: options.timeoutMs ?? 30000,
            headers: { 'User-Agent': USER_AGENT },
            responseType: 'text',
            validateStatus: () => true,
        });
        if (res.status < 200 || res.status >= 300) {
            return { url, ok: false, error: `HTTP ${res.status}` };
        }
        if (typeof res.data !== 'string') {
            return { url, ok: false, error: 'response body is not text' };
        }
        return { url, ok: true, content: res.data };
    } catch (err) {
        return { url, ok: false, error: err instanceof Error ? err.message : String(err) };
    }
}

/** Fetch `urls` one at a time, waiting `delayMs` between requests. */
export async function fetchAll(urls: readonly string[], options: FetchOptions = {}): Promise<FetchResult[]> {
    const wait = options.sleep ?? sleep;
    const delayMs = options.delayMs ?? 1000;
    const results: FetchResult[] = [];
    for (const [i, url] of urls.entries()) {
        if (i > 0 && delayMs > 0) await wait(delayMs);
        results.push(await fetchText(url, options));
    }
    return results;
}
