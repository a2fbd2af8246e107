// tests/fetch.test.ts — Sequential fetching with an injected client
import { describe, it, expect, vi } from 'vitest';
import { fetchAll, fetchText } from '../src/lib/fetch.js';
import type { TextClient } from '../src/lib/fetch.js';

function clientOf(handler: (url: string) => Promise<{ status: number; data: unknown }>) {
    const get = vi.fn(handler);
    const client: TextClient = { get };
    return { client, get };
}

describe('fetchText', () => {
    it('returns the body of a 2xx response', async () => {
        const { client, get } = clientOf(async url => ({ status: 200, data: `body of ${url}` }));
        await expect(fetchText('https://sub.example/a', { client, timeoutMs: 1234 })).resolves.toEqual({
            url: 'https://sub.example/a',
            ok: true,
            content: 'body of https://sub.example/a',
        });
        expect(get).toHaveBeenCalledWith('https://sub.example/a', expect.objectContaining({
            timeout: 1234,
            headers: { 'User-Agent': 'clash.meta' },
            responseType: 'text',
        }));
    });

    it('reports non-2xx statuses', async () => {
        const { client } = clientOf(async () => ({ status: 404, data: 'not found' }));
        await expect(fetchText('https://sub.example/x', { client })).resolves.toEqual({
            url: 'https://sub.example/x',
            ok: false,
            error: 'HTTP 404',
        });
    });

    it('reports non-text bodies', async () => {
        const { client } = clientOf(async () => ({ status: 200, data: { proxies: [] } }));
        const result = await fetchText('https://sub.example/j', { client });
        expect(result).toEqual({ url: 'https://sub.example/j', ok: false, error: 'response body is not text' });
    });

    it('turns client errors into results', async () => {
        const { client } = clientOf(async () => {
            throw new Error('timeout of 30000ms exceeded');
        });
        const result = await fetchText('https://sub.example/t', { client });
        expect(result).toEqual({ url: 'https://sub.example/t', ok: false, error: 'timeout of 30000ms exceeded' });
    });
});

describe('fetchAll', () => {
    it('fetches in order and waits between requests', async () => {
        const { client, get } = clientOf(async url => ({ status: 200, data: url }));
        const sleep = vi.fn(async () => undefined);

        const results = await fetchAll(['u1', 'u2', 'u3'], { client, sleep, delayMs: 5 });

        expect(results.map(r => r.ok && r.content)).toEqual(['u1', 'u2', 'u3']);
        expect(get.mock.calls.map(call => call[0])).toEqual(['u1', 'u2', 'u3']);
        expect(sleep).toHaveBeenCalledTimes(2);
        expect(sleep).toHaveBeenCalledWith(5);
    });

    it('does not wait when the delay is zero', async () => {
        const { client } = clientOf(async () => ({ status: 200, data: '' }));
        const sleep = vi.fn(async () => undefined);
        await fetchAll(['u1', 'u2'], { client, sleep, delayMs: 0 });
        expect(sleep).not.toHaveBeenCalled();
    });

    it('keeps going after a failure', async () => {
        const { client } = clientOf(async url => ({ status: url === 'bad' ? 500 : 200, data: 'ok' }));
        const results = await fetchAll(['bad', 'good'], { client, sleep: async () => undefined });
        expect(results.map(r => r.ok)).toEqual([false, true]);
    });
});
