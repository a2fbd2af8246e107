// linkparse/src/uri.ts
// Text helpers shared by the scheme decoders. None of them throw.

export type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string };

export function parsed<T>(value: T): Parsed<T> {
    return { ok: true, value };
}

export function rejected<T>(reason: string): Parsed<T> {
    return { ok: false, reason };
}

/** Percent-decode, returning the input unchanged on malformed escapes. */
export function safeDecodeURIComponent(text: string): string {
    try {
        return decodeURIComponent(text);
    } catch {
        return text;
    }
}

/**
 * Split off the `#fragment`. An empty fragment counts as absent.
 */
export function splitFragment(text: string): { body: string; fragment: string | null } {
    const hash = text.indexOf('#');
    if (hash === -1) return { body: text, fragment: null };
    const fragment = safeDecodeURIComponent(text.slice(hash + 1)).trim();
    return { body: text.slice(0, hash), fragment: fragment || null };
}

export function splitQuery(text: string): { path: string; query: string } {
    const q = text.indexOf('?');
    if (q === -1) return { path: text, query: '' };
    return { path: text.slice(0, q), query: text.slice(q + 1) };
}

// ─── Query ──────────────────────────────────────────────────────────

/** Multi-value query parameters, keys case-sensitive. */
export type QueryParams = Map<string, string[]>;

/**
 * Parse `a=1&b=2&a=3`. Values are percent-decoded; `+` is kept literally
 * because key material in links is standard base64.
 */
export function parseQuery(query: string): QueryParams {
    const params: QueryParams = new Map();
    for (const pair of query.split('&')) {
        if (!pair) continue;
        const eq = pair.indexOf('=');
        const key = safeDecodeURIComponent(eq === -1 ? pair : pair.slice(0, eq));
        const value = eq === -1 ? '' : safeDecodeURIComponent(pair.slice(eq + 1));
        if (!key) continue;
        const values = params.get(key);
        if (values) values.push(value);
        else params.set(key, [value]);
    }
    return params;
}

/** First non-empty value among `keys`, in key order. */
export function queryValue(params: QueryParams, ...keys: string[]): string | undefined {
    for (const key of keys) {
        const value = params.get(key)?.find(v => v !== '');
        if (value !== undefined) return value;
    }
    return undefined;
}

/** `undefined` when none of `keys` is present, otherwise whether any is `1`/`true`. */
export function queryFlag(params: QueryParams, ...keys: string[]): boolean | undefined {
    const present = keys.filter(key => params.has(key));
    if (present.length === 0) return undefined;
    return present.some(key => (params.get(key) ?? []).some(v => v === '1' || v.toLowerCase() === 'true'));
}

export function splitList(value: string | undefined): string[] {
    if (!value) return [];
    return value.split(',').map(s => s.trim()).filter(Boolean);
}

// ─── Endpoint ───────────────────────────────────────────────────────

/** Decimal port in 0–65535. Port 0 parses; callers reject it later. */
export function parsePort(text: string): number | null {
    if (!/^\d{1,5}$/.test(text)) return null;
    const port = Number(text);
    return port <= 65535 ? port : null;
}

/**
 * Parse `host:port`, `[v6]:port`. Anything from the first `/` on is a path
 * and ignored.
 */
export function parseHostPort(text: string): { server: string; port: number } | null {
    const slash = text.indexOf('/');
    const authority = (slash === -1 ? text : text.slice(0, slash)).trim();

    if (authority.startsWith('[')) {
        const close = authority.indexOf(']');
        if (close === -1 || authority[close + 1] !== ':') return null;
        const port = parsePort(authority.slice(close + 2));
        return port === null ? null : { server: authority.slice(1, close), port };
    }

    const colon = authority.lastIndexOf(':');
    if (colon === -1) return null;
    const port = parsePort(authority.slice(colon + 1));
    return port === null ? null : { server: authority.slice(0, colon), port };
}
