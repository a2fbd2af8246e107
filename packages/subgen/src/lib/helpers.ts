// subgen/src/lib/helpers.ts
// Argument parsing — no proxy domain knowledge.

// ─── Value Parsers ──────────────────────────────────────────────────

export function parseBool(value: unknown, defaultValue = false): boolean {
    if (value === null || typeof value === 'undefined') return defaultValue;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') {
        if (value.toLowerCase() === 'true' || value === '1') return true;
        if (value.toLowerCase() === 'false' || value === '0') return false;
    }
    throw new Error(`Invalid boolean value: ${String(value)}`);
}

export function parseNumber(defaultValue: number): (value: unknown) => number {
    return (value: unknown): number => {
        if (value === null || typeof value === 'undefined') return defaultValue;
        const num = parseInt(String(value), 10);
        return isNaN(num) ? defaultValue : num;
    };
}

export function parseString(defaultValue: string): (value: unknown) => string {
    return (value: unknown): string => {
        if (value === null || typeof value === 'undefined') return defaultValue;
        return String(value);
    };
}

// ─── Command Line ───────────────────────────────────────────────────

/**
 * Collect `--key=value`, `--key value` and bare `--flag` (→ `true`) into a
 * record. Positional arguments are ignored.
 */
export function argvToRecord(argv: readonly string[]): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--')) continue;

        const body = arg.slice(2);
        const eq = body.indexOf('=');
        if (eq !== -1) {
            out[body.slice(0, eq)] = body.slice(eq + 1);
            continue;
        }

        const next = argv[i + 1];
        if (next !== undefined && !next.startsWith('--')) {
            out[body] = next;
            i++;
        } else {
            out[body] = true;
        }
    }
    return out;
}

// ─── Parsed Arguments ───────────────────────────────────────────────

export interface ParsedArgs {
    /** Directory of `.txt` link lists. */
    input: string;
    /** Directory the `.yaml` profiles are written to. */
    output: string;
    /** Rule file; empty for the built-in list. */
    rules: string;
    /** JSON file of general/DNS overrides; empty for none. */
    settings: string;
    maxNodes: number;
    delayMs: number;
    timeoutMs: number;
    maxBundleDepth: number;
    dedupeByName: boolean;
    ipv6Enabled: boolean;
    dnsMode: string;
}

export function parseArgs(args: Record<string, unknown>): ParsedArgs {
    return {
        input: parseString('sources')(args.input),
        output: parseString('output')(args.output),
        rules: parseString('')(args.rules),
        settings: parseString('')(args.settings),
        maxNodes: parseNumber(200)(args.maxNodes),
        delayMs: parseNumber(1000)(args.delayMs),
        timeoutMs: parseNumber(30000)(args.timeoutMs),
        maxBundleDepth: parseNumber(2)(args.maxBundleDepth),
        dedupeByName: parseBool(args.dedupeByName),
        ipv6Enabled: parseBool(args.ipv6Enabled),
        dnsMode: parseString('fake-ip')(args.dnsMode),
    };
}
