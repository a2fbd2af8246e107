// subgen/src/lib/rules.ts
// Routing rules: `MATCHER,PATTERN,TARGET[,options]` strings ⇄ RuleEntry.

import { readFile } from 'node:fs/promises';

export type RuleMatcher =
    | 'domain-suffix'
    | 'domain'
    | 'domain-keyword'
    | 'ip-cidr'
    | 'geoip'
    | 'catch-all';

export interface RuleEntry {
    matcher: RuleMatcher;
    /** Empty for the catch-all. */
    pattern: string;
    target: string;
    /** Trailing flags such as `no-resolve`. */
    options: string[];
}

const MATCHER_TOKENS: Record<RuleMatcher, string> = {
    'domain-suffix': 'DOMAIN-SUFFIX',
    domain: 'DOMAIN',
    'domain-keyword': 'DOMAIN-KEYWORD',
    'ip-cidr': 'IP-CIDR',
    geoip: 'GEOIP',
    'catch-all': 'MATCH',
};

// upper-cased token → matcher; FINAL and IP-CIDR6 are accepted aliases
const TOKEN_MATCHERS: ReadonlyMap<string, RuleMatcher> = new Map<string, RuleMatcher>([
    ['DOMAIN-SUFFIX', 'domain-suffix'],
    ['DOMAIN', 'domain'],
    ['DOMAIN-KEYWORD', 'domain-keyword'],
    ['IP-CIDR', 'ip-cidr'],
    ['IP-CIDR6', 'ip-cidr'],
    ['GEOIP', 'geoip'],
    ['MATCH', 'catch-all'],
    ['FINAL', 'catch-all'],
]);

export const SELECT_GROUP = 'Proxy';
export const AUTO_GROUP = 'Auto';
export const SENTINELS = ['DIRECT', 'REJECT'] as const;

/** Ad blocking, domestic media and platform services direct, GeoIP CN direct. */
export const DEFAULT_RULES: readonly string[] = [
    'DOMAIN-SUFFIX,ads.com,REJECT',
    'DOMAIN-KEYWORD,adservice,REJECT',
    'DOMAIN-SUFFIX,bilibili.com,DIRECT',
    'DOMAIN-SUFFIX,bilibili.tv,DIRECT',
    `DOMAIN-SUFFIX,netflix.com,${SELECT_GROUP}`,
    `DOMAIN-SUFFIX,disneyplus.com,${SELECT_GROUP}`,
    'DOMAIN-SUFFIX,microsoft.com,DIRECT',
    'DOMAIN-SUFFIX,apple.com,DIRECT',
    'GEOIP,CN,DIRECT',
    `MATCH,${SELECT_GROUP}`,
];

export function isCatchAll(entry: RuleEntry): boolean {
    return entry.matcher === 'catch-all';
}

/** Parse one rule string. Unknown matchers and missing fields give `null`. */
export function parseRule(line: string): RuleEntry | null {
    const parts = line.split(',').map(part => part.trim());
    const matcher = TOKEN_MATCHERS.get(parts[0].toUpperCase());
    if (!matcher) return null;

    if (matcher === 'catch-all') {
        const target = parts[1] ?? '';
        return target ? { matcher, pattern: '', target, options: parts.slice(2).filter(Boolean) } : null;
    }

    const [, pattern = '', target = ''] = parts;
    if (!pattern || !target) return null;
    return { matcher, pattern, target, options: parts.slice(3).filter(Boolean) };
}

export function formatRule(entry: RuleEntry): string {
    const token = MATCHER_TOKENS[entry.matcher];
    const fields = entry.matcher === 'catch-all'
        ? [token, entry.target]
        : [token, entry.pattern, entry.target];
    return [...fields, ...entry.options].join(',');
}

export interface ParsedRules {
    rules: RuleEntry[];
    /** Lines that are not valid rules. */
    rejected: string[];
}

/** One rule per line; blank lines and `#` comments are skipped. */
export function parseRules(lines: Iterable<string>): ParsedRules {
    const rules: RuleEntry[] = [];
    const rejected: string[] = [];
    for (const raw of lines) {
        const line = raw.trim();
        if (!line || line.startsWith('#')) continue;
        const entry = parseRule(line);
        if (entry) rules.push(entry);
        else rejected.push(line);
    }
    return { rules, rejected };
}

/** Rules from `file`, or the built-in list when `file` is empty. */
export async function loadRules(file: string): Promise<ParsedRules> {
    if (!file) return parseRules(DEFAULT_RULES);
    const text = await readFile(file, 'utf8');
    return parseRules(text.split(/\r?\n/));
}
