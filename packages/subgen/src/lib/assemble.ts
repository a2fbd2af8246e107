// subgen/src/lib/assemble.ts
// Deduplicated descriptors + rules → policy document (nodes, groups, rules).

import { isValidDescriptor, normalizeProxy } from 'linkparse';
import type { ClashProxy, ProxyDescriptor } from 'linkparse';
import { AUTO_GROUP, SELECT_GROUP, SENTINELS, isCatchAll } from './rules.js';
import type { RuleEntry } from './rules.js';

export const DEFAULT_MAX_NODES = 200;

export const URL_TEST = {
    url: 'http://www.gstatic.com/generate_204',
    interval: 300,
    tolerance: 50,
} as const;

export interface SelectGroup {
    name: string;
    type: 'select';
    proxies: string[];
}

export interface UrlTestGroup {
    name: string;
    type: 'url-test';
    proxies: string[];
    url: string;
    interval: number;
    tolerance: number;
}

export type PolicyGroup = SelectGroup | UrlTestGroup;

export interface PolicyDocument {
    nodes: ClashProxy[];
    groups: PolicyGroup[];
    /** Catch-all last. */
    rules: RuleEntry[];
}

export interface AssembleOptions {
    maxNodes?: number;
}

/** Emitted alone when no usable node remains. */
export const PLACEHOLDER_NODE: Readonly<ClashProxy> = {
    name: 'placeholder',
    type: 'ss',
    server: '127.0.0.1',
    port: 1,
    cipher: 'aes-128-gcm',
    password: 'placeholder',
};

/** Names a node may not take: the generated groups and the sentinels. */
export const RESERVED_NAMES: readonly string[] = [SELECT_GROUP, AUTO_GROUP, ...SENTINELS];

/** Second and later uses of a name, or a reserved name, get `-2`, `-3`, … */
export function uniqueNames(
    nodes: readonly ClashProxy[],
    reserved: readonly string[] = RESERVED_NAMES,
): ClashProxy[] {
    const used = new Set<string>(reserved);
    return nodes.map(node => {
        let name = node.name;
        for (let k = 2; used.has(name); k++) name = `${node.name}-${k}`;
        used.add(name);
        return name === node.name ? node : { ...node, name };
    });
}

function buildGroups(names: string[]): PolicyGroup[] {
    return [
        { name: SELECT_GROUP, type: 'select', proxies: [...names, ...SENTINELS] },
        { name: AUTO_GROUP, type: 'url-test', proxies: [...names], ...URL_TEST },
    ];
}

/**
 * Rewrite unknown targets to the select group and move a single catch-all
 * to the end. Without a catch-all one targeting the select group is added.
 */
export function orderRules(rules: readonly RuleEntry[], targets: ReadonlySet<string>): RuleEntry[] {
    const retarget = (entry: RuleEntry): RuleEntry =>
        targets.has(entry.target) ? entry : { ...entry, target: SELECT_GROUP };

    const body = rules.filter(entry => !isCatchAll(entry)).map(retarget);
    const catchAll = rules.find(isCatchAll);
    return [
        ...body,
        catchAll
            ? retarget(catchAll)
            : { matcher: 'catch-all', pattern: '', target: SELECT_GROUP, options: [] },
    ];
}

export function assemble(
    descriptors: readonly ProxyDescriptor[],
    rules: readonly RuleEntry[],
    options: AssembleOptions = {},
): PolicyDocument {
    const maxNodes = Math.max(0, options.maxNodes ?? DEFAULT_MAX_NODES);
    const usable = descriptors.filter(isValidDescriptor).slice(0, maxNodes);

    const named = uniqueNames(usable.map(normalizeProxy));
    const nodes = named.length > 0 ? named : [{ ...PLACEHOLDER_NODE }];
    const groups = buildGroups(nodes.map(node => node.name));

    const targets = new Set<string>([...groups.map(g => g.name), ...SENTINELS]);
    return { nodes, groups, rules: orderRules(rules, targets) };
}
