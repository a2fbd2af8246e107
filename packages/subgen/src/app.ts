// subgen/src/app.ts
// One run: read link lists, fetch and decode each source, write one
// profile per list.

import { loadRules } from './lib/rules.js';
import { loadSettings, renderConfig } from './lib/render.js';
import { readLinkLists } from './lib/sources.js';
import { fetchAll } from './lib/fetch.js';
import { buildPolicy, decodeSubscription } from './lib/pipeline.js';
import { writeProfile } from './lib/output.js';
import type { ParsedArgs } from './lib/helpers.js';
import type { FetchOptions, TextClient } from './lib/fetch.js';
import type { LinkList } from './lib/sources.js';
import type { RuleEntry } from './lib/rules.js';
import type { Logger } from './lib/logger.js';
import type { ProxyDescriptor } from 'linkparse';

export interface RunDeps {
    logger: Logger;
    client?: TextClient;
    sleep?: FetchOptions['sleep'];
}

export interface ProfileSummary {
    name: string;
    file: string;
    nodes: number;
    rejected: number;
    fetchFailures: number;
}

interface ProfileInput {
    args: ParsedArgs;
    rules: RuleEntry[];
    settings: Record<string, unknown>;
    deps: RunDeps;
}

async function buildProfile(list: LinkList, input: ProfileInput): Promise<ProfileSummary> {
    const { args, rules, settings, deps } = input;
    const { logger } = deps;
    const decodeOptions = { maxBundleDepth: args.maxBundleDepth, logger };

    const proxies: ProxyDescriptor[] = [];
    let rejected = 0;

    // inline links first, then fetched subscriptions, in list order
    const inline = decodeSubscription(list.links.join('\n'), decodeOptions);
    proxies.push(...inline.proxies);
    rejected += inline.failures.length;

    const fetched = await fetchAll(list.urls, {
        client: deps.client,
        sleep: deps.sleep,
        delayMs: args.delayMs,
        timeoutMs: args.timeoutMs,
    });
    let fetchFailures = 0;
    for (const result of fetched) {
        if (!result.ok) {
            fetchFailures++;
            logger.warn({ url: result.url, error: result.error }, 'subscription fetch failed');
            continue;
        }
        const decoded = decodeSubscription(result.content, decodeOptions);
        proxies.push(...decoded.proxies);
        rejected += decoded.failures.length;
        logger.debug({ url: result.url, proxies: decoded.proxies.length }, 'subscription decoded');
    }

    const policy = buildPolicy(proxies, rules, {
        maxNodes: args.maxNodes,
        dedupeByName: args.dedupeByName,
    });
    const config = renderConfig(policy, {
        ipv6Enabled: args.ipv6Enabled,
        dnsMode: args.dnsMode,
        settings,
    });
    const file = await writeProfile(args.output, list.name, config);

    const summary: ProfileSummary = {
        name: list.name,
        file,
        nodes: policy.nodes.length,
        rejected,
        fetchFailures,
    };
    logger.info({ ...summary, decoded: proxies.length }, 'profile written');
    return summary;
}

/** Process every link list under `args.input`. */
export async function run(args: ParsedArgs, deps: RunDeps): Promise<ProfileSummary[]> {
    const { logger } = deps;
    const { rules, rejected } = await loadRules(args.rules);
    for (const line of rejected) logger.warn({ line }, 'invalid rule skipped');
    const settings = await loadSettings(args.settings);

    const lists = await readLinkLists(args.input);
    if (lists.length === 0) logger.warn({ input: args.input }, 'no .txt link lists found');

    const summaries: ProfileSummary[] = [];
    for (const list of lists) {
        if (list.urls.length === 0 && list.links.length === 0) {
            logger.info({ file: list.file }, 'link list is empty, skipped');
            continue;
        }
        summaries.push(await buildProfile(list, { args, rules, settings, deps }));
    }
    return summaries;
}
