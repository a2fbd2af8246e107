// subgen/src/index.ts — public API

export { parseArgs, argvToRecord, parseBool, parseNumber, parseString } from './lib/helpers.js';
export type { ParsedArgs } from './lib/helpers.js';

export { createLogger } from './lib/logger.js';
export type { Logger, LoggerOptions } from './lib/logger.js';

export {
    DEFAULT_RULES, SELECT_GROUP, AUTO_GROUP, SENTINELS,
    parseRule, parseRules, formatRule, isCatchAll, loadRules,
} from './lib/rules.js';
export type { RuleEntry, RuleMatcher, ParsedRules } from './lib/rules.js';

export {
    DEFAULT_MAX_NODES, URL_TEST, PLACEHOLDER_NODE,
    assemble, orderRules, uniqueNames, RESERVED_NAMES,
} from './lib/assemble.js';
export type {
    PolicyDocument, PolicyGroup, SelectGroup, UrlTestGroup, AssembleOptions,
} from './lib/assemble.js';

export { RENDER_MODULES, RESERVED_KEYS, renderConfig, checkSettings, loadSettings } from './lib/render.js';
export type { RenderOptions } from './lib/render.js';

export { contentLines, unwrapSubscription, decodeSubscription, buildPolicy } from './lib/pipeline.js';
export type { DecodeOptions, DecodedSubscription, PolicyOptions } from './lib/pipeline.js';

export { fetchText, fetchAll, USER_AGENT } from './lib/fetch.js';
export type { TextClient, TextResponse, TextRequestConfig, FetchResult, FetchOptions } from './lib/fetch.js';

export { readLinkLists, parseLinkList, isSubscriptionUrl } from './lib/sources.js';
export type { LinkList } from './lib/sources.js';

export { toYaml, writeProfile } from './lib/output.js';

export { run } from './app.js';
export type { RunDeps, ProfileSummary } from './app.js';
