// subgen/src/lib/sources.ts
// Input directory of `.txt` link lists, one output profile per file.

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { contentLines } from './pipeline.js';

export interface LinkList {
    /** File name without `.txt`; names the output profile. */
    name: string;
    file: string;
    /** Subscription URLs to fetch. */
    urls: string[];
    /** Proxy links given inline. */
    links: string[];
}

export function isSubscriptionUrl(entry: string): boolean {
    return /^https?:\/\//i.test(entry);
}

export function parseLinkList(name: string, file: string, text: string): LinkList {
    const entries = contentLines(text);
    return {
        name,
        file,
        urls: entries.filter(isSubscriptionUrl),
        links: entries.filter(entry => !isSubscriptionUrl(entry)),
    };
}

/** Every `.txt` file in `dir`, sorted by file name. */
export async function readLinkLists(dir: string): Promise<LinkList[]> {
    const files = (await readdir(dir))
        .filter(file => file.endsWith('.txt'))
        .sort();

    const lists: LinkList[] = [];
    for (const file of files) {
        const full = path.join(dir, file);
        const text = await readFile(full, 'utf8');
        lists.push(parseLinkList(path.basename(file, '.txt'), full, text));
    }
    return lists;
}
