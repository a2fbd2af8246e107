// tests/rules.test.ts — Rule parsing and formatting
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import {
    DEFAULT_RULES, formatRule, isCatchAll, loadRules, parseRule, parseRules,
} from '../src/lib/rules.js';

describe('parseRule', () => {
    it('parses matcher, pattern and target', () => {
        expect(parseRule('DOMAIN-SUFFIX,example.com,Proxy')).toEqual({
            matcher: 'domain-suffix',
            pattern: 'example.com',
            target: 'Proxy',
            options: [],
        });
    });

    it('trims fields, ignores token case and keeps options', () => {
        expect(parseRule('ip-cidr, 10.0.0.0/8 , DIRECT, no-resolve')).toEqual({
            matcher: 'ip-cidr',
            pattern: '10.0.0.0/8',
            target: 'DIRECT',
            options: ['no-resolve'],
        });
    });

    it('parses MATCH and FINAL as the catch-all', () => {
        expect(parseRule('MATCH,Proxy')).toEqual({ matcher: 'catch-all', pattern: '', target: 'Proxy', options: [] });
        expect(parseRule('FINAL,DIRECT')?.matcher).toBe('catch-all');
    });

    it('returns null for unknown matchers and missing fields', () => {
        expect(parseRule('PROCESS-NAME,curl,DIRECT')).toBeNull();
        expect(parseRule('DOMAIN,only')).toBeNull();
        expect(parseRule('MATCH')).toBeNull();
    });
});

describe('formatRule', () => {
    it('writes options after the target', () => {
        expect(formatRule({ matcher: 'ip-cidr', pattern: '10.0.0.0/8', target: 'DIRECT', options: ['no-resolve'] }))
            .toBe('IP-CIDR,10.0.0.0/8,DIRECT,no-resolve');
    });

    it('writes the catch-all without a pattern', () => {
        expect(formatRule({ matcher: 'catch-all', pattern: '', target: 'Proxy', options: [] })).toBe('MATCH,Proxy');
    });
});

describe('parseRules', () => {
    it('skips comments and blanks and reports invalid lines', () => {
        const { rules, rejected } = parseRules(['# comment', '', 'GEOIP,CN,DIRECT', 'bogus']);
        expect(rules.map(formatRule)).toEqual(['GEOIP,CN,DIRECT']);
        expect(rejected).toEqual(['bogus']);
    });

    it('accepts every built-in rule, ending with the catch-all', () => {
        const { rules, rejected } = parseRules(DEFAULT_RULES);
        expect(rejected).toEqual([]);
        expect(rules.map(formatRule)).toEqual(DEFAULT_RULES);
        expect(isCatchAll(rules[rules.length - 1])).toBe(true);
    });
});

describe('loadRules', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'subgen-rules-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('uses the built-in list without a file', async () => {
        const { rules } = await loadRules('');
        expect(rules).toHaveLength(DEFAULT_RULES.length);
    });

    it('reads one rule per line from a file', async () => {
        const file = path.join(dir, 'rules.txt');
        await writeFile(file, 'DOMAIN,a.example,DIRECT\r\n# skip\nMATCH,Proxy\n', 'utf8');
        const { rules, rejected } = await loadRules(file);
        expect(rules.map(formatRule)).toEqual(['DOMAIN,a.example,DIRECT', 'MATCH,Proxy']);
        expect(rejected).toEqual([]);
    });
});
