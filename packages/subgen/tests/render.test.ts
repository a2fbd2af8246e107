// tests/render.test.ts — Config rendering through the module merge
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { ProxyDescriptor } from 'linkparse';
import { assemble } from '../src/lib/assemble.js';
import { checkSettings, loadSettings, renderConfig } from '../src/lib/render.js';
import { DEFAULT_RULES, parseRules } from '../src/lib/rules.js';

const node: ProxyDescriptor = {
    scheme: 'trojan', name: 'T', server: 't.example', port: 443, password: 'pw', transport: {},
};
const policy = assemble([node], parseRules(DEFAULT_RULES).rules);

describe('renderConfig', () => {
    it('emits general settings, dns, proxies, groups and rules', () => {
        const config = renderConfig(policy);

        expect(Object.keys(config)).toEqual([
            'port', 'socks-port', 'allow-lan', 'mode', 'log-level', 'external-controller', 'ipv6',
            'dns', 'proxies', 'proxy-groups', 'rules',
        ]);
        expect(config.port).toBe(7890);
        expect(config['socks-port']).toBe(7891);
        expect(config['allow-lan']).toBe(true);
        expect(config.mode).toBe('rule');
        expect(config['external-controller']).toBe('0.0.0.0:9090');
        expect(config.ipv6).toBe(false);
    });

    it('emits the fake-ip dns block by default', () => {
        expect(renderConfig(policy).dns).toEqual({
            enable: true,
            ipv6: false,
            listen: '0.0.0.0:53',
            'default-nameserver': ['223.5.5.5', '8.8.8.8'],
            'enhanced-mode': 'fake-ip',
            'fake-ip-range': '198.18.0.1/16',
            nameserver: ['https://doh.pub/dns-query', 'https://dns.alidns.com/dns-query'],
        });
    });

    it('omits the fake-ip range in redir-host mode', () => {
        const config = renderConfig(policy, { dnsMode: 'redir-host', ipv6Enabled: true });
        expect(config.ipv6).toBe(true);
        expect(config.dns).toMatchObject({ 'enhanced-mode': 'redir-host', ipv6: true });
        expect(config.dns).not.toHaveProperty('fake-ip-range');
    });

    it('rejects an unknown dns mode', () => {
        expect(() => renderConfig(policy, { dnsMode: 'bogus' })).toThrow('Invalid dnsMode: bogus');
    });

    it('writes nodes, groups and rules from the policy document', () => {
        const config = renderConfig(policy);
        expect(config.proxies).toEqual([
            { name: 'T', type: 'trojan', server: 't.example', port: 443, password: 'pw', udp: true },
        ]);
        expect(config['proxy-groups']).toEqual([
            { name: 'Proxy', type: 'select', proxies: ['T', 'DIRECT', 'REJECT'] },
            {
                name: 'Auto',
                type: 'url-test',
                proxies: ['T'],
                url: 'http://www.gstatic.com/generate_204',
                interval: 300,
                tolerance: 50,
            },
        ]);
        expect(config.rules).toEqual(DEFAULT_RULES);
    });

    it('lets settings override defaults', () => {
        const config = renderConfig(policy, {
            settings: {
                port: 7000,
                dns: { nameserver: ['https://1.1.1.1/dns-query'] },
                tun: { enable: true },
            },
        });
        expect(config.port).toBe(7000);
        expect(config.dns).toMatchObject({ enable: true, nameserver: ['https://1.1.1.1/dns-query'] });
        expect(config.tun).toEqual({ enable: true });
    });
});

describe('settings', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'subgen-settings-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('requires a JSON object without reserved keys', () => {
        expect(() => checkSettings([], 'test')).toThrow('Settings must be a JSON object: test');
        expect(() => checkSettings({ rules: [] }, 'test')).toThrow('Settings may not set "rules": test');
        expect(checkSettings({ mode: 'global' }, 'test')).toEqual({ mode: 'global' });
    });

    it('loads nothing for an empty path', async () => {
        await expect(loadSettings('')).resolves.toEqual({});
    });

    it('loads a settings file', async () => {
        const file = path.join(dir, 'settings.json');
        await writeFile(file, '{"mode":"global","log-level":"debug"}', 'utf8');
        await expect(loadSettings(file)).resolves.toEqual({ mode: 'global', 'log-level': 'debug' });
    });

    it('reports invalid JSON', async () => {
        const file = path.join(dir, 'broken.json');
        await writeFile(file, '{', 'utf8');
        await expect(loadSettings(file)).rejects.toThrow(/^Settings file is not valid JSON: /);
    });
});
