// tests/normalize.test.ts — Pruning and Clash record flattening
import { describe, it, expect } from 'vitest';
import { normalizeProxy, prune, toClashProxy } from '../src/normalize.js';
import { decodeLink } from '../src/registry.js';
import { encodeBase64 } from '../src/base64.js';
import type { ProxyDescriptor } from '../src/types.js';

function proxyOf(link: string): ProxyDescriptor {
    const result = decodeLink(link);
    if (!result.ok) throw new Error(result.error.reason);
    return result.proxy;
}

describe('prune', () => {
    const messy = {
        a: null,
        b: '',
        c: [],
        d: {},
        e: { f: { g: undefined } },
        h: 0,
        i: false,
        j: [null, '', {}, 'x'],
        k: 'v',
    };

    it('removes empty values depth-first', () => {
        expect(prune(messy)).toEqual({ h: 0, i: false, j: ['x'], k: 'v' });
    });

    it('keeps zero and false', () => {
        expect(prune({ port: 0, udp: false })).toEqual({ port: 0, udp: false });
    });

    it('is idempotent', () => {
        expect(prune(prune(messy))).toEqual(prune(messy));
    });

    it('drops a nested list emptied by pruning', () => {
        expect(prune({ opts: { hosts: [null, ''] }, keep: 1 })).toEqual({ keep: 1 });
    });
});

describe('normalizeProxy', () => {
    it('flattens a vmess websocket node', () => {
        const link = `vmess://${encodeBase64(JSON.stringify({
            add: '1.2.3.4', port: '443', id: 'u-1', aid: '0',
            net: 'ws', path: '/x', host: 'h.example', tls: 'tls',
        }))}`;
        expect(normalizeProxy(proxyOf(link))).toEqual({
            name: 'VMess-1.2.3.4:443',
            type: 'vmess',
            server: '1.2.3.4',
            port: 443,
            uuid: 'u-1',
            alterId: 0,
            cipher: 'auto',
            udp: true,
            tls: true,
            servername: 'h.example',
            network: 'ws',
            'ws-opts': { path: '/x', headers: { Host: 'h.example' } },
        });
    });

    it('flattens ss with its plugin', () => {
        const link = 'ss://YWVzLTI1Ni1nY206cGFzc3dvcmQ=@example.com:8443/'
            + '?plugin=obfs-local%3Bobfs%3Dhttp#MyNode';
        expect(normalizeProxy(proxyOf(link))).toEqual({
            name: 'MyNode',
            type: 'ss',
            server: 'example.com',
            port: 8443,
            cipher: 'aes-256-gcm',
            password: 'password',
            plugin: 'obfs',
            'plugin-opts': { mode: 'http' },
            udp: true,
        });
    });

    it('does not emit the SSR projection', () => {
        const payload = `s.example:443:auth_chain_a:none:plain:${encodeBase64('pw')}`;
        const proxy = normalizeProxy(proxyOf(`ssr://${encodeBase64(payload)}`));
        expect(Object.keys(proxy).sort()).toEqual(['cipher', 'name', 'password', 'port', 'server', 'type', 'udp']);
        expect(proxy.type).toBe('ss');
    });

    it('emits sni and no tls key for trojan', () => {
        const link = 'trojan://pw@t.example:443?sni=s.example&allowInsecure=1&type=ws&path=%2Fws&host=cdn.example#T';
        expect(normalizeProxy(proxyOf(link))).toEqual({
            name: 'T',
            type: 'trojan',
            server: 't.example',
            port: 443,
            password: 'pw',
            udp: true,
            sni: 's.example',
            network: 'ws',
            'ws-opts': { path: '/ws', headers: { Host: 'cdn.example' } },
            'skip-cert-verify': true,
        });
    });

    it('emits reality-opts and flow for vless', () => {
        const link = 'vless://uuid-1@v.example:443?security=reality&pbk=K&sid=01&flow=xtls-rprx-vision&fp=chrome#R';
        expect(normalizeProxy(proxyOf(link))).toEqual({
            name: 'R',
            type: 'vless',
            server: 'v.example',
            port: 443,
            uuid: 'uuid-1',
            flow: 'xtls-rprx-vision',
            udp: true,
            tls: true,
            servername: 'v.example',
            'reality-opts': { 'public-key': 'K', 'short-id': '01' },
            network: 'tcp',
            'client-fingerprint': 'chrome',
        });
    });

    it('flattens wireguard keys', () => {
        const link = 'wireguard://wg.example:51820?private_key=a&public_key=b&address=10.0.0.2/32&mtu=1280#W';
        expect(normalizeProxy(proxyOf(link))).toEqual({
            name: 'W',
            type: 'wireguard',
            server: 'wg.example',
            port: 51820,
            'private-key': 'a',
            'public-key': 'b',
            ip: '10.0.0.2',
            mtu: 1280,
            udp: true,
        });
    });

    it('leaves empty fields in the unpruned record', () => {
        const flat = toClashProxy(proxyOf('trojan://pw@t.example:443#T'));
        expect('ws-opts' in flat).toBe(true);
        expect(flat['ws-opts']).toBeUndefined();
        expect(flat.sni).toBe('t.example');
    });
});
