// tests/base64.test.ts — Tests for lenient base64 decoding
import { describe, it, expect } from 'vitest';
import { decodeBase64, encodeBase64, repairPadding } from '../src/base64.js';

describe('repairPadding', () => {
    it('appends the missing padding', () => {
        expect(repairPadding('ab')).toBe('ab==');
        expect(repairPadding('abc')).toBe('abc=');
    });

    it('leaves aligned input alone', () => {
        expect(repairPadding('abcd')).toBe('abcd');
        expect(repairPadding('')).toBe('');
    });
});

describe('decodeBase64', () => {
    it('decodes padded and unpadded input alike', () => {
        expect(decodeBase64('aGVsbG8=')).toBe('hello');
        expect(decodeBase64('aGVsbG8')).toBe('hello');
    });

    it('gives the same result for any amount of stripped padding', () => {
        for (const text of ['a', 'ab', 'abc', 'abcd', 'subscription']) {
            const encoded = encodeBase64(text);
            expect(decodeBase64(encoded.replace(/=+$/, ''))).toBe(decodeBase64(encoded));
        }
    });

    it('accepts the URL-safe alphabet', () => {
        expect(encodeBase64('~~~')).toBe('fn5+');
        expect(decodeBase64('fn5+')).toBe('~~~');
        expect(decodeBase64('fn5-')).toBe('~~~');
    });

    it('strips line breaks', () => {
        expect(decodeBase64('aGVs\r\nbG8=\n')).toBe('hello');
    });

    it('decodes UTF-8 text', () => {
        expect(decodeBase64(encodeBase64('香港 01'))).toBe('香港 01');
    });

    it('returns null for text outside both alphabets', () => {
        expect(decodeBase64('not base64!')).toBeNull();
        expect(decodeBase64('a+b-c')).toBeNull();
    });

    it('returns null for impossible lengths and empty input', () => {
        expect(decodeBase64('abcde')).toBeNull();
        expect(decodeBase64('')).toBeNull();
        expect(decodeBase64('\r\n')).toBeNull();
    });
});
