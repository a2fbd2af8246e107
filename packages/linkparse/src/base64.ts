// linkparse/src/base64.ts
// Lenient base64 decoding for subscription payloads.

const STANDARD_ALPHABET = /^[A-Za-z0-9+/]*={0,2}$/;
const URL_SAFE_ALPHABET = /^[A-Za-z0-9_-]*={0,2}$/;

type Variant = { alphabet: RegExp; encoding: BufferEncoding };

// standard first, URL-safe second
const VARIANTS: Variant[] = [
    { alphabet: STANDARD_ALPHABET, encoding: 'base64' },
    { alphabet: URL_SAFE_ALPHABET, encoding: 'base64url' },
];

/** Append the `=` characters a length that is not a multiple of 4 lacks. */
export function repairPadding(text: string): string {
    const missingPadding = text.length % 4;
    return missingPadding === 0 ? text : text + '='.repeat(4 - missingPadding);
}

/**
 * Decode base64 text to a UTF-8 string.
 *
 * Line breaks are removed and padding is repaired before decoding. Invalid
 * UTF-8 sequences become U+FFFD. Returns `null` (not base64) when neither
 * alphabet accepts the input.
 */
export function decodeBase64(input: string): string | null {
    const text = repairPadding(input.replace(/[\r\n]/g, '').trim());
    if (text.length === 0) return null;

    for (const { alphabet, encoding } of VARIANTS) {
        if (!alphabet.test(text)) continue;
        return Buffer.from(text, encoding).toString('utf8');
    }
    return null;
}

export function encodeBase64(text: string): string {
    return Buffer.from(text, 'utf8').toString('base64');
}
