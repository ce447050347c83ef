// quote.ts: JSON string literal production
//
// Escapes `"` and `\`, every code unit below 0x20 (short forms where JSON has
// them), and lone surrogates (as \udXXX). Well-formed surrogate pairs pass
// through untouched.

import { LRUCache } from 'lru-cache';
import { KEY_CACHE_MAX_KEY_LENGTH, KEY_CACHE_SIZE } from './config';

const NEEDS_ESCAPE = /["\\\u0000-\u001f\ud800-\udfff]/;

const SHORT_ESCAPES: Record<number, string> = {
    0x08: '\\b',
    0x09: '\\t',
    0x0a: '\\n',
    0x0c: '\\f',
    0x0d: '\\r',
    0x22: '\\"',
    0x5c: '\\\\',
};

function unicodeEscape(code: number): string {
    return '\\u' + code.toString(16).padStart(4, '0');
}

function isHighSurrogate(code: number): boolean {
    return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
    return code >= 0xdc00 && code <= 0xdfff;
}

export function quote(value: string): string {
    if (!NEEDS_ESCAPE.test(value)) return `"${value}"`;

    let out = '"';
    let runStart = 0;
    for (let i = 0; i < value.length; i++) {
        const code = value.charCodeAt(i);
        let escaped: string | undefined;

        if (code < 0x20 || code === 0x22 || code === 0x5c) {
            escaped = SHORT_ESCAPES[code] ?? unicodeEscape(code);
        } else if (isHighSurrogate(code)) {
            if (i + 1 < value.length && isLowSurrogate(value.charCodeAt(i + 1))) {
                i++;
                continue;
            }
            escaped = unicodeEscape(code);
        } else if (isLowSurrogate(code)) {
            escaped = unicodeEscape(code);
        }

        if (escaped !== undefined) {
            out += value.slice(runStart, i) + escaped;
            runStart = i + 1;
        }
    }
    return out + value.slice(runStart) + '"';
}

/* -------------------------------------------------------------------------- */
/* Property-name cache                                                        */
/* -------------------------------------------------------------------------- */

// Quoting is pure, so sharing entries across calls is unobservable.
const keyCache: LRUCache<string, string> | null = KEY_CACHE_SIZE > 0
    ? new LRUCache<string, string>({ max: KEY_CACHE_SIZE })
    : null;

export function quoteKey(key: string): string {
    if (keyCache === null || key.length > KEY_CACHE_MAX_KEY_LENGTH) return quote(key);
    const cached = keyCache.get(key);
    if (cached !== undefined) return cached;
    const quoted = quote(key);
    keyCache.set(key, quoted);
    return quoted;
}

export function keyCacheSize(): number {
    return keyCache === null ? 0 : keyCache.size;
}
