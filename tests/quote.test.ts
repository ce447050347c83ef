import test from 'node:test';
import assert from 'node:assert/strict';

import { keyCacheSize, quote, quoteKey } from '../src/quote';

test('plain strings are wrapped without escaping', () => {
    assert.equal(quote('plain'), '"plain"');
    assert.equal(quote(''), '""');
    assert.equal(quote('a/b\u007f'), '"a/b\u007f"');
});

test('quotes, backslashes and short control escapes', () => {
    assert.equal(quote('say "hi" \\ ok'), '"say \\"hi\\" \\\\ ok"');
    assert.equal(quote('a\nb'), '"a\\nb"');
    assert.equal(quote('\b\f\r\t'), '"\\b\\f\\r\\t"');
});

test('other control characters use lowercase \\u00XX', () => {
    assert.equal(quote('\u0001\u001f'), '"\\u0001\\u001f"');
    assert.equal(quote('x\u000by'), '"x\\u000by"');
});

test('lone surrogates are escaped, pairs pass through', () => {
    assert.equal(quote('\ud800'), '"\\ud800"');
    assert.equal(quote('x\udc00y'), '"x\\udc00y"');
    assert.equal(quote('\ud800\ud800'), '"\\ud800\\ud800"');
    assert.equal(quote('\udc00\ud800'), '"\\udc00\\ud800"');
    assert.equal(quote('😀'), '"😀"');
});

test('quoteKey matches quote and memoizes the result', () => {
    const key = 'quote-cache-probe\n';
    const before = keyCacheSize();
    assert.equal(quoteKey(key), quote(key));
    assert.equal(keyCacheSize(), before + 1);
    assert.equal(quoteKey(key), '"quote-cache-probe\\n"');
    assert.equal(keyCacheSize(), before + 1);
});

test('long keys bypass the cache', () => {
    const key = 'k'.repeat(300);
    const before = keyCacheSize();
    assert.equal(quoteKey(key), `"${key}"`);
    assert.equal(keyCacheSize(), before);
});
