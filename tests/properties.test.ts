import test from 'node:test';
import assert from 'node:assert/strict';

import { parse, stringify } from '../src/index';

const FIXTURES: unknown[] = [
    null,
    true,
    0,
    -5,
    0.1,
    1e-7,
    123456789012,
    '',
    'plain',
    'tab\there "quoted" back\\slash',
    'lone \ud800 and \udfff surrogates',
    'pair 😀 ok',
    [],
    {},
    [1, [2, [3, [4]]]],
    { b: 1, a: [true, false, null], '10': 'ten', '9': 'nine' },
    { nested: { deeper: { deepest: ['x', { y: 'z' }] } }, empty: { list: [], map: {} } },
    { 'key with spaces': 1, 'ünïcödé': 'välue', '\u0000': 'nul key' },
];

test('stringify agrees with the platform on every fixture', () => {
    for (const value of FIXTURES) {
        assert.equal(stringify(value), JSON.stringify(value));
        assert.equal(stringify(value, null, 2), JSON.stringify(value, null, 2));
    }
});

test('parse inverts stringify', () => {
    for (const value of FIXTURES) {
        const text = stringify(value);
        if (text === undefined) throw new Error('fixture has no JSON representation');
        assert.deepEqual(parse(text), value);
    }
});

test('stringify of parsed output is a fixed point', () => {
    for (const value of FIXTURES) {
        for (const space of [undefined, 2, '\t']) {
            const once = stringify(value, null, space);
            if (once === undefined) throw new Error('fixture has no JSON representation');
            assert.equal(stringify(parse(once), null, space), once);
        }
    }
});

test('parse agrees with the platform on accepted texts', () => {
    const texts = [
        '  {"a" : [ 1 , 2 ] , "b" : { } }  ',
        '"\\u00e9\\u0041"',
        '[-1.5e-3, 0, 1E2]',
        '{"a":{"a":{"a":null}}}',
    ];
    for (const text of texts) {
        assert.deepEqual(parse(text), JSON.parse(text));
    }
});
