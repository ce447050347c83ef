import test from 'node:test';
import assert from 'node:assert/strict';

import { parse } from '../src/index';
import { JsonEngine } from '../src/json_engine';
import { nativeHost } from '../src/native_host';
import { JsonSyntaxError, ResourceExhaustedError } from '../src/structured_error';

test('reviver transforms leaf values', () => {
    const doubled = parse('{"a":1,"b":2}', (_key: string, value: unknown) => typeof value === 'number' ? value * 2 : value);
    assert.deepEqual(doubled, { a: 2, b: 4 });
});

test('reviver visits children before parents', () => {
    const seen: string[] = [];
    parse('{"a":[1,{"b":2}],"c":3}', (key: string, value: unknown) => {
        seen.push(key);
        return value;
    });
    assert.deepEqual(seen, ['0', 'b', '1', 'a', 'c', '']);
});

test('reviver is called with the holder as this', () => {
    let holderKeys: string[] = [];
    parse('{"a":{"b":1,"c":2}}', function (this: object, key: string, value: unknown) {
        if (key === 'b') holderKeys = Object.keys(this);
        return value;
    });
    assert.deepEqual(holderKeys, ['b', 'c']);
});

test('returning undefined deletes object members', () => {
    const result = parse('{"user":"u","secret":"s"}', (key: string, value: unknown) => key === 'secret' ? undefined : value);
    assert.deepEqual(result, { user: 'u' });
});

test('returning undefined leaves a hole in arrays', () => {
    const result = parse('[1,2,3]', (_key: string, value: unknown) => value === 2 ? undefined : value);
    if (!Array.isArray(result)) throw new Error('expected an array');
    assert.equal(result.length, 3);
    assert.equal(1 in result, false);
    assert.equal(result[0], 1);
    assert.equal(result[2], 3);
});

test('reviver can replace the root', () => {
    assert.equal(parse('1', (key: string, value: unknown) => key === '' ? 'root' : value), 'root');
});

test('keys added during the walk are not visited', () => {
    const calls: string[] = [];
    const result = parse('{"a":1,"b":2}', function (this: Record<string, unknown>, key: string, value: unknown) {
        if (key === 'a') this.z = 9;
        calls.push(key);
        return value;
    });
    assert.deepEqual(calls, ['a', 'b', '']);
    assert.deepEqual(result, { a: 1, b: 2, z: 9 });
});

test('a non-callable reviver is ignored', () => {
    assert.deepEqual(parse('{"a":1}', 42), { a: 1 });
    assert.deepEqual(parse('{"a":1}', null), { a: 1 });
});

test('missing text is a syntax error', () => {
    assert.throws(() => parse(), (err: unknown) => {
        if (!(err instanceof JsonSyntaxError)) return false;
        assert.ok(err instanceof SyntaxError);
        assert.equal(err.message, 'No JSON text to parse');
        assert.equal(err.position, null);
        return true;
    });
});

test('malformed text reports message and position', () => {
    assert.throws(() => parse('{"a":}'), (err: unknown) => {
        if (!(err instanceof JsonSyntaxError)) return false;
        assert.equal(err.message, "Unexpected token '}' at position 5");
        assert.equal(err.position, 5);
        const record = err.toStructured();
        assert.equal(record.code, 'SYNTAX_ERROR');
        assert.deepEqual(record.context, { position: 5, length: 6 });
        return true;
    });
});

test('non-string text is converted to a string first', () => {
    assert.equal(parse(123), 123);
    assert.equal(parse(null), null);
    assert.equal(parse(true), true);
    assert.deepEqual(parse(['[1]']), [1]);
});

test('revive walk enforces the depth limit on reviver-built structure', () => {
    const engine = new JsonEngine(nativeHost, { maxDepth: 3 });
    const identity = (_key: string, value: unknown) => value;
    assert.deepEqual(engine.parse('[[[1]]]', identity), [[[1]]]);

    const deepen = function (this: unknown[], key: string, value: unknown) {
        if (key === '0') this[1] = [[[[1]]]];
        return value;
    };
    assert.throws(() => engine.parse('[1,2]', deepen), ResourceExhaustedError);
});

test('well-formed text nested past maxDepth is a resource error, not a syntax error', () => {
    const engine = new JsonEngine(nativeHost, { maxDepth: 4 });
    const depth = 5;
    assert.deepEqual(engine.parse('['.repeat(depth - 1) + ']'.repeat(depth - 1)), [[[[]]]]);
    assert.throws(() => engine.parse('['.repeat(depth) + ']'.repeat(depth)), (err: unknown) => {
        if (!(err instanceof ResourceExhaustedError)) return false;
        assert.ok(err instanceof RangeError);
        assert.equal(err.message, 'Maximum nesting depth 4 exceeded');
        assert.deepEqual(err.toStructured().context, { depth: 4, position: 4 });
        return true;
    });
});

test('a reviver that freezes its holder does not abort the parse', () => {
    const result = parse('{"a":1,"b":[1]}', function (this: object, key: string, value: unknown) {
        if (key === 'a') {
            Object.freeze(this);
            return 2;
        }
        return value;
    });
    assert.deepEqual(result, { a: 1, b: [1] });
    assert.ok(Object.isFrozen(result));

    const locked = parse('[1,2]', function (this: unknown[], key: string, value: unknown) {
        if (key === '0') Object.defineProperty(this, '1', { value: 9, configurable: false, writable: false, enumerable: true });
        return key === '1' ? 3 : value;
    });
    assert.deepEqual(locked, [1, 9]);
});
