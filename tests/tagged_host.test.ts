import test from 'node:test';
import assert from 'node:assert/strict';

import { JsonEngine } from '../src/json_engine';
import { CircularStructureError, InternalInvariantError, JsonSyntaxError } from '../src/structured_error';
import { createTaggedHost } from '../src/tagged_host';
import {
    NULL,
    UNDEFINED,
    Value,
    arr,
    bool,
    boxedBool,
    boxedNum,
    boxedStr,
    defineAccessor,
    defineHidden,
    fn,
    fromNative,
    hostObject,
    int64,
    num,
    obj,
    objFromEntries,
    str,
    sym,
    toNative,
} from '../src/value';

const host = createTaggedHost();
const engine = new JsonEngine(host);

function keyText(key: Value): string {
    return key.kind === 'string' ? key.value : '?';
}

test('own keys: indices ascending, then insertion order', () => {
    const value = objFromEntries([
        ['b', num(1)],
        ['2', str('x')],
        ['a', bool(true)],
        ['1', NULL],
    ]);
    assert.deepEqual(host.ownEnumerableKeys(value), ['1', '2', 'b', 'a']);
    assert.equal(engine.stringify(value), '{"1":null,"2":"x","b":1,"a":true}');
});

test('boxed values unwrap and int64 prints every digit', () => {
    assert.equal(engine.stringify(arr(boxedNum(3), boxedStr('s'), boxedBool(false))), '[3,"s",false]');
    assert.equal(engine.stringify(int64(9007199254740993n)), '9007199254740993');
});

test('holes and undefined elements print as null', () => {
    assert.equal(engine.stringify(arr(num(1), undefined, UNDEFINED)), '[1,null,null]');
});

test('non-enumerable, callable and symbol members are omitted', () => {
    const value = obj({ f: fn('f', () => UNDEFINED), s: sym('x'), n: NULL });
    defineHidden(value, 'hidden', num(2));
    assert.equal(engine.stringify(value), '{"n":null}');
});

test('accessors run once with the holder as receiver', () => {
    const value = obj({ a: num(1) });
    let reads = 0;
    defineAccessor(value, 'g', (receiver) => {
        reads++;
        return receiver === value ? str('self') : str('other');
    });
    assert.equal(engine.stringify(value), '{"a":1,"g":"self"}');
    assert.equal(reads, 1);
});

test('toJSON is found on the prototype chain', () => {
    const proto = obj();
    defineHidden(proto, 'toJSON', fn('toJSON', (_self, [key]) => str(`custom:${keyText(key)}`)));
    const child = obj({ x: num(1) }, proto);
    assert.equal(engine.stringify(obj({ c: child })), '{"c":"custom:c"}');
});

test('inherited members are read by key lists but not enumerated', () => {
    const child = obj({ own: num(2) }, obj({ inherited: num(1) }));
    assert.equal(engine.stringify(child), '{"own":2}');
    assert.equal(engine.stringify(child, arr(str('inherited'))), '{"inherited":1}');
});

test('host objects serialize through their enumerable slots', () => {
    assert.equal(engine.stringify(hostObject('Handle', { id: num(7) })), '{"id":7}');
    assert.equal(host.toString(hostObject('Handle')), '[object Handle]');
});

test('cycles are detected by identity', () => {
    const value = obj();
    value.properties.set('self', { type: 'data', value, enumerable: true });
    assert.throws(() => engine.stringify(value), CircularStructureError);
});

test('replacer callable and key list', () => {
    const dropB = fn('dropB', (_holder, [key, value]) => keyText(key) === 'b' ? UNDEFINED : value);
    assert.equal(engine.stringify(obj({ a: num(1), b: num(2) }), dropB), '{"a":1}');

    const keys = arr(str('b'), num(1), boxedStr('a'), bool(true), str('b'));
    assert.equal(engine.stringify(objFromEntries([['a', num(1)], ['b', num(2)], ['1', num(3)]]), keys), '{"b":2,"1":3,"a":1}');
});

test('space accepts numbers and strings', () => {
    assert.equal(engine.stringify(arr(num(1)), undefined, num(2)), '[\n  1\n]');
    assert.equal(engine.stringify(arr(num(1)), undefined, str('--')), '[\n--1\n]');
    assert.equal(engine.stringify(arr(num(1)), undefined, boxedNum(1)), '[\n 1\n]');
});

test('parse builds tagged values in source order', () => {
    const parsed = engine.parse(str('{"b":1,"2":[true,null],"a":"s"}'));
    assert.deepEqual(toNative(parsed), { b: 1, '2': [true, null], a: 's' });
    assert.equal(engine.stringify(parsed), '{"2":[true,null],"b":1,"a":"s"}');
});

test('parse with a tagged reviver', () => {
    const timesTen = fn('timesTen', (_holder, [, value]) => value.kind === 'number' ? num(value.value * 10) : value);
    assert.equal(engine.stringify(engine.parse(str('[1,[2]]'), timesTen)), '[10,[20]]');
});

test('reviver deletion leaves an array hole', () => {
    const dropTwo = fn('dropTwo', (_holder, [, value]) => value.kind === 'number' && value.value === 2 ? UNDEFINED : value);
    const result = engine.parse(str('[1,2,3]'), dropTwo);
    if (result.kind !== 'array') throw new Error(`expected array, got ${result.kind}`);
    assert.equal(result.elements.length, 3);
    assert.equal(result.elements[1], undefined);
    assert.equal(engine.stringify(result), '[1,null,3]');
});

test('__proto__ is an ordinary key', () => {
    const result = engine.parse(str('{"__proto__":1}'));
    if (result.kind !== 'object') throw new Error(`expected object, got ${result.kind}`);
    assert.deepEqual([...result.properties.keys()], ['__proto__']);
    assert.equal(result.prototype, null);
});

test('parse without text is a syntax error', () => {
    assert.throws(() => engine.parse(), (err: unknown) => {
        if (!(err instanceof JsonSyntaxError)) return false;
        assert.equal(err.message, 'No JSON text to parse');
        return true;
    });
});

test('identity of a primitive breaks the host contract', () => {
    assert.throws(() => host.identity(num(1)), InternalInvariantError);
});

test('fromNative and toNative round trip plain data', () => {
    const data = { a: [1, 'two', null, true], b: { c: 12n } };
    assert.deepEqual(toNative(fromNative(data)), data);
    assert.equal(engine.stringify(fromNative(data)), '{"a":[1,"two",null,true],"b":{"c":12}}');
});
