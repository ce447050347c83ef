/**
 * Native host: the capability interface over ordinary JavaScript values.
 *
 * Proxies are honoured through the normal Reflect operations; a Proxy wrapping
 * an array reports no intrinsic length, so its `length` goes through the trap.
 */

import { types } from 'util';
import { InternalInvariantError } from './structured_error';
import { HostModel, TypeKind, ValueIdentity } from './value_model';

function isObjectOrFunction(value: unknown): value is object {
    return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function asObject(value: unknown, operation: string): object {
    if (isObjectOrFunction(value)) return value;
    throw new InternalInvariantError(`${operation} expects an object, got ${value === null ? 'null' : typeof value}`, { operation });
}

function typeKind(value: unknown): TypeKind {
    if (value === null) return 'null';
    switch (typeof value) {
        case 'undefined': return 'undefined';
        case 'boolean': return 'boolean';
        case 'number': return 'number';
        case 'bigint': return 'int64';
        case 'string': return 'string';
        case 'symbol': return 'symbol';
        case 'function': return 'callable';
        default: break;
    }
    if (Array.isArray(value)) return 'array';
    if (types.isNumberObject(value)) return 'boxed_number';
    if (types.isStringObject(value)) return 'boxed_string';
    if (types.isBooleanObject(value)) return 'boxed_boolean';
    return 'object';
}

export const nativeHost: HostModel<unknown> = {
    typeKind,

    isArray: (value) => Array.isArray(value),

    isCallable: (value) => typeof value === 'function',

    identity(value): ValueIdentity {
        return asObject(value, 'identity');
    },

    ownEnumerableKeys(value) {
        // Object.keys already yields a fresh array in ordinary-object order
        return Object.keys(asObject(value, 'ownEnumerableKeys'));
    },

    getProperty(holder, key) {
        return Reflect.get(asObject(holder, 'getProperty'), key);
    },

    getIndex(holder, index) {
        if (Array.isArray(holder) && !types.isProxy(holder) && index < holder.length) {
            return holder[index];
        }
        return Reflect.get(asObject(holder, 'getIndex'), String(index));
    },

    invoke(callable, thisValue, args) {
        if (typeof callable !== 'function') {
            throw new InternalInvariantError('invoke expects a callable', { kind: typeKind(callable) });
        }
        return Reflect.apply(callable, thisValue, args);
    },

    arrayLength(value) {
        if (Array.isArray(value) && !types.isProxy(value)) return value.length;
        return undefined;
    },

    lookupToJSON(value) {
        if (!isObjectOrFunction(value)) return undefined;
        const toJSON: unknown = Reflect.get(value, 'toJSON');
        return typeof toJSON === 'function' ? toJSON : undefined;
    },

    toString: (value) => String(value),

    toNumber: (value) => Number(value),

    toBoolean(value) {
        if (types.isBooleanObject(value)) return value.valueOf();
        return Boolean(value);
    },

    undefinedValue: () => undefined,
    nullValue: () => null,
    booleanValue: (value) => value,
    numberValue: (value) => value,
    stringValue: (value) => value,
    createObject: () => ({}),
    createArray: () => [],

    // CreateDataProperty: a frozen or non-configurable target is left unchanged
    defineProperty(target, key, value) {
        Reflect.defineProperty(asObject(target, 'defineProperty'), key, {
            value,
            writable: true,
            enumerable: true,
            configurable: true,
        });
    },

    deleteProperty(target, key) {
        Reflect.deleteProperty(asObject(target, 'deleteProperty'), key);
    },
};
