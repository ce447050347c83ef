/**
 * Tagged host: the capability interface over the `Value` union from ./value.
 */

import { InternalInvariantError } from './structured_error';
import {
    NULL,
    UNDEFINED,
    Value,
    SlottedValue,
    arr,
    bool,
    isSlotted,
    num,
    obj,
    str,
} from './value';
import { HostModel, TypeKind, ValueIdentity, isArrayIndex, orderOwnKeys } from './value_model';

function typeKind(value: Value): TypeKind {
    switch (value.kind) {
        case 'boolean': return value.boxed ? 'boxed_boolean' : 'boolean';
        case 'number': return value.boxed ? 'boxed_number' : 'number';
        case 'string': return value.boxed ? 'boxed_string' : 'string';
        default: return value.kind;
    }
}

function isBoxed(value: Value): boolean {
    return (value.kind === 'boolean' || value.kind === 'number' || value.kind === 'string') && value.boxed;
}

/** Own-then-prototype lookup; getters run against the original receiver. */
function getSlotted(target: SlottedValue, key: string, receiver: Value): Value {
    let current: SlottedValue | null = target;
    while (current !== null) {
        const slot = current.properties.get(key);
        if (slot !== undefined) {
            return slot.type === 'data' ? slot.value : slot.get(receiver);
        }
        current = current.prototype;
    }
    return UNDEFINED;
}

function numberToString(n: number): string {
    // ES Number::toString; -0 prints as "0"
    return String(n);
}

function coerceToString(value: Value): string {
    switch (value.kind) {
        case 'undefined': return 'undefined';
        case 'null': return 'null';
        case 'boolean': return value.value ? 'true' : 'false';
        case 'number': return numberToString(value.value);
        case 'int64': return value.value.toString();
        case 'string': return value.value;
        case 'symbol': throw new TypeError('Cannot convert a Symbol value to a string');
        case 'array': return value.elements.map((e) => e === undefined || e.kind === 'undefined' || e.kind === 'null' ? '' : coerceToString(e)).join(',');
        case 'callable': return `function ${value.name}() { [native code] }`;
        case 'object': return '[object Object]';
        case 'host_object': return `[object ${value.tag}]`;
    }
}

function coerceToNumber(value: Value): number {
    switch (value.kind) {
        case 'undefined': return NaN;
        case 'null': return 0;
        case 'boolean': return value.value ? 1 : 0;
        case 'number': return value.value;
        case 'int64': return Number(value.value);
        case 'string': return Number(value.value);
        case 'symbol': throw new TypeError('Cannot convert a Symbol value to a number');
        default: return Number(coerceToString(value));
    }
}

function requireSlotted(value: Value, operation: string): SlottedValue {
    if (isSlotted(value)) return value;
    throw new InternalInvariantError(`${operation} expects an object, got ${value.kind}`, { operation });
}

function getTaggedProperty(holder: Value, key: string): Value {
    if (holder.kind === 'array') {
        if (key === 'length') return num(holder.elements.length);
        if (isArrayIndex(key)) return holder.elements[Number(key)] ?? UNDEFINED;
        return UNDEFINED;
    }
    if (holder.kind === 'string' && holder.boxed) {
        if (key === 'length') return num(holder.value.length);
        if (isArrayIndex(key) && Number(key) < holder.value.length) return str(holder.value[Number(key)]);
        return UNDEFINED;
    }
    if (isSlotted(holder)) return getSlotted(holder, key, holder);
    if (isBoxed(holder)) return UNDEFINED;
    throw new InternalInvariantError(`getProperty on primitive ${holder.kind}`, { key });
}

export function createTaggedHost(): HostModel<Value> {
    return {
        typeKind,

        isArray: (value) => value.kind === 'array',

        isCallable: (value) => value.kind === 'callable',

        identity(value): ValueIdentity {
            if (value.kind === 'array' || isSlotted(value) || isBoxed(value)) return value;
            throw new InternalInvariantError(`identity requested for primitive ${value.kind}`, { kind: value.kind });
        },

        ownEnumerableKeys(value) {
            if (value.kind === 'array') {
                const keys: string[] = [];
                value.elements.forEach((element, index) => {
                    if (element !== undefined) keys.push(String(index));
                });
                return keys;
            }
            if (value.kind === 'string' && value.boxed) {
                return Array.from({ length: value.value.length }, (_, i) => String(i));
            }
            if (!isSlotted(value)) return [];
            const enumerable: string[] = [];
            for (const [key, slot] of value.properties) {
                if (slot.enumerable) enumerable.push(key);
            }
            return orderOwnKeys(enumerable);
        },

        getProperty: getTaggedProperty,

        getIndex(holder, index) {
            if (holder.kind === 'array') return holder.elements[index] ?? UNDEFINED;
            return getTaggedProperty(holder, String(index));
        },

        invoke(callable, thisValue, args) {
            if (callable.kind !== 'callable') {
                throw new InternalInvariantError('invoke expects a callable', { kind: callable.kind });
            }
            return callable.call(thisValue, args);
        },

        arrayLength(value) {
            return value.kind === 'array' ? value.elements.length : undefined;
        },

        lookupToJSON(value) {
            if (!isSlotted(value)) return undefined;
            const toJSON = getSlotted(value, 'toJSON', value);
            return toJSON.kind === 'callable' ? toJSON : undefined;
        },

        toString: coerceToString,
        toNumber: coerceToNumber,

        toBoolean(value) {
            switch (value.kind) {
                case 'undefined':
                case 'null':
                    return false;
                case 'boolean': return value.value;
                case 'number': return value.boxed || !(value.value === 0 || Number.isNaN(value.value));
                case 'int64': return value.value !== 0n;
                case 'string': return value.boxed || value.value.length > 0;
                default: return true;
            }
        },

        undefinedValue: () => UNDEFINED,
        nullValue: () => NULL,
        booleanValue: bool,
        numberValue: num,
        stringValue: str,
        createObject: () => obj(),
        createArray: () => arr(),

        defineProperty(target, key, value) {
            if (target.kind === 'array' && isArrayIndex(key)) {
                const index = Number(key);
                while (target.elements.length < index) target.elements.push(undefined);
                target.elements[index] = value;
                return;
            }
            requireSlotted(target, 'defineProperty').properties.set(key, { type: 'data', value, enumerable: true });
        },

        deleteProperty(target, key) {
            if (target.kind === 'array') {
                if (isArrayIndex(key) && Number(key) < target.elements.length) {
                    target.elements[Number(key)] = undefined;
                }
                return;
            }
            requireSlotted(target, 'deleteProperty').properties.delete(key);
        },
    };
}
