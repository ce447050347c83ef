/**
 * Value Capability Interface
 *
 * The engine never inspects host values directly. Everything it needs to know
 * about a value (its kind, keys, properties, callability) goes through a
 * `HostModel<V>`, so the same stringify/parse algorithms run over plain
 * JavaScript values (native_host) or over the tagged `Value` union (tagged_host).
 */

export type TypeKind =
    | 'undefined'
    | 'null'
    | 'boolean'
    | 'number'
    | 'int64'
    | 'string'
    | 'symbol'
    | 'boxed_boolean'
    | 'boxed_number'
    | 'boxed_string'
    | 'array'
    | 'object'
    | 'callable'
    | 'host_object';

/** Handle compared by reference for cycle detection. */
export type ValueIdentity = object;

export interface ValueCapabilities<V> {
    typeKind(value: V): TypeKind;
    isArray(value: V): boolean;
    isCallable(value: V): boolean;
    identity(value: V): ValueIdentity;

    /**
     * Own enumerable string keys, integer-like keys first in ascending order,
     * then insertion order. Must be a snapshot: later mutations are not reflected.
     */
    ownEnumerableKeys(value: V): string[];

    /** [[Get]]; may run host getters. */
    getProperty(holder: V, key: string): V;

    /** Optional fast path for `getProperty(holder, String(index))` on native arrays. */
    getIndex?(holder: V, index: number): V;

    invoke(callable: V, thisValue: V, args: V[]): V;

    /** Intrinsic length of a native array, or undefined when it must be read via ToLength(Get(value, "length")). */
    arrayLength(value: V): number | undefined;

    /** A callable `toJSON` reachable from the value (own or inherited), if any. */
    lookupToJSON(value: V): V | undefined;

    toString(value: V): string;
    toNumber(value: V): number;
    /** Boolean data of a primitive or boxed boolean. */
    toBoolean(value: V): boolean;
}

export interface ValueBuilder<V> {
    undefinedValue(): V;
    nullValue(): V;
    booleanValue(value: boolean): V;
    numberValue(value: number): V;
    stringValue(value: string): V;
    createObject(): V;
    createArray(): V;

    /** CreateDataProperty: always an own, enumerable, writable data property. */
    defineProperty(target: V, key: string, value: V): void;
    deleteProperty(target: V, key: string): void;
}

export type HostModel<V> = ValueCapabilities<V> & ValueBuilder<V>;

/* -------------------------------------------------------------------------- */
/* Shared helpers                                                             */
/* -------------------------------------------------------------------------- */

const OBJECT_LIKE: ReadonlySet<TypeKind> = new Set<TypeKind>([
    'boxed_boolean',
    'boxed_number',
    'boxed_string',
    'array',
    'object',
    'host_object',
]);

export function isObjectLike(kind: TypeKind): boolean {
    return OBJECT_LIKE.has(kind);
}

const ARRAY_INDEX = /^(?:0|[1-9]\d*)$/;
const MAX_ARRAY_INDEX = 2 ** 32 - 2;

/** Canonical array index ("0", "17"), as opposed to "01" or "-1". */
export function isArrayIndex(key: string): boolean {
    return ARRAY_INDEX.test(key) && Number(key) <= MAX_ARRAY_INDEX;
}

/** ES ToIntegerOrInfinity. */
export function toIntegerOrInfinity(n: number): number {
    if (Number.isNaN(n) || n === 0) return 0;
    if (!Number.isFinite(n)) return n;
    return Math.trunc(n);
}

/** ES ToLength over an already-coerced number. */
export function toLength(n: number): number {
    const len = toIntegerOrInfinity(n);
    if (len <= 0) return 0;
    return Math.min(len, Number.MAX_SAFE_INTEGER);
}

/**
 * Orders keys the way ordinary objects enumerate them: array indices ascending,
 * then everything else in the given (insertion) order.
 */
export function orderOwnKeys(keys: Iterable<string>): string[] {
    const indices: string[] = [];
    const named: string[] = [];
    for (const key of keys) {
        if (isArrayIndex(key)) indices.push(key);
        else named.push(key);
    }
    indices.sort((a, b) => Number(a) - Number(b));
    return indices.concat(named);
}

/** Length of an array-like through the capability interface. */
export function lengthOf<V>(host: ValueCapabilities<V>, value: V): number {
    const intrinsic = host.arrayLength(value);
    if (intrinsic !== undefined) return intrinsic;
    return toLength(host.toNumber(host.getProperty(value, 'length')));
}

/** Element read with the `getIndex` fast path when the host offers one. */
export function elementAt<V>(host: ValueCapabilities<V>, value: V, index: number): V {
    if (host.getIndex && host.arrayLength(value) !== undefined) {
        return host.getIndex(value, index);
    }
    return host.getProperty(value, String(index));
}
