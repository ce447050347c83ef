/**
 * Tagged value model
 *
 * A self-contained object model for embedders that do not serialize plain
 * JavaScript values: every value is a record discriminated by `kind`, objects
 * keep ordered property slots (data or accessor) and a prototype link, and
 * Boolean/Number/String carry a `boxed` flag for wrapper objects.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface UndefinedValue { readonly kind: 'undefined' }
export interface NullValue { readonly kind: 'null' }
export interface BooleanValue { readonly kind: 'boolean'; readonly value: boolean; readonly boxed: boolean }
export interface NumberValue { readonly kind: 'number'; readonly value: number; readonly boxed: boolean }
export interface Int64Value { readonly kind: 'int64'; readonly value: bigint }
export interface StringValue { readonly kind: 'string'; readonly value: string; readonly boxed: boolean }
export interface SymbolValue { readonly kind: 'symbol'; readonly description: string }

export type PropertySlot =
    | { readonly type: 'data'; value: Value; enumerable: boolean }
    | { readonly type: 'accessor'; get: (receiver: Value) => Value; enumerable: boolean };

export interface ArrayValue {
    readonly kind: 'array';
    /** `undefined` entries are holes. */
    readonly elements: Array<Value | undefined>;
}

export interface ObjectValue {
    readonly kind: 'object';
    readonly properties: Map<string, PropertySlot>;
    prototype: ObjectValue | null;
}

export type NativeCall = (thisValue: Value, args: Value[]) => Value;

export interface CallableValue {
    readonly kind: 'callable';
    readonly name: string;
    readonly call: NativeCall;
    readonly properties: Map<string, PropertySlot>;
    prototype: ObjectValue | null;
}

/** Any other host object (a date, a handle...): serialized through its enumerable slots. */
export interface HostObjectValue {
    readonly kind: 'host_object';
    readonly tag: string;
    readonly properties: Map<string, PropertySlot>;
    prototype: ObjectValue | null;
}

export type Value =
    | UndefinedValue
    | NullValue
    | BooleanValue
    | NumberValue
    | Int64Value
    | StringValue
    | SymbolValue
    | ArrayValue
    | ObjectValue
    | CallableValue
    | HostObjectValue;

/** Values that own property slots. */
export type SlottedValue = ObjectValue | CallableValue | HostObjectValue;

/* -------------------------------------------------------------------------- */
/* Constructors                                                               */
/* -------------------------------------------------------------------------- */

export const UNDEFINED: UndefinedValue = Object.freeze({ kind: 'undefined' });
export const NULL: NullValue = Object.freeze({ kind: 'null' });

export function bool(value: boolean): BooleanValue {
    return { kind: 'boolean', value, boxed: false };
}

export function num(value: number): NumberValue {
    return { kind: 'number', value, boxed: false };
}

export function int64(value: bigint): Int64Value {
    return { kind: 'int64', value };
}

export function str(value: string): StringValue {
    return { kind: 'string', value, boxed: false };
}

export function sym(description: string): SymbolValue {
    return { kind: 'symbol', description };
}

export function boxedBool(value: boolean): BooleanValue {
    return { kind: 'boolean', value, boxed: true };
}

export function boxedNum(value: number): NumberValue {
    return { kind: 'number', value, boxed: true };
}

export function boxedStr(value: string): StringValue {
    return { kind: 'string', value, boxed: true };
}

export function arr(...elements: Array<Value | undefined>): ArrayValue {
    return { kind: 'array', elements };
}

function slotsFrom(entries: Iterable<readonly [string, Value]>): Map<string, PropertySlot> {
    const properties = new Map<string, PropertySlot>();
    for (const [key, value] of entries) {
        properties.set(key, { type: 'data', value, enumerable: true });
    }
    return properties;
}

export function obj(entries: Record<string, Value> = {}, prototype: ObjectValue | null = null): ObjectValue {
    return objFromEntries(Object.entries(entries), prototype);
}

export function objFromEntries(entries: Iterable<readonly [string, Value]>, prototype: ObjectValue | null = null): ObjectValue {
    return { kind: 'object', properties: slotsFrom(entries), prototype };
}

export function fn(name: string, call: NativeCall): CallableValue {
    return { kind: 'callable', name, call, properties: new Map(), prototype: null };
}

export function hostObject(tag: string, entries: Record<string, Value> = {}, prototype: ObjectValue | null = null): HostObjectValue {
    return { kind: 'host_object', tag, properties: slotsFrom(Object.entries(entries)), prototype };
}

export function isSlotted(value: Value): value is SlottedValue {
    return value.kind === 'object' || value.kind === 'callable' || value.kind === 'host_object';
}

/** Install a getter; it runs on every read with the holder as receiver. */
export function defineAccessor(target: SlottedValue, key: string, get: (receiver: Value) => Value, enumerable = true): void {
    target.properties.set(key, { type: 'accessor', get, enumerable });
}

export function defineHidden(target: SlottedValue, key: string, value: Value): void {
    target.properties.set(key, { type: 'data', value, enumerable: false });
}

/* -------------------------------------------------------------------------- */
/* Native conversion                                                          */
/* -------------------------------------------------------------------------- */

/**
 * Build a tagged tree from plain data (null, booleans, numbers, bigints,
 * strings, arrays, plain objects, undefined).
 */
export function fromNative(input: unknown): Value {
    if (input === undefined) return UNDEFINED;
    if (input === null) return NULL;
    if (typeof input === 'boolean') return bool(input);
    if (typeof input === 'number') return num(input);
    if (typeof input === 'bigint') return int64(input);
    if (typeof input === 'string') return str(input);
    if (typeof input === 'symbol') return sym(input.description ?? '');
    if (typeof input !== 'object') throw new TypeError('fromNative cannot convert functions; use fn()');
    if (Array.isArray(input)) {
        const elements: Array<Value | undefined> = [];
        for (let i = 0; i < input.length; i++) {
            elements.push(i in input ? fromNative(input[i]) : undefined);
        }
        return arr(...elements);
    }
    return objFromEntries(Object.entries(input).map(([key, value]): [string, Value] => [key, fromNative(value)]));
}

/**
 * Inverse of fromNative for inspection: getters run, boxed values unbox,
 * holes stay holes, callables and symbols become undefined.
 */
export function toNative(value: Value): unknown {
    switch (value.kind) {
        case 'undefined': return undefined;
        case 'null': return null;
        case 'boolean':
        case 'number':
        case 'int64':
        case 'string':
            return value.value;
        case 'symbol':
        case 'callable':
            return undefined;
        case 'array': {
            const out: unknown[] = new Array(value.elements.length);
            value.elements.forEach((element, index) => {
                if (element !== undefined) out[index] = toNative(element);
            });
            return out;
        }
        case 'object':
        case 'host_object': {
            const out: Record<string, unknown> = {};
            for (const [key, slot] of value.properties) {
                if (!slot.enumerable) continue;
                const resolved = slot.type === 'data' ? slot.value : slot.get(value);
                Object.defineProperty(out, key, { value: toNative(resolved), enumerable: true, writable: true, configurable: true });
            }
            return out;
        }
    }
}
