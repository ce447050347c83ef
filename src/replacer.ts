/**
 * Replacer Configuration: resolves the `replacer` argument of stringify.
 *
 * An array replacer becomes an ordered, de-duplicated allow-list of property
 * names; a callable is kept as-is; anything else means "no replacer".
 * Unusable allow-list entries are skipped, never reported.
 */

import { TypeKind, ValueCapabilities, elementAt, lengthOf } from './value_model';

export type ReplacerConfig<V> =
    | { readonly type: 'none' }
    | { readonly type: 'keys'; readonly keys: readonly string[] }
    | { readonly type: 'function'; readonly fn: V };

const NO_REPLACER = Object.freeze({ type: 'none' as const });

const KEY_KINDS: ReadonlySet<TypeKind> = new Set<TypeKind>([
    'number',
    'int64',
    'string',
    'boxed_number',
    'boxed_string',
]);

export function resolveReplacer<V>(host: ValueCapabilities<V>, replacer: V | undefined): ReplacerConfig<V> {
    if (replacer === undefined) return NO_REPLACER;
    if (host.isCallable(replacer)) return { type: 'function', fn: replacer };
    if (!host.isArray(replacer)) return NO_REPLACER;

    const length = lengthOf(host, replacer);
    const seen = new Set<string>();
    const keys: string[] = [];

    for (let i = 0; i < length; i++) {
        const item = elementAt(host, replacer, i);
        const kind = host.typeKind(item);
        if (!KEY_KINDS.has(kind)) continue;

        const name = host.toString(item);
        if (seen.has(name)) continue;
        seen.add(name);
        keys.push(name);
    }

    return { type: 'keys', keys };
}

export function describeReplacer<V>(config: ReplacerConfig<V>): string {
    return config.type === 'keys' ? `keys(${config.keys.length})` : config.type;
}
