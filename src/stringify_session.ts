/**
 * Stringify Engine
 *
 * One StringifySession serves one stringify() call. It owns the resolved
 * replacer and gap, the ancestor stack used for cycle detection and the current
 * indentation depth. toJSON, replacer callbacks and getters may reenter `str`
 * on the same session; every object/array entry re-checks the ancestor stack.
 */

import { EngineLimits } from './config';
import { GapConfig, IndentCache } from './gap';
import { Logger } from './logger';
import { quote, quoteKey } from './quote';
import { ReplacerConfig } from './replacer';
import {
    CircularStructureError,
    OutOfBoundStringError,
    ResourceExhaustedError,
} from './structured_error';
import { HostModel, ValueIdentity, elementAt, isObjectLike, lengthOf } from './value_model';

/** Result of `str` for values JSON has no representation for (undefined, symbols, functions). */
export const NOT_SERIALIZABLE: unique symbol = Symbol('not-serializable');

export type StrResult = string | typeof NOT_SERIALIZABLE;

/**
 * Identities of the objects/arrays currently being serialized.
 */
export class AncestorStack {
    private readonly stack: ValueIdentity[] = [];
    private readonly members = new Set<ValueIdentity>();

    has(identity: ValueIdentity): boolean {
        return this.members.has(identity);
    }

    get depth(): number {
        return this.stack.length;
    }

    /** Runs `body` with `identity` on the stack; the entry is removed on every exit path. */
    within<T>(identity: ValueIdentity, body: () => T): T {
        this.stack.push(identity);
        this.members.add(identity);
        try {
            return body();
        } finally {
            this.stack.pop();
            this.members.delete(identity);
        }
    }
}

export interface StringifySessionOptions<V> {
    host: HostModel<V>;
    replacer: ReplacerConfig<V>;
    gap: GapConfig;
    limits: EngineLimits;
    logger: Logger;
}

export class StringifySession<V> {
    private readonly host: HostModel<V>;
    private readonly replacer: ReplacerConfig<V>;
    private readonly gap: GapConfig;
    private readonly limits: EngineLimits;
    private readonly logger: Logger;
    private readonly indents: IndentCache;
    private readonly ancestors = new AncestorStack();
    private indent = 0;

    constructor(opts: StringifySessionOptions<V>) {
        this.host = opts.host;
        this.replacer = opts.replacer;
        this.gap = opts.gap;
        this.limits = opts.limits;
        this.logger = opts.logger;
        this.indents = new IndentCache(opts.gap);
    }

    /**
     * Serialize `value` as the sole property of a fresh wrapper under the
     * empty key, so the root sees the same toJSON/replacer pipeline as members.
     */
    run(value: V): string | undefined {
        const wrapper = this.host.createObject();
        this.host.defineProperty(wrapper, '', value);
        const result = this.str('', wrapper);
        return result === NOT_SERIALIZABLE ? undefined : result;
    }

    /* ---------------------------------------------------------------------- */
    /* Str                                                                    */
    /* ---------------------------------------------------------------------- */

    str(key: string, holder: V, index?: number): StrResult {
        const host = this.host;
        let value = index === undefined ? host.getProperty(holder, key) : elementAt(host, holder, index);

        let kind = host.typeKind(value);
        if (isObjectLike(kind) || kind === 'callable') {
            const toJSON = host.lookupToJSON(value);
            if (toJSON !== undefined) {
                value = host.invoke(toJSON, value, [host.stringValue(key)]);
                kind = host.typeKind(value);
            }
        }

        if (this.replacer.type === 'function') {
            value = host.invoke(this.replacer.fn, holder, [host.stringValue(key), value]);
            kind = host.typeKind(value);
        }

        switch (kind) {
            case 'boxed_number':
                value = host.numberValue(host.toNumber(value));
                kind = 'number';
                break;
            case 'boxed_string':
                value = host.stringValue(host.toString(value));
                kind = 'string';
                break;
            case 'boxed_boolean':
                value = host.booleanValue(host.toBoolean(value));
                kind = 'boolean';
                break;
            default:
                break;
        }

        switch (kind) {
            case 'undefined':
            case 'symbol':
            case 'callable':
                return NOT_SERIALIZABLE;
            case 'null':
                return 'null';
            case 'boolean':
                return host.toBoolean(value) ? 'true' : 'false';
            case 'number': {
                const n = host.toNumber(value);
                return Number.isFinite(n) ? String(n) : 'null';
            }
            case 'int64':
                return host.toString(value);
            case 'string':
                return quote(host.toString(value));
            default:
                return this.serializeStructure(key, value);
        }
    }

    private serializeStructure(key: string, value: V): string {
        const identity = this.host.identity(value);
        if (this.ancestors.has(identity)) {
            this.logger.debug('circular structure', { key, depth: this.ancestors.depth });
            throw new CircularStructureError(key, { depth: this.ancestors.depth });
        }
        if (this.ancestors.depth >= this.limits.maxDepth) {
            throw new ResourceExhaustedError(this.limits.maxDepth, { key });
        }

        return this.ancestors.within(identity, () =>
            this.host.isArray(value) ? this.serializeArray(value) : this.serializeObject(value)
        );
    }

    /* ---------------------------------------------------------------------- */
    /* StringifyObject / StringifyArray                                       */
    /* ---------------------------------------------------------------------- */

    private serializeObject(value: V): string {
        const stepBack = this.indent++;
        try {
            const names = this.replacer.type === 'keys'
                ? this.replacer.keys
                : this.host.ownEnumerableKeys(value);

            const members: string[] = [];
            for (const name of names) {
                const serialized = this.str(name, value);
                if (serialized === NOT_SERIALIZABLE) continue;
                members.push(quoteKey(name) + this.gap.propertySeparator + serialized);
            }

            if (members.length === 0) return '{}';
            return this.wrap('{', members, '}', stepBack);
        } finally {
            this.indent = stepBack;
        }
    }

    private serializeArray(value: V): string {
        const stepBack = this.indent++;
        try {
            const length = lengthOf(this.host, value);
            if (length >= this.limits.maxStringLength) {
                throw new OutOfBoundStringError(length, this.limits.maxStringLength);
            }
            if (length === 0) return '[]';

            const elements: string[] = new Array(length);
            for (let i = 0; i < length; i++) {
                const serialized = this.str(String(i), value, i);
                elements[i] = serialized === NOT_SERIALIZABLE ? 'null' : serialized;
            }
            return this.wrap('[', elements, ']', stepBack);
        } finally {
            this.indent = stepBack;
        }
    }

    private wrap(open: string, parts: string[], close: string, stepBack: number): string {
        if (this.gap.indent === '') {
            return open + parts.join(',') + close;
        }
        const inner = this.indents.at(this.indent);
        const outer = this.indents.at(stepBack);
        return `${open}\n${inner}${parts.join(this.indents.memberSeparator(this.indent))}\n${outer}${close}`;
    }
}
