/**
 * Parse/Revive Engine
 *
 * Runs the tokenizer and, when a callable reviver is supplied, the post-order
 * "Walk": children are revived before their parent, arrays index by index,
 * objects over a snapshot of their own enumerable keys taken before descending.
 */

import { EngineLimits } from './config';
import { parseText } from './json_tokenizer';
import { Logger } from './logger';
import { JsonSyntaxError, ResourceExhaustedError } from './structured_error';
import { HostModel, elementAt, isObjectLike, lengthOf } from './value_model';

export interface ParseRequest<V> {
    host: HostModel<V>;
    limits: EngineLimits;
    logger: Logger;
}

export class ReviveWalk<V> {
    private depth = 0;

    constructor(
        private readonly host: HostModel<V>,
        private readonly reviver: V,
        private readonly limits: EngineLimits
    ) {}

    /** Revive `root` as the sole property of a fresh holder under the empty key. */
    run(root: V): V {
        const holder = this.host.createObject();
        this.host.defineProperty(holder, '', root);
        return this.walk(holder, '');
    }

    private walk(holder: V, key: string, index?: number): V {
        const host = this.host;
        const value = index === undefined ? host.getProperty(holder, key) : elementAt(host, holder, index);
        const kind = host.typeKind(value);

        if (isObjectLike(kind) || kind === 'callable') {
            if (this.depth >= this.limits.maxDepth) {
                throw new ResourceExhaustedError(this.limits.maxDepth, { key });
            }
            this.depth++;
            try {
                if (host.isArray(value)) {
                    const length = lengthOf(host, value);
                    for (let i = 0; i < length; i++) {
                        this.replaceMember(value, String(i), this.walk(value, String(i), i));
                    }
                } else {
                    for (const name of host.ownEnumerableKeys(value)) {
                        this.replaceMember(value, name, this.walk(value, name));
                    }
                }
            } finally {
                this.depth--;
            }
        }

        return host.invoke(this.reviver, holder, [host.stringValue(key), value]);
    }

    private replaceMember(target: V, key: string, revived: V): void {
        if (this.host.typeKind(revived) === 'undefined') {
            this.host.deleteProperty(target, key);
        } else {
            this.host.defineProperty(target, key, revived);
        }
    }
}

/**
 * `text === undefined` means the argument was not supplied.
 */
export function parseJson<V>(request: ParseRequest<V>, text: V | undefined, reviver: V | undefined): V {
    const { host, limits, logger } = request;
    if (text === undefined) {
        throw new JsonSyntaxError('No JSON text to parse');
    }

    const source = host.toString(text);
    const outcome = parseText(source, host, { maxDepth: limits.maxDepth });
    if (!outcome.ok) {
        logger.debug('parse failed', { kind: outcome.kind, offset: outcome.error.offset, message: outcome.error.message });
        if (outcome.kind === 'depth') {
            throw new ResourceExhaustedError(limits.maxDepth, { position: outcome.error.offset });
        }
        throw new JsonSyntaxError(outcome.error.message, outcome.error.offset, { length: source.length });
    }

    if (reviver === undefined || !host.isCallable(reviver)) {
        return outcome.value;
    }
    return new ReviveWalk(host, reviver, limits).run(outcome.value);
}
