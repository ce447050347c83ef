/**
 * JsonEngine - stringify/parse bound to one host model
 */

import { EngineLimits, resolveLimits } from './config';
import { resolveGap } from './gap';
import { Logger, createLogger } from './logger';
import { parseJson } from './parse_engine';
import { describeReplacer, resolveReplacer } from './replacer';
import { StringifySession } from './stringify_session';
import { isJsonEngineFailure } from './structured_error';
import { HostModel } from './value_model';

export interface EngineOptions extends Partial<EngineLimits> {
    logger?: Logger;
}

export class JsonEngine<V> {
    private readonly limits: EngineLimits;
    private readonly logger: Logger;

    constructor(private readonly host: HostModel<V>, options: EngineOptions = {}) {
        this.limits = resolveLimits(options);
        this.logger = options.logger ?? createLogger('jsoncore');
    }

    getLimits(): EngineLimits {
        return { ...this.limits };
    }

    /**
     * Serialize `value`. Returns undefined when the root has no JSON
     * representation (undefined, a symbol, a function, or a toJSON/replacer
     * result that is one of those).
     */
    stringify(value: V, replacer?: V, space?: V): string | undefined {
        const replacerConfig = resolveReplacer(this.host, replacer);
        const gap = resolveGap(this.host, space);
        const log = this.logger.child('stringify');
        log.debug('session start', { replacer: describeReplacer(replacerConfig), gap: gap.indent.length });

        const session = new StringifySession({
            host: this.host,
            replacer: replacerConfig,
            gap,
            limits: this.limits,
            logger: log,
        });

        try {
            return session.run(value);
        } catch (err) {
            if (isJsonEngineFailure(err)) {
                log.debug('session aborted', { code: err.code });
            }
            throw err;
        }
    }

    /**
     * Parse JSON text, optionally reviving the result. Omitting `text`
     * raises a JsonSyntaxError.
     */
    parse(text?: V, reviver?: V): V {
        return parseJson({ host: this.host, limits: this.limits, logger: this.logger.child('parse') }, text, reviver);
    }
}
