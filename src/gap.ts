/**
 * Gap Configuration: resolves the `space` argument of stringify into an
 * indentation unit and the separators derived from it.
 */

import { MAX_GAP_LENGTH } from './config';
import { ValueCapabilities } from './value_model';

export interface GapConfig {
    /** Indentation unit, at most MAX_GAP_LENGTH code units; empty means compact output. */
    readonly indent: string;
    /** `:` or `: ` */
    readonly propertySeparator: string;
}

export const COMPACT_GAP: GapConfig = Object.freeze({ indent: '', propertySeparator: ':' });

export function gapFromIndent(indent: string): GapConfig {
    const unit = indent.slice(0, MAX_GAP_LENGTH);
    return unit === '' ? COMPACT_GAP : { indent: unit, propertySeparator: ': ' };
}

export function resolveGap<V>(host: ValueCapabilities<V>, space: V | undefined): GapConfig {
    if (space === undefined) return COMPACT_GAP;

    switch (host.typeKind(space)) {
        case 'number':
        case 'int64':
        case 'boxed_number': {
            const n = host.toNumber(space);
            if (!Number.isFinite(n)) return COMPACT_GAP;
            const width = Math.min(MAX_GAP_LENGTH, Math.max(0, Math.trunc(n)));
            return gapFromIndent(' '.repeat(width));
        }
        case 'string':
        case 'boxed_string':
            return gapFromIndent(host.toString(space));
        default:
            return COMPACT_GAP;
    }
}

/**
 * Builds `gap * depth` strings once per depth for the lifetime of a session.
 */
export class IndentCache {
    private readonly levels: string[] = [''];

    constructor(private readonly gap: GapConfig) {}

    at(depth: number): string {
        if (this.gap.indent === '') return '';
        for (let level = this.levels.length; level <= depth; level++) {
            this.levels.push(this.levels[level - 1] + this.gap.indent);
        }
        return this.levels[depth];
    }

    /** `,` or `,\n` followed by the indentation for `depth`. */
    memberSeparator(depth: number): string {
        return this.gap.indent === '' ? ',' : `,\n${this.at(depth)}`;
    }
}
