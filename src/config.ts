/**
 * Shared Configuration Constants
 *
 * Centralized limits for the JSON engine.
 * Values can be overridden via environment variables.
 */

function envInt(name: string, fallback: number): number {
    const parsed = parseInt(process.env[name] || '', 10);
    return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

// ES-defined limit on the indentation unit
export const MAX_GAP_LENGTH = 10;

// Longest string the engine will attempt to build (Node.js / V8 string limit)
export const MAX_STRING_LENGTH = envInt('JSONCORE_MAX_STRING_LENGTH', 2 ** 29 - 24);

// Nesting probe shared by stringify, the tokenizer and reviver walks
export const MAX_DEPTH = envInt('JSONCORE_MAX_DEPTH', 1000);

// Quoted property-name cache entries (0 disables)
export const KEY_CACHE_SIZE = envInt('JSONCORE_KEY_CACHE_SIZE', 1024);

// Keys longer than this are never cached
export const KEY_CACHE_MAX_KEY_LENGTH = 256;

export interface EngineLimits {
    maxDepth: number;
    maxStringLength: number;
}

/**
 * Resolve engine limits, falling back to the environment defaults
 */
export function resolveLimits(overrides: Partial<EngineLimits> = {}): EngineLimits {
    return {
        maxDepth: positiveOr(overrides.maxDepth, MAX_DEPTH),
        maxStringLength: positiveOr(overrides.maxStringLength, MAX_STRING_LENGTH),
    };
}

function positiveOr(value: number | undefined, fallback: number): number {
    if (value !== undefined && Number.isFinite(value) && value > 0) return Math.floor(value);
    return fallback;
}
