/**
 * Structured Error Schema for the JSON engine
 *
 * Every failure raised by stringify/parse is a subclass of the matching
 * ECMAScript error (SyntaxError, TypeError, RangeError) so callers can keep
 * using `instanceof` checks, and additionally carries a machine-readable code
 * and context that the CLI can emit as a structured record.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Input errors
    | 'SYNTAX_ERROR'

    // Serialization errors
    | 'CIRCULAR_STRUCTURE'
    | 'OUT_OF_BOUND_STRING'

    // Resource limits
    | 'RESOURCE_EXHAUSTED'

    // Host contract violations
    | 'INTERNAL_INVARIANT';

export type Severity = 'FATAL' | 'ERROR';

export type ErrorContext = Record<string, string | number | boolean | null>;

export interface StructuredError {
    code: ErrorCode;
    name: string;
    message: string;
    severity: Severity;
    context: ErrorContext;
    timestamp: string;
}

export const ERRORS = {
    SYNTAX_ERROR: 'SYNTAX_ERROR',
    CIRCULAR_STRUCTURE: 'CIRCULAR_STRUCTURE',
    OUT_OF_BOUND_STRING: 'OUT_OF_BOUND_STRING',
    RESOURCE_EXHAUSTED: 'RESOURCE_EXHAUSTED',
    INTERNAL_INVARIANT: 'INTERNAL_INVARIANT',
} as const satisfies Record<ErrorCode, ErrorCode>;

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: ErrorContext = {},
    name: string = 'Error'
): StructuredError {
    return {
        code,
        name,
        message,
        severity: getSeverity(code),
        context,
        timestamp: new Date().toISOString()
    };
}

function getSeverity(code: ErrorCode): Severity {
    return code === 'INTERNAL_INVARIANT' ? 'FATAL' : 'ERROR';
}

export interface JsonEngineFailure {
    readonly code: ErrorCode;
    readonly context: ErrorContext;
    toStructured(): StructuredError;
}

export function isJsonEngineFailure(err: unknown): err is Error & JsonEngineFailure {
    return err instanceof JsonSyntaxError
        || err instanceof CircularStructureError
        || err instanceof OutOfBoundStringError
        || err instanceof ResourceExhaustedError
        || err instanceof InternalInvariantError;
}

/* -------------------------------------------------------------------------- */
/* Error Classes                                                              */
/* -------------------------------------------------------------------------- */

/** Malformed JSON text, or parse() called without text. */
export class JsonSyntaxError extends SyntaxError implements JsonEngineFailure {
    readonly code = ERRORS.SYNTAX_ERROR;

    constructor(message: string, public readonly position: number | null = null, public readonly context: ErrorContext = {}) {
        super(position === null ? message : `${message} at position ${position}`);
        this.name = 'JsonSyntaxError';
    }

    toStructured(): StructuredError {
        return createStructuredError(this.code, this.message, { position: this.position, ...this.context }, this.name);
    }
}

export class CircularStructureError extends TypeError implements JsonEngineFailure {
    readonly code = ERRORS.CIRCULAR_STRUCTURE;

    constructor(public readonly key: string, public readonly context: ErrorContext = {}) {
        super(`Converting circular structure to JSON (at key ${JSON.stringify(key)})`);
        this.name = 'CircularStructureError';
    }

    toStructured(): StructuredError {
        return createStructuredError(this.code, this.message, { key: this.key, ...this.context }, this.name);
    }
}

export class OutOfBoundStringError extends RangeError implements JsonEngineFailure {
    readonly code = ERRORS.OUT_OF_BOUND_STRING;

    constructor(public readonly length: number, public readonly limit: number, public readonly context: ErrorContext = {}) {
        super(`Array length ${length} exceeds the maximum string length ${limit}`);
        this.name = 'OutOfBoundStringError';
    }

    toStructured(): StructuredError {
        return createStructuredError(this.code, this.message, { length: this.length, limit: this.limit, ...this.context }, this.name);
    }
}

export class ResourceExhaustedError extends RangeError implements JsonEngineFailure {
    readonly code = ERRORS.RESOURCE_EXHAUSTED;

    constructor(public readonly depth: number, public readonly context: ErrorContext = {}) {
        super(`Maximum nesting depth ${depth} exceeded`);
        this.name = 'ResourceExhaustedError';
    }

    toStructured(): StructuredError {
        return createStructuredError(this.code, this.message, { depth: this.depth, ...this.context }, this.name);
    }
}

/** The host model broke its capability contract. Never reachable with a conforming host. */
export class InternalInvariantError extends Error implements JsonEngineFailure {
    readonly code = ERRORS.INTERNAL_INVARIANT;

    constructor(message: string, public readonly context: ErrorContext = {}) {
        super(message);
        this.name = 'InternalInvariantError';
    }

    toStructured(): StructuredError {
        return createStructuredError(this.code, this.message, this.context, this.name);
    }
}
