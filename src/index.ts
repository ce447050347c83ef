/**
 * Main entry point - exports all public APIs
 */

import { JsonEngine } from './json_engine';
import { nativeHost } from './native_host';

export { JsonEngine } from './json_engine';
export type { EngineOptions } from './json_engine';
export { nativeHost } from './native_host';
export { createTaggedHost } from './tagged_host';
export * as values from './value';
export type { Value } from './value';
export type { HostModel, ValueCapabilities, ValueBuilder, TypeKind, ValueIdentity } from './value_model';
export { parseText } from './json_tokenizer';
export type { ParseError, ParseFailureKind, ParseOutcome } from './json_tokenizer';
export { quote } from './quote';
export type { ErrorCode, StructuredError } from './structured_error';
export {
    JsonSyntaxError,
    CircularStructureError,
    OutOfBoundStringError,
    ResourceExhaustedError,
    InternalInvariantError,
    createStructuredError,
    isJsonEngineFailure,
} from './structured_error';
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';

const defaultEngine = new JsonEngine(nativeHost);

/** JSON.stringify over plain JavaScript values. */
export function stringify(value: unknown, replacer?: unknown, space?: unknown): string | undefined {
    return defaultEngine.stringify(value, replacer, space);
}

/** JSON.parse over plain JavaScript values. */
export function parse(text?: unknown, reviver?: unknown): unknown {
    return defaultEngine.parse(text, reviver);
}
