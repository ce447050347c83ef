/**
 * Structured Logger for the JSON engine
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when JSONCORE_LOG_JSON=1
 * - Optional file output via JSONCORE_LOG_FILE
 * - Module context (component name) on every line
 * - Invocation context (CLI command, input source) propagated through all log entries
 *
 * Environment:
 *   JSONCORE_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   JSONCORE_LOG_JSON   = 1 (default: text)
 *   JSONCORE_LOG_FILE   = path (optional, appends)
 *   JSONCORE_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string): number {
    const level = raw.toLowerCase();
    if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
        return LEVEL_ORDER[level];
    }
    return LEVEL_ORDER.info;
}

const MIN_LEVEL: number = parseLevel(process.env.JSONCORE_LOG_LEVEL || 'info');
const DEBUG_OVERRIDE = process.env.JSONCORE_DEBUG === '1' || process.env.JSONCORE_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.JSONCORE_LOG_JSON === '1';
const LOG_FILE = process.env.JSONCORE_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Invocation Context (singleton)                                             */
/* -------------------------------------------------------------------------- */

let _command: string = '';
let _source: string = '';
let _fileWriteFailed = false;

/** Set the active invocation context. Called by the CLI before running a command. */
export function setLogContext(opts: { command?: string; source?: string }): void {
    if (opts.command !== undefined) _command = opts.command;
    if (opts.source !== undefined) _source = opts.source;
}

/** Clear invocation context. Called when a command finishes. */
export function clearLogContext(): void {
    _command = '';
    _source = '';
}

export function isJsonMode(): boolean {
    return JSON_MODE;
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_command) entry.command = _command;
        if (_source) entry.source = _source;
        if (data) entry.data = data;
        const line = JSON.stringify(entry);
        writeOutput(line);
    } else {
        const ctx = _command ? ` [${_command}${_source ? ':' + _source : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(line);
    }
}

function writeOutput(line: string): void {
    // Console output: stderr only, stdout carries JSON text from the CLI
    process.stderr.write(line + '\n');

    // Optional file append
    if (!LOG_FILE || _fileWriteFailed) return;
    try {
        fs.appendFileSync(LOG_FILE, line + '\n');
    } catch (err) {
        // Report once, then keep logging to stderr only
        _fileWriteFailed = true;
        const reason = err instanceof Error ? err.message : String(err);
        process.stderr.write(`[logger] cannot append to ${LOG_FILE}: ${reason}\n`);
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
