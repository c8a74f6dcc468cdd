/**
 * Structured Logger for the intent pipeline
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when INTENT_LOG_JSON=1
 * - Optional file output via INTENT_LOG_FILE
 * - Component name on every line
 * - Intent correlation (intent id + pipeline stage) on every entry
 *
 * Environment:
 *   INTENT_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   INTENT_LOG_JSON   = 1 (default: text)
 *   INTENT_LOG_FILE   = path (optional, appends)
 *   INTENT_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(v: string): v is LogLevel {
    return v in LEVEL_ORDER;
}

const envLevel = (process.env.INTENT_LOG_LEVEL || 'info').toLowerCase();
const MIN_LEVEL: number = isLogLevel(envLevel) ? LEVEL_ORDER[envLevel] : 1;
const DEBUG_OVERRIDE = process.env.INTENT_DEBUG === '1' || process.env.INTENT_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.INTENT_LOG_JSON === '1';
const LOG_FILE = process.env.INTENT_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Correlation Context                                                        */
/* -------------------------------------------------------------------------- */

let _intentId: string = '';
let _stage: string = '';

/** Set the active intent context. Called at the start of each pipeline stage. */
export function setCorrelation(opts: { intentId?: string; stage?: string }): void {
    if (opts.intentId !== undefined) _intentId = opts.intentId;
    if (opts.stage !== undefined) _stage = opts.stage;
}

export function clearCorrelation(): void {
    _intentId = '';
    _stage = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_intentId) entry.intent_id = _intentId;
        if (_stage) entry.stage = _stage;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = _intentId ? ` [${_intentId}${_stage ? ':' + _stage : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    // stdout is reserved for command output; diagnostics go to stderr
    process.stderr.write(line + '\n');

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e: unknown) {
            if (level === 'error') process.stderr.write(`log file append failed: ${String(e)}\n`);
        }
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
