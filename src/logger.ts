/**
 * Structured Logger
 *
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when AUTODOC_LOG_JSON=1
 * - Optional file output via AUTODOC_LOG_FILE
 * - Component name on every line
 * - Run correlation (run id, current segment) propagated through all entries
 *
 * Every line goes to stderr: stdout is reserved for annotated source when the
 * CLI reads from stdin.
 *
 * Environment:
 *   AUTODOC_LOG_LEVEL  = debug|info|warn|error|silent (default: info)
 *   AUTODOC_LOG_JSON   = 1 (default: text)
 *   AUTODOC_LOG_FILE   = path (optional, appends)
 *   AUTODOC_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function parseLevel(raw: string | undefined): number {
    const key = (raw || 'info').toLowerCase();
    if (key === 'debug' || key === 'info' || key === 'warn' || key === 'error' || key === 'silent') {
        return LEVEL_ORDER[key];
    }
    return LEVEL_ORDER.info;
}

const DEBUG_OVERRIDE = process.env.AUTODOC_DEBUG === '1' || process.env.AUTODOC_DEBUG === 'true';
let effectiveMin = DEBUG_OVERRIDE ? 0 : parseLevel(process.env.AUTODOC_LOG_LEVEL);

const JSON_MODE = process.env.AUTODOC_LOG_JSON === '1';
const LOG_FILE = process.env.AUTODOC_LOG_FILE || '';
let logFileBroken = false;

/** Overrides the environment-derived level, e.g. for `--quiet` or `--verbose`. */
export function setLogLevel(level: LogLevel | 'silent'): void {
    effectiveMin = LEVEL_ORDER[level];
}

/* -------------------------------------------------------------------------- */
/* Run Correlation Context                                                    */
/* -------------------------------------------------------------------------- */

let _runId = '';
let _segment = '';

/** Set the active run correlation context. Called by the driver. */
export function setCorrelation(opts: { runId?: string; segment?: string }): void {
    if (opts.runId !== undefined) _runId = opts.runId;
    if (opts.segment !== undefined) _segment = opts.segment;
}

export function clearCorrelation(): void {
    _runId = '';
    _segment = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < effectiveMin) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_runId) entry.run_id = _runId;
        if (_segment) entry.segment = _segment;
        if (data) entry.data = data;
        writeOutput(JSON.stringify(entry));
    } else {
        const ctx = _runId ? ` [${_runId.slice(0, 8)}${_segment ? ':' + _segment : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(line);
    }
}

function writeOutput(line: string): void {
    process.stderr.write(line + '\n');

    if (LOG_FILE && !logFileBroken) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e) {
            logFileBroken = true;
            process.stderr.write(`[logger] AUTODOC_LOG_FILE disabled: ${e instanceof Error ? e.message : String(e)}\n`);
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
