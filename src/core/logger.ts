/**
 * Structured JSON logging for Dockwright.
 *
 * Component-scoped loggers with level filtering and an injectable sink.
 * Every entry is one JSON object with level, ts, component and msg fields.
 * The default sink writes to stderr so that commands printing a Dockerfile
 * or a script on stdout stay pipeable.
 *
 * A {@link DockwrightError} in metadata is logged as its payload, and its
 * code becomes the entry's `error_code`.
 *
 * @example
 * ```ts
 * const logger = createLogger('context');
 * logger.info('materialized', { entries: 3 });
 * // → {"level":"info","ts":"...","component":"context","msg":"materialized","meta":{"entries":3}}
 * ```
 */

import { DockwrightError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  /** Image tag of the build the entry belongs to, when known. */
  tag?: string;
  duration_ms?: number;
  error_code?: string;
  meta?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

/** Fields bound to a logger and copied into every entry it emits. */
export interface LogContext {
  tag?: string;
}

type LogMethod = (message: string, meta?: Record<string, unknown>) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = stderrSink;

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  globalLevel = options.level ?? globalLevel;
  globalSink = options.sink ?? globalSink;
}

/** Back to `info` on stderr. */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = stderrSink;
}

function stderrSink(entry: LogEntry): void {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(globalLevel);
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

function serializeValue(value: unknown): unknown {
  if (value instanceof DockwrightError) {
    return { name: value.name, ...value.toPayload() };
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
    return `${value.slice(0, META_STRING_MAX_LENGTH)}...[truncated]`;
  }
  return value;
}

/**
 * Split metadata into the top-level entry fields and the rest.
 * An explicit `error_code` wins over one taken from an error value.
 */
function applyMeta(entry: LogEntry, meta: Record<string, unknown>): void {
  const rest: Record<string, unknown> = {};
  let errorCode: string | undefined;

  for (const [key, value] of Object.entries(meta)) {
    switch (key) {
      case 'duration_ms':
        if (typeof value === 'number') entry.duration_ms = value;
        break;
      case 'error_code':
        if (typeof value === 'string') entry.error_code = value;
        break;
      case 'tag':
        if (typeof value === 'string') entry.tag = value;
        break;
      default:
        if (value instanceof DockwrightError) errorCode ??= value.code;
        rest[key] = serializeValue(value);
    }
  }

  if (entry.error_code === undefined && errorCode !== undefined) {
    entry.error_code = errorCode;
  }
  if (Object.keys(rest).length > 0) {
    entry.meta = rest;
  }
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'context'`, `'engine:docker'`).
 * @param bound - Fields copied into every entry.
 */
export function createLogger(component: string, bound: LogContext = {}): Logger {
  const method =
    (level: LogLevel): LogMethod =>
    (message, meta) => {
      if (!enabled(level)) return;

      const entry: LogEntry = { level, ts: new Date().toISOString(), component, msg: message };
      if (bound.tag) entry.tag = bound.tag;
      if (meta) applyMeta(entry, meta);

      globalSink(entry);
    };

  return {
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, bound),
    withContext: (ctx) => createLogger(component, { ...bound, ...ctx }),
  };
}
