/**
 * DockwrightError and its subclasses.
 *
 * Every failure the library raises on purpose is a DockwrightError with a
 * code from {@link ErrorCode}. Anything else reaching the CLI is a bug or
 * an unexpected I/O failure and is reported as such.
 */

import type { ErrorCodeValue, ErrorPayload } from '../types/errors.js';
import { ERROR_RETRIABLE_DEFAULTS, ErrorCode } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

/**
 * Brands instances so that errors thrown by a second copy of this module
 * (two installed versions in one dependency tree) are still recognized.
 */
const DOCKWRIGHT_ERROR_BRAND = Symbol.for('dockwright.DockwrightError');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DockwrightErrorOptions {
  code: ErrorCodeValue;
  message: string;
  /** Defaults to ERROR_RETRIABLE_DEFAULTS for the code. */
  retriable?: boolean;
  /** Paths involved in the failure. */
  paths?: readonly string[];
  cause?: unknown;
}

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

export class DockwrightError extends Error {
  readonly code: ErrorCodeValue;
  readonly retriable: boolean;
  readonly paths: readonly string[];

  /** @internal */
  readonly [DOCKWRIGHT_ERROR_BRAND] = true as const;

  constructor(options: DockwrightErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DockwrightError';
    this.code = options.code;
    this.retriable = options.retriable ?? ERROR_RETRIABLE_DEFAULTS[options.code];
    this.paths = options.paths ? [...options.paths] : [];
  }

  /** Serializable form, without stack traces. */
  toPayload(): ErrorPayload {
    const payload: ErrorPayload = {
      code: this.code,
      message: this.message,
      retriable: this.retriable,
    };
    if (this.paths.length > 0) {
      payload.paths = [...this.paths];
    }
    return payload;
  }
}

/** Type guard that also accepts instances from another copy of this module. */
export function isDockwrightError(value: unknown): value is DockwrightError {
  if (value instanceof DockwrightError) {
    return true;
  }
  return (
    typeof value === 'object' &&
    value !== null &&
    DOCKWRIGHT_ERROR_BRAND in value &&
    value[DOCKWRIGHT_ERROR_BRAND] === true
  );
}

// ---------------------------------------------------------------------------
// Build context errors
// ---------------------------------------------------------------------------

/**
 * A context path is already registered for a different host path.
 *
 * Without a context root only basenames are kept, so `/a/file.txt` and
 * `/b/file.txt` collide. Supply a context root or rename a source.
 */
export class AmbiguousMappingError extends DockwrightError {
  readonly contextPath: string;
  readonly existingHostPath: string;
  readonly hostPath: string;

  constructor(contextPath: string, existingHostPath: string, hostPath: string) {
    super({
      code: ErrorCode.AMBIGUOUS_MAPPING,
      message:
        `Duplicate context entry: "${contextPath}" already maps to "${existingHostPath}", ` +
        `cannot also map it to "${hostPath}"`,
      paths: [contextPath],
    });
    this.name = 'AmbiguousMappingError';
    this.contextPath = contextPath;
    this.existingHostPath = existingHostPath;
    this.hostPath = hostPath;
  }
}

/** One context path mapped differently by the two sides of a merge. */
export interface MergeConflict {
  contextPath: string;
  ours: string;
  theirs: string;
}

/** Raised by a merge; lists every conflicting context path, sorted. */
export class ConflictingMergeError extends DockwrightError {
  readonly conflicts: readonly MergeConflict[];

  constructor(conflicts: readonly MergeConflict[]) {
    const sorted = [...conflicts].sort((a, b) => a.contextPath.localeCompare(b.contextPath));
    const keys = sorted.map((c) => c.contextPath);
    super({
      code: ErrorCode.CONFLICTING_MERGE,
      message: `Duplicate context entries detected before merging: ${keys.join(', ')}`,
      paths: keys,
    });
    this.name = 'ConflictingMergeError';
    this.conflicts = sorted;
  }
}

export class PathEscapeError extends DockwrightError {
  readonly contextPath: string;

  constructor(contextPath: string) {
    super({
      code: ErrorCode.PATH_ESCAPE,
      message: `Invalid context path (must be relative, no '..'): ${contextPath}`,
      paths: [contextPath],
    });
    this.name = 'PathEscapeError';
    this.contextPath = contextPath;
  }
}

export class MissingHostPathError extends DockwrightError {
  readonly hostPath: string;

  constructor(hostPath: string, cause?: unknown) {
    super({
      code: ErrorCode.MISSING_HOST_PATH,
      message: `Host path does not exist: ${hostPath}`,
      paths: [hostPath],
      cause,
    });
    this.name = 'MissingHostPathError';
    this.hostPath = hostPath;
  }
}

export class UnsupportedPathTypeError extends DockwrightError {
  readonly hostPath: string;

  constructor(hostPath: string, kind: string, cause?: unknown) {
    super({
      code: ErrorCode.UNSUPPORTED_PATH_TYPE,
      message: `Host path must be a file or directory, got ${kind}: ${hostPath}`,
      paths: [hostPath],
      cause,
    });
    this.name = 'UnsupportedPathTypeError';
    this.hostPath = hostPath;
  }
}

export class InvalidPathError extends DockwrightError {
  constructor(message: string, paths: readonly string[] = []) {
    super({ code: ErrorCode.INVALID_PATH, message, paths });
    this.name = 'InvalidPathError';
  }
}

// ---------------------------------------------------------------------------
// Builder, engine and config errors
// ---------------------------------------------------------------------------

export class InvalidInstructionError extends DockwrightError {
  constructor(message: string) {
    super({ code: ErrorCode.INVALID_INSTRUCTION, message });
    this.name = 'InvalidInstructionError';
  }
}

export class EngineError extends DockwrightError {
  /** Process exit code, when the engine ran and failed. */
  readonly exitCode?: number;

  constructor(message: string, options: { exitCode?: number; cause?: unknown } = {}) {
    super({ code: ErrorCode.ENGINE_FAILURE, message, cause: options.cause });
    this.name = 'EngineError';
    if (options.exitCode !== undefined) {
      this.exitCode = options.exitCode;
    }
  }
}

export class ConfigError extends DockwrightError {
  constructor(message: string, cause?: unknown) {
    super({ code: ErrorCode.CONFIG_INVALID, message, cause });
    this.name = 'ConfigError';
  }
}
