/**
 * Error codes shared by every Dockwright error.
 *
 * Codes are stable, machine-readable strings. The CLI prints them next to
 * the human-readable message so scripts can branch on the failure kind.
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export const ErrorCode = {
  /** A context path is already registered for a different host path. */
  AMBIGUOUS_MAPPING: 'AMBIGUOUS_MAPPING',
  /** Two contexts map the same context path to different host paths. */
  CONFLICTING_MERGE: 'CONFLICTING_MERGE',
  /** A context path is absolute or climbs out with `..`. */
  PATH_ESCAPE: 'PATH_ESCAPE',
  /** A registered host path no longer exists at materialization time. */
  MISSING_HOST_PATH: 'MISSING_HOST_PATH',
  /** A host path is neither a regular file nor a directory. */
  UNSUPPORTED_PATH_TYPE: 'UNSUPPORTED_PATH_TYPE',
  /** A host path cannot be turned into a context path. */
  INVALID_PATH: 'INVALID_PATH',
  /** A Dockerfile instruction cannot be rendered. */
  INVALID_INSTRUCTION: 'INVALID_INSTRUCTION',
  /** The container engine failed or could not be invoked. */
  ENGINE_FAILURE: 'ENGINE_FAILURE',
  /** config.toml is malformed or holds an invalid value. */
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Whether a failure of each kind may succeed on a plain retry.
 *
 * Only engine failures qualify: the daemon may have been restarting.
 * Everything else depends on inputs the caller controls.
 */
export const ERROR_RETRIABLE_DEFAULTS: Readonly<Record<ErrorCodeValue, boolean>> = {
  AMBIGUOUS_MAPPING: false,
  CONFLICTING_MERGE: false,
  PATH_ESCAPE: false,
  MISSING_HOST_PATH: false,
  UNSUPPORTED_PATH_TYPE: false,
  INVALID_PATH: false,
  INVALID_INSTRUCTION: false,
  ENGINE_FAILURE: true,
  CONFIG_INVALID: false,
};

/** Serialized form of an error, as logged. */
export interface ErrorPayload {
  code: ErrorCodeValue;
  message: string;
  retriable: boolean;
  /** Context or host paths involved in the failure, when any. */
  paths?: string[];
}
