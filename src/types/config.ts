/**
 * Dockwright configuration schema and DOCKWRIGHT_HOME resolution.
 *
 * Defines the TypeScript types for the config.toml sections, their
 * defaults, and the validation applied to a parsed TOML document.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { ConfigError } from '../core/errors.js';
import { isEngineName, type EngineName } from '../core/container/engine.js';
import { isLogLevel, type LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[engine]` section of config.toml. */
export interface EngineConfig {
  name: EngineName;
  /** Binary to invoke; defaults to the engine name. */
  binary?: string;
}

/** `[build]` section of config.toml. */
export interface BuildConfig {
  /** Build with BuildKit (`BUILDKIT_PROGRESS=plain`) or the legacy builder. */
  buildkit: boolean;
  /** Parent directory of per-build workspaces. */
  workspace_root?: string;
  /** Keep the workspace (Dockerfile + context) after a build. */
  keep_context: boolean;
}

/** `[logging]` section of config.toml. */
export interface LoggingConfig {
  level: LogLevel;
}

/**
 * Full Dockwright configuration.
 *
 * Unknown top-level sections are preserved as-is so that newer config
 * files still load.
 */
export interface DockwrightConfig {
  engine: EngineConfig;
  build: BuildConfig;
  logging: LoggingConfig;
  [section: string]: unknown;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: DockwrightConfig = {
  engine: { name: 'docker' },
  build: { buildkit: true, keep_context: false },
  logging: { level: 'info' },
};

/** Fresh copy of the defaults, safe to mutate. */
export function defaultConfig(): DockwrightConfig {
  return {
    engine: { ...DEFAULT_CONFIG.engine },
    build: { ...DEFAULT_CONFIG.build },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

/**
 * Resolve the Dockwright home directory.
 *
 * Precedence:
 *  1. `$DOCKWRIGHT_HOME` (if non-empty), with a leading `~` expanded
 *  2. `~/.dockwright/`
 *
 * Trailing slashes are stripped.
 */
export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
  const envValue = env['DOCKWRIGHT_HOME'];
  if (envValue && envValue.length > 0) {
    let resolved = envValue;
    if (resolved === '~') {
      resolved = homedir();
    } else if (resolved.startsWith('~/')) {
      resolved = join(homedir(), resolved.slice(2));
    }
    while (resolved.length > 1 && resolved.endsWith('/')) {
      resolved = resolved.slice(0, -1);
    }
    return resolved;
  }
  return join(homedir(), '.dockwright');
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

const KNOWN_SECTIONS = new Set(['engine', 'build', 'logging']);

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) return {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigError(`[${name}] must be a table`);
  }
  return { ...value };
}

function optionalString(
  table: Record<string, unknown>,
  key: string,
  where: string,
): string | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function booleanOr(
  table: Record<string, unknown>,
  key: string,
  where: string,
  fallback: boolean,
): boolean {
  const value = table[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${where}.${key} must be a boolean`);
  }
  return value;
}

/**
 * Validate a raw config object (e.g. from TOML parsing) into a typed
 * `DockwrightConfig`, applying defaults for anything missing.
 *
 * @throws ConfigError on the first invalid value.
 */
export function parseConfig(raw: Record<string, unknown>): DockwrightConfig {
  const result = defaultConfig();

  for (const key of Object.keys(raw)) {
    if (!KNOWN_SECTIONS.has(key)) {
      result[key] = raw[key];
    }
  }

  // --- engine ---
  const rawEngine = section(raw, 'engine');
  const name = rawEngine['name'] ?? DEFAULT_CONFIG.engine.name;
  if (!isEngineName(name)) {
    throw new ConfigError(`Invalid engine.name: "${String(name)}". Must be one of: docker, podman`);
  }
  const engine: EngineConfig = { name };
  const binary = optionalString(rawEngine, 'binary', 'engine');
  if (binary !== undefined) {
    engine.binary = binary;
  }
  result.engine = engine;

  // --- build ---
  const rawBuild = section(raw, 'build');
  const build: BuildConfig = {
    buildkit: booleanOr(rawBuild, 'buildkit', 'build', DEFAULT_CONFIG.build.buildkit),
    keep_context: booleanOr(rawBuild, 'keep_context', 'build', DEFAULT_CONFIG.build.keep_context),
  };
  const workspaceRoot = optionalString(rawBuild, 'workspace_root', 'build');
  if (workspaceRoot !== undefined) {
    build.workspace_root = workspaceRoot;
  }
  result.build = build;

  // --- logging ---
  const rawLogging = section(raw, 'logging');
  const level = rawLogging['level'] ?? DEFAULT_CONFIG.logging.level;
  if (!isLogLevel(level)) {
    throw new ConfigError(
      `Invalid logging.level: "${String(level)}". Must be one of: debug, info, warn, error`,
    );
  }
  result.logging = { level };

  return result;
}
