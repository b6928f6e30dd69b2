/**
 * TOML-based configuration loader.
 *
 * Reads `config.toml` from the Dockwright home directory, parses it with
 * smol-toml, validates it and returns a fully typed `DockwrightConfig`.
 */

import { parse as parseTOML, TomlError } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parseConfig, defaultConfig, resolveHome } from '../types/config.js';
import type { DockwrightConfig } from '../types/config.js';
import { ConfigError } from './errors.js';

export const CONFIG_FILE_NAME = 'config.toml';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate `config.toml` from a Dockwright home directory.
 *
 * If `config.toml` does not exist or is empty, returns the defaults.
 * Throws ConfigError on invalid TOML syntax or invalid values.
 */
export function loadConfig(home: string = resolveHome()): DockwrightConfig {
  const configPath = join(home, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return defaultConfig();
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return defaultConfig();
  }

  let raw: Record<string, unknown>;
  try {
    raw = parseTOML(content);
  } catch (err) {
    if (err instanceof TomlError) {
      throw new ConfigError(`Invalid TOML in ${configPath}: ${err.message}`, err);
    }
    throw err;
  }
  return parseConfig(raw);
}
