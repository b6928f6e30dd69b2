import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig } from './config-loader.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { ConfigError } from './errors.js';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'dockwright-config-test-'));
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  function writeConfig(content: string): void {
    writeFileSync(join(home, 'config.toml'), content, 'utf-8');
  }

  it('returns the defaults when config.toml does not exist', () => {
    expect(loadConfig(home)).toEqual(DEFAULT_CONFIG);
  });

  it('returns the defaults when config.toml is blank', () => {
    writeConfig('\n  \n');
    expect(loadConfig(home)).toEqual(DEFAULT_CONFIG);
  });

  it('parses every section', () => {
    writeConfig(`
[engine]
name = "podman"
binary = "/usr/bin/podman"

[build]
buildkit = false
workspace_root = "/var/tmp/dw"
keep_context = true

[logging]
level = "warn"
`);
    expect(loadConfig(home)).toEqual({
      engine: { name: 'podman', binary: '/usr/bin/podman' },
      build: { buildkit: false, workspace_root: '/var/tmp/dw', keep_context: true },
      logging: { level: 'warn' },
    });
  });

  it('applies defaults for missing sections', () => {
    writeConfig('[logging]\nlevel = "error"\n');
    const config = loadConfig(home);
    expect(config.engine).toEqual({ name: 'docker' });
    expect(config.build).toEqual({ buildkit: true, keep_context: false });
  });

  it('turns TOML syntax errors into ConfigError', () => {
    writeConfig('[engine\nname = "docker"\n');
    expect(() => loadConfig(home)).toThrow(ConfigError);
    expect(() => loadConfig(home)).toThrow(`Invalid TOML in ${join(home, 'config.toml')}: `);
  });

  it('reports invalid values', () => {
    writeConfig('[engine]\nname = "rkt"\n');
    expect(() => loadConfig(home)).toThrow('Invalid engine.name: "rkt"');
  });
});
