import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { DEFAULT_CONFIG, defaultConfig, parseConfig, resolveHome } from './config.js';
import { ConfigError } from '../core/errors.js';

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

describe('resolveHome', () => {
  it('defaults to ~/.dockwright', () => {
    expect(resolveHome({})).toBe(join(homedir(), '.dockwright'));
  });

  it('ignores an empty DOCKWRIGHT_HOME', () => {
    expect(resolveHome({ DOCKWRIGHT_HOME: '' })).toBe(join(homedir(), '.dockwright'));
  });

  it('uses DOCKWRIGHT_HOME and strips trailing slashes', () => {
    expect(resolveHome({ DOCKWRIGHT_HOME: '/srv/dockwright//' })).toBe('/srv/dockwright');
  });

  it('expands a leading ~', () => {
    expect(resolveHome({ DOCKWRIGHT_HOME: '~/cfg/dw' })).toBe(join(homedir(), 'cfg/dw'));
    expect(resolveHome({ DOCKWRIGHT_HOME: '~' })).toBe(homedir());
  });

  it('keeps a bare /', () => {
    expect(resolveHome({ DOCKWRIGHT_HOME: '/' })).toBe('/');
  });
});

// ---------------------------------------------------------------------------
// defaultConfig()
// ---------------------------------------------------------------------------

describe('defaultConfig', () => {
  it('returns a copy that does not alias DEFAULT_CONFIG', () => {
    const config = defaultConfig();
    config.build.keep_context = true;
    expect(DEFAULT_CONFIG.build.keep_context).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  it('returns the defaults for an empty document', () => {
    expect(parseConfig({})).toEqual({
      engine: { name: 'docker' },
      build: { buildkit: true, keep_context: false },
      logging: { level: 'info' },
    });
  });

  it('reads every known field', () => {
    const config = parseConfig({
      engine: { name: 'podman', binary: '/usr/bin/podman' },
      build: { buildkit: false, workspace_root: '/var/tmp/dw', keep_context: true },
      logging: { level: 'debug' },
    });
    expect(config).toEqual({
      engine: { name: 'podman', binary: '/usr/bin/podman' },
      build: { buildkit: false, workspace_root: '/var/tmp/dw', keep_context: true },
      logging: { level: 'debug' },
    });
  });

  it('preserves unknown sections', () => {
    const config = parseConfig({ future: { enabled: true } });
    expect(config['future']).toEqual({ enabled: true });
  });

  it('rejects an unknown engine', () => {
    expect(() => parseConfig({ engine: { name: 'lxc' } })).toThrow(
      'Invalid engine.name: "lxc". Must be one of: docker, podman',
    );
  });

  it('rejects an empty binary', () => {
    expect(() => parseConfig({ engine: { binary: '' } })).toThrow(
      'engine.binary must be a non-empty string',
    );
  });

  it('rejects a non-boolean buildkit', () => {
    expect(() => parseConfig({ build: { buildkit: 'yes' } })).toThrow(
      'build.buildkit must be a boolean',
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => parseConfig({ logging: { level: 'trace' } })).toThrow(
      'Invalid logging.level: "trace". Must be one of: debug, info, warn, error',
    );
  });

  it('rejects a section that is not a table', () => {
    expect(() => parseConfig({ build: 'fast' })).toThrow(ConfigError);
    expect(() => parseConfig({ build: 'fast' })).toThrow('[build] must be a table');
  });
});
