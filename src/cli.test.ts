import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parseArgs, runCommand, doctor, USAGE } from './cli.js';
import type { CliDeps } from './cli.js';
import { VERSION } from './index.js';
import { MockEngine } from './core/container/mock-engine.js';
import { TempWorkspace } from './core/workspace.js';
import { ConfigError } from './core/errors.js';
import { configureLogging, resetLogging } from './core/logger.js';
import { defaultConfig } from './types/config.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let tmp: string;
let engine: MockEngine;

function createTestDeps(overrides?: Partial<CliDeps>): CliDeps {
  return {
    stdout: vi.fn(),
    stderr: vi.fn(),
    home: '/tmp/test-dockwright-home',
    cwd: tmp,
    loadConfig: vi.fn().mockReturnValue(defaultConfig()),
    setLogLevel: vi.fn(),
    createEngine: vi.fn().mockReturnValue(engine),
    createWorkspace: vi.fn(() => new TempWorkspace({ root: join(tmp, 'workspaces') })),
    readFile: (path: string) => readFileSync(path, 'utf-8'),
    ...overrides,
  };
}

function writeFile(relativePath: string, content: string): string {
  const path = join(tmp, relativePath);
  mkdirSync(join(path, '..'), { recursive: true });
  writeFileSync(path, content, 'utf-8');
  return path;
}

function run(deps: CliDeps, ...argv: string[]): Promise<number> {
  return runCommand(parseArgs(['node', 'dockwright', ...argv]), deps);
}

beforeEach(() => {
  tmp = mkdtempSync(join(tmpdir(), 'dockwright-cli-test-'));
  engine = new MockEngine();
  configureLogging({ sink: () => {} });
});

afterEach(() => {
  rmSync(tmp, { recursive: true, force: true });
  resetLogging();
});

// ---------------------------------------------------------------------------
// parseArgs
// ---------------------------------------------------------------------------

describe('parseArgs', () => {
  it('parses a subcommand and positionals', () => {
    const result = parseArgs(['node', 'dockwright', 'stage', './ctx', 'a.txt']);
    expect(result.command).toBe('stage');
    expect(result.positionals).toEqual(['./ctx', 'a.txt']);
  });

  it('returns empty command when no subcommand is given', () => {
    expect(parseArgs(['node', 'dockwright']).command).toBe('');
  });

  it('separates flags from key=value options', () => {
    const result = parseArgs(['node', 'dockwright', 'render', 'a', '--dest=/app/', '--debug']);
    expect(result.flags).toEqual({ debug: true });
    expect(result.options).toEqual({ dest: '/app/' });
  });

  it('keeps everything after -- as positionals', () => {
    const result = parseArgs(['node', 'dockwright', 'stage', 'ctx', '--', '--odd-name']);
    expect(result.positionals).toEqual(['ctx', '--odd-name']);
    expect(result.flags).toEqual({});
  });

  it('splits an option on its first equals sign', () => {
    const result = parseArgs(['node', 'dockwright', 'build', '--from=reg/img:1=x']);
    expect(result.options['from']).toBe('reg/img:1=x');
  });
});

// ---------------------------------------------------------------------------
// runCommand
// ---------------------------------------------------------------------------

describe('runCommand', () => {
  it('prints the version', async () => {
    const deps = createTestDeps();
    expect(await run(deps, '--version')).toBe(0);
    expect(deps.stdout).toHaveBeenCalledWith(VERSION);
    expect(deps.loadConfig).not.toHaveBeenCalled();
  });

  it('prints usage for --help even with a command', async () => {
    const deps = createTestDeps();
    expect(await run(deps, 'stage', '--help')).toBe(0);
    expect(deps.stdout).toHaveBeenCalledWith(USAGE);
    expect(deps.loadConfig).not.toHaveBeenCalled();
  });

  it('prints usage without a command', async () => {
    const deps = createTestDeps();
    expect(await run(deps)).toBe(0);
    expect(deps.stdout).toHaveBeenCalledWith(USAGE);
  });

  it('rejects unknown commands', async () => {
    const deps = createTestDeps();
    expect(await run(deps, 'deploy')).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith('Unknown command: "deploy"\n');
    expect(deps.stdout).toHaveBeenCalledWith(USAGE);
  });

  it('applies the configured log level', async () => {
    const config = defaultConfig();
    config.logging.level = 'warn';
    const deps = createTestDeps({ loadConfig: vi.fn().mockReturnValue(config) });

    await run(deps, 'doctor');
    expect(deps.setLogLevel).toHaveBeenCalledWith('warn');
  });

  it('--debug overrides the configured level', async () => {
    const deps = createTestDeps();
    await run(deps, 'doctor', '--debug');
    expect(deps.setLogLevel).toHaveBeenCalledWith('debug');
  });

  it('reports library errors with their code', async () => {
    const deps = createTestDeps({
      loadConfig: vi.fn(() => {
        throw new ConfigError('Invalid logging.level: "loud"');
      }),
    });

    expect(await run(deps, 'doctor')).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith(
      'error [CONFIG_INVALID]: Invalid logging.level: "loud"',
    );
  });

  it('reports other errors by message', async () => {
    const deps = createTestDeps({
      readFile: () => {
        throw new Error('EACCES: permission denied');
      },
    });

    expect(await run(deps, 'stage', 'ctx', '--manifest=context.json')).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith('error: EACCES: permission denied');
  });
});

// ---------------------------------------------------------------------------
// stage
// ---------------------------------------------------------------------------

describe('stage', () => {
  it('materializes paths by basename', async () => {
    const file = writeFile('src/app.toml', 'port = 1');
    const deps = createTestDeps();

    expect(await run(deps, 'stage', 'ctx', 'src/app.toml')).toBe(0);
    expect(readFileSync(join(tmp, 'ctx', 'app.toml'), 'utf-8')).toBe('port = 1');
    expect(deps.stdout).toHaveBeenCalledWith(`app.toml <- ${file}`);
  });

  it('keeps paths relative to --root', async () => {
    writeFile('project/lib/util.ts', 'export {};');
    const deps = createTestDeps();

    expect(await run(deps, 'stage', 'ctx', 'project/lib/util.ts', '--root=project')).toBe(0);
    expect(readFileSync(join(tmp, 'ctx', 'lib', 'util.ts'), 'utf-8')).toBe('export {};');
  });

  it('starts from a context manifest', async () => {
    const hostPath = writeFile('data/seed.sql', 'select 1;');
    writeFile(
      'context.json',
      JSON.stringify({ entries: [{ contextPath: 'db/seed.sql', hostPath }] }),
    );
    const deps = createTestDeps();

    expect(await run(deps, 'stage', 'ctx', '--manifest=context.json')).toBe(0);
    expect(readFileSync(join(tmp, 'ctx', 'db', 'seed.sql'), 'utf-8')).toBe('select 1;');
    expect(deps.stdout).toHaveBeenCalledWith(`db/seed.sql <- ${hostPath}`);
  });

  it('fails on a missing host path', async () => {
    const deps = createTestDeps();

    expect(await run(deps, 'stage', 'ctx', 'nope.txt')).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith(
      `error [MISSING_HOST_PATH]: Host path does not exist: ${join(tmp, 'nope.txt')}`,
    );
  });

  it('requires a destination and paths', async () => {
    const deps = createTestDeps();
    expect(await run(deps, 'stage', 'ctx')).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith(
      'Usage: dockwright stage <dest> <paths...> [--root=<dir> | --manifest=<file>]',
    );
  });

  it('rejects --root together with --manifest', async () => {
    writeFile('context.json', JSON.stringify({ entries: [] }));
    const deps = createTestDeps();

    expect(await run(deps, 'stage', 'ctx', '--manifest=context.json', '--root=.')).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith(
      'Usage: dockwright stage <dest> <paths...> [--root=<dir> | --manifest=<file>]',
    );
    expect(existsSync(join(tmp, 'ctx'))).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// render
// ---------------------------------------------------------------------------

describe('render', () => {
  it('prints a FROM and one COPY', async () => {
    const deps = createTestDeps();

    expect(await run(deps, 'render', 'a.txt', 'b.txt', '--dest=/app/', '--from=alpine:3.20')).toBe(
      0,
    );
    expect(deps.stdout).toHaveBeenCalledWith('FROM alpine:3.20\nCOPY a.txt b.txt /app/');
  });

  it('rejects a basename collision', async () => {
    const deps = createTestDeps();

    expect(await run(deps, 'render', 'a/x.txt', 'b/x.txt', '--dest=/app/')).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith(
      `error [AMBIGUOUS_MAPPING]: Duplicate context entry: "x.txt" already maps to ` +
        `"${join(tmp, 'a', 'x.txt')}", cannot also map it to "${join(tmp, 'b', 'x.txt')}"`,
    );
  });

  it('requires --dest', async () => {
    const deps = createTestDeps();
    expect(await run(deps, 'render', 'a.txt')).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith(
      'Usage: dockwright render <paths...> --dest=<path> [--from=<image>]',
    );
  });
});

// ---------------------------------------------------------------------------
// build
// ---------------------------------------------------------------------------

describe('build', () => {
  it('builds the tag with the configured engine', async () => {
    writeFile('app/server.js', 'listen()');
    const deps = createTestDeps();

    expect(await run(deps, 'build', 'app:dev', 'app', '--dest=/srv/')).toBe(0);
    expect(deps.createEngine).toHaveBeenCalledWith({ name: 'docker' });
    expect(deps.createWorkspace).toHaveBeenCalledWith(undefined);
    expect(engine.builds).toHaveLength(1);
    expect(engine.builds[0].tag).toBe('app:dev');
    expect(engine.builds[0].env).toEqual({ BUILDKIT_PROGRESS: 'plain' });
    expect(deps.stdout).toHaveBeenCalledWith('Built app:dev');
  });

  it('saves the Dockerfile and keeps the workspace on request', async () => {
    writeFile('app.toml', 'x');
    const deps = createTestDeps();

    const code = await run(
      deps,
      'build',
      'app:dev',
      'app.toml',
      '--dest=/etc/app.toml',
      '--from=debian:12',
      '--save-dockerfile=out/Dockerfile',
      '--keep-context',
    );

    expect(code).toBe(0);
    expect(readFileSync(join(tmp, 'out', 'Dockerfile'), 'utf-8')).toBe(
      'FROM debian:12\nCOPY app.toml /etc/app.toml\n',
    );
    expect(deps.stdout).toHaveBeenCalledWith(
      expect.stringMatching(/^Workspace kept at .*workspaces\/build-/),
    );
  });

  it('follows [build] settings from config', async () => {
    writeFile('a.txt', 'a');
    const config = defaultConfig();
    config.build = { buildkit: false, keep_context: false, workspace_root: join(tmp, 'ws') };
    const deps = createTestDeps({ loadConfig: vi.fn().mockReturnValue(config) });

    expect(await run(deps, 'build', 't', 'a.txt', '--dest=/a.txt')).toBe(0);
    expect(deps.createWorkspace).toHaveBeenCalledWith(join(tmp, 'ws'));
    expect(engine.builds[0].env).toEqual({ DOCKER_BUILDKIT: '0' });
  });

  it('reports an engine failure', async () => {
    writeFile('a.txt', 'a');
    engine.simulateBuildFailure('docker build exited with code 1');
    const deps = createTestDeps();

    expect(await run(deps, 'build', 't', 'a.txt', '--dest=/a.txt')).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith(
      'error [ENGINE_FAILURE]: docker build exited with code 1',
    );
  });

  it('requires a tag, paths and --dest', async () => {
    const deps = createTestDeps();
    expect(await run(deps, 'build', 't', '--dest=/x')).toBe(1);
    expect(engine.builds).toHaveLength(0);
  });
});

// ---------------------------------------------------------------------------
// doctor
// ---------------------------------------------------------------------------

describe('doctor', () => {
  it('passes when the engine is available', async () => {
    const deps = createTestDeps();

    expect(await doctor(deps, defaultConfig())).toBe(0);
    expect(deps.stdout).toHaveBeenCalledWith('  PASS  config: /tmp/test-dockwright-home/config.toml');
    expect(deps.stdout).toHaveBeenCalledWith('  PASS  engine: Mock docker 1.0.0 (docker)');
    expect(deps.stdout).toHaveBeenCalledWith('\n2/2 checks passed');
  });

  it('fails with a fix hint when the engine is missing', async () => {
    engine = new MockEngine('podman');
    engine.setAvailable(false);
    const deps = createTestDeps();

    expect(await doctor(deps, defaultConfig())).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith('  FAIL  engine: podman is not available');
    expect(deps.stderr).toHaveBeenCalledWith(
      '        Fix: install podman or set [engine] binary in config.toml',
    );
    expect(deps.stdout).toHaveBeenCalledWith('\n1/2 checks passed');
  });
});
