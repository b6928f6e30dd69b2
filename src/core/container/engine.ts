/**
 * Container engine interface.
 *
 * The library never talks to a daemon directly: it shells out to the
 * engine's CLI binary (`docker`, `podman`) through an injectable
 * {@link ExecFn}, so tests can record the argument vectors instead.
 */

import { spawn } from 'node:child_process';
import { EngineError } from '../errors.js';

// ---------------------------------------------------------------------------
// Engine name
// ---------------------------------------------------------------------------

export type EngineName = 'docker' | 'podman';

export const ENGINE_NAMES: readonly EngineName[] = ['docker', 'podman'];

export function isEngineName(value: unknown): value is EngineName {
  return ENGINE_NAMES.some((name) => name === value);
}

// ---------------------------------------------------------------------------
// Exec
// ---------------------------------------------------------------------------

export interface ExecOptions {
  /** Working directory of the child process. */
  cwd?: string;
  /** Variables added on top of the current environment. */
  env?: Record<string, string>;
  /**
   * Attach the child to this process's stdio instead of capturing it.
   * Builds and interactive runs use this; `stdout`/`stderr` are then empty.
   */
  inherit?: boolean;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
}

/**
 * Run a binary with an argument vector. Resolves on exit code 0 and
 * rejects with an {@link EngineError} otherwise.
 */
export type ExecFn = (
  file: string,
  args: readonly string[],
  options?: ExecOptions,
) => Promise<ExecResult>;

/** Default exec: `child_process.spawn`, no shell. */
export const defaultExec: ExecFn = (file, args, options = {}) =>
  new Promise<ExecResult>((resolvePromise, reject) => {
    const child = spawn(file, [...args], {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: options.inherit ? 'inherit' : ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    child.stdout?.setEncoding('utf-8');
    child.stderr?.setEncoding('utf-8');
    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (err) => {
      reject(new EngineError(`Failed to start ${file}: ${err.message}`, { cause: err }));
    });
    child.on('close', (code, signal) => {
      if (code === 0) {
        resolvePromise({ stdout, stderr });
        return;
      }
      const status = code !== null ? `exit code ${code}` : `signal ${signal ?? 'unknown'}`;
      const detail = stderr.trim().length > 0 ? `: ${stderr.trim()}` : '';
      reject(
        new EngineError(`${file} ${args[0] ?? ''} failed with ${status}${detail}`, {
          exitCode: code ?? undefined,
        }),
      );
    });
  });

// ---------------------------------------------------------------------------
// Build options
// ---------------------------------------------------------------------------

export interface ImageBuildOptions {
  /** Materialized build context directory. */
  contextDir: string;
  /** Path to the Dockerfile. */
  dockerfile: string;
  tag: string;
  /** Passed as `--build-arg=KEY=VALUE`, in insertion order. */
  buildArgs?: Record<string, string>;
  /** Passed as `--ssh <value>`, e.g. `default=/run/ssh-agent.sock`. */
  ssh?: string;
  /** Extra environment for the build process (e.g. `BUILDKIT_PROGRESS`). */
  env?: Record<string, string>;
}

// ---------------------------------------------------------------------------
// ContainerEngine
// ---------------------------------------------------------------------------

export interface ContainerEngine {
  readonly name: EngineName;
  /** Binary invoked for every command. */
  readonly binary: string;

  /** Whether the binary is installed and its daemon (if any) answers. */
  isAvailable(): Promise<boolean>;

  /** e.g. `"Docker 27.5.1"`. */
  version(): Promise<string>;

  /** Argument vector for {@link build}, without the binary. */
  buildCommand(options: ImageBuildOptions): string[];

  /** Build an image, streaming engine output to this process's stdio. */
  build(options: ImageBuildOptions): Promise<void>;

  /**
   * Start a container. `args` is everything after the binary, starting
   * with `run`, as produced by `ConcreteDockerRunner.args()`.
   */
  run(args: readonly string[]): Promise<void>;

  /** Run a command in a running container. */
  exec(container: string, command: readonly string[], options?: { tty?: boolean }): Promise<void>;
}
