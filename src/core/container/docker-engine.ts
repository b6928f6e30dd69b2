/**
 * Docker engine adapter.
 *
 * Reference implementation of {@link ContainerEngine} over the `docker`
 * CLI. No Docker SDK dependency: every operation is an argument vector
 * handed to the injected exec function.
 */

import type { ContainerEngine, EngineName, ExecFn, ImageBuildOptions } from './engine.js';
import { defaultExec } from './engine.js';
import { createLogger, type Logger } from '../logger.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DockerEngineOptions {
  /** Injectable exec function for testing. */
  exec?: ExecFn;
  /** Path to the docker binary. Defaults to `'docker'`. */
  binary?: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// DockerEngine
// ---------------------------------------------------------------------------

export class DockerEngine implements ContainerEngine {
  readonly name: EngineName = 'docker';
  readonly binary: string;

  protected readonly execFn: ExecFn;
  protected readonly logger: Logger;

  constructor(options: DockerEngineOptions = {}) {
    this.execFn = options.exec ?? defaultExec;
    this.binary = options.binary ?? 'docker';
    this.logger = options.logger ?? createLogger('engine:docker');
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.execFn(this.binary, ['info']);
      return true;
    } catch {
      return false;
    }
  }

  async version(): Promise<string> {
    const { stdout } = await this.execFn(this.binary, [
      'version',
      '--format',
      '{{.Server.Version}}',
    ]);
    return `Docker ${stdout.trim()}`;
  }

  buildCommand(options: ImageBuildOptions): string[] {
    const args = ['build', '--file', options.dockerfile];
    for (const [key, value] of Object.entries(options.buildArgs ?? {})) {
      args.push(`--build-arg=${key}=${value}`);
    }
    if (options.ssh !== undefined) {
      args.push('--ssh', options.ssh);
    }
    args.push(`--tag=${options.tag}`, options.contextDir);
    return args;
  }

  async build(options: ImageBuildOptions): Promise<void> {
    const args = this.buildCommand(options);
    this.logger.info('building image', { tag: options.tag, command: this.describe(args) });
    await this.execFn(this.binary, args, {
      cwd: options.contextDir,
      env: options.env,
      inherit: true,
    });
  }

  async run(args: readonly string[]): Promise<void> {
    this.logger.info('running container', { command: this.describe(args) });
    await this.execFn(this.binary, args, { inherit: true });
  }

  async exec(
    container: string,
    command: readonly string[],
    options: { tty?: boolean } = {},
  ): Promise<void> {
    const flags = options.tty ? ['-ti'] : [];
    await this.execFn(this.binary, ['exec', ...flags, container, ...command], { inherit: true });
  }

  /** One-line rendering of a command for logs. */
  protected describe(args: readonly string[]): string {
    return [this.binary, ...args].join(' ');
  }
}
