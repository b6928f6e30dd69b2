/**
 * In-memory container engine for tests.
 *
 * Records every build, run and exec call instead of spawning anything,
 * and can be told to fail the next build or report itself unavailable.
 */

import type { ContainerEngine, EngineName, ImageBuildOptions } from './engine.js';
import { DockerEngine } from './docker-engine.js';
import { EngineError } from '../errors.js';

export interface RecordedExec {
  container: string;
  command: string[];
  tty: boolean;
}

export class MockEngine implements ContainerEngine {
  readonly name: EngineName;
  readonly binary: string;

  /** Options of every successful build, in call order. */
  readonly builds: ImageBuildOptions[] = [];
  /** Argument vectors of every run, in call order. */
  readonly runs: string[][] = [];
  readonly execs: RecordedExec[] = [];

  private available = true;
  private nextBuildFailure: string | null = null;
  /** Called during build, while the context directory still exists. */
  private onBuild: ((options: ImageBuildOptions) => void) | null = null;

  constructor(name: EngineName = 'docker') {
    this.name = name;
    this.binary = name;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async version(): Promise<string> {
    return `Mock ${this.name} 1.0.0`;
  }

  buildCommand(options: ImageBuildOptions): string[] {
    return new DockerEngine({ binary: this.binary }).buildCommand(options);
  }

  async build(options: ImageBuildOptions): Promise<void> {
    if (this.nextBuildFailure !== null) {
      const message = this.nextBuildFailure;
      this.nextBuildFailure = null;
      throw new EngineError(message, { exitCode: 1 });
    }
    this.onBuild?.(options);
    this.builds.push({ ...options });
  }

  async run(args: readonly string[]): Promise<void> {
    this.runs.push([...args]);
  }

  async exec(
    container: string,
    command: readonly string[],
    options: { tty?: boolean } = {},
  ): Promise<void> {
    this.execs.push({ container, command: [...command], tty: options.tty ?? false });
  }

  // -----------------------------------------------------------------------
  // Test controls
  // -----------------------------------------------------------------------

  setAvailable(value: boolean): void {
    this.available = value;
  }

  /** Make the next `build()` reject with an EngineError. */
  simulateBuildFailure(message = 'Build failed'): void {
    this.nextBuildFailure = message;
  }

  /** Inspect the context directory while a build is "running". */
  inspectBuilds(callback: (options: ImageBuildOptions) => void): void {
    this.onBuild = callback;
  }
}
