/**
 * Container invocation builders.
 *
 * A {@link DockerRunner} is a reusable fragment of `docker run` settings
 * (environment, volumes, devices, raw options). Fragments merge, and a
 * fragment is concretized with an image into a {@link ConcreteDockerRunner},
 * which renders the full argument vector or a shell script and runs it
 * through a {@link ContainerEngine}.
 */

import { chmodSync, existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { ContainerEngine } from './container/engine.js';
import { DockerEngine } from './container/docker-engine.js';
import { InvalidInstructionError } from './errors.js';
import { currentHostIds, type HostIds } from './host-ids.js';
import { renderShellScript } from './shell-script.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DockerRunnerOptions {
  /** `--env=KEY=VALUE`, in insertion order. */
  env?: Readonly<Record<string, string>>;
  /** Host path → container path, rendered as `--volume=host:container`. */
  volumes?: Readonly<Record<string, string>>;
  /** Device paths; only those present on the host are passed. */
  devices?: readonly string[];
  /** Raw options appended verbatim after the devices. */
  options?: readonly string[];
}

export interface ConcretizeOptions {
  image: string;
  /** `--name=`; also the target of {@link ConcreteDockerRunner.exec}. */
  name?: string;
  network?: string;
  workdir?: string;
  /** Run as root instead of the invoking user. */
  root?: boolean;
  tty?: boolean;
  interactive?: boolean;
  engine?: ContainerEngine;
  hostIds?: HostIds;
  /** Injectable for tests. */
  deviceExists?: (path: string) => boolean;
}

export type ConcreteDockerRunnerOptions = DockerRunnerOptions & ConcretizeOptions;

// ---------------------------------------------------------------------------
// DockerRunner
// ---------------------------------------------------------------------------

export class DockerRunner {
  readonly env: Readonly<Record<string, string>>;
  readonly volumes: Readonly<Record<string, string>>;
  readonly devices: readonly string[];
  readonly options: readonly string[];

  constructor(options: DockerRunnerOptions = {}) {
    this.env = { ...options.env };
    this.volumes = { ...options.volumes };
    this.devices = [...(options.devices ?? [])];
    this.options = [...(options.options ?? [])];
  }

  /**
   * Combine two fragments. Environment and volumes are unioned with
   * `other` winning on equal keys; devices and options are concatenated.
   */
  merge(other: DockerRunner): DockerRunner {
    return new DockerRunner(mergeSettings(this, other));
  }

  concretize(options: ConcretizeOptions): ConcreteDockerRunner {
    return new ConcreteDockerRunner({
      env: this.env,
      volumes: this.volumes,
      devices: this.devices,
      options: this.options,
      ...options,
    });
  }
}

function mergeSettings(a: DockerRunner, b: DockerRunner): DockerRunnerOptions {
  return {
    env: { ...a.env, ...b.env },
    volumes: { ...a.volumes, ...b.volumes },
    devices: [...a.devices, ...b.devices],
    options: [...a.options, ...b.options],
  };
}

// ---------------------------------------------------------------------------
// ConcreteDockerRunner
// ---------------------------------------------------------------------------

export class ConcreteDockerRunner extends DockerRunner {
  readonly image: string;
  readonly name?: string;
  readonly network?: string;
  readonly workdir?: string;
  readonly root: boolean;
  readonly tty: boolean;
  readonly interactive: boolean;

  private readonly engine: ContainerEngine;
  private readonly hostIds: HostIds;
  private readonly deviceExists: (path: string) => boolean;

  constructor(options: ConcreteDockerRunnerOptions) {
    super(options);
    this.image = options.image;
    this.name = options.name;
    this.network = options.network;
    this.workdir = options.workdir;
    this.root = options.root ?? false;
    this.tty = options.tty ?? true;
    this.interactive = options.interactive ?? true;
    this.engine = options.engine ?? new DockerEngine();
    this.hostIds = options.hostIds ?? currentHostIds();
    this.deviceExists = options.deviceExists ?? existsSync;
  }

  /**
   * Merge a plain fragment into this runner, keeping the image and
   * invocation settings. Two concrete runners do not merge.
   */
  override merge(other: DockerRunner): ConcreteDockerRunner {
    if (other instanceof ConcreteDockerRunner) {
      throw new InvalidInstructionError('Cannot merge two concrete runners');
    }
    return new ConcreteDockerRunner({
      ...mergeSettings(this, other),
      image: this.image,
      name: this.name,
      network: this.network,
      workdir: this.workdir,
      root: this.root,
      tty: this.tty,
      interactive: this.interactive,
      engine: this.engine,
      hostIds: this.hostIds,
      deviceExists: this.deviceExists,
    });
  }

  /** Everything after the engine binary, starting with `run`. */
  args(): string[] {
    const args = ['run', '--rm'];
    if (this.tty) args.push('--tty');
    if (this.interactive) args.push('--interactive');
    for (const [key, value] of Object.entries(this.env)) {
      args.push(`--env=${key}=${value}`);
    }
    for (const [host, container] of Object.entries(this.volumes)) {
      args.push(`--volume=${host}:${container}`);
    }
    for (const device of this.devices) {
      if (this.deviceExists(device)) args.push(`--device=${device}`);
    }
    args.push(...this.options);
    if (this.name) args.push(`--name=${this.name}`);
    args.push(`--hostname=${this.image}`);
    if (this.network) {
      args.push(`--network=${this.network}`, `--add-host=${this.image}:127.0.1.1`);
    }
    if (this.workdir) args.push(`--workdir=${this.workdir}`);
    if (!this.root) args.push(`--user=${this.hostIds.uid}:${this.hostIds.gid}`);
    args.push(this.image);
    return args;
  }

  /** A `/bin/sh` script running the container, forwarding its own arguments. */
  renderScript(): string {
    return renderShellScript([this.engine.binary, ...this.args(), '"$@"']);
  }

  writeScript(path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, this.renderScript(), 'utf-8');
    chmodSync(path, 0o755);
  }

  async run(): Promise<void> {
    await this.engine.run(this.args());
  }

  /** Run a command inside this runner's (named, running) container. */
  async exec(command: readonly string[], options: { tty?: boolean } = {}): Promise<void> {
    if (!this.name) {
      throw new InvalidInstructionError('exec requires a runner with a container name');
    }
    await this.engine.exec(this.name, command, { tty: options.tty ?? true });
  }
}
