/**
 * Dockerfile builders.
 *
 * A {@link PartialDockerBuilder} records instructions and the build context
 * their COPY sources need. Partials compose: `extend` appends another
 * partial's instructions and merges its context. A {@link DockerBuilder}
 * adds an image tag and package manager and drives a build end to end:
 *
 *   1. lease a workspace directory
 *   2. write the Dockerfile into it
 *   3. materialize the build context into `<workspace>/context`
 *   4. hand both to the container engine
 *
 * The engine is never invoked when step 3 fails.
 */

import { chmodSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { BuildContext, type HostPathInput } from './build-context.js';
import type { ContainerEngine, ImageBuildOptions } from './container/engine.js';
import { DockerEngine } from './container/docker-engine.js';
import {
  AddPackagesInstruction,
  CopyInstruction,
  RawInstruction,
  renderDockerfile,
  type DockerfileInstruction,
} from './dockerfile/instructions.js';
import type { RunMount } from './dockerfile/run-mount.js';
import { EngineError, InvalidInstructionError } from './errors.js';
import { currentHostIds, type HostIds } from './host-ids.js';
import { createLogger, type Logger } from './logger.js';
import { ConcreteDockerRunner } from './runner.js';
import { renderShellScript } from './shell-script.js';
import { TempWorkspace, type Workspace } from './workspace.js';

// ---------------------------------------------------------------------------
// PartialDockerBuilder
// ---------------------------------------------------------------------------

export interface PartialDockerBuilderOptions {
  /**
   * Root of the build context. With a root, COPY sources keep their path
   * relative to it; without one they are staged by basename.
   */
  contextRoot?: HostPathInput;
  logger?: Logger;
}

export interface CopyOptions {
  /** One host path or several. */
  source: HostPathInput | readonly HostPathInput[];
  /** Path inside the image. */
  destination: string;
  chown?: string;
  chmod?: string;
}

export class PartialDockerBuilder {
  protected readonly instructions: DockerfileInstruction[] = [];
  protected readonly context: BuildContext;
  protected readonly logger: Logger;
  private sshRequired = false;

  constructor(options: PartialDockerBuilderOptions = {}) {
    this.logger = options.logger ?? createLogger('builder');
    this.context = new BuildContext({
      contextRoot: options.contextRoot,
      logger: this.logger.child('context'),
    });
  }

  /**
   * Merge builders left to right into a fresh partial builder without a
   * context root. The inputs are not modified.
   */
  static merge(...builders: PartialDockerBuilder[]): PartialDockerBuilder {
    const result = new PartialDockerBuilder();
    for (const builder of builders) {
      result.extend(builder);
    }
    return result;
  }

  /** Whether a RUN instruction uses an ssh mount, so the build needs `--ssh`. */
  get needsSsh(): boolean {
    return this.sshRequired;
  }

  /** The context COPY sources were registered in. */
  get buildContext(): BuildContext {
    return this.context;
  }

  /** Snapshot of the recorded instructions. */
  getInstructions(): DockerfileInstruction[] {
    return [...this.instructions];
  }

  /**
   * Append `other`'s instructions and merge its build context into ours.
   *
   * @throws ConflictingMergeError before anything is modified when both
   *   contexts stage different host paths under one context path.
   */
  extend(other: PartialDockerBuilder): void {
    this.context.extend(other.context);
    this.instructions.push(...other.instructions);
    this.sshRequired = this.sshRequired || other.sshRequired;
  }

  // -----------------------------------------------------------------------
  // Instructions
  // -----------------------------------------------------------------------

  /** Blank line. */
  space(): void {
    this.raw('');
  }

  /** `# text` */
  desc(text: string): void {
    this.raw(`# ${text}`);
  }

  fromImage(tag: string): void {
    this.raw(`FROM ${tag}`);
  }

  arg(name: string, value?: string): void {
    this.raw(value === undefined ? `ARG ${name}` : `ARG ${name}=${value}`);
  }

  env(name: string, value: string): void {
    this.raw(`ENV ${name}=${value}`);
  }

  run(command: string, mounts: readonly RunMount[] = []): void {
    if (mounts.length === 0) {
      this.raw(`RUN ${command}`);
      return;
    }
    const flags = mounts.map((m) => m.toFlag()).join(' ');
    this.raw(`RUN ${flags} \\\n    ${command}`);
    if (mounts.some((m) => m.type === 'ssh')) {
      this.sshRequired = true;
    }
  }

  /** Several commands chained with `&&` in one RUN. */
  runMultiple(commands: readonly string[], mounts: readonly RunMount[] = []): void {
    this.run(commands.join(' && \\\n    '), mounts);
  }

  /** Exec-form ENTRYPOINT. */
  entrypoint(command: readonly string[]): void {
    this.raw(`ENTRYPOINT [${command.map((c) => `"${c}"`).join(', ')}]`);
  }

  /** Defaults to the `USER_NAME` build argument. */
  user(name = ''): void {
    this.raw(`USER ${name.length > 0 ? name : '${USER_NAME}'}`);
  }

  root(): void {
    this.user('root');
  }

  workdir(path: string): void {
    this.raw(`WORKDIR ${path}`);
  }

  addPackages(packages: readonly string[]): void {
    this.instructions.push(new AddPackagesInstruction(packages));
  }

  /**
   * Stage host paths in the build context and COPY them into the image.
   *
   * @returns The context paths the COPY names.
   * @throws InvalidInstructionError when no source is given.
   */
  copy(options: CopyOptions): string[] {
    const sources =
      typeof options.source === 'string' || options.source instanceof URL
        ? [options.source]
        : [...options.source];

    if (sources.length === 0) {
      throw new InvalidInstructionError('COPY requires at least one source path');
    }

    const contextPaths = sources.map((s) => this.context.addContextEntry(s));
    const instruction = new CopyInstruction({
      sources: contextPaths,
      destination: options.destination,
      chown: options.chown,
      chmod: options.chmod,
    });
    this.instructions.push(instruction);
    return contextPaths;
  }

  private raw(text: string): void {
    this.instructions.push(new RawInstruction(text));
  }
}

// ---------------------------------------------------------------------------
// DockerBuilder
// ---------------------------------------------------------------------------

export interface DockerBuilderOptions extends PartialDockerBuilderOptions {
  tag: string;
  /** `'apt'`, or `''` for images that never call `addPackages`. */
  packageManager: string;
  /** BuildKit (default) or the legacy builder. */
  useBuildkit?: boolean;
  engine?: ContainerEngine;
  workspace?: Workspace;
  hostIds?: HostIds;
  /** Environment read for `SSH_AUTH_SOCK`. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

export interface BuildCommandOptions {
  dockerfile: string;
  contextDir: string;
  uid?: string;
  gid?: string;
}

export interface BuildOptions {
  /** Also write the Dockerfile here. */
  dockerfileSavePath?: string;
  /** Use this directory as the context instead of materializing one. */
  contextDir?: string;
  /** Keep the workspace after the build, whatever the outcome. */
  keepContext?: boolean;
}

export interface BuildResult {
  tag: string;
  /** Set when the workspace was kept. */
  workspacePath?: string;
}

export class DockerBuilder extends PartialDockerBuilder {
  readonly tag: string;
  readonly packageManager: string;
  readonly useBuildkit: boolean;

  protected readonly engine: ContainerEngine;
  protected readonly workspace: Workspace;
  protected readonly hostIds: HostIds;
  private readonly processEnv: NodeJS.ProcessEnv;

  constructor(options: DockerBuilderOptions) {
    super(options);
    this.tag = options.tag;
    this.packageManager = options.packageManager;
    this.useBuildkit = options.useBuildkit ?? true;
    this.engine = options.engine ?? new DockerEngine();
    this.workspace = options.workspace ?? new TempWorkspace();
    this.hostIds = options.hostIds ?? currentHostIds();
    this.processEnv = options.env ?? process.env;
  }

  /**
   * New builder with this builder's settings holding this builder's
   * instructions followed by `other`'s. Neither input is modified.
   */
  merged(other: PartialDockerBuilder): DockerBuilder {
    const result = new DockerBuilder(this.settings());
    result.extend(this);
    result.extend(other);
    return result;
  }

  protected settings(): DockerBuilderOptions {
    return {
      tag: this.tag,
      packageManager: this.packageManager,
      useBuildkit: this.useBuildkit,
      engine: this.engine,
      workspace: this.workspace,
      hostIds: this.hostIds,
      env: this.processEnv,
      logger: this.logger,
    };
  }

  // -----------------------------------------------------------------------
  // Dockerfile
  // -----------------------------------------------------------------------

  renderDockerfile(): string {
    return renderDockerfile(this.packageManager, this.instructions);
  }

  /** Write the rendered Dockerfile to every path, creating parent directories. */
  writeDockerfile(paths: readonly string[]): void {
    const content = this.renderDockerfile();
    for (const path of paths) {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, content, 'utf-8');
    }
  }

  // -----------------------------------------------------------------------
  // Build command
  // -----------------------------------------------------------------------

  /** Environment of the engine's build process. */
  buildEnvironment(): Record<string, string> {
    return this.useBuildkit ? { BUILDKIT_PROGRESS: 'plain' } : { DOCKER_BUILDKIT: '0' };
  }

  /**
   * Options handed to the engine. UID/GID build arguments are left out
   * when empty or `0` (root).
   *
   * @throws EngineError when an ssh mount is used and `SSH_AUTH_SOCK` is unset.
   */
  imageBuildOptions(options: BuildCommandOptions): ImageBuildOptions {
    const buildArgs: Record<string, string> = {};
    if (options.uid && options.uid !== '0') buildArgs['UID'] = options.uid;
    if (options.gid && options.gid !== '0') buildArgs['GID'] = options.gid;

    const result: ImageBuildOptions = {
      contextDir: options.contextDir,
      dockerfile: options.dockerfile,
      tag: this.tag,
      buildArgs,
      env: this.buildEnvironment(),
    };

    if (this.needsSsh) {
      const sock = this.processEnv['SSH_AUTH_SOCK'];
      if (!sock) {
        throw new EngineError('An ssh mount is used but SSH_AUTH_SOCK is not set');
      }
      result.ssh = `default=${sock}`;
    }
    return result;
  }

  /** Engine arguments of the build, without the binary. */
  buildArgs(options: BuildCommandOptions): string[] {
    return this.engine.buildCommand(this.imageBuildOptions(options));
  }

  /**
   * Script that builds the image from a directory holding the Dockerfile
   * and the materialized context, as the invoking user.
   */
  renderBuildScript(): string {
    const args = this.buildArgs({
      dockerfile: 'Dockerfile',
      contextDir: '.',
      uid: '$(id -u)',
      gid: '$(id -g)',
    });
    return renderShellScript([this.engine.binary, ...args], this.buildEnvironment());
  }

  writeBuildScript(path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, this.renderBuildScript(), 'utf-8');
    chmodSync(path, 0o755);
  }

  // -----------------------------------------------------------------------
  // Build
  // -----------------------------------------------------------------------

  async build(options: BuildOptions = {}): Promise<BuildResult> {
    const started = Date.now();
    const logger = this.logger.withContext({ tag: this.tag });
    const lease = this.workspace.acquire('build');
    const keep = options.keepContext ?? false;

    try {
      const dockerfile = join(lease.path, 'Dockerfile');
      this.writeDockerfile(
        options.dockerfileSavePath !== undefined
          ? [dockerfile, resolve(options.dockerfileSavePath)]
          : [dockerfile],
      );

      let contextDir: string;
      if (options.contextDir !== undefined) {
        contextDir = resolve(options.contextDir);
      } else {
        contextDir = join(lease.path, 'context');
        this.context.build(contextDir);
      }

      await this.engine.build(
        this.imageBuildOptions({ dockerfile, contextDir, ...this.hostIds }),
      );
      logger.info('image built', { duration_ms: Date.now() - started });
    } catch (err) {
      logger.error('image build failed', { error: err, workspace: lease.path });
      throw err;
    } finally {
      if (!keep) {
        lease.release();
      }
    }

    return keep ? { tag: this.tag, workspacePath: lease.path } : { tag: this.tag };
  }

  /** Runner for the image this builder produces, named after its tag. */
  getRunner(options: { workdir?: string } = {}): ConcreteDockerRunner {
    return new ConcreteDockerRunner({
      image: this.tag,
      name: this.tag,
      workdir: options.workdir,
      engine: this.engine,
      hostIds: this.hostIds,
    });
  }
}

// ---------------------------------------------------------------------------
// UbuntuDockerBuilder
// ---------------------------------------------------------------------------

export interface UbuntuDockerBuilderOptions extends Omit<DockerBuilderOptions, 'packageManager'> {
  /** e.g. `ubuntu:24.04`; becomes the FROM line. */
  baseImage: string;
}

/** apt-based builder with user-management helpers for Ubuntu images. */
export class UbuntuDockerBuilder extends DockerBuilder {
  constructor(options: UbuntuDockerBuilderOptions) {
    super({ ...options, packageManager: 'apt' });
    this.fromImage(options.baseImage);
  }

  setLocales(): void {
    this.env('LC_ALL', 'en_US.UTF-8');
    this.env('LANG', 'en_US.UTF-8');
    this.env('LANGUAGE', 'en_US.UTF-8');
  }

  /** Restore the full Ubuntu image when the `unminimize` tool is available. */
  unminimize(): void {
    this.runMultiple([
      'apt-get update',
      '((apt-cache show unminimize && apt-get install -y unminimize) || true)',
      'rm -rf /var/lib/apt/lists/*',
    ]);
    this.run('if which unminimize; then yes | unminimize; fi');
  }

  removeGroupIfGidExists(gid: string): void {
    this.desc(`Remove group with gid=${gid} if it already exists.`);
    this.run(
      `grep :${gid}: /etc/group && \\\n` +
        `    (grep :${gid}: /etc/group | \\\n` +
        `     cut -d ':' -f 1 | \\\n` +
        `     xargs groupdel) || \\\n` +
        `    true`,
    );
  }

  removeUserIfUidExists(uid: string): void {
    this.desc(`Remove user with uid=${uid} if it already exists.`);
    this.run(
      `grep :${uid}: /etc/passwd && \\\n` +
        `    (grep :${uid}: /etc/passwd | \\\n` +
        `     cut -d ':' -f 1 | \\\n` +
        `     xargs userdel --remove) || \\\n` +
        `    true`,
    );
  }

  /**
   * Passwordless-sudo user whose UID/GID come from build arguments
   * (1000 unless the build passes the invoking user's ids).
   */
  createUser(username: string): void {
    this.arg('USER_NAME', username);
    this.arg('UID', '1000');
    this.arg('GID', '1000');
    this.removeGroupIfGidExists('${GID}');
    this.removeUserIfUidExists('${UID}');
    this.run('groupadd -g ${GID} ${USER_NAME}');
    this.run('adduser --disabled-password --uid $UID --gid $GID --gecos "" ${USER_NAME}');
    this.run('adduser ${USER_NAME} sudo');
    this.run("echo '%sudo ALL=(ALL) NOPASSWD:ALL' >> /etc/sudoers");
    this.run('echo "${USER_NAME} ALL=(ALL) NOPASSWD:ALL" > /etc/sudoers.d/10-docker');
  }
}
