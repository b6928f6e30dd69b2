/**
 * Dockwright CLI.
 *
 * Provides the `dockwright` command with subcommands:
 *   - `stage`: Materialize host paths into a build context directory.
 *   - `render`: Print a Dockerfile copying host paths into an image.
 *   - `build`: Build an image from host paths with the configured engine.
 *   - `doctor`: Check the configured container engine.
 *
 * All external dependencies are injected via {@link CliDeps} for testability.
 * The real `main()` wires production dependencies and calls `runCommand()`.
 */

import { resolve } from 'node:path';
import { VERSION } from './index.js';
import { BuildContext } from './core/build-context.js';
import { loadContextManifest } from './core/context-manifest.js';
import { DockerBuilder, PartialDockerBuilder } from './core/builder.js';
import { renderDockerfile } from './core/dockerfile/instructions.js';
import type { ContainerEngine } from './core/container/engine.js';
import { isDockwrightError } from './core/errors.js';
import type { LogLevel } from './core/logger.js';
import type { Workspace } from './core/workspace.js';
import type { DockwrightConfig, EngineConfig } from './types/config.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Injectable dependencies for CLI commands. */
export interface CliDeps {
  /** Write a line to stdout. */
  stdout: (msg: string) => void;
  /** Write a line to stderr. */
  stderr: (msg: string) => void;
  /** Resolved DOCKWRIGHT_HOME path. */
  home: string;
  /** Directory relative paths on the command line resolve against. */
  cwd: string;
  /** Load and validate config from DOCKWRIGHT_HOME. */
  loadConfig: (home: string) => DockwrightConfig;
  /** Apply the effective log level. */
  setLogLevel: (level: LogLevel) => void;
  /** Instantiate the configured container engine. */
  createEngine: (config: EngineConfig) => ContainerEngine;
  /** Workspace for image builds, rooted at `root` when configured. */
  createWorkspace: (root: string | undefined) => Workspace;
  /** Read file contents as string. */
  readFile: (path: string) => string;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  /** Non-option arguments after the command. */
  positionals: string[];
  /** Bare `--flag` arguments. */
  flags: Record<string, boolean>;
  /** `--key=value` arguments. */
  options: Record<string, string>;
}

/**
 * Parse process.argv into a command, positionals, flags and options.
 *
 * Expects argv in the form: [node, script, command?, ...args]. A lone
 * `--` ends option parsing; everything after it is positional.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  let command = '';
  let optionsDone = false;

  for (const arg of args) {
    if (!optionsDone && arg === '--') {
      optionsDone = true;
    } else if (!optionsDone && arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      if (eq === -1) {
        flags[arg.slice(2)] = true;
      } else {
        options[arg.slice(2, eq)] = arg.slice(eq + 1);
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, options };
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

export const USAGE = `Usage: dockwright <command>

Commands:
  stage <dest> <paths...>      Materialize paths into a build context directory
  render <paths...>            Print a Dockerfile copying paths into an image
  build <tag> <paths...>       Build an image copying paths into it
  doctor                       Check the configured container engine

Options:
  --root=<dir>           Keep paths relative to <dir> instead of by basename
  --manifest=<file>      Start staging from a JSON context manifest, which
                         carries its own root (stage; not with --root)
  --dest=<path>          Destination inside the image (render, build)
  --from=<image>         Base image (render, build; build defaults to ubuntu:24.04)
  --save-dockerfile=<f>  Also write the Dockerfile to <f> (build)
  --keep-context         Keep the build workspace (build)
  --debug                Log at debug level
  --version              Show version number
  --help                 Show this help message`;

/**
 * Dispatch a parsed command line to the appropriate handler.
 *
 * Library errors are printed as `error [CODE]: message`.
 *
 * @returns Process exit code (0 = success, 1 = failure).
 */
export async function runCommand(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const { command, flags } = args;

  if (!command && flags['version']) {
    deps.stdout(VERSION);
    return 0;
  }

  if (command === '' || flags['help']) {
    deps.stdout(USAGE);
    return 0;
  }

  try {
    const config = deps.loadConfig(deps.home);
    deps.setLogLevel(flags['debug'] ? 'debug' : config.logging.level);

    switch (command) {
      case 'stage':
        return stage(deps, args);
      case 'render':
        return render(deps, args);
      case 'build':
        return await build(deps, args, config);
      case 'doctor':
        return await doctor(deps, config);
      default:
        deps.stderr(`Unknown command: "${command}"\n`);
        deps.stdout(USAGE);
        return 1;
    }
  } catch (err) {
    reportError(deps, err);
    return 1;
  }
}

function reportError(deps: CliDeps, err: unknown): void {
  if (isDockwrightError(err)) {
    deps.stderr(`error [${err.code}]: ${err.message}`);
  } else if (err instanceof Error) {
    deps.stderr(`error: ${err.message}`);
  } else {
    deps.stderr(`error: ${String(err)}`);
  }
}

function usageError(deps: CliDeps, usage: string): number {
  deps.stderr(`Usage: ${usage}`);
  return 1;
}

function rootOption(deps: CliDeps, args: ParsedArgs): string | undefined {
  const root = args.options['root'];
  return root !== undefined ? resolve(deps.cwd, root) : undefined;
}

// ---------------------------------------------------------------------------
// stage
// ---------------------------------------------------------------------------

/**
 * Register every path in a build context and materialize it into `<dest>`.
 * Prints one `<contextPath> <- <hostPath>` line per staged entry.
 */
export function stage(deps: CliDeps, args: ParsedArgs): number {
  const [dest, ...paths] = args.positionals;
  const manifest = args.options['manifest'];
  if (
    dest === undefined ||
    (paths.length === 0 && manifest === undefined) ||
    (manifest !== undefined && args.options['root'] !== undefined)
  ) {
    return usageError(
      deps,
      'dockwright stage <dest> <paths...> [--root=<dir> | --manifest=<file>]',
    );
  }

  const context =
    manifest !== undefined
      ? loadContextManifest(deps.readFile(resolve(deps.cwd, manifest)))
      : new BuildContext({ contextRoot: rootOption(deps, args) });

  for (const path of paths) {
    context.addContextEntry(resolve(deps.cwd, path));
  }
  context.build(resolve(deps.cwd, dest));

  for (const entry of context.entries()) {
    deps.stdout(`${entry.contextPath} <- ${entry.hostPath}`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// render
// ---------------------------------------------------------------------------

/** Print a Dockerfile: an optional FROM, then one COPY of every path. */
export function render(deps: CliDeps, args: ParsedArgs): number {
  const paths = args.positionals;
  const dest = args.options['dest'];
  if (paths.length === 0 || dest === undefined) {
    return usageError(deps, 'dockwright render <paths...> --dest=<path> [--from=<image>]');
  }

  const builder = new PartialDockerBuilder({ contextRoot: rootOption(deps, args) });
  const from = args.options['from'];
  if (from !== undefined) {
    builder.fromImage(from);
  }
  builder.copy({ source: paths.map((p) => resolve(deps.cwd, p)), destination: dest });

  deps.stdout(renderDockerfile('', builder.getInstructions()).trimEnd());
  return 0;
}

// ---------------------------------------------------------------------------
// build
// ---------------------------------------------------------------------------

const DEFAULT_BASE_IMAGE = 'ubuntu:24.04';

/** Build `<tag>` from a base image plus one COPY of every path. */
export async function build(
  deps: CliDeps,
  args: ParsedArgs,
  config: DockwrightConfig,
): Promise<number> {
  const [tag, ...paths] = args.positionals;
  const dest = args.options['dest'];
  if (tag === undefined || paths.length === 0 || dest === undefined) {
    return usageError(deps, 'dockwright build <tag> <paths...> --dest=<path> [--from=<image>]');
  }

  const builder = new DockerBuilder({
    tag,
    packageManager: '',
    useBuildkit: config.build.buildkit,
    contextRoot: rootOption(deps, args),
    engine: deps.createEngine(config.engine),
    workspace: deps.createWorkspace(config.build.workspace_root),
  });
  builder.fromImage(args.options['from'] ?? DEFAULT_BASE_IMAGE);
  builder.copy({ source: paths.map((p) => resolve(deps.cwd, p)), destination: dest });

  const saveDockerfile = args.options['save-dockerfile'];
  const result = await builder.build({
    dockerfileSavePath:
      saveDockerfile !== undefined ? resolve(deps.cwd, saveDockerfile) : undefined,
    keepContext: config.build.keep_context || args.flags['keep-context'] === true,
  });

  deps.stdout(`Built ${result.tag}`);
  if (result.workspacePath !== undefined) {
    deps.stdout(`Workspace kept at ${result.workspacePath}`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// doctor
// ---------------------------------------------------------------------------

/** Report the configured engine's availability and version. */
export async function doctor(deps: CliDeps, config: DockwrightConfig): Promise<number> {
  const engine = deps.createEngine(config.engine);

  deps.stdout(`  PASS  config: ${deps.home}/config.toml`);

  if (!(await engine.isAvailable())) {
    deps.stderr(`  FAIL  engine: ${engine.binary} is not available`);
    deps.stderr(`        Fix: install ${engine.name} or set [engine] binary in config.toml`);
    deps.stdout('\n1/2 checks passed');
    return 1;
  }

  const version = await engine.version();
  deps.stdout(`  PASS  engine: ${version} (${engine.binary})`);
  deps.stdout('\n2/2 checks passed');
  return 0;
}
