#!/usr/bin/env node
/**
 * Production entry point for Dockwright.
 *
 * Wires real dependencies (filesystem, process, container engine) into
 * CliDeps and dispatches to the CLI command handler.
 *
 * Usage:
 *   dockwright stage ./ctx src/ README.md --root=.
 *   dockwright render app.toml --dest=/etc/app/ --from=ubuntu:24.04
 *   dockwright doctor
 */

import { readFileSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { resolveHome } from './types/config.js';
import { loadConfig } from './core/config-loader.js';
import { createEngine } from './core/container/create-engine.js';
import { TempWorkspace } from './core/workspace.js';
import { configureLogging } from './core/logger.js';

// ---------------------------------------------------------------------------
// main()
// ---------------------------------------------------------------------------

/**
 * Production main(): wires real deps and dispatches commands.
 *
 * @param argv - Process arguments (defaults to process.argv).
 * @returns Exit code (0 = success, non-zero = failure).
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const args = parseArgs(argv);

  const deps: CliDeps = {
    stdout: (msg: string) => process.stdout.write(`${msg}\n`),
    stderr: (msg: string) => process.stderr.write(`${msg}\n`),
    home: resolveHome(),
    cwd: process.cwd(),
    loadConfig: (home: string) => loadConfig(home),
    setLogLevel: (level) => configureLogging({ level }),
    createEngine: (config) => createEngine(config),
    createWorkspace: (root) => new TempWorkspace({ root }),
    readFile: (path: string) => readFileSync(path, 'utf-8'),
  };

  return runCommand(args, deps);
}

// ---------------------------------------------------------------------------
// Entry point, run when executed directly
// ---------------------------------------------------------------------------

/** True when this module is the script node was started with. */
function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  return realpathSync(script) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
    },
  );
}
