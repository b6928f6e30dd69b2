/**
 * Scratch directories for builds.
 *
 * A build needs a directory for its Dockerfile and its materialized
 * context. Each {@link WorkspaceLease} is a fresh, uniquely named
 * directory, so concurrent builds (in this process or others) never share
 * one. Whether a lease is released after a failed build is up to the
 * caller.
 */

import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WorkspaceLease {
  /** Absolute path of the leased directory. */
  readonly path: string;
  /** Remove the directory and everything in it. Safe to call twice. */
  release(): void;
}

export interface Workspace {
  /**
   * Create a fresh directory.
   * @param label - Short name folded into the directory name (e.g. `'build'`).
   */
  acquire(label?: string): WorkspaceLease;
}

export interface TempWorkspaceOptions {
  /** Parent of every leased directory. Defaults to `<os tmpdir>/dockwright`. */
  root?: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// TempWorkspace
// ---------------------------------------------------------------------------

/** Labels end up in directory names; keep them to a safe alphabet. */
const LABEL_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

export const DEFAULT_WORKSPACE_ROOT = join(tmpdir(), 'dockwright');

export class TempWorkspace implements Workspace {
  readonly root: string;
  private readonly logger: Logger;

  constructor(options: TempWorkspaceOptions = {}) {
    this.root = resolve(options.root ?? DEFAULT_WORKSPACE_ROOT);
    this.logger = options.logger ?? createLogger('workspace');
  }

  acquire(label = 'build'): WorkspaceLease {
    if (!LABEL_PATTERN.test(label)) {
      throw new Error(`Invalid workspace label: "${label}"`);
    }

    mkdirSync(this.root, { recursive: true });
    const path = mkdtempSync(join(this.root, `${label}-`));
    this.logger.debug('workspace acquired', { path });

    let released = false;
    const logger = this.logger;
    return {
      path,
      release(): void {
        if (released) return;
        released = true;
        rmSync(path, { recursive: true, force: true });
        logger.debug('workspace released', { path });
      },
    };
  }
}
