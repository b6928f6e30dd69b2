/**
 * Build context management.
 *
 * A BuildContext maps context-relative paths (what a Dockerfile COPY
 * instruction names) to host paths (what gets staged), and materializes
 * that mapping into a directory tree handed to the engine's build command.
 *
 * Context paths are computed at registration:
 *   - with a context root, the host path relative to that root, so the
 *     directory layout is kept and `a/file.txt` never meets `b/file.txt`;
 *   - without one, the basename only. Two host paths sharing a basename
 *     collide and the second registration fails.
 *
 * Registration is pure path arithmetic. Host paths are only required to
 * exist when {@link BuildContext.build} materializes them.
 */

import {
  chmodSync,
  copyFileSync,
  cpSync,
  lstatSync,
  mkdirSync,
  statSync,
  utimesSync,
  type Stats,
} from 'node:fs';
import { basename, dirname, isAbsolute, join, posix, relative, resolve, sep } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  AmbiguousMappingError,
  ConflictingMergeError,
  InvalidPathError,
  MissingHostPathError,
  PathEscapeError,
  UnsupportedPathTypeError,
  type MergeConflict,
} from './errors.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A host path as accepted at the API boundary: a string or a `file:` URL. */
export type HostPathInput = string | URL;

/** One staged path. */
export interface ContextEntry {
  /** Relative POSIX path inside the build context. */
  contextPath: string;
  /** Absolute host path. */
  hostPath: string;
}

export interface BuildContextOptions {
  /**
   * Directory that context paths are computed relative to. Every host path
   * registered afterwards must live under it.
   */
  contextRoot?: HostPathInput;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Path helpers
// ---------------------------------------------------------------------------

/**
 * Normalize a path input into an absolute host path.
 *
 * Relative strings resolve against the current working directory, once,
 * so a later `chdir` cannot change what an entry points at.
 */
export function toHostPath(input: HostPathInput): string {
  if (input instanceof URL) {
    if (input.protocol !== 'file:') {
      throw new InvalidPathError(`Only file: URLs can be used as host paths, got ${input.href}`, [
        input.href,
      ]);
    }
    return resolve(fileURLToPath(input));
  }
  if (typeof input !== 'string' || input.length === 0) {
    throw new InvalidPathError('Host path must be a non-empty string or file: URL');
  }
  return resolve(input);
}

/** Convert a native relative path to the forward-slash form COPY expects. */
function toPosix(relativePath: string): string {
  return sep === '/' ? relativePath : relativePath.split(sep).join('/');
}

/**
 * True when a context path would land outside the context directory:
 * absolute, or holding a `..` segment under either separator.
 */
export function escapesContext(contextPath: string): boolean {
  if (isAbsolute(contextPath) || contextPath.startsWith('/') || contextPath.startsWith('\\')) {
    return true;
  }
  return contextPath.split(/[\\/]/).includes('..');
}

/**
 * Canonical spelling of a serialized context path: `./a.txt`, `a//a.txt`
 * and `a.txt/` all become `a.txt`. Escaping paths are returned unchanged
 * so that {@link BuildContext.build} still rejects them.
 */
export function normalizeContextPath(contextPath: string): string {
  if (escapesContext(contextPath)) return contextPath;
  const normalized = posix.normalize(contextPath);
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

function describeKind(stats: Stats): string {
  if (stats.isSocket()) return 'a socket';
  if (stats.isFIFO()) return 'a FIFO';
  if (stats.isCharacterDevice()) return 'a character device';
  if (stats.isBlockDevice()) return 'a block device';
  return 'an unknown file type';
}

// ---------------------------------------------------------------------------
// BuildContext
// ---------------------------------------------------------------------------

export class BuildContext {
  private readonly root: string | undefined;
  /** contextPath → hostPath, in registration order. */
  private readonly mapping = new Map<string, string>();
  private readonly logger: Logger;

  constructor(options: BuildContextOptions = {}) {
    this.root = options.contextRoot !== undefined ? toHostPath(options.contextRoot) : undefined;
    this.logger = options.logger ?? createLogger('context');
  }

  /**
   * Restore a context from serialized entries (see {@link toJSON}).
   *
   * Context paths are normalized first, so two spellings of one
   * destination count as one key. Nothing here checks that a context path
   * is safe; {@link build} does, before it writes anything for that entry.
   *
   * @throws AmbiguousMappingError if one context path names two host paths.
   */
  static fromEntries(
    entries: Iterable<ContextEntry>,
    options: BuildContextOptions = {},
  ): BuildContext {
    const context = new BuildContext(options);
    for (const entry of entries) {
      const contextPath = normalizeContextPath(entry.contextPath);
      const resolved = toHostPath(entry.hostPath);
      const existing = context.mapping.get(contextPath);
      if (existing !== undefined && existing !== resolved) {
        throw new AmbiguousMappingError(contextPath, existing, resolved);
      }
      context.mapping.set(contextPath, resolved);
    }
    return context;
  }

  get contextRoot(): string | undefined {
    return this.root;
  }

  get size(): number {
    return this.mapping.size;
  }

  has(contextPath: string): boolean {
    return this.mapping.has(contextPath);
  }

  hostPathOf(contextPath: string): string | undefined {
    return this.mapping.get(contextPath);
  }

  /** Snapshot of every entry in registration order. */
  entries(): ContextEntry[] {
    return [...this.mapping].map(([contextPath, hostPath]) => ({ contextPath, hostPath }));
  }

  toJSON(): { contextRoot?: string; entries: ContextEntry[] } {
    return this.root !== undefined
      ? { contextRoot: this.root, entries: this.entries() }
      : { entries: this.entries() };
  }

  /** Independent copy with the same root and entries. */
  clone(): BuildContext {
    const copy = new BuildContext({ contextRoot: this.root, logger: this.logger });
    for (const [contextPath, hostPath] of this.mapping) {
      copy.mapping.set(contextPath, hostPath);
    }
    return copy;
  }

  // -----------------------------------------------------------------------
  // Registration
  // -----------------------------------------------------------------------

  /**
   * Register a host file or directory and return its context path.
   *
   * Registering the same host path twice returns the same context path.
   *
   * @throws InvalidPathError if the path is outside the context root, or has
   *   no basename when there is no root.
   * @throws AmbiguousMappingError if the computed context path already
   *   belongs to another host path.
   */
  addContextEntry(hostPath: HostPathInput): string {
    const resolved = toHostPath(hostPath);
    const contextPath = this.contextPathFor(resolved);

    const existing = this.mapping.get(contextPath);
    if (existing !== undefined) {
      if (existing !== resolved) {
        throw new AmbiguousMappingError(contextPath, existing, resolved);
      }
      return contextPath;
    }

    this.mapping.set(contextPath, resolved);
    this.logger.debug('context entry registered', { contextPath, hostPath: resolved });
    return contextPath;
  }

  private contextPathFor(hostPath: string): string {
    if (this.root === undefined) {
      const name = basename(hostPath);
      if (name.length === 0) {
        throw new InvalidPathError(`Host path has no basename to stage it under: ${hostPath}`, [
          hostPath,
        ]);
      }
      return name;
    }

    const rel = relative(this.root, hostPath);
    if (rel.length === 0) {
      return '.';
    }
    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new InvalidPathError(`Host path ${hostPath} is not under context root ${this.root}`, [
        hostPath,
      ]);
    }
    return toPosix(rel);
  }

  // -----------------------------------------------------------------------
  // Merge
  // -----------------------------------------------------------------------

  /**
   * Merge every entry of `other` into this context.
   *
   * A context path present in both with different host paths is a
   * conflict. All conflicts are collected and reported together, and
   * neither context is modified when there is one.
   *
   * @throws ConflictingMergeError
   */
  extend(other: BuildContext): void {
    const conflicts = this.conflictsWith(other);
    if (conflicts.length > 0) {
      throw new ConflictingMergeError(conflicts);
    }
    for (const [contextPath, hostPath] of other.mapping) {
      this.mapping.set(contextPath, hostPath);
    }
  }

  /** Context paths both contexts map, to different host paths. */
  conflictsWith(other: BuildContext): MergeConflict[] {
    const conflicts: MergeConflict[] = [];
    for (const [contextPath, theirs] of other.mapping) {
      const ours = this.mapping.get(contextPath);
      if (ours !== undefined && ours !== theirs) {
        conflicts.push({ contextPath, ours, theirs });
      }
    }
    return conflicts;
  }

  // -----------------------------------------------------------------------
  // Materialization
  // -----------------------------------------------------------------------

  /**
   * Copy every entry into `targetDir`, creating it if needed.
   *
   * Files keep their mode and timestamps. Directories are copied
   * recursively and merged into whatever already sits at the destination.
   * Symbolic links are followed.
   *
   * The first invalid entry aborts the build. The directory is then in an
   * unspecified state and must not be handed to the engine.
   *
   * @throws PathEscapeError, MissingHostPathError, UnsupportedPathTypeError,
   *   InvalidPathError when a file is registered as the context root itself.
   */
  build(targetDir: HostPathInput): void {
    const started = Date.now();
    const target = toHostPath(targetDir);
    mkdirSync(target, { recursive: true });

    for (const [contextPath, hostPath] of this.mapping) {
      if (escapesContext(contextPath)) {
        throw new PathEscapeError(contextPath);
      }
      materialize(hostPath, contextPath, target);
    }

    this.logger.info('build context materialized', {
      target,
      entries: this.mapping.size,
      duration_ms: Date.now() - started,
    });
  }
}

// ---------------------------------------------------------------------------
// Copy one entry
// ---------------------------------------------------------------------------

function materialize(hostPath: string, contextPath: string, target: string): void {
  const destination = join(target, ...contextPath.split('/'));
  const stats = statSync(hostPath, { throwIfNoEntry: false });
  if (stats === undefined) {
    const link = lstatSync(hostPath, { throwIfNoEntry: false });
    if (link?.isSymbolicLink()) {
      throw new UnsupportedPathTypeError(hostPath, 'a dangling symbolic link');
    }
    throw new MissingHostPathError(hostPath);
  }

  if (stats.isFile()) {
    if (contextPath === '.') {
      throw new InvalidPathError(
        `Only a directory can be staged as the context directory itself: ${hostPath}`,
        [hostPath],
      );
    }
    mkdirSync(dirname(destination), { recursive: true });
    copyFileSync(hostPath, destination);
    chmodSync(destination, stats.mode & 0o7777);
    utimesSync(destination, stats.atime, stats.mtime);
    return;
  }

  if (stats.isDirectory()) {
    mkdirSync(dirname(destination), { recursive: true });
    try {
      cpSync(hostPath, destination, {
        recursive: true,
        force: true,
        dereference: true,
        preserveTimestamps: true,
      });
    } catch (err) {
      throw directoryCopyError(err);
    }
    return;
  }

  throw new UnsupportedPathTypeError(hostPath, describeKind(stats));
}

/** Kinds behind the error codes `cpSync` raises for entries it cannot copy. */
const UNCOPYABLE_KINDS: Readonly<Record<string, string>> = {
  ERR_FS_CP_SOCKET: 'a socket',
  ERR_FS_CP_FIFO_PIPE: 'a FIFO',
  ERR_FS_CP_UNKNOWN: 'an unknown file type',
};

/**
 * Translate a failure on a path inside a copied directory into the error
 * of that inner path. Anything else is returned as is.
 */
function directoryCopyError(err: unknown): unknown {
  if (!(err instanceof Error) || !('code' in err) || typeof err.code !== 'string') return err;
  if (!('path' in err) || typeof err.path !== 'string') return err;

  if (err.code === 'ENOENT') {
    const link = lstatSync(err.path, { throwIfNoEntry: false });
    return link?.isSymbolicLink()
      ? new UnsupportedPathTypeError(err.path, 'a dangling symbolic link', err)
      : new MissingHostPathError(err.path, err);
  }

  const kind = UNCOPYABLE_KINDS[err.code];
  return kind !== undefined ? new UnsupportedPathTypeError(err.path, kind, err) : err;
}

// ---------------------------------------------------------------------------
// mergeContexts
// ---------------------------------------------------------------------------

/**
 * Merge contexts left to right into a fresh context without a root.
 *
 * Each step checks the incoming context against everything merged so far,
 * so two conflicting contexts anywhere in the list fail the merge even if
 * they are not adjacent. The inputs are never modified.
 *
 * @throws ConflictingMergeError at the first step that conflicts.
 */
export function mergeContexts(...contexts: BuildContext[]): BuildContext {
  const merged = new BuildContext();
  for (const context of contexts) {
    merged.extend(context);
  }
  return merged;
}
