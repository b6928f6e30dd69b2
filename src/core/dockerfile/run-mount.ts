/**
 * BuildKit `RUN --mount=` clauses.
 *
 * A RunMount is a mount type plus an ordered option map. {@link RunMount.toFlag}
 * renders it as `--mount=type=<type>,key=value,...`, where a `true` option
 * becomes a bare key and a `false` one is dropped.
 */

export type MountType = 'bind' | 'cache' | 'tmpfs' | 'secret' | 'ssh';

export type MountOptionValue = string | number | boolean;

export interface CacheMountOptions {
  id?: string;
  ro?: boolean;
  readonly?: boolean;
  sharing?: 'shared' | 'private' | 'locked';
  source?: string;
  from?: string;
  mode?: number;
  uid?: number;
  gid?: number;
}

export interface BindMountOptions {
  source?: string;
  from?: string;
  rw?: boolean;
  readwrite?: boolean;
}

export interface SecretMountOptions {
  id: string;
  target?: string;
  env?: string;
  required?: boolean;
  mode?: number;
  uid?: number;
  gid?: number;
}

export interface SshMountOptions {
  id?: string;
  target?: string;
  required?: boolean;
  mode?: number;
  uid?: number | string;
  gid?: number | string;
}

/** Copy the defined options, in the order they are listed in `keys`. */
function pick<T extends object>(
  into: Map<string, MountOptionValue>,
  options: T,
  keys: readonly (keyof T & string)[],
): void {
  for (const key of keys) {
    const value = options[key];
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      into.set(key, value);
    }
  }
}

export class RunMount {
  readonly type: MountType;
  readonly options: ReadonlyMap<string, MountOptionValue>;

  constructor(type: MountType, options: Iterable<[string, MountOptionValue]> = []) {
    this.type = type;
    this.options = new Map(options);
  }

  /** e.g. `--mount=type=cache,target=/root/.cache/go-build,sharing=locked` */
  toFlag(): string {
    const parts = [`type=${this.type}`];
    for (const [key, value] of this.options) {
      if (typeof value === 'boolean') {
        if (value) parts.push(key);
      } else if (key === 'mode' && typeof value === 'number') {
        // BuildKit parses mode as octal.
        parts.push(`mode=0${value.toString(8)}`);
      } else {
        parts.push(`${key}=${value}`);
      }
    }
    return `--mount=${parts.join(',')}`;
  }

  // -----------------------------------------------------------------------
  // Constructors per mount type
  // -----------------------------------------------------------------------

  /** Persistent cache shared between builds (compiler and package caches). */
  static cache(target: string, options: CacheMountOptions = {}): RunMount {
    const opts = new Map<string, MountOptionValue>([['target', target]]);
    pick(opts, options, [
      'id',
      'ro',
      'readonly',
      'sharing',
      'source',
      'from',
      'mode',
      'uid',
      'gid',
    ]);
    return new RunMount('cache', opts);
  }

  /** Read-only unless `rw` or `readwrite` is set. */
  static bind(target: string, options: BindMountOptions = {}): RunMount {
    const opts = new Map<string, MountOptionValue>([['target', target]]);
    pick(opts, options, ['source', 'from', 'rw', 'readwrite']);
    return new RunMount('bind', opts);
  }

  static tmpfs(target: string, options: { size?: string } = {}): RunMount {
    const opts = new Map<string, MountOptionValue>([['target', target]]);
    pick(opts, options, ['size']);
    return new RunMount('tmpfs', opts);
  }

  /** Build secret passed with `docker build --secret id=...`. */
  static secret(options: SecretMountOptions): RunMount {
    const opts = new Map<string, MountOptionValue>();
    pick(opts, options, ['id', 'target', 'env', 'required', 'mode', 'uid', 'gid']);
    return new RunMount('secret', opts);
  }

  /**
   * SSH agent forwarding. A builder containing one passes
   * `--ssh default=$SSH_AUTH_SOCK` to the engine.
   */
  static ssh(options: SshMountOptions = {}): RunMount {
    const opts = new Map<string, MountOptionValue>();
    pick(opts, options, ['id', 'target', 'required', 'mode', 'uid', 'gid']);
    return new RunMount('ssh', opts);
  }
}
