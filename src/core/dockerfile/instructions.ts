/**
 * Dockerfile instructions and rendering.
 *
 * Instructions are plain values. Rendering is pure: COPY sources are
 * already context paths by the time a CopyInstruction exists, so nothing
 * here touches the filesystem.
 */

import { InvalidInstructionError } from '../errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Package managers that {@link AddPackagesInstruction} can render for. */
export type PackageManager = 'apt';

export interface DockerfileInstruction {
  /**
   * Render as Dockerfile text (possibly several lines).
   * @param packageManager - The builder's package manager, or `''` when it has none.
   */
  render(packageManager: string): string;
}

// ---------------------------------------------------------------------------
// RawInstruction
// ---------------------------------------------------------------------------

/** Text emitted verbatim: FROM/ENV/RUN lines, comments, blank lines. */
export class RawInstruction implements DockerfileInstruction {
  constructor(readonly text: string) {}

  render(): string {
    return this.text;
  }
}

// ---------------------------------------------------------------------------
// CopyInstruction
// ---------------------------------------------------------------------------

export interface CopyInstructionOptions {
  /** Context paths, as returned by `BuildContext.addContextEntry`. */
  sources: readonly string[];
  /** Path inside the image. A directory when there are several sources. */
  destination: string;
  /** Forwarded as `--chown=`. */
  chown?: string;
  /** Forwarded as `--chmod=`. */
  chmod?: string;
}

export class CopyInstruction implements DockerfileInstruction {
  readonly sources: readonly string[];
  readonly destination: string;
  readonly chown?: string;
  readonly chmod?: string;

  constructor(options: CopyInstructionOptions) {
    if (options.sources.length === 0) {
      throw new InvalidInstructionError('COPY requires at least one source path');
    }
    this.sources = [...options.sources];
    this.destination = options.destination;
    this.chown = options.chown;
    this.chmod = options.chmod;
  }

  /** `COPY [--chown=<v>] [--chmod=<v>] <src...> <dst>` */
  render(): string {
    const flags: string[] = [];
    if (this.chown !== undefined) flags.push(`--chown=${this.chown}`);
    if (this.chmod !== undefined) flags.push(`--chmod=${this.chmod}`);

    const flagsStr = flags.length > 0 ? ` ${flags.join(' ')}` : '';
    return `COPY${flagsStr} ${this.sources.join(' ')} ${this.destination}`;
  }
}

// ---------------------------------------------------------------------------
// AddPackagesInstruction
// ---------------------------------------------------------------------------

/** Installs packages with the builder's package manager. */
export class AddPackagesInstruction implements DockerfileInstruction {
  readonly packages: readonly string[];

  constructor(packages: readonly string[]) {
    this.packages = [...packages];
  }

  render(packageManager: string): string {
    switch (packageManager) {
      case 'apt':
        return renderAptInstall(this.packages);
      default:
        throw new InvalidInstructionError(`Unsupported package manager: "${packageManager}"`);
    }
  }
}

/** One package per line, sorted, with the apt lists removed afterwards. */
function renderAptInstall(packages: readonly string[]): string {
  const lines = [...packages].sort().map((p) => `        ${p} \\\n`);
  return (
    'RUN apt-get update && apt-get install -y --no-install-recommends \\\n' +
    lines.join('') +
    '    && rm -rf /var/lib/apt/lists/*'
  );
}

// ---------------------------------------------------------------------------
// renderDockerfile
// ---------------------------------------------------------------------------

/**
 * Join rendered instructions with newlines. Leading and trailing blank
 * space is trimmed and exactly one trailing newline is added, so equal
 * instruction lists always give byte-identical Dockerfiles.
 */
export function renderDockerfile(
  packageManager: string,
  instructions: readonly DockerfileInstruction[],
): string {
  const joined = instructions.map((i) => i.render(packageManager)).join('\n');
  return joined.trim() + '\n';
}
