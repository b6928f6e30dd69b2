/**
 * Podman engine adapter.
 *
 * Podman accepts the same `build`/`run`/`exec` vectors as Docker. It has
 * no server daemon, so the version comes from the client and
 * availability is probed with `podman version` rather than `info`.
 */

import { DockerEngine, type DockerEngineOptions } from './docker-engine.js';
import type { EngineName } from './engine.js';
import { createLogger } from '../logger.js';

export class PodmanEngine extends DockerEngine {
  override readonly name: EngineName = 'podman';

  constructor(options: DockerEngineOptions = {}) {
    super({
      ...options,
      binary: options.binary ?? 'podman',
      logger: options.logger ?? createLogger('engine:podman'),
    });
  }

  override async isAvailable(): Promise<boolean> {
    try {
      await this.execFn(this.binary, ['version']);
      return true;
    } catch {
      return false;
    }
  }

  override async version(): Promise<string> {
    const { stdout } = await this.execFn(this.binary, [
      'version',
      '--format',
      '{{.Client.Version}}',
    ]);
    return `Podman ${stdout.trim()}`;
  }
}
