import type { ContainerEngine, ExecFn } from './engine.js';
import { DockerEngine } from './docker-engine.js';
import { PodmanEngine } from './podman-engine.js';
import type { EngineConfig } from '../../types/config.js';

export interface CreateEngineOptions {
  exec?: ExecFn;
}

/** Instantiate the adapter named by the `[engine]` config section. */
export function createEngine(
  config: EngineConfig,
  options: CreateEngineOptions = {},
): ContainerEngine {
  switch (config.name) {
    case 'docker':
      return new DockerEngine({ binary: config.binary, exec: options.exec });
    case 'podman':
      return new PodmanEngine({ binary: config.binary, exec: options.exec });
  }
}
