export type {
  EngineName,
  ExecFn,
  ExecOptions,
  ExecResult,
  ImageBuildOptions,
  ContainerEngine,
} from './engine.js';

export { defaultExec, isEngineName, ENGINE_NAMES } from './engine.js';

export { DockerEngine, type DockerEngineOptions } from './docker-engine.js';

export { PodmanEngine } from './podman-engine.js';

export { MockEngine, type RecordedExec } from './mock-engine.js';

export { createEngine, type CreateEngineOptions } from './create-engine.js';
