/**
 * Dockwright public API.
 *
 * Declarative Dockerfile and container invocation builders over a build
 * context that stages host paths without name collisions.
 */

export const VERSION = '0.3.0';

export {
  BuildContext,
  mergeContexts,
  toHostPath,
  normalizeContextPath,
  escapesContext,
  type BuildContextOptions,
  type ContextEntry,
  type HostPathInput,
} from './core/build-context.js';

export {
  CONTEXT_MANIFEST_SCHEMA,
  parseContextManifest,
  loadContextManifest,
  type ContextManifest,
} from './core/context-manifest.js';

export {
  PartialDockerBuilder,
  DockerBuilder,
  UbuntuDockerBuilder,
  type PartialDockerBuilderOptions,
  type DockerBuilderOptions,
  type UbuntuDockerBuilderOptions,
  type CopyOptions,
  type BuildCommandOptions,
  type BuildOptions,
  type BuildResult,
} from './core/builder.js';

export {
  DockerRunner,
  ConcreteDockerRunner,
  type DockerRunnerOptions,
  type ConcretizeOptions,
  type ConcreteDockerRunnerOptions,
} from './core/runner.js';

export {
  RawInstruction,
  CopyInstruction,
  AddPackagesInstruction,
  renderDockerfile,
  type DockerfileInstruction,
  type CopyInstructionOptions,
  type PackageManager,
} from './core/dockerfile/instructions.js';

export { RunMount, type MountType, type MountOptionValue } from './core/dockerfile/run-mount.js';

export {
  TempWorkspace,
  DEFAULT_WORKSPACE_ROOT,
  type Workspace,
  type WorkspaceLease,
  type TempWorkspaceOptions,
} from './core/workspace.js';

export * from './core/container/index.js';

export {
  DockwrightError,
  isDockwrightError,
  AmbiguousMappingError,
  ConflictingMergeError,
  PathEscapeError,
  MissingHostPathError,
  UnsupportedPathTypeError,
  InvalidPathError,
  InvalidInstructionError,
  EngineError,
  ConfigError,
  type MergeConflict,
} from './core/errors.js';

export { ErrorCode, type ErrorCodeValue, type ErrorPayload } from './types/errors.js';

export {
  createLogger,
  configureLogging,
  resetLogging,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
} from './core/logger.js';

export { currentHostIds, type HostIds } from './core/host-ids.js';

export { loadConfig } from './core/config-loader.js';
export {
  resolveHome,
  parseConfig,
  defaultConfig,
  type DockwrightConfig,
  type EngineConfig,
  type BuildConfig,
  type LoggingConfig,
} from './types/config.js';
