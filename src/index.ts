/**
 * Library exports for programmatic use.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {ConsoleReporter, DockerCliRuntime, ExecaProcessLauncher, Project, composeCli, loadProject} from 'devrun'
 *
 * const reporter = new ConsoleReporter()
 * const loaded = await loadProject({path: '/home/me/projects/api', reporter})
 * const project = new Project({
 *   ...loaded,
 *   runtime: new DockerCliRuntime(),
 *   compose: composeCli(),
 *   processes: new ExecaProcessLauncher(),
 *   reporter
 * })
 *
 * await project.up({wait: false})
 * // ...
 * await project.down()
 * ```
 */

export {
  ContainerRuntime,
  DockerCliRuntime,
  ProcessLauncher,
  ExecaProcessLauncher,
  composeCli,
  type ComposeRunner,
  type HostProcess,
  type ProcessOutcome,
  type LogLine,
  type OnLogLine,
  type ContainerSummary,
  type ContainerFilter,
  type CreateContainerRequest,
  type BuildImageRequest,
  type ProgressEvent
} from './engine/index.js'

export * from './core/index.js'

export {
  DevrunError,
  ConfigMissingError,
  ConfigInvalidError,
  MountParseError,
  SettingsInvalidError,
  UpError,
  NoDevContainerError,
  ContainerCreateError,
  ApplicationSpawnError,
  ExecCommandError,
  ImagePullError,
  ComposeError,
  PortAllocationError,
  RuntimeCommunicationError,
  formatErrorChain
} from './errors.js'

export type * from './types.js'
