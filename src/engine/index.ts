export {ContainerRuntime, type LogLine, type OnLogLine} from './runtime.js'
export {DockerCliRuntime, type DockerCliRuntimeOptions, dockerCliEnv} from './docker-runtime.js'
export {composeCli, type ComposeCliOptions, type ComposeRunner} from './compose.js'
export {
  ExecaProcessLauncher,
  ProcessLauncher,
  isFailure,
  type HostProcess,
  type ProcessOutcome,
  type RunOptions,
  type SpawnOptions
} from './application.js'
export type {
  BuildImageRequest,
  ContainerFilter,
  ContainerSummary,
  CreateContainerRequest,
  PortBinding,
  ProgressEvent
} from './types.js'
