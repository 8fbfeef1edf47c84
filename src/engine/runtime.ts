import type {BuildImageRequest, ContainerFilter, ContainerSummary, CreateContainerRequest, ProgressEvent} from './types.js'

/**
 * Log line from a command running inside a container or on the host.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during command execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Narrow façade over a container runtime.
 *
 * Implementations:
 * - `DockerCliRuntime`: Uses Docker CLI
 *
 * Call contract relied upon by the orchestration engine:
 * - `listContainers` includes stopped containers and returns them in the
 *   runtime's own order (newest first for docker); callers use the first match
 * - `startContainer` / `stopContainer` are only called with ids returned by
 *   `listContainers` or `createContainer`
 * - `pullImage` / `buildImage` streams are produced lazily and must be drained
 *   by the caller
 */
export abstract class ContainerRuntime {
  /**
   * Verifies that the runtime is reachable.
   * @throws RuntimeCommunicationError if it is not
   */
  abstract check(): Promise<void>

  /**
   * Lists containers (running or not) matching every criterion of the filter.
   */
  abstract listContainers(filter: ContainerFilter): Promise<ContainerSummary[]>

  /**
   * Creates a container without starting it.
   * @returns The new container id
   */
  abstract createContainer(request: CreateContainerRequest): Promise<string>

  abstract startContainer(id: string): Promise<void>

  abstract stopContainer(id: string): Promise<void>

  /**
   * Runs a command in a running container, streaming its output.
   * @returns The command's exit code
   */
  abstract exec(id: string, cmd: string[], onLogLine: OnLogLine): Promise<number>

  /**
   * Pulls an image, yielding progress entries in emission order.
   */
  abstract pullImage(image: string): AsyncIterable<ProgressEvent>

  /**
   * Builds an image from a tar context, yielding progress entries in emission order.
   */
  abstract buildImage(request: BuildImageRequest): AsyncIterable<ProgressEvent>

  /**
   * Resolves once the container stops.
   * Aborting `signal` abandons the wait and resolves with `undefined`.
   * @returns The container exit code
   */
  abstract waitContainer(id: string, signal?: AbortSignal): Promise<number | undefined>
}
