import {mkdir, mkdtemp, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import type {ProjectEvent, Reporter} from '../core/reporter.js'
import type {InterruptWatch, WatchInterrupt} from '../core/interrupt.js'
import {ProcessLauncher, type HostProcess, type ProcessOutcome, type RunOptions, type SpawnOptions} from '../engine/application.js'
import type {ComposeRunner} from '../engine/compose.js'
import {ContainerRuntime, type LogLine, type OnLogLine} from '../engine/runtime.js'
import type {
  BuildImageRequest,
  ContainerFilter,
  ContainerSummary,
  CreateContainerRequest,
  ProgressEvent
} from '../engine/types.js'
import type {CommandSpec} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'devrun-test-'))
}

/**
 * Writes `files` (path relative to `root` → contents), creating directories.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, contents] of Object.entries(files)) {
    const file = join(root, path)
    await mkdir(dirname(file), {recursive: true})
    await writeFile(file, contents)
  }
}

/**
 * Silent reporter.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records emitted events for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: ProjectEvent[]} {
  const events: ProjectEvent[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    }
  }

  return {reporter, events}
}

/** Names of the recorded events, in emission order. */
export function eventNames(events: ProjectEvent[]): string[] {
  return events.map(event => event.event)
}

function matches(container: ContainerSummary, filter: ContainerFilter): boolean {
  if (filter.name !== undefined && container.name !== filter.name) {
    return false
  }

  return Object.entries(filter.labels ?? {}).every(([key, value]) => container.labels[key] === value)
}

/**
 * In-memory container runtime. Containers live in `containers`; every call is
 * logged to `calls`.
 */
export class FakeRuntime extends ContainerRuntime {
  readonly calls: string[] = []
  readonly containers: ContainerSummary[] = []
  readonly created: CreateContainerRequest[] = []
  readonly builds: BuildImageRequest[] = []
  readonly execs: Array<{id: string; cmd: string[]}> = []

  /** Exit codes returned by successive `exec` calls (0 once exhausted) */
  execExitCodes: number[] = []
  /** Lines streamed by every `exec` call */
  execOutput: LogLine[] = []
  pullEvents: ProgressEvent[] = [{status: 'Pulling from library'}, {status: 'Download complete'}]
  buildEvents: ProgressEvent[] = [{status: 'Step 1/1'}]
  checkError?: Error
  createError?: Error
  /** When set, `waitContainer` resolves at once with this code */
  waitExitCode?: number
  /** Pending waits that ended through their abort signal */
  abortedWaits = 0

  private nextId = 1

  async check(): Promise<void> {
    this.calls.push('check')
    if (this.checkError) {
      throw this.checkError
    }
  }

  async listContainers(filter: ContainerFilter): Promise<ContainerSummary[]> {
    this.calls.push(filter.name === undefined ? 'list' : `list ${filter.name}`)
    return this.containers.filter(container => matches(container, filter))
  }

  async createContainer(request: CreateContainerRequest): Promise<string> {
    this.calls.push('create')
    if (this.createError) {
      throw this.createError
    }

    const id = `container-${this.nextId++}`
    this.created.push(request)
    this.containers.push({
      id,
      name: request.name ?? `random_${id}`,
      image: request.image,
      state: 'created',
      labels: {...request.labels}
    })
    return id
  }

  async startContainer(id: string): Promise<void> {
    this.calls.push(`start ${id}`)
    this.setState(id, 'running')
  }

  async stopContainer(id: string): Promise<void> {
    this.calls.push(`stop ${id}`)
    this.setState(id, 'exited')
  }

  async exec(id: string, cmd: string[], onLogLine: OnLogLine): Promise<number> {
    this.calls.push(`exec ${id}`)
    this.execs.push({id, cmd})
    for (const line of this.execOutput) {
      onLogLine(line)
    }

    return this.execExitCodes.shift() ?? 0
  }

  async * pullImage(image: string): AsyncGenerator<ProgressEvent> {
    this.calls.push(`pull ${image}`)
    yield * this.pullEvents
  }

  async * buildImage(request: BuildImageRequest): AsyncGenerator<ProgressEvent> {
    this.calls.push(`build ${request.tag}`)
    this.builds.push(request)
    yield * this.buildEvents
  }

  async waitContainer(id: string, signal?: AbortSignal): Promise<number | undefined> {
    this.calls.push(`wait ${id}`)
    const exitCode = this.waitExitCode
    if (exitCode !== undefined) {
      return exitCode
    }

    return new Promise(resolve => {
      if (signal?.aborted) {
        resolve(undefined)
        return
      }

      signal?.addEventListener('abort', () => {
        this.abortedWaits++
        resolve(undefined)
      }, {once: true})
    })
  }

  /** Adds a container as if it had been created earlier. */
  addContainer(container: Partial<ContainerSummary> & Pick<ContainerSummary, 'id'>): ContainerSummary {
    const summary: ContainerSummary = {
      name: container.id,
      image: 'alpine:latest',
      state: 'running',
      labels: {},
      ...container
    }
    this.containers.push(summary)
    return summary
  }

  private setState(id: string, state: string): void {
    const container = this.containers.find(item => item.id === id)
    if (container) {
      container.state = state
    }
  }
}

export type ComposeCall = {
  args: string[];
  cwd: string;
}

/**
 * Compose runner recording its invocations. `onRun` may simulate the effect
 * of the command on a `FakeRuntime`, or throw.
 */
export function fakeCompose(onRun?: (args: string[]) => void): {compose: ComposeRunner; calls: ComposeCall[]} {
  const calls: ComposeCall[] = []
  const compose: ComposeRunner = async (args, {cwd, onLogLine}) => {
    calls.push({args, cwd})
    onLogLine({stream: 'stderr', line: `compose ${args.at(-1) ?? ''}`})
    onRun?.(args)
  }

  return {compose, calls}
}

/**
 * Host process launcher that never starts anything.
 */
export class FakeProcessLauncher extends ProcessLauncher {
  readonly spawned: Array<{command: CommandSpec; options: SpawnOptions}> = []
  readonly runs: Array<{command: CommandSpec; cwd: string}> = []

  runExitCode = 0
  spawnError?: Error
  /** When set, the spawned application exits at once with this outcome */
  applicationOutcome?: ProcessOutcome
  detached = false

  async spawn(command: CommandSpec, options: SpawnOptions): Promise<HostProcess> {
    if (this.spawnError) {
      throw this.spawnError
    }

    this.spawned.push({command, options})
    const outcome = this.applicationOutcome
    const exited = outcome === undefined
      ? new Promise<ProcessOutcome>(() => {/* runs until the test ends */})
      : Promise.resolve(outcome)

    return {
      exited,
      detach: () => {
        this.detached = true
      }
    }
  }

  async run(command: CommandSpec, {cwd, onLogLine}: RunOptions): Promise<number> {
    this.runs.push({command, cwd})
    onLogLine({stream: 'stdout', line: 'initialized'})
    return this.runExitCode
  }
}

/**
 * Interrupt watcher for tests. With a signal, the interrupt fires at once.
 */
export function fakeInterrupt(signal?: NodeJS.Signals): {watch: WatchInterrupt; disposed: () => number} {
  let disposals = 0
  const watch: WatchInterrupt = (): InterruptWatch => ({
    interrupted: signal === undefined
      ? new Promise<NodeJS.Signals>(() => {/* never */})
      : Promise.resolve(signal),
    dispose() {
      disposals++
    }
  })

  return {watch, disposed: () => disposals}
}
