import {isFailure, type HostProcess, type ProcessLauncher, type ProcessOutcome} from '../engine/application.js'
import type {ComposeRunner} from '../engine/compose.js'
import type {ContainerRuntime} from '../engine/runtime.js'
import {ApplicationSpawnError, ExecCommandError, NoDevContainerError} from '../errors.js'
import type {DevContainer, ProjectState, RunContext, Settings} from '../types.js'
import {devcontainerEnvs} from './container-spec.js'
import {getMode, getProjectName, toArgs} from './descriptor.js'
import {HookRunner} from './hook-runner.js'
import {type WatchInterrupt, watchProcessInterrupt} from './interrupt.js'
import {type AllocatePort, requestOpenPort} from './port-allocator.js'
import {type ProvisionContext, provisionerFor} from './provisioners.js'
import type {Reporter} from './reporter.js'
import {shouldStop} from './shutdown.js'

export type ProjectOptions = {
  /** Project root, the directory holding `.devcontainer` */
  projectPath: string;
  devcontainer?: DevContainer;
  /** User settings; empty when not loaded */
  settings?: Settings;
  runtime: ContainerRuntime;
  compose: ComposeRunner;
  processes: ProcessLauncher;
  reporter: Reporter;
  allocatePort?: AllocatePort;
  watchInterrupt?: WatchInterrupt;
  /** Where compose overlays are written (system temp directory by default) */
  overlayDirectory?: string;
}

export type UpOptions = {
  /** Wait for the container, the application or an interrupt (default: true) */
  wait?: boolean;
}

export type DownOptions = {
  /** Teardown at the end of `up`, subject to the shutdown action */
  fromUp?: boolean;
}

/** What ended the wait after a successful `up`. */
export type RaceOutcome =
  | {kind: 'container-exited'; exitCode?: number}
  | {kind: 'application-exited'; outcome: ProcessOutcome}
  | {kind: 'interrupted'; signal: NodeJS.Signals}

/**
 * Orchestration controller of one devcontainer project.
 *
 * States: idle → provisioning → running → shutting-down → terminated.
 */
export class Project {
  private currentState: ProjectState = 'idle'

  constructor(private readonly options: ProjectOptions) {}

  get state(): ProjectState {
    return this.currentState
  }

  get projectPath(): string {
    return this.options.projectPath
  }

  /**
   * Provisions the container, spawns the companion application and, unless
   * `wait` is false, waits for whichever comes first: the container
   * stopping, the application exiting or an interrupt.
   */
  async up({wait = true}: UpOptions = {}): Promise<void> {
    const devcontainer = this.requireDevContainer()
    const {runtime, reporter} = this.options
    const context = this.createContext(devcontainer)

    await runtime.check()
    this.setState('provisioning', context)

    await this.runInitialize(devcontainer)
    const containerId = await provisionerFor(getMode(devcontainer)).provision(this.provisionContext(devcontainer, context))
    reporter.emit({event: 'CONTAINER_READY', containerId, applicationPort: context.applicationPort})
    this.setState('running', context)

    const application = await this.spawnApplication(devcontainer, context)
    if (!wait) {
      application?.detach()
      return
    }

    const outcome = await this.race(containerId, application)
    if (outcome.kind !== 'application-exited') {
      application?.detach()
    }

    switch (outcome.kind) {
      case 'container-exited': {
        reporter.emit({event: 'CONTAINER_EXITED', containerId, exitCode: outcome.exitCode})
        this.setState('terminated', context)
        return
      }

      case 'application-exited': {
        const {exitCode, signal, error} = outcome.outcome
        reporter.emit({event: 'APPLICATION_EXITED', exitCode, signal})
        if (isFailure(outcome.outcome)) {
          this.setState('terminated', context)
          throw new ApplicationSpawnError(error ?? `application exited with code ${exitCode ?? 'unknown'}`)
        }

        reporter.emit({event: 'SHUTDOWN_TRIGGERED', reason: 'application-exit'})
        break
      }

      case 'interrupted': {
        reporter.emit({event: 'SHUTDOWN_TRIGGERED', reason: 'interrupt'})
        break
      }
    }

    await this.down({fromUp: true})
  }

  /**
   * Stops the project's container or compose services. At the end of `up`
   * this only happens when the shutdown action asks for it.
   */
  async down({fromUp = false}: DownOptions = {}): Promise<void> {
    const devcontainer = this.requireDevContainer()
    const {runtime, reporter} = this.options
    const context = this.createContext(devcontainer)
    const mode = getMode(devcontainer)

    this.setState('shutting-down', context)

    if (shouldStop(devcontainer.shutdownAction, mode, fromUp)) {
      if (!fromUp) {
        await runtime.check()
      }

      await provisionerFor(mode).stop(this.provisionContext(devcontainer, context))
    } else {
      reporter.emit({event: 'SHUTDOWN_SKIPPED', action: devcontainer.shutdownAction, mode})
    }

    this.setState('terminated', context)
  }

  private requireDevContainer(): DevContainer {
    const {devcontainer} = this.options
    if (!devcontainer) {
      throw new NoDevContainerError()
    }

    return devcontainer
  }

  private createContext(devcontainer: DevContainer): RunContext {
    return {projectName: getProjectName(devcontainer, this.options.projectPath)}
  }

  private setState(state: ProjectState, context: RunContext): void {
    this.currentState = state
    this.options.reporter.emit({event: 'STATE_CHANGED', projectName: context.projectName, state})
  }

  private provisionContext(devcontainer: DevContainer, context: RunContext): ProvisionContext {
    const {runtime, compose, reporter, projectPath, overlayDirectory} = this.options
    const settings = this.options.settings ?? {}
    return {
      runtime,
      compose,
      reporter,
      hooks: new HookRunner({runtime, reporter, devcontainer, settings}),
      devcontainer,
      settings,
      projectPath,
      context,
      allocatePort: this.options.allocatePort ?? requestOpenPort,
      overlayDirectory
    }
  }

  /** Runs `initializeCommand` on the host, in the project directory. */
  private async runInitialize(devcontainer: DevContainer): Promise<void> {
    const command = devcontainer.initializeCommand
    if (command === undefined) {
      return
    }

    const {processes, reporter, projectPath} = this.options
    reporter.emit({event: 'INITIALIZE_RUNNING', command: toArgs(command)})
    const exitCode = await processes.run(command, {
      cwd: projectPath,
      onLogLine({stream, line}) {
        reporter.emit({event: 'COMMAND_LOG', origin: 'initialize', stream, line})
      }
    })

    if (exitCode !== 0) {
      throw new ExecCommandError(exitCode, toArgs(command))
    }
  }

  private async spawnApplication(devcontainer: DevContainer, context: RunContext): Promise<HostProcess | undefined> {
    const application = this.options.settings?.application
    if (!application) {
      return undefined
    }

    const {processes, reporter, projectPath} = this.options
    const child = await processes.spawn(application.cmd, {
      cwd: projectPath,
      env: {...devcontainer.remoteEnv, ...devcontainerEnvs(context)}
    })

    reporter.emit({event: 'APPLICATION_SPAWNED', command: toArgs(application.cmd)})
    return child
  }

  /**
   * First of: container stop, application exit, interrupt. The container
   * wait is cancelled and the signal listeners removed once it settles; a
   * still-running application is detached by the caller.
   */
  private async race(containerId: string, application: HostProcess | undefined): Promise<RaceOutcome> {
    const {runtime} = this.options
    const abort = new AbortController()
    const interrupt = (this.options.watchInterrupt ?? watchProcessInterrupt)()

    const sources: Array<Promise<RaceOutcome>> = [
      runtime.waitContainer(containerId, abort.signal).then((exitCode): RaceOutcome => ({kind: 'container-exited', exitCode})),
      interrupt.interrupted.then((signal): RaceOutcome => ({kind: 'interrupted', signal}))
    ]

    if (application) {
      sources.push(application.exited.then((outcome): RaceOutcome => ({kind: 'application-exited', outcome})))
    }

    try {
      return await Promise.race(sources)
    } finally {
      abort.abort()
      interrupt.dispose()
    }
  }
}
