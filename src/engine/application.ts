import {execa} from 'execa'
import {ApplicationSpawnError, ConfigInvalidError, ExecCommandError} from '../errors.js'
import type {CommandSpec} from '../types.js'
import type {OnLogLine} from './runtime.js'

/**
 * How a host process ended. `error` is set when it could not run at all.
 */
export type ProcessOutcome = {
  exitCode?: number;
  signal?: string;
  error?: string;
}

/** A host process started by a `ProcessLauncher`. */
export type HostProcess = {
  /** Settles once the process ends; never rejects */
  exited: Promise<ProcessOutcome>;
  /** Leaves the process running on its own; this one may exit before it does */
  detach(): void;
}

export type SpawnOptions = {
  cwd: string;
  /** Added on top of the inherited environment */
  env: Record<string, string>;
}

export type RunOptions = {
  cwd: string;
  onLogLine: OnLogLine;
}

/** True when the process exited on its own with a non-zero code, or never ran. */
export function isFailure(outcome: ProcessOutcome): boolean {
  if (outcome.error !== undefined) {
    return true
  }

  return outcome.signal === undefined && outcome.exitCode !== 0
}

/**
 * Starts processes on the host: the companion application and the
 * descriptor's `initializeCommand`.
 */
export abstract class ProcessLauncher {
  /**
   * Starts a long-running process with inherited stdio.
   * Resolves once the process is running.
   * @throws ApplicationSpawnError if it could not be started
   */
  abstract spawn(command: CommandSpec, options: SpawnOptions): Promise<HostProcess>

  /**
   * Runs a command to completion, streaming its output.
   * @returns The exit code
   */
  abstract run(command: CommandSpec, options: RunOptions): Promise<number>
}

type Invocation = {
  file: string;
  args: string[];
  shell: boolean;
}

/** A single line goes through the shell; a list is executed as is. */
export function toInvocation(command: CommandSpec): Invocation {
  if (typeof command === 'string') {
    return {file: command, args: [], shell: true}
  }

  if (command.length === 0) {
    throw new ConfigInvalidError('command must not be empty')
  }

  const [file, ...args] = command
  return {file, args, shell: false}
}

export class ExecaProcessLauncher extends ProcessLauncher {
  async spawn(command: CommandSpec, {cwd, env}: SpawnOptions): Promise<HostProcess> {
    const {file, args, shell} = toInvocation(command)
    // No cleanup: a detached application must survive this process
    const proc = execa(file, args, {cwd, env, shell, stdio: 'inherit', reject: false, cleanup: false})

    const exited = proc.then(result => ({
      exitCode: result.exitCode,
      signal: result.signal,
      error: result.exitCode === undefined && result.signal === undefined ? result.shortMessage : undefined
    }))

    const spawnError = await new Promise<Error | undefined>(resolve => {
      proc.once('spawn', () => {
        resolve(undefined)
      })
      proc.once('error', resolve)
    })

    if (spawnError) {
      throw new ApplicationSpawnError(spawnError.message, {cause: spawnError})
    }

    return {
      exited,
      detach() {
        proc.unref()
      }
    }
  }

  async run(command: CommandSpec, {cwd, onLogLine}: RunOptions): Promise<number> {
    const {file, args, shell} = toInvocation(command)
    const proc = execa(file, args, {cwd, shell, reject: false})

    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        onLogLine({stream: 'stdout', line})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        onLogLine({stream: 'stderr', line})
      }
    })()

    const [result] = await Promise.all([proc, stdoutDone, stderrDone])
    if (result.exitCode === undefined) {
      // Could not be started: report it the way a shell reports a missing command
      throw new ExecCommandError(127, [file, ...args], {cause: new Error(result.shortMessage)})
    }

    return result.exitCode
  }
}
