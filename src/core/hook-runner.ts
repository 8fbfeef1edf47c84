import type {ContainerRuntime} from '../engine/runtime.js'
import {ExecCommandError} from '../errors.js'
import type {CommandSpec, DevContainer, HookKind, Settings} from '../types.js'
import {hookCommand, toArgs} from './descriptor.js'
import type {HookSource, Reporter} from './reporter.js'

/**
 * Argument vector for `exec`. A single line is handed to `/bin/sh -c`.
 */
export function execArgs(command: CommandSpec): string[] {
  if (typeof command === 'string') {
    return ['/bin/sh', '-c', command]
  }

  return toArgs(command)
}

export type HookRunnerOptions = {
  runtime: ContainerRuntime;
  reporter: Reporter;
  devcontainer: DevContainer;
  settings: Settings;
}

/**
 * Runs lifecycle hooks inside a container: the descriptor command first,
 * then the user settings command for the same hook.
 */
export class HookRunner {
  constructor(private readonly options: HookRunnerOptions) {}

  /**
   * @throws ExecCommandError on the first command exiting non-zero
   */
  async run(hook: HookKind, containerId: string): Promise<void> {
    const {devcontainer, settings} = this.options
    await this.exec(hook, 'descriptor', hookCommand(devcontainer, hook), containerId)
    await this.exec(hook, 'settings', hookCommand(settings, hook), containerId)
  }

  private async exec(hook: HookKind, source: HookSource, command: CommandSpec | undefined, containerId: string): Promise<void> {
    if (command === undefined) {
      return
    }

    const {runtime, reporter} = this.options
    const args = execArgs(command)
    const startedAt = Date.now()
    reporter.emit({event: 'HOOK_STARTING', hook, source, command: args})

    const exitCode = await runtime.exec(containerId, args, ({stream, line}) => {
      reporter.emit({event: 'HOOK_LOG', hook, stream, line})
    })

    if (exitCode !== 0) {
      throw new ExecCommandError(exitCode, args)
    }

    reporter.emit({event: 'HOOK_FINISHED', hook, source, durationMs: Date.now() - startedAt})
  }
}
