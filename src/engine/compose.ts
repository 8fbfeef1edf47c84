import {execa} from 'execa'
import {ComposeError} from '../errors.js'
import {dockerCliEnv} from './docker-runtime.js'
import type {OnLogLine} from './runtime.js'

/**
 * Runs `docker compose` with the given arguments (everything after
 * `compose`) in `cwd`, streaming output lines.
 * @throws ComposeError on a non-zero exit or when the tool cannot be spawned
 */
export type ComposeRunner = (args: string[], options: {cwd: string; onLogLine: OnLogLine}) => Promise<void>

/** Output lines kept to explain a failure. */
const maxErrorLines = 5

export type ComposeCliOptions = {
  /** Daemon address exported as DOCKER_HOST */
  host?: string;
}

/**
 * Compose runner backed by the `docker compose` plugin.
 */
export function composeCli(options: ComposeCliOptions = {}): ComposeRunner {
  const env = dockerCliEnv()
  if (options.host) {
    env.DOCKER_HOST = options.host
  }

  return async (args, {cwd, onLogLine}) => {
    const proc = execa('docker', ['compose', ...args], {cwd, env, reject: false})
    const stderrTail: string[] = []

    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        onLogLine({stream: 'stdout', line})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        stderrTail.push(line)
        if (stderrTail.length > maxErrorLines) {
          stderrTail.shift()
        }

        onLogLine({stream: 'stderr', line})
      }
    })()

    const [result] = await Promise.all([proc, stdoutDone, stderrDone])
    if (result.exitCode === undefined) {
      throw new ComposeError(result.shortMessage)
    }

    if (result.exitCode !== 0) {
      throw new ComposeError(stderrTail.join('\n') || `exit code ${result.exitCode}`, result.exitCode)
    }
  }
}
