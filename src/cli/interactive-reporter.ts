import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {ProjectEvent, Reporter} from '../core/reporter.js'
import {formatDuration} from '../core/utils.js'

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private spinner?: Ora
  private stderrBuffer: string[] = []

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: ProjectEvent): void {
    switch (event.event) {
      case 'PROJECT_LOADED': {
        console.log(chalk.bold(`\n▶ Project: ${chalk.cyan(event.projectName)} ${chalk.gray(`(${event.mode})`)}\n`))
        break
      }

      case 'SETTINGS_SKIPPED': {
        console.log(chalk.yellow('  Ignoring user settings'))
        break
      }

      case 'INITIALIZE_RUNNING': {
        this.startPhase(`Initializing: ${event.command.join(' ')}`)
        break
      }

      case 'IMAGE_PULLING': {
        this.startPhase(`Pulling ${event.image}`)
        break
      }

      case 'IMAGE_PULLED': {
        this.succeed(`Pulled ${event.image}`)
        break
      }

      case 'IMAGE_BUILDING': {
        this.startPhase(`Building ${event.tag}`)
        break
      }

      case 'IMAGE_BUILT': {
        this.succeed(`Built ${event.tag}`)
        break
      }

      case 'COMPOSE_RUNNING': {
        this.startPhase(`docker compose ${event.args.join(' ')}`)
        break
      }

      case 'CONTAINER_FOUND': {
        this.succeed(`Found container ${shortId(event.containerId)} ${chalk.gray(event.running ? '(running)' : '(stopped)')}`)
        break
      }

      case 'CONTAINER_CREATED': {
        this.succeed(`Created container ${event.name ?? shortId(event.containerId)}`)
        break
      }

      case 'CONTAINER_STARTED': {
        this.succeed(`Started container ${shortId(event.containerId)}`)
        break
      }

      case 'HOOK_STARTING': {
        this.startPhase(`${event.hook} ${chalk.gray(`(${event.source})`)}`)
        break
      }

      case 'HOOK_FINISHED': {
        this.succeed(`${event.hook} ${chalk.gray(`(${event.source}, ${formatDuration(event.durationMs)})`)}`)
        break
      }

      case 'HOOK_LOG':
      case 'COMMAND_LOG': {
        this.log(event.stream, event.line)
        break
      }

      case 'PROGRESS': {
        if (this.verbose) {
          this.print(chalk.gray(`    ${event.status}`))
        }

        break
      }

      case 'CONTAINER_READY': {
        this.stopPhase()
        const port = event.applicationPort === undefined ? '' : chalk.gray(` (application port ${event.applicationPort})`)
        console.log(chalk.bold.green(`\n✓ Container ready: ${shortId(event.containerId)}${port}\n`))
        break
      }

      case 'APPLICATION_SPAWNED': {
        console.log(`  ${chalk.cyan('▶')} Application: ${event.command.join(' ')}`)
        break
      }

      case 'APPLICATION_EXITED': {
        const status = event.signal ?? `exit ${event.exitCode ?? '?'}`
        console.log(`  ${chalk.gray('■')} Application finished ${chalk.gray(`(${status})`)}`)
        break
      }

      case 'CONTAINER_EXITED': {
        console.log(chalk.yellow(`  Container has finished${event.exitCode === undefined ? '' : ` (exit ${event.exitCode})`}. Restart required.`))
        break
      }

      case 'SHUTDOWN_TRIGGERED': {
        this.startPhase(event.reason === 'interrupt' ? 'Interrupted, shutting down' : 'Shutting down')
        break
      }

      case 'SHUTDOWN_SKIPPED': {
        this.stopPhase()
        console.log(chalk.gray(`  Leaving ${event.mode === 'compose' ? 'services' : 'container'} running (shutdownAction: ${event.action})`))
        break
      }

      case 'CONTAINER_STOPPED': {
        this.succeed(`Stopped container ${shortId(event.containerId)}`)
        break
      }

      case 'COMPOSE_STOPPED': {
        this.succeed(`Stopped services of ${event.service}`)
        break
      }

      case 'STATE_CHANGED': {
        if (event.state === 'terminated') {
          this.stopPhase()
        }

        break
      }
    }
  }

  /**
   * Marks the current phase failed and prints the last stderr lines seen.
   */
  fail(): void {
    if (this.spinner) {
      this.spinner.fail()
      this.spinner = undefined
    }

    if (this.stderrBuffer.length > 0) {
      console.error(chalk.red('  ── stderr ──'))
      for (const line of this.stderrBuffer) {
        console.error(chalk.red(`  ${line}`))
      }
    }
  }

  private log(stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      this.print(`${chalk.gray('    │')} ${line}`)
    }

    if (stream === 'stderr') {
      this.stderrBuffer.push(line)
      if (this.stderrBuffer.length > InteractiveReporter.maxStderrLines) {
        this.stderrBuffer.shift()
      }
    }
  }

  private print(text: string): void {
    if (this.spinner) {
      this.spinner.clear()
      console.log(text)
      this.spinner.render()
    } else {
      console.log(text)
    }
  }

  private startPhase(text: string): void {
    this.stopPhase()
    this.stderrBuffer = []
    this.spinner = ora({text, prefixText: ' '}).start()
  }

  private succeed(text: string): void {
    if (this.spinner) {
      this.spinner.stopAndPersist({symbol: chalk.green('✓'), text})
      this.spinner = undefined
    } else {
      console.log(`  ${chalk.green('✓')} ${text}`)
    }
  }

  private stopPhase(): void {
    if (this.spinner) {
      this.spinner.stopAndPersist({symbol: chalk.green('✓')})
      this.spinner = undefined
    }
  }
}

function shortId(id: string): string {
  return id.slice(0, 12)
}
