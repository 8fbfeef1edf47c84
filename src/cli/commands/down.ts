import type {Command} from 'commander'
import {InteractiveReporter} from '../interactive-reporter.js'
import {openProject} from '../utils.js'

export function registerDownCommand(program: Command): void {
  program
    .command('down')
    .description('Stop the devcontainer')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {project, reporter} = await openProject(cmd)

      try {
        await project.down()
      } catch (error: unknown) {
        if (reporter instanceof InteractiveReporter) {
          reporter.fail()
        }

        throw error
      }
    })
}
