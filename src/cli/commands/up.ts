import type {Command} from 'commander'
import {InteractiveReporter} from '../interactive-reporter.js'
import {openProject} from '../utils.js'

export function registerUpCommand(program: Command): void {
  program
    .command('up')
    .description('Start the devcontainer')
    .option('-d, --no-wait', 'Do not wait for the client application')
    .action(async (options: {wait: boolean}, cmd: Command) => {
      const {project, reporter} = await openProject(cmd)

      try {
        await project.up({wait: options.wait})
      } catch (error: unknown) {
        if (reporter instanceof InteractiveReporter) {
          reporter.fail()
        }

        throw error
      }
    })
}
