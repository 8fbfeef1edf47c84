#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {formatErrorChain} from '../errors.js'
import {registerDownCommand} from './commands/down.js'
import {registerUpCommand} from './commands/up.js'

async function main() {
  const program = new Command()

  program
    .name('devrun')
    .description('Runner for devcontainer projects')
    .version('0.1.0')
    .option('-a, --host <address>', 'Docker daemon address (default: DOCKER_HOST or the local socket)')
    .option('-c, --path <dir>', 'Project directory (default: the current directory)')
    .option('-f, --file <name>', 'Descriptor file inside .devcontainer', 'devcontainer.json')
    .option('-s, --no-settings', 'Ignore user settings')
    .option('--json', 'Output structured JSON logs')
    .option('--verbose', 'Stream hook and command output')

  registerUpCommand(program)
  registerDownCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  const [first, ...causes] = formatErrorChain(error)
  console.error(chalk.red(`✗ ${first}`))
  for (const cause of causes) {
    console.error(chalk.red(`  caused by: ${cause}`))
  }

  process.exitCode = 1
}
