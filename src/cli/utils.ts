import type {Command} from 'commander'
import {loadProject} from '../core/project-loader.js'
import {Project} from '../core/project.js'
import {ConsoleReporter} from '../core/reporter.js'
import {ExecaProcessLauncher} from '../engine/application.js'
import {composeCli} from '../engine/compose.js'
import {DockerCliRuntime} from '../engine/docker-runtime.js'
import {InteractiveReporter} from './interactive-reporter.js'

export type GlobalOptions = {
  host?: string;
  path?: string;
  file?: string;
  /** False with `--no-settings` */
  settings: boolean;
  json?: boolean;
  verbose?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Loads the project designated by the global options and wires it to the
 * docker CLI.
 */
export async function openProject(cmd: Command): Promise<{project: Project; reporter: ConsoleReporter | InteractiveReporter}> {
  const {host, path, file, settings, json, verbose} = getGlobalOptions(cmd)
  const reporter = json ? new ConsoleReporter() : new InteractiveReporter({verbose})

  const loaded = await loadProject({path, file, loadSettings: settings, reporter})
  const project = new Project({
    ...loaded,
    runtime: new DockerCliRuntime({host}),
    compose: composeCli({host}),
    processes: new ExecaProcessLauncher(),
    reporter
  })

  return {project, reporter}
}
