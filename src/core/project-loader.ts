import {readFile, stat} from 'node:fs/promises'
import {homedir} from 'node:os'
import {dirname, join, resolve} from 'node:path'
import process from 'node:process'
import {parse as parseJsonc, printParseErrorCode, type ParseError} from 'jsonc-parser'
import {ConfigInvalidError, ConfigMissingError, SettingsInvalidError} from '../errors.js'
import type {DevContainer, Settings} from '../types.js'
import {devcontainerFolder} from './build-context.js'
import {getMode, getProjectName, parseDevContainer, parseSettings} from './descriptor.js'
import type {Reporter} from './reporter.js'
import {isNotFound} from './utils.js'

export const defaultDescriptorFile = 'devcontainer.json'

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch (error) {
    if (isNotFound(error)) {
      return false
    }

    throw error
  }
}

/**
 * Project root for a start directory: the outermost ancestor (the directory
 * itself included) holding a `.devcontainer` folder, or the directory itself
 * when none does.
 * @throws ConfigInvalidError if the start directory does not exist
 */
export async function findProjectRoot(start: string): Promise<string> {
  const directory = resolve(start)
  if (!await isDirectory(directory)) {
    throw new ConfigInvalidError(`project path does not exist: ${directory}`)
  }

  let root = directory
  let current = directory
  for (;;) {
    if (await isDirectory(join(current, devcontainerFolder))) {
      root = current
    }

    const parent = dirname(current)
    if (parent === current) {
      return root
    }

    current = parent
  }
}

/**
 * Parses JSON with comments and trailing commas.
 * `fail` builds the error thrown for a syntax error.
 */
export function parseLenientJson(text: string, fail: (message: string) => Error): unknown {
  const errors: ParseError[] = []
  const value: unknown = parseJsonc(text, errors, {allowTrailingComma: true})
  const [first] = errors
  if (first) {
    throw fail(`${printParseErrorCode(first.error)} at offset ${first.offset}`)
  }

  return value
}

/**
 * Reads and validates `<projectPath>/.devcontainer/<file>`.
 * @throws ConfigMissingError if the file does not exist
 * @throws ConfigInvalidError if it cannot be parsed or fails validation
 */
export async function loadDevContainer(projectPath: string, file = defaultDescriptorFile): Promise<DevContainer> {
  const path = join(projectPath, devcontainerFolder, file)

  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    if (isNotFound(error)) {
      throw new ConfigMissingError(path)
    }

    throw new ConfigInvalidError(`cannot read ${path}`, {cause: error})
  }

  return parseDevContainer(parseLenientJson(content, message => new ConfigInvalidError(message)))
}

/**
 * User settings location: `DEVRUN_SETTINGS`, else
 * `$XDG_CONFIG_HOME/devrun/settings.json`, else `~/.config/devrun/settings.json`.
 */
export function defaultSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.DEVRUN_SETTINGS) {
    return env.DEVRUN_SETTINGS
  }

  const configHome = env.XDG_CONFIG_HOME ?? join(homedir(), '.config')
  return join(configHome, 'devrun', 'settings.json')
}

/**
 * Reads user settings. A missing file yields empty settings.
 * @throws SettingsInvalidError if the file cannot be read, parsed or validated
 */
export async function loadSettings(path = defaultSettingsPath()): Promise<Settings> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    if (isNotFound(error)) {
      return {}
    }

    throw new SettingsInvalidError(`cannot read ${path}`, {cause: error})
  }

  const fail = (message: string) => new SettingsInvalidError(message)
  return parseSettings(parseLenientJson(content, fail), fail)
}

export type LoadProjectOptions = {
  /** Start directory (default: the current working directory) */
  path?: string;
  /** Descriptor file name inside `.devcontainer` */
  file?: string;
  loadSettings?: boolean;
  settingsPath?: string;
  reporter: Reporter;
}

export type LoadedProject = {
  projectPath: string;
  devcontainer: DevContainer;
  settings: Settings;
}

/**
 * Locates the project root, then loads its descriptor and the user settings.
 */
export async function loadProject(options: LoadProjectOptions): Promise<LoadedProject> {
  const {reporter} = options
  const projectPath = await findProjectRoot(options.path ?? process.cwd())

  let settings: Settings = {}
  if (options.loadSettings === false) {
    reporter.emit({event: 'SETTINGS_SKIPPED'})
  } else {
    settings = await loadSettings(options.settingsPath)
  }

  const devcontainer = await loadDevContainer(projectPath, options.file)
  reporter.emit({
    event: 'PROJECT_LOADED',
    projectName: getProjectName(devcontainer, projectPath),
    projectPath,
    mode: getMode(devcontainer)
  })

  return {projectPath, devcontainer, settings}
}
