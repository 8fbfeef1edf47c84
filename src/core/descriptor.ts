import {basename} from 'node:path'
import {ConfigInvalidError} from '../errors.js'
import type {
  AppPort,
  BuildOptions,
  CommandSpec,
  ComposeFile,
  DevContainer,
  HookKind,
  ProvisioningMode,
  Settings,
  ShutdownAction
} from '../types.js'

type RawObject = Record<string, unknown>

type FieldError = (message: string) => Error

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value)
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

// -- Field readers ----------------------------------------------------------

function readString(raw: RawObject, key: string, fail: FieldError): string | undefined {
  const value = raw[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw fail(`"${key}" must be a string`)
  }

  return value
}

function readStringList(raw: RawObject, key: string, fail: FieldError): string[] | undefined {
  const value = raw[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (isStringList(value)) {
    return value
  }

  throw fail(`"${key}" must be an array of strings`)
}

function readPortList(raw: RawObject, key: string, fail: FieldError): number[] | undefined {
  const value = raw[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (Array.isArray(value) && value.every(isPort)) {
    return value
  }

  throw fail(`"${key}" must be an array of port numbers`)
}

function readStringMap(raw: RawObject, key: string, fail: FieldError): Record<string, string> | undefined {
  const value = raw[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (!isObject(value)) {
    throw fail(`"${key}" must be an object`)
  }

  const map: Record<string, string> = {}
  for (const [name, item] of Object.entries(value)) {
    if (typeof item === 'string') {
      map[name] = item
    } else if (typeof item === 'number' || typeof item === 'boolean') {
      map[name] = String(item)
    } else {
      throw fail(`"${key}.${name}" must be a string`)
    }
  }

  return map
}

function readCommand(raw: RawObject, key: string, fail: FieldError): CommandSpec | undefined {
  const value = raw[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value === 'string') {
    return value
  }

  if (isStringList(value)) {
    return value
  }

  throw fail(`"${key}" must be a string or an array of strings`)
}

function readAppPort(raw: RawObject, fail: FieldError): AppPort | undefined {
  const value = raw.appPort
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value === 'string' || isPort(value)) {
    return value
  }

  if (Array.isArray(value) && value.every(isPort)) {
    return value
  }

  throw fail('"appPort" must be a port number, an array of port numbers or a string')
}

function readComposeFile(raw: RawObject, fail: FieldError): ComposeFile | undefined {
  const value = raw.dockerComposeFile
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value === 'string') {
    return value
  }

  if (isStringList(value)) {
    return value
  }

  throw fail('"dockerComposeFile" must be a string or an array of strings')
}

function readBuild(raw: RawObject, fail: FieldError): BuildOptions | undefined {
  const value = raw.build
  if (value === undefined || value === null) {
    return undefined
  }

  if (!isObject(value)) {
    throw fail('"build" must be an object')
  }

  const dockerfile = readString(value, 'dockerfile', fail) ?? readString(value, 'dockerFile', fail)
  if (dockerfile === undefined) {
    throw fail('"build.dockerfile" is required')
  }

  return {
    dockerfile,
    context: readString(value, 'context', fail),
    args: readStringMap(value, 'args', fail),
    target: readString(value, 'target', fail)
  }
}

// -- Shutdown action --------------------------------------------------------

const shutdownActions: Record<string, ShutdownAction> = {
  none: 'none',
  stopcontainer: 'stopContainer',
  stopcompose: 'stopCompose'
}

/** Case-insensitive parse; absent means `none`. */
export function parseShutdownAction(value: unknown): ShutdownAction {
  if (value === undefined || value === null) {
    return 'none'
  }

  const action = typeof value === 'string' ? shutdownActions[value.toLowerCase()] : undefined
  if (!action) {
    throw new ConfigInvalidError(`Invalid shutdown action '${String(value)}'`)
  }

  return action
}

// -- Descriptor --------------------------------------------------------------

/**
 * Turns a parsed `devcontainer.json` document into a validated descriptor.
 * @throws ConfigInvalidError on a wrongly typed field or a semantic violation
 */
export function parseDevContainer(raw: unknown): DevContainer {
  const fail: FieldError = message => new ConfigInvalidError(message)
  if (!isObject(raw)) {
    throw fail('devcontainer descriptor must be an object')
  }

  let overrideCommand = true
  const rawOverride = raw.overrideCommand
  if (rawOverride !== undefined && rawOverride !== null) {
    if (typeof rawOverride !== 'boolean') {
      throw fail('"overrideCommand" must be a boolean')
    }

    overrideCommand = rawOverride
  }

  const devcontainer: DevContainer = {
    name: readString(raw, 'name', fail),
    image: readString(raw, 'image', fail),
    build: readBuild(raw, fail),
    appPort: readAppPort(raw, fail),
    containerEnv: readStringMap(raw, 'containerEnv', fail),
    remoteEnv: readStringMap(raw, 'remoteEnv', fail),
    containerUser: readString(raw, 'containerUser', fail),
    remoteUser: readString(raw, 'remoteUser', fail),
    mounts: readStringList(raw, 'mounts', fail),
    workspaceMount: readString(raw, 'workspaceMount', fail),
    runArgs: readStringList(raw, 'runArgs', fail),
    overrideCommand,
    shutdownAction: parseShutdownAction(raw.shutdownAction),
    dockerComposeFile: readComposeFile(raw, fail),
    service: readString(raw, 'service', fail),
    runServices: readStringList(raw, 'runServices', fail),
    forwardPorts: readPortList(raw, 'forwardPorts', fail),
    postCreateCommand: readCommand(raw, 'postCreateCommand', fail),
    postStartCommand: readCommand(raw, 'postStartCommand', fail),
    postAttachCommand: readCommand(raw, 'postAttachCommand', fail),
    initializeCommand: readCommand(raw, 'initializeCommand', fail)
  }

  validateDevContainer(devcontainer)
  return devcontainer
}

/**
 * Semantic checks: exactly one provisioning source, non-blank image and
 * dockerfile, compose requires a service.
 */
export function validateDevContainer(devcontainer: Omit<DevContainer, 'overrideCommand' | 'shutdownAction'>): void {
  const sources = [devcontainer.image, devcontainer.dockerComposeFile, devcontainer.build]
    .filter(source => source !== undefined)

  if (sources.length > 1) {
    throw new ConfigInvalidError('Please specify only one of: image, dockerComposeFile or build')
  }

  if (sources.length === 0) {
    throw new ConfigInvalidError('Please specify at least one of: image, dockerComposeFile or build')
  }

  if (devcontainer.image !== undefined && devcontainer.image.trim() === '') {
    throw new ConfigInvalidError(`Invalid image: '${devcontainer.image}'`)
  }

  if (devcontainer.build && devcontainer.build.dockerfile.trim() === '') {
    throw new ConfigInvalidError(`Invalid docker file: '${devcontainer.build.dockerfile}'`)
  }

  if (devcontainer.dockerComposeFile !== undefined) {
    const files = composeFiles(devcontainer.dockerComposeFile)
    if (files.length === 0 || files.some(file => file.trim() === '')) {
      throw new ConfigInvalidError('Invalid docker-compose file')
    }

    if (!devcontainer.service) {
      throw new ConfigInvalidError('Invalid service: "service" is required with dockerComposeFile')
    }
  }
}

export function getMode(devcontainer: Pick<DevContainer, 'image' | 'build'>): ProvisioningMode {
  if (devcontainer.image !== undefined) {
    return 'image'
  }

  if (devcontainer.build !== undefined) {
    return 'build'
  }

  return 'compose'
}

/** Descriptor `name`, falling back to the project directory name. */
export function getProjectName(devcontainer: Pick<DevContainer, 'name'>, projectPath: string): string {
  return devcontainer.name ?? basename(projectPath)
}

// -- Normalization accessors ------------------------------------------------

/**
 * Argument vector for a command. A single line stays one element, to be
 * interpreted by a shell; it is not tokenized here.
 */
export function toArgs(command: CommandSpec): string[] {
  return typeof command === 'string' ? [command] : [...command]
}

export function appPorts(appPort: AppPort | undefined): string[] {
  if (appPort === undefined) {
    return []
  }

  if (Array.isArray(appPort)) {
    return appPort.map(String)
  }

  return [String(appPort)]
}

export function composeFiles(file: ComposeFile): string[] {
  return typeof file === 'string' ? [file] : [...file]
}

/** Appends `:latest` when the reference carries no tag. */
export function formatImage(image: string): string {
  if (image.includes(':')) {
    return image
  }

  return `${image}:latest`
}

const hookFields = {
  postCreate: 'postCreateCommand',
  postStart: 'postStartCommand',
  postAttach: 'postAttachCommand'
} as const

export function hookCommand(source: DevContainer | Settings, kind: HookKind): CommandSpec | undefined {
  return source[hookFields[kind]]
}

// -- Settings ---------------------------------------------------------------

/**
 * Turns a parsed user settings document into a `Settings` value.
 * `fail` builds the error thrown for a wrongly typed field.
 */
export function parseSettings(raw: unknown, fail: FieldError): Settings {
  if (raw === undefined || raw === null) {
    return {}
  }

  if (!isObject(raw)) {
    throw fail('settings must be an object')
  }

  let application: Settings['application']
  if (raw.application !== undefined && raw.application !== null) {
    if (!isObject(raw.application)) {
      throw fail('"application" must be an object')
    }

    const cmd = readCommand(raw.application, 'cmd', fail)
    if (cmd === undefined || toArgs(cmd).length === 0) {
      throw fail('"application.cmd" is required')
    }

    application = {cmd}
  }

  return {
    application,
    mounts: readStringList(raw, 'mounts', fail),
    envs: readStringMap(raw, 'envs', fail),
    postCreateCommand: readCommand(raw, 'postCreateCommand', fail),
    postStartCommand: readCommand(raw, 'postStartCommand', fail),
    postAttachCommand: readCommand(raw, 'postAttachCommand', fail),
    forwardPorts: readPortList(raw, 'forwardPorts', fail)
  }
}
