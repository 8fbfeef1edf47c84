export class DevrunError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'DevrunError'
  }
}

// -- Configuration errors ----------------------------------------------------

export class ConfigMissingError extends DevrunError {
  constructor(readonly file: string, options?: {cause?: unknown}) {
    super('CONFIG_MISSING', `Config file does not exist: ${file}`, options)
    this.name = 'ConfigMissingError'
  }
}

export class ConfigInvalidError extends DevrunError {
  constructor(message: string, options?: {cause?: unknown}, code = 'CONFIG_INVALID') {
    super(code, `Config is not valid: ${message}`, options)
    this.name = 'ConfigInvalidError'
  }
}

export class MountParseError extends ConfigInvalidError {
  constructor(readonly input: string, detail: string, options?: {cause?: unknown}) {
    super(`${detail} (mount: '${input}')`, options, 'MOUNT_PARSE_FAILED')
    this.name = 'MountParseError'
  }
}

export class SettingsInvalidError extends DevrunError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('SETTINGS_INVALID', `User settings are not valid: ${message}`, options)
    this.name = 'SettingsInvalidError'
  }
}

// -- Lifecycle errors --------------------------------------------------------

export class UpError extends DevrunError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'UpError'
  }
}

export class NoDevContainerError extends UpError {
  constructor(options?: {cause?: unknown}) {
    super('NO_DEVCONTAINER', 'No devcontainer project loaded', options)
    this.name = 'NoDevContainerError'
  }
}

export class ContainerCreateError extends UpError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('CONTAINER_CREATE_FAILED', `Failed to create container: ${message}`, options)
    this.name = 'ContainerCreateError'
  }
}

export class ApplicationSpawnError extends UpError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('APPLICATION_SPAWN_FAILED', `Failed to spawn application: ${message}`, options)
    this.name = 'ApplicationSpawnError'
  }
}

export class ExecCommandError extends UpError {
  constructor(
    readonly exitCode: number,
    readonly command: string[],
    options?: {cause?: unknown}
  ) {
    super('EXEC_COMMAND_FAILED', `Failed to execute command '${command.join(' ')}': exit code ${exitCode}`, options)
    this.name = 'ExecCommandError'
  }
}

export class ImagePullError extends UpError {
  constructor(readonly image: string, detail: string, options?: {cause?: unknown}) {
    super('IMAGE_PULL_FAILED', `Failed while trying to get image "${image}": ${detail}`, options)
    this.name = 'ImagePullError'
  }
}

export class ComposeError extends UpError {
  constructor(
    message: string,
    readonly exitCode?: number,
    options?: {cause?: unknown}
  ) {
    super('COMPOSE_FAILED', `docker compose failed: ${message}`, options)
    this.name = 'ComposeError'
  }
}

export class PortAllocationError extends UpError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('NO_AVAILABLE_PORT', message, options)
    this.name = 'PortAllocationError'
  }
}

// -- Runtime errors ----------------------------------------------------------

export class RuntimeCommunicationError extends DevrunError {
  constructor(detail: string, options?: {cause?: unknown}) {
    super('RUNTIME_COMMUNICATION_FAILED', `Error trying to communicate with docker: ${detail}`, options)
    this.name = 'RuntimeCommunicationError'
  }
}

/** Render an error and its `cause` chain, one message per line. */
export function formatErrorChain(error: unknown): string[] {
  const lines: string[] = []
  let current: unknown = error
  while (current !== undefined && lines.length < 10) {
    if (current instanceof Error) {
      lines.push(current.message)
      current = current.cause
    } else {
      lines.push(String(current))
      current = undefined
    }
  }

  return lines
}
