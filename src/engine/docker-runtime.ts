import process from 'node:process'
import {execa} from 'execa'
import {RuntimeCommunicationError} from '../errors.js'
import type {MountSpec} from '../types.js'
import {ContainerRuntime, type OnLogLine} from './runtime.js'
import type {
  BuildImageRequest,
  ContainerFilter,
  ContainerSummary,
  CreateContainerRequest,
  ProgressEvent
} from './types.js'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept, so host secrets never reach the
 * docker client.
 */
export function dockerCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

/** Renders a mount as a `--mount` value, skipping absent attributes. */
export function formatMountArg(mount: MountSpec): string {
  const parts: string[] = []
  if (mount.type) {
    parts.push(`type=${mount.type}`)
  }

  if (mount.source) {
    parts.push(`source=${mount.source}`)
  }

  if (mount.target) {
    parts.push(`target=${mount.target}`)
  }

  if (mount.consistency) {
    parts.push(`consistency=${mount.consistency}`)
  }

  return parts.join(',')
}

/** Argument vector of `docker create` for a request, without the leading `create`. */
export function createArgs(request: CreateContainerRequest): string[] {
  const args: string[] = []

  if (request.name) {
    args.push('--name', request.name)
  }

  for (const [key, value] of Object.entries(request.labels)) {
    args.push('--label', `${key}=${value}`)
  }

  for (const entry of request.env) {
    args.push('-e', entry)
  }

  for (const mount of request.mounts) {
    args.push('--mount', formatMountArg(mount))
  }

  for (const port of request.exposedPorts) {
    args.push('--expose', port)
  }

  for (const [containerPort, bindings] of Object.entries(request.portBindings)) {
    for (const binding of bindings) {
      args.push('-p', `${binding.hostIp}:${binding.hostPort}:${containerPort}`)
    }
  }

  args.push(request.image)

  if (request.cmd) {
    args.push(...request.cmd)
  }

  return args
}

// -- Inspect output ----------------------------------------------------------

type JsonObject = Record<string, unknown>

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringField(object: unknown, key: string): string {
  if (isJsonObject(object)) {
    const value = object[key]
    if (typeof value === 'string') {
      return value
    }
  }

  return ''
}

function labelsField(object: unknown): Record<string, string> {
  const labels: Record<string, string> = {}
  if (isJsonObject(object) && isJsonObject(object.Labels)) {
    for (const [key, value] of Object.entries(object.Labels)) {
      if (typeof value === 'string') {
        labels[key] = value
      }
    }
  }

  return labels
}

/** Maps the JSON array printed by `docker inspect` to container summaries. */
export function parseInspectOutput(output: string): ContainerSummary[] {
  let parsed: unknown
  try {
    parsed = JSON.parse(output)
  } catch (error) {
    throw new RuntimeCommunicationError('unreadable inspect output', {cause: error})
  }

  if (!Array.isArray(parsed)) {
    throw new RuntimeCommunicationError('unexpected inspect output')
  }

  return parsed.filter(isJsonObject).map(entry => ({
    id: stringField(entry, 'Id'),
    name: stringField(entry, 'Name').replace(/^\//, ''),
    image: stringField(entry.Config, 'Image'),
    state: stringField(entry.State, 'Status'),
    labels: labelsField(entry.Config)
  }))
}

// -- Runtime -----------------------------------------------------------------

export type DockerCliRuntimeOptions = {
  /** Daemon address passed as `-H`; the client default applies otherwise */
  host?: string;
}

export class DockerCliRuntime extends ContainerRuntime {
  private readonly env = dockerCliEnv()
  private readonly host?: string

  constructor(options: DockerCliRuntimeOptions = {}) {
    super()
    this.host = options.host
  }

  async check(): Promise<void> {
    await this.docker(['version', '--format', '{{.Server.Version}}'])
  }

  async listContainers(filter: ContainerFilter): Promise<ContainerSummary[]> {
    const args = ['ps', '-a', '-q', '--no-trunc']
    for (const [key, value] of Object.entries(filter.labels ?? {})) {
      args.push('--filter', `label=${key}=${value}`)
    }

    if (filter.name !== undefined) {
      args.push('--filter', `name=^/${filter.name}$`)
    }

    const ids = (await this.docker(args)).split('\n').map(line => line.trim()).filter(Boolean)
    if (ids.length === 0) {
      return []
    }

    const summaries = parseInspectOutput(await this.docker(['inspect', ...ids]))
    return ids
      .map(id => summaries.find(summary => summary.id === id))
      .filter((summary): summary is ContainerSummary => summary !== undefined)
  }

  async createContainer(request: CreateContainerRequest): Promise<string> {
    const output = await this.docker(['create', ...createArgs(request)])
    return output.trim()
  }

  async startContainer(id: string): Promise<void> {
    await this.docker(['start', id])
  }

  async stopContainer(id: string): Promise<void> {
    await this.docker(['stop', id])
  }

  async exec(id: string, cmd: string[], onLogLine: OnLogLine): Promise<number> {
    const proc = execa('docker', this.args(['exec', id, ...cmd]), {env: this.env, reject: false})

    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        onLogLine({stream: 'stdout', line})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        onLogLine({stream: 'stderr', line})
      }
    })()

    const [result] = await Promise.all([proc, stdoutDone, stderrDone])
    if (result.exitCode === undefined) {
      throw new RuntimeCommunicationError(result.shortMessage)
    }

    return result.exitCode
  }

  async * pullImage(image: string): AsyncGenerator<ProgressEvent> {
    yield * this.stream(['pull', image])
  }

  async * buildImage(request: BuildImageRequest): AsyncGenerator<ProgressEvent> {
    const args = ['build', '-t', request.tag, '-f', request.dockerfile]
    for (const [key, value] of Object.entries(request.args ?? {})) {
      args.push('--build-arg', `${key}=${value}`)
    }

    if (request.target) {
      args.push('--target', request.target)
    }

    args.push('-')

    yield * this.stream(args, request.context)
  }

  async waitContainer(id: string, signal?: AbortSignal): Promise<number | undefined> {
    const result = await execa('docker', this.args(['wait', id]), {
      env: this.env,
      reject: false,
      cancelSignal: signal
    })

    if (result.isCanceled) {
      return undefined
    }

    if (result.failed) {
      throw new RuntimeCommunicationError(result.stderr.trim() || result.shortMessage)
    }

    return Number.parseInt(result.stdout.trim(), 10)
  }

  private args(args: string[]): string[] {
    return this.host ? ['-H', this.host, ...args] : args
  }

  private async docker(args: string[]): Promise<string> {
    const result = await execa('docker', this.args(args), {env: this.env, reject: false})
    if (result.failed) {
      throw new RuntimeCommunicationError(result.stderr.trim() || result.shortMessage)
    }

    return result.stdout
  }

  /** Runs a docker command, yielding its interleaved output lines, then an error entry on failure. */
  private async * stream(args: string[], input?: Uint8Array): AsyncGenerator<ProgressEvent> {
    const proc = execa('docker', this.args(args), {env: this.env, reject: false, all: true, input})

    let lastLine: string | undefined
    for await (const line of proc.iterable({from: 'all'})) {
      lastLine = line
      yield {status: line}
    }

    const result = await proc
    if (result.failed) {
      yield {error: lastLine ?? result.shortMessage}
    }
  }
}
