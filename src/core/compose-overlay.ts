import {readFile, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {isScalar, parseDocument, stringify as stringifyYaml} from 'yaml'
import {ConfigInvalidError} from '../errors.js'
import type {Settings} from '../types.js'

export type ComposeOverrideService = {
  ports: string[];
  volumes?: string[];
  environment: Record<string, string>;
}

export type ComposeOverride = {
  version?: string;
  services: Record<string, ComposeOverrideService>;
}

export type ComposeOverrideInput = {
  settings: Settings;
  serviceName: string;
  /** Schema version of the project's compose file, repeated in the overlay */
  version?: string;
  envs: Record<string, string>;
  extraPorts?: number[];
}

/**
 * Reads the top-level `version` of a compose file.
 * @returns The version as a string, or `undefined` when the file declares none
 * @throws ConfigInvalidError if the file cannot be read or parsed
 */
export async function readComposeVersion(file: string): Promise<string | undefined> {
  let source: string
  try {
    source = await readFile(file, 'utf8')
  } catch (error) {
    throw new ConfigInvalidError(`cannot read compose file ${file}`, {cause: error})
  }

  const document = parseDocument(source)
  const [error] = document.errors
  if (error) {
    throw new ConfigInvalidError(`cannot read compose file ${file}`, {cause: error})
  }

  // The scalar as written: `3.10` must not become the number 3.1
  const node = document.get('version', true)
  if (!isScalar(node)) {
    return undefined
  }

  if (typeof node.source === 'string') {
    return node.source
  }

  const {value} = node
  return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined
}

/**
 * Overlay for one service: settings `forwardPorts` and `extraPorts` published
 * on the same host port, settings mounts as volumes, and `envs` overlaid by
 * settings `envs`.
 */
export function composeOverride({settings, serviceName, version, envs, extraPorts = []}: ComposeOverrideInput): ComposeOverride {
  const ports = [...(settings.forwardPorts ?? []), ...extraPorts].map(port => `${port}:${port}`)

  const service: ComposeOverrideService = {
    ports,
    environment: {...envs, ...settings.envs}
  }

  if (settings.mounts) {
    service.volumes = [...settings.mounts]
  }

  const services = {[serviceName]: service}
  return version === undefined ? {services} : {version, services}
}

/**
 * Writes the overlay to `<directory>/<serviceName>-compose.yml`, replacing any
 * previous one. The file is left in place afterwards.
 * @returns The file path
 */
export async function generateComposeOverride(input: ComposeOverrideInput, directory = tmpdir()): Promise<string> {
  const path = join(directory, `${input.serviceName}-compose.yml`)
  await writeFile(path, stringifyYaml(composeOverride(input)))
  return path
}
