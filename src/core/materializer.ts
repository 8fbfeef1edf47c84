import {basename} from 'node:path'
import type {ContainerRuntime} from '../engine/runtime.js'
import type {ContainerFilter, ContainerSummary} from '../engine/types.js'
import {ContainerCreateError} from '../errors.js'
import type {DevContainer, RunContext, Settings} from '../types.js'
import {buildContainerSpec, identityLabels} from './container-spec.js'
import type {HookRunner} from './hook-runner.js'
import {type AllocatePort, resolveApplicationPort} from './port-allocator.js'
import type {Reporter} from './reporter.js'

/** Candidate names probed before letting the runtime pick one. */
export const maxNameProbes = 20

/**
 * First container matching the filter, in the runtime's listing order.
 * When several match, which one is "the" container is left to that order.
 */
export async function findContainer(runtime: ContainerRuntime, filter: ContainerFilter): Promise<ContainerSummary | undefined> {
  const containers = await runtime.listContainers(filter)
  return containers[0]
}

/** Image name without registry, repository path, tag or digest. */
export function imageBaseName(image: string): string {
  const lastSegment = image.slice(image.lastIndexOf('/') + 1)
  const end = lastSegment.search(/[:@]/)
  return end === -1 ? lastSegment : lastSegment.slice(0, end)
}

function sanitizeName(value: string): string {
  return value.replaceAll(/[^\w.-]/g, '_')
}

/**
 * First free `<dirname>_devcontainer_<image>_<n>` for n in 1..20, or
 * `undefined` when all are taken.
 */
export async function probeContainerName(runtime: ContainerRuntime, projectPath: string, image: string): Promise<string | undefined> {
  const prefix = sanitizeName(`${basename(projectPath)}_devcontainer_${imageBaseName(image)}`)

  for (let n = 1; n <= maxNameProbes; n++) {
    const name = `${prefix}_${n}`
    const taken = await runtime.listContainers({name})
    if (taken.length === 0) {
      return name
    }
  }

  return undefined
}

export type MaterializeOptions = {
  runtime: ContainerRuntime;
  reporter: Reporter;
  hooks: HookRunner;
  devcontainer: DevContainer;
  settings: Settings;
  projectPath: string;
  context: RunContext;
  allocatePort: AllocatePort;
}

/**
 * Brings up the image or build mode container for `image`:
 * - running container: attach hook only
 * - stopped container: start, then start and attach hooks
 * - no container: create and start, then create, start and attach hooks
 *
 * Sets `context.applicationPort` as a side effect.
 * @returns The container id
 */
export async function materialize(image: string, options: MaterializeOptions): Promise<string> {
  const {runtime, reporter, hooks, devcontainer, settings, projectPath, context, allocatePort} = options

  const existing = await findContainer(runtime, {labels: identityLabels(context.projectName)})
  if (existing) {
    const running = existing.state === 'running'
    reporter.emit({event: 'CONTAINER_FOUND', containerId: existing.id, running})
    context.applicationPort = await resolveApplicationPort(existing, allocatePort)

    if (!running) {
      await runtime.startContainer(existing.id)
      reporter.emit({event: 'CONTAINER_STARTED', containerId: existing.id})
      await hooks.run('postStart', existing.id)
    }

    await hooks.run('postAttach', existing.id)
    return existing.id
  }

  context.applicationPort = await resolveApplicationPort(undefined, allocatePort)

  const name = await probeContainerName(runtime, projectPath, image)
  const spec = buildContainerSpec({devcontainer, settings, context, projectPath, image, name})

  let containerId: string
  try {
    containerId = await runtime.createContainer(spec)
  } catch (error) {
    throw new ContainerCreateError(error instanceof Error ? error.message : String(error), {cause: error})
  }

  reporter.emit({event: 'CONTAINER_CREATED', containerId, name})

  await runtime.startContainer(containerId)
  reporter.emit({event: 'CONTAINER_STARTED', containerId})

  await hooks.run('postCreate', containerId)
  await hooks.run('postStart', containerId)
  await hooks.run('postAttach', containerId)

  return containerId
}
