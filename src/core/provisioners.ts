import {readFile} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import type {ComposeRunner} from '../engine/compose.js'
import type {ContainerRuntime} from '../engine/runtime.js'
import type {ProgressEvent} from '../engine/types.js'
import {ConfigInvalidError, ContainerCreateError, ImagePullError} from '../errors.js'
import type {DevContainer, ProvisioningMode, RunContext, Settings} from '../types.js'
import {devcontainerFolder, imageTagFor, packBuildContext} from './build-context.js'
import {generateComposeOverride, readComposeVersion} from './compose-overlay.js'
import {devcontainerEnvs, identityLabels} from './container-spec.js'
import {composeFiles, formatImage} from './descriptor.js'
import type {HookRunner} from './hook-runner.js'
import {findContainer, materialize, type MaterializeOptions} from './materializer.js'
import type {AllocatePort} from './port-allocator.js'
import type {Reporter} from './reporter.js'

/**
 * Everything a provisioning strategy works with during one `up` or `down`.
 */
export type ProvisionContext = {
  runtime: ContainerRuntime;
  compose: ComposeRunner;
  reporter: Reporter;
  hooks: HookRunner;
  devcontainer: DevContainer;
  settings: Settings;
  projectPath: string;
  context: RunContext;
  allocatePort: AllocatePort;
  /** Where the compose overlay is written (system temp directory by default) */
  overlayDirectory?: string;
}

export type Provisioner = {
  /**
   * Brings the container up and runs the due hooks.
   * @returns The id of the container the project runs in
   */
  provision(ctx: ProvisionContext): Promise<string>;

  /** Stops what `provision` started. A missing container is not an error. */
  stop(ctx: ProvisionContext): Promise<void>;
}

/**
 * Consumes a pull or build stream to the end.
 * @throws ImagePullError on the first error entry
 */
export async function drainProgress(stream: AsyncIterable<ProgressEvent>, image: string, reporter: Reporter): Promise<void> {
  for await (const entry of stream) {
    if (entry.error !== undefined) {
      throw new ImagePullError(image, entry.error)
    }

    reporter.emit({event: 'PROGRESS', status: entry.status})
  }
}

function devcontainerDir(projectPath: string): string {
  return join(projectPath, devcontainerFolder)
}

async function stopIdentityContainer({runtime, reporter, context}: ProvisionContext): Promise<void> {
  const container = await findContainer(runtime, {labels: identityLabels(context.projectName)})
  if (!container) {
    return
  }

  await runtime.stopContainer(container.id)
  reporter.emit({event: 'CONTAINER_STOPPED', containerId: container.id})
}

function materializeOptions(ctx: ProvisionContext): MaterializeOptions {
  const {runtime, reporter, hooks, devcontainer, settings, projectPath, context, allocatePort} = ctx
  return {runtime, reporter, hooks, devcontainer, settings, projectPath, context, allocatePort}
}

// -- Image -------------------------------------------------------------------

export const imageProvisioner: Provisioner = {
  async provision(ctx) {
    const {runtime, reporter, devcontainer} = ctx
    if (devcontainer.image === undefined) {
      throw new ConfigInvalidError('"image" is required in image mode')
    }

    const image = formatImage(devcontainer.image)
    reporter.emit({event: 'IMAGE_PULLING', image})
    await drainProgress(runtime.pullImage(image), image, reporter)
    reporter.emit({event: 'IMAGE_PULLED', image})

    return materialize(image, materializeOptions(ctx))
  },

  stop: stopIdentityContainer
}

// -- Build -------------------------------------------------------------------

export const buildProvisioner: Provisioner = {
  async provision(ctx) {
    const {runtime, reporter, devcontainer, projectPath} = ctx
    if (devcontainer.build === undefined) {
      throw new ConfigInvalidError('"build" is required in build mode')
    }

    const {dockerfile, args, target} = devcontainer.build
    let contents: string
    try {
      contents = await readFile(join(devcontainerDir(projectPath), dockerfile), 'utf8')
    } catch (error) {
      throw new ConfigInvalidError(`cannot read Dockerfile '${dockerfile}'`, {cause: error})
    }

    const tag = imageTagFor(contents)
    reporter.emit({event: 'IMAGE_BUILDING', tag})
    const stream = runtime.buildImage({
      tag,
      dockerfile: `${devcontainerFolder}/${dockerfile}`,
      context: await packBuildContext(projectPath),
      args,
      target
    })
    await drainProgress(stream, tag, reporter)
    reporter.emit({event: 'IMAGE_BUILT', tag})

    return materialize(tag, materializeOptions(ctx))
  },

  stop: stopIdentityContainer
}

// -- Compose -----------------------------------------------------------------

function composeLabels(projectName: string, service: string): Record<string, string> {
  return {
    'com.docker.compose.project': projectName,
    'com.docker.compose.service': service
  }
}

function composeService(devcontainer: DevContainer): string {
  if (!devcontainer.service || devcontainer.dockerComposeFile === undefined) {
    throw new ConfigInvalidError('"dockerComposeFile" and "service" are required in compose mode')
  }

  return devcontainer.service
}

/**
 * Leading compose arguments: project name, the descriptor's compose files and
 * a freshly generated overlay.
 */
export async function composeBaseArgs(ctx: ProvisionContext): Promise<string[]> {
  const {devcontainer, settings, projectPath, context, overlayDirectory} = ctx
  const service = composeService(devcontainer)
  const files = composeFiles(devcontainer.dockerComposeFile ?? [])
  const args = ['-p', context.projectName]
  for (const file of files) {
    args.push('-f', file)
  }

  const version = await readComposeVersion(resolve(devcontainerDir(projectPath), files[0]))
  const extraPorts = context.applicationPort === undefined ? [] : [context.applicationPort]
  const overlay = await generateComposeOverride(
    {settings, serviceName: service, version, envs: devcontainerEnvs(context), extraPorts},
    overlayDirectory
  )
  args.push('-f', overlay)

  return args
}

async function runCompose(ctx: ProvisionContext, args: string[]): Promise<void> {
  const {compose, reporter, projectPath} = ctx
  reporter.emit({event: 'COMPOSE_RUNNING', args})
  await compose(args, {
    cwd: devcontainerDir(projectPath),
    onLogLine({stream, line}) {
      reporter.emit({event: 'COMMAND_LOG', origin: 'compose', stream, line})
    }
  })
}

export const composeProvisioner: Provisioner = {
  async provision(ctx) {
    const {runtime, reporter, hooks, devcontainer, context} = ctx
    const service = composeService(devcontainer)
    const labels = composeLabels(context.projectName, service)

    const before = await findContainer(runtime, {labels})
    const existedBefore = before !== undefined
    const runningBefore = before?.state === 'running'

    const args = await composeBaseArgs(ctx)
    args.push('up', '-d', service, ...(devcontainer.runServices ?? []))
    await runCompose(ctx, args)

    const container = await findContainer(runtime, {labels})
    if (!container) {
      throw new ContainerCreateError('Could not locate container after compose up')
    }

    reporter.emit({event: 'CONTAINER_FOUND', containerId: container.id, running: container.state === 'running'})

    if (!existedBefore) {
      await hooks.run('postCreate', container.id)
    }

    if (!runningBefore) {
      await hooks.run('postStart', container.id)
    }

    await hooks.run('postAttach', container.id)
    return container.id
  },

  async stop(ctx) {
    const service = composeService(ctx.devcontainer)
    const args = await composeBaseArgs(ctx)
    args.push('stop')
    await runCompose(ctx, args)
    ctx.reporter.emit({event: 'COMPOSE_STOPPED', service})
  }
}

const provisioners: Record<ProvisioningMode, Provisioner> = {
  image: imageProvisioner,
  build: buildProvisioner,
  compose: composeProvisioner
}

export function provisionerFor(mode: ProvisioningMode): Provisioner {
  return provisioners[mode]
}
