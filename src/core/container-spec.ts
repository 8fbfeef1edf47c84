import type {CreateContainerRequest, PortBinding} from '../engine/types.js'
import type {DevContainer, MountSpec, RunContext, Settings} from '../types.js'
import {appPorts} from './descriptor.js'
import {parseMount} from './mount-parser.js'
import {applicationPortLabel} from './port-allocator.js'

/** Keeps the container alive so hooks can be run through exec. */
export const sleepLoopCommand = ['/bin/sh', '-c', 'while sleep 1000; do :; done']

export const workspaceTarget = '/workspace'

/** Identity labels of image and build mode containers. */
export function identityLabels(projectName: string): Record<string, string> {
  return {devcontainer: 'true', devcontainer_name: projectName}
}

/** Variables describing the project, given to the container and the companion application. */
export function devcontainerEnvs(context: RunContext): Record<string, string> {
  const envs: Record<string, string> = {DEVCONTAINER_PROJECT: context.projectName}
  if (context.applicationPort !== undefined) {
    envs.DEVCONTAINER_APPLICATION_PORT = String(context.applicationPort)
  }

  return envs
}

function toEntries(envs: Record<string, string> | undefined): string[] {
  return Object.entries(envs ?? {}).map(([key, value]) => `${key}=${value}`)
}

/**
 * `KEY=value` entries: project variables, then `containerEnv`, then settings
 * `envs`. A key set twice appears twice.
 */
export function containerEnvEntries(devcontainer: DevContainer, settings: Settings, context: RunContext): string[] {
  return [
    ...toEntries(devcontainerEnvs(context)),
    ...toEntries(devcontainer.containerEnv),
    ...toEntries(settings.envs)
  ]
}

export type PortPublication = {
  exposedPorts: string[];
  portBindings: Record<string, PortBinding[]>;
}

/**
 * Publishes `appPort`, descriptor `forwardPorts`, settings `forwardPorts` and
 * the application port, each on the same host port on all interfaces.
 */
export function publishPorts(devcontainer: DevContainer, settings: Settings, context: RunContext): PortPublication {
  const ports = [
    ...appPorts(devcontainer.appPort),
    ...(devcontainer.forwardPorts ?? []).map(String),
    ...(settings.forwardPorts ?? []).map(String)
  ]

  if (context.applicationPort !== undefined) {
    ports.push(String(context.applicationPort))
  }

  const portBindings: Record<string, PortBinding[]> = {}
  for (const port of ports) {
    portBindings[`${port}/tcp`] = [{hostIp: '0.0.0.0', hostPort: port}]
  }

  return {exposedPorts: Object.keys(portBindings), portBindings}
}

/**
 * Workspace mount first (the project directory on `/workspace` unless
 * `workspaceMount` is set), then descriptor mounts, then settings mounts.
 * @throws MountParseError on a malformed mount string
 */
export function containerMounts(devcontainer: DevContainer, settings: Settings, projectPath: string): MountSpec[] {
  const workspace = devcontainer.workspaceMount
    ?? `source=${projectPath},target=${workspaceTarget},type=bind,consistency=cached`

  return [
    parseMount(workspace),
    ...(devcontainer.mounts ?? []).map(mount => parseMount(mount)),
    ...(settings.mounts ?? []).map(mount => parseMount(mount))
  ]
}

export type ContainerSpecInput = {
  devcontainer: DevContainer;
  settings: Settings;
  context: RunContext;
  projectPath: string;
  image: string;
  name?: string;
}

/**
 * Creation request for an image or build mode container.
 */
export function buildContainerSpec({devcontainer, settings, context, projectPath, image, name}: ContainerSpecInput): CreateContainerRequest {
  const labels = identityLabels(context.projectName)
  if (context.applicationPort !== undefined) {
    labels[applicationPortLabel] = String(context.applicationPort)
  }

  return {
    name,
    image,
    env: containerEnvEntries(devcontainer, settings, context),
    labels,
    mounts: containerMounts(devcontainer, settings, projectPath),
    ...publishPorts(devcontainer, settings, context),
    cmd: devcontainer.overrideCommand ? [...sleepLoopCommand] : undefined
  }
}
