import process from 'node:process'
import pino from 'pino'
import type {HookKind, ProjectState, ProvisioningMode, ShutdownAction} from '../types.js'

/** Where a hook command comes from. */
export type HookSource = 'descriptor' | 'settings'

/**
 * Discriminated union of project lifecycle events.
 *
 * Lifecycle of `up`:
 * 1. PROJECT_LOADED - Descriptor and settings read
 * 2. STATE_CHANGED (provisioning)
 * 3. INITIALIZE_RUNNING - Host-side initialize command, when configured
 * 4. IMAGE_PULLING / IMAGE_BUILDING / COMPOSE_RUNNING, then PROGRESS lines
 * 5. CONTAINER_FOUND or CONTAINER_CREATED, CONTAINER_STARTED
 * 6. HOOK_STARTING / HOOK_LOG / HOOK_FINISHED per configured hook
 * 7. CONTAINER_READY, STATE_CHANGED (running)
 * 8. APPLICATION_SPAWNED, when a companion application is configured
 * 9. CONTAINER_EXITED, APPLICATION_EXITED or SHUTDOWN_TRIGGERED
 * 10. CONTAINER_STOPPED / COMPOSE_STOPPED or SHUTDOWN_SKIPPED
 * 11. STATE_CHANGED (terminated)
 */
export type ProjectLoadedEvent = {
  event: 'PROJECT_LOADED';
  projectName: string;
  projectPath: string;
  mode: ProvisioningMode;
}

export type SettingsSkippedEvent = {
  event: 'SETTINGS_SKIPPED';
}

export type StateChangedEvent = {
  event: 'STATE_CHANGED';
  projectName: string;
  state: ProjectState;
}

export type InitializeRunningEvent = {
  event: 'INITIALIZE_RUNNING';
  command: string[];
}

export type ImagePullingEvent = {
  event: 'IMAGE_PULLING';
  image: string;
}

export type ImagePulledEvent = {
  event: 'IMAGE_PULLED';
  image: string;
}

export type ImageBuildingEvent = {
  event: 'IMAGE_BUILDING';
  tag: string;
}

export type ImageBuiltEvent = {
  event: 'IMAGE_BUILT';
  tag: string;
}

export type ProgressLineEvent = {
  event: 'PROGRESS';
  status: string;
}

export type ComposeRunningEvent = {
  event: 'COMPOSE_RUNNING';
  args: string[];
}

export type ContainerFoundEvent = {
  event: 'CONTAINER_FOUND';
  containerId: string;
  running: boolean;
}

export type ContainerCreatedEvent = {
  event: 'CONTAINER_CREATED';
  containerId: string;
  name?: string;
}

export type ContainerStartedEvent = {
  event: 'CONTAINER_STARTED';
  containerId: string;
}

export type ContainerReadyEvent = {
  event: 'CONTAINER_READY';
  containerId: string;
  applicationPort?: number;
}

export type ContainerExitedEvent = {
  event: 'CONTAINER_EXITED';
  containerId: string;
  exitCode?: number;
}

export type ContainerStoppedEvent = {
  event: 'CONTAINER_STOPPED';
  containerId: string;
}

export type ComposeStoppedEvent = {
  event: 'COMPOSE_STOPPED';
  service: string;
}

export type HookStartingEvent = {
  event: 'HOOK_STARTING';
  hook: HookKind;
  source: HookSource;
  command: string[];
}

export type HookFinishedEvent = {
  event: 'HOOK_FINISHED';
  hook: HookKind;
  source: HookSource;
  durationMs: number;
}

export type HookLogEvent = {
  event: 'HOOK_LOG';
  hook: HookKind;
  stream: 'stdout' | 'stderr';
  line: string;
}

/** Output of host-side commands (initialize command, compose CLI). */
export type CommandLogEvent = {
  event: 'COMMAND_LOG';
  origin: 'initialize' | 'compose';
  stream: 'stdout' | 'stderr';
  line: string;
}

export type ApplicationSpawnedEvent = {
  event: 'APPLICATION_SPAWNED';
  command: string[];
}

export type ApplicationExitedEvent = {
  event: 'APPLICATION_EXITED';
  exitCode?: number;
  signal?: string;
}

export type ShutdownTriggeredEvent = {
  event: 'SHUTDOWN_TRIGGERED';
  reason: 'interrupt' | 'application-exit';
}

export type ShutdownSkippedEvent = {
  event: 'SHUTDOWN_SKIPPED';
  action: ShutdownAction;
  mode: ProvisioningMode;
}

export type ProjectEvent =
  | ProjectLoadedEvent
  | SettingsSkippedEvent
  | StateChangedEvent
  | InitializeRunningEvent
  | ImagePullingEvent
  | ImagePulledEvent
  | ImageBuildingEvent
  | ImageBuiltEvent
  | ProgressLineEvent
  | ComposeRunningEvent
  | ContainerFoundEvent
  | ContainerCreatedEvent
  | ContainerStartedEvent
  | ContainerReadyEvent
  | ContainerExitedEvent
  | ContainerStoppedEvent
  | ComposeStoppedEvent
  | HookStartingEvent
  | HookFinishedEvent
  | HookLogEvent
  | CommandLogEvent
  | ApplicationSpawnedEvent
  | ApplicationExitedEvent
  | ShutdownTriggeredEvent
  | ShutdownSkippedEvent

/**
 * Interface for reporting project lifecycle events.
 */
export type Reporter = {
  emit(event: ProjectEvent): void;
}

const verboseEvents = new Set<ProjectEvent['event']>(['PROGRESS', 'HOOK_LOG', 'COMMAND_LOG'])

/**
 * Reporter that outputs structured JSON logs via pino.
 * Output lines (pull progress, hook and command output) are logged at debug level.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: process.env.LOG_LEVEL ?? 'info'})

  emit(event: ProjectEvent): void {
    if (verboseEvents.has(event.event)) {
      this.logger.debug(event)
    } else {
      this.logger.info(event)
    }
  }
}
