// ---------------------------------------------------------------------------
// Descriptor and settings domain types.
//
// A descriptor (`.devcontainer/devcontainer.json`) and the user settings are
// both loaded once at process start and never mutated afterwards.
// ---------------------------------------------------------------------------

// -- Polymorphic fields -----------------------------------------------------

/** A command as written in JSON: a shell line or an explicit argument list. */
export type CommandSpec = string | string[]

/** `appPort`: a single port, a list of ports, or a raw port string. */
export type AppPort = number | number[] | string

/** `dockerComposeFile`: one compose file or a list of them. */
export type ComposeFile = string | string[]

export type ShutdownAction = 'none' | 'stopContainer' | 'stopCompose'

export type ProvisioningMode = 'image' | 'build' | 'compose'

export type HookKind = 'postCreate' | 'postStart' | 'postAttach'

export const mountTypes = ['bind', 'volume', 'tmpfs', 'npipe', 'cluster'] as const

export type MountType = typeof mountTypes[number]

/** Structured mount, as handed to the container runtime. */
export type MountSpec = {
  source?: string;
  target?: string;
  type?: MountType;
  consistency?: string;
}

// -- Descriptor -------------------------------------------------------------

export type BuildOptions = {
  /** Dockerfile path, relative to the `.devcontainer` folder. */
  dockerfile: string;
  context?: string;
  args?: Record<string, string>;
  target?: string;
}

/**
 * A validated devcontainer descriptor.
 * Exactly one of `image`, `build` or `dockerComposeFile` is set.
 */
export type DevContainer = {
  name?: string;
  image?: string;
  build?: BuildOptions;
  appPort?: AppPort;
  containerEnv?: Record<string, string>;
  remoteEnv?: Record<string, string>;
  containerUser?: string;
  remoteUser?: string;
  mounts?: string[];
  workspaceMount?: string;
  /** Accepted for compatibility, not applied. */
  runArgs?: string[];
  /** Keep the container alive with a sleep loop (default: true). */
  overrideCommand: boolean;
  shutdownAction: ShutdownAction;
  dockerComposeFile?: ComposeFile;
  service?: string;
  runServices?: string[];
  forwardPorts?: number[];
  postCreateCommand?: CommandSpec;
  postStartCommand?: CommandSpec;
  postAttachCommand?: CommandSpec;
  /** Runs on the host, in the project directory, before provisioning. */
  initializeCommand?: CommandSpec;
}

// -- User settings ----------------------------------------------------------

/** Companion application spawned on the host once the container is ready. */
export type ApplicationSettings = {
  cmd: CommandSpec;
}

/** User-global overlay, merged with every project's descriptor. */
export type Settings = {
  application?: ApplicationSettings;
  mounts?: string[];
  envs?: Record<string, string>;
  postCreateCommand?: CommandSpec;
  postStartCommand?: CommandSpec;
  postAttachCommand?: CommandSpec;
  forwardPorts?: number[];
}

// -- Per-command context ----------------------------------------------------

/** Created once per `up`/`down` invocation, never persisted. */
export type RunContext = {
  projectName: string;
  applicationPort?: number;
}

/** Orchestration controller states, in lifecycle order. */
export type ProjectState = 'idle' | 'provisioning' | 'running' | 'shutting-down' | 'terminated'
