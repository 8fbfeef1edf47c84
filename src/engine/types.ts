import type {MountSpec} from '../types.js'

/**
 * A container as reported by the runtime's listing.
 */
export type ContainerSummary = {
  /** Full container id */
  id: string;
  /** Container name, without the leading slash */
  name: string;
  /** Image reference the container was created from */
  image: string;
  /** Runtime state (e.g. "running", "exited", "created") */
  state: string;
  labels: Record<string, string>;
}

/**
 * Listing filter. Every given label must match; `name` matches the
 * container name exactly.
 */
export type ContainerFilter = {
  labels?: Record<string, string>;
  name?: string;
}

/**
 * Host side of a published port.
 */
export type PortBinding = {
  hostIp: string;
  hostPort: string;
}

/**
 * Everything needed to create a container. Environment entries are
 * `KEY=value` strings and may repeat a key.
 */
export type CreateContainerRequest = {
  /** Explicit container name; the runtime assigns one when absent */
  name?: string;
  image: string;
  env: string[];
  labels: Record<string, string>;
  mounts: MountSpec[];
  /** Container ports to expose, e.g. `8080/tcp` */
  exposedPorts: string[];
  /** Container port (`8080/tcp`) to host bindings */
  portBindings: Record<string, PortBinding[]>;
  /** Replaces the image's default command; the entrypoint is kept */
  cmd?: string[];
}

/**
 * Request to build an image from an in-memory tar context.
 */
export type BuildImageRequest = {
  /** Tag given to the built image */
  tag: string;
  /** Dockerfile path inside the context */
  dockerfile: string;
  /** Gzipped tar archive of the build context */
  context: Uint8Array;
  args?: Record<string, string>;
  target?: string;
}

/**
 * One entry of a pull or build event stream. A stream may carry an error
 * entry anywhere; consumers must drain it to the end or to the first error.
 */
export type ProgressEvent =
  | {status: string; error?: undefined}
  | {error: string; status?: undefined}
