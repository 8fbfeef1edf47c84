import {createServer} from 'node:net'
import type {ContainerSummary} from '../engine/types.js'
import {PortAllocationError} from '../errors.js'

/** Label carrying the application port chosen when the container was created. */
export const applicationPortLabel = 'devcontainer_application_port'

export type AllocatePort = () => Promise<number>

/**
 * Asks the OS for a free TCP port by listening on `0.0.0.0:0`, then releases
 * it. Another process may take the port before the container binds it.
 */
export async function requestOpenPort(): Promise<number> {
  const server = createServer()

  return new Promise<number>((resolve, reject) => {
    server.once('error', error => {
      reject(new PortAllocationError(`Could not select an available port for application: ${error.message}`, {cause: error}))
    })

    server.listen(0, '0.0.0.0', () => {
      const address = server.address()
      server.close(() => {
        if (address === null || typeof address === 'string') {
          reject(new PortAllocationError('Could not select an available port for application'))
          return
        }

        resolve(address.port)
      })
    })
  })
}

/**
 * Reuses the port recorded on an existing container, or allocates a new one.
 * @throws PortAllocationError if the recorded label is not a valid port
 */
export async function resolveApplicationPort(
  existing: ContainerSummary | undefined,
  allocate: AllocatePort = requestOpenPort
): Promise<number> {
  const label = existing?.labels[applicationPortLabel]
  if (label === undefined) {
    return allocate()
  }

  const port = Number(label)
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new PortAllocationError(`Could not parse application port from container: '${label}'`)
  }

  return port
}
