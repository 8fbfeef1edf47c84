import type {ProvisioningMode, ShutdownAction} from '../types.js'

/** The shutdown action that stops resources of the given mode. */
export function stopActionFor(mode: ProvisioningMode): ShutdownAction {
  return mode === 'compose' ? 'stopCompose' : 'stopContainer'
}

/**
 * An explicit `down` always stops. A teardown at the end of `up` stops only
 * when the descriptor's shutdown action is the one matching the mode.
 */
export function shouldStop(action: ShutdownAction, mode: ProvisioningMode, fromUp: boolean): boolean {
  if (!fromUp) {
    return true
  }

  return action === stopActionFor(mode)
}
