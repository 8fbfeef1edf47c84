import process from 'node:process'

/**
 * One-shot wait for a termination signal.
 */
export type InterruptWatch = {
  /** Resolves with the first signal received; never rejects */
  interrupted: Promise<NodeJS.Signals>;
  /** Removes the signal listeners */
  dispose(): void;
}

export type WatchInterrupt = () => InterruptWatch

export const interruptSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']

export const watchProcessInterrupt: WatchInterrupt = () => {
  const listeners: Array<[NodeJS.Signals, () => void]> = []

  const interrupted = new Promise<NodeJS.Signals>(resolve => {
    for (const signal of interruptSignals) {
      const listener = () => {
        resolve(signal)
      }

      listeners.push([signal, listener])
      process.once(signal, listener)
    }
  })

  return {
    interrupted,
    dispose() {
      for (const [signal, listener] of listeners) {
        process.off(signal, listener)
      }
    }
  }
}
