import { type EventEmitter } from 'node:events'
import { parseCommandLine, usage } from './command-line.ts'
import { resolveConfig } from './config.ts'
import { run, type RunOptions } from './load-generator.ts'
import { logger as defaultLogger } from './logging.ts'

export const stopSignals = ['SIGINT', 'SIGTERM'] as const

export interface MainOptions extends Omit<RunOptions, 'config'> {
  env?: NodeJS.ProcessEnv
  print?: (text: string) => void
}

/**
 * Aborts the controller on the first stop signal received by the emitter.
 * Returns a function removing the listeners.
 */
export function abortOnSignals (
  controller: AbortController,
  emitter: EventEmitter = process,
  logger = defaultLogger
): () => void {
  const listeners = stopSignals.map(signal => {
    const listener = (): void => {
      logger.info({ signal }, 'Stopping producer...')
      controller.abort()
    }

    emitter.once(signal, listener)
    return [signal, listener] as const
  })

  return () => {
    for (const [signal, listener] of listeners) {
      emitter.removeListener(signal, listener)
    }
  }
}

/** Runs the load generator with the given arguments and resolves to the process exit code. */
export async function main (args: string[], options: MainOptions = {}): Promise<number> {
  const { env, print = console.log, ...runOptions } = options
  const logger = options.logger ?? defaultLogger

  try {
    const { help, overrides } = parseCommandLine(args)

    if (help) {
      print(usage())
      return 0
    }

    await run({ ...runOptions, config: resolveConfig(overrides, env) })
    return 0
  } catch (error) {
    logger.fatal({ err: error }, 'Grid load generator stopped.')
    return 1
  }
}
