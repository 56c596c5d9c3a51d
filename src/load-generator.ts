import { type LoadGeneratorConfig } from './config.ts'
import { MultipleErrors } from './errors.ts'
import { logger as defaultLogger, loggers } from './logging.ts'
import { type ConnectOptions, connect } from './publisher.ts'
import { type Clock, pickChangeCount, type RandomSource, randomInteger, synthesize } from './synthesizer.ts'
import { sleep } from './utils.ts'

export type StopReason = 'interrupted' | 'limit' | 'failed'

export interface RunStats {
  batches: number
  changes: number
  startedAt: number
  stoppedAt: number
  reason: StopReason
}

export interface RunOptions extends ConnectOptions {
  config: LoadGeneratorConfig
  signal?: AbortSignal
  random?: RandomSource
  now?: Clock
}

// Resolves to false when the signal aborts the wait
async function pause (delay: number, signal?: AbortSignal): Promise<boolean> {
  try {
    await sleep(delay, undefined, { signal })
    return true
  } catch (error) {
    if (signal?.aborted) {
      return false
    }

    throw error
  }
}

function isInterruption (error: unknown): boolean {
  return MultipleErrors.isMultipleErrors(error) && error.findBy('interrupted', true) !== null
}

/**
 * Publishes random update batches until the signal is aborted or the
 * configured batch limit is reached.
 *
 * The publisher is closed exactly once before the returned promise settles,
 * whichever way the loop ends. Publish failures are logged and rethrown,
 * unless the signal interrupted a retry.
 */
export async function run (options: RunOptions): Promise<RunStats> {
  const { config, signal } = options
  const random = options.random ?? Math.random
  const now = options.now ?? Date.now
  const logger = options.logger ?? defaultLogger

  const publisher = await connect(config, options)
  const stats: RunStats = { batches: 0, changes: 0, startedAt: now(), stoppedAt: 0, reason: 'interrupted' }

  logger.info({ gridId: config.gridId, topic: config.topic }, 'Sending grid updates. Press Ctrl+C to stop.')

  try {
    while (!signal?.aborted) {
      const count = pickChangeCount(config.minChanges, config.maxChanges, random)
      const batch = synthesize(count, { gridId: config.gridId, rows: config.rows, columns: config.columns, random, now })

      await publisher.publish(batch, signal)
      stats.batches++
      stats.changes += batch.changes.length

      if (config.maxBatches !== undefined && stats.batches >= config.maxBatches) {
        stats.reason = 'limit'
        break
      }

      const delay = randomInteger(random, config.minDelay, config.maxDelay)
      loggers.generator?.debug({ delay }, 'Waiting before the next batch.')

      if (!(await pause(delay, signal))) {
        break
      }
    }
  } catch (error) {
    if (!signal?.aborted || !isInterruption(error)) {
      stats.reason = 'failed'
      logger.error({ err: error }, 'Publishing failed.')
      throw error
    }

    loggers.generator?.debug({ err: error }, 'Publishing interrupted.')
  } finally {
    await publisher.close()
    stats.stoppedAt = now()

    logger.info(stats, `Stopped (${stats.reason}) after ${stats.batches} batches and ${stats.changes} cell updates.`)
  }

  return stats
}
