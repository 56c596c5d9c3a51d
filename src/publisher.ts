import {
  Producer,
  stringSerializers,
  type ProduceResult,
  type ProducerOptions,
  type SendOptions
} from '@platformatic/kafka'
import { type Logger } from 'pino'
import { encodeBatch, validateBatchSize } from './codec.ts'
import { type LoadGeneratorConfig } from './config.ts'
import { ConnectionError, SendError, UserError } from './errors.ts'
import { logger as defaultLogger, loggers } from './logging.ts'
import { type UpdateBatch } from './model.ts'
import { describeBatch } from './summary.ts'
import { sleep, toError } from './utils.ts'

export type GridProducerOptions = ProducerOptions<string, string, string, string>
export type GridSendOptions = SendOptions<string, string, string, string>

export interface MetadataRequest {
  topics: string[]
  autocreateTopics?: boolean
}

// The subset of the Kafka producer the publisher relies on
export interface GridUpdateProducer {
  metadata (options: MetadataRequest): Promise<unknown>
  send (options: GridSendOptions): Promise<ProduceResult>
  close (): Promise<void>
}

export type ProducerFactory = (options: GridProducerOptions) => GridUpdateProducer

export interface ConnectOptions {
  createProducer?: ProducerFactory
  logger?: Logger
}

export function createKafkaProducer (options: GridProducerOptions): GridUpdateProducer {
  return new Producer<string, string, string, string>(options)
}

export function producerOptions (config: LoadGeneratorConfig): GridProducerOptions {
  return {
    clientId: config.clientId,
    bootstrapBrokers: config.bootstrapBrokers,
    connectTimeout: config.connectTimeout,
    timeout: config.timeout,
    // Sends are retried by the publisher with its own backoff
    retries: 0,
    acks: config.acks,
    compression: config.compression,
    autocreateTopics: config.autocreateTopics,
    serializers: stringSerializers,
    strict: true
  }
}

function isRetriable (error: unknown): boolean {
  return !(typeof error === 'object' && error !== null && 'canRetry' in error && error.canRetry === false)
}

export class GridUpdatePublisher {
  #producer: GridUpdateProducer
  #config: LoadGeneratorConfig
  #logger: Logger
  #closeController: AbortController
  #closing: Promise<void> | null
  #sent: number

  constructor (producer: GridUpdateProducer, config: LoadGeneratorConfig, logger: Logger = defaultLogger) {
    this.#producer = producer
    this.#config = config
    this.#logger = logger
    this.#closeController = new AbortController()
    this.#closing = null
    this.#sent = 0
  }

  get closed (): boolean {
    return this.#closing !== null
  }

  get sent (): number {
    return this.#sent
  }

  /**
   * Sends the batch and waits for the broker acknowledgement.
   *
   * Failed sends are retried up to `sendRetries` times, doubling
   * `sendRetryDelay` after every attempt. When all attempts fail a SendError
   * holding every attempt's error is thrown. Closing the publisher or aborting
   * `interrupt` stops the retries; the last error of the SendError is then a
   * UserError with `interrupted: true`.
   */
  async publish (batch: UpdateBatch, interrupt?: AbortSignal): Promise<ProduceResult> {
    if (this.closed) {
      throw new UserError('Cannot publish on a closed publisher.', { batchId: batch.batchId })
    }

    const value = encodeBatch(batch)
    const size = validateBatchSize(batch, value)
    const { topic, routingKey, sendRetries, sendRetryDelay } = this.#config
    const closeSignal = this.#closeController.signal
    const signal = interrupt ? AbortSignal.any([closeSignal, interrupt]) : closeSignal
    const errors: Error[] = []

    for (let attempt = 0; ; attempt++) {
      loggers.publisher?.debug({ batchId: batch.batchId, attempt, size }, 'Sending batch.')

      try {
        const result = await this.#producer.send({ messages: [{ topic, key: routingKey, value }] })
        this.#sent++

        const { message, ...summary } = describeBatch(batch, this.#sent)
        this.#logger.info(summary, message)

        return result
      } catch (error) {
        errors.push(toError(error))

        if (signal.aborted) {
          errors.push(this.#interruption(batch, closeSignal.aborted))
          break
        }

        if (attempt >= sendRetries || !isRetriable(error)) {
          break
        }
      }

      const delay = sendRetryDelay * 2 ** attempt
      this.#logger.warn(
        { batchId: batch.batchId, err: errors[errors.length - 1] },
        `Send attempt ${attempt + 1} failed, retrying in ${delay}ms.`
      )

      await sleep(delay, undefined, { signal }).catch((error: unknown) => {
        if (!signal.aborted) {
          throw error
        }
      })

      if (signal.aborted) {
        errors.push(this.#interruption(batch, closeSignal.aborted))
        break
      }
    }

    throw new SendError(`Sending batch ${batch.batchId} failed after ${errors.length} attempts.`, errors, {
      batchId: batch.batchId,
      topic
    })
  }

  #interruption (batch: UpdateBatch, closed: boolean): UserError {
    const message = closed
      ? `Publisher closed while retrying batch ${batch.batchId}.`
      : `Publishing of batch ${batch.batchId} was interrupted.`

    return new UserError(message, { batchId: batch.batchId, interrupted: true })
  }

  /** Releases the producer. Only the first call has any effect. */
  close (): Promise<void> {
    this.#closing ??= this.#close()
    return this.#closing
  }

  async #close (): Promise<void> {
    this.#closeController.abort()

    try {
      await this.#producer.close()
      this.#logger.info({ sent: this.#sent }, 'Producer closed.')
    } catch (error) {
      this.#logger.warn({ err: error }, 'Failed to close the producer.')
    }
  }
}

/**
 * Creates a producer and performs a metadata round trip for the configured
 * topic, so an unreachable broker is reported before any batch is built.
 */
export async function connect (config: LoadGeneratorConfig, options: ConnectOptions = {}): Promise<GridUpdatePublisher> {
  const logger = options.logger ?? defaultLogger
  const producer = (options.createProducer ?? createKafkaProducer)(producerOptions(config))

  try {
    await producer.metadata({ topics: [config.topic], autocreateTopics: config.autocreateTopics })
  } catch (error) {
    await producer.close().catch((closeError: unknown) => {
      logger.warn({ err: closeError }, 'Failed to close the producer.')
    })

    throw new ConnectionError(`Cannot connect to ${config.bootstrapBrokers.join(', ')}.`, {
      cause: error,
      bootstrapBrokers: config.bootstrapBrokers
    })
  }

  loggers.publisher?.debug({ topic: config.topic }, 'Connected.')
  logger.info({ brokers: config.bootstrapBrokers, topic: config.topic }, 'Connected to Kafka.')

  return new GridUpdatePublisher(producer, config, logger)
}
