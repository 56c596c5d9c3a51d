import { type ProduceResult } from '@platformatic/kafka'
import { pino, type Logger } from 'pino'
import {
  type ConfigOverrides,
  type GridProducerOptions,
  type GridSendOptions,
  type GridUpdateProducer,
  type LoadGeneratorConfig,
  type MetadataRequest,
  resolveConfig
} from '../src/index.ts'

export type ProducedMessage = GridSendOptions['messages'][number]

export interface LogLine {
  level: number
  msg: string
  [key: string]: unknown
}

export class FakeProducer implements GridUpdateProducer {
  options: GridProducerOptions | undefined
  sent: ProducedMessage[] = []
  sendCalls = 0
  sendFailures: Error[] = []
  metadataRequests: MetadataRequest[] = []
  metadataError: Error | null = null
  closeCalls = 0
  closeError: Error | null = null
  onSend: ((producer: FakeProducer) => void) | null = null

  async metadata (options: MetadataRequest): Promise<unknown> {
    this.metadataRequests.push(options)

    if (this.metadataError) {
      throw this.metadataError
    }

    return { brokers: new Map(), topics: new Map() }
  }

  async send (options: GridSendOptions): Promise<ProduceResult> {
    this.sendCalls++

    const failure = this.sendFailures.shift()
    if (failure) {
      throw failure
    }

    this.sent.push(...options.messages)
    this.onSend?.(this)
    return {}
  }

  async close (): Promise<void> {
    this.closeCalls++

    if (this.closeError) {
      throw this.closeError
    }
  }

  factory (): (options: GridProducerOptions) => FakeProducer {
    return options => {
      this.options = options
      return this
    }
  }
}

export function createCapturingLogger (): { logger: Logger, lines: LogLine[] } {
  const lines: LogLine[] = []

  const logger = pino(
    { level: 'debug' },
    {
      write (line: string) {
        lines.push(JSON.parse(line))
      }
    }
  )

  return { logger, lines }
}

export function createConfig (overrides: ConfigOverrides = {}): LoadGeneratorConfig {
  return resolveConfig({ minDelay: 0, maxDelay: 0, sendRetryDelay: 1, ...overrides }, {})
}

// Cycles through the given values, each in [0, 1)
export function sequence (...values: number[]): () => number {
  let i = 0
  return () => values[i++ % values.length]
}

export function fixedClock (start: number, step: number = 0): () => number {
  let current = start - step
  return () => (current += step)
}
