import { ProduceAcks, type ProducerOptions } from '@platformatic/kafka'
import { MAX_CHANGES_PER_BATCH } from './codec.ts'
import { UserError } from './errors.ts'
import { loggers } from './logging.ts'
import { defaultColumns, defaultGridId, defaultRows } from './synthesizer.ts'
import { ajv, enumErrorMessage, formatValidationErrors, listErrorMessage } from './utils.ts'

export type Compression = NonNullable<ProducerOptions<string, string, string, string>['compression']>

export const compressions = ['none', 'gzip', 'snappy', 'lz4', 'zstd'] as const satisfies readonly Compression[]

export interface LoadGeneratorConfig {
  clientId: string
  bootstrapBrokers: string[]
  topic: string
  gridId: string
  routingKey: string
  rows: number
  columns: number
  minChanges: number
  maxChanges: number
  minDelay: number
  maxDelay: number
  maxBatches?: number
  acks: number
  compression: Compression
  autocreateTopics: boolean
  connectTimeout: number
  timeout: number
  sendRetries: number
  sendRetryDelay: number
}

export type ConfigKey = keyof LoadGeneratorConfig
export type ConfigOverrides = Partial<Record<ConfigKey, unknown>>

export const defaultConfig: Omit<LoadGeneratorConfig, 'routingKey'> = {
  clientId: 'grid-loadgen',
  bootstrapBrokers: ['localhost:9092'],
  topic: 'grid-updates',
  gridId: defaultGridId,
  rows: defaultRows,
  columns: defaultColumns,
  minChanges: 1,
  maxChanges: 3,
  minDelay: 500,
  maxDelay: 2000,
  acks: ProduceAcks.LEADER,
  compression: 'none',
  autocreateTopics: true,
  connectTimeout: 5000,
  timeout: 5000,
  sendRetries: 3,
  sendRetryDelay: 250
}

const idProperty = { type: 'string', pattern: '^\\S+$' }
const delayProperty = { type: 'integer', minimum: 0 }

export const configSchema = {
  type: 'object',
  properties: {
    clientId: idProperty,
    bootstrapBrokers: { type: 'array', items: { type: 'string', minLength: 1 }, minItems: 1 },
    topic: idProperty,
    gridId: idProperty,
    routingKey: idProperty,
    rows: { type: 'integer', minimum: 1 },
    columns: { type: 'integer', minimum: 1 },
    minChanges: { type: 'integer', minimum: 1 },
    maxChanges: { type: 'integer', maximum: MAX_CHANGES_PER_BATCH, gteProperty: 'minChanges' },
    minDelay: delayProperty,
    maxDelay: { ...delayProperty, gteProperty: 'minDelay' },
    maxBatches: { type: 'integer', minimum: 1 },
    acks: {
      type: 'integer',
      enumeration: {
        allowed: Object.values(ProduceAcks),
        errorMessage: enumErrorMessage(ProduceAcks)
      }
    },
    compression: {
      type: 'string',
      enumeration: {
        allowed: [...compressions],
        errorMessage: listErrorMessage(compressions)
      }
    },
    autocreateTopics: { type: 'boolean' },
    connectTimeout: delayProperty,
    timeout: delayProperty,
    sendRetries: { type: 'integer', minimum: 0 },
    sendRetryDelay: delayProperty
  },
  required: [
    'clientId',
    'bootstrapBrokers',
    'topic',
    'gridId',
    'routingKey',
    'rows',
    'columns',
    'minChanges',
    'maxChanges',
    'minDelay',
    'maxDelay',
    'acks',
    'compression',
    'autocreateTopics',
    'connectTimeout',
    'timeout',
    'sendRetries',
    'sendRetryDelay'
  ],
  additionalProperties: false
}

export const configValidator = ajv.compile<LoadGeneratorConfig>(configSchema)

type ValueParser = (raw: string) => unknown

export const parseString: ValueParser = raw => raw.trim()
// Malformed numbers become NaN and are reported by the schema
export const parseInteger: ValueParser = raw => Number(raw)
export const parseList: ValueParser = raw =>
  raw
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
export const parseBoolean: ValueParser = raw => {
  const normalized = raw.trim().toLowerCase()

  if (['true', '1', 'yes'].includes(normalized)) {
    return true
  } else if (['false', '0', 'no'].includes(normalized)) {
    return false
  }

  return raw
}

export interface ConfigSource {
  env: string[]
  parse: ValueParser
}

// Earlier variables win when more than one is set
export const configSources: Record<ConfigKey, ConfigSource> = {
  clientId: { env: ['KAFKA_CLIENT_ID'], parse: parseString },
  bootstrapBrokers: { env: ['KAFKA_BROKERS', 'KAFKA_BOOTSTRAP_SERVERS'], parse: parseList },
  topic: { env: ['GRID_TOPIC'], parse: parseString },
  gridId: { env: ['GRID_ID'], parse: parseString },
  routingKey: { env: ['GRID_ROUTING_KEY'], parse: parseString },
  rows: { env: ['GRID_ROWS'], parse: parseInteger },
  columns: { env: ['GRID_COLUMNS'], parse: parseInteger },
  minChanges: { env: ['GRID_MIN_CHANGES'], parse: parseInteger },
  maxChanges: { env: ['GRID_MAX_CHANGES'], parse: parseInteger },
  minDelay: { env: ['GRID_MIN_DELAY'], parse: parseInteger },
  maxDelay: { env: ['GRID_MAX_DELAY'], parse: parseInteger },
  maxBatches: { env: ['GRID_MAX_BATCHES'], parse: parseInteger },
  acks: { env: ['KAFKA_ACKS'], parse: parseInteger },
  compression: { env: ['KAFKA_COMPRESSION'], parse: parseString },
  autocreateTopics: { env: ['KAFKA_AUTOCREATE_TOPICS'], parse: parseBoolean },
  connectTimeout: { env: ['KAFKA_CONNECT_TIMEOUT'], parse: parseInteger },
  timeout: { env: ['KAFKA_TIMEOUT'], parse: parseInteger },
  sendRetries: { env: ['GRID_SEND_RETRIES'], parse: parseInteger },
  sendRetryDelay: { env: ['GRID_SEND_RETRY_DELAY'], parse: parseInteger }
}

export function isConfigKey (key: string): key is ConfigKey {
  return Object.hasOwn(configSources, key)
}

export function configFromEnvironment (env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {}

  for (const key of Object.keys(configSources)) {
    if (!isConfigKey(key)) {
      continue
    }

    const { env: names, parse } = configSources[key]
    const raw = names.map(name => env[name]).find(value => value !== undefined && value.length > 0)

    if (raw !== undefined) {
      overrides[key] = parse(raw)
    }
  }

  return overrides
}

/**
 * Resolves the configuration from the built-in defaults, the environment and
 * the explicit overrides, in increasing priority. When no routing key is
 * given, the grid id is used so that all updates of a grid land on the same
 * partition.
 */
export function resolveConfig (
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): LoadGeneratorConfig {
  const candidate: Record<string, unknown> = { ...defaultConfig, ...configFromEnvironment(env), ...overrides }
  candidate.routingKey ??= candidate.gridId

  if (!configValidator(candidate)) {
    throw new UserError(formatValidationErrors(configValidator, '/config'), {
      errors: configValidator.errors
    })
  }

  loggers.config?.debug({ config: candidate }, 'Configuration resolved.')

  return candidate
}
