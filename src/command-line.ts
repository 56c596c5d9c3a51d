import { parseArgs } from 'node:util'
import { type ConfigKey, type ConfigOverrides, configSources } from './config.ts'

export interface Flag {
  key: ConfigKey
  short?: string
}

export const flags: Record<string, Flag> = {
  brokers: { key: 'bootstrapBrokers', short: 'b' },
  'client-id': { key: 'clientId' },
  topic: { key: 'topic', short: 't' },
  grid: { key: 'gridId', short: 'g' },
  key: { key: 'routingKey', short: 'k' },
  rows: { key: 'rows' },
  columns: { key: 'columns' },
  'min-changes': { key: 'minChanges' },
  'max-changes': { key: 'maxChanges' },
  'min-delay': { key: 'minDelay' },
  'max-delay': { key: 'maxDelay' },
  batches: { key: 'maxBatches', short: 'n' },
  acks: { key: 'acks' },
  compression: { key: 'compression' }
}

export interface CommandLine {
  help: boolean
  overrides: ConfigOverrides
}

export function parseCommandLine (args: string[]): CommandLine {
  const options: Record<string, { type: 'string' | 'boolean', short?: string }> = {
    help: { type: 'boolean', short: 'h' }
  }

  for (const [name, { short }] of Object.entries(flags)) {
    options[name] = short ? { type: 'string', short } : { type: 'string' }
  }

  const { values } = parseArgs({ args, options, strict: true, allowPositionals: false })
  const overrides: ConfigOverrides = {}

  for (const [name, { key }] of Object.entries(flags)) {
    const value = values[name]

    if (typeof value === 'string') {
      overrides[key] = configSources[key].parse(value)
    }
  }

  return { help: values.help === true, overrides }
}

export function usage (): string {
  const lines = ['Usage: grid-loadgen [options]', '', 'Options:', '  -h, --help']

  for (const [name, { key, short }] of Object.entries(flags)) {
    const env = configSources[key].env.join(', ')
    lines.push(`  ${short ? `-${short}, ` : ''}--${name} <value>`.padEnd(28) + `(env: ${env})`)
  }

  return lines.join('\n')
}
