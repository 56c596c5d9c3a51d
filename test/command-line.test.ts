import { deepStrictEqual, ok, strictEqual, throws } from 'node:assert'
import { test } from 'node:test'
import { parseCommandLine, resolveConfig, usage } from '../src/index.ts'

test('parseCommandLine should map flags to configuration keys', () => {
  const { help, overrides } = parseCommandLine([
    '--brokers',
    'a:9092,b:9092',
    '-t',
    'updates',
    '--grid',
    'user4_view2',
    '--min-delay',
    '100',
    '--max-delay',
    '200',
    '-n',
    '10'
  ])

  strictEqual(help, false)
  deepStrictEqual(overrides, {
    bootstrapBrokers: ['a:9092', 'b:9092'],
    topic: 'updates',
    gridId: 'user4_view2',
    minDelay: 100,
    maxDelay: 200,
    maxBatches: 10
  })
})

test('parseCommandLine should only return the flags that were given', () => {
  deepStrictEqual(parseCommandLine([]), { help: false, overrides: {} })
  deepStrictEqual(parseCommandLine(['-h']), { help: true, overrides: {} })
})

test('parseCommandLine should reject unknown flags', () => {
  throws(() => parseCommandLine(['--unknown', 'value']), { code: 'ERR_PARSE_ARGS_UNKNOWN_OPTION' })
})

test('malformed numeric flags should fail validation', () => {
  const { overrides } = parseCommandLine(['--min-delay', '1.5'])

  strictEqual(overrides.minDelay, 1.5)
  throws(() => resolveConfig(overrides, {}), { message: '/config/minDelay must be integer.' })
})

test('flags should override the environment', () => {
  const { overrides } = parseCommandLine(['--rows', '10', '--key', 'partition-1'])
  const config = resolveConfig(overrides, { GRID_ROWS: '20', GRID_COLUMNS: '5' })

  strictEqual(config.rows, 10)
  strictEqual(config.columns, 5)
  strictEqual(config.routingKey, 'partition-1')
})

test('usage should list every flag with its environment variables', () => {
  const lines = usage().split('\n')

  strictEqual(lines[0], 'Usage: grid-loadgen [options]')
  ok(lines.includes('  -b, --brokers <value>     (env: KAFKA_BROKERS, KAFKA_BOOTSTRAP_SERVERS)'))
  ok(lines.includes('  --rows <value>            (env: GRID_ROWS)'))
})
