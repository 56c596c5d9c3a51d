import { deepStrictEqual, ok, strictEqual } from 'node:assert'
import { test } from 'node:test'
import {
  ConnectionError,
  ERROR_PREFIX,
  errorCodes,
  GenericError,
  MultipleErrors,
  SendError,
  UserError
} from '../src/index.ts'

test('should export error codes with correct prefix', () => {
  for (const code of errorCodes) {
    ok(code.startsWith(ERROR_PREFIX), `Error code ${code} should start with ${ERROR_PREFIX}`)
  }
})

test('GenericError constructor', () => {
  const error = new GenericError('GRID_LOADGEN_USER', 'test message', { cause: new Error('cause'), foo: 'bar' })
  strictEqual(error.message, 'test message')
  strictEqual(error.code, 'GRID_LOADGEN_USER')
  strictEqual(error.foo, 'bar')
  ok(error.cause instanceof Error)
  strictEqual(error.cause.message, 'cause')

  // Properties are enumerable so that loggers serialize them
  const errorObj = JSON.parse(JSON.stringify(error))
  strictEqual(errorObj.message, 'test message')
  strictEqual(errorObj.code, 'GRID_LOADGEN_USER')
  strictEqual(errorObj.foo, 'bar')
  ok('stack' in errorObj)
})

test('GenericError.isGenericError', () => {
  ok(GenericError.isGenericError(new UserError('test message')))
  ok(GenericError.isGenericError(new SendError('test message', [])))
  strictEqual(GenericError.isGenericError(new Error('regular error')), false)
  strictEqual(GenericError.isGenericError('not an error'), false)
})

test('GenericError.findBy', () => {
  const error = new GenericError('GRID_LOADGEN_USER', 'test message', { foo: 'bar', baz: 123 })
  strictEqual(error.findBy('foo', 'bar'), error)
  strictEqual(error.findBy('baz', 123), error)
  strictEqual(error.findBy('foo', 'not-bar'), null)
  strictEqual(error.findBy('unknown', 'value'), null)
})

test('MultipleErrors.findBy should search nested errors', () => {
  const nested = new ConnectionError('nested', { broker: 'localhost:9092' })
  const error = new MultipleErrors('GRID_LOADGEN_SEND', 'outer', [new Error('plain'), nested], { meta: 'data' })

  strictEqual(error.findBy('meta', 'data'), error)
  strictEqual(error.findBy('broker', 'localhost:9092'), nested)
  strictEqual(error.findBy('broker', 'elsewhere'), null)
  ok(MultipleErrors.isMultipleErrors(error))
  strictEqual(MultipleErrors.isMultipleErrors(new AggregateError([])), false)
})

test('ConnectionError should not be retriable', () => {
  const cause = new Error('connect ECONNREFUSED')
  const error = new ConnectionError('Cannot connect.', { cause })

  strictEqual(error.code, 'GRID_LOADGEN_CONNECTION')
  strictEqual(error.canRetry, false)
  strictEqual(error.cause, cause)
  ok(error instanceof GenericError)
})

test('SendError should carry every attempt', () => {
  const first = new Error('first')
  const second = new Error('second')
  const error = new SendError('Sending failed.', [first, second], { batchId: 'batch_1_1000' })

  strictEqual(error.code, 'GRID_LOADGEN_SEND')
  strictEqual(error.attempts, 2)
  strictEqual(error.batchId, 'batch_1_1000')
  deepStrictEqual(error.errors, [first, second])
  ok(error instanceof AggregateError)

  const errorObj = JSON.parse(JSON.stringify(error))
  strictEqual(errorObj.code, 'GRID_LOADGEN_SEND')
  strictEqual(errorObj.attempts, 2)
})

test('UserError', () => {
  const error = new UserError('Invalid value.', { key: 'rows' })

  strictEqual(error.code, 'GRID_LOADGEN_USER')
  strictEqual(error.canRetry, false)
  strictEqual(error.key, 'rows')
})
