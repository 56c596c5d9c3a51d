import { UserError } from './errors.ts'
import { CELL_UPDATE, type Change, type DataType, dataTypes, type UpdateBatch } from './model.ts'

export type RandomSource = () => number
export type Clock = () => number

export interface SynthesizeOptions {
  gridId?: string
  rows?: number
  columns?: number
  // Forces every change to carry this type instead of a random one
  dataType?: DataType
  random?: RandomSource
  now?: Clock
}

export const defaultGridId = 'user1_view1'
export const defaultRows = 50
export const defaultColumns = 25

/** Uniform integer in [min, max], both inclusive. */
export function randomInteger (random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1))
}

export function pickChangeCount (min: number = 1, max: number = 3, random: RandomSource = Math.random): number {
  return randomInteger(random, min, max)
}

export function synthesizeChange (options: SynthesizeOptions = {}): Change {
  const random = options.random ?? Math.random
  const now = options.now ?? Date.now

  const row = randomInteger(random, 0, (options.rows ?? defaultRows) - 1)
  const column = randomInteger(random, 0, (options.columns ?? defaultColumns) - 1)
  const dataType = options.dataType ?? dataTypes[randomInteger(random, 0, dataTypes.length - 1)]

  switch (dataType) {
    case 'string':
      return { row, column, newValue: `Updated_${randomInteger(random, 1000, 9999)}`, dataType }
    case 'number':
      return { row, column, newValue: Math.round((1 + random() * 999) * 100) / 100, dataType }
    case 'integer':
      return { row, column, newValue: randomInteger(random, 1, 1000), dataType }
    case 'boolean':
      return { row, column, newValue: random() < 0.5, dataType }
    case 'timestamp':
      return { row, column, newValue: now(), dataType }
  }
}

/**
 * Builds a CELL_UPDATE batch holding exactly `count` random changes.
 *
 * Nothing is read besides the injected random source and clock, so two calls
 * with the same inputs return equal batches.
 */
export function synthesize (count: number, options: SynthesizeOptions = {}): UpdateBatch {
  if (!Number.isInteger(count) || count < 1) {
    throw new UserError(`The number of changes must be a positive integer, received ${count}.`, { count })
  }

  const random = options.random ?? Math.random
  const now = options.now ?? Date.now

  const changes: Change[] = []
  for (let i = 0; i < count; i++) {
    changes.push(synthesizeChange({ ...options, random, now }))
  }

  const timestamp = now()

  return {
    batchId: `batch_${timestamp}_${randomInteger(random, 1000, 9999)}`,
    gridId: options.gridId ?? defaultGridId,
    eventType: CELL_UPDATE,
    changes,
    timestamp
  }
}
