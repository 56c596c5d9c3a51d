import { UserError } from './errors.ts'
import { UPDATE_BATCH_SCHEMA, type UpdateBatch } from './model.ts'

// Limits enforced by the grid view server when it consumes the topic.
export const MAX_CHANGES_PER_BATCH = 500
export const MAX_BATCH_BYTES = 100_000

export function encodeBatch (batch: UpdateBatch): string {
  return JSON.stringify({
    batchId: batch.batchId,
    gridId: batch.gridId,
    eventType: batch.eventType,
    changes: batch.changes.map(({ row, column, newValue, dataType }) => ({ row, column, newValue, dataType })),
    timestamp: batch.timestamp
  })
}

export function decodeBatch (payload: string | Buffer): UpdateBatch {
  let parsed: unknown

  try {
    parsed = JSON.parse(typeof payload === 'string' ? payload : payload.toString('utf-8'))
  } catch (error) {
    throw new UserError('Update batch payload is not valid JSON.', { cause: error })
  }

  const result = UPDATE_BATCH_SCHEMA.safeParse(parsed)

  if (!result.success) {
    throw new UserError(`Invalid update batch: ${result.error.message}`, { issues: result.error.issues })
  }

  return result.data
}

export function validateBatchSize (batch: UpdateBatch, encoded: string = encodeBatch(batch)): number {
  if (batch.changes.length > MAX_CHANGES_PER_BATCH) {
    throw new UserError(
      `Batch ${batch.batchId} has ${batch.changes.length} changes, the limit is ${MAX_CHANGES_PER_BATCH}.`,
      { batchId: batch.batchId, changes: batch.changes.length }
    )
  }

  const size = Buffer.byteLength(encoded, 'utf-8')

  if (size >= MAX_BATCH_BYTES) {
    throw new UserError(`Batch ${batch.batchId} is ${size} bytes, it must be smaller than ${MAX_BATCH_BYTES}.`, {
      batchId: batch.batchId,
      size
    })
  }

  return size
}
