import { type Change, type UpdateBatch } from './model.ts'

export interface BatchSummary {
  message: string
  batchId: string
  gridId: string
  changes: string
  timestamp: string
}

export function formatChange ({ row, column, newValue }: Change): string {
  return `(${row}, ${column}, ${JSON.stringify(newValue)})`
}

export function formatChanges (changes: Change[]): string {
  return changes.map(formatChange).join(', ')
}

// sequence is the 1-based position of the batch in the current run
export function describeBatch (batch: UpdateBatch, sequence: number): BatchSummary {
  const count = batch.changes.length

  return {
    message: `Sent batch #${sequence}: ${count} cell ${count === 1 ? 'update' : 'updates'}`,
    batchId: batch.batchId,
    gridId: batch.gridId,
    changes: formatChanges(batch.changes),
    timestamp: new Date(batch.timestamp).toISOString()
  }
}
