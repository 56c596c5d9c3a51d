import { z } from 'zod/v4'

export const CELL_UPDATE = 'CELL_UPDATE' as const

export const dataTypes = ['string', 'number', 'integer', 'boolean', 'timestamp'] as const
export type DataType = (typeof dataTypes)[number]

const cellPosition = {
  row: z.number().int().min(0),
  column: z.number().int().min(0)
}

// Every variant pairs a dataType tag with the only newValue shape it may carry.
export const CHANGE_SCHEMA = z.discriminatedUnion('dataType', [
  z.object({ ...cellPosition, newValue: z.string(), dataType: z.literal('string') }),
  z.object({ ...cellPosition, newValue: z.number(), dataType: z.literal('number') }),
  z.object({ ...cellPosition, newValue: z.number().int(), dataType: z.literal('integer') }),
  z.object({ ...cellPosition, newValue: z.boolean(), dataType: z.literal('boolean') }),
  z.object({ ...cellPosition, newValue: z.number().int().min(0), dataType: z.literal('timestamp') })
])
export type Change = z.output<typeof CHANGE_SCHEMA>

export const UPDATE_BATCH_SCHEMA = z.object({
  batchId: z.string().min(1),
  gridId: z.string().min(1),
  eventType: z.literal(CELL_UPDATE),
  changes: z.array(CHANGE_SCHEMA),
  timestamp: z.number().int().min(0)
})
export type UpdateBatch = z.output<typeof UPDATE_BATCH_SCHEMA>
