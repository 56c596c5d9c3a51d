import { type ValidateFunction } from 'ajv'
import { Ajv2020 } from 'ajv/dist/2020.js'

export interface EnumerationDefinition<T> {
  allowed: T[]
  errorMessage?: string
}

export type KeywordSchema<T> = { schema: T }

// See: ajv/dist/types/index.d.ts
export interface DataValidationContext {
  parentData: Record<string | number, unknown>
}

export { setTimeout as sleep } from 'node:timers/promises'

export const ajv = new Ajv2020({ allErrors: true, coerceTypes: false, strict: true })

ajv.addKeyword({
  keyword: 'gteProperty',
  validate (property: string, current: unknown, _: unknown, context?: DataValidationContext) {
    const other = context?.parentData[property]
    return typeof current !== 'number' || typeof other !== 'number' || current >= other
  },
  error: {
    message ({ schema }: KeywordSchema<string>): string {
      return `must be greater than or equal to $dataVar$/${schema}`
    }
  }
})

ajv.addKeyword({
  keyword: 'enumeration', // This mimics the enum keyword but defines a custom error message
  validate (property: EnumerationDefinition<string | number>, current: string | number) {
    return property.allowed.includes(current)
  },
  error: {
    message ({ schema }: KeywordSchema<EnumerationDefinition<string>>): string {
      return schema.errorMessage ?? 'must be one of the allowed values'
    }
  }
})

export function niceJoin (array: string[], lastSeparator: string = ' and ', separator: string = ', '): string {
  switch (array.length) {
    case 0:
      return ''
    case 1:
      return array[0]
    case 2:
      return array.join(lastSeparator)
    default:
      return array.slice(0, -1).join(separator) + lastSeparator + array[array.length - 1]
  }
}

export function listErrorMessage (type: readonly string[]): string {
  return `should be one of ${niceJoin([...type], ' or ')}`
}

export function enumErrorMessage (type: Record<string, unknown>): string {
  return `should be one of ${niceJoin(
    Object.entries(type).map(([k, v]) => `${v} (${k})`),
    ' or '
  )}`
}

export function formatValidationErrors (validator: ValidateFunction<unknown>, targetName: string): string {
  return ajv.errorsText(validator.errors, { dataVar: '$dataVar$' }).replaceAll('$dataVar$', targetName) + '.'
}

export function toError (value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
