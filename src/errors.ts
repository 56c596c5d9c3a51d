const kGenericError = Symbol('grid.loadgen.genericError')
const kMultipleErrors = Symbol('grid.loadgen.multipleErrors')

export const ERROR_PREFIX = 'GRID_LOADGEN_'

export const errorCodes = [`${ERROR_PREFIX}CONNECTION`, `${ERROR_PREFIX}SEND`, `${ERROR_PREFIX}USER`] as const

export type ErrorCode = (typeof errorCodes)[number]

export type ErrorProperties = { cause?: unknown } & Record<string, unknown>

function defineProperties (target: Error, properties: Record<string, unknown>): void {
  Reflect.defineProperty(target, 'message', { enumerable: true })
  Reflect.defineProperty(target, 'code', { enumerable: true })

  if ('stack' in target) {
    Reflect.defineProperty(target, 'stack', { enumerable: true })
  }

  for (const [key, value] of Object.entries(properties)) {
    Reflect.defineProperty(target, key, { value, enumerable: true })
  }

  Reflect.defineProperty(target, kGenericError, { value: true, enumerable: false })
}

export class GenericError extends Error {
  code: string;
  [index: string]: unknown
  [kGenericError]: true

  static isGenericError (error: unknown): error is GenericError | MultipleErrors {
    return error instanceof Error && kGenericError in error && error[kGenericError] === true
  }

  constructor (code: ErrorCode, message: string, { cause, ...rest }: ErrorProperties = {}) {
    super(message, cause !== undefined ? { cause } : {})
    this.code = code
    this[kGenericError] = true

    defineProperties(this, rest)
  }

  findBy (property: string, value: unknown): GenericError | MultipleErrors | null {
    return this[property] === value ? this : null
  }
}

export class MultipleErrors extends AggregateError {
  code: string;
  [index: string]: unknown
  [kGenericError]: true;
  [kMultipleErrors]: true

  static isMultipleErrors (error: unknown): error is MultipleErrors {
    return error instanceof AggregateError && kMultipleErrors in error && error[kMultipleErrors] === true
  }

  constructor (code: ErrorCode, message: string, errors: Error[], { cause, ...rest }: ErrorProperties = {}) {
    super(errors, message, cause !== undefined ? { cause } : {})
    this.code = code
    this[kGenericError] = true
    this[kMultipleErrors] = true

    defineProperties(this, rest)
    Reflect.defineProperty(this, kMultipleErrors, { value: true, enumerable: false })
  }

  findBy (property: string, value: unknown): GenericError | MultipleErrors | null {
    if (this[property] === value) {
      return this
    }

    const errors: Error[] = this.errors

    for (const error of errors) {
      if (!GenericError.isGenericError(error)) {
        continue
      }

      const found = error.findBy(property, value)

      if (found) {
        return found
      }
    }

    return null
  }
}

export class ConnectionError extends GenericError {
  static code: ErrorCode = 'GRID_LOADGEN_CONNECTION'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(ConnectionError.code, message, { canRetry: false, ...properties })
  }
}

export class SendError extends MultipleErrors {
  static code: ErrorCode = 'GRID_LOADGEN_SEND'

  constructor (message: string, errors: Error[], properties: ErrorProperties = {}) {
    super(SendError.code, message, errors, { attempts: errors.length, ...properties })
  }
}

export class UserError extends GenericError {
  static code: ErrorCode = 'GRID_LOADGEN_USER'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(UserError.code, message, { canRetry: false, ...properties })
  }
}
