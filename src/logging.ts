import { type Logger, pino } from 'pino'

export const loggersNamespace = 'grid-loadgen'

export function setDebugLoggers (debug: string | undefined): void {
  enabledDebugLoggers = []

  for (let pattern of (debug ?? '').split(',')) {
    pattern = pattern.trim()

    if (pattern.length) {
      enabledDebugLoggers.push(new RegExp(`^${pattern.replaceAll('*', '.*')}$`))
    }
  }

  loggers = {
    config: createDebugLogger(`${loggersNamespace}:config`),
    publisher: createDebugLogger(`${loggersNamespace}:publisher`),
    generator: createDebugLogger(`${loggersNamespace}:generator`)
  }
}

export function setLogger (level: string | undefined): void {
  logger = pino({
    level: level ?? 'info',
    transport: {
      target: 'pino-pretty'
    }
  })
}

export function createDebugLogger (name: string | undefined): Logger | null {
  const loggerName = name ?? ''

  if (!enabledDebugLoggers.some(r => r.test(loggerName))) {
    return null
  }

  return logger.child({ name: loggerName })
}

// These two methods are defined via functions to ensure testability
export let logger: Logger
export let enabledDebugLoggers: RegExp[]
export let loggers: Record<'config' | 'publisher' | 'generator', Logger | null>

setLogger(process.env.LOG_LEVEL)
setDebugLoggers(process.env.NODE_DEBUG ?? '')
