import pino, { type Logger, type LoggerOptions } from 'pino'

const REDACTED_PATHS = ['apiKey', 'personalApiKey', 'projectApiKey', 'authorization', '*.apiKey', '*.personalApiKey', '*.authorization']

export interface CreateLoggerOptions {
  name: string
  level?: string
}

/** Creates a JSON logger with credentials redacted. */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'warn' } = options

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  }

  return pino(loggerOptions)
}

// Used by components that were not handed a logger
export const logger = createLogger({ name: 'flagline' })

export type { Logger }
