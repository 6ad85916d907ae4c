import winston from 'winston'
import { z } from 'zod'

export type Logger = winston.Logger

export const levels = ['error', 'warn', 'info', 'verbose', 'debug'] as const
export type Level = (typeof levels)[number]

export const loggerSchema = z
  .object({
    Level: z.enum(levels).default('info'),
    Colorize: z.boolean().default(true)
  })
  .default({})

export type LoggerConfig = z.input<typeof loggerSchema>

let logger: Logger | undefined

function loggerOptions(config: LoggerConfig): winston.LoggerOptions {
  const { Level, Colorize } = loggerSchema.parse(config)
  const timestampFormat = 'HH:mm:ss.SSS'
  const formats = [
    winston.format.timestamp({
      format: timestampFormat
    }),
    winston.format.splat(),
    winston.format.printf((info) => `[${info.timestamp} ${info.level}]: ${info.message}`)
  ]
  if (Colorize) formats.unshift(winston.format.colorize())
  return {
    level: Level,
    format: winston.format.combine(...formats),
    transports: new winston.transports.Console({
      stderrLevels: [...levels]
    })
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  return winston.createLogger(loggerOptions(config))
}

export function isLevel(level: string): level is Level {
  return levels.some((l) => l === level)
}

export function getLogger(level: Level = 'info'): Logger {
  if (logger) return logger
  logger = createLogger({ Level: level })
  return logger
}

/** Reconfigure the process logger in place, so module level references pick up the change */
export function configureLogger(config: LoggerConfig): Logger {
  const log = getLogger()
  log.configure(loggerOptions(config))
  return log
}

export function getTestingLogger(): Logger {
  const env = process.env.TEST_LOG_LEVEL ?? 'error'
  const level = isLevel(env) ? env : 'error'
  return getLogger(level)
}
