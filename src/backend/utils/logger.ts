import pino from 'pino'
import type { BudgetStage, LogLevel } from '../types'

const createLogger = (level: LogLevel) =>
  pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  })

let pinoLogger = createLogger('info')

export const logger = {
  setLevel(level: LogLevel): void {
    pinoLogger = createLogger(level)
  },

  debug(message: string, ...args: unknown[]): void {
    pinoLogger.debug({ args: args.length > 0 ? args : undefined }, message)
  },

  warn(message: string, ...args: unknown[]): void {
    pinoLogger.warn({ args: args.length > 0 ? args : undefined }, message)
  },

  stage(stage: BudgetStage, message: string): void {
    pinoLogger.info({ stage }, message)
  },
}
