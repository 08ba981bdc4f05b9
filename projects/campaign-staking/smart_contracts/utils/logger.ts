import pino, { type LevelWithSilent, type Logger } from 'pino'
import { getLogLevelFromEnvironment } from './config'

let baseLogger: Logger | undefined

function getBaseLogger(): Logger {
  if (!baseLogger) {
    baseLogger = pino({
      level: getLogLevelFromEnvironment(),
      formatters: {
        level: (label: string) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    })
  }
  return baseLogger
}

/**
 * Structured logger bound to one service/component name.
 */
export function createLogger(service: string, level?: LevelWithSilent): Logger {
  const logger = getBaseLogger().child({ service })
  if (level) {
    logger.level = level
  }
  return logger
}
