import path from 'path'
import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import type { LoggingConfig } from '../config'

export type Logger = winston.Logger

export function createLogger(options: Omit<LoggingConfig, 'requestBodies'>, service = 'waybill-api'): Logger {
  const logger = winston.createLogger({
    level: options.level,
    silent: options.silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service },
  })

  if (options.dir) {
    // DailyRotateFile creates the directory on first write
    logger.add(new DailyRotateFile({
      filename: path.join(options.dir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '14d'
    }))
    logger.add(new DailyRotateFile({
      filename: path.join(options.dir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d'
    }))
  }

  if (options.console || !options.dir) {
    logger.add(new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    }))
  }

  return logger
}

export function createSilentLogger(): Logger {
  return createLogger({ level: 'error', console: true, silent: true })
}
