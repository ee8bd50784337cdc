import { createLogger, transports, format } from 'winston'
import type { Logger } from 'winston'
import Transport from 'winston-transport'
import DailyRotateFile from 'winston-daily-rotate-file'
import moment from 'moment-timezone'
import fs from 'fs-extra'
import path from 'path'

const { combine, timestamp, printf, colorize } = format

const DEFAULT_LABEL = 'dockrun'
const MESSAGE = Symbol.for('message')

const validLogLevels = [
  'error',
  'warn',
  'info',
  'http',
  'verbose',
  'debug',
  'silly'
]

const logFormat = printf(({ level, message, label, timestamp }) => {
  return `${timestamp} - ${level}: [${label ?? DEFAULT_LABEL}] ${message}`
})

export interface RunLoggerOptions {
  logDir: string
  logLevel: string
  logTimezone: string
  console?: boolean
  errorLog?: boolean
}

export interface RunLogger {
  logger: Logger
  logFile: string
  close: () => Promise<void>
}

/**
 * Appends every formatted line to the run log synchronously, so the file is
 * complete at whatever point the process stops.
 */
class RunLogFile extends Transport {
  constructor(
    readonly filename: string,
    opts?: Transport.TransportStreamOptions
  ) {
    super(opts)
    fs.ensureFileSync(filename)
  }

  log(info: Record<string | symbol, unknown>, next: () => void) {
    const line = info[MESSAGE]
    if (typeof line === 'string') {
      fs.appendFileSync(this.filename, `${line}\n`)
    }
    this.emit('logged', info)
    next()
  }
}

const runLogFileName = (startedAt: Date, timezone: string) =>
  `pipeline_${moment(startedAt).tz(timezone).format('YYYY-MM-DD_HHmmss')}.log`

const resolveLogLevel = (requested: string) => {
  if (validLogLevels.includes(requested)) return requested
  console.warn(`Invalid LOG_LEVEL "${requested}", defaulting to "info"`)
  return 'info'
}

const createRunLogger = (
  options: RunLoggerOptions,
  startedAt: Date = new Date()
): RunLogger => {
  const { logDir, logTimezone } = options
  const logLevel = resolveLogLevel(options.logLevel)
  const logFile = path.join(logDir, runLogFileName(startedAt, logTimezone))

  const customTimestamp = () =>
    moment().tz(logTimezone).format('YYYY-MM-DD HH:mm:ss')

  const loggerTransports: Transport[] = [
    new RunLogFile(logFile, { level: logLevel })
  ]
  if (options.errorLog ?? true) {
    loggerTransports.push(
      new DailyRotateFile({
        level: 'error',
        filename: path.join(logDir, 'dockrun-error-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '10m',
        maxFiles: '30d'
      })
    )
  }
  if (options.console ?? true) {
    loggerTransports.push(
      new transports.Console({
        level: logLevel,
        format: combine(colorize(), logFormat)
      })
    )
  }

  const logger = createLogger({
    level: logLevel,
    format: combine(timestamp({ format: customTimestamp }), logFormat),
    transports: loggerTransports
  })

  let closing: Promise<void> | undefined
  const close = () => {
    closing ??= new Promise<void>((resolve) => {
      logger.once('finish', () => resolve())
      logger.end()
    })
    return closing
  }

  return { logger, logFile, close }
}

/** Console-only logger for the single-purpose commands. */
const createConsoleLogger = (logLevel: string, logTimezone: string): Logger =>
  createLogger({
    level: resolveLogLevel(logLevel),
    format: combine(
      timestamp({
        format: () => moment().tz(logTimezone).format('YYYY-MM-DD HH:mm:ss')
      }),
      logFormat
    ),
    transports: [new transports.Console({ format: combine(colorize(), logFormat) })]
  })

export { createRunLogger, createConsoleLogger, runLogFileName, validLogLevels }
