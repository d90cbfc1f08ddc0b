/**
 * Logger utility for issue-autofix
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

/** Every logger created so far, so a CLI flag can retune them after import */
const _loggers = new Set<pino.Logger>()

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'development') return 'debug'
  if (process.env.NODE_ENV === 'test') return 'silent'
  // CLI use: progress goes to stdout through the reporter, keep pino quiet
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  return process.env.NODE_ENV === 'development'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  let instance: pino.Logger
  if (pretty) {
    // pino-pretty is a devDependency; only used outside production
    instance = pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    })
  } else {
    // stderr: stdout carries progress lines and NDJSON output
    instance = pino(baseOptions, pino.destination(2))
  }

  _loggers.add(instance)
  return instance
}

/**
 * Apply a log level to every logger created so far and to those created later.
 */
export function setLogLevel(level: string): void {
  process.env.LOG_LEVEL = level
  for (const instance of _loggers) {
    instance.level = level
  }
}

/** Root application logger */
export const logger = createLogger('autofix')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
