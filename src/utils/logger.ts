/**
 * Structured logging on pino.
 *
 * Level precedence for loggers created without an explicit level:
 *   LOG_LEVEL env var > configured `global.log_level` > NODE_ENV default
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

export type LogLevel = pino.LevelWithSilent

export interface LoggerOptions {
  level?: LogLevel
  pretty?: boolean
  /** Write JSON lines here instead of stdout */
  destination?: pino.DestinationStream
}

const LOG_LEVELS: readonly string[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value)
}

/** Loggers that follow the process-wide level */
const followers = new Set<pino.Logger>()
let configuredLevel: LogLevel | undefined

function resolveLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL
  if (fromEnv !== undefined && isLogLevel(fromEnv)) return fromEnv
  if (configuredLevel !== undefined) return configuredLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'development') return 'debug'
  // Plain CLI use: stay quiet so transcripts are not interleaved with log lines
  return 'warn'
}

function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; only opt in when explicitly developing
  return process.env.NODE_ENV === 'development'
}

/**
 * Create a named logger. Without `options.level` the logger follows
 * {@link setConfiguredLogLevel}.
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    name,
    level: options.level ?? resolveLevel(),
    redact: PINO_REDACT_PATHS,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
  }

  let instance: pino.Logger
  if (options.destination !== undefined) {
    instance = pino(baseOptions, options.destination)
  } else if (options.pretty ?? isPrettyMode()) {
    instance = pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
      },
    })
  } else {
    instance = pino(baseOptions)
  }

  if (options.level === undefined) followers.add(instance)
  return instance
}

/**
 * Apply `global.log_level` from the loaded configuration to every logger
 * created without an explicit level. LOG_LEVEL still takes precedence.
 */
export function setConfiguredLogLevel(level: LogLevel): void {
  configuredLevel = level
  const effective = resolveLevel()
  for (const instance of followers) instance.level = effective
}

/** Root application logger */
export const logger = createLogger('verdict')

export function childLogger(parent: pino.Logger, bindings: Record<string, unknown>): pino.Logger {
  return parent.child(bindings)
}
