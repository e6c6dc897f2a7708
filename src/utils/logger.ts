/**
 * Structured logging on pino.
 *
 * Every module takes a named logger from createLogger(). Output is JSON
 * unless pretty printing is on (development and test runs), in which case
 * lines go through the pino-pretty transport.
 */

import pino from 'pino'

/**
 * Paths scrubbed from every log line. Checkpoint payloads and generated
 * artifact bodies can be large, so only their metadata is logged.
 */
export const REDACT_PATHS: string[] = ['state', 'artifacts[*].content', '*.state', '*.content']

export interface LoggerOptions {
  /** Pins the level; such loggers ignore setLogLevel() */
  level?: string
  /** Overrides the `name` field (default: the logger's name argument) */
  name?: string
  pretty?: boolean
}

const LEVEL_BY_NODE_ENV: Record<string, string> = {
  production: 'info',
  development: 'debug',
  test: 'debug',
}

function resolveLevel(env: NodeJS.ProcessEnv): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL
  // CLI use leaves NODE_ENV unset
  return LEVEL_BY_NODE_ENV[env.NODE_ENV ?? ''] ?? 'warn'
}

function resolvePretty(env: NodeJS.ProcessEnv): boolean {
  if (env.LOG_PRETTY !== undefined) return env.LOG_PRETTY === 'true'
  return env.NODE_ENV === 'development' || env.NODE_ENV === 'test'
}

const PRETTY_TRANSPORT: pino.TransportSingleOptions = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
}

const adjustable = new Set<pino.Logger>()

export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const instance = pino({
    name: options.name ?? name,
    level: options.level ?? resolveLevel(process.env),
    redact: REDACT_PATHS,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
    ...((options.pretty ?? resolvePretty(process.env)) && { transport: PRETTY_TRANSPORT }),
  })
  if (options.level === undefined) adjustable.add(instance)
  return instance
}

/** Apply a configured level to every logger that did not pin its own */
export function setLogLevel(level: string): void {
  for (const instance of adjustable) {
    instance.level = level
  }
}

export const logger = createLogger('blocksmith')

export function childLogger(parent: pino.Logger, bindings: Record<string, unknown>): pino.Logger {
  return parent.child(bindings)
}
