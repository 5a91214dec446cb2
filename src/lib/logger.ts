/**
 * Structured JSON logger for the CLI and the scheduler. Single format: level, timestamp, service, env, release, jobId.
 * Redacts known sensitive keys. Use LOG_LEVEL=debug only when needed (off by default).
 */
import pino from 'pino'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || 'info'

/** Keys (and nested paths) to redact from log output. */
const REDACT_PATHS = ['token', 'apiKey', 'authorization', 'SENTRY_DSN', '*.SENTRY_DSN']

export type ServiceName = 'cli' | 'scheduler'

function createBaseLogger(service: ServiceName): pino.Logger {
  return pino({
    level,
    base: { service, env, release },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

const loggers = new Map<ServiceName, pino.Logger>()

export function getLogger(service: ServiceName): pino.Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = createBaseLogger(service)
    loggers.set(service, logger)
  }
  return logger
}

/** Child logger carrying the jobId (for per-job execution context). */
export function withJobContext(jobId: string): pino.Logger {
  return getLogger('scheduler').child({ jobId })
}

/** Redact a string for safe logging (e.g. file paths: keep basename only). */
export function redactFilePath(path: string): string {
  if (!path) return '[REDACTED]'
  const parts = path.replace(/\\/g, '/').split('/')
  return parts[parts.length - 1] || '[REDACTED]'
}
