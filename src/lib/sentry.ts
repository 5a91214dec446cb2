/**
 * Sentry for the scheduler: unexpected job and worker faults. Enabled only when SENTRY_DSN is set.
 * Env: SENTRY_DSN, SENTRY_ENV (default NODE_ENV or development), RELEASE.
 */
import * as Sentry from '@sentry/node'
import { getLogger } from './logger'

const DSN = process.env.SENTRY_DSN
const ENV = process.env.SENTRY_ENV || process.env.NODE_ENV || 'development'
const RELEASE = process.env.RELEASE || undefined

let initialized = false

export function initSentry(): void {
  if (!DSN?.trim() || initialized) return
  try {
    Sentry.init({
      dsn: DSN,
      environment: ENV,
      release: RELEASE,
      tracesSampleRate: 0,
    })
    initialized = true
  } catch (err) {
    getLogger('scheduler').warn({ msg: 'Sentry init failed', err })
  }
}

/** Capture an unexpected fault inside one job's execution, tagged with jobId and stage. */
export function captureJobError(jobId: string, stage: string, err: unknown): void {
  if (!initialized) return
  Sentry.withScope((scope) => {
    scope.setTag('service', 'scheduler')
    scope.setTag('job_id', jobId)
    scope.setTag('job_stage', stage)
    Sentry.captureException(err)
  })
}

/** Capture a worker-level fault (transcoder unavailable, control loop crash). */
export function captureWorkerError(err: unknown): void {
  if (!initialized) return
  Sentry.withScope((scope) => {
    scope.setTag('service', 'scheduler')
    Sentry.captureException(err)
  })
}
