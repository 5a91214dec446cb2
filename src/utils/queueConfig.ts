/**
 * Scheduler limits and timings. Read from env (see .env.example), overridable per instance.
 */
import { z } from 'zod'
import { OVERWRITE_POLICIES } from './outputPath'
import type { OverwritePolicy } from './outputPath'

export const DEFAULT_MAX_CONCURRENT_JOBS = 4
export const DEFAULT_POLL_INTERVAL_MS = 100
/** Kill a transcode if it prints nothing for 90s. */
export const DEFAULT_STALL_TIMEOUT_MS = 90 * 1000
export const DEFAULT_STOP_TIMEOUT_MS = 30 * 1000
/** Diagnostic lines kept for a failed job's message. */
export const STDERR_TAIL_LINES = 10

export interface SchedulerConfig {
  maxConcurrentJobs: number
  pollIntervalMs: number
  overwritePolicy: OverwritePolicy
  retryAttempts: number
  retryBackoffBaseMs: number
  stallTimeoutMs: number
  stopTimeoutMs: number
  transcoderPath?: string
  probePath?: string
}

const optionalPath = z
  .string()
  .trim()
  .transform((value) => value || undefined)
  .optional()

const envSchema = z.object({
  MAX_CONCURRENT_JOBS: z.coerce.number().int().min(1).max(64).default(DEFAULT_MAX_CONCURRENT_JOBS),
  POLL_INTERVAL_MS: z.coerce.number().int().min(1).default(DEFAULT_POLL_INTERVAL_MS),
  OVERWRITE_POLICY: z.enum(OVERWRITE_POLICIES).default('unique'),
  RETRY_ATTEMPTS: z.coerce.number().int().min(0).max(10).default(0),
  RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(2000),
  STALL_TIMEOUT_MS: z.coerce.number().int().min(0).default(DEFAULT_STALL_TIMEOUT_MS),
  STOP_TIMEOUT_MS: z.coerce.number().int().min(0).default(DEFAULT_STOP_TIMEOUT_MS),
  FFMPEG_PATH: optionalPath,
  FFPROBE_PATH: optionalPath,
})

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid scheduler configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}

/**
 * Build the scheduler configuration from environment variables, then apply explicit overrides.
 * Empty strings count as unset.
 * @throws ConfigError listing every invalid variable
 */
export function loadSchedulerConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<SchedulerConfig> = {}
): SchedulerConfig {
  const raw: Record<string, string> = {}
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]
    if (value !== undefined && value.trim() !== '') raw[key] = value
  }

  const parsed = envSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }

  const e = parsed.data
  const config: SchedulerConfig = {
    maxConcurrentJobs: e.MAX_CONCURRENT_JOBS,
    pollIntervalMs: e.POLL_INTERVAL_MS,
    overwritePolicy: e.OVERWRITE_POLICY,
    retryAttempts: e.RETRY_ATTEMPTS,
    retryBackoffBaseMs: e.RETRY_BACKOFF_MS,
    stallTimeoutMs: e.STALL_TIMEOUT_MS,
    stopTimeoutMs: e.STOP_TIMEOUT_MS,
    transcoderPath: e.FFMPEG_PATH,
    probePath: e.FFPROBE_PATH,
  }
  const merged = { ...config, ...withoutUndefined(overrides) }
  const issues: string[] = []
  if (!Number.isInteger(merged.maxConcurrentJobs) || merged.maxConcurrentJobs < 1) {
    issues.push('maxConcurrentJobs: must be a positive integer')
  }
  if (!(merged.pollIntervalMs > 0)) issues.push('pollIntervalMs: must be positive')
  if (issues.length > 0) throw new ConfigError(issues)
  return merged
}

function withoutUndefined(overrides: Partial<SchedulerConfig>): Partial<SchedulerConfig> {
  const out: Partial<SchedulerConfig> = {}
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(out, { [key]: value })
  }
  return out
}
