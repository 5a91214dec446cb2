import type { ConversionParams } from './ConversionParams'

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled' | 'skipped'

export const JOB_STATUSES: readonly JobStatus[] = ['queued', 'running', 'completed', 'failed', 'cancelled', 'skipped']

const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(['completed', 'failed', 'cancelled', 'skipped'])

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status)
}

/** Lifecycle notifications a job can emit, each at most once. */
export type LifecycleEvent = 'started' | 'completed' | 'failed' | 'cancelled' | 'skipped'

export type JobErrorCode =
  | 'TRANSCODER_EXIT'
  | 'OUTPUT_MISSING'
  | 'OUTPUT_DIR_ERROR'
  | 'LAUNCH_ERROR'
  | 'STALLED'
  | 'UNKNOWN_ERROR'

export interface JobResult {
  success: boolean
  message: string
  outputPath?: string
  errorCode?: JobErrorCode
  exitCode?: number
  duration: number // seconds
}

/** Read-only copy handed to callers; mutating it never touches the registry. */
export interface JobSnapshot {
  id: string
  inputPath: string
  outputPath: string
  params: ConversionParams
  status: JobStatus
  progress: number
  result?: JobResult
  startedAt?: Date
  completedAt?: Date
  error?: string
  durationSeconds: number
  etaSeconds?: number
}

export interface JobInit {
  id: string
  inputPath: string
  outputPath: string
  params: ConversionParams
}

/**
 * One conversion request and its state machine.
 * Transition methods are compare-and-set: they return false (and change nothing) when the
 * job is not in a state the transition starts from.
 */
export class ConversionJob {
  readonly id: string
  readonly inputPath: string
  readonly outputPath: string
  readonly params: ConversionParams

  private _status: JobStatus = 'queued'
  private _progress = 0
  private _result?: JobResult
  private _startedAt?: Date
  private _completedAt?: Date
  private _error?: string
  private readonly emitted = new Set<LifecycleEvent>()

  constructor(init: JobInit) {
    this.id = init.id
    this.inputPath = init.inputPath
    this.outputPath = init.outputPath
    this.params = init.params
  }

  /** A job registered directly in the terminal SKIPPED state. */
  static skipped(init: JobInit, reason: string, now: Date = new Date()): ConversionJob {
    const job = new ConversionJob(init)
    job._status = 'skipped'
    job._error = reason
    job._completedAt = now
    return job
  }

  get status(): JobStatus {
    return this._status
  }

  get progress(): number {
    return this._progress
  }

  get result(): JobResult | undefined {
    return this._result
  }

  get startedAt(): Date | undefined {
    return this._startedAt
  }

  get completedAt(): Date | undefined {
    return this._completedAt
  }

  get error(): string | undefined {
    return this._error
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this._status)
  }

  /** QUEUED → RUNNING */
  start(now: Date = new Date()): boolean {
    if (this._status !== 'queued') return false
    this._status = 'running'
    this._startedAt = now
    return true
  }

  /** Ratchet: only RUNNING jobs move, and only forward. */
  updateProgress(fraction: number): boolean {
    if (this._status !== 'running' || !Number.isFinite(fraction)) return false
    const clamped = Math.min(1, Math.max(0, fraction))
    if (clamped <= this._progress) return false
    this._progress = clamped
    return true
  }

  /** RUNNING → COMPLETED or FAILED, decided by result.success. */
  finish(result: JobResult, now: Date = new Date()): boolean {
    if (this._status !== 'running') return false
    this._status = result.success ? 'completed' : 'failed'
    this._result = result
    this._completedAt = now
    if (result.success) {
      this._progress = 1
    } else {
      this._error = result.message
    }
    return true
  }

  /** QUEUED or RUNNING → CANCELLED */
  cancel(now: Date = new Date()): boolean {
    if (this._status !== 'queued' && this._status !== 'running') return false
    this._status = 'cancelled'
    this._completedAt = now
    return true
  }

  /** True the first time a given lifecycle event is claimed for this job. */
  markEmitted(event: LifecycleEvent): boolean {
    if (this.emitted.has(event)) return false
    this.emitted.add(event)
    return true
  }

  durationSeconds(now: Date = new Date()): number {
    if (!this._startedAt) return 0
    const end = this._completedAt ?? now
    return Math.max(0, (end.getTime() - this._startedAt.getTime()) / 1000)
  }

  etaSeconds(now: Date = new Date()): number | undefined {
    if (this._status !== 'running' || this._progress <= 0) return undefined
    const elapsed = this.durationSeconds(now)
    if (elapsed <= 0) return undefined
    return Math.max(0, elapsed / this._progress - elapsed)
  }

  snapshot(now: Date = new Date()): JobSnapshot {
    return {
      id: this.id,
      inputPath: this.inputPath,
      outputPath: this.outputPath,
      params: this.params,
      status: this._status,
      progress: this._progress,
      result: this._result ? { ...this._result } : undefined,
      startedAt: this._startedAt ? new Date(this._startedAt.getTime()) : undefined,
      completedAt: this._completedAt ? new Date(this._completedAt.getTime()) : undefined,
      error: this._error,
      durationSeconds: this.durationSeconds(now),
      etaSeconds: this.etaSeconds(now),
    }
  }
}
