import fs from 'fs'
import path from 'path'
import { setTimeout as sleep } from 'timers/promises'
import { v4 as uuidv4 } from 'uuid'
import { getLogger, redactFilePath } from '../lib/logger'
import { captureWorkerError } from '../lib/sentry'
import { parseConversionParams } from '../models/ConversionParams'
import type { ConversionParamsInput } from '../models/ConversionParams'
import { ConversionJob } from '../models/Job'
import type { JobResult, JobSnapshot } from '../models/Job'
import { resolveProbePath, resolveTranscoderPath, verifyTranscoder } from '../services/ffmpeg'
import { resolveOutputPath } from '../utils/outputPath'
import { sanitizeFilename } from '../utils/sanitizeFilename'
import { loadSchedulerConfig } from '../utils/queueConfig'
import type { SchedulerConfig } from '../utils/queueConfig'
import { ConversionExecutor } from './executor'
import type { ExecutionHandle, JobExecutor } from './executor'
import { SchedulerEvents } from './events'
import type { QueueStats, SchedulerEventName, SchedulerListener } from './events'

export interface SchedulerOptions {
  /** Applied over the values read from `env`. */
  config?: Partial<SchedulerConfig>
  env?: NodeJS.ProcessEnv
  executor?: JobExecutor
  /** Transcoder availability check run before the first admission; rejects when unusable. */
  verifyTranscoder?: () => Promise<unknown>
}

type ExecutionOutcome = { kind: 'result'; result: JobResult } | { kind: 'error'; error: unknown }

interface InFlight {
  handle: ExecutionHandle
  outcome?: ExecutionOutcome
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Bounded worker pool for conversion jobs.
 *
 * Owns the job registry and a FIFO admission queue. A control loop (poll interval, plus a wake-up
 * whenever a job is queued or an execution settles) reaps finished executions, admits queued jobs
 * while fewer than `maxConcurrentJobs` are in flight, and announces when a batch of work drains.
 * Registry mutations are synchronous, so callers never wait on I/O.
 */
export class ConversionScheduler {
  readonly config: SchedulerConfig

  private readonly log = getLogger('scheduler')
  private readonly events = new SchedulerEvents(this.log)
  private readonly executor: JobExecutor
  private readonly verify: () => Promise<unknown>

  private readonly jobs = new Map<string, ConversionJob>()
  private readonly pending: string[] = []
  private readonly inFlight = new Map<string, InFlight>()

  private timer?: NodeJS.Timeout
  private running = false
  private paused = false
  private wakeScheduled = false
  private transcoderReady = false
  /** Sticky: set once the drained summary has been handled, reset when new work is queued. */
  private drainSignaled = false
  /** Jobs that reached COMPLETED/FAILED/CANCELLED since the last reset of drainSignaled. */
  private settledSinceReset = 0

  constructor(options: SchedulerOptions = {}) {
    this.config = loadSchedulerConfig(options.env ?? process.env, options.config)
    this.executor =
      options.executor ??
      new ConversionExecutor({
        transcoderPath: resolveTranscoderPath(this.config.transcoderPath),
        probePath: resolveProbePath(this.config.probePath),
        stallTimeoutMs: this.config.stallTimeoutMs,
        retryAttempts: this.config.retryAttempts,
        retryBackoffBaseMs: this.config.retryBackoffBaseMs,
      })
    this.verify = options.verifyTranscoder ?? (() => verifyTranscoder(resolveTranscoderPath(this.config.transcoderPath)))
  }

  on<K extends SchedulerEventName>(event: K, listener: SchedulerListener<K>): () => void {
    return this.events.on(event, listener)
  }

  once<K extends SchedulerEventName>(event: K, listener: SchedulerListener<K>): () => void {
    return this.events.once(event, listener)
  }

  get isRunning(): boolean {
    return this.running
  }

  get isPaused(): boolean {
    return this.paused
  }

  // ---------------------------------------------------------------------------
  // Admission
  // ---------------------------------------------------------------------------

  /**
   * Register a job. Returns false (never throws) when the input is missing, the id is taken,
   * the parameters are invalid or no output path can be resolved.
   */
  addJob(
    id: string,
    inputPath: string,
    outputPath: string,
    params: ConversionParamsInput,
    policy: string = this.config.overwritePolicy
  ): boolean {
    // a removed job's execution may still be exiting under this id
    if (this.jobs.has(id) || this.inFlight.has(id)) {
      this.log.warn({ msg: 'Duplicate job id rejected', jobId: id })
      return false
    }
    if (!fs.existsSync(inputPath)) {
      this.log.error({ msg: 'Input file not found', jobId: id, input: redactFilePath(inputPath) })
      return false
    }
    const parsed = parseConversionParams(params)
    if (!parsed.ok) {
      this.log.error({ msg: 'Invalid conversion parameters', jobId: id, error: parsed.error })
      return false
    }

    let resolved: { path: string; shouldSkip: boolean }
    try {
      resolved = resolveOutputPath(outputPath, policy, (candidate) => fs.existsSync(candidate) || this.isReserved(candidate))
    } catch (err) {
      this.log.error({ msg: 'Could not resolve output path', jobId: id, error: errorMessage(err) })
      return false
    }

    const init = { id, inputPath, outputPath: resolved.path, params: parsed.params }

    if (resolved.shouldSkip) {
      const job = ConversionJob.skipped(init, `File already exists: ${resolved.path}`)
      this.jobs.set(id, job)
      if (job.markEmitted('skipped')) this.events.emit('job:skipped', id, job.error ?? '')
      this.events.emit('queue:updated')
      this.log.info({ msg: 'Job skipped, output exists', jobId: id, output: redactFilePath(resolved.path) })
      return true
    }

    this.jobs.set(id, new ConversionJob(init))
    this.pending.push(id)
    this.drainSignaled = false
    this.events.emit('queue:updated')
    this.log.info({
      msg: 'Job queued',
      jobId: id,
      input: redactFilePath(inputPath),
      output: redactFilePath(resolved.path),
    })
    this.wake()
    return true
  }

  /**
   * Queue one job per input. Outputs go to `outputDir`, or beside each source when it is undefined,
   * named `<source stem>.<outputFormat>`.
   */
  addBatchJobs(
    inputPaths: string[],
    outputDir: string | undefined,
    params: ConversionParamsInput,
    policy: string = this.config.overwritePolicy
  ): Record<string, boolean> {
    const results: Record<string, boolean> = {}
    const format = params.outputFormat ?? 'mp3'
    for (const inputPath of inputPaths) {
      const id = `job_${uuidv4()}`
      const stem = path.basename(inputPath, path.extname(inputPath))
      const dir = outputDir ?? path.dirname(inputPath)
      const target = path.join(dir, sanitizeFilename(`${stem}.${format}`))
      results[id] = this.addJob(id, inputPath, target, params, policy)
    }
    return results
  }

  /** Output paths held by jobs that have not finished yet. */
  private isReserved(candidate: string): boolean {
    const resolved = path.resolve(candidate)
    for (const job of this.jobs.values()) {
      if ((job.status === 'queued' || job.status === 'running') && path.resolve(job.outputPath) === resolved) {
        return true
      }
    }
    return false
  }

  // ---------------------------------------------------------------------------
  // Removal and cancellation
  // ---------------------------------------------------------------------------

  /** RUNNING jobs are cancelled (and stay listed); any other job leaves the registry. */
  removeJob(id: string): boolean {
    const job = this.jobs.get(id)
    if (!job) return false
    if (job.status === 'running') return this.cancelJob(id)

    this.dequeue(id)
    this.jobs.delete(id)
    this.events.emit('queue:updated')
    this.log.info({ msg: 'Job removed', jobId: id })
    return true
  }

  /** False for unknown or already terminal jobs. Never waits for the process to exit. */
  cancelJob(id: string): boolean {
    const job = this.jobs.get(id)
    if (!job) return false
    const wasRunning = job.status === 'running'
    if (!job.cancel()) return false

    if (wasRunning) {
      this.inFlight.get(id)?.handle.cancel()
    } else {
      this.dequeue(id)
    }
    this.settledSinceReset++
    if (job.markEmitted('cancelled')) this.events.emit('job:cancelled', id)
    this.events.emit('queue:updated')
    this.log.info({ msg: 'Job cancelled', jobId: id, wasRunning })
    return true
  }

  /** Returns how many jobs were cancelled. */
  cancelAllJobs(): number {
    let count = 0
    for (const id of Array.from(this.jobs.keys())) {
      if (this.cancelJob(id)) count++
    }
    return count
  }

  /** Evict every terminal job (completed, failed, cancelled, skipped). Returns how many. */
  clearCompletedJobs(): number {
    let count = 0
    for (const [id, job] of Array.from(this.jobs.entries())) {
      if (job.isTerminal) {
        this.jobs.delete(id)
        count++
      }
    }
    this.events.emit('queue:updated')
    this.log.info({ msg: 'Cleared finished jobs', count })
    return count
  }

  private dequeue(id: string): void {
    const index = this.pending.indexOf(id)
    if (index !== -1) this.pending.splice(index, 1)
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getJob(id: string): JobSnapshot | undefined {
    return this.jobs.get(id)?.snapshot()
  }

  getAllJobs(): JobSnapshot[] {
    const now = new Date()
    return Array.from(this.jobs.values(), (job) => job.snapshot(now))
  }

  getQueueStats(): QueueStats {
    const stats: QueueStats = { total: this.jobs.size, queued: 0, running: 0, completed: 0, failed: 0, cancelled: 0, skipped: 0 }
    for (const job of this.jobs.values()) {
      stats[job.status]++
    }
    return stats
  }

  // ---------------------------------------------------------------------------
  // Control loop lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Check the transcoder. On failure emits `worker:error` and keeps admission blocked
   * until a later call succeeds.
   */
  async initializeTranscoder(): Promise<boolean> {
    try {
      const version = await this.verify()
      this.transcoderReady = true
      this.log.info({ msg: 'Transcoder ready', version })
      return true
    } catch (err) {
      this.transcoderReady = false
      const message = errorMessage(err)
      this.log.error({ msg: 'Transcoder unavailable', error: message })
      captureWorkerError(err)
      this.events.emit('worker:error', message)
      return false
    }
  }

  /** Start the control loop. Resolves false when the transcoder is unavailable. */
  async startProcessing(): Promise<boolean> {
    if (this.running) return true
    if (!this.transcoderReady && !(await this.initializeTranscoder())) return false
    if (this.running) return true

    this.running = true
    this.paused = false
    this.timer = setInterval(() => this.tick(), this.config.pollIntervalMs)
    this.log.info({ msg: 'Scheduler started', maxConcurrentJobs: this.config.maxConcurrentJobs })
    this.tick()
    return true
  }

  pauseProcessing(): void {
    if (this.paused) return
    this.paused = true
    this.log.info({ msg: 'Scheduler paused' })
  }

  resumeProcessing(): void {
    if (!this.paused) return
    this.paused = false
    this.log.info({ msg: 'Scheduler resumed' })
    this.wake()
  }

  /**
   * Cancel every RUNNING job, stop the loop, and wait up to `timeoutMs` for their executions to
   * wind down. Returns regardless once the timeout passes. QUEUED jobs stay queued.
   */
  async stopProcessing(timeoutMs: number = this.config.stopTimeoutMs): Promise<void> {
    if (!this.running) return
    this.log.info({ msg: 'Stopping scheduler' })
    this.haltLoop()

    // executions that already finished (unreaped while paused) keep their results
    this.reapFinished()
    for (const id of Array.from(this.inFlight.keys())) {
      this.cancelJob(id)
    }
    const outstanding = Array.from(this.inFlight.values(), (entry) => entry.handle.result)
    if (outstanding.length > 0) {
      const ac = new AbortController()
      const settled = await Promise.race([
        Promise.allSettled(outstanding).then(() => true),
        sleep(timeoutMs, false, { signal: ac.signal }).catch(() => false),
      ])
      ac.abort()
      if (!settled) {
        this.log.warn({ msg: 'Executions still running after stop timeout', timeoutMs, count: outstanding.length })
      }
    }
    this.inFlight.clear()
    this.log.info({ msg: 'Scheduler stopped' })
  }

  private haltLoop(): void {
    this.running = false
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }
  }

  private wake(): void {
    if (!this.running || this.wakeScheduled) return
    this.wakeScheduled = true
    setImmediate(() => {
      this.wakeScheduled = false
      this.tick()
    })
  }

  private tick(): void {
    if (!this.running || this.paused) return
    try {
      this.reapFinished()
      while (this.transcoderReady && this.inFlight.size < this.config.maxConcurrentJobs && this.pending.length > 0) {
        this.admitNext()
      }
      this.checkDrained()
    } catch (err) {
      const message = `Worker error: ${errorMessage(err)}`
      this.log.error({ msg: 'Control loop failed; scheduler stopped', error: errorMessage(err) })
      captureWorkerError(err)
      this.haltLoop()
      this.events.emit('worker:error', message)
    }
  }

  private admitNext(): void {
    const id = this.pending.shift()
    if (id === undefined) return
    const job = this.jobs.get(id)
    // cancelled or removed while waiting
    if (!job || !job.start()) return

    let handle: ExecutionHandle
    try {
      handle = this.executor.execute(job.snapshot(), { onProgress: (fraction) => this.recordProgress(id, fraction) })
    } catch (err) {
      handle = { result: Promise.reject(err), cancel: () => undefined }
    }

    const entry: InFlight = { handle }
    this.inFlight.set(id, entry)
    handle.result.then(
      (result) => {
        entry.outcome = { kind: 'result', result }
        this.wake()
      },
      (error: unknown) => {
        entry.outcome = { kind: 'error', error }
        this.wake()
      }
    )

    if (job.markEmitted('started')) this.events.emit('job:started', id)
    this.events.emit('queue:updated')
  }

  private recordProgress(id: string, fraction: number): void {
    const job = this.jobs.get(id)
    if (job?.updateProgress(fraction)) {
      this.events.emit('job:progress', id, job.progress)
    }
  }

  private reapFinished(): void {
    let reaped = 0
    for (const [id, entry] of Array.from(this.inFlight.entries())) {
      if (!entry.outcome) continue
      this.inFlight.delete(id)
      reaped++

      const job = this.jobs.get(id)
      // removed, or cancelled while its process was still exiting
      if (!job || job.isTerminal) continue

      const result: JobResult =
        entry.outcome.kind === 'result'
          ? entry.outcome.result
          : {
              success: false,
              message: `Unexpected error: ${errorMessage(entry.outcome.error)}`,
              errorCode: 'UNKNOWN_ERROR',
              duration: job.durationSeconds(),
            }
      if (!job.finish(result)) continue
      this.settledSinceReset++

      if (result.success) {
        if (job.markEmitted('completed')) this.events.emit('job:completed', id, { ...result })
      } else if (job.markEmitted('failed')) {
        this.events.emit('job:failed', id, result.message)
      }
    }
    if (reaped > 0) this.events.emit('queue:updated')
  }

  private checkDrained(): void {
    if (this.drainSignaled || this.pending.length > 0 || this.inFlight.size > 0) return
    const stats = this.getQueueStats()
    if (stats.queued > 0 || stats.running > 0) return

    this.drainSignaled = true
    // a batch emptied only by removals finishes silently
    if (this.settledSinceReset === 0) return
    this.settledSinceReset = 0
    this.log.info({ msg: 'All jobs completed', ...stats })
    this.events.emit('queue:drained', stats)
  }
}
