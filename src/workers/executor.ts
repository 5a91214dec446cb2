import fs from 'fs'
import path from 'path'
import { setTimeout as sleep } from 'timers/promises'
import type pino from 'pino'
import { withJobContext, redactFilePath } from '../lib/logger'
import { captureJobError } from '../lib/sentry'
import type { JobErrorCode, JobResult, JobSnapshot } from '../models/Job'
import { buildTranscodeCommand, launchTranscode, toArgv } from '../services/ffmpeg'
import type { TranscodeCommand, TranscodeExit, TranscodeProcess, TranscoderLauncher } from '../services/ffmpeg'
import { createMediaProber } from '../services/mediaProbe'
import type { MediaProber } from '../services/mediaProbe'
import { ProgressMonitor, expectedOutputSeconds } from '../services/progress'
import { timecodeToSeconds } from '../utils/timecode'
import { DEFAULT_STALL_TIMEOUT_MS, STDERR_TAIL_LINES } from '../utils/queueConfig'

export interface ExecutionHooks {
  onProgress: (fraction: number) => void
}

export interface ExecutionHandle {
  /** Never rejects: every fault is reported as a failed JobResult. */
  result: Promise<JobResult>
  /** Best-effort: signals the process and returns immediately. */
  cancel(): void
}

export interface JobExecutor {
  execute(job: JobSnapshot, hooks: ExecutionHooks): ExecutionHandle
}

export interface ConversionExecutorOptions {
  transcoderPath: string
  probePath: string
  launcher?: TranscoderLauncher
  prober?: MediaProber
  stallTimeoutMs?: number
  retryAttempts?: number
  retryBackoffBaseMs?: number
}

/** Failures worth another attempt; the rest would fail the same way again. */
const RETRYABLE_CODES: ReadonlySet<JobErrorCode> = new Set<JobErrorCode>(['TRANSCODER_EXIT', 'OUTPUT_MISSING', 'STALLED'])

type AttemptOutcome =
  | { ok: true }
  | { ok: false; code: JobErrorCode; message: string; exitCode?: number }

interface RunControl {
  cancelled: boolean
  /** Aborted on cancel; cuts a retry backoff short. */
  abort: AbortController
  process?: TranscodeProcess
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

async function hasOutput(outputPath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(outputPath)
    return stats.isFile() && stats.size > 0
  } catch {
    return false
  }
}

/**
 * Runs one conversion job end to end: output directory, probe, transcode with progress, outcome.
 */
export class ConversionExecutor implements JobExecutor {
  private readonly transcoderPath: string
  private readonly launcher: TranscoderLauncher
  private readonly prober: MediaProber
  private readonly stallTimeoutMs: number
  private readonly retryAttempts: number
  private readonly retryBackoffBaseMs: number

  constructor(options: ConversionExecutorOptions) {
    this.transcoderPath = options.transcoderPath
    this.launcher = options.launcher ?? launchTranscode
    this.prober = options.prober ?? createMediaProber(options.probePath)
    this.stallTimeoutMs = options.stallTimeoutMs ?? DEFAULT_STALL_TIMEOUT_MS
    this.retryAttempts = options.retryAttempts ?? 0
    this.retryBackoffBaseMs = options.retryBackoffBaseMs ?? 2000
  }

  execute(job: JobSnapshot, hooks: ExecutionHooks): ExecutionHandle {
    const control: RunControl = { cancelled: false, abort: new AbortController() }
    return {
      result: this.run(job, hooks, control),
      cancel: () => {
        control.cancelled = true
        control.abort.abort()
        control.process?.kill('SIGTERM')
      },
    }
  }

  private async run(job: JobSnapshot, hooks: ExecutionHooks, control: RunControl): Promise<JobResult> {
    const log = withJobContext(job.id)
    const startedAt = Date.now()
    const elapsed = () => (Date.now() - startedAt) / 1000
    const cancelled = (): JobResult => ({ success: false, message: 'Conversion cancelled', duration: elapsed() })

    log.info({ msg: 'Starting conversion', input: redactFilePath(job.inputPath), output: redactFilePath(job.outputPath) })

    try {
      try {
        await fs.promises.mkdir(path.dirname(job.outputPath), { recursive: true })
      } catch (err) {
        log.error({ msg: 'Could not create output directory', err: errorMessage(err) })
        return {
          success: false,
          message: `Failed to create output directory: ${errorMessage(err)}`,
          errorCode: 'OUTPUT_DIR_ERROR',
          duration: elapsed(),
        }
      }

      const totalSeconds = await this.probeOutputSeconds(job, log)
      const monitor = new ProgressMonitor(totalSeconds, hooks.onProgress)
      const command = buildTranscodeCommand(this.transcoderPath, job.inputPath, job.outputPath, job.params)
      log.debug({ msg: 'Transcoder command', argv: toArgv(command) })

      for (let attempt = 1; ; attempt++) {
        if (control.cancelled) return cancelled()
        const outcome = await this.attempt(command, monitor, control, log)
        if (control.cancelled) return cancelled()

        if (outcome.ok) {
          const duration = elapsed()
          log.info({ msg: 'Conversion completed', durationSec: Number(duration.toFixed(1)), attempt })
          return {
            success: true,
            message: 'Conversion completed successfully',
            outputPath: job.outputPath,
            duration,
          }
        }

        if (!RETRYABLE_CODES.has(outcome.code) || attempt > this.retryAttempts) {
          log.error({ msg: 'Conversion failed', errorCode: outcome.code, exitCode: outcome.exitCode, attempt })
          return {
            success: false,
            message: outcome.message,
            errorCode: outcome.code,
            exitCode: outcome.exitCode,
            duration: elapsed(),
          }
        }

        const delayMs = this.retryBackoffBaseMs * 2 ** (attempt - 1)
        log.warn({ msg: 'Conversion attempt failed, retrying', errorCode: outcome.code, attempt, delayMs })
        try {
          await sleep(delayMs, undefined, { signal: control.abort.signal })
        } catch (err) {
          if (control.cancelled) return cancelled()
          throw err
        }
      }
    } catch (err) {
      log.error({ msg: 'Unexpected error during conversion', err: errorMessage(err) })
      captureJobError(job.id, 'execute', err)
      return {
        success: false,
        message: `Unexpected error: ${errorMessage(err)}`,
        errorCode: 'UNKNOWN_ERROR',
        duration: elapsed(),
      }
    }
  }

  /** Progress denominator; 0 (progress off) when the input cannot be probed. */
  private async probeOutputSeconds(job: JobSnapshot, log: pino.Logger): Promise<number> {
    let total = 0
    try {
      total = (await this.prober(job.inputPath)).duration
    } catch (err) {
      log.debug({ msg: 'Probe failed; progress reporting disabled', err: errorMessage(err) })
    }
    const start = job.params.startTime ? timecodeToSeconds(job.params.startTime) : undefined
    const end = job.params.endTime ? timecodeToSeconds(job.params.endTime) : undefined
    return expectedOutputSeconds(total, start, end)
  }

  private async attempt(
    command: TranscodeCommand,
    monitor: ProgressMonitor,
    control: RunControl,
    log: pino.Logger
  ): Promise<AttemptOutcome> {
    const tail: string[] = []
    let stalled = false
    let stallTimer: NodeJS.Timeout | undefined
    let proc: TranscodeProcess | undefined

    const armStallTimer = () => {
      if (this.stallTimeoutMs <= 0) return
      clearTimeout(stallTimer)
      stallTimer = setTimeout(() => {
        stalled = true
        log.warn({ msg: 'Transcoder produced no output, killing', stallTimeoutMs: this.stallTimeoutMs })
        proc?.kill('SIGKILL')
      }, this.stallTimeoutMs)
    }

    let exit: TranscodeExit
    try {
      proc = this.launcher(command, (line) => {
        tail.push(line)
        if (tail.length > STDERR_TAIL_LINES) tail.shift()
        armStallTimer()
        monitor.feed(line)
      })
      control.process = proc
      armStallTimer()
      exit = await proc.exited
    } catch (err) {
      return { ok: false, code: 'LAUNCH_ERROR', message: `Failed to start conversion: ${errorMessage(err)}` }
    } finally {
      clearTimeout(stallTimer)
      control.process = undefined
    }

    if (stalled) {
      return {
        ok: false,
        code: 'STALLED',
        message: `Conversion stalled: no transcoder output for ${Math.round(this.stallTimeoutMs / 1000)}s`,
      }
    }
    if (exit.code !== 0) {
      const detail = tail.join('\n') || (exit.signal ? `killed with signal ${exit.signal}` : 'no diagnostic output')
      return {
        ok: false,
        code: 'TRANSCODER_EXIT',
        message: `Conversion failed: ${detail}`,
        exitCode: exit.code ?? undefined,
      }
    }
    if (!(await hasOutput(command.output))) {
      return { ok: false, code: 'OUTPUT_MISSING', message: 'Conversion failed: output file was not created' }
    }
    return { ok: true }
  }
}
