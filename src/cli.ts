#!/usr/bin/env node
import './env'
import { parseArgs } from 'util'
import { getLogger, redactFilePath } from './lib/logger'
import { initSentry } from './lib/sentry'
import type { ConversionParamsInput } from './models/ConversionParams'
import { validateInputFile } from './utils/fileValidation'
import { ConversionScheduler } from './workers/scheduler'
import type { SchedulerOptions } from './workers/scheduler'
import type { QueueStats } from './workers/events'

const log = getLogger('cli')

export const USAGE = `Usage: transcode-pool [options] <files...>

Options:
  -o, --out <dir>          output directory (default: beside each input)
  -f, --format <ext>       output format (default: mp3)
      --codec <name>       audio codec (default: derived from format)
  -b, --bitrate <rate>     audio bitrate, e.g. 192k
      --sample-rate <hz>   output sample rate (default: 44100)
      --channels <n>       output channels (default: 2)
      --start <HH:MM:SS>   trim start
      --end <HH:MM:SS>     trim end
      --stream <index>     audio stream index (default: 0)
      --loudnorm           loudness normalization
      --peak <dB>          peak normalization target
      --policy <policy>    skip | replace | unique
  -j, --concurrency <n>    parallel conversions
  -h, --help               show this help
`

export interface CliOptions {
  inputs: string[]
  outputDir?: string
  params: ConversionParamsInput
  policy?: string
  concurrency?: number
  help: boolean
}

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const parsed = Number(value)
  if (value.trim() === '' || Number.isNaN(parsed)) throw new Error(`--${flag} expects a number, got "${value}"`)
  return parsed
}

/** @throws Error on unknown options or non-numeric values */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      out: { type: 'string', short: 'o' },
      format: { type: 'string', short: 'f' },
      codec: { type: 'string' },
      bitrate: { type: 'string', short: 'b' },
      'sample-rate': { type: 'string' },
      channels: { type: 'string' },
      start: { type: 'string' },
      end: { type: 'string' },
      stream: { type: 'string' },
      loudnorm: { type: 'boolean' },
      peak: { type: 'string' },
      policy: { type: 'string' },
      concurrency: { type: 'string', short: 'j' },
      help: { type: 'boolean', short: 'h' },
    },
  })

  const peakTarget = toNumber('peak', values.peak)
  return {
    inputs: positionals,
    outputDir: values.out,
    policy: values.policy,
    concurrency: toNumber('concurrency', values.concurrency),
    help: values.help ?? false,
    params: {
      outputFormat: values.format,
      codec: values.codec,
      bitrate: values.bitrate,
      sampleRate: toNumber('sample-rate', values['sample-rate']),
      channels: toNumber('channels', values.channels),
      startTime: values.start,
      endTime: values.end,
      streamIndex: toNumber('stream', values.stream),
      normalizeLoudness: values.loudnorm ?? false,
      normalizePeak: peakTarget !== undefined,
      peakTarget,
    },
  }
}

/**
 * Convert every input and wait for the batch to finish.
 * Resolves to the process exit code: 0 when every input converted or was skipped, 1 otherwise.
 */
export async function runCli(argv: string[], schedulerOptions: SchedulerOptions = {}): Promise<number> {
  let options: CliOptions
  try {
    options = parseCliArgs(argv)
  } catch (err) {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n\n${USAGE}`)
    return 1
  }
  if (options.help) {
    process.stdout.write(USAGE)
    return 0
  }
  if (options.inputs.length === 0) {
    process.stderr.write(USAGE)
    return 1
  }

  const scheduler = new ConversionScheduler({
    ...schedulerOptions,
    config: { ...schedulerOptions.config, maxConcurrentJobs: options.concurrency },
  })

  scheduler.on('job:started', (id) => log.info({ msg: 'Converting', jobId: id }))
  scheduler.on('job:progress', (id, progress) => log.debug({ msg: 'Progress', jobId: id, progress: Number(progress.toFixed(3)) }))
  scheduler.on('job:completed', (id, result) =>
    log.info({ msg: 'Converted', jobId: id, output: redactFilePath(result.outputPath ?? ''), durationSec: result.duration })
  )
  scheduler.on('job:failed', (id, message) => log.error({ msg: 'Conversion failed', jobId: id, error: message }))
  scheduler.on('job:skipped', (id, reason) => log.warn({ msg: 'Skipped', jobId: id, reason }))
  scheduler.on('job:cancelled', (id) => log.warn({ msg: 'Cancelled', jobId: id }))

  let rejected = 0
  const accepted: string[] = []
  for (const input of options.inputs) {
    const problem = await validateInputFile(input).catch((err: unknown) => (err instanceof Error ? err.message : String(err)))
    if (problem) {
      log.error({ msg: 'Input rejected', input: redactFilePath(input), reason: problem })
      rejected++
      continue
    }
    accepted.push(input)
  }

  const admitted = scheduler.addBatchJobs(accepted, options.outputDir, options.params, options.policy)
  rejected += Object.values(admitted).filter((ok) => !ok).length

  let interrupted = false
  const onSignal = (signal: NodeJS.Signals) => {
    interrupted = true
    log.warn({ msg: 'Interrupted, cancelling jobs', signal })
    scheduler.cancelAllJobs()
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  try {
    if (scheduler.getQueueStats().queued > 0) {
      const finished = new Promise<QueueStats | undefined>((resolve) => {
        scheduler.once('queue:drained', resolve)
        scheduler.once('worker:error', () => resolve(undefined))
      })
      if (!(await scheduler.startProcessing())) return 1
      const summary = await finished
      if (!summary) return 1
    }
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
    await scheduler.stopProcessing()
  }

  const stats = scheduler.getQueueStats()
  log.info({ msg: 'Batch finished', ...stats, rejected })
  return stats.failed > 0 || stats.cancelled > 0 || rejected > 0 || interrupted ? 1 : 0
}

// When run as main: node dist/cli.js <files...>
if (require.main === module) {
  initSentry()
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (err: unknown) => {
      log.error({ msg: 'Fatal error', err: err instanceof Error ? err.message : String(err) })
      process.exitCode = 1
    }
  )
}
