import ffmpeg from 'fluent-ffmpeg'
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg'
import ffprobeInstaller from '@ffprobe-installer/ffprobe'
import fs from 'fs'
import { execFile } from 'child_process'
import { promisify } from 'util'
import type { ConversionParams } from '../models/ConversionParams'

const execFilePromise = promisify(execFile)

/** Explicit path if the file exists (e.g. /usr/bin/ffmpeg from FFMPEG_PATH), else the npm installer binary. */
export function resolveBinaryPath(explicitPath: string | undefined, fallback: string): string {
  if (explicitPath && fs.existsSync(explicitPath)) return explicitPath
  return fallback
}

export function resolveTranscoderPath(explicitPath?: string): string {
  return resolveBinaryPath(explicitPath, ffmpegInstaller.path)
}

export function resolveProbePath(explicitPath?: string): string {
  return resolveBinaryPath(explicitPath, ffprobeInstaller.path)
}

export class TranscoderUnavailableError extends Error {
  constructor(
    public readonly binaryPath: string,
    cause: unknown
  ) {
    super(`FFmpeg not found or not working at ${binaryPath}: ${cause instanceof Error ? cause.message : String(cause)}`)
    this.name = 'TranscoderUnavailableError'
  }
}

/** Run `<binary> -version`; resolves with the first output line. */
export async function verifyTranscoder(binaryPath: string): Promise<string> {
  try {
    const { stdout } = await execFilePromise(binaryPath, ['-version'], { timeout: 10_000 })
    return stdout.split('\n')[0].trim()
  } catch (err) {
    throw new TranscoderUnavailableError(binaryPath, err)
  }
}

/** Encoders where a target bitrate means nothing. */
const LOSSLESS_CODEC_REGEX = /^(pcm_|flac$|alac$)/

/** EBU R128 loudness normalization target. */
export const LOUDNORM_FILTER = 'loudnorm=I=-18:LRA=7:TP=-2'

export interface TranscodeCommand {
  binary: string
  input: string
  /** Everything between `-i <input>` and the output path. */
  outputOptions: string[]
  output: string
}

export function buildAudioFilters(params: ConversionParams): string[] {
  if (params.normalizeLoudness) return [LOUDNORM_FILTER]
  if (params.normalizePeak) return [`volume=${params.peakTarget}dB`]
  return []
}

/** Pure: job parameters → transcoder invocation. */
export function buildTranscodeCommand(
  binary: string,
  input: string,
  output: string,
  params: ConversionParams
): TranscodeCommand {
  const opts: string[] = []

  if (params.startTime) opts.push('-ss', params.startTime)
  if (params.endTime) opts.push('-to', params.endTime)

  opts.push('-map', `0:a:${params.streamIndex ?? 0}`)
  opts.push('-c:a', params.codec)
  // libmp3lame: highest VBR quality, bitrate still honoured as the cap
  if (params.codec === 'libmp3lame') opts.push('-q:a', '0')
  if (!LOSSLESS_CODEC_REGEX.test(params.codec)) opts.push('-b:a', params.bitrate)
  opts.push('-ar', String(params.sampleRate))
  opts.push('-ac', String(params.channels))

  const filters = buildAudioFilters(params)
  if (filters.length > 0) opts.push('-af', filters.join(','))

  opts.push('-map_metadata', '0')

  return { binary, input, outputOptions: opts, output }
}

/** Full argument vector, binary first, as the process sees it. */
export function toArgv(command: TranscodeCommand): string[] {
  return [command.binary, '-y', '-i', command.input, ...command.outputOptions, command.output]
}

export interface TranscodeExit {
  code: number | null
  signal: string | null
}

export interface TranscodeProcess {
  /** Resolves when the process exits (any code); rejects only when it could not run at all. */
  exited: Promise<TranscodeExit>
  kill(signal: NodeJS.Signals): void
}

export type TranscoderLauncher = (command: TranscodeCommand, onStderrLine: (line: string) => void) => TranscodeProcess

const EXIT_CODE_REGEX = /exited with code (\d+)/
const KILLED_REGEX = /killed with signal (\w+)/

/** fluent-ffmpeg reports exits through error messages; recover code/signal from them. */
export function parseExitFromError(message: string): TranscodeExit | undefined {
  const code = EXIT_CODE_REGEX.exec(message)
  if (code) return { code: Number(code[1]), signal: null }
  const killed = KILLED_REGEX.exec(message)
  if (killed) return { code: null, signal: killed[1] }
  return undefined
}

/** Default launcher: fluent-ffmpeg drives the process and splits stderr into lines. */
export const launchTranscode: TranscoderLauncher = (command, onStderrLine) => {
  const cmd = ffmpeg(command.input)
    .setFfmpegPath(command.binary)
    .outputOptions(command.outputOptions)
    .output(command.output)

  // fluent-ffmpeg probes formats and encoders before spawning; a kill in that window is held until 'start'
  let spawned = false
  let heldSignal: NodeJS.Signals | undefined

  const exited = new Promise<TranscodeExit>((resolve, reject) => {
    cmd
      .on('start', () => {
        spawned = true
        if (heldSignal) cmd.kill(heldSignal)
      })
      .on('stderr', (line: string) => onStderrLine(line))
      .on('end', () => resolve({ code: 0, signal: null }))
      .on('error', (err: Error) => {
        const exit = parseExitFromError(err.message)
        if (exit) resolve(exit)
        else reject(err)
      })
  })

  cmd.run()

  return {
    exited,
    kill: (signal) => {
      if (spawned) cmd.kill(signal)
      else heldSignal = signal
    },
  }
}
