/** ffmpeg's stderr status line carries the current output position as `time=HH:MM:SS.ff`. */
const TIME_MARKER_REGEX = /time=(\d{2,}):(\d{2}):(\d{2}(?:\.\d+)?)/

export type ProgressSink = (fraction: number) => void

/** Elapsed seconds from a diagnostic line, or undefined when the line has no position marker. */
export function parseTimeMarker(line: string): number | undefined {
  const match = TIME_MARKER_REGEX.exec(line)
  if (!match) return undefined
  return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3])
}

/**
 * Turns a live stream of transcoder diagnostic lines into [0,1] progress fractions.
 * Lines that do not parse are ignored; an unknown (zero) total duration disables reporting.
 */
export class ProgressMonitor {
  constructor(
    private readonly totalSeconds: number,
    private readonly sink: ProgressSink
  ) {}

  get enabled(): boolean {
    return Number.isFinite(this.totalSeconds) && this.totalSeconds > 0
  }

  feed(line: string): number | undefined {
    if (!this.enabled) return undefined
    const elapsed = parseTimeMarker(line)
    if (elapsed === undefined) return undefined
    const fraction = Math.min(1, Math.max(0, elapsed / this.totalSeconds))
    this.sink(fraction)
    return fraction
  }
}

/**
 * Seconds of output the transcoder will write: the trim window when one is set, else the whole input.
 * ffmpeg's `time=` counts from the start of the output, so this is the progress denominator.
 */
export function expectedOutputSeconds(totalSeconds: number, startSeconds?: number, endSeconds?: number): number {
  const start = startSeconds ?? 0
  const end = endSeconds ?? totalSeconds
  const bounded = totalSeconds > 0 ? Math.min(end, totalSeconds) : end
  return Math.max(0, bounded - start)
}
