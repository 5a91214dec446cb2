/** Trim timestamps: H:MM:SS or HH:MM:SS with up to three fractional digits. */
const TIMECODE_REGEX = /^(\d{1,2}):([0-5]\d):([0-5]\d(?:\.\d{1,3})?)$/

export function isValidTimecode(value: string): boolean {
  return TIMECODE_REGEX.test(value)
}

/**
 * Convert a trim timestamp to seconds.
 * @throws Error if the value is not a valid timecode
 */
export function timecodeToSeconds(value: string): number {
  const match = TIMECODE_REGEX.exec(value)
  if (!match) {
    throw new Error(`Invalid time format: ${value}`)
  }
  return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3])
}

/** Inverse of timecodeToSeconds, truncated to centiseconds. */
export function secondsToTimecode(seconds: number): string {
  const total = Math.max(0, seconds)
  const h = Math.floor(total / 3600)
  const m = Math.floor((total % 3600) / 60)
  const s = Math.floor(total % 60)
  const cs = Math.floor((total - Math.floor(total)) * 100)
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}.${String(cs).padStart(2, '0')}`
}
