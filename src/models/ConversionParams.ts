import { z } from 'zod'
import { isValidTimecode, timecodeToSeconds } from '../utils/timecode'

/** Default encoder per output container. */
export const CODEC_MAP: Record<string, string> = {
  mp3: 'libmp3lame',
  wav: 'pcm_s16le',
  m4a: 'aac',
  flac: 'flac',
  aac: 'aac',
  ogg: 'libvorbis',
}

export function defaultCodecFor(outputFormat: string): string {
  return CODEC_MAP[outputFormat.toLowerCase()] ?? 'libmp3lame'
}

const timecode = z.string().refine(isValidTimecode, { message: 'Expected HH:MM:SS[.fff]' })

export const conversionParamsSchema = z
  .object({
    outputFormat: z.string().regex(/^[a-z0-9]+$/i, 'Expected a bare container extension').default('mp3'),
    codec: z.string().min(1).optional(),
    bitrate: z.string().regex(/^\d+(\.\d+)?[kKmM]?$/, 'Expected a bitrate such as 192k').default('192k'),
    sampleRate: z.number().int().positive().default(44100),
    channels: z.number().int().min(1).max(8).default(2),
    startTime: timecode.optional(),
    endTime: timecode.optional(),
    streamIndex: z.number().int().min(0).optional(),
    normalizeLoudness: z.boolean().default(false),
    normalizePeak: z.boolean().default(false),
    peakTarget: z.number().default(-1),
  })
  .superRefine((params, ctx) => {
    const { startTime, endTime } = params
    if (!startTime || !endTime || !isValidTimecode(startTime) || !isValidTimecode(endTime)) return
    if (timecodeToSeconds(endTime) <= timecodeToSeconds(startTime)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['endTime'], message: 'endTime must be after startTime' })
    }
  })
  .transform((params) => ({ ...params, codec: params.codec ?? defaultCodecFor(params.outputFormat) }))

/** What callers may pass: every field optional, defaults filled in on parse. */
export type ConversionParamsInput = z.input<typeof conversionParamsSchema>
export type ConversionParams = Readonly<z.output<typeof conversionParamsSchema>>

export type ParseParamsResult =
  | { ok: true; params: ConversionParams }
  | { ok: false; error: string }

/** Validate and normalize; the returned value is frozen so jobs can share it safely. */
export function parseConversionParams(input: ConversionParamsInput = {}): ParseParamsResult {
  const parsed = conversionParamsSchema.safeParse(input)
  if (!parsed.success) {
    const error = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`).join('; ')
    return { ok: false, error }
  }
  return { ok: true, params: Object.freeze(parsed.data) }
}

/** Throwing variant for callers that build params from trusted input (CLI, tests). */
export function createConversionParams(input: ConversionParamsInput = {}): ConversionParams {
  const result = parseConversionParams(input)
  if (!result.ok) {
    throw new Error(`Invalid conversion parameters: ${result.error}`)
  }
  return result.params
}
