import ffmpeg from 'fluent-ffmpeg'
import type { FfprobeData, FfprobeFormat, FfprobeStream } from 'fluent-ffmpeg'
import fs from 'fs'

export interface MediaInfo {
  duration: number // seconds, 0 when unknown
  streams: FfprobeStream[]
  formatInfo: FfprobeFormat
  metadata: Record<string, string>
}

export type MediaProber = (inputPath: string) => Promise<MediaInfo>

/** Container tag → tag name the audio containers understand. */
const AUDIO_TAG_MAP: Record<string, string> = {
  title: 'title',
  artist: 'artist',
  album: 'album',
  date: 'date',
  genre: 'genre',
  track: 'track',
  albumartist: 'album_artist',
  composer: 'composer',
  comment: 'comment',
}

export function toMediaInfo(data: FfprobeData): MediaInfo {
  const formatInfo = data.format ?? {}
  const duration = Number(formatInfo.duration)
  const metadata: Record<string, string> = {}
  for (const [key, value] of Object.entries(formatInfo.tags ?? {})) {
    metadata[key] = String(value)
  }
  return {
    duration: Number.isFinite(duration) && duration > 0 ? duration : 0,
    streams: data.streams ?? [],
    formatInfo,
    metadata,
  }
}

/** ffprobe (format + streams) through fluent-ffmpeg. */
export function probeMedia(inputPath: string, probePath: string): Promise<MediaInfo> {
  return new Promise((resolve, reject) => {
    if (!fs.existsSync(inputPath)) {
      reject(new Error(`Media file not found: ${inputPath}`))
      return
    }
    ffmpeg(inputPath)
      .setFfprobePath(probePath)
      .ffprobe((err: Error | null, data: FfprobeData) => {
        if (err) {
          reject(new Error(`Failed to probe media: ${err.message}`))
          return
        }
        resolve(toMediaInfo(data))
      })
  })
}

export function createMediaProber(probePath: string): MediaProber {
  return (inputPath) => probeMedia(inputPath, probePath)
}

export function getAudioStreams(info: MediaInfo): FfprobeStream[] {
  return info.streams.filter((stream) => stream.codec_type === 'audio')
}

/** Container tags worth carrying into an audio file, keyed by audio tag name. */
export function extractAudioMetadata(info: MediaInfo): Record<string, string> {
  const out: Record<string, string> = {}
  const lower = new Map(Object.entries(info.metadata).map(([k, v]) => [k.toLowerCase(), v]))
  for (const [source, target] of Object.entries(AUDIO_TAG_MAP)) {
    const value = lower.get(source)
    if (value !== undefined) out[target] = value
  }
  return out
}
