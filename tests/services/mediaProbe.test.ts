import { describe, it, expect } from 'vitest'
import os from 'os'
import path from 'path'
import { extractAudioMetadata, getAudioStreams, probeMedia, toMediaInfo } from '../../src/services/mediaProbe'

describe('toMediaInfo', () => {
  const data = {
    format: { duration: 125.4, tags: { TITLE: 'Night Drive', ALBUMARTIST: 'Placeholder Band', track: 3, encoder: 'Lavf' } },
    streams: [
      { index: 0, codec_type: 'video', codec_name: 'h264' },
      { index: 1, codec_type: 'audio', codec_name: 'aac' },
      { index: 2, codec_type: 'audio', codec_name: 'ac3' },
    ],
    chapters: [],
  }

  it('should carry duration, streams and stringified tags', () => {
    const info = toMediaInfo(data)
    expect(info.duration).toBe(125.4)
    expect(info.streams).toHaveLength(3)
    expect(info.metadata).toEqual({ TITLE: 'Night Drive', ALBUMARTIST: 'Placeholder Band', track: '3', encoder: 'Lavf' })
  })

  it('should report an unknown duration as zero', () => {
    expect(toMediaInfo({ format: {}, streams: [], chapters: [] }).duration).toBe(0)
    expect(toMediaInfo({ format: { duration: Number.NaN }, streams: [], chapters: [] }).duration).toBe(0)
  })

  it('should list audio streams only', () => {
    expect(getAudioStreams(toMediaInfo(data)).map((stream) => stream.index)).toEqual([1, 2])
  })

  it('should map container tags to audio tag names', () => {
    expect(extractAudioMetadata(toMediaInfo(data))).toEqual({
      title: 'Night Drive',
      album_artist: 'Placeholder Band',
      track: '3',
    })
  })
})

describe('probeMedia', () => {
  it('should reject a missing file before running the prober', async () => {
    const missing = path.join(os.tmpdir(), 'no-such-input-file.mp4')
    await expect(probeMedia(missing, 'ffprobe')).rejects.toThrow(`Media file not found: ${missing}`)
  })
})
