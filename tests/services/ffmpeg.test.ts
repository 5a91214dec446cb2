import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { createConversionParams } from '../../src/models/ConversionParams'
import {
  LOUDNORM_FILTER,
  TranscoderUnavailableError,
  buildAudioFilters,
  buildTranscodeCommand,
  parseExitFromError,
  resolveBinaryPath,
  toArgv,
  verifyTranscoder,
} from '../../src/services/ffmpeg'

describe('buildTranscodeCommand', () => {
  it('should build the default mp3 invocation', () => {
    const command = buildTranscodeCommand('ffmpeg', 'in.mp4', 'out.mp3', createConversionParams())
    expect(toArgv(command)).toEqual([
      'ffmpeg',
      '-y',
      '-i',
      'in.mp4',
      '-map',
      '0:a:0',
      '-c:a',
      'libmp3lame',
      '-q:a',
      '0',
      '-b:a',
      '192k',
      '-ar',
      '44100',
      '-ac',
      '2',
      '-map_metadata',
      '0',
      'out.mp3',
    ])
  })

  it('should drop the bitrate for lossless codecs', () => {
    const command = buildTranscodeCommand('ffmpeg', 'in.mov', 'out.wav', createConversionParams({ outputFormat: 'wav' }))
    expect(command.outputOptions).toEqual(['-map', '0:a:0', '-c:a', 'pcm_s16le', '-ar', '44100', '-ac', '2', '-map_metadata', '0'])
  })

  it('should place trim, stream selection and filters', () => {
    const params = createConversionParams({
      startTime: '00:00:10',
      endTime: '00:01:00',
      streamIndex: 1,
      normalizeLoudness: true,
      normalizePeak: true,
    })
    expect(buildTranscodeCommand('ffmpeg', 'in.mkv', 'out.mp3', params).outputOptions).toEqual([
      '-ss',
      '00:00:10',
      '-to',
      '00:01:00',
      '-map',
      '0:a:1',
      '-c:a',
      'libmp3lame',
      '-q:a',
      '0',
      '-b:a',
      '192k',
      '-ar',
      '44100',
      '-ac',
      '2',
      '-af',
      LOUDNORM_FILTER,
      '-map_metadata',
      '0',
    ])
  })

  it('should honour an explicit codec and bitrate', () => {
    const params = createConversionParams({ outputFormat: 'm4a', bitrate: '256k', sampleRate: 48000, channels: 1 })
    expect(buildTranscodeCommand('ffmpeg', 'in.mp4', 'out.m4a', params).outputOptions).toEqual([
      '-map',
      '0:a:0',
      '-c:a',
      'aac',
      '-b:a',
      '256k',
      '-ar',
      '48000',
      '-ac',
      '1',
      '-map_metadata',
      '0',
    ])
  })
})

describe('buildAudioFilters', () => {
  it('should use peak volume only without loudness normalization', () => {
    expect(buildAudioFilters(createConversionParams({ normalizePeak: true, peakTarget: -3 }))).toEqual(['volume=-3dB'])
    expect(buildAudioFilters(createConversionParams())).toEqual([])
  })
})

describe('parseExitFromError', () => {
  it('should recover exit codes and signals', () => {
    expect(parseExitFromError('ffmpeg exited with code 1: Conversion failed!')).toEqual({ code: 1, signal: null })
    expect(parseExitFromError('ffmpeg was killed with signal SIGKILL')).toEqual({ code: null, signal: 'SIGKILL' })
    expect(parseExitFromError('spawn /nope ENOENT')).toBeUndefined()
  })
})

describe('binary resolution', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ffmpeg-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('should prefer an explicit path only when it exists', () => {
    const binary = path.join(dir, 'ffmpeg')
    fs.writeFileSync(binary, '')
    expect(resolveBinaryPath(binary, 'bundled')).toBe(binary)
    expect(resolveBinaryPath(path.join(dir, 'missing'), 'bundled')).toBe('bundled')
    expect(resolveBinaryPath(undefined, 'bundled')).toBe('bundled')
  })

  it('should report a transcoder that cannot run', async () => {
    await expect(verifyTranscoder(path.join(dir, 'missing'))).rejects.toBeInstanceOf(TranscoderUnavailableError)
  })
})
