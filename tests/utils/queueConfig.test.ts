import { describe, it, expect } from 'vitest'
import { ConfigError, loadSchedulerConfig } from '../../src/utils/queueConfig'

describe('loadSchedulerConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadSchedulerConfig({})).toEqual({
      maxConcurrentJobs: 4,
      pollIntervalMs: 100,
      overwritePolicy: 'unique',
      retryAttempts: 0,
      retryBackoffBaseMs: 2000,
      stallTimeoutMs: 90000,
      stopTimeoutMs: 30000,
      transcoderPath: undefined,
      probePath: undefined,
    })
  })

  it('should read values from the environment', () => {
    const config = loadSchedulerConfig({
      MAX_CONCURRENT_JOBS: '2',
      OVERWRITE_POLICY: 'skip',
      RETRY_ATTEMPTS: '3',
      FFMPEG_PATH: ' /opt/ffmpeg/bin/ffmpeg ',
    })
    expect(config.maxConcurrentJobs).toBe(2)
    expect(config.overwritePolicy).toBe('skip')
    expect(config.retryAttempts).toBe(3)
    expect(config.transcoderPath).toBe('/opt/ffmpeg/bin/ffmpeg')
  })

  it('should treat blank variables as unset', () => {
    expect(loadSchedulerConfig({ MAX_CONCURRENT_JOBS: '  ', FFPROBE_PATH: '' }).maxConcurrentJobs).toBe(4)
  })

  it('should report invalid variables', () => {
    try {
      loadSchedulerConfig({ MAX_CONCURRENT_JOBS: 'lots', OVERWRITE_POLICY: 'merge' })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError)
      if (err instanceof ConfigError) {
        expect(err.issues).toHaveLength(2)
        expect(err.issues[0]).toMatch(/^MAX_CONCURRENT_JOBS: /)
        expect(err.issues[1]).toMatch(/^OVERWRITE_POLICY: /)
      }
    }
  })

  it('should apply overrides over the environment', () => {
    const config = loadSchedulerConfig({ MAX_CONCURRENT_JOBS: '8' }, { maxConcurrentJobs: 1, pollIntervalMs: undefined })
    expect(config.maxConcurrentJobs).toBe(1)
    expect(config.pollIntervalMs).toBe(100)
  })

  it('should validate overrides', () => {
    expect(() => loadSchedulerConfig({}, { maxConcurrentJobs: 0 })).toThrow(
      'Invalid scheduler configuration: maxConcurrentJobs: must be a positive integer'
    )
    expect(() => loadSchedulerConfig({}, { pollIntervalMs: 0 })).toThrow(ConfigError)
  })
})
