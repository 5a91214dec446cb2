import { describe, it, expect } from 'vitest'
import { FALLBACK_FILENAME, MAX_FILENAME_LENGTH, sanitizeFilename } from '../../src/utils/sanitizeFilename'

describe('sanitizeFilename', () => {
  it('should replace characters filesystems reject', () => {
    expect(sanitizeFilename('a<b>c:d"e|f?g*h.mp3')).toBe('a_b_c_d_e_f_g_h.mp3')
    expect(sanitizeFilename('x\x01y.wav')).toBe('x_y.wav')
  })

  it('should trim leading and trailing whitespace and dots', () => {
    expect(sanitizeFilename('  ..hidden.mp3. ')).toBe('hidden.mp3')
  })

  it('should fall back when nothing is left', () => {
    expect(sanitizeFilename('...')).toBe(FALLBACK_FILENAME)
    expect(sanitizeFilename('   ')).toBe(FALLBACK_FILENAME)
  })

  it('should truncate long names and keep the extension', () => {
    const result = sanitizeFilename(`${'a'.repeat(300)}.mp3`)
    expect(result).toHaveLength(MAX_FILENAME_LENGTH)
    expect(result).toBe(`${'a'.repeat(251)}.mp3`)
  })

  it('should leave ordinary names alone', () => {
    expect(sanitizeFilename('Track 01 (live).flac')).toBe('Track 01 (live).flac')
  })
})
