import { describe, it, expect } from 'vitest'
import { isValidTimecode, secondsToTimecode, timecodeToSeconds } from '../../src/utils/timecode'

describe('timecode', () => {
  it('should parse hours, minutes and fractional seconds', () => {
    expect(timecodeToSeconds('01:02:03.5')).toBe(3723.5)
    expect(timecodeToSeconds('0:00:10')).toBe(10)
  })

  it('should reject malformed values', () => {
    expect(isValidTimecode('1:2:3')).toBe(false)
    expect(isValidTimecode('00:60:00')).toBe(false)
    expect(isValidTimecode('00:00:10.1234')).toBe(false)
    expect(() => timecodeToSeconds('1:2:3')).toThrow('Invalid time format: 1:2:3')
  })

  it('should format seconds as HH:MM:SS.cc', () => {
    expect(secondsToTimecode(3723.5)).toBe('01:02:03.50')
    expect(secondsToTimecode(59.999)).toBe('00:00:59.99')
    expect(secondsToTimecode(-5)).toBe('00:00:00.00')
  })
})
