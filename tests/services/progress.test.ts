import { describe, it, expect, vi } from 'vitest'
import { ProgressMonitor, expectedOutputSeconds, parseTimeMarker } from '../../src/services/progress'

const statusLine = (time: string) => `size=    1024kB time=${time} bitrate= 192.0kbits/s speed=41.2x`

describe('parseTimeMarker', () => {
  it('should read the output position', () => {
    expect(parseTimeMarker(statusLine('00:01:30.50'))).toBe(90.5)
    expect(parseTimeMarker(statusLine('100:00:00.00'))).toBe(360000)
  })

  it('should ignore lines without a position', () => {
    expect(parseTimeMarker('Stream #0:1: Audio: aac (LC), 44100 Hz, stereo')).toBeUndefined()
    expect(parseTimeMarker('time=N/A bitrate=N/A')).toBeUndefined()
  })
})

describe('ProgressMonitor', () => {
  it('should report the fraction of the total', () => {
    const sink = vi.fn()
    const monitor = new ProgressMonitor(300, sink)
    const fraction = monitor.feed(statusLine('00:01:30.50'))
    expect(fraction).toBeCloseTo(0.3017, 4)
    expect(sink).toHaveBeenCalledOnce()
  })

  it('should clamp positions past the end', () => {
    const monitor = new ProgressMonitor(60, () => undefined)
    expect(monitor.feed(statusLine('00:01:05.00'))).toBe(1)
  })

  it('should stay silent when the total is unknown', () => {
    const sink = vi.fn()
    const monitor = new ProgressMonitor(0, sink)
    expect(monitor.enabled).toBe(false)
    expect(monitor.feed(statusLine('00:00:10.00'))).toBeUndefined()
    expect(sink).not.toHaveBeenCalled()
  })

  it('should skip unparseable lines', () => {
    const sink = vi.fn()
    expect(new ProgressMonitor(300, sink).feed('Press [q] to stop')).toBeUndefined()
    expect(sink).not.toHaveBeenCalled()
  })
})

describe('expectedOutputSeconds', () => {
  it('should use the trim window when one is set', () => {
    expect(expectedOutputSeconds(300)).toBe(300)
    expect(expectedOutputSeconds(300, 10, 70)).toBe(60)
    expect(expectedOutputSeconds(300, 100)).toBe(200)
  })

  it('should bound the end by the input duration', () => {
    expect(expectedOutputSeconds(300, undefined, 500)).toBe(300)
    expect(expectedOutputSeconds(300, 400)).toBe(0)
  })

  it('should fall back to the window when the duration is unknown', () => {
    expect(expectedOutputSeconds(0, 10, 70)).toBe(60)
    expect(expectedOutputSeconds(0)).toBe(0)
  })
})
