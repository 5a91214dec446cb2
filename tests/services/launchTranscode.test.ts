import { describe, it, expect, beforeEach, vi } from 'vitest'
import { launchTranscode } from '../../src/services/ffmpeg'
import type { TranscodeCommand } from '../../src/services/ffmpeg'

const fluent = vi.hoisted(() => {
  type Handler = (arg?: unknown) => void

  /** Stand-in for a fluent-ffmpeg command: kill() is a no-op until the process has spawned. */
  class FakeCommand {
    readonly kills: string[] = []
    readonly options: string[] = []
    outputPath = ''
    ran = false
    private spawned = false
    private readonly handlers = new Map<string, Handler>()

    constructor(readonly input: string) {}

    setFfmpegPath(): this {
      return this
    }

    outputOptions(options: string[]): this {
      this.options.push(...options)
      return this
    }

    output(target: string): this {
      this.outputPath = target
      return this
    }

    on(event: string, handler: Handler): this {
      this.handlers.set(event, handler)
      return this
    }

    run(): void {
      this.ran = true
    }

    kill(signal: string): void {
      if (this.spawned) this.kills.push(signal)
    }

    spawn(): void {
      this.spawned = true
      this.emit('start')
    }

    emit(event: string, arg?: unknown): void {
      this.handlers.get(event)?.(arg)
    }
  }

  const created: FakeCommand[] = []
  return {
    created,
    create: (input: string) => {
      const command = new FakeCommand(input)
      created.push(command)
      return command
    },
  }
})

vi.mock('fluent-ffmpeg', () => ({ default: fluent.create }))

const command: TranscodeCommand = {
  binary: 'ffmpeg',
  input: 'in.mp4',
  outputOptions: ['-c:a', 'libmp3lame'],
  output: 'out.mp3',
}

describe('launchTranscode', () => {
  beforeEach(() => {
    fluent.created.length = 0
  })

  it('should run the command and forward diagnostic lines', async () => {
    const lines: string[] = []
    const proc = launchTranscode(command, (line) => lines.push(line))
    const [cmd] = fluent.created

    expect(cmd.ran).toBe(true)
    expect(cmd.options).toEqual(['-c:a', 'libmp3lame'])
    expect(cmd.outputPath).toBe('out.mp3')

    cmd.spawn()
    cmd.emit('stderr', 'time=00:00:01.00')
    cmd.emit('end')
    await expect(proc.exited).resolves.toEqual({ code: 0, signal: null })
    expect(lines).toEqual(['time=00:00:01.00'])
  })

  it('should deliver a kill requested before the process has spawned', async () => {
    const proc = launchTranscode(command, () => undefined)
    const [cmd] = fluent.created

    proc.kill('SIGTERM')
    expect(cmd.kills).toEqual([])

    cmd.spawn()
    expect(cmd.kills).toEqual(['SIGTERM'])

    cmd.emit('error', new Error('ffmpeg was killed with signal SIGTERM'))
    await expect(proc.exited).resolves.toEqual({ code: null, signal: 'SIGTERM' })
  })

  it('should signal a running process straight away', () => {
    const proc = launchTranscode(command, () => undefined)
    const [cmd] = fluent.created
    cmd.spawn()
    proc.kill('SIGKILL')
    expect(cmd.kills).toEqual(['SIGKILL'])
  })

  it('should reject when the transcoder fails without an exit status', async () => {
    const proc = launchTranscode(command, () => undefined)
    fluent.created[0].emit('error', new Error('Cannot find ffmpeg'))
    await expect(proc.exited).rejects.toThrow('Cannot find ffmpeg')
  })
})
