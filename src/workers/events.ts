import { EventEmitter } from 'events'
import type pino from 'pino'
import type { JobResult, JobStatus } from '../models/Job'

export type QueueStats = Record<JobStatus | 'total', number>

export interface SchedulerEventMap {
  'job:started': [jobId: string]
  'job:progress': [jobId: string, progress: number]
  'job:completed': [jobId: string, result: JobResult]
  'job:failed': [jobId: string, message: string]
  'job:cancelled': [jobId: string]
  'job:skipped': [jobId: string, reason: string]
  'queue:updated': []
  /** Once per batch of work, when nothing is queued or running any more. */
  'queue:drained': [summary: QueueStats]
  'worker:error': [message: string]
}

export type SchedulerEventName = keyof SchedulerEventMap
export type SchedulerListener<K extends SchedulerEventName> = (...args: SchedulerEventMap[K]) => void

/**
 * Typed publish/subscribe channel between the scheduler and its observers.
 * A throwing listener is logged and does not reach the publisher.
 */
export class SchedulerEvents {
  private readonly emitter = new EventEmitter()

  constructor(private readonly log: pino.Logger) {
    this.emitter.setMaxListeners(0)
  }

  on<K extends SchedulerEventName>(event: K, listener: SchedulerListener<K>): () => void {
    this.emitter.on(event, listener)
    return () => {
      this.emitter.off(event, listener)
    }
  }

  once<K extends SchedulerEventName>(event: K, listener: SchedulerListener<K>): () => void {
    this.emitter.once(event, listener)
    return () => {
      this.emitter.off(event, listener)
    }
  }

  emit<K extends SchedulerEventName>(event: K, ...args: SchedulerEventMap[K]): void {
    try {
      this.emitter.emit(event, ...args)
    } catch (err) {
      this.log.error({ msg: 'Scheduler event listener threw', event, err: err instanceof Error ? err.message : String(err) })
    }
  }
}
