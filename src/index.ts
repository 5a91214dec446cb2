export { ConversionScheduler } from './workers/scheduler'
export type { SchedulerOptions } from './workers/scheduler'
export { ConversionExecutor } from './workers/executor'
export type { ConversionExecutorOptions, ExecutionHandle, ExecutionHooks, JobExecutor } from './workers/executor'
export type { QueueStats, SchedulerEventMap, SchedulerEventName, SchedulerListener } from './workers/events'

export { ConversionJob, JOB_STATUSES, isTerminalStatus } from './models/Job'
export type { JobErrorCode, JobInit, JobResult, JobSnapshot, JobStatus } from './models/Job'
export { conversionParamsSchema, createConversionParams, defaultCodecFor, parseConversionParams } from './models/ConversionParams'
export type { ConversionParams, ConversionParamsInput } from './models/ConversionParams'

export {
  buildTranscodeCommand,
  launchTranscode,
  resolveProbePath,
  resolveTranscoderPath,
  toArgv,
  TranscoderUnavailableError,
  verifyTranscoder,
} from './services/ffmpeg'
export type { TranscodeCommand, TranscodeExit, TranscodeProcess, TranscoderLauncher } from './services/ffmpeg'
export { extractAudioMetadata, getAudioStreams, probeMedia } from './services/mediaProbe'
export type { MediaInfo, MediaProber } from './services/mediaProbe'
export { ProgressMonitor, parseTimeMarker } from './services/progress'

export { InvalidPolicyError, OVERWRITE_POLICIES, PathExhaustionError, resolveOutputPath } from './utils/outputPath'
export type { OverwritePolicy } from './utils/outputPath'
export { ConfigError, loadSchedulerConfig } from './utils/queueConfig'
export type { SchedulerConfig } from './utils/queueConfig'
export { sanitizeFilename } from './utils/sanitizeFilename'
export { secondsToTimecode, timecodeToSeconds } from './utils/timecode'
