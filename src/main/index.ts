export * from './services/makemkv/records'
export * from './services/makemkv/errors'
export { parseContent, stripQuotes, UNLIMITED } from './services/makemkv/tokenizer'
export { parseLine, decodeLines, type DecodeFailure, type DecodeReport } from './services/makemkv/decoder'
export { checkMessage } from './services/makemkv/classifier'
export { run, drain, resolveMakeMKVPath, ROBOT_FLAGS, type RunOptions } from './services/makemkv/runner'
export { waitForProcessSlot, type ProcessCounter, type Sleep, type ThrottleOptions } from './services/makemkv/throttle'
export {
  aggregateTracks,
  convertToSeconds,
  extractFilename,
  finishTrackInfo,
  stepTrackInfo,
  INITIAL_TRACK_STATE,
  type TrackAccumulator,
  type TrackDescriptor,
  type TrackEvent,
  type TrackStep
} from './services/makemkv/track-info'
export {
  createDatabaseCollaborators,
  toRipJob,
  type DriveRegistry,
  type JobStateSink,
  type Notifier,
  type RipCollaborators,
  type RipJob,
  type TrackSink
} from './services/makemkv/collaborators'
export { MakeMKVService, ALL_DISCS, type InfoOptions, type MakeMKVServiceOptions } from './services/makemkv'
export { runRipJob, type RipJobOutcome } from './services/rip-job'
export { loadRipConfig, splitArgs, type RipConfig } from './config'
export { initDatabase, closeDatabase } from './database/connection'
export { addLogListener, createLogger, setLogLevel, type LogEntry, type LogLevel } from './util/logger'
