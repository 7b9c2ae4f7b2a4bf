import { createLogger } from '../../util/logger'
import {
  MAKEMKV_STREAM_CODE_TYPE_VIDEO,
  StreamAttribute,
  TitleAttribute,
  type MakeMKVRecord,
  type StreamInfo,
  type TitleInfo
} from './records'

const log = createLogger('makemkv')

export interface TrackDescriptor {
  titleId: number
  durationSeconds: number
  aspectRatio: string
  framesPerSecond: number
  filename: string
}

interface StreamContext {
  streamId: number
  type: number | null
}

/** Fold state for one info query */
export interface TrackAccumulator {
  track: TrackDescriptor | null
  stream: StreamContext | null
}

export type TrackEvent =
  | { type: 'track'; track: TrackDescriptor }
  | { type: 'title-count'; count: number }

export interface TrackStep {
  state: TrackAccumulator
  events: TrackEvent[]
}

export const INITIAL_TRACK_STATE: TrackAccumulator = { track: null, stream: null }

function emptyTrack(titleId: number): TrackDescriptor {
  return { titleId, durationSeconds: 0, aspectRatio: '', framesPerSecond: 0, filename: '' }
}

/** Convert an `H:MM:SS` duration to seconds; null when the value has another shape */
export function convertToSeconds(hms: string): number | null {
  const match = /^(\d+):(\d{1,2}):(\d{1,2})$/.exec(hms.trim())
  if (!match) return null
  const [, hours, minutes, seconds] = match
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds)
}

/** The filename attribute wraps the name in quotes; fall back to the raw value */
export function extractFilename(value: string): string {
  const quoted = value.split('"')
  return quoted.length >= 3 ? quoted[1] : value
}

function applyTitleInfo(track: TrackDescriptor, record: TitleInfo): TrackDescriptor {
  if (record.attributeId === TitleAttribute.FILENAME) {
    return { ...track, filename: extractFilename(record.value) }
  }
  if (record.attributeId === TitleAttribute.DURATION) {
    const seconds = convertToSeconds(record.value)
    if (seconds === null) {
      log.warn(`Title ${record.titleId}: unreadable duration '${record.value}'`)
      return track
    }
    return { ...track, durationSeconds: seconds }
  }
  return track
}

function applyStreamInfo(track: TrackDescriptor, context: StreamContext | null, record: StreamInfo): TrackAccumulator {
  const stream: StreamContext = context?.streamId === record.streamId
    ? context
    : { streamId: record.streamId, type: null }

  if (record.attributeId === StreamAttribute.TYPE) {
    return { track, stream: { ...stream, type: record.code } }
  }
  if (stream.type !== MAKEMKV_STREAM_CODE_TYPE_VIDEO) {
    return { track, stream }
  }
  if (record.attributeId === StreamAttribute.ASPECT) {
    return { track: { ...track, aspectRatio: record.value.trim() }, stream }
  }
  if (record.attributeId === StreamAttribute.FPS) {
    const fps = Number.parseFloat(record.value.trim().split(/\s+/)[0])
    if (Number.isNaN(fps)) {
      log.warn(`Title ${record.titleId}: unreadable frame rate '${record.value}'`)
      return { track, stream }
    }
    return { track: { ...track, framesPerSecond: fps }, stream }
  }
  return { track, stream }
}

/**
 * Fold one record into the accumulator.
 *
 * Title and stream records of a title arrive contiguously, so a record for another title
 * completes the pending track. Title counts pass straight through.
 */
export function stepTrackInfo(state: TrackAccumulator, record: MakeMKVRecord): TrackStep {
  if (record.kind === 'title-count') {
    return { state, events: [{ type: 'title-count', count: record.count }] }
  }
  if (record.kind !== 'title-info' && record.kind !== 'stream-info') {
    return { state, events: [] }
  }

  const events: TrackEvent[] = []
  let { track, stream } = state
  if (!track || track.titleId !== record.titleId) {
    if (track) events.push({ type: 'track', track })
    track = emptyTrack(record.titleId)
    stream = null
  }

  if (record.kind === 'stream-info') {
    return { state: applyStreamInfo(track, stream, record), events }
  }
  return { state: { track: applyTitleInfo(track, record), stream }, events }
}

/** Flush the pending track at the end of the record sequence */
export function finishTrackInfo(state: TrackAccumulator): TrackEvent[] {
  return state.track ? [{ type: 'track', track: state.track }] : []
}

/**
 * Aggregate the records of one info query into one track per title.
 * Each track is yielded once the next title starts or the sequence ends.
 */
export async function* aggregateTracks(records: AsyncIterable<MakeMKVRecord>): AsyncGenerator<TrackEvent, void, undefined> {
  let state = INITIAL_TRACK_STATE
  for await (const record of records) {
    const step = stepTrackInfo(state, record)
    state = step.state
    yield* step.events
  }
  yield* finishTrackInfo(state)
}
