import { describe, expect, it } from 'vitest'
import {
  createStreamInfo,
  createTitleInfo,
  MAKEMKV_STREAM_CODE_TYPE_VIDEO,
  StreamAttribute,
  TitleAttribute,
  type MakeMKVRecord
} from '../src/main/services/makemkv/records'
import {
  aggregateTracks,
  convertToSeconds,
  extractFilename,
  finishTrackInfo,
  INITIAL_TRACK_STATE,
  stepTrackInfo,
  type TrackEvent
} from '../src/main/services/makemkv/track-info'

async function* fromArray(records: MakeMKVRecord[]): AsyncGenerator<MakeMKVRecord> {
  yield* records
}

async function collect(records: MakeMKVRecord[]): Promise<TrackEvent[]> {
  const events: TrackEvent[] = []
  for await (const event of aggregateTracks(fromArray(records))) events.push(event)
  return events
}

const filename = (titleId: number, name: string) =>
  createTitleInfo(TitleAttribute.FILENAME, 0, `title_t0${titleId} "${name}" x`, titleId)
const duration = (titleId: number, hms: string) => createTitleInfo(TitleAttribute.DURATION, 0, hms, titleId)
const streamType = (titleId: number, streamId: number, code: number) =>
  createStreamInfo(StreamAttribute.TYPE, code, 'Video', titleId, streamId)
const aspect = (titleId: number, streamId: number, value: string) =>
  createStreamInfo(StreamAttribute.ASPECT, 0, value, titleId, streamId)
const fps = (titleId: number, streamId: number, value: string) =>
  createStreamInfo(StreamAttribute.FPS, 0, value, titleId, streamId)

describe('convertToSeconds', () => {
  it('converts H:MM:SS', () => {
    expect(convertToSeconds('1:30:00')).toBe(5400)
    expect(convertToSeconds('0:00:42')).toBe(42)
    expect(convertToSeconds('12:01:01')).toBe(43261)
  })

  it('returns null for other shapes', () => {
    expect(convertToSeconds('90:00')).toBeNull()
    expect(convertToSeconds('soon')).toBeNull()
  })
})

describe('extractFilename', () => {
  it('takes the first quoted segment', () => {
    expect(extractFilename('pre "movie.mkv" post')).toBe('movie.mkv')
  })

  it('falls back to the raw value', () => {
    expect(extractFilename('movie.mkv')).toBe('movie.mkv')
  })
})

describe('aggregateTracks', () => {
  it('commits title 1 before accumulating title 2', async () => {
    const first = stepTrackInfo(INITIAL_TRACK_STATE, filename(1, 'movie.mkv'))
    const second = stepTrackInfo(first.state, duration(1, '1:30:00'))
    const third = stepTrackInfo(second.state, duration(2, '0:10:00'))

    expect(first.events).toEqual([])
    expect(second.events).toEqual([])
    expect(third.events).toEqual([{
      type: 'track',
      track: { titleId: 1, durationSeconds: 5400, aspectRatio: '', framesPerSecond: 0, filename: 'movie.mkv' }
    }])
    expect(third.state.track).toEqual({ titleId: 2, durationSeconds: 600, aspectRatio: '', framesPerSecond: 0, filename: '' })
  })

  it('reads aspect ratio and frame rate from video streams only', async () => {
    const events = await collect([
      filename(0, 'feature.mkv'),
      duration(0, '2:00:00'),
      streamType(0, 0, MAKEMKV_STREAM_CODE_TYPE_VIDEO),
      aspect(0, 0, '16:9'),
      fps(0, 0, '23.976 (24000/1001)'),
      streamType(0, 1, 6202),
      aspect(0, 1, '4:3'),
      fps(0, 1, '25')
    ])
    expect(events).toEqual([{
      type: 'track',
      track: { titleId: 0, durationSeconds: 7200, aspectRatio: '16:9', framesPerSecond: 23.976, filename: 'feature.mkv' }
    }])
  })

  it('ignores stream attributes that arrive before the stream type', async () => {
    const events = await collect([
      aspect(0, 0, '16:9'),
      streamType(0, 0, MAKEMKV_STREAM_CODE_TYPE_VIDEO),
      fps(0, 0, '29.97')
    ])
    expect(events).toEqual([{
      type: 'track',
      track: { titleId: 0, durationSeconds: 0, aspectRatio: '', framesPerSecond: 29.97, filename: '' }
    }])
  })

  it('does not carry a video stream type over to the next title', async () => {
    const events = await collect([
      streamType(0, 0, MAKEMKV_STREAM_CODE_TYPE_VIDEO),
      aspect(1, 0, '16:9')
    ])
    expect(events.map(event => event.type === 'track' ? event.track.aspectRatio : null)).toEqual(['', ''])
  })

  it('keeps defaults for unreadable values', async () => {
    const events = await collect([
      duration(4, 'n/a'),
      streamType(4, 0, MAKEMKV_STREAM_CODE_TYPE_VIDEO),
      fps(4, 0, 'unknown')
    ])
    expect(events).toEqual([{
      type: 'track',
      track: { titleId: 4, durationSeconds: 0, aspectRatio: '', framesPerSecond: 0, filename: '' }
    }])
  })

  it('passes title counts through in order', async () => {
    const events = await collect([
      { kind: 'title-count', count: 2 },
      duration(0, '0:05:00'),
      duration(1, '0:06:00')
    ])
    expect(events.map(event => event.type === 'track' ? event.track.titleId : `count ${event.count}`))
      .toEqual(['count 2', 0, 1])
  })

  it('yields nothing without title records', async () => {
    expect(await collect([{ kind: 'disc-info', attributeId: 2, code: 0, value: 'Disc' }])).toEqual([])
    expect(finishTrackInfo(INITIAL_TRACK_STATE)).toEqual([])
  })
})
