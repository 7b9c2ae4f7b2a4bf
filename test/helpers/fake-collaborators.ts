import type { DriveMode, JobState } from '../../src/shared/constants'
import type { NewTrack, TrackRow } from '../../src/main/database/queries/tracks'
import type { RipCollaborators, RipJob } from '../../src/main/services/makemkv/collaborators'

export interface FakeState {
  statuses: JobState[]
  titleCounts: number[]
  tracks: TrackRow[]
  discIndexes: Map<string, number>
  driveModes: Map<string, DriveMode>
  notifications: Array<{ jobId: number; title: string; body: string }>
  /** Answers for successive manual start checks; the last one repeats */
  manualStart: boolean[]
  manualChecks: number
}

export function trackRow(id: number, trackNumber: number, length: number, process = false): TrackRow {
  return {
    id,
    job_id: 1,
    track_number: trackNumber,
    length,
    aspect_ratio: '16:9',
    fps: '23.976',
    main_feature: 0,
    source: 'MakeMKV',
    filename: `title_t0${trackNumber}.mkv`,
    process: process ? 1 : 0,
    ripped: 0,
    created_at: '2026-01-01 00:00:00'
  }
}

export function testJob(overrides: Partial<RipJob> = {}): RipJob {
  return { id: 1, title: 'Sample Disc', devpath: '/dev/sr0', discType: 'dvd', ...overrides }
}

export function createFakeCollaborators(initial: Partial<FakeState> = {}): { state: FakeState; collaborators: RipCollaborators } {
  const state: FakeState = {
    statuses: [],
    titleCounts: [],
    tracks: [],
    discIndexes: new Map(),
    driveModes: new Map(),
    notifications: [],
    manualStart: [false],
    manualChecks: 0,
    ...initial
  }

  const toRow = (track: NewTrack): TrackRow => ({
    ...trackRow(state.tracks.length + 1, track.titleId, track.lengthSeconds),
    job_id: track.jobId,
    aspect_ratio: track.aspectRatio,
    fps: track.fps,
    main_feature: track.mainFeature ? 1 : 0,
    source: track.source,
    filename: track.filename
  })

  const collaborators: RipCollaborators = {
    tracks: {
      putTrack: (track) => { state.tracks.push(toRow(track)) },
      listTracks: (jobId) => state.tracks.filter(track => track.job_id === jobId),
      longestTrack: (jobId) => [...state.tracks]
        .filter(track => track.job_id === jobId)
        .sort((a, b) => b.length - a.length)[0],
      setProcess: (trackId, process) => {
        state.tracks = state.tracks.map(track => track.id === trackId ? { ...track, process: process ? 1 : 0 } : track)
      }
    },
    jobs: {
      setStatus: (_jobId, status) => { state.statuses.push(status) },
      setTitleCount: (_jobId, count) => { state.titleCounts.push(count) },
      isManualStart: () => {
        const answer = state.manualStart[Math.min(state.manualChecks, state.manualStart.length - 1)]
        state.manualChecks++
        return answer ?? false
      }
    },
    drives: {
      setDiscIndex: (mount, index) => {
        state.discIndexes.set(mount, index)
        return 1
      },
      getDiscIndex: (mount) => state.discIndexes.get(mount) ?? null,
      getDriveMode: (mount) => state.driveModes.get(mount) ?? 'auto'
    },
    notifier: {
      notify: async (job, title, body) => { state.notifications.push({ jobId: job.id, title, body }) }
    }
  }

  return { state, collaborators }
}
