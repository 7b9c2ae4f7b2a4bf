import type { DiscType, DriveMode, JobState } from '../../../shared/constants'
import { findDrivesByMount, setDiscIndex } from '../../database/queries/drives'
import { getJob, setTitleCount, updateJobStatus, type JobRow } from '../../database/queries/jobs'
import {
  getLongestTrack,
  listTracks,
  putTrack,
  setTrackProcess,
  type NewTrack,
  type TrackRow
} from '../../database/queries/tracks'
import { notifyJob } from '../notify'

/** The slice of a job the MakeMKV service reads */
export interface RipJob {
  id: number
  title: string
  devpath: string
  discType: DiscType
}

export interface TrackSink {
  putTrack(track: NewTrack): void
  listTracks(jobId: number): TrackRow[]
  longestTrack(jobId: number): TrackRow | undefined
  setProcess(trackId: number, process: boolean): void
}

export interface JobStateSink {
  setStatus(jobId: number, state: JobState): void
  setTitleCount(jobId: number, count: number): void
  /** Re-read the manual start flag from storage */
  isManualStart(jobId: number): boolean
}

export interface Notifier {
  notify(job: RipJob, title: string, body: string): Promise<void>
}

export interface DriveRegistry {
  /** Returns the number of registry entries updated */
  setDiscIndex(mount: string, index: number): number
  getDiscIndex(mount: string): number | null
  getDriveMode(mount: string): DriveMode
}

export interface RipCollaborators {
  tracks: TrackSink
  jobs: JobStateSink
  drives: DriveRegistry
  notifier: Notifier
}

export function createDatabaseCollaborators(): RipCollaborators {
  return {
    tracks: {
      putTrack: (track) => { putTrack(track) },
      listTracks,
      longestTrack: getLongestTrack,
      setProcess: setTrackProcess
    },
    jobs: {
      setStatus: (jobId, state) => updateJobStatus(jobId, state),
      setTitleCount,
      isManualStart: (jobId) => getJob(jobId)?.manual_start === 1
    },
    drives: {
      setDiscIndex,
      getDiscIndex: (mount) => findDrivesByMount(mount)[0]?.mdisc ?? null,
      getDriveMode: (mount) => findDrivesByMount(mount)[0]?.mode ?? 'auto'
    },
    notifier: {
      notify: notifyJob
    }
  }
}

export function toRipJob(row: JobRow): RipJob {
  return { id: row.id, title: row.title, devpath: row.devpath, discType: row.disc_type }
}
