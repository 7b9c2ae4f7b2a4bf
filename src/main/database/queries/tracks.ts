import { getDb } from '../connection'

export interface TrackRow {
  id: number
  job_id: number
  track_number: number
  length: number
  aspect_ratio: string
  fps: string
  main_feature: number
  source: string
  filename: string
  process: number
  ripped: number
  created_at: string
}

export interface NewTrack {
  jobId: number
  titleId: number
  lengthSeconds: number
  aspectRatio: string
  fps: string
  mainFeature: boolean
  source: string
  filename: string
}

export function putTrack(track: NewTrack): TrackRow {
  const result = getDb().prepare(`
    INSERT INTO tracks (job_id, track_number, length, aspect_ratio, fps, main_feature, source, filename)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    track.jobId,
    track.titleId,
    track.lengthSeconds,
    track.aspectRatio,
    track.fps,
    track.mainFeature ? 1 : 0,
    track.source,
    track.filename
  )

  return getDb().prepare('SELECT * FROM tracks WHERE id = ?').get(Number(result.lastInsertRowid)) as TrackRow
}

export function listTracks(jobId: number): TrackRow[] {
  return getDb().prepare('SELECT * FROM tracks WHERE job_id = ? ORDER BY track_number ASC, id ASC')
    .all(jobId) as TrackRow[]
}

export function getLongestTrack(jobId: number): TrackRow | undefined {
  return getDb().prepare('SELECT * FROM tracks WHERE job_id = ? ORDER BY length DESC, id ASC LIMIT 1')
    .get(jobId) as TrackRow | undefined
}

export function setTrackProcess(trackId: number, process: boolean): void {
  getDb().prepare('UPDATE tracks SET process = ? WHERE id = ?').run(process ? 1 : 0, trackId)
}
