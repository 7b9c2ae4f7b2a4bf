import type { DiscType, JobState } from '../../../shared/constants'
import { getDb } from '../connection'

export interface JobRow {
  id: number
  title: string
  devpath: string
  disc_type: DiscType
  status: JobState
  no_of_titles: number | null
  manual_start: number
  error_message: string | null
  created_at: string
  updated_at: string
}

export function getJob(id: number): JobRow | undefined {
  return getDb().prepare('SELECT * FROM jobs WHERE id = ?').get(id) as JobRow | undefined
}

export function listJobs(filters?: { status?: JobState }): JobRow[] {
  if (filters?.status) {
    return getDb().prepare('SELECT * FROM jobs WHERE status = ? ORDER BY created_at DESC, id DESC')
      .all(filters.status) as JobRow[]
  }
  return getDb().prepare('SELECT * FROM jobs ORDER BY created_at DESC, id DESC').all() as JobRow[]
}

export function createJob(data: { title: string; devpath: string; disc_type?: DiscType }): JobRow {
  const result = getDb().prepare(`
    INSERT INTO jobs (title, devpath, disc_type) VALUES (?, ?, ?)
  `).run(data.title, data.devpath, data.disc_type ?? 'unknown')

  const job = getJob(Number(result.lastInsertRowid))
  if (!job) throw new Error(`Job ${result.lastInsertRowid} vanished after insert`)
  return job
}

export function updateJobStatus(id: number, status: JobState, extra?: { error_message?: string }): void {
  const fields = ['status = ?', "updated_at = datetime('now')"]
  const values: unknown[] = [status]

  if (extra?.error_message) {
    fields.push('error_message = ?')
    values.push(extra.error_message)
  }

  values.push(id)
  getDb().prepare(`UPDATE jobs SET ${fields.join(', ')} WHERE id = ?`).run(...values)
}

export function setTitleCount(id: number, count: number): void {
  getDb().prepare("UPDATE jobs SET no_of_titles = ?, updated_at = datetime('now') WHERE id = ?").run(count, id)
}

export function setManualStart(id: number, manualStart: boolean): void {
  getDb().prepare("UPDATE jobs SET manual_start = ?, updated_at = datetime('now') WHERE id = ?")
    .run(manualStart ? 1 : 0, id)
}
