import type { DriveMode } from '../../../shared/constants'
import { getDb } from '../connection'

export interface DriveRow {
  id: number
  mount: string
  name: string
  mdisc: number | null
  mode: DriveMode
  updated_at: string
}

export function listDrives(): DriveRow[] {
  return getDb().prepare('SELECT * FROM drives ORDER BY mount ASC, id ASC').all() as DriveRow[]
}

export function findDrivesByMount(mount: string): DriveRow[] {
  return getDb().prepare('SELECT * FROM drives WHERE mount = ? ORDER BY id ASC').all(mount) as DriveRow[]
}

export function createDrive(data: { mount: string; name?: string; mode?: DriveMode }): DriveRow {
  const result = getDb().prepare('INSERT INTO drives (mount, name, mode) VALUES (?, ?, ?)')
    .run(data.mount, data.name ?? '', data.mode ?? 'auto')
  return getDb().prepare('SELECT * FROM drives WHERE id = ?').get(Number(result.lastInsertRowid)) as DriveRow
}

/** Store the MakeMKV disc index on every registry entry for `mount`; returns the number updated */
export function setDiscIndex(mount: string, index: number): number {
  const result = getDb().prepare("UPDATE drives SET mdisc = ?, updated_at = datetime('now') WHERE mount = ?")
    .run(index, mount)
  return result.changes
}
