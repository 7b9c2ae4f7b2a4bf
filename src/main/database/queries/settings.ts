import { DEFAULT_SETTINGS } from '../../../shared/constants'
import { getDb } from '../connection'

export function getSetting(key: string): string | null {
  const row = getDb().prepare('SELECT value FROM settings WHERE key = ?').get(key) as { value: string } | undefined
  return row?.value ?? null
}

export function getAllSettings(): Record<string, string> {
  const rows = getDb().prepare('SELECT key, value FROM settings ORDER BY key').all() as Array<{ key: string; value: string }>
  const result: Record<string, string> = {}
  for (const row of rows) {
    result[row.key] = row.value
  }
  return result
}

export function setSetting(key: string, value: string): void {
  getDb().prepare(`
    INSERT INTO settings (key, value, category, updated_at)
    VALUES (?, ?, ?, datetime('now'))
    ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
  `).run(key, value, key.split('.')[0])
}

/** Integer setting; falls back to the seeded default when the stored value is not a number */
export function getIntSetting(key: string): number {
  const parsed = Number.parseInt(getSetting(key) ?? '', 10)
  if (!Number.isNaN(parsed)) return parsed
  return Number.parseInt(DEFAULT_SETTINGS[key]?.value ?? '0', 10)
}

export function getBoolSetting(key: string): boolean {
  return (getSetting(key) ?? DEFAULT_SETTINGS[key]?.value) === 'true'
}
