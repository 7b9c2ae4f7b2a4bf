import Database from 'better-sqlite3'
import { homedir } from 'os'
import { dirname, join } from 'path'
import { existsSync, mkdirSync } from 'fs'
import { DEFAULT_SETTINGS } from '../../shared/constants'
import { createLogger } from '../util/logger'

const log = createLogger('database')

let db: Database.Database | null = null

export const IN_MEMORY = ':memory:'

export function getDb(): Database.Database {
  if (!db) throw new Error('Database not initialized')
  return db
}

export function defaultDatabasePath(): string {
  return process.env.RIPPER_DB_PATH || join(homedir(), '.ripper-core', 'data', 'ripper-core.db')
}

export function initDatabase(dbPath: string = defaultDatabasePath()): Database.Database {
  if (dbPath !== IN_MEMORY) {
    const dbDir = dirname(dbPath)
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true })
    }
  }

  closeDatabase()
  db = new Database(dbPath)

  if (dbPath !== IN_MEMORY) {
    // readers see job state while a rip writes it
    db.pragma('journal_mode = WAL')
  }
  db.pragma('foreign_keys = ON')

  runMigrations()
  seedDefaultSettings()
  return db
}

export function closeDatabase(): void {
  if (db) {
    db.close()
    db = null
  }
}

function runMigrations(): void {
  const database = getDb()

  database.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const applied = new Set(
    (database.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>)
      .map(row => row.name)
  )

  const insertMigration = database.prepare('INSERT INTO _migrations (name) VALUES (?)')

  for (const migration of getInlineMigrations()) {
    if (!applied.has(migration.name)) {
      database.exec(migration.sql)
      insertMigration.run(migration.name)
      log.debug(`Applied migration: ${migration.name}`)
    }
  }
}

function getInlineMigrations(): Array<{ name: string; sql: string }> {
  return [
    {
      name: '001_create_jobs',
      sql: `
        CREATE TABLE IF NOT EXISTS jobs (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          title TEXT NOT NULL,
          devpath TEXT NOT NULL,
          disc_type TEXT NOT NULL DEFAULT 'unknown' CHECK(disc_type IN ('bluray', 'dvd', 'music', 'data', 'unknown')),
          status TEXT NOT NULL DEFAULT 'active' CHECK(status IN ('active', 'video_waiting', 'video_info', 'video_ripping', 'success', 'fail')),
          no_of_titles INTEGER,
          manual_start INTEGER NOT NULL DEFAULT 0,
          error_message TEXT,
          created_at TEXT NOT NULL DEFAULT (datetime('now')),
          updated_at TEXT NOT NULL DEFAULT (datetime('now'))
        );
        CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
      `
    },
    {
      name: '002_create_tracks',
      sql: `
        CREATE TABLE IF NOT EXISTS tracks (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          job_id INTEGER NOT NULL REFERENCES jobs(id),
          track_number INTEGER NOT NULL,
          length INTEGER NOT NULL DEFAULT 0,
          aspect_ratio TEXT NOT NULL DEFAULT '',
          fps TEXT NOT NULL DEFAULT '0',
          main_feature INTEGER NOT NULL DEFAULT 0,
          source TEXT NOT NULL,
          filename TEXT NOT NULL DEFAULT '',
          process INTEGER NOT NULL DEFAULT 0,
          ripped INTEGER NOT NULL DEFAULT 0,
          created_at TEXT NOT NULL DEFAULT (datetime('now'))
        );
        CREATE INDEX IF NOT EXISTS idx_tracks_job ON tracks(job_id);
      `
    },
    {
      name: '003_create_drives',
      sql: `
        CREATE TABLE IF NOT EXISTS drives (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          mount TEXT NOT NULL,
          name TEXT NOT NULL DEFAULT '',
          mdisc INTEGER,
          mode TEXT NOT NULL DEFAULT 'auto' CHECK(mode IN ('auto', 'manual')),
          updated_at TEXT NOT NULL DEFAULT (datetime('now'))
        );
        CREATE INDEX IF NOT EXISTS idx_drives_mount ON drives(mount);
      `
    },
    {
      name: '004_create_settings',
      sql: `
        CREATE TABLE IF NOT EXISTS settings (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL,
          category TEXT NOT NULL DEFAULT 'general',
          updated_at TEXT NOT NULL DEFAULT (datetime('now'))
        );
        CREATE INDEX IF NOT EXISTS idx_settings_category ON settings(category);
      `
    }
  ]
}

function seedDefaultSettings(): void {
  const database = getDb()
  const insert = database.prepare(`
    INSERT OR IGNORE INTO settings (key, value, category) VALUES (?, ?, ?)
  `)

  const insertMany = database.transaction(() => {
    for (const [key, { value, category }] of Object.entries(DEFAULT_SETTINGS)) {
      insert.run(key, value, category)
    }
  })

  insertMany()
}
