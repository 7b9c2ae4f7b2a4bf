#!/usr/bin/env node
import { readFileSync } from 'fs'
import { Command, InvalidArgumentError } from 'commander'
import { APP_NAME, APP_VERSION, DISC_TYPES, DRIVE_MODES, type DiscType, type DriveMode } from '../shared/constants'
import { loadRipConfig } from './config'
import { initDatabase, closeDatabase } from './database/connection'
import { createDrive, listDrives } from './database/queries/drives'
import { createJob, getJob, setManualStart } from './database/queries/jobs'
import { getAllSettings, setSetting } from './database/queries/settings'
import { listTracks } from './database/queries/tracks'
import { MakeMKVService } from './services/makemkv'
import { createDatabaseCollaborators, toRipJob, type RipJob } from './services/makemkv/collaborators'
import { decodeLines } from './services/makemkv/decoder'
import { RipperError } from './services/makemkv/errors'
import { runRipJob } from './services/rip-job'
import { isLogLevel, setLogLevel } from './util/logger'

const program = new Command()

function parseId(value: string): number {
  const id = Number.parseInt(value, 10)
  if (Number.isNaN(id) || id <= 0) throw new InvalidArgumentError('Expected a positive integer.')
  return id
}

function parseChoice<T extends string>(choices: readonly T[]) {
  return (value: string): T => {
    const match = choices.find(choice => choice === value)
    if (!match) throw new InvalidArgumentError(`Expected one of: ${choices.join(', ')}.`)
    return match
  }
}

function openDatabase(): void {
  initDatabase(program.opts<{ db?: string }>().db)
  const level = getAllSettings()['general.log_level']
  if (level && isLogLevel(level) && !program.opts<{ logLevel?: string }>().logLevel) setLogLevel(level)
}

function loadJob(id: number): RipJob {
  const row = getJob(id)
  if (!row) throw new RipperError(`Job ${id} not found`, 'JOB_NOT_FOUND', { details: { jobId: id } })
  return toRipJob(row)
}

function createService(): MakeMKVService {
  return new MakeMKVService({ config: loadRipConfig(), collaborators: createDatabaseCollaborators() })
}

program
  .name(APP_NAME)
  .description('Drive makemkvcon in robot mode: scan discs, record titles and rip them.')
  .version(APP_VERSION)
  .option('--db <path>', 'SQLite database path (defaults to $RIPPER_DB_PATH or ~/.ripper-core/data)')
  .option('--log-level <level>', 'debug | info | warn | error | critical')
  .hook('preAction', () => {
    const level = program.opts<{ logLevel?: string }>().logLevel
    if (level === undefined) return
    if (!isLogLevel(level)) throw new InvalidArgumentError(`Unknown log level '${level}'.`)
    setLogLevel(level)
  })

program
  .command('decode')
  .description('Decode a captured robot-mode log and print one record per line as JSON.')
  .argument('<file>', 'File holding makemkvcon --robot output')
  .action((file: string) => {
    const report = decodeLines(readFileSync(file, 'utf-8').split('\n'))
    for (const { type, record } of report.records) {
      console.log(`${type} ${JSON.stringify(record)}`)
    }
    for (const failure of report.failures) {
      console.error(`line ${failure.line}: ${failure.error}`)
    }
    if (report.failures.length > 0) process.exitCode = 1
  })

const job = program.command('job').description('Manage ripping jobs.')

job
  .command('add')
  .description('Create a job for the disc in a drive.')
  .requiredOption('--title <title>', 'Job title')
  .requiredOption('--devpath <path>', 'Drive device path, e.g. /dev/sr0')
  .option('--disc-type <type>', DISC_TYPES.join(' | '), parseChoice<DiscType>(DISC_TYPES), 'unknown')
  .action((opts: { title: string; devpath: string; discType: DiscType }) => {
    openDatabase()
    const row = createJob({ title: opts.title, devpath: opts.devpath, disc_type: opts.discType })
    console.log(`Created job ${row.id}`)
  })

job
  .command('start')
  .description('Mark a manual job as ready to rip the chosen tracks.')
  .argument('<jobId>', 'Job id', parseId)
  .action((jobId: number) => {
    openDatabase()
    loadJob(jobId)
    setManualStart(jobId, true)
  })

job
  .command('tracks')
  .description('List the tracks recorded for a job.')
  .argument('<jobId>', 'Job id', parseId)
  .action((jobId: number) => {
    openDatabase()
    for (const track of listTracks(jobId)) {
      console.log(`#${track.track_number}\t${track.length}s\t${track.aspect_ratio}\t${track.fps}\t${track.process ? 'rip' : 'skip'}\t${track.filename}`)
    }
  })

const drive = program.command('drive').description('Manage the drive registry.')

drive
  .command('add')
  .description('Register a drive mount path.')
  .argument('<mount>', 'Device path, e.g. /dev/sr0')
  .option('--name <name>', 'Display name', '')
  .option('--mode <mode>', DRIVE_MODES.join(' | '), parseChoice<DriveMode>(DRIVE_MODES), 'auto')
  .action((mount: string, opts: { name: string; mode: DriveMode }) => {
    openDatabase()
    const row = createDrive({ mount, name: opts.name, mode: opts.mode })
    console.log(`Registered ${row.mount} (${row.mode})`)
  })

drive
  .command('list')
  .description('List registered drives with their MakeMKV disc index.')
  .action(() => {
    openDatabase()
    for (const row of listDrives()) {
      console.log(`${row.mount}\t${row.mode}\tdisc:${row.mdisc ?? '-'}\t${row.name}`)
    }
  })

drive
  .command('scan')
  .description('Query makemkvcon for attached drives and store their disc indexes.')
  .argument('<jobId>', 'Job whose status tracks the query', parseId)
  .action(async (jobId: number) => {
    openDatabase()
    await createService().registerDriveIndexes(loadJob(jobId))
  })

program
  .command('scan')
  .description('Record the titles on the disc of a job.')
  .argument('<jobId>', 'Job id', parseId)
  .action(async (jobId: number) => {
    openDatabase()
    const service = createService()
    const ripJob = loadJob(jobId)
    const collaborators = createDatabaseCollaborators()
    if (collaborators.drives.getDiscIndex(ripJob.devpath) === null) {
      await service.registerDriveIndexes(ripJob)
    }
    const index = collaborators.drives.getDiscIndex(ripJob.devpath)
    if (index === null) {
      throw new RipperError(`makemkvcon does not see a disc in ${ripJob.devpath}`, 'NO_DISC_INDEX')
    }
    const tracks = await service.getTrackInfo(ripJob, index)
    console.log(`Recorded ${tracks.length} tracks`)
  })

program
  .command('rip')
  .description('Rip the disc of a job with the configured method.')
  .argument('<jobId>', 'Job id', parseId)
  .argument('<rawPath>', 'Output directory')
  .action(async (jobId: number, rawPath: string) => {
    openDatabase()
    const outcome = await runRipJob(createService(), jobId, rawPath)
    if (outcome === 'abandoned') {
      console.log(`Job ${jobId} abandoned`)
      process.exitCode = 1
    }
  })

program
  .command('settings')
  .description('Show all settings, or set one.')
  .argument('[key]', 'Setting key, e.g. rip.min_length')
  .argument('[value]', 'New value')
  .action((key: string | undefined, value: string | undefined) => {
    openDatabase()
    if (key !== undefined && value !== undefined) {
      setSetting(key, value)
      return
    }
    for (const [k, v] of Object.entries(getAllSettings())) {
      if (key === undefined || k === key) console.log(`${k}=${v}`)
    }
  })

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv)
  } catch (error) {
    const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error)
    console.error(message)
    process.exitCode = 1
  } finally {
    closeDatabase()
  }
}

void main()
