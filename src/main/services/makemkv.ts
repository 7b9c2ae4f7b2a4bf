import { mkdirSync } from 'fs'
import { join } from 'path'
import { TRACK_SOURCE_MAKEMKV, type DriveMode } from '../../shared/constants'
import type { RipConfig } from '../config'
import { createLogger } from '../util/logger'
import type { RunningProcess } from '../util/process-runner'
import type { TrackRow } from '../database/queries/tracks'
import type { RipCollaborators, RipJob } from './makemkv/collaborators'
import { MakeMKVRuntimeError, RipperError } from './makemkv/errors'
import type { Drive, MakeMKVRecord, OutputType } from './makemkv/records'
import { drain, run, type RunOptions } from './makemkv/runner'
import { sleep as defaultSleep, waitForProcessSlot, type ProcessCounter, type Sleep } from './makemkv/throttle'
import { aggregateTracks, type TrackDescriptor } from './makemkv/track-info'

const log = createLogger('makemkv')

/** makemkvcon disc index that scans every drive */
export const ALL_DISCS = 9999
/** Above this maximum length every title is ripped in one run */
export const MAX_LENGTH_RIP_ALL = 99998

export const DEFAULT_INFO_SELECT: readonly OutputType[] = ['MSG', 'TCOUNT', 'DRV']
const TRACK_INFO_SELECT: readonly OutputType[] = ['CINFO', 'SINFO', 'TCOUNT', 'TINFO']

const MANUAL_WAIT_MINUTES = 30

export const RIP_FAILED_TITLE = 'MakeMKV rip failed'
export const RIP_FAILED_BODY = 'MakeMKV did not complete successfully. Check the job log for details.'

export interface InfoOptions {
  select?: readonly OutputType[]
  index?: number
  options?: readonly string[]
}

export interface MakeMKVServiceOptions {
  config: RipConfig
  collaborators: RipCollaborators
  sleep?: Sleep
  countProcesses?: ProcessCounter
}

/** Stored frame rates keep one decimal for whole numbers: 25 becomes '25.0' */
export function formatFps(fps: number): string {
  return Number.isInteger(fps) ? fps.toFixed(1) : String(fps)
}

export class MakeMKVService {
  private activeProcesses = new Map<number, RunningProcess>()
  private readonly config: RipConfig
  private readonly deps: RipCollaborators
  private readonly sleep: Sleep
  private readonly countProcesses?: ProcessCounter

  constructor(options: MakeMKVServiceOptions) {
    this.config = options.config
    this.deps = options.collaborators
    this.sleep = options.sleep ?? defaultSleep
    this.countProcesses = options.countProcesses
  }

  private runOptions(job: RipJob): RunOptions {
    return {
      executable: this.config.makemkvconPath,
      onSpawn: (proc) => this.activeProcesses.set(job.id, proc)
    }
  }

  private async waitForSlot(): Promise<void> {
    await waitForProcessSlot('makemkvcon', this.config.maxConcurrentInfo, {
      pollIntervalMs: this.config.pollIntervalSeconds * 1000,
      countProcesses: this.countProcesses,
      sleep: this.sleep
    })
  }

  /**
   * Throttled `makemkvcon info` query. The job is parked in `video_waiting` while other
   * makemkvcon processes run and is moved back to `video_ripping` once the query is over,
   * whether it finished, failed or was abandoned by the consumer.
   */
  async *info(job: RipJob, opts: InfoOptions = {}): AsyncGenerator<MakeMKVRecord, void, undefined> {
    const select = opts.select ?? DEFAULT_INFO_SELECT
    const index = opts.index ?? ALL_DISCS
    const args = ['info', '--cache=1', ...(opts.options ?? []), `disc:${index}`]
    const { maxConcurrentInfo, infoWaitSeconds } = this.config

    this.deps.jobs.setStatus(job.id, 'video_waiting')
    await this.waitForSlot()
    this.deps.jobs.setStatus(job.id, 'video_info')
    try {
      yield* run(args, select, this.runOptions(job))
    } finally {
      this.activeProcesses.delete(job.id)
      log.info('MakeMKV info exits.')
      this.deps.jobs.setStatus(job.id, 'video_waiting')
      if (maxConcurrentInfo > 0) {
        log.info(`Penalty ${infoWaitSeconds}s`)
        await this.sleep(infoWaitSeconds * 1000)
      }
      await this.waitForSlot()
      this.deps.jobs.setStatus(job.id, 'video_ripping')
    }
  }

  /** Drives makemkvcon currently sees as attached */
  async *getDrives(job: RipJob): AsyncGenerator<Drive, void, undefined> {
    for await (const record of this.info(job, { select: ['DRV'] })) {
      if (record.kind === 'drive' && record.attached) {
        yield record
      }
    }
  }

  /** Store each attached drive's makemkvcon disc index on the drive registry */
  async registerDriveIndexes(job: RipJob): Promise<void> {
    for await (const drive of this.getDrives(job)) {
      const updated = this.deps.drives.setDiscIndex(drive.mount, drive.index)
      log.debug(`${drive.mount} -> disc:${drive.index} (${updated} registry entries)`)
    }
  }

  /** Scan the titles on disc `index` and record them as tracks of `job` */
  async getTrackInfo(job: RipJob, index: number): Promise<TrackDescriptor[]> {
    log.info('Using MakeMKV to get information on all the tracks on the disc. This will take a few minutes...')
    const found: TrackDescriptor[] = []
    const records = this.info(job, { select: TRACK_INFO_SELECT, index })

    for await (const event of aggregateTracks(records)) {
      if (event.type === 'title-count') {
        log.info(`Found ${event.count} titles`)
        this.deps.jobs.setTitleCount(job.id, event.count)
        continue
      }
      const { track } = event
      this.deps.tracks.putTrack({
        jobId: job.id,
        titleId: track.titleId,
        lengthSeconds: track.durationSeconds,
        aspectRatio: track.aspectRatio,
        fps: formatFps(track.framesPerSecond),
        mainFeature: false,
        source: TRACK_SOURCE_MAKEMKV,
        filename: track.filename
      })
      found.push(track)
    }
    return found
  }

  progressLogPath(job: RipJob): string {
    return join(this.config.logPath, 'progress', `${job.id}.log`)
  }

  private prepareProgressLog(job: RipJob): string {
    const path = this.progressLogPath(job)
    mkdirSync(join(this.config.logPath, 'progress'), { recursive: true })
    return path
  }

  private requireDiscIndex(job: RipJob): number {
    const index = this.deps.drives.getDiscIndex(job.devpath)
    if (index === null) {
      throw new RipperError(`No MakeMKV disc index registered for ${job.devpath}`, 'NO_DISC_INDEX', {
        details: { jobId: job.id, devpath: job.devpath }
      })
    }
    return index
  }

  private async runMakeMKV(job: RipJob, args: string[]): Promise<void> {
    try {
      await drain(args, ['MSG'], this.runOptions(job))
    } finally {
      this.activeProcesses.delete(job.id)
    }
  }

  /** Decrypted backup of the whole disc structure into `rawPath` */
  async backup(job: RipJob, rawPath: string): Promise<void> {
    const index = this.requireDiscIndex(job)
    log.info('Backing up disc')
    await this.runMakeMKV(job, [
      'backup',
      '--decrypt',
      ...this.config.mkvArgs,
      `--minlength=${this.config.minLength}`,
      `--progress=${this.prepareProgressLog(job)}`,
      `disc:${index}`,
      rawPath
    ])
  }

  /** Rip a single title to `rawPath` */
  private async ripTitle(job: RipJob, track: TrackRow, rawPath: string): Promise<void> {
    await this.runMakeMKV(job, [
      'mkv',
      ...this.config.mkvArgs,
      `--progress=${this.prepareProgressLog(job)}`,
      `dev:${job.devpath}`,
      String(track.track_number),
      rawPath
    ])
  }

  /**
   * Scan the disc, then rip by the configured route.
   * Returns `rawPath`, or null when a manual job was never started.
   */
  async mkv(job: RipJob, rawPath: string): Promise<string | null> {
    const mode = this.deps.drives.getDriveMode(job.devpath)
    log.info(`Job running in ${mode} mode`)
    await this.getTrackInfo(job, this.requireDiscIndex(job))

    if (this.config.mainFeature) {
      log.info('Trying to find mainfeature')
      const track = this.deps.tracks.longestTrack(job.id)
      if (!track) {
        throw new RipperError(`No tracks found for job ${job.id}`, 'NO_TRACKS', { details: { jobId: job.id } })
      }
      await this.ripMainFeature(job, track, rawPath)
      return rawPath
    }

    if (mode === 'manual') {
      this.deps.jobs.setStatus(job.id, 'video_waiting')
      if (!(await this.manualWait(job))) {
        log.info(`Job ${job.id} was never started, abandoning`)
        await this.deps.notifier.notify(job, 'Job Abandoned', 'No tracks were chosen in time. The job has been abandoned.')
        return null
      }
      this.deps.jobs.setStatus(job.id, 'video_ripping')
      await this.processSingleTracks(job, rawPath, 'manual')
      return rawPath
    }

    if (this.config.maxLength > MAX_LENGTH_RIP_ALL) {
      log.info('Ripping all tracks')
      await this.runMakeMKV(job, [
        'mkv',
        ...this.config.mkvArgs,
        `--progress=${this.prepareProgressLog(job)}`,
        `dev:${job.devpath}`,
        'all',
        rawPath,
        `--minlength=${this.config.minLength}`
      ])
      return rawPath
    }

    await this.processSingleTracks(job, rawPath, 'auto')
    return rawPath
  }

  async ripMainFeature(job: RipJob, track: TrackRow, rawPath: string): Promise<void> {
    log.info(`Processing track #${track.track_number} as mainfeature. Length is ${track.length} seconds`)
    this.deps.tracks.setProcess(track.id, true)
    await this.ripTitle(job, track, rawPath)
  }

  /**
   * Rip tracks one at a time. In auto mode the length window decides which tracks run;
   * in manual mode the stored `process` flags do.
   */
  async processSingleTracks(job: RipJob, rawPath: string, mode: DriveMode): Promise<void> {
    const tracks = this.deps.tracks.listTracks(job.id)
    const { minLength, maxLength } = this.config

    for (const track of tracks) {
      let process = track.process === 1
      if (mode === 'auto') {
        if (track.length < minLength) {
          log.info(`Track #${track.track_number} of ${tracks.length}. Length (${track.length}) is less than minimum length (${minLength}). Skipping`)
          process = false
        } else if (track.length > maxLength) {
          log.info(`Track #${track.track_number} of ${tracks.length}. Length (${track.length}) is greater than maximum length (${maxLength}). Skipping`)
          process = false
        } else {
          process = true
        }
        this.deps.tracks.setProcess(track.id, process)
      }

      if (!process) continue
      log.info(`Processing track #${track.track_number} of ${tracks.length}. Length is ${track.length} seconds.`)
      await this.ripTitle(job, track, rawPath)
    }
  }

  /**
   * Rip the disc in `job`'s drive into `rawPath` with the configured method.
   * Returns `rawPath`, or null when a manual job was abandoned.
   */
  async rip(job: RipJob, rawPath: string): Promise<string | null> {
    log.info(`Starting MakeMKV rip. Method is ${this.config.ripMethod}`)
    if (this.deps.drives.getDiscIndex(job.devpath) === null) {
      log.debug('Storing new MakeMKV disc numbers')
      await this.registerDriveIndexes(job)
    }
    log.info(`MakeMKV disc number: ${this.deps.drives.getDiscIndex(job.devpath)}`)

    const method = this.config.ripMethod
    try {
      if ((method === 'backup' || method === 'backup_dvd') && job.discType === 'bluray') {
        await this.backup(job, rawPath)
        return rawPath
      }
      if (method === 'mkv' || job.discType === 'dvd') {
        return await this.mkv(job, rawPath)
      }
      log.info(`Nothing to rip for method '${method}' on a ${job.discType} disc, passing on MakeMKV`)
      return rawPath
    } catch (err) {
      if (err instanceof MakeMKVRuntimeError) {
        await this.deps.notifier.notify(job, RIP_FAILED_TITLE, RIP_FAILED_BODY)
      }
      throw err
    }
  }

  /**
   * Give the user up to 30 minutes to pick tracks. The job's manual start flag is
   * checked once a minute; reminders go out every 5 minutes and in the last minute.
   */
  async manualWait(job: RipJob): Promise<boolean> {
    await this.deps.notifier.notify(job, 'Manual Mode Activated!', `You have ${MANUAL_WAIT_MINUTES} minutes to choose tracks.`)

    for (let minutesLeft = MANUAL_WAIT_MINUTES; minutesLeft > 0; minutesLeft--) {
      await this.sleep(60_000)
      const started = this.deps.jobs.isManualStart(job.id)
      log.debug(`Job ${job.id}: manual start ${started}, ${minutesLeft} minutes left`)

      if (started) {
        await this.deps.notifier.notify(job, 'The Wait is Over', 'Tracks were chosen, continuing the job.')
        return true
      }
      if (minutesLeft % 5 === 0 && minutesLeft !== MANUAL_WAIT_MINUTES) {
        await this.deps.notifier.notify(job, 'Waiting for input', `Tracks still need to be chosen. You have ${minutesLeft} minutes left.`)
      }
      if (minutesLeft === 1) {
        await this.deps.notifier.notify(job, 'Job about to be cancelled', 'Less than 1 minute left to choose tracks.')
      }
    }
    return false
  }

  cancelJob(jobId: number): boolean {
    const proc = this.activeProcesses.get(jobId)
    if (proc) {
      proc.kill()
      this.activeProcesses.delete(jobId)
      return true
    }
    return false
  }
}
