import { getJob, updateJobStatus } from '../database/queries/jobs'
import { createLogger } from '../util/logger'
import type { MakeMKVService } from './makemkv'
import { toRipJob } from './makemkv/collaborators'
import { RipperError } from './makemkv/errors'

const log = createLogger('rip-job')

export type RipJobOutcome = 'success' | 'abandoned'

/**
 * Rip the disc of a stored job and record how it ended. A failed rip marks the job
 * failed with the error text and rethrows; an abandoned manual job is marked failed.
 */
export async function runRipJob(service: MakeMKVService, jobId: number, rawPath: string): Promise<RipJobOutcome> {
  const row = getJob(jobId)
  if (!row) throw new RipperError(`Job ${jobId} not found`, 'JOB_NOT_FOUND', { details: { jobId } })

  let result: string | null
  try {
    result = await service.rip(toRipJob(row), rawPath)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    log.error(`Job ${jobId} failed: ${message}`)
    updateJobStatus(jobId, 'fail', { error_message: message })
    throw error
  }

  if (result === null) {
    updateJobStatus(jobId, 'fail', { error_message: 'No tracks were chosen in manual mode' })
    return 'abandoned'
  }
  updateJobStatus(jobId, 'success')
  return 'success'
}
