import { createLogger } from '../../util/logger'
import { findToolPath } from '../../util/platform'
import { runProcess, type RunningProcess } from '../../util/process-runner'
import { parseLine } from './decoder'
import { MakeMKVParserError, MakeMKVRuntimeError } from './errors'
import type { DecodedLine, MakeMKVRecord, OutputType } from './records'

const log = createLogger('makemkv')

export const ROBOT_FLAGS = ['--robot', '--messages=-stdout'] as const

export interface RunOptions {
  /** Configured makemkvcon path; PATH and the fixed install location are tried after it */
  executable?: string | null
  /** Receives the child process handle, e.g. to cancel a long rip */
  onSpawn?: (proc: RunningProcess) => void
}

export function resolveMakeMKVPath(configuredPath?: string | null): string {
  return findToolPath('makemkvcon', configuredPath)
}

/**
 * Run makemkvcon in robot mode and yield the decoded records whose type is in `select`.
 *
 * Lines that cannot be decoded are kept aside. Once the process exits, a non-zero exit code or
 * any kept line raises MakeMKVRuntimeError with those lines as output, even if records were
 * already yielded.
 */
export async function* run(
  options: readonly string[],
  select: readonly OutputType[],
  runOptions: RunOptions = {}
): AsyncGenerator<MakeMKVRecord, void, undefined> {
  const makemkvcon = resolveMakeMKVPath(runOptions.executable)
  const args = [...ROBOT_FLAGS, ...options]
  const cmd = [makemkvcon, ...args]
  const buffer: string[] = []

  log.debug(`command: '${cmd.join(' ')}'`)
  const proc = runProcess({
    command: makemkvcon,
    args,
    onStderr: (line) => log.debug(`MakeMKV stderr: ${line}`)
  })
  log.debug(`PID ${proc.pid}: command: '${cmd.join(' ')}'`)
  runOptions.onSpawn?.(proc)

  let exited = false
  try {
    for await (const rawLine of proc.lines) {
      const line = rawLine.replace(/\r$/, '')
      log.debug(line)
      let decoded: DecodedLine
      try {
        decoded = parseLine(line)
      } catch (err) {
        if (!(err instanceof MakeMKVParserError)) throw err
        log.warn(err.message)
        buffer.push(line)
        continue
      }
      if (select.includes(decoded.type)) {
        yield decoded.record
      }
    }

    const returnCode = await proc.waitForExit()
    exited = true
    if (returnCode !== 0) {
      throw new MakeMKVRuntimeError(returnCode, cmd, buffer.join('\n'))
    }
    if (buffer.length > 0) {
      log.warn(`Cannot parse ${buffer.length} lines: ${buffer.join('\n')}`)
      throw new MakeMKVRuntimeError(returnCode, cmd, buffer.join('\n'))
    }
    log.info('MakeMKV exits gracefully.')
  } finally {
    if (!exited) {
      log.info(`PID ${proc.pid}: sequence abandoned, stopping makemkvcon`)
      proc.kill()
    }
  }
}

/** Run makemkvcon for its side effects, draining every selected record */
export async function drain(
  options: readonly string[],
  select: readonly OutputType[],
  runOptions: RunOptions = {}
): Promise<void> {
  for await (const _record of run(options, select, runOptions)) {
    // records are only logged by the classifier
  }
}
