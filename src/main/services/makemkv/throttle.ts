import { createLogger } from '../../util/logger'
import { countProcesses } from '../../util/process-runner'

const log = createLogger('makemkv')

export type Sleep = (ms: number) => Promise<void>
export type ProcessCounter = (name: string) => Promise<number>

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms))

export interface ThrottleOptions {
  /** Poll interval in milliseconds */
  pollIntervalMs: number
  countProcesses?: ProcessCounter
  sleep?: Sleep
}

/**
 * Wait until at most `maxProcesses` processes named `processName` are running.
 * A ceiling of 0 disables the check.
 *
 * Concurrent `makemkvcon info` runs are known to hang or crash sibling makemkvcon
 * processes. The processes belong to other jobs, so the count is polled.
 */
export async function waitForProcessSlot(
  processName: string,
  maxProcesses: number,
  options: ThrottleOptions
): Promise<void> {
  if (maxProcesses <= 0) return
  const count = options.countProcesses ?? countProcesses
  const pause = options.sleep ?? sleep

  for (;;) {
    const running = await count(processName)
    if (running <= maxProcesses) return
    log.info(`${running} ${processName} processes running (max ${maxProcesses}), waiting ${options.pollIntervalMs / 1000}s`)
    await pause(options.pollIntervalMs)
  }
}
