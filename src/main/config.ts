import { homedir } from 'os'
import { join } from 'path'
import { parse as parseShellWords } from 'shell-quote'
import { RIP_METHODS, type RipMethod } from '../shared/constants'
import { getBoolSetting, getIntSetting, getSetting } from './database/queries/settings'
import { createLogger } from './util/logger'

const log = createLogger('config')

export interface RipConfig {
  /** Configured makemkvcon binary; null searches PATH */
  makemkvconPath: string | null
  /** Ceiling for running makemkvcon processes before an info query starts; 0 disables throttling */
  maxConcurrentInfo: number
  /** Cooldown after an info query, in seconds */
  infoWaitSeconds: number
  pollIntervalSeconds: number
  ripMethod: RipMethod
  /** Extra makemkvcon arguments for backup and mkv runs */
  mkvArgs: string[]
  /** Shortest title to rip in auto mode, in seconds */
  minLength: number
  /** Longest title to rip in auto mode, in seconds; above 99998 the whole disc is ripped in one run */
  maxLength: number
  mainFeature: boolean
  logPath: string
}

/** Expand leading ~ to the user's home directory */
export function expandPath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return join(homedir(), p.slice(1))
  }
  return p
}

/** Split a command-line fragment with shell quoting rules; variables are left as written */
export function splitArgs(value: string): string[] {
  return parseShellWords(value, (name) => `$${name}`)
    .filter((entry): entry is string => typeof entry === 'string')
}

function isRipMethod(value: string): value is RipMethod {
  return RIP_METHODS.some(method => method === value)
}

export function loadRipConfig(): RipConfig {
  const method = getSetting('rip.method') ?? 'mkv'
  if (!isRipMethod(method)) {
    log.warn(`Unknown rip method '${method}', using mkv`)
  }

  return {
    makemkvconPath: getSetting('tools.makemkvcon_path') || null,
    maxConcurrentInfo: getIntSetting('makemkv.max_concurrent_info'),
    infoWaitSeconds: getIntSetting('makemkv.info_wait_time'),
    pollIntervalSeconds: getIntSetting('makemkv.poll_interval'),
    ripMethod: isRipMethod(method) ? method : 'mkv',
    mkvArgs: splitArgs(getSetting('rip.mkv_args') ?? ''),
    minLength: getIntSetting('rip.min_length'),
    maxLength: getIntSetting('rip.max_length'),
    mainFeature: getBoolSetting('rip.main_feature'),
    logPath: expandPath(getSetting('paths.log') ?? '')
  }
}
