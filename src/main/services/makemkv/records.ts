import { createLogger } from '../../util/logger'

const log = createLogger('makemkv')

/**
 * MakeMKV output types: the characters before the colon of a robot-mode stdout line.
 */
export const OUTPUT_TYPES = ['DRV', 'MSG', 'CINFO', 'SINFO', 'TCOUNT', 'TINFO', 'PRGV', 'PRGC', 'PRGT'] as const
export type OutputType = (typeof OUTPUT_TYPES)[number]

export function isOutputType(value: string): value is OutputType {
  return OUTPUT_TYPES.some(type => type === value)
}

/** Raw "enabled" column value of a DRV line; currently always 999 */
export const MAKEMKV_UNKNOWN_DRV = 999
export const MAKEMKV_STREAM_CODE_TYPE_VIDEO = 6201

export const MessageID = {
  /** LIBMKV_TRACE: %1 */
  LIBMKV_TRACE: 1002,
  /** %1 started */
  VERSION_INFO: 1005,
  GENERIC_INFO: 1011,
  /** Error '%1' occurred while reading '%2' at offset '%3'. Mostly non-fatal. */
  READ_ERROR: 2003,
  /** Error '%1' occurred while creating '%2'. Mostly fatal. */
  WRITE_ERROR: 2019,
  COMPLEX_MULTIPLEX: 3024,
  TITLE_SKIPPED: 3025,
  TITLE_ADDED: 3028,
  SUBTITLE_SKIPPED_IDENTICAL: 3030,
  AUDIO_SKIPPED_EMPTY: 3034,
  FILE_ADDED: 3307,
  /** Failed to save title %1 to file %2 */
  RIP_TITLE_ERROR: 5003,
  /** %1 titles saved, %2 failed */
  RIP_COMPLETED: 5004,
  RIP_DISC_OPEN_ERROR: 5010,
  RIP_SUMMARY_BEFORE: 5014,
  RIP_SUMMARY_AFTER: 5037,
  EVALUATION_PERIOD_EXPIRED_INFO: 5052,
  EVALUATION_PERIOD_EXPIRED_SHAREWARE: 5055,
  RIP_BACKUP_FAILED: 5080,
  RIP_BACKUP_FAILED_PRE: 5096
} as const

export const StreamAttribute = {
  UNKNOWN: 0,
  TYPE: 1,
  ASPECT: 20,
  FPS: 21
} as const

export const TitleAttribute = {
  DURATION: 9,
  FILENAME: 27
} as const

export const DriveVisible = {
  EMPTY: 0,
  OPEN: 1,
  LOADED: 2,
  LOADING: 3,
  NOT_ATTACHED: 256
} as const

const VISIBILITY_CODES: readonly number[] = Object.values(DriveVisible)

export type MediaKind = 'CD' | 'DVD' | 'BluRay' | 'Unknown'

/** 12 and 28 are both reported for Blu-ray media */
const MEDIA_FLAGS: Record<number, MediaKind> = {
  0: 'CD',
  1: 'DVD',
  12: 'BluRay',
  28: 'BluRay'
}

export interface Drive {
  readonly kind: 'drive'
  /** Device path, e.g. /dev/sr0 */
  readonly mount: string
  readonly discLabel: string
  /** Drive model and firmware; changes on firmware update */
  readonly firmwareName: string
  readonly mediaFlags: number
  readonly enabled: boolean
  readonly visibilityCode: number
  /** MakeMKV disc index */
  readonly index: number
  readonly loaded: boolean
  readonly trayOpen: boolean
  readonly attached: boolean
  readonly mediaKind: MediaKind
}

export interface Message {
  readonly kind: 'message'
  readonly code: number
  readonly flags: number
  readonly paramCount: number
  /** Formatted message text */
  readonly text: string
  /** Unformatted message, e.g. "%1 started" */
  readonly template: string
  readonly params: readonly string[]
}

export interface ErrorMessage extends Omit<Message, 'kind'> {
  readonly kind: 'error-message'
  /** First message parameter; `params` holds the rest */
  readonly errorText: string
}

export interface TitleCount {
  readonly kind: 'title-count'
  readonly count: number
}

export interface DiscInfo {
  readonly kind: 'disc-info'
  readonly attributeId: number
  /** Message code when the value is a constant string */
  readonly code: number
  readonly value: string
}

export interface TitleInfo extends Omit<DiscInfo, 'kind'> {
  readonly kind: 'title-info'
  readonly titleId: number
}

export interface StreamInfo extends Omit<TitleInfo, 'kind'> {
  readonly kind: 'stream-info'
  readonly streamId: number
}

export interface ProgressValues {
  readonly kind: 'progress-values'
  readonly current: number
  readonly total: number
  /** Constant maximum of either progress bar */
  readonly maximum: number
}

export interface ProgressLabel {
  readonly code: number
  readonly operationId: number
  readonly name: string
}

export interface ProgressCurrentLabel extends ProgressLabel {
  readonly kind: 'progress-current'
}

export interface ProgressTotalLabel extends ProgressLabel {
  readonly kind: 'progress-total'
}

export type MakeMKVRecord =
  | Drive
  | Message
  | ErrorMessage
  | TitleCount
  | DiscInfo
  | TitleInfo
  | StreamInfo
  | ProgressValues
  | ProgressCurrentLabel
  | ProgressTotalLabel

export interface DecodedLine {
  type: OutputType
  record: MakeMKVRecord
}

// ─── Constructors ─────────────────────────────────────────────────────
// Argument order follows the record layout, not the wire order.

export function createDrive(
  mount: string,
  discLabel: string,
  firmwareName: string,
  mediaFlags: number,
  enabledRaw: number,
  visibilityCode: number,
  index: number
): Drive {
  let visibility: number = visibilityCode
  if (!VISIBILITY_CODES.includes(visibility)) {
    log.debug(`Undefined Visible Value ${visibilityCode} for drive ${index}`)
    visibility = DriveVisible.NOT_ATTACHED
  }

  const attached = visibility !== DriveVisible.NOT_ATTACHED
  const mediaKind = MEDIA_FLAGS[mediaFlags]
  if (mediaKind === undefined) {
    log.debug(`Undefined Drive Type ${mediaFlags} for drive ${index}`)
  }

  return {
    kind: 'drive',
    mount,
    discLabel,
    firmwareName,
    mediaFlags,
    enabled: enabledRaw === MAKEMKV_UNKNOWN_DRV,
    visibilityCode,
    index,
    loaded: visibility === DriveVisible.LOADED || visibility === DriveVisible.LOADING,
    trayOpen: visibility === DriveVisible.OPEN,
    attached,
    mediaKind: attached ? mediaKind ?? 'Unknown' : 'Unknown'
  }
}

export function createMessage(
  code: number,
  flags: number,
  paramCount: number,
  text: string,
  template: string,
  params: readonly string[]
): Message {
  return { kind: 'message', code, flags, paramCount, text, template, params }
}

export function createDiscInfo(attributeId: number, code: number, value: string): DiscInfo {
  return { kind: 'disc-info', attributeId, code, value }
}

export function createTitleInfo(attributeId: number, code: number, value: string, titleId: number): TitleInfo {
  const { kind: _, ...info } = createDiscInfo(attributeId, code, value)
  return { ...info, kind: 'title-info', titleId }
}

export function createStreamInfo(
  attributeId: number,
  code: number,
  value: string,
  titleId: number,
  streamId: number
): StreamInfo {
  const { kind: _, ...info } = createTitleInfo(attributeId, code, value, titleId)
  return { ...info, kind: 'stream-info', streamId }
}
