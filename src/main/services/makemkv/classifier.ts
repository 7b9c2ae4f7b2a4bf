import { createLogger, type LogLevel } from '../../util/logger'
import { MalformedErrorMessageError } from './errors'
import { MessageID, type ErrorMessage, type Message } from './records'

const log = createLogger('makemkv')

export const ERROR_MESSAGE_OPERATION_RESULT = 'Internal error - Operation result is incorrect (132)'
export const ERROR_MESSAGE_TRAY_OPEN = 'Scsi error - NOT READY:MEDIUM NOT PRESENT - TRAY OPEN'
export const ERROR_MESSAGE_MEDIUM_ERROR = 'Scsi error - MEDIUM ERROR:L-EC UNCORRECTABLE ERROR'
export const ERROR_MESSAGE_HARDWARE_ERROR = 'Scsi error - HARDWARE ERROR:441E'
export const ERROR_MESSAGE_NO_SUCH_FILE = 'Posix error - No such file or directory'

interface ReadErrorTriage {
  level: LogLevel
  note: string
}

const READ_ERROR_MAP: ReadonlyMap<string, ReadErrorTriage> = new Map([
  [ERROR_MESSAGE_OPERATION_RESULT, { level: 'critical', note: 'error possibly fatal, creating zombie processes' }],
  [ERROR_MESSAGE_TRAY_OPEN, { level: 'info', note: 'error mostly non fatal' }],
  [ERROR_MESSAGE_MEDIUM_ERROR, { level: 'critical', note: 'error possibly fatal, medium removed during mkv backup' }],
  [ERROR_MESSAGE_HARDWARE_ERROR, { level: 'critical', note: 'error possibly fatal, medium removed during mkv backup' }]
])

const LOG_ONLY_CODES: ReadonlyMap<number, LogLevel> = new Map<number, LogLevel>([
  [MessageID.RIP_DISC_OPEN_ERROR, 'info'],
  [MessageID.RIP_TITLE_ERROR, 'warn'],
  [MessageID.RIP_COMPLETED, 'info'],
  [MessageID.LIBMKV_TRACE, 'warn'],
  [MessageID.RIP_BACKUP_FAILED_PRE, 'warn'],
  [MessageID.EVALUATION_PERIOD_EXPIRED_INFO, 'warn']
])

const SPECIAL_ERROR_CODES: ReadonlySet<number> = new Set([
  MessageID.EVALUATION_PERIOD_EXPIRED_SHAREWARE,
  MessageID.RIP_BACKUP_FAILED
])

/**
 * Promote a message to an error message. The first parameter becomes the error text.
 * @throws MalformedErrorMessageError when the message has fewer than two parameters
 */
export function toErrorMessage(message: Message): ErrorMessage {
  if (message.params.length < 2) {
    throw new MalformedErrorMessageError(message.code, message.params)
  }
  const [errorText, ...params] = message.params
  return { ...message, kind: 'error-message', errorText, params }
}

function readError(message: Message): ErrorMessage {
  const error = toErrorMessage(message)
  const triage = READ_ERROR_MAP.get(error.errorText)
  if (triage) {
    log.debug(triage.note)
    log[triage.level](message.text)
  } else {
    log.warn(error.errorText)
  }
  return error
}

function writeError(message: Message): ErrorMessage {
  const error = toErrorMessage(message)
  if (error.errorText === ERROR_MESSAGE_NO_SUCH_FILE) {
    log.critical(message.text)
  } else {
    log.warn(error.errorText)
  }
  return error
}

/**
 * Triage a decoded MSG line by its code. Checked in order:
 * read error, write error, special error codes, log-only codes, everything else.
 */
export function checkMessage(message: Message): Message | ErrorMessage {
  const { code } = message

  if (code === MessageID.READ_ERROR) return readError(message)

  if (code === MessageID.WRITE_ERROR) return writeError(message)

  if (SPECIAL_ERROR_CODES.has(code)) return toErrorMessage(message)

  const level = LOG_ONLY_CODES.get(code)
  if (level) {
    log[level](message.text)
    return message
  }

  return message
}
