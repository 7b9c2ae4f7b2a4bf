import { createLogger } from '../../util/logger'

const log = createLogger('makemkv')

interface RipperErrorOptions {
  cause?: unknown
  details?: Record<string, unknown>
}

export class RipperError extends Error {
  readonly code: string
  readonly details?: Record<string, unknown>

  constructor(message: string, code: string, options: RipperErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = new.target.name
    this.code = code
    if (options.details !== undefined) {
      this.details = options.details
    }
  }
}

/** A stdout line of makemkvcon that cannot be decoded */
export class MakeMKVParserError extends RipperError {
  constructor(message: string, options: RipperErrorOptions = {}, code = 'PARSE') {
    super(message, code, options)
  }
}

/** An error message record was requested for a message with fewer than two parameters */
export class MalformedErrorMessageError extends MakeMKVParserError {
  constructor(messageCode: number, params: readonly string[]) {
    super(
      `Message ${messageCode} has ${params.length} parameter(s), an error message needs at least 2`,
      { details: { messageCode, params: [...params] } },
      'MALFORMED_ERROR_MESSAGE'
    )
  }
}

/**
 * makemkvcon exited non-zero, or exited cleanly but left lines that could not be parsed.
 * `output` holds those lines joined with newlines.
 */
export class MakeMKVRuntimeError extends RipperError {
  readonly returnCode: number | null
  readonly command: string[]
  readonly output: string

  constructor(returnCode: number | null, command: string[], output = '') {
    super(`Call to MakeMKV failed with code: ${returnCode}`, 'RUNTIME', {
      details: { returnCode }
    })
    this.returnCode = returnCode
    this.command = command
    this.output = output

    log.debug(`MakeMKV command: '${command.join(' ')}'`)
    if (output) log.debug(`MakeMKV output: ${output}`)
    log.error(this.message)
  }
}
