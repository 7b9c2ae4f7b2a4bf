import { checkMessage } from './classifier'
import { MakeMKVParserError } from './errors'
import {
  createDiscInfo,
  createDrive,
  createMessage,
  createStreamInfo,
  createTitleInfo,
  isOutputType,
  type DecodedLine,
  type MakeMKVRecord,
  type OutputType
} from './records'
import { parseContent, UNLIMITED } from './tokenizer'

/** [fixed fields, quoted fields] per output type */
const FIELD_LAYOUT: Record<OutputType, readonly [number, number]> = {
  MSG: [3, UNLIMITED],
  TCOUNT: [0, 0],
  DRV: [4, 2],
  CINFO: [2, 0],
  TINFO: [3, 0],
  SINFO: [4, 0],
  PRGV: [2, 0],
  PRGC: [2, 0],
  PRGT: [2, 0]
}

function toInt(type: OutputType, field: string, content: string): number {
  if (!/^-?\d+$/.test(field)) {
    throw new MakeMKVParserError(`Cannot parse '${type}':'${content}': '${field}' is not an integer`)
  }
  return Number(field)
}

function expectFields(type: OutputType, fields: string[], content: string, count: number, open = false): string[] {
  if (open ? fields.length < count : fields.length !== count) {
    throw new MakeMKVParserError(
      `Cannot parse '${type}':'${content}': expected ${open ? 'at least ' : ''}${count} fields, got ${fields.length}`
    )
  }
  return fields
}

function decodeRecord(type: OutputType, content: string): MakeMKVRecord {
  const [fixed, quoted] = FIELD_LAYOUT[type]
  const fields = parseContent(content, fixed, quoted)
  const int = (field: string) => toInt(type, field, content)

  switch (type) {
    case 'MSG': {
      const [code, flags, count, text, template, ...params] = expectFields(type, fields, content, 5, true)
      return checkMessage(createMessage(int(code), int(flags), int(count), text, template, params))
    }
    case 'TCOUNT': {
      const [count] = expectFields(type, fields, content, 1)
      return { kind: 'title-count', count: int(count) }
    }
    case 'DRV': {
      // Wire order is index,visible,enabled,flags,name,disc,mount; the record reads it backwards
      const [mount, disc, name, flags, enabled, visible, index] = expectFields(type, fields, content, 7).reverse()
      return createDrive(mount, disc, name, int(flags), int(enabled), int(visible), int(index))
    }
    case 'CINFO': {
      const [id, code, value] = expectFields(type, fields, content, 3)
      return createDiscInfo(int(id), int(code), value)
    }
    case 'TINFO': {
      const [tid, id, code, value] = expectFields(type, fields, content, 4)
      return createTitleInfo(int(id), int(code), value, int(tid))
    }
    case 'SINFO': {
      const [tid, sid, id, code, value] = expectFields(type, fields, content, 5)
      return createStreamInfo(int(id), int(code), value, int(tid), int(sid))
    }
    case 'PRGV': {
      const [current, total, maximum] = expectFields(type, fields, content, 3)
      return { kind: 'progress-values', current: int(current), total: int(total), maximum: int(maximum) }
    }
    case 'PRGC':
    case 'PRGT': {
      const [code, oid, name] = expectFields(type, fields, content, 3)
      return {
        kind: type === 'PRGC' ? 'progress-current' : 'progress-total',
        code: int(code),
        operationId: int(oid),
        name
      }
    }
    default: {
      const unhandled: never = type
      throw new MakeMKVParserError(`Cannot handle '${String(unhandled)}':'${content}'`)
    }
  }
}

/**
 * Decode one stdout line of `makemkvcon --robot`.
 * MSG lines are triaged by the message classifier before they are returned.
 *
 * @throws MakeMKVParserError for lines without a known type tag or with the wrong field layout
 */
export function parseLine(line: string): DecodedLine {
  const colon = line.indexOf(':')
  if (colon === -1) {
    throw new MakeMKVParserError('No Message Type Detected')
  }
  const tag = line.slice(0, colon)
  const content = line.slice(colon + 1)
  if (!isOutputType(tag)) {
    throw new MakeMKVParserError(`Cannot parse '${tag}':'${content}'`)
  }
  return { type: tag, record: decodeRecord(tag, content) }
}

export interface DecodeFailure {
  /** 1-based line number */
  line: number
  text: string
  error: string
}

export interface DecodeReport {
  records: DecodedLine[]
  failures: DecodeFailure[]
}

/** Decode a captured robot-mode log, collecting undecodable lines instead of stopping at them */
export function decodeLines(lines: Iterable<string>): DecodeReport {
  const report: DecodeReport = { records: [], failures: [] }
  let lineNumber = 0
  for (const raw of lines) {
    lineNumber++
    const text = raw.replace(/\r$/, '')
    if (text === '') continue
    try {
      report.records.push(parseLine(text))
    } catch (err) {
      if (!(err instanceof MakeMKVParserError)) throw err
      report.failures.push({ line: lineNumber, text, error: err.message })
    }
  }
  return report
}
