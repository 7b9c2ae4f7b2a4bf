import { describe, expect, it } from 'vitest'
import { decodeLines, parseLine } from '../src/main/services/makemkv/decoder'
import { MakeMKVParserError, MalformedErrorMessageError } from '../src/main/services/makemkv/errors'

describe('parseLine', () => {
  it('decodes a MSG line into a message', () => {
    const line = 'MSG:1005,0,1,"MakeMKV v1.17.8 linux(x64-release) started","%1 started","MakeMKV v1.17.8 linux(x64-release)"'
    expect(parseLine(line)).toEqual({
      type: 'MSG',
      record: {
        kind: 'message',
        code: 1005,
        flags: 0,
        paramCount: 1,
        text: 'MakeMKV v1.17.8 linux(x64-release) started',
        template: '%1 started',
        params: ['MakeMKV v1.17.8 linux(x64-release)']
      }
    })
  })

  it('decodes a MSG line without parameters', () => {
    const { record } = parseLine('MSG:5011,0,0,"Operation successfully completed","Operation successfully completed"')
    expect(record).toMatchObject({ kind: 'message', code: 5011, paramCount: 0, params: [] })
  })

  it('decodes an unattached drive', () => {
    const { type, record } = parseLine('DRV:6,256,999,0,"","",""')
    expect(type).toBe('DRV')
    expect(record).toEqual({
      kind: 'drive',
      mount: '',
      discLabel: '',
      firmwareName: '',
      mediaFlags: 0,
      enabled: true,
      visibilityCode: 256,
      index: 6,
      loaded: false,
      trayOpen: false,
      attached: false,
      mediaKind: 'Unknown'
    })
  })

  it('decodes a loaded Blu-ray drive', () => {
    const { record } = parseLine('DRV:0,2,999,12,"BD-RE TEST-DRIVE 1.00","SAMPLE_DISC","/dev/sr0"')
    expect(record).toMatchObject({
      kind: 'drive',
      mount: '/dev/sr0',
      discLabel: 'SAMPLE_DISC',
      firmwareName: 'BD-RE TEST-DRIVE 1.00',
      index: 0,
      loaded: true,
      attached: true,
      mediaKind: 'BluRay'
    })
  })

  it('treats an unknown visibility code as not attached', () => {
    const { record } = parseLine('DRV:1,7,999,1,"DVD-DRIVE","","/dev/sr1"')
    expect(record).toMatchObject({ visibilityCode: 7, attached: false, loaded: false, mediaKind: 'Unknown' })
  })

  it('decodes an open tray', () => {
    const { record } = parseLine('DRV:1,1,999,1,"DVD-DRIVE","","/dev/sr1"')
    expect(record).toMatchObject({ trayOpen: true, loaded: false, attached: true, mediaKind: 'DVD' })
  })

  it('decodes title counts', () => {
    expect(parseLine('TCOUNT:12')).toEqual({ type: 'TCOUNT', record: { kind: 'title-count', count: 12 } })
  })

  it('decodes disc, title and stream info', () => {
    expect(parseLine('CINFO:2,0,"Sample Disc"').record)
      .toEqual({ kind: 'disc-info', attributeId: 2, code: 0, value: 'Sample Disc' })
    expect(parseLine('TINFO:3,9,0,"1:30:00"').record)
      .toEqual({ kind: 'title-info', attributeId: 9, code: 0, value: '1:30:00', titleId: 3 })
    expect(parseLine('SINFO:3,1,1,6201,"Video"').record)
      .toEqual({ kind: 'stream-info', attributeId: 1, code: 6201, value: 'Video', titleId: 3, streamId: 1 })
  })

  it('decodes progress records', () => {
    expect(parseLine('PRGV:100,200,65536').record)
      .toEqual({ kind: 'progress-values', current: 100, total: 200, maximum: 65536 })
    expect(parseLine('PRGC:5018,0,"Scanning CD-ROM devices"').record)
      .toEqual({ kind: 'progress-current', code: 5018, operationId: 0, name: 'Scanning CD-ROM devices' })
    expect(parseLine('PRGT:5018,0,"Opening DVD disc"').record)
      .toEqual({ kind: 'progress-total', code: 5018, operationId: 0, name: 'Opening DVD disc' })
  })

  it('classifies read errors into error messages', () => {
    const { record } = parseLine('MSG:2003,0,3,"Error reading","Error \'%1\'","Scsi error - HARDWARE ERROR:441E","/BDMV/STREAM/00001.m2ts","1024"')
    expect(record).toMatchObject({
      kind: 'error-message',
      code: 2003,
      errorText: 'Scsi error - HARDWARE ERROR:441E',
      params: ['/BDMV/STREAM/00001.m2ts', '1024']
    })
  })

  it('rejects a line without a tag separator', () => {
    expect(() => parseLine('garbage')).toThrow(new MakeMKVParserError('No Message Type Detected'))
  })

  it('rejects an unknown tag', () => {
    expect(() => parseLine('FOO:1,2')).toThrow("Cannot parse 'FOO':'1,2'")
  })

  it('rejects the wrong field count', () => {
    expect(() => parseLine('CINFO:1,2')).toThrow(MakeMKVParserError)
    expect(() => parseLine('MSG:1005,0,1,"only text"')).toThrow(MakeMKVParserError)
  })

  it('rejects non-integer numeric fields', () => {
    expect(() => parseLine('TCOUNT:many')).toThrow("'many' is not an integer")
  })

  it('rejects an empty line', () => {
    expect(() => parseLine('')).toThrow('No Message Type Detected')
  })

  it('rejects error messages with too few parameters as parse errors', () => {
    let caught: unknown
    try {
      parseLine('MSG:5080,0,0,"Backup failed","Backup failed"')
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(MalformedErrorMessageError)
    expect(caught).toBeInstanceOf(MakeMKVParserError)
  })
})

describe('decodeLines', () => {
  it('collects records and failures with their line numbers', () => {
    const report = decodeLines(['TCOUNT:2\r', '', 'bogus', 'CINFO:1,6209,"Blu-ray disc"'])
    expect(report.records).toEqual([
      { type: 'TCOUNT', record: { kind: 'title-count', count: 2 } },
      { type: 'CINFO', record: { kind: 'disc-info', attributeId: 1, code: 6209, value: 'Blu-ray disc' } }
    ])
    expect(report.failures).toEqual([{ line: 3, text: 'bogus', error: 'No Message Type Detected' }])
  })
})
