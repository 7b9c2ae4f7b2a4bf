import { describe, expect, it } from 'vitest'
import { parseContent, stripQuotes, UNLIMITED } from '../src/main/services/makemkv/tokenizer'

describe('stripQuotes', () => {
  it('removes one leading and one trailing quote', () => {
    expect(stripQuotes('"abc"')).toBe('abc')
    expect(stripQuotes('""abc""')).toBe('"abc"')
  })

  it('leaves unquoted values alone', () => {
    expect(stripQuotes('abc')).toBe('abc')
    expect(stripQuotes('')).toBe('')
  })
})

describe('parseContent', () => {
  it('splits fixed fields on commas and quoted fields on quote-comma-quote', () => {
    expect(parseContent('6,256,999,0,"BD-Drive","THE TITLE","/dev/sr0"', 4, 2))
      .toEqual(['6', '256', '999', '0', 'BD-Drive', 'THE TITLE', '/dev/sr0'])
  })

  it('keeps commas inside a quoted field', () => {
    expect(parseContent('0,2,0,"Feature, Extended"', 3, 0)).toEqual(['0', '2', '0', 'Feature, Extended'])
  })

  it('splits every quoted boundary when unlimited', () => {
    expect(parseContent('1005,0,1,"a started","%1 started","a"', 3, UNLIMITED))
      .toEqual(['1005', '0', '1', 'a started', '%1 started', 'a'])
  })

  it('returns a single field for a bare value', () => {
    expect(parseContent('12', 0, 0)).toEqual(['12'])
  })

  it('returns what is there when the payload has fewer fixed fields', () => {
    expect(parseContent('1,2', 4, 2)).toEqual(['1', '2'])
  })

  it('splits a quoted value that contains the separator sequence', () => {
    expect(parseContent('0,1,"a","b","c"', 2, 0)).toEqual(['0', '1', 'a","b","c'])
    expect(parseContent('0,1,"a","b"', 2, UNLIMITED)).toEqual(['0', '1', 'a', 'b'])
  })
})
