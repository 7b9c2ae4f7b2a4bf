/** Quoted-field count that splits every `","` boundary */
export const UNLIMITED = -1

/** Split on `separator` at most `maxSplit` times from the left; the tail stays whole. */
function splitFromLeft(value: string, separator: string, maxSplit: number): string[] {
  if (maxSplit < 0) return value.split(separator)
  const parts: string[] = []
  let rest = value
  while (parts.length < maxSplit) {
    const at = rest.indexOf(separator)
    if (at === -1) break
    parts.push(rest.slice(0, at))
    rest = rest.slice(at + separator.length)
  }
  parts.push(rest)
  return parts
}

export function stripQuotes(value: string): string {
  let result = value
  if (result.startsWith('"')) result = result.slice(1)
  if (result.endsWith('"')) result = result.slice(0, -1)
  return result
}

/**
 * Split the payload of a robot-mode line (everything after `TAG:`) into fields.
 *
 * The first `fixedFieldCount` comma-separated fields are never quoted. The rest are quoted
 * strings that may contain commas, so they are split on `","` instead, at most
 * `quotedFieldCount` times (negative: every occurrence).
 *
 * A quoted value that itself contains `","` is split in the wrong place. makemkvcon does not
 * document an escape for it.
 *
 * @example
 * parseContent('6,256,999,0,"BD-Drive","THE TITLE","/dev/sr0"', 4, 2)
 * // ['6', '256', '999', '0', 'BD-Drive', 'THE TITLE', '/dev/sr0']
 */
export function parseContent(content: string, fixedFieldCount: number, quotedFieldCount: number): string[] {
  const header = splitFromLeft(content, ',', fixedFieldCount)
  const tail = header.pop() ?? ''
  const quoted = splitFromLeft(tail, '","', quotedFieldCount).map(stripQuotes)
  return [...header, ...quoted]
}
