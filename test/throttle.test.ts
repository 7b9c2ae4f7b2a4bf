import { describe, expect, it, vi } from 'vitest'
import { waitForProcessSlot } from '../src/main/services/makemkv/throttle'
import { countCommandLines } from '../src/main/util/process-runner'

describe('waitForProcessSlot', () => {
  it('does nothing when the ceiling is 0', async () => {
    const countProcesses = vi.fn(async () => 50)
    const sleep = vi.fn(async () => undefined)
    await waitForProcessSlot('makemkvcon', 0, { pollIntervalMs: 1000, countProcesses, sleep })
    expect(countProcesses).not.toHaveBeenCalled()
    expect(sleep).not.toHaveBeenCalled()
  })

  it('returns at once when the count is at the ceiling', async () => {
    const countProcesses = vi.fn(async () => 2)
    const sleep = vi.fn(async () => undefined)
    await waitForProcessSlot('makemkvcon', 2, { pollIntervalMs: 1000, countProcesses, sleep })
    expect(countProcesses).toHaveBeenCalledWith('makemkvcon')
    expect(sleep).not.toHaveBeenCalled()
  })

  it('polls until the count drops to the ceiling', async () => {
    const counts = [4, 3, 1]
    const countProcesses = vi.fn(async () => counts.shift() ?? 0)
    const sleep = vi.fn(async () => undefined)
    await waitForProcessSlot('makemkvcon', 1, { pollIntervalMs: 10_000, countProcesses, sleep })
    expect(countProcesses).toHaveBeenCalledTimes(3)
    expect(sleep.mock.calls).toEqual([[10_000], [10_000]])
  })
})

describe('countCommandLines', () => {
  it('matches bare command names and full executable paths', () => {
    const stdout = [
      'systemd',
      '  makemkvcon',
      '/Applications/MakeMKV.app/Contents/MacOS/makemkvcon',
      'makemkvcon-helper',
      '/usr/bin/makemkv',
      ''
    ].join('\n')
    expect(countCommandLines(stdout, 'makemkvcon')).toBe(2)
  })

  it('counts nothing in empty output', () => {
    expect(countCommandLines('', 'makemkvcon')).toBe(0)
  })
})
