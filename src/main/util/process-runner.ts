import { spawn, execFile, type ChildProcess } from 'child_process'
import { basename } from 'path'
import { createInterface } from 'readline'
import { promisify } from 'util'
import { createLogger } from './logger'

const execFileAsync = promisify(execFile)
const log = createLogger('process-runner')

export interface ProcessOptions {
  command: string
  args: string[]
  cwd?: string
  env?: Record<string, string>
  onStderr?: (line: string) => void
}

export interface RunningProcess {
  pid: number
  process: ChildProcess
  /** Stdout split into lines with terminators removed. Single pass. */
  lines: AsyncIterable<string>
  kill: () => void
  /** Resolves once the process has exited and its stdio has closed; -1 when it never started */
  waitForExit: () => Promise<number | null>
}

export function runProcess(options: ProcessOptions): RunningProcess {
  const { command, args, cwd, env, onStderr } = options

  log.info(`Spawning: ${command} ${args.join(' ')}`)

  const child = spawn(command, args, {
    cwd,
    env: { ...process.env, ...env },
    stdio: ['ignore', 'pipe', 'pipe']
  })

  const reader = createInterface({ input: child.stdout, crlfDelay: Infinity })
  // Created eagerly so lines emitted before the first read are buffered
  const lineIterator = reader[Symbol.asyncIterator]()

  let stderrBuffer = ''
  child.stderr.on('data', (data: Buffer) => {
    stderrBuffer += data.toString()
    const parts = stderrBuffer.split('\n')
    stderrBuffer = parts.pop() || ''
    for (const line of parts) {
      if (line.trim()) onStderr?.(line)
    }
  })

  const exitPromise = new Promise<number | null>((resolve) => {
    let settled = false

    child.on('close', (code, signal) => {
      if (settled) return
      settled = true
      if (stderrBuffer.trim()) onStderr?.(stderrBuffer.trim())
      log.info(`Process exited: code=${code} signal=${signal}`)
      resolve(code)
    })

    child.on('error', (err) => {
      if (settled) return
      settled = true
      log.error(`Process error: ${err.message}`)
      reader.close()
      resolve(-1)
    })
  })

  return {
    pid: child.pid || -1,
    process: child,
    lines: { [Symbol.asyncIterator]: () => lineIterator },
    kill: () => {
      if (child.exitCode === null && !child.killed) {
        child.kill('SIGTERM')
        setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) child.kill('SIGKILL')
        }, 5000).unref()
      }
    },
    waitForExit: () => exitPromise
  }
}

/** Count `ps -o comm=` lines naming `name`; macOS prints the full executable path */
export function countCommandLines(stdout: string, name: string): number {
  return stdout
    .split('\n')
    .map(line => line.trim())
    .filter(comm => comm !== '' && basename(comm) === name)
    .length
}

/** Count running processes whose command name equals `name` */
export async function countProcesses(name: string): Promise<number> {
  const { stdout } = await execFileAsync('ps', ['-A', '-o', 'comm='])
  return countCommandLines(stdout, name)
}
