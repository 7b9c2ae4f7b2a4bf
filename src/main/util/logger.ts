export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'critical'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export interface LogEntry {
  timestamp: string
  level: LogLevel
  module: string
  message: string
}

export type LogListener = (entry: LogEntry) => void

export type Logger = Record<LogLevel, (message: string, ...args: unknown[]) => void>

let currentLevel: LogLevel = 'info'
const listeners = new Set<LogListener>()

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel)
}

function formatMessage(level: LogLevel, module: string, message: string): string {
  const timestamp = new Date().toISOString()
  return `[${timestamp}] [${level.toUpperCase()}] [${module}] ${message}`
}

function broadcastLog(level: LogLevel, module: string, message: string): void {
  if (listeners.size === 0) return
  const entry: LogEntry = { timestamp: new Date().toISOString(), level, module, message }
  for (const listener of listeners) {
    listener(entry)
  }
}

const CONSOLE_WRITERS: Record<LogLevel, (...data: unknown[]) => void> = {
  debug: (...data) => console.debug(...data),
  info: (...data) => console.log(...data),
  warn: (...data) => console.warn(...data),
  error: (...data) => console.error(...data),
  critical: (...data) => console.error(...data)
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

/**
 * Subscribe to every log entry regardless of the console threshold.
 * Returns the unsubscribe function.
 */
export function addLogListener(listener: LogListener): () => void {
  listeners.add(listener)
  return () => { listeners.delete(listener) }
}

export function createLogger(module: string): Logger {
  const write = (level: LogLevel) => (message: string, ...args: unknown[]) => {
    if (shouldLog(level)) CONSOLE_WRITERS[level](formatMessage(level, module, message), ...args)
    broadcastLog(level, module, message)
  }

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    critical: write('critical')
  }
}
