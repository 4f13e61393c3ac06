import { LOG_LEVEL } from './config'

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 } as const

export type LogLevel = keyof typeof LEVELS

export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, v)
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (raw == null) return fallback
  const key = raw.trim().toLowerCase()
  return isLogLevel(key) ? key : fallback
}

export function createLogger(tag: string, level: LogLevel = parseLogLevel(LOG_LEVEL)): Logger {
  const prefix = `[ruinsim:${tag}]`
  const threshold = LEVELS[level]
  const on = (l: LogLevel) => LEVELS[l] >= threshold
  return {
    debug: (...args) => { if (on('debug')) console.log(prefix, ...args) },
    info: (...args) => { if (on('info')) console.log(prefix, ...args) },
    warn: (...args) => { if (on('warn')) console.warn(prefix, ...args) },
    error: (...args) => { if (on('error')) console.error(prefix, ...args) }
  }
}
