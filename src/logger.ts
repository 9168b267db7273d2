export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 }

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVELS, value)
}

export const DEV_LOG =
  process.env.NODE_ENV === 'development' ||
  process.env.SERIATION_DEV_LOG === '1' ||
  process.env.SERIATION_DEV_LOG === 'true'

const configured = process.env.SERIATION_LOG_LEVEL?.toLowerCase()
let threshold = LEVELS[isLogLevel(configured) ? configured : DEV_LOG ? 'debug' : 'info']

export function setLogLevel(level: LogLevel) {
  threshold = LEVELS[level]
}

export function debug(...args: unknown[]) {
  if (threshold <= LEVELS.debug) console.debug('[seriation:debug]', ...args)
}

export function info(...args: unknown[]) {
  if (threshold <= LEVELS.info) console.info('[seriation:info]', ...args)
}

export function warn(...args: unknown[]) {
  if (threshold <= LEVELS.warn) console.warn('[seriation:warn]', ...args)
}

export function error(...args: unknown[]) {
  if (threshold <= LEVELS.error) console.error('[seriation:error]', ...args)
}
