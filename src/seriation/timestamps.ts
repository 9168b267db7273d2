import { isValid, parseISO } from 'date-fns'
import { InvalidTimestampError } from './errors'
import { TimeRange } from './types'

export type KnownRange = TimeRange & { start: number; end: number }

const OPEN = '..'
const YEAR = /^(\d{4})$/
const MONTH = /^(\d{4})-(\d{2})$/
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/
const ZONE = /(Z|[+-]\d{2}(:?\d{2})?)$/i

const DAY_MS = 24 * 60 * 60 * 1000

// Values without an offset are read as UTC, never host-local time.
function asUtc(part: string) {
  if (DATE_ONLY.test(part)) return `${part}T00:00:00Z`
  if (part.includes('T') && !ZONE.test(part)) return `${part}Z`
  return part
}

function parseBound(part: string, raw: string): { start: number; end: number } {
  // reduced precision covers the whole year or month
  const year = YEAR.exec(part)
  if (year) {
    const y = Number(year[1])
    return { start: Date.UTC(y, 0, 1), end: Date.UTC(y + 1, 0, 1) - 1 }
  }
  const month = MONTH.exec(part)
  if (month) {
    const y = Number(month[1])
    const m = Number(month[2])
    if (m < 1 || m > 12) throw new InvalidTimestampError(raw)
    return { start: Date.UTC(y, m - 1, 1), end: Date.UTC(y, m, 1) - 1 }
  }
  const parsed = parseISO(asUtc(part))
  if (!isValid(parsed)) throw new InvalidTimestampError(raw)
  const start = parsed.getTime()
  return { start, end: start }
}

/**
 * Parses an ISO-8601 instant (`2024-01-15`, `2024-01-15T10:00:00Z`), a reduced
 * precision date (`2024`, `2024-03`) or an interval `start/end` where either
 * side may be `..`. Dates and datetimes without an offset are UTC.
 */
export function parseTimestamp(raw: string): TimeRange {
  const text = raw.trim()
  if (!text) throw new InvalidTimestampError(raw)
  const parts = text.split('/')
  if (parts.length === 1) {
    const bound = parseBound(text, raw)
    return { start: bound.start, end: bound.end, raw: text }
  }
  if (parts.length !== 2) throw new InvalidTimestampError(raw)
  const [left, right] = parts
  const start = left === OPEN || left === '' ? undefined : parseBound(left, raw).start
  const end = right === OPEN || right === '' ? undefined : parseBound(right, raw).end
  if (start === undefined && end === undefined) throw new InvalidTimestampError(raw)
  if (start !== undefined && end !== undefined && start > end) throw new InvalidTimestampError(raw)
  return { start, end, raw: text }
}

export function isFullyKnown(range: TimeRange | undefined): range is KnownRange {
  return range !== undefined && range.start !== undefined && range.end !== undefined
}

export function referenceInstant(range: TimeRange | undefined): number | undefined {
  if (!isFullyKnown(range)) return undefined
  return range.start + (range.end - range.start) / 2
}

/** True only when both ranges are fully known and `a` ends before `b` starts. */
export function strictlyBefore(a: TimeRange | undefined, b: TimeRange | undefined): boolean {
  return isFullyKnown(a) && isFullyKnown(b) && a.end < b.start
}

export function daysBetween(earlier: number, later: number): number {
  return (later - earlier) / DAY_MS
}
