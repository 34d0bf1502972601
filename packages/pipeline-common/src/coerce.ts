/**
 * Per-field coercion of loosely typed input values.
 *
 * Every function returns a `Coerced` result instead of throwing, so callers
 * decide explicitly whether a failure drops the record, fills a default, or
 * aborts the run.
 */
export type Coerced<T> = { ok: true; value: T } | { ok: false }

const failed: Coerced<never> = { ok: false }

const ok = <T>(value: T): Coerced<T> => ({ ok: true, value })

// ISO-8601 date or date-time; a date-time without a zone designator is read as UTC.
const ISO_INSTANT =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?)?$/

const ZONE_OFFSET = /^([+-])(\d{2}):?(\d{2})$/

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

const CALENDAR_DATE = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Numbers, bigints and decimal strings become finite numbers.
 * Blank strings, hex or binary literals, booleans and null fail.
 */
export const coerceNumber = (raw: unknown): Coerced<number> => {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? ok(raw) : failed
  }
  if (typeof raw === 'bigint') {
    return ok(Number(raw))
  }
  if (typeof raw === 'string') {
    const trimmed = raw.trim()
    if (!DECIMAL.test(trimmed)) {
      return failed
    }
    const parsed = Number(trimmed)
    return Number.isFinite(parsed) ? ok(parsed) : failed
  }
  return failed
}

/**
 * Non-blank values become strings. The original text is kept untrimmed.
 */
export const coerceText = (raw: unknown): Coerced<string> => {
  if (raw === null || raw === undefined) {
    return failed
  }
  const text = typeof raw === 'string' ? raw : String(raw)
  return text.trim() === '' ? failed : ok(text)
}

// Minutes east of UTC.
const offsetMinutes = (zone: string | undefined): number | undefined => {
  if (zone === undefined || zone === 'Z') {
    return 0
  }
  const match = ZONE_OFFSET.exec(zone)
  if (!match) {
    return undefined
  }
  const [, sign, hours, minutes] = match
  if (Number(hours) > 23 || Number(minutes) > 59) {
    return undefined
  }
  const total = Number(hours) * 60 + Number(minutes)
  return sign === '-' ? -total : total
}

/**
 * Parses an ISO-8601 date or date-time. A value without offset is taken as UTC.
 * Fields that do not exist on the calendar or clock (Feb 30, 24:00) fail.
 */
export const coerceInstant = (raw: unknown): Coerced<Date> => {
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime()) ? failed : ok(raw)
  }
  if (typeof raw !== 'string') {
    return failed
  }
  const match = ISO_INSTANT.exec(raw.trim())
  if (!match) {
    return failed
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = '', zone] = match
  const offset = offsetMinutes(zone)
  if (offset === undefined) {
    return failed
  }

  const fields = [year, month, day, hour, minute, second].map(Number)
  const milliseconds = Number(fraction.slice(0, 3).padEnd(3, '0'))
  const wallClock = new Date(
    Date.UTC(fields[0], fields[1] - 1, fields[2], fields[3], fields[4], fields[5], milliseconds)
  )
  const readBack = [
    wallClock.getUTCFullYear(),
    wallClock.getUTCMonth() + 1,
    wallClock.getUTCDate(),
    wallClock.getUTCHours(),
    wallClock.getUTCMinutes(),
    wallClock.getUTCSeconds(),
  ]
  if (readBack.some((value, index) => value !== fields[index])) {
    return failed
  }
  return ok(new Date(wallClock.getTime() - offset * 60_000))
}

/**
 * Parses a calendar date into `YYYY-MM-DD`. Accepts `YYYY-MM-DD`,
 * `YYYY/MM/DD`, Date objects, and full instants (reduced to their UTC date).
 */
export const coerceCalendarDate = (raw: unknown): Coerced<string> => {
  if (typeof raw === 'string') {
    const match = CALENDAR_DATE.exec(raw.trim())
    if (match) {
      const [, year, month, day] = match
      const utc = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
      const valid =
        utc.getUTCFullYear() === Number(year) &&
        utc.getUTCMonth() === Number(month) - 1 &&
        utc.getUTCDate() === Number(day)
      return valid ? ok(formatCalendarDate(utc)) : failed
    }
  }
  const instant = coerceInstant(raw)
  return instant.ok ? ok(formatCalendarDate(instant.value)) : failed
}

export const formatCalendarDate = (date: Date): string => date.toISOString().slice(0, 10)

/**
 * Formats an instant as `YYYY-MM-DDTHH:MM:SSZ`, dropping sub-seconds.
 */
export const formatUtcSecond = (date: Date): string => `${date.toISOString().slice(0, 19)}Z`
