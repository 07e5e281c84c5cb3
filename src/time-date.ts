/**
 * Time & Date Utilities
 *
 * Pure functions for calendar dates, wall-clock times, UTC instants and
 * timezone conversion. Uses Julian Day Number for all date arithmetic to avoid
 * month-length edge cases, and Intl.DateTimeFormat for zone offsets.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol
declare const __instant: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** Zone-less ISO 8601 datetime string: YYYY-MM-DDTHH:MM:SS */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

/** UTC point in time: YYYY-MM-DDTHH:MM:SSZ. Lexicographic order is chronological. */
export type Instant = string & { readonly [__instant]: true }

/** 1 = Sunday … 7 = Saturday */
export type WeekdayNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7

export const WEEKDAY_NUMBERS: readonly WeekdayNumber[] = [1, 2, 3, 4, 5, 6, 7]

export const SHORT_WEEKDAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 31
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  return String(n).padStart(4, '0')
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

function toJDN(date: LocalDate): number {
  return dateToJDN(yearOf(date), monthOf(date), dayOf(date))
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = parseInt(match[1] ?? '', 10)
  const minute = parseInt(match[2] ?? '', 10)
  const second = match[3] ? parseInt(match[3], 10) : 0

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute, second))
}

/**
 * Parses an ISO 8601 timestamp carrying an explicit offset (`Z` or `±HH:MM`)
 * and normalizes it to a second-precision UTC instant.
 */
export function parseInstant(str: string): Result<Instant, ParseError> {
  const match = /^(\d{4}-\d{2}-\d{2})T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid instant format: '${str}'`))

  if (!parseDate(match[1] ?? '').ok) return Err(new ParseError(`Invalid date in instant: '${str}'`))

  const ms = Date.parse(str)
  if (Number.isNaN(ms)) return Err(new ParseError(`Invalid instant: '${str}'`))
  return Ok(instantFromMs(ms))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function secondOf(time: LocalTime): number {
  return parseInt(time.substring(6, 8), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11, 19) as LocalTime
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const { year, month, day } = jdnToDate(toJDN(date) + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return toJDN(b) - toJDN(a)
}

/**
 * Moves `n` calendar months and lands on `day` (defaults to the source day),
 * clamped to the length of the target month.
 */
export function addMonths(date: LocalDate, n: number, day?: number): LocalDate {
  const index = yearOf(date) * 12 + (monthOf(date) - 1) + n
  const year = Math.floor(index / 12)
  const month = index - year * 12 + 1
  const wanted = day ?? dayOf(date)
  return makeDate(year, month, Math.min(wanted, daysInMonth(year, month)))
}

export function addYears(date: LocalDate, n: number): LocalDate {
  return addMonths(date, n * 12)
}

export function monthsBetween(a: LocalDate, b: LocalDate): number {
  return (yearOf(b) - yearOf(a)) * 12 + (monthOf(b) - monthOf(a))
}

// ============================================================================
// Day-of-Week
// ============================================================================

export function weekdayOf(date: LocalDate): WeekdayNumber {
  // JDN mod 7 = 0 on Mondays
  const mondayBased = ((toJDN(date) % 7) + 7) % 7
  return WEEKDAY_NUMBERS[(mondayBased + 1) % 7] ?? 1
}

/** Sunday that opens the week containing `date`. */
export function startOfWeek(date: LocalDate): LocalDate {
  return addDays(date, -(weekdayOf(date) - 1))
}

export function isWeekdayNumber(n: number): n is WeekdayNumber {
  return Number.isInteger(n) && n >= 1 && n <= 7
}

// ============================================================================
// Comparison
// ============================================================================

export function compareInstants(a: Instant, b: Instant): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function minInstant(a: Instant, b: Instant): Instant {
  return a <= b ? a : b
}

// ============================================================================
// Instants
// ============================================================================

export function instantFromMs(ms: number): Instant {
  const d = new Date(Math.floor(ms / 1000) * 1000)
  return (
    `${pad4(d.getUTCFullYear())}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}` +
    `T${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}:${pad2(d.getUTCSeconds())}Z`
  ) as Instant
}

export function instantToMs(instant: Instant): number {
  return dtToMs(utcDateTimeOf(instant))
}

export function currentInstant(): Instant {
  return instantFromMs(Date.now())
}

export function addMinutesToInstant(instant: Instant, minutes: number): Instant {
  return instantFromMs(instantToMs(instant) + minutes * 60000)
}

function utcDateTimeOf(instant: Instant): LocalDateTime {
  return instant.substring(0, 19) as LocalDateTime
}

// ============================================================================
// Timezones
// ============================================================================

export function isValidTimeZone(tz: string): boolean {
  if (tz.length === 0) return false
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
}

export function systemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone
}

/** The stored identifier when the runtime knows it, the system zone otherwise. */
export function resolveTimeZone(tz: string | null | undefined): string {
  return tz != null && isValidTimeZone(tz) ? tz : systemTimeZone()
}

/** Given a UTC epoch in ms, return the UTC offset in minutes for timezone tz */
function utcOffsetAtMs(utcMs: number, tz: string): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  })

  const parts = formatter.formatToParts(new Date(utcMs))
  const get = (type: string) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  let h = get('hour')
  if (h === 24) h = 0
  const localMs = Date.UTC(get('year'), get('month') - 1, get('day'), h, get('minute'), get('second'))
  return (localMs - utcMs) / 60000
}

/** Convert a LocalDateTime to epoch ms (treating it as UTC) */
function dtToMs(dt: LocalDateTime): number {
  const d = dateOf(dt), t = timeOf(dt)
  return Date.UTC(yearOf(d), monthOf(d) - 1, dayOf(d), hourOf(t), minuteOf(t), secondOf(t))
}

/** Convert epoch ms to a LocalDateTime (treating ms as UTC) */
function msToDt(ms: number): LocalDateTime {
  const d = new Date(ms)
  return makeDateTime(
    makeDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate()),
    makeTime(d.getUTCHours(), d.getUTCMinutes(), d.getUTCSeconds())
  )
}

/** Wall-clock reading of `instant` in zone `tz`. */
export function toZoned(instant: Instant, tz: string): LocalDateTime {
  const utcMs = instantToMs(instant)
  if (tz === 'UTC') return utcDateTimeOf(instant)
  const offset = utcOffsetAtMs(utcMs, tz)
  return msToDt(utcMs + offset * 60000)
}

/** Calendar date of `instant` in zone `tz`. */
export function localDateIn(instant: Instant, tz: string): LocalDate {
  return dateOf(toZoned(instant, tz))
}

/**
 * Instant at which the wall clock in `tz` reads `local`.
 * Gap times resolve to the first instant after the transition; overlap times
 * resolve to the standard-time (later) instant.
 */
export function fromZoned(local: LocalDateTime, tz: string): Instant {
  if (tz === 'UTC') return `${local}Z` as Instant

  const localMs = dtToMs(local)
  const year = yearOf(dateOf(local))

  // Standard and daylight offsets from Jan/Jul
  const janOffset = utcOffsetAtMs(Date.UTC(year, 0, 15, 12, 0, 0), tz)
  const julOffset = utcOffsetAtMs(Date.UTC(year, 6, 15, 12, 0, 0), tz)

  if (janOffset === julOffset) {
    return instantFromMs(localMs - janOffset * 60000)
  }

  const stdOffset = Math.min(janOffset, julOffset)
  const dstOffset = Math.max(janOffset, julOffset)
  const status = dstStatusAt(localMs, tz, stdOffset, dstOffset)

  if (status === 'gap') {
    // DST transitions are minute-aligned
    const utcViaDst = localMs - dstOffset * 60000
    const utcViaStd = localMs - stdOffset * 60000
    for (let ms = utcViaDst; ms <= utcViaStd; ms += 60000) {
      if (utcOffsetAtMs(ms, tz) !== stdOffset) return instantFromMs(ms)
    }
    return instantFromMs(utcViaStd)
  }

  if (status === 'daylight') return instantFromMs(localMs - dstOffset * 60000)
  return instantFromMs(localMs - stdOffset * 60000)
}

function dstStatusAt(
  localMs: number,
  tz: string,
  stdOffset: number,
  dstOffset: number,
): 'standard' | 'daylight' | 'gap' | 'overlap' {
  const utcViaStd = localMs - stdOffset * 60000
  const utcViaDst = localMs - dstOffset * 60000

  const stdMapsBack = utcViaStd + utcOffsetAtMs(utcViaStd, tz) * 60000 === localMs
  const dstMapsBack = utcViaDst + utcOffsetAtMs(utcViaDst, tz) * 60000 === localMs

  if (stdMapsBack && dstMapsBack) return 'overlap'
  if (!stdMapsBack && !dstMapsBack) return 'gap'
  return dstMapsBack ? 'daylight' : 'standard'
}
