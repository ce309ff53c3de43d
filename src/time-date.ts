/**
 * Time & Date Utilities
 *
 * Pure functions for date/time parsing, arithmetic, calendar positions and
 * timezone conversion. Values are branded ISO strings, so lexical order is
 * chronological order. Uses Julian Day Number for all date arithmetic to
 * avoid month-length edge cases, and Intl.DateTimeFormat for timezones.
 */

import type { Result } from './result'
import { Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

export const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

export const SECONDS_PER_DAY = 86400

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
  return MONTH_LENGTHS[month - 1] ?? 0
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
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

function jdnOf(date: LocalDate): number {
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

export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const tIdx = str.indexOf('T')
  if (tIdx === -1) return Err(new ParseError(`Invalid datetime format (missing T): '${str}'`))

  const dateResult = parseDate(str.substring(0, tIdx))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const timeResult = parseTime(str.substring(tIdx + 1))
  if (!timeResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok(makeDateTime(dateResult.value, timeResult.value))
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

export const MIDNIGHT = makeTime(0, 0, 0)
export const END_OF_DAY = makeTime(23, 59, 59)

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
  return dt.substring(11) as LocalTime
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const { year, month, day } = jdnToDate(jdnOf(date) + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return jdnOf(b) - jdnOf(a)
}

/** First day of the month that lies `n` months after the month of `date`. */
export function addMonthsToMonthStart(date: LocalDate, n: number): LocalDate {
  const index = yearOf(date) * 12 + (monthOf(date) - 1) + n
  return makeDate(Math.floor(index / 12), (index % 12) + 1, 1)
}

export function monthsBetween(a: LocalDate, b: LocalDate): number {
  return (yearOf(b) - yearOf(a)) * 12 + (monthOf(b) - monthOf(a))
}

// ============================================================================
// DateTime Arithmetic
// ============================================================================

export function secondOfDay(time: LocalTime): number {
  return hourOf(time) * 3600 + minuteOf(time) * 60 + secondOf(time)
}

export function timeFromSecondOfDay(seconds: number): LocalTime {
  return makeTime(Math.floor(seconds / 3600), Math.floor((seconds % 3600) / 60), seconds % 60)
}

export function addSeconds(dt: LocalDateTime, n: number): LocalDateTime {
  const total = secondOfDay(timeOf(dt)) + n
  // Floor division keeps negative offsets on the previous day
  const dayDelta = Math.floor(total / SECONDS_PER_DAY)
  const rest = total - dayDelta * SECONDS_PER_DAY
  const date = dayDelta === 0 ? dateOf(dt) : addDays(dateOf(dt), dayDelta)
  return makeDateTime(date, timeFromSecondOfDay(rest))
}

export function secondsBetween(a: LocalDateTime, b: LocalDateTime): number {
  return daysBetween(dateOf(a), dateOf(b)) * SECONDS_PER_DAY
    + secondOfDay(timeOf(b)) - secondOfDay(timeOf(a))
}

// ============================================================================
// Calendar Positions
// ============================================================================

export function dayOfWeek(date: LocalDate): Weekday {
  // JDN mod 7 = 0 is a Monday
  const idx = ((jdnOf(date) % 7) + 7) % 7
  return indexToWeekday(idx)
}

/** Monday = 0 ... Sunday = 6 */
export function weekdayToIndex(w: Weekday): number {
  return WEEKDAYS.indexOf(w)
}

export function indexToWeekday(i: number): Weekday {
  return WEEKDAYS[((i % 7) + 7) % 7] ?? 'mon'
}

/** 1-based ordinal day within the year. */
export function dayOfYear(date: LocalDate): number {
  return daysBetween(makeDate(yearOf(date), 1, 1), date) + 1
}

/** Start of the week containing `date`, for weeks beginning on `weekStart`. */
export function startOfWeek(date: LocalDate, weekStart: Weekday): LocalDate {
  const offset = (weekdayToIndex(dayOfWeek(date)) - weekdayToIndex(weekStart) + 7) % 7
  return addDays(date, -offset)
}

/** First day of week 1: the first week holding at least four days of the year. */
function firstWeekStart(year: number, weekStart: Weekday): LocalDate {
  const jan1 = makeDate(year, 1, 1)
  const offset = (weekdayToIndex(dayOfWeek(jan1)) - weekdayToIndex(weekStart) + 7) % 7
  return offset <= 3 ? addDays(jan1, -offset) : addDays(jan1, 7 - offset)
}

export function weeksInYear(year: number, weekStart: Weekday): number {
  return daysBetween(firstWeekStart(year, weekStart), firstWeekStart(year + 1, weekStart)) / 7
}

/** Week-numbering year and week number of `date`. */
export function weekNumber(date: LocalDate, weekStart: Weekday): { year: number; week: number } {
  let year = yearOf(date)
  if (date >= firstWeekStart(year + 1, weekStart)) {
    year += 1
  } else if (date < firstWeekStart(year, weekStart)) {
    year -= 1
  }
  const week = Math.floor(daysBetween(firstWeekStart(year, weekStart), date) / 7) + 1
  return { year, week }
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function compareTimes(a: LocalTime, b: LocalTime): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

// ============================================================================
// Timezone Conversion
// ============================================================================

export function isValidTimeZone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
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

export function toLocal(utc: LocalDateTime, tz: string): LocalDateTime {
  if (tz === 'UTC') return utc
  const utcMs = dtToMs(utc)
  return msToDt(utcMs + utcOffsetAtMs(utcMs, tz) * 60000)
}

export function toUTC(local: LocalDateTime, tz: string): LocalDateTime {
  if (tz === 'UTC') return local

  const localMs = dtToMs(local)
  const year = yearOf(dateOf(local))

  // Standard and daylight offsets from Jan/Jul
  const janOffset = utcOffsetAtMs(Date.UTC(year, 0, 15, 12, 0, 0), tz)
  const julOffset = utcOffsetAtMs(Date.UTC(year, 6, 15, 12, 0, 0), tz)

  if (janOffset === julOffset) {
    return msToDt(localMs - janOffset * 60000)
  }

  const stdOffset = Math.min(janOffset, julOffset)
  const dstOffset = Math.max(janOffset, julOffset)

  const utcViaStd = localMs - stdOffset * 60000
  const utcViaDst = localMs - dstOffset * 60000
  const stdMapsBack = utcViaStd + utcOffsetAtMs(utcViaStd, tz) * 60000 === localMs
  const dstMapsBack = utcViaDst + utcOffsetAtMs(utcViaDst, tz) * 60000 === localMs

  if (!stdMapsBack && !dstMapsBack) {
    // Gap: DST transitions are minute-aligned, take the first post-transition minute
    for (let ms = utcViaDst; ms <= utcViaStd; ms += 60000) {
      if (utcOffsetAtMs(ms, tz) !== stdOffset) return msToDt(ms)
    }
    return msToDt(utcViaStd)
  }

  // Overlap resolves to standard time
  if (stdMapsBack) return msToDt(utcViaStd)
  return msToDt(utcViaDst)
}

/** Wall-clock time in `toZone` of the instant that reads `dt` in `fromZone`. */
export function convertZone(dt: LocalDateTime, fromZone: string, toZone: string): LocalDateTime {
  if (fromZone === toZone) return dt
  return toLocal(toUTC(dt, fromZone), toZone)
}
