/**
 * Rule Expansion
 *
 * Pure functions that turn one rule's fields into concrete occurrences.
 *
 * A rule is expanded one "block" at a time. For daily and coarser periods a
 * block is one period of the rule (the n-th aligned year, month, week or day
 * after the start, stepped by the frequency); BYSETPOS selects from the whole
 * period. For hourly, minutely and secondly rules a block is one calendar day
 * holding many periods, since scanning those period by period would be
 * hopeless across date-level limits such as BYMONTH.
 */

import {
  type LocalDate,
  type LocalTime,
  type LocalDateTime,
  type Weekday,
  addDays,
  addMonthsToMonthStart,
  addSeconds,
  dateOf,
  dayOf,
  dayOfWeek,
  dayOfYear,
  daysBetween,
  daysInMonth,
  daysInYear,
  hourOf,
  makeDate,
  makeDateTime,
  makeTime,
  minuteOf,
  monthOf,
  monthsBetween,
  secondOf,
  secondsBetween,
  startOfWeek,
  timeOf,
  weekNumber,
  weeksInYear,
  yearOf,
  MIDNIGHT,
} from './time-date'
import type { PeriodType, WeekdayPosition } from './types'
import { DURATION_UNTIL } from './types'
import { sortUnique } from './sorted-set'

// ============================================================================
// Types
// ============================================================================

export type RuleState = {
  period: PeriodType
  frequency: number
  duration: number
  endDateTime: LocalDateTime | null
  start: LocalDateTime
  floating: boolean
  weekStart: Weekday
  byDays: WeekdayPosition[]
  byMonthDays: number[]
  byYearDays: number[]
  byWeekNumbers: number[]
  byMonths: number[]
  byHours: number[]
  byMinutes: number[]
  bySeconds: number[]
  bySetPos: number[]
}

type DateRange = {
  first: LocalDate
  last: LocalDate
}

const UNIT_SECONDS: Partial<Record<PeriodType, number>> = {
  hourly: 3600,
  minutely: 60,
  secondly: 1,
}

// ============================================================================
// Blocks
// ============================================================================

export function isSubDaily(period: PeriodType): boolean {
  return UNIT_SECONDS[period] !== undefined
}

/** Upper bound imposed by an UNTIL end, if the rule has one. */
export function untilLimit(state: RuleState): LocalDateTime | null {
  return state.duration === DURATION_UNTIL ? state.endDateTime : null
}

/** Index of the block holding `dt`, possibly negative. */
export function blockIndexOf(state: RuleState, dt: LocalDateTime): number {
  const startDate = dateOf(state.start)
  const date = dateOf(dt)
  switch (state.period) {
    case 'yearly':
      return Math.floor((yearOf(date) - yearOf(startDate)) / state.frequency)
    case 'monthly':
      return Math.floor(monthsBetween(startDate, date) / state.frequency)
    case 'weekly': {
      const weeks = daysBetween(
        startOfWeek(startDate, state.weekStart),
        startOfWeek(date, state.weekStart)
      ) / 7
      return Math.floor(weeks / state.frequency)
    }
    case 'daily':
      return Math.floor(daysBetween(startDate, date) / state.frequency)
    default:
      return daysBetween(startDate, date)
  }
}

function periodRange(state: RuleState, n: number): DateRange {
  const startDate = dateOf(state.start)
  const step = n * state.frequency
  switch (state.period) {
    case 'yearly': {
      const year = yearOf(startDate) + step
      return { first: makeDate(year, 1, 1), last: makeDate(year, 12, 31) }
    }
    case 'monthly': {
      const first = addMonthsToMonthStart(startDate, step)
      return { first, last: addDays(first, daysInMonth(yearOf(first), monthOf(first)) - 1) }
    }
    case 'weekly': {
      const first = addDays(startOfWeek(startDate, state.weekStart), 7 * step)
      return { first, last: addDays(first, 6) }
    }
    case 'daily': {
      const day = addDays(startDate, step)
      return { first: day, last: day }
    }
    default: {
      const day = addDays(startDate, n)
      return { first: day, last: day }
    }
  }
}

/** First instant covered by block `n`. */
export function blockBegin(state: RuleState, n: number): LocalDateTime {
  return makeDateTime(periodRange(state, n).first, MIDNIGHT)
}

/** Occurrences inside block `n`, ascending, clipped to the start and any UNTIL. */
export function blockOccurrences(state: RuleState, n: number): LocalDateTime[] {
  if (n < 0 || state.period === 'none') return []
  const raw = isSubDaily(state.period)
    ? subDailyOccurrences(state, periodRange(state, n).first)
    : applySetPos(periodOccurrences(state, periodRange(state, n)), state.bySetPos)

  const limit = untilLimit(state)
  return raw.filter(dt => dt >= state.start && (limit === null || dt <= limit))
}

// ============================================================================
// Date-Level Constraints
// ============================================================================

function hasDayLevelConstraint(state: RuleState): boolean {
  return state.byDays.length > 0
    || state.byMonthDays.length > 0
    || state.byYearDays.length > 0
    || state.byWeekNumbers.length > 0
}

function matchesSigned(values: number[], positive: number, count: number): boolean {
  return values.includes(positive) || values.includes(positive - count - 1)
}

/** Month or year the positional BYDAY entries count within, or null when positions do not apply. */
function positionFrame(state: RuleState, date: LocalDate): DateRange | null {
  const month = (): DateRange => {
    const first = makeDate(yearOf(date), monthOf(date), 1)
    return { first, last: addDays(first, daysInMonth(yearOf(date), monthOf(date)) - 1) }
  }
  if (state.period === 'monthly') return month()
  if (state.period === 'yearly' && state.byWeekNumbers.length === 0) {
    if (state.byMonths.length > 0) return month()
    return { first: makeDate(yearOf(date), 1, 1), last: makeDate(yearOf(date), 12, 31) }
  }
  return null
}

function matchesWeekday(state: RuleState, date: LocalDate): boolean {
  const weekday = dayOfWeek(date)
  const frame = positionFrame(state, date)
  return state.byDays.some(entry => {
    if (entry.day !== weekday) return false
    if (entry.pos === 0 || frame === null) return true
    const index = daysBetween(frame.first, date)
    const length = daysBetween(frame.first, frame.last) + 1
    const fromStart = Math.floor(index / 7) + 1
    const fromEnd = -(Math.floor((length - 1 - index) / 7) + 1)
    return entry.pos === fromStart || entry.pos === fromEnd
  })
}

/** Date-level limits common to every period. */
function matchesDateLimits(state: RuleState, date: LocalDate): boolean {
  if (state.byMonths.length > 0 && !state.byMonths.includes(monthOf(date))) return false
  if (state.byWeekNumbers.length > 0) {
    const { year, week } = weekNumber(date, state.weekStart)
    if (!matchesSigned(state.byWeekNumbers, week, weeksInYear(year, state.weekStart))) return false
  }
  if (state.byYearDays.length > 0
    && !matchesSigned(state.byYearDays, dayOfYear(date), daysInYear(yearOf(date)))) return false
  if (state.byMonthDays.length > 0
    && !matchesSigned(state.byMonthDays, dayOf(date), daysInMonth(yearOf(date), monthOf(date)))) return false
  if (state.byDays.length > 0 && !matchesWeekday(state, date)) return false
  return true
}

/** Without any day-level BY* field a period falls back to the start's own day. */
function matchesStartDefaults(state: RuleState, date: LocalDate): boolean {
  if (hasDayLevelConstraint(state)) return true
  const startDate = dateOf(state.start)
  switch (state.period) {
    case 'yearly':
      return (state.byMonths.length > 0 || monthOf(date) === monthOf(startDate))
        && dayOf(date) === dayOf(startDate)
    case 'monthly':
      return dayOf(date) === dayOf(startDate)
    case 'weekly':
      return dayOfWeek(date) === dayOfWeek(startDate)
    default:
      return true
  }
}

// ============================================================================
// Time-Level Expansion
// ============================================================================

function valuesOrDefault(values: number[], fallback: number): number[] {
  return values.length > 0 ? [...values].sort((a, b) => a - b) : [fallback]
}

function timesOfDay(state: RuleState): LocalTime[] {
  const startTime = timeOf(state.start)
  if (state.floating) return [startTime]
  const times: LocalTime[] = []
  for (const h of valuesOrDefault(state.byHours, hourOf(startTime))) {
    for (const m of valuesOrDefault(state.byMinutes, minuteOf(startTime))) {
      for (const s of valuesOrDefault(state.bySeconds, secondOf(startTime))) {
        times.push(makeTime(h, m, s))
      }
    }
  }
  return sortUnique(times)
}

function periodOccurrences(state: RuleState, range: DateRange): LocalDateTime[] {
  const times = timesOfDay(state)
  const result: LocalDateTime[] = []
  for (let date = range.first; date <= range.last; date = addDays(date, 1)) {
    if (!matchesDateLimits(state, date) || !matchesStartDefaults(state, date)) continue
    for (const time of times) result.push(makeDateTime(date, time))
  }
  return result
}

/** Pick 1-based (or negative, from the end) positions out of an ordered period set. */
export function applySetPos(occurrences: LocalDateTime[], positions: number[]): LocalDateTime[] {
  if (positions.length === 0) return occurrences
  const picked: LocalDateTime[] = []
  for (const pos of positions) {
    const index = pos > 0 ? pos - 1 : occurrences.length + pos
    const value = occurrences[index]
    if (pos !== 0 && value !== undefined) picked.push(value)
  }
  return sortUnique(picked)
}

/** All occurrences of an hourly/minutely/secondly rule on one calendar day. */
function subDailyOccurrences(state: RuleState, date: LocalDate): LocalDateTime[] {
  if (!matchesDateLimits(state, date)) return []

  const unit = UNIT_SECONDS[state.period] ?? 1
  const step = unit * state.frequency
  const startTime = timeOf(state.start)
  const anchorTime = state.period === 'hourly'
    ? makeTime(hourOf(startTime), 0, 0)
    : state.period === 'minutely'
      ? makeTime(hourOf(startTime), minuteOf(startTime), 0)
      : startTime
  const anchor = makeDateTime(dateOf(state.start), anchorTime)

  const dayOffset = secondsBetween(anchor, makeDateTime(date, MIDNIGHT))
  const result: LocalDateTime[] = []
  for (let k = Math.max(0, Math.ceil(dayOffset / step)); k * step < dayOffset + 86400; k++) {
    const periodStart = timeOf(addSeconds(anchor, k * step))
    const hour = hourOf(periodStart)
    const minute = minuteOf(periodStart)
    if (state.byHours.length > 0 && !state.byHours.includes(hour)) continue
    if (state.period !== 'hourly' && state.byMinutes.length > 0 && !state.byMinutes.includes(minute)) continue

    let candidates: LocalDateTime[]
    if (state.period === 'hourly') {
      candidates = []
      for (const m of valuesOrDefault(state.byMinutes, minuteOf(startTime))) {
        for (const s of valuesOrDefault(state.bySeconds, secondOf(startTime))) {
          candidates.push(makeDateTime(date, makeTime(hour, m, s)))
        }
      }
    } else if (state.period === 'minutely') {
      candidates = valuesOrDefault(state.bySeconds, secondOf(startTime))
        .map(s => makeDateTime(date, makeTime(hour, minute, s)))
    } else {
      if (state.bySeconds.length > 0 && !state.bySeconds.includes(secondOf(periodStart))) continue
      candidates = [makeDateTime(date, periodStart)]
    }
    result.push(...applySetPos(candidates, state.bySetPos))
  }
  return result
}
