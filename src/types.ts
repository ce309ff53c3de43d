/**
 * Shared Types
 *
 * Re-exports branded types from time-date and defines the rule vocabulary
 * shared by the rule generator and the recurrence aggregator.
 */

import type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'

export type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'

// ============================================================================
// Rule Vocabulary
// ============================================================================

export type PeriodType =
  | 'none'
  | 'secondly'
  | 'minutely'
  | 'hourly'
  | 'daily'
  | 'weekly'
  | 'monthly'
  | 'yearly'

/** A BYDAY entry: `pos` 0 means every such weekday, ±n the n-th from the start/end. */
export type WeekdayPosition = {
  pos: number
  day: Weekday
}

/** Occurrence count meaning "repeat forever". */
export const DURATION_FOREVER = -1

/** Occurrence count meaning "repeat until the end date/time". */
export const DURATION_UNTIL = 0

/** Legacy single-rule categories a recurrence can be classified into. */
export const RecurrenceType = {
  NONE: 'none',
  MINUTELY: 'minutely',
  HOURLY: 'hourly',
  DAILY: 'daily',
  WEEKLY: 'weekly',
  MONTHLY_DAY: 'monthlyDay',
  MONTHLY_POS: 'monthlyPos',
  YEARLY_MONTH: 'yearlyMonth',
  YEARLY_DAY: 'yearlyDay',
  YEARLY_POS: 'yearlyPos',
  OTHER: 'other',
} as const

export type RecurrenceType = (typeof RecurrenceType)[keyof typeof RecurrenceType]

// ============================================================================
// Rule Generator Capabilities
// ============================================================================

/** BY* constraint accessors read by classification and the legacy getters. */
export type RuleFields = {
  period(): PeriodType
  frequency(): number
  duration(): number
  weekStart(): Weekday
  byDays(): WeekdayPosition[]
  byMonthDays(): number[]
  byYearDays(): number[]
  byWeekNumbers(): number[]
  byMonths(): number[]
  byHours(): number[]
  byMinutes(): number[]
  bySeconds(): number[]
  bySetPos(): number[]
}

/**
 * Everything the aggregator asks of a single RRULE/EXRULE. The aggregator
 * never looks past this surface.
 */
export type RuleGenerator = RuleFields & {
  start(): LocalDateTime
  isFloating(): boolean
  /** Last occurrence, or null when the rule repeats forever. */
  endDateTime(): LocalDateTime | null
  recursOn(date: LocalDate): boolean
  recursAt(dateTime: LocalDateTime): boolean
  timesOn(date: LocalDate): LocalTime[]
  timesInInterval(start: LocalDateTime, end: LocalDateTime): LocalDateTime[]
  nextAfter(dateTime: LocalDateTime): LocalDateTime | null
  previousBefore(dateTime: LocalDateTime): LocalDateTime | null
  durationTo(dateTime: LocalDateTime): number
  setFloating(floating: boolean): void
  setStart(start: LocalDateTime): void
  shiftTimes(fromZone: string, toZone: string): void
}

export type RuleObserver = {
  ruleChanged(rule: RuleGenerator): void
}
