/**
 * recurrence-set
 *
 * Public API exports
 */

// Error system
export {
  RecurrenceError, RecurrenceErrorCode,
  ParseError, InvalidRuleError, ValidationError,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'
export {
  WEEKDAYS, MIDNIGHT, END_OF_DAY,
  isLeapYear, daysInMonth, daysInYear,
  parseDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  addDays, daysBetween, addSeconds, secondsBetween,
  dayOfWeek, dayOfYear, weekNumber, weeksInYear, startOfWeek,
  compareDates, compareTimes, compareDateTimes,
  isValidTimeZone, toLocal, toUTC, convertZone,
} from './time-date'

// Rule vocabulary
export type {
  PeriodType, WeekdayPosition, RuleFields, RuleGenerator, RuleObserver,
} from './types'
export { DURATION_FOREVER, DURATION_UNTIL, RecurrenceType } from './types'

// Sorted set
export type { SortedSet } from './sorted-set'
export { createSortedSet } from './sorted-set'

// Rule generator
export type { RuleInit, RuleState, RecurrenceRule } from './recurrence-rule'
export { createRecurrenceRule, MAX_EMPTY_BLOCKS } from './recurrence-rule'

// Classification
export { classifyRule } from './classify'

// Recurrence aggregator
export type { Recurrence, RecurrenceConfig, RecurrenceObserver } from './recurrence'
export { createRecurrence, DEFAULT_MAX_SEARCH_ITERATIONS } from './recurrence'
