/**
 * Recurrence Aggregator
 *
 * Owns every source of occurrences for one calendar item: inclusion rules
 * (RRULE), exclusion rules (EXRULE), and explicit inclusion/exclusion dates
 * and date-times (RDATE/EXDATE). Answers membership, enumeration and
 * nearest-neighbour queries by combining all sources, with exclusions taking
 * precedence over inclusions.
 *
 * All values are wall-clock readings in the recurrence's own time zone. A
 * floating recurrence is date-only: its anchor sits at midnight and any
 * matching exclusion rule removes the whole day.
 *
 * Mutators never throw. A read-only recurrence or an out-of-range argument
 * turns the call into a no-op; queries without an answer return null.
 */

import {
  type LocalDate,
  type LocalTime,
  type LocalDateTime,
  type Weekday,
  WEEKDAYS,
  MIDNIGHT,
  END_OF_DAY,
  convertZone,
  dateOf,
  isValidTimeZone,
  makeDateTime,
  timeOf,
} from './time-date'
import type { PeriodType, RuleObserver, WeekdayPosition } from './types'
import { DURATION_FOREVER, RecurrenceType } from './types'
import { type SortedSet, createSortedSet, removeSortedAll, sortUnique } from './sorted-set'
import { type RecurrenceRule, createRecurrenceRule } from './recurrence-rule'
import { classifyRule } from './classify'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type RecurrenceConfig = {
  /** IANA zone the recurrence's wall-clock values are read in. */
  timeZone?: string
  /** Cap on exclusion rounds in nextDateTime/previousDateTime. */
  maxSearchIterations?: number
}

export type RecurrenceObserver = {
  recurrenceUpdated(recurrence: Recurrence): void
}

export type Recurrence = {
  // Anchor & flags
  startDateTime(): LocalDateTime | null
  startDate(): LocalDate | null
  setStartDateTime(start: LocalDateTime): void
  setStartDate(start: LocalDate): void
  isFloating(): boolean
  setFloating(floating: boolean): void
  isReadOnly(): boolean
  setReadOnly(readOnly: boolean): void
  timeZone(): string
  maxSearchIterations(): number

  // Classification
  recurs(): boolean
  recurrenceType(): RecurrenceType

  // Membership
  recursOn(date: LocalDate): boolean
  recursAt(dateTime: LocalDateTime, fromZone?: string): boolean

  // Enumeration & search
  timesOn(date: LocalDate): LocalTime[]
  timesInInterval(start: LocalDateTime, end: LocalDateTime): LocalDateTime[]
  nextDateTime(after: LocalDateTime): LocalDateTime | null
  previousDateTime(before: LocalDateTime): LocalDateTime | null

  // End & duration
  endDateTime(): LocalDateTime | null
  endDate(): LocalDate | null
  setEndDateTime(end: LocalDateTime): void
  setEndDate(end: LocalDate): void
  duration(): number
  setDuration(duration: number): void
  durationTo(dateTime: LocalDateTime): number
  durationToDate(date: LocalDate): number

  // Legacy single-rule interface (default rule)
  defaultRule(): RecurrenceRule | null
  frequency(): number
  setFrequency(frequency: number): void
  weekStart(): Weekday
  days(): Weekday[]
  monthDays(): number[]
  monthPositions(): WeekdayPosition[]
  yearDays(): number[]
  yearDates(): number[]
  yearMonths(): number[]
  yearPositions(): WeekdayPosition[]
  setNewRecurrenceType(period: PeriodType, frequency: number): RecurrenceRule | null
  setMinutely(frequency: number): void
  setHourly(frequency: number): void
  setDaily(frequency: number): void
  setWeekly(frequency: number, weekStart?: Weekday, days?: Weekday[]): void
  addWeeklyDays(days: Weekday[]): void
  setMonthly(frequency: number): void
  addMonthlyPos(pos: number, days: Weekday | Weekday[]): void
  addMonthlyDate(day: number): void
  setYearly(frequency: number): void
  addYearlyDay(day: number): void
  addYearlyDate(day: number): void
  addYearlyPos(pos: number, days: Weekday | Weekday[]): void
  addYearlyMonth(month: number): void
  unsetRecurs(): void
  clear(): void
  shiftTimes(oldZone: string, newZone: string): void

  // Rules
  rRules(): RecurrenceRule[]
  addRRule(rule: RecurrenceRule): void
  removeRRule(rule: RecurrenceRule): void
  exRules(): RecurrenceRule[]
  addExRule(rule: RecurrenceRule): void
  removeExRule(rule: RecurrenceRule): void

  // Explicit dates
  rDates(): LocalDate[]
  setRDates(dates: LocalDate[]): void
  addRDate(date: LocalDate): void
  rDateTimes(): LocalDateTime[]
  setRDateTimes(dateTimes: LocalDateTime[]): void
  addRDateTime(dateTime: LocalDateTime): void
  exDates(): LocalDate[]
  setExDates(dates: LocalDate[]): void
  addExDate(date: LocalDate): void
  exDateTimes(): LocalDateTime[]
  setExDateTimes(dateTimes: LocalDateTime[]): void
  addExDateTime(dateTime: LocalDateTime): void

  // Observers
  addObserver(observer: RecurrenceObserver): void
  removeObserver(observer: RecurrenceObserver): void

  // Value semantics
  equals(other: Recurrence): boolean
  clone(): Recurrence
  dump(): string
}

export const DEFAULT_MAX_SEARCH_ITERATIONS = 1000

type RecurrenceState = {
  rRules: RecurrenceRule[]
  exRules: RecurrenceRule[]
  rDates: SortedSet<LocalDate>
  rDateTimes: SortedSet<LocalDateTime>
  exDates: SortedSet<LocalDate>
  exDateTimes: SortedSet<LocalDateTime>
  start: LocalDateTime | null
  floating: boolean
  readOnly: boolean
  timeZone: string
}

// ============================================================================
// Helpers
// ============================================================================

/** Every entry of a sorted date-time set that falls on `date`. */
function entriesOn(set: SortedSet<LocalDateTime>, date: LocalDate): LocalDateTime[] {
  const result: LocalDateTime[] = []
  // Sorted: the run for `date` starts right after the last earlier entry
  for (let i = set.findLessThan(makeDateTime(date, MIDNIGHT)) + 1; i < set.size; i++) {
    const dt = set.at(i)
    if (dt === undefined || dateOf(dt) !== date) break
    result.push(dt)
  }
  return result
}

function inRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max
}

function sameList<T>(a: T[], b: T[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i])
}

function sameRules(a: RecurrenceRule[], b: RecurrenceRule[]): boolean {
  return a.length === b.length && a.every((rule, i) => {
    const other = b[i]
    return other !== undefined && rule.equals(other)
  })
}

function checkConfig(config: RecurrenceConfig): { timeZone: string; maxSearchIterations: number } {
  const timeZone = config.timeZone ?? 'UTC'
  if (!isValidTimeZone(timeZone)) {
    throw new ValidationError(`Invalid timezone: '${timeZone}'`)
  }
  const maxSearchIterations = config.maxSearchIterations ?? DEFAULT_MAX_SEARCH_ITERATIONS
  if (!Number.isInteger(maxSearchIterations) || maxSearchIterations < 1) {
    throw new ValidationError(`maxSearchIterations must be a positive integer, got ${maxSearchIterations}`)
  }
  return { timeZone, maxSearchIterations }
}

// ============================================================================
// Factory
// ============================================================================

export function createRecurrence(config: RecurrenceConfig = {}): Recurrence {
  const { timeZone, maxSearchIterations } = checkConfig(config)
  return buildRecurrence({
    rRules: [],
    exRules: [],
    rDates: createSortedSet<LocalDate>(),
    rDateTimes: createSortedSet<LocalDateTime>(),
    exDates: createSortedSet<LocalDate>(),
    exDateTimes: createSortedSet<LocalDateTime>(),
    start: null,
    floating: false,
    readOnly: false,
    timeZone,
  }, maxSearchIterations)
}

function buildRecurrence(state: RecurrenceState, searchLimit: number): Recurrence {
  const observers: RecurrenceObserver[] = []
  let cachedType: RecurrenceType | null = null
  let batchDepth = 0
  let pending = false

  const ruleObserver: RuleObserver = {
    ruleChanged: () => updated(),
  }
  for (const rule of [...state.rRules, ...state.exRules]) rule.addObserver(ruleObserver)

  // ========== Change Notification ==========

  function notify(): void {
    for (const observer of [...observers]) {
      try {
        observer.recurrenceUpdated(recurrence)
      } catch (e) {
        console.error('Recurrence observer error:', e)
      }
    }
  }

  /** Invalidate derived state and tell observers, once per outermost batch. */
  function updated(): void {
    cachedType = null
    if (batchDepth > 0) {
      pending = true
      return
    }
    notify()
  }

  function batch(apply: () => void): void {
    batchDepth++
    try {
      apply()
    } finally {
      batchDepth--
    }
    if (batchDepth === 0 && pending) {
      pending = false
      notify()
    }
  }

  function mutate(apply: () => void): void {
    if (state.readOnly) return
    batch(() => {
      apply()
      updated()
    })
  }

  // ========== Internal Helpers ==========

  function anchorTime(): LocalTime {
    return state.start !== null && !state.floating ? timeOf(state.start) : MIDNIGHT
  }

  function promote(date: LocalDate): LocalDateTime {
    return makeDateTime(date, anchorTime())
  }

  function allRules(): RecurrenceRule[] {
    return [...state.rRules, ...state.exRules]
  }

  function attach(rule: RecurrenceRule): void {
    rule.setFloating(state.floating)
    rule.addObserver(ruleObserver)
  }

  function detach(rules: RecurrenceRule[]): void {
    for (const rule of rules) rule.removeObserver(ruleObserver)
  }

  function defaultRule(create: boolean): RecurrenceRule | null {
    const existing = state.rRules[0]
    if (existing) return existing
    if (!create || state.readOnly || state.start === null) return null
    const rule = createRecurrenceRule({ start: state.start, floating: state.floating })
    batch(() => {
      attach(rule)
      state.rRules.push(rule)
      updated()
    })
    return rule
  }

  function isExcluded(dt: LocalDateTime): boolean {
    return state.exDates.contains(dateOf(dt))
      || state.exDateTimes.contains(dt)
      || state.exRules.some(rule => rule.recursAt(dt))
  }

  function floatingDayExcluded(date: LocalDate): boolean {
    return state.floating && state.exRules.some(rule => rule.recursOn(date))
  }

  // ========== Membership ==========

  function recursOn(date: LocalDate): boolean {
    if (state.start !== null && date < dateOf(state.start)) return false

    // Explicit exclusions override everything
    if (state.exDates.contains(date)) return false
    // A floating day has a single slot, so any matching exclusion rule removes it
    if (floatingDayExcluded(date)) return false

    const recurs = (state.start !== null && dateOf(state.start) === date)
      || state.rDates.contains(date)
      || entriesOn(state.rDateTimes, date).length > 0
      || state.rRules.some(rule => rule.recursOn(date))
    if (!recurs) return false

    const partlyExcluded = entriesOn(state.exDateTimes, date).length > 0
      || (!state.floating && state.exRules.some(rule => rule.recursOn(date)))
    if (!partlyExcluded) return true

    // Some time on this day is excluded; only the full list can tell if any survives
    return timesOn(date).length > 0
  }

  function recursAt(dateTime: LocalDateTime, fromZone?: string): boolean {
    const at = fromZone !== undefined && isValidTimeZone(fromZone)
      ? convertZone(dateTime, fromZone, state.timeZone)
      : dateTime

    if (isExcluded(at)) return false

    const date = dateOf(at)
    if (state.floating) {
      if (state.start !== null && dateOf(state.start) === date) return true
      if (state.rDates.contains(date) || entriesOn(state.rDateTimes, date).length > 0) return true
    } else {
      if (state.start === at || state.rDateTimes.contains(at)) return true
      if (state.rDates.contains(date) && timeOf(at) === anchorTime()) return true
    }
    return state.rRules.some(rule => rule.recursAt(at))
  }

  // ========== Enumeration ==========

  function timesOn(date: LocalDate): LocalTime[] {
    if (state.exDates.contains(date)) return []
    if (floatingDayExcluded(date)) return []

    const times: LocalTime[] = []
    if (state.start !== null && dateOf(state.start) === date) times.push(timeOf(state.start))
    if (state.rDates.contains(date)) times.push(anchorTime())
    for (const dt of entriesOn(state.rDateTimes, date)) times.push(timeOf(dt))
    for (const rule of state.rRules) times.push(...rule.timesOn(date))
    sortUnique(times)

    const excluded: LocalTime[] = entriesOn(state.exDateTimes, date).map(timeOf)
    if (!state.floating) {
      for (const rule of state.exRules) excluded.push(...rule.timesOn(date))
    }
    removeSortedAll(times, sortUnique(excluded))
    return times
  }

  function timesInInterval(start: LocalDateTime, end: LocalDateTime): LocalDateTime[] {
    if (end < start) return []

    const candidates: LocalDateTime[] = []
    for (const rule of state.rRules) candidates.push(...rule.timesInInterval(start, end))
    candidates.push(...state.rDateTimes.values())
    for (const date of state.rDates) candidates.push(promote(date))
    if (state.start !== null) candidates.push(state.start)
    const times = sortUnique(candidates.filter(dt => dt >= start && dt <= end))

    // Whole excluded days, swept in step with the sorted occurrence list.
    // A floating exclusion rule removes its whole days as well.
    const exDates = state.exDates.values()
    let ex = 0
    let write = 0
    for (const dt of times) {
      const date = dateOf(dt)
      let exDate = exDates[ex]
      while (exDate !== undefined && exDate < date) exDate = exDates[++ex]
      if (exDate !== date && !floatingDayExcluded(date)) times[write++] = dt
    }
    times.length = write

    const excluded: LocalDateTime[] = [...state.exDateTimes.values()]
    if (!state.floating) {
      for (const rule of state.exRules) excluded.push(...rule.timesInInterval(start, end))
    }
    removeSortedAll(times, sortUnique(excluded))
    return times
  }

  // ========== Nearest-Neighbour Search ==========

  function nextDateTime(after: LocalDateTime): LocalDateTime | null {
    let current = after
    for (let round = 0; round < searchLimit; round++) {
      const candidates: LocalDateTime[] = []
      if (state.start !== null && current < state.start) candidates.push(state.start)

      // at(-1) is undefined, so a failed search adds nothing
      const nextRDateTime = state.rDateTimes.at(state.rDateTimes.findGreaterThan(current))
      if (nextRDateTime !== undefined) candidates.push(nextRDateTime)

      const sameDay = dateOf(current)
      if (state.rDates.contains(sameDay) && promote(sameDay) > current) {
        candidates.push(promote(sameDay))
      } else {
        const nextRDate = state.rDates.at(state.rDates.findGreaterThan(sameDay))
        if (nextRDate !== undefined) candidates.push(promote(nextRDate))
      }

      for (const rule of state.rRules) {
        const next = rule.nextAfter(current)
        if (next !== null) candidates.push(next)
      }

      if (candidates.length === 0) return null
      const next = sortUnique(candidates)[0]
      if (next === undefined) return null
      if (!isExcluded(next)) return next
      current = next
    }
    // Every candidate within the search horizon was excluded
    return null
  }

  function previousDateTime(before: LocalDateTime): LocalDateTime | null {
    let current = before
    for (let round = 0; round < searchLimit; round++) {
      const candidates: LocalDateTime[] = []
      if (state.start !== null && current > state.start) candidates.push(state.start)

      const prevRDateTime = state.rDateTimes.at(state.rDateTimes.findLessThan(current))
      if (prevRDateTime !== undefined) candidates.push(prevRDateTime)

      const sameDay = dateOf(current)
      if (state.rDates.contains(sameDay) && promote(sameDay) < current) {
        candidates.push(promote(sameDay))
      } else {
        const prevRDate = state.rDates.at(state.rDates.findLessThan(sameDay))
        if (prevRDate !== undefined) candidates.push(promote(prevRDate))
      }

      for (const rule of state.rRules) {
        const prev = rule.previousBefore(current)
        if (prev !== null) candidates.push(prev)
      }

      const sorted = sortUnique(candidates)
      const prev = sorted[sorted.length - 1]
      if (prev === undefined) return null
      if (!isExcluded(prev)) return prev
      current = prev
    }
    return null
  }

  // ========== End & Duration ==========

  function endDateTime(): LocalDateTime | null {
    const ends: LocalDateTime[] = []
    if (state.start !== null) ends.push(state.start)
    const lastRDate = state.rDates.last()
    if (lastRDate !== undefined) ends.push(promote(lastRDate))
    const lastRDateTime = state.rDateTimes.last()
    if (lastRDateTime !== undefined) ends.push(lastRDateTime)
    for (const rule of state.rRules) {
      const end = rule.endDateTime()
      // One open-ended rule makes the whole recurrence open-ended
      if (end === null) return null
      ends.push(end)
    }
    const sorted = sortUnique(ends)
    return sorted[sorted.length - 1] ?? null
  }

  function setEndDateTime(end: LocalDateTime): void {
    if (state.readOnly) return
    batch(() => defaultRule(true)?.setEndDateTime(end))
  }

  function durationTo(dateTime: LocalDateTime): number {
    return state.rRules[0]?.durationTo(dateTime) ?? 0
  }

  // ========== Legacy Cadence Setters ==========

  function setNewRecurrenceType(period: PeriodType, frequency: number): RecurrenceRule | null {
    if (state.readOnly || !inRange(frequency, 1, Number.MAX_SAFE_INTEGER)) return null
    const start = state.start
    if (start === null) return null

    const rule = createRecurrenceRule({
      start,
      floating: state.floating,
      period,
      frequency,
      duration: DURATION_FOREVER,
    })
    batch(() => {
      detach(state.rRules)
      state.rRules = []
      attach(rule)
      state.rRules.push(rule)
      updated()
    })
    return rule
  }

  function addMonthlyPos(pos: number, days: Weekday | Weekday[]): void {
    // 53 is allowed for yearly positions
    if (state.readOnly || !inRange(pos, -53, 53)) return
    const wanted = Array.isArray(days) ? days : [days]
    batch(() => {
      const rule = defaultRule(true)
      if (!rule) return
      const positions = rule.byDays()
      let changed = false
      for (const day of WEEKDAYS) {
        if (!wanted.includes(day)) continue
        if (positions.some(p => p.pos === pos && p.day === day)) continue
        positions.push({ pos, day })
        changed = true
      }
      if (changed) rule.setByDays(positions)
    })
  }

  function addToRuleList(
    value: number,
    get: (rule: RecurrenceRule) => number[],
    set: (rule: RecurrenceRule, values: number[]) => void
  ): void {
    batch(() => {
      const rule = defaultRule(true)
      if (!rule) return
      const values = get(rule)
      if (values.includes(value)) return
      set(rule, [...values, value])
    })
  }

  function addMonthlyDate(day: number): void {
    if (state.readOnly || !inRange(day, -31, 31)) return
    addToRuleList(day, r => r.byMonthDays(), (r, v) => r.setByMonthDays(v))
  }

  function setWeekly(frequency: number, weekStart: Weekday = 'mon', days?: Weekday[]): void {
    batch(() => {
      const rule = setNewRecurrenceType('weekly', frequency)
      if (!rule) return
      rule.setWeekStart(weekStart)
      if (days) addMonthlyPos(0, days)
    })
  }

  // ========== Explicit Date Lists ==========

  function dateListMutators<T extends string>(set: SortedSet<T>) {
    return {
      assign: (values: T[]) => mutate(() => set.assign(values)),
      add: (value: T) => mutate(() => { set.insert(value) }),
    }
  }

  const rDateOps = dateListMutators(state.rDates)
  const rDateTimeOps = dateListMutators(state.rDateTimes)
  const exDateOps = dateListMutators(state.exDates)
  const exDateTimeOps = dateListMutators(state.exDateTimes)

  // ========== Diagnostics ==========

  function dump(): string {
    const lines: string[] = []
    const flags = [state.floating ? 'floating' : '', state.readOnly ? 'read-only' : '']
      .filter(Boolean)
    lines.push(`Recurrence from ${state.start ?? '(unset)'} [${state.timeZone}]${flags.length ? ' ' + flags.join(', ') : ''}`)
    lines.push(`  ${state.rRules.length} inclusion rule(s)`)
    for (const rule of state.rRules) lines.push(`    - ${rule.describe()}`)
    lines.push(`  ${state.exRules.length} exclusion rule(s)`)
    for (const rule of state.exRules) lines.push(`    - ${rule.describe()}`)
    lines.push(`  inclusion dates: ${state.rDates.values().join(', ')}`)
    lines.push(`  inclusion date-times: ${state.rDateTimes.values().join(', ')}`)
    lines.push(`  exclusion dates: ${state.exDates.values().join(', ')}`)
    lines.push(`  exclusion date-times: ${state.exDateTimes.values().join(', ')}`)
    return lines.join('\n')
  }

  // ========== Public Object ==========

  const recurrence: Recurrence = {
    startDateTime: () => state.start,
    startDate: () => (state.start !== null ? dateOf(state.start) : null),

    setStartDateTime(start: LocalDateTime): void {
      mutate(() => {
        state.start = start
        state.floating = false
        for (const rule of allRules()) {
          rule.setFloating(false)
          rule.setStart(start)
        }
      })
    },

    setStartDate(start: LocalDate): void {
      mutate(() => {
        const anchor = makeDateTime(start, MIDNIGHT)
        state.start = anchor
        state.floating = true
        for (const rule of allRules()) {
          rule.setFloating(true)
          rule.setStart(anchor)
        }
      })
    },

    isFloating: () => state.floating,

    setFloating(floating: boolean): void {
      if (state.floating === floating) return
      mutate(() => {
        state.floating = floating
        if (floating && state.start !== null) state.start = makeDateTime(dateOf(state.start), MIDNIGHT)
        for (const rule of allRules()) rule.setFloating(floating)
      })
    },

    isReadOnly: () => state.readOnly,

    setReadOnly(readOnly: boolean): void {
      state.readOnly = readOnly
    },

    timeZone: () => state.timeZone,
    maxSearchIterations: () => searchLimit,

    recurs: () => state.rRules.length > 0 || state.rDates.size > 0 || state.rDateTimes.size > 0,

    recurrenceType(): RecurrenceType {
      if (cachedType === null) cachedType = classifyRule(state.rRules[0] ?? null)
      return cachedType
    },

    recursOn,
    recursAt,
    timesOn,
    timesInInterval,
    nextDateTime,
    previousDateTime,

    endDateTime,
    endDate(): LocalDate | null {
      const end = endDateTime()
      return end !== null ? dateOf(end) : null
    },
    setEndDateTime,
    setEndDate(end: LocalDate): void {
      setEndDateTime(makeDateTime(end, state.floating ? END_OF_DAY : anchorTime()))
    },
    duration: () => state.rRules[0]?.duration() ?? 0,
    setDuration(duration: number): void {
      if (state.readOnly || !inRange(duration, DURATION_FOREVER, Number.MAX_SAFE_INTEGER)) return
      batch(() => defaultRule(true)?.setDuration(duration))
    },
    durationTo,
    durationToDate: date => durationTo(makeDateTime(date, END_OF_DAY)),

    defaultRule: () => state.rRules[0] ?? null,
    frequency: () => state.rRules[0]?.frequency() ?? 0,
    setFrequency(frequency: number): void {
      if (state.readOnly || !inRange(frequency, 1, Number.MAX_SAFE_INTEGER)) return
      batch(() => defaultRule(true)?.setFrequency(frequency))
    },
    weekStart: () => state.rRules[0]?.weekStart() ?? 'mon',
    days(): Weekday[] {
      const positions = state.rRules[0]?.byDays() ?? []
      return WEEKDAYS.filter(day => positions.some(p => p.pos === 0 && p.day === day))
    },
    monthDays: () => state.rRules[0]?.byMonthDays() ?? [],
    monthPositions: () => state.rRules[0]?.byDays() ?? [],
    yearDays: () => state.rRules[0]?.byYearDays() ?? [],
    yearDates: () => state.rRules[0]?.byMonthDays() ?? [],
    yearMonths: () => state.rRules[0]?.byMonths() ?? [],
    yearPositions: () => state.rRules[0]?.byDays() ?? [],

    setNewRecurrenceType,
    setMinutely: frequency => { setNewRecurrenceType('minutely', frequency) },
    setHourly: frequency => { setNewRecurrenceType('hourly', frequency) },
    setDaily: frequency => { setNewRecurrenceType('daily', frequency) },
    setWeekly,
    addWeeklyDays: days => addMonthlyPos(0, days),
    setMonthly: frequency => { setNewRecurrenceType('monthly', frequency) },
    addMonthlyPos,
    addMonthlyDate,
    setYearly: frequency => { setNewRecurrenceType('yearly', frequency) },
    addYearlyDay(day: number): void {
      if (state.readOnly || !inRange(day, -366, 366)) return
      addToRuleList(day, r => r.byYearDays(), (r, v) => r.setByYearDays(v))
    },
    addYearlyDate: addMonthlyDate,
    addYearlyPos: addMonthlyPos,
    addYearlyMonth(month: number): void {
      if (state.readOnly || !inRange(month, 1, 12)) return
      addToRuleList(month, r => r.byMonths(), (r, v) => r.setByMonths(v))
    },

    unsetRecurs(): void {
      mutate(() => {
        detach(state.rRules)
        state.rRules = []
      })
    },

    clear(): void {
      mutate(() => {
        detach(allRules())
        state.rRules = []
        state.exRules = []
        state.rDates.clear()
        state.rDateTimes.clear()
        state.exDates.clear()
        state.exDateTimes.clear()
      })
    },

    shiftTimes(oldZone: string, newZone: string): void {
      if (!isValidTimeZone(oldZone) || !isValidTimeZone(newZone)) return
      mutate(() => {
        if (!state.floating) {
          const from = state.timeZone
          const shift = (dt: LocalDateTime) => convertZone(dt, from, oldZone)
          if (state.start !== null) state.start = shift(state.start)
          state.rDateTimes.assign(state.rDateTimes.values().map(shift))
          state.exDateTimes.assign(state.exDateTimes.values().map(shift))
          for (const rule of allRules()) rule.shiftTimes(from, oldZone)
        }
        state.timeZone = newZone
      })
    },

    rRules: () => [...state.rRules],
    addRRule(rule: RecurrenceRule): void {
      if (state.rRules.includes(rule)) return
      mutate(() => {
        attach(rule)
        state.rRules.push(rule)
      })
    },
    removeRRule(rule: RecurrenceRule): void {
      if (!state.rRules.includes(rule)) return
      mutate(() => {
        detach([rule])
        state.rRules = state.rRules.filter(r => r !== rule)
      })
    },
    exRules: () => [...state.exRules],
    addExRule(rule: RecurrenceRule): void {
      if (state.exRules.includes(rule)) return
      mutate(() => {
        attach(rule)
        state.exRules.push(rule)
      })
    },
    removeExRule(rule: RecurrenceRule): void {
      if (!state.exRules.includes(rule)) return
      mutate(() => {
        detach([rule])
        state.exRules = state.exRules.filter(r => r !== rule)
      })
    },

    rDates: () => state.rDates.values(),
    setRDates: rDateOps.assign,
    addRDate: rDateOps.add,
    rDateTimes: () => state.rDateTimes.values(),
    setRDateTimes: rDateTimeOps.assign,
    addRDateTime: rDateTimeOps.add,
    exDates: () => state.exDates.values(),
    setExDates: exDateOps.assign,
    addExDate: exDateOps.add,
    exDateTimes: () => state.exDateTimes.values(),
    setExDateTimes: exDateTimeOps.assign,
    addExDateTime: exDateTimeOps.add,

    addObserver(observer: RecurrenceObserver): void {
      if (!observers.includes(observer)) observers.push(observer)
    },
    removeObserver(observer: RecurrenceObserver): void {
      const i = observers.indexOf(observer)
      if (i >= 0) observers.splice(i, 1)
    },

    equals(other: Recurrence): boolean {
      return state.start === other.startDateTime()
        && state.floating === other.isFloating()
        && state.readOnly === other.isReadOnly()
        && state.timeZone === other.timeZone()
        && sameList(state.exDates.values(), other.exDates())
        && sameList(state.exDateTimes.values(), other.exDateTimes())
        && sameList(state.rDates.values(), other.rDates())
        && sameList(state.rDateTimes.values(), other.rDateTimes())
        && sameRules(state.rRules, other.rRules())
        && sameRules(state.exRules, other.exRules())
    },

    clone(): Recurrence {
      return buildRecurrence({
        ...state,
        rRules: state.rRules.map(rule => rule.clone()),
        exRules: state.exRules.map(rule => rule.clone()),
        rDates: state.rDates.clone(),
        rDateTimes: state.rDateTimes.clone(),
        exDates: state.exDates.clone(),
        exDateTimes: state.exDateTimes.clone(),
      }, searchLimit)
    },

    dump,
  }

  return recurrence
}
