/**
 * Recurrence Rule
 *
 * A single RRULE/EXRULE generator. Owns its fields, a small cache of
 * expanded blocks, and the list of observers told about every change.
 * The aggregator only talks to it through the RuleGenerator surface.
 */

import {
  type LocalDate,
  type LocalTime,
  type LocalDateTime,
  type Weekday,
  convertZone,
  dateOf,
  makeDateTime,
  timeOf,
  MIDNIGHT,
} from './time-date'
import type { PeriodType, RuleGenerator, RuleObserver, WeekdayPosition } from './types'
import { DURATION_FOREVER, DURATION_UNTIL } from './types'
import { InvalidRuleError } from './errors'
import { lowerBound } from './sorted-set'
import {
  type RuleState,
  blockBegin,
  blockIndexOf,
  blockOccurrences,
  untilLimit,
} from './rule-expansion'

export type { RuleState } from './rule-expansion'

// ============================================================================
// Types
// ============================================================================

export type RuleInit = {
  start: LocalDateTime
  period?: PeriodType
  frequency?: number
  duration?: number
  endDateTime?: LocalDateTime | null
  floating?: boolean
  weekStart?: Weekday
  byDays?: WeekdayPosition[]
  byMonthDays?: number[]
  byYearDays?: number[]
  byWeekNumbers?: number[]
  byMonths?: number[]
  byHours?: number[]
  byMinutes?: number[]
  bySeconds?: number[]
  bySetPos?: number[]
}

export type RecurrenceRule = RuleGenerator & {
  setPeriod(period: PeriodType): void
  setFrequency(frequency: number): void
  setDuration(duration: number): void
  setEndDateTime(endDateTime: LocalDateTime): void
  setWeekStart(weekStart: Weekday): void
  setByDays(byDays: WeekdayPosition[]): void
  setByMonthDays(values: number[]): void
  setByYearDays(values: number[]): void
  setByWeekNumbers(values: number[]): void
  setByMonths(values: number[]): void
  setByHours(values: number[]): void
  setByMinutes(values: number[]): void
  setBySeconds(values: number[]): void
  setBySetPos(values: number[]): void
  addObserver(observer: RuleObserver): void
  removeObserver(observer: RuleObserver): void
  /** Deep copy of every field. */
  state(): RuleState
  /** Independent copy without observers. */
  clone(): RecurrenceRule
  equals(other: RecurrenceRule): boolean
  describe(): string
}

/** Consecutive blocks without an occurrence before a scan gives up. */
export const MAX_EMPTY_BLOCKS = 5000

const BLOCK_CACHE_SIZE = 64

// ============================================================================
// Validation
// ============================================================================

type NumberField = 'byMonthDays' | 'byYearDays' | 'byWeekNumbers' | 'byMonths'
  | 'byHours' | 'byMinutes' | 'bySeconds' | 'bySetPos'

const FIELD_RANGES: Record<NumberField, [number, number]> = {
  byMonthDays: [-31, 31],
  byYearDays: [-366, 366],
  byWeekNumbers: [-53, 53],
  byMonths: [1, 12],
  byHours: [0, 23],
  byMinutes: [0, 59],
  bySeconds: [0, 59],
  bySetPos: [-366, 366],
}

function checkField(field: NumberField, values: number[]): number[] {
  const [min, max] = FIELD_RANGES[field]
  for (const v of values) {
    if (!Number.isInteger(v) || v < min || v > max) {
      throw new InvalidRuleError(`${field} requires integers ${min}..${max}, got ${v}`)
    }
  }
  return [...values]
}

function checkByDays(byDays: WeekdayPosition[]): WeekdayPosition[] {
  for (const entry of byDays) {
    if (!Number.isInteger(entry.pos) || entry.pos < -53 || entry.pos > 53) {
      throw new InvalidRuleError(`byDays position must be -53..53, got ${entry.pos}`)
    }
  }
  return byDays.map(entry => ({ ...entry }))
}

function checkFrequency(frequency: number): number {
  if (!Number.isInteger(frequency) || frequency < 1) {
    throw new InvalidRuleError(`frequency requires an integer >= 1, got ${frequency}`)
  }
  return frequency
}

function checkDuration(duration: number): number {
  if (!Number.isInteger(duration) || duration < DURATION_FOREVER) {
    throw new InvalidRuleError(`duration requires an integer >= -1, got ${duration}`)
  }
  return duration
}

function sameNumbers(a: number[], b: number[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i])
}

function sameByDays(a: WeekdayPosition[], b: WeekdayPosition[]): boolean {
  return a.length === b.length && a.every((v, i) => v.pos === b[i]?.pos && v.day === b[i]?.day)
}

function sameRuleState(a: RuleState, b: RuleState): boolean {
  return a.period === b.period
    && a.frequency === b.frequency
    && a.duration === b.duration
    && a.endDateTime === b.endDateTime
    && a.start === b.start
    && a.floating === b.floating
    && a.weekStart === b.weekStart
    && sameByDays(a.byDays, b.byDays)
    && sameNumbers(a.byMonthDays, b.byMonthDays)
    && sameNumbers(a.byYearDays, b.byYearDays)
    && sameNumbers(a.byWeekNumbers, b.byWeekNumbers)
    && sameNumbers(a.byMonths, b.byMonths)
    && sameNumbers(a.byHours, b.byHours)
    && sameNumbers(a.byMinutes, b.byMinutes)
    && sameNumbers(a.bySeconds, b.bySeconds)
    && sameNumbers(a.bySetPos, b.bySetPos)
}

function copyState(state: RuleState): RuleState {
  return {
    ...state,
    byDays: state.byDays.map(entry => ({ ...entry })),
    byMonthDays: [...state.byMonthDays],
    byYearDays: [...state.byYearDays],
    byWeekNumbers: [...state.byWeekNumbers],
    byMonths: [...state.byMonths],
    byHours: [...state.byHours],
    byMinutes: [...state.byMinutes],
    bySeconds: [...state.bySeconds],
    bySetPos: [...state.bySetPos],
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createRecurrenceRule(init: RuleInit): RecurrenceRule {
  const state: RuleState = {
    period: init.period ?? 'none',
    frequency: checkFrequency(init.frequency ?? 1),
    duration: checkDuration(init.duration ?? DURATION_FOREVER),
    endDateTime: init.endDateTime ?? null,
    start: init.start,
    floating: init.floating ?? false,
    weekStart: init.weekStart ?? 'mon',
    byDays: checkByDays(init.byDays ?? []),
    byMonthDays: checkField('byMonthDays', init.byMonthDays ?? []),
    byYearDays: checkField('byYearDays', init.byYearDays ?? []),
    byWeekNumbers: checkField('byWeekNumbers', init.byWeekNumbers ?? []),
    byMonths: checkField('byMonths', init.byMonths ?? []),
    byHours: checkField('byHours', init.byHours ?? []),
    byMinutes: checkField('byMinutes', init.byMinutes ?? []),
    bySeconds: checkField('bySeconds', init.bySeconds ?? []),
    bySetPos: checkField('bySetPos', init.bySetPos ?? []),
  }
  if (state.floating) state.start = makeDateTime(dateOf(state.start), MIDNIGHT)

  const observers: RuleObserver[] = []
  const blockCache = new Map<number, LocalDateTime[]>()
  let counted: LocalDateTime[] | null = null

  // ========== Change Tracking ==========

  function changed(): void {
    blockCache.clear()
    counted = null
    for (const observer of [...observers]) observer.ruleChanged(rule)
  }

  function update(apply: () => boolean): void {
    if (apply()) changed()
  }

  // ========== Expansion ==========

  function block(n: number): LocalDateTime[] {
    if (n < 0) return []
    const hit = blockCache.get(n)
    if (hit) return hit
    const occurrences = blockOccurrences(state, n)
    if (blockCache.size >= BLOCK_CACHE_SIZE) blockCache.clear()
    blockCache.set(n, occurrences)
    return occurrences
  }

  /** The complete occurrence list, for rules that have one. */
  function finiteOccurrences(): LocalDateTime[] | null {
    if (state.period === 'none') return [state.start]
    if (state.duration <= DURATION_UNTIL) return null
    if (counted) return counted

    const result: LocalDateTime[] = []
    let empty = 0
    for (let n = 0; result.length < state.duration && empty < MAX_EMPTY_BLOCKS; n++) {
      const occurrences = block(n)
      if (occurrences.length === 0) {
        empty++
        continue
      }
      empty = 0
      result.push(...occurrences.slice(0, state.duration - result.length))
    }
    counted = result
    return result
  }

  // ========== Queries ==========

  function timesOn(date: LocalDate): LocalTime[] {
    const finite = finiteOccurrences()
    // Daily and coarser periods hold whole days, sub-daily blocks are days
    const source = finite ?? block(blockIndexOf(state, makeDateTime(date, MIDNIGHT)))
    return source.filter(dt => dateOf(dt) === date).map(timeOf)
  }

  function recursOn(date: LocalDate): boolean {
    return timesOn(date).length > 0
  }

  function recursAt(dateTime: LocalDateTime): boolean {
    if (state.floating) return recursOn(dateOf(dateTime))
    return timesOn(dateOf(dateTime)).includes(timeOf(dateTime))
  }

  function timesInInterval(start: LocalDateTime, end: LocalDateTime): LocalDateTime[] {
    if (end < start) return []
    const finite = finiteOccurrences()
    if (finite) return finite.filter(dt => dt >= start && dt <= end)

    const limit = untilLimit(state)
    const bound = limit !== null && limit < end ? limit : end
    const result: LocalDateTime[] = []
    for (let n = Math.max(0, blockIndexOf(state, start)); blockBegin(state, n) <= bound; n++) {
      for (const dt of block(n)) {
        if (dt >= start && dt <= end) result.push(dt)
      }
    }
    return result
  }

  function nextAfter(dateTime: LocalDateTime): LocalDateTime | null {
    const finite = finiteOccurrences()
    if (finite) {
      let i = lowerBound(finite, dateTime)
      if (finite[i] === dateTime) i++
      return finite[i] ?? null
    }

    const limit = untilLimit(state)
    if (limit !== null && dateTime >= limit) return null
    let n = Math.max(0, blockIndexOf(state, dateTime))
    for (let empty = 0; empty < MAX_EMPTY_BLOCKS; empty++, n++) {
      if (limit !== null && blockBegin(state, n) > limit) return null
      const found = block(n).find(dt => dt > dateTime)
      if (found !== undefined) return found
    }
    return null
  }

  function previousBefore(dateTime: LocalDateTime): LocalDateTime | null {
    const finite = finiteOccurrences()
    if (finite) return finite[lowerBound(finite, dateTime) - 1] ?? null

    const limit = untilLimit(state)
    const reference = limit !== null && dateTime > limit ? limit : dateTime
    let n = blockIndexOf(state, reference)
    for (let scanned = 0; n >= 0 && scanned < MAX_EMPTY_BLOCKS; scanned++, n--) {
      const occurrences = block(n)
      for (let i = occurrences.length - 1; i >= 0; i--) {
        const dt = occurrences[i]
        if (dt !== undefined && dt < dateTime) return dt
      }
    }
    return null
  }

  function endDateTime(): LocalDateTime | null {
    const finite = finiteOccurrences()
    if (finite) return finite[finite.length - 1] ?? state.start
    return untilLimit(state)
  }

  function durationTo(dateTime: LocalDateTime): number {
    const finite = finiteOccurrences()
    if (finite) return finite.filter(dt => dt <= dateTime).length
    return timesInInterval(state.start, dateTime).length
  }

  // ========== Field Setters ==========

  function setNumbers(field: NumberField, values: number[]): void {
    const next = checkField(field, values)
    update(() => {
      if (sameNumbers(state[field], next)) return false
      state[field] = next
      return true
    })
  }

  function describe(): string {
    const parts = [`${state.period} every ${state.frequency}`, `from ${state.start}`]
    if (state.floating) parts.push('floating')
    if (state.byDays.length > 0) {
      parts.push(`byDays [${state.byDays.map(d => (d.pos === 0 ? d.day : `${d.pos}${d.day}`)).join(', ')}]`)
    }
    const lists: NumberField[] = ['byMonthDays', 'byYearDays', 'byWeekNumbers', 'byMonths',
      'byHours', 'byMinutes', 'bySeconds', 'bySetPos']
    for (const field of lists) {
      if (state[field].length > 0) parts.push(`${field} [${state[field].join(', ')}]`)
    }
    if (state.duration > 0) parts.push(`${state.duration} times`)
    else if (state.duration === DURATION_UNTIL && state.endDateTime !== null) parts.push(`until ${state.endDateTime}`)
    else parts.push('forever')
    return parts.join(', ')
  }

  const rule: RecurrenceRule = {
    period: () => state.period,
    frequency: () => state.frequency,
    duration: () => state.duration,
    weekStart: () => state.weekStart,
    byDays: () => state.byDays.map(entry => ({ ...entry })),
    byMonthDays: () => [...state.byMonthDays],
    byYearDays: () => [...state.byYearDays],
    byWeekNumbers: () => [...state.byWeekNumbers],
    byMonths: () => [...state.byMonths],
    byHours: () => [...state.byHours],
    byMinutes: () => [...state.byMinutes],
    bySeconds: () => [...state.bySeconds],
    bySetPos: () => [...state.bySetPos],
    start: () => state.start,
    isFloating: () => state.floating,

    endDateTime,
    recursOn,
    recursAt,
    timesOn,
    timesInInterval,
    nextAfter,
    previousBefore,
    durationTo,

    setFloating(floating: boolean): void {
      update(() => {
        if (state.floating === floating) return false
        state.floating = floating
        if (floating) state.start = makeDateTime(dateOf(state.start), MIDNIGHT)
        return true
      })
    },

    setStart(start: LocalDateTime): void {
      const next = state.floating ? makeDateTime(dateOf(start), MIDNIGHT) : start
      update(() => {
        if (state.start === next) return false
        state.start = next
        return true
      })
    },

    shiftTimes(fromZone: string, toZone: string): void {
      if (state.floating) return
      update(() => {
        state.start = convertZone(state.start, fromZone, toZone)
        if (state.endDateTime !== null) state.endDateTime = convertZone(state.endDateTime, fromZone, toZone)
        return true
      })
    },

    setPeriod(period: PeriodType): void {
      update(() => {
        if (state.period === period) return false
        state.period = period
        return true
      })
    },

    setFrequency(frequency: number): void {
      const next = checkFrequency(frequency)
      update(() => {
        if (state.frequency === next) return false
        state.frequency = next
        return true
      })
    },

    setDuration(duration: number): void {
      const next = checkDuration(duration)
      update(() => {
        if (state.duration === next) return false
        state.duration = next
        return true
      })
    },

    setEndDateTime(end: LocalDateTime): void {
      update(() => {
        if (state.duration === DURATION_UNTIL && state.endDateTime === end) return false
        state.duration = DURATION_UNTIL
        state.endDateTime = end
        return true
      })
    },

    setWeekStart(weekStart: Weekday): void {
      update(() => {
        if (state.weekStart === weekStart) return false
        state.weekStart = weekStart
        return true
      })
    },

    setByDays(byDays: WeekdayPosition[]): void {
      const next = checkByDays(byDays)
      update(() => {
        if (sameByDays(state.byDays, next)) return false
        state.byDays = next
        return true
      })
    },

    setByMonthDays: values => setNumbers('byMonthDays', values),
    setByYearDays: values => setNumbers('byYearDays', values),
    setByWeekNumbers: values => setNumbers('byWeekNumbers', values),
    setByMonths: values => setNumbers('byMonths', values),
    setByHours: values => setNumbers('byHours', values),
    setByMinutes: values => setNumbers('byMinutes', values),
    setBySeconds: values => setNumbers('bySeconds', values),
    setBySetPos: values => setNumbers('bySetPos', values),

    addObserver(observer: RuleObserver): void {
      if (!observers.includes(observer)) observers.push(observer)
    },

    removeObserver(observer: RuleObserver): void {
      const i = observers.indexOf(observer)
      if (i >= 0) observers.splice(i, 1)
    },

    state: () => copyState(state),
    clone: () => createRecurrenceRule(copyState(state)),
    equals: other => sameRuleState(state, other.state()),
    describe,
  }

  return rule
}
