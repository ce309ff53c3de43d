/**
 * Property tests for the recurrence aggregator.
 *
 * Tests the invariants and laws for:
 * - Exclusion precedence
 * - Agreement between membership, per-day times, enumeration and search
 * - Copy semantics
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { recurrenceSampleGen, buildRecurrence } from '../generators'
import {
  addDays,
  dateOf,
  makeDateTime,
  timeOf,
  MIDNIGHT,
  type LocalDateTime,
} from '../../../src/time-date'

function windowAround(start: LocalDateTime): [LocalDateTime, LocalDateTime] {
  const from = makeDateTime(addDays(dateOf(start), -3), MIDNIGHT)
  return [from, makeDateTime(addDays(dateOf(start), 30), MIDNIGHT)]
}

describe('Recurrence - Exclusion Precedence', () => {
  it('never yields an excluded date', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const recurrence = buildRecurrence(sample)
        const excluded = new Set<string>(recurrence.exDates())
        for (const dt of recurrence.timesInInterval(...windowAround(sample.start))) {
          expect(excluded.has(dateOf(dt))).toBe(false)
        }
        for (const date of recurrence.exDates()) {
          expect(recurrence.recursOn(date)).toBe(false)
        }
      })
    )
  })

  it('excluding an occurrence date removes the whole day', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const recurrence = buildRecurrence(sample)
        const next = recurrence.nextDateTime(sample.start)
        if (next === null) return
        recurrence.addExDate(dateOf(next))
        expect(recurrence.recursOn(dateOf(next))).toBe(false)
        expect(recurrence.recursAt(next)).toBe(false)
        expect(recurrence.timesOn(dateOf(next))).toEqual([])
      })
    )
  })
})

describe('Recurrence - Query Agreement', () => {
  it('recurs at and on every enumerated occurrence', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const recurrence = buildRecurrence(sample)
        for (const dt of recurrence.timesInInterval(...windowAround(sample.start))) {
          expect(recurrence.recursAt(dt)).toBe(true)
          expect(recurrence.recursOn(dateOf(dt))).toBe(true)
        }
      })
    )
  })

  it('per-day times match the enumeration day by day', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const recurrence = buildRecurrence(sample)
        const [from, to] = windowAround(sample.start)
        const times = recurrence.timesInInterval(from, to)
        for (let date = dateOf(from); date < dateOf(to); date = addDays(date, 1)) {
          const expected = times.filter(dt => dateOf(dt) === date).map(timeOf)
          expect(recurrence.timesOn(date)).toEqual(expected)
          expect(recurrence.recursOn(date)).toBe(expected.length > 0)
        }
      })
    )
  })

  it('walking nextDateTime reproduces the enumeration', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const recurrence = buildRecurrence(sample)
        const [from, to] = windowAround(sample.start)
        const walked: LocalDateTime[] = []
        for (let dt = recurrence.nextDateTime(from); dt !== null && dt <= to; dt = recurrence.nextDateTime(dt)) {
          walked.push(dt)
        }
        expect(walked).toEqual(recurrence.timesInInterval(from, to).filter(dt => dt > from))
      })
    )
  })

  it('previousDateTime steps back through the enumeration', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const recurrence = buildRecurrence(sample)
        const times = recurrence.timesInInterval(...windowAround(sample.start))
        times.forEach((dt, i) => {
          expect(recurrence.previousDateTime(dt)).toBe(times[i - 1] ?? null)
        })
      })
    )
  })
})

describe('Recurrence - Copy Semantics', () => {
  it('a clone is equal and enumerates the same occurrences', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const recurrence = buildRecurrence(sample)
        const copy = recurrence.clone()
        expect(copy.equals(recurrence)).toBe(true)
        const window = windowAround(sample.start)
        expect(copy.timesInInterval(...window)).toEqual(recurrence.timesInInterval(...window))
      })
    )
  })

  it('changing a clone leaves the original alone', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), fc.integer({ min: 0, max: 30 }), (sample, offset) => {
        const recurrence = buildRecurrence(sample)
        const before = recurrence.exDates()
        const copy = recurrence.clone()
        copy.addExDate(addDays(dateOf(sample.start), offset))
        expect(recurrence.exDates()).toEqual(before)
      })
    )
  })
})
