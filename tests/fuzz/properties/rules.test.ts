/**
 * Property tests for single-rule expansion.
 *
 * Tests the laws for:
 * - Enumeration order and membership
 * - Agreement between forward search, backward search and enumeration
 * - Count limits
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { recurrenceSampleGen, buildRule } from '../generators'
import { addDays, dateOf, makeDateTime, MIDNIGHT, type LocalDateTime } from '../../../src/time-date'

function windowAround(start: LocalDateTime): [LocalDateTime, LocalDateTime] {
  const from = makeDateTime(addDays(dateOf(start), -3), MIDNIGHT)
  return [from, makeDateTime(addDays(dateOf(start), 45), MIDNIGHT)]
}

describe('Rules - Enumeration', () => {
  it('lists strictly ascending occurrences inside the window, none before the start', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const rule = buildRule(sample)
        const [from, to] = windowAround(sample.start)
        const times = rule.timesInInterval(from, to)
        times.forEach((dt, i) => {
          expect(dt >= from && dt <= to).toBe(true)
          expect(dt >= sample.start).toBe(true)
          const prev = times[i - 1]
          if (prev !== undefined) expect(prev < dt).toBe(true)
        })
      })
    )
  })

  it('recurs at every listed occurrence', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const rule = buildRule(sample)
        for (const dt of rule.timesInInterval(...windowAround(sample.start))) {
          expect(rule.recursAt(dt)).toBe(true)
        }
      })
    )
  })

  it('never lists more than the count', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const rule = buildRule(sample)
        const duration = rule.duration()
        if (duration > 0) {
          expect(rule.timesInInterval(...windowAround(sample.start)).length).toBeLessThanOrEqual(duration)
        }
      })
    )
  })
})

describe('Rules - Search Agreement', () => {
  it('walking nextAfter reproduces the enumeration', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const rule = buildRule(sample)
        const [from, to] = windowAround(sample.start)
        const walked: LocalDateTime[] = []
        for (let dt = rule.nextAfter(from); dt !== null && dt <= to; dt = rule.nextAfter(dt)) {
          walked.push(dt)
        }
        expect(walked).toEqual(rule.timesInInterval(from, to).filter(dt => dt > from))
      })
    )
  })

  it('previousBefore steps back through the enumeration', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const rule = buildRule(sample)
        const times = rule.timesInInterval(...windowAround(sample.start))
        times.forEach((dt, i) => {
          expect(rule.previousBefore(dt)).toBe(times[i - 1] ?? null)
        })
      })
    )
  })

  it('a clone enumerates the same occurrences', () => {
    fc.assert(
      fc.property(recurrenceSampleGen(), (sample) => {
        const rule = buildRule(sample)
        const copy = rule.clone()
        expect(copy.equals(rule)).toBe(true)
        const window = windowAround(sample.start)
        expect(copy.timesInInterval(...window)).toEqual(rule.timesInInterval(...window))
      })
    )
  })
})
