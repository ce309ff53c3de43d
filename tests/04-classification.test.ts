/**
 * Segment 04: Classification Tests
 *
 * Maps the default rule onto the legacy single-rule categories.
 */

import { describe, it, expect } from 'vitest'
import { classifyRule } from '../src/classify'
import { createRecurrenceRule, type RuleInit } from '../src/recurrence-rule'
import { createRecurrence } from '../src/recurrence'
import { RecurrenceType } from '../src/types'
import type { LocalDateTime } from '../src/time-date'

const start = '2024-01-01T09:00:00' as LocalDateTime

function classify(init: Omit<RuleInit, 'start'>) {
  return classifyRule(createRecurrenceRule({ start, ...init }))
}

describe('classifyRule', () => {
  it('classifies a missing rule as none', () => {
    expect(classifyRule(null)).toBe(RecurrenceType.NONE)
  })

  it('classifies a rule without a period as none', () => {
    expect(classify({})).toBe(RecurrenceType.NONE)
  })

  it('maps plain periods directly', () => {
    expect(classify({ period: 'minutely' })).toBe(RecurrenceType.MINUTELY)
    expect(classify({ period: 'hourly' })).toBe(RecurrenceType.HOURLY)
    expect(classify({ period: 'daily' })).toBe(RecurrenceType.DAILY)
    expect(classify({ period: 'weekly', byDays: [{ pos: 0, day: 'mon' }] })).toBe(RecurrenceType.WEEKLY)
  })

  it('has no legacy category for secondly rules', () => {
    expect(classify({ period: 'secondly' })).toBe(RecurrenceType.OTHER)
  })

  describe('monthly', () => {
    it('is by day of month without weekdays', () => {
      expect(classify({ period: 'monthly' })).toBe(RecurrenceType.MONTHLY_DAY)
      expect(classify({ period: 'monthly', byMonthDays: [15] })).toBe(RecurrenceType.MONTHLY_DAY)
    })

    it('is by position with weekdays', () => {
      expect(classify({ period: 'monthly', byDays: [{ pos: 2, day: 'tue' }] })).toBe(RecurrenceType.MONTHLY_POS)
    })

    it('is other when mixing weekdays and days of month', () => {
      expect(classify({ period: 'monthly', byDays: [{ pos: 0, day: 'fri' }], byMonthDays: [13] }))
        .toBe(RecurrenceType.OTHER)
    })
  })

  describe('yearly', () => {
    it('is by month by default', () => {
      expect(classify({ period: 'yearly' })).toBe(RecurrenceType.YEARLY_MONTH)
      expect(classify({ period: 'yearly', byMonths: [3], byMonthDays: [1] })).toBe(RecurrenceType.YEARLY_MONTH)
    })

    it('is by day of year with only year days', () => {
      expect(classify({ period: 'yearly', byYearDays: [100] })).toBe(RecurrenceType.YEARLY_DAY)
    })

    it('is other when year days meet months', () => {
      expect(classify({ period: 'yearly', byYearDays: [100], byMonths: [4] })).toBe(RecurrenceType.OTHER)
    })

    it('is by position with weekdays', () => {
      expect(classify({ period: 'yearly', byMonths: [5], byDays: [{ pos: -1, day: 'mon' }] }))
        .toBe(RecurrenceType.YEARLY_POS)
    })

    it('is other when weekdays meet days of month', () => {
      expect(classify({ period: 'yearly', byMonthDays: [10], byDays: [{ pos: 2, day: 'tue' }] }))
        .toBe(RecurrenceType.OTHER)
    })
  })

  it('is other for any time-level or set-position limit', () => {
    expect(classify({ period: 'daily', byHours: [8] })).toBe(RecurrenceType.OTHER)
    expect(classify({ period: 'daily', byMinutes: [30] })).toBe(RecurrenceType.OTHER)
    expect(classify({ period: 'hourly', bySeconds: [15] })).toBe(RecurrenceType.OTHER)
    expect(classify({ period: 'monthly', bySetPos: [1] })).toBe(RecurrenceType.OTHER)
    expect(classify({ period: 'yearly', byWeekNumbers: [20] })).toBe(RecurrenceType.OTHER)
  })

  it('is other for date limits a period cannot hold', () => {
    expect(classify({ period: 'daily', byMonths: [1] })).toBe(RecurrenceType.OTHER)
    expect(classify({ period: 'monthly', byYearDays: [1] })).toBe(RecurrenceType.OTHER)
    expect(classify({ period: 'daily', byDays: [{ pos: 0, day: 'mon' }] })).toBe(RecurrenceType.OTHER)
  })
})

describe('Recurrence.recurrenceType', () => {
  it('is none without rules', () => {
    const recurrence = createRecurrence()
    recurrence.setStartDateTime(start)
    expect(recurrence.recurrenceType()).toBe(RecurrenceType.NONE)
  })

  it('follows the default rule', () => {
    const recurrence = createRecurrence()
    recurrence.setStartDateTime(start)
    recurrence.setMonthly(1)
    recurrence.addMonthlyPos(-1, 'fri')
    expect(recurrence.recurrenceType()).toBe(RecurrenceType.MONTHLY_POS)
  })

  it('is recomputed after the rules change', () => {
    const recurrence = createRecurrence()
    recurrence.setStartDateTime(start)
    recurrence.setDaily(1)
    expect(recurrence.recurrenceType()).toBe(RecurrenceType.DAILY)
    recurrence.defaultRule()?.setByHours([8, 12])
    expect(recurrence.recurrenceType()).toBe(RecurrenceType.OTHER)
    recurrence.unsetRecurs()
    expect(recurrence.recurrenceType()).toBe(RecurrenceType.NONE)
  })
})
