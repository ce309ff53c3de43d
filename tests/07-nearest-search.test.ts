/**
 * Segment 07: Nearest-Neighbour Search Tests
 *
 * nextDateTime / previousDateTime with exclusions, explicit dates and the
 * bounded search for recurrences whose candidates are all excluded.
 */

import { describe, it, expect } from 'vitest'
import { createRecurrence, type Recurrence } from '../src/recurrence'
import { createRecurrenceRule } from '../src/recurrence-rule'
import type { LocalDate, LocalDateTime } from '../src/time-date'

const d = (s: string) => s as LocalDate
const dt = (s: string) => s as LocalDateTime

function weeklyMonWedFri(): Recurrence {
  const recurrence = createRecurrence()
  recurrence.setStartDateTime(dt('2024-01-01T09:00:00'))
  recurrence.setWeekly(1, 'mon', ['mon', 'wed', 'fri'])
  return recurrence
}

describe('nextDateTime', () => {
  it('finds the next rule occurrence', () => {
    expect(weeklyMonWedFri().nextDateTime(dt('2024-01-01T09:00:00'))).toBe('2024-01-03T09:00:00')
  })

  it('skips an excluded date', () => {
    const recurrence = weeklyMonWedFri()
    recurrence.addExDate(d('2024-01-03'))
    expect(recurrence.nextDateTime(dt('2024-01-01T09:00:00'))).toBe('2024-01-05T09:00:00')
  })

  it('returns the start from before it', () => {
    expect(weeklyMonWedFri().nextDateTime(dt('2023-12-01T00:00:00'))).toBe('2024-01-01T09:00:00')
  })

  it('gives up when an exclusion rule mirrors the inclusion rule', () => {
    const recurrence = createRecurrence()
    recurrence.setStartDateTime(dt('2024-01-01T00:00:00'))
    recurrence.setDaily(1)
    recurrence.addExRule(createRecurrenceRule({ start: dt('2024-01-01T00:00:00'), period: 'daily' }))
    expect(recurrence.nextDateTime(dt('2024-01-01T00:00:00'))).toBeNull()
  })

  it('stops at the configured number of exclusion rounds', () => {
    const build = (maxSearchIterations?: number) => {
      const recurrence = createRecurrence({ maxSearchIterations })
      recurrence.setStartDateTime(dt('2024-01-01T00:00:00'))
      recurrence.setDaily(1)
      recurrence.setExDates([d('2024-01-02'), d('2024-01-03')])
      return recurrence
    }
    expect(build(2).nextDateTime(dt('2024-01-01T00:00:00'))).toBeNull()
    expect(build().nextDateTime(dt('2024-01-01T00:00:00'))).toBe('2024-01-04T00:00:00')
  })

  it('walks explicit dates without any rule', () => {
    const recurrence = createRecurrence()
    recurrence.addRDate(d('2024-03-10'))
    recurrence.addRDateTime(dt('2024-03-05T08:00:00'))
    expect(recurrence.nextDateTime(dt('2024-03-01T00:00:00'))).toBe('2024-03-05T08:00:00')
    expect(recurrence.nextDateTime(dt('2024-03-05T08:00:00'))).toBe('2024-03-10T00:00:00')
    expect(recurrence.nextDateTime(dt('2024-03-10T00:00:00'))).toBeNull()
  })

  it('finds an inclusion date later on the same day', () => {
    const recurrence = createRecurrence()
    recurrence.setStartDateTime(dt('2024-01-01T09:00:00'))
    recurrence.addRDate(d('2024-01-10'))
    expect(recurrence.nextDateTime(dt('2024-01-10T08:00:00'))).toBe('2024-01-10T09:00:00')
    expect(recurrence.nextDateTime(dt('2024-01-10T09:00:00'))).toBeNull()
  })

  it('stops at an until end', () => {
    const recurrence = createRecurrence()
    recurrence.setStartDateTime(dt('2024-01-01T00:00:00'))
    recurrence.setDaily(1)
    recurrence.setEndDateTime(dt('2024-01-03T00:00:00'))
    expect(recurrence.nextDateTime(dt('2024-01-02T00:00:00'))).toBe('2024-01-03T00:00:00')
    expect(recurrence.nextDateTime(dt('2024-01-03T00:00:00'))).toBeNull()
  })
})

describe('previousDateTime', () => {
  it('skips an excluded date', () => {
    const recurrence = weeklyMonWedFri()
    recurrence.addExDate(d('2024-01-03'))
    expect(recurrence.previousDateTime(dt('2024-01-05T09:00:00'))).toBe('2024-01-01T09:00:00')
  })

  it('has nothing before the start', () => {
    expect(weeklyMonWedFri().previousDateTime(dt('2024-01-01T09:00:00'))).toBeNull()
  })

  it('finds the start from after it', () => {
    expect(weeklyMonWedFri().previousDateTime(dt('2024-01-02T00:00:00'))).toBe('2024-01-01T09:00:00')
  })

  it('gives up when every candidate is excluded', () => {
    const recurrence = createRecurrence()
    recurrence.setStartDateTime(dt('2024-01-01T00:00:00'))
    recurrence.setDaily(1)
    recurrence.addExRule(createRecurrenceRule({ start: dt('2024-01-01T00:00:00'), period: 'daily' }))
    expect(recurrence.previousDateTime(dt('2024-03-01T00:00:00'))).toBeNull()
  })

  it('walks explicit dates backwards', () => {
    const recurrence = createRecurrence()
    recurrence.addRDate(d('2024-03-10'))
    recurrence.addRDateTime(dt('2024-03-05T08:00:00'))
    expect(recurrence.previousDateTime(dt('2024-03-31T00:00:00'))).toBe('2024-03-10T00:00:00')
    expect(recurrence.previousDateTime(dt('2024-03-10T00:00:00'))).toBe('2024-03-05T08:00:00')
    expect(recurrence.previousDateTime(dt('2024-03-05T08:00:00'))).toBeNull()
  })

  it('finds an inclusion date earlier on the same day', () => {
    const recurrence = createRecurrence()
    recurrence.setStartDateTime(dt('2024-01-01T09:00:00'))
    recurrence.addRDate(d('2024-01-10'))
    expect(recurrence.previousDateTime(dt('2024-01-10T10:00:00'))).toBe('2024-01-10T09:00:00')
  })
})
