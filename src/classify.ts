/**
 * Recurrence Classification
 *
 * Maps a rule's BY* combination onto the closed set of legacy single-rule
 * categories. Anything the legacy categories cannot express is OTHER.
 */

import type { RuleFields } from './types'
import { RecurrenceType } from './types'

export function classifyRule(rule: RuleFields | null): RecurrenceType {
  if (!rule) return RecurrenceType.NONE
  const period = rule.period()

  // No legacy equivalent for these at all
  if (rule.bySetPos().length > 0
    || rule.bySeconds().length > 0
    || rule.byWeekNumbers().length > 0
    || rule.byMinutes().length > 0
    || rule.byHours().length > 0) {
    return RecurrenceType.OTHER
  }

  // BYYEARDAY and BYMONTH only combine with YEARLY; BYDAY with WEEKLY, MONTHLY, YEARLY
  if ((rule.byYearDays().length > 0 || rule.byMonths().length > 0) && period !== 'yearly') {
    return RecurrenceType.OTHER
  }
  const hasDays = rule.byDays().length > 0
  if (hasDays && period !== 'yearly' && period !== 'monthly' && period !== 'weekly') {
    return RecurrenceType.OTHER
  }

  switch (period) {
    case 'none':
      return RecurrenceType.NONE
    case 'minutely':
      return RecurrenceType.MINUTELY
    case 'hourly':
      return RecurrenceType.HOURLY
    case 'daily':
      return RecurrenceType.DAILY
    case 'weekly':
      return RecurrenceType.WEEKLY
    case 'monthly':
      if (!hasDays) return RecurrenceType.MONTHLY_DAY
      if (rule.byMonthDays().length === 0) return RecurrenceType.MONTHLY_POS
      return RecurrenceType.OTHER
    case 'yearly':
      if (hasDays) {
        return rule.byMonthDays().length === 0 && rule.byYearDays().length === 0
          ? RecurrenceType.YEARLY_POS
          : RecurrenceType.OTHER
      }
      if (rule.byYearDays().length > 0) {
        return rule.byMonths().length === 0 && rule.byMonthDays().length === 0
          ? RecurrenceType.YEARLY_DAY
          : RecurrenceType.OTHER
      }
      return RecurrenceType.YEARLY_MONTH
    default:
      return RecurrenceType.OTHER
  }
}
