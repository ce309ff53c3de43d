/**
 * Consolidated error system for recurrence-set.
 *
 * All error classes extend RecurrenceError, which carries a typed error code.
 * Errors are only thrown at construction and parsing boundaries; the
 * recurrence aggregator itself answers with no-ops and null sentinels.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const RecurrenceErrorCode = {
  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Rule generator
  INVALID_RULE: 'INVALID_RULE',

  // Aggregator configuration
  VALIDATION: 'VALIDATION',
} as const

export type RecurrenceErrorCode = (typeof RecurrenceErrorCode)[keyof typeof RecurrenceErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class RecurrenceError extends Error {
  readonly code: RecurrenceErrorCode

  constructor(code: RecurrenceErrorCode, message: string) {
    super(message)
    this.name = 'RecurrenceError'
    this.code = code
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends RecurrenceError {
  constructor(message: string) {
    super(RecurrenceErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Rule Errors
// ============================================================================

export class InvalidRuleError extends RecurrenceError {
  constructor(message: string) {
    super(RecurrenceErrorCode.INVALID_RULE, message)
    this.name = 'InvalidRuleError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ValidationError extends RecurrenceError {
  constructor(message: string) {
    super(RecurrenceErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}
