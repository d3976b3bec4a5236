/**
 * Consolidated error system for calendar-date.
 *
 * All error classes extend CalendarDateError, which carries a typed error code.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CalendarDateErrorCode = {
  // Construction
  INVALID_DATE: 'INVALID_DATE',

  // Parsing
  PARSE_ERROR: 'PARSE_ERROR',

  // Arithmetic
  OUT_OF_RANGE: 'OUT_OF_RANGE',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',

  // Serialization
  INVALID_DATA: 'INVALID_DATA',
} as const

export type CalendarDateErrorCode = (typeof CalendarDateErrorCode)[keyof typeof CalendarDateErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CalendarDateError extends Error {
  readonly code: CalendarDateErrorCode

  constructor(code: CalendarDateErrorCode, message: string) {
    super(message)
    this.name = 'CalendarDateError'
    this.code = code
  }
}

// ============================================================================
// Construction & Parsing Errors
// ============================================================================

export class InvalidDateError extends CalendarDateError {
  constructor(message: string) {
    super(CalendarDateErrorCode.INVALID_DATE, message)
    this.name = 'InvalidDateError'
  }
}

export class ParseError extends CalendarDateError {
  constructor(message: string) {
    super(CalendarDateErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Arithmetic Errors
// ============================================================================

export class DateOutOfRangeError extends CalendarDateError {
  constructor(message: string) {
    super(CalendarDateErrorCode.OUT_OF_RANGE, message)
    this.name = 'DateOutOfRangeError'
  }
}

export class InvalidArgumentError extends CalendarDateError {
  constructor(message: string) {
    super(CalendarDateErrorCode.INVALID_ARGUMENT, message)
    this.name = 'InvalidArgumentError'
  }
}

// ============================================================================
// Serialization Errors
// ============================================================================

export class InvalidDataError extends CalendarDateError {
  constructor(message: string) {
    super(CalendarDateErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}
