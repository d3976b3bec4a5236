/**
 * Base generators for CalendarDate values.
 *
 * Provides type-safe wrappers around fast-check's Arbitrary for the date domain.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import { CalendarDate } from '../../../src/calendar-date'
import { daysInMonth, toDayNumber, MIN_YEAR, MAX_YEAR } from '../../../src/calendar'

// ============================================================================
// Type-Safe Generator Aliases
// ============================================================================

export type GenCalendarDate = Arbitrary<CalendarDate>

export type DateTriple = { year: number; month: number; day: number }

// ============================================================================
// Generator Builders
// ============================================================================

/**
 * Create a CalendarDate generator over an inclusive year range.
 * Draws uniformly over day numbers, so every day in the range is equally likely.
 */
export function calendarDateGen(options?: { minYear?: number; maxYear?: number }): GenCalendarDate {
  const minYear = options?.minYear ?? MIN_YEAR
  const maxYear = options?.maxYear ?? MAX_YEAR

  return fc
    .integer({ min: toDayNumber(minYear, 1, 1), max: toDayNumber(maxYear, 12, 31) })
    .map((n) => CalendarDate.fromDayNumber(n))
}

/**
 * Create a generator of valid (year, month, day) triples.
 */
export function dateTripleGen(options?: { minYear?: number; maxYear?: number }): Arbitrary<DateTriple> {
  const minYear = options?.minYear ?? MIN_YEAR
  const maxYear = options?.maxYear ?? MAX_YEAR

  return fc
    .tuple(fc.integer({ min: minYear, max: maxYear }), fc.integer({ min: 1, max: 12 }), fc.integer({ min: 1, max: 31 }))
    .map(([year, month, day]) => {
      // Clamp day to valid range for the month
      return { year, month, day: Math.min(day, daysInMonth(year, month)) }
    })
}

/**
 * Dates that stress month-end clamping: the last days of months, leap days included.
 */
export function monthEndDateGen(options?: { minYear?: number; maxYear?: number }): GenCalendarDate {
  const minYear = options?.minYear ?? MIN_YEAR
  const maxYear = options?.maxYear ?? MAX_YEAR

  return fc
    .tuple(fc.integer({ min: minYear, max: maxYear }), fc.integer({ min: 1, max: 12 }), fc.integer({ min: 0, max: 3 }))
    .map(([year, month, back]) => CalendarDate.of(year, month, daysInMonth(year, month) - back))
}
