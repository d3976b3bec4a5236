/**
 * Gregorian Calendar Helpers
 *
 * Pure functions over raw (year, month, day) triples in the proleptic Gregorian calendar.
 * Date arithmetic goes through the Julian Day Number, shifted so that day 0 is 1970-01-01.
 */

// ============================================================================
// Supported Range
// ============================================================================

export const MIN_YEAR = 1
export const MAX_YEAR = 9999

/** Julian Day Number of 1970-01-01 */
const EPOCH_JDN = 2440588

// ============================================================================
// Month & Year Lengths
// ============================================================================

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

export function isValidDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false
  if (year < MIN_YEAR || year > MAX_YEAR) return false
  if (month < 1 || month > 12) return false
  return day >= 1 && day <= daysInMonth(year, month)
}

// ============================================================================
// Day Numbers (days since 1970-01-01)
// ============================================================================

export function toDayNumber(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  const jdn =
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  return jdn - EPOCH_JDN
}

export function fromDayNumber(dayNumber: number): { year: number; month: number; day: number } {
  const a = dayNumber + EPOCH_JDN + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor((146097 * b) / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor((1461 * d) / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

/** Smallest and largest day numbers inside [MIN_YEAR, MAX_YEAR] */
export const MIN_DAY_NUMBER = toDayNumber(MIN_YEAR, 1, 1)
export const MAX_DAY_NUMBER = toDayNumber(MAX_YEAR, 12, 31)

// ============================================================================
// Derived Fields
// ============================================================================

/** 0 = Sunday .. 6 = Saturday */
export function weekdayOfDayNumber(dayNumber: number): number {
  // 1970-01-01 was a Thursday (4)
  return (((dayNumber + 4) % 7) + 7) % 7
}

export function dayOfYear(year: number, month: number, day: number): number {
  return toDayNumber(year, month, day) - toDayNumber(year, 1, 1) + 1
}
