/**
 * CalendarDate
 *
 * Immutable proleptic Gregorian date with no time-of-day and no time zone.
 * Holds the normalized (year, month, day) triple plus its day number (days since 1970-01-01),
 * which drives ordering, hashing and day arithmetic.
 */

import type { Clock } from './clock'
import { systemClock } from './clock'
import {
  MIN_YEAR, MAX_YEAR, MIN_DAY_NUMBER, MAX_DAY_NUMBER,
  isLeapYear, daysInMonth, isValidDate,
  toDayNumber, fromDayNumber, weekdayOfDayNumber, dayOfYear,
} from './calendar'
import { DateOutOfRangeError, InvalidArgumentError, InvalidDateError, ParseError } from './errors'
import type { Result } from './result'
import { Ok, Err } from './result'

// ============================================================================
// Day of Week
// ============================================================================

export const DayOfWeek = {
  Sunday: 0,
  Monday: 1,
  Tuesday: 2,
  Wednesday: 3,
  Thursday: 4,
  Friday: 5,
  Saturday: 6,
} as const

export type DayOfWeek = (typeof DayOfWeek)[keyof typeof DayOfWeek]

const WEEKDAYS: readonly DayOfWeek[] = [
  DayOfWeek.Sunday, DayOfWeek.Monday, DayOfWeek.Tuesday, DayOfWeek.Wednesday,
  DayOfWeek.Thursday, DayOfWeek.Friday, DayOfWeek.Saturday,
]

// ============================================================================
// Helpers
// ============================================================================

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

function requireInteger(name: string, n: number): void {
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError(`${name} must be an integer, got ${n}`)
  }
}

export interface CalendarDateFields {
  readonly year: number
  readonly month: number
  readonly day: number
}

// ============================================================================
// CalendarDate
// ============================================================================

export class CalendarDate {
  readonly year: number
  readonly month: number
  readonly day: number
  private readonly epochDay: number

  /**
   * @throws InvalidDateError when the triple is not a date in [MIN_YEAR, MAX_YEAR]
   */
  constructor(year: number, month: number, day: number) {
    if (!isValidDate(year, month, day)) {
      throw new InvalidDateError(`Invalid date: year=${year}, month=${month}, day=${day}`)
    }
    this.year = year
    this.month = month
    this.day = day
    this.epochDay = toDayNumber(year, month, day)
    Object.freeze(this)
  }

  static of(year: number, month: number, day: number): CalendarDate {
    return new CalendarDate(year, month, day)
  }

  /** Current local calendar date as seen by `clock`. */
  static today(clock: Clock = systemClock): CalendarDate {
    const now = clock.now()
    return new CalendarDate(now.getFullYear(), now.getMonth() + 1, now.getDate())
  }

  static fromDayNumber(dayNumber: number): CalendarDate {
    requireInteger('dayNumber', dayNumber)
    if (dayNumber < MIN_DAY_NUMBER || dayNumber > MAX_DAY_NUMBER) {
      throw new DateOutOfRangeError(`Day number ${dayNumber} is outside years ${MIN_YEAR}-${MAX_YEAR}`)
    }
    const { year, month, day } = fromDayNumber(dayNumber)
    return new CalendarDate(year, month, day)
  }

  // ==========================================================================
  // Parsing
  // ==========================================================================

  /** Parses `YYYY-MM-DD`. Never throws. */
  static tryParse(text: string): Result<CalendarDate, ParseError> {
    const match = ISO_DATE.exec(text)
    if (!match) return Err(new ParseError(`Invalid date format: '${text}'`))

    const [, y = '', m = '', d = ''] = match
    const year = parseInt(y, 10)
    const month = parseInt(m, 10)
    const day = parseInt(d, 10)

    if (year < MIN_YEAR || year > MAX_YEAR)
      return Err(new ParseError(`Invalid year in date: '${text}'`))
    if (month < 1 || month > 12)
      return Err(new ParseError(`Invalid month in date: '${text}'`))
    if (day < 1 || day > daysInMonth(year, month))
      return Err(new ParseError(`Invalid day in date: '${text}'`))

    return Ok(new CalendarDate(year, month, day))
  }

  /**
   * @throws ParseError when `text` is not a valid `YYYY-MM-DD` date
   */
  static parse(text: string): CalendarDate {
    const result = CalendarDate.tryParse(text)
    if (!result.ok) throw result.error
    return result.value
  }

  // ==========================================================================
  // Derived Fields
  // ==========================================================================

  get dayOfWeek(): DayOfWeek {
    return WEEKDAYS[weekdayOfDayNumber(this.epochDay)] ?? DayOfWeek.Sunday
  }

  get dayOfYear(): number {
    return dayOfYear(this.year, this.month, this.day)
  }

  get isLeapYear(): boolean {
    return isLeapYear(this.year)
  }

  get daysInMonth(): number {
    return daysInMonth(this.year, this.month)
  }

  toDayNumber(): number {
    return this.epochDay
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  addDays(n: number): CalendarDate {
    requireInteger('days', n)
    if (n === 0) return this
    return CalendarDate.fromDayNumber(this.epochDay + n)
  }

  /** Clamps the day to the last day of the target month. */
  addMonths(n: number): CalendarDate {
    requireInteger('months', n)
    if (n === 0) return this

    const total = this.year * 12 + (this.month - 1) + n
    const year = Math.floor(total / 12)
    const month = total - year * 12 + 1
    if (year < MIN_YEAR || year > MAX_YEAR) {
      throw new DateOutOfRangeError(`${this.toString()} + ${n} months is outside years ${MIN_YEAR}-${MAX_YEAR}`)
    }
    return new CalendarDate(year, month, Math.min(this.day, daysInMonth(year, month)))
  }

  /** Feb 29 becomes Feb 28 in a non-leap target year. */
  addYears(n: number): CalendarDate {
    requireInteger('years', n)
    if (n === 0) return this

    const year = this.year + n
    if (year < MIN_YEAR || year > MAX_YEAR) {
      throw new DateOutOfRangeError(`${this.toString()} + ${n} years is outside years ${MIN_YEAR}-${MAX_YEAR}`)
    }
    return new CalendarDate(year, this.month, Math.min(this.day, daysInMonth(year, this.month)))
  }

  /** Signed number of days from this date to `other`. */
  daysUntil(other: CalendarDate): number {
    return other.epochDay - this.epochDay
  }

  // ==========================================================================
  // Comparison
  // ==========================================================================

  static compare(a: CalendarDate, b: CalendarDate): -1 | 0 | 1 {
    return a.compareTo(b)
  }

  static min(first: CalendarDate, ...rest: CalendarDate[]): CalendarDate {
    return rest.reduce((acc, d) => (d.epochDay < acc.epochDay ? d : acc), first)
  }

  static max(first: CalendarDate, ...rest: CalendarDate[]): CalendarDate {
    return rest.reduce((acc, d) => (d.epochDay > acc.epochDay ? d : acc), first)
  }

  compareTo(other: CalendarDate): -1 | 0 | 1 {
    if (this.epochDay < other.epochDay) return -1
    if (this.epochDay > other.epochDay) return 1
    return 0
  }

  equals(other: CalendarDate): boolean {
    return this.epochDay === other.epochDay
  }

  notEquals(other: CalendarDate): boolean {
    return this.epochDay !== other.epochDay
  }

  isBefore(other: CalendarDate): boolean {
    return this.epochDay < other.epochDay
  }

  isBeforeOrEqual(other: CalendarDate): boolean {
    return this.epochDay <= other.epochDay
  }

  isAfter(other: CalendarDate): boolean {
    return this.epochDay > other.epochDay
  }

  isAfterOrEqual(other: CalendarDate): boolean {
    return this.epochDay >= other.epochDay
  }

  /** Equal dates hash equally; distinct dates never collide. */
  hashCode(): number {
    return this.epochDay
  }

  // ==========================================================================
  // Decomposition & Formatting
  // ==========================================================================

  deconstruct(): readonly [year: number, month: number, day: number] {
    return [this.year, this.month, this.day]
  }

  toFields(): CalendarDateFields {
    return { year: this.year, month: this.month, day: this.day }
  }

  toString(): string {
    return `${pad4(this.year)}-${pad2(this.month)}-${pad2(this.day)}`
  }

  toJSON(): string {
    return this.toString()
  }
}
