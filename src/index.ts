/**
 * calendar-date
 *
 * Public API exports
 */

// Error system
export {
  CalendarDateError, CalendarDateErrorCode,
  InvalidDateError, ParseError, DateOutOfRangeError, InvalidArgumentError, InvalidDataError,
} from './errors'
export type { CalendarDateErrorCode as CalendarDateErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Calendar helpers
export {
  MIN_YEAR, MAX_YEAR, MIN_DAY_NUMBER, MAX_DAY_NUMBER,
  isLeapYear, daysInMonth, daysInYear, isValidDate,
  toDayNumber, fromDayNumber, weekdayOfDayNumber, dayOfYear,
} from './calendar'

// Clock
export type { Clock } from './clock'
export { systemClock, fixedClock } from './clock'

// CalendarDate
export type { CalendarDateFields } from './calendar-date'
export { CalendarDate, DayOfWeek } from './calendar-date'

// Serialization
export type { SerializedCalendarDate } from './serialization'
export { ENCODED_DATE_LENGTH, serializeDate, deserializeDate, encodeDate, decodeDate } from './serialization'

// Collections
export type { DateMap, DateSet } from './collections'
export { createDateMap, createDateSet } from './collections'
