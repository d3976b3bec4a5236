/**
 * Persisted forms of CalendarDate.
 *
 * Record form: `{ year, month, day }`, suitable for JSON documents and row mappers.
 * Binary form: 4 bytes, year as big-endian uint16 followed by month and day as uint8.
 */

import { CalendarDate } from './calendar-date'
import { isValidDate } from './calendar'
import { InvalidDataError } from './errors'

export type SerializedCalendarDate = {
  year: number
  month: number
  day: number
}

export const ENCODED_DATE_LENGTH = 4

// ============================================================================
// Record Form
// ============================================================================

export function serializeDate(date: CalendarDate): SerializedCalendarDate {
  return { year: date.year, month: date.month, day: date.day }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * @throws InvalidDataError when `value` is not a record holding a valid date
 */
export function deserializeDate(value: unknown): CalendarDate {
  if (!isRecord(value)) {
    throw new InvalidDataError('Serialized date must be an object')
  }
  const { year, month, day } = value
  if (typeof year !== 'number' || typeof month !== 'number' || typeof day !== 'number') {
    throw new InvalidDataError('Serialized date requires numeric year, month and day')
  }
  if (!isValidDate(year, month, day)) {
    throw new InvalidDataError(`Serialized date is not a valid date: ${year}-${month}-${day}`)
  }
  return new CalendarDate(year, month, day)
}

// ============================================================================
// Binary Form
// ============================================================================

export function encodeDate(date: CalendarDate): Uint8Array {
  const bytes = new Uint8Array(ENCODED_DATE_LENGTH)
  const view = new DataView(bytes.buffer)
  view.setUint16(0, date.year, false)
  view.setUint8(2, date.month)
  view.setUint8(3, date.day)
  return bytes
}

/**
 * @throws InvalidDataError when `bytes` is not exactly one encoded valid date
 */
export function decodeDate(bytes: Uint8Array): CalendarDate {
  if (bytes.length !== ENCODED_DATE_LENGTH) {
    throw new InvalidDataError(`Encoded date must be ${ENCODED_DATE_LENGTH} bytes, got ${bytes.length}`)
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const year = view.getUint16(0, false)
  const month = view.getUint8(2)
  const day = view.getUint8(3)
  if (!isValidDate(year, month, day)) {
    throw new InvalidDataError(`Encoded date is not a valid date: ${year}-${month}-${day}`)
  }
  return new CalendarDate(year, month, day)
}
