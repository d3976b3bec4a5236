/**
 * Date-keyed Collections
 *
 * Native Map and Set compare object keys by identity. These wrap a Map keyed by
 * `hashCode()`, so two separately constructed equal dates address the same entry.
 */

import type { CalendarDate } from './calendar-date'

export type DateMap<V> = {
  readonly size: number
  get(date: CalendarDate): V | undefined
  set(date: CalendarDate, value: V): DateMap<V>
  has(date: CalendarDate): boolean
  delete(date: CalendarDate): boolean
  clear(): void
  keys(): IterableIterator<CalendarDate>
  values(): IterableIterator<V>
  entries(): IterableIterator<[CalendarDate, V]>
  [Symbol.iterator](): IterableIterator<[CalendarDate, V]>
}

export type DateSet = {
  readonly size: number
  add(date: CalendarDate): DateSet
  has(date: CalendarDate): boolean
  delete(date: CalendarDate): boolean
  clear(): void
  values(): IterableIterator<CalendarDate>
  [Symbol.iterator](): IterableIterator<CalendarDate>
}

// ============================================================================
// DateMap
// ============================================================================

export function createDateMap<V>(initial?: Iterable<readonly [CalendarDate, V]>): DateMap<V> {
  const entriesByHash = new Map<number, [CalendarDate, V]>()

  function* keys(): IterableIterator<CalendarDate> {
    for (const [date] of entriesByHash.values()) yield date
  }

  function* values(): IterableIterator<V> {
    for (const [, value] of entriesByHash.values()) yield value
  }

  function* entries(): IterableIterator<[CalendarDate, V]> {
    for (const [date, value] of entriesByHash.values()) yield [date, value]
  }

  const map: DateMap<V> = {
    get size() {
      return entriesByHash.size
    },
    get(date) {
      return entriesByHash.get(date.hashCode())?.[1]
    },
    set(date, value) {
      const existing = entriesByHash.get(date.hashCode())
      if (existing) {
        existing[1] = value
      } else {
        entriesByHash.set(date.hashCode(), [date, value])
      }
      return map
    },
    has(date) {
      return entriesByHash.has(date.hashCode())
    },
    delete(date) {
      return entriesByHash.delete(date.hashCode())
    },
    clear() {
      entriesByHash.clear()
    },
    keys,
    values,
    entries,
    [Symbol.iterator]: entries,
  }

  if (initial) {
    for (const [date, value] of initial) map.set(date, value)
  }
  return map
}

// ============================================================================
// DateSet
// ============================================================================

export function createDateSet(initial?: Iterable<CalendarDate>): DateSet {
  const datesByHash = new Map<number, CalendarDate>()

  const set: DateSet = {
    get size() {
      return datesByHash.size
    },
    add(date) {
      if (!datesByHash.has(date.hashCode())) datesByHash.set(date.hashCode(), date)
      return set
    },
    has(date) {
      return datesByHash.has(date.hashCode())
    },
    delete(date) {
      return datesByHash.delete(date.hashCode())
    },
    clear() {
      datesByHash.clear()
    },
    values: () => datesByHash.values(),
    [Symbol.iterator]: () => datesByHash.values(),
  }

  if (initial) {
    for (const date of initial) set.add(date)
  }
  return set
}
