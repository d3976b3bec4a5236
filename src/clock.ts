/**
 * Source of the current instant, injectable so callers can pin "today".
 */
export interface Clock {
  now(): Date
}

export const systemClock: Clock = {
  now: () => new Date(),
}

export function fixedClock(instant: Date): Clock {
  const ms = instant.getTime()
  return { now: () => new Date(ms) }
}
