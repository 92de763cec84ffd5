/**
 * Clock abstraction and epoch-second helpers for token validity windows.
 */

/** Seconds in one day, used to turn day offsets into epoch timestamps. */
export const SECONDS_PER_DAY = 86_400

/** Source of the current time. */
export interface Clock {
  now(): Date
}

/** Clock backed by the system time. */
export const systemClock: Clock = {
  now: () => new Date(),
}

/** Clock frozen at `at` (a `Date` or epoch milliseconds). */
export function fixedClock(at: Date | number): Clock {
  const ms = typeof at === 'number' ? at : at.getTime()
  return {
    now: () => new Date(ms),
  }
}

/** Current time as whole seconds since the Unix epoch. */
export function nowSeconds(clock: Clock = systemClock): number {
  return Math.floor(clock.now().getTime() / 1000)
}

/**
 * Convert a day offset into an absolute epoch-seconds timestamp.
 * `undefined` passes through so optional validity bounds stay unset.
 *
 * @throws RangeError if `days` is negative or not an integer
 */
export function daysFromNow(days: number | undefined, clock: Clock = systemClock): number | undefined {
  if (days === undefined) {
    return undefined
  }
  if (!Number.isSafeInteger(days) || days < 0) {
    throw new RangeError(`Day offset must be a non-negative integer, got ${String(days)}`)
  }
  return nowSeconds(clock) + days * SECONDS_PER_DAY
}
