import type { TimeWindow, TimeWindowConfig } from '../types.js'

const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Turn a window configuration into a concrete half-open interval.
 *
 * - rolling: the `days` days ending at `now` (exclusive)
 * - calendar-year: January 1st of `year` up to January 1st of the next year, UTC
 */
export function resolveTimeWindow(
  config: TimeWindowConfig,
  now: Date = new Date(),
): TimeWindow {
  switch (config.kind) {
    case 'rolling':
      if (!Number.isFinite(config.days) || config.days <= 0) {
        throw new Error(`Window length must be a positive number of days, got ${config.days}`)
      }
      return {
        start: new Date(now.getTime() - config.days * DAY_MS),
        end: new Date(now.getTime()),
      }
    case 'calendar-year':
      if (!Number.isInteger(config.year)) {
        throw new Error(`Calendar year must be an integer, got ${config.year}`)
      }
      return {
        start: new Date(Date.UTC(config.year, 0, 1)),
        end: new Date(Date.UTC(config.year + 1, 0, 1)),
      }
  }
}

export function isWithinWindow(time: Date, window: TimeWindow): boolean {
  const t = time.getTime()
  return t >= window.start.getTime() && t < window.end.getTime()
}

export function describeTimeWindow(window: TimeWindow): string {
  return `${window.start.toISOString()} to ${window.end.toISOString()} (exclusive)`
}
