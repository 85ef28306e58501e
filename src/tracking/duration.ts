import type { CivilCalendar } from '../calendar/civil-calendar'
import { ONE_DAY_MS, ONE_MINUTE_MS } from '../constants'

/**
 * Elapsed wall-clock time between two times of day (ms since local midnight).
 * A check-out clock time earlier than the check-in one means the session
 * crossed midnight, so one day is added. Floors to whole minutes.
 *
 * Only a single wrap is applied: a session of 24 hours or more is reported
 * modulo 24 hours.
 *
 * Example: 23:00 → 01:15 gives 2h15m.
 */
function elapsedClockMs(checkInClockMs: number, checkOutClockMs: number): number {
  let raw = checkOutClockMs - checkInClockMs
  if (raw < 0) raw += ONE_DAY_MS
  return Math.floor(raw / ONE_MINUTE_MS) * ONE_MINUTE_MS
}

/**
 * Clock-time difference in the calendar's timezone. A session that spans a
 * DST change is off by the size of the shift, usually one hour.
 */
function sessionDurationMs(calendar: CivilCalendar, checkInAt: number, checkOutAt: number): number {
  return elapsedClockMs(calendar.timeOfDayMs(checkInAt), calendar.timeOfDayMs(checkOutAt))
}

/**
 * Formats a duration as `H:MM`. Hours are not capped, so monthly sums read
 * e.g. `152:30`.
 */
function formatDuration(ms: number): string {
  const totalMinutes = ms > 0 ? Math.floor(ms / ONE_MINUTE_MS) : 0
  return formatMinutes(totalMinutes)
}

function formatMinutes(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60)
  const minutes = totalMinutes % 60
  return `${hours}:${String(minutes).padStart(2, '0')}`
}

/**
 * Reads back a stored duration. Accepts `H:MM` and `H:MM:SS` (seconds are
 * dropped). Returns whole minutes, or null when the text is not a duration.
 */
function parseDuration(text: string): number | null {
  const match = /^\s*(\d+):([0-5]\d)(?::([0-5]\d))?\s*$/.exec(text)
  if (!match) return null
  return Number(match[1]) * 60 + Number(match[2])
}

export { elapsedClockMs, formatDuration, formatMinutes, parseDuration, sessionDurationMs }
