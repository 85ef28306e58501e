import { ONE_DAY_MS, ONE_HOUR_MS, ONE_MINUTE_MS, ONE_SECOND_MS } from '../constants'
import { CalendarConversionError } from '../errors'
import type { CivilDay, CivilStamp } from '../types'

// Largest magnitude an ECMAScript Date accepts.
const MAX_INSTANT_MS = 8.64e15

type PartMap = Partial<Record<Intl.DateTimeFormatPartTypes, string>>

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

/**
 * Converts absolute instants into civil dates and clock times for one
 * timezone and one calendar system. The calendar only affects the civil
 * date and month name; the ISO date and weekday are always Gregorian.
 */
class CivilCalendar {
  timeZone: string
  calendar: string
  _civilFormat: Intl.DateTimeFormat
  _isoFormat: Intl.DateTimeFormat
  _weekdayFormat: Intl.DateTimeFormat
  _timeFormat: Intl.DateTimeFormat
  _clockFormat: Intl.DateTimeFormat
  _monthNameFormat: Intl.DateTimeFormat

  constructor(timeZone: string, calendar: string) {
    this.timeZone = timeZone
    this.calendar = calendar
    try {
      this._civilFormat = new Intl.DateTimeFormat(`en-US-u-ca-${calendar}-nu-latn`, {
        timeZone,
        year: 'numeric',
        month: 'numeric',
        day: 'numeric',
      })
      this._isoFormat = new Intl.DateTimeFormat('en-US-u-ca-gregory-nu-latn', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
      })
      this._weekdayFormat = new Intl.DateTimeFormat('en-US', { timeZone, weekday: 'long' })
      this._timeFormat = new Intl.DateTimeFormat('en-US-u-nu-latn', {
        timeZone,
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hour12: true,
      })
      this._clockFormat = new Intl.DateTimeFormat('en-US-u-nu-latn', {
        timeZone,
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23',
      })
      this._monthNameFormat = new Intl.DateTimeFormat(`en-US-u-ca-${calendar}`, { timeZone, month: 'long' })
    } catch (err) {
      throw new CalendarConversionError(`Unknown timezone or calendar: ${timeZone} / ${calendar}`, err)
    }

    // Intl silently falls back to the Gregorian calendar for names it does not know
    const resolved = this._civilFormat.resolvedOptions().calendar
    if (resolved !== calendar) {
      throw new CalendarConversionError(`Unsupported calendar: ${calendar}`)
    }
  }

  stamp(instant: number): CivilStamp {
    const civil = this._parts(this._civilFormat, instant)
    const iso = this._parts(this._isoFormat, instant)
    const year = Number(civil.year)
    const month = Number(civil.month)
    const day = Number(civil.day)
    if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
      throw new CalendarConversionError(`Could not read a ${this.calendar} date for instant ${instant}`)
    }

    return {
      isoDate: `${iso.year}-${iso.month}-${iso.day}`,
      weekday: this.weekday(instant),
      civilDate: `${year}/${pad2(month)}/${pad2(day)}`,
      year,
      month,
      day,
      time: this.formatTime(instant),
    }
  }

  weekday(instant: number): string {
    return this._parts(this._weekdayFormat, instant).weekday ?? ''
  }

  /**
   * 12-hour clock time, e.g. `09:05:00 PM`.
   */
  formatTime(instant: number): string {
    const p = this._parts(this._timeFormat, instant)
    return `${p.hour}:${p.minute}:${p.second} ${p.dayPeriod}`
  }

  /**
   * Milliseconds elapsed since local midnight in the configured timezone.
   */
  timeOfDayMs(instant: number): number {
    const p = this._parts(this._clockFormat, instant)
    const subSecond = ((instant % ONE_SECOND_MS) + ONE_SECOND_MS) % ONE_SECOND_MS
    return (
      Number(p.hour) * ONE_HOUR_MS + Number(p.minute) * ONE_MINUTE_MS + Number(p.second) * ONE_SECOND_MS + subSecond
    )
  }

  monthName(instant: number): string {
    return this._parts(this._monthNameFormat, instant).month ?? ''
  }

  /**
   * Every civil day of the month containing `instant`, in order.
   *
   * Walks whole days from local noon so a DST shift never moves the sampled instant
   * across a date line.
   */
  monthDays(instant: number): CivilDay[] {
    const target = this.stamp(instant)
    const noon = instant - this.timeOfDayMs(instant) + 12 * ONE_HOUR_MS
    const days: CivilDay[] = []

    for (let offset = -(target.day - 1); offset < 32; offset++) {
      const at = noon + offset * ONE_DAY_MS
      const stamp = this.stamp(at)
      if (stamp.year !== target.year || stamp.month !== target.month) {
        if (offset > 0) break
        continue
      }
      days.push({ day: stamp.day, weekday: stamp.weekday })
    }
    return days
  }

  _parts(format: Intl.DateTimeFormat, instant: number): PartMap {
    if (!Number.isFinite(instant) || Math.abs(instant) > MAX_INSTANT_MS) {
      throw new CalendarConversionError(`Malformed instant: ${instant}`)
    }
    let parts: Intl.DateTimeFormatPart[]
    try {
      parts = format.formatToParts(instant)
    } catch (err) {
      throw new CalendarConversionError(`Could not convert instant ${instant}`, err)
    }
    const map: PartMap = {}
    for (const part of parts) {
      if (part.type !== 'literal') map[part.type] = part.value
    }
    return map
  }
}

export { CivilCalendar }
