import type { CivilCalendar } from '../calendar/civil-calendar'
import { EXPECTED_HOURS_PER_DAY } from '../constants'
import { formatMinutes, parseDuration } from '../tracking/duration'
import type { MonthlyStats, SessionRecord } from '../types'

interface MonthEntry {
  day: number
  minutes: number
}

/**
 * Reads a stored civil date (`YYYY/MM/DD`, or with dashes).
 */
function parseCivilDate(text: string): { year: number; month: number; day: number } | null {
  const match = /^\s*(\d{1,4})[/-](\d{1,2})[/-](\d{1,2})\s*$/.exec(text)
  if (!match) return null
  return { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) }
}

/**
 * Sums the session log for the current civil month. Always recomputed from
 * the full log; no running total is kept.
 */
class MonthlyAggregator {
  calendar: CivilCalendar
  hourlyRate: number
  dayOff: string

  constructor(calendar: CivilCalendar, hourlyRate: number, dayOff: string) {
    this.calendar = calendar
    this.hourlyRate = hourlyRate
    this.dayOff = dayOff
  }

  monthlyTotal(records: SessionRecord[], now: number): string {
    const entries = this._currentMonth(records, now)
    return formatMinutes(entries.reduce((sum, e) => sum + e.minutes, 0))
  }

  monthlyStats(records: SessionRecord[], now: number): MonthlyStats {
    const entries = this._currentMonth(records, now)
    const totalMinutes = entries.reduce((sum, e) => sum + e.minutes, 0)
    const workedDays = new Set(entries.map((e) => e.day)).size
    const rate = this.hourlyRate

    const today = this.calendar.stamp(now).day
    const businessDays = this.calendar.monthDays(now).filter((d) => d.weekday !== this.dayOff)
    const businessDaysSoFar = businessDays.filter((d) => d.day <= today).length
    const remainingBusinessDays = businessDays.length - businessDaysSoFar

    // projected hours = worked hours + average hours per worked day × remaining business days
    const projectedSalary =
      workedDays > 0
        ? Math.trunc((totalMinutes * (workedDays + remainingBusinessDays) * rate) / (workedDays * 60))
        : 0

    return {
      monthName: this.calendar.monthName(now),
      totalHours: formatMinutes(totalMinutes),
      totalMinutes,
      workedDays,
      currentSalary: Math.trunc((totalMinutes * rate) / 60),
      expectedSalary: businessDaysSoFar * EXPECTED_HOURS_PER_DAY * rate,
      projectedSalary,
    }
  }

  /**
   * Records dated in the civil month of `now`. Rows whose date or duration
   * cannot be read are left out.
   */
  _currentMonth(records: SessionRecord[], now: number): MonthEntry[] {
    const { year, month } = this.calendar.stamp(now)
    const entries: MonthEntry[] = []
    for (const record of records) {
      const date = parseCivilDate(record.date)
      if (!date || date.year !== year || date.month !== month) continue
      const minutes = parseDuration(record.totalHours)
      if (minutes === null) continue
      entries.push({ day: date.day, minutes })
    }
    return entries
  }
}

export { MonthlyAggregator, parseCivilDate }
