/**
 * Tests for CivilCalendar: instant → civil date, weekday and clock time
 * in a fixed timezone and calendar.
 */

import { CivilCalendar } from '../src/calendar/civil-calendar'
import { CalendarConversionError } from '../src/errors'

// Asia/Tehran has no DST since 2022: local = UTC + 03:30
const tehran = (y: number, m: number, d: number, h: number, min = 0) =>
  Date.UTC(y, m - 1, d, h, min) - 3.5 * 3600000

describe('CivilCalendar (persian, Asia/Tehran)', () => {
  const calendar = new CivilCalendar('Asia/Tehran', 'persian')

  test('stamps a morning instant', () => {
    expect(calendar.stamp(tehran(2024, 1, 15, 9))).toEqual({
      isoDate: '2024-01-15',
      weekday: 'Monday',
      civilDate: '1402/10/25',
      year: 1402,
      month: 10,
      day: 25,
      time: '09:00:00 AM',
    })
  })

  test('uses the local date, not the UTC one, just after midnight', () => {
    // 2024-01-15 20:45 UTC is 00:15 on the 16th in Tehran
    const stamp = calendar.stamp(Date.UTC(2024, 0, 15, 20, 45))
    expect(stamp.isoDate).toBe('2024-01-16')
    expect(stamp.civilDate).toBe('1402/10/26')
    expect(stamp.weekday).toBe('Tuesday')
    expect(stamp.time).toBe('12:15:00 AM')
  })

  test('rolls over the civil year at Nowruz', () => {
    const stamp = calendar.stamp(tehran(2024, 3, 20, 10))
    expect(stamp.civilDate).toBe('1403/01/01')
    expect(stamp.weekday).toBe('Wednesday')
    expect(calendar.monthName(tehran(2024, 3, 20, 10))).toBe('Farvardin')
  })

  test('names the civil month', () => {
    expect(calendar.monthName(tehran(2024, 1, 15, 9))).toBe('Dey')
    expect(calendar.monthName(tehran(2024, 2, 14, 12))).toBe('Bahman')
  })

  test('lists the 30 days of Bahman 1402 with weekdays', () => {
    const days = calendar.monthDays(tehran(2024, 2, 14, 12))
    expect(days).toHaveLength(30)
    expect(days[0]).toEqual({ day: 1, weekday: 'Sunday' })
    expect(days[29]).toEqual({ day: 30, weekday: 'Monday' })
    expect(days.filter((d) => d.weekday === 'Friday').map((d) => d.day)).toEqual([6, 13, 20, 27])
  })

  test('Esfand of a common year has 29 days', () => {
    expect(calendar.monthDays(tehran(2024, 3, 10, 12))).toHaveLength(29)
  })

  test('monthDays works from late at night', () => {
    const days = calendar.monthDays(tehran(2024, 2, 14, 23, 50))
    expect(days.map((d) => d.day)).toEqual(Array.from({ length: 30 }, (_, i) => i + 1))
  })

  test('timeOfDayMs counts from local midnight', () => {
    expect(calendar.timeOfDayMs(tehran(2024, 1, 15, 9))).toBe(9 * 3600000)
    expect(calendar.timeOfDayMs(tehran(2024, 1, 15, 23, 30) + 1500)).toBe(23.5 * 3600000 + 1500)
  })
})

describe('CivilCalendar (gregory, UTC)', () => {
  const calendar = new CivilCalendar('UTC', 'gregory')

  test('civil date matches the ISO date', () => {
    const stamp = calendar.stamp(Date.UTC(2024, 1, 10, 12))
    expect(stamp.civilDate).toBe('2024/02/10')
    expect(stamp.isoDate).toBe('2024-02-10')
    expect(stamp.weekday).toBe('Saturday')
  })

  test('formats 12-hour clock times', () => {
    expect(calendar.formatTime(Date.UTC(2024, 0, 15, 13, 5, 9))).toBe('01:05:09 PM')
    expect(calendar.formatTime(Date.UTC(2024, 0, 15, 0, 0, 0))).toBe('12:00:00 AM')
    expect(calendar.formatTime(Date.UTC(2024, 0, 15, 12, 0, 0))).toBe('12:00:00 PM')
  })

  test('February of a leap year has 29 days', () => {
    const days = calendar.monthDays(Date.UTC(2024, 1, 10, 12))
    expect(days).toHaveLength(29)
    expect(days[0]).toEqual({ day: 1, weekday: 'Thursday' })
  })
})

describe('CivilCalendar errors', () => {
  const calendar = new CivilCalendar('UTC', 'gregory')

  test('rejects NaN', () => {
    expect(() => calendar.stamp(Number.NaN)).toThrow(CalendarConversionError)
  })

  test('rejects instants outside the Date range', () => {
    expect(() => calendar.stamp(9e15)).toThrow(CalendarConversionError)
    expect(() => calendar.timeOfDayMs(Number.POSITIVE_INFINITY)).toThrow(CalendarConversionError)
  })

  test('rejects an unknown timezone', () => {
    expect(() => new CivilCalendar('Mars/Olympus_Mons', 'gregory')).toThrow(CalendarConversionError)
  })

  test('rejects a calendar Intl does not know', () => {
    expect(() => new CivilCalendar('UTC', 'klingon')).toThrow('Unsupported calendar: klingon')
  })
})
