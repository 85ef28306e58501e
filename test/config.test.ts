/**
 * Tests for loadConfig: required settings, defaults and validation.
 */

import { loadConfig } from '../src/config'
import { ConfigError } from '../src/errors'

const base = { BOT_TOKEN: 'test-token', TIMESHEET_DB: '/tmp/timesheet.db' }

describe('loadConfig', () => {
  test('applies defaults', () => {
    expect(loadConfig(base)).toEqual({
      botToken: 'test-token',
      databasePath: '/tmp/timesheet.db',
      timeZone: 'Asia/Tehran',
      calendar: 'persian',
      hourlyRate: 70000,
      dayOff: 'Friday',
      persistOpenSessions: true,
    })
  })

  test('reads overrides', () => {
    const config = loadConfig({
      ...base,
      TIMEZONE: 'Europe/Berlin',
      CALENDAR: 'gregory',
      HOURLY_RATE: '45.5',
      DAY_OFF: 'Sunday',
      PERSIST_OPEN_SESSIONS: 'false',
    })
    expect(config.timeZone).toBe('Europe/Berlin')
    expect(config.calendar).toBe('gregory')
    expect(config.hourlyRate).toBe(45.5)
    expect(config.dayOff).toBe('Sunday')
    expect(config.persistOpenSessions).toBe(false)
  })

  test('missing token is fatal', () => {
    expect(() => loadConfig({ TIMESHEET_DB: 'x.db' })).toThrow(ConfigError)
    expect(() => loadConfig({ TIMESHEET_DB: 'x.db' })).toThrow(/BOT_TOKEN/)
  })

  test('missing persistence target is fatal', () => {
    expect(() => loadConfig({ BOT_TOKEN: 'test-token' })).toThrow(/TIMESHEET_DB/)
  })

  test('blank values count as unset', () => {
    expect(() => loadConfig({ ...base, BOT_TOKEN: '   ' })).toThrow(/BOT_TOKEN/)
    expect(loadConfig({ ...base, TIMEZONE: '' }).timeZone).toBe('Asia/Tehran')
  })

  test('rejects unknown calendars and bad numbers', () => {
    expect(() => loadConfig({ ...base, CALENDAR: 'klingon' })).toThrow(/CALENDAR/)
    expect(() => loadConfig({ ...base, HOURLY_RATE: 'lots' })).toThrow(/HOURLY_RATE/)
    expect(() => loadConfig({ ...base, DAY_OFF: 'Caturday' })).toThrow(/DAY_OFF/)
  })
})
