// ── Time durations ──────────────────────────────────────────────────────────

export const ONE_DAY_MS = 86400000
export const ONE_HOUR_MS = 3600000
export const ONE_MINUTE_MS = 60000
export const ONE_SECOND_MS = 1000

// ── Calendar defaults ──────────────────────────────────────────────────────

export const DEFAULT_TIMEZONE = 'Asia/Tehran'
export const DEFAULT_CALENDAR = 'persian'
export const SUPPORTED_CALENDARS = [
  'persian',
  'gregory',
  'islamic-civil',
  'islamic-umalqura',
  'buddhist',
  'indian',
] as const

export const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const

// ── Pay ────────────────────────────────────────────────────────────────────

export const DEFAULT_HOURLY_RATE = 70000
export const EXPECTED_HOURS_PER_DAY = 8
export const DEFAULT_DAY_OFF = 'Friday'

// ── Telegram polling ───────────────────────────────────────────────────────

export const TELEGRAM_API_BASE = 'https://api.telegram.org'
export const POLL_TIMEOUT_SECONDS = 30
export const POLL_RETRY_DELAY_MS = 5000

// ── Keyboard labels ────────────────────────────────────────────────────────

export const CHECK_IN_LABEL = '⏰ Check In'
export const CHECK_OUT_LABEL = '🏁 Check Out'
