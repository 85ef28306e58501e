import { z } from 'zod'
import {
  DEFAULT_CALENDAR,
  DEFAULT_DAY_OFF,
  DEFAULT_HOURLY_RATE,
  DEFAULT_TIMEZONE,
  SUPPORTED_CALENDARS,
  WEEKDAYS,
} from './constants'
import { ConfigError } from './errors'

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('true')
  .transform((v) => v === 'true' || v === '1' || v === 'yes')

const envSchema = z.object({
  BOT_TOKEN: z.string().trim().min(1, 'BOT_TOKEN must be set'),
  TIMESHEET_DB: z.string().trim().min(1, 'TIMESHEET_DB must be set'),
  TIMEZONE: z.string().trim().min(1).default(DEFAULT_TIMEZONE),
  CALENDAR: z.enum(SUPPORTED_CALENDARS).default(DEFAULT_CALENDAR),
  HOURLY_RATE: z.coerce.number().nonnegative().default(DEFAULT_HOURLY_RATE),
  DAY_OFF: z.enum(WEEKDAYS).default(DEFAULT_DAY_OFF),
  PERSIST_OPEN_SESSIONS: booleanFlag,
})

interface AppConfig {
  botToken: string
  databasePath: string
  timeZone: string
  calendar: string
  hourlyRate: number
  dayOff: string
  persistOpenSessions: boolean
}

/**
 * Reads settings from the environment. Blank values count as unset, so
 * defaults apply to them and required ones fail.
 */
function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Record<string, string> = {}
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]
    if (value !== undefined && value.trim() !== '') raw[key] = value
  }

  const parsed = envSchema.safeParse(raw)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`)
  }

  const values = parsed.data
  return {
    botToken: values.BOT_TOKEN,
    databasePath: values.TIMESHEET_DB,
    timeZone: values.TIMEZONE,
    calendar: values.CALENDAR,
    hourlyRate: values.HOURLY_RATE,
    dayOff: values.DAY_OFF,
    persistOpenSessions: values.PERSIST_OPEN_SESSIONS,
  }
}

export { loadConfig }
export type { AppConfig }
