#!/usr/bin/env node
import { BotController } from './bot/bot-controller'
import { TelegramTransport } from './bot/telegram-transport'
import { CivilCalendar } from './calendar/civil-calendar'
import { loadConfig } from './config'
import { AppDatabase } from './data/database'
import { MonthlyAggregator } from './data/monthly-aggregator'
import { MemoryOpenSessionStore, SqliteOpenSessionStore } from './data/open-session-store'
import { SqliteSessionLogStore } from './data/session-log-store'
import { SessionStateMachine } from './tracking/session-machine'
import { Timesheet } from './tracking/timesheet'

async function main() {
  const config = loadConfig()

  const database = new AppDatabase(config.databasePath)
  const calendar = new CivilCalendar(config.timeZone, config.calendar)
  const openStore = config.persistOpenSessions
    ? new SqliteOpenSessionStore(database.db)
    : new MemoryOpenSessionStore()

  const timesheet = new Timesheet({
    machine: new SessionStateMachine(openStore),
    logStore: new SqliteSessionLogStore(database.db),
    calendar,
    aggregator: new MonthlyAggregator(calendar, config.hourlyRate, config.dayOff),
  })
  console.log(`Timesheet database ready at ${config.databasePath} (${config.calendar}, ${config.timeZone})`)

  const restored = timesheet.machine.openSessions().length
  if (restored > 0) {
    console.log(`Restored ${restored} open sessions`)
  }

  const transport = new TelegramTransport(config.botToken, new BotController(timesheet))

  const shutdown = () => {
    console.log('Shutting down')
    transport.stop()
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)

  try {
    await transport.start()
  } finally {
    database.close()
  }
}

main().catch((err: unknown) => {
  console.error('Fatal:', err instanceof Error ? err.message : err)
  process.exit(1)
})
