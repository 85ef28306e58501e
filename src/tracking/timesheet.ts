import type { CivilCalendar } from '../calendar/civil-calendar'
import type { MonthlyAggregator } from '../data/monthly-aggregator'
import type { SessionLogStore } from '../data/session-log-store'
import { isTimesheetError, PersistenceError } from '../errors'
import type { CheckInResult, CheckOutResult, ClosedSession, MonthlyStats, OpenSession, SessionRecord } from '../types'
import { formatDuration, sessionDurationMs } from './duration'
import type { SessionStateMachine } from './session-machine'
import { UserLock } from './user-lock'

interface TimesheetDeps {
  machine: SessionStateMachine
  logStore: SessionLogStore
  calendar: CivilCalendar
  aggregator: MonthlyAggregator
}

/**
 * Runs check-in / check-out events through the state machine, writes closed
 * sessions to the log and reads the log back for monthly totals.
 *
 * Events for one user are handled one at a time.
 */
class Timesheet {
  machine: SessionStateMachine
  logStore: SessionLogStore
  calendar: CivilCalendar
  aggregator: MonthlyAggregator
  lock: UserLock

  constructor(deps: TimesheetDeps) {
    this.machine = deps.machine
    this.logStore = deps.logStore
    this.calendar = deps.calendar
    this.aggregator = deps.aggregator
    this.lock = new UserLock()
  }

  checkIn(userId: string, now: number = Date.now()): Promise<CheckInResult> {
    return this.lock.run(userId, () => {
      // Convert first so a calendar failure leaves the state untouched
      const stamp = this.calendar.stamp(now)
      const session = this.machine.checkIn(userId, now)
      return { session, stamp }
    })
  }

  checkOut(userId: string, activity: string | undefined, now: number = Date.now()): Promise<CheckOutResult> {
    return this.lock.run(userId, async () => {
      const session = await this.machine.checkOut(userId, now, activity, (closed) =>
        this._append(this.toRecord(closed)),
      )
      const record = this.toRecord(session)

      let monthlyTotal: string | null = null
      try {
        monthlyTotal = this.aggregator.monthlyTotal(await this.logStore.readAll(userId), now)
      } catch (err) {
        // The session is already persisted; only the summary is missing
        console.warn(`Monthly total unavailable for ${userId}:`, err)
      }
      return { session, record, monthlyTotal }
    })
  }

  status(userId: string): OpenSession | null {
    return this.machine.current(userId)
  }

  async stats(userId: string, now: number = Date.now()): Promise<MonthlyStats> {
    const records = await this._readAll(userId)
    return this.aggregator.monthlyStats(records, now)
  }

  async monthlyTotal(userId: string, now: number = Date.now()): Promise<string> {
    const records = await this._readAll(userId)
    return this.aggregator.monthlyTotal(records, now)
  }

  toRecord(session: ClosedSession): SessionRecord {
    const checkIn = this.calendar.stamp(session.checkInAt)
    return {
      userId: session.userId,
      date: checkIn.civilDate,
      weekday: checkIn.weekday,
      checkIn: checkIn.time,
      checkOut: this.calendar.formatTime(session.checkOutAt),
      totalHours: formatDuration(sessionDurationMs(this.calendar, session.checkInAt, session.checkOutAt)),
      activity: session.activity,
    }
  }

  async _append(record: SessionRecord) {
    try {
      await this.logStore.append(record)
    } catch (err) {
      if (isTimesheetError(err)) throw err
      throw new PersistenceError('Could not append to the session log', err)
    }
  }

  async _readAll(userId: string): Promise<SessionRecord[]> {
    try {
      return await this.logStore.readAll(userId)
    } catch (err) {
      if (isTimesheetError(err)) throw err
      throw new PersistenceError('Could not read the session log', err)
    }
  }
}

export { Timesheet }
export type { TimesheetDeps }
