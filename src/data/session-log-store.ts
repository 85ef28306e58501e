import type Database from 'better-sqlite3'
import type { Statement } from 'better-sqlite3'
import { PersistenceError } from '../errors'
import type { SessionRecord } from '../types'

/**
 * Append-only log of closed sessions. An append must be visible to the next
 * readAll for the same user; nothing else is assumed.
 */
interface SessionLogStore {
  append(record: SessionRecord): Promise<void>
  readAll(userId: string): Promise<SessionRecord[]>
}

class MemorySessionLogStore implements SessionLogStore {
  records: SessionRecord[]

  constructor() {
    this.records = []
  }

  async append(record: SessionRecord): Promise<void> {
    this.records.push({ ...record })
  }

  async readAll(userId: string): Promise<SessionRecord[]> {
    return this.records.filter((r) => r.userId === userId).map((r) => ({ ...r }))
  }
}

interface TimesheetRow {
  user_id: string
  date: string
  weekday: string
  check_in: string
  check_out: string
  total_hours: string
  activity: string
}

/**
 * Session log kept in the `timesheet_rows` table, one row per closed session
 * in insertion order.
 */
class SqliteSessionLogStore implements SessionLogStore {
  db: Database.Database
  _insertStmt: Statement<[SessionRecord]>
  _selectStmt: Statement<[string], TimesheetRow>

  constructor(db: Database.Database) {
    this.db = db
    this._insertStmt = db.prepare<SessionRecord>(`
      INSERT INTO timesheet_rows (user_id, date, weekday, check_in, check_out, total_hours, activity)
      VALUES (@userId, @date, @weekday, @checkIn, @checkOut, @totalHours, @activity)
    `)
    this._selectStmt = db.prepare<[string], TimesheetRow>(`
      SELECT user_id, date, weekday, check_in, check_out, total_hours, activity
      FROM timesheet_rows WHERE user_id = ? ORDER BY id
    `)
  }

  async append(record: SessionRecord): Promise<void> {
    try {
      this._insertStmt.run({ ...record })
    } catch (err) {
      throw new PersistenceError('Could not append to the session log', err)
    }
  }

  async readAll(userId: string): Promise<SessionRecord[]> {
    try {
      return this._selectStmt.all(userId).map((row) => ({
        userId: row.user_id,
        date: row.date,
        weekday: row.weekday,
        checkIn: row.check_in,
        checkOut: row.check_out,
        totalHours: row.total_hours,
        activity: row.activity,
      }))
    } catch (err) {
      throw new PersistenceError('Could not read the session log', err)
    }
  }
}

export { MemorySessionLogStore, SqliteSessionLogStore }
export type { SessionLogStore }
