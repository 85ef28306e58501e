import type Database from 'better-sqlite3'
import type { Statement } from 'better-sqlite3'
import { PersistenceError } from '../errors'
import type { OpenSession } from '../types'

/**
 * Where the state machine keeps each user's open session. The in-memory
 * store loses open sessions on restart; the SQLite one keeps them.
 */
interface OpenSessionStore {
  get(userId: string): OpenSession | null
  set(session: OpenSession): void
  delete(userId: string): void
  all(): OpenSession[]
}

class MemoryOpenSessionStore implements OpenSessionStore {
  sessions: Map<string, OpenSession>

  constructor() {
    this.sessions = new Map()
  }

  get(userId: string): OpenSession | null {
    return this.sessions.get(userId) ?? null
  }

  set(session: OpenSession) {
    this.sessions.set(session.userId, session)
  }

  delete(userId: string) {
    this.sessions.delete(userId)
  }

  all(): OpenSession[] {
    return [...this.sessions.values()]
  }
}

interface OpenSessionRow {
  user_id: string
  check_in_at: number
}

function guard<T>(action: string, fn: () => T): T {
  try {
    return fn()
  } catch (err) {
    throw new PersistenceError(`Could not ${action} the open session`, err)
  }
}

function toSession(row: OpenSessionRow): OpenSession {
  return { userId: row.user_id, checkInAt: row.check_in_at, status: 'OPEN' }
}

class SqliteOpenSessionStore implements OpenSessionStore {
  db: Database.Database
  _getStmt: Statement<[string], OpenSessionRow>
  _upsertStmt: Statement<[{ userId: string; checkInAt: number }]>
  _deleteStmt: Statement<[string]>
  _allStmt: Statement<[], OpenSessionRow>

  constructor(db: Database.Database) {
    this.db = db
    this._getStmt = db.prepare<[string], OpenSessionRow>(
      'SELECT user_id, check_in_at FROM open_sessions WHERE user_id = ?',
    )
    this._upsertStmt = db.prepare<{ userId: string; checkInAt: number }>(`
      INSERT INTO open_sessions (user_id, check_in_at) VALUES (@userId, @checkInAt)
      ON CONFLICT(user_id) DO UPDATE SET check_in_at = excluded.check_in_at
    `)
    this._deleteStmt = db.prepare<[string]>('DELETE FROM open_sessions WHERE user_id = ?')
    this._allStmt = db.prepare<[], OpenSessionRow>('SELECT user_id, check_in_at FROM open_sessions ORDER BY check_in_at')
  }

  get(userId: string): OpenSession | null {
    const row = guard('read', () => this._getStmt.get(userId))
    return row ? toSession(row) : null
  }

  set(session: OpenSession) {
    guard('save', () => this._upsertStmt.run({ userId: session.userId, checkInAt: session.checkInAt }))
  }

  delete(userId: string) {
    guard('remove', () => this._deleteStmt.run(userId))
  }

  all(): OpenSession[] {
    return guard('read', () => this._allStmt.all()).map(toSession)
  }
}

export { MemoryOpenSessionStore, SqliteOpenSessionStore }
export type { OpenSessionStore }
