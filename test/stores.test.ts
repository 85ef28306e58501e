/**
 * Tests for the session log and open-session stores, against an in-memory
 * SQLite database and the plain in-memory implementations.
 */

import { AppDatabase } from '../src/data/database'
import { MemoryOpenSessionStore, SqliteOpenSessionStore } from '../src/data/open-session-store'
import type { OpenSessionStore } from '../src/data/open-session-store'
import { MemorySessionLogStore, SqliteSessionLogStore } from '../src/data/session-log-store'
import type { SessionLogStore } from '../src/data/session-log-store'
import { PersistenceError } from '../src/errors'
import type { SessionRecord } from '../src/types'

const record = (overrides: Partial<SessionRecord> = {}): SessionRecord => ({
  userId: 'u1',
  date: '1402/10/25',
  weekday: 'Monday',
  checkIn: '09:00:00 AM',
  checkOut: '05:30:00 PM',
  totalHours: '8:30',
  activity: 'coding',
  ...overrides,
})

// ── Session log ─────────────────────────────────────────────────────────────

describe.each([
  ['memory', () => ({ store: new MemorySessionLogStore() as SessionLogStore, close: () => {} })],
  [
    'sqlite',
    () => {
      const database = new AppDatabase(':memory:')
      return { store: new SqliteSessionLogStore(database.db) as SessionLogStore, close: () => database.close() }
    },
  ],
])('%s session log', (_name, create) => {
  let store: SessionLogStore
  let close: () => void

  beforeEach(() => {
    ;({ store, close } = create())
  })

  afterEach(() => close())

  test('reads back an appended record field for field', async () => {
    const written = record({ activity: 'fixed the "midnight" bug, again' })
    await store.append(written)

    expect(await store.readAll('u1')).toEqual([written])
  })

  test('keeps insertion order', async () => {
    await store.append(record({ date: '1402/10/26', activity: 'second day' }))
    await store.append(record({ date: '1402/10/25', activity: 'back-filled' }))

    const rows = await store.readAll('u1')
    expect(rows.map((r) => r.activity)).toEqual(['second day', 'back-filled'])
  })

  test('only returns the requested user', async () => {
    await store.append(record({ userId: 'u1' }))
    await store.append(record({ userId: 'u2', activity: 'other' }))

    expect((await store.readAll('u2')).map((r) => r.activity)).toEqual(['other'])
    expect(await store.readAll('u3')).toEqual([])
  })

  test('returned records are copies', async () => {
    await store.append(record())
    const [first] = await store.readAll('u1')
    first.activity = 'changed'

    expect((await store.readAll('u1'))[0].activity).toBe('coding')
  })
})

describe('SqliteSessionLogStore failures', () => {
  test('append on a closed database is a PersistenceError', async () => {
    const database = new AppDatabase(':memory:')
    const store = new SqliteSessionLogStore(database.db)
    database.close()

    await expect(store.append(record())).rejects.toBeInstanceOf(PersistenceError)
    await expect(store.readAll('u1')).rejects.toBeInstanceOf(PersistenceError)
  })
})

describe('AppDatabase', () => {
  test('migrations run once', () => {
    const database = new AppDatabase(':memory:')
    database.migrate()

    const versions = database.db.prepare('SELECT version FROM schema_version ORDER BY version').all()
    expect(versions).toEqual([{ version: 1 }, { version: 2 }])
    database.close()
  })
})

// ── Open sessions ───────────────────────────────────────────────────────────

describe.each([
  ['memory', () => ({ store: new MemoryOpenSessionStore() as OpenSessionStore, close: () => {} })],
  [
    'sqlite',
    () => {
      const database = new AppDatabase(':memory:')
      return { store: new SqliteOpenSessionStore(database.db) as OpenSessionStore, close: () => database.close() }
    },
  ],
])('%s open-session store', (_name, create) => {
  let store: OpenSessionStore
  let close: () => void

  beforeEach(() => {
    ;({ store, close } = create())
  })

  afterEach(() => close())

  test('get returns null for an unknown user', () => {
    expect(store.get('u1')).toBeNull()
  })

  test('set, get and delete', () => {
    store.set({ userId: 'u1', checkInAt: 1000, status: 'OPEN' })
    expect(store.get('u1')).toEqual({ userId: 'u1', checkInAt: 1000, status: 'OPEN' })

    store.delete('u1')
    expect(store.get('u1')).toBeNull()
  })

  test('set replaces an existing entry', () => {
    store.set({ userId: 'u1', checkInAt: 1000, status: 'OPEN' })
    store.set({ userId: 'u1', checkInAt: 2000, status: 'OPEN' })

    expect(store.all()).toEqual([{ userId: 'u1', checkInAt: 2000, status: 'OPEN' }])
  })

  test('all lists every open session', () => {
    store.set({ userId: 'u1', checkInAt: 1000, status: 'OPEN' })
    store.set({ userId: 'u2', checkInAt: 2000, status: 'OPEN' })

    expect(store.all()).toEqual([
      { userId: 'u1', checkInAt: 1000, status: 'OPEN' },
      { userId: 'u2', checkInAt: 2000, status: 'OPEN' },
    ])
  })
})

describe('SqliteOpenSessionStore', () => {
  test('open sessions survive a new store on the same database', () => {
    const database = new AppDatabase(':memory:')
    new SqliteOpenSessionStore(database.db).set({ userId: 'u1', checkInAt: 1000, status: 'OPEN' })

    expect(new SqliteOpenSessionStore(database.db).get('u1')).toEqual({ userId: 'u1', checkInAt: 1000, status: 'OPEN' })
    database.close()
  })

  test('a closed database is a PersistenceError', () => {
    const database = new AppDatabase(':memory:')
    const store = new SqliteOpenSessionStore(database.db)
    database.close()

    expect(() => store.get('u1')).toThrow(PersistenceError)
    expect(() => store.delete('u1')).toThrow(PersistenceError)
  })
})
