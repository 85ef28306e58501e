import { MemoryOpenSessionStore } from '../data/open-session-store'
import type { OpenSessionStore } from '../data/open-session-store'
import { InvalidTransitionError, isTimesheetError, PersistenceError, ValidationError } from '../errors'
import type { ClosedSession, OpenSession } from '../types'

type MachineState = 'NO_SESSION' | 'OPEN'

/**
 * Per-user check-in / check-out state: NO_SESSION → OPEN → NO_SESSION.
 *
 * Each user holds at most one open session. A stale open session is never
 * closed automatically; it waits for the user's check-out.
 */
class SessionStateMachine {
  store: OpenSessionStore

  constructor(store: OpenSessionStore = new MemoryOpenSessionStore()) {
    this.store = store
  }

  state(userId: string): MachineState {
    return this.store.get(userId) ? 'OPEN' : 'NO_SESSION'
  }

  current(userId: string): OpenSession | null {
    return this.store.get(userId)
  }

  checkIn(userId: string, now: number): OpenSession {
    if (this.store.get(userId)) {
      throw new InvalidTransitionError('Already checked in. Check out before starting a new session.')
    }
    const session: OpenSession = { userId, checkInAt: now, status: 'OPEN' }
    this._write(() => this.store.set(session))
    return session
  }

  /**
   * Close the open session. `commit` persists the closed session; the user
   * only returns to NO_SESSION once it resolves. If it rejects, the session
   * is put back and the error propagates.
   *
   * The open session is removed before `commit` runs, so a failed removal
   * never leaves a logged row behind an open session.
   */
  async checkOut(
    userId: string,
    now: number,
    activity: string | undefined,
    commit: (session: ClosedSession) => Promise<void>,
  ): Promise<ClosedSession> {
    const open = this.store.get(userId)
    if (!open) {
      throw new InvalidTransitionError('No open session. Check in first.')
    }
    const text = activity?.trim() ?? ''
    if (text === '') {
      throw new ValidationError('An activity description is required to check out.')
    }

    const closed: ClosedSession = {
      userId,
      checkInAt: open.checkInAt,
      checkOutAt: now,
      activity: text,
      status: 'CLOSED',
    }
    this._write(() => this.store.delete(userId))
    try {
      await commit(closed)
    } catch (err) {
      this._write(() => this.store.set(open))
      throw err
    }
    return closed
  }

  openSessions(): OpenSession[] {
    return this.store.all()
  }

  _write(action: () => void) {
    try {
      action()
    } catch (err) {
      if (isTimesheetError(err)) throw err
      throw new PersistenceError('Could not update the open session', err)
    }
  }
}

export { SessionStateMachine }
export type { MachineState }
