import { CHECK_IN_LABEL, CHECK_OUT_LABEL } from '../constants'
import { isTimesheetError } from '../errors'
import type { Timesheet } from '../tracking/timesheet'
import * as replies from './replies'

interface IncomingMessage {
  userId: string
  text: string
  at: number
}

interface Reply {
  text: string
  showKeyboard: boolean
}

function reply(text: string, showKeyboard = false): Reply {
  return { text, showKeyboard }
}

/**
 * Splits `/checkout@SomeBot fixed tests` into `checkout` and `fixed tests`.
 * Keyboard labels map onto their commands.
 */
function parseCommand(text: string): { command: string; args: string } | null {
  if (text === CHECK_IN_LABEL) return { command: 'checkin', args: '' }
  if (text === CHECK_OUT_LABEL) return { command: 'checkout', args: '' }
  const match = /^\/([a-z]+)(?:@\S+)?(?:\s+([\s\S]*))?$/i.exec(text)
  if (!match) return null
  return { command: match[1].toLowerCase(), args: (match[2] ?? '').trim() }
}

/**
 * Turns chat messages into timesheet events and answers them.
 *
 * Check-out is a two-step conversation: the button asks for the activity
 * and the next plain message supplies it. The session ends at the button
 * press but stays open until that message is saved.
 */
class BotController {
  timesheet: Timesheet
  // user → instant the check-out button was pressed
  awaitingActivity: Map<string, number>

  constructor(timesheet: Timesheet) {
    this.timesheet = timesheet
    this.awaitingActivity = new Map()
  }

  async handle(message: IncomingMessage): Promise<Reply[]> {
    const text = message.text.trim()
    try {
      return await this._route(message.userId, text, message.at)
    } catch (err) {
      if (isTimesheetError(err)) {
        if (err.code === 'INVALID_TRANSITION') this.awaitingActivity.delete(message.userId)
        if (err.code === 'CALENDAR_CONVERSION' || err.code === 'PERSISTENCE') {
          console.error(`[bot] ${err.code} for user ${message.userId}:`, err)
        }
        return [reply(replies.failure(err), true)]
      }
      console.error(`[bot] Unexpected error for user ${message.userId}:`, err)
      return [reply(replies.GENERIC_FAILURE, true)]
    }
  }

  async _route(userId: string, text: string, at: number): Promise<Reply[]> {
    const parsed = parseCommand(text)

    if (!parsed) {
      const pressedAt = this.awaitingActivity.get(userId)
      if (pressedAt !== undefined) return this._checkOut(userId, text, pressedAt)
      return [reply(replies.GREETING, true)]
    }

    switch (parsed.command) {
      case 'start':
        return [reply(replies.GREETING, true)]
      case 'checkin': {
        this.awaitingActivity.delete(userId)
        const { stamp } = await this.timesheet.checkIn(userId, at)
        return [reply(replies.checkedIn(stamp), true)]
      }
      case 'checkout':
        if (parsed.args !== '') return this._checkOut(userId, parsed.args, at)
        if (!this.timesheet.status(userId)) {
          return [reply(replies.CHECK_IN_FIRST, true)]
        }
        this.awaitingActivity.set(userId, at)
        return [reply(replies.ASK_ACTIVITY)]
      case 'cancel':
        if (!this.awaitingActivity.delete(userId)) return [reply(replies.NOTHING_TO_CANCEL, true)]
        return [reply(replies.CHECKOUT_CANCELLED, true)]
      case 'stats': {
        const stats = await this.timesheet.stats(userId, at)
        return [reply(replies.monthlyStats(stats), true)]
      }
      case 'status': {
        const open = this.timesheet.status(userId)
        if (!open) return [reply(replies.NO_OPEN_SESSION, true)]
        return [reply(replies.openSince(this.timesheet.calendar.stamp(open.checkInAt)), true)]
      }
      default:
        return [reply(replies.GREETING, true)]
    }
  }

  async _checkOut(userId: string, activity: string, at: number): Promise<Reply[]> {
    const result = await this.timesheet.checkOut(userId, activity, at)
    this.awaitingActivity.delete(userId)
    return [reply(replies.checkedOut(result), true)]
  }
}

export { BotController, parseCommand }
export type { IncomingMessage, Reply }
