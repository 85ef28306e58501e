import { setTimeout as sleep } from 'node:timers/promises'
import { z } from 'zod'
import {
  CHECK_IN_LABEL,
  CHECK_OUT_LABEL,
  POLL_RETRY_DELAY_MS,
  POLL_TIMEOUT_SECONDS,
  TELEGRAM_API_BASE,
} from '../constants'
import type { BotController, Reply } from './bot-controller'

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
})

const updateSchema = z.object({
  update_id: z.number(),
  message: z
    .object({
      date: z.number(),
      chat: z.object({ id: z.number() }),
      from: z.object({ id: z.number() }).optional(),
      text: z.string().optional(),
    })
    .optional(),
})

const updatesSchema = z.array(updateSchema)

type TelegramUpdate = z.infer<typeof updateSchema>

const MAIN_KEYBOARD = {
  keyboard: [[{ text: CHECK_IN_LABEL }, { text: CHECK_OUT_LABEL }]],
  resize_keyboard: true,
}

/**
 * Long-polls the Telegram Bot API and hands text messages to the controller.
 * Updates are processed in order; the offset only moves past an update once
 * its replies were sent or failed.
 */
class TelegramTransport {
  token: string
  controller: BotController
  fetchFn: typeof fetch
  offset: number
  running: boolean
  _abort: AbortController | null
  // aborted by stop() to cut the retry delay short
  _halt: AbortController

  constructor(token: string, controller: BotController, fetchFn: typeof fetch = fetch) {
    this.token = token
    this.controller = controller
    this.fetchFn = fetchFn
    this.offset = 0
    this.running = false
    this._abort = null
    this._halt = new AbortController()
  }

  async start() {
    this.running = true
    this._halt = new AbortController()
    const halt = this._halt
    await this.call('deleteWebhook', { drop_pending_updates: true })
    console.log('[telegram] Polling for updates')
    while (this.running) {
      try {
        await this.pollOnce()
      } catch (err) {
        if (!this.running) break
        console.error('[telegram] Polling failed, retrying:', err)
        await sleep(POLL_RETRY_DELAY_MS, undefined, { signal: halt.signal }).catch((sleepErr: unknown) => {
          if (!halt.signal.aborted) throw sleepErr
        })
      }
    }
    console.log('[telegram] Stopped')
  }

  stop() {
    this.running = false
    this._halt.abort()
    if (this._abort) this._abort.abort()
  }

  async pollOnce() {
    const result = await this.call('getUpdates', {
      offset: this.offset,
      timeout: POLL_TIMEOUT_SECONDS,
      allowed_updates: ['message'],
    })
    const updates = updatesSchema.parse(result)
    for (const update of updates) {
      await this.dispatch(update)
      this.offset = update.update_id + 1
    }
  }

  async dispatch(update: TelegramUpdate) {
    const message = update.message
    if (!message || !message.from || message.text === undefined) return

    const replies = await this.controller.handle({
      userId: String(message.from.id),
      text: message.text,
      at: message.date * 1000,
    })
    for (const r of replies) {
      await this.send(message.chat.id, r)
    }
  }

  async send(chatId: number, r: Reply) {
    try {
      await this.call('sendMessage', {
        chat_id: chatId,
        text: r.text,
        ...(r.showKeyboard ? { reply_markup: MAIN_KEYBOARD } : {}),
      })
    } catch (err) {
      // The event itself was handled; a lost reply must not replay it
      console.error(`[telegram] Could not send reply to chat ${chatId}:`, err)
    }
  }

  async call(method: string, body: Record<string, unknown>): Promise<unknown> {
    const abort = new AbortController()
    this._abort = abort
    try {
      const response = await this.fetchFn(`${TELEGRAM_API_BASE}/bot${this.token}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: abort.signal,
      })
      const payload = apiResponseSchema.parse(await response.json())
      if (!payload.ok) {
        throw new Error(`Telegram ${method} failed: ${payload.description ?? response.status}`)
      }
      return payload.result
    } finally {
      if (this._abort === abort) this._abort = null
    }
  }
}

export { MAIN_KEYBOARD, TelegramTransport }
