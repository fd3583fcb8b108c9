/**
 * Telegram Bot API sendMessage
 */

import { z } from 'zod'
import { TransportError } from '../../shared/error.js'
import { getErrorMessage } from '../../shared/assertError.js'
import { formatBody, formatSubject } from '../formatAlert.js'
import type { AlertMessage, Notifier } from '../types.js'

const apiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
})

export interface TelegramNotifierOptions {
  botToken: string
  chatId: string
  apiBase: string
}

export function createTelegramNotifier(options: TelegramNotifierOptions): Notifier {
  const url = `${options.apiBase.replace(/\/$/, '')}/bot${options.botToken}/sendMessage`

  return {
    name: 'telegram',
    async send(message: AlertMessage, signal: AbortSignal) {
      let response: Response
      try {
        response = await fetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            chat_id: options.chatId,
            text: `${formatSubject(message)}\n\n${formatBody(message)}`,
            disable_web_page_preview: true,
          }),
          signal,
        })
      } catch (error) {
        throw new TransportError(`Telegram request failed: ${getErrorMessage(error)}`, 'TRANSPORT_FAILED', error)
      }

      const parsed = apiResponseSchema.safeParse(await response.json().catch(() => null))
      if (!response.ok || !parsed.success || !parsed.data.ok) {
        const description = parsed.success ? parsed.data.description : undefined
        throw new TransportError(`Telegram sendMessage failed (HTTP ${response.status})${description ? `: ${description}` : ''}`)
      }
    },
  }
}
