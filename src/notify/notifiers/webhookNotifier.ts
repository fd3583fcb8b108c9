/**
 * 通用 JSON webhook（POST）
 */

import { formatISO } from 'date-fns'
import { TransportError } from '../../shared/error.js'
import { getErrorMessage } from '../../shared/assertError.js'
import { formatSubject } from '../formatAlert.js'
import type { AlertMessage, Notifier } from '../types.js'

export interface WebhookNotifierOptions {
  url: string
  headers: Record<string, string>
}

export function buildWebhookPayload(message: AlertMessage): Record<string, string> {
  return {
    key: message.alertKey,
    subject: formatSubject(message),
    summary: message.summary,
    detail: message.detail,
    host: message.hostname,
    time: formatISO(message.timestamp),
    version: message.agentVersion,
  }
}

export function createWebhookNotifier(options: WebhookNotifierOptions): Notifier {
  return {
    name: 'webhook',
    async send(message: AlertMessage, signal: AbortSignal) {
      let response: Response
      try {
        response = await fetch(options.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', ...options.headers },
          body: JSON.stringify(buildWebhookPayload(message)),
          signal,
        })
      } catch (error) {
        throw new TransportError(`Webhook request failed: ${getErrorMessage(error)}`, 'TRANSPORT_FAILED', error)
      }
      if (!response.ok) {
        throw new TransportError(`Webhook responded with HTTP ${response.status}`)
      }
    },
  }
}
