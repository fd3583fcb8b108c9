import { assertNever } from '../shared/error.js'
import type { AlertConfig } from '../config/schema.js'
import type { Notifier } from './types.js'
import { createMailNotifier } from './notifiers/mailNotifier.js'
import { createTelegramNotifier } from './notifiers/telegramNotifier.js'
import { createWebhookNotifier } from './notifiers/webhookNotifier.js'
import { createLogNotifier } from './notifiers/logNotifier.js'

export function createNotifier(config: AlertConfig): Notifier {
  const transport = config.transport
  switch (transport) {
    case 'mail':
      return createMailNotifier({ timeoutMs: config.timeoutSeconds * 1000 })
    case 'telegram':
      return createTelegramNotifier(config.telegram)
    case 'webhook':
      return createWebhookNotifier(config.webhook)
    case 'log':
      return createLogNotifier()
    default:
      return assertNever(transport)
  }
}
