/**
 * @entry Notify 告警模块
 *
 * 主要 API:
 * - AlertDispatcher: 冷却/去重 + 投递
 * - createNotifier(): 按配置选择 mail / telegram / webhook / log
 */

export type { AlertMessage, Notifier, NotifyResult } from './types.js'
export { AlertDispatcher, type AlertDispatcherOptions, type DispatchRecord } from './AlertDispatcher.js'
export { createNotifier } from './createNotifier.js'
export { formatSubject, formatBody } from './formatAlert.js'
export { createMailNotifier } from './notifiers/mailNotifier.js'
export { createTelegramNotifier, type TelegramNotifierOptions } from './notifiers/telegramNotifier.js'
export { createWebhookNotifier, buildWebhookPayload, type WebhookNotifierOptions } from './notifiers/webhookNotifier.js'
export { createLogNotifier } from './notifiers/logNotifier.js'
