/**
 * 告警调度器
 *
 * - 冷却表以 AlertKey 为键，只在投递成功后更新
 * - 投递失败记录 ERROR 并返回 suppressed，冷却不前进，下次同类事件会重试
 * - 例行的冷却抑制只记 INFO
 */

import { hostname } from 'os'
import { createLogger, logError } from '../shared/logger.js'
import { TransportError } from '../shared/error.js'
import { ensureError } from '../shared/assertError.js'
import { withTimeout } from '../shared/formatTime.js'
import { VERSION } from '../version.js'
import type { AlertConfig } from '../config/schema.js'
import type { DiagnosticResult } from '../types/health.js'
import type { AlertMessage, Notifier, NotifyResult } from './types.js'

const logger = createLogger('alert')

export interface AlertDispatcherOptions {
  config: AlertConfig
  notifier: Notifier
  now?: () => number
  hostname?: string
}

export interface DispatchRecord {
  key: string
  result: NotifyResult
}

export class AlertDispatcher {
  private readonly lastNotified = new Map<string, number>()
  private readonly config: AlertConfig
  private readonly notifier: Notifier
  private readonly now: () => number
  private readonly host: string

  constructor(options: AlertDispatcherOptions) {
    this.config = options.config
    this.notifier = options.notifier
    this.now = options.now ?? Date.now
    this.host = options.hostname ?? hostname()
  }

  async notify(alertKey: string, summary: string, detail: string): Promise<NotifyResult> {
    if (!this.config.enabled) {
      logger.info(`Alerts disabled, not sending [${alertKey}] ${summary}`)
      return 'suppressed'
    }

    const now = this.now()
    const last = this.lastNotified.get(alertKey)
    const cooldownMs = this.config.cooldownSeconds * 1000
    if (last !== undefined && now - last < cooldownMs) {
      const remaining = Math.ceil((cooldownMs - (now - last)) / 1000)
      logger.info(`Cooldown active [${alertKey}] (${remaining}s left), suppressed: ${summary}`)
      return 'suppressed'
    }

    const message: AlertMessage = {
      alertKey,
      subjectPrefix: this.config.subjectPrefix,
      summary,
      detail,
      recipient: this.config.recipient,
      hostname: this.host,
      timestamp: now,
      agentVersion: VERSION,
    }

    try {
      await this.deliver(message)
    } catch (error) {
      logError(logger, `Alert delivery via ${this.notifier.name} failed [${alertKey}]`, ensureError(error))
      return 'suppressed'
    }

    this.record(alertKey, now)
    logger.warn(`Alert sent [${alertKey}]: ${summary}`)
    return 'sent'
  }

  /**
   * 对所有非 NOMINAL 子系统的每条发现发送告警（ERROR 也告警）
   */
  async dispatchDiagnostics(result: DiagnosticResult): Promise<DispatchRecord[]> {
    const records: DispatchRecord[] = []
    for (const diagnosis of result.subsystems) {
      if (diagnosis.status === 'NOMINAL') continue
      for (const finding of diagnosis.alerts) {
        const sent = await this.notify(finding.key, finding.summary, finding.detail)
        records.push({ key: finding.key, result: sent })
      }
    }
    return records
  }

  lastNotifiedAt(alertKey: string): number | undefined {
    return this.lastNotified.get(alertKey)
  }

  /** 冷却表唯一的写入点 */
  private record(alertKey: string, at: number): void {
    this.lastNotified.set(alertKey, at)
  }

  private async deliver(message: AlertMessage): Promise<void> {
    const timeoutMs = this.config.timeoutSeconds * 1000
    const controller = new AbortController()
    await withTimeout(this.notifier.send(message, controller.signal), timeoutMs, () => {
      controller.abort()
      return new TransportError(
        `${this.notifier.name} did not respond within ${this.config.timeoutSeconds}s`,
        'TRANSPORT_TIMEOUT'
      )
    })
  }
}
