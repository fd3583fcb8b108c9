/**
 * 例行维护：空闲时重建 man 数据库
 *
 * 只在系统 CPU 低于 cpuPermitPercent 且距上次成功运行超过 minIntervalHours 时执行；
 * 计时器只在成功后前进，失败会在下一轮重试并告警 MAINTENANCE_FAIL
 */

import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { withTimeout } from '../shared/formatTime.js'
import { RemediationError } from '../shared/error.js'
import { AlertKeys } from '../diagnosis/alertKeys.js'
import { describeAction, type HealingAction } from '../types/healing.js'
import type { MaintenanceConfig } from '../config/schema.js'
import type { MetricSource } from '../metrics/types.js'
import type { CommandRunner } from '../heal/types.js'
import type { AlertSink } from '../heal/SelfHealingController.js'

const logger = createLogger('maintenance')

const HOUR_MS = 60 * 60 * 1000

export type MaintenanceOutcome = 'disabled' | 'not-due' | 'busy' | 'skipped' | 'success' | 'failure'

export interface MaintenanceOptions {
  config: MaintenanceConfig
  commandTimeoutMs: number
  runner: CommandRunner
  alerts: AlertSink
  metrics: Pick<MetricSource, 'readCpu'>
  now?: () => number
}

export class MaintenanceScheduler {
  private lastSuccessAt: number | null = null
  private readonly options: MaintenanceOptions
  private readonly now: () => number

  constructor(options: MaintenanceOptions) {
    this.options = options
    this.now = options.now ?? Date.now
  }

  get lastRunAt(): number | null {
    return this.lastSuccessAt
  }

  isDue(): boolean {
    if (this.lastSuccessAt === null) return true
    return this.now() - this.lastSuccessAt >= this.options.config.minIntervalHours * HOUR_MS
  }

  async runIfDue(): Promise<MaintenanceOutcome> {
    const { config } = this.options
    if (!config.enabled) return 'disabled'
    if (!this.isDue()) return 'not-due'

    // 采样失败时不冒险运行
    let cpuPercent: number
    try {
      cpuPercent = (await this.options.metrics.readCpu()).percent
    } catch (error) {
      logger.warn(`Maintenance skipped, CPU unavailable: ${getErrorMessage(error)}`)
      return 'skipped'
    }
    if (cpuPercent >= config.cpuPermitPercent) {
      logger.debug(`Maintenance deferred, CPU ${cpuPercent}% >= ${config.cpuPermitPercent}%`)
      return 'busy'
    }

    const action: HealingAction = { kind: 'RUN_MANDB' }
    const description = describeAction(action)
    const timeoutMs = this.options.commandTimeoutMs
    let failure: string | null = null
    try {
      const result = await withTimeout(
        this.options.runner.run(action, { timeoutMs }),
        timeoutMs + 1000,
        () => new RemediationError(`${description} timed out after ${timeoutMs}ms`, 'REMEDIATION_TIMEOUT')
      )
      if (result.exitCode !== 0) failure = result.output || `exit code ${result.exitCode ?? 'none'}`
    } catch (error) {
      failure = getErrorMessage(error)
    }

    if (failure !== null) {
      logger.error(`Maintenance failed: ${failure}`)
      await this.options.alerts.notify(AlertKeys.maintenanceFail(), 'Maintenance FAILED', `${description}: ${failure}`)
      return 'failure'
    }

    this.lastSuccessAt = this.now()
    logger.info(`Maintenance completed: ${description}`)
    return 'success'
  }
}
