/**
 * 监控主循环
 *
 * 状态机：INIT → RUNNING → SHUTTING_DOWN → TERMINATED
 *
 * 每轮：采集 → 诊断 → 告警 → 自愈 → 维护 → 睡眠到下一个周期
 * 任一阶段抛错只记录日志，本轮继续；stop() 会立即打断睡眠，正在执行的动作等它结束
 */

import { createLogger, logError } from '../shared/logger.js'
import { ensureError } from '../shared/assertError.js'
import { formatISO } from 'date-fns'
import { sleep as defaultSleep } from '../shared/formatTime.js'
import { collectSnapshot } from '../metrics/collectSnapshot.js'
import { diagnose } from '../diagnosis/diagnose.js'
import { describeAction, type HealOutcome } from '../types/healing.js'
import type { DiagnosticResult } from '../types/health.js'
import type { Config } from '../config/schema.js'
import type { MetricSource } from '../metrics/types.js'
import type { AlertDispatcher, DispatchRecord } from '../notify/AlertDispatcher.js'
import type { SelfHealingController } from '../heal/SelfHealingController.js'
import type { CycleSummary } from '../store/lastCycle.js'
import type { MaintenanceOutcome, MaintenanceScheduler } from './maintenance.js'
import { checkDependencies } from './checkDependencies.js'

const logger = createLogger('agent')

/** 两轮之间至少间隔 1 秒 */
const MIN_SLEEP_MS = 1000

export type AgentState = 'INIT' | 'RUNNING' | 'SHUTTING_DOWN' | 'TERMINATED'

export interface CycleReport {
  cycle: number
  startedAt: number
  durationMs: number
  /** 采集阶段整体失败时为 null */
  diagnosis: DiagnosticResult | null
  alerts: DispatchRecord[]
  healing: HealOutcome[]
  maintenance: MaintenanceOutcome | null
}

export interface RunCycleOptions {
  /** false 时跳过自愈与维护（check --no-heal） */
  heal?: boolean
}

export interface MonitorAgentOptions {
  config: Config
  metrics: MetricSource
  alerts: Pick<AlertDispatcher, 'dispatchDiagnostics'>
  healer: Pick<SelfHealingController, 'maybeHeal'>
  maintenance: Pick<MaintenanceScheduler, 'runIfDue'>
  onCycle?: (report: CycleReport) => void
  checkDependencies?: (config: Config) => void
  now?: () => number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>
}

export class MonitorAgent {
  private currentState: AgentState = 'INIT'
  private readonly abortController = new AbortController()
  private cycleCount = 0
  private readonly options: MonitorAgentOptions
  private readonly now: () => number
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>

  constructor(options: MonitorAgentOptions) {
    this.options = options
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
  }

  get state(): AgentState {
    return this.currentState
  }

  get cycles(): number {
    return this.cycleCount
  }

  /**
   * 进入主循环，直到 stop() 被调用
   * 依赖检查失败会抛 DependencyError，状态直接到 TERMINATED
   */
  async run(): Promise<void> {
    if (this.currentState !== 'INIT') {
      throw new Error(`MonitorAgent cannot run from state ${this.currentState}`)
    }

    const check = this.options.checkDependencies ?? checkDependencies
    try {
      check(this.options.config)
    } catch (error) {
      this.currentState = 'TERMINATED'
      throw error
    }

    // 启动前就收到了 stop()
    if (this.abortController.signal.aborted) {
      this.currentState = 'TERMINATED'
      return
    }

    this.currentState = 'RUNNING'
    const intervalMs = this.options.config.monitor.intervalSeconds * 1000
    logger.info(`Monitor loop started (interval ${this.options.config.monitor.intervalSeconds}s)`)

    const { signal } = this.abortController
    while (!signal.aborted) {
      const startedAt = this.now()
      await this.runCycle()
      if (signal.aborted) break

      const elapsed = this.now() - startedAt
      await this.sleep(Math.max(MIN_SLEEP_MS, intervalMs - elapsed), signal)
    }

    this.currentState = 'TERMINATED'
    logger.info(`Monitor loop stopped after ${this.cycleCount} cycle(s)`)
  }

  /**
   * 请求停止：打断睡眠，当前动作完成后退出循环
   */
  stop(): void {
    if (this.currentState === 'TERMINATED' || this.abortController.signal.aborted) return
    if (this.currentState === 'RUNNING') this.currentState = 'SHUTTING_DOWN'
    logger.info('Shutdown requested')
    this.abortController.abort()
  }

  /** 执行一轮（守护循环和一次性 check 共用） */
  async runCycle(options: RunCycleOptions = {}): Promise<CycleReport> {
    const heal = options.heal ?? true
    const cycle = ++this.cycleCount
    const startedAt = this.now()
    const report: CycleReport = {
      cycle,
      startedAt,
      durationMs: 0,
      diagnosis: null,
      alerts: [],
      healing: [],
      maintenance: null,
    }
    const { config } = this.options
    const { signal } = this.abortController

    try {
      const snapshot = await collectSnapshot(this.options.metrics, config, this.now)
      report.diagnosis = diagnose(snapshot, config)
    } catch (error) {
      logError(logger, 'Collection phase failed', ensureError(error), { cycle })
    }

    const diagnosis = report.diagnosis
    if (diagnosis) {
      logger.info(`Cycle ${cycle}: ${diagnosis.overall}`)
      for (const sub of diagnosis.subsystems) {
        if (sub.status !== 'NOMINAL') logger.warn(`${sub.subsystem}: ${sub.status} - ${sub.detail}`)
        else logger.debug(`${sub.subsystem}: ${sub.detail}`)
      }

      try {
        report.alerts = await this.options.alerts.dispatchDiagnostics(diagnosis)
      } catch (error) {
        logError(logger, 'Alert phase failed', ensureError(error), { cycle })
      }

      if (heal) {
        for (const sub of diagnosis.subsystems) {
          if (!sub.healEligible) continue
          // 停止后不再发起新动作
          if (signal.aborted) break
          try {
            report.healing.push(await this.options.healer.maybeHeal(sub, { signal }))
          } catch (error) {
            logError(logger, 'Heal phase failed', ensureError(error), { cycle, subsystem: sub.subsystem })
          }
        }
      }
    }

    if (heal && !signal.aborted) {
      try {
        report.maintenance = await this.options.maintenance.runIfDue()
      } catch (error) {
        logError(logger, 'Maintenance phase failed', ensureError(error), { cycle })
      }
    }

    report.durationMs = this.now() - startedAt

    if (this.options.onCycle) {
      try {
        this.options.onCycle(report)
      } catch (error) {
        logError(logger, 'Cycle hook failed', ensureError(error), { cycle })
      }
    }
    return report
  }
}

/** 转成可持久化的摘要（status 命令读取） */
export function summarizeCycle(report: CycleReport): CycleSummary {
  return {
    cycle: report.cycle,
    finishedAt: formatISO(report.startedAt + report.durationMs),
    durationMs: report.durationMs,
    overall: report.diagnosis?.overall ?? 'ERROR',
    subsystems: (report.diagnosis?.subsystems ?? []).map(s => ({
      subsystem: s.subsystem,
      status: s.status,
      detail: s.detail,
    })),
    alertsSent: report.alerts.filter(a => a.result === 'sent').map(a => a.key),
    healing: report.healing.map(h =>
      h.attempted ? `${describeAction(h.action)}: ${h.outcome}` : `skipped: ${h.reason}`
    ),
  }
}
