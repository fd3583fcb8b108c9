/**
 * 自愈控制器
 *
 * 闸门顺序（任一不满足即 NotAttempted）：
 *   1. selfHeal.enabled
 *   2. 子系统有对应动作且该动作开关打开
 *   3. 状态为 WARNING/CRITICAL 且诊断可自愈（ERROR 永不自愈）
 *   4. 目标（进程/服务）不在排除集合
 *   5. 破坏性动作的路径与期限在边界内
 *
 * 每次调用最多执行一个动作，结果经告警调度器以 SELF_HEAL_ATTEMPT / SELF_HEAL_FAIL 上报
 */

import { createLogger, logError } from '../shared/logger.js'
import { RemediationError } from '../shared/error.js'
import { ensureError, getErrorMessage } from '../shared/assertError.js'
import { sleep, withTimeout } from '../shared/formatTime.js'
import { AlertKeys } from '../diagnosis/alertKeys.js'
import { describeAction, type HealingAction, type HealOutcome } from '../types/healing.js'
import {
  isRemediableSubsystem,
  type AlertOnlySubsystem,
  type RemediableSubsystem,
  type SubsystemDiagnosis,
} from '../types/health.js'
import type { Config, StaleFileTarget } from '../config/schema.js'
import type { MetricSource } from '../metrics/types.js'
import type { ProcessInfo } from '../types/metrics.js'
import type { NotifyResult } from '../notify/types.js'
import type { CommandRunner } from './types.js'
import {
  buildExclusionSet,
  checkProcessTarget,
  checkServiceTarget,
  checkStaleFileTarget,
  type ExclusionSet,
} from './safety.js'

const logger = createLogger('heal')

// 选择 CPU 结束目标时考察的进程数
const TOP_PROCESS_SAMPLE = 15

export interface AlertSink {
  notify(alertKey: string, summary: string, detail: string): Promise<NotifyResult>
}

export interface SelfHealingControllerOptions {
  config: Pick<Config, 'selfHeal' | 'thresholds' | 'processService'>
  runner: CommandRunner
  alerts: AlertSink
  metrics: Pick<MetricSource, 'topProcesses'>
  ownPid?: number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>
}

type Plan = { ok: true; action: HealingAction } | { ok: false; reason: string }

const ACTION_FLAGS: Record<RemediableSubsystem, string> = {
  cpu: 'selfHeal.cpu.enabled',
  memory: 'selfHeal.memory.enabled',
  disk: 'selfHeal.disk.enabled',
  processService: 'selfHeal.service.enabled',
  network: 'selfHeal.network.enabled',
}

function noRemediationReason(subsystem: AlertOnlySubsystem): string {
  return subsystem === 'port'
    ? 'no remediation is defined for port mismatches'
    : `no remediation is defined for ${subsystem} readings`
}

export class SelfHealingController {
  private readonly config: SelfHealingControllerOptions['config']
  private readonly runner: CommandRunner
  private readonly alerts: AlertSink
  private readonly metrics: Pick<MetricSource, 'topProcesses'>
  private readonly exclusions: ExclusionSet
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>

  constructor(options: SelfHealingControllerOptions) {
    this.config = options.config
    this.runner = options.runner
    this.alerts = options.alerts
    this.metrics = options.metrics
    this.exclusions = buildExclusionSet(options.config.selfHeal.exclusions, options.ownPid)
    this.sleep = options.sleep ?? sleep
  }

  async maybeHeal(diagnosis: SubsystemDiagnosis, options: { signal?: AbortSignal } = {}): Promise<HealOutcome> {
    const refused = this.checkGates(diagnosis)
    if (refused) return this.notAttempted(diagnosis, refused)

    if (!isRemediableSubsystem(diagnosis.subsystem)) {
      return this.notAttempted(diagnosis, noRemediationReason(diagnosis.subsystem))
    }
    const plan = await this.plan(diagnosis.subsystem, diagnosis.observed)
    if (!plan.ok) return this.notAttempted(diagnosis, plan.reason)

    return this.execute(plan.action, options.signal)
  }

  /** 闸门 1-3 */
  private checkGates(diagnosis: SubsystemDiagnosis): string | null {
    const { selfHeal } = this.config
    if (!selfHeal.enabled) return 'self-healing is disabled'

    const { subsystem } = diagnosis
    if (!isRemediableSubsystem(subsystem)) return noRemediationReason(subsystem)
    if (!this.isActionEnabled(subsystem)) return `${ACTION_FLAGS[subsystem]} is off`

    if (diagnosis.status === 'ERROR') return 'status ERROR (reading unavailable) is never remediated'
    if (diagnosis.status === 'NOMINAL') return 'subsystem is nominal'
    if (!diagnosis.healEligible) return 'diagnosis is not eligible for remediation'
    return null
  }

  private isActionEnabled(subsystem: RemediableSubsystem): boolean {
    const { selfHeal } = this.config
    switch (subsystem) {
      case 'cpu':
        return selfHeal.cpu.enabled
      case 'memory':
        return selfHeal.memory.enabled
      case 'disk':
        return selfHeal.disk.enabled
      case 'processService':
        return selfHeal.service.enabled
      case 'network':
        return selfHeal.network.enabled
    }
  }

  /** 闸门 4-5：选择目标并做安全检查 */
  private async plan(subsystem: RemediableSubsystem, observed: number | undefined): Promise<Plan> {
    const { selfHeal } = this.config
    switch (subsystem) {
      case 'cpu':
        return this.planKill(observed)
      case 'memory':
        return selfHeal.memory.dropCaches
          ? { ok: true, action: { kind: 'DROP_CACHES' } }
          : { ok: false, reason: 'selfHeal.memory.dropCaches is off' }
      case 'disk':
        return this.planCleanup()
      case 'processService':
        return this.planRestart([this.config.processService.serviceName])
      case 'network':
        return this.planRestart(selfHeal.network.services)
    }
  }

  private async planKill(observed: number | undefined): Promise<Plan> {
    const { cpu } = this.config.selfHeal
    if (observed === undefined || observed < cpu.triggerPercent) {
      return { ok: false, reason: `CPU ${observed ?? '?'}% is below the kill trigger ${cpu.triggerPercent}%` }
    }

    let processes: ProcessInfo[]
    try {
      processes = await this.metrics.topProcesses(TOP_PROCESS_SAMPLE)
    } catch (error) {
      return { ok: false, reason: `could not list processes: ${getErrorMessage(error)}` }
    }

    const minPercent = this.config.thresholds.cpu
    for (const proc of processes) {
      if (proc.cpuPercent <= minPercent) break
      if (proc.elapsedSeconds <= cpu.minAgeSeconds) continue
      const gate = checkProcessTarget(proc, this.exclusions)
      if (!gate.allowed) {
        logger.debug(`Skip kill candidate: ${gate.reason}`)
        continue
      }
      return { ok: true, action: { kind: 'KILL_PROCESS', pid: proc.pid, name: proc.name, user: proc.user } }
    }
    return { ok: false, reason: `no killable process above ${minPercent}% CPU` }
  }

  private planCleanup(): Plan {
    const allowed: StaleFileTarget[] = []
    for (const target of this.config.selfHeal.disk.targets) {
      try {
        const gate = checkStaleFileTarget(target, this.exclusions)
        if (gate.allowed) allowed.push(target)
        else logger.warn(`Skip cleanup target: ${gate.reason}`)
      } catch (error) {
        // 空路径等配置错误：整个动作放弃
        logError(logger, 'Disk cleanup aborted', ensureError(error), { subsystem: 'disk' })
        return { ok: false, reason: `configuration error: ${getErrorMessage(error)}` }
      }
    }
    if (allowed.length === 0) return { ok: false, reason: 'no permitted cleanup targets' }
    return { ok: true, action: { kind: 'DELETE_STALE_FILES', targets: allowed } }
  }

  private planRestart(candidates: string[]): Plan {
    const reasons: string[] = []
    for (const service of candidates) {
      const gate = checkServiceTarget(service, this.exclusions)
      if (gate.allowed) return { ok: true, action: { kind: 'RESTART_SERVICE', service } }
      reasons.push(gate.reason ?? service)
    }
    return { ok: false, reason: reasons.join('; ') || 'no service configured' }
  }

  private async execute(action: HealingAction, signal?: AbortSignal): Promise<HealOutcome> {
    const description = describeAction(action)
    const timeoutMs = this.config.selfHeal.commandTimeoutSeconds * 1000
    logger.warn(`Self-heal: ${description}`)

    let outcome: 'success' | 'failure'
    let message: string
    try {
      // runner 自己也有超时，这里再兜底一次，保证循环不会卡住
      const result = await withTimeout(
        this.runner.run(action, { timeoutMs }),
        timeoutMs + 1000,
        () => new RemediationError(`${description} timed out after ${timeoutMs}ms`, 'REMEDIATION_TIMEOUT')
      )
      if (result.exitCode === 0) {
        outcome = 'success'
        message = result.output || 'ok'
      } else {
        outcome = 'failure'
        message = result.output || `exit code ${result.exitCode ?? 'none'}`
      }
    } catch (error) {
      outcome = 'failure'
      message = getErrorMessage(error)
    }

    if (outcome === 'success') {
      logger.info(`Self-heal succeeded: ${description}`)
      await this.alerts.notify(AlertKeys.selfHealAttempt(), 'Self-heal attempted', `Succeeded: ${description}\n${message}`)
      await this.settle(action, signal)
    } else {
      logger.error(`Self-heal failed: ${description}: ${message}`)
      await this.alerts.notify(AlertKeys.selfHealFail(), 'Self-heal FAILED', `Failed: ${description}\n${message}`)
    }

    return { attempted: true, action, outcome, message }
  }

  /** 服务重启后等待一会儿，避免下一次读取把仍在启动的服务再次判为异常 */
  private async settle(action: HealingAction, signal?: AbortSignal): Promise<void> {
    const seconds = this.config.selfHeal.settleSeconds
    if (action.kind !== 'RESTART_SERVICE' || seconds <= 0) return
    logger.debug(`Waiting ${seconds}s for ${action.service} to settle`)
    await this.sleep(seconds * 1000, signal)
  }

  private notAttempted(diagnosis: SubsystemDiagnosis, reason: string): HealOutcome {
    logger.info(`No self-heal for ${diagnosis.subsystem}: ${reason}`)
    return { attempted: false, reason }
  }
}
