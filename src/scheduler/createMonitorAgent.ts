/**
 * 按配置组装真实组件：系统指标源、通知渠道、告警调度器、命令执行器、自愈控制器、维护调度
 */

import { SystemMetricSource } from '../metrics/SystemMetricSource.js'
import { AlertDispatcher } from '../notify/AlertDispatcher.js'
import { createNotifier } from '../notify/createNotifier.js'
import { SelfHealingController } from '../heal/SelfHealingController.js'
import { SystemCommandRunner } from '../heal/SystemCommandRunner.js'
import type { Config } from '../config/schema.js'
import type { MetricSource } from '../metrics/types.js'
import type { Notifier } from '../notify/types.js'
import type { CommandRunner } from '../heal/types.js'
import { MaintenanceScheduler } from './maintenance.js'
import { MonitorAgent, type CycleReport } from './MonitorAgent.js'

export interface MonitorAgentDeps {
  metrics?: MetricSource
  notifier?: Notifier
  runner?: CommandRunner
  onCycle?: (report: CycleReport) => void
  checkDependencies?: (config: Config) => void
}

export function createMonitorAgent(config: Config, deps: MonitorAgentDeps = {}): MonitorAgent {
  const metrics = deps.metrics ?? new SystemMetricSource()
  const runner = deps.runner ?? new SystemCommandRunner(config.selfHeal.privilegeHelper)
  const alerts = new AlertDispatcher({
    config: config.alert,
    notifier: deps.notifier ?? createNotifier(config.alert),
  })

  const healer = new SelfHealingController({ config, runner, alerts, metrics })
  const maintenance = new MaintenanceScheduler({
    config: config.maintenance,
    commandTimeoutMs: config.selfHeal.commandTimeoutSeconds * 1000,
    runner,
    alerts,
    metrics,
  })

  return new MonitorAgent({
    config,
    metrics,
    alerts,
    healer,
    maintenance,
    onCycle: deps.onCycle,
    checkDependencies: deps.checkDependencies,
  })
}
