/**
 * 一次性检查：跑一轮完整循环并打印诊断表
 *
 * 退出码：0 整体 NOMINAL，2 存在异常，1 启动失败
 */

import chalk from 'chalk'
import { printError } from '../shared/error.js'
import { describeAction } from '../types/healing.js'
import { createMonitorAgent, type MonitorAgentDeps } from './createMonitorAgent.js'
import { loadRuntimeConfig } from './loadRuntimeConfig.js'
import { colorStatus, header, statusTable } from '../cli/output.js'
import { checkDependencies } from './checkDependencies.js'
import type { CycleReport } from './MonitorAgent.js'

export interface CheckOptions {
  config?: string
  /** commander 的 --no-heal 会设成 false */
  heal?: boolean
}

export async function runCheck(options: CheckOptions, deps: MonitorAgentDeps = {}): Promise<number> {
  const config = await loadRuntimeConfig(options.config)
  if (!config) return 1

  const agent = createMonitorAgent(config, deps)
  try {
    const check = deps.checkDependencies ?? checkDependencies
    check(config)
  } catch (error) {
    printError(error)
    return 1
  }

  const report = await agent.runCycle({ heal: options.heal ?? true })
  printReport(report)
  return report.diagnosis?.overall === 'NOMINAL' ? 0 : 2
}

export function printReport(report: CycleReport): void {
  if (!report.diagnosis) {
    console.log()
    console.log(chalk.red('✗ Collection failed, no diagnosis available'))
    return
  }

  header(`Overall: ${colorStatus(report.diagnosis.overall)}`, 50)
  console.log(statusTable(report.diagnosis.subsystems))

  const sent = report.alerts.filter(a => a.result === 'sent')
  if (sent.length > 0) {
    console.log()
    console.log(chalk.bold('Alerts sent: ') + sent.map(a => a.key).join(', '))
  }

  for (const heal of report.healing) {
    if (!heal.attempted) continue
    const icon = heal.outcome === 'success' ? chalk.green('✓') : chalk.red('✗')
    console.log(`${icon} ${describeAction(heal.action)}: ${heal.message}`)
  }
  console.log()
}
