/**
 * @entry Scheduler 调度模块
 *
 * 能力分组：
 * - 主循环: MonitorAgent（状态机 + 单轮 runCycle）、createMonitorAgent（按配置组装）
 * - 维护: MaintenanceScheduler
 * - 启动检查: checkDependencies
 * - 守护进程: startDaemon/stopDaemon/getDaemonStatus/runCheck、PID 锁
 */

export {
  MonitorAgent,
  summarizeCycle,
  type AgentState,
  type CycleReport,
  type MonitorAgentOptions,
  type RunCycleOptions,
} from './MonitorAgent.js'
export { createMonitorAgent, type MonitorAgentDeps } from './createMonitorAgent.js'
export { MaintenanceScheduler, type MaintenanceOptions, type MaintenanceOutcome } from './maintenance.js'
export { checkDependencies, requiredCommands, isExecutableOnPath } from './checkDependencies.js'
export {
  acquirePidLock,
  releasePidLock,
  getPidLock,
  isAgentRunning,
  isProcessRunning,
  type PidLockInfo,
} from './pidLock.js'
export { startDaemon, type StartOptions } from './startDaemon.js'
export { stopDaemon, type StopResult } from './stopDaemon.js'
export { getDaemonStatus } from './getDaemonStatus.js'
export { runCheck, printReport, type CheckOptions } from './runCheck.js'
