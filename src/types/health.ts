/**
 * 健康状态与诊断结果
 */

export type HealthStatus = 'NOMINAL' | 'WARNING' | 'CRITICAL' | 'ERROR'

/** 有对应自愈动作的子系统 */
export type RemediableSubsystem = 'cpu' | 'memory' | 'disk' | 'network' | 'processService'

/** 只告警、从不自愈的子系统 */
export type AlertOnlySubsystem = 'port' | 'load' | 'swap' | 'zombies' | 'temperature'

export type Subsystem = RemediableSubsystem | AlertOnlySubsystem

const REMEDIABLE: ReadonlySet<Subsystem> = new Set<Subsystem>([
  'cpu',
  'memory',
  'disk',
  'network',
  'processService',
])

export function isRemediableSubsystem(subsystem: Subsystem): subsystem is RemediableSubsystem {
  return REMEDIABLE.has(subsystem)
}

/** ERROR 排在最后：告警上至少等同 WARNING，但从不触发自愈 */
const STATUS_RANK: Record<HealthStatus, number> = {
  NOMINAL: 0,
  WARNING: 1,
  CRITICAL: 2,
  ERROR: 3,
}

export function compareStatus(a: HealthStatus, b: HealthStatus): number {
  return STATUS_RANK[a] - STATUS_RANK[b]
}

export function worstStatus(statuses: readonly HealthStatus[]): HealthStatus {
  return statuses.reduce<HealthStatus>((worst, s) => (compareStatus(s, worst) > 0 ? s : worst), 'NOMINAL')
}

/** WARNING/CRITICAL 可以触发自愈，NOMINAL 与 ERROR 不行 */
export function isActionableStatus(status: HealthStatus): boolean {
  return status === 'WARNING' || status === 'CRITICAL'
}

export interface AlertFinding {
  key: string
  summary: string
  detail: string
}

export interface SubsystemDiagnosis {
  subsystem: Subsystem
  status: HealthStatus
  detail: string
  /** 阈值类检查的观测值（CPU/内存/磁盘/swap 为百分比，僵尸为个数，温度为摄氏度） */
  observed?: number
  alerts: AlertFinding[]
  /** 诊断层面是否存在对应的自愈动作（是否真的执行由控制器决定） */
  healEligible: boolean
}

export interface DiagnosticResult {
  overall: HealthStatus
  subsystems: SubsystemDiagnosis[]
}
