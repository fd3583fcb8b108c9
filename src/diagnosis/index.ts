/**
 * @entry Diagnosis 诊断引擎
 *
 * - diagnose(): 快照 → 各子系统 HealthStatus + 总体状态
 * - AlertKeys: 告警键构造
 */

export { diagnose } from './diagnose.js'
export { AlertKeys } from './alertKeys.js'
