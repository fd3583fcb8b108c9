/**
 * @entry 共享类型
 */

export type {
  Reading,
  ServiceState,
  CpuReading,
  MemoryReading,
  DiskReading,
  NetworkReading,
  ProcessServiceReading,
  PortReading,
  LoadReading,
  SwapReading,
  ZombieReading,
  TemperatureReading,
  TemperatureSensor,
  ProcessInfo,
  MetricSnapshot,
} from './metrics.js'

export {
  type HealthStatus,
  type Subsystem,
  type RemediableSubsystem,
  type AlertOnlySubsystem,
  type AlertFinding,
  type SubsystemDiagnosis,
  type DiagnosticResult,
  compareStatus,
  worstStatus,
  isActionableStatus,
  isRemediableSubsystem,
} from './health.js'

export {
  type HealingAction,
  type HealingActionKind,
  type HealOutcome,
  describeAction,
} from './healing.js'
