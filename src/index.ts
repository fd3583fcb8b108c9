/**
 * @entry sysguard 库入口
 *
 * 嵌入使用时可替换 MetricSource / Notifier / CommandRunner 的实现
 */

export { VERSION } from './version.js'
export * from './types/index.js'
export * from './config/index.js'
export * from './metrics/index.js'
export * from './diagnosis/index.js'
export * from './notify/index.js'
export * from './heal/index.js'
export * from './scheduler/index.js'
export { saveLastCycle, readLastCycle, type CycleSummary } from './store/index.js'
export {
  AgentError,
  CollectionError,
  ConfigurationError,
  TransportError,
  RemediationError,
  DependencyError,
  type ErrorCode,
  type ErrorCategory,
} from './shared/index.js'
export { createLogger, setLogLevel, setLogFile, type Logger, type LogLevel } from './shared/index.js'
export { ok, err, type Result } from './shared/index.js'
