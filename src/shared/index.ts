/**
 * @entry Shared 公共基础设施模块
 *
 * 底层工具函数，无业务逻辑依赖
 *
 * 能力分组：
 * - Result<T,E>: 函数式错误处理（ok/err/map/fromPromise）
 * - AgentError 及子类: 分类错误（Collection/Configuration/Transport/Remediation/Dependency）
 * - Logger: 日志系统（createLogger/setLogLevel/setLogFile/logError）
 * - 错误守卫: isError/getErrorMessage/ensureError/getErrnoCode
 * - 时间: formatRelative/formatDuration/sleep/withTimeout
 * - 外部命令: runCommand/describeCommandFailure
 */

export {
  type Result,
  ok,
  err,
  isOk,
  isErr,
  unwrapOr,
  map,
  fromPromise,
} from './result.js'

export {
  type ErrorCode,
  type ErrorCategory,
  AgentError,
  CollectionError,
  ConfigurationError,
  TransportError,
  RemediationError,
  DependencyError,
  assertNever,
  printError,
} from './error.js'

export {
  type LogLevel,
  type Logger,
  type ErrorContext,
  isLogLevel,
  setLogLevel,
  setLogFile,
  createLogger,
  logger,
  logError,
  stripAnsi,
  formatFileLogLine,
} from './logger.js'

export { isError, getErrorMessage, ensureError, getErrnoCode } from './assertError.js'

export { formatRelative, formatDuration, sleep, withTimeout } from './formatTime.js'

export { type CommandResult, type RunCommandOptions, runCommand, describeCommandFailure } from './exec.js'
