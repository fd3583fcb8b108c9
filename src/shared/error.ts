/**
 * 统一错误处理系统
 * 支持错误分类、上下文信息和修复建议
 */

import chalk from 'chalk'

// ============ 错误分类定义 ============

export type ErrorCategory =
  | 'COLLECTION' // 指标采集失败
  | 'CONFIG' // 配置错误
  | 'TRANSPORT' // 告警投递失败
  | 'REMEDIATION' // 自愈动作失败
  | 'DEPENDENCY' // 缺少外部命令
  | 'UNKNOWN'

export type ErrorCode =
  | 'COLLECT_COMMAND_FAILED'
  | 'COLLECT_PARSE_FAILED'
  | 'COLLECT_TIMEOUT'
  | 'CONFIG_INVALID'
  | 'CONFIG_NOT_FOUND'
  | 'TRANSPORT_FAILED'
  | 'TRANSPORT_TIMEOUT'
  | 'REMEDIATION_FAILED'
  | 'REMEDIATION_TIMEOUT'
  | 'DEPENDENCY_MISSING'
  | 'AGENT_ALREADY_RUNNING'
  | 'UNKNOWN'

// ============ 统一错误类 ============

export class AgentError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AgentError'
  }

  /**
   * 格式化错误输出到终端
   */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(categoryLabels[this.category])}]`)
    lines.push('')
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggested fix:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }
}

/** 读不到指标（命令缺失、超时、输出无法解析） */
export class CollectionError extends AgentError {
  constructor(message: string, code: ErrorCode = 'COLLECT_COMMAND_FAILED', cause?: unknown) {
    super(code, message, 'COLLECTION', cause)
    this.name = 'CollectionError'
  }
}

export class ConfigurationError extends AgentError {
  constructor(message: string, suggestion?: string) {
    super('CONFIG_INVALID', message, 'CONFIG', undefined, suggestion ?? 'Run `sysguard config` to inspect the effective configuration')
    this.name = 'ConfigurationError'
  }
}

/** 告警投递失败：不消耗冷却 */
export class TransportError extends AgentError {
  constructor(message: string, code: ErrorCode = 'TRANSPORT_FAILED', cause?: unknown) {
    super(code, message, 'TRANSPORT', cause)
    this.name = 'TransportError'
  }
}

export class RemediationError extends AgentError {
  constructor(message: string, code: ErrorCode = 'REMEDIATION_FAILED', cause?: unknown) {
    super(code, message, 'REMEDIATION', cause)
    this.name = 'RemediationError'
  }
}

export class DependencyError extends AgentError {
  constructor(public readonly missing: string[]) {
    super(
      'DEPENDENCY_MISSING',
      `Missing required commands: ${missing.join(', ')}`,
      'DEPENDENCY',
      undefined,
      'Install the missing tools or disable the checks that need them'
    )
    this.name = 'DependencyError'
  }
}

// ============ 格式化输出 ============

const categoryLabels: Record<ErrorCategory, string> = {
  COLLECTION: 'collection',
  CONFIG: 'config',
  TRANSPORT: 'transport',
  REMEDIATION: 'remediation',
  DEPENDENCY: 'dependency',
  UNKNOWN: 'unknown',
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  COLLECTION: chalk.yellow,
  CONFIG: chalk.yellow,
  TRANSPORT: chalk.red,
  REMEDIATION: chalk.magenta,
  DEPENDENCY: chalk.red,
  UNKNOWN: chalk.gray,
}

/**
 * 打印错误到终端
 */
export function printError(error: unknown): void {
  if (error instanceof AgentError) {
    console.error(error.format())
    return
  }
  const message = error instanceof Error ? error.message : String(error)
  console.error(new AgentError('UNKNOWN', message, 'UNKNOWN', error).format())
}

// ============ 错误断言 ============

export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`)
}
