/**
 * 统一日志系统
 *
 * 功能：
 * - 分级日志（debug/info/warn/error）
 * - 前台/后台两种输出格式（后台由守护进程环境变量决定）
 * - 可选文件输出（无 ANSI 颜色，追加写入）
 * - 结构化上下文信息
 *
 * 使用：
 * - logger.debug/info/warn/error
 * - setLogLevel('debug'|'info'|'warn'|'error')
 * - setLogFile('/var/log/sysguard.log')
 */

import chalk from 'chalk'
import { appendFileSync, mkdirSync } from 'fs'
import { dirname } from 'path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
type LogMode = 'foreground' | 'background'

type EmitLevel = Exclude<LogLevel, 'silent'>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<EmitLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<EmitLevel, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

// ============ 全局状态 ============

function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const fromEnv = process.env.SYSGUARD_LOG_LEVEL
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv
  return 'info'
}

function initLogMode(): LogMode {
  if (process.env.SYSGUARD_BACKGROUND === '1') return 'background'
  return process.stdout.isTTY ? 'foreground' : 'background'
}

let currentLevel: LogLevel = initLogLevel()
const currentMode: LogMode = initLogMode()
let logFilePath: string | null = null

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

/** 设置日志文件，传 null 关闭文件输出 */
export function setLogFile(path: string | null): void {
  if (path) mkdirSync(dirname(path), { recursive: true })
  logFilePath = path
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function formatClock(): string {
  const now = new Date()
  return chalk.dim(
    `${now.getHours().toString().padStart(2, '0')}:${now.getMinutes().toString().padStart(2, '0')}:${now.getSeconds().toString().padStart(2, '0')}`
  )
}

/**
 * 格式化消息
 * - 前台模式：简洁输出，仅时间+级别+消息
 * - 后台模式：包含 scope，便于在 agent.log 中定位
 */
function formatMessage(level: EmitLevel, scope: string, message: string): string {
  const color = LEVEL_COLORS[level]
  const label = LEVEL_LABELS[level]

  if (currentMode === 'foreground') {
    return `${formatClock()} ${color(label)} ${message}`
  }

  const scopeStr = scope ? chalk.cyan(`[${scope}]`) : ''
  return `${formatClock()} ${color(label)} ${scopeStr} ${message}`
}

// ============ 文件日志格式化（无 ANSI 颜色） ============

// eslint-disable-next-line no-control-regex
const ANSI_REGEX = /\x1b\[[0-9;]*m/g
export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, '')
}

/** 格式化文件日志行（无颜色） */
export function formatFileLogLine(
  level: EmitLevel,
  scope: string,
  message: string,
  timestamp: string = new Date().toISOString()
): string {
  const label = LEVEL_LABELS[level]
  const scopeStr = scope ? `[${scope}]` : ''
  return `${timestamp} ${label} ${scopeStr} ${stripAnsi(message)}`
}

function formatArgs(args: unknown[]): string {
  if (args.length === 0) return ''
  return (
    ' ' +
    args
      .map(arg => (typeof arg === 'string' ? arg : JSON.stringify(arg)))
      .join(' ')
  )
}

function writeToFile(level: EmitLevel, scope: string, message: string, args: unknown[]): void {
  if (!logFilePath) return
  try {
    appendFileSync(logFilePath, formatFileLogLine(level, scope, message + formatArgs(args)) + '\n')
  } catch (error) {
    // 文件不可写时退回控制台，关闭文件输出避免每行都报错
    const path = logFilePath
    logFilePath = null
    console.error(`Log file ${path} is not writable, file logging disabled: ${String(error)}`)
  }
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(scope: string = ''): Logger {
  function logWithLevel(level: EmitLevel, message: string, args: unknown[]): void {
    if (!shouldLog(level)) return

    const output = formatMessage(level, scope, message)
    const logFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    logFn(output, ...args)
    writeToFile(level, scope, message, args)
  }

  return {
    debug(message: string, ...args: unknown[]) {
      logWithLevel('debug', message, args)
    },
    info(message: string, ...args: unknown[]) {
      logWithLevel('info', message, args)
    },
    warn(message: string, ...args: unknown[]) {
      logWithLevel('warn', message, args)
    },
    error(message: string, ...args: unknown[]) {
      logWithLevel('error', message, args)
    },
  }
}

// 默认 logger
export const logger = createLogger()

// ============ 错误日志增强 ============

/** 错误上下文信息 */
export interface ErrorContext {
  /** 子系统 (cpu/memory/disk/...) */
  subsystem?: string
  /** 告警 key */
  alertKey?: string
  /** 自愈动作描述 */
  action?: string
  /** 循环序号 */
  cycle?: number
  [key: string]: unknown
}

/**
 * 记录带上下文的错误日志
 *
 * @example
 * logError(logger, 'Collection failed', err, { subsystem: 'disk', cycle: 12 })
 */
export function logError(
  loggerInstance: Logger,
  message: string,
  error: Error | string,
  context?: ErrorContext
): void {
  const errorMessage = error instanceof Error ? error.message : error
  const errorStack = error instanceof Error ? error.stack : undefined

  const fullMessage = `${message}: ${errorMessage}`

  const data: Record<string, unknown> = {}
  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value !== undefined) data[key] = value
    }
  }

  // 堆栈截取前 5 行
  if (errorStack) {
    data.stack = errorStack.split('\n').slice(0, 6).join('\n')
  }

  if (Object.keys(data).length > 0) {
    loggerInstance.error(fullMessage, data)
  } else {
    loggerInstance.error(fullMessage)
  }
}
