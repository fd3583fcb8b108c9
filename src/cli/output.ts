/**
 * CLI 用户输出工具
 * 面向终端用户的输出（check/status/config），无时间戳
 *
 * 诊断日志请使用 shared/logger.ts
 */

import chalk from 'chalk'
import { table } from 'table'
import type { HealthStatus } from '../types/health.js'

const STATUS_COLORS: Record<HealthStatus, (text: string) => string> = {
  NOMINAL: chalk.green,
  WARNING: chalk.yellow,
  CRITICAL: chalk.red,
  ERROR: chalk.magenta,
}

export function colorStatus(status: HealthStatus): string {
  return STATUS_COLORS[status](status)
}

/** 标题 + 分隔线 */
export function header(title: string, width = 40): void {
  console.log()
  console.log(chalk.bold(title))
  console.log(chalk.dim('─'.repeat(width)))
}

export function blank(): void {
  console.log()
}

export interface ListItem {
  label: string
  value: string | number | undefined
  /** 值为空或仅作提示时置灰 */
  dim?: boolean
}

/** 对齐的键值列表 */
export function list(items: ListItem[], indent = 2): void {
  const prefix = ' '.repeat(indent)
  const width = Math.max(0, ...items.map(i => i.label.length))

  for (const item of items) {
    const value = String(item.value ?? '-')
    console.log(`${prefix}${chalk.gray(`${item.label.padEnd(width)}:`)} ${item.dim ? chalk.dim(value) : value}`)
  }
}

export function bulletList(items: string[], indent = 2): void {
  const prefix = ' '.repeat(indent)
  for (const item of items) {
    console.log(`${prefix}${chalk.dim('•')} ${item}`)
  }
}

export interface StatusRow {
  subsystem: string
  status: HealthStatus
  detail: string
}

/** 子系统状态表：名称、着色状态、说明 */
export function statusTable(rows: readonly StatusRow[]): string {
  const data = [
    [chalk.bold('Subsystem'), chalk.bold('Status'), chalk.bold('Detail')],
    ...rows.map(row => [row.subsystem, colorStatus(row.status), row.detail]),
  ]
  return table(data)
}
