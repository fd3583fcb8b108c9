/**
 * 启动前检查外部命令是否在 PATH 中
 *
 * 缺少命令是致命错误：守护进程在进入循环前就退出，并列出全部缺失项
 */

import { accessSync, constants } from 'fs'
import { delimiter, join } from 'path'
import { DependencyError } from '../shared/error.js'
import type { Config } from '../config/schema.js'

/** 按配置计算需要的命令，顺序稳定、去重 */
export function requiredCommands(config: Config): string[] {
  const commands = ['mpstat', 'free', 'df', 'ps']
  if (config.network.enabled) commands.push('ping')
  if (config.processService.enabled) commands.push('pgrep', 'systemctl')
  if (config.port.enabled) commands.push('ss')
  if (config.alert.enabled && config.alert.transport === 'mail') commands.push('mail')

  // 自愈与 mandb 都经提权前缀执行
  const privileged = config.selfHeal.enabled || config.maintenance.enabled
  const helper = config.selfHeal.privilegeHelper[0]
  if (privileged && helper) commands.push(helper)
  if (config.maintenance.enabled) commands.push('mandb')
  return [...new Set(commands)]
}

export function isExecutableOnPath(command: string, pathEnv: string = process.env.PATH ?? ''): boolean {
  // 绝对路径直接检查
  const candidates = command.includes('/')
    ? [command]
    : pathEnv
        .split(delimiter)
        .filter(Boolean)
        .map(dir => join(dir, command))

  return candidates.some(candidate => {
    try {
      accessSync(candidate, constants.X_OK)
      return true
    } catch {
      return false
    }
  })
}

export function checkDependencies(config: Config, pathEnv?: string): void {
  const missing = requiredCommands(config).filter(cmd => !isExecutableOnPath(cmd, pathEnv))
  if (missing.length > 0) {
    throw new DependencyError(missing)
  }
}
