/**
 * 自愈安全闸门
 *
 * 每次结束进程、重启服务、删除文件之前都要经过这里，任何配置都不能绕过内置保护
 */

import { isAbsolute, normalize, sep } from 'path'
import { ConfigurationError } from '../shared/error.js'
import type { SelfHealConfig, StaleFileTarget } from '../config/schema.js'
import type { ProcessInfo } from '../types/metrics.js'

export interface GateResult {
  allowed: boolean
  reason?: string
}

/** 整棵目录树都不允许清理 */
const PROTECTED_TREES = ['/bin', '/boot', '/dev', '/etc', '/lib', '/lib64', '/proc', '/run', '/sbin', '/sys', '/usr']

/** 只保护目录本身（子目录如 /var/log 可以清理） */
const PROTECTED_ROOTS = ['/', '/home', '/opt', '/root', '/srv', '/var']

const MAX_AGE_DAYS = 3650

/** ps -o comm 报告的进程名最多 15 个字符（内核 TASK_COMM_LEN - 1） */
const COMM_MAX_LENGTH = 15

export interface ExclusionSet {
  processNames: ReadonlySet<string>
  users: ReadonlySet<string>
  /** root 进程中例外允许的进程名 */
  allowRoot: ReadonlySet<string>
  pids: ReadonlySet<number>
  services: ReadonlySet<string>
  /** 配置中额外保护的目录（含子树） */
  paths: readonly string[]
}

export function buildExclusionSet(
  exclusions: SelfHealConfig['exclusions'],
  ownPid: number = process.pid
): ExclusionSet {
  // 同时保存截断后的名字，长进程名在 ps 里只剩前 15 个字符
  const commNames = (items: string[]) =>
    new Set(items.flatMap(i => [i.toLowerCase(), i.toLowerCase().slice(0, COMM_MAX_LENGTH)]))
  return {
    processNames: commNames(exclusions.processes),
    // root 始终在排除名单里，allowRoot 只能放行具体进程名
    users: new Set(['root', ...exclusions.users]),
    allowRoot: commNames(exclusions.allowRoot),
    pids: new Set([1, ownPid, process.ppid]),
    services: new Set(exclusions.services.map(normalizeServiceName)),
    paths: exclusions.paths.filter(p => p.trim().length > 0).map(normalizeDirPath),
  }
}

/** 规范化目录路径并去掉末尾的 /（根目录 / 保持不变） */
function normalizeDirPath(path: string): string {
  return normalize(path).replace(/(.)\/+$/, '$1')
}

function normalizeServiceName(name: string): string {
  const lower = name.toLowerCase()
  return lower.endsWith('.service') ? lower : `${lower}.service`
}

export function checkProcessTarget(proc: ProcessInfo, exclusions: ExclusionSet): GateResult {
  if (exclusions.pids.has(proc.pid)) {
    return { allowed: false, reason: `PID ${proc.pid} is protected` }
  }
  const name = proc.name.toLowerCase()
  if (exclusions.processNames.has(name)) {
    return { allowed: false, reason: `process ${proc.name} is excluded` }
  }
  if (exclusions.users.has(proc.user)) {
    const rootAllowed = proc.user === 'root' && exclusions.allowRoot.has(name)
    if (!rootAllowed) {
      return { allowed: false, reason: `process ${proc.name} is owned by excluded user ${proc.user}` }
    }
  }
  return { allowed: true }
}

export function checkServiceTarget(service: string, exclusions: ExclusionSet): GateResult {
  if (!service.trim()) {
    return { allowed: false, reason: 'service name is empty' }
  }
  if (exclusions.services.has(normalizeServiceName(service))) {
    return { allowed: false, reason: `service ${service} is protected` }
  }
  return { allowed: true }
}

function isWithin(path: string, root: string): boolean {
  return path === root || path.startsWith(root.endsWith(sep) ? root : root + sep)
}

/**
 * 空路径是配置错误（不是 "删除一切"），直接抛 ConfigurationError
 */
export function checkStaleFileTarget(target: StaleFileTarget, exclusions: ExclusionSet): GateResult {
  if (!target.path.trim()) {
    throw new ConfigurationError('selfHeal.disk target path is empty', 'Set an absolute directory such as /var/log')
  }
  if (!isAbsolute(target.path)) {
    throw new ConfigurationError(`selfHeal.disk target path must be absolute: ${target.path}`)
  }

  const path = normalizeDirPath(target.path)

  if (PROTECTED_ROOTS.includes(path)) {
    return { allowed: false, reason: `${path} is a protected system directory` }
  }
  const tree = PROTECTED_TREES.find(root => isWithin(path, root))
  if (tree) {
    return { allowed: false, reason: `${path} is inside protected tree ${tree}` }
  }
  const configured = exclusions.paths.find(root => isWithin(path, root))
  if (configured) {
    return { allowed: false, reason: `${path} is inside excluded path ${configured}` }
  }

  if (!Number.isInteger(target.maxAgeDays) || target.maxAgeDays < 1 || target.maxAgeDays > MAX_AGE_DAYS) {
    return { allowed: false, reason: `maxAgeDays ${target.maxAgeDays} for ${path} is outside 1-${MAX_AGE_DAYS}` }
  }
  return { allowed: true }
}
