/**
 * 系统命令输出解析
 *
 * 全部是纯函数，输入为 C locale 下的命令输出；解析失败抛 CollectionError
 */

import { CollectionError } from '../shared/error.js'
import type { CpuReading, MemoryReading, ProcessInfo, ServiceState, SwapReading } from '../types/metrics.js'

function parseError(tool: string, reason: string): CollectionError {
  return new CollectionError(`Failed to parse ${tool} output: ${reason}`, 'COLLECT_PARSE_FAILED')
}

function round1(value: number): number {
  return Math.round(value * 10) / 10
}

/**
 * `mpstat 1 1` → CPU 使用率 = 100 - %idle
 * %idle 是 Average 行的最后一列
 */
export function parseMpstat(output: string): CpuReading {
  const line = output.split('\n').find(l => /^Average:\s+all\s/.test(l))
  if (!line) throw parseError('mpstat', 'no "Average: all" line')

  const idle = Number(line.trim().split(/\s+/).pop())
  if (!Number.isFinite(idle) || idle < 0 || idle > 100) {
    throw parseError('mpstat', `invalid %idle in "${line.trim()}"`)
  }
  return { percent: round1(100 - idle) }
}

/**
 * `free -m` → used = total - available
 */
export function parseFree(output: string): MemoryReading {
  const line = output.split('\n').find(l => l.startsWith('Mem:'))
  if (!line) throw parseError('free', 'no "Mem:" line')

  // Mem: total used free shared buff/cache available
  const cols = line.trim().split(/\s+/)
  const total = Number(cols[1])
  const available = Number(cols[6])
  if (!Number.isFinite(total) || total <= 0 || !Number.isFinite(available)) {
    throw parseError('free', `unexpected columns in "${line.trim()}"`)
  }

  const usedMb = total - available
  return { percent: round1((usedMb / total) * 100), usedMb, totalMb: total }
}

/**
 * `free -m` 的 Swap 行；未配置 swap（total 为 0）时使用率为 0
 */
export function parseFreeSwap(output: string): SwapReading {
  const line = output.split('\n').find(l => l.startsWith('Swap:'))
  if (!line) throw parseError('free', 'no "Swap:" line')

  // Swap: total used free
  const cols = line.trim().split(/\s+/)
  const total = Number(cols[1])
  const used = Number(cols[2])
  if (!Number.isFinite(total) || total < 0 || !Number.isFinite(used) || used < 0) {
    throw parseError('free', `unexpected columns in "${line.trim()}"`)
  }

  return { percent: total === 0 ? 0 : round1((used / total) * 100), usedMb: used, totalMb: total }
}

/**
 * `/proc/loadavg` → 1 分钟平均负载
 */
export function parseLoadavg(content: string): number {
  const first = content.trim().split(/\s+/)[0]
  const load = Number(first)
  if (!first || !Number.isFinite(load) || load < 0) {
    throw parseError('loadavg', `unexpected content "${content.trim()}"`)
  }
  return load
}

/**
 * `ps -eo stat=` → 状态以 Z 开头的进程个数
 */
export function parseZombieCount(output: string): number {
  return output.split('\n').filter(l => l.trim().startsWith('Z')).length
}

/**
 * thermal_zone 的 temp 文件（千分之一摄氏度）→ 摄氏度
 */
export function parseThermalMillidegrees(content: string): number {
  const value = Number(content.trim())
  if (!content.trim() || !Number.isFinite(value)) {
    throw parseError('thermal', `unexpected temperature "${content.trim()}"`)
  }
  return round1(value / 1000)
}

/**
 * `df -Pk <fs>` → 第二行第五列（Capacity）
 */
export function parseDf(output: string): number {
  const line = output.split('\n').filter(l => l.trim())[1]
  if (!line) throw parseError('df', 'no data line')

  const capacity = line.trim().split(/\s+/)[4]
  const match = capacity?.match(/^(\d+)%$/)
  if (!match?.[1]) throw parseError('df', `unexpected capacity column in "${line.trim()}"`)
  return Number(match[1])
}

/**
 * `systemctl is-active <unit>` 的输出
 */
export function parseServiceState(output: string): ServiceState {
  const state = output.trim().split('\n')[0]?.trim()
  switch (state) {
    case 'active':
    case 'reloading':
      return 'active'
    case 'inactive':
    case 'failed':
    case 'deactivating':
    case 'activating':
      return 'inactive'
    default:
      return 'unknown'
  }
}

/**
 * 将 ss 的本地地址归一化为 IPv4 形式
 * `[::1]:11434` → 127.0.0.1，`[::]:80` / `*:80` → 0.0.0.0
 */
export function normalizeListenAddress(localAddress: string): { ip: string; port: number } | null {
  const sep = localAddress.lastIndexOf(':')
  if (sep <= 0) return null

  const port = Number(localAddress.slice(sep + 1))
  if (!Number.isInteger(port)) return null

  let ip = localAddress.slice(0, sep)
  if (ip.startsWith('[') && ip.endsWith(']')) ip = ip.slice(1, -1)
  // 去掉接口后缀，如 127.0.0.53%lo
  const zone = ip.indexOf('%')
  if (zone >= 0) ip = ip.slice(0, zone)

  if (ip === '::1') ip = '127.0.0.1'
  else if (ip === '::' || ip === '*') ip = '0.0.0.0'
  else if (ip.startsWith('::ffff:')) ip = ip.slice('::ffff:'.length)

  return { ip, port }
}

/**
 * `ss -tln` → 指定端口的监听地址（取第一条）
 */
export function parseSsListeners(output: string, port: number): { listening: boolean; boundIp: string | null } {
  for (const line of output.split('\n')) {
    const cols = line.trim().split(/\s+/)
    // State Recv-Q Send-Q Local:Port Peer:Port
    if (cols[0] !== 'LISTEN') continue
    const local = cols[3]
    if (!local) continue
    const addr = normalizeListenAddress(local)
    if (addr && addr.port === port) {
      return { listening: true, boundIp: addr.ip }
    }
  }
  return { listening: false, boundIp: null }
}

/**
 * `ps -eo pid=,user=,etimes=,pcpu=,comm=` → 进程列表（按 CPU 降序）
 */
export function parsePs(output: string): ProcessInfo[] {
  const processes: ProcessInfo[] = []
  for (const line of output.split('\n')) {
    const match = line.trim().match(/^(\d+)\s+(\S+)\s+(\d+)\s+([\d.]+)\s+(.+)$/)
    if (!match) continue
    const [, pid, user, etimes, pcpu, comm] = match
    if (!pid || !user || !etimes || !pcpu || !comm) continue
    processes.push({
      pid: Number(pid),
      user,
      elapsedSeconds: Number(etimes),
      cpuPercent: Number(pcpu),
      name: comm.trim(),
    })
  }
  return processes.sort((a, b) => b.cpuPercent - a.cpuPercent)
}
