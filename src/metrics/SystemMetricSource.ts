/**
 * 基于系统命令的指标来源（Linux）
 *
 * mpstat / free / df / ping / systemctl / pgrep / ss / ps，
 * 负载和温度直接读 /proc 与 /sys
 */

import { readFile, readdir } from 'fs/promises'
import { join } from 'path'
import { cpus } from 'os'

import { CollectionError } from '../shared/error.js'
import { runCommand, describeCommandFailure, type CommandResult } from '../shared/exec.js'
import { getErrnoCode, getErrorMessage } from '../shared/assertError.js'
import type { TemperatureSensor } from '../types/metrics.js'
import type { MetricSource } from './types.js'
import {
  parseMpstat,
  parseFree,
  parseFreeSwap,
  parseLoadavg,
  parseZombieCount,
  parseThermalMillidegrees,
  parseDf,
  parseServiceState,
  parseSsListeners,
  parsePs,
} from './parsers.js'

export interface SystemMetricSourceOptions {
  /** 单条命令的超时（ping 额外加上自身超时） */
  commandTimeoutMs?: number
  /** procfs 挂载点 */
  procRoot?: string
  /** thermal 类目录 */
  thermalRoot?: string
  /** 逻辑 CPU 核数，默认取 os.cpus() */
  cpuCount?: () => number
}

export class SystemMetricSource implements MetricSource {
  private readonly timeoutMs: number
  private readonly procRoot: string
  private readonly thermalRoot: string
  private readonly cpuCount: () => number

  constructor(options: SystemMetricSourceOptions = {}) {
    this.timeoutMs = options.commandTimeoutMs ?? 10_000
    this.procRoot = options.procRoot ?? '/proc'
    this.thermalRoot = options.thermalRoot ?? '/sys/class/thermal'
    this.cpuCount = options.cpuCount ?? (() => cpus().length)
  }

  async readCpu() {
    const out = await this.exec('mpstat', ['1', '1'])
    return parseMpstat(out.stdout)
  }

  async readMemory() {
    const out = await this.exec('free', ['-m'])
    return parseFree(out.stdout)
  }

  async readDisk(filesystem: string) {
    const out = await this.exec('df', ['-Pk', filesystem])
    return parseDf(out.stdout)
  }

  async pingCheck(host: string, timeoutSeconds: number) {
    // 0: 可达，1: 无应答，2: 其他错误（如域名解析失败），都视为网络不通
    const out = await this.exec('ping', ['-c', '1', '-W', String(timeoutSeconds), host], {
      okExitCodes: [0, 1, 2],
      timeoutMs: (timeoutSeconds + 2) * 1000,
    })
    return out.exitCode === 0
  }

  async serviceState(name: string) {
    // is-active 对非 active 状态返回非零退出码，状态本身在 stdout
    const out = await this.exec('systemctl', ['is-active', name], { okExitCodes: [0, 1, 2, 3, 4] })
    return parseServiceState(out.stdout)
  }

  async processPresent(name: string) {
    const out = await this.exec('pgrep', ['-f', name], { okExitCodes: [0, 1] })
    return out.exitCode === 0
  }

  async portState(port: number) {
    const out = await this.exec('ss', ['-tln'])
    return parseSsListeners(out.stdout, port)
  }

  async readLoad() {
    const cores = this.cpuCount()
    if (cores < 1) throw new CollectionError('Cannot determine the number of CPU cores')
    const load1 = parseLoadavg(await this.readSysFile(join(this.procRoot, 'loadavg')))
    return { load1, cores }
  }

  async readSwap() {
    const out = await this.exec('free', ['-m'])
    return parseFreeSwap(out.stdout)
  }

  async countZombies() {
    const out = await this.exec('ps', ['-eo', 'stat='])
    return parseZombieCount(out.stdout)
  }

  async readTemperatures(): Promise<TemperatureSensor[]> {
    let entries: string[]
    try {
      entries = await readdir(this.thermalRoot)
    } catch (error) {
      // 虚拟机和容器里常常没有 thermal 类
      if (getErrnoCode(error) === 'ENOENT') return []
      throw new CollectionError(`Cannot list ${this.thermalRoot}: ${getErrorMessage(error)}`, 'COLLECT_COMMAND_FAILED', error)
    }

    const zones = entries.filter(name => name.startsWith('thermal_zone')).sort()
    const sensors: TemperatureSensor[] = []
    for (const zone of zones) {
      const dir = join(this.thermalRoot, zone)
      const celsius = parseThermalMillidegrees(await this.readSysFile(join(dir, 'temp')))
      // type 文件缺失时只用 zone 名
      const type = await readFile(join(dir, 'type'), 'utf-8').then(
        t => t.trim(),
        () => ''
      )
      sensors.push({ name: type ? `${zone}/${type}` : zone, celsius })
    }
    return sensors
  }

  async topProcesses(limit: number) {
    const out = await this.exec('ps', ['-eo', 'pid=,user=,etimes=,pcpu=,comm=', '--sort=-pcpu'])
    return parsePs(out.stdout).slice(0, limit)
  }

  private async readSysFile(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf-8')
    } catch (error) {
      throw new CollectionError(`Cannot read ${path}: ${getErrorMessage(error)}`, 'COLLECT_COMMAND_FAILED', error)
    }
  }

  private async exec(
    file: string,
    args: string[],
    options: { okExitCodes?: number[]; timeoutMs?: number } = {}
  ): Promise<CommandResult & { exitCode: number }> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs
    const okExitCodes = options.okExitCodes ?? [0]
    const result = await runCommand(file, args, { timeoutMs })

    const { exitCode } = result
    if (exitCode === null || !okExitCodes.includes(exitCode)) {
      throw new CollectionError(
        describeCommandFailure(file, result, timeoutMs),
        result.timedOut ? 'COLLECT_TIMEOUT' : 'COLLECT_COMMAND_FAILED'
      )
    }
    return { ...result, exitCode }
  }
}
