/**
 * 一次循环采集到的原始读数
 */

import type { Result } from '../shared/result.js'
import type { CollectionError } from '../shared/error.js'

/** 读数：要么有值，要么是采集失败的原因，绝不用哨兵值表示 "读不到" */
export type Reading<T> = Result<T, CollectionError>

export type ServiceState = 'active' | 'inactive' | 'unknown'

export interface CpuReading {
  percent: number
}

export interface MemoryReading {
  percent: number
  usedMb: number
  totalMb: number
}

export interface DiskReading {
  filesystem: string
  percent: number
}

export interface NetworkReading {
  host: string
  reachable: boolean
}

export interface ProcessServiceReading {
  processName: string
  processRunning: boolean
  serviceName: string
  serviceState: ServiceState
}

export interface PortReading {
  port: number
  listening: boolean
  /** 已归一化的绑定地址，未监听时为 null */
  boundIp: string | null
}

export interface LoadReading {
  /** 1 分钟平均负载 */
  load1: number
  cores: number
}

export interface SwapReading {
  /** 未配置 swap 时为 0 */
  percent: number
  usedMb: number
  totalMb: number
}

export interface ZombieReading {
  count: number
}

export interface TemperatureSensor {
  name: string
  celsius: number
}

export interface TemperatureReading {
  /** 没有温度传感器的主机为空数组 */
  sensors: TemperatureSensor[]
}

export interface ProcessInfo {
  pid: number
  user: string
  name: string
  cpuPercent: number
  /** 进程已运行秒数 */
  elapsedSeconds: number
}

/**
 * 单次循环的快照，采集完成后冻结
 * 可选项在对应检查关闭时不存在
 */
export interface MetricSnapshot {
  readonly collectedAt: number
  readonly cpu: Reading<CpuReading>
  readonly memory: Reading<MemoryReading>
  readonly disk: Reading<DiskReading>
  readonly network?: Reading<NetworkReading>
  readonly processService?: Reading<ProcessServiceReading>
  readonly port?: Reading<PortReading>
  readonly load?: Reading<LoadReading>
  readonly swap?: Reading<SwapReading>
  readonly zombies?: Reading<ZombieReading>
  readonly temperature?: Reading<TemperatureReading>
}
