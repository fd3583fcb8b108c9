import type {
  CpuReading,
  LoadReading,
  MemoryReading,
  PortReading,
  ProcessInfo,
  ServiceState,
  SwapReading,
  TemperatureSensor,
} from '../types/metrics.js'

/**
 * 指标来源：纯查询接口，无状态
 * 每个方法要么返回读数，要么抛 CollectionError
 */
export interface MetricSource {
  readCpu(): Promise<CpuReading>
  readMemory(): Promise<MemoryReading>
  /** 返回挂载点使用率（百分比） */
  readDisk(filesystem: string): Promise<number>
  pingCheck(host: string, timeoutSeconds: number): Promise<boolean>
  serviceState(name: string): Promise<ServiceState>
  processPresent(name: string): Promise<boolean>
  portState(port: number): Promise<Omit<PortReading, 'port'>>
  readLoad(): Promise<LoadReading>
  readSwap(): Promise<SwapReading>
  /** 当前僵尸进程个数 */
  countZombies(): Promise<number>
  /** 所有温度传感器，没有传感器时返回空数组 */
  readTemperatures(): Promise<TemperatureSensor[]>
  /** CPU 占用最高的若干进程，供自愈选择目标 */
  topProcesses(limit: number): Promise<ProcessInfo[]>
}
