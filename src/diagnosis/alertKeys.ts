/**
 * AlertKey 是 (检查类型, 资源标识) 的确定性函数，同一类事件永远落在同一个冷却槽
 */

import type { Subsystem } from '../types/health.js'

export const AlertKeys = {
  cpuHigh: () => 'CPU_HIGH',
  memoryHigh: () => 'MEM_HIGH',
  diskHigh: (filesystem: string) => `DISK_HIGH_${filesystem}`,
  networkDown: () => 'NET_DOWN',
  processServiceState: (service: string) => `PROC_SVC_STATE_${service}`,
  portUnexpectedListen: (port: number) => `PORT_UNEXPECTED_LISTEN_${port}`,
  portUnexpectedClear: (port: number) => `PORT_UNEXPECTED_CLEAR_${port}`,
  portWrongIp: (port: number) => `PORT_WRONG_IP_${port}`,
  loadHigh: () => 'LOAD_HIGH',
  swapHigh: () => 'SWAP_HIGH',
  zombiesHigh: () => 'ZOMBIES_HIGH',
  temperatureHigh: () => 'TEMP_HIGH',
  readError: (subsystem: Subsystem) => `${SUBSYSTEM_KEY_NAMES[subsystem]}_READ_ERROR`,
  selfHealAttempt: () => 'SELF_HEAL_ATTEMPT',
  selfHealFail: () => 'SELF_HEAL_FAIL',
  maintenanceFail: () => 'MAINTENANCE_FAIL',
} as const

const SUBSYSTEM_KEY_NAMES: Record<Subsystem, string> = {
  cpu: 'CPU',
  memory: 'MEM',
  disk: 'DISK',
  network: 'NET',
  processService: 'PROC_SVC',
  port: 'PORT',
  load: 'LOAD',
  swap: 'SWAP',
  zombies: 'ZOMBIES',
  temperature: 'TEMP',
}
