/**
 * 诊断引擎：快照 + 阈值 → 各子系统状态 + 总体状态
 *
 * 纯函数，无副作用；同一输入永远得到同一结果
 */

import type { Config } from '../config/schema.js'
import type { CollectionError } from '../shared/error.js'
import type { MetricSnapshot } from '../types/metrics.js'
import {
  worstStatus,
  type AlertFinding,
  type DiagnosticResult,
  type Subsystem,
  type SubsystemDiagnosis,
} from '../types/health.js'
import { AlertKeys } from './alertKeys.js'

type DiagnoseConfig = Pick<Config, 'thresholds' | 'processService' | 'port'>

const SUBSYSTEM_LABELS: Record<Subsystem, string> = {
  cpu: 'CPU',
  memory: 'Memory',
  disk: 'Disk',
  network: 'Network',
  processService: 'Process/Service',
  port: 'Port',
  load: 'Load',
  swap: 'Swap',
  zombies: 'Zombies',
  temperature: 'Temperature',
}

function nominal(subsystem: Subsystem, detail: string): SubsystemDiagnosis {
  return { subsystem, status: 'NOMINAL', detail, alerts: [], healEligible: false }
}

function warning(
  subsystem: Subsystem,
  detail: string,
  alert: AlertFinding,
  healEligible: boolean
): SubsystemDiagnosis {
  return { subsystem, status: 'WARNING', detail, alerts: [alert], healEligible }
}

/** 读不到数据：ERROR，只告 "读取失败"，不会伪造阈值告警 */
function readError(subsystem: Subsystem, error: CollectionError): SubsystemDiagnosis {
  const label = SUBSYSTEM_LABELS[subsystem]
  const detail = `${label} reading unavailable: ${error.message}`
  return {
    subsystem,
    status: 'ERROR',
    detail,
    alerts: [{ key: AlertKeys.readError(subsystem), summary: `${label} check failed`, detail }],
    healEligible: false,
  }
}

function diagnoseThreshold(
  subsystem: 'cpu' | 'memory' | 'disk' | 'swap',
  value: number,
  threshold: number,
  key: string,
  what: string,
  healEligible = true
): SubsystemDiagnosis {
  if (value > threshold) {
    const detail = `${what} ${value}% > ${threshold}%`
    return { ...warning(subsystem, detail, { key, summary: `High ${what}`, detail }, healEligible), observed: value }
  }
  return { ...nominal(subsystem, `${what} ${value}% (threshold ${threshold}%)`), observed: value }
}

export function diagnose(snapshot: MetricSnapshot, config: DiagnoseConfig): DiagnosticResult {
  const { thresholds } = config
  const subsystems: SubsystemDiagnosis[] = []

  const { cpu, memory, disk } = snapshot
  subsystems.push(
    cpu.ok
      ? diagnoseThreshold('cpu', cpu.value.percent, thresholds.cpu, AlertKeys.cpuHigh(), 'CPU')
      : readError('cpu', cpu.error)
  )

  if (memory.ok) {
    const d = diagnoseThreshold('memory', memory.value.percent, thresholds.memory, AlertKeys.memoryHigh(), 'Memory')
    subsystems.push({ ...d, detail: `${d.detail}, ${memory.value.usedMb} MB used` })
  } else {
    subsystems.push(readError('memory', memory.error))
  }

  subsystems.push(
    disk.ok
      ? diagnoseThreshold(
          'disk',
          disk.value.percent,
          thresholds.disk,
          AlertKeys.diskHigh(disk.value.filesystem),
          `Disk ${disk.value.filesystem}`
        )
      : readError('disk', disk.error)
  )

  if (snapshot.network) subsystems.push(diagnoseNetwork(snapshot.network))
  if (snapshot.processService) subsystems.push(diagnoseProcessService(snapshot.processService, config))
  if (snapshot.port) subsystems.push(diagnosePort(snapshot.port, config))
  if (snapshot.load) subsystems.push(diagnoseLoad(snapshot.load, thresholds.loadPerCore))
  if (snapshot.swap) subsystems.push(diagnoseSwap(snapshot.swap, thresholds.swap))
  if (snapshot.zombies) subsystems.push(diagnoseZombies(snapshot.zombies, thresholds.zombies))
  if (snapshot.temperature) subsystems.push(diagnoseTemperature(snapshot.temperature, thresholds.temperature))

  return {
    overall: worstStatus(subsystems.map(s => s.status)),
    subsystems,
  }
}

function diagnoseNetwork(reading: NonNullable<MetricSnapshot['network']>): SubsystemDiagnosis {
  if (!reading.ok) return readError('network', reading.error)
  const { host, reachable } = reading.value
  if (reachable) return nominal('network', `Ping ${host} OK`)
  const detail = `Ping failed: ${host}`
  return warning('network', detail, { key: AlertKeys.networkDown(), summary: 'Network issue', detail }, true)
}

function diagnoseProcessService(
  reading: NonNullable<MetricSnapshot['processService']>,
  config: DiagnoseConfig
): SubsystemDiagnosis {
  if (!reading.ok) return readError('processService', reading.error)

  const { processName, processRunning, serviceName, serviceState } = reading.value
  const expected = config.processService.expectedState
  const serviceActive = serviceState === 'active'

  const ok =
    expected === 'active' ? processRunning && serviceActive : !processRunning && !serviceActive

  const observed = `process ${processName} ${processRunning ? 'running' : 'stopped'}, service ${serviceName} ${serviceState}`
  if (ok) return nominal('processService', `${observed} (expected ${expected})`)

  const detail = `State mismatch: expected ${expected}, ${observed}`
  return warning(
    'processService',
    detail,
    {
      key: AlertKeys.processServiceState(serviceName),
      summary: `Process/service state mismatch: ${serviceName}`,
      detail,
    },
    // 只朝 active 方向自愈
    expected === 'active'
  )
}

function diagnosePort(
  reading: NonNullable<MetricSnapshot['port']>,
  config: DiagnoseConfig
): SubsystemDiagnosis {
  if (!reading.ok) return readError('port', reading.error)

  const { port, listening, boundIp } = reading.value
  const { expectedState, expectedListenIp } = config.port

  if (listening && expectedState === 'clear') {
    const detail = `Port ${port} listening on ${boundIp ?? '?'}, expected clear`
    return warning(
      'port',
      detail,
      { key: AlertKeys.portUnexpectedListen(port), summary: `Port unexpectedly listening: ${port}`, detail },
      false
    )
  }

  if (listening && expectedListenIp !== 'any' && boundIp !== expectedListenIp) {
    const detail = `Port ${port} listening on ${boundIp ?? '?'}, expected ${expectedListenIp}`
    return warning(
      'port',
      detail,
      { key: AlertKeys.portWrongIp(port), summary: `Port bound to wrong IP: ${port}`, detail },
      false
    )
  }

  if (!listening && expectedState === 'listening') {
    const detail = `Port ${port} not listening, expected listening on ${expectedListenIp}`
    return warning(
      'port',
      detail,
      { key: AlertKeys.portUnexpectedClear(port), summary: `Port unexpectedly clear: ${port}`, detail },
      false
    )
  }

  return nominal('port', listening ? `Port ${port} listening on ${boundIp ?? '?'}` : `Port ${port} clear`)
}

function round2(value: number): number {
  return Math.round(value * 100) / 100
}

// 以下检查只告警，healEligible 恒为 false

function diagnoseLoad(reading: NonNullable<MetricSnapshot['load']>, perCore: number): SubsystemDiagnosis {
  if (!reading.ok) return readError('load', reading.error)

  const { load1, cores } = reading.value
  const limit = round2(cores * perCore)
  if (load1 > limit) {
    const detail = `Load ${load1} > ${limit} (${cores} cores x ${perCore})`
    return {
      ...warning('load', detail, { key: AlertKeys.loadHigh(), summary: 'High load average', detail }, false),
      observed: load1,
    }
  }
  return { ...nominal('load', `Load ${load1} (limit ${limit} for ${cores} cores)`), observed: load1 }
}

function diagnoseSwap(reading: NonNullable<MetricSnapshot['swap']>, threshold: number): SubsystemDiagnosis {
  if (!reading.ok) return readError('swap', reading.error)
  if (reading.value.totalMb === 0) return nominal('swap', 'No swap configured')

  const d = diagnoseThreshold('swap', reading.value.percent, threshold, AlertKeys.swapHigh(), 'Swap', false)
  return { ...d, detail: `${d.detail}, ${reading.value.usedMb} MB used` }
}

function diagnoseZombies(reading: NonNullable<MetricSnapshot['zombies']>, threshold: number): SubsystemDiagnosis {
  if (!reading.ok) return readError('zombies', reading.error)

  const { count } = reading.value
  if (count > threshold) {
    const detail = `${count} zombie processes > ${threshold}`
    return {
      ...warning('zombies', detail, { key: AlertKeys.zombiesHigh(), summary: 'Zombie processes accumulating', detail }, false),
      observed: count,
    }
  }
  return { ...nominal('zombies', `${count} zombie processes (threshold ${threshold})`), observed: count }
}

function diagnoseTemperature(
  reading: NonNullable<MetricSnapshot['temperature']>,
  threshold: number
): SubsystemDiagnosis {
  if (!reading.ok) return readError('temperature', reading.error)

  const { sensors } = reading.value
  if (sensors.length === 0) return nominal('temperature', 'No temperature sensors')

  const hottest = Math.max(...sensors.map(s => s.celsius))
  const hot = sensors.filter(s => s.celsius > threshold)
  if (hot.length > 0) {
    const detail = `${hot.map(s => `${s.name} ${s.celsius}°C`).join(', ')} > ${threshold}°C`
    return {
      ...warning('temperature', detail, { key: AlertKeys.temperatureHigh(), summary: 'High temperature', detail }, false),
      observed: hottest,
    }
  }
  return { ...nominal('temperature', `Max ${hottest}°C (threshold ${threshold}°C)`), observed: hottest }
}
