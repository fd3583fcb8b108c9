/**
 * 并发采集一次快照
 *
 * 每项检查相互独立：某项失败只会让它自己的读数变成 error，不影响其它检查。
 * 所有检查 join 之后才返回，诊断永远看到完整快照。
 */

import { CollectionError } from '../shared/error.js'
import { fromPromise } from '../shared/result.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger } from '../shared/logger.js'
import type { Config } from '../config/schema.js'
import type { MetricSnapshot, Reading } from '../types/metrics.js'
import type { MetricSource } from './types.js'

const logger = createLogger('collect')

function toCollectionError(error: unknown): CollectionError {
  if (error instanceof CollectionError) return error
  return new CollectionError(getErrorMessage(error), 'COLLECT_COMMAND_FAILED', error)
}

function read<T>(label: string, task: () => Promise<T>): Promise<Reading<T>> {
  // task() 同步抛出也要被隔离
  const promise = Promise.resolve().then(task)
  return fromPromise(promise, toCollectionError).then(reading => {
    if (!reading.ok) logger.error(`${label} reading failed: ${reading.error.message}`)
    return reading
  })
}

export async function collectSnapshot(
  source: MetricSource,
  config: Config,
  now: () => number = Date.now
): Promise<MetricSnapshot> {
  const { disk, network, processService, port, checks } = config

  const [
    cpu,
    memory,
    diskReading,
    networkReading,
    processServiceReading,
    portReading,
    loadReading,
    swapReading,
    zombieReading,
    temperatureReading,
  ] = await Promise.all([
    read('cpu', () => source.readCpu()),
    read('memory', () => source.readMemory()),
    read('disk', async () => ({
      filesystem: disk.filesystem,
      percent: await source.readDisk(disk.filesystem),
    })),
    network.enabled
      ? read('network', async () => ({
          host: network.host,
          reachable: await source.pingCheck(network.host, network.timeoutSeconds),
        }))
      : undefined,
    processService.enabled
      ? read('processService', async () => {
          const [processRunning, serviceState] = await Promise.all([
            source.processPresent(processService.processName),
            source.serviceState(processService.serviceName),
          ])
          return {
            processName: processService.processName,
            processRunning,
            serviceName: processService.serviceName,
            serviceState,
          }
        })
      : undefined,
    port.enabled
      ? read('port', async () => ({ port: port.port, ...(await source.portState(port.port)) }))
      : undefined,
    checks.load ? read('load', () => source.readLoad()) : undefined,
    checks.swap ? read('swap', () => source.readSwap()) : undefined,
    checks.zombies ? read('zombies', async () => ({ count: await source.countZombies() })) : undefined,
    checks.temperature
      ? read('temperature', async () => ({ sensors: await source.readTemperatures() }))
      : undefined,
  ])

  const snapshot: MetricSnapshot = {
    collectedAt: now(),
    cpu,
    memory,
    disk: diskReading,
    ...(networkReading ? { network: networkReading } : {}),
    ...(processServiceReading ? { processService: processServiceReading } : {}),
    ...(portReading ? { port: portReading } : {}),
    ...(loadReading ? { load: loadReading } : {}),
    ...(swapReading ? { swap: swapReading } : {}),
    ...(zombieReading ? { zombies: zombieReading } : {}),
    ...(temperatureReading ? { temperature: temperatureReading } : {}),
  }
  return Object.freeze(snapshot)
}
