/**
 * PID 文件锁 - 防止多个守护进程同时运行
 */

import { existsSync, unlinkSync } from 'fs'
import { z } from 'zod'
import { PID_FILE } from '../store/paths.js'
import { readJson, writeJson } from '../store/readWriteJson.js'
import { createLogger } from '../shared/logger.js'
import { getErrnoCode, getErrorMessage } from '../shared/assertError.js'

const logger = createLogger('pid-lock')

const pidLockSchema = z.object({
  pid: z.number().int().positive(),
  startedAt: z.string(),
  cwd: z.string(),
  command: z.string(),
})

export type PidLockInfo = z.infer<typeof pidLockSchema>

/**
 * 检查进程是否在运行
 * EPERM 说明进程存在但属于其他用户
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (error) {
    return getErrnoCode(error) === 'EPERM'
  }
}

export function getPidLock(file: string = PID_FILE): PidLockInfo | null {
  return readJson(file, pidLockSchema)
}

/**
 * 尝试获取锁
 * 已有锁但进程不在了（僵尸 PID 文件）会被清理后重新获取
 */
export function acquirePidLock(
  file: string = PID_FILE
): { success: true } | { success: false; existingLock: PidLockInfo } {
  const existingLock = getPidLock(file)

  if (existingLock) {
    if (isProcessRunning(existingLock.pid)) {
      logger.warn(`Another agent is already running (PID: ${existingLock.pid})`)
      return { success: false, existingLock }
    }
    logger.info(`Cleaning up stale PID file (PID: ${existingLock.pid} is not running)`)
    releasePidLock(file)
  }

  const lockInfo: PidLockInfo = {
    pid: process.pid,
    startedAt: new Date().toISOString(),
    cwd: process.cwd(),
    command: process.argv.join(' '),
  }

  writeJson(file, lockInfo)
  logger.info(`PID lock acquired: ${file}`)
  return { success: true }
}

export function releasePidLock(file: string = PID_FILE): void {
  if (!existsSync(file)) return
  try {
    unlinkSync(file)
    logger.info('PID lock released')
  } catch (error) {
    logger.warn(`Failed to delete PID file: ${getErrorMessage(error)}`)
  }
}

/**
 * 检查是否有守护进程在运行
 */
export function isAgentRunning(file: string = PID_FILE): { running: boolean; lock?: PidLockInfo } {
  const lock = getPidLock(file)
  if (!lock) return { running: false }
  return { running: isProcessRunning(lock.pid), lock }
}
