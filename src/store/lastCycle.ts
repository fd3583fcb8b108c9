/**
 * 最近一次循环摘要
 *
 * 守护进程每轮结束后写入，status 命令读取；写失败只记日志，不影响循环
 */

import { z } from 'zod'
import { LAST_CYCLE_FILE } from './paths.js'
import { readJson, writeJson } from './readWriteJson.js'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'

const logger = createLogger('last-cycle')

const statusSchema = z.enum(['NOMINAL', 'WARNING', 'CRITICAL', 'ERROR'])

export const cycleSummarySchema = z.object({
  cycle: z.number().int(),
  finishedAt: z.string(),
  durationMs: z.number(),
  overall: statusSchema,
  subsystems: z.array(
    z.object({
      subsystem: z.string(),
      status: statusSchema,
      detail: z.string(),
    })
  ),
  alertsSent: z.array(z.string()),
  healing: z.array(z.string()),
})

export type CycleSummary = z.infer<typeof cycleSummarySchema>

export function saveLastCycle(summary: CycleSummary, filepath: string = LAST_CYCLE_FILE): void {
  try {
    writeJson(filepath, summary)
  } catch (error) {
    logger.warn(`Failed to persist cycle summary: ${getErrorMessage(error)}`)
  }
}

export function readLastCycle(filepath: string = LAST_CYCLE_FILE): CycleSummary | null {
  return readJson(filepath, cycleSummarySchema)
}
