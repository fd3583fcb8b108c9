/**
 * JSON 文件读写工具
 *
 * 写入默认原子化（临时文件 + rename），读取时用 zod schema 做运行时校验
 */

import { existsSync, readFileSync, writeFileSync, renameSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import type { z } from 'zod'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'

const logger = createLogger('json-io')

/**
 * 同步读取 JSON 文件
 *
 * @returns 文件不存在、解析失败或校验失败时返回 null
 */
export function readJson<S extends z.ZodTypeAny>(filepath: string, schema: S): z.infer<S> | null {
  if (!existsSync(filepath)) return null
  try {
    const parsed = schema.safeParse(JSON.parse(readFileSync(filepath, 'utf-8')))
    if (!parsed.success) {
      logger.warn(`JSON validation failed: ${filepath}`)
      return null
    }
    return parsed.data
  } catch (e) {
    logger.debug(`Failed to read JSON: ${filepath} (${getErrorMessage(e)})`)
    return null
  }
}

export interface JsonWriteOptions {
  indent?: number
  /** 默认 true */
  atomic?: boolean
}

export function writeJson(filepath: string, data: unknown, options?: JsonWriteOptions): void {
  const indent = options?.indent ?? 2
  const atomic = options?.atomic ?? true
  const content = JSON.stringify(data, null, indent)

  ensureDir(dirname(filepath))

  if (atomic) {
    const tempPath = `${filepath}.tmp`
    writeFileSync(tempPath, content, 'utf-8')
    renameSync(tempPath, filepath)
  } else {
    writeFileSync(filepath, content, 'utf-8')
  }
}

export function ensureDir(dirpath: string): void {
  if (!existsSync(dirpath)) {
    mkdirSync(dirpath, { recursive: true })
  }
}
