/**
 * 命令启动时的公共准备：加载配置并按 log 段设置日志
 */

import { loadConfig } from '../config/loadConfig.js'
import { printError } from '../shared/error.js'
import { createLogger, setLogFile, setLogLevel } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import type { Config } from '../config/schema.js'

const logger = createLogger('runtime')

/**
 * @returns 配置无效时打印错误并返回 null，调用方以退出码 1 结束
 */
export async function loadRuntimeConfig(configPath?: string): Promise<Config | null> {
  let config: Config
  try {
    config = await loadConfig({ configPath })
  } catch (error) {
    printError(error)
    return null
  }

  // 测试环境保持静默
  if (process.env.NODE_ENV !== 'test') setLogLevel(config.log.level)

  if (config.log.file) {
    try {
      setLogFile(config.log.file)
    } catch (error) {
      logger.warn(`Cannot open log file ${config.log.file}: ${getErrorMessage(error)}`)
    }
  }
  return config
}
