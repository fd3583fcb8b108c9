/**
 * 统一存储路径常量
 *
 * 数据目录优先级：
 * 1. 环境变量 SYSGUARD_DATA_DIR
 * 2. 默认值 ~/.sysguard
 */

import { join } from 'path'
import { homedir } from 'os'

const DEFAULT_DATA_DIR_NAME = '.sysguard'

function getDataDir(): string {
  const envDir = process.env.SYSGUARD_DATA_DIR
  if (envDir) {
    return envDir.startsWith('/') ? envDir : join(process.cwd(), envDir)
  }
  return join(homedir(), DEFAULT_DATA_DIR_NAME)
}

/** 主数据目录 */
export const DATA_DIR = getDataDir()

/** 守护进程 PID 锁 */
export const PID_FILE = join(DATA_DIR, 'agent.pid')

/** --detach 模式下的 stdout/stderr */
export const DAEMON_LOG_FILE = join(DATA_DIR, 'agent.log')

/** 最近一次循环的摘要，供 status 命令读取 */
export const LAST_CYCLE_FILE = join(DATA_DIR, 'last-cycle.json')
