/**
 * 守护进程启动
 *
 * 默认前台运行（阻塞），接收 Ctrl+C / SIGTERM 优雅退出
 * --detach 模式 fork 子进程后台运行，输出写入 agent.log
 */

import chalk from 'chalk'
import { spawn } from 'child_process'
import { mkdirSync, openSync, closeSync } from 'fs'
import { DATA_DIR, DAEMON_LOG_FILE } from '../store/paths.js'
import { saveLastCycle } from '../store/lastCycle.js'
import { printError } from '../shared/error.js'
import { createLogger, logError } from '../shared/logger.js'
import { ensureError } from '../shared/assertError.js'
import { acquirePidLock, isAgentRunning, releasePidLock } from './pidLock.js'
import { createMonitorAgent } from './createMonitorAgent.js'
import { summarizeCycle } from './MonitorAgent.js'
import { loadRuntimeConfig } from './loadRuntimeConfig.js'

const logger = createLogger('daemon')

export interface StartOptions {
  detach?: boolean
  config?: string
}

/**
 * @returns 进程退出码：0 正常停止，1 启动失败
 */
export async function startDaemon(options: StartOptions): Promise<number> {
  if (options.detach) {
    return spawnDetached()
  }
  return runForeground(options.config)
}

/** fork 子进程后台运行 */
function spawnDetached(): number {
  const { running, lock } = isAgentRunning()
  if (running && lock) {
    console.error(chalk.red('✗ Agent is already running'))
    console.error(chalk.yellow(`  PID: ${lock.pid}`))
    console.error(chalk.yellow(`  Started: ${lock.startedAt}`))
    console.error(chalk.gray(`\n  Use 'sysguard stop' to stop it`))
    return 1
  }

  const script = process.argv[1]
  if (!script) {
    console.error(chalk.red('✗ Cannot determine entry script'))
    return 1
  }

  mkdirSync(DATA_DIR, { recursive: true })
  const logFd = openSync(DAEMON_LOG_FILE, 'a')

  const args = process.argv.slice(2).filter(a => a !== '--detach' && a !== '-D')
  const child = spawn(process.execPath, [...process.execArgv, script, ...args], {
    detached: true,
    stdio: ['ignore', logFd, logFd],
    cwd: process.cwd(),
    env: { ...process.env, SYSGUARD_BACKGROUND: '1' },
  })
  child.unref()
  // 子进程已继承 fd
  closeSync(logFd)

  console.log(chalk.green(`✓ Agent started in background (PID: ${child.pid ?? '?'})`))
  console.log(chalk.gray(`  Log: ${DAEMON_LOG_FILE}`))
  console.log(chalk.gray('  Use sysguard stop to stop it'))
  console.log(chalk.gray(`  Use tail -F ${DAEMON_LOG_FILE} to follow the log`))
  return 0
}

/** 实际运行守护进程（前台阻塞） */
async function runForeground(configPath?: string): Promise<number> {
  const config = await loadRuntimeConfig(configPath)
  if (!config) return 1

  const lockResult = acquirePidLock()
  if (!lockResult.success) {
    const lock = lockResult.existingLock
    console.error(chalk.red('✗ Agent is already running'))
    console.error(chalk.yellow(`  PID: ${lock.pid}`))
    console.error(chalk.yellow(`  Started: ${lock.startedAt}`))
    console.error(chalk.yellow(`  Cwd: ${lock.cwd}`))
    console.error(chalk.gray(`\n  Use 'sysguard stop' or 'kill ${lock.pid}'`))
    return 1
  }

  const agent = createMonitorAgent(config, {
    onCycle: report => saveLastCycle(summarizeCycle(report)),
  })

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}`)
    agent.stop()
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  console.log(chalk.green(`✓ Agent running (PID: ${process.pid})`))
  console.log(chalk.gray('  Ctrl+C to stop'))

  try {
    await agent.run()
    return 0
  } catch (error) {
    // 依赖缺失等启动期错误
    printError(error)
    logError(logger, 'Agent terminated', ensureError(error))
    return 1
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
    releasePidLock()
  }
}
