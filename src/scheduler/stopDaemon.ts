import chalk from 'chalk'
import { getPidLock, releasePidLock } from './pidLock.js'
import { createLogger } from '../shared/logger.js'
import { getErrnoCode } from '../shared/assertError.js'

const logger = createLogger('stop-daemon')

export type StopResult = 'signalled' | 'not-running' | 'stale'

/**
 * 向守护进程发送 SIGTERM，由它自己完成当前动作后退出并释放锁
 */
export function stopDaemon(): StopResult {
  const lock = getPidLock()
  if (!lock) {
    console.log(chalk.yellow('Agent is not running'))
    return 'not-running'
  }

  try {
    process.kill(lock.pid, 'SIGTERM')
    logger.info(`Sent SIGTERM to agent (PID ${lock.pid})`)
    console.log(chalk.green(`✓ Stop signal sent to agent (PID ${lock.pid})`))
    return 'signalled'
  } catch (error) {
    if (getErrnoCode(error) === 'ESRCH') {
      console.log(chalk.yellow('Agent process no longer exists, cleaning up PID file'))
      releasePidLock()
      return 'stale'
    }
    throw error
  }
}
