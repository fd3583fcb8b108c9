import chalk from 'chalk'
import { isAgentRunning, type PidLockInfo } from './pidLock.js'
import { readLastCycle, type CycleSummary } from '../store/lastCycle.js'
import { DATA_DIR } from '../store/paths.js'
import { formatDuration, formatRelative } from '../shared/formatTime.js'
import { colorStatus, statusTable } from '../cli/output.js'

export function getDaemonStatus(): void {
  const { running, lock } = isAgentRunning()

  const statusIcon = running ? chalk.green('●') : chalk.red('●')
  const statusText = running ? chalk.green('Running') : chalk.red('Stopped')
  console.log()
  console.log(`${statusIcon} sysguard: ${statusText}`)
  console.log(chalk.dim('─'.repeat(50)))

  printAgentSection(running, lock)
  printLastCycle(readLastCycle())

  console.log()
}

function printAgentSection(running: boolean, lock?: PidLockInfo): void {
  console.log()
  console.log(chalk.bold('  Agent'))

  if (!running) {
    console.log(chalk.gray('    Status:      ') + chalk.red('Stopped'))
    if (lock) console.log(chalk.gray(`    (stale PID file for ${lock.pid})`))
    return
  }
  if (!lock) return

  const uptime = formatDuration(Date.now() - new Date(lock.startedAt).getTime())
  console.log(chalk.gray('    Status:      ') + chalk.green(`Running (PID ${lock.pid})`))
  console.log(chalk.gray('    Uptime:      ') + uptime)
  console.log(chalk.gray('    Data Dir:    ') + DATA_DIR.replace(process.env.HOME ?? '', '~'))
}

function printLastCycle(summary: CycleSummary | null): void {
  console.log()
  console.log(chalk.bold('  Last Cycle'))

  if (!summary) {
    console.log(chalk.gray('    No cycle recorded yet'))
    return
  }

  console.log(
    chalk.gray('    Cycle:       ') +
      `#${summary.cycle} ${chalk.dim(formatRelative(new Date(summary.finishedAt)))} (${summary.durationMs}ms)`
  )
  console.log(chalk.gray('    Overall:     ') + colorStatus(summary.overall))
  console.log(statusTable(summary.subsystems))
  if (summary.alertsSent.length > 0) {
    console.log(chalk.gray('    Alerts:      ') + summary.alertsSent.join(', '))
  }
  for (const line of summary.healing) {
    console.log(chalk.gray('    Heal:        ') + line)
  }
}
