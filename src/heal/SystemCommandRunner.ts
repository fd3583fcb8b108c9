/**
 * 把 HealingAction 映射为固定的 argv 并执行
 *
 * 提权前缀（如 sudo --non-interactive）来自配置，需由 sudoers 预先授权
 */

import { assertNever } from '../shared/error.js'
import { runCommand, describeCommandFailure } from '../shared/exec.js'
import { createLogger } from '../shared/logger.js'
import type { HealingAction } from '../types/healing.js'
import type { CommandRunner, CommandRunResult } from './types.js'

const logger = createLogger('runner')

export function buildCommands(action: HealingAction): string[][] {
  switch (action.kind) {
    case 'RESTART_SERVICE':
      return [['systemctl', 'restart', action.service]]
    case 'KILL_PROCESS':
      return [['kill', '-TERM', String(action.pid)]]
    case 'DROP_CACHES':
      return [['sync'], ['sysctl', '-w', 'vm.drop_caches=3']]
    case 'DELETE_STALE_FILES':
      return action.targets.map(t => [
        'find',
        t.path,
        '-xdev',
        '-type',
        'f',
        `-${t.timeField}`,
        `+${t.maxAgeDays}`,
        '-print',
        '-delete',
      ])
    case 'RUN_MANDB':
      return [['mandb', '-q']]
    default:
      return assertNever(action)
  }
}

export class SystemCommandRunner implements CommandRunner {
  constructor(private readonly privilegeHelper: readonly string[] = []) {}

  async run(action: HealingAction, options: { timeoutMs: number }): Promise<CommandRunResult> {
    const outputs: string[] = []
    const deadline = Date.now() + options.timeoutMs

    for (const argv of buildCommands(action)) {
      const [file, ...args] = [...this.privilegeHelper, ...argv]
      if (!file) continue
      const remaining = Math.max(1, deadline - Date.now())

      logger.debug(`exec: ${[file, ...args].join(' ')}`)
      const result = await runCommand(file, args, { timeoutMs: remaining })
      const out = [result.stdout, result.stderr].filter(Boolean).join('\n').trim()
      if (out) outputs.push(out)

      if (result.exitCode !== 0) {
        outputs.push(describeCommandFailure(file, result, remaining))
        return { exitCode: result.exitCode, output: outputs.join('\n') }
      }
    }
    return { exitCode: 0, output: outputs.join('\n') }
  }
}
