/**
 * 自愈动作词汇表
 *
 * 控制器只能从这里选择动作，命令行由执行器按 kind 映射，核心代码从不拼接 shell 字符串
 */

import type { StaleFileTarget } from '../config/schema.js'

export type HealingAction =
  | { kind: 'RESTART_SERVICE'; service: string }
  | { kind: 'KILL_PROCESS'; pid: number; name: string; user: string }
  | { kind: 'DROP_CACHES' }
  | { kind: 'DELETE_STALE_FILES'; targets: StaleFileTarget[] }
  | { kind: 'RUN_MANDB' }

export type HealingActionKind = HealingAction['kind']

export function describeAction(action: HealingAction): string {
  switch (action.kind) {
    case 'RESTART_SERVICE':
      return `restart service ${action.service}`
    case 'KILL_PROCESS':
      return `kill process ${action.name} (pid ${action.pid}, user ${action.user})`
    case 'DROP_CACHES':
      return 'drop page cache'
    case 'DELETE_STALE_FILES':
      return (
        'delete stale files in ' +
        action.targets.map(t => `${t.path} (${t.timeField} > ${t.maxAgeDays}d)`).join(', ')
      )
    case 'RUN_MANDB':
      return 'rebuild man page index'
  }
}

export type HealOutcome =
  | { attempted: true; action: HealingAction; outcome: 'success' | 'failure'; message: string }
  | { attempted: false; reason: string }
