import type { HealingAction } from '../types/healing.js'

export interface CommandRunResult {
  /** null：被信号结束或超时 */
  exitCode: number | null
  output: string
}

/**
 * 执行自愈动作的外部通道
 * 只接受 HealingAction，命令行与提权方式由实现决定
 */
export interface CommandRunner {
  run(action: HealingAction, options: { timeoutMs: number }): Promise<CommandRunResult>
}
