/**
 * 外部命令执行（execa 封装）
 *
 * 不抛异常：退出码、超时、无法启动都体现在返回值里，由调用方映射成各自的错误类型
 */

import { execa } from 'execa'

export interface CommandResult {
  /** 进程没有正常退出（无法启动、被信号结束、超时）时为 null */
  exitCode: number | null
  stdout: string
  stderr: string
  timedOut: boolean
  /** 命令不存在或无法启动 */
  failedToStart: boolean
}

export interface RunCommandOptions {
  timeoutMs: number
  /** 传给子进程 stdin 的内容 */
  input?: string
}

export async function runCommand(
  file: string,
  args: readonly string[],
  options: RunCommandOptions
): Promise<CommandResult> {
  const result = await execa(file, args, {
    reject: false,
    timeout: options.timeoutMs,
    // 固定 C locale，保证 mpstat/df 等输出格式可解析
    env: { LC_ALL: 'C', LANG: 'C' },
    input: options.input ?? '',
  })

  const exitCode = typeof result.exitCode === 'number' ? result.exitCode : null
  return {
    exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    timedOut: result.timedOut,
    failedToStart: exitCode === null && !result.timedOut && result.signal === undefined,
  }
}

/** 单行描述，用于日志与告警正文 */
export function describeCommandFailure(file: string, result: CommandResult, timeoutMs: number): string {
  if (result.timedOut) return `${file} timed out after ${timeoutMs}ms`
  if (result.failedToStart) return `${file} could not be started (not installed or not executable)`
  if (result.exitCode === null) return `${file} was terminated by a signal`
  const stderr = result.stderr.trim().split('\n')[0] ?? ''
  return `${file} exited with code ${result.exitCode}${stderr ? `: ${stderr}` : ''}`
}
