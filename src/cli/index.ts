#!/usr/bin/env node
/**
 * @entry sysguard CLI 主入口
 *
 * 守护进程：
 *   sysguard start [-D]       - 启动监控（默认前台阻塞）
 *   sysguard stop             - 停止守护进程
 *   sysguard status           - 查看运行状态与最近一轮结果
 *
 * 其它：
 *   sysguard check [--no-heal] - 执行一轮诊断
 *   sysguard init             - 生成配置模板
 *   sysguard config           - 显示生效配置
 */

import { Command } from 'commander'
import { VERSION } from '../version.js'
import { setLogLevel } from '../shared/logger.js'
import { printError } from '../shared/error.js'
import { registerDaemonCommands } from './commands/daemon.js'
import { registerCheckCommand } from './commands/check.js'
import { registerInitCommand } from './commands/init.js'
import { registerConfigCommand } from './commands/config.js'

const program = new Command()

program
  .name('sysguard')
  .description('主机健康守护：周期诊断、告警去重、受限自愈')
  .version(VERSION)
  .option('-v, --verbose', '显示详细日志 (debug 级别)')
  .hook('preAction', thisCommand => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      // 环境变量优先于配置文件里的 log.level
      process.env.SYSGUARD_LOG_LEVEL = 'debug'
      setLogLevel('debug')
    }
  })

registerDaemonCommands(program)
registerCheckCommand(program)
registerInitCommand(program)
registerConfigCommand(program)

program.parseAsync().catch((error: unknown) => {
  printError(error)
  process.exitCode = 1
})
