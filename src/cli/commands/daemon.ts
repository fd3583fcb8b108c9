import { Command } from 'commander'
import { startDaemon } from '../../scheduler/startDaemon.js'
import { stopDaemon } from '../../scheduler/stopDaemon.js'
import { getDaemonStatus } from '../../scheduler/getDaemonStatus.js'

export function registerDaemonCommands(program: Command) {
  // sysguard start：默认前台阻塞运行
  program
    .command('start')
    .description('启动监控守护进程')
    .option('-D, --detach', '后台运行（fork 子进程）')
    .option('-c, --config <path>', '指定配置文件')
    .action(async (options: { detach?: boolean; config?: string }) => {
      process.exitCode = await startDaemon(options)
    })

  program
    .command('stop')
    .description('停止守护进程')
    .action(() => {
      stopDaemon()
    })

  program
    .command('status')
    .description('查看守护进程状态与最近一轮结果')
    .action(() => {
      getDaemonStatus()
    })
}
