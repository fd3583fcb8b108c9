import { Command } from 'commander'
import { runCheck } from '../../scheduler/runCheck.js'

export function registerCheckCommand(program: Command) {
  program
    .command('check')
    .description('执行一轮诊断（退出码 0=NOMINAL, 2=异常）')
    .option('-c, --config <path>', '指定配置文件')
    .option('--no-heal', '只诊断和告警，不执行自愈与维护')
    .action(async (options: { config?: string; heal?: boolean }) => {
      process.exitCode = await runCheck(options)
    })
}
