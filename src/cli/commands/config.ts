import { Command } from 'commander'
import { stringify } from 'yaml'
import { findConfigPaths } from '../../config/loadConfig.js'
import { loadRuntimeConfig } from '../../scheduler/loadRuntimeConfig.js'
import { requiredCommands, isExecutableOnPath } from '../../scheduler/checkDependencies.js'
import type { Config } from '../../config/schema.js'
import { header, list, bulletList, blank } from '../output.js'

/** 打印前隐藏凭据 */
export function maskSecrets(config: Config): Config {
  const { telegram, webhook } = config.alert
  return {
    ...config,
    alert: {
      ...config.alert,
      telegram: { ...telegram, botToken: telegram.botToken ? '***' : '' },
      webhook: {
        ...webhook,
        headers: Object.fromEntries(Object.keys(webhook.headers).map(k => [k, '***'])),
      },
    },
  }
}

export function registerConfigCommand(program: Command) {
  program
    .command('config')
    .description('显示生效的配置与所需外部命令')
    .option('-c, --config <path>', '指定配置文件')
    .action(async (options: { config?: string }) => {
      const config = await loadRuntimeConfig(options.config)
      if (!config) {
        process.exitCode = 1
        return
      }

      const { globalPath, projectPath } = findConfigPaths()
      header('Config sources')
      list([
        { label: 'explicit', value: options.config, dim: !options.config },
        { label: 'global', value: globalPath ?? undefined, dim: !globalPath },
        { label: 'project', value: projectPath ?? undefined, dim: !projectPath },
      ])

      header('Required commands')
      bulletList(requiredCommands(config).map(cmd => (isExecutableOnPath(cmd) ? `${cmd}` : `${cmd} (missing)`)))

      header('Effective config')
      console.log(stringify(maskSecrets(config)))
      blank()
    })
}
