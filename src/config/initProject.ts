import { writeFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import chalk from 'chalk'
import { CONFIG_FILENAME } from './loadConfig.js'

interface InitOptions {
  force?: boolean
  cwd?: string
}

export const DEFAULT_CONFIG = `# sysguard 配置文件
# 未写出的键使用内置默认值；未知键会被警告并忽略

monitor:
  intervalSeconds: 60         # 循环间隔（秒，>= 10）

thresholds:                   # 超过即 WARNING
  cpu: 90
  memory: 90
  disk: 85
  swap: 75
  zombies: 10                 # 僵尸进程个数
  temperature: 80             # 摄氏度
  loadPerCore: 1.5            # 1 分钟负载 / CPU 核数

checks:                       # 只告警、不自愈的附加检查
  load: true
  swap: true
  zombies: true
  temperature: true

disk:
  filesystem: /

network:
  enabled: true
  host: 1.1.1.1
  timeoutSeconds: 3

processService:
  enabled: true
  processName: ollama
  serviceName: ollama.service
  expectedState: active       # active | inactive

port:
  enabled: true
  port: 11434
  expectedState: listening    # listening | clear
  expectedListenIp: 127.0.0.1 # 或 any

alert:
  enabled: false
  transport: mail             # mail | telegram | webhook | log
  recipient: ""
  subjectPrefix: "[sysguard]"
  cooldownSeconds: 3600
  # telegram:
  #   botToken: ""            # 也可用 SYSGUARD_TELEGRAM_BOT_TOKEN
  #   chatId: ""
  # webhook:
  #   url: https://hooks.example.com/sysguard

selfHeal:
  enabled: false              # 总开关
  commandTimeoutSeconds: 60
  settleSeconds: 5
  privilegeHelper: [sudo, --non-interactive]
  service:
    enabled: true             # 重启不符合预期的服务
  cpu:
    enabled: false            # 结束占用过高的非 root 进程
    triggerPercent: 95
  memory:
    enabled: false            # 释放 page cache
  disk:
    enabled: false            # 删除过期日志/临时文件
    targets:
      - { path: /var/log, maxAgeDays: 30, timeField: mtime }
      - { path: /tmp, maxAgeDays: 7, timeField: atime }
  network:
    enabled: false
    services: [networking, NetworkManager, systemd-networkd]
  exclusions:
    users: [root]
    services: [sshd.service, ssh.service, systemd-journald.service, dbus.service]
    paths: []

maintenance:
  enabled: true               # 空闲时刷新 man 索引
  cpuPermitPercent: 50
  minIntervalHours: 6

log:
  level: info
  file: ""
`

/**
 * 在当前目录生成配置模板
 */
export async function initProject(options: InitOptions = {}): Promise<boolean> {
  const configPath = join(options.cwd ?? process.cwd(), CONFIG_FILENAME)

  if (existsSync(configPath) && !options.force) {
    console.log(chalk.yellow(`${CONFIG_FILENAME} already exists, use --force to overwrite`))
    return false
  }

  await writeFile(configPath, DEFAULT_CONFIG)
  console.log(chalk.green(`✓ Config created: ${configPath}`))
  console.log('')
  console.log(chalk.bold('Next steps:'))
  console.log(chalk.gray(`  1. Edit ${CONFIG_FILENAME} (thresholds, service, alert recipient)`))
  console.log(chalk.gray('  2. Run `sysguard check` for a one-off diagnosis'))
  console.log(chalk.gray('  3. Run `sysguard start --detach` to keep monitoring'))
  return true
}
