import { z } from 'zod'

const percent = z.number().min(0).max(100)

export const monitorConfigSchema = z.object({
  /** 两次循环之间的间隔（秒） */
  intervalSeconds: z.number().int().min(10).default(60),
})

export const thresholdsConfigSchema = z.object({
  cpu: percent.default(90),
  memory: percent.default(90),
  disk: percent.default(85),
  swap: percent.default(75),
  /** 僵尸进程个数上限 */
  zombies: z.number().int().min(0).default(10),
  /** 任一传感器超过该温度（摄氏度）即告警 */
  temperature: z.number().min(0).max(150).default(80),
  /** 1 分钟负载超过 核数 × 该系数 即告警 */
  loadPerCore: z.number().positive().default(1.5),
})

/** 只告警的附加检查开关 */
export const checksConfigSchema = z.object({
  load: z.boolean().default(true),
  swap: z.boolean().default(true),
  zombies: z.boolean().default(true),
  temperature: z.boolean().default(true),
})

export const diskConfigSchema = z.object({
  /** 被监控的挂载点 */
  filesystem: z.string().startsWith('/').default('/'),
})

export const networkConfigSchema = z.object({
  enabled: z.boolean().default(true),
  host: z.string().min(1).default('1.1.1.1'),
  timeoutSeconds: z.number().int().min(1).max(60).default(3),
})

export const processServiceConfigSchema = z.object({
  enabled: z.boolean().default(true),
  processName: z.string().min(1).default('ollama'),
  serviceName: z.string().min(1).default('ollama.service'),
  expectedState: z.enum(['active', 'inactive']).default('active'),
})

export const portConfigSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().min(1).max(65535).default(11434),
  expectedState: z.enum(['listening', 'clear']).default('listening'),
  /** 期望绑定的地址，`any` 表示不校验 */
  expectedListenIp: z.string().min(1).default('127.0.0.1'),
})

export const telegramConfigSchema = z.object({
  botToken: z.string().default(''),
  chatId: z.string().default(''),
  apiBase: z.string().url().default('https://api.telegram.org'),
})

export const webhookConfigSchema = z.object({
  url: z.string().default(''),
  headers: z.record(z.string()).default({}),
})

export const alertConfigSchema = z.object({
  enabled: z.boolean().default(false),
  /** mail: 本地 mail 命令 | telegram | webhook | log: 只写日志 */
  transport: z.enum(['mail', 'telegram', 'webhook', 'log']).default('mail'),
  recipient: z.string().default(''),
  subjectPrefix: z.string().default('[sysguard]'),
  cooldownSeconds: z.number().int().min(0).default(3600),
  /** 单次投递超时 */
  timeoutSeconds: z.number().int().min(1).max(300).default(15),
  telegram: telegramConfigSchema.default({}),
  webhook: webhookConfigSchema.default({}),
})

export const staleFileTargetSchema = z.object({
  path: z.string(),
  maxAgeDays: z.number().int(),
  /** mtime: 最后修改时间 | atime: 最后访问时间 */
  timeField: z.enum(['mtime', 'atime']).default('mtime'),
})

export const selfHealConfigSchema = z.object({
  enabled: z.boolean().default(false),
  commandTimeoutSeconds: z.number().int().min(1).max(3600).default(60),
  /** 服务重启成功后等待多久再继续 */
  settleSeconds: z.number().int().min(0).max(300).default(5),
  /** 预先授权的提权命令前缀，空数组表示直接执行 */
  privilegeHelper: z.array(z.string().min(1)).default(['sudo', '--non-interactive']),
  cpu: z
    .object({
      enabled: z.boolean().default(false),
      /** 系统 CPU 达到该值才考虑结束进程 */
      triggerPercent: percent.default(95),
      /** 进程至少运行多久才可被结束 */
      minAgeSeconds: z.number().int().min(0).default(10),
    })
    .default({}),
  memory: z
    .object({
      enabled: z.boolean().default(false),
      dropCaches: z.boolean().default(true),
    })
    .default({}),
  disk: z
    .object({
      enabled: z.boolean().default(false),
      targets: z.array(staleFileTargetSchema).default([
        { path: '/var/log', maxAgeDays: 30, timeField: 'mtime' },
        { path: '/tmp', maxAgeDays: 7, timeField: 'atime' },
      ]),
    })
    .default({}),
  service: z
    .object({
      enabled: z.boolean().default(true),
    })
    .default({}),
  network: z
    .object({
      enabled: z.boolean().default(false),
      services: z.array(z.string().min(1)).default(['networking', 'NetworkManager', 'systemd-networkd']),
    })
    .default({}),
  exclusions: z
    .object({
      /** 永不结束的进程名（大小写不敏感） */
      processes: z
        .array(z.string())
        .default([
          'systemd',
          'kthreadd',
          'sshd',
          'rsyslogd',
          'systemd-journald',
          'journald',
          'dbus-daemon',
          'login',
          'agetty',
          'containerd',
          'dockerd',
          'kubelet',
          'supervisord',
          'node',
          'sysguard',
        ]),
      users: z.array(z.string()).default(['root']),
      /** root 进程中例外允许结束的进程名 */
      allowRoot: z.array(z.string()).default([]),
      services: z.array(z.string()).default(['sshd.service', 'ssh.service', 'systemd-journald.service', 'dbus.service']),
      /** 额外保护的路径（含子目录） */
      paths: z.array(z.string()).default([]),
    })
    .default({}),
})

export const maintenanceConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** 系统 CPU 低于该值才运行 mandb */
  cpuPermitPercent: percent.default(50),
  minIntervalHours: z.number().min(1).default(6),
})

export const logConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  /** 追加写入的日志文件，为空表示只输出到终端 */
  file: z.string().default(''),
})

export const configSchema = z.object({
  monitor: monitorConfigSchema.default({}),
  thresholds: thresholdsConfigSchema.default({}),
  disk: diskConfigSchema.default({}),
  network: networkConfigSchema.default({}),
  processService: processServiceConfigSchema.default({}),
  port: portConfigSchema.default({}),
  checks: checksConfigSchema.default({}),
  alert: alertConfigSchema.default({}),
  selfHeal: selfHealConfigSchema.default({}),
  maintenance: maintenanceConfigSchema.default({}),
  log: logConfigSchema.default({}),
})

export type Config = z.infer<typeof configSchema>
export type ThresholdsConfig = z.infer<typeof thresholdsConfigSchema>
export type ChecksConfig = z.infer<typeof checksConfigSchema>
export type NetworkConfig = z.infer<typeof networkConfigSchema>
export type ProcessServiceConfig = z.infer<typeof processServiceConfigSchema>
export type PortConfig = z.infer<typeof portConfigSchema>
export type AlertConfig = z.infer<typeof alertConfigSchema>
export type SelfHealConfig = z.infer<typeof selfHealConfigSchema>
export type StaleFileTarget = z.infer<typeof staleFileTargetSchema>
export type MaintenanceConfig = z.infer<typeof maintenanceConfigSchema>
export type LogConfig = z.infer<typeof logConfigSchema>
