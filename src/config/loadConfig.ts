import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join, resolve } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { z } from 'zod'
import { createLogger, isLogLevel } from '../shared/logger.js'
import { ConfigurationError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.sysguard.yaml'

// 每次删除一个非法键后重新校验，最多重试这么多次
const MAX_REPAIR_PASSES = 50

// 自愈目标与排除名单不回退默认值：默认值可能比用户写的范围更宽
const NO_FALLBACK_PREFIXES: ReadonlyArray<readonly string[]> = [
  ['selfHeal', 'disk', 'targets'],
  ['selfHeal', 'exclusions'],
]

let cachedConfig: Config | null = null

export interface LoadConfigOptions {
  /** 显式指定的配置文件（--config），不存在时报错 */
  configPath?: string
  cwd?: string
}

type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * 查找配置文件路径（全局 + 项目）
 * 全局配置为基底，项目配置覆盖其上
 */
export function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // 项目目录与 home 目录相同时，不重复加载
  const isHomeCwd = resolve(projectDir) === resolve(homedir())

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * 加载配置
 * 查找顺序：--config → 项目目录 ~/.sysguard.yaml 之上叠加 ./.sysguard.yaml → 默认配置
 *
 * 进程生命周期内只解析一次，修改配置需重启
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  let raw: RawConfig = {}
  if (options.configPath) {
    const explicit = resolve(options.cwd ?? process.cwd(), options.configPath)
    if (!existsSync(explicit)) {
      throw new ConfigurationError(`Config file not found: ${explicit}`, 'Create one with `sysguard init`')
    }
    raw = await parseYamlFile(explicit)
    logger.debug(`Loaded config from ${explicit}`)
  } else {
    const { globalPath, projectPath } = findConfigPaths(options.cwd)
    const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
    const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
    raw = deepMergeConfig(globalRaw, projectRaw)
    for (const p of [globalPath, projectPath]) {
      if (p) logger.debug(`Loaded config from ${p}`)
    }
  }

  cachedConfig = resolveConfig(raw)
  return cachedConfig
}

/**
 * 校验原始配置并生成最终配置（不读文件，便于测试）
 * - 未知键：警告并忽略
 * - 非法值：警告并回退到该键的默认值（自愈目标与排除名单除外，直接报错）
 * - 环境变量覆盖
 * - 组合约束（如开启邮件告警却没有收件人）
 */
export function resolveConfig(raw: RawConfig): Config {
  for (const key of collectUnknownKeys(raw, configSchema, '')) {
    logger.warn(`Unknown config key ignored: ${key}`)
  }

  const parsed = parseWithDefaults(structuredClone(raw))
  return applyConstraints(applyEnvOverrides(parsed))
}

function parseWithDefaults(raw: RawConfig): Config {
  for (let pass = 0; pass < MAX_REPAIR_PASSES; pass++) {
    const result = configSchema.safeParse(raw)
    if (result.success) return result.data

    const removed = new Set<string>()
    for (const issue of result.error.issues) {
      const path = repairablePath(issue.path)
      const label = issue.path.join('.') || '<root>'
      if (isNoFallbackPath(issue.path)) {
        throw new ConfigurationError(
          `Invalid config at ${label}: ${issue.message}`,
          'Fix this entry; self-heal targets and exclusions never fall back to defaults',
        )
      }
      if (path && removed.has(path.join('.'))) continue
      if (path) removed.add(path.join('.'))
      if (!path || !deleteAtPath(raw, path)) {
        throw new ConfigurationError(`Invalid config at ${label}: ${issue.message}`)
      }
      logger.warn(`Invalid config value at ${label} (${issue.message}), using default`)
    }
  }
  throw new ConfigurationError('Config could not be repaired with defaults')
}

function isNoFallbackPath(path: ReadonlyArray<string | number>): boolean {
  return NO_FALLBACK_PREFIXES.some(prefix => prefix.every((segment, i) => path[i] === segment))
}

/**
 * 数组内的元素出错时整个数组回退到默认值
 */
function repairablePath(path: (string | number)[]): string[] | null {
  const keys: string[] = []
  for (const segment of path) {
    if (typeof segment === 'number') break
    keys.push(segment)
  }
  return keys.length > 0 ? keys : null
}

function deleteAtPath(raw: RawConfig, path: string[]): boolean {
  let node: unknown = raw
  for (const key of path.slice(0, -1)) {
    if (!isRecord(node)) return false
    node = node[key]
  }
  const last = path[path.length - 1]
  if (!isRecord(node) || last === undefined || !(last in node)) return false
  delete node[last]
  return true
}

function unwrapSchema(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodDefault) return unwrapSchema(schema.removeDefault())
  if (schema instanceof z.ZodOptional) return unwrapSchema(schema.unwrap())
  return schema
}

export function collectUnknownKeys(value: unknown, schema: z.ZodTypeAny, prefix: string): string[] {
  const inner = unwrapSchema(schema)
  const unknown: string[] = []

  if (inner instanceof z.ZodObject && isRecord(value)) {
    const shape: Record<string, z.ZodTypeAny> = inner.shape
    for (const [key, child] of Object.entries(value)) {
      const path = prefix ? `${prefix}.${key}` : key
      const childSchema = shape[key]
      if (childSchema) {
        unknown.push(...collectUnknownKeys(child, childSchema, path))
      } else {
        unknown.push(path)
      }
    }
  } else if (inner instanceof z.ZodArray && Array.isArray(value)) {
    const element: z.ZodTypeAny = inner.element
    value.forEach((item, i) => {
      unknown.push(...collectUnknownKeys(item, element, `${prefix}[${i}]`))
    })
  }

  return unknown
}

/**
 * Parse YAML file, returning empty object for empty/comment-only files
 */
async function parseYamlFile(filePath: string): Promise<RawConfig> {
  const content = await readFile(filePath, 'utf-8')
  let parsed: unknown
  try {
    parsed = YAML.parse(content)
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${filePath}: ${getErrorMessage(error)}`)
  }
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config root must be a mapping: ${filePath}`)
  }
  return parsed
}

/**
 * Merge config objects: project fields override global fields.
 * Nested mappings are merged, arrays are replaced.
 */
function deepMergeConfig(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue
    const current = result[key]
    result[key] = isRecord(val) && isRecord(current) ? deepMergeConfig(current, val) : val
  }
  return result
}

/**
 * Apply environment variable overrides to config.
 * Called after schema validation.
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env

  if (env.SYSGUARD_ALERT_RECIPIENT) {
    config = { ...config, alert: { ...config.alert, recipient: env.SYSGUARD_ALERT_RECIPIENT } }
  }

  if (env.SYSGUARD_TELEGRAM_BOT_TOKEN) {
    const telegram = { ...config.alert.telegram, botToken: env.SYSGUARD_TELEGRAM_BOT_TOKEN }
    config = { ...config, alert: { ...config.alert, telegram } }
  }

  const level = env.SYSGUARD_LOG_LEVEL
  if (level && isLogLevel(level) && level !== 'silent') {
    config = { ...config, log: { ...config.log, level } }
  }

  return config
}

function applyConstraints(config: Config): Config {
  const { alert } = config
  if (!alert.enabled) return config

  let reason: string | null = null
  if (alert.transport === 'mail' && !alert.recipient) {
    reason = 'alert.transport is mail but alert.recipient is empty'
  } else if (alert.transport === 'telegram' && (!alert.telegram.botToken || !alert.telegram.chatId)) {
    reason = 'alert.transport is telegram but botToken or chatId is missing'
  } else if (alert.transport === 'webhook' && !alert.webhook.url) {
    reason = 'alert.transport is webhook but webhook.url is empty'
  }

  if (reason) {
    logger.warn(`${reason}; alerts disabled`)
    return { ...config, alert: { ...alert, enabled: false } }
  }
  return config
}

/**
 * 获取默认配置
 */
export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

/**
 * 清除配置缓存
 */
export function clearConfigCache(): void {
  cachedConfig = null
}
