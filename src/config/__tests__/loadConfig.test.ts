/**
 * loadConfig tests
 * Tests config loading, per-key fallback, unknown keys and env overrides
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdirSync, writeFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'

const TEST_DIR = join(tmpdir(), `sysguard-config-test-${Date.now()}`)

// Mock homedir to prevent loading the user's real ~/.sysguard.yaml
vi.mock('os', async importOriginal => {
  const os = await importOriginal<typeof import('os')>()
  return { ...os, homedir: () => TEST_DIR }
})

const { loadConfig, resolveConfig, getDefaultConfig, clearConfigCache, collectUnknownKeys } =
  await import('../loadConfig.js')
const { configSchema } = await import('../schema.js')
const { ConfigurationError } = await import('../../shared/error.js')

const ENV_KEYS = ['SYSGUARD_ALERT_RECIPIENT', 'SYSGUARD_TELEGRAM_BOT_TOKEN', 'SYSGUARD_LOG_LEVEL']

beforeEach(() => {
  clearConfigCache()
  for (const key of ENV_KEYS) delete process.env[key]
  mkdirSync(TEST_DIR, { recursive: true })
})

afterEach(() => {
  clearConfigCache()
  for (const key of ENV_KEYS) delete process.env[key]
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('getDefaultConfig', () => {
  it('should return the documented defaults', () => {
    const config = getDefaultConfig()
    expect(config.monitor.intervalSeconds).toBe(60)
    expect(config.thresholds).toEqual({
      cpu: 90,
      memory: 90,
      disk: 85,
      swap: 75,
      zombies: 10,
      temperature: 80,
      loadPerCore: 1.5,
    })
    expect(config.checks).toEqual({ load: true, swap: true, zombies: true, temperature: true })
    expect(config.disk.filesystem).toBe('/')
    expect(config.network.host).toBe('1.1.1.1')
    expect(config.port.port).toBe(11434)
    expect(config.port.expectedListenIp).toBe('127.0.0.1')
    expect(config.alert.cooldownSeconds).toBe(3600)
    expect(config.selfHeal.enabled).toBe(false)
    expect(config.selfHeal.exclusions.users).toEqual(['root'])
    expect(config.maintenance.minIntervalHours).toBe(6)
  })
})

describe('loadConfig', () => {
  it('should return default config when no config file exists', async () => {
    const config = await loadConfig({ cwd: TEST_DIR })
    expect(config).toEqual(getDefaultConfig())
  })

  it('should load values from YAML and keep defaults for the rest', async () => {
    writeFileSync(
      join(TEST_DIR, '.sysguard.yaml'),
      `
thresholds:
  cpu: 75
port:
  port: 8080
  expectedListenIp: any
`
    )

    const config = await loadConfig({ cwd: TEST_DIR })
    expect(config.thresholds.cpu).toBe(75)
    expect(config.thresholds.memory).toBe(90)
    expect(config.port.port).toBe(8080)
    expect(config.port.expectedListenIp).toBe('any')
    expect(config.port.expectedState).toBe('listening')
  })

  it('should cache the first result for the process lifetime', async () => {
    const first = await loadConfig({ cwd: TEST_DIR })
    writeFileSync(join(TEST_DIR, '.sysguard.yaml'), 'thresholds:\n  cpu: 10\n')
    const second = await loadConfig({ cwd: TEST_DIR })
    expect(second).toBe(first)
    expect(second.thresholds.cpu).toBe(90)
  })

  it('should treat an empty file as defaults', async () => {
    writeFileSync(join(TEST_DIR, '.sysguard.yaml'), '# only comments\n')
    const config = await loadConfig({ cwd: TEST_DIR })
    expect(config).toEqual(getDefaultConfig())
  })

  it('should throw ConfigurationError for an explicit path that does not exist', async () => {
    await expect(loadConfig({ configPath: join(TEST_DIR, 'missing.yaml') })).rejects.toBeInstanceOf(
      ConfigurationError
    )
  })

  it('should throw ConfigurationError on broken YAML', async () => {
    const path = join(TEST_DIR, 'broken.yaml')
    writeFileSync(path, 'thresholds: [broken\n')
    await expect(loadConfig({ configPath: path })).rejects.toBeInstanceOf(ConfigurationError)
  })

  it('should refuse to start from a file whose process exclusions contain a non-string', async () => {
    const path = join(TEST_DIR, 'exclusions.yaml')
    writeFileSync(path, 'selfHeal:\n  enabled: true\n  exclusions:\n    processes:\n      - postgres\n      - 42\n')
    await expect(loadConfig({ configPath: path })).rejects.toThrow('Invalid config at selfHeal.exclusions.processes.1')
  })

  it('should reject a YAML root that is not a mapping', async () => {
    const path = join(TEST_DIR, 'list.yaml')
    writeFileSync(path, '- a\n- b\n')
    await expect(loadConfig({ configPath: path })).rejects.toThrow('Config root must be a mapping')
  })
})

describe('resolveConfig', () => {
  it('should fall back to the default for an out-of-range value only', () => {
    const config = resolveConfig({ thresholds: { cpu: 150, disk: 70 } })
    expect(config.thresholds.cpu).toBe(90)
    expect(config.thresholds.disk).toBe(70)
  })

  it('should fall back to the default for a wrong type', () => {
    const config = resolveConfig({ monitor: { intervalSeconds: 'often' } })
    expect(config.monitor.intervalSeconds).toBe(60)
  })

  it('should reject an interval below 10 seconds by using the default', () => {
    const config = resolveConfig({ monitor: { intervalSeconds: 2 } })
    expect(config.monitor.intervalSeconds).toBe(60)
  })

  it('should refuse a disk target list with an invalid element instead of using defaults', () => {
    expect(() =>
      resolveConfig({ selfHeal: { disk: { targets: [{ path: '/srv/logs', maxAgeDays: 'old' }] } } }),
    ).toThrow('Invalid config at selfHeal.disk.targets.0.maxAgeDays')
  })

  it('should refuse a disk target that has no path', () => {
    expect(() => resolveConfig({ selfHeal: { disk: { targets: [{ maxAgeDays: 5 }] } } })).toThrow(
      ConfigurationError,
    )
    expect(() => resolveConfig({ selfHeal: { disk: { targets: [{ maxAgeDays: 5 }] } } })).toThrow(
      'Invalid config at selfHeal.disk.targets.0.path: Required',
    )
  })

  it('should refuse an exclusion list with an invalid element', () => {
    expect(() => resolveConfig({ selfHeal: { exclusions: { processes: ['postgres', 42] } } })).toThrow(
      'Invalid config at selfHeal.exclusions.processes.1',
    )
  })

  it('should refuse exclusions of the wrong shape', () => {
    expect(() => resolveConfig({ selfHeal: { exclusions: { paths: '/data' } } })).toThrow(
      'Invalid config at selfHeal.exclusions.paths',
    )
  })

  it('should still fall back for other invalid self-heal values', () => {
    const config = resolveConfig({ selfHeal: { cpu: { triggerPercent: 'high' } } })
    expect(config.selfHeal.cpu.triggerPercent).toBe(95)
  })

  it('should keep an empty disk target path for the heal gate to refuse', () => {
    const config = resolveConfig({ selfHeal: { disk: { targets: [{ path: '', maxAgeDays: 3 }] } } })
    expect(config.selfHeal.disk.targets).toEqual([{ path: '', maxAgeDays: 3, timeField: 'mtime' }])
  })

  it('should ignore unknown keys', () => {
    const config = resolveConfig({ thresholds: { cpu: 80, gpu: 50 }, shell: 'rm -rf /' })
    expect(config.thresholds.cpu).toBe(80)
    expect(config).not.toHaveProperty('shell')
    expect(config.thresholds).not.toHaveProperty('gpu')
  })

  it('should disable mail alerts that have no recipient', () => {
    const config = resolveConfig({ alert: { enabled: true, transport: 'mail' } })
    expect(config.alert.enabled).toBe(false)
  })

  it('should keep mail alerts when a recipient is set', () => {
    const config = resolveConfig({ alert: { enabled: true, recipient: 'ops@example.com' } })
    expect(config.alert.enabled).toBe(true)
    expect(config.alert.recipient).toBe('ops@example.com')
  })

  it('should disable telegram alerts without a chat id', () => {
    const config = resolveConfig({
      alert: { enabled: true, transport: 'telegram', telegram: { botToken: 'test-secret' } },
    })
    expect(config.alert.enabled).toBe(false)
  })

  it('should take the recipient from SYSGUARD_ALERT_RECIPIENT', () => {
    process.env.SYSGUARD_ALERT_RECIPIENT = 'oncall@example.com'
    const config = resolveConfig({ alert: { enabled: true } })
    expect(config.alert.recipient).toBe('oncall@example.com')
    expect(config.alert.enabled).toBe(true)
  })

  it('should take the bot token from SYSGUARD_TELEGRAM_BOT_TOKEN', () => {
    process.env.SYSGUARD_TELEGRAM_BOT_TOKEN = 'test-secret'
    const config = resolveConfig({ alert: { enabled: true, transport: 'telegram', telegram: { chatId: '42' } } })
    expect(config.alert.telegram.botToken).toBe('test-secret')
    expect(config.alert.enabled).toBe(true)
  })

  it('should ignore an invalid SYSGUARD_LOG_LEVEL', () => {
    process.env.SYSGUARD_LOG_LEVEL = 'loud'
    expect(resolveConfig({}).log.level).toBe('info')
    process.env.SYSGUARD_LOG_LEVEL = 'debug'
    expect(resolveConfig({}).log.level).toBe('debug')
  })
})

describe('collectUnknownKeys', () => {
  it('should report nested and array element paths', () => {
    const keys = collectUnknownKeys(
      {
        monitor: { intervalSeconds: 60, jitter: 5 },
        selfHeal: { disk: { targets: [{ path: '/tmp', maxAgeDays: 1, recursive: true }] } },
        extra: 1,
      },
      configSchema,
      ''
    )
    expect(keys).toEqual(['monitor.jitter', 'selfHeal.disk.targets[0].recursive', 'extra'])
  })

  it('should return nothing for a clean config', () => {
    expect(collectUnknownKeys({ alert: { webhook: { headers: { 'X-Token': 'test-secret' } } } }, configSchema, '')).toEqual([])
  })
})
