import { describe, it, expect } from 'vitest'
import { MaintenanceScheduler } from '../maintenance.js'
import { FakeCommandRunner, FakeMetricSource, makeConfig } from '../../../tests/helpers/fakes.js'
import type { AlertSink } from '../../heal/SelfHealingController.js'
import type { NotifyResult } from '../../notify/types.js'

const HOUR = 60 * 60 * 1000

class RecordingSink implements AlertSink {
  readonly calls: string[] = []

  async notify(key: string, _summary: string, detail: string): Promise<NotifyResult> {
    this.calls.push(`${key}: ${detail}`)
    return 'sent'
  }
}

function setup(overrides: Parameters<typeof makeConfig>[0] = {}) {
  const clock = { now: 1_700_000_000_000 }
  const runner = new FakeCommandRunner()
  const alerts = new RecordingSink()
  const metrics = new FakeMetricSource({ cpu: 10 })
  const scheduler = new MaintenanceScheduler({
    config: makeConfig(overrides).maintenance,
    commandTimeoutMs: 5000,
    runner,
    alerts,
    metrics,
    now: () => clock.now,
  })
  return { scheduler, runner, alerts, metrics, clock }
}

describe('MaintenanceScheduler', () => {
  it('should run mandb when idle and then wait for the interval', async () => {
    const { scheduler, runner, clock } = setup()

    expect(await scheduler.runIfDue()).toBe('success')
    expect(runner.actions).toEqual([{ kind: 'RUN_MANDB' }])
    expect(scheduler.lastRunAt).toBe(clock.now)

    clock.now += 5 * HOUR
    expect(await scheduler.runIfDue()).toBe('not-due')

    clock.now += HOUR
    expect(await scheduler.runIfDue()).toBe('success')
    expect(runner.actions).toHaveLength(2)
  })

  it('should defer while the CPU is busy', async () => {
    const { scheduler, runner, metrics } = setup()
    metrics.values.cpu = 50

    expect(await scheduler.runIfDue()).toBe('busy')
    expect(runner.actions).toEqual([])
    expect(scheduler.isDue()).toBe(true)
  })

  it('should skip when the CPU reading fails', async () => {
    const { scheduler, runner, metrics } = setup()
    metrics.values.cpu = new Error('mpstat: not found')

    expect(await scheduler.runIfDue()).toBe('skipped')
    expect(runner.actions).toEqual([])
  })

  it('should alert on failure and retry on the next cycle', async () => {
    const { scheduler, runner, alerts } = setup()
    runner.result = { exitCode: 1, output: 'mandb: can\'t write index' }

    expect(await scheduler.runIfDue()).toBe('failure')
    expect(alerts.calls).toEqual(["MAINTENANCE_FAIL: rebuild man page index: mandb: can't write index"])
    expect(scheduler.lastRunAt).toBeNull()

    runner.result = { exitCode: 0, output: '' }
    expect(await scheduler.runIfDue()).toBe('success')
  })

  it('should do nothing when disabled', async () => {
    const { scheduler, metrics } = setup({ maintenance: { enabled: false } })

    expect(await scheduler.runIfDue()).toBe('disabled')
    expect(metrics.calls).toEqual([])
  })
})
