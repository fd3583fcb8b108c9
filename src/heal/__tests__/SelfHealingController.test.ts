import { describe, it, expect, vi } from 'vitest'
import { SelfHealingController, type AlertSink } from '../SelfHealingController.js'
import { FakeCommandRunner, FakeMetricSource, makeConfig, proc } from '../../../tests/helpers/fakes.js'
import type { Config } from '../../config/schema.js'
import type { NotifyResult } from '../../notify/types.js'
import type { SubsystemDiagnosis } from '../../types/health.js'

class RecordingSink implements AlertSink {
  readonly calls: Array<{ key: string; summary: string; detail: string }> = []

  async notify(key: string, summary: string, detail: string): Promise<NotifyResult> {
    this.calls.push({ key, summary, detail })
    return 'sent'
  }
}

function diag(overrides: Partial<SubsystemDiagnosis> = {}): SubsystemDiagnosis {
  return {
    subsystem: 'processService',
    status: 'WARNING',
    detail: 'ollama.service is failed',
    alerts: [],
    healEligible: true,
    ...overrides,
  }
}

const healEnabled = {
  selfHeal: {
    enabled: true,
    cpu: { enabled: true },
    memory: { enabled: true },
    disk: { enabled: true },
    network: { enabled: true },
  },
}

function setup(config: Config = makeConfig(healEnabled)) {
  const runner = new FakeCommandRunner()
  const alerts = new RecordingSink()
  const metrics = new FakeMetricSource()
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => true)
  const controller = new SelfHealingController({ config, runner, alerts, metrics, ownPid: 31337, sleep })
  return { controller, runner, alerts, metrics, sleep }
}

describe('SelfHealingController gates', () => {
  it('should do nothing when self-healing is disabled', async () => {
    const { controller, runner, alerts } = setup(makeConfig())

    const outcome = await controller.maybeHeal(diag())

    expect(outcome).toEqual({ attempted: false, reason: 'self-healing is disabled' })
    expect(runner.actions).toEqual([])
    expect(alerts.calls).toEqual([])
  })

  it('should refuse when the action flag for the subsystem is off', async () => {
    const { controller } = setup(makeConfig({ selfHeal: { enabled: true } }))

    expect(await controller.maybeHeal(diag({ subsystem: 'cpu', observed: 99 }))).toEqual({
      attempted: false,
      reason: 'selfHeal.cpu.enabled is off',
    })
  })

  it('should never remediate an ERROR reading', async () => {
    const { controller, runner } = setup()

    const outcome = await controller.maybeHeal(diag({ status: 'ERROR', healEligible: true }))

    expect(outcome).toEqual({ attempted: false, reason: 'status ERROR (reading unavailable) is never remediated' })
    expect(runner.actions).toEqual([])
  })

  it('should refuse nominal and ineligible diagnoses', async () => {
    const { controller } = setup()

    expect(await controller.maybeHeal(diag({ status: 'NOMINAL' }))).toEqual({
      attempted: false,
      reason: 'subsystem is nominal',
    })
    expect(await controller.maybeHeal(diag({ healEligible: false }))).toEqual({
      attempted: false,
      reason: 'diagnosis is not eligible for remediation',
    })
  })

  it('should have no remediation for port findings', async () => {
    const { controller } = setup()

    expect(await controller.maybeHeal(diag({ subsystem: 'port' }))).toEqual({
      attempted: false,
      reason: 'no remediation is defined for port mismatches',
    })
  })

  it('should only alert on load, swap, zombie and temperature findings', async () => {
    const { controller, runner } = setup()

    expect(await controller.maybeHeal(diag({ subsystem: 'zombies', observed: 40 }))).toEqual({
      attempted: false,
      reason: 'no remediation is defined for zombies readings',
    })
    expect(await controller.maybeHeal(diag({ subsystem: 'temperature', observed: 95 }))).toEqual({
      attempted: false,
      reason: 'no remediation is defined for temperature readings',
    })
    expect(runner.actions).toEqual([])
  })
})

describe('SelfHealingController service restart', () => {
  it('should restart the monitored service once and report the attempt', async () => {
    const { controller, runner, alerts, sleep } = setup()

    const outcome = await controller.maybeHeal(diag())

    expect(runner.actions).toEqual([{ kind: 'RESTART_SERVICE', service: 'ollama.service' }])
    expect(outcome).toEqual({
      attempted: true,
      action: { kind: 'RESTART_SERVICE', service: 'ollama.service' },
      outcome: 'success',
      message: 'ok',
    })
    expect(alerts.calls).toEqual([
      { key: 'SELF_HEAL_ATTEMPT', summary: 'Self-heal attempted', detail: 'Succeeded: restart service ollama.service\nok' },
    ])
    expect(sleep).toHaveBeenCalledWith(5000, undefined)
  })

  it('should report SELF_HEAL_FAIL and skip the settle wait when the command fails', async () => {
    const { controller, runner, alerts, sleep } = setup()
    runner.result = { exitCode: 1, output: '' }

    const outcome = await controller.maybeHeal(diag())

    expect(outcome).toMatchObject({ attempted: true, outcome: 'failure', message: 'exit code 1' })
    expect(alerts.calls).toEqual([
      {
        key: 'SELF_HEAL_FAIL',
        summary: 'Self-heal FAILED',
        detail: 'Failed: restart service ollama.service\nexit code 1',
      },
    ])
    expect(sleep).not.toHaveBeenCalled()
  })

  it('should treat a rejected runner as a failure', async () => {
    const { controller, runner, alerts } = setup()
    runner.run = async () => {
      throw new Error('spawn EACCES')
    }

    const outcome = await controller.maybeHeal(diag())

    expect(outcome).toMatchObject({ attempted: true, outcome: 'failure', message: 'spawn EACCES' })
    expect(alerts.calls.map(c => c.key)).toEqual(['SELF_HEAL_FAIL'])
  })

  it('should refuse to restart a protected service', async () => {
    const config = makeConfig({ ...healEnabled, processService: { serviceName: 'sshd.service' } })
    const { controller, runner } = setup(config)

    expect(await controller.maybeHeal(diag())).toEqual({
      attempted: false,
      reason: 'service sshd.service is protected',
    })
    expect(runner.actions).toEqual([])
  })

  it('should restart the first unprotected network service', async () => {
    const config = makeConfig({
      ...healEnabled,
      selfHeal: { ...healEnabled.selfHeal, network: { enabled: true, services: ['sshd', 'NetworkManager'] } },
    })
    const { controller, runner } = setup(config)

    await controller.maybeHeal(diag({ subsystem: 'network', detail: '1.1.1.1 unreachable' }))

    expect(runner.actions).toEqual([{ kind: 'RESTART_SERVICE', service: 'NetworkManager' }])
  })
})

describe('SelfHealingController CPU kill', () => {
  it('should kill the top eligible process and skip excluded ones', async () => {
    const { controller, runner, metrics } = setup()
    metrics.values.processes = [
      proc({ pid: 1, name: 'systemd', user: 'root', cpuPercent: 99 }),
      proc({ pid: 900, name: 'sshd', cpuPercent: 98 }),
      proc({ pid: 901, name: 'fresh', cpuPercent: 97, elapsedSeconds: 3 }),
      proc({ pid: 4242, name: 'worker', cpuPercent: 96 }),
    ]

    const outcome = await controller.maybeHeal(diag({ subsystem: 'cpu', status: 'WARNING', observed: 97 }))

    expect(runner.actions).toEqual([{ kind: 'KILL_PROCESS', pid: 4242, name: 'worker', user: 'app' }])
    expect(outcome).toMatchObject({ attempted: true, outcome: 'success' })
  })

  it('should skip a process whose ps name is the truncated form of an excluded name', async () => {
    const config = makeConfig({
      ...healEnabled,
      selfHeal: { ...healEnabled.selfHeal, exclusions: { processes: ['postgres-exporter'] } },
    })
    const { controller, runner, metrics } = setup(config)
    metrics.values.processes = [
      proc({ pid: 800, name: 'postgres-export', cpuPercent: 98 }),
      proc({ pid: 4242, name: 'worker', cpuPercent: 96 }),
    ]

    await controller.maybeHeal(diag({ subsystem: 'cpu', observed: 98 }))

    expect(runner.actions).toEqual([{ kind: 'KILL_PROCESS', pid: 4242, name: 'worker', user: 'app' }])
  })

  it('should not kill anything below the trigger', async () => {
    const { controller, runner, metrics } = setup()

    const outcome = await controller.maybeHeal(diag({ subsystem: 'cpu', observed: 91 }))

    expect(outcome).toEqual({ attempted: false, reason: 'CPU 91% is below the kill trigger 95%' })
    expect(metrics.calls).toEqual([])
    expect(runner.actions).toEqual([])
  })

  it('should stop at the first process below the CPU threshold', async () => {
    const { controller, runner, metrics } = setup()
    metrics.values.processes = [proc({ name: 'sshd', cpuPercent: 96 }), proc({ pid: 77, cpuPercent: 40 })]

    const outcome = await controller.maybeHeal(diag({ subsystem: 'cpu', observed: 96 }))

    expect(outcome).toEqual({ attempted: false, reason: 'no killable process above 90% CPU' })
    expect(runner.actions).toEqual([])
  })

  it('should report a process listing failure as not attempted', async () => {
    const { controller, metrics } = setup()
    metrics.values.processes = new Error('ps: not found')

    expect(await controller.maybeHeal(diag({ subsystem: 'cpu', observed: 99 }))).toEqual({
      attempted: false,
      reason: 'could not list processes: ps: not found',
    })
  })
})

describe('SelfHealingController memory and disk', () => {
  it('should drop caches for memory pressure', async () => {
    const { controller, runner } = setup()

    await controller.maybeHeal(diag({ subsystem: 'memory', observed: 92 }))

    expect(runner.actions).toEqual([{ kind: 'DROP_CACHES' }])
  })

  it('should delete stale files only in permitted targets', async () => {
    const config = makeConfig({
      ...healEnabled,
      selfHeal: {
        ...healEnabled.selfHeal,
        disk: {
          enabled: true,
          targets: [
            { path: '/etc', maxAgeDays: 7, timeField: 'mtime' },
            { path: '/var/log', maxAgeDays: 30, timeField: 'mtime' },
          ],
        },
      },
    })
    const { controller, runner } = setup(config)

    await controller.maybeHeal(diag({ subsystem: 'disk', observed: 95 }))

    expect(runner.actions).toEqual([
      { kind: 'DELETE_STALE_FILES', targets: [{ path: '/var/log', maxAgeDays: 30, timeField: 'mtime' }] },
    ])
  })

  it('should not clean a target covered by an excluded path written with a trailing slash', async () => {
    const config = makeConfig({
      ...healEnabled,
      selfHeal: {
        ...healEnabled.selfHeal,
        disk: { enabled: true, targets: [{ path: '/data', maxAgeDays: 5, timeField: 'mtime' }] },
        exclusions: { paths: ['/data/'] },
      },
    })
    const { controller, runner } = setup(config)

    const outcome = await controller.maybeHeal(diag({ subsystem: 'disk', observed: 95 }))

    expect(outcome).toEqual({ attempted: false, reason: 'no permitted cleanup targets' })
    expect(runner.actions).toEqual([])
  })

  it('should abort disk cleanup on an empty target path', async () => {
    const config = makeConfig({
      ...healEnabled,
      selfHeal: {
        ...healEnabled.selfHeal,
        disk: {
          enabled: true,
          targets: [
            { path: '/var/log', maxAgeDays: 30, timeField: 'mtime' },
            { path: '', maxAgeDays: 7, timeField: 'mtime' },
          ],
        },
      },
    })
    const { controller, runner, alerts } = setup(config)

    const outcome = await controller.maybeHeal(diag({ subsystem: 'disk', observed: 95 }))

    expect(outcome).toEqual({
      attempted: false,
      reason: 'configuration error: selfHeal.disk target path is empty',
    })
    expect(runner.actions).toEqual([])
    expect(alerts.calls).toEqual([])
  })
})
