import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { formatISO } from 'date-fns'
import type { AlertMessage } from '../types.js'

vi.mock('../../shared/exec.js', async importOriginal => {
  const actual = await importOriginal<typeof import('../../shared/exec.js')>()
  return { ...actual, runCommand: vi.fn() }
})

const { runCommand } = await import('../../shared/exec.js')
const { createMailNotifier } = await import('../notifiers/mailNotifier.js')
const { createTelegramNotifier } = await import('../notifiers/telegramNotifier.js')
const { createWebhookNotifier, buildWebhookPayload } = await import('../notifiers/webhookNotifier.js')
const { createNotifier } = await import('../createNotifier.js')
const { formatSubject, formatBody } = await import('../formatAlert.js')
const { TransportError } = await import('../../shared/error.js')
const { makeConfig } = await import('../../../tests/helpers/fakes.js')

const mockRun = vi.mocked(runCommand)

const message: AlertMessage = {
  alertKey: 'CPU_HIGH',
  subjectPrefix: '[sysguard]',
  summary: 'High CPU',
  detail: 'CPU 95% > 90%',
  recipient: 'ops@example.test',
  hostname: 'web-01',
  timestamp: 1_700_000_000_000,
  agentVersion: '0.1.0',
}

const signal = new AbortController().signal

describe('formatAlert', () => {
  it('should prefix the subject', () => {
    expect(formatSubject(message)).toBe('[sysguard] High CPU')
    expect(formatSubject({ ...message, subjectPrefix: '' })).toBe('High CPU')
  })

  it('should include detail, host, key and version in the body', () => {
    expect(formatBody(message).split('\n')).toEqual([
      'CPU 95% > 90%',
      '',
      'Host: web-01',
      `Time: ${formatISO(message.timestamp)}`,
      'Key:  CPU_HIGH',
      '--',
      'sysguard v0.1.0',
    ])
  })
})

describe('mail notifier', () => {
  beforeEach(() => {
    mockRun.mockReset()
  })

  it('should pipe the body into mail -s', async () => {
    mockRun.mockResolvedValue({ exitCode: 0, stdout: '', stderr: '', timedOut: false, failedToStart: false })

    await createMailNotifier({ timeoutMs: 15000 }).send(message, signal)
    expect(mockRun).toHaveBeenCalledWith('mail', ['-s', '[sysguard] High CPU', 'ops@example.test'], {
      timeoutMs: 15000,
      input: formatBody(message),
    })
  })

  it('should throw TransportError on a non-zero exit', async () => {
    mockRun.mockResolvedValue({
      exitCode: 1,
      stdout: '',
      stderr: 'send-mail: cannot connect\n',
      timedOut: false,
      failedToStart: false,
    })

    await expect(createMailNotifier({ timeoutMs: 15000 }).send(message, signal)).rejects.toThrow(
      'mail exited with code 1: send-mail: cannot connect'
    )
  })

  it('should refuse to send without a recipient', async () => {
    await expect(createMailNotifier({ timeoutMs: 15000 }).send({ ...message, recipient: '' }, signal)).rejects.toBeInstanceOf(
      TransportError
    )
    expect(mockRun).not.toHaveBeenCalled()
  })
})

describe('HTTP notifiers', () => {
  const fetchMock = vi.fn<typeof fetch>()

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('should call the Telegram sendMessage endpoint', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ ok: true }), { status: 200 }))
    const notifier = createTelegramNotifier({
      botToken: 'test-token',
      chatId: '42',
      apiBase: 'https://api.telegram.example/',
    })

    await notifier.send(message, signal)

    const [url, init] = fetchMock.mock.calls[0] ?? []
    expect(url).toBe('https://api.telegram.example/bottest-token/sendMessage')
    expect(init?.method).toBe('POST')
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: '42',
      text: `[sysguard] High CPU\n\n${formatBody(message)}`,
      disable_web_page_preview: true,
    })
  })

  it('should surface the Telegram error description', async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ ok: false, description: 'Bad Request: chat not found' }), { status: 400 })
    )
    const notifier = createTelegramNotifier({ botToken: 'test-token', chatId: '42', apiBase: 'https://api.telegram.example' })

    await expect(notifier.send(message, signal)).rejects.toThrow(
      'Telegram sendMessage failed (HTTP 400): Bad Request: chat not found'
    )
  })

  it('should POST the webhook payload with custom headers', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }))
    const notifier = createWebhookNotifier({
      url: 'https://hooks.example.test/alerts',
      headers: { Authorization: 'Bearer test-secret' },
    })

    await notifier.send(message, signal)

    const [url, init] = fetchMock.mock.calls[0] ?? []
    expect(url).toBe('https://hooks.example.test/alerts')
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' })
    expect(JSON.parse(String(init?.body))).toEqual(buildWebhookPayload(message))
  })

  it('should wrap network failures as TransportError', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNREFUSED'))
    const notifier = createWebhookNotifier({ url: 'https://hooks.example.test/alerts', headers: {} })

    await expect(notifier.send(message, signal)).rejects.toThrow('Webhook request failed: ECONNREFUSED')
  })

  it('should reject non-2xx webhook responses', async () => {
    fetchMock.mockResolvedValue(new Response('nope', { status: 502 }))
    const notifier = createWebhookNotifier({ url: 'https://hooks.example.test/alerts', headers: {} })

    await expect(notifier.send(message, signal)).rejects.toThrow('Webhook responded with HTTP 502')
  })
})

describe('createNotifier', () => {
  it('should pick the implementation by transport', () => {
    const base = makeConfig().alert
    expect(createNotifier({ ...base, transport: 'mail' }).name).toBe('mail')
    expect(createNotifier({ ...base, transport: 'telegram' }).name).toBe('telegram')
    expect(createNotifier({ ...base, transport: 'webhook' }).name).toBe('webhook')
    expect(createNotifier({ ...base, transport: 'log' }).name).toBe('log')
  })
})
