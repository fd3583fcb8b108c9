/**
 * 告警投递接口
 *
 * 传输方式（mail/telegram/webhook）对调度器不可见
 */

export interface AlertMessage {
  alertKey: string
  subjectPrefix: string
  summary: string
  detail: string
  recipient: string
  hostname: string
  /** 毫秒时间戳 */
  timestamp: number
  agentVersion: string
}

export interface Notifier {
  readonly name: string
  /** 投递失败抛 TransportError；signal abort 表示已超时 */
  send(message: AlertMessage, signal: AbortSignal): Promise<void>
}

export type NotifyResult = 'sent' | 'suppressed'
