import { createLogger } from '../../shared/logger.js'
import { formatSubject } from '../formatAlert.js'
import type { AlertMessage, Notifier } from '../types.js'

const logger = createLogger('alert:log')

/** 只写日志，用于没有投递通道的主机 */
export function createLogNotifier(): Notifier {
  return {
    name: 'log',
    async send(message: AlertMessage) {
      logger.warn(`${formatSubject(message)}: ${message.detail}`)
    },
  }
}
