/**
 * 通过本地 `mail` 命令投递（MTA 由系统负责）
 */

import { TransportError } from '../../shared/error.js'
import { runCommand, describeCommandFailure } from '../../shared/exec.js'
import { formatBody, formatSubject } from '../formatAlert.js'
import type { AlertMessage, Notifier } from '../types.js'

export function createMailNotifier(options: { timeoutMs: number }): Notifier {
  return {
    name: 'mail',
    async send(message: AlertMessage) {
      if (!message.recipient) {
        throw new TransportError('mail transport needs alert.recipient')
      }
      const result = await runCommand('mail', ['-s', formatSubject(message), message.recipient], {
        timeoutMs: options.timeoutMs,
        input: formatBody(message),
      })
      if (result.exitCode !== 0) {
        throw new TransportError(
          describeCommandFailure('mail', result, options.timeoutMs),
          result.timedOut ? 'TRANSPORT_TIMEOUT' : 'TRANSPORT_FAILED'
        )
      }
    },
  }
}
