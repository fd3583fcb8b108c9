import { formatISO } from 'date-fns'
import type { AlertMessage } from './types.js'

export function formatSubject(message: AlertMessage): string {
  return message.subjectPrefix ? `${message.subjectPrefix} ${message.summary}` : message.summary
}

export function formatBody(message: AlertMessage): string {
  return [
    message.detail,
    '',
    `Host: ${message.hostname}`,
    `Time: ${formatISO(message.timestamp)}`,
    `Key:  ${message.alertKey}`,
    '--',
    `sysguard v${message.agentVersion}`,
  ].join('\n')
}
