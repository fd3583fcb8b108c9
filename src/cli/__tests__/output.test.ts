import { describe, it, expect } from 'vitest'
import { statusTable } from '../output.js'
import { stripAnsi } from '../../shared/logger.js'

describe('statusTable', () => {
  it('should render one aligned row per subsystem under a header', () => {
    const lines = stripAnsi(
      statusTable([
        { subsystem: 'cpu', status: 'WARNING', detail: 'CPU 95% > 90%' },
        { subsystem: 'disk', status: 'NOMINAL', detail: 'Disk / 50%' },
      ])
    ).split('\n')

    expect(lines.find(l => l.includes('Subsystem'))).toBe('║ Subsystem │ Status  │ Detail        ║')
    expect(lines.find(l => l.includes('cpu'))).toBe('║ cpu       │ WARNING │ CPU 95% > 90% ║')
    expect(lines.find(l => l.includes('disk'))).toBe('║ disk      │ NOMINAL │ Disk / 50%    ║')
  })
})
