/**
 * pidLock 测试
 *
 * 测试 PID 锁的获取、释放和冲突检测
 * 每个用例使用独立的临时目录
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { getPidLock, acquirePidLock, releasePidLock, isAgentRunning, isProcessRunning } from '../pidLock.js'

let testDir: string
let lockFile: string

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'sysguard-lock-test-'))
  lockFile = join(testDir, 'agent.pid')
})

afterEach(() => {
  vi.restoreAllMocks()
  rmSync(testDir, { recursive: true, force: true })
})

function errnoError(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(code), { code })
}

describe('pidLock', () => {
  describe('getPidLock', () => {
    it('should return null when no lock file exists', () => {
      expect(getPidLock(lockFile)).toBeNull()
    })

    it('should return lock info after acquiring', () => {
      expect(acquirePidLock(lockFile)).toEqual({ success: true })

      const lock = getPidLock(lockFile)
      expect(lock?.pid).toBe(process.pid)
      expect(lock?.cwd).toBe(process.cwd())
      expect(lock?.startedAt).toMatch(/^\d{4}-\d{2}-\d{2}T/)
    })

    it('should ignore a corrupt lock file', () => {
      writeFileSync(lockFile, '{"pid":"not-a-number"}')
      expect(getPidLock(lockFile)).toBeNull()
    })
  })

  describe('acquirePidLock', () => {
    it('should fail if a running process already holds the lock', () => {
      expect(acquirePidLock(lockFile).success).toBe(true)

      const second = acquirePidLock(lockFile)
      expect(second.success).toBe(false)
      if (!second.success) {
        expect(second.existingLock.pid).toBe(process.pid)
      }
    })

    it('should replace a stale lock whose process is gone', () => {
      writeFileSync(
        lockFile,
        JSON.stringify({ pid: 999999, startedAt: '2024-01-01T00:00:00.000Z', cwd: '/', command: 'sysguard' })
      )
      vi.spyOn(process, 'kill').mockImplementation(() => {
        throw errnoError('ESRCH')
      })

      expect(acquirePidLock(lockFile)).toEqual({ success: true })
      expect(getPidLock(lockFile)?.pid).toBe(process.pid)
    })
  })

  describe('releasePidLock', () => {
    it('should remove the lock file', () => {
      acquirePidLock(lockFile)
      releasePidLock(lockFile)
      expect(getPidLock(lockFile)).toBeNull()
    })

    it('should not throw when no lock file exists', () => {
      expect(() => releasePidLock(lockFile)).not.toThrow()
    })
  })

  describe('isProcessRunning', () => {
    it('should return true for the current process', () => {
      expect(isProcessRunning(process.pid)).toBe(true)
    })

    it('should return true when EPERM error occurs', () => {
      vi.spyOn(process, 'kill').mockImplementation(() => {
        throw errnoError('EPERM')
      })
      expect(isProcessRunning(1)).toBe(true)
    })

    it('should return false when ESRCH error occurs', () => {
      vi.spyOn(process, 'kill').mockImplementation(() => {
        throw errnoError('ESRCH')
      })
      expect(isProcessRunning(99999)).toBe(false)
    })
  })

  describe('isAgentRunning', () => {
    it('should report not running without a lock', () => {
      expect(isAgentRunning(lockFile)).toEqual({ running: false })
    })

    it('should report the lock holder', () => {
      acquirePidLock(lockFile)
      const status = isAgentRunning(lockFile)
      expect(status.running).toBe(true)
      expect(status.lock?.pid).toBe(process.pid)
    })
  })
})
