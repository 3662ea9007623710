import { describe, it, expect, afterEach, vi } from 'vitest'
import { createSyncLogger, createChildLogger } from '../../logger/index.js'

describe('Logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  describe('createSyncLogger', () => {
    it('should use the requested level, case-insensitively', () => {
      const logger = createSyncLogger({ level: 'DEBUG' })

      expect(logger.level).toBe('debug')
      expect(logger.isLevelEnabled('debug')).toBe(true)
      expect(logger.isLevelEnabled('trace')).toBe(false)
    })

    it('should fall back to LOG_LEVEL', () => {
      vi.stubEnv('LOG_LEVEL', 'warn')

      expect(createSyncLogger().level).toBe('warn')
    })

    it('should bind the service name and version', () => {
      const logger = createSyncLogger({ level: 'silent', serviceName: 'smsbridge-test' })

      expect(logger.bindings()).toMatchObject({ service: 'smsbridge-test', version: '0.1.0' })
    })
  })

  describe('createChildLogger', () => {
    it('should add bindings and keep the parent level', () => {
      const parent = createSyncLogger({ level: 'error' })
      const child = createChildLogger(parent, { provider: 'pswin', alias: 'main' })

      expect(child.level).toBe('error')
      expect(child.bindings()).toMatchObject({ provider: 'pswin', alias: 'main' })
    })
  })
})
