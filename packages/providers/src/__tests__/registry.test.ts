import { describe, it, expect } from 'vitest'
import { Gateway, createSyncLogger } from '@smsbridge/core'
import { createProvider, registerProviders } from '../registry.js'
import { PswinProvider } from '../pswin/pswin.js'
import { LoopbackProvider } from '../loopback/loopback.js'

const logger = createSyncLogger({ level: 'silent' })

describe('Provider registry', () => {
  describe('createProvider', () => {
    it('should create a PSWin provider', () => {
      const provider = createProvider(
        { alias: 'main', type: 'pswin', options: { user: 'acme', password: 'test-secret' } },
        logger,
      )

      expect(provider).toBeInstanceOf(PswinProvider)
      expect(provider.name).toBe('pswin')
    })

    it('should create a loopback provider', () => {
      const provider = createProvider({ alias: 'dev', type: 'loopback' }, logger)

      expect(provider).toBeInstanceOf(LoopbackProvider)
    })
  })

  describe('registerProviders', () => {
    it('should add providers under their aliases in order', () => {
      const gateway = new Gateway({ logger })

      registerProviders(
        gateway,
        [
          { alias: 'main', type: 'pswin', options: { user: 'acme', password: 'test-secret' } },
          { alias: 'dev', type: 'loopback', default: true },
        ],
        logger,
      )

      expect(gateway.aliases).toEqual(['main', 'dev'])
      expect(gateway.defaultProvider).toBe('dev')
      expect(gateway.getProvider('main')).toBeInstanceOf(PswinProvider)
    })

    it('should reject duplicate aliases', () => {
      const gateway = new Gateway({ logger })

      expect(() =>
        registerProviders(gateway, [
          { alias: 'dev', type: 'loopback', options: { logger } },
          { alias: 'dev', type: 'loopback', options: { logger } },
        ]),
      ).toThrow('Provider alias "dev" is already registered')
    })
  })
})
