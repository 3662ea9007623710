import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  Gateway,
  TransportError,
  createOutgoingMessage,
  createSyncLogger,
} from '@smsbridge/core'
import { PswinProvider } from '../../pswin/pswin.js'
import { PswinError } from '../../pswin/errors.js'
import type { HttpResponse, HttpTransport } from '../../pswin/api.js'

interface RecordedRequest {
  url: string
  body: string
  headers: Record<string, string>
}

class StubTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = []
  response: HttpResponse | Error = { status: 200, body: '' }

  async post(url: string, body: string, headers: Record<string, string>): Promise<HttpResponse> {
    this.requests.push({ url, body, headers })
    if (this.response instanceof Error) {
      throw this.response
    }
    return this.response
  }
}

const logger = createSyncLogger({ level: 'silent' })

describe('PswinProvider', () => {
  let transport: StubTransport
  let provider: PswinProvider

  beforeEach(() => {
    vi.stubEnv('PSWIN_API_URL', '')
    vi.stubEnv('PSWIN_SENDER_ID', '')
    transport = new StubTransport()
    provider = new PswinProvider({
      logger,
      user: 'acme',
      password: 'test-secret',
      senderId: 'Acme',
      transport,
    })
  })

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  describe('constructor', () => {
    it('should require a user', () => {
      vi.stubEnv('PSWIN_USER', '')

      expect(() => new PswinProvider({ logger, password: 'test-secret' })).toThrow(
        'PSWIN_USER is required for PswinProvider',
      )
    })

    it('should require a password', () => {
      vi.stubEnv('PSWIN_PASSWORD', '')

      expect(() => new PswinProvider({ logger, user: 'acme' })).toThrow(
        'PSWIN_PASSWORD is required for PswinProvider',
      )
    })

    it('should read credentials and endpoint from the environment', () => {
      vi.stubEnv('PSWIN_USER', 'env-user')
      vi.stubEnv('PSWIN_PASSWORD', 'test-secret')
      vi.stubEnv('PSWIN_API_URL', 'https://gateway.test/sms')

      const fromEnv = new PswinProvider({ logger })

      expect(fromEnv.api.apiUrl).toBe('https://gateway.test/sms')
    })

    it('should default to the public endpoint', () => {
      expect(provider.api.apiUrl).toBe('https://simple.pswin.com/')
    })
  })

  describe('prepare', () => {
    it('should produce PSWin fields', () => {
      const prepared = provider.prepare(createOutgoingMessage('4712345678', 'Hei på deg'))

      expect(prepared).toEqual({
        provider: 'pswin',
        data: { RCV: '4712345678', SND: 'Acme', CT: '0', TXT: 'Hei på deg' },
      })
    })

    it('should annotate hex bodies and clear the annotation otherwise', () => {
      const message = createOutgoingMessage('4712345678', 'Vamos a aprender chino 玩.')

      provider.prepare(message)
      expect(message.annotations.isHex).toBe(true)

      message.body = 'Vamos a aprender chino.'
      provider.prepare(message)
      expect('isHex' in message.annotations).toBe(false)
    })
  })

  describe('send', () => {
    it('should post form-encoded fields with credentials', async () => {
      const prepared = provider.prepare(createOutgoingMessage('4712345678', 'Hei på deg'))

      const result = await provider.send(prepared)

      expect(result).toEqual({ data: { status: 200 } })
      expect(result.msgid).toBeUndefined()
      expect(transport.requests).toEqual([
        {
          url: 'https://simple.pswin.com/',
          body: 'RCV=4712345678&SND=Acme&CT=0&TXT=Hei+p%E5+deg&USER=acme&PW=test-secret',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded; charset=ISO-8859-1' },
        },
      ])
    })

    it('should post hex bodies', async () => {
      const prepared = provider.prepare(createOutgoingMessage('4712345678', 'מה קורה?'))

      await provider.send(prepared)

      expect(transport.requests[0]?.body).toBe(
        'RCV=4712345678&SND=Acme&CT=UCS2&HEX=05de05d4002005e705d505e805d4003f&USER=acme&PW=test-secret',
      )
    })

    it('should throw E001 on HTTP 500', async () => {
      transport.response = { status: 500, body: 'oops' }
      const prepared = provider.prepare(createOutgoingMessage('4712345678', 'Hei'))

      await expect(provider.send(prepared)).rejects.toBeInstanceOf(PswinError)
      await expect(provider.send(prepared)).rejects.toMatchObject({
        code: 'E001',
        statusCode: 500,
        message: 'E001: Internal gateway error',
        responseBody: 'oops',
      })
    })

    it('should throw E003 on HTTP 401', async () => {
      transport.response = { status: 401, body: '' }
      const prepared = provider.prepare(createOutgoingMessage('4712345678', 'Hei'))

      await expect(provider.send(prepared)).rejects.toMatchObject({
        code: 'E003',
        statusCode: 401,
        message: 'E003: Authentication failed',
      })
    })

    it('should wrap network failures in a TransportError', async () => {
      transport.response = new Error('connect ECONNREFUSED')
      const prepared = provider.prepare(createOutgoingMessage('4712345678', 'Hei'))

      await expect(provider.send(prepared)).rejects.toBeInstanceOf(TransportError)
      await expect(provider.send(prepared)).rejects.toThrow(
        'Failed to reach PSWin gateway: connect ECONNREFUSED',
      )
    })

    it('should not send SND for an empty sender ID', async () => {
      const blank = new PswinProvider({
        logger,
        user: 'acme',
        password: 'test-secret',
        senderId: '',
        transport,
      })

      await blank.send(blank.prepare(createOutgoingMessage('4712345678', 'Hei')))

      expect(transport.requests[0]?.body).toBe('RCV=4712345678&CT=0&TXT=Hei&USER=acme&PW=test-secret')
    })

    it('should post to a configured endpoint', async () => {
      const custom = new PswinProvider({
        logger,
        user: 'acme',
        password: 'test-secret',
        apiUrl: 'https://gateway.test/sms',
        transport,
      })

      await custom.send(custom.prepare(createOutgoingMessage('4712345678', 'Hei')))

      expect(transport.requests[0]?.url).toBe('https://gateway.test/sms')
      expect(transport.requests[0]?.body).toBe('RCV=4712345678&CT=0&TXT=Hei&USER=acme&PW=test-secret')
    })
  })

  describe('through the gateway', () => {
    it('should send and leave msgid unset', async () => {
      const gateway = new Gateway({ logger })
      gateway.addProvider('main', provider)

      const message = await gateway.send(
        createOutgoingMessage('4712345678', 'Vamos a aprender chino 玩.', {
          options: { statusReport: true },
        }),
      )

      expect(message.provider).toBe('main')
      expect(message.msgid).toBeUndefined()
      expect(message.annotations.isHex).toBe(true)
      expect(transport.requests[0]?.body).toContain('&RCPREQ=Y&')
    })
  })

  describe('healthCheck', () => {
    it('should report the configuration', async () => {
      expect(await provider.healthCheck()).toEqual({
        ok: true,
        details: { apiUrl: 'https://simple.pswin.com/', senderId: 'Acme' },
      })
    })
  })

  describe('receiver', () => {
    it('should decode message callbacks from raw parameters', () => {
      const fields = provider.receiver.parseParams('SND=4712345678&RCV=2027&TXT=Hei+p%e5+deg')

      expect(provider.receiver.decodeMessage(fields, 'main')).toMatchObject({
        provider: 'main',
        src: '4712345678',
        dst: '2027',
        body: 'Hei på deg',
      })
    })

    it('should decode status callbacks', () => {
      const fields = provider.receiver.parseParams('REF=r-1&STATE=REJECTD')

      expect(provider.receiver.decodeStatus(fields, 'main')).toMatchObject({
        msgid: 'r-1',
        status: 'rejected',
        code: 'REJECTD',
      })
    })
  })
})
