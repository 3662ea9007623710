import type {
  Provider,
  OutgoingMessage,
  PreparedMessage,
  SendResult,
  HealthCheckResult,
  InboundReceiver,
  InboundMessage,
  StatusReport,
  WireFields,
  Logger,
} from '@smsbridge/core'
import {
  createSyncLogger,
  maskPhone,
  maskWireFields,
  recordMessageSent,
  recordProcessingDuration,
  recordProviderError,
  TransportError,
} from '@smsbridge/core'
import { trace, SpanStatusCode } from '@opentelemetry/api'
import { PswinHttpApi, DEFAULT_API_URL, type HttpTransport } from './api.js'
import { classifyResponse } from './errors.js'
import { encodeMessage } from './wire.js'
import { decodeForm } from './form.js'
import { decodeMessage, decodeStatus } from './decoder.js'

/**
 * PSWin provider options
 */
export interface PswinProviderOptions {
  logger?: Logger
  /** Account username (defaults to PSWIN_USER env var) */
  user?: string
  /** Account password (defaults to PSWIN_PASSWORD env var) */
  password?: string
  /** Default sender ID (defaults to PSWIN_SENDER_ID env var) */
  senderId?: string
  /** Gateway endpoint (defaults to PSWIN_API_URL env var, then https://simple.pswin.com/) */
  apiUrl?: string
  /** HTTP transport (defaults to global fetch) */
  transport?: HttpTransport
}

const tracer = trace.getTracer('smsbridge-pswin-provider')

/**
 * PSWin provider implementation
 *
 * Sends SMS through the PSWin HTTP API and decodes its inbound message and
 * delivery status callbacks.
 *
 * Bodies the gateway can carry in its single-byte repertoire go out as plain
 * text (`CT=0`, `TXT`); anything else goes out as UCS2 hex (`CT=UCS2`, `HEX`)
 * and the message is annotated with `isHex: true`.
 *
 * @example
 * ```typescript
 * const provider = new PswinProvider({
 *   user: 'acme',
 *   password: 'secret',
 *   senderId: 'Acme',
 * })
 * gateway.addProvider('main', provider)
 * ```
 */
export class PswinProvider implements Provider {
  readonly name = 'pswin'
  readonly api: PswinHttpApi
  readonly receiver: InboundReceiver
  private logger: Logger
  private senderId?: string

  constructor(options?: PswinProviderOptions) {
    this.logger = options?.logger ?? createSyncLogger({ serviceName: 'smsbridge-pswin-provider' })

    const user = options?.user ?? process.env.PSWIN_USER
    const password = options?.password ?? process.env.PSWIN_PASSWORD

    if (!user) {
      throw new Error('PSWIN_USER is required for PswinProvider')
    }

    if (!password) {
      throw new Error('PSWIN_PASSWORD is required for PswinProvider')
    }

    this.senderId = options?.senderId || process.env.PSWIN_SENDER_ID || undefined
    this.api = new PswinHttpApi({
      user,
      password,
      apiUrl: options?.apiUrl ?? (process.env.PSWIN_API_URL || DEFAULT_API_URL),
      transport: options?.transport,
    })

    this.receiver = {
      parseParams: (raw) => decodeForm(raw),
      decodeMessage: (fields, alias) => this.decodeMessage(fields, alias),
      decodeStatus: (fields, alias) => this.decodeStatus(fields, alias),
    }
  }

  /**
   * Validate that the message can be sent via PSWin
   */
  validate(message: OutgoingMessage): void {
    if (!message.dst) {
      throw new Error('Message destination is required')
    }
  }

  /**
   * Prepare the message for the PSWin API and record which body encoding was chosen
   */
  prepare(message: OutgoingMessage): PreparedMessage {
    const encoded = encodeMessage(message, { senderId: this.senderId })

    if (encoded.isHex) {
      message.annotations.isHex = true
    } else {
      delete message.annotations.isHex
    }

    return {
      provider: this.name,
      data: encoded.fields,
    }
  }

  /**
   * Check if the provider is properly configured.
   * PSWin has no status endpoint, so this reports configuration only.
   */
  async healthCheck(): Promise<HealthCheckResult> {
    return {
      ok: true,
      details: {
        apiUrl: this.api.apiUrl,
        senderId: this.senderId,
      },
    }
  }

  /**
   * Send SMS via PSWin
   * @throws {PswinError} If the gateway answers with a non-2xx status
   * @throws {TransportError} If the gateway could not be reached
   */
  async send(prepared: PreparedMessage): Promise<SendResult> {
    const startTime = Date.now()

    return tracer.startActiveSpan('pswin.send', async (span) => {
      const fields = prepared.data

      span.setAttribute('messaging.system', 'pswin')
      span.setAttribute('messaging.operation', 'send')
      span.setAttribute('messaging.destination.kind', 'sms')
      span.setAttribute('content_type', fields.CT ?? '')

      this.logger.info(
        { provider: this.name, fields: maskWireFields(fields) },
        '📱 [PSWIN] Sending SMS',
      )

      try {
        const response = await this.api.request(fields)
        const outcome = classifyResponse(response.status, response.body)
        span.setAttribute('http.response.status_code', response.status)

        if (!outcome.ok) {
          throw outcome.error
        }

        span.setStatus({ code: SpanStatusCode.OK })
        recordMessageSent(this.name, 'success')

        this.logger.info(
          { provider: this.name, dst: maskPhone(fields.RCV ?? ''), status: response.status },
          '📱 [PSWIN] SMS sent successfully',
        )

        return { data: { status: response.status } }
      } catch (error: unknown) {
        const err = error instanceof Error ? error : new Error(String(error))
        const code = errorCode(err)

        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message })
        span.recordException(err)
        recordMessageSent(this.name, 'error')
        recordProviderError(this.name, code)

        this.logger.error({ provider: this.name, err }, '📱 [PSWIN] Failed to send SMS')
        throw err
      } finally {
        recordProcessingDuration(this.name, Date.now() - startTime)
        span.end()
      }
    })
  }

  /**
   * Decode a "message received" callback
   * @throws {DecodeError} If SND or RCV is missing
   */
  decodeMessage(fields: WireFields, alias: string): InboundMessage {
    const message = decodeMessage(fields, alias)
    this.logger.debug(
      { provider: alias, src: maskPhone(message.src), msgid: message.msgid },
      '📱 [PSWIN] Message received',
    )
    return message
  }

  /**
   * Decode a "delivery status" callback
   * @throws {DecodeError} If REF or STATE is missing, or DELIVERYTIME is malformed
   */
  decodeStatus(fields: WireFields, alias: string): StatusReport {
    const report = decodeStatus(fields, alias)
    if (report.status === 'unknown' && report.code !== 'UNKNOWN') {
      this.logger.warn({ provider: alias, msgid: report.msgid, state: report.code }, '📱 [PSWIN] Unrecognized STATE')
    }
    return report
  }
}

function errorCode(error: Error): string {
  if (error instanceof TransportError) return 'TRANSPORT_ERROR'
  if ('code' in error && typeof error.code === 'string') return error.code
  return 'PSWIN_EXCEPTION'
}
