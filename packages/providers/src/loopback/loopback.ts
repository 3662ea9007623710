import type {
  Provider,
  OutgoingMessage,
  PreparedMessage,
  SendResult,
  HealthCheckResult,
  InboundReceiver,
  Logger,
} from '@smsbridge/core'
import {
  createSyncLogger,
  maskPhone,
  maskText,
  recordMessageSent,
  recordProviderError,
  GatewayError,
} from '@smsbridge/core'

/**
 * Simulation options for testing failure scenarios
 */
export interface LoopbackSimulation {
  /** Force all sends to fail with this error */
  forceError?: {
    code: string
    message: string
    statusCode?: number
  }
}

export interface LoopbackProviderOptions {
  logger?: Logger
  simulation?: LoopbackSimulation
  /**
   * Messages kept in the outbox; the oldest are dropped beyond this
   * @default 1000
   */
  outboxLimit?: number
}

const DEFAULT_OUTBOX_LIMIT = 1000

/**
 * Loopback provider
 *
 * Keeps sent messages in memory instead of sending them. Useful in
 * development and as a second provider in tests.
 */
export class LoopbackProvider implements Provider {
  readonly name = 'loopback'
  readonly outbox: PreparedMessage[] = []
  declare readonly receiver?: InboundReceiver
  private logger: Logger
  private simulation: LoopbackSimulation
  private outboxLimit: number
  private counter = 0

  constructor(options: LoopbackProviderOptions = {}) {
    this.logger = options.logger ?? createSyncLogger({ serviceName: 'smsbridge-loopback-provider' })
    this.simulation = options.simulation ?? {}
    this.outboxLimit = Math.max(1, options.outboxLimit ?? DEFAULT_OUTBOX_LIMIT)
  }

  /**
   * Empty the outbox. Message IDs keep counting up.
   */
  clear(): void {
    this.outbox.length = 0
  }

  /**
   * Update simulation settings (useful for tests)
   */
  setSimulation(simulation: LoopbackSimulation): void {
    this.simulation = simulation
  }

  validate(message: OutgoingMessage): void {
    if (!message.dst) {
      throw new Error('Message destination is required')
    }
  }

  prepare(message: OutgoingMessage): PreparedMessage {
    const data: Record<string, string> = {
      dst: message.dst,
      body: message.body,
    }
    const src = message.options.senderId ?? message.src
    if (src !== undefined) {
      data.src = src
    }
    return { provider: this.name, data }
  }

  async healthCheck(): Promise<HealthCheckResult> {
    return { ok: true, details: { loopback: true, sent: this.outbox.length } }
  }

  async send(prepared: PreparedMessage): Promise<SendResult> {
    const { forceError } = this.simulation
    if (forceError) {
      this.logger.warn(
        { provider: this.name, simulation: 'forceError', error: forceError },
        '🔁 [LOOPBACK] Simulating forced error',
      )
      recordMessageSent(this.name, 'error')
      recordProviderError(this.name, forceError.code)
      throw new GatewayError(forceError.message, forceError.code, forceError.statusCode ?? 500)
    }

    this.counter += 1
    const msgid = `loopback-${this.counter}`
    this.outbox.push(prepared)
    if (this.outbox.length > this.outboxLimit) {
      this.outbox.splice(0, this.outbox.length - this.outboxLimit)
    }

    this.logger.info(
      {
        provider: this.name,
        msgid,
        dst: maskPhone(prepared.data.dst ?? ''),
        body: maskText(prepared.data.body ?? ''),
      },
      '🔁 [LOOPBACK] Message stored',
    )
    recordMessageSent(this.name, 'success')

    return { msgid }
  }
}
