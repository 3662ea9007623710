import type { Provider } from '../providers/base.js'
import type { InboundMessage, OutgoingMessage, StatusReport } from '../types/message.js'
import type { Logger } from '../logger/index.js'
import { createSyncLogger } from '../logger/index.js'
import { maskPhone } from '../logger/masking.js'
import { SmsBridgeError } from '../errors/index.js'

export type SendListener = (message: OutgoingMessage) => void | Promise<void>
export type ReceiveListener = (message: InboundMessage) => void | Promise<void>
export type StatusListener = (report: StatusReport) => void | Promise<void>

/**
 * Picks a provider alias for a message that does not name one.
 * Returning undefined falls back to the default provider.
 */
export type MessageRouter = (
  message: OutgoingMessage,
  aliases: readonly string[],
) => string | undefined

export interface GatewayOptions {
  logger?: Logger
  router?: MessageRouter
}

/**
 * Dispatch gateway
 *
 * Holds the configured providers under their aliases, sends outgoing
 * messages through them and fans inbound messages and status reports out
 * to application listeners. Providers are handed in by the host; nothing
 * registers itself.
 *
 * @example
 * ```typescript
 * const gateway = new Gateway()
 * gateway.addProvider('main', new PswinProvider({ user: 'acme', password: 'secret' }))
 * gateway.onReceive((message) => console.log(message.body))
 *
 * await gateway.send(createOutgoingMessage('+4712345678', 'Hei på deg'))
 * ```
 */
export class Gateway {
  private providers: Map<string, Provider> = new Map()
  private defaultAlias?: string
  private router?: MessageRouter
  private logger: Logger

  private sendListeners: SendListener[] = []
  private receiveListeners: ReceiveListener[] = []
  private statusListeners: StatusListener[] = []

  constructor(options: GatewayOptions = {}) {
    this.logger = options.logger ?? createSyncLogger({ serviceName: 'smsbridge-gateway' })
    this.router = options.router
  }

  /**
   * Register a provider under an alias. The first one registered becomes the default.
   * @throws {SmsBridgeError} If the alias is already taken
   */
  addProvider(alias: string, provider: Provider, options: { default?: boolean } = {}): void {
    if (this.providers.has(alias)) {
      throw new SmsBridgeError(`Provider alias "${alias}" is already registered`, 'DUPLICATE_PROVIDER')
    }
    this.providers.set(alias, provider)
    if (options.default || this.defaultAlias === undefined) {
      this.defaultAlias = alias
    }
    this.logger.debug({ alias, provider: provider.name }, 'Provider registered')
  }

  /**
   * @throws {SmsBridgeError} If no provider has this alias
   */
  getProvider(alias: string): Provider {
    const provider = this.providers.get(alias)
    if (!provider) {
      throw new SmsBridgeError(`Provider "${alias}" is not registered`, 'UNKNOWN_PROVIDER')
    }
    return provider
  }

  /** Registered aliases in registration order */
  get aliases(): string[] {
    return [...this.providers.keys()]
  }

  get defaultProvider(): string | undefined {
    return this.defaultAlias
  }

  /** Alias/provider pairs in registration order */
  entries(): Array<[string, Provider]> {
    return [...this.providers.entries()]
  }

  /**
   * Send a message through its provider
   *
   * Resolves with the same message object, with `provider` set to the alias
   * used and `msgid` set when the gateway returned one.
   *
   * @throws {SmsBridgeError} If no provider can be resolved
   * @throws {GatewayError} If the gateway rejects the message
   * @throws {TransportError} If the gateway could not be reached
   */
  async send(message: OutgoingMessage): Promise<OutgoingMessage> {
    const alias = this.resolveAlias(message)
    const provider = this.getProvider(alias)

    provider.validate(message)
    const prepared = provider.prepare(message)
    const result = await provider.send(prepared)

    message.provider = alias
    message.msgid = result.msgid

    this.logger.info(
      { provider: alias, dst: maskPhone(message.dst), msgid: message.msgid },
      'Message sent',
    )

    for (const listener of [...this.sendListeners]) {
      await listener(message)
    }

    return message
  }

  /**
   * Deliver an inbound message to the application listeners.
   * Listener errors propagate to the caller (the receiver route).
   */
  async receiveMessage(message: InboundMessage): Promise<void> {
    for (const listener of [...this.receiveListeners]) {
      await listener(message)
    }
  }

  /**
   * Deliver a status report to the application listeners.
   * Listener errors propagate to the caller (the receiver route).
   */
  async receiveStatus(report: StatusReport): Promise<void> {
    for (const listener of [...this.statusListeners]) {
      await listener(report)
    }
  }

  /** @returns Function removing the listener */
  onSend(listener: SendListener): () => void {
    return subscribe(this.sendListeners, listener)
  }

  /** @returns Function removing the listener */
  onReceive(listener: ReceiveListener): () => void {
    return subscribe(this.receiveListeners, listener)
  }

  /** @returns Function removing the listener */
  onStatus(listener: StatusListener): () => void {
    return subscribe(this.statusListeners, listener)
  }

  private resolveAlias(message: OutgoingMessage): string {
    if (message.provider) {
      return message.provider
    }

    const routed = this.router?.(message, this.aliases)
    const alias = routed ?? this.defaultAlias
    if (alias === undefined) {
      throw new SmsBridgeError('No providers registered', 'UNKNOWN_PROVIDER')
    }
    return alias
  }
}

function subscribe<T>(listeners: T[], listener: T): () => void {
  listeners.push(listener)
  return () => {
    const index = listeners.indexOf(listener)
    if (index !== -1) {
      listeners.splice(index, 1)
    }
  }
}
