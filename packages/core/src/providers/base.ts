import type { OutgoingMessage } from '../types/message.js'
import type {
  HealthCheckResult,
  InboundReceiver,
  PreparedMessage,
  SendResult,
} from './types.js'

/**
 * Base interface for all SMS providers
 * Providers transform outgoing messages into actual API calls to a gateway
 */
export interface Provider {
  /** Provider implementation name (e.g. 'pswin') */
  readonly name: string

  /**
   * Validate that the message can be processed by this provider
   * @throws {Error} If the message is invalid for this provider
   */
  validate(message: OutgoingMessage): void

  /**
   * Prepare the message for sending by transforming it into provider-specific format.
   * May record annotations on the message.
   */
  prepare(message: OutgoingMessage): PreparedMessage

  /**
   * Send the prepared message to the gateway
   * @throws {GatewayError} If the gateway rejects the request
   * @throws {TransportError} If the request could not be completed
   */
  send(prepared: PreparedMessage): Promise<SendResult>

  /**
   * Check if the provider is properly configured
   */
  healthCheck?(): Promise<HealthCheckResult>

  /** Present when the provider accepts inbound callbacks */
  readonly receiver?: InboundReceiver
}
