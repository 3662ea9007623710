/**
 * Delivery options understood by every provider.
 * Providers translate them into their own wire fields.
 */
export interface MessageOptions {
  /** Sender ID override (alphanumeric or phone number) */
  senderId?: string
  /** Ask the gateway for a delivery status report */
  statusReport?: boolean
  /** Validity period in minutes */
  expires?: number
}

/**
 * Outgoing SMS created by the application
 *
 * Providers may attach `annotations` while preparing the message
 * (e.g. `isHex` when the body was sent in UCS2 mode). The annotations stay
 * visible to the caller after `Gateway.send()` resolves.
 */
export interface OutgoingMessage {
  /** Destination phone number */
  dst: string
  /** Message text */
  body: string
  /** Source phone number or sender ID */
  src?: string
  /** Alias of the provider to send through (defaults to the gateway's default) */
  provider?: string
  options: MessageOptions
  /** Provider-specific wire fields passed through as-is */
  providerOptions: Record<string, string>
  /** Set by providers */
  annotations: Record<string, unknown>
  /** Message ID assigned by the provider, when it returns one */
  msgid?: string
}

/**
 * Delivery status values
 */
export type DeliveryStatus =
  | 'accepted'
  | 'delivered'
  | 'expired'
  | 'deleted'
  | 'undelivered'
  | 'rejected'
  | 'failed'
  | 'unknown'

/**
 * Inbound SMS received from a gateway callback
 */
export interface InboundMessage {
  /** Alias of the provider that received it */
  readonly provider: string
  /** Gateway reference, when the callback carries one */
  readonly msgid?: string
  readonly src: string
  readonly dst: string
  readonly body: string
  /** Remaining callback fields, unmodified */
  readonly meta: Readonly<Record<string, string>>
}

/**
 * Delivery status report received from a gateway callback
 */
export interface StatusReport {
  readonly provider: string
  readonly msgid: string
  readonly status: DeliveryStatus
  /** Status code exactly as the gateway sent it */
  readonly code: string
  /** Delivery time reported by the gateway */
  readonly timestamp?: Date
  readonly meta: Readonly<Record<string, string>>
}
