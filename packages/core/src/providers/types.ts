import type { InboundMessage, StatusReport } from '../types/message.js'

/**
 * Flat key/value fields exchanged with a gateway
 */
export type WireFields = Record<string, string>

/**
 * Prepared message ready to be sent by a provider
 */
export interface PreparedMessage<TData = WireFields> {
  /** Provider name this message was prepared by */
  provider: string
  /** Provider-specific prepared data */
  data: TData
}

/**
 * Result of a successful send. Failures are thrown.
 */
export interface SendResult {
  /** Message ID assigned by the gateway, if it returns one */
  msgid?: string
  /** Provider-specific response data */
  data?: Record<string, unknown>
}

/**
 * Health check result
 */
export interface HealthCheckResult {
  ok: boolean
  error?: string
  details?: Record<string, unknown>
}

/**
 * Decodes inbound gateway callbacks into domain objects.
 * HTTP handling lives in the server; receivers only see parameters.
 */
export interface InboundReceiver {
  /**
   * Parse a raw query string or form body into callback fields
   * @param raw - Query string (without `?`) or request body
   */
  parseParams(raw: string | Uint8Array): WireFields

  /**
   * @throws {DecodeError} If a required field is missing or malformed
   */
  decodeMessage(fields: WireFields, alias: string): InboundMessage

  /**
   * @throws {DecodeError} If a required field is missing or malformed
   */
  decodeStatus(fields: WireFields, alias: string): StatusReport
}
