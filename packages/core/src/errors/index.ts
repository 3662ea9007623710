/**
 * Error taxonomy for smsbridge
 *
 * - TransportError: the outbound HTTP call could not be completed
 * - GatewayError: the gateway answered with a non-2xx status
 * - DecodeError: an inbound callback is missing a field or has a malformed value
 *
 * Send-path errors are thrown to the caller of `Gateway.send()`.
 * Decode errors are contained by the receiver routes.
 */

/**
 * HTTP status codes that indicate a fatal/permanent failure.
 * Retrying a request that got one of these will not help.
 */
export const FATAL_HTTP_STATUS_CODES: ReadonlySet<number> = new Set([
  400, // Bad Request - malformed request
  401, // Unauthorized - invalid credentials
  403, // Forbidden - no permission
  404, // Not Found - resource doesn't exist
  410, // Gone - resource permanently removed
  422, // Unprocessable Entity - validation failed
])

/**
 * Check if an HTTP status code indicates a fatal (non-retryable) error.
 *
 * @returns true if the status indicates a fatal error
 */
export function isFatalHttpStatus(statusCode: number | undefined | null): boolean {
  if (!statusCode) {
    return false
  }
  return FATAL_HTTP_STATUS_CODES.has(statusCode)
}

/**
 * Base error class for smsbridge
 */
export class SmsBridgeError extends Error {
  constructor(
    message: string,
    public code?: string,
    public statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'SmsBridgeError'
  }
}

/**
 * The outbound HTTP request could not be completed (DNS, connection reset, ...)
 * Never classified by status code.
 */
export class TransportError extends SmsBridgeError {
  constructor(message: string, public originalError?: Error) {
    super(message, 'TRANSPORT_ERROR', undefined, { cause: originalError })
    this.name = 'TransportError'
  }
}

/**
 * The gateway responded with a non-2xx status
 */
export class GatewayError extends SmsBridgeError {
  declare code: string
  declare statusCode: number

  constructor(
    message: string,
    code: string,
    statusCode: number,
    public responseBody?: string,
  ) {
    super(message, code, statusCode)
    this.name = 'GatewayError'
  }

  /** Whether resending the same request is pointless */
  get isFatal(): boolean {
    return isFatalHttpStatus(this.statusCode)
  }
}

/**
 * An inbound callback could not be decoded
 */
export class DecodeError extends SmsBridgeError {
  constructor(
    message: string,
    public fields: string[] = [],
    public details?: Record<string, unknown>,
  ) {
    super(message, 'DECODE_ERROR')
    this.name = 'DecodeError'
  }
}

/**
 * Check if an error is a DecodeError instance.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError
}
