import { GatewayError } from '@smsbridge/core'

/**
 * PSWin error conditions.
 * Any non-2xx status not listed here is reported as E000.
 */
export const PSWIN_ERRORS = [
  { code: 'E001', status: 500, message: 'Internal gateway error' },
  { code: 'E002', status: 400, message: 'Malformed request' },
  { code: 'E003', status: 401, message: 'Authentication failed' },
  { code: 'E004', status: 403, message: 'Access denied' },
  { code: 'E005', status: 404, message: 'Unknown endpoint' },
  { code: 'E006', status: 503, message: 'Gateway unavailable' },
] as const

type PswinErrorEntry = (typeof PSWIN_ERRORS)[number]

export type KnownPswinErrorCode = PswinErrorEntry['code']
export type PswinErrorCode = KnownPswinErrorCode | 'E000'

const ERROR_BY_STATUS = new Map<number, PswinErrorEntry>(
  PSWIN_ERRORS.map((entry) => [entry.status, entry]),
)

/**
 * Error returned by the PSWin gateway
 */
export class PswinError extends GatewayError {
  declare code: PswinErrorCode

  constructor(code: PswinErrorCode, statusCode: number, message: string, responseBody?: string) {
    super(message, code, statusCode, responseBody)
    this.name = 'PswinError'
  }

  /**
   * Build the error for a non-2xx HTTP status
   */
  static fromStatus(statusCode: number, responseBody?: string): PswinError {
    const entry = ERROR_BY_STATUS.get(statusCode)
    const body = responseBody?.trim() || undefined

    if (entry === undefined) {
      return new PswinError('E000', statusCode, `Unexpected gateway response: HTTP ${statusCode}`, body)
    }
    return new PswinError(entry.code, statusCode, `${entry.code}: ${entry.message}`, body)
  }
}

export type ClassifiedResponse = { ok: true } | { ok: false; error: PswinError }

/**
 * Map a gateway HTTP response to success or a PSWin error. Never throws.
 * PSWin returns no message ID, so success carries nothing.
 */
export function classifyResponse(statusCode: number, body?: string): ClassifiedResponse {
  if (Number.isInteger(statusCode) && statusCode >= 200 && statusCode < 300) {
    return { ok: true }
  }
  return { ok: false, error: PswinError.fromStatus(statusCode, body) }
}

/**
 * Check if an error is a PswinError, optionally with a given code
 */
export function isPswinError(error: unknown, code?: PswinErrorCode): error is PswinError {
  return error instanceof PswinError && (code === undefined || error.code === code)
}
