import type { DeliveryStatus } from '@smsbridge/core'

/**
 * PSWin `STATE` values of delivery status callbacks
 */
export const PSWIN_STATES = {
  DELIVRD: 'delivered',
  UNDELIV: 'undelivered',
  EXPIRED: 'expired',
  DELETED: 'deleted',
  ACCEPTD: 'accepted',
  REJECTD: 'rejected',
  FAILED: 'failed',
  UNKNOWN: 'unknown',
} as const satisfies Record<string, DeliveryStatus>

export type PswinState = keyof typeof PSWIN_STATES

export function isPswinState(code: string): code is PswinState {
  return Object.prototype.hasOwnProperty.call(PSWIN_STATES, code)
}

/**
 * Map a wire `STATE` to a delivery status.
 * Codes outside the table map to 'unknown' rather than failing.
 */
export function mapState(code: string): DeliveryStatus {
  return isPswinState(code) ? PSWIN_STATES[code] : 'unknown'
}
