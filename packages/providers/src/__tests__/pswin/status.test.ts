import { describe, it, expect } from 'vitest'
import { mapState, isPswinState, PSWIN_STATES } from '../../pswin/status.js'

describe('PSWin delivery states', () => {
  it.each([
    ['DELIVRD', 'delivered'],
    ['UNDELIV', 'undelivered'],
    ['EXPIRED', 'expired'],
    ['DELETED', 'deleted'],
    ['ACCEPTD', 'accepted'],
    ['REJECTD', 'rejected'],
    ['FAILED', 'failed'],
    ['UNKNOWN', 'unknown'],
  ])('should map %s to %s', (code, status) => {
    expect(mapState(code)).toBe(status)
  })

  it('should map unrecognized codes to unknown', () => {
    expect(mapState('BOUNCED')).toBe('unknown')
    expect(mapState('delivrd')).toBe('unknown')
    expect(mapState('')).toBe('unknown')
  })

  it('should not match inherited object properties', () => {
    expect(isPswinState('toString')).toBe(false)
    expect(mapState('constructor')).toBe('unknown')
  })

  it('should cover every listed state', () => {
    expect(Object.keys(PSWIN_STATES).every(isPswinState)).toBe(true)
  })
})
