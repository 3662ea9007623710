import { createHash } from 'crypto'

/**
 * PII masking utilities for system logs
 *
 * Phone numbers and message text must never reach the logs in clear.
 */

/**
 * Hash a value for pseudonymization
 * Useful for correlating log lines without revealing PII
 *
 * @param length - Number of characters to return (default: 12)
 * @returns Truncated SHA-256 hash
 */
export function hashPii(value: string, length: number = 12): string {
  if (!value) return '[invalid]'
  return createHash('sha256').update(value).digest('hex').slice(0, length)
}

/**
 * Mask a phone number or sender ID
 * Example: "+4712345678" -> "+4***678"
 */
export function maskPhone(phone: string): string {
  if (!phone) return '[invalid-phone]'
  if (phone.length <= 4) return '****'

  const prefix = phone.slice(0, 2)
  const suffix = phone.slice(-3)
  return `${prefix}***${suffix}`
}

/**
 * Replace message text by its length
 * Example: "hello there" -> "[11 chars]"
 */
export function maskText(text: string): string {
  return `[${text.length} chars]`
}

/** Wire fields carrying phone numbers */
const PHONE_FIELDS: ReadonlySet<string> = new Set(['RCV', 'SND'])

/** Wire fields carrying message text */
const TEXT_FIELDS: ReadonlySet<string> = new Set(['TXT', 'HEX'])

/** Wire fields carrying credentials */
const SECRET_FIELDS: ReadonlySet<string> = new Set(['USER', 'PW'])

/**
 * Mask a flat gateway field set for logging
 * Creates a copy with phone numbers, text and credentials masked
 */
export function maskWireFields(fields: Readonly<Record<string, string>>): Record<string, string> {
  const masked: Record<string, string> = {}

  for (const [key, value] of Object.entries(fields)) {
    if (PHONE_FIELDS.has(key)) {
      masked[key] = maskPhone(value)
    } else if (TEXT_FIELDS.has(key)) {
      masked[key] = maskText(value)
    } else if (SECRET_FIELDS.has(key)) {
      masked[key] = '***'
    } else {
      masked[key] = value
    }
  }

  return masked
}
