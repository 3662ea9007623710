import { z } from 'zod'
import { DecodeError } from '@smsbridge/core'
import type { InboundMessage, StatusReport, WireFields } from '@smsbridge/core'
import { mapState } from './status.js'

const required = z.string().min(1)

/**
 * Fields of a "message received" callback
 */
export const inboundMessageFieldsSchema = z.object({
  SND: required,
  RCV: required,
  TXT: z.string().default(''),
  REF: z.string().optional(),
})

/**
 * Fields of a "delivery status" callback
 */
export const statusFieldsSchema = z.object({
  REF: required,
  STATE: required,
  DELIVERYTIME: z.string().optional(),
})

const MESSAGE_FIELDS = ['SND', 'RCV', 'TXT', 'REF'] as const
const STATUS_FIELDS = ['REF', 'STATE', 'DELIVERYTIME'] as const

function parseFields<T extends z.ZodTypeAny>(
  schema: T,
  fields: WireFields,
  kind: string,
): z.output<T> {
  const result = schema.safeParse(fields)
  if (!result.success) {
    const names = [...new Set(result.error.issues.map((issue) => String(issue.path[0])))]
    throw new DecodeError(`Invalid ${kind} callback: missing or empty ${names.join(', ')}`, names, {
      issues: result.error.issues,
    })
  }
  return result.data
}

function remainingFields(fields: WireFields, consumed: readonly string[]): Record<string, string> {
  const meta: Record<string, string> = {}
  for (const [key, value] of Object.entries(fields)) {
    if (!consumed.includes(key)) {
      meta[key] = value
    }
  }
  return meta
}

const DELIVERY_TIME = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})$/

/**
 * Parse a `YYYYMMDDHHmm` delivery time, read as UTC
 * @throws {DecodeError} If the value is not a valid date and time
 */
export function parseDeliveryTime(value: string): Date {
  const match = DELIVERY_TIME.exec(value)
  if (!match) {
    throw new DecodeError(`Invalid DELIVERYTIME "${value}": expected YYYYMMDDHHmm`, ['DELIVERYTIME'])
  }

  const [year, month, day, hour, minute] = match.slice(1).map(Number)
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute))

  // Date.UTC rolls over out-of-range parts (month 13, minute 61, ...)
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute
  ) {
    throw new DecodeError(`Invalid DELIVERYTIME "${value}": out of range`, ['DELIVERYTIME'])
  }

  return date
}

/**
 * Decode a "message received" callback
 *
 * TXT arrives already decoded from the gateway's single-byte charset. The
 * gateway replaces characters it cannot carry with "?" before calling us;
 * those are passed through as they are.
 *
 * @throws {DecodeError} If SND or RCV is missing
 */
export function decodeMessage(fields: WireFields, provider: string): InboundMessage {
  const parsed = parseFields(inboundMessageFieldsSchema, fields, 'message')

  return Object.freeze({
    provider,
    msgid: parsed.REF,
    src: parsed.SND,
    dst: parsed.RCV,
    body: parsed.TXT,
    meta: Object.freeze(remainingFields(fields, MESSAGE_FIELDS)),
  })
}

/**
 * Decode a "delivery status" callback
 *
 * @throws {DecodeError} If REF or STATE is missing, or DELIVERYTIME is malformed
 */
export function decodeStatus(fields: WireFields, provider: string): StatusReport {
  const parsed = parseFields(statusFieldsSchema, fields, 'status')
  const timestamp = parsed.DELIVERYTIME ? parseDeliveryTime(parsed.DELIVERYTIME) : undefined

  return Object.freeze({
    provider,
    msgid: parsed.REF,
    status: mapState(parsed.STATE),
    code: parsed.STATE,
    timestamp,
    meta: Object.freeze(remainingFields(fields, STATUS_FIELDS)),
  })
}
