import { z } from 'zod'
import type { OutgoingMessage } from '../types/message.js'

/**
 * Message options schema
 */
export const messageOptionsSchema = z.object({
  senderId: z.string().min(1, 'Sender ID cannot be empty').optional(),
  statusReport: z.boolean().optional(),
  expires: z.number().int().positive('Expiry must be a positive number of minutes').optional(),
})

/**
 * Outgoing message schema
 */
export const outgoingMessageSchema = z.object({
  dst: z.string().min(1, 'Destination is required'),
  body: z.string(),
  src: z.string().min(1).optional(),
  provider: z.string().min(1).optional(),
  options: messageOptionsSchema.default({}),
  providerOptions: z.record(z.string()).default({}),
  annotations: z.record(z.unknown()).default({}),
  msgid: z.string().optional(),
})

export type OutgoingMessageInit = Partial<
  Pick<OutgoingMessage, 'src' | 'provider' | 'options' | 'providerOptions'>
>

/**
 * Create a validated outgoing message
 *
 * @example
 * ```typescript
 * const message = createOutgoingMessage('+4712345678', 'Hei', {
 *   options: { senderId: 'Acme' },
 * })
 * ```
 * @throws {z.ZodError} If validation fails
 */
export function createOutgoingMessage(
  dst: string,
  body: string,
  init: OutgoingMessageInit = {},
): OutgoingMessage {
  return validateOutgoingMessage({ dst, body, ...init })
}

/**
 * Validate an outgoing message against the schema
 * @throws {z.ZodError} If validation fails
 */
export function validateOutgoingMessage(message: unknown): OutgoingMessage {
  return outgoingMessageSchema.parse(message)
}

/**
 * Safely validate an outgoing message and return result
 */
export function safeValidateOutgoingMessage(message: unknown): {
  success: boolean
  data?: OutgoingMessage
  error?: z.ZodError
} {
  const result = outgoingMessageSchema.safeParse(message)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, error: result.error }
}
