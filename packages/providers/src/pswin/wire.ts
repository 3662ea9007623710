import type { OutgoingMessage, WireFields } from '@smsbridge/core'
import { isRepresentable } from './charset.js'
import { encodeUcs2Hex } from './ucs2.js'

/** Content type for bodies sent as single-byte text in `TXT` */
export const CT_PLAIN_TEXT = '0'
/** Content type for bodies sent as hex-encoded UTF-16 in `HEX` */
export const CT_UCS2 = 'UCS2'

export type ContentType = typeof CT_PLAIN_TEXT | typeof CT_UCS2

export interface WireDefaults {
  /** Sender used when neither the message options nor `src` carry one; empty means none */
  senderId?: string
}

export interface EncodedMessage {
  fields: WireFields
  contentType: ContentType
  /** Body went out as UCS2 hex */
  isHex: boolean
}

/**
 * Translate an outgoing message into PSWin request fields
 *
 * The body is sent as plain text when every character is in the gateway
 * repertoire, and as UCS2 hex otherwise; never a mix of both.
 * Caller-supplied `providerOptions` are merged first so they can never
 * override the protocol fields.
 */
export function encodeMessage(message: OutgoingMessage, defaults: WireDefaults = {}): EncodedMessage {
  const fields: WireFields = { ...message.providerOptions }

  fields.RCV = message.dst

  const sender = message.options.senderId ?? message.src ?? defaults.senderId
  if (sender) {
    fields.SND = sender
  }

  const isHex = !isRepresentable(message.body)
  if (isHex) {
    fields.CT = CT_UCS2
    fields.HEX = encodeUcs2Hex(message.body)
    delete fields.TXT
  } else {
    fields.CT = CT_PLAIN_TEXT
    fields.TXT = message.body
    delete fields.HEX
  }

  if (message.options.statusReport) {
    fields.RCPREQ = 'Y'
  }
  if (message.options.expires !== undefined) {
    fields.TTL = String(message.options.expires)
  }

  return {
    fields,
    contentType: isHex ? CT_UCS2 : CT_PLAIN_TEXT,
    isHex,
  }
}
