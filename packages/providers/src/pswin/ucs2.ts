import { DecodeError } from '@smsbridge/core'

/**
 * Hex-encode text as UTF-16BE code units, 4 lowercase hex digits per unit.
 * Characters outside the BMP take two units (a surrogate pair).
 *
 * @example encodeUcs2Hex('מה') === '05de05d4'
 */
export function encodeUcs2Hex(text: string): string {
  let hex = ''
  for (let i = 0; i < text.length; i++) {
    hex += text.charCodeAt(i).toString(16).padStart(4, '0')
  }
  return hex
}

const UCS2_HEX = /^(?:[0-9a-fA-F]{4})*$/

/**
 * Inverse of encodeUcs2Hex
 * @throws {DecodeError} If the input is not a sequence of 4-digit hex units
 */
export function decodeUcs2Hex(hex: string): string {
  if (!UCS2_HEX.test(hex)) {
    throw new DecodeError('HEX must be a sequence of 4-digit hex code units', ['HEX'])
  }

  let text = ''
  for (let i = 0; i < hex.length; i += 4) {
    text += String.fromCharCode(parseInt(hex.slice(i, i + 4), 16))
  }
  return text
}
