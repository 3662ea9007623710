import type { WireFields } from '@smsbridge/core'
import { pswinCharset, type SingleByteCharset } from './charset.js'

const AMPERSAND = 0x26
const EQUALS = 0x3d
const PLUS = 0x2b
const PERCENT = 0x25
const SPACE = 0x20

/** Bytes left unescaped by application/x-www-form-urlencoded */
function isUnreserved(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) || // 0-9
    (byte >= 0x41 && byte <= 0x5a) || // A-Z
    (byte >= 0x61 && byte <= 0x7a) || // a-z
    byte === 0x2a || // *
    byte === 0x2d || // -
    byte === 0x2e || // .
    byte === 0x5f // _
  )
}

function escapeBytes(bytes: Uint8Array): string {
  let out = ''
  for (const byte of bytes) {
    if (isUnreserved(byte)) {
      out += String.fromCharCode(byte)
    } else if (byte === SPACE) {
      out += '+'
    } else {
      out += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`
    }
  }
  return out
}

function hexValue(byte: number | undefined): number {
  if (byte === undefined) return -1
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10
  return -1
}

function unescapeBytes(bytes: Uint8Array): Uint8Array {
  const out: number[] = []
  for (let i = 0; i < bytes.length; i++) {
    const byte = bytes[i]
    if (byte === PLUS) {
      out.push(SPACE)
      continue
    }
    if (byte === PERCENT) {
      const high = hexValue(bytes[i + 1])
      const low = hexValue(bytes[i + 2])
      if (high !== -1 && low !== -1) {
        out.push(high * 16 + low)
        i += 2
        continue
      }
    }
    out.push(byte)
  }
  return Uint8Array.from(out)
}

function toBytes(raw: string | Uint8Array, charset: SingleByteCharset): Uint8Array {
  return typeof raw === 'string' ? charset.encode(raw) : raw
}

function split(bytes: Uint8Array, separator: number): Uint8Array[] {
  const parts: Uint8Array[] = []
  let start = 0
  for (let i = 0; i <= bytes.length; i++) {
    if (i === bytes.length || bytes[i] === separator) {
      parts.push(bytes.subarray(start, i))
      start = i + 1
    }
  }
  return parts
}

/**
 * Render fields as an application/x-www-form-urlencoded string.
 * Values travel in the gateway's single-byte charset, never UTF-8;
 * unrepresentable characters become the charset's replacement character.
 *
 * @example encodeForm({ TXT: 'Hei på deg' }) === 'TXT=Hei+p%E5+deg'
 */
export function encodeForm(fields: WireFields, charset: SingleByteCharset = pswinCharset): string {
  return Object.entries(fields)
    .map(([key, value]) => `${escapeBytes(charset.encode(key))}=${escapeBytes(charset.encode(value))}`)
    .join('&')
}

/**
 * Parse a query string or form body sent by the gateway.
 * Percent-escaped bytes are decoded with the single-byte charset.
 * Repeated keys keep the last value; a key without `=` gets an empty value.
 *
 * @example decodeForm('TXT=Hei+p%e5+deg') // { TXT: 'Hei på deg' }
 */
export function decodeForm(
  raw: string | Uint8Array,
  charset: SingleByteCharset = pswinCharset,
): WireFields {
  const fields: WireFields = {}

  for (const pair of split(toBytes(raw, charset), AMPERSAND)) {
    if (pair.length === 0) continue

    const separator = pair.indexOf(EQUALS)
    const keyBytes = separator === -1 ? pair : pair.subarray(0, separator)
    const valueBytes = separator === -1 ? new Uint8Array(0) : pair.subarray(separator + 1)

    const key = charset.decode(unescapeBytes(keyBytes))
    if (key === '') continue
    fields[key] = charset.decode(unescapeBytes(valueBytes))
  }

  return fields
}
