import { z } from 'zod'
import repertoire from './repertoire.json' with { type: 'json' }

/**
 * Single-byte character table, indexed by byte value.
 * A null entry means the byte has no character in the repertoire.
 */
export const charsetDefinitionSchema = z.object({
  name: z.string().min(1),
  /** Character the gateway substitutes for anything it cannot transmit */
  replacement: z.string().length(1),
  table: z.array(z.number().int().min(0).max(0xffff).nullable()).length(256),
})

export type CharsetDefinition = z.infer<typeof charsetDefinitionSchema>

export interface EncodeOptions {
  /** Throw instead of substituting the replacement character */
  strict?: boolean
}

/**
 * Bidirectional single-byte codec over an explicit table
 *
 * The gateway's repertoire is close to ISO-8859-1 but is not taken from any
 * platform codec: the table in repertoire.json is the only source of truth.
 */
export class SingleByteCharset {
  readonly name: string
  readonly replacement: string
  private readonly replacementByte: number
  private readonly toChar: ReadonlyArray<string | null>
  private readonly toByte: ReadonlyMap<number, number>

  constructor(definition: CharsetDefinition) {
    const { name, replacement, table } = charsetDefinitionSchema.parse(definition)
    const toByte = new Map<number, number>()
    table.forEach((codePoint, byte) => {
      if (codePoint !== null) toByte.set(codePoint, byte)
    })

    const replacementByte = toByte.get(replacement.charCodeAt(0))
    if (replacementByte === undefined) {
      throw new Error(`Replacement character "${replacement}" is not in charset ${name}`)
    }

    this.name = name
    this.replacement = replacement
    this.replacementByte = replacementByte
    this.toChar = table.map((codePoint) => (codePoint === null ? null : String.fromCharCode(codePoint)))
    this.toByte = toByte
  }

  /**
   * Whether every character of `text` is in the repertoire
   */
  isRepresentable(text: string): boolean {
    for (const char of text) {
      const codePoint = char.codePointAt(0)
      if (codePoint === undefined || !this.toByte.has(codePoint)) {
        return false
      }
    }
    return true
  }

  /**
   * Encode text to bytes. Characters outside the repertoire become the
   * replacement byte unless `strict` is set.
   * @throws {RangeError} In strict mode, on the first unrepresentable character
   */
  encode(text: string, options: EncodeOptions = {}): Uint8Array {
    const bytes: number[] = []
    for (const char of text) {
      const codePoint = char.codePointAt(0)
      const byte = codePoint === undefined ? undefined : this.toByte.get(codePoint)
      if (byte !== undefined) {
        bytes.push(byte)
      } else if (options.strict) {
        throw new RangeError(`Character U+${(codePoint ?? 0).toString(16).toUpperCase().padStart(4, '0')} is not in charset ${this.name}`)
      } else {
        bytes.push(this.replacementByte)
      }
    }
    return Uint8Array.from(bytes)
  }

  /**
   * Decode bytes to text. Bytes without a character become the replacement character.
   */
  decode(bytes: Uint8Array): string {
    let text = ''
    for (const byte of bytes) {
      text += this.toChar[byte] ?? this.replacement
    }
    return text
  }
}

/**
 * Charset of the PSWin gateway for plain-text (`CT=0`) bodies and callback parameters
 */
export const pswinCharset = new SingleByteCharset(repertoire)

/**
 * Whether the gateway can transmit `text` in plain-text mode
 */
export function isRepresentable(text: string): boolean {
  return pswinCharset.isRepresentable(text)
}
