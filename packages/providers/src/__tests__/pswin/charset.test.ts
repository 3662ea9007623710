import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { SingleByteCharset, pswinCharset, isRepresentable } from '../../pswin/charset.js'

describe('PSWin charset', () => {
  describe('isRepresentable', () => {
    it('should accept ASCII and Latin-1 letters', () => {
      expect(isRepresentable('Hello, world!')).toBe(true)
      expect(isRepresentable('Æ E A Å Edø.')).toBe(true)
      expect(isRepresentable('¿Vamos a aprender español? Sí, mañana.')).toBe(true)
    })

    it('should accept line breaks', () => {
      expect(isRepresentable('line one\nline two\r\n')).toBe(true)
    })

    it('should accept the empty string', () => {
      expect(isRepresentable('')).toBe(true)
    })

    it('should reject characters outside the repertoire', () => {
      expect(isRepresentable('Vamos a aprender chino 玩.')).toBe(false)
      expect(isRepresentable('מה קורה?')).toBe(false)
      expect(isRepresentable('5 €')).toBe(false)
      expect(isRepresentable('ok 😀')).toBe(false)
    })

    it('should accept every ASCII character, controls included', () => {
      let ascii = ''
      for (let codePoint = 0; codePoint <= 0x7f; codePoint++) {
        ascii += String.fromCharCode(codePoint)
      }

      expect(isRepresentable(ascii)).toBe(true)
      expect(isRepresentable('a\tb\u000bc\u000cd')).toBe(true)
    })

    it('should reject C1 control characters', () => {
      expect(isRepresentable('\u0080')).toBe(false)
      expect(isRepresentable('\u0085')).toBe(false)
      expect(isRepresentable('\u009f')).toBe(false)
    })
  })

  describe('encode', () => {
    it('should map characters to their single bytes', () => {
      expect(Array.from(pswinCharset.encode('Æ E A Å Edø.'))).toEqual([
        0xc6, 0x20, 0x45, 0x20, 0x41, 0x20, 0xc5, 0x20, 0x45, 0x64, 0xf8, 0x2e,
      ])
    })

    it('should substitute the replacement byte for unknown characters', () => {
      expect(Array.from(pswinCharset.encode('a€b'))).toEqual([0x61, 0x3f, 0x62])
    })

    it('should substitute once per code point', () => {
      expect(Array.from(pswinCharset.encode('😀'))).toEqual([0x3f])
    })

    it('should throw in strict mode', () => {
      expect(() => pswinCharset.encode('a€b', { strict: true })).toThrow(RangeError)
      expect(() => pswinCharset.encode('a€b', { strict: true })).toThrow(
        'Character U+20AC is not in charset pswin-latin1',
      )
    })
  })

  describe('decode', () => {
    it('should map bytes to characters', () => {
      expect(pswinCharset.decode(Uint8Array.from([0x48, 0x65, 0x69, 0x20, 0xe5]))).toBe('Hei å')
    })

    it('should substitute the replacement character for unmapped bytes only', () => {
      expect(pswinCharset.decode(Uint8Array.from([0x48, 0x80, 0x09, 0x9f]))).toBe('H?\t?')
    })

    it('should decode ASCII control bytes unchanged', () => {
      expect(pswinCharset.decode(Uint8Array.from([0x09, 0x0b, 0x0c, 0x7f]))).toBe('\t\u000b\u000c\u007f')
    })
  })

  describe('SingleByteCharset', () => {
    it('should require a 256 entry table', () => {
      expect(
        () => new SingleByteCharset({ name: 'short', replacement: '?', table: [63] }),
      ).toThrow(ZodError)
    })

    it('should require the replacement character to be in the table', () => {
      const table: Array<number | null> = new Array<number | null>(256).fill(null)
      table[0x41] = 0x41

      expect(() => new SingleByteCharset({ name: 'tiny', replacement: '?', table })).toThrow(
        'Replacement character "?" is not in charset tiny',
      )
    })

    it('should encode through a custom table', () => {
      const table: Array<number | null> = new Array<number | null>(256).fill(null)
      table[0x3f] = 0x3f
      table[0x01] = 0x41

      const charset = new SingleByteCharset({ name: 'custom', replacement: '?', table })

      expect(Array.from(charset.encode('AB'))).toEqual([0x01, 0x3f])
      expect(charset.decode(Uint8Array.from([0x01, 0x02]))).toBe('A?')
      expect(charset.isRepresentable('A')).toBe(true)
      expect(charset.isRepresentable('B')).toBe(false)
    })
  })
})
