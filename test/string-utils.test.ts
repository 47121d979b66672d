import { describe, it, expect } from 'vitest'
import { escapeBarcode } from '../src/utils/string-utils'
import { splitAimPrefix, symbologyFamily } from '../src/utils/symbology'

describe('escapeBarcode', () => {
   it('leaves printable ASCII alone', () => {
      expect(escapeBarcode('RMCF0603FT5K10CT-ND')).toBe('RMCF0603FT5K10CT-ND')
   })

   it('escapes separator symbols as \\u sequences', () => {
      expect(escapeBarcode('[)>\u241e06\u241d')).toBe('[)>\\u241e06\\u241d')
   })

   it('escapes control and latin-1 characters as \\x sequences', () => {
      expect(escapeBarcode('A\u001dB')).toBe('A\\x1dB')
      expect(escapeBarcode('caf\u00e9')).toBe('caf\\xe9')
   })

   it('uses named escapes and doubles backslashes', () => {
      expect(escapeBarcode('a\tb\nc\rd')).toBe('a\\tb\\nc\\rd')
      expect(escapeBarcode('a\\b')).toBe('a\\\\b')
   })

   it('escapes astral code points as \\U sequences', () => {
      expect(escapeBarcode('\u{1F600}')).toBe('\\U0001f600')
   })
})

describe('symbology', () => {
   it('groups AIM identifiers into families', () => {
      expect(symbologyFamily(']d2')).toBe('matrix')
      expect(symbologyFamily(']Q1')).toBe('matrix')
      expect(symbologyFamily(']C0')).toBe('linear')
      expect(symbologyFamily(']E0')).toBe('linear')
      expect(symbologyFamily(']L2')).toBe('other')
      expect(symbologyFamily('d2')).toBe('other')
   })

   it('splits the AIM prefix off a device line', () => {
      expect(splitAimPrefix(']C0RMCF0603')).toEqual({ symbology: ']C0', text: 'RMCF0603' })
      expect(splitAimPrefix('RMCF0603')).toBeNull()
      expect(splitAimPrefix('+5')).toBeNull()
   })
})
