import { describe, it, expect } from 'vitest'
import { parseCommand } from '../src/services/commands'
import { CommandParseError } from '../src/utils/errors'

describe('parseCommand', () => {
   it('treats an empty line as commit', () => {
      expect(parseCommand('')).toEqual({ kind: 'commit' })
      expect(parseCommand('   ')).toEqual({ kind: 'commit' })
   })

   it('treats anything starting with d as delete', () => {
      expect(parseCommand('d')).toEqual({ kind: 'delete' })
      expect(parseCommand('delete')).toEqual({ kind: 'delete' })
   })

   it('parses quantity deltas', () => {
      expect(parseCommand('+5')).toEqual({ kind: 'delta', delta: 5 })
      expect(parseCommand('-20')).toEqual({ kind: 'delta', delta: -20 })
      expect(parseCommand('0')).toEqual({ kind: 'delta', delta: 0 })
      expect(parseCommand('12')).toEqual({ kind: 'delta', delta: 12 })
   })

   it('parses a product override', () => {
      expect(parseCommand('pRMCF0603FT5K10')).toEqual({ kind: 'override', partNumber: 'RMCF0603FT5K10' })
      expect(parseCommand('p  311-5.10KHRCT-ND ')).toEqual({ kind: 'override', partNumber: '311-5.10KHRCT-ND' })
   })

   it('rejects an override without a part number', () => {
      expect(() => parseCommand('p')).toThrow(CommandParseError)
   })

   it('rejects malformed tokens', () => {
      expect(() => parseCommand('+abc')).toThrow('Unrecognized command: "+abc"')
      expect(() => parseCommand('5.5')).toThrow(CommandParseError)
      expect(() => parseCommand('x')).toThrow(CommandParseError)
      expect(() => parseCommand('99999999999999999999')).toThrow('Quantity out of range: "99999999999999999999"')
   })
})
