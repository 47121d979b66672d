import { describe, it, expect } from 'vitest'
import {
   decodeSegmented,
   describeMessage,
   segmentQuantity,
   segmentRaw,
} from '../src/services/segmented/decoder'
import { ALL_FIELDS, FieldSupplierPartNumber, fieldRegistry } from '../src/services/segmented/fields'
import type { DecodedMessage } from '../src/types/segmented'
import { FormatError } from '../src/utils/errors'
import { EOT, GS, RS, label } from './fakes'

function decode(data: string): DecodedMessage {
   const message = decodeSegmented(data)
   if (!message) throw new Error('expected a segmented label')
   return message
}

describe('fieldRegistry', () => {
   it('holds the sixteen label fields', () => {
      expect(ALL_FIELDS).toHaveLength(16)
      expect(fieldRegistry.lookup('1P')).toBe(FieldSupplierPartNumber)
      expect(fieldRegistry.lookup('13Q')?.name).toBe('Package Count')
      expect(fieldRegistry.lookup('E')?.name).toBe('RoHS/CC')
   })

   it('matches identifiers exactly', () => {
      expect(fieldRegistry.lookup('01P')).toBeUndefined()
      expect(fieldRegistry.lookup('1p')).toBeUndefined()
   })
})

describe('decodeSegmented', () => {
   it('decodes each segment under its registry name', () => {
      const message = decode(
         label('K596-777A1-ND', '1PXAF4444', 'Q3', '10D1452', '1TBF1103', '4LUS') + RS + EOT
      )

      expect(message.size).toBe(6)
      expect(describeMessage(message)).toEqual({
         'Customer PO': '596-777A1-ND',
         'Supplier Part Number': 'XAF4444',
         'Quantity': '3',
         'Date Code': '1452',
         'Lot Code': 'BF1103',
         'Country of Origin': 'US',
      })
      expect(segmentQuantity(message, 'Q')).toBe(3)
   })

   it('accepts a label without the trailer', () => {
      const message = decode(label(
         'PRMCF0603FT5K10CT-ND', '1PRMCF0603FT5K10', 'K', '1K58732613', '10K67192477',
         '11K1', '4LCN', 'Q100', '11ZPICK', '12Z1943037', '13Z803900', '20Z0000000000',
      ))

      expect(segmentRaw(message, 'P')).toBe('RMCF0603FT5K10CT-ND')
      expect(segmentRaw(message, '1P')).toBe('RMCF0603FT5K10')
      expect(segmentRaw(message, 'K')).toBe('')
      expect(segmentQuantity(message, 'Q')).toBe(100)
      expect(message.get('11K')?.field?.name).toBe('Packing List Number')
      expect(message.has('20Z')).toBe(true)
   })

   it('keeps a trailing record separator that is not part of the trailer', () => {
      const message = decode(label('1PXAF4444', '4LUS') + RS)
      expect(segmentRaw(message, '4L')).toBe('US' + RS)
   })

   it('passes unknown identifiers through under their literal identifier', () => {
      const message = decode(label('K0160NLA52600', '14K002', '1PFH12-15S-0.5SH(55)', '1VHirose') + RS + EOT)

      expect(message.get('14K')).toEqual({ kind: 'text', identifier: '14K', raw: '002' })
      expect(message.get('14K')?.field).toBeUndefined()
      expect(describeMessage(message)['14K']).toBe('002')
      expect(segmentRaw(message, '1V')).toBe('Hirose')
   })

   it('takes the leading digits and one non-digit as the identifier', () => {
      const message = decode(label('33PBIN-7', '1PX1', '9D2401'))

      expect(segmentRaw(message, '33P')).toBe('BIN-7')
      expect(segmentRaw(message, '1P')).toBe('X1')
      expect(segmentRaw(message, '9D')).toBe('2401')
   })

   it('keeps the raw quantity when it is not an integer', () => {
      const message = decode(label('Q1,000'))
      expect(message.get('Q')).toMatchObject({ kind: 'quantity', raw: '1,000', value: null })
      expect(segmentQuantity(message, 'Q')).toBeNull()
   })

   it('suffixes names shared by two identifiers', () => {
      const message = decode(label('9D2401', '10D1452'))
      expect(describeMessage(message)).toEqual({
         'Date Code': '2401',
         'Date Code (10D)': '1452',
      })
   })

   it('returns null for text without the header', () => {
      expect(decodeSegmented('RMCF0603FT5K10CT-ND')).toBeNull()
      expect(decodeSegmented(`[)>${RS}05${GS}PX`)).toBeNull()
      expect(decodeSegmented('')).toBeNull()
   })

   it('rejects a repeated identifier', () => {
      expect(() => decodeSegmented(label('Q1', '1PXAF4444', 'Q2'))).toThrow(FormatError)
      expect(() => decodeSegmented(label('Q1', '1PXAF4444', 'Q2'))).toThrow('Duplicate data identifier: Q')
   })

   it('rejects segments without an identifier', () => {
      expect(() => decodeSegmented(label('Q1', ''))).toThrow(FormatError)
      expect(() => decodeSegmented(label('Q1', '42'))).toThrow('Segment 2 has no data identifier: "42"')
   })

   it('returns an immutable message', () => {
      const message = decode(label('1PXAF4444'))
      expect(Object.isFrozen(message)).toBe(true)
      expect(Object.isFrozen(message.get('1P'))).toBe(true)
   })
})
