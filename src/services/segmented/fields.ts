import type { Field, RecordParser, SegmentRecord } from '../../types/segmented'

const QUANTITY_REGEX = /^\d+$/

/**
 * Quantity-bearing identifiers also carry their integer value.
 */
const parseQuantity: RecordParser = (identifier, raw) => ({
   kind: 'quantity',
   identifier,
   raw,
   value: QUANTITY_REGEX.test(raw) ? Number(raw) : null,
})

export const FieldPo: Field = { identifier: 'K', name: 'Customer PO' }
export const FieldPackingListNumber: Field = { identifier: '11K', name: 'Packing List Number' }
export const FieldShipDate: Field = { identifier: '6D', name: 'Ship Date' }
export const FieldCustomerPartNumber: Field = { identifier: 'P', name: 'Customer Part Number' }
export const FieldSupplierPartNumber: Field = { identifier: '1P', name: 'Supplier Part Number' }
export const FieldCustomerPoLine: Field = { identifier: '4K', name: 'Customer PO Line' }
export const FieldQuantity: Field = { identifier: 'Q', name: 'Quantity', parse: parseQuantity }
export const FieldDateCode9D: Field = { identifier: '9D', name: 'Date Code' }
export const FieldDateCode10D: Field = { identifier: '10D', name: 'Date Code' }
export const FieldLotCode: Field = { identifier: '1T', name: 'Lot Code' }
export const FieldCountryOfOrigin: Field = { identifier: '4L', name: 'Country of Origin' }
export const FieldBinCode: Field = { identifier: '33P', name: 'BIN Code' }
export const FieldPackageCount: Field = { identifier: '13Q', name: 'Package Count', parse: parseQuantity }
export const FieldWeight: Field = { identifier: '7Q', name: 'Weight' }
export const FieldManufacturer: Field = { identifier: '1V', name: 'Manufacturer' }
export const FieldRohsCc: Field = { identifier: 'E', name: 'RoHS/CC' }

export const ALL_FIELDS: readonly Field[] = Object.freeze([
   FieldPo,
   FieldPackingListNumber,
   FieldShipDate,
   FieldCustomerPartNumber,
   FieldSupplierPartNumber,
   FieldCustomerPoLine,
   FieldQuantity,
   FieldDateCode9D,
   FieldDateCode10D,
   FieldLotCode,
   FieldCountryOfOrigin,
   FieldBinCode,
   FieldPackageCount,
   FieldWeight,
   FieldManufacturer,
   FieldRohsCc,
].map(field => Object.freeze(field)))

const FIELDS_BY_IDENTIFIER: ReadonlyMap<string, Field> =
   new Map(ALL_FIELDS.map(field => [field.identifier, field]))

export const fieldRegistry = {
   /**
    * Exact-match lookup; `01P` and `1P` are different identifiers.
    */
   lookup: (identifier: string): Field | undefined => {
      return FIELDS_BY_IDENTIFIER.get(identifier)
   },

   /**
    * Builds the record for one segment, through the field's own parser when it has one.
    * Unknown identifiers pass through as plain text records.
    */
   createRecord: (identifier: string, raw: string): SegmentRecord => {
      const field = FIELDS_BY_IDENTIFIER.get(identifier)
      if (!field) return { kind: 'text', identifier, raw }
      const record = field.parse
         ? field.parse(identifier, raw)
         : { kind: 'text' as const, identifier, raw }
      return { ...record, field }
   },
}
