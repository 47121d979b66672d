/**
 * Parses the raw payload of a registered field into a typed record.
 */
export type RecordParser = (identifier: string, raw: string) => SegmentRecord

/**
 * A data identifier from the label standard, e.g. `1P` (Supplier Part Number).
 */
export interface Field {
   identifier: string
   name: string
   parse?: RecordParser
}

/**
 * One decoded segment. `field` is absent for identifiers the registry does not know.
 */
export type SegmentRecord =
   | {
      kind: 'text'
      identifier: string
      raw: string
      field?: Field
   }
   | {
      kind: 'quantity'
      identifier: string
      raw: string
      field?: Field
      // null when the raw payload is not a plain decimal integer
      value: number | null
   }

/**
 * Decoded segments keyed by their literal identifier. Identifiers are unique
 * within one message, so this is equivalent to keying by field.
 */
export type DecodedMessage = ReadonlyMap<string, SegmentRecord>
