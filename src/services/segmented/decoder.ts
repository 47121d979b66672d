import {
   GROUP_SEPARATOR,
   MESSAGE_HEADER,
   MESSAGE_TRAILER,
} from '../../config/constants'
import type { DecodedMessage, SegmentRecord } from '../../types/segmented'
import { FormatError } from '../../utils/errors'
import { fieldRegistry } from './fields'

/**
 * Matches a segment: zero or more digits and one non-digit form the identifier,
 * everything after is the value. The `s` flag lets values span line breaks.
 * - Group 1: identifier
 * - Group 2: raw value
 */
const SEGMENT_REGEX = /^([0-9]*[^0-9])(.*)$/s

/**
 * Decodes one scanned payload in the segmented label format.
 *
 * @param {string} data The full scanned text.
 * @returns {DecodedMessage | null} The decoded segments, or null when the text
 *    does not start with the format header.
 * @throws {FormatError} When a segment has no identifier or an identifier repeats.
 *    Nothing is returned for a message that fails part way.
 */
export function decodeSegmented(data: string): DecodedMessage | null {
   if (!data.startsWith(MESSAGE_HEADER)) return null

   let body = data.slice(MESSAGE_HEADER.length)
   if (body.endsWith(MESSAGE_TRAILER)) {
      body = body.slice(0, -MESSAGE_TRAILER.length)
   }

   const records = new Map<string, SegmentRecord>()

   body.split(GROUP_SEPARATOR).forEach((segment, index) => {
      const match = segment.match(SEGMENT_REGEX)
      if (!match) {
         throw new FormatError(
            `Segment ${index + 1} has no data identifier: "${segment}"`
         )
      }

      const [, identifier, raw] = match
      if (records.has(identifier)) {
         throw new FormatError(`Duplicate data identifier: ${identifier}`)
      }
      records.set(identifier, Object.freeze(fieldRegistry.createRecord(identifier, raw)))
   })

   // Freezing a Map does not stop set/delete; the ReadonlyMap type is what
   // keeps callers from mutating it. The records themselves are frozen.
   return Object.freeze(records)
}

/**
 * Raw payload of a segment, if present.
 */
export function segmentRaw(message: DecodedMessage, identifier: string): string | undefined {
   return message.get(identifier)?.raw
}

/**
 * Integer value of a quantity segment, if present and numeric.
 */
export function segmentQuantity(message: DecodedMessage, identifier: string): number | null {
   const record = message.get(identifier)
   return record?.kind === 'quantity' ? record.value : null
}

/**
 * Flattens a message into `{ [field name or identifier]: raw }` for logging.
 * Identifiers sharing a name (9D and 10D are both "Date Code") keep the identifier as a suffix.
 */
export function describeMessage(message: DecodedMessage): Record<string, string> {
   const described: Record<string, string> = {}
   for (const [identifier, record] of message) {
      const name = record.field?.name ?? identifier
      const key = name in described ? `${name} (${identifier})` : name
      described[key] = record.raw
   }
   return described
}
