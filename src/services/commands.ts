import type { OperatorCommand } from '../types/events'
import { CommandParseError } from '../utils/errors'

const DELTA_REGEX = /^[+-]?\d+$/

/**
 * Parses one operator line.
 * - empty line: commit the open record
 * - `d...`: delete the open record
 * - `+N`, `-N`, `N`, `0`: add to the current quantity
 * - `p<part number>`: look the product up again under an explicit part number
 *
 * @throws {CommandParseError} For anything else.
 */
export function parseCommand(line: string): OperatorCommand {
   const token = line.trim()

   if (token === '') return { kind: 'commit' }
   if (token.startsWith('d')) return { kind: 'delete' }

   if (token.startsWith('p')) {
      const partNumber = token.slice(1).trim()
      if (!partNumber) throw new CommandParseError('Product override needs a part number, e.g. "pRMCF0603FT5K10"')
      return { kind: 'override', partNumber }
   }

   if (DELTA_REGEX.test(token)) {
      const delta = Number.parseInt(token, 10)
      if (!Number.isSafeInteger(delta)) throw new CommandParseError(`Quantity out of range: "${token}"`)
      return { kind: 'delta', delta }
   }

   throw new CommandParseError(`Unrecognized command: "${token}"`)
}
