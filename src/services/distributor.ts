import { DI, DIGIKEY, MOUSER } from '../config/constants'
import type { Distributor } from '../types/inventory'
import type { DecodedMessage } from '../types/segmented'
import { symbologyFamily } from '../utils/symbology'

/**
 * Guesses the distributor from the symbology and the decoded label.
 * Both DigiKey and Mouser print segmented labels as 2D matrix codes; only
 * DigiKey adds its `20Z` padding segment.
 *
 * @returns The distributor, or null for anything that is not a matrix code.
 */
export function classifyDistributor(
   symbology: string,
   message: DecodedMessage
): Distributor | null {
   if (symbologyFamily(symbology) !== 'matrix') return null
   return message.has(DI.DIGIKEY_MARKER) ? DIGIKEY : MOUSER
}
