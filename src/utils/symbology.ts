/**
 * AIM symbology identifiers are `]` + a code character + a modifier, e.g. `]d2`
 * (DataMatrix, ECC 200) or `]C0` (Code 128). Only the code character decides the family.
 */
export type SymbologyFamily = 'matrix' | 'linear' | 'other'

export const AIM_PREFIX_REGEX = /^\][A-Za-z][0-9A-Za-z]/

const MATRIX_CODES = new Set([
   'd', // DataMatrix
   'Q', // QR Code
   'z', // Aztec
])

const LINEAR_CODES = new Set([
   'A', // Code 39
   'C', // Code 128
   'E', // EAN / UPC
   'F', // Codabar
   'G', // Code 93
   'I', // Interleaved 2 of 5
   'e', // GS1 DataBar
])

export function symbologyFamily(symbology: string): SymbologyFamily {
   if (!AIM_PREFIX_REGEX.test(symbology)) return 'other'
   const code = symbology[1]
   if (MATRIX_CODES.has(code)) return 'matrix'
   if (LINEAR_CODES.has(code)) return 'linear'
   return 'other'
}

/**
 * Splits a line from a scanner that transmits the AIM identifier ahead of the data.
 * @returns The symbology and the remaining text, or null when the line has no prefix.
 */
export function splitAimPrefix(line: string): { symbology: string; text: string } | null {
   if (!AIM_PREFIX_REGEX.test(line)) return null
   return { symbology: line.slice(0, 3), text: line.slice(3) }
}
