const NAMED_ESCAPES: Record<string, string> = {
   '\\': '\\\\',
   '\t': '\\t',
   '\n': '\\n',
   '\r': '\\r',
}

/**
 * Escapes scanned text into a printable ASCII key.
 * - Printable ASCII passes through, except the backslash which is doubled.
 * - Tab, newline and carriage return become `\t`, `\n`, `\r`.
 * - Other code points below U+0100 become `\xhh`, the rest of the BMP `\uhhhh`,
 *   and astral code points `\Uhhhhhhhh` (lowercase hex).
 * This is the form the barcode API expects in its path, and the form rows are keyed by.
 * @param {string} text The raw scanned text.
 * @returns {string} The escaped key.
 */
export function escapeBarcode(text: string): string {
   let escaped = ''
   for (const char of text) {
      const named = NAMED_ESCAPES[char]
      if (named) {
         escaped += named
         continue
      }
      const code = char.codePointAt(0) ?? 0
      if (code >= 0x20 && code < 0x7f) escaped += char
      else if (code < 0x100) escaped += '\\x' + hex(code, 2)
      else if (code < 0x10000) escaped += '\\u' + hex(code, 4)
      else escaped += '\\U' + hex(code, 8)
   }
   return escaped
}

function hex(code: number, width: number): string {
   return code.toString(16).padStart(width, '0')
}
