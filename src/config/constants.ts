// ===================================================================================
// Segmented label format (ISO/IEC 15434 envelope, format 06)
// ===================================================================================

export const COMPLIANCE_INDICATOR = '[)>'
export const RECORD_SEPARATOR = '\u241e'
export const GROUP_SEPARATOR = '\u241d'
export const END_OF_TRANSMISSION = '\u2404'
export const FORMAT_VERSION = '06'

export const MESSAGE_HEADER =
   COMPLIANCE_INDICATOR + RECORD_SEPARATOR + FORMAT_VERSION + GROUP_SEPARATOR

// DigiKey labels omit the trailer, so it is optional on input
export const MESSAGE_TRAILER = RECORD_SEPARATOR + END_OF_TRANSMISSION

// Data identifiers the pipeline reads directly
export const DI = {
   CUSTOMER_PART_NUMBER: 'P',
   SUPPLIER_PART_NUMBER: '1P',
   QUANTITY: 'Q',
   DIGIKEY_MARKER: '20Z',
} as const

// ===================================================================================
// Distributors
// ===================================================================================

export const DIGIKEY = 'digikey'
export const MOUSER = 'mouser'

export const DISTRIBUTORS = [DIGIKEY, MOUSER] as const

// ===================================================================================
// Event channel
// ===================================================================================

export const SCAN_EVENTS = 'scan_events'

// ===================================================================================
// Inventory table columns, in stored order
// ===================================================================================

export const H = {
   BARCODE: 'barcode',
   SYMBOLOGY: 'symbology',
   CATEGORY: 'category',
   SUPPLIER_PART: 'supplier_part',
   QUANTITY: 'quantity',
   DESCRIPTION: 'description',
   PACK_QUANTITY: 'pack_quantity',
   BARCODE_RESPONSE: 'barcode_response',
   PRODUCT_RESPONSE: 'product_response',
   SCAN_TIME: 'scan_time',
   UPDATE_TIME: 'update_time',
} as const

export const INVENTORY_COLUMNS = Object.values(H)

export const DISPLAY_HEADERS = {
   [H.BARCODE]: 'Barcode',
   [H.SYMBOLOGY]: 'Symbology',
   [H.CATEGORY]: 'Category',
   [H.SUPPLIER_PART]: 'Supplier Part',
   [H.QUANTITY]: 'Quantity',
   [H.DESCRIPTION]: 'Description',
   [H.PACK_QUANTITY]: 'Pack Quantity',
   [H.BARCODE_RESPONSE]: 'Barcode Response',
   [H.PRODUCT_RESPONSE]: 'Product Response',
   [H.SCAN_TIME]: 'Scan Time',
   [H.UPDATE_TIME]: 'Update Time',
} as const satisfies Record<(typeof H)[keyof typeof H], string>

export const INVENTORY_COLLECTION = 'inventory'
