import { H, DISTRIBUTORS } from '../config/constants'

export type Distributor = (typeof DISTRIBUTORS)[number]

/**
 * One physical item received. The keys are the stored column names, so a
 * record is written to the table as-is.
 */
export interface InventoryRecord {
   [H.BARCODE]: string
   [H.SYMBOLOGY]: string
   [H.CATEGORY]: string | null
   [H.SUPPLIER_PART]: string | null
   [H.QUANTITY]: number | null
   [H.DESCRIPTION]: string | null
   [H.PACK_QUANTITY]: number | null
   [H.BARCODE_RESPONSE]: string | null   // raw distributor barcode response
   [H.PRODUCT_RESPONSE]: string | null   // raw distributor product response
   [H.SCAN_TIME]: Date
   [H.UPDATE_TIME]: Date
}

/**
 * A committed record. Rows are appended once and never rewritten.
 */
export type InventoryRow = Readonly<InventoryRecord>

/**
 * The append-only table committed rows go to.
 */
export interface InventoryTable {
   /** All rows, in the order they were appended. */
   loadAll(): Promise<InventoryRow[]>
   append(row: InventoryRow): Promise<void>
}


// --- Catalog lookup ---

export interface LookupOptions {
   signal?: AbortSignal
}

export interface BarcodeLookupOptions extends LookupOptions {
   /** null for linear barcodes, which carry no distributor envelope */
   distributor: Distributor | null
}

export interface BarcodeLookupResult {
   partNumber: string
   manufacturerPartNumber: string
   quantity: number | null
   description: string | null
   raw: string
}

export interface ProductLookupResult {
   description: string
   category: string | null
   packQuantity: number | null
   raw: string
}

/**
 * The distributor catalog. Both calls reject with a LookupFailure.
 */
export interface LookupService {
   barcodeLookup(rawText: string, options: BarcodeLookupOptions): Promise<BarcodeLookupResult>
   productDetailLookup(partNumber: string, options?: LookupOptions): Promise<ProductLookupResult>
}
