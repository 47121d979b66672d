import type { AxiosInstance } from 'axios'
import type { z } from 'zod'
import { DIGIKEY, MOUSER } from '../../config/constants'
import type {
   BarcodeLookupResult,
   LookupService,
   ProductLookupResult,
} from '../../types/inventory'
import { LookupFailure } from '../../utils/errors'
import { json } from '../../utils/json'
import { escapeBarcode } from '../../utils/string-utils'
import {
   type CategoryNode,
   type ProductBarcode,
   product2dBarcodeSchema,
   productBarcodeSchema,
   productDetailsSchema,
} from './schemas'

/**
 * The DigiKey catalog as the pipeline's lookup collaborator.
 *
 * Mouser has no catalog API here, so Mouser labels fail the barcode lookup
 * and the pipeline searches by the part number printed on the label instead.
 */
export function createDigikeyLookup(digikeyApi: AxiosInstance): LookupService {
   return {
      async barcodeLookup(rawText, { distributor, signal }) {
         if (distributor === MOUSER) {
            throw new LookupFailure('No barcode lookup available for mouser labels')
         }

         if (distributor === DIGIKEY) {
            // Control characters must reach the API escaped, e.g. \u241e
            const url = `Barcoding/v3/Product2DBarcodes/${encodeURIComponent(escapeBarcode(rawText))}`
            const { data } = await digikeyApi.get<unknown>(url, { signal })
            return toBarcodeResult(validate(product2dBarcodeSchema, data, url), data)
         }

         const url = `Barcoding/v3/ProductBarcodes/${encodeURIComponent(rawText)}`
         const { data } = await digikeyApi.get<unknown>(url, { signal })
         return toBarcodeResult(validate(productBarcodeSchema, data, url), data)
      },

      async productDetailLookup(partNumber, { signal } = {}) {
         const url = `products/v4/search/${encodeURIComponent(partNumber)}/productdetails`
         const { data } = await digikeyApi.get<unknown>(url, { signal })
         const { Product: product } = validate(productDetailsSchema, data, url)

         const variations = product.ProductVariations ?? []
         const variation = variations.find(v => v.DigiKeyProductNumber === partNumber) ?? variations[0]

         const result: ProductLookupResult = {
            description: product.Description.ProductDescription,
            category: product.Category ? categoryPath(product.Category) : null,
            packQuantity: variation?.StandardPackage ?? null,
            raw: json.stringify(data),
         }
         return result
      },
   }
}

/**
 * Validates a response body against its schema.
 * @throws {LookupFailure} When the body does not have the expected shape.
 */
function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, url: string): T {
   const result = schema.safeParse(data)

   if (!result.success) {
      const errorDetails = result.error.flatten()
      log.warn({ url, error: errorDetails }, 'Unexpected DigiKey response shape')
      throw new LookupFailure(`Unexpected DigiKey response from ${url}`)
   }

   return result.data
}

function toBarcodeResult(barcode: ProductBarcode, data: unknown): BarcodeLookupResult {
   return {
      partNumber: barcode.DigiKeyPartNumber,
      manufacturerPartNumber: barcode.ManufacturerPartNumber,
      quantity: barcode.Quantity ?? null,
      description: barcode.ProductDescription ?? null,
      raw: json.stringify(data),
   }
}

/**
 * Joins a category and its first descendants into one path,
 * e.g. "Resistors > Chip Resistor - Surface Mount".
 */
export function categoryPath(node: CategoryNode): string {
   const names: string[] = []
   let current: CategoryNode | undefined = node
   while (current) {
      names.push(current.Name)
      current = current.ChildCategories?.[0]
   }
   return names.join(' > ')
}
