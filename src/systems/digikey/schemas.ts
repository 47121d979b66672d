import { z } from 'zod'

// Response shapes of the DigiKey APIs. Only the fields the service reads are
// declared; the raw body is stored alongside, so nothing else is lost.

/**
 * Barcoding/v3/ProductBarcodes (linear labels)
 */
export const productBarcodeSchema = z.object({
   DigiKeyPartNumber: z.string(),
   ManufacturerPartNumber: z.string(),
   ManufacturerName: z.string().nullish(),
   ProductDescription: z.string().nullish(),
   Quantity: z.number().int().nullish(),
})

/**
 * Barcoding/v3/Product2DBarcodes (DataMatrix labels)
 */
export const product2dBarcodeSchema = productBarcodeSchema.extend({
   SalesorderId: z.number().nullish(),
   InvoiceId: z.number().nullish(),
   PurchaseOrder: z.string().nullish(),
   CountryOfOrigin: z.string().nullish(),
   LotCode: z.string().nullish(),
   DateCode: z.string().nullish(),
})

export interface CategoryNode {
   CategoryId?: number
   Name: string
   ChildCategories?: CategoryNode[] | null
}

const categoryNodeSchema: z.ZodType<CategoryNode> = z.lazy(() =>
   z.object({
      CategoryId: z.number().optional(),
      Name: z.string(),
      ChildCategories: z.array(categoryNodeSchema).nullish(),
   })
)

/**
 * products/v4/search/{productNumber}/productdetails
 */
export const productDetailsSchema = z.object({
   Product: z.object({
      Description: z.object({
         ProductDescription: z.string(),
         DetailedDescription: z.string().nullish(),
      }),
      Manufacturer: z.object({
         Id: z.number(),
         Name: z.string(),
      }).nullish(),
      ManufacturerProductNumber: z.string(),
      Category: categoryNodeSchema.nullish(),
      ProductVariations: z.array(z.object({
         DigiKeyProductNumber: z.string(),
         StandardPackage: z.number().int().nullish(),
      })).nullish(),
   }),
})

export type ProductBarcode = z.infer<typeof productBarcodeSchema>
