import ExcelJS from 'exceljs'
import { DISPLAY_HEADERS, H, INVENTORY_COLUMNS } from '../config/constants'
import type { InventoryRow } from '../types/inventory'
import { toRowValues } from './inventory-table'

export interface ExportFile {
   filename: string
   mimetype: string
   data: ExcelJS.Buffer
}

const COLUMN_WIDTHS: Partial<Record<(typeof INVENTORY_COLUMNS)[number], number>> = {
   [H.BARCODE]: 40,
   [H.SUPPLIER_PART]: 24,
   [H.DESCRIPTION]: 40,
   [H.CATEGORY]: 30,
   [H.SCAN_TIME]: 20,
   [H.UPDATE_TIME]: 20,
}

/**
 * Lays the rows out in stored column order, one worksheet, header row frozen.
 */
export function buildInventoryWorkbook(rows: InventoryRow[]): ExcelJS.Workbook {
   const workbook = new ExcelJS.Workbook()
   const worksheet = workbook.addWorksheet('Inventory')

   // Barcodes and part numbers are text: '@' stops Excel from reading
   // digit-only codes as numbers in scientific notation.
   worksheet.columns = INVENTORY_COLUMNS.map(column => ({
      header: DISPLAY_HEADERS[column],
      key: column,
      width: COLUMN_WIDTHS[column] ?? 12,
      style: column === H.BARCODE || column === H.SUPPLIER_PART
         ? { numFmt: '@' }
         : column === H.SCAN_TIME || column === H.UPDATE_TIME
            ? { numFmt: 'yyyy-mm-dd hh:mm:ss' }
            : {},
   }))

   worksheet.getRow(1).font = { bold: true }
   worksheet.views = [{ state: 'frozen', ySplit: 1 }]

   rows.forEach(row => {
      worksheet.addRow(toRowValues(row))
   })

   return workbook
}

export async function exportInventory(rows: InventoryRow[], at = new Date()): Promise<ExportFile> {
   const data = await buildInventoryWorkbook(rows).xlsx.writeBuffer()
   return {
      filename: `inventory-${at.toISOString().slice(0, 10)}.xlsx`,
      mimetype: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
      data,
   }
}
