import type { Db } from 'mongodb'
import { INVENTORY_COLLECTION, INVENTORY_COLUMNS } from '../config/constants'
import type { InventoryRecord, InventoryRow, InventoryTable } from '../types/inventory'

/**
 * The inventory table as a MongoDB collection. Documents hold exactly the row
 * columns; the ObjectId only fixes insertion order and is never returned.
 */
export function createMongoInventoryTable(db: Db): InventoryTable {
   const collection = db.collection<InventoryRecord>(INVENTORY_COLLECTION)

   return {
      loadAll: async (): Promise<InventoryRow[]> => {
         return collection
            .find({}, { projection: { _id: 0 }, sort: { _id: 1 } })
            .toArray()
      },

      append: async (row: InventoryRow): Promise<void> => {
         // insertOne assigns _id on the document it is given, so hand it a copy
         await collection.insertOne({ ...row })
      },
   }
}

/**
 * A row's values in stored column order.
 */
export function toRowValues(row: InventoryRow): InventoryRow[keyof InventoryRow][] {
   return INVENTORY_COLUMNS.map(column => row[column])
}
