import { DI, H } from '../config/constants'
import { LOOKUP_TIMEOUT_MS } from '../config/settings'
import type {
   CommandEvent,
   OperatorCommand,
   PipelineEvent,
   PipelineOutcome,
   PipelineState,
   ScanEvent,
} from '../types/events'
import type {
   Distributor,
   InventoryRecord,
   InventoryRow,
   InventoryTable,
   LookupService,
   ProductLookupResult,
} from '../types/inventory'
import type { DecodedMessage } from '../types/segmented'
import {
   CommandParseError,
   FormatError,
   LookupFailure,
   StorageError,
   errorMessage,
} from '../utils/errors'
import { escapeBarcode } from '../utils/string-utils'
import { symbologyFamily } from '../utils/symbology'
import { parseCommand } from './commands'
import { classifyDistributor } from './distributor'
import { decodeSegmented, describeMessage, segmentQuantity, segmentRaw } from './segmented/decoder'

/**
 * Everything the pipeline reads or writes outside its own open-record slot.
 * The pipeline is the only writer of `index`; nothing else may mutate it.
 */
export interface PipelineContext {
   table: InventoryTable
   lookup: LookupService
   /** Barcode keys already in the table, see `loadDuplicateIndex` */
   index: Set<string>
   now?: () => Date
   lookupTimeoutMs?: number
}

export interface InventoryPipeline {
   /**
    * Handles one event. Never rejects: every failure becomes a warning in the outcome.
    * Callers must not call this again before the previous call settles.
    */
   handle(event: PipelineEvent): Promise<PipelineOutcome>
   state(): PipelineState
   /** A copy of the open record, or null when idle. */
   openRecord(): InventoryRow | null
}

/**
 * Reads the whole table once to seed the duplicate-key index.
 * @throws {StorageError} When the table cannot be read; startup cannot continue.
 */
export async function loadDuplicateIndex(table: InventoryTable): Promise<Set<string>> {
   let rows: InventoryRow[]
   try {
      rows = await table.loadAll()
   } catch (error) {
      throw new StorageError(`Could not load the inventory table: ${errorMessage(error)}`, { cause: error })
   }
   const index = new Set(rows.map(row => row[H.BARCODE]))
   log.info({ rows: rows.length, keys: index.size }, 'Duplicate index loaded')
   return index
}

/**
 * The record-assembly state machine.
 *
 * Idle: no open record. Open: one record under edit.
 * - A new scan commits the open record (if any), then opens and enriches a new one.
 * - Commands edit, commit or delete the open record and are rejected when idle.
 * - A flush commits the open record, if any.
 */
export function createInventoryPipeline(ctx: PipelineContext): InventoryPipeline {
   const now = ctx.now ?? (() => new Date())
   const lookupTimeoutMs = ctx.lookupTimeoutMs ?? LOOKUP_TIMEOUT_MS

   let open: InventoryRecord | null = null

   // --- Outcome helpers ---

   type Outcome = Omit<PipelineOutcome, 'state'>

   function warn(out: Outcome, message: string, context: Record<string, unknown> = {}) {
      out.warnings.push(message)
      log.warn({ barcode: open?.[H.BARCODE], ...context }, message)
   }

   function touch(record: InventoryRecord) {
      record[H.UPDATE_TIME] = now()
   }

   /**
    * Runs one catalog call under the lookup timeout. Any failure is surfaced
    * as a warning and turned into null, so the caller leaves its fields as they are.
    */
   async function attempt<T>(
      out: Outcome,
      label: string,
      call: (signal: AbortSignal) => Promise<T>
   ): Promise<T | null> {
      const controller = new AbortController()
      let timer: NodeJS.Timeout | undefined
      const timeout = new Promise<never>((_, reject) => {
         timer = setTimeout(() => {
            // Reject before aborting so the timeout wins the race
            reject(new LookupFailure(`${label} timed out after ${lookupTimeoutMs} ms`))
            controller.abort()
         }, lookupTimeoutMs)
      })

      const started = Date.now()
      try {
         const result = await Promise.race([call(controller.signal), timeout])
         log.debug({ label, durationMs: Date.now() - started }, 'Lookup succeeded')
         return result
      } catch (error) {
         warn(out, `${label} failed: ${errorMessage(error)}`, {
            status: error instanceof LookupFailure ? error.status : undefined,
         })
         return null
      } finally {
         clearTimeout(timer)
      }
   }

   /**
    * The catalog's standard package only fills a missing pack quantity: the
    * label or barcode response states what was actually received.
    */
   function applyProduct(record: InventoryRecord, product: ProductLookupResult) {
      record[H.DESCRIPTION] = product.description
      record[H.CATEGORY] = product.category ?? record[H.CATEGORY]
      record[H.PACK_QUANTITY] = record[H.PACK_QUANTITY] ?? product.packQuantity
      record[H.PRODUCT_RESPONSE] = product.raw
      touch(record)
   }

   // --- State transitions ---

   /**
    * Appends the open record and returns to idle. On a storage failure the
    * record stays open so the commit can be retried.
    */
   async function commit(out: Outcome): Promise<boolean> {
      const record = open
      if (!record) return true

      const row: InventoryRow = Object.freeze({
         ...record,
         [H.SCAN_TIME]: new Date(record[H.SCAN_TIME]),
         [H.UPDATE_TIME]: new Date(record[H.UPDATE_TIME]),
      })

      try {
         await ctx.table.append(row)
      } catch (error) {
         const message = `Could not save ${row[H.BARCODE]}, record kept open: ${errorMessage(error)}`
         out.warnings.push(message)
         log.error(error, message)
         return false
      }

      ctx.index.add(row[H.BARCODE])
      open = null
      out.committed.push(row)
      log.info(
         { barcode: row[H.BARCODE], part: row[H.SUPPLIER_PART], quantity: row[H.QUANTITY] },
         'Record committed'
      )
      return true
   }

   async function onScan(event: ScanEvent, out: Outcome) {
      if (!(await commit(out))) {
         warn(out, 'Scan ignored until the open record is saved', { scanned: escapeBarcode(event.text) })
         return
      }

      const timestamp = now()
      const record: InventoryRecord = {
         [H.BARCODE]: escapeBarcode(event.text),
         [H.SYMBOLOGY]: event.symbology,
         [H.CATEGORY]: null,
         [H.SUPPLIER_PART]: null,
         [H.QUANTITY]: null,
         [H.DESCRIPTION]: null,
         [H.PACK_QUANTITY]: null,
         [H.BARCODE_RESPONSE]: null,
         [H.PRODUCT_RESPONSE]: null,
         [H.SCAN_TIME]: timestamp,
         [H.UPDATE_TIME]: timestamp,
      }
      open = record
      log.info({ barcode: record[H.BARCODE], symbology: event.symbology }, 'Record opened')

      if (ctx.index.has(record[H.BARCODE])) {
         warn(out, `Duplicate: ${record[H.BARCODE]} is already in the inventory`)
      }

      if (symbologyFamily(event.symbology) === 'linear') {
         await enrichLinear(record, event.text, out)
         return
      }

      let message: DecodedMessage | null
      try {
         message = decodeSegmented(event.text)
      } catch (error) {
         if (!(error instanceof FormatError)) throw error
         warn(out, `Malformed label: ${error.message}`)
         return
      }

      if (!message) {
         warn(out, 'Not a segmented part label; record left without catalog data')
         return
      }

      const distributor = classifyDistributor(event.symbology, message)
      log.debug({ distributor, fields: describeMessage(message) }, 'Label decoded')

      if (!distributor) {
         warn(out, `Unknown distributor for symbology ${event.symbology}; record left without catalog data`)
         return
      }

      await enrichSegmented(record, event.text, message, distributor, out)
   }

   /**
    * Segmented labels carry the part number and quantity themselves; the
    * barcode lookup only resolves the distributor's own part number.
    */
   async function enrichSegmented(
      record: InventoryRecord,
      text: string,
      message: DecodedMessage,
      distributor: Distributor,
      out: Outcome
   ) {
      record[H.SUPPLIER_PART] = segmentRaw(message, DI.SUPPLIER_PART_NUMBER) ?? null
      record[H.PACK_QUANTITY] = segmentQuantity(message, DI.QUANTITY)
      touch(record)

      const barcode = await attempt(out, `${distributor} barcode lookup`, signal =>
         ctx.lookup.barcodeLookup(text, { distributor, signal })
      )

      let searchTerm = record[H.SUPPLIER_PART]
      if (barcode) {
         record[H.BARCODE_RESPONSE] = barcode.raw
         record[H.PACK_QUANTITY] = record[H.PACK_QUANTITY] ?? barcode.quantity
         searchTerm = barcode.partNumber || searchTerm
         touch(record)
      }

      if (!searchTerm) {
         warn(out, 'Label has no supplier part number to search the catalog with')
         return
      }

      const partNumber = searchTerm
      const product = await attempt(out, 'Product lookup', signal =>
         ctx.lookup.productDetailLookup(partNumber, { signal })
      )
      if (product) applyProduct(record, product)
   }

   /**
    * Linear barcodes carry nothing but an identifier; everything comes from the catalog.
    */
   async function enrichLinear(record: InventoryRecord, text: string, out: Outcome) {
      const barcode = await attempt(out, 'Barcode lookup', signal =>
         ctx.lookup.barcodeLookup(text, { distributor: null, signal })
      )
      if (!barcode) return

      record[H.SUPPLIER_PART] = barcode.partNumber
      record[H.PACK_QUANTITY] = barcode.quantity
      record[H.BARCODE_RESPONSE] = barcode.raw
      touch(record)

      const product = await attempt(out, 'Product lookup', signal =>
         ctx.lookup.productDetailLookup(barcode.partNumber, { signal })
      )
      if (product) applyProduct(record, product)
   }

   async function onCommand(event: CommandEvent, out: Outcome) {
      let command: OperatorCommand
      try {
         command = parseCommand(event.line)
      } catch (error) {
         if (!(error instanceof CommandParseError)) throw error
         warn(out, error.message, { source: event.source })
         return
      }

      const record = open
      if (!record) {
         warn(out, `No open record for ${command.kind}`, { source: event.source })
         return
      }

      switch (command.kind) {
         case 'commit':
            await commit(out)
            break

         case 'delete':
            open = null
            log.info({ barcode: record[H.BARCODE] }, 'Record deleted')
            break

         case 'delta': {
            const quantity = (record[H.QUANTITY] ?? record[H.PACK_QUANTITY] ?? 0) + command.delta
            record[H.QUANTITY] = quantity
            touch(record)
            log.info({ barcode: record[H.BARCODE], quantity }, 'Quantity updated')
            if (quantity < 0) warn(out, `Quantity is negative (${quantity})`)
            break
         }

         case 'override': {
            const { partNumber } = command
            const product = await attempt(out, `Product lookup for ${partNumber}`, signal =>
               ctx.lookup.productDetailLookup(partNumber, { signal })
            )
            if (product) {
               applyProduct(record, product)
               log.info({ barcode: record[H.BARCODE], partNumber }, 'Product overridden')
            }
            break
         }
      }
   }

   return {
      async handle(event) {
         const out: Outcome = { committed: [], warnings: [] }
         try {
            switch (event.type) {
               case 'scan':
                  await onScan(event, out)
                  break
               case 'command':
                  await onCommand(event, out)
                  break
               case 'flush':
                  await commit(out)
                  break
            }
         } catch (error) {
            const message = `Unexpected failure handling ${event.type}: ${errorMessage(error)}`
            out.warnings.push(message)
            log.error(error, message)
         }
         return { state: open ? 'open' : 'idle', ...out }
      },

      state() {
         return open ? 'open' : 'idle'
      },

      openRecord() {
         return open ? Object.freeze({ ...open }) : null
      },
   }
}
