import { Hono } from 'hono'
import { z } from 'zod'
import type { EventChannel } from '../queues'
import { exportInventory } from '../services/export'
import type { ScanIntake } from '../services/scan-intake'
import type { InventoryTable } from '../types/inventory'

const scanReportSchema = z.object({
   symbology: z.string(),
   text: z.string().min(1),
   scannedAt: z.number().int().nonnegative().optional(),
})

const commandSchema = z.object({
   line: z.string(),
})

export interface ApiDependencies {
   intake: ScanIntake
   channel: EventChannel
   table: InventoryTable
   /** Invoked by the capture surface's quit signal. */
   onQuit: () => Promise<void>
   now?: () => number
}

/**
 * The HTTP surface the capture/decode process talks to.
 */
export function createApi({ intake, channel, table, onQuit, now = Date.now }: ApiDependencies): Hono {
   const app = new Hono()

   // Decoded codes from the capture process
   app.post('/scans', async (c) => {
      const body: unknown = await c.req.json().catch(() => null)
      const result = scanReportSchema.safeParse(body)
      if (!result.success) {
         return c.json({ error: result.error.flatten() }, 400)
      }

      const { symbology, text, scannedAt } = result.data
      const status = await intake.submit({ symbology, text, scannedAt: scannedAt ?? now() })
      return c.json({ status })
   })

   // Operator commands from a remote terminal
   app.post('/commands', async (c) => {
      const body: unknown = await c.req.json().catch(() => null)
      const result = commandSchema.safeParse(body)
      if (!result.success) {
         return c.json({ error: result.error.flatten() }, 400)
      }

      await channel.publish({ type: 'command', line: result.data.line, source: 'http' })
      return c.json({ status: 'queued' }, 202)
   })

   app.post('/quit', (c) => {
      log.info('Quit requested by capture surface')
      onQuit().catch((error: unknown) => log.error(error, 'Shutdown failed'))
      return c.json({ status: 'shutting down' }, 202)
   })

   app.get('/inventory/export', async (c) => {
      const rows = await table.loadAll()
      const { data, filename, mimetype } = await exportInventory(rows)
      log.info({ rows: rows.length, filename }, 'Inventory exported')
      return c.body(data, 200, {
         'Content-Type': mimetype,
         'Content-Disposition': `attachment; filename="${filename}"`,
      })
   })

   // Define a health check endpoint
   app.get('/health', (c) => c.json({ status: 'ok' }))

   // Error handling
   app.onError((err, c) => {
      log.error(err, 'Error handling request')
      return c.json({ error: 'Internal server error' }, 500)
   })

   return app
}
