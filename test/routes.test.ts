import { describe, it, expect, beforeEach, vi } from 'vitest'
import type { Hono } from 'hono'
import { createApi } from '../src/api/routes'
import { createScanIntake } from '../src/services/scan-intake'
import type { PipelineEvent } from '../src/types/events'
import { createMemoryTable, createRecordingChannel, inventoryRow } from './fakes'

function post(app: Hono, path: string, body: unknown) {
   return app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
   })
}

describe('HTTP API', () => {
   let app: Hono
   let published: PipelineEvent[]
   let table: ReturnType<typeof createMemoryTable>
   const onQuit = vi.fn(async () => {})

   beforeEach(() => {
      const recording = createRecordingChannel()
      published = recording.published
      table = createMemoryTable([inventoryRow()])
      onQuit.mockClear()
      app = createApi({
         intake: createScanIntake(recording.channel),
         channel: recording.channel,
         table,
         onQuit,
         now: () => 1000,
      })
   })

   it('queues a new scan and suppresses its repeat', async () => {
      const first = await post(app, '/scans', { symbology: ']C0', text: '0123456789' })
      expect(first.status).toBe(200)
      expect(await first.json()).toEqual({ status: 'new' })

      const second = await post(app, '/scans', { symbology: ']C0', text: '0123456789', scannedAt: 3000 })
      expect(await second.json()).toEqual({ status: 'repeat' })

      expect(published).toEqual([
         { type: 'scan', symbology: ']C0', text: '0123456789', scannedAt: 1000 },
      ])
   })

   it('rejects a scan without text', async () => {
      const res = await post(app, '/scans', { symbology: ']C0', text: '' })
      expect(res.status).toBe(400)
      expect(published).toEqual([])
   })

   it('rejects a body that is not JSON', async () => {
      const res = await app.request('/scans', { method: 'POST', body: 'not json' })
      expect(res.status).toBe(400)
   })

   it('queues operator commands', async () => {
      const res = await post(app, '/commands', { line: '+5' })
      expect(res.status).toBe(202)
      expect(await res.json()).toEqual({ status: 'queued' })
      expect(published).toEqual([{ type: 'command', line: '+5', source: 'http' }])
   })

   it('starts shutdown on quit', async () => {
      const res = await app.request('/quit', { method: 'POST' })
      expect(res.status).toBe(202)
      expect(onQuit).toHaveBeenCalledTimes(1)
   })

   it('exports the inventory as a workbook', async () => {
      const res = await app.request('/inventory/export')

      expect(res.status).toBe(200)
      expect(res.headers.get('Content-Type'))
         .toBe('application/vnd.openxmlformats-officedocument.spreadsheetml.sheet')
      expect(res.headers.get('Content-Disposition'))
         .toMatch(/^attachment; filename="inventory-\d{4}-\d{2}-\d{2}\.xlsx"$/)

      // xlsx files are zip archives
      const bytes = new Uint8Array(await res.arrayBuffer())
      expect([bytes[0], bytes[1]]).toEqual([0x50, 0x4b])
   })

   it('answers 500 when the table cannot be read', async () => {
      table.loadAll.mockRejectedValueOnce(new Error('connection reset'))
      const res = await app.request('/inventory/export')

      expect(res.status).toBe(500)
      expect(await res.json()).toEqual({ error: 'Internal server error' })
   })

   it('reports health', async () => {
      const res = await app.request('/health')
      expect(await res.json()).toEqual({ status: 'ok' })
   })
})
