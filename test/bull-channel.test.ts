import { describe, it, expect, beforeEach, vi } from 'vitest'
import { createBullChannel } from '../src/queues'
import type { PipelineEvent } from '../src/types/events'
import { queues } from './fake-bull'

vi.mock('bull', async () => await import('./fake-bull'))

const SCAN: PipelineEvent = { type: 'scan', symbology: ']C0', text: '0123456789', scannedAt: 0 }

describe('createBullChannel', () => {
   beforeEach(() => {
      queues.length = 0
   })

   it('handles every queued event, flush included, before closing', async () => {
      const channel = createBullChannel({ host: 'localhost', port: 6379 })
      const handled: string[] = []

      channel.start(async (event) => {
         await new Promise(resolve => setTimeout(resolve, 5))
         handled.push(event.type)
      })

      await channel.publish(SCAN)
      await channel.publish({ type: 'command', line: '+5', source: 'operator' })
      await channel.publish({ type: 'flush' })
      await channel.close()

      expect(handled).toEqual(['scan', 'command', 'flush'])
      expect(queues[0]?.name).toBe('scan_events')
      expect(queues[0]?.closed).toBe(true)
   })

   it('closes right away without a consumer', async () => {
      const channel = createBullChannel({ host: 'localhost', port: 6379 })
      await channel.publish(SCAN)
      await channel.close()

      expect(queues[0]?.closed).toBe(true)
      expect(queues[0]?.waiting).toHaveLength(1)
   })

   it('refuses events after close', async () => {
      const channel = createBullChannel({ host: 'localhost', port: 6379 })
      await channel.close()
      await expect(channel.publish(SCAN)).rejects.toThrow('Event channel is closed')
   })

   it('takes a single consumer', () => {
      const channel = createBullChannel({ host: 'localhost', port: 6379 })
      channel.start(async () => {})
      expect(() => channel.start(async () => {})).toThrow('Event channel already has a consumer')
   })
})
