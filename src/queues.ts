import Bull, { type Job, type QueueOptions } from 'bull'
import type { RedisOptions } from 'ioredis'
import { SCAN_EVENTS } from './config/constants'
import { createRedisConnection } from './connections/redis'
import type { PipelineEvent } from './types/events'

export type EventHandler = (event: PipelineEvent) => Promise<unknown>

/**
 * The one serialized channel between all producers and the pipeline.
 * Events reach the handler strictly in publish order, one at a time: the next
 * event is not handed over before the previous handler call settles.
 */
export interface EventChannel {
   publish(event: PipelineEvent): Promise<void>
   /** Attaches the single consumer. */
   start(handler: EventHandler): void
   /** Stops accepting events and waits for the ones already queued. */
   close(): Promise<void>
}

/**
 * In-process FIFO channel.
 */
export function createMemoryChannel(): EventChannel {
   const pending: PipelineEvent[] = []
   let handler: EventHandler | null = null
   let draining: Promise<void> | null = null
   let closed = false

   function drain() {
      const consume = handler
      if (draining || !consume || !pending.length) return

      draining = (async () => {
         let event = pending.shift()
         while (event) {
            try {
               await consume(event)
            } catch (error) {
               log.error(error, `Event handler failed for ${event.type} event`)
            }
            event = pending.shift()
         }
         draining = null
      })()
   }

   return {
      async publish(event) {
         if (closed) throw new Error('Event channel is closed')
         pending.push(event)
         drain()
      },

      start(consume) {
         if (handler) throw new Error('Event channel already has a consumer')
         handler = consume
         drain()
      },

      async close() {
         closed = true
         while (draining) await draining
      },
   }
}


// Queue configuration
const queueConfig: QueueOptions = {
   settings: {
      stalledInterval: 0, // never check for stalled jobs
   },
   defaultJobOptions: {
      attempts: 1, // Only try once, no retries
      removeOnComplete: true,
      removeOnFail: 100,
   },
}

/**
 * Redis-backed channel. Events queued before a crash are still handled after
 * a restart. Processing with concurrency 1 keeps Bull's FIFO order intact.
 */
export function createBullChannel(redisOptions: RedisOptions): EventChannel {
   const queue = new Bull<PipelineEvent>(SCAN_EVENTS, {
      ...queueConfig,
      createClient: (type) => createRedisConnection(type, redisOptions),
   })

   let started = false
   let closed = false
   const drainWaiters: (() => void)[] = []

   // Emitted once the worker finds no waiting job left
   queue.on('drained', () => {
      drainWaiters.splice(0).forEach(resolve => resolve())
   })

   return {
      async publish(event) {
         if (closed) throw new Error('Event channel is closed')
         await queue.add(event)
      },

      start(handler) {
         if (started) throw new Error('Event channel already has a consumer')
         started = true

         queue.on('failed', (job: Job<PipelineEvent>, error: Error) => {
            log.error(error, `Event ${job.id} failed in queue ${SCAN_EVENTS}`)
         })

         queue.process(1, async (job: Job<PipelineEvent>) => {
            await handler(job.data)
         }).catch((error: unknown) => {
            log.error(error, `Queue ${SCAN_EVENTS} stopped processing`)
         })

         log.info(`Queue ${SCAN_EVENTS} processing`)
      },

      async close() {
         closed = true

         // queue.close() only waits for the active job, so let the worker
         // reach the end of the queue first
         if (started) {
            const drained = new Promise<void>(resolve => drainWaiters.push(resolve))
            const waiting = await queue.count()
            if (waiting > 0) {
               log.info({ waiting }, `Draining queue ${SCAN_EVENTS}`)
               await drained
            }
         }

         await queue.close()
      },
   }
}
