import { EventEmitter } from 'events'

interface FakeJob {
   id: number
   data: unknown
}

type Processor = (job: FakeJob) => Promise<void>

export const queues: FakeQueue[] = []

/**
 * An in-process stand-in for a Bull queue. Like Bull, close() pauses the
 * worker and only waits for the job in progress.
 */
export default class FakeQueue extends EventEmitter {
   readonly waiting: FakeJob[] = []
   closed = false
   private processor: Processor | null = null
   private active: Promise<void> | null = null
   private paused = false
   private nextId = 1

   constructor(readonly name: string) {
      super()
      queues.push(this)
   }

   async add(data: unknown): Promise<FakeJob> {
      const job = { id: this.nextId++, data }
      this.waiting.push(job)
      this.work()
      return job
   }

   process(_concurrency: number, processor: Processor): Promise<void> {
      this.processor = processor
      this.work()
      return Promise.resolve()
   }

   async count(): Promise<number> {
      return this.waiting.length
   }

   async close(): Promise<void> {
      this.paused = true
      await this.active
      this.closed = true
   }

   private work() {
      const processor = this.processor
      if (this.active || this.paused || !processor || !this.waiting.length) return

      this.active = (async () => {
         let job = this.waiting.shift()
         while (job) {
            try {
               await processor(job)
            } catch (error) {
               this.emit('failed', job, error)
            }
            if (this.paused) break
            job = this.waiting.shift()
         }
         this.active = null
         if (!this.waiting.length) this.emit('drained')
      })()
   }
}
