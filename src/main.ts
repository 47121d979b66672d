import { flushLogs } from './utils/global-logger'
import { serve, type ServerType } from '@hono/node-server'
import type { Hono } from 'hono'
import type { Interface } from 'readline'
import { createApi } from './api/routes'
import { SHUTDOWN_TIMEOUT_MS } from './config/settings'
import { closeDatabase, initializeDatabase } from './connections/mongodb'
import { redisOptionsFromEnv } from './connections/redis'
import { startLineDevice } from './inputs/line-device'
import { startOperatorConsole } from './inputs/operator-console'
import { createBullChannel, createMemoryChannel, type EventChannel } from './queues'
import { createMongoInventoryTable } from './services/inventory-table'
import { createInventoryPipeline, loadDuplicateIndex } from './services/pipeline'
import { createScanIntake } from './services/scan-intake'
import { createDigikeyApi, digikeyConfigFromEnv } from './systems/digikey/api'
import { createDigikeyLookup } from './systems/digikey/lookup'

interface Runtime {
   app: Hono
   channel: EventChannel
   inputs: Interface[]
   server?: ServerType
}

let runtime: Runtime | undefined
let shuttingDown = false


export async function buildApp(): Promise<Runtime> {
   log.info('Building application...')

   // A table that cannot be read aborts startup
   const db = await initializeDatabase()
   const table = createMongoInventoryTable(db)
   const index = await loadDuplicateIndex(table)

   const lookup = createDigikeyLookup(createDigikeyApi(digikeyConfigFromEnv()))
   const pipeline = createInventoryPipeline({ table, lookup, index })

   const channel = process.env.EVENT_CHANNEL === 'redis'
      ? createBullChannel(redisOptionsFromEnv())
      : createMemoryChannel()

   // The single consumer
   channel.start((event) => pipeline.handle(event))

   const intake = createScanIntake(channel)
   const inputs = [startOperatorConsole(channel)]

   const devicePath = process.env.DEVICE_PATH
   if (devicePath) inputs.push(startLineDevice(devicePath, intake, channel))

   const app = createApi({ intake, channel, table, onQuit: () => shutdown('QUIT') })

   return { app, channel, inputs }
}


async function startServer() {
   process.on('SIGINT', shutdown)
   process.on('SIGTERM', shutdown)

   try {
      runtime = await buildApp()
      const PORT = process.env.PORT || 3000

      // Start the Node.js server
      runtime.server = serve({
         fetch: runtime.app.fetch,
         port: Number(PORT),
      })

      log.info(`Server running on port ${PORT}`)
      log.info('Application started successfully')

   } catch (error) {
      log.error(error, 'Application Startup Error')
      await shutdown('ERROR')
   }
}


// --- Final Graceful Shutdown Handler ---
async function shutdown(signal: string) {
   if (shuttingDown) return
   shuttingDown = true
   log.info(`${signal} received. Shutting down gracefully...`)

   const shutdownTimeout = setTimeout(() => {
      log.warn('Shutdown timeout reached. Forcing exit.')
      process.exit(1)
   }, SHUTDOWN_TIMEOUT_MS)

   try {
      if (runtime) {
         // 1. Stop every producer
         const { server, inputs, channel } = runtime
         inputs.forEach(input => input.close())
         if (server) await new Promise<void>(resolve => server.close(() => resolve()))

         // 2. Commit the open record after everything already queued,
         //    then let the in-flight lookup finish
         await channel.publish({ type: 'flush' })
         await channel.close()
         log.info('Event channel drained')
      }
      await closeDatabase()
   } catch (error) {
      log.error(error, `Error during ${signal} shutdown`)
   } finally {
      clearTimeout(shutdownTimeout)
      await flushLogs()
      process.exit(signal === 'ERROR' ? 1 : 0)
   }
}


startServer()
