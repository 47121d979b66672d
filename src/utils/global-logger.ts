import pino, { type Level } from 'pino'
import pretty from 'pino-pretty'
import { Writable } from 'stream'
import { Logtail } from '@logtail/node'
import { errorMessage } from './errors'

const { BETTERSTACK_SOURCE_TOKEN, BETTERSTACK_ENDPOINT, CONSOLE_LOG_LEVEL } = process.env

function isLevel(value: string | undefined): value is Level {
   return value !== undefined && value in pino.levels.values
}

const streams: pino.StreamEntry[] = []
let logtail: Logtail | undefined

// Stream 1: always pretty-printed output to local stdout (TTY or not)
streams.push({
   level: isLevel(CONSOLE_LOG_LEVEL) ? CONSOLE_LOG_LEVEL : 'info',
   stream: pretty({
      colorize: true,
      translateTime: 'SYS:d mmm HH:MM:ss.l',
      ignore: 'pid,hostname',
   }),
})

// Stream 2: Better Stack, when a source is configured
if (BETTERSTACK_SOURCE_TOKEN) {
   if (!BETTERSTACK_ENDPOINT) throw new Error(
      'Environment variable BETTERSTACK_ENDPOINT is required when BETTERSTACK_SOURCE_TOKEN is set'
   )

   const remote = new Logtail(
      BETTERSTACK_SOURCE_TOKEN,
      { endpoint: BETTERSTACK_ENDPOINT }
   )
   logtail = remote

   const betterStackStream = new Writable({
      objectMode: true,
      write(chunk, _enc, cb) {
         const logEntry = JSON.parse(chunk.toString())
         const level = pino.levels.labels[logEntry.level] || 'info'
         const { level: _lvl, time: _time, pid: _pid, hostname: _host, msg, ...context } = logEntry
         // Fire-and-forget: pino is told the entry is done right away
         remote.log(msg, level, context).catch((error: unknown) => {
            process.stderr.write(`Better Stack shipping failed: ${errorMessage(error)}\n`)
         })
         cb()
      },
   })

   streams.push({ level: 'debug', stream: betterStackStream })
}


const logger = pino({ level: 'trace' }, pino.multistream(streams))
globalThis.log = logger


/**
 * Sends whatever Better Stack still buffers. Call before process.exit.
 */
export async function flushLogs(): Promise<void> {
   if (!logtail) return
   try {
      await logtail.flush()
   } catch (error) {
      process.stderr.write(`Better Stack flush failed: ${errorMessage(error)}\n`)
   }
}


export default logger
