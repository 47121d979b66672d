import { createReadStream } from 'fs'
import { createInterface, type Interface } from 'readline'
import type { EventChannel } from '../queues'
import type { ScanIntake } from '../services/scan-intake'
import { splitAimPrefix } from '../utils/symbology'

/**
 * Reads an external line device: a handheld scanner, keypad or any process
 * writing lines to a tty, FIFO or file.
 * - Lines starting with an AIM symbology identifier (e.g. `]C0`) are scans.
 * - Anything else is an operator command.
 */
export function startLineDevice(
   path: string,
   intake: ScanIntake,
   channel: EventChannel,
   input: NodeJS.ReadableStream = createReadStream(path, { encoding: 'utf8' })
): Interface {
   const device = createInterface({ input, terminal: false })

   input.on('error', (error) => {
      log.error(error, `Line device ${path} failed`)
   })

   device.on('line', (line) => {
      handleDeviceLine(line, intake, channel)
         .catch((error: unknown) => log.error(error, `Could not queue line from ${path}`))
   })

   log.info({ path }, 'Line device attached')
   return device
}

export async function handleDeviceLine(
   line: string,
   intake: ScanIntake,
   channel: EventChannel,
   now = Date.now()
): Promise<void> {
   const scan = splitAimPrefix(line)
   if (scan) {
      await intake.submit({ ...scan, scannedAt: now })
      return
   }
   await channel.publish({ type: 'command', line, source: 'device' })
}
