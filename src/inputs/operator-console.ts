import { createInterface, type Interface } from 'readline'
import type { EventChannel } from '../queues'

/**
 * Reads operator commands from a line-oriented stream, stdin by default.
 * Every line, including an empty one, is a command.
 */
export function startOperatorConsole(
   channel: EventChannel,
   input: NodeJS.ReadableStream = process.stdin
): Interface {
   const reader = createInterface({ input, terminal: false })

   reader.on('line', (line) => {
      channel
         .publish({ type: 'command', line, source: 'operator' })
         .catch((error: unknown) => log.error(error, 'Could not queue operator command'))
   })

   log.info('Operator console ready: <enter> commit, d delete, +N/-N quantity, p<part> override')
   return reader
}
