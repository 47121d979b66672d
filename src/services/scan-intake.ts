import type { EventChannel } from '../queues'
import type { ScanEvent } from '../types/events'
import { escapeBarcode } from '../utils/string-utils'
import { createScanDeduplicator, type ScanDeduplicator, type Sighting } from './scan-dedup'

export type ScanReport = Omit<ScanEvent, 'type'>

export interface ScanIntake {
   /**
    * Publishes a scan unless it repeats a sighting still inside the dedup window.
    */
   submit(report: ScanReport): Promise<Sighting>
}

/**
 * The scan-producing side of the channel. It is the only owner of the
 * sighting table; every scan source goes through the same intake.
 */
export function createScanIntake(
   channel: EventChannel,
   dedup: ScanDeduplicator = createScanDeduplicator()
): ScanIntake {
   return {
      async submit(report) {
         const sighting = dedup.observe(report.text, report.scannedAt)

         if (sighting === 'repeat') {
            log.trace({ barcode: escapeBarcode(report.text) }, 'Repeat sighting suppressed')
            return sighting
         }

         await channel.publish({ type: 'scan', ...report })
         log.debug({ barcode: escapeBarcode(report.text), symbology: report.symbology }, 'Scan queued')
         return sighting
      },
   }
}
