/**
 * Scan Deduplicator
 *
 * The capture process reports every code in view on every frame, so a label
 * held steady in front of the camera arrives many times a second. This filter
 * lets the first sighting through and marks the rest as repeats until the
 * label has been out of view for the dedup window.
 *
 * Sightings are refreshed on every report, repeat or not: a label held in view
 * for a minute stays one scan. The table is bounded; the least recently
 * sighted text is evicted first.
 */

import { DEDUP_CAPACITY, DEDUP_WINDOW_MS } from '../config/settings'

export type Sighting = 'new' | 'repeat'

export interface ScanDeduplicatorOptions {
   windowMs?: number
   capacity?: number
}

export interface ScanDeduplicator {
   /**
    * Classifies one sighting and records it.
    * @param text The raw scanned text.
    * @param at Arrival time in epoch milliseconds.
    */
   observe(text: string, at: number): Sighting
   size(): number
}

export function createScanDeduplicator(
   { windowMs = DEDUP_WINDOW_MS, capacity = DEDUP_CAPACITY }: ScanDeduplicatorOptions = {}
): ScanDeduplicator {
   if (capacity < 1) throw new Error(`Dedup capacity must be at least 1, got ${capacity}`)

   // Map iteration order is insertion order, so re-inserting on every
   // sighting keeps the least recently sighted text first.
   const lastSeen = new Map<string, number>()

   return {
      observe(text, at) {
         const previous = lastSeen.get(text)
         const sighting: Sighting =
            previous !== undefined && at - previous <= windowMs ? 'repeat' : 'new'

         lastSeen.delete(text)
         lastSeen.set(text, at)

         if (lastSeen.size > capacity) {
            const oldest = lastSeen.keys().next()
            if (!oldest.done) lastSeen.delete(oldest.value)
         }

         return sighting
      },

      size() {
         return lastSeen.size
      },
   }
}
