import type { InventoryRow } from './inventory'

/**
 * General convention for channel events:
 * events are plain JSON so they survive a round trip through Redis when the
 * channel is Bull-backed. Timestamps are therefore epoch milliseconds.
 */

/**
 * A decoded code as reported by the capture process.
 * `symbology` is the AIM symbology identifier, e.g. `]d2` for DataMatrix.
 */
export interface ScanEvent {
   type: 'scan'
   symbology: string
   text: string
   scannedAt: number
}

export type CommandSource = 'operator' | 'device' | 'http'

export interface CommandEvent {
   type: 'command'
   line: string
   source: CommandSource
}

/**
 * Published once at shutdown, after every producer has stopped.
 */
export interface FlushEvent {
   type: 'flush'
}

export type PipelineEvent = ScanEvent | CommandEvent | FlushEvent

export type OperatorCommand =
   | { kind: 'commit' }
   | { kind: 'delete' }
   | { kind: 'delta'; delta: number }
   | { kind: 'override'; partNumber: string }

export type PipelineState = 'idle' | 'open'

/**
 * What handling one event did.
 */
export interface PipelineOutcome {
   state: PipelineState
   committed: InventoryRow[]
   warnings: string[]
}
