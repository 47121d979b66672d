/**
 * A scanned payload carried the segmented-format header but broke its grammar
 * (malformed segment, repeated identifier). Fatal to that one decode only.
 */
export class FormatError extends Error {
   constructor(message: string) {
      super(message)
      this.name = 'FormatError'
   }
}

/**
 * A catalog lookup failed, timed out, or returned an unusable response.
 */
export class LookupFailure extends Error {
   constructor(message: string, readonly status?: number) {
      super(message)
      this.name = 'LookupFailure'
   }
}

/**
 * An operator command was malformed or not valid in the current state.
 */
export class CommandParseError extends Error {
   constructor(message: string) {
      super(message)
      this.name = 'CommandParseError'
   }
}

/**
 * The inventory table could not be read or written.
 */
export class StorageError extends Error {
   constructor(message: string, options?: { cause?: unknown }) {
      super(message, options)
      this.name = 'StorageError'
   }
}

export function errorMessage(error: unknown): string {
   return error instanceof Error ? error.message : String(error)
}
