/**
 * Application-wide settings.
 */


/**
 * Two sightings of the same scanned text no further apart than this are one
 * physical scan: the label was simply held in front of the camera.
 */
export const DEDUP_WINDOW_MS = 4000

/**
 * Upper bound on remembered sightings. The least recently sighted text is
 * forgotten first; forgetting it only means a later sighting counts as new.
 */
export const DEDUP_CAPACITY = 1024

/**
 * Upper bound on a single catalog lookup. The consumer processes events one
 * at a time, so a hanging lookup would otherwise stall every queued scan.
 */
export const LOOKUP_TIMEOUT_MS = 15000

/**
 * Catalog API hosts.
 */
export const DIGIKEY_API_URL = 'https://api.digikey.com/'
export const DIGIKEY_SANDBOX_API_URL = 'https://sandbox-api.digikey.com/'

export const DEFAULT_LOCALE_LANGUAGE = 'en'
export const DEFAULT_LOCALE_SITE = 'US'

/**
 * Grace period for in-flight work during shutdown before the process is forced to exit.
 */
export const SHUTDOWN_TIMEOUT_MS = 30000
