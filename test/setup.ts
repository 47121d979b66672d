import pino from 'pino'

// Modules under test log through the global `log`
globalThis.log = pino({ level: 'silent' })
