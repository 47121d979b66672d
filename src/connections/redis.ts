import Redis, { type RedisOptions } from 'ioredis'

export type RedisConnectionType = 'client' | 'subscriber' | 'bclient'

/**
 * Reads the Redis location from the environment.
 * @throws When REDIS_HOST or REDIS_PORT is missing.
 */
export function redisOptionsFromEnv(): RedisOptions {
   if (!process.env.REDIS_HOST) throw new Error(
      'REDIS_HOST must be set in environment variables'
   )

   if (!process.env.REDIS_PORT) throw new Error(
      'REDIS_PORT must be set in environment variables'
   )

   return {
      host: process.env.REDIS_HOST,
      port: Number(process.env.REDIS_PORT),
   }
}

/**
 * Opens one Redis connection for Bull. Bull's blocking and subscriber
 * connections must not give up on requests or wait for the ready check.
 */
export function createRedisConnection(type: RedisConnectionType, options: RedisOptions): Redis {
   const connection = new Redis(
      type === 'client'
         ? options
         : { ...options, maxRetriesPerRequest: null, enableReadyCheck: false }
   )

   // Error handling
   connection.on('error', (error) => {
      log.error(error, `Redis ${type} error`)
   })

   // Reconnection event
   connection.on('reconnecting', () => {
      log.warn(`Redis ${type} reconnecting`)
   })

   // Successful connection
   connection.on('connect', () => {
      log.info(`Redis ${type} connected`)
   })

   return connection
}
