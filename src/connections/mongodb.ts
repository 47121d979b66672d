import { MongoClient, Db } from 'mongodb'

let client: MongoClient | undefined

export async function initializeDatabase(): Promise<Db> {
   // Get MongoDB connection URI from environment variables
   const uri = process.env.MONGO_URI
   if (!uri) throw new Error(
      'MONGO_URI is not defined in the environment variables.'
   )

   const dbName = process.env.MONGO_DB_NAME
   if (!dbName) throw new Error(
      'MONGO_DB_NAME is not defined in the environment variables.'
   )

   client = new MongoClient(uri)

   // Connect the client to the server
   await client.connect()

   // Get a reference to the database
   const db = client.db(dbName, { ignoreUndefined: true })

   // Verify the connection with a simple command
   await db.command({ ping: 1 })
   log.info(`Connected to MongoDB database: ${dbName}`)

   return db
}

export async function closeDatabase(): Promise<void> {
   if (!client) return
   await client.close()
   client = undefined
   log.info('MongoDB connection closed')
}
