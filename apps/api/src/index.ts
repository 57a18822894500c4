import { Server } from 'http'
import dotenv from 'dotenv'
import { createApp } from './app'
import { ConfigError, loadConfig } from './config'
import { createDatabase, migrateLatest } from './db/database'
import { createLogger } from './lib/logger'
import { listen } from './lib/server'

dotenv.config()

async function start() {
  const config = loadConfig()
  const logger = createLogger(config.logging)
  const db = createDatabase(config.database)

  const applied = await migrateLatest(db)
  if (applied.length > 0) {
    logger.info('Applied database migrations', { migrations: applied })
  }

  const app = createApp({ config, db, logger })
  let server: Server
  try {
    server = await listen(app, config.port)
  } catch (error) {
    logger.error('Failed to bind HTTP server', {
      port: config.port,
      error: error instanceof Error ? error.message : String(error)
    })
    await db.destroy()
    process.exit(1)
  }
  logger.info(`🚀 Waybill billing API running on port ${config.port}`)
  server.on('error', (error) => {
    logger.error('HTTP server error', { error: error.message })
  })

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`)
    server.close(() => {
      db.destroy()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close database pool', { error })
          process.exit(1)
        })
    })
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))
}

start().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message)
  } else {
    console.error('❌ Failed to start API server:', error)
  }
  process.exit(1)
})
