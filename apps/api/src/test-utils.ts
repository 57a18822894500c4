import { Express } from 'express'
import { Knex } from 'knex'
import type { AppDeps } from './app'
import { createTestDatabase, migrateLatest } from './db/database'
import { listen } from './lib/server'

export const testAppConfig: AppDeps['config'] = {
  maxUploadBytes: 1024 * 1024,
  logging: { level: 'info', console: false, silent: true, requestBodies: true },
  pdf: { pageSize: 'A4', seller: { name: 'Courier Services' } },
}

export async function setupTestDatabase(): Promise<Knex> {
  const db = createTestDatabase()
  await migrateLatest(db)
  return db
}

export async function clearTables(db: Knex): Promise<void> {
  await db('invoice_items').delete()
  await db('invoices').delete()
  await db('customers').delete()
}

export interface TestServer {
  baseUrl: string
  port: number
  close(): Promise<void>
}

/**
 * Listens on an ephemeral localhost port for the duration of a test file
 */
export async function startTestServer(app: Express): Promise<TestServer> {
  const server = await listen(app, 0, '127.0.0.1')
  const address = server.address()
  if (address === null || typeof address === 'string') {
    server.close()
    throw new Error('Test server is not bound to a TCP port')
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    port: address.port,
    close: () => new Promise<void>((done, fail) => {
      server.closeAllConnections()
      server.close((error) => (error ? fail(error) : done()))
    }),
  }
}
