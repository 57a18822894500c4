import knex, { Knex } from 'knex'
import { types } from 'pg'
import type { DatabaseConfig } from '../config'
import { migrationSource } from './migrations'

// DATE columns stay as YYYY-MM-DD text instead of local-midnight Date objects
types.setTypeParser(types.builtins.DATE, (value: string) => value)

interface SqliteConnection {
  pragma(source: string): unknown
}

export function createDatabase(config: DatabaseConfig): Knex {
  if (config.client === 'better-sqlite3') {
    return knex({
      client: 'better-sqlite3',
      connection: { filename: config.connection },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
        afterCreate: (conn: SqliteConnection, done: (err: Error | null, conn: SqliteConnection) => void) => {
          conn.pragma('foreign_keys = ON')
          done(null, conn)
        },
      },
    })
  }

  return knex({
    client: 'pg',
    connection: config.connection,
    pool: { min: 0, max: 10 },
  })
}

export async function migrateLatest(db: Knex): Promise<string[]> {
  const [, applied] = await db.migrate.latest({ migrationSource })
  return applied
}

export function createTestDatabase(): Knex {
  return createDatabase({ client: 'better-sqlite3', connection: ':memory:' })
}
