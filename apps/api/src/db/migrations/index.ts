import { Knex } from 'knex'
import * as createBillingTables from './001_create_billing_tables'

const migrations: Record<string, Knex.Migration> = {
  '001_create_billing_tables': createBillingTables,
}

// Migrations are bundled with the code rather than discovered on disk
export const migrationSource: Knex.MigrationSource<string> = {
  getMigrations: async () => Object.keys(migrations).sort(),
  getMigrationName: (migration) => migration,
  getMigration: async (migration) => migrations[migration],
}
