import dotenv from 'dotenv'
import { loadConfig } from '../config'
import { createLogger } from '../lib/logger'
import { type CustomerRow } from './rows'
import { createDatabase, migrateLatest } from './database'

dotenv.config()

const sampleCustomers: Omit<CustomerRow, 'id'>[] = [
  {
    name: 'Sample Traders',
    email: 'accounts@example.com',
    mobile: '9800000000',
    address: '12 Sample Street, Pune',
    gst_no: '27ABCDE1234F1Z5',
    pan_no: 'ABCDE1234F',
    state: 'Maharashtra',
    state_code: '27'
  }
]

async function main() {
  const config = loadConfig()
  const logger = createLogger(config.logging, 'waybill-seed')
  const db = createDatabase(config.database)

  try {
    logger.info('🌱 Starting database seeding...')
    await migrateLatest(db)

    for (const customer of sampleCustomers) {
      const existing = await db<CustomerRow>('customers').where({ name: customer.name }).first()
      if (existing) {
        logger.info(`Customer "${customer.name}" already present`)
        continue
      }
      await db<CustomerRow>('customers').insert(customer)
      logger.info(`Created customer "${customer.name}"`)
    }

    logger.info('🎉 Database seeding completed!')
  } finally {
    await db.destroy()
  }
}

main().catch((e: unknown) => {
  console.error('❌ Error during seeding:', e)
  process.exit(1)
})
