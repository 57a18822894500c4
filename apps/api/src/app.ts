import express, { Express } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import compression from 'compression'
import { Knex } from 'knex'
import type { AppConfig } from './config'
import type { Logger } from './lib/logger'
import { errorHandler, notFoundHandler } from './middleware/errorHandler'
import { requestLogger } from './middleware/requestLogger'
import { createCustomerRoutes } from './routes/customers'
import { createInvoiceRoutes } from './routes/invoices'
import { CustomerService } from './services/customer.service'
import { InvoiceService } from './services/invoice.service'
import { PdfService } from './services/pdf.service'
import { SpreadsheetService } from './services/spreadsheet.service'

export interface AppDeps {
  config: Pick<AppConfig, 'maxUploadBytes' | 'pdf' | 'logging'>
  db: Knex
  logger: Logger
}

export function createApp({ config, db, logger }: AppDeps): Express {
  const app = express()

  const customers = new CustomerService(db)
  const invoices = new InvoiceService(db, customers, logger)
  const pdf = new PdfService(config.pdf)
  const spreadsheets = new SpreadsheetService()

  // Middleware
  app.use(helmet())
  app.use(compression())
  app.use(cors())
  app.use(express.json({ limit: '5mb' }))
  app.use(express.urlencoded({ extended: true }))

  // Health check route
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'waybill-api'
    })
  })

  app.use('/api', requestLogger(logger, { logRequestBody: config.logging.requestBodies }))

  // API routes
  app.use('/api/customers', createCustomerRoutes(customers))
  app.use('/api/invoices', createInvoiceRoutes({
    invoices,
    pdf,
    spreadsheets,
    maxUploadBytes: config.maxUploadBytes
  }))

  app.use('*', notFoundHandler)
  app.use(errorHandler(logger))

  return app
}
