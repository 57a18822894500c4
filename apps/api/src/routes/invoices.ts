import { Router } from 'express'
import multer from 'multer'
import { ValidationError } from '../lib/errors'
import { parseIdParam } from '../lib/http'
import { InvoiceService } from '../services/invoice.service'
import { PdfService } from '../services/pdf.service'
import { SpreadsheetService } from '../services/spreadsheet.service'
import {
  invoiceInputSchema,
  invoiceListQuerySchema,
  paymentStatusInputSchema,
} from '../validation/schemas'

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'

export interface InvoiceRouteDeps {
  invoices: InvoiceService
  pdf: PdfService
  spreadsheets: SpreadsheetService
  maxUploadBytes: number
}

export function createInvoiceRoutes({ invoices, pdf, spreadsheets, maxUploadBytes }: InvoiceRouteDeps): Router {
  const router: Router = Router()
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: maxUploadBytes, files: 1 } })

  // GET /api/invoices - List invoices with totals, search and pagination
  router.get('/', async (req, res, next) => {
    try {
      const query = invoiceListQuerySchema.parse(req.query)
      res.json(await invoices.list(query))
    } catch (error) {
      next(error)
    }
  })

  // GET /api/invoices/next-number - Number the next created invoice would get
  router.get('/next-number', async (req, res, next) => {
    try {
      res.json({ invoiceNo: await invoices.peekNextNumber() })
    } catch (error) {
      next(error)
    }
  })

  // GET /api/invoices/import-template - Empty item spreadsheet
  router.get('/import-template', async (req, res, next) => {
    try {
      const template = await spreadsheets.buildTemplate()
      res.setHeader('Content-Type', XLSX_CONTENT_TYPE)
      res.setHeader('Content-Disposition', 'attachment; filename="invoice-items-template.xlsx"')
      res.send(template)
    } catch (error) {
      next(error)
    }
  })

  // GET /api/invoices/:id - Invoice with customer, items and totals
  router.get('/:id', async (req, res, next) => {
    try {
      const id = parseIdParam(req.params.id, 'Invoice')
      res.json(await invoices.get(id))
    } catch (error) {
      next(error)
    }
  })

  // GET /api/invoices/:id/pdf - Render invoice as PDF
  router.get('/:id/pdf', async (req, res, next) => {
    try {
      const id = parseIdParam(req.params.id, 'Invoice')
      const invoice = await invoices.get(id)
      const { buffer, filename } = await pdf.render(invoice)

      res.setHeader('Content-Type', 'application/pdf')
      res.setHeader('Content-Disposition', `inline; filename="${filename}"`)
      res.send(buffer)
    } catch (error) {
      next(error)
    }
  })

  // POST /api/invoices - Create invoice with items
  router.post('/', async (req, res, next) => {
    try {
      const input = invoiceInputSchema.parse(req.body)
      res.status(201).json(await invoices.create(input))
    } catch (error) {
      next(error)
    }
  })

  // PUT /api/invoices/:id - Update invoice and replace its items
  router.put('/:id', async (req, res, next) => {
    try {
      const id = parseIdParam(req.params.id, 'Invoice')
      const input = invoiceInputSchema.parse(req.body)
      res.json(await invoices.update(id, input))
    } catch (error) {
      next(error)
    }
  })

  // PATCH /api/invoices/:id/status - Change payment status
  router.patch('/:id/status', async (req, res, next) => {
    try {
      const id = parseIdParam(req.params.id, 'Invoice')
      const { paymentStatus } = paymentStatusInputSchema.parse(req.body)
      res.json(await invoices.updateStatus(id, paymentStatus))
    } catch (error) {
      next(error)
    }
  })

  // POST /api/invoices/:id/items/import - Append items from an uploaded spreadsheet
  router.post('/:id/items/import', upload.single('file'), async (req, res, next) => {
    try {
      const id = parseIdParam(req.params.id, 'Invoice')
      if (!req.file) {
        throw new ValidationError('No file uploaded; send the spreadsheet as the "file" field')
      }

      const { items, skipped, rejected } = await spreadsheets.importItems(req.file.buffer)
      const invoice = await invoices.appendItems(id, items)
      res.json({ imported: items.length, skipped, rejected, invoice })
    } catch (error) {
      next(error)
    }
  })

  // DELETE /api/invoices/:id - Delete invoice and its items
  router.delete('/:id', async (req, res, next) => {
    try {
      const id = parseIdParam(req.params.id, 'Invoice')
      await invoices.delete(id)
      res.status(204).send()
    } catch (error) {
      next(error)
    }
  })

  return router
}
