import assert from 'node:assert'
import { after, before, beforeEach, describe, it } from 'node:test'
import { Workbook } from 'exceljs'
import { Knex } from 'knex'
import { z } from 'zod'

import { createApp } from '../app'
import { createSilentLogger } from '../lib/logger'
import { CustomerService } from '../services/customer.service'
import { clearTables, setupTestDatabase, startTestServer, testAppConfig, type TestServer } from '../test-utils'
import { customerInputSchema } from '../validation/schemas'

const errorBody = z.object({
  error: z.string(),
  details: z.array(z.object({ path: z.string(), message: z.string() })).optional(),
})

const invoiceBody = z.object({
  id: z.number(),
  invoiceNo: z.string(),
  gstType: z.string(),
  paymentStatus: z.string(),
  customer: z.object({ name: z.string() }),
  items: z.array(z.object({ date: z.string().nullable(), awbNo: z.string(), amount: z.number() })),
  totals: z.object({ subtotal: z.number(), igst: z.number(), billAmount: z.number() }),
})

const invoicePageBody = z.object({
  data: z.array(z.object({ invoiceNo: z.string(), itemCount: z.number() })),
  total: z.number(),
  page: z.number(),
  perPage: z.number(),
})

const importBody = z.object({
  imported: z.number(),
  skipped: z.number(),
  rejected: z.array(z.object({ row: z.number(), errors: z.array(z.string()) })),
  invoice: invoiceBody,
})

describe('invoice routes', () => {
  let db: Knex
  let server: TestServer
  let customerId: number

  const request = (path: string, init: RequestInit = {}) => fetch(`${server.baseUrl}${path}`, init)

  const sendJson = (method: string, path: string, body: unknown) =>
    request(path, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    })

  const createInvoice = async (body: Record<string, unknown> = {}) => {
    const res = await sendJson('POST', '/api/invoices', { customerId, ...body })
    assert.strictEqual(res.status, 201)
    return invoiceBody.parse(await res.json())
  }

  before(async () => {
    db = await setupTestDatabase()
    const app = createApp({
      config: testAppConfig,
      db,
      logger: createSilentLogger(),
    })
    server = await startTestServer(app)
  })

  after(async () => {
    await server.close()
    await db.destroy()
  })

  beforeEach(async () => {
    await clearTables(db)
    const customer = await new CustomerService(db).create(customerInputSchema.parse({ name: 'Sample Traders' }))
    customerId = customer.id
  })

  describe('POST /api/invoices', () => {
    it('creates an invoice with computed totals', async () => {
      const invoice = await createInvoice({
        invoiceDate: '30-04-2025',
        fuelPercentage: '5',
        additionalCharges: '20',
        gstType: 'Inter-State',
        gstRate: 18,
        items: [
          { date: '2025-04-01', awbNo: 'AWB1001', destination: 'Pune', weight: '1 kg', amount: 100 },
          { date: '2025-04-02', awbNo: 'AWB1002', destination: 'Delhi', weight: '2 kg', amount: 250.5 },
        ],
      })

      assert.strictEqual(invoice.invoiceNo, 'INV-0001')
      assert.strictEqual(invoice.gstType, 'IGST')
      assert.strictEqual(invoice.customer.name, 'Sample Traders')
      assert.deepStrictEqual(invoice.totals, { subtotal: 350.5, igst: 69.84, billAmount: 458 })
    })

    it('rejects an unsupported GST type', async () => {
      const res = await sendJson('POST', '/api/invoices', { customerId, gstType: 'VAT' })

      assert.strictEqual(res.status, 400)
      const body = errorBody.parse(await res.json())
      assert.strictEqual(body.error, 'Invalid request')
      assert.deepStrictEqual(body.details, [{ path: 'gstType', message: 'Unsupported GST type: VAT' }])
    })

    it('rejects amounts a money column cannot hold', async () => {
      const res = await sendJson('POST', '/api/invoices', {
        customerId,
        additionalCharges: 1e10,
        items: [{ awbNo: 'AWB1', amount: -1e11 }],
      })

      assert.strictEqual(res.status, 400)
      const body = errorBody.parse(await res.json())
      assert.deepStrictEqual(body.details?.map((detail) => detail.path), ['additionalCharges', 'items.0.amount'])
    })

    it('accepts a credit line and exports it', async () => {
      const invoice = await createInvoice({ items: [{ awbNo: 'AWB9', amount: -120.5 }] })
      assert.strictEqual(invoice.totals.billAmount, -120)

      const res = await request(`/api/invoices/${invoice.id}/pdf`)
      assert.strictEqual(res.status, 200)
      assert.strictEqual(res.headers.get('content-type'), 'application/pdf')
    })

    it('requires a customer', async () => {
      const res = await sendJson('POST', '/api/invoices', { items: [] })

      assert.strictEqual(res.status, 400)
      const body = errorBody.parse(await res.json())
      assert.deepStrictEqual(body.details, [{ path: 'customerId', message: 'customerId or customerName is required' }])
    })

    it('returns 409 for a duplicate invoice number', async () => {
      await createInvoice({ invoiceNo: 'INV-0100' })

      const res = await sendJson('POST', '/api/invoices', { customerId, invoiceNo: 'INV-0100' })
      assert.strictEqual(res.status, 409)
      assert.deepStrictEqual(await res.json(), { error: 'Invoice number INV-0100 is already in use' })
    })

    it('rejects a malformed JSON body', async () => {
      const res = await request('/api/invoices', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"customerId":',
      })

      assert.strictEqual(res.status, 400)
      assert.deepStrictEqual(await res.json(), { error: 'Malformed JSON body' })
    })
  })

  describe('GET /api/invoices', () => {
    it('lists invoices with search and pagination', async () => {
      await createInvoice({ items: [{ awbNo: 'AWB1', amount: 10 }] })
      await createInvoice({ remarks: 'Express consignments' })
      await createInvoice()

      const res = await request('/api/invoices?page=1&perPage=2')
      assert.strictEqual(res.status, 200)
      const page = invoicePageBody.parse(await res.json())
      assert.strictEqual(page.total, 3)
      assert.deepStrictEqual(page.data.map((invoice) => invoice.invoiceNo), ['INV-0003', 'INV-0002'])

      const searched = invoicePageBody.parse(await (await request('/api/invoices?search=express')).json())
      assert.deepStrictEqual(searched.data.map((invoice) => invoice.invoiceNo), ['INV-0002'])
    })

    it('falls back to default paging for bad query values', async () => {
      const page = invoicePageBody.parse(await (await request('/api/invoices?page=zero&perPage=5000')).json())

      assert.strictEqual(page.page, 1)
      assert.strictEqual(page.perPage, 20)
    })

    it('reports the next invoice number', async () => {
      await createInvoice()

      const res = await request('/api/invoices/next-number')
      assert.deepStrictEqual(await res.json(), { invoiceNo: 'INV-0002' })
    })

    it('returns 404 for an unknown or malformed id', async () => {
      const missing = await request('/api/invoices/424242')
      assert.strictEqual(missing.status, 404)
      assert.deepStrictEqual(await missing.json(), { error: 'Invoice 424242 not found' })

      const malformed = await request('/api/invoices/abc')
      assert.strictEqual(malformed.status, 404)
    })
  })

  describe('PUT /api/invoices/:id', () => {
    it('replaces the items', async () => {
      const created = await createInvoice({ items: [{ awbNo: 'AWB1', amount: 10 }] })

      const res = await sendJson('PUT', `/api/invoices/${created.id}`, {
        customerId,
        items: [{ awbNo: 'AWB2', amount: 20 }, { awbNo: 'AWB3', amount: 30 }],
      })

      assert.strictEqual(res.status, 200)
      const updated = invoiceBody.parse(await res.json())
      assert.strictEqual(updated.invoiceNo, created.invoiceNo)
      assert.deepStrictEqual(updated.items.map((item) => item.awbNo), ['AWB2', 'AWB3'])
      assert.strictEqual(updated.totals.billAmount, 50)
    })
  })

  describe('PATCH /api/invoices/:id/status', () => {
    it('changes the payment status', async () => {
      const created = await createInvoice()

      const res = await sendJson('PATCH', `/api/invoices/${created.id}/status`, { paymentStatus: 'Paid' })
      assert.strictEqual(res.status, 200)
      assert.strictEqual(invoiceBody.parse(await res.json()).paymentStatus, 'Paid')
    })

    it('rejects an unknown status', async () => {
      const created = await createInvoice()

      const res = await sendJson('PATCH', `/api/invoices/${created.id}/status`, { paymentStatus: 'Overdue' })
      assert.strictEqual(res.status, 400)
    })
  })

  describe('GET /api/invoices/:id/pdf', () => {
    it('streams the invoice as a PDF', async () => {
      const created = await createInvoice({ items: [{ awbNo: 'AWB1', amount: 10 }] })

      const res = await request(`/api/invoices/${created.id}/pdf`)

      assert.strictEqual(res.status, 200)
      assert.strictEqual(res.headers.get('content-type'), 'application/pdf')
      assert.strictEqual(res.headers.get('content-disposition'), 'inline; filename="INV-0001.pdf"')
      const body = Buffer.from(await res.arrayBuffer())
      assert.strictEqual(body.subarray(0, 5).toString('latin1'), '%PDF-')
    })
  })

  describe('spreadsheet import', () => {
    it('serves the import template', async () => {
      const res = await request('/api/invoices/import-template')

      assert.strictEqual(res.status, 200)
      assert.strictEqual(
        res.headers.get('content-type'),
        'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
      )
      assert.strictEqual(
        res.headers.get('content-disposition'),
        'attachment; filename="invoice-items-template.xlsx"'
      )
    })

    it('appends uploaded rows to the invoice', async () => {
      const created = await createInvoice({ items: [{ awbNo: 'AWB1', amount: 10 }] })

      const workbook = new Workbook()
      const sheet = workbook.addWorksheet('Items')
      sheet.addRow(['Date', 'AWB No', 'Destination', 'Weight', 'Amount'])
      sheet.addRow(['01/04/2025', 'AWB2', 'Pune', '1 kg', 40])
      sheet.addRow([])
      sheet.addRow(['02/04/2025', 'AWB3', 'Delhi', '2 kg', '50'])
      const file = new Uint8Array(await workbook.xlsx.writeBuffer())

      const form = new FormData()
      form.append('file', new Blob([file]), 'items.xlsx')
      const res = await request(`/api/invoices/${created.id}/items/import`, { method: 'POST', body: form })

      assert.strictEqual(res.status, 200)
      const body = importBody.parse(await res.json())
      assert.strictEqual(body.imported, 2)
      assert.strictEqual(body.skipped, 1)
      assert.deepStrictEqual(body.rejected, [])
      assert.deepStrictEqual(
        body.invoice.items.map((item) => [item.date, item.awbNo, item.amount]),
        [[null, 'AWB1', 10], ['2025-04-01', 'AWB2', 40], ['2025-04-02', 'AWB3', 50]]
      )
      assert.strictEqual(body.invoice.totals.subtotal, 100)
    })

    it('requires a file', async () => {
      const created = await createInvoice()

      const form = new FormData()
      form.append('note', 'no attachment')
      const res = await request(`/api/invoices/${created.id}/items/import`, { method: 'POST', body: form })
      assert.strictEqual(res.status, 400)
      assert.deepStrictEqual(await res.json(), { error: 'No file uploaded; send the spreadsheet as the "file" field' })
    })
  })

  describe('DELETE /api/invoices/:id', () => {
    it('deletes the invoice', async () => {
      const created = await createInvoice()

      const res = await request(`/api/invoices/${created.id}`, { method: 'DELETE' })
      assert.strictEqual(res.status, 204)
      assert.strictEqual((await request(`/api/invoices/${created.id}`)).status, 404)
    })
  })

  it('answers unknown routes with 404', async () => {
    const res = await request('/api/unknown')

    assert.strictEqual(res.status, 404)
    assert.deepStrictEqual(await res.json(), { error: 'Route not found' })
  })
})
