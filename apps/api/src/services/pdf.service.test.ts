import assert from 'node:assert'
import { describe, it } from 'node:test'
import { calculateInvoiceTotals, type InvoiceDetail, type InvoiceItem } from '@waybill/shared'

import { PdfService } from './pdf.service'

function buildInvoice(overrides: Partial<InvoiceDetail> = {}, itemCount = 3): InvoiceDetail {
  const items: InvoiceItem[] = Array.from({ length: itemCount }, (_, index) => ({
    id: index + 1,
    invoiceId: 1,
    date: '2025-04-01',
    awbNo: `AWB${1000 + index}`,
    destination: index % 2 ? 'Delhi' : 'Pune',
    weight: '1.5 kg',
    amount: 125.5,
  }))
  const invoice = {
    id: 1,
    invoiceNo: 'INV-0001',
    invoiceDate: '2025-04-30',
    customerId: 1,
    fromDate: '2025-04-01',
    toDate: '2025-04-30',
    fuelPercentage: 5,
    gstType: 'IGST' as const,
    gstRate: 18,
    additionalCharges: 20,
    remarks: 'Thank you for your business',
    paymentStatus: 'Unpaid' as const,
    createdAt: '2025-04-30T10:00:00.000Z',
    ...overrides,
  }

  return {
    ...invoice,
    customer: {
      id: 1,
      name: 'Sample Traders',
      email: 'accounts@example.com',
      mobile: null,
      address: '12 Market Road, Pune',
      gstNo: '27ABCDE1234F1Z5',
      panNo: null,
      state: 'Maharashtra',
      stateCode: '27',
    },
    items,
    totals: calculateInvoiceTotals(items, invoice),
  }
}

function countPages(pdf: Buffer): number {
  return pdf.toString('latin1').match(/\/Type \/Page[^s]/g)?.length ?? 0
}

describe('PdfService', () => {
  const service = new PdfService({
    pageSize: 'A4',
    seller: { name: 'Courier Services', gstin: '27AAAAA0000A1Z5', state: 'Maharashtra', stateCode: '27' },
  })

  it('renders a PDF named after the invoice number', async () => {
    const { buffer, filename } = await service.render(buildInvoice())

    assert.strictEqual(buffer.subarray(0, 5).toString('latin1'), '%PDF-')
    assert.strictEqual(filename, 'INV-0001.pdf')
    assert.strictEqual(countPages(buffer), 1)
  })

  it('keeps only safe characters in the filename', async () => {
    const { filename } = await service.render(buildInvoice({ invoiceNo: 'INV/2025 01' }))

    assert.strictEqual(filename, 'INV_2025_01.pdf')
  })

  it('continues long item tables on further pages', async () => {
    const { buffer } = await service.render(buildInvoice({}, 120))

    assert.ok(countPages(buffer) > 1)
  })

  it('renders a credit invoice with a negative bill amount', async () => {
    const credit = buildInvoice({ gstType: 'NONE', additionalCharges: 0, fuelPercentage: 0 }, 1)
    credit.items[0].amount = -120.5
    credit.totals = calculateInvoiceTotals(credit.items, credit)
    assert.strictEqual(credit.totals.billAmount, -120)

    const { buffer } = await service.render(credit)
    assert.strictEqual(buffer.subarray(0, 5).toString('latin1'), '%PDF-')
  })

  it('closes the document and rejects when drawing fails', async () => {
    const broken = buildInvoice()
    broken.totals = { ...broken.totals, billAmount: Number.NaN }

    await assert.rejects(service.render(broken), RangeError)
  })

  it('renders intra-state and untaxed invoices', async () => {
    for (const gstType of ['CGST', 'NONE'] as const) {
      const { buffer } = await service.render(buildInvoice({ gstType, remarks: null }, 0))
      assert.strictEqual(buffer.subarray(0, 5).toString('latin1'), '%PDF-')
    }
  })
})
