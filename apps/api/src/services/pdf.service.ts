import PDFDocument from 'pdfkit'
import { amountInWords, formatAmount, type InvoiceDetail } from '@waybill/shared'
import type { PdfConfig } from '../config'

const MARGIN = 36
const ROW_HEIGHT = 18
const INK = '#111827'
const MUTED = '#6B7280'
const RULE = '#D1D5DB'

type Align = 'left' | 'right' | 'center'
type Column = { label: string; width: number; align: Align }

// Helvetica has no rupee glyph
function money(value: number): string {
  return `Rs. ${formatAmount(value)}`
}

function displayDate(key: string | null): string {
  if (!key) return ''
  const [y, m, d] = key.split('-')
  return `${d}-${m}-${y}`
}

function drawText(
  doc: PDFKit.PDFDocument,
  text: string,
  x: number,
  y: number,
  options: PDFKit.Mixins.TextOptions = {}
) {
  doc.text(text, x, y, { lineBreak: false, ...options })
}

// Writes lines at a fixed line height and returns the y below the block
function drawBlock(doc: PDFKit.PDFDocument, lines: string[], x: number, y: number, width: number, lineHeight = 14) {
  let yy = y
  for (const line of lines) {
    drawText(doc, line, x, yy, { width, ellipsis: true })
    yy += lineHeight
  }
  return yy
}

export interface RenderedInvoice {
  buffer: Buffer
  filename: string
}

export class PdfService {
  constructor(private readonly config: PdfConfig) {}

  async render(invoice: InvoiceDetail): Promise<RenderedInvoice> {
    const doc = new PDFDocument({
      size: this.config.pageSize,
      margins: { top: MARGIN, left: MARGIN, right: MARGIN, bottom: MARGIN },
      info: { Title: `Invoice ${invoice.invoiceNo}`, Author: this.config.seller.name },
    })

    const chunks: Buffer[] = []
    doc.on('data', (chunk: Buffer) => chunks.push(chunk))
    const done = new Promise<Buffer>((resolve, reject) => {
      doc.on('end', () => resolve(Buffer.concat(chunks)))
      doc.on('error', reject)
    })

    try {
      this.draw(doc, invoice)
    } finally {
      doc.end()
    }

    return {
      buffer: await done,
      filename: `${invoice.invoiceNo.replace(/[^A-Za-z0-9_-]+/g, '_')}.pdf`,
    }
  }

  private draw(doc: PDFKit.PDFDocument, invoice: InvoiceDetail) {
    const W = doc.page.width
    const contentW = W - MARGIN * 2
    const { seller } = this.config
    const { customer, totals } = invoice

    // =======================
    // Header
    // =======================
    let y = MARGIN
    doc.fillColor(INK).font('Helvetica-Bold').fontSize(18)
    drawText(doc, seller.name, MARGIN, y, { width: contentW - 160 })
    doc.fontSize(14)
    drawText(doc, 'TAX INVOICE', W - MARGIN - 160, y + 2, { width: 160, align: 'right' })
    y += 24

    doc.font('Helvetica').fontSize(9).fillColor(MUTED)
    const sellerLines = [
      seller.address,
      [seller.gstin && `GSTIN: ${seller.gstin}`, seller.pan && `PAN: ${seller.pan}`].filter(Boolean).join('   '),
      seller.state && `State: ${seller.state}${seller.stateCode ? ` (Code ${seller.stateCode})` : ''}`,
    ].filter((line): line is string => Boolean(line))
    y = drawBlock(doc, sellerLines, MARGIN, y, contentW, 12) + 10

    doc.moveTo(MARGIN, y).lineTo(W - MARGIN, y).strokeColor(RULE).lineWidth(1).stroke()
    y += 12

    // =======================
    // Bill To / invoice meta
    // =======================
    const leftW = contentW / 2 - 10
    const rightX = MARGIN + contentW / 2 + 10

    doc.font('Helvetica-Bold').fontSize(10).fillColor(INK)
    drawText(doc, 'Bill To', MARGIN, y)
    drawText(doc, 'Invoice Details', rightX, y)
    y += 16

    doc.font('Helvetica').fontSize(10)
    const customerLines = [
      customer.name,
      customer.address,
      customer.gstNo && `GSTIN: ${customer.gstNo}`,
      customer.panNo && `PAN: ${customer.panNo}`,
      customer.state && `State: ${customer.state}${customer.stateCode ? ` (Code ${customer.stateCode})` : ''}`,
      customer.mobile && `Mobile: ${customer.mobile}`,
      customer.email && `Email: ${customer.email}`,
    ].filter((line): line is string => Boolean(line))

    const period = invoice.fromDate || invoice.toDate
      ? `${displayDate(invoice.fromDate)} to ${displayDate(invoice.toDate)}`
      : undefined
    const metaLines = [
      `Invoice No: ${invoice.invoiceNo}`,
      `Invoice Date: ${displayDate(invoice.invoiceDate)}`,
      period && `Billing Period: ${period}`,
      `Payment Status: ${invoice.paymentStatus}`,
    ].filter((line): line is string => Boolean(line))

    const leftEnd = drawBlock(doc, customerLines, MARGIN, y, leftW)
    const rightEnd = drawBlock(doc, metaLines, rightX, y, leftW)
    y = Math.max(leftEnd, rightEnd) + 16

    // =======================
    // Items table
    // =======================
    const cols: Column[] = [
      { label: 'Sr.', width: 30, align: 'left' },
      { label: 'Date', width: 70, align: 'left' },
      { label: 'AWB No', width: 110, align: 'left' },
      { label: 'Destination', width: contentW - 30 - 70 - 110 - 70 - 90, align: 'left' },
      { label: 'Weight', width: 70, align: 'right' },
      { label: 'Amount', width: 90, align: 'right' },
    ]

    const drawHeaderRow = (top: number) => {
      doc.rect(MARGIN, top, contentW, ROW_HEIGHT).fill('#F3F4F6')
      doc.fillColor(INK).font('Helvetica-Bold').fontSize(9)
      let x = MARGIN
      for (const col of cols) {
        drawText(doc, col.label, x + 4, top + 5, { width: col.width - 8, align: col.align })
        x += col.width
      }
      doc.font('Helvetica')
      return top + ROW_HEIGHT
    }

    const bottomLimit = () => doc.page.height - MARGIN - ROW_HEIGHT

    y = drawHeaderRow(y)
    invoice.items.forEach((item, index) => {
      if (y > bottomLimit()) {
        doc.addPage()
        y = drawHeaderRow(MARGIN)
      }
      const cells = [
        String(index + 1),
        displayDate(item.date),
        item.awbNo,
        item.destination,
        item.weight,
        formatAmount(item.amount),
      ]
      doc.fillColor(INK).fontSize(9)
      let x = MARGIN
      cols.forEach((col, i) => {
        drawText(doc, cells[i], x + 4, y + 5, { width: col.width - 8, align: col.align, ellipsis: true })
        x += col.width
      })
      doc.moveTo(MARGIN, y + ROW_HEIGHT).lineTo(W - MARGIN, y + ROW_HEIGHT).strokeColor(RULE).lineWidth(0.5).stroke()
      y += ROW_HEIGHT
    })

    // =======================
    // Totals
    // =======================
    const totalLines: Array<[string, string]> = [
      ['Subtotal', money(totals.subtotal)],
      [`Fuel Surcharge (${invoice.fuelPercentage}%)`, money(totals.fuelCharge)],
    ]
    if (totals.additionalCharges) totalLines.push(['Additional Charges', money(totals.additionalCharges)])
    totalLines.push(['Taxable Value', money(totals.taxBase)])
    if (invoice.gstType === 'IGST') {
      totalLines.push([`IGST @ ${totals.igstRate}%`, money(totals.igst)])
    } else if (invoice.gstType === 'CGST') {
      totalLines.push([`CGST @ ${totals.cgstRate}%`, money(totals.cgst)])
      totalLines.push([`SGST @ ${totals.sgstRate}%`, money(totals.sgst)])
    } else {
      totalLines.push(['GST', 'Not applicable'])
    }

    const needed = (totalLines.length + 4) * 16 + 40
    if (y + needed > doc.page.height - MARGIN) {
      doc.addPage()
      y = MARGIN
    }
    y += 12

    const labelX = W - MARGIN - 260
    doc.font('Helvetica').fontSize(10).fillColor(INK)
    for (const [label, value] of totalLines) {
      drawText(doc, label, labelX, y, { width: 150 })
      drawText(doc, value, labelX + 150, y, { width: 110, align: 'right' })
      y += 16
    }

    doc.moveTo(labelX, y).lineTo(W - MARGIN, y).strokeColor(INK).lineWidth(1).stroke()
    y += 6
    doc.font('Helvetica-Bold').fontSize(11)
    drawText(doc, 'Bill Amount', labelX, y, { width: 150 })
    drawText(doc, money(totals.billAmount), labelX + 150, y, { width: 110, align: 'right' })
    y += 24

    doc.font('Helvetica').fontSize(10)
    drawText(doc, `Amount in words: Rupees ${amountInWords(totals.billAmount)}`, MARGIN, y, { width: contentW })
    y += 18

    if (invoice.remarks) {
      doc.fillColor(MUTED).fontSize(9)
      doc.text(`Remarks: ${invoice.remarks}`, MARGIN, y, { width: contentW })
    }
  }
}
