import { Readable } from 'stream'
import { Workbook, type CellValue, type Worksheet } from 'exceljs'
import { parseFlexibleDate } from '@waybill/shared'
import { ValidationError } from '../lib/errors'
import { invoiceItemInputSchema, type InvoiceItemInput } from '../validation/schemas'

export const IMPORT_COLUMNS = ['Date', 'AWB No', 'Destination', 'Weight', 'Amount'] as const

type ImportColumn = (typeof IMPORT_COLUMNS)[number]
type Primitive = string | number | boolean | Date | null

export interface RejectedRow {
  row: number
  errors: string[]
}

export interface ImportResult {
  items: InvoiceItemInput[]
  skipped: number
  rejected: RejectedRow[]
}

// Formula, rich-text, hyperlink and error cells reduced to a plain value
function toPrimitive(value: CellValue): Primitive {
  if (value === null || value === undefined) return null
  if (typeof value !== 'object' || value instanceof Date) return value
  if ('result' in value) {
    const { result } = value
    if (result === undefined) return null
    if (result instanceof Date || typeof result !== 'object') return result
    return null
  }
  if ('richText' in value) return value.richText.map((run) => run.text).join('')
  if ('text' in value) return typeof value.text === 'string' ? value.text : null
  return null
}

function toText(value: Primitive): string {
  if (value === null) return ''
  if (value instanceof Date) return parseFlexibleDate(value) ?? ''
  return String(value).trim()
}

function toAmount(value: Primitive): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0
  if (typeof value !== 'string') return 0
  const n = Number(value.replace(/,/g, '').trim())
  return value.trim() && Number.isFinite(n) ? n : 0
}

function normalizeHeader(value: Primitive): string {
  return toText(value).toLowerCase().replace(/[^a-z]/g, '')
}

function findHeaderRow(sheet: Worksheet): { rowNumber: number; columns: Map<ImportColumn, number> } | null {
  const wanted = new Map(IMPORT_COLUMNS.map((column) => [normalizeHeader(column), column]))
  const lastRow = Math.min(sheet.rowCount, 10)

  for (let rowNumber = 1; rowNumber <= lastRow; rowNumber++) {
    const columns = new Map<ImportColumn, number>()
    sheet.getRow(rowNumber).eachCell((cell, colNumber) => {
      const column = wanted.get(normalizeHeader(toPrimitive(cell.value)))
      if (column && !columns.has(column)) columns.set(column, colNumber)
    })
    if (columns.size > 0) return { rowNumber, columns }
  }
  return null
}

export class SpreadsheetService {
  /**
   * Reads waybill rows from the first worksheet. Rows stand alone: a bad date
   * becomes null, a missing text cell '' and a missing amount 0. A row that
   * still fails item validation, such as an over-long AWB number, is left out
   * and reported in `rejected` with its sheet row number.
   */
  async importItems(data: Buffer): Promise<ImportResult> {
    const workbook = new Workbook()
    try {
      await workbook.xlsx.read(Readable.from(data))
    } catch {
      throw new ValidationError('Uploaded file is not a readable .xlsx workbook')
    }

    const sheet = workbook.worksheets[0]
    if (!sheet) {
      throw new ValidationError('Workbook has no worksheets')
    }

    const header = findHeaderRow(sheet)
    if (!header) {
      throw new ValidationError(`No header row found; expected columns: ${IMPORT_COLUMNS.join(', ')}`)
    }

    const items: InvoiceItemInput[] = []
    const rejected: RejectedRow[] = []
    let skipped = 0

    for (let rowNumber = header.rowNumber + 1; rowNumber <= sheet.rowCount; rowNumber++) {
      const row = sheet.getRow(rowNumber)
      const read = (column: ImportColumn): Primitive => {
        const colNumber = header.columns.get(column)
        return colNumber === undefined ? null : toPrimitive(row.getCell(colNumber).value)
      }

      const values = IMPORT_COLUMNS.map(read)
      if (values.every((value) => value === null || toText(value) === '')) {
        skipped++
        continue
      }

      const parsed = invoiceItemInputSchema.safeParse({
        date: parseFlexibleDate(read('Date')),
        awbNo: toText(read('AWB No')),
        destination: toText(read('Destination')),
        weight: toText(read('Weight')),
        amount: toAmount(read('Amount')),
      })
      if (parsed.success) {
        items.push(parsed.data)
      } else {
        rejected.push({
          row: rowNumber,
          errors: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        })
      }
    }

    return { items, skipped, rejected }
  }

  /**
   * Empty workbook carrying just the import header row
   */
  async buildTemplate(): Promise<Buffer> {
    const workbook = new Workbook()
    const sheet = workbook.addWorksheet('Items')
    sheet.columns = IMPORT_COLUMNS.map((header) => ({ header, key: header, width: header === 'Destination' ? 24 : 16 }))
    sheet.getRow(1).font = { bold: true }

    return Buffer.from(await workbook.xlsx.writeBuffer())
  }
}
