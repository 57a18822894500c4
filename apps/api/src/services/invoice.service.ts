import { Knex } from 'knex'
import {
  calculateInvoiceTotals,
  formatInvoiceNumber,
  invoiceNumberSuffix,
  nextInvoiceNumber,
  todayDateKey,
  type Customer,
  type InvoiceDetail,
  type InvoiceSummary,
  type Page,
  type PaymentStatus,
} from '@waybill/shared'
import {
  type CustomerRow,
  type InvoiceItemRow,
  type InvoiceRow,
  toCustomer,
  toInvoice,
  toInvoiceItem,
} from '../db/rows'
import { ConflictError, isUniqueViolation, NotFoundError, ValidationError } from '../lib/errors'
import type { Logger } from '../lib/logger'
import { countRows, LIKE_ESCAPE, likePattern, pageOffset, toPage } from '../lib/query'
import type { InvoiceInput, InvoiceItemInput, InvoiceListQuery } from '../validation/schemas'
import { CustomerService } from './customer.service'

const MAX_NUMBER_ATTEMPTS = 5
const ITEM_INSERT_CHUNK = 500

type InvoiceListRow = InvoiceRow & { customer_name: string }
type InvoiceHeaderRow = Omit<InvoiceRow, 'id' | 'invoice_no' | 'payment_status' | 'created_at'>

function toHeaderRow(customerId: number, input: InvoiceInput): InvoiceHeaderRow {
  return {
    invoice_date: input.invoiceDate ?? todayDateKey(),
    customer_id: customerId,
    from_date: input.fromDate,
    to_date: input.toDate,
    fuel_percentage: input.fuelPercentage,
    gst_type: input.gstType,
    gst_rate: input.gstRate,
    additional_charges: input.additionalCharges,
    remarks: input.remarks,
  }
}

function toItemRows(invoiceId: number, items: InvoiceItemInput[]): Omit<InvoiceItemRow, 'id'>[] {
  return items.map((item) => ({
    invoice_id: invoiceId,
    date: item.date,
    awb_no: item.awbNo,
    destination: item.destination,
    weight: item.weight,
    amount: item.amount,
  }))
}

export class InvoiceService {
  constructor(
    private readonly db: Knex,
    private readonly customers: CustomerService,
    private readonly logger: Logger
  ) {}

  /**
   * Invoices newest first, each with its customer name and computed totals
   */
  async list(query: InvoiceListQuery): Promise<Page<InvoiceSummary>> {
    const base = this.db('invoices as i').join('customers as c', 'c.id', 'i.customer_id')

    if (query.search) {
      const pattern = likePattern(query.search)
      base.where((builder) => {
        builder
          .whereRaw(`lower(i.invoice_no) like ? ${LIKE_ESCAPE}`, [pattern])
          .orWhereRaw(`lower(c.name) like ? ${LIKE_ESCAPE}`, [pattern])
          .orWhereRaw(`lower(coalesce(i.remarks, '')) like ? ${LIKE_ESCAPE}`, [pattern])
      })
    }
    if (query.status) base.where('i.payment_status', query.status)
    if (query.customerId) base.where('i.customer_id', query.customerId)

    const total = await countRows(base)
    const rows: InvoiceListRow[] = await base
      .clone()
      .select('i.*', 'c.name as customer_name')
      .orderBy('i.id', 'desc')
      .limit(query.perPage)
      .offset(pageOffset(query))

    const ids = rows.map((row) => row.id)
    const itemRows: Pick<InvoiceItemRow, 'invoice_id' | 'amount'>[] = ids.length
      ? await this.db<InvoiceItemRow>('invoice_items')
        .select('invoice_id', 'amount')
        .whereIn('invoice_id', ids)
      : []

    const itemsByInvoice = new Map<number, Pick<InvoiceItemRow, 'amount'>[]>()
    for (const item of itemRows) {
      const list = itemsByInvoice.get(item.invoice_id) ?? []
      list.push(item)
      itemsByInvoice.set(item.invoice_id, list)
    }

    const summaries = rows.map((row): InvoiceSummary => {
      const invoice = toInvoice(row)
      const items = itemsByInvoice.get(row.id) ?? []
      return {
        ...invoice,
        customer: { id: row.customer_id, name: row.customer_name },
        itemCount: items.length,
        totals: calculateInvoiceTotals(items, invoice),
      }
    })

    return toPage(summaries, total, query)
  }

  async get(id: number): Promise<InvoiceDetail> {
    const row = await this.db<InvoiceRow>('invoices').where({ id }).first()
    if (!row) {
      throw new NotFoundError('Invoice', id)
    }

    const [customerRow, itemRows] = await Promise.all([
      this.db<CustomerRow>('customers').where({ id: row.customer_id }).first(),
      this.db<InvoiceItemRow>('invoice_items').where({ invoice_id: id }).orderBy('id', 'asc'),
    ])
    if (!customerRow) {
      throw new NotFoundError('Customer', row.customer_id)
    }

    const invoice = toInvoice(row)
    const items = itemRows.map(toInvoiceItem)
    return {
      ...invoice,
      customer: toCustomer(customerRow),
      items,
      totals: calculateInvoiceTotals(items, invoice),
    }
  }

  /**
   * Number the next invoice would get if it were created now
   */
  async peekNextNumber(): Promise<string> {
    return this.generateNumber(this.db, 0)
  }

  async create(input: InvoiceInput): Promise<InvoiceDetail> {
    const customer = await this.resolveCustomer(input)

    let id: number
    if (input.invoiceNo) {
      const invoiceNo = input.invoiceNo
      try {
        id = await this.db.transaction((trx) => this.insertInvoice(trx, invoiceNo, customer.id, input))
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new ConflictError(`Invoice number ${invoiceNo} is already in use`)
        }
        throw error
      }
    } else {
      id = await this.insertWithGeneratedNumber(customer.id, input)
    }

    const created = await this.get(id)
    this.logger.info('Invoice created', { invoiceId: id, invoiceNo: created.invoiceNo })
    return created
  }

  /**
   * Rewrites the invoice header and replaces its items
   */
  async update(id: number, input: InvoiceInput): Promise<InvoiceDetail> {
    const existing = await this.db<InvoiceRow>('invoices').where({ id }).first()
    if (!existing) {
      throw new NotFoundError('Invoice', id)
    }

    const customer = await this.resolveCustomer(input)
    const invoiceNo = input.invoiceNo ?? existing.invoice_no

    try {
      await this.db.transaction(async (trx) => {
        await trx<InvoiceRow>('invoices')
          .where({ id })
          .update({
            ...toHeaderRow(customer.id, input),
            invoice_date: input.invoiceDate ?? existing.invoice_date,
            invoice_no: invoiceNo,
          })
        await trx<InvoiceItemRow>('invoice_items').where({ invoice_id: id }).delete()
        await this.insertItems(trx, id, input.items)
      })
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Invoice number ${invoiceNo} is already in use`)
      }
      throw error
    }

    this.logger.info('Invoice updated', { invoiceId: id, invoiceNo })
    return this.get(id)
  }

  async delete(id: number): Promise<void> {
    const deleted = await this.db.transaction(async (trx): Promise<number> => {
      // Explicit as well as cascading: SQLite only enforces the key with foreign_keys on
      await trx<InvoiceItemRow>('invoice_items').where({ invoice_id: id }).delete()
      return trx<InvoiceRow>('invoices').where({ id }).delete()
    })

    if (deleted === 0) {
      throw new NotFoundError('Invoice', id)
    }
    this.logger.info('Invoice deleted', { invoiceId: id })
  }

  async updateStatus(id: number, paymentStatus: PaymentStatus): Promise<InvoiceDetail> {
    const updated = await this.db<InvoiceRow>('invoices')
      .where({ id })
      .update({ payment_status: paymentStatus })

    if (updated === 0) {
      throw new NotFoundError('Invoice', id)
    }
    this.logger.info('Invoice payment status changed', { invoiceId: id, paymentStatus })
    return this.get(id)
  }

  /**
   * Adds items after the existing ones, e.g. rows from a spreadsheet import
   */
  async appendItems(id: number, items: InvoiceItemInput[]): Promise<InvoiceDetail> {
    const existing = await this.db<InvoiceRow>('invoices').where({ id }).first()
    if (!existing) {
      throw new NotFoundError('Invoice', id)
    }

    await this.db.transaction((trx) => this.insertItems(trx, id, items))
    return this.get(id)
  }

  private async resolveCustomer(input: InvoiceInput): Promise<Customer> {
    if (input.customerId !== undefined) {
      const customer = await this.customers.findById(input.customerId)
      if (!customer) {
        throw new ValidationError(`Customer ${input.customerId} does not exist`)
      }
      return customer
    }

    const name = input.customerName ?? ''
    const customer = await this.customers.findByName(name)
    if (!customer) {
      throw new ValidationError(`Customer "${name}" not found`)
    }
    return customer
  }

  /**
   * Reads the last invoice inside the transaction and numbers from it. A
   * concurrent create can take the same number first; the unique index then
   * rejects ours and we retry from past the collided number.
   */
  private async insertWithGeneratedNumber(customerId: number, input: InvoiceInput): Promise<number> {
    let minimumSequence = 0

    for (let attempt = 1; ; attempt++) {
      let candidate = ''
      try {
        return await this.db.transaction(async (trx) => {
          candidate = await this.generateNumber(trx, minimumSequence)
          return this.insertInvoice(trx, candidate, customerId, input)
        })
      } catch (error) {
        if (!isUniqueViolation(error)) throw error
        if (attempt >= MAX_NUMBER_ATTEMPTS) {
          throw new ConflictError('Could not reserve an invoice number, please retry')
        }
        minimumSequence = (invoiceNumberSuffix(candidate) ?? 0) + 1
        this.logger.warn('Invoice number already taken, retrying', { invoiceNo: candidate, attempt })
      }
    }
  }

  private async generateNumber(trx: Knex, minimumSequence: number): Promise<string> {
    const last = await trx<InvoiceRow>('invoices')
      .select('id', 'invoice_no')
      .orderBy('id', 'desc')
      .first()

    const next = nextInvoiceNumber(last ? { id: last.id, invoiceNo: last.invoice_no } : null)
    const sequence = invoiceNumberSuffix(next) ?? 0
    return sequence >= minimumSequence ? next : formatInvoiceNumber(minimumSequence)
  }

  private async insertInvoice(
    trx: Knex.Transaction,
    invoiceNo: string,
    customerId: number,
    input: InvoiceInput
  ): Promise<number> {
    const [row] = await trx<InvoiceRow>('invoices')
      .insert({
        ...toHeaderRow(customerId, input),
        invoice_no: invoiceNo,
        payment_status: 'Unpaid',
        created_at: new Date(),
      })
      .returning('id')

    await this.insertItems(trx, row.id, input.items)
    return row.id
  }

  private async insertItems(trx: Knex.Transaction, invoiceId: number, items: InvoiceItemInput[]): Promise<void> {
    const rows = toItemRows(invoiceId, items)
    for (let start = 0; start < rows.length; start += ITEM_INSERT_CHUNK) {
      await trx<InvoiceItemRow>('invoice_items').insert(rows.slice(start, start + ITEM_INSERT_CHUNK))
    }
  }
}
