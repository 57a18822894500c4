import { Knex } from 'knex'
import type { Customer, Page } from '@waybill/shared'
import { type CustomerRow, toCustomer } from '../db/rows'
import { ConflictError, isForeignKeyViolation, NotFoundError } from '../lib/errors'
import { countRows, LIKE_ESCAPE, likePattern, pageOffset, toPage } from '../lib/query'
import type { CustomerInput, CustomerListQuery } from '../validation/schemas'

function toCustomerRow(input: CustomerInput): Omit<CustomerRow, 'id'> {
  return {
    name: input.name,
    email: input.email,
    mobile: input.mobile,
    address: input.address,
    gst_no: input.gstNo,
    pan_no: input.panNo,
    state: input.state,
    state_code: input.stateCode,
  }
}

export class CustomerService {
  constructor(private readonly db: Knex) {}

  /**
   * Customers by name, optionally filtered on name, email, mobile or GST number
   */
  async list(query: CustomerListQuery): Promise<Page<Customer>> {
    const base = this.db<CustomerRow>('customers')

    if (query.search) {
      const pattern = likePattern(query.search)
      base.where((builder) => {
        builder
          .whereRaw(`lower(name) like ? ${LIKE_ESCAPE}`, [pattern])
          .orWhereRaw(`lower(coalesce(email, '')) like ? ${LIKE_ESCAPE}`, [pattern])
          .orWhereRaw(`lower(coalesce(mobile, '')) like ? ${LIKE_ESCAPE}`, [pattern])
          .orWhereRaw(`lower(coalesce(gst_no, '')) like ? ${LIKE_ESCAPE}`, [pattern])
      })
    }

    const [total, rows] = await Promise.all([
      countRows(base),
      base
        .clone()
        .select('*')
        .orderBy([{ column: 'name', order: 'asc' }, { column: 'id', order: 'asc' }])
        .limit(query.perPage)
        .offset(pageOffset(query)),
    ])

    return toPage(rows.map(toCustomer), total, query)
  }

  async get(id: number, trx: Knex = this.db): Promise<Customer> {
    const row = await trx<CustomerRow>('customers').where({ id }).first()
    if (!row) {
      throw new NotFoundError('Customer', id)
    }
    return toCustomer(row)
  }

  async findById(id: number, trx: Knex = this.db): Promise<Customer | null> {
    const row = await trx<CustomerRow>('customers').where({ id }).first()
    return row ? toCustomer(row) : null
  }

  /**
   * Case-insensitive exact match; the oldest customer wins when names repeat
   */
  async findByName(name: string, trx: Knex = this.db): Promise<Customer | null> {
    const row = await trx<CustomerRow>('customers')
      .whereRaw('lower(name) = ?', [name.trim().toLowerCase()])
      .orderBy('id', 'asc')
      .first()
    return row ? toCustomer(row) : null
  }

  async create(input: CustomerInput): Promise<Customer> {
    const [row] = await this.db<CustomerRow>('customers')
      .insert(toCustomerRow(input))
      .returning('*')
    return toCustomer(row)
  }

  async update(id: number, input: CustomerInput): Promise<Customer> {
    const updated = await this.db<CustomerRow>('customers')
      .where({ id })
      .update(toCustomerRow(input))

    if (updated === 0) {
      throw new NotFoundError('Customer', id)
    }
    return this.get(id)
  }

  /**
   * Deletes a customer that no invoice refers to
   */
  async delete(id: number): Promise<void> {
    await this.get(id)

    const invoiceCount = await countRows(this.db('invoices').where({ customer_id: id }))
    if (invoiceCount > 0) {
      throw new ConflictError(`Customer ${id} still has ${invoiceCount} invoice(s)`)
    }

    try {
      await this.db<CustomerRow>('customers').where({ id }).delete()
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new ConflictError(`Customer ${id} still has invoices`)
      }
      throw error
    }
  }
}
