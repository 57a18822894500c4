import {
  normalizeGstType,
  UnsupportedGstTypeError,
  PAYMENT_STATUSES,
  type Customer,
  type Invoice,
  type InvoiceItem,
  type PaymentStatus,
} from '@waybill/shared'

// Raw row shapes as the drivers return them: pg hands numerics back as
// strings and timestamps as Date, better-sqlite3 as numbers.
type DbNumeric = number | string
type DbTimestamp = Date | string | number

export interface CustomerRow {
  id: number
  name: string
  email: string | null
  mobile: string | null
  address: string | null
  gst_no: string | null
  pan_no: string | null
  state: string | null
  state_code: string | null
}

export interface InvoiceRow {
  id: number
  invoice_no: string
  invoice_date: string
  customer_id: number
  from_date: string | null
  to_date: string | null
  fuel_percentage: DbNumeric
  gst_type: string
  gst_rate: DbNumeric
  additional_charges: DbNumeric
  remarks: string | null
  payment_status: string
  created_at: DbTimestamp
}

export interface InvoiceItemRow {
  id: number
  invoice_id: number
  date: string | null
  awb_no: string
  destination: string
  weight: string
  amount: DbNumeric
}

function toNumber(value: DbNumeric | null): number {
  const n = Number(value ?? 0)
  return Number.isFinite(n) ? n : 0
}

function toIsoTimestamp(value: DbTimestamp): string {
  const date = value instanceof Date ? value : new Date(value)
  return Number.isNaN(date.getTime()) ? String(value) : date.toISOString()
}

function toPaymentStatus(value: string): PaymentStatus {
  return PAYMENT_STATUSES.find((status) => status === value) ?? 'Unpaid'
}

export function toCustomer(row: CustomerRow): Customer {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    mobile: row.mobile,
    address: row.address,
    gstNo: row.gst_no,
    panNo: row.pan_no,
    state: row.state,
    stateCode: row.state_code,
  }
}

export function toInvoice(row: InvoiceRow): Invoice {
  const gstType = normalizeGstType(row.gst_type)
  if (gstType === null) throw new UnsupportedGstTypeError(row.gst_type)

  return {
    id: row.id,
    invoiceNo: row.invoice_no,
    invoiceDate: row.invoice_date,
    customerId: row.customer_id,
    fromDate: row.from_date,
    toDate: row.to_date,
    fuelPercentage: toNumber(row.fuel_percentage),
    gstType,
    gstRate: toNumber(row.gst_rate),
    additionalCharges: toNumber(row.additional_charges),
    remarks: row.remarks,
    paymentStatus: toPaymentStatus(row.payment_status),
    createdAt: toIsoTimestamp(row.created_at),
  }
}

export function toInvoiceItem(row: InvoiceItemRow): InvoiceItem {
  return {
    id: row.id,
    invoiceId: row.invoice_id,
    date: row.date,
    awbNo: row.awb_no,
    destination: row.destination,
    weight: row.weight,
    amount: toNumber(row.amount),
  }
}
