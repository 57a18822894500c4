// Common types shared between the API and its consumers

/** Calendar date as `YYYY-MM-DD`. */
export type DateKey = string

export const GST_TYPES = ['IGST', 'CGST', 'NONE'] as const
export type GstType = (typeof GST_TYPES)[number]

export const PAYMENT_STATUSES = ['Unpaid', 'Paid'] as const
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number]

export interface Customer {
  id: number
  name: string
  email: string | null
  mobile: string | null
  address: string | null
  gstNo: string | null
  panNo: string | null
  state: string | null
  stateCode: string | null
}

export interface InvoiceItem {
  id: number
  invoiceId: number
  date: DateKey | null
  awbNo: string
  destination: string
  weight: string
  amount: number
}

export interface Invoice {
  id: number
  invoiceNo: string
  invoiceDate: DateKey
  customerId: number
  fromDate: DateKey | null
  toDate: DateKey | null
  fuelPercentage: number
  gstType: GstType
  gstRate: number
  additionalCharges: number
  remarks: string | null
  paymentStatus: PaymentStatus
  createdAt: string
}

// GST-related types
export interface InvoiceTotals {
  subtotal: number
  fuelCharge: number
  additionalCharges: number
  taxBase: number
  igst: number
  cgst: number
  sgst: number
  igstRate: number
  cgstRate: number
  sgstRate: number
  totalTax: number
  billAmount: number
}

export interface InvoiceDetail extends Invoice {
  customer: Customer
  items: InvoiceItem[]
  totals: InvoiceTotals
}

export interface InvoiceSummary extends Invoice {
  customer: Pick<Customer, 'id' | 'name'>
  itemCount: number
  totals: InvoiceTotals
}

export interface Page<T> {
  data: T[]
  total: number
  page: number
  perPage: number
  totalPages: number
}
