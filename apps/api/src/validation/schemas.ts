import { z } from 'zod'
import {
  normalizeGstType,
  parseFlexibleDate,
  PAYMENT_STATUSES,
  validateGSTIN,
  validatePAN,
} from '@waybill/shared'

// Blank, missing or non-numeric input counts as zero
const lenientNumber = z.preprocess((value) => {
  if (value === null || value === undefined) return 0
  const n = typeof value === 'number' ? value : Number(String(value).trim() || 0)
  return Number.isFinite(n) ? n : 0
}, z.number())

const percentage = lenientNumber.pipe(z.number().min(0).max(100))

// Largest value a numeric(12,2) column holds; negatives are credit lines
export const MAX_MONEY = 9_999_999_999.99

const money = lenientNumber.pipe(z.number().min(-MAX_MONEY).max(MAX_MONEY))

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .nullish()
    .transform((value) => (value ? value : null))

// Free text that may arrive as a number from a form or sheet
const looseText = (max: number) =>
  z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value) => (value === null || value === undefined ? '' : String(value).trim()))
    .pipe(z.string().max(max))

const optionalDate = z
  .union([z.string(), z.date()])
  .nullish()
  .transform((value, ctx) => {
    if (value === null || value === undefined) return null
    if (typeof value === 'string' && !value.trim()) return null
    const key = parseFlexibleDate(value)
    if (key === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid date' })
      return z.NEVER
    }
    return key
  })

const taxId = (max: number, isValid: (value: string) => boolean, label: string) =>
  optionalText(max)
    .transform((value) => (value ? value.toUpperCase() : null))
    .refine((value) => value === null || isValid(value), { message: `Invalid ${label}` })

const gstType = z
  .string()
  .nullish()
  .transform((value, ctx) => {
    const normalized = normalizeGstType(value)
    if (normalized === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported GST type: ${value}` })
      return z.NEVER
    }
    return normalized
  })

export const customerInputSchema = z.object({
  name: z.string().trim().min(1, 'Customer name is required').max(100),
  email: z
    .union([z.literal(''), z.string().trim().email().max(100)])
    .nullish()
    .transform((value) => (value ? value : null)),
  mobile: optionalText(20),
  address: optionalText(200),
  gstNo: taxId(50, validateGSTIN, 'GST number'),
  panNo: taxId(50, validatePAN, 'PAN number'),
  state: optionalText(50),
  stateCode: optionalText(10),
})

export type CustomerInput = z.infer<typeof customerInputSchema>

export const invoiceItemInputSchema = z.object({
  date: optionalDate,
  awbNo: looseText(200),
  destination: looseText(200),
  weight: looseText(200),
  amount: money,
})

export type InvoiceItemInput = z.infer<typeof invoiceItemInputSchema>

export const invoiceInputSchema = z
  .object({
    invoiceNo: optionalText(50),
    invoiceDate: optionalDate,
    customerId: z.coerce.number().int().positive().optional(),
    customerName: z.string().trim().min(1).max(100).optional(),
    fromDate: optionalDate,
    toDate: optionalDate,
    fuelPercentage: percentage,
    gstType,
    gstRate: percentage,
    additionalCharges: money,
    remarks: optionalText(2000),
    items: z.array(invoiceItemInputSchema).default([]),
  })
  .refine((input) => input.customerId !== undefined || input.customerName !== undefined, {
    message: 'customerId or customerName is required',
    path: ['customerId'],
  })
  .refine((input) => !input.fromDate || !input.toDate || input.fromDate <= input.toDate, {
    message: 'fromDate must not be after toDate',
    path: ['toDate'],
  })

export type InvoiceInput = z.infer<typeof invoiceInputSchema>

export const paymentStatusInputSchema = z.object({
  paymentStatus: z.enum(PAYMENT_STATUSES),
})

const pageFields = {
  page: z.coerce.number().int().min(1).catch(1),
  perPage: z.coerce.number().int().min(1).max(100).catch(20),
  search: z.string().trim().optional().catch(undefined),
}

export const customerListQuerySchema = z.object(pageFields)

export type CustomerListQuery = z.infer<typeof customerListQuerySchema>

export const invoiceListQuerySchema = z.object({
  ...pageFields,
  status: z.enum(PAYMENT_STATUSES).optional().catch(undefined),
  customerId: z.coerce.number().int().positive().optional().catch(undefined),
})

export type InvoiceListQuery = z.infer<typeof invoiceListQuerySchema>
