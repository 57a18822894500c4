import Decimal from 'decimal.js'
import type { GstType, InvoiceTotals } from './types'
import { normalizeGstType } from './utils'

type Numeric = number | string | null | undefined

export interface TotalsLineItem {
  amount?: Numeric
}

export interface TotalsInvoice {
  fuelPercentage?: Numeric
  additionalCharges?: Numeric
  gstType?: GstType | string | null
  gstRate?: Numeric
}

export class UnsupportedGstTypeError extends Error {
  constructor(public readonly gstType: string) {
    super(`Unsupported GST type: ${gstType}`)
    this.name = 'UnsupportedGstTypeError'
  }
}

// Missing, blank or non-numeric values count as zero
function toDecimal(value: Numeric): Decimal {
  if (value === null || value === undefined) return new Decimal(0)
  if (typeof value === 'string' && value.trim() === '') return new Decimal(0)
  try {
    const decimal = new Decimal(typeof value === 'string' ? value.trim() : value)
    return decimal.isFinite() ? decimal : new Decimal(0)
  } catch {
    return new Decimal(0)
  }
}

function money(value: Decimal): number {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber()
}

/**
 * Subtotal, fuel surcharge, GST split and payable amount for an invoice.
 *
 * Every intermediate stays unrounded; the reported figures are rounded to
 * paise and the bill amount is the ceiling of the exact tax-inclusive total.
 */
export function calculateInvoiceTotals(
  items: readonly TotalsLineItem[],
  invoice: TotalsInvoice
): InvoiceTotals {
  const gstType = normalizeGstType(invoice.gstType)
  if (gstType === null) {
    throw new UnsupportedGstTypeError(String(invoice.gstType))
  }

  const subtotal = items.reduce((sum, item) => sum.plus(toDecimal(item.amount)), new Decimal(0))
  const fuelCharge = subtotal.times(toDecimal(invoice.fuelPercentage)).dividedBy(100)
  const additionalCharges = toDecimal(invoice.additionalCharges)
  const taxBase = subtotal.plus(fuelCharge).plus(additionalCharges)
  const gstRate = toDecimal(invoice.gstRate)

  let igst = new Decimal(0)
  let cgst = new Decimal(0)
  let sgst = new Decimal(0)
  let igstRate = new Decimal(0)
  let splitRate = new Decimal(0)

  if (gstType === 'IGST') {
    igstRate = gstRate
    igst = taxBase.times(gstRate).dividedBy(100)
  } else if (gstType === 'CGST') {
    splitRate = gstRate.dividedBy(2)
    cgst = taxBase.times(splitRate).dividedBy(100)
    sgst = taxBase.times(splitRate).dividedBy(100)
  }

  const totalTax = igst.plus(cgst).plus(sgst)

  return {
    subtotal: money(subtotal),
    fuelCharge: money(fuelCharge),
    additionalCharges: money(additionalCharges),
    taxBase: money(taxBase),
    igst: money(igst),
    cgst: money(cgst),
    sgst: money(sgst),
    igstRate: money(igstRate),
    cgstRate: money(splitRate),
    sgstRate: money(splitRate),
    totalTax: money(totalTax),
    billAmount: taxBase.plus(totalTax).ceil().toNumber()
  }
}
