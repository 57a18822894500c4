// Common utility functions

import { format, isValid, parse } from 'date-fns'
import type { DateKey, GstType } from './types'

const GST_TYPE_ALIASES: Record<string, GstType> = {
  'igst': 'IGST',
  'inter-state': 'IGST',
  'interstate': 'IGST',
  'cgst': 'CGST',
  'sgst': 'CGST',
  'cgst+sgst': 'CGST',
  'cgst/sgst': 'CGST',
  'intra-state': 'CGST',
  'intrastate': 'CGST',
  'none': 'NONE',
  'na': 'NONE',
  'n/a': 'NONE',
  'not-applicable': 'NONE',
  '': 'NONE'
}

/**
 * Canonical GST regime for a stored or submitted value; `null` when the value
 * names no regime we know.
 */
export function normalizeGstType(value: string | null | undefined): GstType | null {
  if (value === null || value === undefined) return 'NONE'
  const key = value.trim().toLowerCase().replace(/[\s_]+/g, '-')
  return GST_TYPE_ALIASES[key] ?? null
}

export function formatAmount(amount: number): string {
  return new Intl.NumberFormat('en-IN', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  }).format(amount)
}

export function validateGSTIN(gstin: string): boolean {
  // 2-digit state code, PAN, entity number, 'Z', checksum
  const gstinRegex = /^[0-9]{2}[A-Z]{5}[0-9]{4}[A-Z]{1}[1-9A-Z]{1}Z[0-9A-Z]{1}$/
  return gstinRegex.test(gstin)
}

export function validatePAN(pan: string): boolean {
  const panRegex = /^[A-Z]{5}[0-9]{4}[A-Z]{1}$/
  return panRegex.test(pan)
}

const ONES = [
  'Zero', 'One', 'Two', 'Three', 'Four', 'Five', 'Six', 'Seven', 'Eight', 'Nine',
  'Ten', 'Eleven', 'Twelve', 'Thirteen', 'Fourteen', 'Fifteen', 'Sixteen',
  'Seventeen', 'Eighteen', 'Nineteen',
]
const TENS = ['', '', 'Twenty', 'Thirty', 'Forty', 'Fifty', 'Sixty', 'Seventy', 'Eighty', 'Ninety']

function belowHundred(n: number): string {
  if (n < 20) return ONES[n]
  const unit = n % 10
  return unit === 0 ? TENS[Math.floor(n / 10)] : `${TENS[Math.floor(n / 10)]}-${ONES[unit]}`
}

function belowThousand(n: number): string {
  const hundreds = Math.floor(n / 100)
  const rest = n % 100
  if (hundreds === 0) return belowHundred(rest)
  if (rest === 0) return `${ONES[hundreds]} Hundred`
  return `${ONES[hundreds]} Hundred And ${belowHundred(rest)}`
}

function indianWords(n: number): string {
  const crore = Math.floor(n / 10_000_000)
  const lakh = Math.floor((n % 10_000_000) / 100_000)
  const thousand = Math.floor((n % 100_000) / 1000)
  const rest = n % 1000

  const parts: string[] = []
  if (crore) parts.push(`${indianWords(crore)} Crore`)
  if (lakh) parts.push(`${belowHundred(lakh)} Lakh`)
  if (thousand) parts.push(`${belowHundred(thousand)} Thousand`)
  if (rest) {
    parts.push(rest < 100 && parts.length > 0 ? `And ${belowHundred(rest)}` : belowThousand(rest))
  }
  return parts.length > 0 ? parts.join(' ') : ONES[0]
}

/**
 * Whole-rupee amount in words using lakh and crore grouping,
 * e.g. `150000` → "One Lakh Fifty Thousand Only". Credit amounts read
 * "Minus …".
 */
export function amountInWords(amount: number): string {
  if (!Number.isFinite(amount)) {
    throw new RangeError(`Cannot express ${amount} in words`)
  }
  const words = `${indianWords(Math.floor(Math.abs(amount)))} Only`
  return amount <= -1 ? `Minus ${words}` : words
}

export function toDateKey(date: Date): DateKey {
  const y = date.getUTCFullYear().toString().padStart(4, '0')
  const m = (date.getUTCMonth() + 1).toString().padStart(2, '0')
  const d = date.getUTCDate().toString().padStart(2, '0')
  return `${y}-${m}-${d}`
}

export function todayDateKey(now: Date = new Date()): DateKey {
  return format(now, 'yyyy-MM-dd')
}

// Tried in order: day-first before month-first, four-digit years before two
const DATE_FORMATS = [
  'yyyy-MM-dd',
  'dd-MM-yyyy',
  'dd/MM/yyyy',
  'dd.MM.yyyy',
  'dd-MMM-yyyy',
  'dd MMM yyyy',
  'MM/dd/yyyy',
  'd/M/yy',
  'd-M-yy',
  'd-MMM-yy',
]

const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30)
const MS_PER_DAY = 24 * 60 * 60 * 1000
const REFERENCE_DATE = new Date(2000, 0, 1)

function plausible(date: Date): boolean {
  const year = date.getFullYear()
  return year >= 1900 && year <= 2100
}

/**
 * Reads a date from a spreadsheet cell: a Date, an Excel serial day number or
 * text in one of the common Indian/ISO layouts. Anything else gives `null`.
 */
export function parseFlexibleDate(value: unknown): DateKey | null {
  if (value instanceof Date) {
    return isValid(value) ? toDateKey(value) : null
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 1 || value > 2958465) return null
    return toDateKey(new Date(EXCEL_EPOCH_MS + Math.floor(value) * MS_PER_DAY))
  }

  if (typeof value !== 'string') return null

  let text = value.trim()
  if (!text) return null
  if (/^\d{4}-\d{2}-\d{2}T/.test(text)) text = text.slice(0, 10)

  for (const pattern of DATE_FORMATS) {
    const parsed = parse(text, pattern, REFERENCE_DATE)
    if (isValid(parsed) && plausible(parsed)) {
      return format(parsed, 'yyyy-MM-dd')
    }
  }
  return null
}
