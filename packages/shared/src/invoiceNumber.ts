export const INVOICE_NUMBER_PREFIX = 'INV'

export interface LastInvoiceRef {
  id: number
  invoiceNo: string | null
}

export function formatInvoiceNumber(sequence: number): string {
  const paddedSequence = sequence.toString().padStart(4, '0')
  return `${INVOICE_NUMBER_PREFIX}-${paddedSequence}`
}

/**
 * Numeric part of an `INV-####` number, or null when it doesn't follow the pattern.
 */
export function invoiceNumberSuffix(invoiceNo: string | null | undefined): number | null {
  if (!invoiceNo) return null
  const match = /^INV-(\d+)$/i.exec(invoiceNo.trim())
  if (!match) return null
  const sequence = Number(match[1])
  return Number.isSafeInteger(sequence) ? sequence : null
}

/**
 * Number for the invoice created after `last`. Historical numbers that don't
 * parse fall back to the record id, so this never throws.
 */
export function nextInvoiceNumber(last: LastInvoiceRef | null | undefined): string {
  if (!last) return formatInvoiceNumber(1)

  const sequence = invoiceNumberSuffix(last.invoiceNo)
  if (sequence === null) {
    return formatInvoiceNumber(last.id + 1)
  }
  return formatInvoiceNumber(sequence + 1)
}
