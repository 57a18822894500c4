export * from './types'
export * from './utils'
export * from './invoiceTotals'
export * from './invoiceNumber'
