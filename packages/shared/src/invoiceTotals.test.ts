import assert from 'node:assert'
import { describe, it } from 'node:test'
import Decimal from 'decimal.js'

import { calculateInvoiceTotals, UnsupportedGstTypeError } from './invoiceTotals'

const sampleItems = [{ amount: 100 }, { amount: 250.5 }]
const sampleInvoice = { fuelPercentage: 5, additionalCharges: 20, gstRate: 18 }

describe('calculateInvoiceTotals', () => {
  it('charges IGST on subtotal plus fuel plus additional charges', () => {
    const totals = calculateInvoiceTotals(sampleItems, { ...sampleInvoice, gstType: 'IGST' })

    assert.deepStrictEqual(totals, {
      subtotal: 350.5,
      fuelCharge: 17.53,
      additionalCharges: 20,
      taxBase: 388.03,
      igst: 69.84,
      cgst: 0,
      sgst: 0,
      igstRate: 18,
      cgstRate: 0,
      sgstRate: 0,
      totalTax: 69.84,
      // ceil(388.025 + 69.8445)
      billAmount: 458,
    })
  })

  it('splits the rate into equal CGST and SGST halves', () => {
    const totals = calculateInvoiceTotals(sampleItems, { ...sampleInvoice, gstType: 'CGST' })

    assert.strictEqual(totals.igst, 0)
    assert.strictEqual(totals.igstRate, 0)
    assert.strictEqual(totals.cgst, 34.92)
    assert.strictEqual(totals.sgst, 34.92)
    assert.strictEqual(totals.cgstRate, 9)
    assert.strictEqual(totals.sgstRate, 9)
    assert.strictEqual(totals.billAmount, 458)
  })

  it('charges the same total tax intra-state as inter-state', () => {
    const inter = calculateInvoiceTotals(sampleItems, { ...sampleInvoice, gstType: 'IGST' })
    const intra = calculateInvoiceTotals(sampleItems, { ...sampleInvoice, gstType: 'CGST' })

    assert.strictEqual(intra.totalTax, inter.totalTax)
    assert.strictEqual(intra.billAmount, inter.billAmount)
  })

  it('keeps the exact half rate for odd rates', () => {
    const totals = calculateInvoiceTotals([{ amount: 1000 }], { gstType: 'CGST', gstRate: 5 })

    assert.strictEqual(totals.cgstRate, 2.5)
    assert.strictEqual(totals.cgst, 25)
    assert.strictEqual(totals.sgst, 25)
    assert.strictEqual(totals.billAmount, 1050)
  })

  it('zeroes every tax bucket when GST does not apply', () => {
    const totals = calculateInvoiceTotals(sampleItems, { ...sampleInvoice, gstType: 'NONE' })

    assert.strictEqual(totals.igst, 0)
    assert.strictEqual(totals.cgst, 0)
    assert.strictEqual(totals.sgst, 0)
    assert.strictEqual(totals.igstRate, 0)
    assert.strictEqual(totals.cgstRate, 0)
    assert.strictEqual(totals.totalTax, 0)
    assert.strictEqual(totals.billAmount, 389)
  })

  it('bills the ceiling of the subtotal with no surcharges', () => {
    assert.strictEqual(calculateInvoiceTotals([{ amount: 10.2 }, { amount: 5.1 }], { gstType: 'NONE' }).billAmount, 16)
    assert.strictEqual(calculateInvoiceTotals([{ amount: 100 }, { amount: 200 }], { gstType: 'NONE' }).billAmount, 300)
    assert.strictEqual(calculateInvoiceTotals([{ amount: 0.1 }, { amount: 0.2 }], { gstType: 'NONE' }).subtotal, 0.3)
  })

  it('treats missing and malformed numbers as zero', () => {
    const totals = calculateInvoiceTotals(
      [{ amount: 'abc' }, { amount: null }, {}, { amount: '12.5' }, { amount: '  ' }],
      { fuelPercentage: undefined, additionalCharges: 'n/a', gstType: null, gstRate: null }
    )

    assert.strictEqual(totals.subtotal, 12.5)
    assert.strictEqual(totals.fuelCharge, 0)
    assert.strictEqual(totals.additionalCharges, 0)
    assert.strictEqual(totals.billAmount, 13)
  })

  it('accepts regime aliases', () => {
    const totals = calculateInvoiceTotals([{ amount: 100 }], { gstType: 'inter-state', gstRate: 12 })

    assert.strictEqual(totals.igst, 12)
    assert.strictEqual(totals.billAmount, 112)
  })

  it('rejects an unknown regime', () => {
    assert.throws(
      () => calculateInvoiceTotals([{ amount: 100 }], { gstType: 'VAT', gstRate: 20 }),
      UnsupportedGstTypeError
    )
  })

  it('rounds the bill up by less than one unit', () => {
    const cases = [
      { amounts: ['99.99', '0.02'], fuel: '3', extra: '0', type: 'IGST', rate: '18' },
      { amounts: ['1234.56', '78.9', '0.01'], fuel: '7.5', extra: '15.25', type: 'CGST', rate: '12' },
      { amounts: ['500'], fuel: '0', extra: '0', type: 'IGST', rate: '0' },
    ]

    for (const c of cases) {
      const totals = calculateInvoiceTotals(
        c.amounts.map((amount) => ({ amount })),
        { fuelPercentage: c.fuel, additionalCharges: c.extra, gstType: c.type, gstRate: c.rate }
      )
      const subtotal = c.amounts.reduce((sum, a) => sum.plus(a), new Decimal(0))
      const base = subtotal.plus(subtotal.times(c.fuel).dividedBy(100)).plus(c.extra)
      const exact = base.plus(base.times(c.rate).dividedBy(100))

      assert.ok(Number.isInteger(totals.billAmount))
      assert.ok(new Decimal(totals.billAmount).gte(exact))
      assert.ok(new Decimal(totals.billAmount).minus(exact).lt(1))
    }
  })

  it('gives identical results when recomputed', () => {
    const first = calculateInvoiceTotals(sampleItems, { ...sampleInvoice, gstType: 'CGST' })
    const second = calculateInvoiceTotals(sampleItems, { ...sampleInvoice, gstType: 'CGST' })

    assert.deepStrictEqual(second, first)
  })
})
