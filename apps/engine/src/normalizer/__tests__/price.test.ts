import { describe, it, expect } from 'vitest'
import { ParseError } from '../../lib/errors.js'
import { parseAmount, parsePrice, parseRating } from '../price.js'

describe('parsePrice', () => {
  it.each([
    ['$1,049.00', 'US', 1049, 'USD'],
    ['US$ 999', 'SG', 999, 'USD'],
    ['C$ 1,299.99', 'US', 1299.99, 'CAD'],
    ['1.049,00 €', 'DE', 1049, 'EUR'],
    ['€999,99', 'FR', 999.99, 'EUR'],
    ['1 299,00 €', 'FR', 1299, 'EUR'],
    ['£1,049', 'GB', 1049, 'GBP'],
    ['Rs. 1,29,999', 'IN', 129999, 'INR'],
    ['₹1,29,999', 'IN', 129999, 'INR'],
    ['USD 1,049', 'CA', 1049, 'USD'],
    ['¥150000', 'JP', 150000, 'JPY'],
  ])('parses %s in %s', (text, region, amount, currency) => {
    expect(parsePrice(text, { region })).toEqual({ amount, currency })
  })

  it('reads a bare dollar sign as the region dollar', () => {
    expect(parsePrice('$999', { region: 'CA' }).currency).toBe('CAD')
    expect(parsePrice('$999', { region: 'US' }).currency).toBe('USD')
    expect(parsePrice('$999', { region: 'DE' }).currency).toBe('USD')
  })

  it('falls back to the currency hint, then the region default', () => {
    expect(parsePrice('1299', { region: 'US', currencyHint: 'eur' })).toEqual({ amount: 1299, currency: 'EUR' })
    expect(parsePrice('1299', { region: 'GB' })).toEqual({ amount: 1299, currency: 'GBP' })
  })

  it('rejects text without an amount', () => {
    expect(() => parsePrice('Call for price', { region: 'US' })).toThrow(ParseError)
  })

  it('rejects zero and negative prices', () => {
    expect(() => parsePrice('$0.00', { region: 'US' })).toThrowError(/Cannot parse price/)
    try {
      parsePrice('-$5.00', { region: 'US' })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError)
      expect(error).toMatchObject({ code: 'PRICE_NOT_POSITIVE' })
    }
  })

  it('rejects amounts with no way to tell the currency', () => {
    expect(() => parsePrice('999', { region: 'ZZ' })).toThrow(ParseError)
  })
})

describe('parseAmount', () => {
  it('treats a lone separator followed by three digits as grouping', () => {
    expect(parseAmount('1,049')).toBe(1049)
    expect(parseAmount('1.049')).toBe(1049)
  })

  it('treats a lone separator followed by one or two digits as decimal', () => {
    expect(parseAmount('1,5')).toBe(1.5)
    expect(parseAmount('12.99')).toBe(12.99)
  })

  it('drops a trailing separator', () => {
    expect(parseAmount('999.')).toBe(999)
  })
})

describe('parseRating', () => {
  it('reads numbers and rating text', () => {
    expect(parseRating(4)).toBe(4)
    expect(parseRating('4.5 out of 5 stars')).toBe(4.5)
    expect(parseRating('4,7')).toBe(4.7)
  })

  it('ignores values outside 0..5 and non-numeric input', () => {
    expect(parseRating(7)).toBeUndefined()
    expect(parseRating('n/a')).toBeUndefined()
    expect(parseRating(null)).toBeUndefined()
  })
})
