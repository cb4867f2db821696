/**
 * Price parsing
 *
 * Turns source-native price text ("US$ 1,049.00", "1.049,00 €", "Rs. 1,29,999")
 * into an amount and an ISO currency.
 */

import { ERROR_CODES, ParseError } from '../lib/errors.js'

export interface ParsedPrice {
  amount: number
  currency: string
}

export interface PriceContext {
  region: string
  /** ISO code supplied by the adapter in rawAttributes.currency */
  currencyHint?: string
}

export const REGION_CURRENCY: Readonly<Record<string, string>> = {
  US: 'USD',
  CA: 'CAD',
  GB: 'GBP',
  UK: 'GBP',
  IE: 'EUR',
  DE: 'EUR',
  FR: 'EUR',
  IT: 'EUR',
  ES: 'EUR',
  NL: 'EUR',
  AU: 'AUD',
  IN: 'INR',
  SG: 'SGD',
  MY: 'MYR',
  PH: 'PHP',
  JP: 'JPY',
}

const DOLLAR_CURRENCIES = new Set(['USD', 'CAD', 'AUD', 'SGD'])

const ISO_CODE = /\b(USD|CAD|AUD|GBP|EUR|INR|JPY|SGD|MYR|PHP|CNY)\b/

// Longest prefixes first so "US$" wins over "$"
const SYMBOLS: ReadonlyArray<[RegExp, string]> = [
  [/US\$/, 'USD'],
  [/CA?\$/, 'CAD'],
  [/AU?\$/, 'AUD'],
  [/S\$/, 'SGD'],
  [/\bRs\.?/, 'INR'],
  [/\bRM\b/, 'MYR'],
  [/₹/, 'INR'],
  [/€/, 'EUR'],
  [/£/, 'GBP'],
  [/¥/, 'JPY'],
  [/₱/, 'PHP'],
]

// Digits with thousands/decimal separators; a plain space only groups when three digits follow
const NUMBER = /\d(?:[\d.,'\u00a0\u202f]|\s(?=\d{3}(?!\d)))*/

export function regionCurrency(region: string): string | undefined {
  return REGION_CURRENCY[region.toUpperCase()]
}

function normalizeHint(hint: string | undefined): string | undefined {
  const code = hint?.trim().toUpperCase()
  return code && /^[A-Z]{3}$/.test(code) ? code : undefined
}

export function detectCurrency(text: string, ctx: PriceContext): string | undefined {
  const iso = text.toUpperCase().match(ISO_CODE)
  if (iso) return iso[1]

  for (const [pattern, currency] of SYMBOLS) {
    if (pattern.test(text)) return currency
  }

  const hint = normalizeHint(ctx.currencyHint)
  const regional = regionCurrency(ctx.region)

  if (text.includes('$')) {
    if (hint && DOLLAR_CURRENCIES.has(hint)) return hint
    if (regional && DOLLAR_CURRENCIES.has(regional)) return regional
    return 'USD'
  }

  return hint ?? regional
}

/**
 * Interpret grouping and decimal separators.
 *
 * - both ',' and '.' present: the later one is the decimal mark
 * - one separator occurring more than once: grouping (1,29,999 / 1.299.000)
 * - one separator occurring once: grouping when exactly three digits follow
 */
export function parseAmount(raw: string): number {
  const compact = raw.replace(/[\s\u00a0\u202f']/g, '').replace(/[.,]+$/, '')
  const lastComma = compact.lastIndexOf(',')
  const lastDot = compact.lastIndexOf('.')

  let canonical: string
  if (lastComma >= 0 && lastDot >= 0) {
    const decimal = lastComma > lastDot ? ',' : '.'
    const grouping = decimal === ',' ? '.' : ','
    canonical = compact.split(grouping).join('').replace(decimal, '.')
  } else if (lastComma >= 0 || lastDot >= 0) {
    const separator = lastComma >= 0 ? ',' : '.'
    const parts = compact.split(separator)
    if (parts.length > 2 || parts[parts.length - 1].length === 3) {
      canonical = parts.join('')
    } else {
      canonical = parts.join('.')
    }
  } else {
    canonical = compact
  }

  return Number.parseFloat(canonical)
}

/**
 * Parse a price. Throws ParseError when no amount is found or it is not positive.
 */
export function parsePrice(text: string, ctx: PriceContext): ParsedPrice {
  const match = text.match(NUMBER)
  if (!match) {
    throw new ParseError(ERROR_CODES.PRICE_UNPARSABLE, 'price', text)
  }

  const amount = parseAmount(match[0])
  if (!Number.isFinite(amount)) {
    throw new ParseError(ERROR_CODES.PRICE_UNPARSABLE, 'price', text)
  }
  const prefix = text.slice(0, match.index)
  const negative = /-[^\w\s]{0,3}$/.test(prefix)
  if (negative || amount <= 0) {
    throw new ParseError(ERROR_CODES.PRICE_NOT_POSITIVE, 'price', text)
  }

  const currency = detectCurrency(text, ctx)
  if (!currency) {
    throw new ParseError(ERROR_CODES.PRICE_UNPARSABLE, 'price', text)
  }

  return { amount: Math.round(amount * 100) / 100, currency }
}

/**
 * Ratings arrive as numbers or text like "4.5 out of 5 stars". Anything outside 0..5 is ignored.
 */
export function parseRating(value: unknown): number | undefined {
  let rating: number | undefined
  if (typeof value === 'number') {
    rating = value
  } else if (typeof value === 'string') {
    const match = value.match(/\d+(?:[.,]\d+)?/)
    rating = match ? Number.parseFloat(match[0].replace(',', '.')) : undefined
  }
  if (rating === undefined || !Number.isFinite(rating) || rating < 0 || rating > 5) {
    return undefined
  }
  return rating
}
