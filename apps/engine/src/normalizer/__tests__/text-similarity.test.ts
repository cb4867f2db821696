import { describe, it, expect } from 'vitest'
import { DEFAULT_MATCHING_CONFIG } from '../config.js'
import { diceSimilarity, levenshteinSimilarity, titleSimilarity } from '../text-similarity.js'
import { DEFAULT_BOILERPLATE, normalizeTitle, tokenizeTitle } from '../title.js'

const boilerplate = new Set(DEFAULT_BOILERPLATE)
const variants = new Set(DEFAULT_MATCHING_CONFIG.variantTokens)

function similarity(title1: string, title2: string): number {
  return titleSimilarity(
    normalizeTitle(title1, boilerplate),
    normalizeTitle(title2, boilerplate),
    DEFAULT_MATCHING_CONFIG,
    variants
  )
}

describe('normalizeTitle', () => {
  it('lower-cases, strips punctuation and boilerplate, merges units', () => {
    expect(normalizeTitle('Apple iPhone 16 Pro (128 GB) - Natural Titanium | Unlocked', boilerplate)).toBe(
      'apple iphone 16 pro 128gb natural titanium'
    )
  })

  it('keeps hyphens inside words', () => {
    expect(tokenizeTitle('Wi-Fi 6E Router')).toEqual(['wi-fi', '6e', 'router'])
  })

  it('returns an empty name when only boilerplate remains', () => {
    expect(normalizeTitle('NEW! Free Shipping!!', boilerplate)).toBe('')
  })
})

describe('diceSimilarity', () => {
  it('computes 2|A∩B| / (|A|+|B|)', () => {
    expect(diceSimilarity(new Set(['a', 'b', 'c']), new Set(['b', 'c', 'd']))).toBeCloseTo(4 / 6)
  })

  it('returns 0 for an empty set', () => {
    expect(diceSimilarity(new Set(), new Set(['a']))).toBe(0)
  })
})

describe('levenshteinSimilarity', () => {
  it('returns 1 for identical text', () => {
    expect(levenshteinSimilarity('iphone', 'iphone')).toBe(1)
  })

  it('scales edit distance by the longer length', () => {
    expect(levenshteinSimilarity('kitten', 'sitting')).toBeCloseTo(1 - 3 / 7)
  })

  it('returns 0 for empty input', () => {
    expect(levenshteinSimilarity('', 'abc')).toBe(0)
  })
})

describe('titleSimilarity', () => {
  it('matches reordered titles with an extra colour word', () => {
    const score = similarity('Apple iPhone 16 Pro 128GB Titanium', 'iPhone 16 Pro (128GB, Natural Titanium)')
    expect(score).toBeCloseTo(0.7778, 3)
    expect(score).toBeGreaterThanOrEqual(DEFAULT_MATCHING_CONFIG.clusterThreshold)
  })

  it('keeps a base model apart from its Pro variant', () => {
    const score = similarity('iPhone 16', 'iPhone 16 Pro')
    expect(score).toBeCloseTo(0.2569, 3)
    expect(score).toBeLessThan(DEFAULT_MATCHING_CONFIG.clusterThreshold)
  })

  it('keeps different storage sizes apart', () => {
    expect(similarity('iPhone 16 Pro 128GB', 'iPhone 16 Pro 256GB')).toBeLessThan(
      DEFAULT_MATCHING_CONFIG.clusterThreshold
    )
  })

  it('keeps different generations apart', () => {
    expect(similarity('iPhone 16 Pro 128GB', 'iPhone 15 Pro 128GB')).toBeLessThan(
      DEFAULT_MATCHING_CONFIG.clusterThreshold
    )
  })

  it('is symmetric', () => {
    const a = 'Samsung Galaxy S24 Ultra 256GB'
    const b = 'Galaxy S24 Ultra 256 GB Titanium Black'
    expect(similarity(a, b)).toBe(similarity(b, a))
  })
})
