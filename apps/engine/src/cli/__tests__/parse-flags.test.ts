import { describe, it, expect } from 'vitest'
import { parseFlags, UsageError } from '../parse-flags.js'

describe('parseFlags', () => {
  it('applies defaults', () => {
    expect(parseFlags(['search', '--query', 'iPhone 16 Pro'])).toEqual({
      query: 'iPhone 16 Pro',
      region: 'US',
      maxResults: 10,
      filters: {},
      refresh: false,
      json: false,
      help: false,
    })
  })

  it('reads every flag in both spellings', () => {
    const opts = parseFlags([
      'search',
      '--query=Pixel 9 Pro',
      '--region',
      'gb',
      '--max=5',
      '--sources',
      'ebay, bestbuy',
      '--exclude-sources=amazon',
      '--min-price',
      '100',
      '--max-price=999.99',
      '--deadline-ms',
      '3000',
      '--refresh',
      '--json',
    ])

    expect(opts).toEqual({
      query: 'Pixel 9 Pro',
      region: 'GB',
      maxResults: 5,
      filters: { sources: 'ebay,bestbuy', excludeSources: 'amazon', minPrice: '100', maxPrice: '999.99' },
      deadlineMs: 3000,
      refresh: true,
      json: true,
      help: false,
    })
  })

  it('answers --help without a query', () => {
    expect(parseFlags(['search', '--help']).help).toBe(true)
    expect(parseFlags(['--help']).help).toBe(true)
  })

  it.each([
    [[], 'Missing command'],
    [['find', '--query', 'tv'], 'Unknown command: find'],
    [['search'], '--query is required'],
    [['search', '--query'], '--query needs a value'],
    [['search', '--query', '--json'], '--query needs a value'],
    [['search', '--query', 'tv', '--max', '0'], '--max must be an integer between 1 and 100, got "0"'],
    [['search', '--query', 'tv', '--max', '2.5'], '--max must be an integer between 1 and 100, got "2.5"'],
    [['search', '--query', 'tv', '--min-price', 'cheap'], '--min-price must be a number, got "cheap"'],
    [['search', '--query', 'tv', '--verbose'], 'Unknown argument: --verbose'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseFlags(argv)).toThrow(UsageError)
    expect(() => parseFlags(argv)).toThrow(message)
  })
})
