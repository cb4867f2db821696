/**
 * Title normalization
 *
 * productName keeps the human-readable title; normalizedName is the matching key.
 */

const UNIT_SUFFIXES = new Set(['gb', 'tb', 'mb', 'mah', 'mm', 'hz', 'ghz', 'mp'])

export const DEFAULT_BOILERPLATE: readonly string[] = [
  'new',
  'brand',
  'sealed',
  'unlocked',
  'free',
  'shipping',
  'delivery',
  'sale',
  'deal',
  'hot',
  'best',
  'official',
  'genuine',
  'original',
  'authentic',
  'fast',
  'with',
  'the',
  'and',
  'for',
  'factory',
  'warranty',
]

/**
 * Split text into lower-case tokens.
 *
 * - punctuation becomes whitespace; hyphens inside words survive ("wi-fi")
 * - a number followed by a unit merges ("128 GB" → "128gb")
 */
export function tokenizeTitle(text: string): string[] {
  const raw = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, ' ')
    .split(/\s+/)
    .map((token) => token.replace(/^-+|-+$/g, ''))
    .filter((token) => token.length > 0)

  const tokens: string[] = []
  for (const token of raw) {
    const previous = tokens[tokens.length - 1]
    if (previous !== undefined && UNIT_SUFFIXES.has(token) && /^\d+(?:\.\d+)?$/.test(previous)) {
      tokens[tokens.length - 1] = previous + token
    } else {
      tokens.push(token)
    }
  }
  return tokens
}

export function normalizeTitle(title: string, boilerplate: ReadonlySet<string>): string {
  return tokenizeTitle(title)
    .filter((token) => !boilerplate.has(token))
    .join(' ')
}

export function displayTitle(title: string): string {
  return title.replace(/\s+/g, ' ').trim()
}
